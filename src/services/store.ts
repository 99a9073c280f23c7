import Database from 'better-sqlite3'
import type { ContactsMap, Conversation, DeviceId } from '../types/index.js'

interface ConversationRow {
  thread_id: string
  phone_number: string
  contact_name: string
  last_message: string
  timestamp: number
  unread: number
}

interface ContactRow {
  phone_number: string
  name: string
}

/**
 * Last-known SMS conversations and contacts per device, so the SMS screen has
 * something to show before the phone answers. Written after the engine merges,
 * read once when an engine is created.
 */
export class SmsStore {
  private readonly db: Database.Database

  /** `filename` may be ':memory:' */
  constructor(filename: string) {
    this.db = new Database(filename)

    // Enable WAL mode for better concurrent read performance
    this.db.pragma('journal_mode = WAL')
    initTables(this.db)
  }

  getConversations(deviceId: DeviceId): Conversation[] {
    const rows = this.db
      .prepare<[string], ConversationRow>(
        `SELECT thread_id, phone_number, contact_name, last_message, timestamp, unread
         FROM conversations
         WHERE device_id = ?
         ORDER BY timestamp DESC`
      )
      .all(deviceId)

    return rows.map((row) => ({
      threadId: row.thread_id,
      phoneNumber: row.phone_number,
      contactName: row.contact_name,
      lastMessage: row.last_message,
      timestamp: row.timestamp,
      unread: row.unread === 1,
    }))
  }

  /**
   * Upsert every conversation of the batch. Rows for threads missing from the
   * batch stay; the table only grows, like the in-memory one.
   */
  saveConversations(deviceId: DeviceId, conversations: readonly Conversation[]): void {
    const upsert = this.db.prepare<[string, string, string, string, string, number, number]>(
      `INSERT INTO conversations (device_id, thread_id, phone_number, contact_name, last_message, timestamp, unread)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(device_id, thread_id) DO UPDATE SET
         phone_number = excluded.phone_number,
         contact_name = excluded.contact_name,
         last_message = excluded.last_message,
         timestamp = excluded.timestamp,
         unread = excluded.unread`
    )

    const saveAll = this.db.transaction((batch: readonly Conversation[]) => {
      for (const conv of batch) {
        upsert.run(
          deviceId,
          conv.threadId,
          conv.phoneNumber,
          conv.contactName,
          conv.lastMessage,
          conv.timestamp,
          conv.unread ? 1 : 0
        )
      }
    })
    saveAll(conversations)
  }

  getContacts(deviceId: DeviceId): ContactsMap {
    const rows = this.db
      .prepare<[string], ContactRow>('SELECT phone_number, name FROM contacts WHERE device_id = ? ORDER BY rowid')
      .all(deviceId)
    return new Map(rows.map((row): [string, string] => [row.phone_number, row.name]))
  }

  /** Replace the device's whole contact list. */
  saveContacts(deviceId: DeviceId, contacts: ContactsMap): void {
    const remove = this.db.prepare<[string]>('DELETE FROM contacts WHERE device_id = ?')
    const insert = this.db.prepare<[string, string, string]>(
      'INSERT OR REPLACE INTO contacts (device_id, phone_number, name) VALUES (?, ?, ?)'
    )

    const replaceAll = this.db.transaction((entries: Array<[string, string]>) => {
      remove.run(deviceId)
      for (const [phone, name] of entries) {
        insert.run(deviceId, phone, name)
      }
    })
    replaceAll(Array.from(contacts))
  }

  clear(): void {
    this.db.exec('DELETE FROM conversations; DELETE FROM contacts;')
  }

  close(): void {
    this.db.close()
  }
}

function initTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS conversations (
      device_id     TEXT NOT NULL,
      thread_id     TEXT NOT NULL,
      phone_number  TEXT NOT NULL DEFAULT '',
      contact_name  TEXT NOT NULL DEFAULT '',
      last_message  TEXT NOT NULL DEFAULT '',
      timestamp     INTEGER NOT NULL DEFAULT 0,
      unread        INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (device_id, thread_id)
    );

    CREATE TABLE IF NOT EXISTS contacts (
      device_id     TEXT NOT NULL,
      phone_number  TEXT NOT NULL,
      name          TEXT NOT NULL DEFAULT '',
      PRIMARY KEY (device_id, phone_number)
    );
  `)
}
