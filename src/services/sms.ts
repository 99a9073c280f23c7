import { EventEmitter } from 'node:events'
import type { Logger } from 'pino'
import {
  MessageDirection,
  type CommandStatus,
  type ContactsMap,
  type Conversation,
  type DeviceId,
  type Message,
  type SmsPacketMessage,
  type SmsProtocolEvent,
} from '../types/index.js'
import { findContactName, phonesMatch, resolveContactName } from '../utils/phone.js'
import { vcardsToContacts } from '../utils/vcard.js'
import type { CommandDispatcher } from './commands.js'
import { parseSmsMessages } from './protocol.js'
import type { SmsStore } from './store.js'

export const PLACEHOLDER_MESSAGE_PREFIX = 'sending_'
export const PLACEHOLDER_THREAD_PREFIX = 'new_'
/** How far apart an optimistic bubble and its authoritative echo may be dated */
export const ECHO_WINDOW_MS = 60_000

/** Android message type for an outgoing SMS */
const MESSAGE_TYPE_SENT = 2

export interface SmsEngineEvents {
  'sms-event': (event: SmsProtocolEvent) => void
  'conversations-changed': () => void
  'messages-changed': () => void
  'contacts-changed': () => void
}

export interface SmsEngineOptions {
  deviceId: DeviceId
  dispatcher: CommandDispatcher
  logger: Logger
  store?: SmsStore | null
  now?: () => number
}

export function isPlaceholderMessage(message: Pick<Message, 'id'>): boolean {
  return message.id.startsWith(PLACEHOLDER_MESSAGE_PREFIX)
}

export function isPlaceholderThread(threadId: string): boolean {
  return threadId.startsWith(PLACEHOLDER_THREAD_PREFIX)
}

export function toMessage(packet: SmsPacketMessage): Message {
  return {
    id: packet.id,
    threadId: packet.threadId,
    body: packet.body,
    address: packet.addresses[0]?.address ?? '',
    date: packet.date,
    direction: packet.messageType === MESSAGE_TYPE_SENT ? MessageDirection.Sent : MessageDirection.Received,
    read: packet.read,
  }
}

/**
 * Collapse a message batch into one conversation per thread. The newest
 * message of each thread supplies the preview, timestamp and number.
 */
export function messagesToConversations(messages: readonly Message[], contacts: ContactsMap): Conversation[] {
  const threads = new Map<string, Message[]>()
  for (const message of messages) {
    const thread = threads.get(message.threadId)
    if (thread) thread.push(message)
    else threads.set(message.threadId, [message])
  }

  return Array.from(threads, ([threadId, thread]) => {
    const newest = thread.reduce((latest, msg) => (msg.date > latest.date ? msg : latest))
    return {
      threadId,
      phoneNumber: newest.address,
      contactName: resolveContactName(newest.address, contacts),
      lastMessage: newest.body,
      timestamp: newest.date,
      unread: thread.some((msg) => !msg.read),
    }
  })
}

const byTimestampDesc = (a: Conversation, b: Conversation) => b.timestamp - a.timestamp
const byDateAsc = (a: Message, b: Message) => a.date - b.date

const isNumericThread = (threadId: string) => /^-?\d+$/.test(threadId)

export declare interface SmsEngine {
  on<E extends keyof SmsEngineEvents>(event: E, listener: SmsEngineEvents[E]): this
  off<E extends keyof SmsEngineEvents>(event: E, listener: SmsEngineEvents[E]): this
  emit<E extends keyof SmsEngineEvents>(event: E, ...args: Parameters<SmsEngineEvents[E]>): boolean
}

/**
 * Conversation table and open-thread message list for one device.
 *
 * This is the only writer of SMS state. Conversations merge last-writer-wins
 * by thread id and stay sorted newest first; messages of the open thread
 * dedupe by id and stay sorted oldest first. Readers get copies.
 */
export class SmsEngine extends EventEmitter {
  readonly deviceId: DeviceId
  private conversations: Conversation[] = []
  private messages: Message[] = []
  private selectedThread: string | null = null
  private contacts: ContactsMap = new Map()
  private sendSeq = 0
  private readonly dispatcher: CommandDispatcher
  private readonly logger: Logger
  private readonly store: SmsStore | null
  private readonly now: () => number

  constructor(options: SmsEngineOptions) {
    super()
    this.deviceId = options.deviceId
    this.dispatcher = options.dispatcher
    this.logger = options.logger
    this.store = options.store ?? null
    this.now = options.now ?? (() => Date.now())

    if (this.store) {
      this.contacts = this.store.getContacts(this.deviceId)
      const cached = this.store.getConversations(this.deviceId)
      if (cached.length > 0) {
        this.logger.debug({ count: cached.length }, 'Restoring cached conversations')
        this.mergeConversations(cached)
      }
    }
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  getConversations(): Conversation[] {
    return this.conversations.map((conv) => ({ ...conv }))
  }

  getMessages(): Message[] {
    return this.messages.map((msg) => ({ ...msg }))
  }

  getSelectedThread(): string | null {
    return this.selectedThread
  }

  getSelectedConversation(): Conversation | null {
    const conv = this.conversations.find((c) => c.threadId === this.selectedThread)
    return conv ? { ...conv } : null
  }

  getContacts(): ContactsMap {
    return new Map(this.contacts)
  }

  // ─── Core input ─────────────────────────────────────────────────────

  /**
   * Body of an SmsMessages event. A malformed batch is dropped whole and the
   * tables are left as they were.
   */
  ingestPacket(payload: unknown): void {
    const parsed = parseSmsMessages(payload)
    if (!parsed.ok) {
      this.logger.warn({ err: parsed.error }, 'Dropping malformed SMS batch')
      this.handleProtocolEvent({ type: 'Error', error: parsed.error.message })
      return
    }

    const messages = parsed.value.messages.map(toMessage)
    this.logger.debug({ count: messages.length }, 'SMS batch received')

    for (const message of messages) {
      this.handleProtocolEvent({ type: 'MessageReceived', message })
    }
    if (messages.length > 0) {
      this.handleProtocolEvent({
        type: 'ConversationsReceived',
        conversations: messagesToConversations(messages, this.contacts),
      })
    }
  }

  ingestVcards(vcards: string[]): void {
    this.loadContacts(vcardsToContacts(vcards))
  }

  handleProtocolEvent(event: SmsProtocolEvent): void {
    this.emit('sms-event', event)
    switch (event.type) {
      case 'MessageReceived':
        this.ingestMessage(event.message)
        break
      case 'ConversationsReceived':
        this.mergeConversations(event.conversations)
        break
      case 'Error':
        this.logger.warn({ error: event.error }, 'SMS protocol error')
        break
    }
  }

  // ─── Reconciliation ─────────────────────────────────────────────────

  /**
   * Add a message to the open thread. Returns false when it belongs to another
   * thread or its id is already present (the first copy wins).
   */
  ingestMessage(message: Message): boolean {
    if (this.selectedThread === null) return false

    if (isPlaceholderThread(this.selectedThread)) {
      this.adoptThread(message)
    }

    if (message.threadId !== this.selectedThread) return false

    if (this.messages.some((m) => m.id === message.id)) {
      this.logger.debug({ id: message.id }, 'Message already present, skipping')
      return false
    }

    if (message.direction === MessageDirection.Sent) {
      const echoOf = this.messages.findIndex(
        (m) =>
          isPlaceholderMessage(m) &&
          m.body === message.body &&
          phonesMatch(m.address, message.address) &&
          Math.abs(m.date - message.date) <= ECHO_WINDOW_MS
      )
      if (echoOf !== -1) {
        this.messages.splice(echoOf, 1)
      }
    }

    this.messages.push({ ...message })
    this.messages.sort(byDateAsc)
    this.emit('messages-changed')
    return true
  }

  /**
   * Merge a batch into the conversation table by thread id. Known threads take
   * the incoming preview, timestamp, name and unread flag; new threads are
   * inserted. Merging the same batch twice changes nothing.
   */
  mergeConversations(batch: readonly Conversation[]): void {
    for (const incoming of batch) {
      const existing = this.conversations.find((c) => c.threadId === incoming.threadId)
      if (existing) {
        existing.lastMessage = incoming.lastMessage
        existing.timestamp = incoming.timestamp
        existing.contactName = incoming.contactName
        existing.unread = incoming.unread
      } else {
        this.conversations.push({ ...incoming })
      }
    }

    this.conversations.sort(byTimestampDesc)
    this.persistConversations()
    this.emit('conversations-changed')
  }

  /**
   * Replace the contacts map and re-resolve every conversation name against
   * it. Returns how many names changed.
   */
  loadContacts(contacts: ContactsMap): number {
    this.contacts = new Map(contacts)
    this.logger.info({ count: contacts.size }, 'Contacts loaded')

    let updated = 0
    for (const conv of this.conversations) {
      const name = findContactName(conv.phoneNumber, this.contacts)
      if (name !== null && name !== conv.contactName) {
        conv.contactName = name
        updated++
      }
    }

    if (this.store) {
      this.store.saveContacts(this.deviceId, this.contacts)
    }
    this.emit('contacts-changed')
    if (updated > 0) {
      this.persistConversations()
      this.emit('conversations-changed')
    }
    this.logger.debug({ updated }, 'Conversation names updated from contacts')
    return updated
  }

  // ─── User actions ───────────────────────────────────────────────────

  openThread(threadId: string): void {
    if (this.dropPlaceholders(threadId)) {
      this.emit('conversations-changed')
    }
    this.selectedThread = threadId
    this.messages = []
    this.emit('messages-changed')
    this.refreshThread()
  }

  /**
   * Open the conversation whose number matches, or start a placeholder one.
   * Returns the opened thread id, or null for an empty number.
   */
  startChat(phoneNumber: string): string | null {
    const phone = phoneNumber.trim()
    if (!phone) return null

    const existing = this.conversations.find((c) => phonesMatch(c.phoneNumber, phone))
    if (existing) {
      this.openThread(existing.threadId)
      return existing.threadId
    }

    this.dropPlaceholders(null)
    const now = this.now()
    const placeholder: Conversation = {
      threadId: `${PLACEHOLDER_THREAD_PREFIX}${now}`,
      phoneNumber: phone,
      contactName: resolveContactName(phone, this.contacts),
      lastMessage: '',
      timestamp: now,
      unread: false,
    }
    this.conversations.unshift(placeholder)
    this.conversations.sort(byTimestampDesc)
    this.selectedThread = placeholder.threadId
    this.messages = []
    this.emit('conversations-changed')
    this.emit('messages-changed')
    return placeholder.threadId
  }

  /**
   * Optimistic send: the bubble appears before the Core answers. Returns the
   * placeholder, or null when there is nothing to send or nowhere to send it.
   */
  sendMessage(text: string): Message | null {
    if (!text.trim()) return null

    const threadId = this.selectedThread
    if (threadId === null) {
      this.logger.warn('No thread selected')
      return null
    }

    const conv = this.conversations.find((c) => c.threadId === threadId)
    if (!conv) {
      this.logger.warn({ threadId }, 'Conversation not found')
      return null
    }

    const now = this.now()
    const placeholder: Message = {
      id: `${PLACEHOLDER_MESSAGE_PREFIX}${now}-${++this.sendSeq}`,
      threadId,
      body: text,
      address: conv.phoneNumber,
      date: now,
      direction: MessageDirection.Sent,
      read: true,
    }
    this.messages.push(placeholder)
    this.messages.sort(byDateAsc)
    this.emit('messages-changed')

    if (this.dispatcher.sendSms(this.deviceId, conv.phoneNumber, text) === 'sent') {
      this.refreshThread()
    }
    return { ...placeholder }
  }

  refreshConversations(): CommandStatus {
    return this.dispatcher.requestConversations(this.deviceId)
  }

  /** Ask the Core for the open thread again. Placeholder threads have nothing to ask for. */
  refreshThread(): CommandStatus | null {
    const threadId = this.selectedThread
    if (threadId === null) return null
    if (!isNumericThread(threadId)) {
      this.logger.debug({ threadId }, 'Thread has no Core id yet')
      return null
    }
    return this.dispatcher.requestConversation(this.deviceId, Number(threadId))
  }

  // ─── Internals ──────────────────────────────────────────────────────

  /**
   * A chat started from a bare number lives under a placeholder id until the
   * phone reports a message for that number; from then on the real thread id
   * is used and the placeholder conversation goes away.
   */
  private adoptThread(message: Message): void {
    const placeholderId = this.selectedThread
    if (placeholderId === null || message.threadId === placeholderId) return

    const index = this.conversations.findIndex((c) => c.threadId === placeholderId)
    const placeholder = this.conversations[index]
    if (!placeholder || !phonesMatch(placeholder.phoneNumber, message.address)) return

    this.logger.debug({ placeholderId, threadId: message.threadId }, 'Adopting real thread id')
    this.conversations.splice(index, 1)
    this.selectedThread = message.threadId
    for (const msg of this.messages) {
      msg.threadId = message.threadId
    }
    this.emit('conversations-changed')
  }

  /** Forget placeholder conversations other than `keep`. Returns whether any went away. */
  private dropPlaceholders(keep: string | null): boolean {
    const before = this.conversations.length
    this.conversations = this.conversations.filter((c) => !isPlaceholderThread(c.threadId) || c.threadId === keep)
    return this.conversations.length !== before
  }

  private persistConversations(): void {
    if (!this.store) return
    const persistable = this.conversations.filter((c) => !isPlaceholderThread(c.threadId))
    this.store.saveConversations(this.deviceId, persistable)
  }
}
