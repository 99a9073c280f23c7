import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import type { Conversation } from '../types/index.js'
import { SmsStore } from './store.js'

const conversation = (threadId: string, timestamp: number, overrides: Partial<Conversation> = {}): Conversation => ({
  threadId,
  phoneNumber: '+15550001111',
  contactName: '+15550001111',
  lastMessage: `message ${threadId}`,
  timestamp,
  unread: false,
  ...overrides,
})

describe('SmsStore', () => {
  let store: SmsStore

  beforeEach(() => {
    store = new SmsStore(':memory:')
  })

  afterEach(() => {
    store.close()
  })

  it('returns conversations newest first', () => {
    store.saveConversations('phone-1', [conversation('1', 100), conversation('2', 300, { unread: true })])

    expect(store.getConversations('phone-1')).toEqual([
      conversation('2', 300, { unread: true }),
      conversation('1', 100),
    ])
  })

  it('upserts by thread id', () => {
    store.saveConversations('phone-1', [conversation('1', 100)])
    store.saveConversations('phone-1', [conversation('1', 50, { lastMessage: 'later write' })])

    expect(store.getConversations('phone-1')).toEqual([conversation('1', 50, { lastMessage: 'later write' })])
  })

  it('keeps devices apart', () => {
    store.saveConversations('phone-1', [conversation('1', 100)])
    store.saveConversations('phone-2', [conversation('9', 100)])

    expect(store.getConversations('phone-2').map((c) => c.threadId)).toEqual(['9'])
  })

  it('replaces the contact list', () => {
    store.saveContacts('phone-1', new Map([['+15550001111', 'Jane']]))
    store.saveContacts(
      'phone-1',
      new Map([
        ['+15550002222', 'Sam'],
        ['+15550003333', 'Alex'],
      ])
    )

    expect(Array.from(store.getContacts('phone-1'))).toEqual([
      ['+15550002222', 'Sam'],
      ['+15550003333', 'Alex'],
    ])
  })

  it('clears everything', () => {
    store.saveConversations('phone-1', [conversation('1', 100)])
    store.saveContacts('phone-1', new Map([['+15550001111', 'Jane']]))
    store.clear()

    expect(store.getConversations('phone-1')).toEqual([])
    expect(store.getContacts('phone-1').size).toBe(0)
  })
})
