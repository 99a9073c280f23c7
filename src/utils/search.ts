import type { ContactsMap, Conversation } from '../types/index.js'
import { normalizePhoneNumber } from './phone.js'

export interface ContactEntry {
  phoneNumber: string
  name: string
}

/**
 * Case-insensitive match on contact name and last message; the number is
 * matched as typed. An empty query matches everything.
 */
export function conversationMatchesSearch(conv: Conversation, query: string): boolean {
  if (!query) return true
  const needle = query.toLowerCase()
  return (
    conv.contactName.toLowerCase().includes(needle) ||
    conv.phoneNumber.includes(query) ||
    conv.lastMessage.toLowerCase().includes(needle)
  )
}

export function filterConversations(conversations: readonly Conversation[], query: string): Conversation[] {
  return conversations.filter((conv) => conversationMatchesSearch(conv, query))
}

/**
 * Contacts for the new-chat picker, sorted by name. A non-blank query keeps
 * contacts whose name contains it, or whose number contains it either as
 * typed or digit for digit ("555 0001" finds "+1 (555) 000-1111").
 */
export function filterContacts(contacts: ContactsMap, query: string): ContactEntry[] {
  const entries = Array.from(contacts, ([phoneNumber, name]) => ({ phoneNumber, name }))
  entries.sort((a, b) => a.name.localeCompare(b.name))

  const term = query.trim().toLowerCase()
  if (!term) return entries

  const digits = normalizePhoneNumber(term)
  return entries.filter(
    ({ phoneNumber, name }) =>
      name.toLowerCase().includes(term) ||
      phoneNumber.includes(term) ||
      (digits.length > 0 && normalizePhoneNumber(phoneNumber).includes(digits))
  )
}
