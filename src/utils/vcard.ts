import type { ContactsMap } from '../types/index.js'

export interface VcardContact {
  name: string | null
  phones: string[]
}

/**
 * Pull the display name and phone numbers out of a vCard.
 * FN wins; N ("Family;Given;...") is used as "Given Family" only when FN is absent.
 */
export function parseVcard(content: string): VcardContact {
  let formattedName: string | null = null
  let structuredName: string | null = null
  const phones: string[] = []

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim()

    if (line.startsWith('FN:')) {
      formattedName = line.slice(3).trim()
    } else if (line.startsWith('N:')) {
      const parts = line.slice(2).split(';')
      if (parts.length >= 2) {
        const fullName = `${(parts[1] ?? '').trim()} ${(parts[0] ?? '').trim()}`.trim()
        if (fullName) structuredName = fullName
      }
    } else if (line.startsWith('TEL')) {
      const colon = line.lastIndexOf(':')
      if (colon !== -1) {
        const phone = line.slice(colon + 1).trim()
        if (phone) phones.push(phone)
      }
    }
  }

  return { name: formattedName || structuredName, phones }
}

/**
 * Flatten a batch of vCards into a phone → name map.
 * Cards without a name contribute nothing.
 */
export function vcardsToContacts(vcards: string[]): ContactsMap {
  const contacts: ContactsMap = new Map()
  for (const card of vcards) {
    const { name, phones } = parseVcard(card)
    if (!name) continue
    for (const phone of phones) {
      contacts.set(phone, name)
    }
  }
  return contacts
}
