import type { ContactsMap } from '../types/index.js'

/**
 * Strip everything but ASCII digits.
 * e.g., "+1 (555) 123-4567" → "15551234567"
 */
export function normalizePhoneNumber(phone: string): string {
  return phone.replace(/[^0-9]/g, '')
}

/**
 * Loose phone number equality used for contact lookup and chat matching.
 *
 * Two numbers match when their digits are equal, when one is the other with a
 * leading US country code "1" (the bare form being 10 digits), or when both have
 * at least 7 digits and share the last 7.
 *
 * Symmetric. Only ever compare pairs, never build groups.
 */
export function phonesMatch(a: string, b: string): boolean {
  const left = normalizePhoneNumber(a)
  const right = normalizePhoneNumber(b)

  if (left.length === 0 || right.length === 0) return false

  if (left === right) return true

  if (left.length === 10 && right.length === 11 && right.startsWith('1') && left === right.slice(1)) {
    return true
  }
  if (right.length === 10 && left.length === 11 && left.startsWith('1') && right === left.slice(1)) {
    return true
  }

  return left.length >= 7 && right.length >= 7 && left.slice(-7) === right.slice(-7)
}

/**
 * First contact whose number matches, in map iteration order.
 */
export function findContactName(phone: string, contacts: ContactsMap): string | null {
  for (const [contactPhone, name] of contacts) {
    if (phonesMatch(phone, contactPhone)) return name
  }
  return null
}

/**
 * Contact name for a number, falling back to the number itself.
 */
export function resolveContactName(phone: string, contacts: ContactsMap): string {
  return findContactName(phone, contacts) ?? phone
}
