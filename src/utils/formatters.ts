import { join } from 'node:path'
import { mkdirSync } from 'node:fs'
import { DB_FILE_NAME, PairState, type Device } from '../types/index.js'

/**
 * Format a unix timestamp (ms) into a short conversation-list label.
 * - Today: "HH:MM"
 * - This week: "Mon", "Tue", etc.
 * - Older: "DD/MM/YY"
 */
export function formatTimestamp(timestampMs: number, now: Date = new Date()): string {
  const date = new Date(timestampMs)
  const diffMs = now.getTime() - date.getTime()
  const diffDays = Math.floor(diffMs / (1000 * 60 * 60 * 24))

  if (diffDays === 0 && date.getDate() === now.getDate()) {
    return date.toLocaleTimeString([], { hour: '2-digit', minute: '2-digit', hour12: false })
  }

  if (diffDays < 7) {
    return date.toLocaleDateString([], { weekday: 'short' })
  }

  return date.toLocaleDateString([], {
    day: '2-digit',
    month: '2-digit',
    year: '2-digit',
  })
}

/**
 * Format a timestamp for message display (always show time).
 */
export function formatMessageTime(timestampMs: number): string {
  const date = new Date(timestampMs)
  return date.toLocaleTimeString([], { hour: '2-digit', minute: '2-digit', hour12: false })
}

/**
 * "Just now", "5 min ago", "3 hours ago", "2 days ago", "More than a week ago".
 */
export function formatRelativeTime(timestampMs: number, nowMs: number = Date.now()): string {
  const diff = Math.floor((nowMs - timestampMs) / 1000)

  if (diff < 60) return 'Just now'
  if (diff < 3600) return `${Math.floor(diff / 60)} min ago`
  if (diff < 86400) return `${Math.floor(diff / 3600)} hours ago`
  if (diff < 604800) return `${Math.floor(diff / 86400)} days ago`
  return 'More than a week ago'
}

/**
 * Truncate a string to a max length, appending "…" if truncated.
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str
  return str.slice(0, maxLength - 1) + '…'
}

/**
 * Make sure the data directory exists and return it.
 */
export function ensureDataDir(dir: string): string {
  mkdirSync(dir, { recursive: true })
  return dir
}

/**
 * SQLite cache location inside the data directory.
 */
export function getDbPath(dataDir: string): string {
  return join(ensureDataDir(dataDir), DB_FILE_NAME)
}

export function pairStateLabel(state: PairState): string {
  switch (state) {
    case PairState.Paired:
      return 'Paired'
    case PairState.Requested:
      return 'Pairing…'
    case PairState.NotPaired:
      return 'Not paired'
  }
}

/**
 * "🔋 80%", "⚡ 42%", or "" when the device never reported a battery level.
 */
export function batteryLabel(device: Pick<Device, 'batteryLevel' | 'charging'>): string {
  if (device.batteryLevel === undefined) return ''
  const icon = device.charging ? '⚡' : '🔋'
  return `${icon} ${device.batteryLevel}%`
}

/**
 * Signal bars for 0–4, "✕" for no signal (-1), "" when unknown.
 */
export function signalLabel(device: Pick<Device, 'signalStrength' | 'networkType'>): string {
  const strength = device.signalStrength
  if (strength === undefined) return ''
  const network = device.networkType ? ` ${device.networkType}` : ''
  if (strength < 0) return `✕${network}`
  const bars = Math.min(4, strength)
  return `${'▮'.repeat(bars)}${'▯'.repeat(4 - bars)}${network}`
}

export function deviceIcon(deviceType: string): string {
  switch (deviceType) {
    case 'tablet':
      return '📱'
    case 'desktop':
    case 'laptop':
      return '💻'
    case 'tv':
      return '📺'
    default:
      return '📱'
  }
}
