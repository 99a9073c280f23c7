import { describe, it, expect } from 'vitest'
import { PairState } from '../types/index.js'
import { batteryLabel, formatRelativeTime, pairStateLabel, signalLabel, truncate } from './formatters.js'

const MINUTE = 60_000
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR

describe('formatRelativeTime', () => {
  it('buckets the elapsed time', () => {
    expect(formatRelativeTime(0, 30_000)).toBe('Just now')
    expect(formatRelativeTime(0, 2 * MINUTE)).toBe('2 min ago')
    expect(formatRelativeTime(0, 2 * HOUR)).toBe('2 hours ago')
    expect(formatRelativeTime(0, 3 * DAY)).toBe('3 days ago')
    expect(formatRelativeTime(0, 8 * DAY)).toBe('More than a week ago')
  })
})

describe('truncate', () => {
  it('keeps short strings and shortens long ones with an ellipsis', () => {
    expect(truncate('hello', 5)).toBe('hello')
    expect(truncate('hello world', 5)).toBe('hell…')
  })
})

describe('device labels', () => {
  it('describes the pair state', () => {
    expect(pairStateLabel(PairState.Paired)).toBe('Paired')
    expect(pairStateLabel(PairState.Requested)).toBe('Pairing…')
    expect(pairStateLabel(PairState.NotPaired)).toBe('Not paired')
  })

  it('shows battery only when reported', () => {
    expect(batteryLabel({ batteryLevel: 80, charging: false })).toBe('🔋 80%')
    expect(batteryLabel({ batteryLevel: 42, charging: true })).toBe('⚡ 42%')
    expect(batteryLabel({})).toBe('')
  })

  it('draws signal bars', () => {
    expect(signalLabel({ signalStrength: 3, networkType: 'LTE' })).toBe('▮▮▮▯ LTE')
    expect(signalLabel({ signalStrength: -1 })).toBe('✕')
    expect(signalLabel({})).toBe('')
  })
})
