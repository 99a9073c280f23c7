import { describe, it, expect } from 'vitest'
import { PairState } from '../types/index.js'
import { MalformedPayloadError } from '../utils/errors.js'
import { decodeEventLine, parseCoreEvent, parseSmsMessages, parseStateUpdate, toCapabilities } from './protocol.js'

describe('parseCoreEvent', () => {
  it('fills device defaults and maps capability names', () => {
    const result = parseCoreEvent({
      type: 'Connected',
      deviceId: 'phone-1',
      device: { name: 'Pixel', capabilities: ['sms', 'ping', 'unknown-plugin'] },
    })

    expect(result).toEqual({
      ok: true,
      value: {
        type: 'Connected',
        deviceId: 'phone-1',
        device: {
          id: 'phone-1',
          name: 'Pixel',
          deviceType: 'phone',
          pairState: PairState.NotPaired,
          reachable: true,
          capabilities: toCapabilities(['sms', 'ping']),
        },
      },
    })
  })

  it('parses pair state changes', () => {
    expect(parseCoreEvent({ type: 'PairStateChanged', deviceId: 'phone-1', pairState: 'requested' })).toEqual({
      ok: true,
      value: { type: 'PairStateChanged', deviceId: 'phone-1', pairState: PairState.Requested },
    })
  })

  it('reports unknown event types as malformed', () => {
    const result = parseCoreEvent({ type: 'Teleported', deviceId: 'phone-1' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(MalformedPayloadError)
      expect(result.error.code).toBe('MALFORMED_PAYLOAD')
    }
  })
})

describe('decodeEventLine', () => {
  it('decodes one JSON line', () => {
    expect(decodeEventLine('{"type":"Disconnected","deviceId":"phone-1"}')).toEqual({
      ok: true,
      value: { type: 'Disconnected', deviceId: 'phone-1' },
    })
  })

  it('turns invalid JSON into a malformed payload', () => {
    const result = decodeEventLine('{not json')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message.startsWith('Malformed core event payload: (root): ')).toBe(true)
    }
  })
})

describe('parseSmsMessages', () => {
  it('converts wire fields and numeric ids', () => {
    const result = parseSmsMessages({
      messages: [
        {
          id: 17,
          thread_id: 4,
          addresses: [{ address: '+15550001111' }],
          body: 'hi',
          date: 1_000,
          message_type: 1,
          read: 0,
        },
      ],
    })

    expect(result).toEqual({
      ok: true,
      value: {
        messages: [
          {
            id: '17',
            threadId: '4',
            addresses: [{ address: '+15550001111' }],
            body: 'hi',
            date: 1_000,
            messageType: 1,
            read: false,
          },
        ],
      },
    })
  })

  it('rejects a batch with a missing field', () => {
    expect(parseSmsMessages({ messages: [{ id: 1 }] }).ok).toBe(false)
    expect(parseSmsMessages('garbage').ok).toBe(false)
  })
})

describe('parseStateUpdate', () => {
  it('accepts battery and connectivity reports', () => {
    expect(parseStateUpdate({ deviceId: 'phone-1', battery: { level: 80, charging: true } })).toEqual({
      deviceId: 'phone-1',
      battery: { level: 80, charging: true },
    })
  })

  it('returns null for anything else', () => {
    expect(parseStateUpdate({ volume: 3 })).toBeNull()
    expect(parseStateUpdate({ deviceId: 'phone-1', battery: { level: 140, charging: true } })).toBeNull()
  })
})
