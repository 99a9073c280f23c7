import { z } from 'zod'
import {
  PairState,
  type Capability,
  type CoreEvent,
  type Device,
  type DeviceCapabilities,
  type SmsMessagesPayload,
} from '../types/index.js'
import { MalformedPayloadError } from '../utils/errors.js'

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: MalformedPayloadError }

// ─── Wire schemas ─────────────────────────────────────────────────────

const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String)

const pairStateSchema = z.enum(['not-paired', 'requested', 'paired']).transform((state): PairState => {
  switch (state) {
    case 'paired':
      return PairState.Paired
    case 'requested':
      return PairState.Requested
    case 'not-paired':
      return PairState.NotPaired
  }
})

const wireDeviceSchema = z.object({
  name: z.string(),
  deviceType: z.string().default('phone'),
  pairState: pairStateSchema.default('not-paired'),
  reachable: z.boolean().default(true),
  capabilities: z.array(z.string()).default([]),
  batteryLevel: z.number().int().min(0).max(100).optional(),
  charging: z.boolean().optional(),
  signalStrength: z.number().int().min(-1).max(4).optional(),
  networkType: z.string().optional(),
})

type WireDevice = z.infer<typeof wireDeviceSchema>

const deviceIdSchema = z.string().min(1)

const coreEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Connected'), deviceId: deviceIdSchema, device: wireDeviceSchema }),
  z.object({ type: z.literal('DevicePaired'), deviceId: deviceIdSchema, device: wireDeviceSchema }),
  z.object({ type: z.literal('Disconnected'), deviceId: deviceIdSchema }),
  z.object({ type: z.literal('PairStateChanged'), deviceId: deviceIdSchema, pairState: pairStateSchema }),
  z.object({ type: z.literal('ClipboardReceived'), content: z.string() }),
  z.object({ type: z.literal('StateUpdated'), payload: z.unknown() }),
  z.object({ type: z.literal('Mpris'), payload: z.unknown() }),
  z.object({ type: z.literal('SmsMessages'), payload: z.unknown() }),
  z.object({ type: z.literal('Contacts'), vcards: z.array(z.string()) }),
])

const smsMessagesSchema = z.object({
  messages: z.array(
    z.object({
      id: idSchema,
      thread_id: idSchema,
      addresses: z.array(z.object({ address: z.string() })),
      body: z.string(),
      date: z.number().int(),
      message_type: z.number().int(),
      read: z.union([z.boolean(), z.number().int()]).transform((read) => read === true || read === 1),
    })
  ),
})

const stateUpdateSchema = z.object({
  deviceId: deviceIdSchema,
  battery: z
    .object({
      level: z.number().int().min(0).max(100),
      charging: z.boolean(),
    })
    .optional(),
  connectivity: z
    .object({
      signalStrength: z.number().int().min(-1).max(4),
      networkType: z.string().optional(),
    })
    .optional(),
})

export type DeviceStateUpdate = z.infer<typeof stateUpdateSchema>

// ─── Conversions ──────────────────────────────────────────────────────

export function toCapabilities(names: readonly string[]): DeviceCapabilities {
  const has = (capability: Capability) => names.includes(capability)
  return {
    battery: has('battery'),
    ping: has('ping'),
    share: has('share'),
    sftp: has('sftp'),
    sms: has('sms'),
    contacts: has('contacts'),
    clipboard: has('clipboard'),
    findmyphone: has('findmyphone'),
    mpris: has('mpris'),
    runcommand: has('runcommand'),
    remotekeyboard: has('remotekeyboard'),
    presenter: has('presenter'),
    lockdevice: has('lockdevice'),
    virtualmonitor: has('virtualmonitor'),
  }
}

function toDevice(deviceId: string, wire: WireDevice): Device {
  const device: Device = {
    id: deviceId,
    name: wire.name,
    deviceType: wire.deviceType,
    pairState: wire.pairState,
    reachable: wire.reachable,
    capabilities: toCapabilities(wire.capabilities),
  }
  if (wire.batteryLevel !== undefined) device.batteryLevel = wire.batteryLevel
  if (wire.charging !== undefined) device.charging = wire.charging
  if (wire.signalStrength !== undefined) device.signalStrength = wire.signalStrength
  if (wire.networkType !== undefined) device.networkType = wire.networkType
  return device
}

// ─── Parsers ──────────────────────────────────────────────────────────

/**
 * Validate one Core event (already JSON-decoded).
 */
export function parseCoreEvent(input: unknown): ParseResult<CoreEvent> {
  const parsed = coreEventSchema.safeParse(input)
  if (!parsed.success) {
    return { ok: false, error: new MalformedPayloadError('core event', parsed.error.issues) }
  }

  const event = parsed.data
  switch (event.type) {
    case 'Connected':
    case 'DevicePaired':
      return {
        ok: true,
        value: { type: event.type, deviceId: event.deviceId, device: toDevice(event.deviceId, event.device) },
      }
    case 'Disconnected':
      return { ok: true, value: { type: 'Disconnected', deviceId: event.deviceId } }
    case 'PairStateChanged':
      return {
        ok: true,
        value: { type: 'PairStateChanged', deviceId: event.deviceId, pairState: event.pairState },
      }
    case 'ClipboardReceived':
      return { ok: true, value: { type: 'ClipboardReceived', content: event.content } }
    case 'StateUpdated':
    case 'Mpris':
    case 'SmsMessages':
      return { ok: true, value: { type: event.type, payload: event.payload } }
    case 'Contacts':
      return { ok: true, value: { type: 'Contacts', vcards: event.vcards } }
  }
}

/**
 * Validate the body of an SmsMessages event.
 */
export function parseSmsMessages(payload: unknown): ParseResult<SmsMessagesPayload> {
  const parsed = smsMessagesSchema.safeParse(payload)
  if (!parsed.success) {
    return { ok: false, error: new MalformedPayloadError('SMS', parsed.error.issues) }
  }
  return {
    ok: true,
    value: {
      messages: parsed.data.messages.map((msg) => ({
        id: msg.id,
        threadId: msg.thread_id,
        addresses: msg.addresses,
        body: msg.body,
        date: msg.date,
        messageType: msg.message_type,
        read: msg.read,
      })),
    },
  }
}

/**
 * StateUpdated payloads are opaque; only battery/connectivity reports for a
 * named device are understood. Anything else yields null.
 */
export function parseStateUpdate(payload: unknown): DeviceStateUpdate | null {
  const parsed = stateUpdateSchema.safeParse(payload)
  return parsed.success ? parsed.data : null
}

/**
 * Decode one line of newline-delimited JSON from the Core socket.
 */
export function decodeEventLine(line: string): ParseResult<CoreEvent> {
  let json: unknown
  try {
    json = JSON.parse(line)
  } catch (error) {
    return {
      ok: false,
      error: new MalformedPayloadError('core event', [
        { code: 'custom', path: [], message: error instanceof Error ? error.message : 'invalid JSON' },
      ]),
    }
  }
  return parseCoreEvent(json)
}
