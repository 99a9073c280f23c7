import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { ConnectionState, PairState, type CoreEvent, type PairingNotification } from '../types/index.js'
import { makeDevice, silentLogger, testConfig } from '../test/fixtures.js'
import { createRelayContext, type RelayContext } from './context.js'
import type { CoreConnection } from './core.js'
import { MemoryCoreConnection } from './memoryCore.js'

const connected = (id: string, pairState = PairState.NotPaired): CoreEvent => ({
  type: 'Connected',
  deviceId: id,
  device: makeDevice(id, { pairState }),
})

let context: RelayContext | null = null

function setup() {
  const ctx = createRelayContext({ config: testConfig, logger: silentLogger() })
  context = ctx
  const connection = new MemoryCoreConnection()
  return { context: ctx, relay: ctx.relay, devices: ctx.devices, connection }
}

/** Feed events, close the stream, and wait until every one has been applied. */
async function run(connection: MemoryCoreConnection, relay: RelayContext['relay'], ...events: CoreEvent[]) {
  relay.start(connection)
  connection.emit(...events)
  connection.end()
  await relay.whenStopped()
}

/** Let the relay drain everything already queued. setImmediate stays real under the fake timers below. */
const settle = () => new Promise<void>((resolve) => setImmediate(resolve))

const requested = (id: string): CoreEvent => ({
  type: 'PairStateChanged',
  deviceId: id,
  pairState: PairState.Requested,
})

afterEach(async () => {
  await context?.shutdown()
  context = null
})

describe('EventRelay', () => {
  it('keeps only the device that is still connected', async () => {
    const { relay, devices, connection } = setup()

    await run(
      connection,
      relay,
      connected('phone-a'),
      connected('phone-b'),
      { type: 'Disconnected', deviceId: 'phone-a' }
    )

    expect(devices.getAll().map((d) => d.id)).toEqual(['phone-b'])
  })

  it('adds a connected device and removes it on disconnect', async () => {
    const { relay, devices, connection } = setup()
    relay.start(connection)

    const first = relay.nextEvent()
    connection.emit({
      type: 'Connected',
      deviceId: 'dev1',
      device: makeDevice('dev1', { name: 'Pixel', pairState: PairState.Paired }),
    })
    await first

    expect(devices.getAll().map((d) => [d.name, d.pairState])).toEqual([['Pixel', PairState.Paired]])

    const second = relay.nextEvent()
    connection.emit({ type: 'Disconnected', deviceId: 'dev1' })
    await second

    expect(devices.getAll()).toEqual([])
  })

  it('marks DevicePaired devices as paired and reachable', async () => {
    const { relay, devices, connection } = setup()

    await run(connection, relay, {
      type: 'DevicePaired',
      deviceId: 'phone-a',
      device: makeDevice('phone-a', { reachable: false }),
    })

    expect(devices.get('phone-a')?.pairState).toBe(PairState.Paired)
    expect(devices.get('phone-a')?.reachable).toBe(true)
  })

  it('raises one pairing request per transition', async () => {
    const { relay, connection } = setup()
    const requests: PairingNotification[] = []
    relay.on('pairing-request', (request) => requests.push(request))

    await run(
      connection,
      relay,
      connected('phone-a'),
      { type: 'PairStateChanged', deviceId: 'phone-a', pairState: PairState.Requested },
      { type: 'PairStateChanged', deviceId: 'phone-a', pairState: PairState.Requested }
    )

    expect(requests).toEqual([{ deviceId: 'phone-a', deviceName: 'Device phone-a', deviceType: 'phone' }])
  })

  it('records settled pair states in the cache', async () => {
    const { relay, devices, connection } = setup()

    await run(connection, relay, connected('phone-a'), {
      type: 'PairStateChanged',
      deviceId: 'phone-a',
      pairState: PairState.Paired,
    })

    expect(devices.get('phone-a')?.pairState).toBe(PairState.Paired)
  })

  it('applies battery and signal reports', async () => {
    const { relay, devices, connection } = setup()
    const raw = vi.fn()
    relay.on('state-updated', raw)

    const payload = {
      deviceId: 'phone-a',
      battery: { level: 80, charging: true },
      connectivity: { signalStrength: 3, networkType: 'LTE' },
    }
    await run(connection, relay, connected('phone-a'), { type: 'StateUpdated', payload })

    expect(devices.get('phone-a')).toMatchObject({
      batteryLevel: 80,
      charging: true,
      signalStrength: 3,
      networkType: 'LTE',
    })
    expect(raw).toHaveBeenCalledWith(payload)
  })

  it('forwards clipboard and media events', async () => {
    const { relay, connection } = setup()
    const clipboard = vi.fn()
    const mpris = vi.fn()
    relay.on('clipboard', clipboard)
    relay.on('mpris', mpris)

    await run(
      connection,
      relay,
      { type: 'ClipboardReceived', content: 'copied text' },
      { type: 'Mpris', payload: { player: 'music' } }
    )

    expect(clipboard).toHaveBeenCalledWith('copied text')
    expect(mpris).toHaveBeenCalledWith({ player: 'music' })
  })

  it('hands SMS traffic to the open SMS engine', async () => {
    const { context: ctx, relay, connection } = setup()
    const sms = ctx.openSms('phone-a')

    await run(connection, relay, {
      type: 'SmsMessages',
      payload: {
        messages: [
          {
            id: 1,
            thread_id: 3,
            addresses: [{ address: '+15550001111' }],
            body: 'hi',
            date: 1,
            message_type: 1,
            read: 0,
          },
        ],
      },
    })

    expect(sms.getConversations().map((c) => [c.threadId, c.lastMessage, c.unread])).toEqual([['3', 'hi', true]])
  })

  it('drops SMS traffic when no SMS engine is open', async () => {
    const { relay, devices, connection } = setup()

    await run(connection, relay, { type: 'SmsMessages', payload: { messages: [] } }, connected('phone-a'))

    expect(devices.has('phone-a')).toBe(true)
  })

  it('hands each applied event to nextEvent', async () => {
    const { relay, connection } = setup()
    relay.start(connection)

    const next = relay.nextEvent()
    connection.emit({ type: 'ClipboardReceived', content: 'x' })

    await expect(next).resolves.toEqual({ type: 'ClipboardReceived', content: 'x' })
  })

  it('stops for good when the core closes the stream', async () => {
    const { context: ctx, relay, connection } = setup()
    const stopped = vi.fn()
    relay.on('stopped', stopped)

    await run(connection, relay, connected('phone-a'))

    expect(stopped).toHaveBeenCalledOnce()
    expect(relay.connectionState).toBe(ConnectionState.Disconnected)
    expect(ctx.dispatcher.isAttached).toBe(false)
    await expect(relay.nextEvent()).resolves.toBeNull()
    expect(() => relay.start(new MemoryCoreConnection())).toThrow('relay already started')
  })

  it('routes commands through the connection while running', async () => {
    const { context: ctx, relay, connection } = setup()
    relay.start(connection)

    expect(ctx.dispatcher.ping('phone-a')).toBe('sent')
    expect(connection.sent).toHaveLength(1)
  })
})

describe('EventRelay.connect', () => {
  it('retries until the core answers', async () => {
    const { relay, connection } = setup()
    const factory = vi
      .fn<() => Promise<CoreConnection>>()
      .mockRejectedValueOnce(new Error('ENOENT'))
      .mockRejectedValueOnce(new Error('ENOENT'))
      .mockResolvedValue(connection)

    await expect(relay.connect(factory, 1)).resolves.toBe(true)
    expect(factory).toHaveBeenCalledTimes(3)
    expect(relay.connectionState).toBe(ConnectionState.Connected)
  })

  it('gives up after the configured retries', async () => {
    const { relay } = setup()
    const states: ConnectionState[] = []
    relay.on('connection-state', (state) => states.push(state))
    const factory = vi.fn<() => Promise<CoreConnection>>().mockRejectedValue(new Error('ENOENT'))

    await expect(relay.connect(factory, 1)).resolves.toBe(false)
    // testConfig allows 2 retries after the first attempt
    expect(factory).toHaveBeenCalledTimes(3)
    expect(states).toEqual([ConnectionState.Connecting, ConnectionState.Disconnected])
  })
})

describe('EventRelay refresh timers', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] })
  })

  afterEach(async () => {
    await context?.shutdown()
    context = null
    vi.useRealTimers()
  })

  it('refreshes every burst interval after a connect, then at the poll cadence', async () => {
    const { relay, connection } = setup()
    const changed = vi.fn()
    relay.on('devices-changed', changed)
    relay.start(connection)

    connection.emit(connected('phone-a'))
    await settle()
    expect(changed).toHaveBeenCalledTimes(1)

    vi.advanceTimersByTime(500)
    await settle()
    expect(changed).toHaveBeenCalledTimes(2)

    // ticks at 1000 through 9500
    vi.advanceTimersByTime(9_000)
    await settle()
    expect(changed).toHaveBeenCalledTimes(20)

    // the window closes at 10000 without a tick
    vi.advanceTimersByTime(500)
    await settle()
    vi.advanceTimersByTime(9_999)
    await settle()
    expect(changed).toHaveBeenCalledTimes(20)

    vi.advanceTimersByTime(1)
    await settle()
    expect(changed).toHaveBeenCalledTimes(21)
  })

  it('restarts the burst when a pairing request is accepted', async () => {
    const { context: ctx, relay, connection } = setup()
    const changed = vi.fn()
    relay.start(connection)
    connection.emit(connected('phone-a'))
    await settle()
    vi.advanceTimersByTime(10_000)
    await settle()
    relay.on('devices-changed', changed)

    expect(ctx.acceptPairing('phone-a')).toBe('sent')
    await settle()
    expect(changed).toHaveBeenCalledTimes(1)
    expect(connection.sent).toEqual([{ type: 'Pair', deviceId: 'phone-a' }])

    vi.advanceTimersByTime(500)
    await settle()
    expect(changed).toHaveBeenCalledTimes(2)
  })

  it('does not restart the burst when the accept cannot be sent', async () => {
    const { context: ctx, relay } = setup()
    const changed = vi.fn()
    relay.on('devices-changed', changed)

    expect(ctx.acceptPairing('phone-a')).toBe('not-initialized')
    vi.advanceTimersByTime(500)
    await settle()
    expect(changed).not.toHaveBeenCalled()
  })

  it('drops a pairing request for a device it has not seen', async () => {
    const { relay, connection } = setup()
    const requests: PairingNotification[] = []
    relay.on('pairing-request', (request) => requests.push(request))
    relay.start(connection)

    connection.emit(requested('ghost'))
    await settle()
    expect(requests).toEqual([])

    connection.emit(connected('ghost'), requested('ghost'))
    await settle()
    expect(requests).toEqual([{ deviceId: 'ghost', deviceName: 'Device ghost', deviceType: 'phone' }])
  })

  it('notifies again after the device disconnects and returns', async () => {
    const { relay, connection } = setup()
    const requests: PairingNotification[] = []
    relay.on('pairing-request', (request) => requests.push(request))
    relay.start(connection)

    connection.emit(connected('phone-a'), requested('phone-a'), requested('phone-a'))
    await settle()
    expect(requests).toHaveLength(1)

    connection.emit({ type: 'Disconnected', deviceId: 'phone-a' }, connected('phone-a'), requested('phone-a'))
    await settle()
    expect(requests).toHaveLength(2)
  })
})
