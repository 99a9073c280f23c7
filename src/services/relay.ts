import { EventEmitter } from 'node:events'
import { setTimeout as sleep } from 'node:timers/promises'
import type { Logger } from 'pino'
import {
  ConnectionState,
  PairState,
  type CoreEvent,
  type Device,
  type DeviceId,
  type PairingNotification,
} from '../types/index.js'
import type { RelayConfig } from '../utils/config.js'
import { AsyncQueue } from '../utils/queue.js'
import type { CommandDispatcher } from './commands.js'
import type { CoreConnection, CoreConnectionFactory } from './core.js'
import type { DeviceCache } from './deviceCache.js'
import { RefreshScheduler, type PairingDetector, type RefreshTick } from './pairing.js'
import { parseStateUpdate, type DeviceStateUpdate } from './protocol.js'
import type { SmsEngine } from './sms.js'

/** Everything the consumption loop reacts to, in arrival order. */
export type RelayInput =
  | { source: 'core'; event: CoreEvent }
  | { source: 'timer'; tick: RefreshTick }
  | { source: 'local'; action: 'pairing-accepted'; deviceId: DeviceId }

export interface RelayEvents {
  /** No payload: listeners re-read the device cache */
  'devices-changed': () => void
  'pairing-request': (notification: PairingNotification) => void
  clipboard: (content: string) => void
  'state-updated': (payload: unknown) => void
  mpris: (payload: unknown) => void
  'connection-state': (state: ConnectionState) => void
  /** Every Core event, after it has been applied */
  event: (event: CoreEvent) => void
  stopped: () => void
}

export interface EventRelayOptions {
  devices: DeviceCache
  dispatcher: CommandDispatcher
  detector: PairingDetector
  logger: Logger
  config: Pick<
    RelayConfig,
    'burstWindowMs' | 'burstIntervalMs' | 'pollIntervalMs' | 'maxConnectRetries'
  >
  /** Where SMS traffic goes; null when no SMS window is open */
  smsSink: () => SmsEngine | null
}

const MAX_RETRY_DELAY_MS = 10_000

export declare interface EventRelay {
  on<E extends keyof RelayEvents>(event: E, listener: RelayEvents[E]): this
  once<E extends keyof RelayEvents>(event: E, listener: RelayEvents[E]): this
  off<E extends keyof RelayEvents>(event: E, listener: RelayEvents[E]): this
  emit<E extends keyof RelayEvents>(event: E, ...args: Parameters<RelayEvents[E]>): boolean
}

/**
 * Drains the Core event stream and the refresh timers through one queue, so
 * every cache mutation happens on a single sequential path: one input is fully
 * applied before the next is read. Core ordering is trusted as delivered.
 *
 * When the Core closes its stream the relay stops for good; it does not
 * reconnect.
 */
export class EventRelay extends EventEmitter {
  private readonly queue = new AsyncQueue<RelayInput>()
  private readonly scheduler: RefreshScheduler
  private readonly devices: DeviceCache
  private readonly dispatcher: CommandDispatcher
  private readonly detector: PairingDetector
  private readonly logger: Logger
  private readonly options: EventRelayOptions
  private connection: CoreConnection | null = null
  private loop: Promise<void> | null = null
  private stopped = false
  private state = ConnectionState.Disconnected

  constructor(options: EventRelayOptions) {
    super()
    this.options = options
    this.devices = options.devices
    this.dispatcher = options.dispatcher
    this.detector = options.detector
    this.logger = options.logger
    this.scheduler = new RefreshScheduler((tick) => this.enqueue({ source: 'timer', tick }), options.config)
  }

  get connectionState(): ConnectionState {
    return this.state
  }

  get isStopped(): boolean {
    return this.stopped
  }

  /**
   * Open a connection, retrying with a linear backoff. Resolves true once the
   * relay is running, false when every attempt failed.
   */
  async connect(factory: CoreConnectionFactory, retryDelayMs = 1000): Promise<boolean> {
    const maxRetries = this.options.config.maxConnectRetries

    for (let attempt = 0; ; attempt++) {
      this.setState(ConnectionState.Connecting)
      try {
        const connection = await factory()
        this.start(connection)
        return true
      } catch (err) {
        if (attempt >= maxRetries) {
          this.logger.error({ err, attempts: attempt + 1 }, 'Could not reach the core')
          this.setState(ConnectionState.Disconnected)
          return false
        }
        const delay = Math.min(retryDelayMs * (attempt + 1), MAX_RETRY_DELAY_MS)
        this.logger.warn({ err, attempt: attempt + 1, delay }, 'Core connection failed, retrying')
        await sleep(delay)
      }
    }
  }

  /** Begin consuming. A relay runs once; after it stops it stays stopped. */
  start(connection: CoreConnection): void {
    if (this.loop || this.stopped) {
      throw new Error('relay already started')
    }

    this.connection = connection
    this.dispatcher.attach(connection)
    this.setState(ConnectionState.Connected)
    this.scheduler.start()

    void this.pump(connection)
    this.loop = this.run()
  }

  /** Resolves when the consumption loop has ended. */
  whenStopped(): Promise<void> {
    return this.loop ?? Promise.resolve()
  }

  /**
   * The next Core event once applied, or null when the stream has ended.
   */
  nextEvent(): Promise<CoreEvent | null> {
    if (this.stopped) return Promise.resolve(null)

    return new Promise((resolve) => {
      const onEvent = (event: CoreEvent) => {
        this.off('stopped', onStopped)
        resolve(event)
      }
      const onStopped = () => {
        this.off('event', onEvent)
        resolve(null)
      }
      this.once('event', onEvent)
      this.once('stopped', onStopped)
    })
  }

  /**
   * The user answered a pairing request with Pair. The device reports its new
   * state over the following seconds, so refresh at the burst cadence again.
   */
  pairingAccepted(deviceId: DeviceId): void {
    if (!this.loop || this.stopped) return
    this.enqueue({ source: 'local', action: 'pairing-accepted', deviceId })
  }

  async stop(): Promise<void> {
    const connection = this.connection
    if (connection) {
      await connection.close()
    }
    this.queue.close()
    await this.whenStopped()
  }

  private enqueue(input: RelayInput): void {
    if (!this.queue.push(input)) {
      this.logger.trace({ input: input.source }, 'Relay closed, input dropped')
    }
  }

  private async pump(connection: CoreConnection): Promise<void> {
    try {
      for await (const event of connection.events()) {
        this.enqueue({ source: 'core', event })
      }
    } catch (err) {
      this.logger.warn({ err }, 'Core event stream failed')
    } finally {
      this.queue.close()
    }
  }

  private async run(): Promise<void> {
    for await (const input of this.queue) {
      try {
        this.apply(input)
      } catch (err) {
        this.logger.error({ err, input: input.source }, 'Failed to apply relay input')
      }
    }
    this.shutdown()
  }

  private shutdown(): void {
    this.stopped = true
    this.scheduler.stop()
    this.dispatcher.detach()
    this.connection = null
    this.setState(ConnectionState.Disconnected)
    this.logger.info('Relay stopped')
    this.emit('stopped')
  }

  private setState(state: ConnectionState): void {
    if (this.state === state) return
    this.state = state
    this.emit('connection-state', state)
  }

  private apply(input: RelayInput): void {
    if (input.source === 'timer') {
      this.logger.trace({ tick: input.tick }, 'Refresh tick')
      this.emit('devices-changed')
      return
    }

    if (input.source === 'local') {
      this.logger.debug({ deviceId: input.deviceId }, 'Pairing accepted, refreshing')
      this.scheduler.startBurst()
      this.emit('devices-changed')
      return
    }

    const event = input.event
    switch (event.type) {
      case 'Connected':
        this.logger.info({ deviceId: event.deviceId, name: event.device.name }, 'Device connected')
        this.upsertLive({ ...event.device, id: event.deviceId })
        break

      case 'DevicePaired':
        this.logger.info({ deviceId: event.deviceId, name: event.device.name }, 'Device paired')
        this.upsertLive({ ...event.device, id: event.deviceId, pairState: PairState.Paired })
        break

      case 'Disconnected':
        if (!this.devices.remove(event.deviceId)) {
          this.logger.debug({ deviceId: event.deviceId }, 'Disconnect for unknown device')
        }
        this.detector.forget(event.deviceId)
        this.logger.info({ deviceId: event.deviceId, remaining: this.devices.size }, 'Device disconnected')
        this.emit('devices-changed')
        break

      case 'PairStateChanged':
        this.applyPairState(event.deviceId, event.pairState)
        break

      case 'ClipboardReceived':
        this.emit('clipboard', event.content)
        break

      case 'StateUpdated': {
        const update = parseStateUpdate(event.payload)
        if (update && this.applyStateUpdate(update)) {
          this.emit('devices-changed')
        }
        this.emit('state-updated', event.payload)
        break
      }

      case 'Mpris':
        this.emit('mpris', event.payload)
        break

      case 'SmsMessages': {
        const sms = this.options.smsSink()
        if (sms) sms.ingestPacket(event.payload)
        else this.logger.debug('SMS batch with no SMS window open')
        break
      }

      case 'Contacts': {
        const sms = this.options.smsSink()
        if (sms) sms.ingestVcards(event.vcards)
        else this.logger.debug('Contacts with no SMS window open')
        break
      }
    }

    this.emit('event', event)
  }

  private upsertLive(device: Device): void {
    this.devices.upsert({ ...device, reachable: true })
    this.detector.observe(device.id, device.pairState)
    this.emit('devices-changed')
    this.scheduler.startBurst()
  }

  private applyPairState(deviceId: string, state: PairState): void {
    const notification = this.detector.onPairStateChanged(deviceId, state)
    if (notification) {
      this.emit('pairing-request', notification)
    }
    // a pending request is shown through the notification, not the cache
    if (state === PairState.Requested) return

    const current = this.devices.get(deviceId)
    if (!current) {
      this.logger.debug({ deviceId, state }, 'Pair state for unknown device')
      return
    }
    if (current.pairState !== state) {
      this.devices.upsert({ ...current, pairState: state })
      this.emit('devices-changed')
    }
  }

  /** Optional fields only. Returns whether the cache changed. */
  private applyStateUpdate(update: DeviceStateUpdate): boolean {
    const current = this.devices.get(update.deviceId)
    if (!current) {
      this.logger.debug({ deviceId: update.deviceId }, 'State update for unknown device')
      return false
    }

    const next: Device = { ...current }
    if (update.battery) {
      next.batteryLevel = update.battery.level
      next.charging = update.battery.charging
    }
    if (update.connectivity) {
      next.signalStrength = update.connectivity.signalStrength
      if (update.connectivity.networkType !== undefined) {
        next.networkType = update.connectivity.networkType
      }
    }
    this.devices.upsert(next)
    return true
  }
}
