import type { Logger } from 'pino'
import { PairState, type DeviceId, type PairingNotification } from '../types/index.js'
import type { DeviceCache } from './deviceCache.js'

/**
 * Raises one notification per transition into Requested.
 *
 * Re-delivered Requested packets are swallowed until the device leaves that
 * state (or disconnects). A request for a device that is not in the cache
 * cannot be rendered and is dropped without being recorded, so a later
 * re-delivery after the device connects still notifies.
 */
export class PairingDetector {
  private readonly lastNotified = new Map<DeviceId, PairState>()

  constructor(
    private readonly devices: DeviceCache,
    private readonly logger: Logger
  ) {}

  onPairStateChanged(deviceId: DeviceId, state: PairState): PairingNotification | null {
    if (state !== PairState.Requested) {
      this.observe(deviceId, state)
      return null
    }

    if (this.lastNotified.get(deviceId) === PairState.Requested) {
      this.logger.debug({ deviceId }, 'Pairing request already notified')
      return null
    }

    const device = this.devices.get(deviceId)
    if (!device) {
      this.logger.debug({ deviceId }, 'Pairing request for unknown device, dropping')
      return null
    }

    this.lastNotified.set(deviceId, PairState.Requested)
    this.logger.info({ deviceId, deviceName: device.name }, 'Pairing requested')
    return {
      deviceId,
      deviceName: device.name,
      deviceType: device.deviceType,
    }
  }

  /**
   * Record a state seen outside PairStateChanged (Connected, DevicePaired).
   * Requested is never recorded here: only a notification arms the dedup.
   */
  observe(deviceId: DeviceId, state: PairState): void {
    if (state === PairState.Requested) return
    this.lastNotified.set(deviceId, state)
  }

  forget(deviceId: DeviceId): void {
    this.lastNotified.delete(deviceId)
  }
}

export type RefreshTick = 'burst' | 'poll'

export interface RefreshSchedulerOptions {
  burstWindowMs: number
  burstIntervalMs: number
  pollIntervalMs: number
  now?: () => number
}

/**
 * Timer half of pairing: after a Connected/DevicePaired event, ask for a
 * refresh every `burstIntervalMs` for `burstWindowMs` (battery and capability
 * fields keep arriving after the first packet), then fall back to a slow
 * backstop poll. Ticks are handed to `onTick`; the relay queues them next to
 * Core events.
 */
export class RefreshScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null
  private burstStartedAt: number | null = null
  private running = false
  private readonly now: () => number

  constructor(
    private readonly onTick: (tick: RefreshTick) => void,
    private readonly options: RefreshSchedulerOptions
  ) {
    this.now = options.now ?? (() => Date.now())
  }

  get isRunning(): boolean {
    return this.running
  }

  isBursting(): boolean {
    return this.burstStartedAt !== null && this.now() - this.burstStartedAt < this.options.burstWindowMs
  }

  start(): void {
    if (this.running) return
    this.running = true
    this.arm(this.isBursting() ? this.options.burstIntervalMs : this.options.pollIntervalMs)
  }

  /** Start the burst window, or restart it if one is running. */
  startBurst(): void {
    this.burstStartedAt = this.now()
    if (this.running) {
      this.arm(this.options.burstIntervalMs)
    }
  }

  stop(): void {
    this.running = false
    this.burstStartedAt = null
    this.clear()
  }

  private fire(): void {
    this.timer = null
    if (!this.running) return

    if (this.isBursting()) {
      this.onTick('burst')
      this.arm(this.options.burstIntervalMs)
      return
    }

    if (this.burstStartedAt !== null) {
      // window just elapsed; resume the slow cadence from here
      this.burstStartedAt = null
      this.arm(this.options.pollIntervalMs)
      return
    }

    this.onTick('poll')
    this.arm(this.options.pollIntervalMs)
  }

  private arm(delayMs: number): void {
    this.clear()
    this.timer = setTimeout(() => this.fire(), delayMs)
  }

  private clear(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }
}
