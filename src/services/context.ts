import type { Logger } from 'pino'
import type { CommandStatus, DeviceId } from '../types/index.js'
import type { RelayConfig } from '../utils/config.js'
import { CommandDispatcher } from './commands.js'
import { DeviceCache } from './deviceCache.js'
import { PairingDetector } from './pairing.js'
import { EventRelay } from './relay.js'
import { SmsEngine } from './sms.js'
import type { SmsStore } from './store.js'

export interface RelayContextOptions {
  config: RelayConfig
  logger: Logger
  store?: SmsStore | null
}

/**
 * Owns every long-lived piece of the client. One per process; nothing lives in
 * module scope.
 */
export class RelayContext {
  readonly config: RelayConfig
  readonly logger: Logger
  readonly devices = new DeviceCache()
  readonly dispatcher: CommandDispatcher
  readonly detector: PairingDetector
  readonly relay: EventRelay
  private readonly store: SmsStore | null
  private sms: SmsEngine | null = null

  constructor(options: RelayContextOptions) {
    this.config = options.config
    this.logger = options.logger
    this.store = options.store ?? null

    this.dispatcher = new CommandDispatcher(this.logger.child({ component: 'dispatcher' }))
    this.detector = new PairingDetector(this.devices, this.logger.child({ component: 'pairing' }))
    this.relay = new EventRelay({
      devices: this.devices,
      dispatcher: this.dispatcher,
      detector: this.detector,
      logger: this.logger.child({ component: 'relay' }),
      config: this.config,
      smsSink: () => this.sms,
    })
  }

  get activeSms(): SmsEngine | null {
    return this.sms
  }

  /** Answer a pairing request and restart the refresh burst once it is on its way. */
  acceptPairing(deviceId: DeviceId): CommandStatus {
    const status = this.dispatcher.acceptPairing(deviceId)
    if (status === 'sent') {
      this.relay.pairingAccepted(deviceId)
    }
    return status
  }

  /**
   * The SMS engine for a device. Opening another device replaces the active
   * engine; opening the same one returns it unchanged.
   */
  openSms(deviceId: DeviceId): SmsEngine {
    if (this.sms?.deviceId === deviceId) {
      return this.sms
    }

    this.closeSms()
    const engine = new SmsEngine({
      deviceId,
      dispatcher: this.dispatcher,
      logger: this.logger.child({ component: 'sms', deviceId }),
      store: this.config.cache ? this.store : null,
    })
    this.sms = engine
    engine.refreshConversations()
    return engine
  }

  closeSms(): void {
    if (!this.sms) return
    this.sms.removeAllListeners()
    this.sms = null
  }

  async shutdown(): Promise<void> {
    this.closeSms()
    await this.relay.stop()
    this.store?.close()
  }
}

export function createRelayContext(options: RelayContextOptions): RelayContext {
  return new RelayContext(options)
}
