import { PairState, type Device, type Message, MessageDirection } from '../types/index.js'
import type { RelayConfig } from '../utils/config.js'
import { toCapabilities } from '../services/protocol.js'
import { createSilentLogger } from '../utils/logger.js'

export const silentLogger = createSilentLogger

export function makeDevice(id: string, overrides: Partial<Device> = {}): Device {
  return {
    id,
    name: `Device ${id}`,
    deviceType: 'phone',
    pairState: PairState.NotPaired,
    reachable: true,
    capabilities: toCapabilities(['battery', 'ping', 'sms']),
    ...overrides,
  }
}

export function makeMessage(overrides: Partial<Message> & Pick<Message, 'id' | 'threadId'>): Message {
  return {
    body: 'hello',
    address: '+15550001111',
    date: 1_000,
    direction: MessageDirection.Received,
    read: true,
    ...overrides,
  }
}

export const testConfig: RelayConfig = {
  socketPath: '/tmp/connect-relay-test/core.sock',
  dataDir: '/tmp/connect-relay-test',
  logLevel: 'silent',
  burstWindowMs: 10_000,
  burstIntervalMs: 500,
  pollIntervalMs: 10_000,
  maxConnectRetries: 2,
  cache: false,
}
