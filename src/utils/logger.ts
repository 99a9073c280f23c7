import { join } from 'node:path'
import pino, { type Logger } from 'pino'
import type { RelayConfig } from './config.js'
import { LOG_FILE_NAME } from '../types/index.js'

export type { Logger }

/**
 * File-backed logger. The terminal belongs to Ink, so nothing goes to stdout.
 */
export function createLogger(config: Pick<RelayConfig, 'dataDir' | 'logLevel'>): Logger {
  const destination = pino.destination({
    dest: join(config.dataDir, LOG_FILE_NAME),
    mkdir: true,
    sync: false,
  })
  return pino({ level: config.logLevel, base: { app: 'connect-relay' } }, destination)
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
