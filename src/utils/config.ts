import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { DATA_DIR_NAME, SOCKET_FILE_NAME, APP_NAME } from '../types/index.js'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const configSchema = z.object({
  socketPath: z.string().min(1),
  dataDir: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  burstWindowMs: z.number().int().positive(),
  burstIntervalMs: z.number().int().positive(),
  pollIntervalMs: z.number().int().positive(),
  maxConnectRetries: z.number().int().nonnegative(),
  cache: z.boolean(),
})

export type RelayConfig = Readonly<z.infer<typeof configSchema>>

export const DEFAULT_BURST_WINDOW_MS = 10_000
export const DEFAULT_BURST_INTERVAL_MS = 500
export const DEFAULT_POLL_INTERVAL_MS = 10_000
export const DEFAULT_MAX_CONNECT_RETRIES = 5

type Env = Record<string, string | undefined>

/**
 * Value of `--flag <value>` or `--flag=value`, if present.
 */
export function readFlag(argv: readonly string[], flag: string): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === flag) return argv[i + 1]
    if (arg?.startsWith(`${flag}=`)) return arg.slice(flag.length + 1)
  }
  return undefined
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  return Number(raw)
}

/**
 * Build the runtime configuration from CLI arguments and environment.
 * Throws a ZodError when a value is out of range.
 */
export function loadConfig(argv: readonly string[], env: Env = process.env): RelayConfig {
  const dataDir = env.CONNECT_RELAY_HOME || join(homedir(), DATA_DIR_NAME)
  const runtimeDir = env.XDG_RUNTIME_DIR ? join(env.XDG_RUNTIME_DIR, APP_NAME) : dataDir

  const config = configSchema.parse({
    socketPath:
      readFlag(argv, '--socket') || env.CONNECT_RELAY_SOCKET || join(runtimeDir, SOCKET_FILE_NAME),
    dataDir,
    logLevel: readFlag(argv, '--log-level') || env.CONNECT_RELAY_LOG_LEVEL || 'info',
    burstWindowMs: readNumber(env, 'CONNECT_RELAY_BURST_WINDOW_MS', DEFAULT_BURST_WINDOW_MS),
    burstIntervalMs: readNumber(env, 'CONNECT_RELAY_BURST_INTERVAL_MS', DEFAULT_BURST_INTERVAL_MS),
    pollIntervalMs: readNumber(env, 'CONNECT_RELAY_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS),
    maxConnectRetries: readNumber(env, 'CONNECT_RELAY_MAX_RETRIES', DEFAULT_MAX_CONNECT_RETRIES),
    cache: !argv.includes('--no-cache'),
  })

  return Object.freeze(config)
}
