#!/usr/bin/env node
import React from 'react'
import { render } from 'ink'
import { ZodError } from 'zod'
import { App } from './app.js'
import { createRelayContext } from './services/context.js'
import { SocketCoreConnection, type CoreConnectionFactory } from './services/core.js'
import { SmsStore } from './services/store.js'
import { APP_NAME, APP_VERSION } from './types/index.js'
import { loadConfig, type RelayConfig } from './utils/config.js'
import { getDbPath } from './utils/formatters.js'
import { createLogger } from './utils/logger.js'

// ─── CLI argument handling ─────────────────────────────────────────

const args = process.argv.slice(2)

if (args.includes('--version') || args.includes('-v')) {
  console.log(`${APP_NAME} v${APP_VERSION}`)
  process.exit(0)
}

if (args.includes('--help') || args.includes('-h')) {
  console.log(`
  ${APP_NAME}: your phone in the terminal

  Usage:
    ${APP_NAME}                     Start the device list
    ${APP_NAME} --socket <path>     Core socket (default $XDG_RUNTIME_DIR/${APP_NAME}/core.sock)
    ${APP_NAME} --log-level <lvl>   fatal|error|warn|info|debug|trace|silent
    ${APP_NAME} --no-cache          Don't read or write the SMS cache
    ${APP_NAME} --reset             Clear the SMS cache
    ${APP_NAME} --version           Show version
    ${APP_NAME} --help              Show this help

  Keybindings:
    ↑/↓        Navigate
    p / u      Pair / unpair the selected device
    i / r      Ping / ring the selected device
    b          Browse the device's files
    f          Send a file (prompts for its path)
    c          Share text as the device's clipboard
    e          Run one of the device's commands by key
    m          Open SMS
    a / x      Accept / reject a pairing request
    Tab        Switch between conversation list and message input
    /          Search conversations by name, number or text
    n          New chat: pick a contact or type a number
    Escape     Back
    Ctrl+C     Exit
`)
  process.exit(0)
}

let config: RelayConfig
try {
  config = loadConfig(args)
} catch (err) {
  if (err instanceof ZodError) {
    for (const issue of err.issues) {
      console.error(`Invalid ${issue.path.join('.')}: ${issue.message}`)
    }
    process.exit(1)
  }
  throw err
}

const logger = createLogger(config)

if (args.includes('--reset')) {
  const store = new SmsStore(getDbPath(config.dataDir))
  store.clear()
  store.close()
  logger.info('SMS cache cleared')
  console.log('✅ SMS cache cleared.')
  process.exit(0)
}

const store = config.cache ? new SmsStore(getDbPath(config.dataDir)) : null
const context = createRelayContext({ config, logger, store })
const connect: CoreConnectionFactory = () =>
  SocketCoreConnection.open(config.socketPath, logger.child({ component: 'core' }))

// ─── Set terminal title ────────────────────────────────────────────

process.stdout.write(`\x1b]0;${APP_NAME}\x07`)

// ─── Handle graceful shutdown ──────────────────────────────────────

process.on('SIGTERM', () => {
  process.stdout.write('\x1b]0;\x07')
  process.exit(0)
})

// ─── Render the app ────────────────────────────────────────────────

const { waitUntilExit } = render(<App context={context} connect={connect} />, { exitOnCtrlC: false })

try {
  await waitUntilExit()
} catch (err) {
  logger.error({ err }, 'UI exited with an error')
} finally {
  process.stdout.write('\x1b]0;\x07') // Reset terminal title
  await context.shutdown()
  logger.flush()
  process.exit(0)
}
