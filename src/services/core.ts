import { createConnection, type Socket } from 'node:net'
import { createInterface } from 'node:readline'
import type { Logger } from 'pino'
import type { CoreCommand, CoreEvent } from '../types/index.js'
import { decodeEventLine } from './protocol.js'

/**
 * The two channels to the protocol engine: an event stream in, commands out.
 */
export interface CoreConnection {
  /** Ends when the Core closes the channel. Consume once. */
  events(): AsyncIterable<CoreEvent>
  send(command: CoreCommand): Promise<void>
  close(): Promise<void>
}

export type CoreConnectionFactory = () => Promise<CoreConnection>

/**
 * Newline-delimited JSON over a local stream socket. One event per line in,
 * one command per line out.
 */
export class SocketCoreConnection implements CoreConnection {
  private constructor(
    private readonly socket: Socket,
    private readonly logger: Logger
  ) {
    socket.setEncoding('utf8')
    socket.on('error', (err) => {
      this.logger.warn({ err }, 'Core socket error')
    })
  }

  static open(socketPath: string, logger: Logger): Promise<SocketCoreConnection> {
    return new Promise((resolve, reject) => {
      const socket = createConnection(socketPath)
      const onError = (err: Error) => {
        socket.destroy()
        reject(err)
      }
      socket.once('error', onError)
      socket.once('connect', () => {
        socket.off('error', onError)
        logger.info({ socketPath }, 'Connected to core')
        resolve(new SocketCoreConnection(socket, logger))
      })
    })
  }

  async *events(): AsyncGenerator<CoreEvent> {
    const lines = createInterface({ input: this.socket, crlfDelay: Infinity })

    for await (const line of lines) {
      if (!line.trim()) continue
      const result = decodeEventLine(line)
      if (!result.ok) {
        this.logger.warn({ err: result.error }, 'Dropping malformed core event')
        continue
      }
      yield result.value
    }

    this.logger.info('Core event stream ended')
  }

  send(command: CoreCommand): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.destroyed || !this.socket.writable) {
        reject(new Error('core socket is closed'))
        return
      }
      this.socket.write(`${JSON.stringify(command)}\n`, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.socket.destroyed) {
        resolve()
        return
      }
      this.socket.end(() => resolve())
    })
  }
}
