import type { CoreCommand, CoreEvent } from '../types/index.js'
import { AsyncQueue } from '../utils/queue.js'
import type { CoreConnection } from './core.js'

/**
 * In-process Core stand-in: events are pushed by the caller, commands are
 * recorded. Used by tests and by embedders that host the Core in the same
 * process.
 */
export class MemoryCoreConnection implements CoreConnection {
  readonly sent: CoreCommand[] = []
  private readonly queue = new AsyncQueue<CoreEvent>()
  private failure: Error | null = null

  emit(...events: CoreEvent[]): void {
    for (const event of events) {
      this.queue.push(event)
    }
  }

  /** End the event stream, as if the Core closed the channel. */
  end(): void {
    this.queue.close()
  }

  /** Make every later send() reject with this error (null to clear). */
  failSendsWith(error: Error | null): void {
    this.failure = error
  }

  events(): AsyncIterable<CoreEvent> {
    return this.queue
  }

  async send(command: CoreCommand): Promise<void> {
    if (this.failure) throw this.failure
    this.sent.push(command)
  }

  async close(): Promise<void> {
    this.queue.close()
  }
}
