import type { Logger } from 'pino'
import {
  PING_MESSAGE,
  RING_MESSAGE,
  type CommandStatus,
  type CoreCommand,
  type DeviceId,
} from '../types/index.js'
import { CommandSendError, NotInitializedError } from '../utils/errors.js'
import type { CoreConnection } from './core.js'

/** Device actions that take one line of text from the user */
export type DevicePromptKind = 'file' | 'clipboard' | 'command'

/**
 * Turns user actions into Core commands. Fire-and-forget: nothing here waits
 * for the Core, retries, or reports delivery failures to the caller; those are
 * only logged. Without a connection every call returns 'not-initialized'
 * immediately and nothing is queued.
 */
export class CommandDispatcher {
  private connection: CoreConnection | null = null

  constructor(private readonly logger: Logger) {}

  get isAttached(): boolean {
    return this.connection !== null
  }

  attach(connection: CoreConnection): void {
    this.connection = connection
  }

  detach(): void {
    this.connection = null
  }

  pair(deviceId: DeviceId): CommandStatus {
    return this.dispatch({ type: 'Pair', deviceId })
  }

  unpair(deviceId: DeviceId): CommandStatus {
    return this.dispatch({ type: 'Unpair', deviceId })
  }

  /** The Core completes the handshake when we answer a request with our own pair. */
  acceptPairing(deviceId: DeviceId): CommandStatus {
    return this.pair(deviceId)
  }

  rejectPairing(deviceId: DeviceId): CommandStatus {
    return this.unpair(deviceId)
  }

  ping(deviceId: DeviceId, message: string = PING_MESSAGE): CommandStatus {
    return this.dispatch({ type: 'Ping', deviceId, message })
  }

  ringDevice(deviceId: DeviceId): CommandStatus {
    return this.dispatch({ type: 'Ping', deviceId, message: RING_MESSAGE })
  }

  sendFiles(deviceId: DeviceId, files: string[]): CommandStatus {
    return this.dispatch({ type: 'SendFiles', deviceId, files })
  }

  sendClipboard(deviceId: DeviceId, content: string): CommandStatus {
    return this.dispatch({ type: 'SendClipboard', deviceId, content })
  }

  requestConversations(deviceId: DeviceId): CommandStatus {
    return this.dispatch({ type: 'RequestConversations', deviceId })
  }

  requestConversation(deviceId: DeviceId, threadId: number): CommandStatus {
    return this.dispatch({ type: 'RequestConversation', deviceId, threadId })
  }

  sendSms(deviceId: DeviceId, phoneNumber: string, message: string): CommandStatus {
    return this.dispatch({ type: 'SendSms', deviceId, phoneNumber, message })
  }

  startSftpBrowsing(deviceId: DeviceId): CommandStatus {
    return this.dispatch({ type: 'StartSftpBrowsing', deviceId })
  }

  executeCommand(deviceId: DeviceId, commandKey: string): CommandStatus {
    return this.dispatch({ type: 'ExecuteCommand', deviceId, commandKey })
  }

  /** Send the text typed into a device prompt as the matching command. */
  submitPrompt(deviceId: DeviceId, kind: DevicePromptKind, text: string): CommandStatus {
    switch (kind) {
      case 'file':
        return this.sendFiles(deviceId, [text])
      case 'clipboard':
        return this.sendClipboard(deviceId, text)
      case 'command':
        return this.executeCommand(deviceId, text)
    }
  }

  private dispatch(command: CoreCommand): CommandStatus {
    const connection = this.connection
    if (!connection) {
      this.logger.warn({ err: new NotInitializedError(command.type), command: command.type }, 'Command dropped')
      return 'not-initialized'
    }

    this.logger.debug({ command }, 'Sending command')
    void connection.send(command).then(
      () => {
        this.logger.debug({ command: command.type }, 'Command delivered')
      },
      (error: unknown) => {
        this.logger.warn({ err: new CommandSendError(command.type, error) }, 'Command failed')
      }
    )
    return 'sent'
  }
}
