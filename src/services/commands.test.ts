import { describe, it, expect, vi } from 'vitest'
import { PING_MESSAGE, RING_MESSAGE } from '../types/index.js'
import { CommandSendError } from '../utils/errors.js'
import { silentLogger } from '../test/fixtures.js'
import { CommandDispatcher } from './commands.js'
import { MemoryCoreConnection } from './memoryCore.js'

function setup() {
  const logger = silentLogger()
  const dispatcher = new CommandDispatcher(logger)
  const connection = new MemoryCoreConnection()
  return { logger, dispatcher, connection }
}

describe('CommandDispatcher', () => {
  it('returns not-initialized without a connection and queues nothing', () => {
    const { dispatcher, connection } = setup()

    expect(dispatcher.ping('phone-1')).toBe('not-initialized')
    dispatcher.attach(connection)
    expect(connection.sent).toEqual([])
  })

  it('sends commands through the attached connection', () => {
    const { dispatcher, connection } = setup()
    dispatcher.attach(connection)

    expect(dispatcher.ping('phone-1')).toBe('sent')
    dispatcher.ringDevice('phone-1')
    dispatcher.requestConversation('phone-1', 42)
    dispatcher.sendSms('phone-1', '+15550001111', 'hi')

    expect(connection.sent).toEqual([
      { type: 'Ping', deviceId: 'phone-1', message: PING_MESSAGE },
      { type: 'Ping', deviceId: 'phone-1', message: RING_MESSAGE },
      { type: 'RequestConversation', deviceId: 'phone-1', threadId: 42 },
      { type: 'SendSms', deviceId: 'phone-1', phoneNumber: '+15550001111', message: 'hi' },
    ])
  })

  it('sends device prompt text as the matching command', () => {
    const { dispatcher, connection } = setup()
    dispatcher.attach(connection)

    expect(dispatcher.submitPrompt('phone-1', 'file', '/tmp/photo.jpg')).toBe('sent')
    dispatcher.submitPrompt('phone-1', 'clipboard', 'copied text')
    dispatcher.submitPrompt('phone-1', 'command', 'lock')

    expect(connection.sent).toEqual([
      { type: 'SendFiles', deviceId: 'phone-1', files: ['/tmp/photo.jpg'] },
      { type: 'SendClipboard', deviceId: 'phone-1', content: 'copied text' },
      { type: 'ExecuteCommand', deviceId: 'phone-1', commandKey: 'lock' },
    ])
  })

  it('answers pairing requests with pair and unpair', () => {
    const { dispatcher, connection } = setup()
    dispatcher.attach(connection)

    dispatcher.acceptPairing('phone-1')
    dispatcher.rejectPairing('phone-2')

    expect(connection.sent).toEqual([
      { type: 'Pair', deviceId: 'phone-1' },
      { type: 'Unpair', deviceId: 'phone-2' },
    ])
  })

  it('logs send failures without surfacing them', async () => {
    const { logger, dispatcher, connection } = setup()
    const warn = vi.spyOn(logger, 'warn')
    connection.failSendsWith(new Error('socket closed'))
    dispatcher.attach(connection)

    expect(dispatcher.sendClipboard('phone-1', 'copied text')).toBe('sent')

    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(CommandSendError) }),
        'Command failed'
      )
    })
  })

  it('stops sending after detach', () => {
    const { dispatcher, connection } = setup()
    dispatcher.attach(connection)
    dispatcher.detach()

    expect(dispatcher.isAttached).toBe(false)
    expect(dispatcher.executeCommand('phone-1', 'lock')).toBe('not-initialized')
    expect(connection.sent).toEqual([])
  })
})
