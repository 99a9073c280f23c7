import { useState, useEffect, useCallback } from 'react'
import type { RelayContext } from '../services/context.js'
import type { CoreConnectionFactory } from '../services/core.js'
import type { SmsEngine } from '../services/sms.js'
import type { ContactsMap, Conversation, Device, Message, PairingNotification } from '../types/index.js'
import { ConnectionState } from '../types/index.js'
import { truncate } from '../utils/formatters.js'

/**
 * Core hook: starts the relay and mirrors the device cache into React state.
 */
export function useRelay(context: RelayContext, connect: CoreConnectionFactory) {
  const [connectionState, setConnectionState] = useState<ConnectionState>(context.relay.connectionState)
  const [devices, setDevices] = useState<Device[]>(() => context.devices.getAll())
  const [pairingRequest, setPairingRequest] = useState<PairingNotification | null>(null)
  const [notice, setNotice] = useState<string | null>(null)

  useEffect(() => {
    const relay = context.relay

    const onDevicesChanged = () => {
      const current = context.devices.getAll()
      setDevices(current)
      // a request for a device that went away cannot be answered
      setPairingRequest((pending) =>
        pending && current.some((d) => d.id === pending.deviceId) ? pending : null
      )
    }
    const onPairingRequest = (notification: PairingNotification) => {
      setPairingRequest(notification)
    }
    const onClipboard = (content: string) => {
      setNotice(`📋 ${truncate(content, 40)}`)
    }
    const onStopped = () => {
      setNotice('The core closed the connection')
    }

    relay.on('connection-state', setConnectionState)
    relay.on('devices-changed', onDevicesChanged)
    relay.on('pairing-request', onPairingRequest)
    relay.on('clipboard', onClipboard)
    relay.on('stopped', onStopped)

    if (!relay.isStopped && relay.connectionState === ConnectionState.Disconnected) {
      void relay.connect(connect).then((connected) => {
        if (!connected) setNotice('Could not reach the core')
      })
    }

    return () => {
      relay.off('connection-state', setConnectionState)
      relay.off('devices-changed', onDevicesChanged)
      relay.off('pairing-request', onPairingRequest)
      relay.off('clipboard', onClipboard)
      relay.off('stopped', onStopped)
    }
  }, [context, connect])

  const clearPairingRequest = useCallback(() => {
    setPairingRequest(null)
  }, [])

  return {
    connectionState,
    devices,
    pairingRequest,
    clearPairingRequest,
    notice,
    setNotice,
  }
}

/**
 * Mirrors the active SMS engine's conversation table, open thread and contacts.
 */
export function useSms(engine: SmsEngine | null) {
  const [conversations, setConversations] = useState<Conversation[]>([])
  const [messages, setMessages] = useState<Message[]>([])
  const [selectedThread, setSelectedThread] = useState<string | null>(null)
  const [contacts, setContacts] = useState<ContactsMap>(() => new Map())

  useEffect(() => {
    if (!engine) {
      setConversations([])
      setMessages([])
      setSelectedThread(null)
      setContacts(new Map())
      return
    }

    const onConversations = () => {
      setConversations(engine.getConversations())
      setSelectedThread(engine.getSelectedThread())
    }
    const onMessages = () => {
      setMessages(engine.getMessages())
      setSelectedThread(engine.getSelectedThread())
    }

    const onContacts = () => {
      setContacts(engine.getContacts())
    }

    onConversations()
    onMessages()
    onContacts()
    engine.on('conversations-changed', onConversations)
    engine.on('messages-changed', onMessages)
    engine.on('contacts-changed', onContacts)
    return () => {
      engine.off('conversations-changed', onConversations)
      engine.off('messages-changed', onMessages)
      engine.off('contacts-changed', onContacts)
    }
  }, [engine])

  return { conversations, messages, selectedThread, contacts }
}

/**
 * Selection over a list that reorders under us. Tracks the selected item by
 * key so a re-sort doesn't jump the cursor.
 */
export function useListNavigation<T>(items: readonly T[], keyOf: (item: T) => string) {
  const [selectedKey, setSelectedKey] = useState<string | null>(null)

  const found = selectedKey === null ? -1 : items.findIndex((item) => keyOf(item) === selectedKey)
  const selectedIndex = Math.max(0, found)
  const selectedItem: T | null = items[selectedIndex] ?? null

  const selectAt = useCallback(
    (index: number) => {
      const item = items[index]
      if (item !== undefined) {
        setSelectedKey(keyOf(item))
      }
    },
    [items, keyOf]
  )

  const moveUp = useCallback(() => {
    selectAt(Math.max(0, selectedIndex - 1))
  }, [selectAt, selectedIndex])

  const moveDown = useCallback(() => {
    selectAt(Math.min(items.length - 1, selectedIndex + 1))
  }, [selectAt, selectedIndex, items.length])

  return {
    selectedIndex,
    selectedItem,
    selectAt,
    selectKey: setSelectedKey,
    moveUp,
    moveDown,
  }
}
