import React, { useState, useCallback, useMemo } from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import { DeviceList } from './components/DeviceList.js'
import { DeviceView } from './components/DeviceView.js'
import { ContactPicker } from './components/ContactPicker.js'
import { ConversationList } from './components/ConversationList.js'
import { MessageView } from './components/MessageView.js'
import { InputBar } from './components/InputBar.js'
import { PairingBanner } from './components/PairingBanner.js'
import { SearchBar } from './components/SearchBar.js'
import { StatusBar } from './components/StatusBar.js'
import { useRelay, useSms, useListNavigation } from './hooks/useRelay.js'
import type { DevicePromptKind } from './services/commands.js'
import type { RelayContext } from './services/context.js'
import type { CoreConnectionFactory } from './services/core.js'
import type { SmsEngine } from './services/sms.js'
import {
  AppScreen,
  ConnectionState,
  FocusArea,
  PairState,
  type Capability,
  type CommandStatus,
  type Conversation,
  type Device,
} from './types/index.js'
import { filterContacts, filterConversations, type ContactEntry } from './utils/search.js'

const LIST_WIDTH = 32

const deviceKey = (device: Device) => device.id
const conversationKey = (conv: Conversation) => conv.threadId
const contactKey = (contact: ContactEntry) => contact.phoneNumber

interface DevicePrompt {
  key: string
  capability: Capability
  prompt: string
  placeholder: string
  done: (deviceName: string) => string
}

const DEVICE_PROMPTS: Record<DevicePromptKind, DevicePrompt> = {
  file: {
    key: 'f',
    capability: 'share',
    prompt: '📎 ',
    placeholder: 'Path of the file to send',
    done: (name) => `File sent to ${name}`,
  },
  clipboard: {
    key: 'c',
    capability: 'clipboard',
    prompt: '📋 ',
    placeholder: 'Text to put on the clipboard',
    done: (name) => `Clipboard shared with ${name}`,
  },
  command: {
    key: 'e',
    capability: 'runcommand',
    prompt: '⚙ ',
    placeholder: 'Command key to run',
    done: (name) => `Command sent to ${name}`,
  },
}

const PROMPT_KINDS: DevicePromptKind[] = ['file', 'clipboard', 'command']

const TYPING_AREAS = new Set<FocusArea>([
  FocusArea.InputBar,
  FocusArea.NewChat,
  FocusArea.Search,
  FocusArea.DevicePrompt,
])

interface AppProps {
  context: RelayContext
  connect: CoreConnectionFactory
}

export function App({ context, connect }: AppProps) {
  const { exit } = useApp()
  const { connectionState, devices, pairingRequest, clearPairingRequest, notice, setNotice } = useRelay(
    context,
    connect
  )

  const [screen, setScreen] = useState<AppScreen>(AppScreen.Devices)
  const [focusArea, setFocusArea] = useState<FocusArea>(FocusArea.DeviceList)
  const [sms, setSms] = useState<SmsEngine | null>(null)
  const [devicePrompt, setDevicePrompt] = useState<DevicePromptKind | null>(null)
  const [searchQuery, setSearchQuery] = useState('')
  const [contactQuery, setContactQuery] = useState('')

  const deviceNav = useListNavigation(devices, deviceKey)
  const { conversations, messages, selectedThread, contacts } = useSms(sms)
  const visibleConversations = useMemo(
    () => filterConversations(conversations, searchQuery),
    [conversations, searchQuery]
  )
  const conversationNav = useListNavigation(visibleConversations, conversationKey)
  const contactMatches = useMemo(() => filterContacts(contacts, contactQuery), [contacts, contactQuery])
  const contactNav = useListNavigation(contactMatches, contactKey)

  const openConversation = conversations.find((c) => c.threadId === selectedThread) ?? null
  const device = deviceNav.selectedItem

  const report = useCallback(
    (status: CommandStatus, done: string) => {
      setNotice(status === 'sent' ? done : 'Not connected to the core')
    },
    [setNotice]
  )

  // ─── Handle keyboard input ─────────────────────────────────────

  useInput((ch, key) => {
    if (key.ctrl && ch === 'c') {
      exit()
      return
    }

    const typing = TYPING_AREAS.has(focusArea)

    if (pairingRequest && !typing && (ch === 'a' || ch === 'x')) {
      const { deviceId, deviceName } = pairingRequest
      if (ch === 'a') {
        report(context.acceptPairing(deviceId), `Accepted ${deviceName}`)
      } else {
        report(context.dispatcher.rejectPairing(deviceId), `Rejected ${deviceName}`)
      }
      clearPairingRequest()
      return
    }

    if (screen === AppScreen.Devices) {
      if (focusArea !== FocusArea.DevicePrompt) handleDeviceKeys(ch, key)
      return
    }

    // the filter bars own the text; arrows still move through the filtered list
    if (focusArea === FocusArea.Search || focusArea === FocusArea.NewChat) {
      const nav = focusArea === FocusArea.Search ? conversationNav : contactNav
      if (key.upArrow) nav.moveUp()
      if (key.downArrow) nav.moveDown()
      return
    }

    if (key.tab) {
      setFocusArea((prev) =>
        prev === FocusArea.ConversationList && selectedThread !== null ? FocusArea.InputBar : FocusArea.ConversationList
      )
      return
    }

    if (focusArea !== FocusArea.ConversationList) return

    if (key.escape) {
      setScreen(AppScreen.Devices)
      setFocusArea(FocusArea.DeviceList)
      return
    }
    if (key.upArrow) {
      conversationNav.moveUp()
      return
    }
    if (key.downArrow) {
      conversationNav.moveDown()
      return
    }
    if (key.return && sms && conversationNav.selectedItem) {
      sms.openThread(conversationNav.selectedItem.threadId)
      setFocusArea(FocusArea.InputBar)
      return
    }
    if (ch === '/') {
      setFocusArea(FocusArea.Search)
      return
    }
    if (ch === 'n') {
      setContactQuery('')
      setFocusArea(FocusArea.NewChat)
    }
  })

  function handleDeviceKeys(ch: string, key: { upArrow: boolean; downArrow: boolean }) {
    if (key.upArrow) {
      deviceNav.moveUp()
      return
    }
    if (key.downArrow) {
      deviceNav.moveDown()
      return
    }
    if (!device) return

    const paired = device.pairState === PairState.Paired
    const { dispatcher } = context

    const promptKind = PROMPT_KINDS.find((kind) => DEVICE_PROMPTS[kind].key === ch)
    if (promptKind) {
      if (paired && device.capabilities[DEVICE_PROMPTS[promptKind].capability]) {
        setDevicePrompt(promptKind)
        setFocusArea(FocusArea.DevicePrompt)
      }
      return
    }

    switch (ch) {
      case 'p':
        report(dispatcher.pair(device.id), `Pairing request sent to ${device.name}`)
        break
      case 'u':
        report(dispatcher.unpair(device.id), `Unpaired ${device.name}`)
        break
      case 'i':
        if (paired) report(dispatcher.ping(device.id), `Pinged ${device.name}`)
        break
      case 'r':
        if (paired && device.capabilities.findmyphone) {
          report(dispatcher.ringDevice(device.id), `Ringing ${device.name}`)
        }
        break
      case 'b':
        if (paired && device.capabilities.sftp) report(dispatcher.startSftpBrowsing(device.id), 'Browsing requested')
        break
      case 'm':
        if (paired && device.capabilities.sms) {
          setSms(context.openSms(device.id))
          setScreen(AppScreen.Sms)
          setFocusArea(FocusArea.ConversationList)
        }
        break
    }
  }

  const handleDevicePrompt = useCallback(
    (text: string) => {
      if (device && devicePrompt) {
        const status = context.dispatcher.submitPrompt(device.id, devicePrompt, text)
        report(status, DEVICE_PROMPTS[devicePrompt].done(device.name))
      }
      setDevicePrompt(null)
      setFocusArea(FocusArea.DeviceList)
    },
    [context, device, devicePrompt, report]
  )

  const closeDevicePrompt = useCallback(() => {
    setDevicePrompt(null)
    setFocusArea(FocusArea.DeviceList)
  }, [])

  // ─── SMS handlers ──────────────────────────────────────────────

  const handleSendMessage = useCallback(
    (text: string) => {
      if (!sms) return
      if (!sms.sendMessage(text)) {
        setNotice('Message not sent')
      }
    },
    [sms, setNotice]
  )

  const handleNewChat = useCallback(
    (query: string) => {
      if (!sms) return
      const phoneNumber = contactNav.selectedItem?.phoneNumber ?? query
      const threadId = sms.startChat(phoneNumber)
      if (threadId !== null) {
        setSearchQuery('')
        conversationNav.selectKey(threadId)
        setFocusArea(FocusArea.InputBar)
      }
    },
    [sms, contactNav.selectedItem, conversationNav]
  )

  const openSearchResult = useCallback(() => {
    const conv = conversationNav.selectedItem
    if (!sms || !conv) return
    sms.openThread(conv.threadId)
    setSearchQuery('')
    setFocusArea(FocusArea.InputBar)
  }, [sms, conversationNav.selectedItem])

  const closeSearch = useCallback(() => {
    setSearchQuery('')
    setFocusArea(FocusArea.ConversationList)
  }, [])

  const backToList = useCallback(() => {
    setFocusArea(FocusArea.ConversationList)
  }, [])

  // ─── Render ────────────────────────────────────────────────────

  if (connectionState !== ConnectionState.Connected && devices.length === 0) {
    return (
      <Box flexDirection="column" alignItems="center" justifyContent="center" padding={2}>
        <Box marginBottom={1}>
          <Text bold color="green">
            connect-relay
          </Text>
        </Box>
        {connectionState === ConnectionState.Connecting ? (
          <Text color="yellow">⏳ Connecting to the core...</Text>
        ) : (
          <Box flexDirection="column" alignItems="center">
            <Text color="red">❌ Disconnected</Text>
            {notice && <Text color="red">{notice}</Text>}
          </Box>
        )}
      </Box>
    )
  }

  return (
    <Box flexDirection="column" height={process.stdout.rows}>
      {pairingRequest && <PairingBanner request={pairingRequest} />}

      <Box flexGrow={1}>
        {screen === AppScreen.Devices ? (
          <>
            <DeviceList
              devices={devices}
              selectedIndex={deviceNav.selectedIndex}
              isFocused={focusArea === FocusArea.DeviceList}
              width={LIST_WIDTH}
            />
            <Box flexDirection="column" flexGrow={1}>
              <DeviceView device={device} isFocused={false} />
              {focusArea === FocusArea.DevicePrompt && devicePrompt && (
                <InputBar
                  placeholder={DEVICE_PROMPTS[devicePrompt].placeholder}
                  prompt={DEVICE_PROMPTS[devicePrompt].prompt}
                  color="cyan"
                  isFocused
                  onSubmit={handleDevicePrompt}
                  onEscape={closeDevicePrompt}
                />
              )}
            </Box>
          </>
        ) : (
          <>
            {focusArea === FocusArea.NewChat ? (
              <ContactPicker
                contacts={contactMatches}
                selectedIndex={contactNav.selectedIndex}
                query={contactQuery}
                width={LIST_WIDTH}
              />
            ) : (
              <ConversationList
                conversations={visibleConversations}
                selectedIndex={conversationNav.selectedIndex}
                isFocused={focusArea === FocusArea.ConversationList || focusArea === FocusArea.Search}
                width={LIST_WIDTH}
                searchQuery={searchQuery}
              />
            )}
            <Box flexDirection="column" flexGrow={1}>
              <MessageView conversation={openConversation} messages={messages} isFocused={false} />
              {focusArea === FocusArea.Search && (
                <SearchBar
                  isFocused
                  onQueryChange={setSearchQuery}
                  onEscape={closeSearch}
                  onSubmit={openSearchResult}
                  placeholder="Search conversations..."
                />
              )}
              {focusArea === FocusArea.NewChat ? (
                <SearchBar
                  isFocused
                  onQueryChange={setContactQuery}
                  onEscape={backToList}
                  onSubmit={handleNewChat}
                  prompt="# "
                  placeholder="Name or number"
                />
              ) : (
                <InputBar
                  placeholder={openConversation ? `Text ${openConversation.contactName}...` : null}
                  isFocused={focusArea === FocusArea.InputBar}
                  onSubmit={handleSendMessage}
                  onEscape={backToList}
                />
              )}
            </Box>
          </>
        )}
      </Box>

      <StatusBar
        connectionState={connectionState}
        screen={screen}
        deviceCount={devices.length}
        notice={notice}
      />
    </Box>
  )
}
