import React from 'react'
import { Box, Text } from 'ink'
import { MessageDirection, type Conversation, type Message } from '../types/index.js'
import { isPlaceholderMessage } from '../services/sms.js'
import { formatMessageTime, formatRelativeTime } from '../utils/formatters.js'

interface MessageViewProps {
  conversation: Conversation | null
  messages: Message[]
  isFocused: boolean
}

/**
 * Messages of the open thread (right pane). Shows the most recent that fit.
 */
export function MessageView({ conversation, messages, isFocused }: MessageViewProps) {
  // header (2) + input bar (3) + status bar (1) + borders (2)
  const maxVisible = Math.max(3, Math.floor((process.stdout.rows - 9) / 2))

  if (!conversation) {
    return (
      <Box
        flexDirection="column"
        flexGrow={1}
        borderStyle="single"
        borderColor="gray"
        alignItems="center"
        justifyContent="center"
      >
        <Text color="green" bold>
          Messages
        </Text>
        <Text dimColor>Select a conversation</Text>
        <Box marginTop={1} flexDirection="column" alignItems="center">
          <Text dimColor>↑/↓ Navigate</Text>
          <Text dimColor>Enter  Open</Text>
          <Text dimColor>/      Search</Text>
          <Text dimColor>n      New chat</Text>
          <Text dimColor>Esc    Devices</Text>
        </Box>
      </Box>
    )
  }

  const visibleMessages = messages.slice(-maxVisible)
  const title = conversation.contactName || conversation.phoneNumber

  return (
    <Box
      flexDirection="column"
      flexGrow={1}
      borderStyle="single"
      borderColor={isFocused ? 'green' : 'gray'}
      overflow="hidden"
    >
      <Box paddingX={1} justifyContent="space-between">
        <Text bold color="green" wrap="truncate-end">
          {title}
        </Text>
        <Text dimColor>
          {conversation.phoneNumber} · {formatRelativeTime(conversation.timestamp)}
        </Text>
      </Box>

      <Box flexDirection="column" flexGrow={1} paddingX={1} overflow="hidden">
        {visibleMessages.length === 0 ? (
          <Box justifyContent="center" flexGrow={1} alignItems="center">
            <Text dimColor>No messages loaded yet.</Text>
          </Box>
        ) : (
          visibleMessages.map((msg) => <MessageBubble key={msg.id} message={msg} />)
        )}
      </Box>
    </Box>
  )
}

function MessageBubble({ message }: { message: Message }) {
  const time = formatMessageTime(message.date)
  const maxLen = (process.stdout.columns || 80) - 45
  const body = message.body.length > maxLen ? message.body.slice(0, maxLen - 1) + '…' : message.body

  if (message.direction === MessageDirection.Sent) {
    const pending = isPlaceholderMessage(message)
    return (
      <Box flexDirection="column">
        <Box justifyContent="flex-end">
          <Text color="cyan" wrap="truncate-end">
            {body}
          </Text>
        </Box>
        <Box justifyContent="flex-end">
          <Text dimColor>
            {time}
            {pending ? ' ⏳' : ' ✓'}
          </Text>
        </Box>
      </Box>
    )
  }

  return (
    <Box flexDirection="column">
      <Text color="white" wrap="truncate-end">
        {body}
      </Text>
      <Text dimColor>{time}</Text>
    </Box>
  )
}
