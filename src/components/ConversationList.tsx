import React from 'react'
import { Box, Text } from 'ink'
import type { Conversation } from '../types/index.js'
import { formatTimestamp, truncate } from '../utils/formatters.js'

interface ConversationListProps {
  conversations: Conversation[]
  selectedIndex: number
  isFocused: boolean
  width: number
  /** Active search, if any; the list is already filtered by it */
  searchQuery?: string
}

/**
 * Scrollable list of SMS conversations (left pane of the SMS window).
 * Shows contact name, last message preview, timestamp, and unread marker.
 */
export function ConversationList({
  conversations,
  selectedIndex,
  isFocused,
  width,
  searchQuery = '',
}: ConversationListProps) {
  const maxVisible = Math.max(5, Math.floor((process.stdout.rows - 4) / 2))
  const nameWidth = Math.max(10, width - 8)

  let startIndex = 0
  if (selectedIndex >= maxVisible) {
    startIndex = selectedIndex - maxVisible + 1
  }
  const visible = conversations.slice(startIndex, startIndex + maxVisible)

  if (conversations.length === 0) {
    return (
      <Box
        flexDirection="column"
        width={width}
        borderStyle="single"
        borderColor={isFocused ? 'green' : 'gray'}
        paddingX={1}
      >
        <Box marginBottom={1}>
          <Text bold color="green">
            {' 💬 Messages'}
          </Text>
        </Box>
        {searchQuery ? (
          <Text dimColor>No matching conversations</Text>
        ) : (
          <>
            <Text dimColor>Waiting for the phone…</Text>
            <Text dimColor>Press n to text a number.</Text>
          </>
        )}
      </Box>
    )
  }

  return (
    <Box
      flexDirection="column"
      width={width}
      borderStyle="single"
      borderColor={isFocused ? 'green' : 'gray'}
    >
      <Box paddingX={1}>
        <Text bold color="green">
          💬 Messages ({conversations.length})
        </Text>
      </Box>

      {visible.map((conv, i) => (
        <ConversationListItem
          key={conv.threadId}
          conversation={conv}
          isSelected={startIndex + i === selectedIndex}
          isFocused={isFocused}
          nameWidth={nameWidth}
        />
      ))}

      {conversations.length > maxVisible && (
        <Box paddingX={1}>
          <Text dimColor>
            ↕ {startIndex + 1}-{Math.min(startIndex + maxVisible, conversations.length)} of {conversations.length}
          </Text>
        </Box>
      )}
    </Box>
  )
}

interface ConversationListItemProps {
  conversation: Conversation
  isSelected: boolean
  isFocused: boolean
  nameWidth: number
}

function ConversationListItem({ conversation, isSelected, isFocused, nameWidth }: ConversationListItemProps) {
  const bgColor = isSelected && isFocused ? 'green' : isSelected ? 'gray' : undefined
  const textColor = isSelected && isFocused ? 'black' : undefined

  const displayName = conversation.contactName || conversation.phoneNumber
  const unread = conversation.unread ? ' •' : ''
  const time = conversation.timestamp ? formatTimestamp(conversation.timestamp) : ''

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box>
        <Box flexGrow={1}>
          <Text color={textColor} backgroundColor={bgColor} bold={conversation.unread}>
            {truncate(displayName, nameWidth - unread.length)}
            {unread && (
              <Text color="yellow" bold>
                {unread}
              </Text>
            )}
          </Text>
        </Box>
        <Text dimColor color={textColor} backgroundColor={bgColor}>
          {time}
        </Text>
      </Box>
      {conversation.lastMessage && (
        <Text dimColor={!isSelected} color={textColor} backgroundColor={bgColor}>
          {truncate(conversation.lastMessage, nameWidth)}
        </Text>
      )}
    </Box>
  )
}
