import React from 'react'
import { Box, Text } from 'ink'
import type { ContactEntry } from '../utils/search.js'
import { truncate } from '../utils/formatters.js'

interface ContactPickerProps {
  contacts: ContactEntry[]
  selectedIndex: number
  /** Raw query, shown when nothing matches */
  query: string
  width: number
}

/**
 * Left pane while a new chat is being started: contacts matching what has been
 * typed so far. Enter picks the highlighted one; with no match the typed text
 * is used as the number.
 */
export function ContactPicker({ contacts, selectedIndex, query, width }: ContactPickerProps) {
  const maxVisible = Math.max(5, process.stdout.rows - 8)
  const textWidth = Math.max(10, width - 4)

  let startIndex = 0
  if (selectedIndex >= maxVisible) {
    startIndex = selectedIndex - maxVisible + 1
  }
  const visible = contacts.slice(startIndex, startIndex + maxVisible)

  return (
    <Box flexDirection="column" width={width} borderStyle="single" borderColor="yellow">
      <Box paddingX={1}>
        <Text bold color="yellow">
          👤 New chat
        </Text>
      </Box>

      {contacts.length === 0 ? (
        <Box paddingX={1} flexDirection="column">
          <Text dimColor>No matching contacts</Text>
          {query.trim() && <Text dimColor>Enter texts {truncate(query.trim(), textWidth - 12)}</Text>}
        </Box>
      ) : (
        visible.map((contact, i) => {
          const isSelected = startIndex + i === selectedIndex
          return (
            <Box key={contact.phoneNumber} paddingX={1}>
              <Text color={isSelected ? 'black' : undefined} backgroundColor={isSelected ? 'yellow' : undefined}>
                {truncate(`${contact.name} (${contact.phoneNumber})`, textWidth)}
              </Text>
            </Box>
          )
        })
      )}

      {contacts.length > 0 && (
        <Box paddingX={1}>
          <Text dimColor>
            Showing {contacts.length} contact{contacts.length === 1 ? '' : 's'}
          </Text>
        </Box>
      )}
    </Box>
  )
}
