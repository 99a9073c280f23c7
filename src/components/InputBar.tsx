import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'

interface InputBarProps {
  /** Null disables the bar */
  placeholder: string | null
  isFocused: boolean
  onSubmit: (text: string) => void
  onEscape: () => void
  prompt?: string
  color?: string
}

/**
 * Single-line text input. Used for message bodies and for the device prompts
 * (file path, clipboard text, command key). Scrolls horizontally so long input
 * doesn't distort the layout.
 */
export function InputBar({
  placeholder,
  isFocused,
  onSubmit,
  onEscape,
  prompt = '> ',
  color = 'green',
}: InputBarProps) {
  const [input, setInput] = useState('')
  const [cursorPos, setCursorPos] = useState(0)

  useInput(
    (ch, key) => {
      if (key.escape) {
        setInput('')
        setCursorPos(0)
        onEscape()
        return
      }

      if (key.return) {
        const trimmed = input.trim()
        if (trimmed) {
          onSubmit(trimmed)
          setInput('')
          setCursorPos(0)
        }
        return
      }

      if (key.backspace || key.delete) {
        if (cursorPos > 0) {
          setInput((prev) => prev.slice(0, cursorPos - 1) + prev.slice(cursorPos))
          setCursorPos((prev) => prev - 1)
        }
        return
      }

      if (key.leftArrow) {
        setCursorPos((prev) => Math.max(0, prev - 1))
        return
      }

      if (key.rightArrow) {
        setCursorPos((prev) => Math.min(input.length, prev + 1))
        return
      }

      if (ch && !key.ctrl && !key.meta && !key.tab) {
        setInput((prev) => prev.slice(0, cursorPos) + ch + prev.slice(cursorPos))
        setCursorPos((prev) => prev + ch.length)
      }
    },
    { isActive: isFocused && placeholder !== null }
  )

  if (placeholder === null) {
    return (
      <Box borderStyle="single" borderColor="gray" paddingX={1} height={3}>
        <Text dimColor>Select a conversation to start typing...</Text>
      </Box>
    )
  }

  const availableWidth = Math.max(10, (process.stdout.columns || 80) - 40)

  let viewStart = 0
  if (cursorPos >= availableWidth) {
    viewStart = cursorPos - availableWidth + 1
  }
  const visibleText = input.slice(viewStart, viewStart + availableWidth)
  const visibleCursorPos = cursorPos - viewStart

  const beforeCursor = visibleText.slice(0, visibleCursorPos)
  const cursorChar = visibleText[visibleCursorPos] ?? ' '
  const afterCursor = visibleText.slice(visibleCursorPos + 1)

  return (
    <Box borderStyle="single" borderColor={isFocused ? color : 'gray'} paddingX={1} height={3} overflow="hidden">
      <Text color={color} bold>
        {prompt}
      </Text>
      {isFocused ? (
        <Text wrap="truncate-end">
          {beforeCursor}
          <Text inverse>{cursorChar}</Text>
          {afterCursor}
        </Text>
      ) : (
        <Text dimColor wrap="truncate-end">
          {input || placeholder}
        </Text>
      )}
    </Box>
  )
}
