import React from 'react'
import { Box, Text } from 'ink'
import { AppScreen, ConnectionState } from '../types/index.js'

interface StatusBarProps {
  connectionState: ConnectionState
  screen: AppScreen
  deviceCount: number
  notice: string | null
}

const HINTS: Record<AppScreen, string> = {
  [AppScreen.Devices]: '↑↓:navigate │ p:pair │ f:file │ c:clipboard │ e:command │ m:messages │ Ctrl+C:quit',
  [AppScreen.Sms]: 'Tab:switch │ Enter:open │ /:search │ n:new │ Esc:back │ Ctrl+C:quit',
}

/**
 * Bottom status bar: connection state, device count, last notice, keybindings.
 */
export function StatusBar({ connectionState, screen, deviceCount, notice }: StatusBarProps) {
  const indicator = getConnectionIndicator(connectionState)

  return (
    <Box justifyContent="space-between" paddingX={1}>
      <Box gap={2}>
        <Text>
          {indicator.icon} <Text color={indicator.color}>{indicator.text}</Text>
        </Text>
        <Text dimColor>{deviceCount} devices</Text>
        {notice && (
          <Text color="yellow" wrap="truncate-end">
            {notice}
          </Text>
        )}
      </Box>
      <Text dimColor>{HINTS[screen]}</Text>
    </Box>
  )
}

export function getConnectionIndicator(state: ConnectionState): {
  icon: string
  text: string
  color: string
} {
  switch (state) {
    case ConnectionState.Connected:
      return { icon: '🟢', text: 'Connected', color: 'green' }
    case ConnectionState.Connecting:
      return { icon: '🟡', text: 'Connecting...', color: 'yellow' }
    case ConnectionState.Disconnected:
      return { icon: '🔴', text: 'Disconnected', color: 'red' }
  }
}
