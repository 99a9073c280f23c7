import React from 'react'
import { Box, Text } from 'ink'
import { CAPABILITIES, PairState, type Capability, type Device } from '../types/index.js'
import { batteryLabel, deviceIcon, pairStateLabel, signalLabel } from '../utils/formatters.js'

/** Keys offered for a paired device, each shown only when its plugin is announced */
const ACTION_HINTS: [Capability | null, string][] = [
  [null, 'i ping'],
  ['findmyphone', 'r ring'],
  ['sftp', 'b browse'],
  ['share', 'f send file'],
  ['clipboard', 'c clipboard'],
  ['runcommand', 'e run command'],
  ['sms', 'm messages'],
  [null, 'u unpair'],
]

interface DeviceViewProps {
  device: Device | null
  isFocused: boolean
}

/**
 * Details of the selected device (right pane) and the keys that act on it.
 */
export function DeviceView({ device, isFocused }: DeviceViewProps) {
  if (!device) {
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
          connect-relay
        </Text>
        <Text dimColor>Waiting for a device to connect</Text>
        <Box marginTop={1} flexDirection="column" alignItems="center">
          <Text dimColor>↑/↓ Navigate devices</Text>
          <Text dimColor>Ctrl+C Exit</Text>
        </Box>
      </Box>
    )
  }

  const paired = device.pairState === PairState.Paired
  const actions = ACTION_HINTS.filter(([capability]) => capability === null || device.capabilities[capability])
  const enabled = CAPABILITIES.filter((name) => device.capabilities[name])
  const battery = batteryLabel(device)
  const signal = signalLabel(device)

  return (
    <Box
      flexDirection="column"
      flexGrow={1}
      borderStyle="single"
      borderColor={isFocused ? 'green' : 'gray'}
      paddingX={1}
    >
      <Box justifyContent="space-between">
        <Text bold color="green" wrap="truncate-end">
          {deviceIcon(device.deviceType)} {device.name}
        </Text>
        <Text color={paired ? 'green' : 'yellow'}>{pairStateLabel(device.pairState)}</Text>
      </Box>

      <Text dimColor>{device.id}</Text>

      <Box marginTop={1} gap={2}>
        {battery && <Text>{battery}</Text>}
        {signal && <Text>{signal}</Text>}
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Plugins</Text>
        <Text dimColor wrap="wrap">
          {enabled.length > 0 ? enabled.join(', ') : 'none announced'}
        </Text>
      </Box>

      <Box marginTop={1} flexDirection="column">
        {paired ? (
          <Text dimColor wrap="wrap">
            {actions.map(([, hint]) => hint).join(' │ ')}
          </Text>
        ) : (
          <Text dimColor>p pair</Text>
        )}
      </Box>
    </Box>
  )
}
