import React from 'react'
import { Box, Text } from 'ink'
import { PairState, type Device } from '../types/index.js'
import { batteryLabel, deviceIcon, truncate } from '../utils/formatters.js'

interface DeviceListProps {
  devices: Device[]
  selectedIndex: number
  isFocused: boolean
  width: number
}

/**
 * Scrollable list of known devices (left pane).
 * Shows name, pair state marker and battery.
 */
export function DeviceList({ devices, selectedIndex, isFocused, width }: DeviceListProps) {
  const maxVisible = Math.max(5, Math.floor((process.stdout.rows - 4) / 2))
  const nameWidth = Math.max(10, width - 6)

  let startIndex = 0
  if (selectedIndex >= maxVisible) {
    startIndex = selectedIndex - maxVisible + 1
  }
  const visibleDevices = devices.slice(startIndex, startIndex + maxVisible)

  if (devices.length === 0) {
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
            {' 📡 Devices'}
          </Text>
        </Box>
        <Text dimColor>No devices yet.</Text>
        <Text dimColor>Open the companion app</Text>
        <Text dimColor>on the same network.</Text>
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
          📡 Devices ({devices.length})
        </Text>
      </Box>

      {visibleDevices.map((device, i) => (
        <DeviceListItem
          key={device.id}
          device={device}
          isSelected={startIndex + i === selectedIndex}
          isFocused={isFocused}
          nameWidth={nameWidth}
        />
      ))}

      {devices.length > maxVisible && (
        <Box paddingX={1}>
          <Text dimColor>
            ↕ {startIndex + 1}-{Math.min(startIndex + maxVisible, devices.length)} of {devices.length}
          </Text>
        </Box>
      )}
    </Box>
  )
}

interface DeviceListItemProps {
  device: Device
  isSelected: boolean
  isFocused: boolean
  nameWidth: number
}

function DeviceListItem({ device, isSelected, isFocused, nameWidth }: DeviceListItemProps) {
  const bgColor = isSelected && isFocused ? 'green' : isSelected ? 'gray' : undefined
  const textColor = isSelected && isFocused ? 'black' : undefined

  const prefix = `${deviceIcon(device.deviceType)} `
  const marker = device.pairState === PairState.Paired ? '' : device.pairState === PairState.Requested ? ' ?' : ' ○'
  const battery = batteryLabel(device)

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color={textColor} backgroundColor={bgColor} bold={device.pairState === PairState.Requested}>
        {prefix}
        {truncate(device.name, nameWidth - prefix.length - marker.length)}
        {marker && <Text color="yellow">{marker}</Text>}
      </Text>
      <Text dimColor={!isSelected} color={textColor} backgroundColor={bgColor}>
        {battery || (device.reachable ? 'reachable' : 'unreachable')}
      </Text>
    </Box>
  )
}
