import React from 'react'
import { Box, Text } from 'ink'
import type { PairingNotification } from '../types/index.js'
import { deviceIcon } from '../utils/formatters.js'

interface PairingBannerProps {
  request: PairingNotification
}

export function PairingBanner({ request }: PairingBannerProps) {
  return (
    <Box borderStyle="round" borderColor="yellow" paddingX={1} justifyContent="space-between">
      <Text color="yellow" bold wrap="truncate-end">
        {deviceIcon(request.deviceType)} {request.deviceName} wants to pair
      </Text>
      <Text dimColor>a accept │ x reject</Text>
    </Box>
  )
}
