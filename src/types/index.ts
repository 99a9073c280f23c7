/** Shared types for connect-relay */

export type DeviceId = string

export enum PairState {
  NotPaired = 'not-paired',
  Requested = 'requested',
  Paired = 'paired',
}

export const CAPABILITIES = [
  'battery',
  'ping',
  'share',
  'sftp',
  'sms',
  'contacts',
  'clipboard',
  'findmyphone',
  'mpris',
  'runcommand',
  'remotekeyboard',
  'presenter',
  'lockdevice',
  'virtualmonitor',
] as const

export type Capability = (typeof CAPABILITIES)[number]

export type DeviceCapabilities = Record<Capability, boolean>

export interface Device {
  /** Stable identifier announced by the device */
  id: DeviceId
  /** Human-readable device name */
  name: string
  /** "phone", "tablet", "desktop", "laptop", "tv" */
  deviceType: string
  pairState: PairState
  reachable: boolean
  capabilities: DeviceCapabilities
  /** 0–100 */
  batteryLevel?: number
  charging?: boolean
  /** 0–4 bars, -1 for no signal */
  signalStrength?: number
  /** "5G", "4G", "3G", ... */
  networkType?: string
}

export interface PairingNotification {
  deviceId: DeviceId
  deviceName: string
  deviceType: string
}

// ─── SMS ──────────────────────────────────────────────────────────────

export interface Conversation {
  threadId: string
  /** Number as received from the device, never normalized */
  phoneNumber: string
  /** Defaults to the phone number until a contact resolves it */
  contactName: string
  lastMessage: string
  /** Unix timestamp (ms) */
  timestamp: number
  unread: boolean
}

export enum MessageDirection {
  Received = 'received',
  Sent = 'sent',
}

export interface Message {
  id: string
  threadId: string
  body: string
  address: string
  /** Unix timestamp (ms) */
  date: number
  direction: MessageDirection
  read: boolean
}

/** phone number → display name */
export type ContactsMap = Map<string, string>

export type SmsProtocolEvent =
  | { type: 'MessageReceived'; message: Message }
  | { type: 'ConversationsReceived'; conversations: Conversation[] }
  | { type: 'Error'; error: string }

// ─── Core event surface ───────────────────────────────────────────────

export interface SmsAddress {
  address: string
}

export interface SmsPacketMessage {
  id: string
  threadId: string
  addresses: SmsAddress[]
  body: string
  date: number
  /** 1 = received, 2 = sent */
  messageType: number
  read: boolean
}

export interface SmsMessagesPayload {
  messages: SmsPacketMessage[]
}

export type CoreEvent =
  | { type: 'Connected'; deviceId: DeviceId; device: Device }
  | { type: 'DevicePaired'; deviceId: DeviceId; device: Device }
  | { type: 'Disconnected'; deviceId: DeviceId }
  | { type: 'PairStateChanged'; deviceId: DeviceId; pairState: PairState }
  | { type: 'ClipboardReceived'; content: string }
  | { type: 'StateUpdated'; payload: unknown }
  | { type: 'Mpris'; payload: unknown }
  | { type: 'SmsMessages'; payload: unknown }
  | { type: 'Contacts'; vcards: string[] }

// ─── Core command surface ─────────────────────────────────────────────

export type CoreCommand =
  | { type: 'Pair'; deviceId: DeviceId }
  | { type: 'Unpair'; deviceId: DeviceId }
  | { type: 'Ping'; deviceId: DeviceId; message: string }
  | { type: 'SendFiles'; deviceId: DeviceId; files: string[] }
  | { type: 'SendClipboard'; deviceId: DeviceId; content: string }
  | { type: 'RequestConversations'; deviceId: DeviceId }
  | { type: 'RequestConversation'; deviceId: DeviceId; threadId: number }
  | { type: 'SendSms'; deviceId: DeviceId; phoneNumber: string; message: string }
  | { type: 'StartSftpBrowsing'; deviceId: DeviceId }
  | { type: 'ExecuteCommand'; deviceId: DeviceId; commandKey: string }

export type CommandStatus = 'sent' | 'not-initialized'

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
}

// ─── UI ───────────────────────────────────────────────────────────────

export enum AppScreen {
  Devices = 'devices',
  Sms = 'sms',
}

export enum FocusArea {
  DeviceList = 'device-list',
  ConversationList = 'conversation-list',
  InputBar = 'input-bar',
  NewChat = 'new-chat',
  Search = 'search',
  DevicePrompt = 'device-prompt',
}

export const APP_NAME = 'connect-relay'
export const APP_VERSION = '0.1.0'
export const DATA_DIR_NAME = '.connect-relay'
export const DB_FILE_NAME = 'store.db'
export const LOG_FILE_NAME = 'relay.log'
export const SOCKET_FILE_NAME = 'core.sock'

export const PING_MESSAGE = 'Ping from connect-relay'
/** Sent as a ping payload; the phone treats it as a find-my-phone ring */
export const RING_MESSAGE = 'findmyphone:ring'
