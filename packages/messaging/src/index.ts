export { NotificationService } from './service/NotificationService';
export type {
  InitializeResult,
  NotificationServiceOptions,
  TokenHandler,
} from './service/NotificationService';
export { isValidTopic } from './service/topics';
export { SocketPushClient } from './socket/SocketPushClient';
export type { SocketPushClientOptions } from './socket/SocketPushClient';
export { parseRelayFrame } from './socket/frames';
export { FileTokenStore } from './storage/FileTokenStore';
export { FileSeenMessageStore } from './storage/FileSeenMessageStore';
export { loadMessagingConfig } from './config';
export type { MessagingConfig } from './config';
export { PERMISSION_STATUSES, isPermissionGranted } from './types/provider';
export type {
  BackgroundMessageListener,
  MessageSource,
  PermissionStatus,
  PermissionTokenProvider,
  TokenListener,
} from './types/provider';
export type { TokenStore } from './types/storage';
export type * from './types/protocol';
