export { DispatchRouter } from './routing/DispatchRouter';
export type { DispatchRouterOptions, RouterStats } from './routing/DispatchRouter';
export { SeenMessageSet } from './routing/SeenMessageSet';
export type { SeenMessageSetOptions } from './routing/SeenMessageSet';
export { mapPayloadToIntent } from './routing/intentMapper';
export type { IntentMapping, IntentMappingOptions } from './routing/intentMapper';
export {
  parseInboundMessage,
  parseMessageFields,
  parsePayload,
  isDeliveryChannel,
} from './validation/parseInboundMessage';
export type { MessageFields } from './validation/parseInboundMessage';
export { DEFAULT_ROUTER_CONFIG, loadRouterConfig, readPositiveInt } from './config';
export type { RouterConfig } from './config';
export { createLogger, silentLogger } from './logging/logger';
export type { Logger } from './logging/logger';
export {
  PushError,
  TokenUnavailableError,
  PermissionDeniedError,
  MalformedPayloadError,
  InvalidTopicError,
  ProviderError,
  success,
  failure,
  describeError,
} from './errors';
export type { PushErrorCode, Outcome } from './errors';
export {
  DELIVERY_CHANNELS,
  createInboundMessage,
  toSubscription,
  withChannel,
} from './types/messages';
export type {
  DeliveryChannel,
  InboundMessage,
  MessagePayload,
  NavigationConsumer,
  NavigationIntent,
  Subscription,
} from './types/messages';
export type { ChannelSource, MessageListener, SeenMessageStore } from './types/channels';
