import type { ChannelSource, InboundMessage, MessageFields, Subscription } from '@push-dispatch/router';

/**
 * Outcome of the OS permission prompt:
 *  - 'authorized'     : alerts, badges and sounds allowed
 *  - 'provisional'    : delivered quietly to the notification centre (iOS)
 *  - 'denied'         : user declined; only data messages get through
 *  - 'not_determined' : prompt was dismissed or never shown
 */
export type PermissionStatus = 'authorized' | 'provisional' | 'denied' | 'not_determined';

export const PERMISSION_STATUSES: readonly PermissionStatus[] = [
  'authorized',
  'provisional',
  'denied',
  'not_determined',
];

export function isPermissionGranted(status: PermissionStatus): boolean {
  return status === 'authorized' || status === 'provisional';
}

export type TokenListener = (token: string) => void;

/** Permission, token and topic operations of the push provider's SDK. */
export interface PermissionTokenProvider {
  requestPermission(): Promise<PermissionStatus>;
  getToken(): Promise<string | null>;
  onTokenRefresh(listener: TokenListener): Subscription;
  subscribeToTopic(topic: string): Promise<void>;
  unsubscribeFromTopic(topic: string): Promise<void>;
}

/** A data-only message delivered while the app is in the background; never routed. */
export type BackgroundMessageListener = (message: MessageFields) => void;

/** The three delivery channels of the push provider's SDK, plus data-only background delivery. */
export interface MessageSource extends ChannelSource {
  /** Resolves with the message whose tap launched the process, or null. */
  getInitialLaunchMessage(): Promise<InboundMessage | null>;
  /** Data-only messages handled while the app is in the background. */
  onBackgroundMessage?(listener: BackgroundMessageListener): Subscription;
}
