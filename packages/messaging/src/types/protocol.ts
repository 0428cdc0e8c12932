// Frames exchanged with a push emulator/relay over WebSocket.
// Messages travel as plain JSON and are validated on arrival; the relay owns
// delivery, this side only adapts frames to the provider interfaces.

import type { PermissionStatus } from './provider';

// ─── Client → Relay ───────────────────────────────────────────────────────────

export interface ClientHelloFrame {
  type: 'client_hello';
  clientId: string;
  version: string;
}

export interface PermissionRequestFrame {
  type: 'permission_request';
  requestId: string;
}

export interface TokenRequestFrame {
  type: 'token_request';
  requestId: string;
}

export interface TopicSubscribeFrame {
  type: 'topic_subscribe';
  requestId: string;
  topic: string;
}

export interface TopicUnsubscribeFrame {
  type: 'topic_unsubscribe';
  requestId: string;
  topic: string;
}

export interface PingFrame {
  type: 'ping';
}

// ─── Relay → Client ───────────────────────────────────────────────────────────

export interface HelloOkFrame {
  type: 'hello_ok';
  /** Raw message that launched the app, validated on arrival. */
  launchMessage: unknown;
}

export interface PermissionResultFrame {
  type: 'permission_result';
  requestId: string;
  status: PermissionStatus;
}

export interface TokenResultFrame {
  type: 'token_result';
  requestId: string;
  token: string | null;
  error?: string;
}

export interface TopicResultFrame {
  type: 'topic_result';
  requestId: string;
  ok: boolean;
  error?: string;
}

export interface TokenRefreshFrame {
  type: 'token_refresh';
  token: string;
}

export type WireChannel = 'foreground' | 'background_tap' | 'background';

export interface MessageFrame {
  type: 'message';
  channel: WireChannel;
  message: unknown;
}

export interface PongFrame {
  type: 'pong';
}

export interface ErrorFrame {
  type: 'error';
  requestId?: string;
  message: string;
}

// ─── Unions ───────────────────────────────────────────────────────────────────

export type RequestFrame =
  | PermissionRequestFrame
  | TokenRequestFrame
  | TopicSubscribeFrame
  | TopicUnsubscribeFrame;

export type ClientFrame = ClientHelloFrame | RequestFrame | PingFrame;

export type RelayFrame =
  | HelloOkFrame
  | PermissionResultFrame
  | TokenResultFrame
  | TopicResultFrame
  | TokenRefreshFrame
  | MessageFrame
  | PongFrame
  | ErrorFrame;

export type ResponseFrame = PermissionResultFrame | TokenResultFrame | TopicResultFrame;
