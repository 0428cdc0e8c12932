import WebSocket from 'ws';
import { randomUUID } from 'crypto';
import {
  createLogger,
  describeError,
  parseInboundMessage,
  parseMessageFields,
  toSubscription,
  type DeliveryChannel,
  type InboundMessage,
  type Logger,
  type MessageListener,
  type Subscription,
} from '@push-dispatch/router';
import type {
  BackgroundMessageListener,
  MessageSource,
  PermissionStatus,
  PermissionTokenProvider,
  TokenListener,
} from '../types/provider';
import type {
  ClientFrame,
  MessageFrame,
  RelayFrame,
  RequestFrame,
  ResponseFrame,
} from '../types/protocol';
import { parseRelayFrame } from './frames';

const RECONNECT_DELAY_MS = 5_000;
const HEARTBEAT_INTERVAL_MS = 30_000;
const CLIENT_VERSION = '0.1.0';

export interface SocketPushClientOptions {
  url: string;
  clientId: string;
  requestTimeoutMs?: number;
  /** How long `getInitialLaunchMessage()` waits for the relay's hello_ok. */
  launchTimeoutMs?: number;
  logger?: Logger;
}

interface PendingRequest {
  resolve: (frame: ResponseFrame) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Push provider backed by a WebSocket connection to a push emulator/relay.
 * Implements both the permission/token operations and the three delivery
 * channels. Automatically reconnects on disconnect (unless explicitly shut
 * down).
 */
export class SocketPushClient implements PermissionTokenProvider, MessageSource {
  private ws: WebSocket | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private launchTimer: ReturnType<typeof setTimeout> | null = null;
  private isShuttingDown = false;
  private readonly url: string;
  private readonly clientId: string;
  private readonly requestTimeoutMs: number;
  private readonly launchTimeoutMs: number;
  private readonly logger: Logger;
  private readonly pending = new Map<string, PendingRequest>();
  private readonly foregroundListeners = new Set<MessageListener>();
  private readonly tapListeners = new Set<MessageListener>();
  private readonly backgroundListeners = new Set<BackgroundMessageListener>();
  private readonly tokenListeners = new Set<TokenListener>();
  private readonly openWaiters = new Set<() => void>();
  private readonly launchMessage: Promise<InboundMessage | null>;
  private settleLaunch: ((message: InboundMessage | null) => void) | null = null;

  constructor(options: SocketPushClientOptions) {
    this.url = options.url;
    this.clientId = options.clientId;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.launchTimeoutMs = options.launchTimeoutMs ?? 5_000;
    this.logger = options.logger ?? createLogger('push-socket');
    this.launchMessage = new Promise((resolve) => {
      this.settleLaunch = resolve;
    });
  }

  connect(): void {
    if (this.ws) return;
    this.isShuttingDown = false;
    this.doConnect();
  }

  disconnect(): void {
    this.isShuttingDown = true;
    this.stopHeartbeat();
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.resolveLaunch(null);
    this.rejectPending(new Error('Push client shut down'));
    this.ws?.close(1000, 'Client shutting down');
    this.ws = null;
  }

  get isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  /** Resolves once the socket is open; rejects after the request timeout. */
  ready(): Promise<void> {
    if (this.isConnected) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const waiter = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.openWaiters.delete(waiter);
        reject(new Error(`Push relay not reachable within ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);
      this.openWaiters.add(waiter);
    });
  }

  // ─── PermissionTokenProvider ────────────────────────────────────────────────

  async requestPermission(): Promise<PermissionStatus> {
    const reply = await this.request({ type: 'permission_request', requestId: randomUUID() });
    if (reply.type !== 'permission_result') {
      throw unexpectedReply(reply, 'permission_request');
    }
    return reply.status;
  }

  async getToken(): Promise<string | null> {
    const reply = await this.request({ type: 'token_request', requestId: randomUUID() });
    if (reply.type !== 'token_result') {
      throw unexpectedReply(reply, 'token_request');
    }
    if (reply.error) {
      throw new Error(reply.error);
    }
    return reply.token;
  }

  onTokenRefresh(listener: TokenListener): Subscription {
    return register(this.tokenListeners, listener);
  }

  subscribeToTopic(topic: string): Promise<void> {
    return this.changeTopic({ type: 'topic_subscribe', requestId: randomUUID(), topic });
  }

  unsubscribeFromTopic(topic: string): Promise<void> {
    return this.changeTopic({ type: 'topic_unsubscribe', requestId: randomUUID(), topic });
  }

  // ─── MessageSource ──────────────────────────────────────────────────────────

  onForegroundMessage(listener: MessageListener): Subscription {
    return register(this.foregroundListeners, listener);
  }

  onTapOpenedFromBackground(listener: MessageListener): Subscription {
    return register(this.tapListeners, listener);
  }

  onBackgroundMessage(listener: BackgroundMessageListener): Subscription {
    return register(this.backgroundListeners, listener);
  }

  /**
   * Resolves with the launch message from the relay's hello_ok, or null once
   * the launch timeout elapses or the client shuts down.
   */
  getInitialLaunchMessage(): Promise<InboundMessage | null> {
    if (this.settleLaunch && this.launchTimer === null) {
      this.launchTimer = setTimeout(() => {
        this.logger.warn(`No hello_ok within ${this.launchTimeoutMs}ms; assuming no launch message`);
        this.resolveLaunch(null);
      }, this.launchTimeoutMs);
    }
    return this.launchMessage;
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private doConnect(): void {
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      this.logger.info('Connected');
      this.send({ type: 'client_hello', clientId: this.clientId, version: CLIENT_VERSION });
      this.startHeartbeat();
      for (const waiter of this.openWaiters) waiter();
      this.openWaiters.clear();
    });

    ws.on('message', (data) => {
      const frame = parseRelayFrame(data.toString());
      if (!frame) {
        this.logger.warn('Dropping malformed frame from relay');
        return;
      }
      this.handleFrame(frame);
    });

    ws.on('close', (code, reason) => {
      // Late close from a socket already replaced by connect()
      if (this.ws !== ws) return;
      this.logger.info(`Disconnected (${code} ${reason.toString()})`);
      this.stopHeartbeat();
      this.rejectPending(new Error('Connection to push relay closed'));
      this.ws = null;
      if (!this.isShuttingDown) {
        this.scheduleReconnect();
      }
    });

    ws.on('error', (err) => {
      // 'close' fires immediately after 'error', so just log here
      this.logger.error(`Error: ${err.message}`);
    });
  }

  private handleFrame(frame: RelayFrame): void {
    switch (frame.type) {
      case 'hello_ok':
        this.handleHello(frame.launchMessage);
        break;

      case 'permission_result':
      case 'token_result':
      case 'topic_result': {
        const reply = frame;
        this.settleRequest(reply.requestId, (request) => request.resolve(reply));
        break;
      }

      case 'token_refresh': {
        const { token } = frame;
        for (const listener of this.tokenListeners) {
          this.invoke(() => listener(token), 'token refresh');
        }
        break;
      }

      case 'message':
        this.handleMessage(frame);
        break;

      case 'error': {
        const { requestId, message } = frame;
        if (requestId) {
          this.settleRequest(requestId, (request) => request.reject(new Error(message)));
        } else {
          this.logger.error(`Relay error: ${message}`);
        }
        break;
      }

      case 'pong':
        // Heartbeat reply
        break;
    }
  }

  private handleHello(rawLaunchMessage: unknown): void {
    if (!this.settleLaunch) {
      this.logger.debug('Ignoring launch message from a later hello_ok');
      return;
    }
    if (rawLaunchMessage === null) {
      this.resolveLaunch(null);
      return;
    }
    try {
      this.resolveLaunch(parseInboundMessage(rawLaunchMessage, 'cold_start'));
    } catch (err) {
      this.logger.warn(`Invalid launch message: ${describeError(err)}`);
      this.resolveLaunch(null);
    }
  }

  private handleMessage(frame: MessageFrame): void {
    try {
      if (frame.channel === 'background') {
        const fields = parseMessageFields(frame.message);
        for (const listener of this.backgroundListeners) {
          this.invoke(() => listener(fields), 'background message');
        }
        return;
      }

      const via: DeliveryChannel = frame.channel;
      const message = parseInboundMessage(frame.message, via);
      const listeners = via === 'foreground' ? this.foregroundListeners : this.tapListeners;
      for (const listener of listeners) {
        this.invoke(() => listener(message), `${via} message`);
      }
    } catch (err) {
      this.logger.warn(`Dropping invalid ${frame.channel} message: ${describeError(err)}`);
    }
  }

  private invoke(fn: () => void, context: string): void {
    try {
      fn();
    } catch (err) {
      this.logger.error(`Listener for ${context} failed: ${describeError(err)}`);
    }
  }

  private request(frame: RequestFrame): Promise<ResponseFrame> {
    return new Promise<ResponseFrame>((resolve, reject) => {
      if (!this.send(frame)) {
        reject(new Error(`Not connected to push relay (${frame.type})`));
        return;
      }
      const timer = setTimeout(() => {
        this.pending.delete(frame.requestId);
        reject(new Error(`${frame.type} timed out after ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);
      this.pending.set(frame.requestId, { resolve, reject, timer });
    });
  }

  private settleRequest(requestId: string, settle: (request: PendingRequest) => void): void {
    const request = this.pending.get(requestId);
    if (!request) {
      this.logger.debug(`Reply for unknown request ${requestId}`);
      return;
    }
    clearTimeout(request.timer);
    this.pending.delete(requestId);
    settle(request);
  }

  private rejectPending(err: Error): void {
    for (const request of this.pending.values()) {
      clearTimeout(request.timer);
      request.reject(err);
    }
    this.pending.clear();
  }

  private async changeTopic(frame: RequestFrame): Promise<void> {
    const reply = await this.request(frame);
    if (reply.type !== 'topic_result') {
      throw unexpectedReply(reply, frame.type);
    }
    if (!reply.ok) {
      throw new Error(reply.error ?? `${frame.type} rejected`);
    }
  }

  private resolveLaunch(message: InboundMessage | null): void {
    if (this.launchTimer !== null) {
      clearTimeout(this.launchTimer);
      this.launchTimer = null;
    }
    const settle = this.settleLaunch;
    this.settleLaunch = null;
    settle?.(message);
  }

  private send(frame: ClientFrame): boolean {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(frame));
      return true;
    }
    return false;
  }

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      this.send({ type: 'ping' });
    }, HEARTBEAT_INTERVAL_MS);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private scheduleReconnect(): void {
    this.logger.info(`Reconnecting in ${RECONNECT_DELAY_MS}ms…`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.doConnect();
    }, RECONNECT_DELAY_MS);
  }
}

function register<T>(listeners: Set<T>, listener: T): Subscription {
  listeners.add(listener);
  return toSubscription(() => {
    listeners.delete(listener);
  });
}

function unexpectedReply(reply: ResponseFrame, requestType: string): Error {
  return new Error(`Unexpected ${reply.type} reply to ${requestType}`);
}
