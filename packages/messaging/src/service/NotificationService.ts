/**
 * Bootstraps push notifications for the app and wires the provider's
 * delivery channels into the DispatchRouter.
 *
 * `initialize()` runs, in order:
 *  1. Request notification permission (declined → data-only mode).
 *  2. Fetch the messaging token and report it if it changed.
 *  3. Listen for token refreshes.
 *  4. Bind the router to the foreground and background-tap channels.
 *  5. Replay the message that launched the app, if any.
 *
 * Nothing here throws for provider failures: each step yields an Outcome and
 * the next step still runs.
 */
import {
  createLogger,
  describeError,
  failure,
  InvalidTopicError,
  PermissionDeniedError,
  ProviderError,
  success,
  TokenUnavailableError,
  type DispatchRouter,
  type InboundMessage,
  type Logger,
  type Outcome,
  type Subscription,
} from '@push-dispatch/router';
import {
  isPermissionGranted,
  type MessageSource,
  type PermissionStatus,
  type PermissionTokenProvider,
} from '../types/provider';
import type { TokenStore } from '../types/storage';
import { isValidTopic } from './topics';

export type TokenHandler = (token: string) => void | Promise<void>;

export interface NotificationServiceOptions {
  router: DispatchRouter;
  provider: PermissionTokenProvider;
  source: MessageSource;
  tokenStore?: TokenStore;
  /** Called with a new or refreshed token; registering it with a backend happens here. */
  onToken?: TokenHandler;
  logger?: Logger;
}

export interface InitializeResult {
  permission: Outcome<PermissionStatus>;
  token: Outcome<string>;
  /** True when permission was not granted and only data messages will arrive. */
  dataOnly: boolean;
}

export class NotificationService {
  private readonly router: DispatchRouter;
  private readonly provider: PermissionTokenProvider;
  private readonly source: MessageSource;
  private readonly tokenStore: TokenStore | null;
  private readonly onToken: TokenHandler | null;
  private readonly logger: Logger;
  private readonly subscriptions: Subscription[] = [];
  private initializing: Promise<InitializeResult> | null = null;

  constructor(options: NotificationServiceOptions) {
    this.router = options.router;
    this.provider = options.provider;
    this.source = options.source;
    this.tokenStore = options.tokenStore ?? null;
    this.onToken = options.onToken ?? null;
    this.logger = options.logger ?? createLogger('messaging');
  }

  /** Idempotent: later calls resolve with the first call's result. */
  initialize(): Promise<InitializeResult> {
    this.initializing ??= this.runInitialize();
    return this.initializing;
  }

  async getToken(): Promise<Outcome<string>> {
    try {
      const token = await this.provider.getToken();
      if (!token) {
        return failure(new TokenUnavailableError('Provider returned no messaging token'));
      }
      return success(token);
    } catch (err) {
      return failure(
        new TokenUnavailableError(`Error getting messaging token: ${describeError(err)}`, { cause: err })
      );
    }
  }

  subscribeToTopic(topic: string): Promise<Outcome<string>> {
    return this.changeTopic(topic, 'subscribe');
  }

  unsubscribeFromTopic(topic: string): Promise<Outcome<string>> {
    return this.changeTopic(topic, 'unsubscribe');
  }

  /** Releases every listener registered by `initialize()`. */
  shutdown(): void {
    for (const subscription of this.subscriptions.splice(0)) {
      subscription.unsubscribe();
    }
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private async runInitialize(): Promise<InitializeResult> {
    const permission = await this.requestPermission();
    const dataOnly = !permission.ok;

    const token = await this.getToken();
    if (token.ok) {
      this.logger.info(`Messaging token: ${token.value}`);
      await this.handleToken(token.value, false);
    } else {
      this.logger.warn(token.error.message);
    }

    this.subscriptions.push(
      this.provider.onTokenRefresh((refreshed) => {
        this.logger.info(`Messaging token refreshed: ${refreshed}`);
        void this.handleToken(refreshed, true);
      })
    );

    this.subscriptions.push(this.router.bind(this.source));
    if (this.source.onBackgroundMessage) {
      this.subscriptions.push(
        this.source.onBackgroundMessage((message) => {
          this.logger.info(`Background message ${message.id}`, message.payload);
        })
      );
    }

    await this.replayLaunchMessage();

    this.logger.info(`Notification service initialized${dataOnly ? ' (data-only)' : ''}`);
    return { permission, token, dataOnly };
  }

  private async requestPermission(): Promise<Outcome<PermissionStatus>> {
    let status: PermissionStatus;
    try {
      status = await this.provider.requestPermission();
    } catch (err) {
      const error = new ProviderError('requestPermission', err);
      this.logger.error(error.message);
      return failure(error);
    }

    this.logger.info(`Notification permission status: ${status}`);
    if (isPermissionGranted(status)) {
      return success(status);
    }
    this.logger.warn('User declined or has not accepted permission; continuing with data-only delivery');
    return failure(new PermissionDeniedError(status));
  }

  private async handleToken(token: string, refreshed: boolean): Promise<void> {
    try {
      if (this.tokenStore) {
        const previous = await this.tokenStore.get();
        if (!refreshed && previous === token) {
          this.logger.debug('Messaging token unchanged since last launch');
          return;
        }
        await this.tokenStore.set(token);
      }
      await this.onToken?.(token);
    } catch (err) {
      this.logger.error(`Failed to handle messaging token: ${describeError(err)}`);
    }
  }

  private async replayLaunchMessage(): Promise<void> {
    if (!this.router.hasConsumer) {
      this.logger.warn('Replaying the launch message before a navigation consumer is attached');
    }

    let launchMessage: InboundMessage | null;
    try {
      launchMessage = await this.source.getInitialLaunchMessage();
    } catch (err) {
      this.logger.error(`Failed to read the launch message: ${describeError(err)}`);
      launchMessage = null;
    }

    if (launchMessage) {
      this.logger.info(`App opened from terminated state via ${launchMessage.id}`);
    }
    this.router.onColdStart(launchMessage);
  }

  private async changeTopic(topic: string, action: 'subscribe' | 'unsubscribe'): Promise<Outcome<string>> {
    if (!isValidTopic(topic)) {
      return failure(new InvalidTopicError(topic));
    }

    try {
      if (action === 'subscribe') {
        await this.provider.subscribeToTopic(topic);
        this.logger.info(`Subscribed to topic: ${topic}`);
      } else {
        await this.provider.unsubscribeFromTopic(topic);
        this.logger.info(`Unsubscribed from topic: ${topic}`);
      }
      return success(topic);
    } catch (err) {
      const error = new ProviderError(`${action} ${topic}`, err);
      this.logger.error(error.message);
      return failure(error);
    }
  }
}
