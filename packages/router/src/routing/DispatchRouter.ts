import { DEFAULT_ROUTER_CONFIG, type RouterConfig } from '../config';
import { describeError } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import type { ChannelSource, MessageListener, SeenMessageStore } from '../types/channels';
import {
  toSubscription,
  withChannel,
  type DeliveryChannel,
  type InboundMessage,
  type NavigationConsumer,
  type NavigationIntent,
  type Subscription,
} from '../types/messages';
import { mapPayloadToIntent } from './intentMapper';
import { SeenMessageSet } from './SeenMessageSet';

export interface DispatchRouterOptions {
  config?: Partial<RouterConfig>;
  logger?: Logger;
  /** Persists seen ids so a cold-start message replayed on the next launch is not dispatched twice. */
  store?: SeenMessageStore;
  now?: () => number;
}

export interface RouterStats {
  dispatched: number;
  duplicates: number;
  /** Fresh tap/cold-start messages that found no consumer attached. */
  dropped: number;
  foreground: number;
}

/**
 * Turns provider events from all three delivery channels into at most one
 * NavigationIntent per distinct message id.
 *
 * Owned by application startup code and passed to whoever needs it. The
 * SeenMessageSet check-and-insert runs synchronously, so on the event loop it
 * is the single serialization point between channels: whichever call sees an
 * id first dispatches it, the other is a no-op.
 *
 * Ordering rule: attach the consumer before calling `onColdStart`, otherwise
 * the cold-start intent is dropped.
 */
export class DispatchRouter {
  readonly config: RouterConfig;
  private readonly logger: Logger;
  private readonly store: SeenMessageStore | null;
  private readonly seen: SeenMessageSet;
  private readonly foregroundListeners = new Set<MessageListener>();
  private consumer: NavigationConsumer | null = null;
  private coldStartConsumed = false;
  private saveChain: Promise<void> = Promise.resolve();
  private readonly counters: RouterStats = {
    dispatched: 0,
    duplicates: 0,
    dropped: 0,
    foreground: 0,
  };

  constructor(options: DispatchRouterOptions = {}) {
    this.config = { ...DEFAULT_ROUTER_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('router');
    this.store = options.store ?? null;
    this.seen = new SeenMessageSet({
      capacity: this.config.seenCapacity,
      maxAgeMs: this.config.seenMaxAgeMs,
      now: options.now,
    });
  }

  // ─── Consumer ───────────────────────────────────────────────────────────────

  /** Attach the navigation consumer. Replaces any previous one. */
  attach(consumer: NavigationConsumer): Subscription {
    if (this.consumer) {
      this.logger.warn('Replacing an already attached navigation consumer');
    }
    this.consumer = consumer;
    return toSubscription(() => {
      if (this.consumer === consumer) {
        this.consumer = null;
      }
    });
  }

  get hasConsumer(): boolean {
    return this.consumer !== null;
  }

  /** Listen for unseen foreground messages (e.g. to show an in-app banner). */
  observeForeground(listener: MessageListener): Subscription {
    this.foregroundListeners.add(listener);
    return toSubscription(() => {
      this.foregroundListeners.delete(listener);
    });
  }

  // ─── Channels ───────────────────────────────────────────────────────────────

  /** Foreground arrival is not a request to navigate: never emits an intent. */
  onForeground(message: InboundMessage): void {
    this.counters.foreground++;
    if (this.seen.has(message.id)) {
      this.logger.debug(`Foreground message ${message.id} already dispatched`);
      return;
    }

    this.logger.info(`Foreground message ${message.id}${message.title ? `: ${message.title}` : ''}`);
    const received = withChannel(message, 'foreground');
    for (const listener of this.foregroundListeners) {
      try {
        listener(received);
      } catch (err) {
        this.logger.error(`Foreground listener failed for ${message.id}:`, err);
      }
    }
  }

  /** Returns true when an intent was emitted. */
  onTapOpened(message: InboundMessage): boolean {
    return this.dispatch(withChannel(message, 'background_tap'));
  }

  /**
   * Replays the message that launched the process. Expected once; later calls
   * are ignored.
   */
  onColdStart(message: InboundMessage | null): boolean {
    if (this.coldStartConsumed) {
      this.logger.warn('Cold-start message already handled; ignoring repeat call');
      return false;
    }
    this.coldStartConsumed = true;

    if (message === null) {
      this.logger.debug('No launch message');
      return false;
    }
    if (!this.consumer) {
      this.logger.warn(`Cold start for ${message.id} before a consumer was attached`);
    }
    return this.dispatch(withChannel(message, 'cold_start'));
  }

  /** Subscribe to a source's foreground and background-tap channels. */
  bind(source: ChannelSource): Subscription {
    const foreground = source.onForegroundMessage((message) => {
      this.onForeground(message);
    });
    const tapped = source.onTapOpenedFromBackground((message) => {
      this.onTapOpened(message);
    });
    return toSubscription(() => {
      foreground.unsubscribe();
      tapped.unsubscribe();
    });
  }

  // ─── Persistence ────────────────────────────────────────────────────────────

  /** Seed the seen set from the store. Returns the number of ids loaded. */
  async restore(): Promise<number> {
    if (!this.store) return 0;
    const ids = await this.store.load();
    this.seen.restore(ids);
    this.logger.debug(`Restored ${ids.length} seen message ids`);
    return ids.length;
  }

  /** Resolves once every pending save has settled. */
  flush(): Promise<void> {
    return this.saveChain;
  }

  // ─── Introspection ──────────────────────────────────────────────────────────

  isSeen(messageId: string): boolean {
    return this.seen.has(messageId);
  }

  seenIds(): string[] {
    return this.seen.snapshot();
  }

  stats(): RouterStats {
    return { ...this.counters };
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private dispatch(message: InboundMessage): boolean {
    if (!this.seen.checkAndAdd(message.id)) {
      this.counters.duplicates++;
      this.logger.debug(`Ignoring duplicate ${message.id} via ${message.receivedVia}`);
      return false;
    }
    this.persist();

    const { intent, diagnostic } = mapPayloadToIntent(message, this.config);
    if (diagnostic) {
      this.logger.warn(`${diagnostic.message}; routing to "${intent.target}"`);
    }

    const consumer = this.consumer;
    if (!consumer) {
      this.counters.dropped++;
      this.logger.warn(`No navigation consumer attached; dropped intent for ${message.id}`);
      return false;
    }

    this.counters.dispatched++;
    this.logger.info(`Dispatching ${message.id} via ${message.receivedVia} → ${intent.target}`);
    this.emit(consumer, intent, message.receivedVia);
    return true;
  }

  // Fire-and-forget: consumer failures are logged, never returned to the channel callback
  private emit(consumer: NavigationConsumer, intent: NavigationIntent, via: DeliveryChannel): void {
    let result: void | Promise<void>;
    try {
      result = consumer(intent);
    } catch (err) {
      this.logger.error(`Consumer failed for ${intent.sourceMessageId} (${via}):`, err);
      return;
    }
    void Promise.resolve(result).catch((err: unknown) => {
      this.logger.error(`Consumer failed for ${intent.sourceMessageId} (${via}):`, err);
    });
  }

  private persist(): void {
    const store = this.store;
    if (!store) return;
    const snapshot = this.seen.snapshot();
    this.saveChain = this.saveChain
      .then(() => store.save(snapshot))
      .catch((err: unknown) => {
        this.logger.error(`Failed to persist seen message ids: ${describeError(err)}`);
      });
  }
}
