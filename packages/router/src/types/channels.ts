import type { InboundMessage, Subscription } from './messages';

export type MessageListener = (message: InboundMessage) => void;

/**
 * The two live registration points of a message source. The cold-start
 * message is fetched separately so the caller decides when it is replayed.
 */
export interface ChannelSource {
  onForegroundMessage(listener: MessageListener): Subscription;
  onTapOpenedFromBackground(listener: MessageListener): Subscription;
}

/** Persists dispatched ids across launches, oldest first. */
export interface SeenMessageStore {
  load(): Promise<string[]>;
  save(ids: readonly string[]): Promise<void>;
}
