// Message and intent types shared by every channel the router listens on.
// A message arrives from the push provider; an intent leaves towards the UI.

// ─── Inbound ──────────────────────────────────────────────────────────────────

/**
 * How a message reached the app:
 *  - 'foreground'     : arrived while the app was running
 *  - 'background_tap' : user tapped it while the app was backgrounded
 *  - 'cold_start'     : user tapped it and the tap launched the process
 */
export type DeliveryChannel = 'foreground' | 'background_tap' | 'cold_start';

export const DELIVERY_CHANNELS: readonly DeliveryChannel[] = [
  'foreground',
  'background_tap',
  'cold_start',
];

export type MessagePayload = Readonly<Record<string, string>>;

export interface InboundMessage {
  /** Provider-assigned, unique per send. */
  readonly id: string;
  readonly payload: MessagePayload;
  readonly title?: string;
  readonly body?: string;
  readonly receivedVia: DeliveryChannel;
}

// ─── Outbound ─────────────────────────────────────────────────────────────────

export interface NavigationIntent {
  sourceMessageId: string;
  /** Screen identifier understood by the navigation layer. */
  target: string;
  params: Record<string, string>;
}

export type NavigationConsumer = (intent: NavigationIntent) => void | Promise<void>;

// ─── Handles ──────────────────────────────────────────────────────────────────

/** Returned by every registration point so callers can tear down deterministically. */
export interface Subscription {
  unsubscribe(): void;
}

export function toSubscription(teardown: () => void): Subscription {
  let active = true;
  return {
    unsubscribe() {
      if (!active) return;
      active = false;
      teardown();
    },
  };
}

export function createInboundMessage(fields: {
  id: string;
  payload?: Record<string, string>;
  title?: string;
  body?: string;
  receivedVia: DeliveryChannel;
}): InboundMessage {
  const message: InboundMessage = {
    id: fields.id,
    payload: Object.freeze({ ...(fields.payload ?? {}) }),
    receivedVia: fields.receivedVia,
    ...(fields.title !== undefined ? { title: fields.title } : {}),
    ...(fields.body !== undefined ? { body: fields.body } : {}),
  };
  return Object.freeze(message);
}

/** Same message, re-labelled with the channel that actually delivered it. */
export function withChannel(message: InboundMessage, receivedVia: DeliveryChannel): InboundMessage {
  if (message.receivedVia === receivedVia) return message;
  return createInboundMessage({ ...message, receivedVia });
}
