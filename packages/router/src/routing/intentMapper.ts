import { MalformedPayloadError } from '../errors';
import type { InboundMessage, NavigationIntent } from '../types/messages';

export interface IntentMappingOptions {
  defaultTarget: string;
  screenKey: string;
}

export interface IntentMapping {
  intent: NavigationIntent;
  /** Set when the payload named no screen and the default target was used. */
  diagnostic: MalformedPayloadError | null;
}

/**
 * Derive a NavigationIntent from a message payload.
 *
 * `target` is the payload's screen entry when it is a non-empty string,
 * otherwise the default target. Every other entry is passed through as a
 * param. Never throws.
 */
export function mapPayloadToIntent(
  message: InboundMessage,
  options: IntentMappingOptions
): IntentMapping {
  const entries = Object.entries(message.payload);
  const screen = entries.find(([key]) => key === options.screenKey)?.[1] ?? null;
  const params = Object.fromEntries(entries.filter(([key]) => key !== options.screenKey));

  const target = screen !== null && screen.trim().length > 0 ? screen : null;
  const intent: NavigationIntent = {
    sourceMessageId: message.id,
    target: target ?? options.defaultTarget,
    params,
  };

  if (target !== null) {
    return { intent, diagnostic: null };
  }

  const diagnostic = new MalformedPayloadError(
    screen === null
      ? `message ${message.id} has no "${options.screenKey}" entry`
      : `message ${message.id} has an empty "${options.screenKey}" entry`
  );
  return { intent, diagnostic };
}
