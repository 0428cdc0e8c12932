/**
 * Runtime validation for messages that arrive as untyped JSON (socket frames,
 * provider callbacks). Payload values that are not strings are coerced:
 * numbers and booleans with String(), anything else as JSON.
 */
import { MalformedPayloadError } from '../errors';
import {
  createInboundMessage,
  DELIVERY_CHANNELS,
  type DeliveryChannel,
  type InboundMessage,
} from '../types/messages';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertObject(value: unknown, context: string): asserts value is Record<string, unknown> {
  if (!isRecord(value)) {
    throw new MalformedPayloadError(`${context} must be an object`);
  }
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new MalformedPayloadError(`${field} must be a string`);
  }
  return value;
}

function coerceValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    default:
      return JSON.stringify(value) ?? '';
  }
}

export function isDeliveryChannel(value: unknown): value is DeliveryChannel {
  return DELIVERY_CHANNELS.some((channel) => channel === value);
}

export function parsePayload(input: unknown): Record<string, string> {
  if (input === undefined || input === null) return {};
  assertObject(input, 'payload');

  // fromEntries defines own properties, so a "__proto__" key survives
  return Object.fromEntries(
    Object.entries(input)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]): [string, string] => [key, coerceValue(value)])
  );
}

/** Message fields without a delivery channel, e.g. a data-only background message. */
export type MessageFields = Omit<InboundMessage, 'receivedVia'>;

export function parseMessageFields(input: unknown): MessageFields {
  assertObject(input, 'message');

  const id = input['id'];
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new MalformedPayloadError('id must be a non-empty string');
  }

  const title = optionalString(input['title'], 'title');
  const body = optionalString(input['body'], 'body');
  return {
    id,
    payload: Object.freeze(parsePayload(input['payload'])),
    ...(title !== undefined ? { title } : {}),
    ...(body !== undefined ? { body } : {}),
  };
}

/**
 * Parse and validate an inbound message. `receivedVia` is taken from the
 * caller when given, otherwise from the input itself.
 */
export function parseInboundMessage(input: unknown, receivedVia?: DeliveryChannel): InboundMessage {
  const fields = parseMessageFields(input);

  const channel = receivedVia ?? (isRecord(input) ? input['receivedVia'] : undefined);
  if (!isDeliveryChannel(channel)) {
    throw new MalformedPayloadError(`receivedVia must be one of ${DELIVERY_CHANNELS.join(', ')}`);
  }

  return createInboundMessage({ ...fields, receivedVia: channel });
}
