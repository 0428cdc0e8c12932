/**
 * Validation for frames received from the push relay. Anything that does not
 * match a known frame shape is rejected with null.
 */
import { PERMISSION_STATUSES, type PermissionStatus } from '../types/provider';
import type { RelayFrame, WireChannel } from '../types/protocol';

const WIRE_CHANNELS: readonly WireChannel[] = ['foreground', 'background_tap', 'background'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

// null marks an invalid value
function optionalString(value: unknown): string | undefined | null {
  if (value === undefined) return undefined;
  return isString(value) ? value : null;
}

// undefined marks an invalid value; absent and null both read as null
function nullableString(value: unknown): string | null | undefined {
  if (value === undefined || value === null) return null;
  return isString(value) ? value : undefined;
}

function isPermissionStatus(value: unknown): value is PermissionStatus {
  return PERMISSION_STATUSES.some((status) => status === value);
}

function isWireChannel(value: unknown): value is WireChannel {
  return WIRE_CHANNELS.some((channel) => channel === value);
}

export function parseRelayFrame(data: string): RelayFrame | null {
  let input: unknown;
  try {
    input = JSON.parse(data);
  } catch {
    return null;
  }
  if (!isRecord(input)) return null;

  switch (input['type']) {
    case 'hello_ok':
      return { type: 'hello_ok', launchMessage: input['launchMessage'] ?? null };

    case 'permission_result': {
      const { requestId, status } = input;
      if (!isString(requestId) || !isPermissionStatus(status)) return null;
      return { type: 'permission_result', requestId, status };
    }

    case 'token_result': {
      const { requestId } = input;
      const token = nullableString(input['token']);
      const error = optionalString(input['error']);
      if (!isString(requestId) || token === undefined || error === null) return null;
      return {
        type: 'token_result',
        requestId,
        token,
        ...(error !== undefined ? { error } : {}),
      };
    }

    case 'topic_result': {
      const { requestId, ok } = input;
      const error = optionalString(input['error']);
      if (!isString(requestId) || typeof ok !== 'boolean' || error === null) return null;
      return { type: 'topic_result', requestId, ok, ...(error !== undefined ? { error } : {}) };
    }

    case 'token_refresh': {
      const { token } = input;
      if (!isString(token) || token.length === 0) return null;
      return { type: 'token_refresh', token };
    }

    case 'message': {
      const { channel } = input;
      if (!isWireChannel(channel)) return null;
      return { type: 'message', channel, message: input['message'] };
    }

    case 'pong':
      return { type: 'pong' };

    case 'error': {
      const { message } = input;
      const requestId = optionalString(input['requestId']);
      if (!isString(message) || requestId === null) return null;
      return { type: 'error', message, ...(requestId !== undefined ? { requestId } : {}) };
    }

    default:
      return null;
  }
}
