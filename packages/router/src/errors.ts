/**
 * Error taxonomy for the push subsystem.
 *
 * Nothing here is fatal: every failure degrades to a safe default (no
 * navigation, default-screen navigation, or data-only delivery). Async
 * operations surface these through `Outcome<T>` instead of throwing.
 */

export type PushErrorCode =
  | 'TOKEN_UNAVAILABLE'
  | 'PERMISSION_DENIED'
  | 'MALFORMED_PAYLOAD'
  | 'INVALID_TOPIC'
  | 'PROVIDER_FAILURE';

export class PushError extends Error {
  constructor(
    readonly code: PushErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PushError';
  }
}

export class TokenUnavailableError extends PushError {
  constructor(message = 'Messaging token is unavailable', options?: { cause?: unknown }) {
    super('TOKEN_UNAVAILABLE', message, options);
    this.name = 'TokenUnavailableError';
  }
}

export class PermissionDeniedError extends PushError {
  constructor(readonly status: string) {
    super('PERMISSION_DENIED', `Notification permission not granted (${status})`);
    this.name = 'PermissionDeniedError';
  }
}

export class MalformedPayloadError extends PushError {
  constructor(message: string) {
    super('MALFORMED_PAYLOAD', message);
    this.name = 'MalformedPayloadError';
  }
}

export class InvalidTopicError extends PushError {
  constructor(readonly topic: string) {
    super('INVALID_TOPIC', `Invalid topic name: "${topic}"`);
    this.name = 'InvalidTopicError';
  }
}

export class ProviderError extends PushError {
  constructor(operation: string, cause: unknown) {
    super('PROVIDER_FAILURE', `${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'ProviderError';
  }
}

// ─── Outcomes ─────────────────────────────────────────────────────────────────

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: PushError };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(error: PushError): Outcome<T> {
  return { ok: false, error };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
