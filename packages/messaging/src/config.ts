import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { loadRouterConfig, readPositiveInt, type RouterConfig } from '@push-dispatch/router';

const STATE_DIR = path.join(os.homedir(), '.push-dispatch');

/**
 * Runtime configuration for the push-dispatch daemon.
 */
export interface MessagingConfig {
  router: RouterConfig;
  /** WebSocket URL of the push emulator/relay; null when unset. */
  relayUrl: string | null;
  clientId: string;
  /** Topics subscribed right after initialization. */
  topics: string[];
  seenStorePath: string;
  /** JSON file remembering the last messaging token. */
  tokenStorePath: string;
  requestTimeoutMs: number;
  launchTimeoutMs: number;
}

export function loadMessagingConfig(env: NodeJS.ProcessEnv = process.env): MessagingConfig {
  return {
    router: loadRouterConfig(env),
    relayUrl: env['PUSH_RELAY_URL']?.trim() || null,
    clientId: env['PUSH_CLIENT_ID']?.trim() || randomUUID(),
    topics: (env['PUSH_TOPICS'] ?? '')
      .split(',')
      .map((topic) => topic.trim())
      .filter((topic) => topic.length > 0),
    seenStorePath: env['PUSH_SEEN_STORE_PATH'] ?? path.join(STATE_DIR, 'seen.json'),
    tokenStorePath: env['PUSH_TOKEN_STORE_PATH'] ?? path.join(STATE_DIR, 'token.json'),
    requestTimeoutMs: readPositiveInt(env, 'PUSH_REQUEST_TIMEOUT_MS') ?? 10_000,
    launchTimeoutMs: readPositiveInt(env, 'PUSH_LAUNCH_TIMEOUT_MS') ?? 5_000,
  };
}
