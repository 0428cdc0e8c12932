#!/usr/bin/env node
/**
 * push-dispatch daemon entry point.
 *
 * Connects to a push emulator/relay, initializes notifications and logs every
 * NavigationIntent the router emits. Configured through environment
 * variables (see config.ts).
 */
import { createLogger, DispatchRouter, describeError } from '@push-dispatch/router';
import { loadMessagingConfig } from './config';
import { NotificationService } from './service/NotificationService';
import { SocketPushClient } from './socket/SocketPushClient';
import { FileSeenMessageStore } from './storage/FileSeenMessageStore';
import { FileTokenStore } from './storage/FileTokenStore';

const logger = createLogger('push-dispatch');

async function main(): Promise<void> {
  const config = loadMessagingConfig();

  if (!config.relayUrl) {
    logger.error(
      'PUSH_RELAY_URL is not set. Point it at a push relay, e.g.\n\n' +
        '  PUSH_RELAY_URL=ws://localhost:8790 push-dispatch\n'
    );
    process.exit(1);
  }

  const router = new DispatchRouter({
    config: config.router,
    store: new FileSeenMessageStore(config.seenStorePath),
  });
  await router.restore();

  // Consumer first: the launch message is replayed during initialize()
  router.attach((intent) => {
    logger.info(`Navigate → ${intent.target}`, intent.params);
  });

  const client = new SocketPushClient({
    url: config.relayUrl,
    clientId: config.clientId,
    requestTimeoutMs: config.requestTimeoutMs,
    launchTimeoutMs: config.launchTimeoutMs,
  });
  client.connect();
  await client.ready();

  const service = new NotificationService({
    router,
    provider: client,
    source: client,
    tokenStore: new FileTokenStore(config.tokenStorePath),
    onToken: (token) => {
      logger.info(`Token ready for registration: ${token}`);
    },
  });

  const result = await service.initialize();
  if (!result.permission.ok) {
    logger.warn(result.permission.error.message);
  }

  for (const topic of config.topics) {
    const outcome = await service.subscribeToTopic(topic);
    if (!outcome.ok) {
      logger.warn(outcome.error.message);
    }
  }

  logger.info('Running: press Ctrl+C to stop.');

  const shutdown = (): void => {
    logger.info('Shutting down…');
    service.shutdown();
    client.disconnect();
    void router.flush().finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.error(`Fatal: ${describeError(err)}`);
  process.exit(1);
});
