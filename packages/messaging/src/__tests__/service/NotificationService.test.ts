/**
 * Tests for NotificationService: bootstrap order, degraded modes and
 * wiring of the provider's channels into the router.
 */

import {
  createInboundMessage,
  DispatchRouter,
  silentLogger,
  type NavigationIntent,
} from '@push-dispatch/router';
import { NotificationService } from '../../service/NotificationService';
import { FakePushProvider, makeLogger, MemoryTokenStore, nextTick } from '../fakes';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function setup(options: { tokenStore?: MemoryTokenStore; attachConsumer?: boolean } = {}) {
  const provider = new FakePushProvider();
  const router = new DispatchRouter({ logger: silentLogger });
  const intents: NavigationIntent[] = [];
  if (options.attachConsumer ?? true) {
    router.attach((intent) => {
      intents.push(intent);
    });
  }
  const tokens: string[] = [];
  const logger = makeLogger();
  const service = new NotificationService({
    router,
    provider,
    source: provider,
    tokenStore: options.tokenStore,
    onToken: (token) => {
      tokens.push(token);
    },
    logger,
  });
  return { provider, router, intents, tokens, logger, service };
}

function tap(id: string, payload: Record<string, string> = {}) {
  return createInboundMessage({ id, payload, receivedVia: 'background_tap' });
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('NotificationService', () => {
  describe('initialize()', () => {
    it('runs permission, token, listeners and launch replay in order', async () => {
      const { provider, service, intents, tokens } = setup();
      provider.launchMessage = createInboundMessage({
        id: 'launch-1',
        payload: { screen: 'chat', chatId: '123' },
        receivedVia: 'cold_start',
      });

      const result = await service.initialize();

      expect(provider.calls).toEqual([
        'requestPermission',
        'getToken',
        'onTokenRefresh',
        'onForegroundMessage',
        'onTapOpenedFromBackground',
        'getInitialLaunchMessage',
      ]);
      expect(result).toEqual({
        permission: { ok: true, value: 'authorized' },
        token: { ok: true, value: 'tok-1' },
        dataOnly: false,
      });
      expect(tokens).toEqual(['tok-1']);
      expect(intents).toEqual([{ sourceMessageId: 'launch-1', target: 'chat', params: { chatId: '123' } }]);
    });

    it('treats provisional permission as granted', async () => {
      const { provider, service } = setup();
      provider.permission = 'provisional';

      const result = await service.initialize();

      expect(result.dataOnly).toBe(false);
    });

    it('continues in data-only mode when permission is denied', async () => {
      const { provider, service, tokens } = setup();
      provider.permission = 'denied';

      const result = await service.initialize();

      expect(result.dataOnly).toBe(true);
      expect(result.permission.ok).toBe(false);
      if (!result.permission.ok) {
        expect(result.permission.error.code).toBe('PERMISSION_DENIED');
        expect(result.permission.error.message).toBe('Notification permission not granted (denied)');
      }
      expect(tokens).toEqual(['tok-1']);
    });

    it('reports a failing permission prompt as a provider failure', async () => {
      const { provider, service } = setup();
      provider.permission = new Error('prompt crashed');

      const result = await service.initialize();

      expect(result.dataOnly).toBe(true);
      expect(result.permission).toMatchObject({
        ok: false,
        error: { code: 'PROVIDER_FAILURE', message: 'requestPermission failed: prompt crashed' },
      });
    });

    it('returns TokenUnavailable when the token fetch fails and keeps going', async () => {
      const { provider, service, intents, tokens } = setup();
      provider.token = new Error('SERVICE_NOT_AVAILABLE');
      provider.launchMessage = createInboundMessage({ id: 'launch-2', receivedVia: 'cold_start' });

      const result = await service.initialize();

      expect(result.token).toMatchObject({
        ok: false,
        error: { code: 'TOKEN_UNAVAILABLE', message: 'Error getting messaging token: SERVICE_NOT_AVAILABLE' },
      });
      expect(tokens).toEqual([]);
      expect(intents).toHaveLength(1);
    });

    it('returns TokenUnavailable when the provider has no token', async () => {
      const { provider, service } = setup();
      provider.token = null;

      const result = await service.initialize();

      expect(result.token).toMatchObject({
        ok: false,
        error: { code: 'TOKEN_UNAVAILABLE', message: 'Provider returned no messaging token' },
      });
    });

    it('is idempotent', async () => {
      const { provider, service } = setup();

      const [first, second] = await Promise.all([service.initialize(), service.initialize()]);

      expect(second).toBe(first);
      expect(provider.calls.filter((c) => c === 'requestPermission')).toHaveLength(1);
    });

    it('warns when the launch message is replayed before a consumer is attached', async () => {
      const { provider, service, router, logger } = setup({ attachConsumer: false });
      provider.launchMessage = createInboundMessage({ id: 'launch-3', receivedVia: 'cold_start' });

      await service.initialize();

      expect(logger.warn).toHaveBeenCalledWith(
        'Replaying the launch message before a navigation consumer is attached'
      );
      expect(router.stats().dropped).toBe(1);
    });

    it('logs a failing launch lookup and treats it as no launch message', async () => {
      const { provider, service, intents, logger } = setup();
      provider.launchMessage = new Error('bridge gone');

      await service.initialize();

      expect(logger.error).toHaveBeenCalledWith('Failed to read the launch message: bridge gone');
      expect(intents).toHaveLength(0);
    });
  });

  describe('tokens', () => {
    it('skips onToken when the token matches the stored one', async () => {
      const tokenStore = new MemoryTokenStore('tok-1');
      const { service, tokens } = setup({ tokenStore });

      await service.initialize();

      expect(tokens).toEqual([]);
    });

    it('stores and reports a changed token', async () => {
      const tokenStore = new MemoryTokenStore('tok-old');
      const { service, tokens } = setup({ tokenStore });

      await service.initialize();

      expect(tokens).toEqual(['tok-1']);
      expect(await tokenStore.get()).toBe('tok-1');
    });

    it('stores and reports refreshed tokens', async () => {
      const tokenStore = new MemoryTokenStore();
      const { provider, service, tokens } = setup({ tokenStore });
      await service.initialize();

      provider.emitTokenRefresh('tok-2');
      await nextTick();

      expect(tokens).toEqual(['tok-1', 'tok-2']);
      expect(await tokenStore.get()).toBe('tok-2');
    });

    it('logs a failing token handler without rejecting', async () => {
      const provider = new FakePushProvider();
      const logger = makeLogger();
      const service = new NotificationService({
        router: new DispatchRouter({ logger: silentLogger }),
        provider,
        source: provider,
        onToken: () => Promise.reject(new Error('backend down')),
        logger,
      });

      await expect(service.initialize()).resolves.toMatchObject({ dataOnly: false });
      expect(logger.error).toHaveBeenCalledWith('Failed to handle messaging token: backend down');
    });

    it('getToken() returns an outcome', async () => {
      const { service } = setup();

      expect(await service.getToken()).toEqual({ ok: true, value: 'tok-1' });
    });
  });

  describe('channels', () => {
    it('routes taps and ignores foreground arrivals', async () => {
      const { provider, service, intents } = setup();
      await service.initialize();

      provider.emitForeground(
        createInboundMessage({ id: 'fg-1', payload: { screen: 'chat' }, receivedVia: 'foreground' })
      );
      provider.emitTap(tap('tap-1', { screen: 'order', orderId: '7' }));
      provider.emitTap(tap('tap-1', { screen: 'order', orderId: '7' }));

      expect(intents).toEqual([{ sourceMessageId: 'tap-1', target: 'order', params: { orderId: '7' } }]);
    });

    it('does not re-dispatch a tap that replays the launch message', async () => {
      const { provider, service, intents } = setup();
      provider.launchMessage = createInboundMessage({ id: 'dup-1', receivedVia: 'cold_start' });
      await service.initialize();

      provider.emitTap(tap('dup-1'));

      expect(intents).toHaveLength(1);
    });

    it('logs data-only background messages', async () => {
      const { provider, service, intents, logger } = setup();
      await service.initialize();

      provider.emitBackground({ id: 'bg-1', payload: { sync: 'inbox' } });

      expect(logger.info).toHaveBeenCalledWith('Background message bg-1', { sync: 'inbox' });
      expect(intents).toHaveLength(0);
    });

    it('shutdown() releases every listener', async () => {
      const { provider, service } = setup();
      await service.initialize();

      service.shutdown();

      expect(provider.foreground.size).toBe(0);
      expect(provider.tapped.size).toBe(0);
      expect(provider.background.size).toBe(0);
      expect(provider.refresh.size).toBe(0);
    });
  });

  describe('topics', () => {
    it('subscribes and unsubscribes valid topics', async () => {
      const { provider, service } = setup();

      expect(await service.subscribeToTopic('news')).toEqual({ ok: true, value: 'news' });
      expect(provider.topics.has('news')).toBe(true);
      expect(await service.unsubscribeFromTopic('news')).toEqual({ ok: true, value: 'news' });
      expect(provider.topics.has('news')).toBe(false);
    });

    it('rejects invalid topic names without calling the provider', async () => {
      const { provider, service } = setup();

      const outcome = await service.subscribeToTopic('breaking news!');

      expect(outcome).toMatchObject({
        ok: false,
        error: { code: 'INVALID_TOPIC', message: 'Invalid topic name: "breaking news!"' },
      });
      expect(provider.calls).toEqual([]);
    });

    it('wraps provider failures', async () => {
      const { provider, service } = setup();
      provider.topicError = new Error('quota exceeded');

      const outcome = await service.subscribeToTopic('news');

      expect(outcome).toMatchObject({
        ok: false,
        error: { code: 'PROVIDER_FAILURE', message: 'subscribe news failed: quota exceeded' },
      });
    });
  });
});
