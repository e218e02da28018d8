import { afterEach, describe, expect, it, vi } from 'vitest';
import { TopicRouter } from 'Routing/TopicRouter';
import { StatisticsStore } from 'Statistics/StatisticsStore';
import { createFakeTransportFactory, testSessionConfig } from '../../__tests__/helpers/fakeTransport';
import { ConnectionManager } from '../ConnectionManager';

const setup = (now: () => number = Date.now) => {
  const transports = createFakeTransportFactory();
  const router = new TopicRouter();
  const stats = new StatisticsStore(now);
  const manager = new ConnectionManager(transports.factory, router, stats);
  return { transports, router, stats, manager };
};

const connect = async (ctx: ReturnType<typeof setup>) => {
  const started = ctx.manager.start(testSessionConfig());
  ctx.transports.latest().emit({ kind: 'connected' });
  return started;
};

describe('ConnectionManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts idle without a transport', () => {
    const { manager, transports } = setup();

    expect(manager.state()).toBe('idle');
    expect(manager.isConnected()).toBe(false);
    expect(manager.activeTransport()).toBeUndefined();
    expect(transports.created).toHaveLength(0);
  });

  it('resolves start once the transport connects', async () => {
    const ctx = setup();
    const started = ctx.manager.start(testSessionConfig());

    expect(ctx.manager.state()).toBe('connecting');
    expect(ctx.transports.latest().connectCalls).toBe(1);

    ctx.transports.latest().emit({ kind: 'connected' });

    expect(await started).toEqual({ ok: true, value: undefined });
    expect(ctx.manager.state()).toBe('connected');
    expect(ctx.manager.activeTransport()).toBe(ctx.transports.latest());
  });

  it('hands the session config to the transport factory', async () => {
    const ctx = setup();
    const config = testSessionConfig({ clientId: 'pump-house', keepaliveSec: 30 });

    const started = ctx.manager.start(config);
    ctx.transports.latest().emit({ kind: 'connected' });
    await started;

    expect(ctx.transports.latest().config).toBe(config);
  });

  it('emits state changes and connectivity events', async () => {
    const ctx = setup();
    const states: [string, string][] = [];
    const connected = vi.fn();
    const disconnected = vi.fn();
    ctx.manager.on('state', (next: string, previous: string) => states.push([next, previous]));
    ctx.manager.on('connected', connected);
    ctx.manager.on('disconnected', disconnected);

    await connect(ctx);
    ctx.transports.latest().emit({ kind: 'disconnected' });

    expect(states).toEqual([
      ['connecting', 'idle'],
      ['connected', 'connecting'],
      ['disconnected', 'connected'],
    ]);
    expect(connected).toHaveBeenCalledTimes(1);
    expect(disconnected).toHaveBeenCalledTimes(1);
  });

  it('faults the session when the transport reports an error while connecting', async () => {
    const ctx = setup();
    const started = ctx.manager.start(testSessionConfig());
    const transport = ctx.transports.latest();

    transport.emit({ kind: 'error', errorKind: 'protocol', detail: 'Connection refused: Not authorized' });

    expect(await started).toEqual({
      ok: false,
      error: { kind: 'transport', detail: 'Connection refused: Not authorized' },
    });
    expect(ctx.manager.state()).toBe('faulted');
    expect(transport.disconnectCalls).toBe(1);
  });

  it('faults the session when no connection arrives in time', async () => {
    vi.useFakeTimers();
    const ctx = setup();
    const started = ctx.manager.start(testSessionConfig({ connectTimeoutMs: 1_000 }));
    const transport = ctx.transports.latest();

    await vi.advanceTimersByTimeAsync(999);
    expect(ctx.manager.state()).toBe('connecting');

    await vi.advanceTimersByTimeAsync(1);

    expect(await started).toEqual({ ok: false, error: { kind: 'timeout', timeoutMs: 1_000 } });
    expect(ctx.manager.state()).toBe('faulted');
    expect(transport.disconnectCalls).toBe(1);
    expect(transport.listenerCount).toBe(0);
  });

  it('can start again after a fault', async () => {
    const ctx = setup();
    const first = ctx.manager.start(testSessionConfig());
    ctx.transports.latest().emit({ kind: 'error', errorKind: 'transport', detail: 'ECONNREFUSED' });
    await first;

    const second = await connect(ctx);

    expect(second.ok).toBe(true);
    expect(ctx.transports.created).toHaveLength(2);
    expect(ctx.manager.state()).toBe('connected');
  });

  it('refuses a second start while a session exists', async () => {
    const ctx = setup();
    const pending = ctx.manager.start(testSessionConfig());

    expect(await ctx.manager.start(testSessionConfig())).toEqual({
      ok: false,
      error: { kind: 'already-started', state: 'connecting' },
    });

    ctx.transports.latest().emit({ kind: 'connected' });
    await pending;
    ctx.transports.latest().emit({ kind: 'disconnected' });

    expect(await ctx.manager.start(testSessionConfig())).toEqual({
      ok: false,
      error: { kind: 'already-started', state: 'disconnected' },
    });
    expect(ctx.transports.created).toHaveLength(1);
  });

  it('resolves a pending start as aborted when shut down', async () => {
    const ctx = setup();
    const started = ctx.manager.start(testSessionConfig());

    expect(await ctx.manager.shutdown()).toEqual({ ok: true, value: undefined });
    expect(await started).toEqual({ ok: false, error: { kind: 'aborted' } });
    expect(ctx.manager.state()).toBe('idle');
  });

  it('re-issues router subscriptions in registration order on every connect', async () => {
    const ctx = setup();
    ctx.router.subscribe('garden/+/temperature', 0, vi.fn());
    ctx.router.subscribe('demo/central/commands/#', 1, vi.fn());

    await connect(ctx);
    const transport = ctx.transports.latest();

    expect(transport.subscribed).toEqual([
      { topic: 'garden/+/temperature', qos: 0 },
      { topic: 'demo/central/commands/#', qos: 1 },
    ]);

    transport.emit({ kind: 'connected' });
    expect(transport.subscribed).toHaveLength(2);

    transport.emit({ kind: 'disconnected' });
    transport.emit({ kind: 'connected' });

    expect(transport.subscribed).toEqual([
      { topic: 'garden/+/temperature', qos: 0 },
      { topic: 'demo/central/commands/#', qos: 1 },
      { topic: 'garden/+/temperature', qos: 0 },
      { topic: 'demo/central/commands/#', qos: 1 },
    ]);
  });

  it('counts each drop once and tracks downtime until the reconnect', async () => {
    let now = 1_000;
    const ctx = setup(() => now);
    await connect(ctx);
    const transport = ctx.transports.latest();

    now = 2_000;
    transport.emit({ kind: 'disconnected' });
    transport.emit({ kind: 'disconnected' });
    now = 2_500;

    expect(ctx.manager.isConnected()).toBe(false);
    expect(ctx.manager.activeTransport()).toBeUndefined();
    expect(ctx.stats.get()).toMatchObject({ disconnectCount: 1, disconnectedTimeMs: 500 });

    now = 5_000;
    transport.emit({ kind: 'connected' });
    now = 9_000;

    expect(ctx.manager.state()).toBe('connected');
    expect(ctx.stats.get()).toMatchObject({ disconnectCount: 1, disconnectedTimeMs: 3_000 });
  });

  it('ignores transport errors once connected', async () => {
    const ctx = setup();
    await connect(ctx);

    ctx.transports.latest().emit({ kind: 'error', errorKind: 'transport', detail: 'EPIPE' });

    expect(ctx.manager.state()).toBe('connected');
  });

  it('routes inbound messages and counts them', async () => {
    const ctx = setup();
    const handler = vi.fn();
    ctx.router.subscribe('home/+/temp', 0, handler);
    await connect(ctx);

    ctx.transports.latest().emit({ kind: 'message', topic: 'home/kitchen/temp', payload: Buffer.from('21.5') });
    ctx.transports.latest().emit({ kind: 'message', topic: 'home/kitchen/humidity', payload: Buffer.from('40') });

    expect(handler).toHaveBeenCalledWith(expect.objectContaining({ topic: 'home/kitchen/temp', payload: '21.5' }));
    expect(handler).toHaveBeenCalledTimes(1);
    expect(ctx.stats.get().receivedCount).toBe(2);
  });

  describe('subscribe', () => {
    it('is refused while not connected', async () => {
      const ctx = setup();

      expect(await ctx.manager.subscribe('a/b', 0, vi.fn())).toEqual({ ok: false, error: { kind: 'not-connected' } });
      expect(ctx.router.size).toBe(0);
    });

    it('registers the handler and subscribes on the broker', async () => {
      const ctx = setup();
      await connect(ctx);

      expect(await ctx.manager.subscribe('a/+', 1, vi.fn())).toEqual({ ok: true, value: 1 });
      expect(ctx.router.has('a/+')).toBe(true);
      expect(ctx.transports.latest().subscribed).toEqual([{ topic: 'a/+', qos: 1 }]);
    });

    it('rejects an invalid pattern before touching the broker', async () => {
      const ctx = setup();
      await connect(ctx);

      const result = await ctx.manager.subscribe('a/#/b', 0, vi.fn());

      expect(result).toMatchObject({ ok: false, error: { kind: 'invalid-pattern' } });
      expect(ctx.transports.latest().subscribed).toEqual([]);
    });

    it('drops the registration when the broker rejects the subscribe', async () => {
      const ctx = setup();
      await connect(ctx);
      const transport = ctx.transports.latest();
      transport.subscribeFailure = new Error('Subscribe error: not authorized');

      expect(await ctx.manager.subscribe('a/+', 1, vi.fn())).toEqual({
        ok: false,
        error: { kind: 'transport', detail: 'Subscribe error: not authorized' },
      });
      expect(ctx.router.has('a/+')).toBe(false);

      transport.subscribeFailure = undefined;
      transport.emit({ kind: 'disconnected' });
      transport.emit({ kind: 'connected' });
      expect(transport.subscribed).toEqual([]);
    });

    it('keeps the previous handler when re-subscribing a pattern fails', async () => {
      const ctx = setup();
      const first = vi.fn();
      const second = vi.fn();
      ctx.router.subscribe('a/+', 0, first);
      await connect(ctx);
      const transport = ctx.transports.latest();
      transport.subscribeFailure = new Error('Subscribe error: quota exceeded');

      const result = await ctx.manager.subscribe('a/+', 1, second);

      expect(result).toMatchObject({ ok: false, error: { kind: 'transport' } });
      expect(ctx.router.get('a/+')).toEqual({ id: 1, pattern: 'a/+', qos: 0, handler: first });
      transport.emit({ kind: 'message', topic: 'a/b', payload: Buffer.from('1') });
      expect(first).toHaveBeenCalledTimes(1);
      expect(second).not.toHaveBeenCalled();
    });
  });

  describe('unsubscribe', () => {
    it('removes the pattern from the router and the broker', async () => {
      const ctx = setup();
      await connect(ctx);
      await ctx.manager.subscribe('a/+', 1, vi.fn());

      expect(await ctx.manager.unsubscribe('a/+')).toEqual({ ok: true, value: undefined });
      expect(ctx.router.size).toBe(0);
      expect(ctx.transports.latest().unsubscribed).toEqual(['a/+']);
    });

    it('reports patterns that were never registered', async () => {
      const ctx = setup();
      await connect(ctx);

      expect(await ctx.manager.unsubscribe('a/+')).toEqual({ ok: false, error: { kind: 'not-found', pattern: 'a/+' } });
      expect(ctx.transports.latest().unsubscribed).toEqual([]);
    });
  });

  describe('shutdown', () => {
    it('closes the transport and returns to idle', async () => {
      const ctx = setup();
      await connect(ctx);
      const transport = ctx.transports.latest();

      expect(await ctx.manager.shutdown()).toEqual({ ok: true, value: undefined });
      expect(transport.disconnectCalls).toBe(1);
      expect(ctx.manager.state()).toBe('idle');
      expect(ctx.manager.activeTransport()).toBeUndefined();
    });

    it('is a no-op without a session', async () => {
      const ctx = setup();

      expect(await ctx.manager.shutdown()).toEqual({ ok: true, value: undefined });
      expect(ctx.manager.state()).toBe('idle');
    });

    it('reports a transport that fails to close', async () => {
      const ctx = setup();
      await connect(ctx);
      vi.spyOn(ctx.transports.latest(), 'disconnect').mockRejectedValue(new Error('socket hang up'));

      expect(await ctx.manager.shutdown()).toEqual({ ok: false, error: { kind: 'transport', detail: 'socket hang up' } });
      expect(ctx.manager.state()).toBe('idle');
    });

    it('closes open downtime without counting a reconnect', async () => {
      let now = 0;
      const ctx = setup(() => now);
      await connect(ctx);
      ctx.transports.latest().emit({ kind: 'disconnected' });
      now = 4_000;

      await ctx.manager.shutdown();
      now = 10_000;

      expect(ctx.stats.get()).toMatchObject({ disconnectCount: 1, disconnectedTimeMs: 4_000 });
    });
  });
});
