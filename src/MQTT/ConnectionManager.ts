import {
  type ConnectError,
  NOT_CONNECTED,
  type ShutdownError,
  type SubscribeError,
  type UnsubscribeError,
  describeError,
} from 'Common/errors';
import { type MessageHandler, type SubscriptionId, TopicRouter } from 'Routing/TopicRouter';
import { StatisticsStore } from 'Statistics/StatisticsStore';
import { Deferred } from '@utils/deferred';
import { errorMessage, logError, logInfo, logWarn } from '@utils/logger';
import { type Result, err, ok } from '@utils/result';
import EventEmitter from 'events';
import type { ITransportClient, QoS, SessionConfig, TransportEvent, TransportFactory } from './ITransportClient';
import { type SessionEvent, type SessionState, transition } from './sessionState';

/**
 * Owns the broker session: the transport handle, the state machine and the subscription replay
 * that follows every (re)connect.
 *
 * Reconnect scheduling is left to the transport. Each transition into `connected` re-issues the
 * router's subscriptions exactly once, in registration order.
 *
 * Events: `state` (next, previous), `connected`, `disconnected`.
 */
export class ConnectionManager extends EventEmitter {
  private currentState: SessionState = 'idle';
  private transport?: ITransportClient;
  private removeTransportListener?: () => void;
  private pendingStart?: Deferred<Result<void, ConnectError>>;

  constructor(
    private readonly createTransport: TransportFactory,
    private readonly router: TopicRouter,
    private readonly stats: StatisticsStore
  ) {
    super();
    this.setMaxListeners(0);
  }

  state(): SessionState {
    return this.currentState;
  }

  isConnected(): boolean {
    return this.currentState === 'connected';
  }

  /** The live transport, only while connected. */
  activeTransport(): ITransportClient | undefined {
    return this.isConnected() ? this.transport : undefined;
  }

  /**
   * Open the session and wait for the first connect, an error, or `config.connectTimeoutMs`.
   *
   * The last will in `config` is fixed for the lifetime of the transport created here.
   */
  async start(config: SessionConfig): Promise<Result<void, ConnectError>> {
    if (this.transport || this.currentState === 'connecting' || this.currentState === 'connected') {
      return err({ kind: 'already-started', state: this.currentState });
    }

    logInfo(`[Session] Starting session for client ${config.clientId} at ${config.brokerUrl}`);
    const pending = new Deferred<Result<void, ConnectError>>();
    this.pendingStart = pending;

    const transport = this.createTransport(config);
    this.transport = transport;
    this.removeTransportListener = transport.onEvent((event) => this.handleTransportEvent(event));
    this.apply('connect_requested');

    const timer = setTimeout(() => {
      if (pending.settled) return;
      logError(`[Session] No connection within ${config.connectTimeoutMs}ms`);
      void this.fail({ kind: 'timeout', timeoutMs: config.connectTimeoutMs });
    }, config.connectTimeoutMs);

    try {
      transport.connect();
    } catch (error) {
      void this.fail({ kind: 'transport', detail: errorMessage(error) });
    }

    const result = await pending;
    clearTimeout(timer);
    return result;
  }

  /** Safe from any state, including while `start` is pending. */
  async shutdown(): Promise<Result<void, ShutdownError>> {
    const transport = this.transport;
    this.detachTransport();
    this.stats.closeDowntime();
    this.apply('shutdown_requested');
    this.settleStart(err({ kind: 'aborted' }));

    if (!transport) return ok(undefined);

    try {
      await transport.disconnect();
      logInfo('[Session] Shut down');
      return ok(undefined);
    } catch (error) {
      const detail = errorMessage(error);
      logWarn(`[Session] Transport did not close cleanly: ${detail}`);
      return err({ kind: 'transport', detail });
    }
  }

  /**
   * Register a handler and subscribe on the broker. Only accepted while connected; use the
   * router directly to register patterns before `start`. A subscribe the broker rejects leaves
   * the router as it was.
   */
  async subscribe(pattern: string, qos: QoS, handler: MessageHandler): Promise<Result<SubscriptionId, SubscribeError>> {
    const transport = this.activeTransport();
    if (!transport) return err(NOT_CONNECTED);

    const previous = this.router.get(pattern);
    const registered = this.router.subscribe(pattern, qos, handler);
    if (!registered.ok) return registered;

    try {
      await transport.subscribe(pattern, qos);
      return registered;
    } catch (error) {
      // The broker did not take it, so the router must not replay it on reconnect.
      if (previous) this.router.restore(previous);
      else this.router.unsubscribe(pattern);

      const detail = errorMessage(error);
      logWarn(`[Session] Subscribe to ${pattern} failed: ${detail}`);
      return err({ kind: 'transport', detail });
    }
  }

  async unsubscribe(pattern: string): Promise<Result<void, UnsubscribeError>> {
    const transport = this.activeTransport();
    if (!transport) return err(NOT_CONNECTED);

    const removed = this.router.unsubscribe(pattern);
    if (!removed.ok) return removed;

    try {
      await transport.unsubscribe(pattern);
      return ok(undefined);
    } catch (error) {
      const detail = errorMessage(error);
      logWarn(`[Session] Unsubscribe from ${pattern} failed: ${detail}`);
      return err({ kind: 'transport', detail });
    }
  }

  private handleTransportEvent(event: TransportEvent) {
    switch (event.kind) {
      case 'connected':
        this.apply('transport_connected');
        return;
      case 'disconnected':
        this.apply('transport_disconnected');
        return;
      case 'error':
        logWarn(`[Session] Transport ${event.errorKind} error: ${event.detail}`);
        if (this.currentState === 'connecting') {
          void this.fail({ kind: 'transport', detail: event.detail });
        }
        return;
      case 'message':
        this.stats.recordReceived();
        this.router.dispatch(event.topic, event.payload);
        return;
      case 'subscribed':
      case 'unsubscribed':
      case 'published':
        return;
    }
  }

  private apply(event: SessionEvent) {
    const previous = this.currentState;
    const next = transition(previous, event);
    if (next === previous) return;

    this.currentState = next;
    logInfo(`[Session] ${previous} -> ${next}`);

    if (next === 'connected') {
      if (previous === 'disconnected') this.stats.markReconnected();
      this.reissueSubscriptions();
      this.settleStart(ok(undefined));
    }
    if (previous === 'connected' && next === 'disconnected') {
      this.stats.markDisconnected();
    }

    this.emit('state', next, previous);
    if (next === 'connected') this.emit('connected');
    if (next === 'disconnected') this.emit('disconnected');
  }

  private reissueSubscriptions() {
    const transport = this.transport;
    if (!transport) return;

    for (const { pattern, qos } of this.router.subscriptions()) {
      void transport
        .subscribe(pattern, qos)
        .then(() => logInfo(`[Session] Subscribed to ${pattern} (qos=${qos})`))
        .catch((error: unknown) => logWarn(`[Session] Subscribe to ${pattern} failed: ${errorMessage(error)}`));
    }
  }

  /** Fault a pending start and release its transport. */
  private async fail(error: ConnectError) {
    const transport = this.transport;
    this.detachTransport();
    this.apply('transport_error');
    logError(`[Session] Connect failed: ${describeError(error)}`);
    this.settleStart(err(error));

    if (!transport) return;
    try {
      await transport.disconnect();
    } catch (closeError) {
      logWarn(`[Session] Failed to release transport: ${errorMessage(closeError)}`);
    }
  }

  private detachTransport() {
    this.removeTransportListener?.();
    this.removeTransportListener = undefined;
    this.transport = undefined;
  }

  private settleStart(result: Result<void, ConnectError>) {
    this.pendingStart?.resolve(result);
    this.pendingStart = undefined;
  }
}
