import { type ConnectError, type ShutdownError, describeError } from 'Common/errors';
import { TopicRouter } from 'Routing/TopicRouter';
import { type StatisticsSnapshot, StatisticsStore } from 'Statistics/StatisticsStore';
import type { BuildInfo } from '@utils/buildInfo';
import { getUnixEpoch } from '@utils/getUnixEpoch';
import { logWarn } from '@utils/logger';
import type { Options } from '@utils/options.schema';
import type { Result } from '@utils/result';
import { ConnectionManager } from './ConnectionManager';
import type { SessionConfig, TransportFactory } from './ITransportClient';
import { type PublishOptions, Publisher } from './Publisher';
import { STATUS_OFFLINE, STATUS_ONLINE, type Topics, buildTopics } from './topics';

export const sessionConfigFromOptions = (options: Options, topics: Topics = buildTopics(options.topic_base)): SessionConfig => ({
  brokerUrl: options.mqtt_url,
  clientId: options.client_id,
  username: options.mqtt_user,
  password: options.mqtt_password,
  keepaliveSec: options.keepalive_sec,
  autoReconnect: options.auto_reconnect,
  reconnectPeriodMs: options.reconnect_period_ms,
  connectTimeoutMs: options.connect_timeout_ms,
  lastWill: {
    topic: options.last_will.topic ?? topics.status,
    payload: options.last_will.payload,
    qos: options.last_will.qos,
    retain: options.last_will.retain,
  },
});

export type DeviceSessionOptions = {
  config: SessionConfig;
  topics: Topics;
  buildInfo?: BuildInfo;
  now?: () => number;
  /** How long `shutdown()` waits for the broker to acknowledge `OFFLINE`. */
  offlineTimeoutMs?: number;
};

const DEFAULT_OFFLINE_TIMEOUT_MS = 2000;

/**
 * One broker session for this device: statistics, router, connection manager and publisher
 * wired together.
 *
 * Every transition into `connected` publishes a fresh retained `ONLINE` on the status topic; the
 * first one of the session also publishes the boot record. The broker's last will covers
 * unclean drops, `shutdown()` publishes `OFFLINE` itself.
 */
export class DeviceSession {
  readonly stats: StatisticsStore;
  readonly router = new TopicRouter();
  readonly connection: ConnectionManager;
  readonly publisher: Publisher;
  readonly topics: Topics;

  private readonly config: SessionConfig;
  private readonly buildInfo?: BuildInfo;
  private readonly now: () => number;
  private readonly offlineTimeoutMs: number;
  private bootPublished = false;

  constructor(
    createTransport: TransportFactory,
    {
      config,
      topics,
      buildInfo,
      now = Date.now,
      offlineTimeoutMs = DEFAULT_OFFLINE_TIMEOUT_MS,
    }: DeviceSessionOptions
  ) {
    this.config = config;
    this.topics = topics;
    this.buildInfo = buildInfo;
    this.now = now;
    this.offlineTimeoutMs = offlineTimeoutMs;
    this.stats = new StatisticsStore(now);
    this.connection = new ConnectionManager(createTransport, this.router, this.stats);
    this.publisher = new Publisher(this.connection, this.stats);

    this.connection.on('connected', () => void this.announceOnline());
  }

  start(): Promise<Result<void, ConnectError>> {
    return this.connection.start(this.config);
  }

  isConnected() {
    return this.connection.isConnected();
  }

  publish(topic: string, payload: string | Buffer, options?: PublishOptions) {
    return this.publisher.publish(topic, payload, options);
  }

  getStatistics(): StatisticsSnapshot {
    return this.stats.get();
  }

  resetStatistics() {
    this.stats.reset();
  }

  /** Publishes `OFFLINE` when connected, waiting at most `offlineTimeoutMs`, then closes the session. */
  async shutdown(): Promise<Result<void, ShutdownError>> {
    if (this.connection.isConnected()) await this.announceOffline();
    return this.connection.shutdown();
  }

  private async announceOffline() {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.offlineTimeoutMs);
    });

    try {
      const offline = await Promise.race([
        this.publisher.publish(this.topics.status, STATUS_OFFLINE, { qos: 1, retain: true }),
        deadline,
      ]);
      if (offline === 'timeout') {
        logWarn(`[Session] Offline status not acknowledged within ${this.offlineTimeoutMs}ms`);
      } else if (!offline.ok) {
        logWarn(`[Session] Could not publish offline status: ${describeError(offline.error)}`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async announceOnline() {
    const online = await this.publisher.publish(this.topics.status, STATUS_ONLINE, { qos: 1, retain: true });
    if (!online.ok) {
      logWarn(`[Session] Failed to publish online status: ${describeError(online.error)}`);
      return;
    }

    if (this.bootPublished) return;
    this.bootPublished = true;
    const boot = await this.publisher.publishJson(
      this.topics.boot,
      {
        client_id: this.config.clientId,
        version: this.buildInfo?.version ?? null,
        git_sha: this.buildInfo?.gitSha ?? 'unknown',
        build_time: this.buildInfo?.buildTime ?? null,
        ts: getUnixEpoch(this.now()),
      },
      { qos: 1 }
    );
    if (!boot.ok) logWarn(`[Session] Failed to publish boot record: ${describeError(boot.error)}`);
  }
}
