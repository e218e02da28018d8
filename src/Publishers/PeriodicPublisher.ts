import { describeError } from 'Common/errors';
import type { QoS } from '@mqtt/ITransportClient';
import { Publisher } from '@mqtt/Publisher';
import { Deferred } from '@utils/deferred';
import { errorMessage, logDebug, logError, logInfo, logWarn, logWarnDedup } from '@utils/logger';

export type SampleSource<TSample> = () => TSample | Promise<TSample>;

export type PeriodicPublisherOptions<TSample> = {
  name: string;
  topic: string;
  intervalMs: number;
  /** Grace period before the first cycle; afterwards the first cycle waits for a connection. */
  startupDelayMs: number;
  qos: QoS;
  retain?: boolean;
  sample: SampleSource<TSample>;
  format: (sample: TSample) => string;
};

/** The part of the connection manager a publisher watches. */
export interface Connectivity {
  isConnected(): boolean;
  once(event: 'connected', listener: () => void): unknown;
  off(event: 'connected', listener: () => void): unknown;
}

/** Type-erased view used to start, stop and retime publishers together. */
export interface IPeriodicTask {
  readonly name: string;
  readonly isRunning: boolean;
  start(): void;
  stop(): void;
  setIntervalMs(intervalMs: number): void;
}

const SKIP_LOG_WINDOW_MS = 60_000;

/**
 * Pull a sample every `intervalMs` and publish it.
 *
 * A cycle that finds the session disconnected is dropped, not queued: these values are only
 * worth their latest reading.
 */
export class PeriodicPublisher<TSample> implements IPeriodicTask {
  private timer?: NodeJS.Timeout;
  private running = false;
  private stopSignal = new Deferred<void>();
  private intervalMs: number;
  private publishedCount = 0;
  /** Bumped on every start so cycles left over from an earlier run stop rescheduling. */
  private generation = 0;

  constructor(
    private readonly options: PeriodicPublisherOptions<TSample>,
    private readonly connection: Connectivity,
    private readonly publisher: Pick<Publisher, 'publish'>
  ) {
    this.intervalMs = options.intervalMs;
  }

  get name() {
    return this.options.name;
  }

  get interval() {
    return this.intervalMs;
  }

  get published() {
    return this.publishedCount;
  }

  get isRunning() {
    return this.running;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.stopSignal = new Deferred<void>();
    const generation = ++this.generation;
    logInfo(`[${this.name}] Starting (every ${this.intervalMs}ms, first after ${this.options.startupDelayMs}ms)`);
    this.timer = setTimeout(() => void this.firstCycle(generation), this.options.startupDelayMs);
  }

  stop() {
    if (!this.running) return;
    this.running = false;
    clearTimeout(this.timer);
    this.timer = undefined;
    this.stopSignal.resolve();
    logDebug(`[${this.name}] Stopped`);
  }

  /** Applies from the next scheduled cycle. */
  setIntervalMs(intervalMs: number) {
    if (intervalMs === this.intervalMs) return;
    logInfo(`[${this.name}] Interval ${this.intervalMs}ms -> ${intervalMs}ms`);
    this.intervalMs = intervalMs;
  }

  private async firstCycle(generation: number) {
    if (!this.connection.isConnected()) {
      logInfo(`[${this.name}] Waiting for MQTT connection...`);
      if (!(await this.waitForConnection())) return;
    }
    await this.runCycle(generation);
    this.scheduleNext(generation);
  }

  private isCurrent(generation: number) {
    return this.running && generation === this.generation;
  }

  private scheduleNext(generation: number) {
    if (!this.isCurrent(generation)) return;
    this.timer = setTimeout(() => void this.tick(generation), this.intervalMs);
  }

  private async tick(generation: number) {
    await this.runCycle(generation);
    this.scheduleNext(generation);
  }

  private async runCycle(generation: number) {
    if (!this.isCurrent(generation)) return;

    if (!this.connection.isConnected()) {
      logWarnDedup(`publisher:${this.name}:skip`, SKIP_LOG_WINDOW_MS, `[${this.name}] MQTT disconnected, skipping cycle`);
      return;
    }

    let payload: string;
    try {
      payload = this.options.format(await this.options.sample());
    } catch (error) {
      logError(`[${this.name}] Failed to read sample: ${errorMessage(error)}`);
      return;
    }

    const result = await this.publisher.publish(this.options.topic, payload, {
      qos: this.options.qos,
      retain: this.options.retain ?? false,
    });
    if (!result.ok) {
      logWarn(`[${this.name}] Publish failed: ${describeError(result.error)}`);
      return;
    }
    this.publishedCount += 1;
    logDebug(`[${this.name}] Published #${this.publishedCount}: ${payload}`);
  }

  /** Resolves true on connect, false if stopped first. */
  private waitForConnection(): Promise<boolean> {
    return new Promise((resolve) => {
      const onConnected = () => resolve(true);
      this.connection.once('connected', onConnected);
      void this.stopSignal.then(() => {
        this.connection.off('connected', onConnected);
        resolve(false);
      });
    });
  }
}
