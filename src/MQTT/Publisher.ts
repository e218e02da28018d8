import { NOT_CONNECTED, type PublishError } from 'Common/errors';
import { isPublishableTopic } from 'Routing/topicPattern';
import { StatisticsStore } from 'Statistics/StatisticsStore';
import { errorMessage, logDebug, logError } from '@utils/logger';
import { Deferred } from '@utils/deferred';
import { type Result, err, ok } from '@utils/result';
import type { ITransportClient, QoS } from './ITransportClient';
import type { SessionState } from './sessionState';

export type PublishOptions = {
  qos?: QoS;
  retain?: boolean;
  /**
   * Number of payload bytes to send. Omitted or 0 sends the whole payload, its length computed
   * from the text.
   */
  length?: number;
};

const VALID_QOS: readonly number[] = [0, 1, 2];

type StateListener = (next: SessionState) => void;

/** The part of the connection manager the publisher depends on. */
export interface PublishGate {
  activeTransport(): ITransportClient | undefined;
  on(event: 'state', listener: StateListener): unknown;
  off(event: 'state', listener: StateListener): unknown;
}

/**
 * Outbound side of the session: every publish goes through here so the connectivity gate and
 * the statistics stay in one place.
 */
export class Publisher {
  constructor(
    private readonly connection: PublishGate,
    private readonly stats: StatisticsStore
  ) {}

  /**
   * Publish a message. Fails with `not-connected` before touching the transport when the session
   * is not connected, and also when the session leaves `connected` before the transport settles:
   * an unacknowledged QoS 1/2 publish is never rejected by the client on close.
   */
  async publish(
    topic: string,
    payload: string | Buffer,
    options: PublishOptions = {}
  ): Promise<Result<number, PublishError>> {
    const transport = this.connection.activeTransport();
    if (!transport) return err(NOT_CONNECTED);

    const qos = options.qos ?? 1;
    const retain = options.retain ?? false;
    const length = options.length ?? 0;

    if (!isPublishableTopic(topic)) {
      return err({ kind: 'invalid-message', reason: `"${topic}" is not a publishable topic` });
    }
    if (!VALID_QOS.includes(qos)) {
      return err({ kind: 'invalid-message', reason: `qos ${qos} is not 0, 1 or 2` });
    }
    if (!Number.isInteger(length) || length < 0) {
      return err({ kind: 'invalid-message', reason: `length ${length} is not a non-negative integer` });
    }

    const bytes = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
    const body = length > 0 && length < bytes.length ? bytes.subarray(0, length) : bytes;

    const left = new Deferred<void>();
    const onState: StateListener = (next) => {
      if (next !== 'connected') left.resolve();
    };
    this.connection.on('state', onState);

    try {
      const outcome = await Promise.race([
        transport.publish(topic, body, qos, retain).then((messageId) => ({ sent: true as const, messageId })),
        left.then(() => ({ sent: false as const })),
      ]);
      if (!outcome.sent) {
        logDebug(`[Publisher] Session left connected while publishing to ${topic}`);
        return err(NOT_CONNECTED);
      }

      this.stats.recordPublished();
      logDebug(`[Publisher] ${topic} (${body.length}B, qos=${qos}, retain=${retain}, id=${outcome.messageId})`);
      return ok(outcome.messageId);
    } catch (error) {
      // The session left `connected` while this was in flight.
      if (this.connection.activeTransport() !== transport) return err(NOT_CONNECTED);

      const detail = errorMessage(error);
      this.stats.recordPublishFailure();
      logError(`[Publisher] Failed to publish to ${topic}: ${detail}`);
      return err({ kind: 'transport', detail });
    } finally {
      this.connection.off('state', onState);
    }
  }

  /** Publish a record serialized as JSON. */
  publishJson(topic: string, record: object, options?: PublishOptions) {
    return this.publish(topic, JSON.stringify(record), options);
  }
}
