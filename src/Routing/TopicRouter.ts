import type { InvalidPatternError, NotFoundError } from 'Common/errors';
import type { QoS } from '@mqtt/ITransportClient';
import { errorMessage, logDebug, logError } from '@utils/logger';
import { type Result, err, ok } from '@utils/result';
import { MAX_PAYLOAD_LENGTH, MAX_TOPIC_LENGTH, boundedCopy } from './boundedCopy';
import { matchesPattern, validatePattern } from './topicPattern';

export type SubscriptionId = number;

/** What a handler sees: bounded copies of the topic and payload. */
export type InboundMessage = {
  topic: string;
  payload: string;
  topicTruncated: boolean;
  payloadTruncated: boolean;
  /** Payload size on the wire, before truncation. */
  payloadBytes: number;
};

export type MessageHandler = (message: InboundMessage) => void | Promise<void>;

export type TopicSubscription = {
  id: SubscriptionId;
  pattern: string;
  qos: QoS;
  handler: MessageHandler;
};

export type DispatchResult =
  | {
      status: 'handled';
      pattern: string;
      subscriptionId: SubscriptionId;
      topicTruncated: boolean;
      payloadTruncated: boolean;
    }
  | { status: 'unhandled' }
  | { status: 'failed'; pattern: string; error: string };

/**
 * Maps inbound topics to handlers.
 *
 * Patterns are kept in registration order and the first match wins, so overlapping wildcards
 * resolve deterministically. Re-registering a pattern swaps its handler in place.
 */
export class TopicRouter {
  private readonly subscriptionsByPattern = new Map<string, TopicSubscription>();
  private nextId: SubscriptionId = 1;

  get size() {
    return this.subscriptionsByPattern.size;
  }

  subscribe(pattern: string, qos: QoS, handler: MessageHandler): Result<SubscriptionId, InvalidPatternError> {
    const validation = validatePattern(pattern);
    if (!validation.valid) {
      return err({ kind: 'invalid-pattern', pattern, reason: validation.reason });
    }

    const id = this.nextId++;
    this.subscriptionsByPattern.set(pattern, { id, pattern, qos, handler });
    return ok(id);
  }

  unsubscribe(pattern: string): Result<void, NotFoundError> {
    if (!this.subscriptionsByPattern.delete(pattern)) {
      return err({ kind: 'not-found', pattern });
    }
    return ok(undefined);
  }

  has(pattern: string) {
    return this.subscriptionsByPattern.has(pattern);
  }

  get(pattern: string): TopicSubscription | undefined {
    return this.subscriptionsByPattern.get(pattern);
  }

  /** Put back a subscription taken from `get`, keeping its id and, if still present, its position. */
  restore(subscription: TopicSubscription) {
    this.subscriptionsByPattern.set(subscription.pattern, subscription);
  }

  /** Registered subscriptions, in registration order. */
  subscriptions(): TopicSubscription[] {
    return [...this.subscriptionsByPattern.values()];
  }

  dispatch(topic: string, payload: Buffer | string): DispatchResult {
    const subscription = this.subscriptions().find((s) => matchesPattern(topic, s.pattern));
    if (!subscription) {
      logDebug(`[Router] Unhandled topic: ${boundedCopy(topic, MAX_TOPIC_LENGTH).text}`);
      return { status: 'unhandled' };
    }

    const boundedTopic = boundedCopy(topic, MAX_TOPIC_LENGTH);
    const boundedPayload = boundedCopy(payload, MAX_PAYLOAD_LENGTH);
    const message: InboundMessage = {
      topic: boundedTopic.text,
      payload: boundedPayload.text,
      topicTruncated: boundedTopic.truncated,
      payloadTruncated: boundedPayload.truncated,
      payloadBytes: boundedPayload.byteLength,
    };

    try {
      const returned = subscription.handler(message);
      if (returned instanceof Promise) {
        void returned.catch((error: unknown) =>
          logError(`[Router] Handler for ${subscription.pattern} failed: ${errorMessage(error)}`)
        );
      }
    } catch (error) {
      logError(`[Router] Handler for ${subscription.pattern} failed: ${errorMessage(error)}`);
      return { status: 'failed', pattern: subscription.pattern, error: errorMessage(error) };
    }

    return {
      status: 'handled',
      pattern: subscription.pattern,
      subscriptionId: subscription.id,
      topicTruncated: message.topicTruncated,
      payloadTruncated: message.payloadTruncated,
    };
  }
}
