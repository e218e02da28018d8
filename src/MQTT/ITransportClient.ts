export type QoS = 0 | 1 | 2;

export type LastWill = {
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
};

/**
 * Everything a transport needs to open a session. The last will is fixed here: it is handed to
 * the broker in the CONNECT packet and cannot be renegotiated afterwards.
 */
export type SessionConfig = {
  brokerUrl: string;
  /**
   * Must be unique broker-wide. A second client connecting with the same id causes the broker to
   * disconnect the earlier one.
   */
  clientId: string;
  username?: string;
  password?: string;
  keepaliveSec: number;
  lastWill: LastWill;
  autoReconnect: boolean;
  reconnectPeriodMs: number;
  connectTimeoutMs: number;
};

export type TransportErrorKind = 'transport' | 'protocol' | 'connection-closed';

export type TransportEvent =
  | { kind: 'connected' }
  | { kind: 'disconnected' }
  | { kind: 'subscribed'; topic: string; qos: QoS }
  | { kind: 'unsubscribed'; topic: string }
  | { kind: 'published'; topic: string; messageId: number }
  | { kind: 'message'; topic: string; payload: Buffer }
  | { kind: 'error'; errorKind: TransportErrorKind; detail: string };

export type TransportEventListener = (event: TransportEvent) => void;

/**
 * The broker client the session drives. Reconnect scheduling belongs to the implementation;
 * outcomes are reported through `onEvent`.
 */
export interface ITransportClient {
  /** Begin connecting. The result arrives as a `connected` or `error` event. */
  connect(): void;
  /**
   * Close the connection cleanly (no last will) and stop reconnecting.
   *
   * Once this resolves the client emits no further events.
   */
  disconnect(): Promise<void>;
  /** Resolves with the broker message id (0 for QoS 0). Rejects on transport failure. */
  publish(topic: string, payload: Buffer, qos: QoS, retain: boolean): Promise<number>;
  subscribe(topic: string, qos: QoS): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  /** Returns a function that removes the listener. */
  onEvent(listener: TransportEventListener): () => void;
}

export type TransportFactory = (config: SessionConfig) => ITransportClient;
