import type { SessionState } from '@mqtt/sessionState';

export type NotConnectedError = { kind: 'not-connected' };

export type TransportError = { kind: 'transport'; detail: string };

/** Transport init failure; fatal to the `start` call that produced it. */
export type ConnectError =
  | { kind: 'already-started'; state: SessionState }
  | TransportError
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'aborted' };

export type ShutdownError = TransportError;

export type PublishError = NotConnectedError | TransportError | { kind: 'invalid-message'; reason: string };

/** Programmer error in subscription setup. */
export type InvalidPatternError = { kind: 'invalid-pattern'; pattern: string; reason: string };

export type NotFoundError = { kind: 'not-found'; pattern: string };

export type SubscribeError = NotConnectedError | InvalidPatternError | TransportError;

export type UnsubscribeError = NotConnectedError | NotFoundError | TransportError;

export const NOT_CONNECTED: NotConnectedError = { kind: 'not-connected' };

export const describeError = (
  error: ConnectError | PublishError | InvalidPatternError | NotFoundError | SubscribeError | UnsubscribeError
): string => {
  switch (error.kind) {
    case 'not-connected':
      return 'not connected to the broker';
    case 'transport':
      return `transport error: ${error.detail}`;
    case 'already-started':
      return `session already started (state=${error.state})`;
    case 'timeout':
      return `no connection within ${error.timeoutMs}ms`;
    case 'aborted':
      return 'start aborted by shutdown';
    case 'invalid-message':
      return `invalid message: ${error.reason}`;
    case 'invalid-pattern':
      return `invalid pattern "${error.pattern}": ${error.reason}`;
    case 'not-found':
      return `no subscription for "${error.pattern}"`;
  }
};
