export type SessionState = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'faulted';

export type SessionEvent =
  | 'connect_requested'
  | 'transport_connected'
  | 'transport_disconnected'
  | 'transport_error'
  | 'shutdown_requested';

/**
 * Session state machine. Pairs not listed keep the current state.
 *
 * idle|faulted  --connect_requested-->      connecting
 * connecting    --transport_connected-->    connected
 * connecting    --transport_error-->        faulted
 * connected     --transport_disconnected--> disconnected
 * disconnected  --transport_connected-->    connected
 * any           --shutdown_requested-->     idle
 */
export function transition(state: SessionState, event: SessionEvent): SessionState {
  if (event === 'shutdown_requested') return 'idle';

  switch (state) {
    case 'idle':
    case 'faulted':
      return event === 'connect_requested' ? 'connecting' : state;
    case 'connecting':
      if (event === 'transport_connected') return 'connected';
      if (event === 'transport_error') return 'faulted';
      return state;
    case 'connected':
      return event === 'transport_disconnected' ? 'disconnected' : state;
    case 'disconnected':
      return event === 'transport_connected' ? 'connected' : state;
  }
}
