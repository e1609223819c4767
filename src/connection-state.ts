/**
 * ConnectionStateMachine - the single authoritative connection state
 *
 *   idle → connecting → connected → closed | failed | cancelled
 *
 * A connecting attempt may also end directly in failed/cancelled (or closed).
 * Any ended attempt may be followed by a fresh connecting.
 */

import type { ConnectionState } from './types.js';

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  idle: ['connecting'],
  connecting: ['connected', 'closed', 'failed', 'cancelled'],
  connected: ['closed', 'failed', 'cancelled'],
  closed: ['connecting'],
  failed: ['connecting'],
  cancelled: ['connecting'],
};

export function isActiveState(state: ConnectionState): boolean {
  return state === 'connecting' || state === 'connected';
}

export function isTerminalState(state: ConnectionState): boolean {
  return state === 'closed' || state === 'failed' || state === 'cancelled';
}

export class ConnectionStateMachine {
  private current: ConnectionState = 'idle';

  get state(): ConnectionState {
    return this.current;
  }

  canTransition(next: ConnectionState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  /**
   * Move to `next` if the transition is legal.
   * Returns false (state unchanged) otherwise.
   */
  transition(next: ConnectionState): boolean {
    if (!this.canTransition(next)) {
      return false;
    }
    this.current = next;
    return true;
  }

  /** connecting or connected */
  isActive(): boolean {
    return isActiveState(this.current);
  }

  isTerminal(): boolean {
    return isTerminalState(this.current);
  }
}
