/**
 * Connection State Machine
 *
 * Strict state machine for event-channel connections, shared by the
 * server's per-client bookkeeping and the client's reconnect loop.
 *
 * State Flow:
 * DISCONNECTED → CONNECTING → CONNECTED
 *       ↑              ↓          ↓
 *       └──────────────┴──────────┘   (attempt failed / connection lost)
 *
 * DRAINING is entered only on an explicit shutdown and is terminal.
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 */

import { StateTransitionError } from './errors/index.js';

export const CONNECTION_STATES = ['connecting', 'connected', 'draining', 'disconnected'] as const;

export type ConnectionState = typeof CONNECTION_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface ConnectionStateTransition {
  from: ConnectionState;
  to: ConnectionState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<ConnectionState, ReadonlySet<ConnectionState>> = {
  connecting: new Set<ConnectionState>([
    'connected',
    'disconnected', // Attempt failed
    'draining',
  ]),
  connected: new Set<ConnectionState>([
    'disconnected', // Connection lost
    'draining',
  ]),
  disconnected: new Set<ConnectionState>([
    'connecting', // Retry
    'draining',
  ]),
  draining: new Set<ConnectionState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: ConnectionState, to: ConnectionState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: ConnectionState): ConnectionState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Connection State Machine class
 * Manages state transitions with validation and history
 */
export class ConnectionStateMachine {
  private currentState: ConnectionState;
  private history: ConnectionStateTransition[];
  private readonly connectionId: string;
  private readonly historyLimit: number;

  constructor(
    connectionId: string,
    initialState: ConnectionState = 'disconnected',
    historyLimit = 50
  ) {
    this.connectionId = connectionId;
    this.currentState = initialState;
    this.history = [];
    this.historyLimit = historyLimit;
  }

  /**
   * Get the current state
   */
  getState(): ConnectionState {
    return this.currentState;
  }

  /**
   * Get the recent transition history, oldest first
   */
  getHistory(): ReadonlyArray<ConnectionStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: ConnectionState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: ConnectionState, reason?: string): ConnectionStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.connectionId, this.currentState, targetState);
    }

    const transition: ConnectionStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    if (this.history.length > this.historyLimit) {
      this.history.shift();
    }
    this.currentState = targetState;

    return transition;
  }

  /**
   * Draining is the only terminal state
   */
  isTerminal(): boolean {
    return this.currentState === 'draining';
  }

  isConnected(): boolean {
    return this.currentState === 'connected';
  }
}
