/**
 * Custom Error Classes
 */

import type { ConnectionState } from '../stateMachine.js';

/**
 * Base error class for all meshwatch errors
 */
export class MeshWatchError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MeshWatchError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends MeshWatchError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid connection state changes
 */
export class StateTransitionError extends MeshWatchError {
  constructor(
    connectionId: string,
    fromState: ConnectionState,
    toState: ConnectionState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      409,
      { connectionId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends MeshWatchError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * The watched directory itself became unwatchable (deleted, unmounted).
 * No further synchronization is possible; the process exits.
 */
export class WatchLostError extends MeshWatchError {
  constructor(directory: string, cause?: unknown) {
    super(
      `Lost watch on directory: ${directory}`,
      'WATCH_LOST',
      500,
      {
        directory,
        cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
      }
    );
    this.name = 'WatchLostError';
  }
}

/**
 * The server could not bind its listening socket
 */
export class BindError extends MeshWatchError {
  constructor(host: string, port: number, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'unknown error';
    super(
      `Could not listen on ${host}:${port} (${reason}). ` +
        'Free the port or pick another one with --port or MESHWATCH_PORT.',
      'BIND_FAILED',
      500,
      { host, port }
    );
    this.name = 'BindError';
  }
}

/**
 * A peer sent a frame that does not match the event channel protocol
 */
export class ProtocolError extends MeshWatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROTOCOL_ERROR', 400, details);
    this.name = 'ProtocolError';
  }
}
