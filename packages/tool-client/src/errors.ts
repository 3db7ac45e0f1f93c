/**
 * Error taxonomy for the tool client.
 *
 * Every failure surfaced to callers is a `ToolClientError` carrying a `kind`
 * discriminant and a `retryable` flag, so the reasoning layer and the task
 * manager can branch on the class of failure without parsing messages.
 */

export type ErrorKind =
  | 'connect'
  | 'handshake'
  | 'connection_lost'
  | 'timeout'
  | 'session_closed'
  | 'session_not_ready'
  | 'unknown_server'
  | 'unknown_capability'
  | 'invalid_arguments'
  | 'tool_error'
  | 'cancelled'
  | 'io'
  | 'protocol'
  | 'config'
  | 'invalid_task';

export interface ErrorInfo {
  kind: ErrorKind | 'unknown';
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export interface ToolClientErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export abstract class ToolClientError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: ToolClientErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.details = options.details;
  }

  toJSON(): ErrorInfo {
    return {
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
      ...(this.details && { details: this.details }),
    };
  }
}

/** The transport could not be established (spawn or connect failure). */
export class ConnectError extends ToolClientError {
  readonly kind = 'connect';
  readonly retryable = false;
}

/** The peer's initialization exchange was malformed, failed or timed out. */
export class HandshakeError extends ToolClientError {
  readonly kind = 'handshake';
  readonly retryable = false;
}

/** The transport dropped while the session was open. */
export class ConnectionLostError extends ToolClientError {
  readonly kind = 'connection_lost';
  readonly retryable = true;
}

export class TimeoutError extends ToolClientError {
  readonly kind = 'timeout';
  readonly retryable = true;

  constructor(message: string, readonly timeoutMs: number, options: ToolClientErrorOptions = {}) {
    super(message, { ...options, details: { timeoutMs, ...options.details } });
  }
}

export class SessionClosedError extends ToolClientError {
  readonly kind = 'session_closed';
  readonly retryable = false;
}

export class SessionNotReadyError extends ToolClientError {
  readonly kind = 'session_not_ready';
  readonly retryable = false;
}

export class UnknownServerError extends ToolClientError {
  readonly kind = 'unknown_server';
  readonly retryable = false;

  constructor(readonly serverName: string) {
    super(`Unknown tool server "${serverName}"`, { details: { serverName } });
  }
}

export class UnknownCapabilityError extends ToolClientError {
  readonly kind = 'unknown_capability';
  readonly retryable = false;

  constructor(readonly toolName: string, readonly serverName: string) {
    super(`Tool "${toolName}" is not offered by server "${serverName}"`, {
      details: { toolName, serverName },
    });
  }
}

export class InvalidArgumentsError extends ToolClientError {
  readonly kind = 'invalid_arguments';
  readonly retryable = false;

  constructor(readonly toolName: string, readonly issues: string[]) {
    super(`Invalid arguments for tool "${toolName}": ${issues.join('; ')}`, {
      details: { toolName, issues },
    });
  }
}

/** The server answered a request with a JSON-RPC error. */
export class ToolCallError extends ToolClientError {
  readonly kind = 'tool_error';
  readonly retryable = false;

  constructor(message: string, readonly code: number, readonly data?: unknown) {
    super(message, { details: { code, ...(data !== undefined && { data }) } });
  }
}

export class RequestCancelledError extends ToolClientError {
  readonly kind = 'cancelled';
  readonly retryable = false;
}

/** Transport-level I/O failure: writing to a closed channel, or the peer vanishing. */
export class TransportIOError extends ToolClientError {
  readonly kind = 'io';
  readonly retryable = false;
}

/** A response arrived but did not have the shape the protocol requires. */
export class ProtocolError extends ToolClientError {
  readonly kind = 'protocol';
  readonly retryable = false;
}

export class ConfigError extends ToolClientError {
  readonly kind = 'config';
  readonly retryable = false;

  constructor(message: string, readonly issues: string[] = [], options: ToolClientErrorOptions = {}) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, {
      ...options,
      details: { issues },
    });
  }
}

export class InvalidTaskError extends ToolClientError {
  readonly kind = 'invalid_task';
  readonly retryable = false;

  constructor(readonly issues: string[]) {
    super(`Invalid task: ${issues.join('; ')}`, { details: { issues } });
  }
}

export const isRetryable = (error: unknown): boolean =>
  error instanceof ToolClientError && error.retryable;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Convert any thrown value into the structured error value handed to the
 * reasoning layer.
 */
export const toErrorInfo = (error: unknown): ErrorInfo => {
  if (error instanceof ToolClientError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { kind: 'unknown', message: error.message, retryable: false };
  }
  return { kind: 'unknown', message: String(error), retryable: false };
};
