/**
 * Error classification
 *
 * Every failure raised by the stream client, the broadcast hub and the
 * exchange wrappers is a RelayError carrying a stable code.
 */

export enum ErrorCode {
  // Stream transport (1xxx)
  CONNECTION_FAILED = 1000,
  NOT_CONNECTED = 1001,
  SEND_FAILED = 1002,
  RECEIVE_FAILED = 1003,

  // Payloads (2xxx)
  MALFORMED_MESSAGE = 2000,

  // Exchange API (3xxx)
  RPC_FAILED = 3000,
  AUTHENTICATION_FAILED = 3001,
}

export interface ErrorContext {
  [key: string]: unknown;
}

export class RelayError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, cause?: unknown, context: ErrorContext = {}) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RelayError';
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause === undefined ? undefined : describeError(this.cause),
    };
  }
}

// =============================================================================
// Stream errors
// =============================================================================

export class ConnectionError extends RelayError {
  constructor(message: string, cause?: unknown, context?: ErrorContext) {
    super(ErrorCode.CONNECTION_FAILED, message, cause, context);
    this.name = 'ConnectionError';
  }
}

export class NotConnectedError extends RelayError {
  constructor(operation: string) {
    super(ErrorCode.NOT_CONNECTED, `Cannot ${operation}: not connected`, undefined, { operation });
    this.name = 'NotConnectedError';
  }
}

export class SendError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.SEND_FAILED, message, cause);
    this.name = 'SendError';
  }
}

export class ReceiveError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.RECEIVE_FAILED, message, cause);
    this.name = 'ReceiveError';
  }
}

export class MalformedMessageError extends RelayError {
  constructor(message: string, payload: string, cause?: unknown) {
    super(ErrorCode.MALFORMED_MESSAGE, message, cause, { payload: payload.slice(0, 200) });
    this.name = 'MalformedMessageError';
  }
}

// =============================================================================
// Exchange errors
// =============================================================================

export class RpcError extends RelayError {
  /** Error code from the JSON-RPC reply, or the HTTP status when there was none */
  readonly rpcCode?: number;

  constructor(method: string, message: string, rpcCode?: number, cause?: unknown) {
    super(ErrorCode.RPC_FAILED, `${method}: ${message}`, cause, { method, rpcCode });
    this.name = 'RpcError';
    this.rpcCode = rpcCode;
  }
}

export class AuthenticationError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.AUTHENTICATION_FAILED, message, cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Human-readable description of any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
