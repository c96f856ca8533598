/**
 * Error types for log sharing sessions
 */

export enum ShareErrorCode {
  MappingFailed = 'MAPPING_FAILED',
  PortPermissionDenied = 'PORT_PERMISSION_DENIED',
  BindFailed = 'BIND_FAILED',
  InvalidCode = 'INVALID_CODE',
  AuthenticationMismatch = 'AUTHENTICATION_MISMATCH',
  ConnectionFailed = 'CONNECTION_FAILED',
  TransferIncomplete = 'TRANSFER_INCOMPLETE',
  InvalidPayload = 'INVALID_PAYLOAD',
  LocalReadFailed = 'LOCAL_READ_FAILED',
  SessionClosed = 'SESSION_CLOSED',
}

export class ShareError extends Error {
  public readonly code: ShareErrorCode;
  public override readonly cause?: Error;

  constructor(message: string, code: ShareErrorCode, cause?: Error) {
    super(message, { cause });
    this.name = 'ShareError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * Steps of establishing a gateway port mapping, in the order they run
 */
export type MappingStage = 'discover' | 'select' | 'local-address' | 'map' | 'external-address';

export class MappingError extends ShareError {
  public readonly stage: MappingStage;

  constructor(stage: MappingStage, cause: Error) {
    super(`Port mapping failed at stage "${stage}": ${cause.message}`, ShareErrorCode.MappingFailed, cause);
    this.name = 'MappingError';
    this.stage = stage;
  }
}

export class PortPermissionError extends ShareError {
  public readonly port: number;

  constructor(port: number, cause?: Error) {
    super(`Port ${port} is restricted; choose another port or run with elevated rights`, ShareErrorCode.PortPermissionDenied, cause);
    this.name = 'PortPermissionError';
    this.port = port;
  }
}

export class DecodeError extends ShareError {
  constructor(reason: string, cause?: Error) {
    super(`Invalid session code: ${reason}`, ShareErrorCode.InvalidCode, cause);
    this.name = 'DecodeError';
  }
}

export class AuthenticationMismatch extends ShareError {
  constructor(reason: string, cause?: Error) {
    super(`Authentication failed: ${reason}`, ShareErrorCode.AuthenticationMismatch, cause);
    this.name = 'AuthenticationMismatch';
  }
}

export class ConnectionError extends ShareError {
  public readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, cause?: Error) {
    super(message, ShareErrorCode.ConnectionFailed, cause);
    this.name = 'ConnectionError';
    this.timedOut = timedOut;
  }
}

export class TransferIncomplete extends ShareError {
  public readonly expected: number;
  public readonly received: number;

  constructor(expected: number, received: number, what = 'payload', cause?: Error) {
    super(
      `Connection closed before the ${what} was complete (${received} of ${expected} bytes)`,
      ShareErrorCode.TransferIncomplete,
      cause
    );
    this.name = 'TransferIncomplete';
    this.expected = expected;
    this.received = received;
  }
}

export class LocalReadError extends ShareError {
  public readonly path: string;

  constructor(path: string, cause?: Error) {
    super(`Cannot read ${path}${cause ? `: ${cause.message}` : ''}`, ShareErrorCode.LocalReadFailed, cause);
    this.name = 'LocalReadError';
    this.path = path;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
