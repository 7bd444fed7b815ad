import { status as Status } from '@grpc/grpc-js';

export const ErrorCode = {
  Connection: 'CONNECTION_ERROR',
  Auth: 'AUTH_ERROR',
  Validation: 'VALIDATION_ERROR',
  Publish: 'PUBLISH_ERROR',
  Subscribe: 'SUBSCRIBE_ERROR',
  Stream: 'STREAM_ERROR',
  Configuration: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Error raised by every client operation.
 * Rendered as `[CODE] description: cause`, or `[CODE] description` without a cause.
 */
export class MqError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly description: string,
    cause?: unknown
  ) {
    super(
      cause === undefined
        ? `[${code}] ${description}`
        : `[${code}] ${description}: ${describeCause(cause)}`,
      cause === undefined ? undefined : { cause }
    );
    this.name = 'MqError';
  }

  unwrap(): unknown {
    return this.cause;
  }

  toString(): string {
    return this.message;
  }
}

export function isMqError(value: unknown, code?: ErrorCode): value is MqError {
  return value instanceof MqError && (code === undefined || value.code === code);
}

export interface StatusError extends Error {
  code: number;
  details: string;
}

/**
 * Whether the value carries a gRPC status (grpc-js ServiceError shape)
 */
export function isStatusError(value: unknown): value is StatusError {
  if (!(value instanceof Error)) return false;
  const candidate: { code?: unknown; details?: unknown; message?: unknown } = value;
  return typeof candidate.code === 'number' && typeof candidate.details === 'string';
}

function codeForStatus(status: number): ErrorCode {
  switch (status) {
    case Status.UNAUTHENTICATED:
      return ErrorCode.Auth;
    case Status.INVALID_ARGUMENT:
      return ErrorCode.Validation;
    case Status.UNAVAILABLE:
      return ErrorCode.Connection;
    default:
      return ErrorCode.Stream;
  }
}

/**
 * Translate a transport failure into an MqError with the given context
 */
export function wrapGrpcError(err: null | undefined, context: string): undefined;
export function wrapGrpcError(err: Error, context: string): MqError;
export function wrapGrpcError(err: unknown, context: string): MqError | undefined;
export function wrapGrpcError(err: unknown, context: string): MqError | undefined {
  if (err === null || err === undefined) {
    return undefined;
  }

  if (!isStatusError(err)) {
    return new MqError(ErrorCode.Stream, context, err);
  }

  return new MqError(codeForStatus(err.code), `${context}: ${err.details}`, err);
}

/**
 * Same as wrapGrpcError, for values that are known to be present (catch clauses)
 */
export function toMqError(err: unknown, context: string): MqError {
  return wrapGrpcError(err, context) ?? new MqError(ErrorCode.Stream, context);
}
