import { describe, it, expect } from 'vitest';
import { status as Status } from '@grpc/grpc-js';
import { ErrorCode, MqError, isMqError, isStatusError, toMqError, wrapGrpcError } from './errors';
import { statusError } from '../test-utils';

describe('MqError', () => {
  it('formats without a cause', () => {
    const err = new MqError(ErrorCode.Validation, 'message topic is required');
    expect(err.message).toBe('[VALIDATION_ERROR] message topic is required');
    expect(String(err)).toBe('[VALIDATION_ERROR] message topic is required');
    expect(err.unwrap()).toBeUndefined();
  });

  it('formats with a cause and keeps it', () => {
    const cause = new Error('socket hang up');
    const err = new MqError(ErrorCode.Connection, 'failed to create gRPC connection', cause);
    expect(err.message).toBe('[CONNECTION_ERROR] failed to create gRPC connection: socket hang up');
    expect(err.cause).toBe(cause);
    expect(err.unwrap()).toBe(cause);
    expect(err.code).toBe('CONNECTION_ERROR');
    expect(err.description).toBe('failed to create gRPC connection');
  });

  it('is an Error', () => {
    const err = new MqError(ErrorCode.Stream, 'boom');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('MqError');
  });
});

describe('isMqError', () => {
  it('narrows by code', () => {
    const err = new MqError(ErrorCode.Auth, 'denied');
    expect(isMqError(err)).toBe(true);
    expect(isMqError(err, ErrorCode.Auth)).toBe(true);
    expect(isMqError(err, ErrorCode.Stream)).toBe(false);
    expect(isMqError(new Error('plain'))).toBe(false);
  });
});

describe('isStatusError', () => {
  it('recognizes grpc status errors', () => {
    expect(isStatusError(statusError(Status.INTERNAL, 'oops'))).toBe(true);
    expect(isStatusError(new Error('plain'))).toBe(false);
    expect(isStatusError({ code: 14, details: 'not an Error' })).toBe(false);
  });
});

describe('wrapGrpcError', () => {
  it('returns undefined for missing errors', () => {
    expect(wrapGrpcError(null, 'ctx')).toBeUndefined();
    expect(wrapGrpcError(undefined, 'ctx')).toBeUndefined();
  });

  it.each<[string, Status, ErrorCode]>([
    ['UNAUTHENTICATED', Status.UNAUTHENTICATED, ErrorCode.Auth],
    ['INVALID_ARGUMENT', Status.INVALID_ARGUMENT, ErrorCode.Validation],
    ['UNAVAILABLE', Status.UNAVAILABLE, ErrorCode.Connection],
    ['NOT_FOUND', Status.NOT_FOUND, ErrorCode.Stream],
    ['INTERNAL', Status.INTERNAL, ErrorCode.Stream],
    ['CANCELLED', Status.CANCELLED, ErrorCode.Stream],
    ['DEADLINE_EXCEEDED', Status.DEADLINE_EXCEEDED, ErrorCode.Stream],
  ])('maps %s', (_name, status, expected) => {
    const err = wrapGrpcError(statusError(status, 'details text'), 'failed to count messages');
    expect(err?.code).toBe(expected);
    expect(err?.description).toBe('failed to count messages: details text');
  });

  it('combines context, status text and the underlying error', () => {
    const cause = statusError(Status.UNAUTHENTICATED, 'invalid token');
    const err = wrapGrpcError(cause, 'failed to send message');
    expect(err.message).toBe(
      '[AUTH_ERROR] failed to send message: invalid token: 16 UNAUTHENTICATED: invalid token'
    );
    expect(err.unwrap()).toBe(cause);
  });

  it('maps unknown status codes to stream errors', () => {
    const unknown = Object.assign(new Error('99 ???'), { code: 99, details: 'odd' });
    expect(wrapGrpcError(unknown, 'ctx').code).toBe(ErrorCode.Stream);
  });

  it('maps non-status errors to stream errors with the bare context', () => {
    const err = wrapGrpcError(new Error('ECONNRESET'), 'failed to receive message');
    expect(err.code).toBe(ErrorCode.Stream);
    expect(err.description).toBe('failed to receive message');
    expect(err.message).toBe('[STREAM_ERROR] failed to receive message: ECONNRESET');
  });

  it('wraps non-Error values', () => {
    const err = wrapGrpcError('boom', 'ctx');
    expect(err?.message).toBe('[STREAM_ERROR] ctx: boom');
  });
});

describe('toMqError', () => {
  it('always returns an error', () => {
    expect(toMqError(undefined, 'ctx').message).toBe('[STREAM_ERROR] ctx');
    expect(toMqError(statusError(Status.UNAVAILABLE, 'down'), 'ctx').code).toBe(
      ErrorCode.Connection
    );
  });
});
