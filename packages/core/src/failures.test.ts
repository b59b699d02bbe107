import { describe, expect, it } from 'vitest';
import {
  describeFailure,
  FailureKind,
  failureKindOf,
  InterruptedIOError,
  KindedError,
  SocketError,
  TransientInterruptedError
} from './failures.js';

class ProxySocketError extends SocketError {
  override readonly kind = 'ProxySocketError';
}

class QuotaError extends Error {
  override name = 'QuotaError';
}

describe('failure classes', () => {
  it('should tag built-in failures with their kind and name', () => {
    const socket = new SocketError('Connection Unstable');
    expect(socket).toBeInstanceOf(Error);
    expect(socket.kind).toBe('SocketError');
    expect(socket.name).toBe('SocketError');
    expect(socket.message).toBe('Connection Unstable');

    expect(new InterruptedIOError().kind).toBe('InterruptedIOError');
    expect(new TransientInterruptedError().kind).toBe('TransientInterrupted');
  });

  it('should keep the underlying cause', () => {
    const root = new Error('reset by peer');
    const error = new SocketError('Connection lost', { cause: root });
    expect(error.cause).toBe(root);
  });
});

describe('failureKindOf', () => {
  it('should read an explicit kind', () => {
    expect(failureKindOf(new KindedError('RateLimited', 'slow down'))).toBe('RateLimited');
    expect(failureKindOf({ kind: 'Custom', message: 'plain object' })).toBe('Custom');
  });

  it('should keep an explicit empty kind', () => {
    expect(failureKindOf(new KindedError('', 'untagged'))).toBe('');
    expect(failureKindOf({ kind: '', name: 'Named' })).toBe('');
  });

  it('should prefer a subclass kind over the parent kind', () => {
    expect(failureKindOf(new ProxySocketError('proxy down'))).toBe('ProxySocketError');
  });

  it('should fall back to the error name', () => {
    expect(failureKindOf(new TypeError('nope'))).toBe('TypeError');
    expect(failureKindOf(new QuotaError('over quota'))).toBe('QuotaError');
  });

  it('should map socket errno codes to socket failures', () => {
    const reset = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    const timedOut = Object.assign(new Error('connect ETIMEDOUT'), { code: 'ETIMEDOUT' });

    expect(failureKindOf(reset)).toBe(FailureKind.SOCKET);
    expect(failureKindOf(refused)).toBe(FailureKind.SOCKET);
    expect(failureKindOf(timedOut)).toBe(FailureKind.INTERRUPTED_IO);
  });

  it('should ignore unrelated error codes', () => {
    const missing = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(failureKindOf(missing)).toBe('Error');
  });

  it('should tag non-error values as unknown', () => {
    expect(failureKindOf('string failure')).toBe('UnknownFailure');
    expect(failureKindOf(42)).toBe('UnknownFailure');
    expect(failureKindOf(null)).toBe('UnknownFailure');
    expect(failureKindOf({ kind: 7 })).toBe('UnknownFailure');
  });
});

describe('describeFailure', () => {
  it('should capture kind, message and cause', () => {
    const error = new InterruptedIOError('Interrupted IO');
    const info = describeFailure(error);

    expect(info).toEqual({ kind: 'InterruptedIOError', message: 'Interrupted IO', cause: error });
    expect(Object.isFrozen(info)).toBe(true);
  });

  it('should stringify non-error values', () => {
    expect(describeFailure('went wrong')).toEqual({
      kind: 'UnknownFailure',
      message: 'went wrong',
      cause: 'went wrong'
    });
  });
});
