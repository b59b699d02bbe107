import { describe, expect, it } from 'vitest';
import { createFlakyOperation, FLAKY_SUCCESS } from './flaky.js';

function raisedBy(operation: () => unknown): unknown {
  try {
    operation();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('createFlakyOperation', () => {
  it('should succeed in the first quarter', () => {
    expect(createFlakyOperation(() => 0)()).toBe(FLAKY_SUCCESS);
    expect(createFlakyOperation(() => 0.24)()).toBe('Connection Success');
  });

  it('should raise a cancellation in the second quarter', () => {
    const raised = raisedBy(createFlakyOperation(() => 0.25));
    expect(raised).toBeInstanceOf(Error);
    expect(raised).toMatchObject({ name: 'AbortError', message: 'Interrupted' });
  });

  it('should raise an interrupted read in the third quarter', () => {
    const raised = raisedBy(createFlakyOperation(() => 0.5));
    expect(raised).toMatchObject({ kind: 'InterruptedIOError', message: 'Interrupted IO' });
  });

  it('should raise an unstable connection in the last quarter', () => {
    expect(raisedBy(createFlakyOperation(() => 0.75))).toMatchObject({
      kind: 'SocketError',
      message: 'Connection Unstable'
    });
    expect(raisedBy(createFlakyOperation(() => 0.999))).toMatchObject({ kind: 'SocketError' });
  });
});
