/**
 * Flaky demonstration operation
 *
 * Picks one of four outcomes uniformly on every call: success, a
 * cancellation, an interrupted read, or an unstable connection.
 */

import { InterruptedIOError, SocketError } from '@retrykit/core';
import type { Operation } from '@retrykit/runtime';

export const FLAKY_SUCCESS = 'Connection Success';

export function createFlakyOperation(random: () => number = Math.random): Operation<string> {
  return () => {
    const status = Math.min(3, Math.floor(random() * 4));
    switch (status) {
      case 0:
        return FLAKY_SUCCESS;
      case 1: {
        const interrupted = new Error('Interrupted');
        interrupted.name = 'AbortError';
        throw interrupted;
      }
      case 2:
        throw new InterruptedIOError('Interrupted IO');
      default:
        throw new SocketError('Connection Unstable');
    }
  };
}
