/**
 * Failure classification
 *
 * A failure is transient when its kind is a member of the policy's transient
 * set. Membership is exact tag equality; there is no hierarchy walk.
 */

import {
  describeFailure,
  FailureKind,
  type FailureInfo,
  TransientInterruptedError
} from '@retrykit/core';

/**
 * Set of failure kinds that rejects mutation once built; policies share it
 */
export class TransientKindSet extends Set<string> {
  private sealed = false;

  constructor(kinds: Iterable<string> = []) {
    super();
    for (const kind of kinds) {
      super.add(kind);
    }
    this.sealed = true;
  }

  override add(kind: string): this {
    if (this.sealed) {
      throw new TypeError(`Cannot add "${kind}": transient kind sets are read-only`);
    }
    return super.add(kind);
  }

  override delete(kind: string): boolean {
    throw new TypeError(`Cannot delete "${kind}": transient kind sets are read-only`);
  }

  override clear(): void {
    throw new TypeError('Cannot clear: transient kind sets are read-only');
  }
}

/**
 * Kinds retried when the caller supplies none
 */
export const DEFAULT_TRANSIENT_KINDS: ReadonlySet<string> = new TransientKindSet([
  FailureKind.SOCKET,
  FailureKind.INTERRUPTED_IO,
  FailureKind.TRANSIENT_INTERRUPTED
]);

/**
 * Check if a failure is eligible for retry
 */
export function isTransient(failure: FailureInfo, transientKinds: ReadonlySet<string>): boolean {
  return transientKinds.has(failure.kind);
}

export type TransientKindsInput = {
  /** Replaces the defaults */
  transientKinds?: Iterable<string>;
  /** Merged into the base set (the defaults, or `transientKinds` when given) */
  additionalTransientKinds?: Iterable<string>;
};

/**
 * Build the transient set a policy carries
 */
export function resolveTransientKinds(input: TransientKindsInput = {}): ReadonlySet<string> {
  const kinds = new Set<string>(input.transientKinds ?? DEFAULT_TRANSIENT_KINDS);
  for (const kind of input.additionalTransientKinds ?? []) {
    kinds.add(kind);
  }
  return new TransientKindSet(kinds);
}

/**
 * Check if a raised value is a cooperative-cancellation signal, the
 * `AbortError` that AbortSignal-aware APIs reject with
 */
export function isCancellation(raised: unknown): raised is Error {
  return raised instanceof Error && raised.name === 'AbortError';
}

/**
 * Capture a raised value, folding cancellation into TransientInterrupted
 */
export function classifyFailure(raised: unknown): FailureInfo {
  if (isCancellation(raised)) {
    return describeFailure(new TransientInterruptedError(raised.message, { cause: raised }));
  }
  return describeFailure(raised);
}
