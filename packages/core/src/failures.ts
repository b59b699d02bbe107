/**
 * Failure kinds and failure values
 *
 * A failure kind is an explicit string tag attached to a failure when it is
 * raised. Matching against a set of kinds is flat equality on that tag: a
 * subclass that declares its own kind never matches its parent's kind.
 */

export const FailureKind = {
  /** Socket-level connectivity failure */
  SOCKET: 'SocketError',
  /** Interrupted or timed-out I/O */
  INTERRUPTED_IO: 'InterruptedIOError',
  /** Cooperative cancellation observed during an attempt */
  TRANSIENT_INTERRUPTED: 'TransientInterrupted',
  /** A thrown value that is not an Error and carries no kind */
  UNKNOWN: 'UnknownFailure'
} as const;

/**
 * Failure captured from one attempt
 */
export type FailureInfo = {
  readonly kind: string;
  readonly message: string;
  /** The raised value itself */
  readonly cause: unknown;
};

/**
 * Error carrying an explicit failure kind. `name` mirrors `kind`.
 */
export class KindedError extends Error {
  public readonly kind: string;

  constructor(kind: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

export class SocketError extends KindedError {
  constructor(message = 'Socket connection failed', options?: { cause?: unknown }) {
    super(FailureKind.SOCKET, message, options);
  }
}

export class InterruptedIOError extends KindedError {
  constructor(message = 'I/O interrupted', options?: { cause?: unknown }) {
    super(FailureKind.INTERRUPTED_IO, message, options);
  }
}

export class TransientInterruptedError extends KindedError {
  constructor(message = '', options?: { cause?: unknown }) {
    super(FailureKind.TRANSIENT_INTERRUPTED, message, options);
  }
}

const SOCKET_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN'
]);

const INTERRUPTED_IO_CODES: ReadonlySet<string> = new Set(['ETIMEDOUT']);

function readStringProperty(value: object, key: string): string | undefined {
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
}

/**
 * Resolve the kind tag of a raised value
 */
export function failureKindOf(raised: unknown): string {
  if (typeof raised === 'object' && raised !== null) {
    const kind = readStringProperty(raised, 'kind');
    if (kind !== undefined) {
      return kind;
    }
  }

  if (raised instanceof Error) {
    // Node's own socket failures are plain Errors with an errno code
    const code = readStringProperty(raised, 'code');
    if (code && SOCKET_ERROR_CODES.has(code)) {
      return FailureKind.SOCKET;
    }
    if (code && INTERRUPTED_IO_CODES.has(code)) {
      return FailureKind.INTERRUPTED_IO;
    }
    return raised.name;
  }

  return FailureKind.UNKNOWN;
}

/**
 * Capture a raised value as FailureInfo
 */
export function describeFailure(raised: unknown): FailureInfo {
  return Object.freeze({
    kind: failureKindOf(raised),
    message: raised instanceof Error ? raised.message : String(raised),
    cause: raised
  });
}
