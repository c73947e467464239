// src/services/errors.ts: typed faults that component boundaries convert into result fields

export type LiveApiErrorKind =
  | 'timeout'
  | 'network'
  | 'rate-limit'
  | 'upstream'
  | 'auth'
  | 'bad-request'
  | 'not-found';

const TRANSIENT_KINDS: ReadonlySet<LiveApiErrorKind> = new Set(['timeout', 'network', 'rate-limit', 'upstream']);

export class LiveApiError extends Error {
  readonly kind: LiveApiErrorKind;
  readonly status?: number;

  constructor(kind: LiveApiErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'LiveApiError';
    this.kind = kind;
    this.status = status;
  }

  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export class GenerationError extends Error {
  readonly kind: 'backend' | 'malformed';

  constructor(kind: GenerationError['kind'], message: string) {
    super(message);
    this.name = 'GenerationError';
    this.kind = kind;
  }
}

/** A category was written twice into one trip context. */
export class ContextWriteError extends Error {
  constructor(category: string) {
    super(`Trip context already holds a result for "${category}"`);
    this.name = 'ContextWriteError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Data was found but none of it satisfies a hard constraint of the request. */
export class UnsatisfiableRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsatisfiableRequestError';
  }
}

/** A required retrieval came back without data; the agent records it as a failure. */
export class RetrievalFailedError extends Error {
  readonly reason: 'exhausted' | 'cancelled';

  constructor(reason: 'exhausted' | 'cancelled', message: string) {
    super(message);
    this.name = 'RetrievalFailedError';
    this.reason = reason;
  }
}
