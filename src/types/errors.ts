/**
 * Error taxonomy for the monitor.
 *
 * Every error that leaves a service carries the subject tag and a stable kind,
 * so callers never see raw transport errors.
 */

export type ApiErrorKind = 'NotFound' | 'RateLimited' | 'Transient';

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly tag: string;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    kind: ApiErrorKind,
    tag: string,
    message: string,
    opts: { status?: number; retryAfterMs?: number } = {},
  ) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
    this.tag = tag;
    this.status = opts.status;
    this.retryAfterMs = opts.retryAfterMs;
  }
}

export class MalformedRecordError extends Error {
  readonly tag: string;
  readonly field: string;

  constructor(tag: string, field: string, message: string) {
    super(message);
    this.name = 'MalformedRecordError';
    this.tag = tag;
    this.field = field;
  }
}

export class StateStoreError extends Error {
  readonly tag: string;

  constructor(tag: string, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'StateStoreError';
    this.tag = tag;
  }
}

export type MonitorErrorKind =
  | 'AlreadyMonitored'
  | 'NotMonitored'
  | 'ProfileNotFound'
  | 'OpponentNotFound'
  | 'ApiUnavailable'
  | 'InvalidTag'
  | 'StateStoreFailure';

export class MonitorError extends Error {
  readonly kind: MonitorErrorKind;
  readonly tag: string;

  constructor(kind: MonitorErrorKind, tag: string, message: string) {
    super(message);
    this.name = 'MonitorError';
    this.kind = kind;
    this.tag = tag;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
