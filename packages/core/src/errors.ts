import type { FailureKind, JobFailure } from './types.js';

/** Longest error detail shown to an end user */
const USER_DETAIL_LIMIT = 200;

/**
 * Classified relay failure. Transports and the content-store client throw
 * this so the worker and coordinator can pick the right user message and
 * retry policy without inspecting platform-specific error shapes.
 */
export class RelayError extends Error {
  readonly kind: FailureKind;
  /** Cooldown mandated by the transport, for `rate_limited` */
  readonly retryAfterMs?: number;

  constructor(
    kind: FailureKind,
    message: string,
    options: { retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'RelayError';
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}

/**
 * Wrap anything thrown into a RelayError. Unclassified errors become
 * `unexpected` with their message truncated for display.
 */
export function toRelayError(err: unknown): RelayError {
  if (err instanceof RelayError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new RelayError('unexpected', truncate(message, USER_DETAIL_LIMIT), { cause: err });
}

export function toFailure(err: unknown): JobFailure {
  const relayErr = toRelayError(err);
  return { kind: relayErr.kind, message: relayErr.message };
}

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max - 1)}…`;
}
