import { Segment } from '../types';

export type FailureKind = 'lookup' | 'shape';

/**
 * Why a segment could not be applied. Kept as plain data so that broadcasts
 * can discard it without building an Error.
 */
export interface Failure {
  kind: FailureKind;
  message: string;
  segment: Segment;
}

export type Outcome<T = unknown> = { ok: true; value: T } | { ok: false; failure: Failure };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function lookupFailure(message: string, segment: Segment): Outcome<never> {
  return { ok: false, failure: { kind: 'lookup', message, segment } };
}

export function shapeMismatch(message: string, segment: Segment): Outcome<never> {
  return { ok: false, failure: { kind: 'shape', message, segment } };
}
