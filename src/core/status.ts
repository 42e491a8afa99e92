/**
 * src/core/status.ts
 * Outcome of every scanning step and of a whole parse.
 *
 * `complete` means the value was fully present and the cursor sits just past it.
 * `partial` means every byte seen so far is a valid prefix but the buffer ran out; the
 * caller appends more bytes and parses again from the start. `error` is final.
 */
import { HttpParseError, ParseErrorKind } from './errors';

export interface CompleteResult<T> {
  readonly status: 'complete';
  readonly value: T;
}

export interface PartialResult {
  readonly status: 'partial';
}

export interface FailureResult {
  readonly status: 'error';
  readonly error: HttpParseError;
}

export type ParseResult<T> = CompleteResult<T> | PartialResult | FailureResult;

export const PARTIAL: PartialResult = { status: 'partial' };

export function complete<T>(value: T): CompleteResult<T> {
  return { status: 'complete', value };
}

export function fail(kind: ParseErrorKind, offset: number): FailureResult {
  return { status: 'error', error: new HttpParseError(kind, offset) };
}

export function isComplete<T>(result: ParseResult<T>): result is CompleteResult<T> {
  return result.status === 'complete';
}

export function isPartial<T>(result: ParseResult<T>): result is PartialResult {
  return result.status === 'partial';
}

export function isFailure<T>(result: ParseResult<T>): result is FailureResult {
  return result.status === 'error';
}

/**
 * Returns the completed value. Throws the carried {@link HttpParseError} on failure and a
 * plain `Error` on a partial result.
 */
export function unwrap<T>(result: ParseResult<T>): T {
  switch (result.status) {
    case 'complete':
      return result.value;
    case 'error':
      throw result.error;
    case 'partial':
      throw new Error('Tried to unwrap a partial parse result');
  }
}
