/**
 * Error hierarchy for autoassert
 */

import { inspect } from "node:util";

export class AutoAssertError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A new assertion was rejected, so no expectation exists for the value.
 */
export class MissingExpectationError extends AutoAssertError {
  constructor(readonly actual: unknown, location: string) {
    super(`No expected value recorded at ${location}; received ${inspect(actual, { depth: 4 })}`);
  }
}

export class ExpectationMismatchError extends AutoAssertError {
  constructor(readonly expected: unknown, readonly actual: unknown, location: string) {
    super(
      `Value does not match the recorded expectation at ${location}\n` +
        `  expected: ${inspect(expected, { depth: 4 })}\n` +
        `  received: ${inspect(actual, { depth: 4 })}`
    );
  }
}

export class FileChangedError extends AutoAssertError {
  constructor(readonly file: string) {
    super(`${file} changed on disk while its assertions were being updated`);
  }
}

export class PatternError extends AutoAssertError {}

export class CallSiteNotFoundError extends AutoAssertError {
  constructor(readonly file: string, readonly line: number, calleeNames: readonly string[]) {
    super(`No ${calleeNames.join("/")} call found at ${file}:${line}`);
  }
}

/**
 * A call site reached by several assertions, already staged with a different expected value.
 */
export class CallSiteConflictError extends AutoAssertError {
  constructor(readonly file: string, readonly line: number, readonly owner: string) {
    super(`${file}:${line} already has a staged edit from ${owner} with a different expected value`);
  }
}

export class AbortedError extends AutoAssertError {}

/**
 * Normalize anything thrown into an Error
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
