/**
 * Assertion: one reconciliation unit tied to a call site and a captured value
 */

import {
  AssertionContext,
  AssertionMetadata,
  AssertionOptions,
  AssertionStage,
  CandidateResult,
  Decision,
  PatternGenerator,
} from "./types";
import { toError } from "./errors";

export const DEFAULT_ASSERTION_OPTIONS: AssertionOptions = {
  action: "prompt",
  defaultPattern: "first",
  forceUpdate: false,
};

export type AssertionInput = {
  stage: AssertionStage;
  value: unknown;
  expected?: unknown;
  context: AssertionContext;
  options?: Partial<AssertionOptions>;
};

export class Assertion {
  readonly stage: AssertionStage;
  readonly value: unknown;
  readonly expected: unknown;
  readonly context: Readonly<AssertionContext>;
  readonly options: Readonly<AssertionOptions>;
  readonly candidates: CandidateResult;
  private regenerated: string | undefined;

  private constructor(input: AssertionInput, candidates: CandidateResult) {
    this.stage = input.stage;
    this.value = input.value;
    this.expected = input.expected;
    this.context = { ...input.context };
    this.options = resolveOptions(DEFAULT_ASSERTION_OPTIONS, input.options ?? {});
    this.candidates = candidates;
  }

  /**
   * Capture an assertion, generating its candidate patterns up front.
   * A generator failure is kept on the assertion and surfaces when it is patched.
   */
  static create(input: AssertionInput, generator: PatternGenerator): Assertion {
    let candidates: CandidateResult;
    try {
      const patterns = generator.toPatterns(input.value);
      candidates =
        patterns.length > 0
          ? { ok: true, patterns }
          : { ok: false, error: new Error("Pattern generator returned no candidates") };
    } catch (error) {
      candidates = { ok: false, error: toError(error) };
    }
    return new Assertion(input, candidates);
  }

  /**
   * Call text written for this assertion, once a decision materialized it
   */
  get code(): string | undefined {
    return this.regenerated;
  }

  regenerateCode(code: string): this {
    if (this.regenerated !== undefined) {
      throw new Error(`Assertion at ${this.location()} was already materialized`);
    }
    this.regenerated = code;
    return this;
  }

  key(): string {
    const { file, line, column, groupId, testName } = this.context;
    const position = column === undefined ? `${line}` : `${line}:${column}`;
    return `${file}:${position}:${groupId}:${testName}`;
  }

  location(): string {
    return `${this.context.file}:${this.context.line}`;
  }

  metadata(candidateIndex: number, candidateCount: number, history: Decision[]): AssertionMetadata {
    return {
      ...this.context,
      stage: this.stage,
      candidateIndex,
      candidateCount,
      history: [...history],
    };
  }
}

/**
 * Layer option overrides, later layers winning; undefined fields are ignored
 */
export function resolveOptions(
  base: AssertionOptions,
  ...layers: Partial<AssertionOptions>[]
): AssertionOptions {
  const resolved: AssertionOptions = { ...base };
  for (const layer of layers) {
    if (layer.action !== undefined) resolved.action = layer.action;
    if (layer.defaultPattern !== undefined) resolved.defaultPattern = layer.defaultPattern;
    if (layer.forceUpdate !== undefined) resolved.forceUpdate = layer.forceUpdate;
  }
  return resolved;
}
