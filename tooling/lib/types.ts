/**
 * Shared type definitions for the autoassert reconciliation system
 */

import type { Assertion } from "./assertion";
import type { LogLevel } from "./logger";

export type Action = "prompt" | "accept" | "reject";

export type PatternChoice = "first" | "last";

export type QueueOrder = "lifo" | "fifo";

export type Config = {
  envSearchPaths?: string[];
  action?: Action;
  defaultPattern?: PatternChoice;
  forceUpdate?: boolean;
  dryRun?: boolean;
  queueOrder?: QueueOrder;
  failureExitStatus?: number;
  calleeNames?: string[];
  logLevel?: LogLevel;
};

export type AssertionOptions = {
  action: Action;
  defaultPattern: PatternChoice;
  forceUpdate: boolean;
};

export type AssertionStage = "new" | "update";

export type CallLocation = {
  file: string;
  line: number;
  /** 1-based column of the callee, when the stack frame reports one */
  column?: number;
};

export type AssertionContext = CallLocation & {
  testName: string;
  groupId: string;
};

export type Decision = "accept" | "reject" | "skip" | "next" | "prev";

export type PatchError =
  | { kind: "skipped" }
  | { kind: "rejected" }
  | { kind: "fileChanged"; file: string }
  | { kind: "failed"; cause: Error };

export type PatchOutcome = { ok: true; value: Assertion } | { ok: false; error: PatchError };

export type FinalizeResult = { ok: true } | { ok: false; notSaved: string[] };

export type CandidateResult = { ok: true; patterns: string[] } | { ok: false; error: Error };

export type DiffLineKind = "eq" | "ins" | "del";

export type DiffLine = {
  kind: DiffLineKind;
  text: string;
};

export type DiffView = {
  original: string;
  proposed: string;
  lines: DiffLine[];
};

export type AssertionMetadata = AssertionContext & {
  stage: AssertionStage;
  candidateIndex: number;
  candidateCount: number;
  history: Decision[];
};

export interface Prompter {
  prompt(view: DiffView, metadata: AssertionMetadata): Promise<Decision>;
}

export interface PatternGenerator {
  toPatterns(value: unknown): string[];
}

export interface StagingStore {
  patch(assertion: Assertion, seq: number): Promise<PatchOutcome>;
  finalize(): FinalizeResult;
}

export type RunnerEvent =
  | { type: "testStarted"; testId: string }
  | { type: "groupFinished"; groupId: string }
  | { type: "suiteFinished" };

export type RunStats = {
  new: number;
  updated: number;
  skipped: number;
  rejected: number;
  failed: number;
};

export type RunSummary = {
  stats: RunStats;
  notSaved: string[];
  failed: boolean;
};

export interface OutputSink {
  write(chunk: string): void;
}

export interface ExitHandler {
  fail(status: number): void;
}
