/**
 * Reconciliation coordinator
 *
 * The single owner of the pending-request queue, the active group and the run
 * statistics. Test bodies await `register`/`requestPatch`; the coordinator
 * resolves one request at a time through the staging store, so prompts and file
 * edits are never produced concurrently. While a group is active, runner output
 * is held back so it cannot interleave with a prompt.
 */

import { Assertion } from "./assertion";
import { AbortedError, toError } from "./errors";
import { Logger } from "./logger";
import { RunReporter } from "./reporter";
import {
  ExitHandler,
  OutputSink,
  PatchOutcome,
  QueueOrder,
  RunStats,
  RunSummary,
  RunnerEvent,
  StagingStore,
} from "./types";

export const DEFAULT_FAILURE_EXIT_STATUS = 1;

export interface PendingRequest {
  assertion: Assertion;
  reply: (outcome: PatchOutcome) => void;
  insertion: number;
}

export interface CoordinatorOptions {
  output: OutputSink;
  reporter?: RunReporter;
  exit?: ExitHandler;
  queueOrder?: QueueOrder;
  failureExitStatus?: number;
  logger?: Logger;
}

export const processExit: ExitHandler = {
  fail(status: number): void {
    process.exitCode = status;
  },
};

export function emptyStats(): RunStats {
  return { new: 0, updated: 0, skipped: 0, rejected: 0, failed: 0 };
}

export class Coordinator {
  private queue: PendingRequest[] = [];
  private activeGroup: string | null = null;
  private finishedGroups = new Set<string>();
  private stats: RunStats = emptyStats();
  private notSaved = new Set<string>();
  private buffered: string[] = [];
  private insertions = 0;
  private patchSeq = 0;
  private draining = false;
  private inFlight = false;
  private suiteDone = false;
  private closed = false;
  private summary: RunSummary | undefined;
  private summaryWaiters: Array<(summary: RunSummary) => void> = [];

  private readonly output: OutputSink;
  private readonly reporter: RunReporter;
  private readonly exit: ExitHandler;
  private readonly queueOrder: QueueOrder;
  private readonly failureExitStatus: number;
  private readonly logger: Logger;

  constructor(private readonly store: StagingStore, options: CoordinatorOptions) {
    this.output = options.output;
    this.reporter = options.reporter ?? new RunReporter(options.output);
    this.exit = options.exit ?? processExit;
    this.queueOrder = options.queueOrder ?? "lifo";
    this.failureExitStatus = options.failureExitStatus ?? DEFAULT_FAILURE_EXIT_STATUS;
    this.logger = options.logger ?? new Logger("warn", false);
  }

  /**
   * Register an assertion. New assertions always wait for a decision; update
   * assertions only when a forced update is requested, otherwise they come
   * straight back unmodified for the caller's own comparison.
   */
  register(assertion: Assertion): Promise<PatchOutcome> {
    if (assertion.stage === "update" && !assertion.options.forceUpdate) {
      return Promise.resolve({ ok: true, value: assertion });
    }
    return this.enqueue(assertion);
  }

  /**
   * Request a patch regardless of stage
   */
  requestPatch(assertion: Assertion): Promise<PatchOutcome> {
    return this.enqueue(assertion);
  }

  notify(event: RunnerEvent): void {
    switch (event.type) {
      case "testStarted":
        this.logger.debug("Test started", { testId: event.testId });
        break;
      case "groupFinished":
        this.finishedGroups.add(event.groupId);
        this.releaseGroup();
        break;
      case "suiteFinished":
        this.suiteDone = true;
        this.activeGroup = null;
        this.flushOutput();
        break;
    }
    this.schedule();
  }

  /**
   * Side-channel output from the test runner
   */
  write(chunk: string): void {
    if (this.activeGroup !== null || this.inFlight) {
      this.buffered.push(chunk);
      return;
    }
    this.output.write(chunk);
  }

  /**
   * Resolves once the suite has finished and the staged edits were committed
   */
  finished(): Promise<RunSummary> {
    if (this.summary) {
      return Promise.resolve(this.summary);
    }
    return new Promise((resolve) => {
      this.summaryWaiters.push(resolve);
    });
  }

  /**
   * Fail every queued request and refuse new ones. A decision already in
   * flight is left to complete.
   */
  abort(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const pending = this.queue;
    this.queue = [];
    for (const request of pending) {
      this.settle(request, { ok: false, error: { kind: "failed", cause: new AbortedError(reason) } });
    }
    this.logger.warn("Run aborted", { reason, abandoned: pending.length });
    this.flushOutput();
    this.exit.fail(this.failureExitStatus);
    this.publish({ stats: this.getStats(), notSaved: Array.from(this.notSaved).sort(), failed: true });
  }

  getStats(): RunStats {
    return { ...this.stats };
  }

  getActiveGroup(): string | null {
    return this.activeGroup;
  }

  pendingCount(): number {
    return this.queue.length;
  }

  private enqueue(assertion: Assertion): Promise<PatchOutcome> {
    return new Promise((reply) => {
      const request: PendingRequest = { assertion, reply, insertion: ++this.insertions };
      if (this.closed) {
        const cause = new AbortedError(`Run already finished; ${assertion.location()} was not reconciled`);
        this.settle(request, { ok: false, error: { kind: "failed", cause } });
        return;
      }
      this.queue.push(request);
      this.logger.debug("Queued assertion", { key: assertion.key(), queued: this.queue.length });
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.draining) {
      return;
    }
    this.draining = true;
    this.drain().catch((error: unknown) => {
      this.draining = false;
      this.logger.error("Coordinator stopped draining", { error: String(error) });
    });
  }

  private async drain(): Promise<void> {
    for (;;) {
      const next = this.takeNext();
      if (next) {
        await this.process(next);
        continue;
      }
      if (this.suiteDone && !this.closed && this.queue.length === 0) {
        this.finish();
        continue;
      }
      break;
    }
    this.draining = false;
  }

  private takeNext(): PendingRequest | undefined {
    const eligible = (request: PendingRequest): boolean =>
      this.suiteDone || this.activeGroup === null || request.assertion.context.groupId === this.activeGroup;

    const index = this.queueOrder === "fifo" ? this.queue.findIndex(eligible) : findLastIndex(this.queue, eligible);
    if (index < 0) {
      return undefined;
    }
    const [request] = this.queue.splice(index, 1);
    return request;
  }

  private async process(request: PendingRequest): Promise<void> {
    const { assertion } = request;
    const seq = ++this.patchSeq;
    this.inFlight = true;

    let outcome: PatchOutcome;
    try {
      outcome = await this.logger.withContext(
        { group: assertion.context.groupId, test: assertion.context.testName, file: assertion.context.file },
        () => this.store.patch(assertion, seq)
      );
    } catch (error) {
      outcome = { ok: false, error: { kind: "failed", cause: toError(error) } };
    } finally {
      this.inFlight = false;
    }

    if (!this.suiteDone) {
      this.activeGroup = assertion.context.groupId;
    }
    this.settle(request, outcome);
    this.releaseGroup();
  }

  private settle(request: PendingRequest, outcome: PatchOutcome): void {
    const { assertion } = request;

    if (outcome.ok) {
      if (assertion.stage === "new") {
        this.stats.new += 1;
      } else {
        this.stats.updated += 1;
      }
    } else {
      switch (outcome.error.kind) {
        case "skipped":
          this.stats.skipped += 1;
          break;
        case "rejected":
          this.stats.rejected += 1;
          break;
        case "fileChanged":
          this.stats.skipped += 1;
          this.notSaved.add(outcome.error.file);
          break;
        case "failed":
          this.stats.failed += 1;
          this.logger.warn("Assertion could not be reconciled", {
            key: assertion.key(),
            error: outcome.error.cause.message,
          });
          break;
      }
    }

    this.logger.debug("Resolved assertion", {
      key: assertion.key(),
      outcome: outcome.ok ? "ok" : outcome.error.kind,
    });
    request.reply(outcome);
  }

  /**
   * Unset the active group once it has finished and nothing of it is queued
   */
  private releaseGroup(): void {
    const group = this.activeGroup;
    if (group === null || !this.finishedGroups.has(group)) {
      return;
    }
    if (this.queue.some((request) => request.assertion.context.groupId === group)) {
      return;
    }
    this.activeGroup = null;
    this.flushOutput();
  }

  private flushOutput(): void {
    if (this.inFlight || this.buffered.length === 0) {
      return;
    }
    const output = this.buffered.join("");
    this.buffered = [];
    if (output !== "") {
      this.output.write(output);
    }
  }

  private finish(): void {
    this.closed = true;

    let committed = true;
    try {
      const result = this.store.finalize();
      if (!result.ok) {
        result.notSaved.forEach((file) => this.notSaved.add(file));
      }
    } catch (error) {
      committed = false;
      this.logger.error("Failed to commit staged edits", { error: String(error) });
    }

    this.flushOutput();
    const notSaved = Array.from(this.notSaved).sort();
    const failed = !committed || notSaved.length > 0 || this.stats.skipped > 0;

    this.reporter.summary(this.stats);
    if (notSaved.length > 0) {
      this.reporter.notSaved(notSaved);
    }
    if (failed) {
      this.exit.fail(this.failureExitStatus);
    }

    this.publish({ stats: this.getStats(), notSaved, failed });
  }

  private publish(summary: RunSummary): void {
    this.summary = summary;
    const waiters = this.summaryWaiters;
    this.summaryWaiters = [];
    for (const waiter of waiters) {
      waiter(summary);
    }
  }
}

function findLastIndex<T>(items: T[], predicate: (item: T) => boolean): number {
  for (let index = items.length - 1; index >= 0; index -= 1) {
    if (predicate(items[index])) {
      return index;
    }
  }
  return -1;
}
