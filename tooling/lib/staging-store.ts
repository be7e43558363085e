/**
 * Patch Staging Store
 * Holds accepted edits per file in memory, detects files that changed on disk
 * underneath them, and writes every file once when the run is finalized.
 */

import { chmodSync, existsSync, readFileSync, realpathSync, renameSync, statSync, unlinkSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { Assertion } from "./assertion";
import { CallSite, CallSiteRewriter } from "./call-site";
import { buildDiffView } from "./diff";
import { CallSiteConflictError } from "./errors";
import { Logger } from "./logger";
import { Decision, FinalizeResult, PatchOutcome, Prompter, StagingStore } from "./types";
import { detectEol, hashText } from "./utils";

export type StagedStatus = "pending" | "committed" | "conflicted";

export interface StagedReplacement {
  seq: number;
  /** Key of the assertion the edit was accepted for */
  owner: string;
  start: number;
  end: number;
  text: string;
}

export interface StagedFile {
  path: string;
  baselineText: string;
  baselineFingerprint: string;
  eol: "\n" | "\r\n";
  edits: Map<number, StagedReplacement>;
  status: StagedStatus;
  reported: boolean;
}

export interface PatchStagingStoreOptions {
  rewriter?: CallSiteRewriter;
  prompter?: Prompter;
  /** Builds the prompter the first time an assertion resolves to "prompt" */
  createPrompter?: () => Prompter;
  dryRun?: boolean;
  logger?: Logger;
}

type Resolution = { kind: "accept"; index: number } | { kind: "reject" } | { kind: "skip" };

export class PatchStagingStore implements StagingStore {
  private files = new Map<string, StagedFile>();
  private rewriter: CallSiteRewriter;
  private prompter: Prompter | undefined;
  private createPrompter: (() => Prompter) | undefined;
  private dryRun: boolean;
  private logger: Logger;

  constructor(options: PatchStagingStoreOptions = {}) {
    this.rewriter = options.rewriter ?? new CallSiteRewriter();
    this.prompter = options.prompter;
    this.createPrompter = options.createPrompter;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? new Logger("warn", false);
  }

  async patch(assertion: Assertion, seq: number): Promise<PatchOutcome> {
    const file = this.stageFile(assertion.context.file);
    if (file.status === "conflicted") {
      this.logger.debug("File already conflicted, not prompting", { file: file.path, seq });
      return { ok: false, error: { kind: "fileChanged", file: file.path } };
    }

    const candidates = assertion.candidates;
    if (!candidates.ok) {
      throw candidates.error;
    }

    const { line, column } = assertion.context;
    const site = this.rewriter.locate(file.path, file.baselineText, line, column);
    const proposals = candidates.patterns.map((pattern) => this.rewriter.replacement(site, pattern, file.eol));

    const claimed = this.claimedEdit(file, site, assertion.key());
    if (claimed) {
      if (!proposals.includes(claimed.text)) {
        this.logger.warn("Call site already staged for another assertion", {
          file: file.path,
          seq,
          owner: claimed.owner,
        });
        const cause = new CallSiteConflictError(file.path, site.line, claimed.owner);
        return { ok: false, error: { kind: "failed", cause } };
      }
      assertion.regenerateCode(claimed.text);
      this.logger.debug("Call site already staged with the same text", { file: file.path, seq, owner: claimed.owner });
      return { ok: true, value: assertion };
    }

    const resolution = await this.resolve(assertion, site, proposals);

    switch (resolution.kind) {
      case "reject":
        return { ok: false, error: { kind: "rejected" } };
      case "skip":
        return { ok: false, error: { kind: "skipped" } };
      case "accept":
        break;
    }

    if (!this.baselineMatches(file)) {
      this.logger.warn("File changed on disk since staging began", { file: file.path, seq });
      this.markConflicted(file);
      return { ok: false, error: { kind: "fileChanged", file: file.path } };
    }

    const text = proposals[resolution.index];
    this.stageEdit(file, { seq, owner: assertion.key(), start: site.start, end: site.end, text });
    assertion.regenerateCode(text);
    this.logger.debug("Staged edit", { file: file.path, seq, line: site.line });
    return { ok: true, value: assertion };
  }

  finalize(): FinalizeResult {
    const notSaved: string[] = [];

    for (const file of this.files.values()) {
      if (file.status === "conflicted") {
        if (!file.reported) {
          file.reported = true;
          notSaved.push(file.path);
        }
        continue;
      }

      if (file.status !== "pending" || file.edits.size === 0) {
        continue;
      }

      if (!this.baselineMatches(file)) {
        this.logger.warn("File changed on disk before commit", { file: file.path });
        this.markConflicted(file);
        file.reported = true;
        notSaved.push(file.path);
        continue;
      }

      const text = applyReplacements(file.baselineText, Array.from(file.edits.values()));
      if (this.dryRun) {
        this.logger.info("Dry run, not writing", { file: file.path, edits: file.edits.size });
        file.edits.clear();
        file.status = "committed";
        continue;
      }

      try {
        writeAtomically(file.path, text);
      } catch (error) {
        this.logger.error("Failed to write file", { file: file.path, error: String(error) });
        this.markConflicted(file);
        file.reported = true;
        notSaved.push(file.path);
        continue;
      }

      this.logger.debug("Committed file", { file: file.path, edits: file.edits.size });
      file.baselineText = text;
      file.baselineFingerprint = hashText(text);
      file.edits.clear();
      file.status = "committed";
    }

    return notSaved.length === 0 ? { ok: true } : { ok: false, notSaved };
  }

  getStagedFile(path: string): StagedFile | undefined {
    return this.files.get(path);
  }

  private stageFile(path: string): StagedFile {
    const existing = this.files.get(path);
    if (existing) {
      return existing;
    }

    const baselineText = readFileSync(path, "utf8");
    const file: StagedFile = {
      path,
      baselineText,
      baselineFingerprint: hashText(baselineText),
      eol: detectEol(baselineText),
      edits: new Map(),
      status: "pending",
      reported: false,
    };
    this.files.set(path, file);
    return file;
  }

  /**
   * A staged edit over the same call made for a different assertion
   */
  private claimedEdit(file: StagedFile, site: CallSite, owner: string): StagedReplacement | undefined {
    for (const staged of file.edits.values()) {
      if (staged.owner !== owner && overlaps(staged, site)) {
        return staged;
      }
    }
    return undefined;
  }

  // a later edit of the same assertion replaces the earlier one
  private stageEdit(file: StagedFile, edit: StagedReplacement): void {
    for (const [seq, staged] of file.edits) {
      if (overlaps(staged, edit)) {
        file.edits.delete(seq);
      }
    }
    file.edits.set(edit.seq, edit);
    file.status = "pending";
  }

  private markConflicted(file: StagedFile): void {
    file.status = "conflicted";
    file.edits.clear();
  }

  private baselineMatches(file: StagedFile): boolean {
    if (!existsSync(file.path)) {
      return false;
    }
    return hashText(readFileSync(file.path, "utf8")) === file.baselineFingerprint;
  }

  private getPrompter(): Prompter | undefined {
    if (!this.prompter && this.createPrompter) {
      this.prompter = this.createPrompter();
      this.createPrompter = undefined;
    }
    return this.prompter;
  }

  private async resolve(assertion: Assertion, site: CallSite, proposals: string[]): Promise<Resolution> {
    const initial = assertion.options.defaultPattern === "last" ? proposals.length - 1 : 0;

    switch (assertion.options.action) {
      case "accept":
        return { kind: "accept", index: initial };
      case "reject":
        return { kind: "reject" };
      case "prompt":
        break;
    }

    const prompter = this.getPrompter();
    if (!prompter) {
      this.logger.warn("No prompter configured, skipping", { file: site.file, line: site.line });
      return { kind: "skip" };
    }

    const history: Decision[] = [];
    let index = initial;
    for (;;) {
      const view = buildDiffView(site.text, proposals[index]);
      const decision = await prompter.prompt(view, assertion.metadata(index, proposals.length, history));
      history.push(decision);

      switch (decision) {
        case "next":
          index = (index + 1) % proposals.length;
          break;
        case "prev":
          index = (index - 1 + proposals.length) % proposals.length;
          break;
        case "accept":
          return { kind: "accept", index };
        case "reject":
          return { kind: "reject" };
        case "skip":
          return { kind: "skip" };
      }
    }
  }
}

type Span = Pick<StagedReplacement, "start" | "end">;

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Apply non-overlapping replacements to `text`, working from the end backwards
 */
export function applyReplacements(text: string, replacements: Array<Span & { text: string }>): string {
  const ordered = [...replacements].sort((a, b) => b.start - a.start);
  let result = text;
  for (const replacement of ordered) {
    result = result.slice(0, replacement.start) + replacement.text + result.slice(replacement.end);
  }
  return result;
}

/**
 * Write through a temporary sibling of the resolved target and rename it over
 * the target. Symlinks stay in place and the target keeps its permission bits.
 */
export function writeAtomically(path: string, text: string): void {
  const target = realpathSync(path);
  const mode = statSync(target).mode & 0o7777;
  const temporary = join(dirname(target), `.${basename(target)}.${process.pid}.autoassert.tmp`);
  try {
    writeFileSync(temporary, text, "utf8");
    chmodSync(temporary, mode);
    renameSync(temporary, target);
  } catch (error) {
    if (existsSync(temporary)) {
      unlinkSync(temporary);
    }
    throw error;
  }
}
