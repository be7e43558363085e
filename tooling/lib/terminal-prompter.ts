/**
 * Terminal prompter
 * Shows the call-site diff and reads the operator's decision from a line of input
 */

import chalk from "chalk";
import * as readline from "node:readline";
import { relative } from "node:path";
import { formatDiff } from "./diff";
import { AssertionMetadata, Decision, DiffLineKind, DiffView, Prompter } from "./types";

export interface TerminalPrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  palette?: chalk.Chalk;
  cwd?: string;
  /** Treat the streams as a TTY; defaults to whether the output is one */
  terminal?: boolean;
  /** Called on Ctrl-C; defaults to raising SIGINT on the process */
  onInterrupt?: () => void;
}

const ANSWERS: Record<string, Decision> = {
  y: "accept",
  yes: "accept",
  n: "reject",
  no: "reject",
  s: "skip",
  skip: "skip",
  k: "next",
  ">": "next",
  j: "prev",
  "<": "prev",
};

export function parseAnswer(answer: string): Decision | undefined {
  return ANSWERS[answer.trim().toLowerCase()];
}

function diffColor(palette: chalk.Chalk, kind: DiffLineKind): chalk.Chalk {
  switch (kind) {
    case "ins":
      return palette.green;
    case "del":
      return palette.red;
    case "eq":
      return palette.dim;
  }
}

/**
 * The block printed before asking for a decision
 */
export function renderPromptView(
  view: DiffView,
  metadata: AssertionMetadata,
  palette: chalk.Chalk,
  cwd: string
): string {
  const prefix = palette.gray("│ ");
  const stage = metadata.stage === "new" ? palette.green("New") : palette.yellow("Changed");
  const lines: string[] = [
    `${stage}${palette.gray(" • autoAssert")}`,
    palette.gray(`${relative(cwd, metadata.file) || metadata.file}:${metadata.line}`),
    palette.gray(`${metadata.groupId} › ${metadata.testName}`),
  ];

  if (metadata.candidateCount > 1) {
    lines.push(palette.gray(`pattern ${metadata.candidateIndex + 1} of ${metadata.candidateCount}`));
  }
  if (metadata.history.length > 0) {
    lines.push(palette.gray(`history: ${metadata.history.join(" → ")}`));
  }

  lines.push("");
  lines.push(...formatDiff(view.lines, undefined, (kind, text) => diffColor(palette, kind)(text)).split("\n"));

  return "\n" + lines.map((line) => prefix + line).join("\n") + "\n";
}

export function renderQuestion(metadata: AssertionMetadata, palette: chalk.Chalk): string {
  const question =
    metadata.stage === "new"
      ? `Accept ${palette.green("new")} assertion?`
      : `${palette.yellow("Value has changed!")} Update to new value?`;
  const controls = ["y/n", "s skip"];
  if (metadata.candidateCount > 1) {
    controls.push("j/k prev/next pattern");
  }
  return `${palette.gray("│ ")}${question} ${palette.gray(`[${controls.join(", ")}]`)} `;
}

export class TerminalPrompter implements Prompter {
  private rl: readline.Interface;
  private output: NodeJS.WritableStream;
  private palette: chalk.Chalk;
  private cwd: string;
  private closed = false;

  constructor(options: TerminalPrompterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.palette = options.palette ?? chalk;
    this.cwd = options.cwd ?? process.cwd();
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      terminal: options.terminal,
    });
    this.rl.on("close", () => {
      this.closed = true;
    });

    // raw mode turns Ctrl-C into a keypress, so no signal reaches the process
    const onInterrupt = options.onInterrupt ?? ((): void => {
      process.kill(process.pid, "SIGINT");
    });
    this.rl.on("SIGINT", () => {
      this.close();
      onInterrupt();
    });
  }

  async prompt(view: DiffView, metadata: AssertionMetadata): Promise<Decision> {
    this.output.write(renderPromptView(view, metadata, this.palette, this.cwd));
    const question = renderQuestion(metadata, this.palette);

    for (;;) {
      const answer = await this.ask(question);
      if (answer === undefined) {
        return "skip";
      }
      const decision = parseAnswer(answer);
      if (decision && (metadata.candidateCount > 1 || (decision !== "next" && decision !== "prev"))) {
        return decision;
      }
      this.output.write(this.palette.gray("│ ") + this.palette.red(`Unrecognised answer "${answer}"`) + "\n");
    }
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  /**
   * Resolves with the answered line, or undefined once input has closed
   */
  private ask(question: string): Promise<string | undefined> {
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const onClose = (): void => resolve(undefined);
      this.rl.once("close", onClose);
      this.rl.question(question, (answer) => {
        this.rl.off("close", onClose);
        resolve(answer);
      });
    });
  }
}
