/**
 * End-of-run report: counts per outcome and the files that could not be saved
 */

import chalk from "chalk";
import { relative } from "node:path";
import { OutputSink, RunStats } from "./types";

export const REPORT_PREFIX = "[autoassert] ";

type StatKey = keyof RunStats;

const STAT_ORDER: StatKey[] = ["new", "updated", "rejected", "skipped", "failed"];

const plain = new chalk.Instance({ level: 0 });

function statColor(palette: chalk.Chalk, stat: StatKey): chalk.Chalk {
  switch (stat) {
    case "new":
    case "updated":
      return palette.green;
    case "rejected":
    case "failed":
      return palette.red;
    case "skipped":
      return palette.yellow;
  }
}

/**
 * "2 new, 1 updated, 3 skipped"; zero counts are left out. Undefined when every count is zero.
 */
export function renderSummary(stats: RunStats, palette: chalk.Chalk = plain): string | undefined {
  const parts = STAT_ORDER.filter((stat) => stats[stat] !== 0).map((stat) =>
    statColor(palette, stat)(`${stats[stat]} ${stat}`)
  );
  return parts.length > 0 ? parts.join(", ") : undefined;
}

export function renderNotSaved(files: string[], cwd: string, palette: chalk.Chalk = plain): string {
  const lines = [
    "The following files could not be saved. Their content may have changed.",
    "",
    ...files.map((file) => `  * ${relative(cwd, file) || file}`),
    "",
    "You may need to run these tests again.",
  ];
  return palette.red(REPORT_PREFIX + lines.join("\n"));
}

export class RunReporter {
  constructor(
    private readonly output: OutputSink,
    private readonly palette: chalk.Chalk = chalk,
    private readonly cwd: string = process.cwd()
  ) {}

  summary(stats: RunStats): void {
    const rendered = renderSummary(stats, this.palette);
    if (rendered !== undefined) {
      this.output.write(`\n\n${REPORT_PREFIX}${rendered}\n`);
    }
  }

  notSaved(files: string[]): void {
    this.output.write(`\n${renderNotSaved(files, this.cwd, this.palette)}\n`);
  }
}
