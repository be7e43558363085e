/**
 * Line diff between the current and the proposed call-site source
 */

import { diffLines } from "diff";
import { DiffLine, DiffLineKind, DiffView } from "./types";

export type DiffGutters = Record<DiffLineKind, string>;

export const DEFAULT_GUTTERS: DiffGutters = { eq: "   ", ins: "  +", del: "  -" };

export function diffSource(before: string, after: string): DiffLine[] {
  const lines: DiffLine[] = [];

  for (const change of diffLines(before, after)) {
    const kind: DiffLineKind = change.added ? "ins" : change.removed ? "del" : "eq";
    const parts = change.value.split(/\r?\n/);
    if (parts[parts.length - 1] === "") {
      parts.pop();
    }
    for (const text of parts) {
      lines.push({ kind, text });
    }
  }

  return lines;
}

export function buildDiffView(original: string, proposed: string): DiffView {
  return { original, proposed, lines: diffSource(original, proposed) };
}

/**
 * Render diff lines with a gutter per kind, optionally decorating each line
 */
export function formatDiff(
  lines: DiffLine[],
  gutters: DiffGutters = DEFAULT_GUTTERS,
  decorate: (kind: DiffLineKind, text: string) => string = (_kind, text) => text
): string {
  return lines.map((line) => decorate(line.kind, `${gutters[line.kind]} ${line.text}`)).join("\n");
}
