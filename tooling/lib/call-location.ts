/**
 * Resolve the source location of a call from a V8 stack trace
 */

import { fileURLToPath } from "node:url";
import { CallLocation } from "./types";

const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Parse one "    at fn (file:line:column)" stack line
 */
export function parseStackFrame(frame: string): CallLocation | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) {
    return undefined;
  }

  const [, rawFile, line, column] = match;
  if (rawFile.startsWith("node:") || rawFile === "native" || rawFile.startsWith("<anonymous>")) {
    return undefined;
  }

  const file = rawFile.startsWith("file://") ? fileURLToPath(rawFile) : rawFile;
  return { file, line: Number(line), column: Number(column) };
}

/**
 * Location of whoever called `callee`
 */
export function captureCallLocation(callee: (...args: never[]) => unknown): CallLocation {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, callee);

  const frames = (holder.stack ?? "").split("\n").slice(1);
  for (const frame of frames) {
    const location = parseStackFrame(frame);
    if (location) {
      return location;
    }
  }
  throw new Error("Could not determine the call location from the stack trace");
}
