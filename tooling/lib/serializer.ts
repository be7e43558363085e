/**
 * Value serializer
 * Turns a captured runtime value into candidate TypeScript expressions
 */

import { PatternError } from "./errors";
import { PatternGenerator } from "./types";
import { isPlainObject, isValidIdentifier } from "./utils";

export const DEFAULT_MAX_INLINE_WIDTH = 60;
const INDENT = "  ";

type Layout = "inline" | "block";

export class ValueSerializer implements PatternGenerator {
  constructor(private readonly maxInlineWidth: number = DEFAULT_MAX_INLINE_WIDTH) {}

  /**
   * Candidate expressions for a value, preferred candidate first
   */
  toPatterns(value: unknown): string[] {
    if (typeof value === "string" && value.includes("\n")) {
      const quoted = JSON.stringify(value);
      return value.includes("\r") ? [quoted] : unique([templateLiteral(value), quoted]);
    }

    const inline = render(value, "inline", "", new Set());
    if (!isCompound(value)) {
      return [inline];
    }

    const block = render(value, "block", "", new Set());
    return inline.length <= this.maxInlineWidth ? unique([inline, block]) : unique([block, inline]);
  }
}

function isCompound(value: unknown): boolean {
  return Array.isArray(value) || value instanceof Map || value instanceof Set || isPlainObject(value);
}

function unique(patterns: string[]): string[] {
  return Array.from(new Set(patterns));
}

function templateLiteral(value: string): string {
  const escaped = value.replace(/\\/g, "\\\\").replace(/`/g, "\\`").replace(/\$\{/g, "\\${");
  return "`" + escaped + "`";
}

function render(value: unknown, layout: Layout, indent: string, seen: Set<object>): string {
  switch (typeof value) {
    case "undefined":
      return "undefined";
    case "boolean":
      return String(value);
    case "number":
      return renderNumber(value);
    case "bigint":
      return `${value}n`;
    case "string":
      return JSON.stringify(value);
    case "symbol":
      throw new PatternError(`Cannot represent ${String(value)} as a literal`);
    case "function":
      throw new PatternError(`Cannot represent function ${value.name || "<anonymous>"} as a literal`);
  }

  if (value === null) {
    return "null";
  }

  if (typeof value !== "object") {
    throw new PatternError(`Cannot represent ${typeof value} as a literal`);
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "new Date(NaN)" : `new Date(${JSON.stringify(value.toISOString())})`;
  }

  if (value instanceof RegExp) {
    return String(value);
  }

  if (seen.has(value)) {
    throw new PatternError("Cannot represent a circular structure as a literal");
  }
  seen.add(value);

  const childIndent = layout === "block" ? indent + INDENT : indent;
  const child = (item: unknown): string => render(item, layout, childIndent, seen);

  try {
    if (Array.isArray(value)) {
      return sequence(Array.from(value, child), "[", "]", layout, indent);
    }

    if (value instanceof Map) {
      const entries = Array.from(value.entries(), ([key, item]) => `[${child(key)}, ${child(item)}]`);
      return `new Map(${sequence(entries, "[", "]", layout, indent)})`;
    }

    if (value instanceof Set) {
      return `new Set(${sequence(Array.from(value, child), "[", "]", layout, indent)})`;
    }

    if (isPlainObject(value)) {
      const record = value;
      const entries = Object.keys(record).map((key) => {
        const name = propertyName(key);
        return `${name}: ${child(record[key])}`;
      });
      return sequence(entries, "{", "}", layout, indent);
    }
  } finally {
    seen.delete(value);
  }

  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  const name = typeof ctor === "function" && ctor.name ? ctor.name : "object";
  throw new PatternError(`Cannot represent ${name} instance as a literal`);
}

function propertyName(key: string): string {
  // a literal __proto__ key sets the prototype instead of an own property
  if (key === "__proto__") {
    return `[${JSON.stringify(key)}]`;
  }
  return isValidIdentifier(key) ? key : JSON.stringify(key);
}

function renderNumber(value: number): string {
  if (Object.is(value, -0)) return "-0";
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  return String(value);
}

function sequence(items: string[], open: string, close: string, layout: Layout, indent: string): string {
  if (items.length === 0) {
    return open + close;
  }

  if (layout === "inline") {
    return open === "{" ? `{ ${items.join(", ")} }` : `${open}${items.join(", ")}${close}`;
  }

  const body = items.map((item) => `${indent}${INDENT}${item},`).join("\n");
  return `${open}\n${body}\n${indent}${close}`;
}
