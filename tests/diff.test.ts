import { describe, it, expect } from "@jest/globals";
import { buildDiffView, diffSource, formatDiff, DEFAULT_GUTTERS } from "../tooling/lib/diff";
import { DiffLine } from "../tooling/lib/types";

const textsOf = (lines: DiffLine[], kind: DiffLine["kind"]): string[] =>
  lines.filter((line) => line.kind === kind).map((line) => line.text);

describe("diffSource", () => {
  it("should split changes into one entry per line", () => {
    const lines = diffSource("await autoAssert(total)", "await autoAssert(total, {\n  sum: 3,\n})");

    expect(textsOf(lines, "del")).toEqual(["await autoAssert(total)"]);
    expect(textsOf(lines, "ins")).toEqual(["await autoAssert(total, {", "  sum: 3,", "})"]);
    expect(textsOf(lines, "eq")).toEqual([]);
  });

  it("should keep unchanged lines as context", () => {
    const lines = diffSource("a\nb\nc\n", "a\nx\nc\n");

    expect(textsOf(lines, "eq")).toEqual(["a", "c"]);
    expect(textsOf(lines, "del")).toEqual(["b"]);
    expect(textsOf(lines, "ins")).toEqual(["x"]);
    expect(lines[0]).toEqual({ kind: "eq", text: "a" });
  });

  it("should strip CRLF line endings from the text", () => {
    const lines = diffSource("a\r\nb", "a\r\nc");

    expect(textsOf(lines, "eq")).toEqual(["a"]);
    expect(textsOf(lines, "del")).toEqual(["b"]);
    expect(textsOf(lines, "ins")).toEqual(["c"]);
  });

  it("should report identical text as context only", () => {
    expect(diffSource("same\n", "same\n")).toEqual([{ kind: "eq", text: "same" }]);
  });
});

describe("buildDiffView", () => {
  it("should keep both sides of the diff", () => {
    const view = buildDiffView("f(x)", "f(x, 1)");

    expect(view.original).toBe("f(x)");
    expect(view.proposed).toBe("f(x, 1)");
    expect(textsOf(view.lines, "ins")).toEqual(["f(x, 1)"]);
  });
});

describe("formatDiff", () => {
  const lines: DiffLine[] = [
    { kind: "eq", text: "x" },
    { kind: "ins", text: "y" },
    { kind: "del", text: "z" },
  ];

  it("should prefix each line with its gutter", () => {
    expect(formatDiff(lines)).toBe("    x\n  + y\n  - z");
  });

  it("should accept custom gutters and decoration", () => {
    const gutters = { ...DEFAULT_GUTTERS, ins: ">" };
    expect(formatDiff(lines, gutters, (kind, text) => `<${kind}>${text}`)).toBe(
      "<eq>    x\n<ins>> y\n<del>  - z"
    );
  });
});
