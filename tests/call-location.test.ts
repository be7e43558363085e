import { describe, it, expect } from "@jest/globals";
import { captureCallLocation, parseStackFrame } from "../tooling/lib/call-location";

describe("parseStackFrame", () => {
  it("should read named frames", () => {
    expect(parseStackFrame("    at Object.<anonymous> (/work/tests/a.test.ts:12:9)")).toEqual({
      file: "/work/tests/a.test.ts",
      line: 12,
      column: 9,
    });
  });

  it("should read anonymous frames", () => {
    expect(parseStackFrame("    at /work/tests/b.test.ts:3:1")).toEqual({
      file: "/work/tests/b.test.ts",
      line: 3,
      column: 1,
    });
  });

  it("should convert file URLs to paths", () => {
    expect(parseStackFrame("    at run (file:///work/suite.mjs:4:2)")).toEqual({
      file: "/work/suite.mjs",
      line: 4,
      column: 2,
    });
  });

  it("should ignore runtime internals", () => {
    expect(parseStackFrame("    at node:internal/process/task_queues:95:5")).toBeUndefined();
    expect(parseStackFrame("    at new Promise (<anonymous>)")).toBeUndefined();
    expect(parseStackFrame("    at async Promise.all (index 0)")).toBeUndefined();
    expect(parseStackFrame("Error: message")).toBeUndefined();
  });
});

describe("captureCallLocation", () => {
  function helper() {
    return captureCallLocation(helper);
  }

  it("should report the caller of the given function", () => {
    const location = helper();

    expect(location.file).toBe(__filename);
    expect(location.line).toBeGreaterThan(0);
    expect(location.column).toBeGreaterThan(0);
  });
});
