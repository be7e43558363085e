import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { chmodSync, lstatSync, readFileSync, statSync, symlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { PatchStagingStore, applyReplacements, writeAtomically } from "../tooling/lib/staging-store";
import { CallSiteConflictError, CallSiteNotFoundError } from "../tooling/lib/errors";
import { Logger } from "../tooling/lib/logger";
import { ScriptedPrompter, TempProject, createTempProject, failingGenerator, makeAssertion } from "./fixtures/assertions";

const SOURCE = 'const total = 3;\nautoAssert(total);\nautoAssert("name");\n';

describe("PatchStagingStore", () => {
  let project: TempProject;
  let file: string;

  beforeEach(() => {
    project = createTempProject();
    file = project.write("sample.test.ts", SOURCE);
  });

  afterEach(() => {
    project.cleanup();
  });

  describe("patch", () => {
    it("should stage an accepted edit without touching the file", async () => {
      const store = new PatchStagingStore();
      const assertion = makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } });

      const outcome = await store.patch(assertion, 1);

      expect(outcome).toEqual({ ok: true, value: assertion });
      expect(assertion.code).toBe("autoAssert(total, 3)");
      expect(readFileSync(file, "utf8")).toBe(SOURCE);
      expect(store.getStagedFile(file)?.edits.size).toBe(1);
    });

    it("should reject without staging", async () => {
      const store = new PatchStagingStore();
      const outcome = await store.patch(makeAssertion({ file, line: 2, options: { action: "reject" } }), 1);

      expect(outcome).toEqual({ ok: false, error: { kind: "rejected" } });
      expect(store.getStagedFile(file)?.edits.size).toBe(0);
    });

    it("should skip prompts when no prompter is configured", async () => {
      const store = new PatchStagingStore();
      const outcome = await store.patch(makeAssertion({ file, line: 2 }), 1);

      expect(outcome).toEqual({ ok: false, error: { kind: "skipped" } });
    });

    it("should navigate between candidates before accepting", async () => {
      const prompter = new ScriptedPrompter(["next", "accept"]);
      const store = new PatchStagingStore({ prompter });
      const assertion = makeAssertion({ file, line: 2, value: [1, 2] });

      await store.patch(assertion, 1);

      expect(prompter.calls).toHaveLength(2);
      expect(prompter.calls[0].view.original).toBe("autoAssert(total)");
      expect(prompter.calls[0].view.proposed).toBe("autoAssert(total, [1, 2])");
      expect(prompter.calls[0].metadata.candidateIndex).toBe(0);
      expect(prompter.calls[1].metadata.candidateIndex).toBe(1);
      expect(prompter.calls[1].metadata.candidateCount).toBe(2);
      expect(prompter.calls[1].metadata.history).toEqual(["next"]);
      expect(assertion.code).toBe("autoAssert(total, [\n  1,\n  2,\n])");
    });

    it("should wrap around when navigating backwards", async () => {
      const prompter = new ScriptedPrompter(["prev", "accept"]);
      const store = new PatchStagingStore({ prompter });
      const assertion = makeAssertion({ file, line: 2, value: [1, 2] });

      await store.patch(assertion, 1);

      expect(prompter.calls[1].metadata.candidateIndex).toBe(1);
      expect(assertion.code).toBe("autoAssert(total, [\n  1,\n  2,\n])");
    });

    it("should start from the last candidate when configured", async () => {
      const store = new PatchStagingStore();
      const assertion = makeAssertion({
        file,
        line: 2,
        value: { a: 1 },
        options: { action: "accept", defaultPattern: "last" },
      });

      await store.patch(assertion, 1);

      expect(assertion.code).toBe("autoAssert(total, {\n  a: 1,\n})");
    });

    it("should pass skip and reject decisions through", async () => {
      const store = new PatchStagingStore({ prompter: new ScriptedPrompter(["skip", "reject"]) });

      expect(await store.patch(makeAssertion({ file, line: 2 }), 1)).toEqual({ ok: false, error: { kind: "skipped" } });
      expect(await store.patch(makeAssertion({ file, line: 3 }), 2)).toEqual({ ok: false, error: { kind: "rejected" } });
    });

    it("should build the prompter only once an assertion needs it", async () => {
      const prompter = new ScriptedPrompter(["accept", "accept"]);
      let built = 0;
      const store = new PatchStagingStore({
        createPrompter: () => {
          built += 1;
          return prompter;
        },
      });

      await store.patch(makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } }), 1);
      expect(built).toBe(0);

      await store.patch(makeAssertion({ file, line: 3, value: "name" }), 2);
      await store.patch(makeAssertion({ file, line: 3, value: "other" }), 3);

      expect(built).toBe(1);
      expect(prompter.calls).toHaveLength(2);
    });

    it("should surface generator and location failures", async () => {
      const store = new PatchStagingStore();

      await expect(store.patch(makeAssertion({ file, line: 2 }, failingGenerator), 1)).rejects.toThrow(
        "generator exploded"
      );
      await expect(store.patch(makeAssertion({ file, line: 1, options: { action: "accept" } }), 2)).rejects.toThrow(
        CallSiteNotFoundError
      );
    });
  });

  describe("finalize", () => {
    it("should write every staged edit of a file at once", async () => {
      const store = new PatchStagingStore();
      await store.patch(makeAssertion({ file, line: 3, value: "name", options: { action: "accept" } }), 1);
      await store.patch(makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } }), 2);

      expect(store.finalize()).toEqual({ ok: true });
      expect(readFileSync(file, "utf8")).toBe('const total = 3;\nautoAssert(total, 3);\nautoAssert("name", "name");\n');
      expect(store.getStagedFile(file)?.status).toBe("committed");
    });

    it("should keep only the latest edit of the same call", async () => {
      const store = new PatchStagingStore();
      await store.patch(makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } }), 1);
      await store.patch(makeAssertion({ file, line: 2, value: 4, options: { action: "accept" } }), 2);

      store.finalize();

      expect(readFileSync(file, "utf8")).toBe('const total = 3;\nautoAssert(total, 4);\nautoAssert("name");\n');
    });

    it("should rewrite each of two calls sharing a line", async () => {
      const shared = project.write("shared.test.ts", "autoAssert(a); autoAssert(b);\n");
      const store = new PatchStagingStore();
      await store.patch(makeAssertion({ file: shared, line: 1, column: 16, value: 2, options: { action: "accept" } }), 1);
      await store.patch(makeAssertion({ file: shared, line: 1, column: 1, value: 1, options: { action: "accept" } }), 2);

      expect(store.finalize()).toEqual({ ok: true });
      expect(readFileSync(shared, "utf8")).toBe("autoAssert(a, 1); autoAssert(b, 2);\n");
    });

    it("should reuse an edit staged by another test for the same value", async () => {
      const prompter = new ScriptedPrompter([]);
      const store = new PatchStagingStore({ prompter });
      await store.patch(
        makeAssertion({ file, line: 2, value: 3, testName: "first", options: { action: "accept" } }),
        1
      );

      const second = makeAssertion({ file, line: 2, value: 3, testName: "second" });
      const outcome = await store.patch(second, 2);

      expect(outcome).toEqual({ ok: true, value: second });
      expect(second.code).toBe("autoAssert(total, 3)");
      expect(prompter.calls).toHaveLength(0);
      expect(store.getStagedFile(file)?.edits.size).toBe(1);
    });

    it("should fail a second test asking for a different value at the same call", async () => {
      const store = new PatchStagingStore();
      await store.patch(
        makeAssertion({ file, line: 2, value: 3, testName: "first", options: { action: "accept" } }),
        1
      );

      const outcome = await store.patch(
        makeAssertion({ file, line: 2, value: 4, testName: "second", options: { action: "accept" } }),
        2
      );

      expect(outcome.ok).toBe(false);
      if (outcome.ok || outcome.error.kind !== "failed") {
        throw new Error("expected a failed outcome");
      }
      expect(outcome.error.cause).toBeInstanceOf(CallSiteConflictError);
      expect(outcome.error.cause.message).toBe(
        `${file}:2 already has a staged edit from ${file}:2:group:first with a different expected value`
      );

      store.finalize();
      expect(readFileSync(file, "utf8")).toBe('const total = 3;\nautoAssert(total, 3);\nautoAssert("name");\n');
    });

    it("should do nothing on a second finalize", async () => {
      const store = new PatchStagingStore();
      await store.patch(makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } }), 1);
      store.finalize();
      const written = readFileSync(file, "utf8");

      expect(store.finalize()).toEqual({ ok: true });
      expect(readFileSync(file, "utf8")).toBe(written);
    });

    it("should preserve CRLF line endings", async () => {
      const crlf = project.write("crlf.test.ts", "const total = 3;\r\nautoAssert(total);\r\n");
      const store = new PatchStagingStore();
      await store.patch(
        makeAssertion({ file: crlf, line: 2, value: { a: 1 }, options: { action: "accept", defaultPattern: "last" } }),
        1
      );

      store.finalize();

      expect(readFileSync(crlf, "utf8")).toBe("const total = 3;\r\nautoAssert(total, {\r\n  a: 1,\r\n});\r\n");
    });

    it("should not write anything in dry-run mode", async () => {
      const logger = new Logger("info", false);
      const store = new PatchStagingStore({ dryRun: true, logger });
      await store.patch(makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } }), 1);

      expect(store.finalize()).toEqual({ ok: true });
      expect(readFileSync(file, "utf8")).toBe(SOURCE);
      expect(logger.getEntries().map((entry) => entry.message)).toEqual(["Dry run, not writing"]);
    });
  });

  describe("conflicts", () => {
    const EDITED = "// edited by hand\n" + SOURCE;

    it("should refuse an accepted edit once the file changed on disk", async () => {
      const prompter = new ScriptedPrompter(["accept", "accept"]);
      const store = new PatchStagingStore({ prompter });
      await store.patch(makeAssertion({ file, line: 2, value: 3 }), 1);
      writeFileSync(file, EDITED, "utf8");

      const outcome = await store.patch(makeAssertion({ file, line: 3, value: "name" }), 2);

      expect(outcome).toEqual({ ok: false, error: { kind: "fileChanged", file } });
      expect(store.getStagedFile(file)?.status).toBe("conflicted");
      expect(store.getStagedFile(file)?.edits.size).toBe(0);
    });

    it("should answer later requests for a conflicted file without prompting", async () => {
      const prompter = new ScriptedPrompter(["accept", "accept", "accept"]);
      const store = new PatchStagingStore({ prompter });
      await store.patch(makeAssertion({ file, line: 2, value: 3 }), 1);
      writeFileSync(file, EDITED, "utf8");
      await store.patch(makeAssertion({ file, line: 3, value: "name" }), 2);

      const outcome = await store.patch(makeAssertion({ file, line: 2, value: 5 }), 3);

      expect(outcome).toEqual({ ok: false, error: { kind: "fileChanged", file } });
      expect(prompter.calls).toHaveLength(2);
    });

    it("should report a conflicted file once and never overwrite it", async () => {
      const store = new PatchStagingStore({ prompter: new ScriptedPrompter(["accept", "accept"]) });
      await store.patch(makeAssertion({ file, line: 2, value: 3 }), 1);
      writeFileSync(file, EDITED, "utf8");
      await store.patch(makeAssertion({ file, line: 3, value: "name" }), 2);

      expect(store.finalize()).toEqual({ ok: false, notSaved: [file] });
      expect(store.finalize()).toEqual({ ok: true });
      expect(readFileSync(file, "utf8")).toBe(EDITED);
    });

    it("should detect changes made between staging and finalize", async () => {
      const store = new PatchStagingStore();
      await store.patch(makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } }), 1);
      writeFileSync(file, EDITED, "utf8");

      expect(store.finalize()).toEqual({ ok: false, notSaved: [file] });
      expect(readFileSync(file, "utf8")).toBe(EDITED);
    });

    it("should leave other files intact", async () => {
      const other = project.write("other.test.ts", "autoAssert(1);\n");
      const store = new PatchStagingStore();
      await store.patch(makeAssertion({ file, line: 2, value: 3, options: { action: "accept" } }), 1);
      await store.patch(makeAssertion({ file: other, line: 1, value: 1, options: { action: "accept" } }), 2);
      writeFileSync(file, EDITED, "utf8");

      expect(store.finalize()).toEqual({ ok: false, notSaved: [file] });
      expect(readFileSync(other, "utf8")).toBe("autoAssert(1, 1);\n");
    });
  });
});

describe("writeAtomically", () => {
  let project: TempProject;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it("should keep the permission bits of the file", () => {
    const script = project.write("run.ts", "old\n");
    chmodSync(script, 0o750);

    writeAtomically(script, "new\n");

    expect(statSync(script).mode & 0o777).toBe(0o750);
    expect(readFileSync(script, "utf8")).toBe("new\n");
  });

  it("should write through a symlink without replacing it", () => {
    const target = project.write("target.ts", "old\n");
    const link = join(project.root, "link.ts");
    symlinkSync(target, link);

    writeAtomically(link, "new\n");

    expect(lstatSync(link).isSymbolicLink()).toBe(true);
    expect(readFileSync(target, "utf8")).toBe("new\n");
  });
});

describe("applyReplacements", () => {
  it("should apply replacements regardless of their order", () => {
    const text = "abcdef";
    expect(
      applyReplacements(text, [
        { start: 0, end: 1, text: "A" },
        { start: 4, end: 6, text: "EF!" },
        { start: 2, end: 2, text: "+" },
      ])
    ).toBe("Ab+cdEF!");
  });
});
