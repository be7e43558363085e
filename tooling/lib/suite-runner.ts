/**
 * Suite runner
 * Runs every test of every group concurrently and reports lifecycle events to the coordinator
 */

import { createAutoAssert } from "../../src/autoAssert";
import { GroupDefinition, TestDefinition } from "../../src/suite";
import { DEFAULT_ASSERTION_OPTIONS, resolveOptions } from "./assertion";
import { Coordinator } from "./coordinator";
import { toError } from "./errors";
import { Logger } from "./logger";
import { AssertionOptions, CallLocation, PatternGenerator, RunSummary } from "./types";

export interface SuiteRunnerOptions {
  baseOptions?: AssertionOptions;
  generator?: PatternGenerator;
  locate?: (callee: (...args: never[]) => unknown) => CallLocation;
  logger?: Logger;
}

export type TestResult = {
  groupId: string;
  testName: string;
  error?: Error;
};

export type SuiteResult = {
  passed: number;
  failed: number;
  results: TestResult[];
  summary: RunSummary;
};

export function renderTestResult(result: TestResult): string {
  const title = `${result.groupId} › ${result.testName}`;
  if (!result.error) {
    return `  ✓ ${title}\n`;
  }
  return `  ✗ ${title}\n      ${result.error.name}: ${result.error.message.split("\n").join("\n      ")}\n`;
}

export class SuiteRunner {
  private baseOptions: AssertionOptions;
  private logger: Logger;

  constructor(private readonly coordinator: Coordinator, private readonly options: SuiteRunnerOptions = {}) {
    this.baseOptions = options.baseOptions ?? DEFAULT_ASSERTION_OPTIONS;
    this.logger = options.logger ?? new Logger("warn", false);
  }

  async run(groups: GroupDefinition[]): Promise<SuiteResult> {
    const ids = new Set<string>();
    for (const group of groups) {
      if (ids.has(group.id)) {
        throw new Error(`Duplicate group "${group.id}"`);
      }
      ids.add(group.id);
    }

    this.logger.startTimer("suite");
    const settled = await Promise.all(groups.map((group) => this.runGroup(group)));
    this.coordinator.notify({ type: "suiteFinished" });
    const summary = await this.coordinator.finished();
    this.logger.endTimer("suite", "Suite finished", "info");

    const results = settled.flat();
    const failed = results.filter((result) => result.error !== undefined).length;
    return { passed: results.length - failed, failed, results, summary };
  }

  private async runGroup(group: GroupDefinition): Promise<TestResult[]> {
    const results = await Promise.all(group.tests.map((test) => this.runTest(group, test)));
    this.coordinator.notify({ type: "groupFinished", groupId: group.id });
    return results;
  }

  private async runTest(group: GroupDefinition, test: TestDefinition): Promise<TestResult> {
    this.coordinator.notify({ type: "testStarted", testId: `${group.id} › ${test.name}` });

    const options = resolveOptions(this.baseOptions, group.options ?? {}, test.options ?? {});
    const autoAssert = createAutoAssert(
      this.coordinator,
      { groupId: group.id, testName: test.name, options },
      { generator: this.options.generator, locate: this.options.locate }
    );

    let result: TestResult;
    try {
      await test.body({ groupId: group.id, testName: test.name, autoAssert });
      result = { groupId: group.id, testName: test.name };
    } catch (error) {
      result = { groupId: group.id, testName: test.name, error: toError(error) };
      this.logger.debug("Test failed", { test: test.name, error: result.error?.message });
    }

    this.coordinator.write(renderTestResult(result));
    return result;
  }
}
