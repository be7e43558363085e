import { AutoAssert } from "./autoAssert";
import { AssertionOptions } from "../tooling/lib/types";

export type TestContext = {
  groupId: string;
  testName: string;
  autoAssert: AutoAssert;
};

export type TestBody = (context: TestContext) => unknown;

export type TestDefinition = {
  name: string;
  body: TestBody;
  options?: Partial<AssertionOptions>;
};

export type GroupDefinition = {
  id: string;
  tests: TestDefinition[];
  options?: Partial<AssertionOptions>;
};

export type TestRegistrar = (name: string, body: TestBody, options?: Partial<AssertionOptions>) => void;

/**
 * Collect a group of tests. Tests in different groups may run concurrently;
 * decisions for one group are resolved before another group's.
 */
export function defineGroup(
  id: string,
  build: (test: TestRegistrar) => void,
  options?: Partial<AssertionOptions>
): GroupDefinition {
  const tests: TestDefinition[] = [];
  const names = new Set<string>();

  build((name, body, testOptions) => {
    if (names.has(name)) {
      throw new Error(`Duplicate test "${name}" in group "${id}"`);
    }
    names.add(name);
    tests.push({ name, body, options: testOptions });
  });

  return { id, tests, options };
}

export function isGroupDefinition(value: unknown): value is GroupDefinition {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "tests" in value &&
    Array.isArray(value.tests)
  );
}
