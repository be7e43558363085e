/**
 * ts-autoassert: Main entry point
 * Exports the assertion entry, the group DSL and the reconciliation engine
 */

export { createAutoAssert, AutoAssert, AssertionScope, AutoAssertDeps } from "./autoAssert";

export {
  defineGroup,
  isGroupDefinition,
  GroupDefinition,
  TestBody,
  TestContext,
  TestDefinition,
  TestRegistrar,
} from "./suite";

export { Coordinator, CoordinatorOptions } from "../tooling/lib/coordinator";
export { PatchStagingStore, PatchStagingStoreOptions } from "../tooling/lib/staging-store";
export { SuiteRunner, SuiteRunnerOptions, SuiteResult } from "../tooling/lib/suite-runner";
export { TerminalPrompter } from "../tooling/lib/terminal-prompter";
export { ValueSerializer } from "../tooling/lib/serializer";
export {
  AutoAssertError,
  ExpectationMismatchError,
  FileChangedError,
  MissingExpectationError,
} from "../tooling/lib/errors";
