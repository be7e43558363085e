import { isDeepStrictEqual } from "node:util";
import { Assertion } from "../tooling/lib/assertion";
import { captureCallLocation } from "../tooling/lib/call-location";
import { Coordinator } from "../tooling/lib/coordinator";
import { ExpectationMismatchError, FileChangedError, MissingExpectationError } from "../tooling/lib/errors";
import { ValueSerializer } from "../tooling/lib/serializer";
import { AssertionOptions, CallLocation, PatchError, PatternGenerator } from "../tooling/lib/types";

/**
 * `autoAssert(actual)` records a new expectation; `autoAssert(actual, expected)`
 * checks it and offers an update when it no longer matches. Resolves with `actual`.
 */
export type AutoAssert = <T>(...args: [actual: T] | [actual: T, expected: T]) => Promise<T>;

export type AssertionScope = {
  groupId: string;
  testName: string;
  options: AssertionOptions;
};

export type AutoAssertDeps = {
  generator?: PatternGenerator;
  locate?: (callee: AutoAssert) => CallLocation;
};

export function createAutoAssert(
  coordinator: Coordinator,
  scope: AssertionScope,
  deps: AutoAssertDeps = {}
): AutoAssert {
  const generator = deps.generator ?? new ValueSerializer();
  const locate = deps.locate ?? captureCallLocation;

  const autoAssert: AutoAssert = async function autoAssert<T>(
    ...args: [actual: T] | [actual: T, expected: T]
  ): Promise<T> {
    const location = locate(autoAssert);
    const actual = args[0];
    const context = { ...location, groupId: scope.groupId, testName: scope.testName };

    if (args.length === 1) {
      const assertion = Assertion.create({ stage: "new", value: actual, context, options: scope.options }, generator);
      const outcome = await coordinator.register(assertion);
      if (outcome.ok || outcome.error.kind === "skipped") {
        return actual;
      }
      throw toFailure(outcome.error, () => new MissingExpectationError(actual, assertion.location()));
    }

    const expected = args[1];
    const assertion = Assertion.create(
      { stage: "update", value: actual, expected, context, options: scope.options },
      generator
    );

    const registered = await coordinator.register(assertion);
    if (registered.ok && registered.value.code !== undefined) {
      return actual;
    }
    if (isDeepStrictEqual(actual, expected)) {
      return actual;
    }

    const outcome = registered.ok ? await coordinator.requestPatch(assertion) : registered;
    if (outcome.ok || outcome.error.kind === "skipped") {
      return actual;
    }
    throw toFailure(outcome.error, () => new ExpectationMismatchError(expected, actual, assertion.location()));
  };

  return autoAssert;
}

function toFailure(error: PatchError, onRejected: () => Error): Error {
  switch (error.kind) {
    case "rejected":
    case "skipped":
      return onRejected();
    case "fileChanged":
      return new FileChangedError(error.file);
    case "failed":
      return error.cause;
  }
}
