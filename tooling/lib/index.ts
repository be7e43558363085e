/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./utils";
export * from "./logger";
export * from "./assertion";
export * from "./serializer";
export * from "./diff";
export * from "./call-site";
export * from "./call-location";
export * from "./staging-store";
export * from "./terminal-prompter";
export * from "./reporter";
export * from "./coordinator";
export * from "./suite-runner";
