/**
 * Configuration loading, environment overrides and path expansion
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse as parseEnv } from "dotenv";
import { resolveOptions, DEFAULT_ASSERTION_OPTIONS } from "./assertion";
import { DEFAULT_CALLEE_NAMES } from "./call-site";
import { DEFAULT_FAILURE_EXIT_STATUS } from "./coordinator";
import { isLogLevel, LogLevel } from "./logger";
import { Action, AssertionOptions, Config, PatternChoice, QueueOrder } from "./types";
import { isPlainObject } from "./utils";

export const CONFIG_FILE_NAME = "autoassert.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const ACTIONS: readonly Action[] = ["prompt", "accept", "reject"];
const PATTERN_CHOICES: readonly PatternChoice[] = ["first", "last"];
const QUEUE_ORDERS: readonly QueueOrder[] = ["lifo", "fifo"];

function oneOf<T extends string>(values: readonly T[], value: unknown): T | undefined {
  return values.find((candidate) => candidate === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Keep the recognised fields of a parsed config file, dropping anything malformed
 */
export function parseConfig(raw: unknown): Config {
  if (!isPlainObject(raw)) {
    return {};
  }

  const config: Config = {};
  if (isStringArray(raw.envSearchPaths)) config.envSearchPaths = raw.envSearchPaths;
  const action = oneOf(ACTIONS, raw.action);
  if (action) config.action = action;
  const defaultPattern = oneOf(PATTERN_CHOICES, raw.defaultPattern);
  if (defaultPattern) config.defaultPattern = defaultPattern;
  if (typeof raw.forceUpdate === "boolean") config.forceUpdate = raw.forceUpdate;
  if (typeof raw.dryRun === "boolean") config.dryRun = raw.dryRun;
  const queueOrder = oneOf(QUEUE_ORDERS, raw.queueOrder);
  if (queueOrder) config.queueOrder = queueOrder;
  if (Number.isInteger(raw.failureExitStatus) && typeof raw.failureExitStatus === "number") {
    config.failureExitStatus = raw.failureExitStatus;
  }
  if (isStringArray(raw.calleeNames) && raw.calleeNames.length > 0) config.calleeNames = raw.calleeNames;
  if (isLogLevel(raw.logLevel)) config.logLevel = raw.logLevel;
  return config;
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes"].includes(value.toLowerCase());
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;
  private env: NodeJS.ProcessEnv;

  constructor(
    projectRoot: string,
    configPath: string = join(projectRoot, CONFIG_FILE_NAME),
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.projectRoot = projectRoot;
    this.env = env;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return {};
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(configPath, "utf8"));
      return parseConfig(raw);
    } catch {
      return {};
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing env file into the environment, never overriding variables already set
   */
  loadEnvFiles(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!expanded || !existsSync(expanded)) {
        continue;
      }
      const parsed = parseEnv(readFileSync(expanded, "utf8"));
      for (const [key, value] of Object.entries(parsed)) {
        if (this.env[key] === undefined) {
          this.env[key] = value;
        }
      }
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getAction(): Action {
    const fromEnv = oneOf(ACTIONS, this.env.AUTOASSERT_ACTION);
    if (fromEnv) return fromEnv;
    if (this.config.action) return this.config.action;
    return envFlag(this.env.CI) ? "reject" : DEFAULT_ASSERTION_OPTIONS.action;
  }

  getDefaultPattern(): PatternChoice {
    return this.config.defaultPattern ?? DEFAULT_ASSERTION_OPTIONS.defaultPattern;
  }

  isForceUpdate(): boolean {
    return envFlag(this.env.AUTOASSERT_FORCE_UPDATE) ?? this.config.forceUpdate ?? false;
  }

  isDryRun(): boolean {
    return envFlag(this.env.AUTOASSERT_DRY_RUN) ?? this.config.dryRun ?? false;
  }

  getQueueOrder(): QueueOrder {
    return this.config.queueOrder ?? "lifo";
  }

  getFailureExitStatus(): number {
    return this.config.failureExitStatus ?? DEFAULT_FAILURE_EXIT_STATUS;
  }

  getCalleeNames(): string[] {
    return this.config.calleeNames ?? [...DEFAULT_CALLEE_NAMES];
  }

  getLogLevel(): LogLevel {
    const fromEnv = this.env.AUTOASSERT_LOG_LEVEL;
    if (isLogLevel(fromEnv)) return fromEnv;
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  /**
   * Run-wide assertion options, before group and test overrides
   */
  getAssertionOptions(): AssertionOptions {
    return resolveOptions(DEFAULT_ASSERTION_OPTIONS, {
      action: this.getAction(),
      defaultPattern: this.getDefaultPattern(),
      forceUpdate: this.isForceUpdate(),
    });
  }

  getConfig(): Config {
    return this.config;
  }
}
