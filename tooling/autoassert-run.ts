import { join, resolve } from "node:path";
import { GroupDefinition, isGroupDefinition } from "../src/suite";
import { CallSiteRewriter } from "./lib/call-site";
import { ConfigManager } from "./lib/config";
import { Coordinator, processExit } from "./lib/coordinator";
import { Logger } from "./lib/logger";
import { RunReporter } from "./lib/reporter";
import { PatchStagingStore } from "./lib/staging-store";
import { SuiteRunner } from "./lib/suite-runner";
import { TerminalPrompter } from "./lib/terminal-prompter";

const PROJECT_ROOT = process.cwd();
const DEFAULT_SUITE = join(__dirname, "..", "examples", "basics.suite");

function collectGroups(exported: unknown, file: string): GroupDefinition[] {
  const candidates: unknown[] = [];
  if (typeof exported === "object" && exported !== null) {
    if ("default" in exported) candidates.push(exported.default);
    if ("groups" in exported) candidates.push(exported.groups);
  }

  const groups: GroupDefinition[] = [];
  for (const candidate of candidates) {
    const items = Array.isArray(candidate) ? candidate : [candidate];
    groups.push(...items.filter(isGroupDefinition));
  }

  if (groups.length === 0) {
    throw new Error(`${file} exports no group definitions (expected a default or "groups" export)`);
  }
  return groups;
}

function loadSuite(file: string): GroupDefinition[] {
  const path = resolve(PROJECT_ROOT, file);
  const exported: unknown = require(path);
  return collectGroups(exported, path);
}

async function main(): Promise<void> {
  const configManager = new ConfigManager(PROJECT_ROOT);
  const loadedEnv = configManager.loadEnvFiles();

  const logger = new Logger(configManager.getLogLevel());
  logger.pushContext({ phase: "run", component: "autoassert" });
  if (loadedEnv.length > 0) {
    logger.debug("Loaded env files", { files: loadedEnv });
  }

  const baseOptions = configManager.getAssertionOptions();
  const terminal: { prompter?: TerminalPrompter } = {};
  const interrupt = (): void => {
    coordinator.abort("Interrupted");
    terminal.prompter?.close();
    process.exit(configManager.getFailureExitStatus());
  };

  // group and test options may still ask for a prompt when the base action does not
  const createPrompter = (): TerminalPrompter => {
    if (!process.stdin.isTTY) {
      logger.warn("stdin is not a terminal, reading decisions from piped input");
    }
    const prompter = new TerminalPrompter({ onInterrupt: interrupt });
    terminal.prompter = prompter;
    return prompter;
  };

  const store = new PatchStagingStore({
    rewriter: new CallSiteRewriter(configManager.getCalleeNames()),
    createPrompter,
    dryRun: configManager.isDryRun(),
    logger,
  });
  const coordinator = new Coordinator(store, {
    output: process.stdout,
    reporter: new RunReporter(process.stdout),
    exit: processExit,
    queueOrder: configManager.getQueueOrder(),
    failureExitStatus: configManager.getFailureExitStatus(),
    logger,
  });

  process.once("SIGINT", interrupt);

  const files = process.argv.slice(2);
  const groups = (files.length > 0 ? files : [DEFAULT_SUITE]).flatMap(loadSuite);

  try {
    const result = await new SuiteRunner(coordinator, { baseOptions, logger }).run(groups);
    if (result.failed > 0) {
      process.exitCode = configManager.getFailureExitStatus();
    }
    console.log(`\n${result.passed} passed, ${result.failed} failed`);
    logger.debug("Run finished", { ...result.summary.stats, notSaved: result.summary.notSaved });
  } finally {
    terminal.prompter?.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
