/**
 * Structured logging for the reconciliation run
 * Keeps every entry in memory and optionally echoes to the console
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  phase?: string;
  component?: string;
  group?: string;
  test?: string;
  file?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private context: LogContext = {};
  private timerStack: Map<string, number> = new Map();
  private shouldLog: boolean;

  constructor(level: LogLevel = "warn", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Merge context into all subsequent logs
   */
  pushContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Drop the given context keys
   */
  popContext(keys: (keyof LogContext)[]): void {
    keys.forEach((key) => {
      delete this.context[key];
    });
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Run a callback with extra context, restoring the previous context afterwards
   */
  async withContext<T>(context: Partial<LogContext>, fn: () => Promise<T>): Promise<T> {
    const previous = this.context;
    this.context = { ...previous, ...context };
    try {
      return await fn();
    } finally {
      this.context = previous;
    }
  }

  startTimer(name: string): void {
    this.timerStack.set(name, Date.now());
  }

  /**
   * End a timer and log its duration
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timerStack.get(name);
    if (start === undefined) {
      this.log("warn", `Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timerStack.delete(name);
    this.log(level, message, { duration });
    return duration;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };

    this.entries.push(entry);

    if (this.shouldLog) {
      this.consoleLog(level, formatLogEntry(entry));
    }
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForFile(file: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.file === file);
  }

  /**
   * Get entries at or above a level
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LOG_LEVELS.indexOf(level);
    return this.entries.filter((entry) => LOG_LEVELS.indexOf(entry.level) >= index);
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Render an entry as `[phase] <component> group › test: message` plus a data line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];
  const context = entry.context;
  if (context?.phase) parts.push(`[${context.phase}]`);
  if (context?.component) parts.push(`<${context.component}>`);
  if (context?.group && context.test) {
    parts.push(`${context.group} › ${context.test}`);
  } else if (context?.group) {
    parts.push(context.group);
  }
  const prefix = parts.length > 0 ? parts.join(" ") + ": " : "";

  let result = prefix + entry.message;
  if (entry.data) {
    result += "\n  " + formatData(entry.data);
  }
  return result;
}

function formatData(data: Record<string, unknown>): string {
  const parts: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (key === "duration" && typeof value === "number") {
      parts.push(`${key}: ${value}ms`);
    } else if (Array.isArray(value)) {
      parts.push(`${key}: [${value.length} items]`);
    } else if (typeof value === "object" && value !== null) {
      parts.push(`${key}: ${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}: ${String(value)}`);
    }
  }

  return parts.join(", ");
}
