/**
 * Structured logging for catalog and execution events
 *
 * Lines look like `[ts] [LEVEL] [event] category/script message {details}`.
 * Only info lines go to stdout; the CLI prints command output there.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  script?: string;
  category?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

/**
 * Receives every entry that passes the level filter
 */
export type LogSink = (line: string, entry: LogEntry) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

/**
 * Threshold from the environment: SQLCATALOG_LOG_LEVEL, or debug when SQLCATALOG_DEBUG is set
 */
function levelFromEnv(): LogLevel {
  const configured = process.env.SQLCATALOG_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return process.env.SQLCATALOG_DEBUG ? "debug" : "info";
}

export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.script || entry.category) {
    parts.push(`${entry.category ?? ""}/${entry.script ?? ""}`);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

const consoleSink: LogSink = (line, entry) => {
  if (entry.level === "info") {
    console.log(line);
  } else {
    console.error(line);
  }
};

class Logger {
  #enabled = true;
  #level: LogLevel | undefined;
  #sink: LogSink = consoleSink;

  log(level: LogLevel, event: string, fields?: LogFields): void {
    if (!this.#enabled || LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const entry: LogEntry = {
      ...fields,
      timestamp: new Date().toISOString(),
      level,
      event,
    };
    this.#sink(formatLogEntry(entry), entry);
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  /** Explicit threshold; `undefined` goes back to the environment */
  setLevel(level: LogLevel | undefined): void {
    this.#level = level;
  }

  get level(): LogLevel {
    return this.#level ?? levelFromEnv();
  }

  /** Replace the output; `undefined` restores the console */
  setSink(sink: LogSink | undefined): void {
    this.#sink = sink ?? consoleSink;
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  get enabled(): boolean {
    return this.#enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
