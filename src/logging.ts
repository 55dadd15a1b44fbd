// =============================================================================
// Logging: Structured pipeline event logging
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  jobId?: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  /** Logger whose entries carry the given job id. */
  forJob(jobId: string): Logger;
}

export interface LoggerOptions {
  /** Custom sink (defaults to a console line writer) */
  sink?: LogSink;
  /** Entries below this level are dropped (default: "info") */
  minLevel?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function consoleSink(entry: LogEntry): void {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
  const job = entry.jobId ? ` job=${entry.jobId}` : "";
  const line = `${prefix}${job} ${entry.event}`;
  // eslint-disable-next-line no-console
  const write = entry.level === "error" ? console.error : entry.level === "warn" ? console.warn : console.log;
  write(line, entry.data ?? "");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[options.minLevel ?? "info"];

  function build(jobId?: string): Logger {
    const emit = (level: LogLevel, event: string, data?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      sink({ timestamp: Date.now(), level, event, jobId, data });
    };

    return {
      debug: (event, data) => emit("debug", event, data),
      info: (event, data) => emit("info", event, data),
      warn: (event, data) => emit("warn", event, data),
      error: (event, data) => emit("error", event, data),
      forJob: (id) => build(id),
    };
  }

  return build();
}

/** Drops everything. Default for library consumers that pass no logger. */
export const silentLogger: Logger = createLogger({ sink: () => undefined });
