/**
 * Onboarding Logger
 *
 * Structured, leveled logging with subsystem names, run context and
 * pluggable transports. The file transport doubles as the run transcript.
 */

import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import path from "node:path";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  jobId?: string;
  metadata?: Record<string, unknown>;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

export type LogContext = {
  jobId?: string;
  [key: string]: unknown;
};

export interface OnboardingLogger {
  readonly subsystem: string;

  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;

  child(name: string): OnboardingLogger;
  withContext(context: LogContext): OnboardingLogger;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
};

export function createDefaultFormatter(options?: { colors?: boolean; timestamps?: boolean }): LogFormatter {
  const { colors = process.stdout.isTTY ?? false, timestamps = true } = options ?? {};
  const paint = (color: string, s: string) => (colors ? `${color}${s}${COLORS.reset}` : s);

  return (entry) => {
    const parts: string[] = [];
    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);
    if (entry.jobId) parts.push(paint(COLORS.dim, `(job=${entry.jobId})`));
    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }
    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    const formatted = this.formatter(entry);
    if (entry.level === "error") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/**
 * Appends formatted entries to a file. The stream opens lazily on the first
 * write; `close()` resolves once everything written has reached the file.
 */
/**
 * Appends formatted entries to a file, opened on first write. A failure to
 * open or write the file stops further writes and is reported by `close()`.
 */
export class FileTransport implements LogTransport {
  name = "file";
  readonly filePath: string;
  private formatter: LogFormatter;
  private stream: WriteStream | null = null;
  private failure: Error | null = null;

  constructor(options: { filePath: string; formatter?: LogFormatter }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createDefaultFormatter({ colors: false, timestamps: true });
  }

  write(entry: LogEntry): void {
    if (this.failure) return;
    try {
      this.stream ??= this.open();
      this.stream.write(`${this.formatter(entry)}\n`);
    } catch (error) {
      this.fail(error);
    }
  }

  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (this.failure) {
      stream?.destroy();
      return Promise.reject(this.failure);
    }
    if (!stream) return Promise.resolve();
    return new Promise((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  private open(): WriteStream {
    mkdirSync(path.dirname(this.filePath), { recursive: true });
    const stream = createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (error) => this.fail(error));
    return stream;
  }

  private fail(error: unknown): void {
    this.failure ??= error instanceof Error ? error : new Error(String(error));
  }
}

/** Keeps entries in memory; used by tests and for post-run inspection. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class OnboardingLoggerImpl implements OnboardingLogger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  child(name: string): OnboardingLogger {
    return new OnboardingLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): OnboardingLogger {
    return new OnboardingLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const { jobId, ...rest } = this.context;
    const metadata = { ...rest, ...meta };
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      jobId,
      metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createSilentLogger(): OnboardingLogger {
  return new OnboardingLoggerImpl({ subsystem: "onboarding", transports: [] });
}
