export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  OnboardingLoggerImpl,
  createDefaultFormatter,
  createSilentLogger,
  shouldLog,
} from "./logger.js";
export type {
  LogContext,
  LogEntry,
  LogFormatter,
  LogLevel,
  LogTransport,
  OnboardingLogger,
} from "./logger.js";
