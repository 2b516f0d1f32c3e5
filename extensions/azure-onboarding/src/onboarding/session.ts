/**
 * Run session: the log sink owned by one onboarding run.
 *
 * Opens the console output and the transcript file for the run, and closes
 * the transcript on every exit path, fatal errors included.
 */

import path from "node:path";
import {
  ConsoleTransport,
  FileTransport,
  OnboardingLoggerImpl,
  type LogLevel,
  type LogTransport,
  type OnboardingLogger,
} from "../logging/logger.js";

export type RunSessionOptions = {
  /** Transcript name prefix, e.g. `ClientA-Developer`. */
  label: string;
  logDir: string;
  level?: LogLevel;
  console?: boolean;
  transcript?: boolean;
  /** Extra transports, e.g. a memory transport in tests. */
  transports?: LogTransport[];
  now?: () => Date;
};

export type RunSession = {
  logger: OnboardingLogger;
  transcriptPath?: string;
};

export function transcriptFileName(label: string, at: Date): string {
  return `${label}-${at.toISOString().replace(/[:.]/g, "-")}.log`;
}

export async function withRunSession<T>(
  options: RunSessionOptions,
  fn: (session: RunSession) => Promise<T>,
): Promise<T> {
  const transports: LogTransport[] = [...(options.transports ?? [])];
  if (options.console ?? true) transports.push(new ConsoleTransport());

  let transcript: FileTransport | undefined;
  if (options.transcript ?? true) {
    const at = (options.now ?? (() => new Date()))();
    transcript = new FileTransport({ filePath: path.join(options.logDir, transcriptFileName(options.label, at)) });
    transports.push(transcript);
  }

  const logger = new OnboardingLoggerImpl({ subsystem: "onboarding", level: options.level, transports });
  try {
    return await fn({ logger, transcriptPath: transcript?.filePath });
  } catch (error) {
    logger.error(`Run aborted: ${error instanceof Error ? error.message : String(error)}`);
    throw error;
  } finally {
    await transcript?.close();
  }
}
