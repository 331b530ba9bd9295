/**
 * Run log for reload operations.
 *
 * In --reload mode the trace goes to a log file; in --test mode it goes to the
 * console. Debug entries are dropped unless --debug is set.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import chalk from "chalk";
import { LogFileError } from "./errors.js";

export const DEFAULT_LOG_FILE = "/var/log/quagga/quagga-reload.log";

export type LogLevel = "debug" | "info" | "error";

export interface ReloadLog {
  /** Resolves once entries can be written; rejects with LogFileError otherwise */
  open(): Promise<void>;
  debug(msg: string): void;
  info(msg: string): void;
  error(msg: string): void;
  /** Resolves once every entry has been written */
  flush(): Promise<void>;
}

/**
 * One log line: `2025-01-25T10:30:45.123Z  INFO: message`.
 */
export function formatLogLine(level: LogLevel, msg: string, now: Date = new Date()): string {
  return `${now.toISOString()} ${level.toUpperCase().padStart(5)}: ${msg}`;
}

/**
 * Appends entries to a file in order. open() creates the directory and the
 * file up front. Writes are chained; the first failure is rethrown from flush().
 */
export class FileLog implements ReloadLog {
  private pending: Promise<void> = Promise.resolve();
  private failure: Error | null = null;

  constructor(
    readonly path: string,
    private readonly verbose: boolean
  ) {}

  async open(): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, "", "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LogFileError(`Cannot write log file ${this.path}: ${reason}`, this.path);
    }
  }

  debug(msg: string): void {
    if (this.verbose) this.write("debug", msg);
  }

  info(msg: string): void {
    this.write("info", msg);
  }

  error(msg: string): void {
    this.write("error", msg);
  }

  async flush(): Promise<void> {
    await this.pending;
    if (this.failure) {
      throw this.failure;
    }
  }

  private write(level: LogLevel, msg: string): void {
    const line = formatLogLine(level, msg) + "\n";
    this.pending = this.pending.then(async () => {
      if (this.failure) return;
      try {
        await appendFile(this.path, line, "utf-8");
      } catch (err) {
        this.failure = err instanceof Error ? err : new Error(String(err));
      }
    });
  }
}

/**
 * Writes entries to stderr so they never mix with the diff on stdout.
 */
export class ConsoleLog implements ReloadLog {
  constructor(private readonly verbose: boolean) {}

  async open(): Promise<void> {}

  debug(msg: string): void {
    if (this.verbose) {
      console.error(chalk.dim(formatLogLine("debug", msg)));
    }
  }

  info(msg: string): void {
    if (this.verbose) {
      console.error(formatLogLine("info", msg));
    }
  }

  error(msg: string): void {
    console.error(chalk.red(formatLogLine("error", msg)));
  }

  async flush(): Promise<void> {}
}
