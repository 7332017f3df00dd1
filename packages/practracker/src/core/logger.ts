/**
 * Debug logger - structured logging for scan and ledger debugging
 * Writes JSON lines to a rotatable log file
 */

import * as fs from "node:fs";
import * as path from "node:path";

import type { DebugLogger, LogCategory } from "../types/index.js";

interface LoggerConfig {
  categories: LogCategory[] | null; // null = all categories
  logFile: string;
  maxFileSize: number;
}

export const DEBUG_LOG_ENV = "PRACTRACKER_DEBUG_LOG";

export class FileDebugLogger implements DebugLogger {
  private config: LoggerConfig;
  private broken = false;

  constructor(logFile: string, categories?: LogCategory[], maxFileSize = 1024 * 1024) {
    this.config = {
      categories: categories?.length ? categories : null,
      logFile: path.resolve(logFile),
      maxFileSize,
    };
  }

  log(category: LogCategory, message: string, data?: object): void {
    if (this.broken) return;
    if (this.config.categories && !this.config.categories.includes(category)) return;

    const entry = JSON.stringify({
      ...data, // spread first so reserved keys take precedence
      t: new Date().toISOString(),
      cat: category,
      msg: message,
    });

    this.write(entry + "\n");
  }

  private write(line: string): void {
    try {
      fs.mkdirSync(path.dirname(this.config.logFile), { recursive: true });
      this.rotateIfNeeded();
      fs.appendFileSync(this.config.logFile, line);
    } catch (err: unknown) {
      // a failing debug log must not fail the check itself
      this.broken = true;
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`practracker: debug log disabled (${msg})`);
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.config.logFile)) return;
    const stats = fs.statSync(this.config.logFile);
    if (stats.size <= this.config.maxFileSize) return;

    const backup = this.config.logFile + ".1";
    fs.rmSync(backup, { force: true });
    fs.renameSync(this.config.logFile, backup);
  }
}

/**
 * No-op logger for when logging is disabled
 */
class NoopLogger implements DebugLogger {
  log(): void {
    // intentionally empty
  }
}

/**
 * Create a debug logger; falls back to $PRACTRACKER_DEBUG_LOG, and to a
 * no-op logger when neither names a file.
 */
export function createLogger(logFile?: string): DebugLogger {
  const target = logFile ?? process.env[DEBUG_LOG_ENV];
  if (!target) {
    return new NoopLogger();
  }
  return new FileDebugLogger(target);
}

export function createNoopLogger(): DebugLogger {
  return new NoopLogger();
}
