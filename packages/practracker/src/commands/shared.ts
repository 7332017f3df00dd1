import { ConfigError, LedgerParseError } from "../core/errors.js";

// status for usage, config and ledger errors
export const EXIT_ERROR = 2;
// the largest status a process can report; larger counts would wrap around
export const MAX_EXIT_STATUS = 255;

export function exitStatusFor(newIssueCount: number): number {
  return Math.min(newIssueCount, MAX_EXIT_STATUS);
}

export function warn(message: string): void {
  console.error(`practracker: warning: ${message}`);
}

/**
 * Print an expected failure (bad config, corrupt ledger) and return the
 * error status. Anything else is rethrown for the CLI entrypoint.
 */
export function reportSetupError(err: unknown): number {
  if (err instanceof LedgerParseError) {
    console.error(`Error: invalid exceptions file: ${err.message}`);
    return EXIT_ERROR;
  }
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
    return EXIT_ERROR;
  }
  throw err;
}
