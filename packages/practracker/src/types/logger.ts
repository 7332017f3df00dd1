/**
 * Log categories for debug logging
 */
export type LogCategory =
  | "config"
  | "discovery"
  | "ledger"
  | "scan"
  | "report";

/**
 * Debug logger interface
 */
export interface DebugLogger {
  log(category: LogCategory, message: string, data?: object): void;
}
