// primary public API
export { heuristicExtractor, getFileLength, getIncludeCount, getFunctionLines } from "./core/metrics.js";
export type { MetricsExtractor } from "./core/metrics.js";

export {
  fileSizeProblem,
  functionSizeProblem,
  includeCountProblem,
  problemKey,
  compareProblems,
  formatProblem,
} from "./core/problem.js";

export { ExceptionLedger } from "./core/ledger.js";
export type { LedgerOptions } from "./core/ledger.js";

export { Reconciler } from "./core/reconciler.js";
export type { ReconcilerOptions } from "./core/reconciler.js";

export { serializeLedger, writeLedgerAtomic } from "./core/regen.js";
export { THRESHOLDS, TOLERANCE_FNS } from "./core/thresholds.js";
export { LedgerParseError, ConfigError } from "./core/errors.js";
export { discoverSourceFiles } from "./core/discovery.js";
export { resolveConfig } from "./core/config.js";
export { createLogger } from "./core/logger.js";

// primary types
export type {
  ProblemKind,
  Problem,
  ExceptionEntry,
  OverstrictException,
  ToleranceFns,
  Thresholds,
  FunctionMetric,
  ReconcileResult,
  CheckReport,
  PractrackerConfig,
  DebugLogger,
} from "./types/index.js";
