export type {
  ProblemKind,
  Problem,
  ExceptionEntry,
  OverstrictException,
  ToleranceFn,
  ToleranceFns,
  Thresholds,
  FunctionMetric,
} from "./problem.js";

export type {
  PractrackerConfig,
  SourcesConfig,
  ResolvedConfig,
} from "./config.js";

export type {
  ReconcileResult,
  OverstrictLine,
  CheckReport,
} from "./report.js";

export type {
  CheckOptions,
  RegenOptions,
} from "./cli-options.js";

export type { LogCategory, DebugLogger } from "./logger.js";
