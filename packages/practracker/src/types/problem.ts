export type ProblemKind = "file-size" | "function-size" | "include-count";

export interface Problem {
  readonly kind: ProblemKind;
  // file path for file-size/include-count, `path:name()` for function-size
  readonly location: string;
  readonly magnitude: number;
}

export interface ExceptionEntry {
  readonly kind: ProblemKind;
  readonly location: string;
  // magnitude as written in the ledger file
  readonly recorded: number;
  // ceiling after tolerance inflation; equals `recorded` until tolerances are set
  allowed: number;
}

export interface OverstrictException {
  entry: ExceptionEntry;
  // undefined when the problem no longer exists
  observed?: Problem;
}

export type ToleranceFn = (magnitude: number) => number;
export type ToleranceFns = Partial<Record<ProblemKind, ToleranceFn>>;

export type Thresholds = Record<ProblemKind, number>;

export interface FunctionMetric {
  name: string;
  lines: number;
}
