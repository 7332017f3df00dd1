import type { ProblemKind, Thresholds, ToleranceFns } from "../types/index.js";

export const MAX_FILE_SIZE = 3000; // lines
export const MAX_FUNCTION_SIZE = 100; // lines
export const MAX_INCLUDE_COUNT = 50;

export const THRESHOLDS: Thresholds = {
  "file-size": MAX_FILE_SIZE,
  "function-size": MAX_FUNCTION_SIZE,
  "include-count": MAX_INCLUDE_COUNT,
};

function inflateBy(ratio: number) {
  return (n: number): number => Math.floor(n * ratio);
}

// raise a ledger entry's ceiling so only materially worse regressions count as new
export const TOLERANCE_FNS: ToleranceFns = {
  "file-size": inflateBy(1.02),
  "function-size": inflateBy(1.1),
  "include-count": inflateBy(1.1),
};

export const PROBLEM_KINDS: readonly ProblemKind[] = ["file-size", "function-size", "include-count"];

export function isProblemKind(value: string): value is ProblemKind {
  return PROBLEM_KINDS.some((kind) => kind === value);
}
