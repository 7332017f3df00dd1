import type { ExceptionEntry, Problem, Thresholds } from "./problem.js";

export interface ReconcileResult {
  filesScanned: number;
  newProblems: Problem[];
  // over the recorded magnitude but within the tolerance-inflated ceiling
  toleratedProblems: Problem[];
  newIssueCount: number;
}

export interface OverstrictLine {
  entry: ExceptionEntry;
  observedMagnitude: number;
}

export interface CheckReport {
  version: string;
  timestamp: string;
  topdir: string;
  exceptionsPath: string;
  thresholds: Thresholds;
  toleranceApplied: boolean;
  result: ReconcileResult;
  overstrict?: OverstrictLine[];
}
