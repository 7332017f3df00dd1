import * as fs from "node:fs";
import * as path from "node:path";

import { createNoopLogger } from "./logger.js";
import { heuristicExtractor } from "./metrics.js";
import { fileSizeProblem, functionSizeProblem, includeCountProblem } from "./problem.js";
import { THRESHOLDS, TOLERANCE_FNS } from "./thresholds.js";

import type { ExceptionLedger } from "./ledger.js";
import type { MetricsExtractor } from "./metrics.js";
import type {
  DebugLogger,
  FunctionMetric,
  Problem,
  ReconcileResult,
  Thresholds,
  ToleranceFns,
} from "../types/index.js";

export interface ReconcilerOptions {
  // inflate ledger ceilings before scanning; off for regeneration and over-strict listing
  applyTolerance: boolean;
  // every regression is an error, tolerance or not
  strict: boolean;
  extractor?: MetricsExtractor;
  thresholds?: Thresholds;
  tolerances?: ToleranceFns;
  logger?: DebugLogger;
}

// one entry per function name; a name seen twice in a file keeps its largest span
function collapseByName(metrics: FunctionMetric[]): FunctionMetric[] {
  const byName = new Map<string, number>();
  for (const { name, lines } of metrics) {
    byName.set(name, Math.max(lines, byName.get(name) ?? 0));
  }
  return [...byName].map(([name, lines]) => ({ name, lines }));
}

/**
 * Measures source files and registers every threshold violation with the
 * ledger it was constructed with, counting the ones that are new.
 */
export class Reconciler {
  private readonly extractor: MetricsExtractor;
  private readonly thresholds: Thresholds;
  private readonly logger: DebugLogger;
  private readonly newProblems: Problem[] = [];
  private readonly toleratedProblems: Problem[] = [];
  private filesScanned = 0;

  constructor(
    private readonly ledger: ExceptionLedger,
    readonly options: ReconcilerOptions,
  ) {
    this.extractor = options.extractor ?? heuristicExtractor;
    this.thresholds = options.thresholds ?? THRESHOLDS;
    this.logger = options.logger ?? createNoopLogger();

    if (options.applyTolerance && !options.strict) {
      ledger.setTolerances(options.tolerances ?? TOLERANCE_FNS);
    }
  }

  get toleranceApplied(): boolean {
    return this.options.applyTolerance && !this.options.strict;
  }

  private consider(p: Problem): number {
    if (this.ledger.registerProblem(p)) {
      this.newProblems.push(p);
      return 1;
    }
    if (this.ledger.isToleratedRegression(p)) {
      this.toleratedProblems.push(p);
    }
    return 0;
  }

  /**
   * Measure one file's text and register its violations. `location` is the
   * path problems are reported under. Returns the number of new problems.
   */
  considerSource(location: string, source: string): number {
    let found = 0;

    const fileLength = this.extractor.fileLength(source);
    if (fileLength > this.thresholds["file-size"]) {
      found += this.consider(fileSizeProblem(location, fileLength));
    }

    const includeCount = this.extractor.includeCount(source);
    if (includeCount > this.thresholds["include-count"]) {
      found += this.consider(includeCountProblem(location, includeCount));
    }

    for (const { name, lines } of collapseByName(this.extractor.functionLines(source))) {
      if (lines <= this.thresholds["function-size"]) continue;
      found += this.consider(functionSizeProblem(location, name, lines));
    }

    this.filesScanned++;
    this.logger.log("scan", "file measured", { location, fileLength, includeCount, found });
    return found;
  }

  /**
   * Read and measure each file in turn. Paths are relative to `topdir` and
   * become the problem locations. A file that cannot be read aborts the run.
   */
  considerFiles(topdir: string, relativePaths: string[]): number {
    let found = 0;
    for (const relativePath of relativePaths) {
      const source = fs.readFileSync(path.join(topdir, relativePath), "utf8");
      found += this.considerSource(relativePath, source);
    }
    return found;
  }

  result(): ReconcileResult {
    return {
      filesScanned: this.filesScanned,
      newProblems: [...this.newProblems],
      toleratedProblems: [...this.toleratedProblems],
      newIssueCount: this.newProblems.length,
    };
  }
}
