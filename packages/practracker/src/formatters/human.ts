import { formatEntry, formatProblem } from "../core/problem.js";

import type { CheckReport, Problem, Thresholds } from "../types/index.js";

type PaintFn = (text: string) => string;

// the subset of chalk the formatter needs; identity functions give plain text
export interface Paint {
  bold: PaintFn;
  dim: PaintFn;
  red: PaintFn;
  yellow: PaintFn;
  green: PaintFn;
}

const identity: PaintFn = (text) => text;

export const plainPaint: Paint = {
  bold: identity,
  dim: identity,
  red: identity,
  yellow: identity,
  green: identity,
};

export const ADVICE_ENV = "PRACTRACKER_DISABLE_ADVICE";

export interface HumanFormatOptions {
  // print the advisory block when new problems are found
  advice: boolean;
}

function formatNewProblem(p: Problem, thresholds: Thresholds): string {
  return `${formatProblem(p)} (limit ${thresholds[p.kind]})`;
}

export function formatAdvice(count: number, exceptionsPath: string): string {
  return [
    `FAILURE: practracker found ${count} new problem(s) in the code: see above.`,
    "",
    "Please fix the problems if you can, and update the exceptions file",
    `(${exceptionsPath}) if you can't.`,
    "",
    `You can disable this message by setting the ${ADVICE_ENV} environment`,
    "variable.",
  ].join("\n");
}

export function formatCheckHuman(
  report: CheckReport,
  options: HumanFormatOptions,
  paint: Paint = plainPaint,
): string {
  const { result } = report;
  const lines: string[] = [];

  lines.push(paint.bold(`practracker: ${report.topdir}`));
  lines.push(paint.dim(`Files scanned: ${result.filesScanned}`));
  lines.push(paint.dim(`Exceptions: ${report.exceptionsPath}`));
  if (!report.toleranceApplied) {
    lines.push(paint.dim("Tolerance: off"));
  }
  lines.push("");

  if (result.newProblems.length > 0) {
    lines.push(paint.red(paint.bold(`NEW PROBLEMS (${result.newProblems.length})`)));
    lines.push(paint.red("─".repeat(60)));
    for (const p of result.newProblems) {
      lines.push(paint.red(`  ${formatNewProblem(p, report.thresholds)}`));
    }
    lines.push("");
  }

  if (result.toleratedProblems.length > 0) {
    lines.push(paint.yellow(paint.bold(`WARNINGS (${result.toleratedProblems.length})`)));
    lines.push(paint.yellow("─".repeat(60)));
    for (const p of result.toleratedProblems) {
      lines.push(paint.yellow(`  (warning) ${formatProblem(p)}`));
    }
    lines.push("");
  }

  if (report.overstrict) {
    lines.push(paint.bold(`OVER-STRICT EXCEPTIONS (${report.overstrict.length})`));
    lines.push("─".repeat(60));
    for (const { entry, observedMagnitude } of report.overstrict) {
      lines.push(`  ${formatEntry(entry)} -> ${observedMagnitude}`);
    }
    lines.push("");
  }

  if (result.newIssueCount > 0) {
    if (options.advice) {
      lines.push(formatAdvice(result.newIssueCount, report.exceptionsPath));
      lines.push("");
    }
    lines.push(paint.red(paint.bold(`RESULT: FAIL (${result.newIssueCount} new)`)));
  } else if (result.toleratedProblems.length > 0) {
    lines.push(paint.yellow(paint.bold("RESULT: PASS (with warnings)")));
  } else {
    lines.push(paint.green(paint.bold("RESULT: PASS")));
  }

  return lines.join("\n");
}
