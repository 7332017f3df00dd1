import * as fs from "node:fs";
import * as path from "node:path";

import { formatProblem } from "./problem.js";
import { THRESHOLDS } from "./thresholds.js";

import type { Problem, Thresholds } from "../types/index.js";

export function ledgerHeader(thresholds: Thresholds = THRESHOLDS): string {
  return `# Exceptions file for practracker, the best-practices tracker.
#
# Each line of this file represents a single violation of our best
# practices, typically one that existed before practracker was enabled.
#
# There are three kinds of problems recognized right now:
#   function-size -- a function of more than ${thresholds["function-size"]} lines.
#   file-size -- a file of more than ${thresholds["file-size"]} lines.
#   include-count -- a file with more than ${thresholds["include-count"]} #includes.
#
# Each line below represents a single exception that practracker should
# _ignore_. Each line has four parts:
#  1. The word "problem".
#  2. The kind of problem.
#  3. The location of the problem: either a filename, or a
#     filename:functionname() pair.
#  4. The magnitude of the problem to ignore.
#
# So for example, consider this line:
#    problem file-size src/core/connection.c 3200
#
# It tells practracker to allow the mentioned file to be up to 3200 lines
# long, even though ordinarily it would warn about any file with more than
# ${thresholds["file-size"]} lines.
#
# You can either edit this file by hand, or regenerate it completely by
# running \`practracker regen\`.
#
# Remember: it is better to fix the problem than to add a new exception!

`;
}

// problems are expected to be sorted and unique by key, as observedProblems() returns them
export function serializeLedger(problems: Problem[], thresholds: Thresholds = THRESHOLDS): string {
  const lines = problems.map(formatProblem);
  return ledgerHeader(thresholds) + lines.map((line) => line + "\n").join("");
}

/**
 * Replace the ledger file without ever leaving a truncated copy behind:
 * write a sibling temp file, then rename it into place.
 */
export function writeLedgerAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, content, "utf8");
  fs.renameSync(tmpPath, filePath);
}
