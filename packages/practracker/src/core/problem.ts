import type { ExceptionEntry, Problem, ProblemKind } from "../types/index.js";

function makeProblem(kind: ProblemKind, location: string, magnitude: number): Problem {
  return Object.freeze({ kind, location, magnitude });
}

export function fileSizeProblem(path: string, lines: number): Problem {
  return makeProblem("file-size", path, lines);
}

export function includeCountProblem(path: string, count: number): Problem {
  return makeProblem("include-count", path, count);
}

export function functionSizeProblem(path: string, functionName: string, lines: number): Problem {
  return makeProblem("function-size", `${path}:${functionName}()`, lines);
}

// identity ignores magnitude: two problems with one key occupy the same ledger slot
export function problemKey(p: { kind: ProblemKind; location: string }): string {
  return `${p.kind} ${p.location}`;
}

export function compareProblems(
  a: { kind: ProblemKind; location: string },
  b: { kind: ProblemKind; location: string },
): number {
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  if (a.location !== b.location) return a.location < b.location ? -1 : 1;
  return 0;
}

// the ledger line form: `problem <kind> <location> <magnitude>`
export function formatProblem(p: Problem): string {
  return `problem ${p.kind} ${p.location} ${p.magnitude}`;
}

export function formatEntry(e: ExceptionEntry): string {
  return `problem ${e.kind} ${e.location} ${e.recorded}`;
}
