import type { FunctionMetric } from "../types/index.js";

/**
 * Structural metrics over the text of one source file. Every operation takes
 * the whole text, so callers can run all of them on a single read.
 */
export interface MetricsExtractor {
  fileLength(source: string): number;
  includeCount(source: string): number;
  functionLines(source: string): FunctionMetric[];
}

const INCLUDE_RE = /^\s*#\s*include\b/;
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
// `extern "C" {` after literal stripping
const LINKAGE_BLOCK_RE = /^extern\s*""$/;

// call-like names that may appear in a definition header without naming the function
const NON_FUNCTION_CALLS = new Set([
  "__attribute__",
  "__declspec",
  "DISABLE_GCC_WARNING",
  "DISABLE_GCC_WARNINGS",
  "ENABLE_GCC_WARNING",
  "ENABLE_GCC_WARNINGS",
  "CHECK_PRINTF",
  "CHECK_SCANF",
]);

const C_KEYWORDS = new Set([
  "if", "for", "while", "switch", "return", "sizeof", "do", "else",
  "void", "int", "char", "short", "long", "float", "double", "unsigned", "signed",
  "const", "volatile", "static", "extern", "inline", "struct", "union", "enum",
]);

// wrappers whose second argument is the function being defined
const WRAPPED_DEFINITIONS = new Set(["MOCK_IMPL"]);

export function splitLines(source: string): string[] {
  if (source === "") return [];
  const lines = source.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function getFileLength(source: string): number {
  return splitLines(source).length;
}

export function getIncludeCount(source: string): number {
  return splitLines(source).filter((line) => INCLUDE_RE.test(line)).length;
}

interface LexState {
  inBlockComment: boolean;
}

// drop comments and the contents of string/char literals, keeping the quotes
export function stripCommentsAndLiterals(line: string, state: LexState): string {
  let out = "";
  let i = 0;
  while (i < line.length) {
    if (state.inBlockComment) {
      const end = line.indexOf("*/", i);
      if (end === -1) return out;
      state.inBlockComment = false;
      i = end + 2;
      out += " ";
      continue;
    }

    const c = line.charAt(i);
    const next = line.charAt(i + 1);
    if (c === "/" && next === "/") break;
    if (c === "/" && next === "*") {
      state.inBlockComment = true;
      i += 2;
      continue;
    }
    if (c === '"' || c === "'") {
      let j = i + 1;
      while (j < line.length && line.charAt(j) !== c) {
        j += line.charAt(j) === "\\" ? 2 : 1;
      }
      out += c + c;
      i = j + 1;
      continue;
    }

    out += c;
    i++;
  }
  return out;
}

interface CallSite {
  name: string;
  // index of the opening paren
  open: number;
}

// identifiers directly followed by `(` outside any parentheses
function topLevelCalls(header: string): CallSite[] {
  const calls: CallSite[] = [];
  let depth = 0;
  for (let i = 0; i < header.length; i++) {
    const c = header.charAt(i);
    if (c === "(") {
      if (depth === 0) {
        const match = /([A-Za-z_][A-Za-z0-9_]*)\s*$/.exec(header.slice(0, i));
        if (match?.[1]) calls.push({ name: match[1], open: i });
      }
      depth++;
    } else if (c === ")") {
      depth = Math.max(0, depth - 1);
    }
  }
  return calls;
}

function hasTopLevelAssignment(header: string): boolean {
  let depth = 0;
  for (const c of header) {
    if (c === "(" || c === "[") depth++;
    else if (c === ")" || c === "]") depth = Math.max(0, depth - 1);
    else if (c === "=" && depth === 0) return true;
  }
  return false;
}

// second top-level argument of the call whose paren opens at `open`
function wrappedName(header: string, open: number): string | null {
  const args: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = open + 1; i < header.length; i++) {
    const c = header.charAt(i);
    if (c === "(") depth++;
    if (c === ")") {
      if (depth === 0) break;
      depth--;
    }
    if (c === "," && depth === 0) {
      args.push(current.trim());
      current = "";
      continue;
    }
    current += c;
  }
  args.push(current.trim());
  const name = args[1];
  return name !== undefined && IDENTIFIER_RE.test(name) ? name : null;
}

/**
 * Decide whether the code preceding a top-level `{` is a function
 * definition header, and return the function's name if so.
 */
export function functionNameFromHeader(header: string): string | null {
  const trimmed = header.trim();
  if (!trimmed.endsWith(")")) return null;
  if (hasTopLevelAssignment(trimmed)) return null;

  const calls = topLevelCalls(trimmed).filter(
    (call) => !NON_FUNCTION_CALLS.has(call.name) && !C_KEYWORDS.has(call.name),
  );
  const last = calls[calls.length - 1];
  if (!last) return null;

  if (WRAPPED_DEFINITIONS.has(last.name)) {
    return wrappedName(trimmed, last.open);
  }
  return last.name;
}

interface OpenFunction {
  name: string;
  startLine: number;
}

/**
 * Find function definitions by tracking brace depth. A function spans from
 * the line of its top-level opening brace through the line of the matching
 * closing brace. A function still open at end of file is discarded.
 */
export function getFunctionLines(source: string): FunctionMetric[] {
  const results: FunctionMetric[] = [];
  const lex: LexState = { inBlockComment: false };
  let inDirective = false;
  let depth = 0;
  let header = "";
  let open: OpenFunction | null = null;

  splitLines(source).forEach((line, lineno) => {
    const code = stripCommentsAndLiterals(line, lex);
    if (inDirective || code.trimStart().startsWith("#")) {
      inDirective = line.trimEnd().endsWith("\\");
      return;
    }

    for (const c of code) {
      if (depth === 0) {
        if (c === "{") {
          if (LINKAGE_BLOCK_RE.test(header.trim())) {
            // its closing brace is dropped as an excess close
            header = "";
            continue;
          }
          const name = functionNameFromHeader(header);
          if (name !== null) open = { name, startLine: lineno };
          depth = 1;
          header = "";
        } else if (c === ";" || c === "}") {
          header = "";
        } else {
          header += c;
        }
        continue;
      }

      if (c === "{") {
        depth++;
      } else if (c === "}") {
        depth--;
        if (depth === 0 && open) {
          results.push({ name: open.name, lines: lineno - open.startLine + 1 });
          open = null;
        }
      }
    }

    if (depth === 0) header += "\n";
  });

  return results;
}

export const heuristicExtractor: MetricsExtractor = {
  fileLength: getFileLength,
  includeCount: getIncludeCount,
  functionLines: getFunctionLines,
};
