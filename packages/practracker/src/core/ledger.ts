import * as fs from "node:fs";
import * as path from "node:path";

import { LedgerParseError } from "./errors.js";
import { createNoopLogger } from "./logger.js";
import { compareProblems, problemKey } from "./problem.js";
import { isProblemKind } from "./thresholds.js";

import type {
  DebugLogger,
  ExceptionEntry,
  OverstrictException,
  Problem,
  ToleranceFns,
} from "../types/index.js";

// location may contain spaces; kind and magnitude may not
const PROBLEM_LINE_RE = /^problem\s+(\S+)\s+(.+?)\s+(\S+)$/;

export interface LedgerOptions {
  logger?: DebugLogger;
  // user-facing warnings (duplicate keys, missing file)
  onWarning?: (message: string) => void;
}

/**
 * Allow-list of known problems, keyed by kind + location.
 *
 * The ledger is loaded once per run. Registrations during the scan are kept
 * in memory so that entries the code has outgrown can be listed afterwards;
 * the file on disk is only ever replaced by regeneration.
 */
export class ExceptionLedger {
  private readonly exceptions = new Map<string, ExceptionEntry>();
  // largest magnitude observed this run, per key
  private readonly observed = new Map<string, Problem>();
  private readonly logger: DebugLogger;

  constructor(options: LedgerOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
  }

  static load(filePath: string, options: LedgerOptions = {}): ExceptionLedger {
    if (!fs.existsSync(filePath)) {
      const ledger = new ExceptionLedger(options);
      ledger.warn(options, `No exceptions file found at ${filePath}; every problem is new`);
      return ledger;
    }
    const text = fs.readFileSync(filePath, "utf8");
    return ExceptionLedger.parse(text, filePath, options);
  }

  static parse(text: string, fileName: string, options: LedgerOptions = {}): ExceptionLedger {
    const ledger = new ExceptionLedger(options);

    text.split("\n").forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (line === "" || line.startsWith("#")) return;

      const lineno = index + 1;
      const match = PROBLEM_LINE_RE.exec(line);
      if (!match) {
        throw new LedgerParseError(
          fileName,
          lineno,
          `expected "problem <kind> <location> <magnitude>", got "${line}"`,
        );
      }
      const [, kind = "", location = "", magnitude = ""] = match;
      if (!isProblemKind(kind)) {
        throw new LedgerParseError(fileName, lineno, `unknown problem kind "${kind}"`);
      }
      const value = Number(magnitude);
      if (!/^\d+$/.test(magnitude) || !Number.isSafeInteger(value)) {
        throw new LedgerParseError(
          fileName,
          lineno,
          `magnitude must be a non-negative integer, got "${magnitude}"`,
        );
      }

      const entry: ExceptionEntry = { kind, location, recorded: value, allowed: value };
      const key = problemKey(entry);
      const previous = ledger.exceptions.get(key);
      if (previous) {
        ledger.warn(
          options,
          `${fileName}:${lineno}: duplicate exception for ${kind} ${location} ` +
            `(was ${previous.recorded}, now ${value}); using the later line`,
        );
      }
      ledger.exceptions.set(key, entry);
    });

    ledger.logger.log("ledger", "exceptions loaded", {
      file: path.basename(fileName),
      entries: ledger.exceptions.size,
    });
    return ledger;
  }

  // warnings always reach the debug log; onWarning also shows them to the user
  private warn(options: LedgerOptions, message: string): void {
    this.logger.log("ledger", "warning", { warning: message });
    options.onWarning?.(message);
  }

  get size(): number {
    return this.exceptions.size;
  }

  get(key: string): ExceptionEntry | undefined {
    return this.exceptions.get(key);
  }

  entries(): ExceptionEntry[] {
    return [...this.exceptions.values()].sort(compareProblems);
  }

  /**
   * Raise every entry's allowed ceiling with the function for its kind.
   * The ceiling never drops below the recorded magnitude.
   */
  setTolerances(fns: ToleranceFns): void {
    for (const entry of this.exceptions.values()) {
      const fn = fns[entry.kind];
      if (!fn) continue;
      entry.allowed = Math.max(entry.recorded, fn(entry.recorded));
    }
    this.logger.log("ledger", "tolerances applied", { kinds: Object.keys(fns) });
  }

  /**
   * Record an observed problem and return true if it is new: either no
   * exception covers its key, or the observed magnitude is above the
   * allowed ceiling.
   */
  registerProblem(p: Problem): boolean {
    const key = problemKey(p);
    const seen = this.observed.get(key);
    if (!seen || seen.magnitude < p.magnitude) {
      this.observed.set(key, p);
    }

    const entry = this.exceptions.get(key);
    const isNew = !entry || entry.allowed < p.magnitude;
    this.logger.log("ledger", "problem registered", {
      key,
      magnitude: p.magnitude,
      allowed: entry?.allowed ?? null,
      isNew,
    });
    return isNew;
  }

  // worse than the ledger line says, but still inside the tolerance
  isToleratedRegression(p: Problem): boolean {
    const entry = this.exceptions.get(problemKey(p));
    if (!entry) return false;
    return p.magnitude > entry.recorded && p.magnitude <= entry.allowed;
  }

  /**
   * Entries the code has outgrown: never observed this run, or observed
   * below the allowed magnitude. Sorted by key.
   */
  listOverstrictExceptions(): OverstrictException[] {
    const result: OverstrictException[] = [];
    for (const entry of this.entries()) {
      const observed = this.observed.get(problemKey(entry));
      if (!observed) {
        result.push({ entry });
      } else if (observed.magnitude < entry.allowed) {
        result.push({ entry, observed });
      }
    }
    return result;
  }

  observedProblems(): Problem[] {
    return [...this.observed.values()].sort(compareProblems);
  }
}
