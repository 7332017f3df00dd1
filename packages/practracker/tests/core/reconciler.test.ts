import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

import { ExceptionLedger } from "../../src/core/ledger.js";
import { fileSizeProblem, functionSizeProblem, includeCountProblem } from "../../src/core/problem.js";
import { Reconciler } from "../../src/core/reconciler.js";

import type { MetricsExtractor } from "../../src/core/metrics.js";
import type { Thresholds } from "../../src/types/index.js";

const SMALL: Thresholds = {
  "file-size": 10,
  "function-size": 3,
  "include-count": 2,
};

// a function whose span is `bodyLines + 2` lines
function fn(name: string, bodyLines: number): string[] {
  return [`void ${name}(void)`, "{", ...Array.from({ length: bodyLines }, () => "  step();"), "}"];
}

function source(...rows: string[]): string {
  return rows.join("\n") + "\n";
}

describe("Reconciler.considerSource", () => {
  it("registers nothing for a file within every limit", () => {
    const reconciler = new Reconciler(new ExceptionLedger(), {
      applyTolerance: false,
      strict: false,
      thresholds: SMALL,
    });

    const found = reconciler.considerSource("ok.c", source("#include <a.h>", ...fn("f", 1)));

    expect(found).toBe(0);
    expect(reconciler.result()).toEqual({
      filesScanned: 1,
      newProblems: [],
      toleratedProblems: [],
      newIssueCount: 0,
    });
  });

  it("builds a problem for each metric over its limit", () => {
    const reconciler = new Reconciler(new ExceptionLedger(), {
      applyTolerance: false,
      strict: false,
      thresholds: SMALL,
    });

    // 3 include lines + 7 rows for big() + 4 rows for small() = 14 lines
    const text = source("#include <a.h>", "#include <b.h>", "#include <c.h>", ...fn("big", 4), ...fn("small", 1));
    const found = reconciler.considerSource("src/x.c", text);

    expect(found).toBe(3);
    expect(reconciler.result().newProblems).toEqual([
      fileSizeProblem("src/x.c", 14),
      includeCountProblem("src/x.c", 3),
      functionSizeProblem("src/x.c", "big", 6),
    ]);
  });

  it("uses the default limits when none are given", () => {
    const reconciler = new Reconciler(new ExceptionLedger(), { applyTolerance: false, strict: false });

    expect(reconciler.considerSource("long.c", "x;\n".repeat(3000))).toBe(0);
    expect(reconciler.considerSource("longer.c", "x;\n".repeat(3001))).toBe(1);
    expect(reconciler.result().newProblems).toEqual([fileSizeProblem("longer.c", 3001)]);
  });

  it("does not count problems the ledger allows", () => {
    const ledger = ExceptionLedger.parse("problem function-size src/x.c:big() 6\n", "exceptions.txt");
    const reconciler = new Reconciler(ledger, { applyTolerance: false, strict: false, thresholds: SMALL });

    expect(reconciler.considerSource("src/x.c", source(...fn("big", 4)))).toBe(0);
    expect(reconciler.considerSource("src/x.c", source(...fn("big", 5)))).toBe(1);
  });

  it("collapses functions sharing a name in one file to the largest", () => {
    const reconciler = new Reconciler(new ExceptionLedger(), {
      applyTolerance: false,
      strict: false,
      thresholds: { ...SMALL, "file-size": 100 },
    });

    const found = reconciler.considerSource("dup.c", source(...fn("twice", 3), ...fn("twice", 6)));

    expect(found).toBe(1);
    expect(reconciler.result().newProblems).toEqual([functionSizeProblem("dup.c", "twice", 8)]);
  });

  it("uses an injected extractor", () => {
    const extractor: MetricsExtractor = {
      fileLength: () => 1,
      includeCount: () => 0,
      functionLines: () => [{ name: "generated", lines: 500 }],
    };
    const reconciler = new Reconciler(new ExceptionLedger(), {
      applyTolerance: false,
      strict: false,
      extractor,
    });

    expect(reconciler.considerSource("gen.c", "")).toBe(1);
    expect(reconciler.result().newProblems).toEqual([functionSizeProblem("gen.c", "generated", 500)]);
  });
});

describe("Reconciler tolerance", () => {
  const LEDGER = "problem file-size a.c 100\n";

  function check(lines: number, options: { applyTolerance: boolean; strict: boolean }) {
    const ledger = ExceptionLedger.parse(LEDGER, "exceptions.txt");
    const reconciler = new Reconciler(ledger, { ...options, thresholds: SMALL });
    reconciler.considerSource("a.c", "x;\n".repeat(lines));
    return { reconciler, result: reconciler.result() };
  }

  it("applies tolerances at construction when asked", () => {
    const { reconciler, result } = check(102, { applyTolerance: true, strict: false });
    expect(reconciler.toleranceApplied).toBe(true);
    expect(result.newIssueCount).toBe(0);
    expect(result.toleratedProblems).toEqual([fileSizeProblem("a.c", 102)]);
  });

  it("still reports growth beyond the tolerance", () => {
    const { result } = check(103, { applyTolerance: true, strict: false });
    expect(result.newProblems).toEqual([fileSizeProblem("a.c", 103)]);
    expect(result.toleratedProblems).toEqual([]);
  });

  it("strict mode disables tolerance", () => {
    const { reconciler, result } = check(101, { applyTolerance: true, strict: true });
    expect(reconciler.toleranceApplied).toBe(false);
    expect(result.newIssueCount).toBe(1);
  });

  it("without tolerance any growth is new", () => {
    const { result } = check(101, { applyTolerance: false, strict: false });
    expect(result.newIssueCount).toBe(1);
  });
});

describe("Reconciler.considerFiles", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "practracker-reconcile-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeFile(relativePath: string, content: string): void {
    const abs = path.join(tmpDir, relativePath);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content, "utf8");
  }

  it("reads each file and reports under its relative path", () => {
    writeFile("src/a.c", source(...fn("long_one", 4)));
    writeFile("src/b.c", source(...fn("short_one", 1)));

    const reconciler = new Reconciler(new ExceptionLedger(), {
      applyTolerance: false,
      strict: false,
      thresholds: SMALL,
    });
    const found = reconciler.considerFiles(tmpDir, ["src/a.c", "src/b.c"]);

    expect(found).toBe(1);
    expect(reconciler.result().filesScanned).toBe(2);
    expect(reconciler.result().newProblems).toEqual([functionSizeProblem("src/a.c", "long_one", 6)]);
  });

  it("fails when a listed file cannot be read", () => {
    const reconciler = new Reconciler(new ExceptionLedger(), { applyTolerance: false, strict: false });
    expect(() => reconciler.considerFiles(tmpDir, ["gone.c"])).toThrow("ENOENT");
  });
});
