import { resolveConfig } from "../core/config.js";
import { discoverSourceFiles } from "../core/discovery.js";
import { ExceptionLedger } from "../core/ledger.js";
import { createLogger } from "../core/logger.js";
import { getPackageVersion } from "../core/paths.js";
import { Reconciler } from "../core/reconciler.js";
import { THRESHOLDS } from "../core/thresholds.js";
import { ADVICE_ENV, formatCheckHuman } from "../formatters/human.js";
import { formatCheckJson } from "../formatters/json.js";
import { EXIT_ERROR, exitStatusFor, reportSetupError, warn } from "./shared.js";

import type { CheckOptions, CheckReport, ResolvedConfig } from "../types/index.js";

export function adviceEnabled(options: CheckOptions, env: NodeJS.ProcessEnv = process.env): boolean {
  if (options.terse) return false;
  return !env[ADVICE_ENV];
}

/**
 * Scan the tree, report problems the ledger does not allow, and return the
 * number of new problems as the exit status.
 */
export async function checkCommand(
  topdir: string | undefined,
  options: CheckOptions,
): Promise<number> {
  const format = options.format ?? "human";
  if (format !== "human" && format !== "json") {
    console.error(`Error: invalid --format value "${String(format)}". Use human or json`);
    return EXIT_ERROR;
  }

  const logger = createLogger(options.debugLog);

  let config: ResolvedConfig;
  let ledger: ExceptionLedger;
  try {
    config = resolveConfig(topdir ?? ".", options);
    logger.log("config", "config resolved", config);
    ledger = ExceptionLedger.load(config.exceptionsPath, { logger, onWarning: warn });
  } catch (err: unknown) {
    return reportSetupError(err);
  }

  const files = await discoverSourceFiles(config.topdir, {
    include: config.include,
    ignore: config.ignore,
    logger,
  });

  // over-strict listing compares against the ledger as written
  const reconciler = new Reconciler(ledger, {
    applyTolerance: !options.listOverstrict,
    strict: options.strict ?? false,
    logger,
  });
  reconciler.considerFiles(config.topdir, files);
  const result = reconciler.result();

  const report: CheckReport = {
    version: getPackageVersion(),
    timestamp: new Date().toISOString(),
    topdir: config.topdir,
    exceptionsPath: config.exceptionsPath,
    thresholds: THRESHOLDS,
    toleranceApplied: reconciler.toleranceApplied,
    result,
  };

  if (options.listOverstrict) {
    report.overstrict = ledger.listOverstrictExceptions().map(({ entry, observed }) => ({
      entry,
      observedMagnitude: observed?.magnitude ?? 0,
    }));
  }

  logger.log("report", "check finished", {
    filesScanned: result.filesScanned,
    newIssueCount: result.newIssueCount,
    tolerated: result.toleratedProblems.length,
  });

  if (format === "json") {
    console.log(formatCheckJson(report));
  } else {
    const chalk = (await import("chalk")).default;
    console.log(formatCheckHuman(report, { advice: adviceEnabled(options) }, chalk));
  }

  return exitStatusFor(result.newIssueCount);
}
