import { resolveConfig } from "../core/config.js";
import { discoverSourceFiles } from "../core/discovery.js";
import { ExceptionLedger } from "../core/ledger.js";
import { createLogger } from "../core/logger.js";
import { Reconciler } from "../core/reconciler.js";
import { serializeLedger, writeLedgerAtomic } from "../core/regen.js";
import { reportSetupError } from "./shared.js";

import type { RegenOptions, ResolvedConfig } from "../types/index.js";

/**
 * Rebuild the exceptions file so that it allows exactly the problems the
 * tree has today.
 */
export async function regenCommand(
  topdir: string | undefined,
  options: RegenOptions,
): Promise<number> {
  const logger = createLogger(options.debugLog);

  let config: ResolvedConfig;
  try {
    config = resolveConfig(topdir ?? ".", options);
  } catch (err: unknown) {
    return reportSetupError(err);
  }

  const files = await discoverSourceFiles(config.topdir, {
    include: config.include,
    ignore: config.ignore,
    logger,
  });

  // against an empty ledger every current violation is new and gets written out
  const ledger = new ExceptionLedger({ logger });
  const reconciler = new Reconciler(ledger, { applyTolerance: false, strict: false, logger });
  reconciler.considerFiles(config.topdir, files);

  const problems = ledger.observedProblems();
  writeLedgerAtomic(config.exceptionsPath, serializeLedger(problems));
  logger.log("report", "exceptions regenerated", {
    file: config.exceptionsPath,
    entries: problems.length,
  });

  console.log(`Wrote ${problems.length} exception(s) to ${config.exceptionsPath}`);
  return 0;
}
