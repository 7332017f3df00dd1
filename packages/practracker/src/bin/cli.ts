#!/usr/bin/env node
import { program } from "commander";

import { getPackageVersion } from "../core/paths.js";

import type { CheckOptions, RegenOptions } from "../types/index.js";

program
  .name("practracker")
  .description("Best-practices tracker - reports new file-size, function-size and include-count problems")
  .version(getPackageVersion());

program
  .command("check [topdir]", { isDefault: true })
  .description("Scan the tree and fail on problems the exceptions file does not allow")
  .option("-c, --config <file>", "Path to practracker.yaml")
  .option("--exceptions <file>", "Override the location of the exceptions file")
  .option("--strict", "Make all warnings into errors (no tolerance)")
  .option("--list-overstrict", "List exceptions that are looser than the code needs")
  .option("--terse", "Do not print the advice block when new problems are found")
  .option("-f, --format <format>", "Output format (human|json)", "human")
  .option("--debug-log <file>", "Append JSON debug log lines to this file")
  .action(async (topdir: string | undefined, options: CheckOptions) => {
    const { checkCommand } = await import("../commands/check.js");
    const exitCode = await checkCommand(topdir, options);
    process.exitCode = exitCode;
  });

program
  .command("regen [topdir]")
  .description("Regenerate the exceptions file to allow every current problem")
  .option("-c, --config <file>", "Path to practracker.yaml")
  .option("--exceptions <file>", "Override the location of the exceptions file")
  .option("--debug-log <file>", "Append JSON debug log lines to this file")
  .action(async (topdir: string | undefined, options: RegenOptions) => {
    const { regenCommand } = await import("../commands/regen.js");
    const exitCode = await regenCommand(topdir, options);
    process.exitCode = exitCode;
  });

await program.parseAsync();
