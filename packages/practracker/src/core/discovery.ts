import * as fs from "node:fs";
import * as path from "node:path";
import { glob } from "glob";

import { createNoopLogger } from "./logger.js";

import type { DebugLogger } from "../types/index.js";

export interface DiscoveryOptions {
  include: string[];
  ignore: string[];
  logger?: DebugLogger;
}

function isRegularFile(filePath: string): boolean {
  return fs.statSync(filePath).isFile();
}

// posix-style path relative to the topdir; also the problem location prefix
export function toLocation(topdir: string, filePath: string): string {
  return path.relative(topdir, path.resolve(topdir, filePath)).split(path.sep).join("/");
}

/**
 * Enumerate the source files under `topdir` that practracker measures.
 * Returns topdir-relative posix paths, deduplicated and sorted so that
 * every run visits files in the same order.
 */
export async function discoverSourceFiles(
  topdir: string,
  options: DiscoveryOptions,
): Promise<string[]> {
  const logger = options.logger ?? createNoopLogger();
  const found = new Set<string>();

  for (const pattern of options.include) {
    const matches = await glob(pattern, {
      cwd: topdir,
      ignore: options.ignore,
      nodir: true,
      posix: true,
    });
    for (const match of matches) {
      const location = toLocation(topdir, match);
      if (isRegularFile(path.join(topdir, location))) {
        found.add(location);
      }
    }
    logger.log("discovery", "pattern expanded", { pattern, matches: matches.length });
  }

  return [...found].sort();
}
