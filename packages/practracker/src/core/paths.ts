import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "practracker";

let _packageRoot: string | null = null;

function readPackageJson(dir: string): { name?: string; version?: string } | null {
  const pkgJsonPath = path.join(dir, "package.json");
  if (!fs.existsSync(pkgJsonPath)) return null;
  return JSON.parse(fs.readFileSync(pkgJsonPath, "utf8")) as { name?: string; version?: string };
}

// walk up from this module's location to find the package root
// works regardless of build output structure (dist/core/, src/core/, etc.)
export function getPackageRoot(): string {
  if (_packageRoot) return _packageRoot;

  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (readPackageJson(dir)?.name === PACKAGE_NAME) {
      _packageRoot = dir;
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new Error(`Could not find ${PACKAGE_NAME} package root`);
}

export function getPackageVersion(): string {
  return readPackageJson(getPackageRoot())?.version ?? "0.0.0";
}
