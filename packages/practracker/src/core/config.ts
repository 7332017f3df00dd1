import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";

import { ConfigError } from "./errors.js";

import type { PractrackerConfig, ResolvedConfig, SourcesConfig } from "../types/index.js";

const CONFIG_FILENAMES = ["practracker.yaml", "practracker.yml"];

export const DEFAULT_EXCEPTIONS_FILE = "practracker-exceptions.txt";
export const DEFAULT_INCLUDE = ["**/*.c", "**/*.h"];
export const DEFAULT_IGNORE = ["**/node_modules/**", "**/.git/**", "**/build/**", "**/dist/**"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// undefined means the topdir has no config file, which is fine
export function findConfigPath(topdir: string, configPath?: string): string | undefined {
  if (configPath) {
    const resolved = path.resolve(topdir, configPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  for (const filename of CONFIG_FILENAMES) {
    const candidate = path.resolve(topdir, filename);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export function loadConfigFile(filePath: string): PractrackerConfig {
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config at ${filePath}: ${msg}`);
  }
  return validateConfig(parsed, filePath);
}

function validateStringArray(value: unknown, field: string, filePath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`Invalid config at ${filePath}: '${field}' must be an array of strings`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string" || !item) {
      throw new ConfigError(`Invalid config at ${filePath}: each entry of '${field}' must be a non-empty string`);
    }
    items.push(item);
  }
  return items;
}

export function validateConfig(data: unknown, filePath: string): PractrackerConfig {
  // an empty file parses to undefined
  if (data == null) return {};
  if (!isRecord(data)) {
    throw new ConfigError(`Invalid config at ${filePath}: expected a mapping`);
  }

  const config: PractrackerConfig = {};

  if (data.exceptions != null) {
    if (typeof data.exceptions !== "string" || !data.exceptions) {
      throw new ConfigError(`Invalid config at ${filePath}: 'exceptions' must be a non-empty string`);
    }
    config.exceptions = data.exceptions;
  }

  if (data.sources != null) {
    if (!isRecord(data.sources)) {
      throw new ConfigError(`Invalid config at ${filePath}: 'sources' must be a mapping`);
    }
    const sources: SourcesConfig = {};
    if (data.sources.include != null) {
      const include = validateStringArray(data.sources.include, "sources.include", filePath);
      if (include.length === 0) {
        throw new ConfigError(`Invalid config at ${filePath}: 'sources.include' must not be empty`);
      }
      sources.include = include;
    }
    if (data.sources.ignore != null) {
      sources.ignore = validateStringArray(data.sources.ignore, "sources.ignore", filePath);
    }
    config.sources = sources;
  }

  for (const key of Object.keys(data)) {
    if (key !== "exceptions" && key !== "sources") {
      throw new ConfigError(`Invalid config at ${filePath}: unknown key '${key}'`);
    }
  }

  return config;
}

/**
 * Merge the optional config file with CLI overrides. `--exceptions` is
 * resolved against the working directory, the config's `exceptions`
 * against the topdir.
 */
export function resolveConfig(
  topdir: string,
  overrides: { config?: string; exceptions?: string } = {},
): ResolvedConfig {
  const root = path.resolve(topdir);
  const configPath = findConfigPath(root, overrides.config);
  const file = configPath ? loadConfigFile(configPath) : {};

  const exceptionsPath = overrides.exceptions
    ? path.resolve(overrides.exceptions)
    : path.resolve(root, file.exceptions ?? DEFAULT_EXCEPTIONS_FILE);

  return {
    topdir: root,
    exceptionsPath,
    include: file.sources?.include ?? DEFAULT_INCLUDE,
    ignore: [...DEFAULT_IGNORE, ...(file.sources?.ignore ?? [])],
    configPath: configPath ?? null,
  };
}
