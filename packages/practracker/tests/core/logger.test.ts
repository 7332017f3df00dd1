import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

import { DEBUG_LOG_ENV, FileDebugLogger, createLogger } from "../../src/core/logger.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "practracker-logger-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

function readEntries(file: string): Record<string, unknown>[] {
  return fs
    .readFileSync(file, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("FileDebugLogger", () => {
  it("appends one JSON line per entry", () => {
    const file = path.join(tmpDir, "logs", "debug.log");
    const logger = new FileDebugLogger(file);

    logger.log("scan", "file measured", { location: "a.c" });
    logger.log("ledger", "exceptions loaded");

    const entries = readEntries(file);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ cat: "scan", msg: "file measured", location: "a.c" });
    expect(entries[1]).toMatchObject({ cat: "ledger", msg: "exceptions loaded" });
  });

  it("keeps reserved keys over data keys", () => {
    const file = path.join(tmpDir, "debug.log");
    new FileDebugLogger(file).log("scan", "real", { msg: "spoofed" });
    expect(readEntries(file)[0]?.msg).toBe("real");
  });

  it("filters by category", () => {
    const file = path.join(tmpDir, "debug.log");
    const logger = new FileDebugLogger(file, ["ledger"]);

    logger.log("scan", "dropped");
    logger.log("ledger", "kept");

    expect(readEntries(file).map((e) => e.msg)).toEqual(["kept"]);
  });

  it("rotates the file once it grows past the size limit", () => {
    const file = path.join(tmpDir, "debug.log");
    const logger = new FileDebugLogger(file, undefined, 10);

    logger.log("scan", "first");
    logger.log("scan", "second");

    expect(readEntries(`${file}.1`).map((e) => e.msg)).toEqual(["first"]);
    expect(readEntries(file).map((e) => e.msg)).toEqual(["second"]);
  });

  it("disables itself after a write failure", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const blocker = path.join(tmpDir, "not-a-dir");
    fs.writeFileSync(blocker, "", "utf8");
    const logger = new FileDebugLogger(path.join(blocker, "debug.log"));

    logger.log("scan", "one");
    logger.log("scan", "two");

    expect(errors).toHaveBeenCalledTimes(1);
  });
});

describe("createLogger", () => {
  it("writes to the file named by the environment", () => {
    const file = path.join(tmpDir, "env.log");
    vi.stubEnv(DEBUG_LOG_ENV, file);

    createLogger().log("config", "hello");

    expect(readEntries(file)[0]).toMatchObject({ cat: "config", msg: "hello" });
  });

  it("returns a logger that writes nothing when no file is named", () => {
    vi.stubEnv(DEBUG_LOG_ENV, "");
    const logger = createLogger();
    logger.log("config", "hello");
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});
