import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { vi } from "vitest";

export function makeTree(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "practracker-cmd-"));
}

export function writeFile(root: string, relativePath: string, content: string): void {
  const abs = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content, "utf8");
}

// a C file of exactly `lines` lines with no includes or functions
export function longFile(lines: number): string {
  return "int x;\n".repeat(lines);
}

// a C file holding one function whose span is `lines` lines
export function functionFile(name: string, lines: number): string {
  const body = Array.from({ length: lines - 2 }, () => "  step();");
  return [`void ${name}(void)`, "{", ...body, "}", ""].join("\n");
}

function joinCalls(calls: unknown[][]): string {
  return calls.map((args) => args.map(String).join(" ")).join("\n");
}

export interface CapturedConsole {
  stdout(): string;
  stderr(): string;
}

// silence console output and keep it for assertions; vi.restoreAllMocks() undoes it
export function captureConsole(): CapturedConsole {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  return {
    stdout: () => joinCalls(log.mock.calls),
    stderr: () => joinCalls(error.mock.calls),
  };
}
