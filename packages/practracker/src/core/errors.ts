export class LedgerParseError extends Error {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number, reason: string) {
    super(`${file}:${line}: ${reason}`);
    this.name = "LedgerParseError";
    this.file = file;
    this.line = line;
  }
}

// a missing or malformed practracker.yaml
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
