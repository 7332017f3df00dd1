interface BaseCommandOptions {
  config?: string;
  exceptions?: string;
  debugLog?: string;
}

export interface CheckOptions extends BaseCommandOptions {
  strict?: boolean;
  listOverstrict?: boolean;
  terse?: boolean;
  format?: "human" | "json";
}

export type RegenOptions = BaseCommandOptions;
