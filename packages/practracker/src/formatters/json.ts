import type { CheckReport } from "../types/index.js";

export function formatCheckJson(report: CheckReport): string {
  return JSON.stringify(report, null, 2);
}
