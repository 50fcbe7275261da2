import type { RunReport } from "../engine/run.js";

export function formatJsonReport(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}
