import type { RunReport } from "../engine/run.js";
import { REGISTRY_KINDS } from "../engine/registry.js";
import { formatTraceEvent } from "../engine/trace.js";

export function formatHumanReport(report: RunReport): string {
  const lines: string[] = [];
  const { counts } = report;

  lines.push("## Materialization Report");
  lines.push(`**Relationships:** ${report.relationships}`);
  lines.push(
    `**Created:** ${counts.create} | **Reused:** ${counts.reuse} | **Linked:** ${counts.link} | **Gaps:** ${counts.gap} | **Failed:** ${counts.fail}`,
  );
  lines.push("");

  // Registry
  const rows: string[] = [];
  for (const kind of REGISTRY_KINDS) {
    for (const [logicalId, remote] of Object.entries(report.registry[kind])) {
      rows.push(`| ${kind} | ${logicalId} | ${remote} |`);
    }
  }
  if (rows.length > 0) {
    lines.push("### Registry");
    lines.push("| Kind | Logical id | Remote |");
    lines.push("|------|------------|--------|");
    lines.push(...rows);
    lines.push("");
  }

  const problems = report.events.filter((e) => e.action === "gap" || e.action === "fail");
  if (problems.length > 0) {
    lines.push("### Warnings");
    for (const event of problems) {
      lines.push(`- ${formatTraceEvent(event)}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
