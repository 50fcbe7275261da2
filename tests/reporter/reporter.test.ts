import { describe, it, expect } from "vitest";
import type { RunReport } from "../../src/engine/run.js";
import { formatHumanReport } from "../../src/reporter/human.js";
import { formatJsonReport } from "../../src/reporter/json.js";

function makeReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    relationships: "deferred",
    events: [],
    referenceGaps: [],
    registry: { label: {}, milestone: {}, iteration: {}, epic: {}, issue: {}, user: {} },
    counts: { create: 0, reuse: 0, link: 0, gap: 0, fail: 0 },
    ...overrides,
  };
}

describe("formatHumanReport", () => {
  it("prints counts and the registry table", () => {
    const report = makeReport({
      registry: { label: { "1": "bug" }, milestone: {}, iteration: {}, epic: { "1": 501 }, issue: { "1": 902 }, user: {} },
      counts: { create: 5, reuse: 0, link: 4, gap: 0, fail: 0 },
    });

    expect(formatHumanReport(report)).toBe(
      [
        "## Materialization Report",
        "**Relationships:** deferred",
        "**Created:** 5 | **Reused:** 0 | **Linked:** 4 | **Gaps:** 0 | **Failed:** 0",
        "",
        "### Registry",
        "| Kind | Logical id | Remote |",
        "|------|------------|--------|",
        "| label | 1 | bug |",
        "| epic | 1 | 501 |",
        "| issue | 1 | 902 |",
        "",
      ].join("\n"),
    );
  });

  it("lists gaps and failures under Warnings", () => {
    const report = makeReport({
      relationships: "inline",
      events: [
        { action: "create", kind: "group", name: "Platform" },
        { action: "gap", kind: "epic", name: "Core", logicalId: "1", detail: "not created" },
        { action: "fail", kind: "issue", name: "Fix X", logicalId: "1", detail: "weight not applied" },
      ],
      counts: { create: 1, reuse: 0, link: 0, gap: 1, fail: 1 },
    });

    const lines = formatHumanReport(report).split("\n");

    expect(lines).toContain("**Relationships:** inline");
    expect(lines).not.toContain("### Registry");
    expect(lines.slice(lines.indexOf("### Warnings"))).toEqual([
      "### Warnings",
      '- gap    epic "Core" (1): not created',
      '- fail   issue "Fix X" (1): weight not applied',
      "",
    ]);
  });
});

describe("formatJsonReport", () => {
  it("round-trips the report as indented JSON", () => {
    const report = makeReport({ counts: { create: 1, reuse: 2, link: 3, gap: 0, fail: 0 } });

    const json = formatJsonReport(report);

    expect(JSON.parse(json)).toEqual(report);
    expect(json.split("\n")[1]).toBe('  "relationships": "deferred",');
  });
});
