import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadDocument, parseDocument } from "../../src/document/loader.js";
import { DocumentError } from "../../src/engine/errors.js";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

async function documentError(run: () => Promise<unknown>): Promise<DocumentError> {
  try {
    await run();
  } catch (err) {
    if (err instanceof DocumentError) return err;
    throw err;
  }
  throw new Error("expected a DocumentError");
}

describe("loadDocument", () => {
  it("loads a full plan and applies defaults", async () => {
    const doc = await loadDocument(fixture("full-plan.yaml"));

    expect(doc.users.map((u) => u.id)).toEqual(["alice", "me", "ghost"]);
    const [platform] = doc.groups;
    expect(platform.labels[0]).toEqual({ id: "bug", name: "bug", color: "#FF0000", description: "" });
    expect(platform.iterations[0]).toMatchObject({ start_date: "2026-01-05", due_date: "2026-01-16", state: "active" });
    expect(platform.milestones[1].state).toBe("closed");
    expect(platform.projects[0].issues[0]).toMatchObject({
      id: "1",
      label_ids: ["feature", "bug"],
      parent_epic_id: "child",
      state: "opened",
      weight: 3,
    });
    expect(platform.subgroups[0].projects[0].name).toBe("svc");
  });

  it("normalizes numeric logical ids to strings", async () => {
    const doc = await loadDocument(fixture("end-to-end.yaml"));

    const [group] = doc.groups;
    expect(group.labels[0].id).toBe("1");
    expect(group.epics[0].label_ids).toEqual(["1"]);
    expect(group.projects[0].issues[0].parent_epic_id).toBe("1");
  });

  it("lists schema violations by path", async () => {
    const err = await documentError(() => loadDocument(fixture("invalid-plan.yaml")));

    expect(err.message.startsWith(`${fixture("invalid-plan.yaml")} does not match the plan schema`)).toBe(true);
    expect(err.issues).toContain("groups.0.labels.0.color: expected a hex color like #FF0000");
    expect(err.issues.some((i) => i.startsWith("groups.0.projects.0.issues.0.id:"))).toBe(true);
  });

  it("rejects duplicate logical ids within a kind", async () => {
    const err = await documentError(() => loadDocument(fixture("duplicate-ids.yaml")));

    expect(err.issues).toEqual(['epic id "1" is declared 2 times', 'issue id "7" is declared 2 times']);
  });

  it("wraps read errors", async () => {
    const err = await documentError(() => loadDocument(fixture("does-not-exist.yaml")));

    expect(err.message).toContain(`Cannot read ${fixture("does-not-exist.yaml")}`);
  });
});

describe("parseDocument", () => {
  it("reports malformed YAML", () => {
    expect(() => parseDocument("groups: [", "plan.yaml")).toThrow(/^Invalid YAML in plan\.yaml:/);
  });

  it("requires at least one group", () => {
    expect(() => parseDocument("")).toThrow("groups: Required");
    expect(() => parseDocument("groups: []")).toThrow("groups: at least one group is required");
  });

  it("accepts the same id across different kinds", () => {
    const doc = parseDocument(`
groups:
  - name: Platform
    labels: [{ id: 1, name: bug, color: "#FF0000" }]
    epics: [{ id: 1, title: Core }]
    projects: [{ name: svc, issues: [{ id: 1, title: Fix X }] }]
`);

    expect(doc.groups[0].epics[0].id).toBe("1");
  });

  it("rejects unknown roles", () => {
    expect(() =>
      parseDocument(`
groups:
  - name: Platform
    members: [{ user_id: u1, role: admin }]
`),
    ).toThrow(DocumentError);
  });
});
