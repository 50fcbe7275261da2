import { describe, it, expect, beforeEach } from "vitest";
import { fileURLToPath } from "node:url";
import { loadDocument } from "../../src/document/loader.js";
import { planDocumentSchema } from "../../src/document/schema.js";
import type { PlanDocument } from "../../src/document/types.js";
import { ConflictError, ContainerCreateError } from "../../src/engine/errors.js";
import { materializePlan, type RunOptions } from "../../src/engine/run.js";
import { silentLogger } from "../../src/utils/logger.js";
import { FakePlatform, createCapturingLogger } from "../helpers/fake-platform.js";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const deferred: RunOptions = { onDuplicate: "reuse", relationships: "deferred" };
const inline: RunOptions = { onDuplicate: "reuse", relationships: "inline" };

let platform: FakePlatform;

beforeEach(() => {
  platform = new FakePlatform({ users: [{ id: 42, username: "alice" }] });
});

// ---------------------------------------------------------------------------
// End-to-end scenario
// ---------------------------------------------------------------------------

describe("end-to-end", () => {
  it("creates, labels, links and closes in declaration order when inline", async () => {
    const doc = await loadDocument(fixture("end-to-end.yaml"));

    const report = await materializePlan(doc, platform, inline, silentLogger);

    expect(report.events.map((e) => `${e.action} ${e.kind} ${e.name}${e.detail ? ` | ${e.detail}` : ""}`)).toEqual([
      "create group Platform | in instance root",
      "create label bug | in group platform",
      "create epic Core | in group platform",
      "link epic Core | added labels bug",
      "create project svc | in group platform",
      "create issue Fix X | in project platform/svc",
      "link issue Fix X | added labels bug",
      'link issue Fix X | linked to epic "1"',
      "link issue Fix X | closed",
    ]);

    const epic = platform.byName("epic", "Core");
    const issue = platform.byName("issue", "Fix X");
    expect(report.registry).toEqual({
      label: { "1": "bug" },
      milestone: {},
      iteration: {},
      epic: { "1": epic.id },
      issue: { "1": issue.id },
      user: {},
    });
    expect(epic.labels).toEqual(["bug"]);
    expect(issue).toMatchObject({ labels: ["bug"], parentEpicId: epic.id, state: "closed" });
  });

  it("creates everything first and links afterwards when deferred", async () => {
    const doc = await loadDocument(fixture("end-to-end.yaml"));

    const report = await materializePlan(doc, platform, deferred, silentLogger);

    expect(report.events.map((e) => `${e.action} ${e.kind} ${e.name}`)).toEqual([
      "create group Platform",
      "create label bug",
      "create epic Core",
      "create project svc",
      "create issue Fix X",
      "link epic Core",
      "link issue Fix X",
      "link issue Fix X",
      "link issue Fix X",
    ]);
    expect(report.counts).toEqual({ create: 5, reuse: 0, link: 4, gap: 0, fail: 0 });
  });
});

// ---------------------------------------------------------------------------
// Idempotence
// ---------------------------------------------------------------------------

describe("idempotence", () => {
  it("makes no changes when the same plan is applied twice", async () => {
    const doc = await loadDocument(fixture("full-plan.yaml"));

    const first = await materializePlan(doc, platform, deferred, silentLogger);
    const callsAfterFirst = platform.calls.length;
    const second = await materializePlan(doc, platform, deferred, silentLogger);
    const secondCalls = platform.calls.slice(callsAfterFirst);

    expect(first.counts.create).toBeGreaterThan(0);
    expect(second.counts.create).toBe(0);
    expect(second.counts.link).toBe(0);
    expect(secondCalls.filter((c) => c.op === "create" || c.op === "update" || c.op === "addMember")).toEqual([]);
    expect(second.registry).toEqual(first.registry);
  });
});

// ---------------------------------------------------------------------------
// Relationship ordering
// ---------------------------------------------------------------------------

describe("forward references", () => {
  const doc: PlanDocument = planDocumentSchema.parse({
    groups: [
      {
        name: "Platform",
        epics: [
          { id: "child", title: "Login flow", parent_epic_id: "parent" },
          { id: "parent", title: "Authentication" },
        ],
      },
    ],
  });

  it("reports a reference gap for a parent declared later when inline", async () => {
    const report = await materializePlan(doc, platform, inline, silentLogger);

    expect(report.referenceGaps).toEqual([
      { kind: "epic", logicalId: "parent", referencedBy: 'epic "child"', link: "parent epic" },
    ]);
    expect(platform.byName("epic", "Login flow").parentEpicId).toBeNull();
  });

  it("resolves the same reference in the deferred pass", async () => {
    const report = await materializePlan(doc, platform, deferred, silentLogger);

    expect(report.referenceGaps).toEqual([]);
    expect(platform.byName("epic", "Login flow").parentEpicId).toBe(platform.byName("epic", "Authentication").id);
  });
});

// ---------------------------------------------------------------------------
// Capability degradation
// ---------------------------------------------------------------------------

describe("capability degradation", () => {
  const doc: PlanDocument = planDocumentSchema.parse({
    groups: [
      {
        name: "Platform",
        labels: [{ id: 1, name: "bug", color: "#FF0000" }],
        epics: [{ id: 1, title: "Core", label_ids: [1] }],
        projects: [{ name: "svc", issues: [{ id: 1, title: "Fix X", label_ids: [1], parent_epic_id: 1 }] }],
      },
    ],
  });

  it("skips epics on a container without the feature and reports every reference to them", async () => {
    platform = new FakePlatform({ capabilities: () => ({ epics: "unsupported", iterations: "unsupported" }) });
    const logger = createCapturingLogger();

    const report = await materializePlan(doc, platform, deferred, logger);

    expect(platform.callsOf("create", "epic")).toEqual([]);
    expect(platform.callsOf("find", "epic")).toEqual([]);
    expect(report.referenceGaps).toEqual([
      { kind: "epic", logicalId: "1", referencedBy: 'issue "1"', link: "parent epic" },
    ]);
    expect(logger.warnings()).toEqual([
      'gap    epic "Core" (1): not created, group platform does not support epics (requires GitLab Premium or Ultimate)',
      'gap    issue "Fix X" (1): parent epic skipped, epic "1" is not registered',
    ]);
    expect(platform.byName("issue", "Fix X").labels).toEqual(["bug"]);
  });

  it("learns the gap from the first denied response", async () => {
    platform = new FakePlatform({ deniedKinds: ["epic"] });
    const twoEpics = planDocumentSchema.parse({
      groups: [{ name: "Platform", epics: [{ id: 1, title: "Core" }, { id: 2, title: "Edge" }] }],
    });

    const report = await materializePlan(twoEpics, platform, deferred, silentLogger);

    expect(platform.callsOf("find", "epic")).toHaveLength(1);
    expect(platform.callsOf("create", "epic")).toEqual([]);
    expect(report.counts.gap).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Users and members
// ---------------------------------------------------------------------------

describe("users and members", () => {
  it("resolves users, adds members and reports unknown users", async () => {
    const doc = await loadDocument(fixture("full-plan.yaml"));

    const report = await materializePlan(doc, platform, deferred, silentLogger);

    expect(report.registry.user).toEqual({ alice: 42, me: 1 });
    const group = platform.byName("group", "Platform");
    const project = platform.byName("project", "Auth Service");
    expect(platform.members.get(`group:${group.id}:42`)).toEqual({ userId: 42, accessLevel: 30 });
    expect(platform.members.get(`project:${project.id}:1`)).toEqual({ userId: 1, accessLevel: 40 });
    expect(report.referenceGaps).toContainEqual({
      kind: "user",
      logicalId: "ghost",
      referencedBy: "group platform",
      link: "membership",
    });
    expect(report.events).toContainEqual({
      action: "gap",
      kind: "user",
      name: "nobody",
      logicalId: "ghost",
      detail: "no such user on the remote instance",
    });
  });

  describe("existing membership", () => {
    const doc: PlanDocument = planDocumentSchema.parse({
      users: [{ id: "alice", username: "alice" }],
      groups: [{ name: "Platform", members: [{ user_id: "alice", role: "developer" }] }],
    });

    it("keeps a membership at or above the declared role", async () => {
      const group = await platform.create(null, { kind: "group", name: "Platform", path: "platform", description: "" });
      platform.members.set(`group:${group.id}:42`, { userId: 42, accessLevel: 50 });

      await materializePlan(doc, platform, deferred, silentLogger);

      expect(platform.callsOf("addMember")).toEqual([]);
      expect(platform.members.get(`group:${group.id}:42`)).toEqual({ userId: 42, accessLevel: 50 });
    });

    it("raises a membership below the declared role", async () => {
      const group = await platform.create(null, { kind: "group", name: "Platform", path: "platform", description: "" });
      platform.members.set(`group:${group.id}:42`, { userId: 42, accessLevel: 20 });

      await materializePlan(doc, platform, deferred, silentLogger);

      expect(platform.callsOf("addMember")).toHaveLength(1);
      expect(platform.members.get(`group:${group.id}:42`)).toEqual({ userId: 42, accessLevel: 30 });
    });
  });

  it("links issues to iteration, milestone and assignees", async () => {
    const doc = await loadDocument(fixture("full-plan.yaml"));

    await materializePlan(doc, platform, deferred, silentLogger);

    const issue = platform.byName("issue", "Add login endpoint");
    expect(issue).toMatchObject({
      labels: ["feature", "bug"],
      parentEpicId: platform.byName("epic", "Login flow").id,
      milestoneId: platform.byName("milestone", "v1.0").id,
      iterationId: platform.byName("iteration", "Sprint 1").id,
      assigneeIds: [42],
      weight: 3,
    });
    expect(platform.byName("milestone", "v0.9").state).toBe("closed");
  });
});

// ---------------------------------------------------------------------------
// Fatal conditions
// ---------------------------------------------------------------------------

describe("fatal conditions", () => {
  const doc: PlanDocument = planDocumentSchema.parse({
    groups: [{ name: "Platform", projects: [{ name: "svc" }] }],
  });

  it("places top-level groups under an existing parent", async () => {
    await platform.create(null, { kind: "group", name: "Acme", path: "acme", description: "" });

    await materializePlan(doc, platform, { ...deferred, parent: "acme" }, silentLogger);

    expect(platform.byName("project", "svc").fullPath).toBe("acme/platform/svc");
  });

  it("fails when the parent group does not exist", async () => {
    await expect(materializePlan(doc, platform, { ...deferred, parent: "missing" }, silentLogger)).rejects.toThrow(
      'Failed to materialize group "missing": parent group not found',
    );
  });

  it("stops on an existing entity under the reject policy", async () => {
    await materializePlan(doc, platform, deferred, silentLogger);

    const rerun = materializePlan(doc, platform, { ...deferred, onDuplicate: "reject" }, silentLogger);

    await expect(rerun).rejects.toThrow(ConflictError);
    await expect(rerun).rejects.toThrow('group "Platform" already exists in instance root (duplicate policy: reject)');
  });

  it("wraps container failures with the container name", async () => {
    platform = new FakePlatform({ deniedKinds: ["project"] });

    const run = materializePlan(doc, platform, deferred, silentLogger);

    await expect(run).rejects.toThrow(ContainerCreateError);
    await expect(run).rejects.toThrow('Failed to materialize project "svc": 403 Forbidden: project list');
  });
});
