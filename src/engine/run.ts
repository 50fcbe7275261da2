import { ROLE_ACCESS_LEVELS } from "../document/schema.js";
import type { MemberDecl, PlanDocument, UserDecl } from "../document/types.js";
import type { Logger } from "../utils/logger.js";
import { slugify } from "../utils/slug.js";
import { CapabilityProbe } from "./capabilities.js";
import {
  ConflictError,
  ContainerCreateError,
  TransportError,
  errorMessage,
  type ReferenceGap,
} from "./errors.js";
import type { IterationLinker } from "./iteration-directive.js";
import {
  Materializer,
  describeContainer,
  draftName,
  type DuplicatePolicy,
  type MaterializeOutcome,
} from "./materializer.js";
import type { ContainerRef, EntityDraft, RemotePlatform } from "./platform.js";
import { Registry, type RegistrySnapshot } from "./registry.js";
import { RelationshipResolver, type LinkTarget } from "./resolver.js";
import { Trace, type TraceAction, type TraceEvent } from "./trace.js";
import { walkDocument, type Visit } from "./traversal.js";

/**
 * When deferred links are applied:
 * - `deferred`: one pass after the whole document exists (forward references resolve)
 * - `inline`: right after each entity (forward references become reference gaps)
 */
export type RelationshipMode = "deferred" | "inline";

export interface RunOptions {
  onDuplicate: DuplicatePolicy;
  relationships: RelationshipMode;
  /** Full path of an existing group that receives the document's top-level groups */
  parent?: string;
  iterationLinker?: IterationLinker;
}

export interface RunReport {
  relationships: RelationshipMode;
  events: TraceEvent[];
  referenceGaps: ReferenceGap[];
  registry: RegistrySnapshot;
  counts: Record<TraceAction, number>;
}

const SELF_HANDLE = "@me";

/** Materialize a validated plan document against a remote platform. */
export async function materializePlan(
  doc: PlanDocument,
  platform: RemotePlatform,
  options: RunOptions,
  logger: Logger,
): Promise<RunReport> {
  const registry = new Registry();
  const trace = new Trace(logger);
  const probe = new CapabilityProbe(logger);
  const materializer = new Materializer({
    platform,
    registry,
    probe,
    logger,
    policy: options.onDuplicate,
  });
  const resolver = new RelationshipResolver({
    platform,
    registry,
    trace,
    iterationLinker: options.iterationLinker,
  });

  for (const user of doc.users) {
    await resolveUser(platform, registry, trace, user);
  }

  const root = options.parent ? await resolveParent(platform, options.parent) : null;
  const containers = new Map<string, ContainerRef>();
  const pending: LinkTarget[] = [];

  const containerFor = (key: string): ContainerRef => {
    const container = containers.get(key);
    if (!container) throw new Error(`Container ${key} was not materialized before its contents`);
    return container;
  };

  const link = async (target: LinkTarget) => {
    if (options.relationships === "inline") {
      await resolver.resolve(target);
    } else {
      pending.push(target);
    }
  };

  for (const visit of walkDocument(doc)) {
    switch (visit.type) {
      case "group":
      case "project": {
        const parent = visit.parentKey === null ? root : containerFor(visit.parentKey);
        const entity = await materializeContainer(materializer, trace, parent, visit);
        containers.set(visit.key, platform.asContainer(entity));
        break;
      }
      case "member":
        await addMember(platform, registry, trace, containerFor(visit.containerKey), visit.decl);
        break;
      case "label": {
        const { decl } = visit;
        await materializeLeaf(materializer, trace, containerFor(visit.containerKey), decl.id, {
          kind: "label",
          name: decl.name,
          color: decl.color,
          description: decl.description,
        });
        break;
      }
      case "iteration":
      case "milestone": {
        const { decl } = visit;
        const outcome = await materializeLeaf(materializer, trace, containerFor(visit.containerKey), decl.id, {
          kind: visit.type,
          title: decl.title,
          description: decl.description,
          startDate: decl.start_date,
          dueDate: decl.due_date,
        });
        if (visit.type === "milestone" && outcome.status !== "unsupported") {
          await link({ kind: "milestone", logicalId: decl.id, decl, entity: outcome.entity });
        }
        break;
      }
      case "epic": {
        const { decl } = visit;
        const outcome = await materializeLeaf(materializer, trace, containerFor(visit.containerKey), decl.id, {
          kind: "epic",
          title: decl.title,
          description: decl.description,
        });
        if (outcome.status !== "unsupported") {
          await link({ kind: "epic", logicalId: decl.id, decl, entity: outcome.entity });
        }
        break;
      }
      case "issue": {
        const { decl } = visit;
        const outcome = await materializeLeaf(materializer, trace, containerFor(visit.containerKey), decl.id, {
          kind: "issue",
          title: decl.title,
          description: decl.description,
        });
        if (outcome.status !== "unsupported") {
          await link({ kind: "issue", logicalId: decl.id, decl, entity: outcome.entity });
        }
        break;
      }
    }
  }

  if (pending.length > 0) {
    logger.info(`Applying relationships for ${pending.length} entities...`);
    for (const target of pending) {
      await resolver.resolve(target);
    }
  }

  return {
    relationships: options.relationships,
    events: trace.events,
    referenceGaps: trace.referenceGaps,
    registry: registry.snapshot(),
    counts: {
      create: trace.count("create"),
      reuse: trace.count("reuse"),
      link: trace.count("link"),
      gap: trace.count("gap"),
      fail: trace.count("fail"),
    },
  };
}

async function resolveUser(
  platform: RemotePlatform,
  registry: Registry,
  trace: Trace,
  user: UserDecl,
): Promise<void> {
  const handle = user.username.replace(/^@/, "");
  const remote =
    user.username === SELF_HANDLE ? await platform.currentUser() : await platform.findUser(handle);
  if (!remote) {
    trace.record({
      action: "gap",
      kind: "user",
      name: user.username,
      logicalId: user.id,
      detail: "no such user on the remote instance",
    });
    return;
  }
  registry.set("user", user.id, remote.id);
  trace.record({
    action: "reuse",
    kind: "user",
    name: user.username,
    logicalId: user.id,
    detail: `resolved to @${remote.username} (id ${remote.id})`,
  });
}

async function resolveParent(platform: RemotePlatform, fullPath: string): Promise<ContainerRef> {
  let parent: ContainerRef | null;
  try {
    parent = await platform.findGroupByPath(fullPath);
  } catch (err) {
    throw new ContainerCreateError("group", fullPath, err);
  }
  if (!parent) {
    throw new ContainerCreateError("group", fullPath, "parent group not found");
  }
  return parent;
}

async function materializeContainer(
  materializer: Materializer,
  trace: Trace,
  parent: ContainerRef | null,
  visit: Extract<Visit, { type: "group" | "project" }>,
) {
  const { decl } = visit;
  const draft: EntityDraft = {
    kind: visit.type,
    name: decl.name,
    path: slugify(decl.name),
    description: decl.description,
  };
  let outcome: MaterializeOutcome;
  try {
    outcome = await materializer.materialize(parent, draft);
  } catch (err) {
    if (err instanceof ConflictError) throw err;
    throw new ContainerCreateError(visit.type, decl.name, err);
  }
  if (outcome.status === "unsupported") {
    throw new ContainerCreateError(visit.type, decl.name, outcome.reason);
  }
  trace.record({
    action: outcome.status === "created" ? "create" : "reuse",
    kind: visit.type,
    name: decl.name,
    detail: `in ${describeContainer(parent)}`,
  });
  return outcome.entity;
}

async function materializeLeaf(
  materializer: Materializer,
  trace: Trace,
  container: ContainerRef,
  logicalId: string,
  draft: EntityDraft,
): Promise<MaterializeOutcome> {
  const outcome = await materializer.materialize(container, draft, logicalId);
  const name = draftName(draft);
  if (outcome.status === "unsupported") {
    trace.record({ action: "gap", kind: draft.kind, name, logicalId, detail: `not created, ${outcome.reason}` });
  } else {
    trace.record({
      action: outcome.status === "created" ? "create" : "reuse",
      kind: draft.kind,
      name,
      logicalId,
      detail: `in ${describeContainer(container)}`,
    });
  }
  return outcome;
}

async function addMember(
  platform: RemotePlatform,
  registry: Registry,
  trace: Trace,
  container: ContainerRef,
  decl: MemberDecl,
): Promise<void> {
  const source = { kind: "member", name: container.fullPath, logicalId: decl.user_id };
  const userId = registry.get("user", decl.user_id);
  if (userId === undefined) {
    trace.referenceGap(
      {
        kind: "user",
        logicalId: decl.user_id,
        referencedBy: `${container.kind} ${container.fullPath}`,
        link: "membership",
      },
      source,
    );
    return;
  }

  const accessLevel = ROLE_ACCESS_LEVELS[decl.role];
  const existing = await platform.findMember(container, userId);
  if (existing && existing.accessLevel >= accessLevel) {
    trace.record({ action: "reuse", ...source, detail: `already a member (access level ${existing.accessLevel})` });
    return;
  }

  try {
    await platform.addMember(container, userId, accessLevel);
    trace.record({ action: "link", ...source, detail: `added as ${decl.role}` });
  } catch (err) {
    if (!(err instanceof TransportError) || err.reason === "failure") throw err;
    trace.record({ action: "fail", ...source, detail: `membership not added: ${errorMessage(err)}` });
  }
}
