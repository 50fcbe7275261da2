import type { EpicDecl, IssueDecl, TimeboxDecl } from "../document/types.js";
import { TransportError, errorMessage } from "./errors.js";
import { quickActionIterationLinker, type IterationLinker } from "./iteration-directive.js";
import type { EntityUpdate, RemoteEntity, RemotePlatform } from "./platform.js";
import type { Registry, RegistryKind, RegistryValues } from "./registry.js";
import type { Trace } from "./trace.js";

/** A materialized entity whose deferred links still need applying. */
export type LinkTarget =
  | { kind: "epic"; logicalId: string; decl: EpicDecl; entity: RemoteEntity }
  | { kind: "issue"; logicalId: string; decl: IssueDecl; entity: RemoteEntity }
  | { kind: "milestone"; logicalId: string; decl: TimeboxDecl; entity: RemoteEntity };

export interface ResolverDeps {
  platform: RemotePlatform;
  registry: Registry;
  trace: Trace;
  iterationLinker?: IterationLinker;
}

/**
 * Applies relationships that need other entities to exist first.
 * Order per entity: labels, parent epic, milestone, iteration, assignees,
 * weight, state. Every step is local: an unregistered reference is recorded as
 * a gap, a denied or rejected update is recorded and the next step still runs.
 * Only transport failures abort.
 */
export class RelationshipResolver {
  private readonly linker: IterationLinker;

  constructor(private readonly deps: ResolverDeps) {
    this.linker = deps.iterationLinker ?? quickActionIterationLinker;
  }

  async resolve(target: LinkTarget): Promise<RemoteEntity> {
    let current = target.entity;

    switch (target.kind) {
      case "epic":
        current = await this.attachLabels(target, current, target.decl.label_ids);
        current = await this.linkParentEpic(target, current, target.decl.parent_epic_id);
        current = await this.applyState(target, current, target.decl.state);
        break;
      case "issue": {
        const { decl } = target;
        current = await this.attachLabels(target, current, decl.label_ids);
        current = await this.linkParentEpic(target, current, decl.parent_epic_id);
        current = await this.linkMilestone(target, current, decl.milestone_id);
        current = await this.linkIteration(target, current, decl.iteration_id);
        current = await this.assign(target, current, decl.assignee_ids);
        current = await this.applyWeight(target, current, decl.weight);
        current = await this.applyState(target, current, decl.state);
        break;
      }
      case "milestone":
        current = await this.applyState(target, current, target.decl.state);
        break;
    }

    return current;
  }

  private async attachLabels(target: LinkTarget, current: RemoteEntity, refs: string[]): Promise<RemoteEntity> {
    const names: string[] = [];
    for (const ref of refs) {
      const name = this.lookup(target, "label", ref, "label");
      if (name !== undefined && !names.includes(name)) names.push(name);
    }
    const missing = names.filter((n) => !current.labels.includes(n));
    if (missing.length === 0) return current;
    return this.apply(target, current, "labels", { addLabels: missing }, `added labels ${missing.join(", ")}`);
  }

  private async linkParentEpic(
    target: LinkTarget,
    current: RemoteEntity,
    ref: string | undefined,
  ): Promise<RemoteEntity> {
    if (ref === undefined) return current;
    if (target.kind === "epic" && ref === target.logicalId) {
      this.deps.trace.record({
        action: "fail",
        kind: target.kind,
        name: current.name,
        logicalId: target.logicalId,
        detail: "an epic cannot be its own parent",
      });
      return current;
    }
    const epicId = this.lookup(target, "epic", ref, "parent epic");
    if (epicId === undefined || current.parentEpicId === epicId) return current;
    return this.apply(target, current, "parent epic", { parentEpicId: epicId }, `linked to epic "${ref}"`);
  }

  private async linkMilestone(
    target: LinkTarget,
    current: RemoteEntity,
    ref: string | undefined,
  ): Promise<RemoteEntity> {
    if (ref === undefined) return current;
    const milestoneId = this.lookup(target, "milestone", ref, "milestone");
    if (milestoneId === undefined || current.milestoneId === milestoneId) return current;
    return this.apply(target, current, "milestone", { milestoneId }, `set milestone "${ref}"`);
  }

  private async linkIteration(
    target: LinkTarget,
    current: RemoteEntity,
    ref: string | undefined,
  ): Promise<RemoteEntity> {
    if (ref === undefined) return current;
    const iterationId = this.lookup(target, "iteration", ref, "iteration");
    if (iterationId === undefined) return current;
    const changes = this.linker.link(current, iterationId);
    if (!changes) return current;
    return this.apply(target, current, "iteration", changes, `set iteration "${ref}"`);
  }

  private async assign(target: LinkTarget, current: RemoteEntity, refs: string[]): Promise<RemoteEntity> {
    const resolved: number[] = [];
    for (const ref of refs) {
      const userId = this.lookup(target, "user", ref, "assignee");
      if (userId !== undefined) resolved.push(userId);
    }
    const added = resolved.filter((id) => !current.assigneeIds.includes(id));
    if (added.length === 0) return current;
    const assigneeIds = [...current.assigneeIds, ...new Set(added)];
    return this.apply(target, current, "assignees", { assigneeIds }, `assigned ${added.length} user(s)`);
  }

  private async applyWeight(
    target: LinkTarget,
    current: RemoteEntity,
    weight: number | undefined,
  ): Promise<RemoteEntity> {
    if (weight === undefined || current.weight === weight) return current;
    return this.apply(target, current, "weight", { weight }, `weight ${weight}`);
  }

  private async applyState(target: LinkTarget, current: RemoteEntity, state: string): Promise<RemoteEntity> {
    if (state !== "closed" || current.state === "closed") return current;
    return this.apply(target, current, "state", { stateEvent: "close" }, "closed");
  }

  /** Registry lookup that records a reference gap when the id is absent. */
  private lookup<K extends RegistryKind>(
    target: LinkTarget,
    kind: K,
    ref: string,
    link: string,
  ): RegistryValues[K] | undefined {
    const value = this.deps.registry.get(kind, ref);
    if (value === undefined) {
      this.deps.trace.referenceGap(
        { kind, logicalId: ref, referencedBy: `${target.kind} "${target.logicalId}"`, link },
        { kind: target.kind, name: target.entity.name, logicalId: target.logicalId },
      );
    }
    return value;
  }

  private async apply(
    target: LinkTarget,
    current: RemoteEntity,
    link: string,
    changes: EntityUpdate,
    detail: string,
  ): Promise<RemoteEntity> {
    const source = { kind: target.kind, name: current.name, logicalId: target.logicalId };
    try {
      const updated = await this.deps.platform.update(current, changes);
      this.deps.trace.record({ action: "link", ...source, detail });
      return updated;
    } catch (err) {
      if (!(err instanceof TransportError) || err.reason === "failure") throw err;
      this.deps.trace.record({
        action: err.reason === "denied" ? "gap" : "fail",
        ...source,
        detail: `${link} not applied: ${errorMessage(err)}`,
      });
      return current;
    }
  }
}
