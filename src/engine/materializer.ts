import type { Capability, CapabilityProbe } from "./capabilities.js";
import { ConflictError } from "./errors.js";
import type {
  ContainerRef,
  EntityDraft,
  EntityKind,
  RemoteEntity,
  RemotePlatform,
} from "./platform.js";
import type { Registry } from "./registry.js";
import type { Logger } from "../utils/logger.js";

/**
 * What to do when an entity with the declared name already exists:
 * - `reuse`: adopt it and continue (re-runs are idempotent)
 * - `reject`: raise ConflictError and stop the run
 */
export type DuplicatePolicy = "reuse" | "reject";

export type MaterializeOutcome =
  | { status: "created"; entity: RemoteEntity }
  | { status: "reused"; entity: RemoteEntity }
  | { status: "unsupported"; reason: string };

const GATED: Partial<Record<EntityKind, Capability>> = {
  epic: "epics",
  iteration: "iterations",
};

export function draftName(draft: EntityDraft): string {
  switch (draft.kind) {
    case "group":
    case "project":
    case "label":
      return draft.name;
    case "milestone":
    case "iteration":
    case "epic":
    case "issue":
      return draft.title;
  }
}

export function describeContainer(container: ContainerRef | null): string {
  return container ? `${container.kind} ${container.fullPath}` : "instance root";
}

export interface MaterializerDeps {
  platform: RemotePlatform;
  registry: Registry;
  probe: CapabilityProbe;
  logger: Logger;
  policy: DuplicatePolicy;
}

/** Find-or-create for a single entity, recording the result in the registry. */
export class Materializer {
  constructor(private readonly deps: MaterializerDeps) {}

  async materialize(
    container: ContainerRef | null,
    draft: EntityDraft,
    logicalId?: string,
  ): Promise<MaterializeOutcome> {
    const capability = GATED[draft.kind];
    let outcome: MaterializeOutcome;

    if (capability) {
      if (!container) {
        throw new Error(`${draft.kind} "${draftName(draft)}" needs a container`);
      }
      const guarded = await this.deps.probe.guard(container, capability, () =>
        this.findOrCreate(container, draft),
      );
      outcome = guarded.supported ? guarded.value : { status: "unsupported", reason: guarded.reason };
    } else {
      outcome = await this.findOrCreate(container, draft);
    }

    if (outcome.status !== "unsupported" && logicalId !== undefined) {
      this.register(draft.kind, logicalId, outcome.entity);
    }
    return outcome;
  }

  private async findOrCreate(
    container: ContainerRef | null,
    draft: EntityDraft,
  ): Promise<MaterializeOutcome> {
    const { platform, logger, policy } = this.deps;
    const name = draftName(draft);
    const where = describeContainer(container);

    const existing = await platform.find(draft.kind, container, name);
    if (existing) {
      if (policy === "reject") {
        throw new ConflictError(draft.kind, name, where);
      }
      logger.debug(`${draft.kind} "${name}" found in ${where} (id ${existing.id})`);
      return { status: "reused", entity: existing };
    }

    let entity = await platform.create(container, draft);
    logger.debug(`${draft.kind} "${name}" created in ${where} (id ${entity.id})`);

    if (draft.kind === "project") {
      entity = await platform.awaitReady(entity);
    }
    return { status: "created", entity };
  }

  private register(kind: EntityKind, logicalId: string, entity: RemoteEntity): void {
    const { registry } = this.deps;
    switch (kind) {
      case "label":
        registry.set("label", logicalId, entity.name);
        break;
      case "milestone":
      case "iteration":
      case "epic":
      case "issue":
        registry.set(kind, logicalId, entity.id);
        break;
      case "group":
      case "project":
        // containers are tracked by the traversal, not by logical id
        break;
    }
  }
}
