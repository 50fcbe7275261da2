import { setTimeout as sleep } from "node:timers/promises";
import { CapabilityDescriptor, type Capability, type CapabilityState } from "../engine/capabilities.js";
import { TransportError, type TransportReason } from "../engine/errors.js";
import type {
  ContainerKind,
  ContainerRef,
  EntityDraft,
  EntityKind,
  EntityUpdate,
  RemoteEntity,
  RemoteMember,
  RemotePlatform,
  RemoteUser,
} from "../engine/platform.js";
import type { Logger } from "../utils/logger.js";
import { GitLabClientError, GitLabRequestError, type GitLabClient } from "./client.js";
import { createIteration } from "./iterations.js";
import type {
  GitLabEpic,
  GitLabGroup,
  GitLabIssue,
  GitLabIteration,
  GitLabLabel,
  GitLabMember,
  GitLabMilestone,
  GitLabProject,
  GitLabUserRef,
} from "./types.js";

/** Which tier-gated features to assume. `auto` discovers them from access-denied responses. */
export type GitLabTier = "auto" | "free" | "premium" | "ultimate";

export type Visibility = "private" | "internal" | "public";

export interface GitLabPlatformOptions {
  tier: GitLabTier;
  visibility: Visibility;
  initializeWithReadme: boolean;
  projectReadiness: { intervalMs: number; attempts: number };
  logger: Logger;
  /** Injected for tests */
  wait?: (ms: number) => Promise<unknown>;
}

function reasonFor(status: number): TransportReason {
  if (status === 403) return "denied";
  if (status === 404) return "not_found";
  if (status === 400 || status === 409 || status === 422) return "invalid";
  return "failure";
}

/** Translate client errors into the engine's TransportError. */
async function call<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    if (err instanceof GitLabRequestError) {
      throw new TransportError(err.message, reasonFor(err.status), err.status, { cause: err });
    }
    if (err instanceof GitLabClientError) {
      throw new TransportError(err.message, "failure", undefined, { cause: err });
    }
    throw err;
  }
}

function scopeRoute(kind: ContainerKind | null, id: number | null): string {
  if (kind === null || id === null) {
    throw new Error("Entity has no container");
  }
  return kind === "group" ? `/groups/${id}` : `/projects/${id}`;
}

function baseEntity(kind: EntityKind, id: number, name: string): RemoteEntity {
  return {
    kind,
    id,
    name,
    containerId: null,
    containerKind: null,
    description: "",
    labels: [],
    parentEpicId: null,
    milestoneId: null,
    iterationId: null,
    assigneeIds: [],
    weight: null,
  };
}

function fromGroup(g: GitLabGroup): RemoteEntity {
  return {
    ...baseEntity("group", g.id, g.name),
    containerId: g.parent_id,
    containerKind: g.parent_id === null ? null : "group",
    fullPath: g.full_path,
    description: g.description ?? "",
  };
}

function fromProject(p: GitLabProject): RemoteEntity {
  return {
    ...baseEntity("project", p.id, p.name),
    containerId: p.namespace?.id ?? null,
    containerKind: "group",
    fullPath: p.path_with_namespace,
    description: p.description ?? "",
    ready: p.empty_repo === false,
  };
}

function fromLabel(l: GitLabLabel, container: ContainerRef): RemoteEntity {
  return {
    ...baseEntity("label", l.id, l.name),
    containerId: container.id,
    containerKind: container.kind,
    description: l.description ?? "",
  };
}

function fromMilestone(m: GitLabMilestone, container: ContainerRef): RemoteEntity {
  return {
    ...baseEntity("milestone", m.id, m.title),
    iid: m.iid,
    containerId: container.id,
    containerKind: container.kind,
    description: m.description ?? "",
    state: m.state,
  };
}

function fromIteration(i: { id: number; iid: number; title: string | null; description: string | null }, groupId: number): RemoteEntity {
  return {
    ...baseEntity("iteration", i.id, i.title ?? ""),
    iid: i.iid,
    containerId: groupId,
    containerKind: "group",
    description: i.description ?? "",
  };
}

function fromEpic(e: GitLabEpic): RemoteEntity {
  return {
    ...baseEntity("epic", e.id, e.title),
    iid: e.iid,
    containerId: e.group_id,
    containerKind: "group",
    description: e.description ?? "",
    state: e.state,
    labels: e.labels,
    parentEpicId: e.parent_id,
  };
}

function fromIssue(i: GitLabIssue): RemoteEntity {
  return {
    ...baseEntity("issue", i.id, i.title),
    iid: i.iid,
    containerId: i.project_id,
    containerKind: "project",
    description: i.description ?? "",
    state: i.state,
    labels: i.labels,
    parentEpicId: i.epic?.id ?? null,
    milestoneId: i.milestone?.id ?? null,
    iterationId: i.iteration?.id ?? null,
    assigneeIds: (i.assignees ?? []).map((a) => a.id),
    weight: i.weight ?? null,
  };
}

/** RemotePlatform backed by GitLab REST v4 plus GraphQL for iterations. */
export class GitLabPlatform implements RemotePlatform {
  private readonly wait: (ms: number) => Promise<unknown>;

  constructor(
    private readonly client: GitLabClient,
    private readonly opts: GitLabPlatformOptions,
  ) {
    this.wait = opts.wait ?? ((ms) => sleep(ms));
  }

  async find(kind: EntityKind, container: ContainerRef | null, name: string): Promise<RemoteEntity | null> {
    return call(async () => {
      if (kind === "group") {
        const groups = container
          ? await this.client.paginate<GitLabGroup>(`/groups/${container.id}/subgroups`, { search: name })
          : await this.client.paginate<GitLabGroup>("/groups", { search: name, top_level_only: true });
        const match = groups.find((g) => g.name === name);
        return match ? fromGroup(match) : null;
      }

      const scope = requireContainer(kind, container);
      const route = scopeRoute(scope.kind, scope.id);
      switch (kind) {
        case "project": {
          const projects = await this.client.paginate<GitLabProject>(`${route}/projects`, { search: name });
          const match = projects.find((p) => p.name === name);
          return match ? fromProject(match) : null;
        }
        case "label": {
          const labels = await this.client.paginate<GitLabLabel>(`${route}/labels`, {
            search: name,
            include_ancestor_groups: false,
          });
          const match = labels.find((l) => l.name === name && (scope.kind === "group" || l.is_project_label !== false));
          return match ? fromLabel(match, scope) : null;
        }
        case "milestone": {
          const milestones = await this.client.paginate<GitLabMilestone>(`${route}/milestones`, { title: name });
          const match = milestones.find((m) => m.title === name);
          return match ? fromMilestone(match, scope) : null;
        }
        case "iteration": {
          const iterations = await this.client.paginate<GitLabIteration>(`${route}/iterations`, {
            search: name,
            include_ancestors: false,
          });
          const match = iterations.find((i) => i.title === name && i.group_id === scope.id);
          return match ? fromIteration(match, scope.id) : null;
        }
        case "epic": {
          const epics = await this.client.paginate<GitLabEpic>(`${route}/epics`, {
            search: name,
            include_descendant_groups: false,
          });
          const match = epics.find((e) => e.title === name && e.group_id === scope.id);
          return match ? fromEpic(match) : null;
        }
        case "issue": {
          const issues = await this.client.paginate<GitLabIssue>(`${route}/issues`, { search: name, in: "title" });
          const match = issues.find((i) => i.title === name);
          return match ? fromIssue(match) : null;
        }
      }
    });
  }

  async create(container: ContainerRef | null, draft: EntityDraft): Promise<RemoteEntity> {
    return call(async () => {
      if (draft.kind === "group") {
        const group = await this.client.post<GitLabGroup>("/groups", {
          name: draft.name,
          path: draft.path,
          description: draft.description,
          visibility: this.opts.visibility,
          parent_id: container?.id,
        });
        return fromGroup(group);
      }

      const scope = requireContainer(draft.kind, container);
      const route = scopeRoute(scope.kind, scope.id);
      switch (draft.kind) {
        case "project": {
          const project = await this.client.post<GitLabProject>("/projects", {
            name: draft.name,
            path: draft.path,
            description: draft.description,
            namespace_id: scope.id,
            visibility: this.opts.visibility,
            initialize_with_readme: this.opts.initializeWithReadme,
          });
          return fromProject(project);
        }
        case "label": {
          const label = await this.client.post<GitLabLabel>(`${route}/labels`, {
            name: draft.name,
            color: draft.color,
            description: draft.description,
          });
          return fromLabel(label, scope);
        }
        case "milestone": {
          const milestone = await this.client.post<GitLabMilestone>(`${route}/milestones`, {
            title: draft.title,
            description: draft.description,
            start_date: draft.startDate,
            due_date: draft.dueDate,
          });
          return fromMilestone(milestone, scope);
        }
        case "iteration": {
          const iteration = await createIteration(this.client, {
            groupPath: scope.fullPath,
            title: draft.title,
            description: draft.description,
            startDate: draft.startDate,
            dueDate: draft.dueDate,
          });
          return fromIteration(iteration, scope.id);
        }
        case "epic": {
          const epic = await this.client.post<GitLabEpic>(`${route}/epics`, {
            title: draft.title,
            description: draft.description,
          });
          return fromEpic(epic);
        }
        case "issue": {
          const issue = await this.client.post<GitLabIssue>(`${route}/issues`, {
            title: draft.title,
            description: draft.description,
          });
          return fromIssue(issue);
        }
      }
    });
  }

  async update(entity: RemoteEntity, changes: EntityUpdate): Promise<RemoteEntity> {
    return call(async () => {
      const route = scopeRoute(entity.containerKind, entity.containerId);
      switch (entity.kind) {
        case "issue": {
          const issue = await this.client.put<GitLabIssue>(`${route}/issues/${entity.iid}`, {
            add_labels: changes.addLabels?.join(","),
            epic_id: changes.parentEpicId,
            milestone_id: changes.milestoneId,
            assignee_ids: changes.assigneeIds,
            weight: changes.weight,
            description: changes.description,
            state_event: changes.stateEvent,
          });
          return fromIssue(issue);
        }
        case "epic": {
          const epic = await this.client.put<GitLabEpic>(`${route}/epics/${entity.iid}`, {
            add_labels: changes.addLabels?.join(","),
            parent_id: changes.parentEpicId,
            description: changes.description,
            state_event: changes.stateEvent,
          });
          return fromEpic(epic);
        }
        case "milestone": {
          const milestone = await this.client.put<GitLabMilestone>(`${route}/milestones/${entity.id}`, {
            description: changes.description,
            state_event: changes.stateEvent,
          });
          return { ...entity, description: milestone.description ?? "", state: milestone.state };
        }
        default:
          throw new Error(`Updating a ${entity.kind} is not supported`);
      }
    });
  }

  async fetch(entity: RemoteEntity): Promise<RemoteEntity> {
    return call(async () => {
      switch (entity.kind) {
        case "group":
          return fromGroup(await this.client.get<GitLabGroup>(`/groups/${entity.id}`));
        case "project":
          return fromProject(await this.client.get<GitLabProject>(`/projects/${entity.id}`));
        case "issue": {
          const route = scopeRoute(entity.containerKind, entity.containerId);
          return fromIssue(await this.client.get<GitLabIssue>(`${route}/issues/${entity.iid}`));
        }
        case "epic": {
          const route = scopeRoute(entity.containerKind, entity.containerId);
          return fromEpic(await this.client.get<GitLabEpic>(`${route}/epics/${entity.iid}`));
        }
        case "milestone": {
          const route = scopeRoute(entity.containerKind, entity.containerId);
          const milestone = await this.client.get<GitLabMilestone>(`${route}/milestones/${entity.id}`);
          return { ...entity, description: milestone.description ?? "", state: milestone.state };
        }
        case "label":
        case "iteration":
          return entity;
      }
    });
  }

  /**
   * GitLab initializes the repository asynchronously after project creation,
   * so attributes read immediately can be incomplete. Poll until the
   * repository is no longer empty, bounded by the configured attempts.
   */
  async awaitReady(project: RemoteEntity): Promise<RemoteEntity> {
    if (!this.opts.initializeWithReadme || project.ready) return project;
    const { intervalMs, attempts } = this.opts.projectReadiness;

    let current = project;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      await this.wait(intervalMs);
      current = await this.fetch(current);
      if (current.ready) {
        this.opts.logger.debug(`project ${current.fullPath} ready after ${attempt} check(s)`);
        return current;
      }
    }
    this.opts.logger.warn(
      `project ${current.fullPath} still initializing after ${attempts} checks; continuing`,
    );
    return current;
  }

  asContainer(entity: RemoteEntity): ContainerRef {
    if (entity.kind !== "group" && entity.kind !== "project") {
      throw new Error(`A ${entity.kind} cannot contain other entities`);
    }
    return {
      kind: entity.kind,
      id: entity.id,
      name: entity.name,
      fullPath: entity.fullPath ?? entity.name,
      capabilities: new CapabilityDescriptor(tierCapabilities(this.opts.tier, entity.kind)),
    };
  }

  async findGroupByPath(fullPath: string): Promise<ContainerRef | null> {
    const group = await call(() =>
      this.client.getOptional<GitLabGroup>(`/groups/${encodeURIComponent(fullPath)}`),
    );
    return group ? this.asContainer(fromGroup(group)) : null;
  }

  async currentUser(): Promise<RemoteUser> {
    const user = await call(() => this.client.get<GitLabUserRef>("/user"));
    return { id: user.id, username: user.username };
  }

  async findUser(username: string): Promise<RemoteUser | null> {
    const users = await call(() => this.client.get<GitLabUserRef[]>("/users", { username }));
    const match = users.find((u) => u.username.toLowerCase() === username.toLowerCase());
    return match ? { id: match.id, username: match.username } : null;
  }

  /** Direct or inherited membership, at the effective access level. */
  async findMember(container: ContainerRef, userId: number): Promise<RemoteMember | null> {
    const route = scopeRoute(container.kind, container.id);
    const member = await call(() => this.client.getOptional<GitLabMember>(`${route}/members/all/${userId}`));
    return member ? { userId: member.id, accessLevel: member.access_level } : null;
  }

  async addMember(container: ContainerRef, userId: number, accessLevel: number): Promise<RemoteMember> {
    const route = scopeRoute(container.kind, container.id);
    const member = await call(async () => {
      try {
        return await this.client.post<GitLabMember>(`${route}/members`, { user_id: userId, access_level: accessLevel });
      } catch (err) {
        // already a direct member at a lower level
        if (err instanceof GitLabRequestError && err.status === 409) {
          return this.client.put<GitLabMember>(`${route}/members/${userId}`, { access_level: accessLevel });
        }
        throw err;
      }
    });
    return { userId: member.id, accessLevel: member.access_level };
  }
}

function requireContainer(kind: EntityKind, container: ContainerRef | null): ContainerRef {
  if (!container) throw new Error(`A ${kind} must belong to a group or project`);
  return container;
}

/** Capability descriptor seed for a container, from the configured tier. */
export function tierCapabilities(
  tier: GitLabTier,
  kind: ContainerKind,
): Partial<Record<Capability, CapabilityState>> {
  // epics and iterations only exist on groups
  if (kind === "project") return { epics: "unsupported", iterations: "unsupported" };
  switch (tier) {
    case "free":
      return { epics: "unsupported", iterations: "unsupported" };
    case "premium":
    case "ultimate":
      return { epics: "supported", iterations: "supported" };
    case "auto":
      return {};
  }
}
