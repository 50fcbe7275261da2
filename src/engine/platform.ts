import type { CapabilityDescriptor } from "./capabilities.js";

/** Every kind of entity the engine can materialize. */
export type EntityKind =
  | "group"
  | "project"
  | "label"
  | "milestone"
  | "iteration"
  | "epic"
  | "issue";

export type ContainerKind = "group" | "project";

/** A group or project that exists remotely and can hold other entities. */
export interface ContainerRef {
  kind: ContainerKind;
  id: number;
  name: string;
  fullPath: string;
  capabilities: CapabilityDescriptor;
}

/** Remote view of an entity, as returned by find/create/update/fetch. */
export interface RemoteEntity {
  kind: EntityKind;
  /** Instance-wide id */
  id: number;
  /** Container-scoped id (issues, epics, milestones) */
  iid?: number;
  /** Name for groups, projects and labels; title otherwise */
  name: string;
  /** Group or project holding this entity (null for top-level groups) */
  containerId: number | null;
  containerKind: ContainerKind | null;
  fullPath?: string;
  description: string;
  state?: string;
  labels: string[];
  /** Epics: parent epic id. Issues: epic id. */
  parentEpicId: number | null;
  milestoneId: number | null;
  iterationId: number | null;
  assigneeIds: number[];
  weight: number | null;
  /** Projects: repository initialized */
  ready?: boolean;
}

export interface GroupDraft {
  kind: "group";
  name: string;
  path: string;
  description: string;
}

export interface ProjectDraft {
  kind: "project";
  name: string;
  path: string;
  description: string;
}

export interface LabelDraft {
  kind: "label";
  name: string;
  color: string;
  description: string;
}

export interface MilestoneDraft {
  kind: "milestone";
  title: string;
  description: string;
  startDate?: string;
  dueDate?: string;
}

export interface IterationDraft {
  kind: "iteration";
  title: string;
  description: string;
  startDate?: string;
  dueDate?: string;
}

export interface EpicDraft {
  kind: "epic";
  title: string;
  description: string;
}

export interface IssueDraft {
  kind: "issue";
  title: string;
  description: string;
}

/** Fields sent on creation, discriminated by kind. */
export type EntityDraft =
  | GroupDraft
  | ProjectDraft
  | LabelDraft
  | MilestoneDraft
  | IterationDraft
  | EpicDraft
  | IssueDraft;

/** Changes applied after creation by the relationship resolver. */
export interface EntityUpdate {
  addLabels?: string[];
  parentEpicId?: number;
  milestoneId?: number;
  assigneeIds?: number[];
  weight?: number;
  description?: string;
  stateEvent?: "close";
}

export interface RemoteUser {
  id: number;
  username: string;
}

export interface RemoteMember {
  userId: number;
  accessLevel: number;
}

/**
 * What the engine needs from the remote platform. Implementations translate
 * failures into `TransportError` so the engine can classify them.
 */
export interface RemotePlatform {
  /** Exact name/title match of `kind` within `container` (null = instance root, groups only). */
  find(kind: EntityKind, container: ContainerRef | null, name: string): Promise<RemoteEntity | null>;
  create(container: ContainerRef | null, draft: EntityDraft): Promise<RemoteEntity>;
  update(entity: RemoteEntity, changes: EntityUpdate): Promise<RemoteEntity>;
  /** Re-read an entity's current remote state. */
  fetch(entity: RemoteEntity): Promise<RemoteEntity>;
  /** Wait for a freshly created project to finish asynchronous initialization. */
  awaitReady(project: RemoteEntity): Promise<RemoteEntity>;
  /** Wrap a group or project entity as a container, attaching its capability descriptor. */
  asContainer(entity: RemoteEntity): ContainerRef;
  findGroupByPath(fullPath: string): Promise<ContainerRef | null>;
  currentUser(): Promise<RemoteUser>;
  findUser(username: string): Promise<RemoteUser | null>;
  findMember(container: ContainerRef, userId: number): Promise<RemoteMember | null>;
  addMember(container: ContainerRef, userId: number, accessLevel: number): Promise<RemoteMember>;
}
