import type { EntityKind } from "./platform.js";

/** Document could not be parsed or failed validation. Raised before any remote call. */
export class DocumentError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "DocumentError";
    this.issues = issues;
  }
}

/**
 * Why a remote call failed, as far as the engine cares:
 * - `denied`: authorization refused (403); on tier-gated kinds this is a capability gap
 * - `not_found`: 404
 * - `invalid`: the platform rejected the payload (400, 409, 422)
 * - `failure`: anything else (network, auth, 5xx, rate limit)
 */
export type TransportReason = "denied" | "not_found" | "invalid" | "failure";

/** Failure talking to the remote platform. */
export class TransportError extends Error {
  readonly reason: TransportReason;
  readonly status: number | undefined;

  constructor(message: string, reason: TransportReason, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.reason = reason;
    this.status = status;
  }
}

/** A group or project could not be found or created; its subtree cannot be processed. */
export class ContainerCreateError extends Error {
  readonly containerKind: "group" | "project";
  readonly containerName: string;

  constructor(containerKind: "group" | "project", containerName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to materialize ${containerKind} "${containerName}": ${detail}`, { cause });
    this.name = "ContainerCreateError";
    this.containerKind = containerKind;
    this.containerName = containerName;
  }
}

/** Name collision under the `reject` duplicate policy. */
export class ConflictError extends Error {
  readonly kind: EntityKind;
  readonly entityName: string;

  constructor(kind: EntityKind, entityName: string, container: string) {
    super(`${kind} "${entityName}" already exists in ${container} (duplicate policy: reject)`);
    this.name = "ConflictError";
    this.kind = kind;
    this.entityName = entityName;
  }
}

/** Attempt to remap a logical id that is already registered. */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/** A relationship pointing at a logical id that was never registered. Recorded, never thrown. */
export interface ReferenceGap {
  /** Kind of the missing target, e.g. "epic" */
  kind: string;
  /** The unresolved logical id */
  logicalId: string;
  /** The entity holding the reference, e.g. `issue "issue1"` */
  referencedBy: string;
  /** Which link was skipped, e.g. "parent epic" */
  link: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
