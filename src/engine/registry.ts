import { RegistryError } from "./errors.js";

/** Remote value recorded per kind. Labels are keyed by name in the GitLab API. */
export interface RegistryValues {
  label: string;
  milestone: number;
  iteration: number;
  epic: number;
  issue: number;
  user: number;
}

export type RegistryKind = keyof RegistryValues;

export const REGISTRY_KINDS: readonly RegistryKind[] = [
  "label",
  "milestone",
  "iteration",
  "epic",
  "issue",
  "user",
];

export type RegistrySnapshot = {
  [K in RegistryKind]: Record<string, RegistryValues[K]>;
};

/**
 * Logical id → remote id, one map per kind, scoped to a single run.
 * Append-only: a mapping is never removed or changed once set.
 */
export class Registry {
  private readonly maps: { [K in RegistryKind]: Map<string, RegistryValues[K]> } = {
    label: new Map(),
    milestone: new Map(),
    iteration: new Map(),
    epic: new Map(),
    issue: new Map(),
    user: new Map(),
  };

  /** Record a mapping. Setting the same value again is a no-op; a different value throws. */
  set<K extends RegistryKind>(kind: K, logicalId: string, value: RegistryValues[K]): void {
    const map: Map<string, RegistryValues[K]> = this.maps[kind];
    const existing = map.get(logicalId);
    if (existing !== undefined) {
      if (existing === value) return;
      throw new RegistryError(
        `${kind} "${logicalId}" is already mapped to ${String(existing)}; refusing to remap to ${String(value)}`,
      );
    }
    map.set(logicalId, value);
  }

  get<K extends RegistryKind>(kind: K, logicalId: string): RegistryValues[K] | undefined {
    const map: Map<string, RegistryValues[K]> = this.maps[kind];
    return map.get(logicalId);
  }

  has(kind: RegistryKind, logicalId: string): boolean {
    return this.maps[kind].has(logicalId);
  }

  size(kind: RegistryKind): number {
    return this.maps[kind].size;
  }

  snapshot(): RegistrySnapshot {
    return {
      label: Object.fromEntries(this.maps.label),
      milestone: Object.fromEntries(this.maps.milestone),
      iteration: Object.fromEntries(this.maps.iteration),
      epic: Object.fromEntries(this.maps.epic),
      issue: Object.fromEntries(this.maps.issue),
      user: Object.fromEntries(this.maps.user),
    };
  }
}
