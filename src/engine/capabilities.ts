import { TransportError } from "./errors.js";
import type { ContainerRef } from "./platform.js";
import type { Logger } from "../utils/logger.js";

/** Optional features that only exist on higher GitLab tiers. */
export type Capability = "epics" | "iterations";

export type CapabilityState = "supported" | "unsupported" | "unknown";

/**
 * Per-container record of which tier-gated features are usable.
 * Built when the container ref is constructed; `unknown` entries are settled
 * by the probe the first time the feature is exercised.
 */
export class CapabilityDescriptor {
  private readonly states = new Map<Capability, CapabilityState>();

  constructor(initial: Partial<Record<Capability, CapabilityState>> = {}) {
    for (const [capability, state] of Object.entries(initial)) {
      if (isCapability(capability) && state) this.states.set(capability, state);
    }
  }

  get(capability: Capability): CapabilityState {
    return this.states.get(capability) ?? "unknown";
  }

  supports(capability: Capability): boolean {
    return this.get(capability) !== "unsupported";
  }

  mark(capability: Capability, state: CapabilityState): void {
    this.states.set(capability, state);
  }
}

function isCapability(value: string): value is Capability {
  return value === "epics" || value === "iterations";
}

export type Guarded<T> =
  | { supported: true; value: T }
  | { supported: false; reason: string };

/**
 * Runs tier-gated operations. A container already known to lack the feature is
 * skipped without any remote call. Otherwise the operation runs, and an
 * access-denied response is classified as a capability gap and remembered;
 * every other error is re-raised.
 */
export class CapabilityProbe {
  constructor(private readonly logger: Logger) {}

  async guard<T>(
    container: ContainerRef,
    capability: Capability,
    operation: () => Promise<T>,
  ): Promise<Guarded<T>> {
    if (!container.capabilities.supports(capability)) {
      return { supported: false, reason: gapMessage(container, capability) };
    }

    try {
      const value = await operation();
      if (container.capabilities.get(capability) === "unknown") {
        container.capabilities.mark(capability, "supported");
        this.logger.debug(`${capability} available on ${container.fullPath}`);
      }
      return { supported: true, value };
    } catch (err) {
      if (isAccessDenied(err)) {
        container.capabilities.mark(capability, "unsupported");
        this.logger.debug(`${capability} denied on ${container.fullPath}, marking unsupported`);
        return { supported: false, reason: gapMessage(container, capability) };
      }
      throw err;
    }
  }
}

export function isAccessDenied(err: unknown): boolean {
  return err instanceof TransportError && err.reason === "denied";
}

function gapMessage(container: ContainerRef, capability: Capability): string {
  return `${container.kind} ${container.fullPath} does not support ${capability} (requires GitLab Premium or Ultimate)`;
}
