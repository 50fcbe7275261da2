import type { ReferenceGap } from "./errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * - create / reuse: an entity was materialized
 * - link: a relationship or state update was applied
 * - gap: a reference or capability could not be satisfied
 * - fail: a single link was rejected by the platform
 */
export type TraceAction = "create" | "reuse" | "link" | "gap" | "fail";

export interface TraceEvent {
  action: TraceAction;
  kind: string;
  name: string;
  logicalId?: string;
  detail?: string;
}

/** Ordered record of every decision in a run, echoed to the logger as it happens. */
export class Trace {
  readonly events: TraceEvent[] = [];
  readonly referenceGaps: ReferenceGap[] = [];

  constructor(private readonly logger: Logger) {}

  record(event: TraceEvent): void {
    this.events.push(event);
    const line = formatTraceEvent(event);
    if (event.action === "gap" || event.action === "fail") {
      this.logger.warn(line);
    } else {
      this.logger.info(line);
    }
  }

  /** Record an unresolved reference held by `source`. */
  referenceGap(gap: ReferenceGap, source: { kind: string; name: string; logicalId?: string }): void {
    this.referenceGaps.push(gap);
    this.record({
      action: "gap",
      kind: source.kind,
      name: source.name,
      logicalId: source.logicalId,
      detail: `${gap.link} skipped, ${gap.kind} "${gap.logicalId}" is not registered`,
    });
  }

  count(action: TraceAction): number {
    return this.events.filter((e) => e.action === action).length;
  }
}

export function formatTraceEvent(event: TraceEvent): string {
  const id = event.logicalId !== undefined ? ` (${event.logicalId})` : "";
  const detail = event.detail ? `: ${event.detail}` : "";
  return `${event.action.padEnd(6)} ${event.kind} "${event.name}"${id}${detail}`;
}
