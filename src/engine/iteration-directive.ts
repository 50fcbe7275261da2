import type { EntityUpdate, RemoteEntity } from "./platform.js";

/**
 * Issue → iteration linkage.
 *
 * GitLab's REST issue API has no iteration field, so the link is made by
 * appending an `/iteration` quick action to the issue description; GitLab's
 * quick-action processor assigns the iteration and strips the line. This is a
 * workaround for that API gap. If a structured field becomes available, swap
 * the linker passed to the resolver and nothing else changes.
 */
export interface IterationLinker {
  /** Update that links `issue` to `iterationId`, or null when already linked. */
  link(issue: RemoteEntity, iterationId: number): EntityUpdate | null;
}

const DIRECTIVE = /^\/iteration \*iteration:(\d+)\s*$/m;

export function iterationDirective(iterationId: number): string {
  return `/iteration *iteration:${iterationId}`;
}

/** Find a pending directive in a description. Used by stand-ins that emulate quick-action processing. */
export function extractIterationDirective(
  description: string,
): { iterationId: number; description: string } | null {
  const match = DIRECTIVE.exec(description);
  if (!match) return null;
  const stripped = description.replace(DIRECTIVE, "").replace(/\n+$/, "");
  return { iterationId: Number(match[1]), description: stripped };
}

export const quickActionIterationLinker: IterationLinker = {
  link(issue, iterationId) {
    if (issue.iterationId === iterationId) return null;
    const body = issue.description.replace(/\s+$/, "");
    const directive = iterationDirective(iterationId);
    return { description: body ? `${body}\n\n${directive}` : directive };
  },
};
