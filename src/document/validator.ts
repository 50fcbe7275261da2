import type { DocumentIssue, GroupDecl, LogicalKind, PlanDocument } from "./types.js";

/**
 * Structural checks the schema cannot express.
 * Returns all problems found (does not short-circuit on the first).
 */
export function validateDocument(doc: PlanDocument): DocumentIssue[] {
  const counts = new Map<LogicalKind, Map<string, number>>();
  const count = (kind: LogicalKind, id: string) => {
    let perKind = counts.get(kind);
    if (!perKind) {
      perKind = new Map();
      counts.set(kind, perKind);
    }
    perKind.set(id, (perKind.get(id) ?? 0) + 1);
  };

  for (const user of doc.users) count("user", user.id);

  const stack: GroupDecl[] = [...doc.groups];
  while (stack.length > 0) {
    const group = stack.pop();
    if (!group) break;
    for (const label of group.labels) count("label", label.id);
    for (const iteration of group.iterations) count("iteration", iteration.id);
    for (const milestone of group.milestones) count("milestone", milestone.id);
    for (const epic of group.epics) count("epic", epic.id);
    for (const project of group.projects) {
      for (const label of project.labels) count("label", label.id);
      for (const milestone of project.milestones) count("milestone", milestone.id);
      for (const issue of project.issues) count("issue", issue.id);
    }
    stack.push(...group.subgroups);
  }

  const issues: DocumentIssue[] = [];
  for (const [kind, perKind] of counts) {
    for (const [id, occurrences] of perKind) {
      if (occurrences > 1) {
        issues.push({
          type: "duplicate_id",
          message: `${kind} id "${id}" is declared ${occurrences} times`,
          context: { kind, id, occurrences },
        });
      }
    }
  }
  return issues;
}

export type DocumentSummary = Record<
  "users" | "groups" | "projects" | "labels" | "iterations" | "milestones" | "epics" | "issues",
  number
>;

/** Entity counts per kind, for `plansmith validate`. */
export function summarizeDocument(doc: PlanDocument): DocumentSummary {
  const summary: DocumentSummary = {
    users: doc.users.length,
    groups: 0,
    projects: 0,
    labels: 0,
    iterations: 0,
    milestones: 0,
    epics: 0,
    issues: 0,
  };

  const stack: GroupDecl[] = [...doc.groups];
  while (stack.length > 0) {
    const group = stack.pop();
    if (!group) break;
    summary.groups++;
    summary.labels += group.labels.length;
    summary.iterations += group.iterations.length;
    summary.milestones += group.milestones.length;
    summary.epics += group.epics.length;
    for (const project of group.projects) {
      summary.projects++;
      summary.labels += project.labels.length;
      summary.milestones += project.milestones.length;
      summary.issues += project.issues.length;
    }
    stack.push(...group.subgroups);
  }
  return summary;
}
