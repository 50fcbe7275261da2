import type {
  EpicDecl,
  GroupDecl,
  IssueDecl,
  LabelDecl,
  MemberDecl,
  PlanDocument,
  ProjectDecl,
  TimeboxDecl,
} from "../document/types.js";

/** One step of the walk. Container keys tie nested visits to the group/project visit that precedes them. */
export type Visit =
  | { type: "group"; key: string; parentKey: string | null; depth: number; decl: GroupDecl }
  | { type: "project"; key: string; parentKey: string; depth: number; decl: ProjectDecl }
  | { type: "member"; containerKey: string; decl: MemberDecl }
  | { type: "label"; containerKey: string; decl: LabelDecl }
  | { type: "iteration"; containerKey: string; decl: TimeboxDecl }
  | { type: "milestone"; containerKey: string; decl: TimeboxDecl }
  | { type: "epic"; containerKey: string; decl: EpicDecl }
  | { type: "issue"; containerKey: string; decl: IssueDecl };

interface Frame {
  node: GroupDecl;
  parentKey: string | null;
  depth: number;
}

export function groupKey(parentKey: string | null, name: string): string {
  return parentKey === null ? `group:${name}` : `${parentKey}/${name}`;
}

export function projectKey(groupKey: string, name: string): string {
  return `${groupKey}#${name}`;
}

/**
 * Depth-first walk over the document using an explicit stack.
 *
 * Group order: group, members, labels, iterations, milestones, epics,
 * projects (each: project, members, labels, milestones, issues), then subgroups.
 * A consumer that materializes each container when it is yielded therefore
 * always has it before anything nested inside it arrives.
 */
export function* walkDocument(doc: PlanDocument): Generator<Visit, void, undefined> {
  const stack: Frame[] = [];
  for (let i = doc.groups.length - 1; i >= 0; i--) {
    stack.push({ node: doc.groups[i], parentKey: null, depth: 0 });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, parentKey, depth } = frame;
    const key = groupKey(parentKey, node.name);

    yield { type: "group", key, parentKey, depth, decl: node };
    for (const decl of node.members) yield { type: "member", containerKey: key, decl };
    for (const decl of node.labels) yield { type: "label", containerKey: key, decl };
    for (const decl of node.iterations) yield { type: "iteration", containerKey: key, decl };
    for (const decl of node.milestones) yield { type: "milestone", containerKey: key, decl };
    for (const decl of node.epics) yield { type: "epic", containerKey: key, decl };

    for (const project of node.projects) {
      const pKey = projectKey(key, project.name);
      yield { type: "project", key: pKey, parentKey: key, depth: depth + 1, decl: project };
      for (const decl of project.members) yield { type: "member", containerKey: pKey, decl };
      for (const decl of project.labels) yield { type: "label", containerKey: pKey, decl };
      for (const decl of project.milestones) yield { type: "milestone", containerKey: pKey, decl };
      for (const decl of project.issues) yield { type: "issue", containerKey: pKey, decl };
    }

    for (let i = node.subgroups.length - 1; i >= 0; i--) {
      stack.push({ node: node.subgroups[i], parentKey: key, depth: depth + 1 });
    }
  }
}
