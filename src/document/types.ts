import type { z } from "zod";
import type {
  epicSchema,
  issueSchema,
  labelSchema,
  memberSchema,
  planDocumentSchema,
  projectSchema,
  roleEnum,
  timeboxSchema,
  userSchema,
} from "./schema.js";

export type { GroupDecl } from "./schema.js";

/** A validated plan document. */
export type PlanDocument = z.output<typeof planDocumentSchema>;

export type UserDecl = z.output<typeof userSchema>;
export type MemberDecl = z.output<typeof memberSchema>;
export type Role = z.output<typeof roleEnum>;
export type LabelDecl = z.output<typeof labelSchema>;
/** Milestone or iteration declaration. */
export type TimeboxDecl = z.output<typeof timeboxSchema>;
export type EpicDecl = z.output<typeof epicSchema>;
export type IssueDecl = z.output<typeof issueSchema>;
export type ProjectDecl = z.output<typeof projectSchema>;

/** Kinds whose logical ids must be unique across the document. */
export type LogicalKind = "user" | "label" | "milestone" | "iteration" | "epic" | "issue";

/** Structural problem found after schema validation. */
export interface DocumentIssue {
  type: "duplicate_id";
  message: string;
  context: { kind: LogicalKind; id: string; occurrences: number };
}
