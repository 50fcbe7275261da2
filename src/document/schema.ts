import { z } from "zod";

/** Logical ids may be written as strings or numbers; both normalize to strings. */
export const logicalIdSchema = z
  .union([z.string().min(1), z.number().int()])
  .transform((v) => String(v));

const optionalRef = logicalIdSchema.nullish().transform((v) => v ?? undefined);

/** Dates arrive as YYYY-MM-DD strings, or as Date objects from YAML 1.1 timestamps. */
const dateSchema = z
  .union([z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"), z.date()])
  .transform((v) => (typeof v === "string" ? v : v.toISOString().slice(0, 10)));

export const ROLE_ACCESS_LEVELS = {
  guest: 10,
  planner: 15,
  reporter: 20,
  developer: 30,
  maintainer: 40,
  owner: 50,
} as const;

export const roleEnum = z.enum(["guest", "planner", "reporter", "developer", "maintainer", "owner"]);

export const userSchema = z.object({
  id: logicalIdSchema,
  username: z.string().min(1),
});

export const memberSchema = z.object({
  user_id: logicalIdSchema,
  role: roleEnum,
});

export const labelSchema = z.object({
  id: logicalIdSchema,
  name: z.string().min(1),
  color: z.string().regex(/^#[0-9A-Fa-f]{6}$/, "expected a hex color like #FF0000"),
  description: z.string().default(""),
});

/** Milestones and iterations share a shape. */
export const timeboxSchema = z.object({
  id: logicalIdSchema,
  title: z.string().min(1),
  description: z.string().default(""),
  start_date: dateSchema.optional(),
  due_date: dateSchema.optional(),
  state: z.enum(["active", "upcoming", "current", "closed"]).default("active"),
});

export const entityStateEnum = z.enum(["opened", "closed"]);

export const epicSchema = z.object({
  id: logicalIdSchema,
  title: z.string().min(1),
  description: z.string().default(""),
  state: entityStateEnum.default("opened"),
  label_ids: z.array(logicalIdSchema).default([]),
  parent_epic_id: optionalRef,
});

export const issueSchema = z.object({
  id: logicalIdSchema,
  title: z.string().min(1),
  description: z.string().default(""),
  state: entityStateEnum.default("opened"),
  label_ids: z.array(logicalIdSchema).default([]),
  parent_epic_id: optionalRef,
  milestone_id: optionalRef,
  iteration_id: optionalRef,
  weight: z.number().int().nonnegative().optional(),
  assignee_ids: z.array(logicalIdSchema).default([]),
});

export const projectSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  members: z.array(memberSchema).default([]),
  labels: z.array(labelSchema).default([]),
  milestones: z.array(timeboxSchema).default([]),
  issues: z.array(issueSchema).default([]),
});

export interface GroupInput {
  name: string;
  description?: string;
  members?: z.input<typeof memberSchema>[];
  labels?: z.input<typeof labelSchema>[];
  iterations?: z.input<typeof timeboxSchema>[];
  milestones?: z.input<typeof timeboxSchema>[];
  epics?: z.input<typeof epicSchema>[];
  projects?: z.input<typeof projectSchema>[];
  subgroups?: GroupInput[];
}

export interface GroupDecl {
  name: string;
  description: string;
  members: z.output<typeof memberSchema>[];
  labels: z.output<typeof labelSchema>[];
  iterations: z.output<typeof timeboxSchema>[];
  milestones: z.output<typeof timeboxSchema>[];
  epics: z.output<typeof epicSchema>[];
  projects: z.output<typeof projectSchema>[];
  subgroups: GroupDecl[];
}

export const groupSchema: z.ZodType<GroupDecl, z.ZodTypeDef, GroupInput> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    description: z.string().default(""),
    members: z.array(memberSchema).default([]),
    labels: z.array(labelSchema).default([]),
    iterations: z.array(timeboxSchema).default([]),
    milestones: z.array(timeboxSchema).default([]),
    epics: z.array(epicSchema).default([]),
    projects: z.array(projectSchema).default([]),
    subgroups: z.array(groupSchema).default([]),
  }),
);

/** Validates the full plan document. */
export const planDocumentSchema = z.object({
  users: z.array(userSchema).default([]),
  groups: z.array(groupSchema).min(1, "at least one group is required"),
});
