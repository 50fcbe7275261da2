import { z } from "zod";

export const projectReadinessSchema = z.object({
  /** Delay between readiness checks after a project is created */
  intervalMs: z.number().int().positive().default(1_000),
  attempts: z.number().int().positive().default(10),
});

export const plansmithConfigSchema = z.object({
  /** GitLab instance URL; GITLAB_URL and --url take precedence */
  url: z.string().url().optional(),
  /** Full path of an existing group that receives the top-level groups */
  parent: z.string().min(1).optional(),
  onDuplicate: z.enum(["reuse", "reject"]).default("reuse"),
  relationships: z.enum(["deferred", "inline"]).default("deferred"),
  tier: z.enum(["auto", "free", "premium", "ultimate"]).default("auto"),
  visibility: z.enum(["private", "internal", "public"]).default("private"),
  initializeWithReadme: z.boolean().default(true),
  projectReadiness: projectReadinessSchema.default({}),
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

export type PlansmithConfig = z.output<typeof plansmithConfigSchema>;
export type PlansmithConfigInput = z.input<typeof plansmithConfigSchema>;
