import { loadConfig, type ConfigOverrides } from "./config/loader.js";
import type { PlansmithConfig } from "./config/schema.js";
import { loadDocument } from "./document/loader.js";
import { materializePlan, type RunReport } from "./engine/run.js";
import { GitLabClient } from "./gitlab/client.js";
import { GitLabPlatform } from "./gitlab/platform.js";
import type { Logger } from "./utils/logger.js";

export interface ApplyInput {
  /** Path to the plan document */
  documentPath: string;
  token?: string;
  projectDir?: string;
  overrides?: ConfigOverrides;
  logger: Logger;
}

/** Build the GitLab-backed platform for a resolved configuration. */
export function createGitLabPlatform(config: PlansmithConfig, token: string, logger: Logger): GitLabPlatform {
  const client = new GitLabClient({
    baseUrl: config.url ?? "",
    token,
    timeoutMs: config.requestTimeoutMs,
  });
  return new GitLabPlatform(client, {
    tier: config.tier,
    visibility: config.visibility,
    initializeWithReadme: config.initializeWithReadme,
    projectReadiness: config.projectReadiness,
    logger,
  });
}

/**
 * Load configuration and document, then materialize the document on GitLab.
 * The document is validated before any remote call is made.
 */
export async function applyPlan(input: ApplyInput): Promise<RunReport> {
  const { logger } = input;
  const config = loadConfig(input.projectDir, input.overrides);
  const doc = await loadDocument(input.documentPath);
  logger.debug(`Loaded ${input.documentPath}: ${doc.groups.length} top-level group(s), ${doc.users.length} user(s)`);

  const platform = createGitLabPlatform(config, input.token ?? "", logger);
  const me = await platform.currentUser();
  logger.info(`Connected to ${config.url} as @${me.username}`);

  return materializePlan(
    doc,
    platform,
    {
      onDuplicate: config.onDuplicate,
      relationships: config.relationships,
      parent: config.parent,
    },
    logger,
  );
}
