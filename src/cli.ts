#!/usr/bin/env node

import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { applyPlan } from "./apply.js";
import { errorMessage } from "./engine/errors.js";
import { summarizeDocument } from "./document/validator.js";
import { loadDocument } from "./document/loader.js";
import { formatHumanReport } from "./reporter/human.js";
import { formatJsonReport } from "./reporter/json.js";
import { createLogger, type Logger } from "./utils/logger.js";

const __dirname_cli = dirname(fileURLToPath(import.meta.url));
const cliPkgVersion = JSON.parse(
  readFileSync(join(__dirname_cli, "..", "package.json"), "utf-8"),
).version as string;

interface ApplyOptions {
  config: string;
  token?: string;
  url?: string;
  parent?: string;
  onDuplicate?: "reuse" | "reject";
  relationships?: "deferred" | "inline";
  tier?: "auto" | "free" | "premium" | "ultimate";
  json?: boolean;
  verbose?: boolean;
}

function reportFailure(logger: Logger, err: unknown): void {
  logger.error(`Error: ${errorMessage(err)}`);
}

const program = new Command();

program
  .name("plansmith")
  .description("Materialize a YAML plan of groups, projects, epics and issues on GitLab")
  .version(cliPkgVersion);

program
  .command("apply")
  .description("Create or reuse every entity in a plan document and link them")
  .requiredOption("--config <file>", "Plan document (YAML)")
  .option("--token <token>", "Personal access token (default: $GITLAB_TOKEN)")
  .option("--url <url>", "GitLab instance URL (default: $GITLAB_URL)")
  .option("--parent <path>", "Existing group that receives the top-level groups")
  .addOption(
    new Option("--on-duplicate <policy>", "Policy for entities that already exist").choices(["reuse", "reject"]),
  )
  .addOption(
    new Option("--relationships <mode>", "When links are applied").choices(["deferred", "inline"]),
  )
  .addOption(
    new Option("--tier <tier>", "Assumed GitLab tier").choices(["auto", "free", "premium", "ultimate"]),
  )
  .option("--json", "Print the report as JSON", false)
  .option("--verbose", "Log every remote decision", false)
  .action(async (opts: ApplyOptions) => {
    const logger = createLogger({ verbose: opts.verbose, quiet: opts.json });
    try {
      const report = await applyPlan({
        documentPath: opts.config,
        token: opts.token ?? process.env.GITLAB_TOKEN,
        overrides: {
          url: opts.url ?? process.env.GITLAB_URL,
          parent: opts.parent,
          onDuplicate: opts.onDuplicate,
          relationships: opts.relationships,
          tier: opts.tier,
        },
        logger,
      });
      console.log(opts.json ? formatJsonReport(report) : formatHumanReport(report));
    } catch (err) {
      reportFailure(logger, err);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Check a plan document without contacting GitLab")
  .argument("<file>", "Plan document (YAML)")
  .action(async (file: string) => {
    const logger = createLogger();
    try {
      const doc = await loadDocument(file);
      const counts = summarizeDocument(doc);
      const parts = Object.entries(counts).map(([kind, n]) => `${n} ${kind}`);
      logger.info(`${file} is valid: ${parts.join(", ")}`);
    } catch (err) {
      reportFailure(logger, err);
      process.exit(1);
    }
  });

await program.parseAsync();
