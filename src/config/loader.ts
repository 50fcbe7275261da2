import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ZodError } from "zod";
import { plansmithConfigSchema, type PlansmithConfig, type PlansmithConfigInput } from "./schema.js";

export const CONFIG_FILE = ".plansmith.json";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Values from CLI flags or the environment. Undefined entries leave the file value in place. */
export type ConfigOverrides = {
  [K in keyof PlansmithConfigInput]?: PlansmithConfigInput[K] | undefined;
};

function readConfigFile(projectDir: string): Record<string, unknown> {
  const path = join(projectDir, CONFIG_FILE);
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${CONFIG_FILE} is not valid JSON: ${message}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${CONFIG_FILE} must contain a JSON object`);
  }
  return { ...parsed };
}

/**
 * Load `.plansmith.json` from `projectDir` (optional) and apply overrides.
 * Missing fields take schema defaults.
 */
export function loadConfig(
  projectDir: string = process.cwd(),
  overrides: ConfigOverrides = {},
): PlansmithConfig {
  const raw = readConfigFile(projectDir);
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  try {
    return plansmithConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const details = err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new ConfigError(`Invalid configuration:\n  - ${details.join("\n  - ")}`);
    }
    throw err;
  }
}
