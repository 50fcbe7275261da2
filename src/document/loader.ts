import { readFile } from "node:fs/promises";
import { parse as yamlParse, YAMLParseError } from "yaml";
import type { ZodIssue } from "zod";
import { DocumentError } from "../engine/errors.js";
import { planDocumentSchema } from "./schema.js";
import type { PlanDocument } from "./types.js";
import { validateDocument } from "./validator.js";

function formatZodIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Parse and validate a plan document from YAML text. */
export function parseDocument(content: string, source = "document"): PlanDocument {
  let data: unknown;
  try {
    data = yamlParse(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new DocumentError(`Invalid YAML in ${source}: ${err.message}`);
    }
    throw err;
  }

  const result = planDocumentSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new DocumentError(
      `${source} does not match the plan schema`,
      result.error.issues.map(formatZodIssue),
    );
  }

  const problems = validateDocument(result.data);
  if (problems.length > 0) {
    throw new DocumentError(
      `${source} has invalid references`,
      problems.map((p) => p.message),
    );
  }

  return result.data;
}

/** Read, parse and validate a plan document. Throws DocumentError on any failure. */
export async function loadDocument(path: string): Promise<PlanDocument> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DocumentError(`Cannot read ${path}: ${message}`);
  }
  return parseDocument(content, path);
}
