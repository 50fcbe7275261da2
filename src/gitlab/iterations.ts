import type { GitLabClient } from "./client.js";
import { GitLabRequestError } from "./client.js";

const ITERATION_CREATE = `
mutation CreateIteration($input: iterationCreateInput!) {
  iterationCreate(input: $input) {
    iteration { id iid title description }
    errors
  }
}`;

interface IterationCreateResponse {
  iterationCreate: {
    iteration: { id: string; iid: string; title: string | null; description: string | null } | null;
    errors: string[];
  } | null;
}

export interface CreatedIteration {
  id: number;
  iid: number;
  title: string;
  description: string;
}

/** Numeric id out of a GraphQL global id such as gid://gitlab/Iteration/42. */
export function parseGlobalId(gid: string): number {
  const match = /\/(\d+)$/.exec(gid);
  if (!match) throw new Error(`Unexpected GitLab global id: ${gid}`);
  return Number(match[1]);
}

/**
 * Create a group iteration. The REST API can list iterations but not create
 * them, so this goes through the GraphQL `iterationCreate` mutation.
 */
export async function createIteration(
  client: GitLabClient,
  input: {
    groupPath: string;
    title: string;
    description: string;
    startDate?: string;
    dueDate?: string;
  },
): Promise<CreatedIteration> {
  const data = await client.graphql<IterationCreateResponse>(ITERATION_CREATE, { input });
  const payload = data.iterationCreate;
  if (!payload) {
    throw new GitLabRequestError("POST", "graphql iterationCreate", 403, {
      message: "iterationCreate is not available on this instance",
    });
  }
  if (payload.errors.length > 0 || !payload.iteration) {
    throw new GitLabRequestError("POST", "graphql iterationCreate", 422, {
      message: payload.errors.join("; ") || "Iteration creation returned no data",
    });
  }
  const { iteration } = payload;
  return {
    id: parseGlobalId(iteration.id),
    iid: Number(iteration.iid),
    title: iteration.title ?? input.title,
    description: iteration.description ?? "",
  };
}
