/**
 * Minimal GitLab API client over global fetch.
 *
 * REST v4 is the primary channel; GraphQL is only used for mutations the REST
 * API does not expose (see iterations.ts). Every failure surfaces as a
 * GitLabRequestError carrying the HTTP status so callers can classify it.
 */

export interface GitLabClientOptions {
  /** Instance URL, e.g. https://gitlab.example.com (with or without /api/v4) */
  baseUrl: string;
  token: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export class GitLabClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GitLabClientError";
  }
}

export class GitLabRequestError extends GitLabClientError {
  readonly status: number;
  readonly method: string;
  readonly route: string;
  readonly body: unknown;

  constructor(method: string, route: string, status: number, body: unknown) {
    super(`GitLab ${method} ${route} failed (${status}): ${extractMessage(body)}`);
    this.name = "GitLabRequestError";
    this.status = status;
    this.method = method;
    this.route = route;
    this.body = body;
  }
}

/** GitLab error bodies carry `message` (string, array or field map) or `error`. */
function extractMessage(body: unknown): string {
  if (typeof body === "string") return body || "no response body";
  if (typeof body === "object" && body !== null) {
    if ("message" in body) {
      const message = body.message;
      if (typeof message === "string") return message;
      return JSON.stringify(message);
    }
    if ("error" in body && typeof body.error === "string") return body.error;
  }
  return "no response body";
}

interface SentResponse {
  ok: boolean;
  status: number;
  headers: Headers;
  body: unknown;
}

interface GraphQLResponse<T> {
  data?: T;
  errors?: Array<{ message: string }>;
}

const PERMISSION_PATTERN = /don't have permission|not have permission|permission denied|forbidden/i;
const PAGE_SIZE = 100;

export class GitLabClient {
  private readonly apiUrl: string;
  private readonly graphqlUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(opts: GitLabClientOptions) {
    if (!opts.token) {
      throw new GitLabClientError(
        "GitLab token not found. Pass --token or set the GITLAB_TOKEN environment variable.",
      );
    }
    if (!opts.baseUrl) {
      throw new GitLabClientError(
        "GitLab URL not found. Pass --url or set the GITLAB_URL environment variable.",
      );
    }
    const instance = opts.baseUrl.replace(/\/+$/, "").replace(/\/api\/v4$/, "");
    this.apiUrl = `${instance}/api/v4`;
    this.graphqlUrl = `${instance}/api/graphql`;
    this.token = opts.token;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  async get<T>(route: string, query?: QueryParams): Promise<T> {
    const { data } = await this.request<T>("GET", route, { query });
    return data;
  }

  async post<T>(route: string, body: Record<string, unknown>): Promise<T> {
    const { data } = await this.request<T>("POST", route, { body });
    return data;
  }

  async put<T>(route: string, body: Record<string, unknown>): Promise<T> {
    const { data } = await this.request<T>("PUT", route, { body });
    return data;
  }

  /** GET that returns null instead of throwing on 404. */
  async getOptional<T>(route: string, query?: QueryParams): Promise<T | null> {
    try {
      return await this.get<T>(route, query);
    } catch (err) {
      if (err instanceof GitLabRequestError && err.status === 404) return null;
      throw err;
    }
  }

  /** Follow `x-next-page` until every page of a list endpoint has been read. */
  async paginate<T>(route: string, query: QueryParams = {}): Promise<T[]> {
    const all: T[] = [];
    let page: string | null = "1";
    while (page) {
      const { data, headers }: { data: T[]; headers: Headers } = await this.request<T[]>("GET", route, {
        query: { ...query, per_page: PAGE_SIZE, page },
      });
      all.push(...data);
      const next = headers.get("x-next-page");
      page = next && next.length > 0 ? next : null;
    }
    return all;
  }

  /** Run a GraphQL operation. GraphQL-level errors become GitLabRequestError (403 for permission messages). */
  async graphql<T>(query: string, variables: Record<string, unknown>): Promise<T> {
    const response = await this.send("POST", this.graphqlUrl, "graphql", { query, variables });
    const { body } = response;
    if (!response.ok) {
      throw new GitLabRequestError("POST", "graphql", response.status, body);
    }
    const json = body as GraphQLResponse<T>;
    if (json.errors && json.errors.length > 0) {
      const message = json.errors.map((e) => e.message).join("; ");
      const status = PERMISSION_PATTERN.test(message) ? 403 : 422;
      throw new GitLabRequestError("POST", "graphql", status, { message });
    }
    if (json.data === undefined) {
      throw new GitLabRequestError("POST", "graphql", response.status, { message: "response had no data" });
    }
    return json.data;
  }

  private async request<T>(
    method: HttpMethod,
    route: string,
    opts: { query?: QueryParams; body?: Record<string, unknown> } = {},
  ): Promise<{ data: T; headers: Headers }> {
    const url = new URL(`${this.apiUrl}${route}`);
    for (const [key, value] of Object.entries(opts.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    const response = await this.send(method, url.toString(), route, opts.body);
    const { body } = response;
    if (!response.ok) {
      throw new GitLabRequestError(method, route, response.status, body);
    }
    return { data: body as T, headers: response.headers };
  }

  /** Fetch and read the body under one timeout. */
  private async send(method: HttpMethod, url: string, route: string, body?: unknown): Promise<SentResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        method,
        headers: {
          "Content-Type": "application/json",
          "PRIVATE-TOKEN": this.token,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      return {
        ok: response.ok,
        status: response.status,
        headers: response.headers,
        body: await readBody(response),
      };
    } catch (err) {
      if (controller.signal.aborted || (err instanceof Error && err.name === "AbortError")) {
        throw new GitLabClientError(`GitLab ${method} ${route} timed out after ${this.timeoutMs}ms`);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new GitLabClientError(`GitLab ${method} ${route} failed: ${message}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

async function readBody(response: Response): Promise<unknown> {
  if (response.status === 204) return undefined;
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}
