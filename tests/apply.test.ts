import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { fileURLToPath } from "node:url";
import { applyPlan } from "../src/apply.js";
import { DocumentError } from "../src/engine/errors.js";
import { GitLabClientError } from "../src/gitlab/client.js";
import { silentLogger } from "../src/utils/logger.js";

const fixturesDir = fileURLToPath(new URL("./fixtures/", import.meta.url));
const fixture = (name: string) => `${fixturesDir}${name}`;

const fetchMock = vi.fn<typeof fetch>();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("applyPlan", () => {
  it("materializes a plan against the configured instance", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ id: 1, username: "root" }))
      .mockResolvedValueOnce(json([]))
      .mockResolvedValueOnce(
        json(
          { id: 5, name: "Platform", path: "platform", full_path: "platform", description: "Platform engineering", parent_id: null },
          201,
        ),
      );

    const report = await applyPlan({
      documentPath: fixture("single-group.yaml"),
      token: "test-secret",
      projectDir: fixturesDir,
      overrides: { url: "https://gitlab.test" },
      logger: silentLogger,
    });

    expect(report.counts.create).toBe(1);
    expect(report.events[0]).toEqual({ action: "create", kind: "group", name: "Platform", detail: "in instance root" });
    const [url, init] = fetchMock.mock.calls[2];
    expect(url).toBe("https://gitlab.test/api/v4/groups");
    expect(init?.body).toBe(
      JSON.stringify({ name: "Platform", path: "platform", description: "Platform engineering", visibility: "private" }),
    );
  });

  it("rejects an invalid document before contacting GitLab", async () => {
    await expect(
      applyPlan({
        documentPath: fixture("invalid-plan.yaml"),
        token: "test-secret",
        projectDir: fixturesDir,
        overrides: { url: "https://gitlab.test" },
        logger: silentLogger,
      }),
    ).rejects.toThrow(DocumentError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("requires a token", async () => {
    await expect(
      applyPlan({
        documentPath: fixture("single-group.yaml"),
        projectDir: fixturesDir,
        overrides: { url: "https://gitlab.test" },
        logger: silentLogger,
      }),
    ).rejects.toThrow(GitLabClientError);
  });
});
