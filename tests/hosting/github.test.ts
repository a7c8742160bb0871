import { Octokit } from "@octokit/rest";
import { describe, expect, test } from "vitest";
import { HostingError } from "../../src/errors";
import { GitHubHostingGateway } from "../../src/hosting";
import { repo, silentLogger } from "../helpers/fakes";

interface FakeRoute {
  status?: number;
  body: unknown;
  /** Page 2 of the same path is announced through a Link header */
  hasNextPage?: boolean;
}

/** Routes are keyed by `pathname` or `pathname?page=N` for later pages */
function fakeApi(routes: Record<string, FakeRoute>) {
  const requests: URL[] = [];

  const fetch = async (input: string | URL | Request): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    requests.push(url);

    const page = url.searchParams.get("page");
    const key = page && page !== "1" ? `${url.pathname}?page=${page}` : url.pathname;
    const route = routes[key];
    if (!route) {
      return new Response(JSON.stringify({ message: "Not Found" }), {
        status: 404,
        headers: { "content-type": "application/json" },
      });
    }

    const headers: Record<string, string> = { "content-type": "application/json; charset=utf-8" };
    if (route.hasNextPage) {
      const next = new URL(url.toString());
      next.searchParams.set("page", "2");
      headers.link = `<${next.toString()}>; rel="next"`;
    }

    return new Response(JSON.stringify(route.body), { status: route.status ?? 200, headers });
  };

  const octokit = new Octokit({
    auth: "test-secret",
    request: { fetch },
    log: { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} },
  });
  return { gateway: new GitHubHostingGateway("test-secret", { octokit, log: silentLogger }), requests };
}

function apiRepo(name: string, overrides: Record<string, unknown> = {}) {
  return {
    name,
    full_name: `test-org/${name}`,
    owner: { login: "test-org" },
    archived: false,
    default_branch: "main",
    clone_url: `https://github.com/test-org/${name}.git`,
    ...overrides,
  };
}

function apiIssue(number: number, overrides: Record<string, unknown> = {}) {
  return {
    number,
    title: `Issue ${number}`,
    html_url: `https://github.com/test-org/demo/issues/${number}`,
    state: "open",
    user: { login: "octo" },
    created_at: "2025-11-01T00:00:00Z",
    updated_at: "2025-11-02T00:00:00Z",
    closed_at: null,
    closed_by: null,
    labels: [],
    milestone: null,
    assignees: [],
    body: null,
    comments: 0,
    ...overrides,
  };
}

describe("GitHubHostingGateway", () => {
  describe("listRepositories", () => {
    test("follows every page", async () => {
      const { gateway, requests } = fakeApi({
        "/orgs/test-org/repos": { body: [apiRepo("alpha"), apiRepo("beta", { archived: true })], hasNextPage: true },
        "/orgs/test-org/repos?page=2": { body: [apiRepo("gamma", { default_branch: "trunk" })] },
      });

      const repositories = await gateway.listRepositories("test-org");

      expect(repositories).toEqual([
        repo("alpha"),
        repo("beta", { archived: true }),
        repo("gamma", { defaultBranch: "trunk" }),
      ]);
      expect(requests).toHaveLength(2);
      expect(requests[0]?.searchParams.get("type")).toBe("all");
      expect(requests[0]?.searchParams.get("per_page")).toBe("100");
    });

    test("failures become HostingErrors with the HTTP status", async () => {
      const { gateway } = fakeApi({
        "/orgs/test-org/repos": { status: 401, body: { message: "Bad credentials" } },
      });

      const error = await gateway.listRepositories("test-org").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HostingError);
      expect(error).toHaveProperty("status", 401);
      expect(error).toHaveProperty(
        "message",
        expect.stringMatching(/^Failed to list repositories for test-org \(HTTP 401\): Bad credentials/),
      );
    });
  });

  describe("listIssues", () => {
    test("maps issues and drops pull requests", async () => {
      const { gateway, requests } = fakeApi({
        "/repos/test-org/demo/issues": {
          body: [
            apiIssue(1, {
              state: "closed",
              closed_at: "2025-11-03T00:00:00Z",
              closed_by: { login: "alice" },
              labels: [{ name: "bug" }, "docs"],
              milestone: { title: "v1.0" },
              assignees: [{ login: "alice" }, { login: "bob" }],
              body: "Details",
              comments: 2,
            }),
            apiIssue(2, { pull_request: { url: "https://api.github.com/repos/test-org/demo/pulls/2" } }),
          ],
        },
      });

      const issues = await gateway.listIssues(repo("demo"));

      expect(issues).toEqual([
        {
          number: 1,
          title: "Issue 1",
          url: "https://github.com/test-org/demo/issues/1",
          state: "closed",
          author: "octo",
          createdAt: "2025-11-01T00:00:00Z",
          updatedAt: "2025-11-02T00:00:00Z",
          closedAt: "2025-11-03T00:00:00Z",
          closedBy: "alice",
          labels: ["bug", "docs"],
          milestone: "v1.0",
          assignees: ["alice", "bob"],
          body: "Details",
          commentCount: 2,
        },
      ]);
      expect(requests[0]?.searchParams.get("state")).toBe("all");
    });

    test("a rate limit is a HostingError for the repository", async () => {
      const { gateway } = fakeApi({
        "/repos/test-org/demo/issues": { status: 403, body: { message: "API rate limit exceeded" } },
      });

      await expect(gateway.listIssues(repo("demo"))).rejects.toThrow(
        /^Failed to list issues for test-org\/demo \(HTTP 403\)/,
      );
    });
  });

  describe("listComments", () => {
    test("maps every comment", async () => {
      const { gateway } = fakeApi({
        "/repos/test-org/demo/issues/1/comments": {
          body: [
            { id: 11, user: { login: "alice" }, body: "First", created_at: "2025-11-01T01:00:00Z" },
            { id: 12, user: null, body: "Ghost", created_at: "2025-11-01T02:00:00Z" },
          ],
        },
      });

      const comments = await gateway.listComments(repo("demo"), 1);

      expect(comments).toEqual([
        { id: 11, author: "alice", body: "First", createdAt: "2025-11-01T01:00:00Z" },
        { id: 12, author: null, body: "Ghost", createdAt: "2025-11-01T02:00:00Z" },
      ]);
    });
  });
});
