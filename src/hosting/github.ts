/**
 * GitHub hosting gateway
 */

import { Octokit } from "@octokit/rest";
import { errorMessage, HostingError } from "../errors";
import type { HostingGateway, IssueComment, IssueSummary, RepositoryDescriptor } from "../types";
import { type Logger, logger } from "../utils/logger";

const PER_PAGE = 100;

export interface GitHubHostingOptions {
  /** Pre-built client; a new one is created from the token otherwise */
  octokit?: Octokit;
  log?: Logger;
}

interface GitHubUser {
  login: string;
}

interface GitHubLabel {
  name?: string;
}

function loginOf(user: GitHubUser | null | undefined): string | null {
  return user ? user.login : null;
}

function labelName(label: string | GitHubLabel): string {
  return typeof label === "string" ? label : (label.name ?? "");
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

function toHostingError(error: unknown, action: string): HostingError {
  if (error instanceof HostingError) return error;
  const status = statusOf(error);
  const statusPart = status === undefined ? "" : ` (HTTP ${status})`;
  return new HostingError(`Failed to ${action}${statusPart}: ${errorMessage(error)}`, {
    status,
    cause: error,
  });
}

export class GitHubHostingGateway implements HostingGateway {
  private readonly octokit: Octokit;
  private readonly log: Logger;

  constructor(token: string, options: GitHubHostingOptions = {}) {
    this.octokit = options.octokit ?? new Octokit({ auth: token, userAgent: "repo-vault" });
    this.log = options.log ?? logger;
  }

  async listRepositories(organization: string): Promise<RepositoryDescriptor[]> {
    this.log.info(`Fetching repositories for organization: ${organization}`);

    try {
      // type "all" includes private repositories visible to the token
      const repos = await this.octokit.paginate(this.octokit.rest.repos.listForOrg, {
        org: organization,
        type: "all",
        per_page: PER_PAGE,
      });

      this.log.info(`Found ${repos.length} total repositories`);

      return repos.map((repo) => ({
        name: repo.name,
        fullName: repo.full_name,
        owner: repo.owner.login,
        archived: repo.archived ?? false,
        defaultBranch: repo.default_branch ?? "main",
        cloneUrl: repo.clone_url ?? `https://github.com/${repo.full_name}.git`,
      }));
    } catch (error) {
      throw toHostingError(error, `list repositories for ${organization}`);
    }
  }

  async listIssues(repository: RepositoryDescriptor): Promise<IssueSummary[]> {
    try {
      const issues = await this.octokit.paginate(this.octokit.rest.issues.listForRepo, {
        owner: repository.owner,
        repo: repository.name,
        state: "all",
        per_page: PER_PAGE,
      });

      // The issues endpoint also returns pull requests
      return issues
        .filter((issue) => !issue.pull_request)
        .map((issue) => ({
          number: issue.number,
          title: issue.title,
          url: issue.html_url,
          state: issue.state,
          author: loginOf(issue.user),
          createdAt: issue.created_at,
          updatedAt: issue.updated_at,
          closedAt: issue.closed_at,
          closedBy: loginOf(issue.closed_by),
          labels: issue.labels.map(labelName).filter((name) => name.length > 0),
          milestone: issue.milestone ? issue.milestone.title : null,
          assignees: (issue.assignees ?? []).map((assignee) => assignee.login),
          body: issue.body ?? null,
          commentCount: issue.comments,
        }));
    } catch (error) {
      throw toHostingError(error, `list issues for ${repository.fullName}`);
    }
  }

  async listComments(repository: RepositoryDescriptor, issueNumber: number): Promise<IssueComment[]> {
    try {
      const comments = await this.octokit.paginate(this.octokit.rest.issues.listComments, {
        owner: repository.owner,
        repo: repository.name,
        issue_number: issueNumber,
        per_page: PER_PAGE,
      });

      return comments.map((comment) => ({
        id: comment.id,
        author: loginOf(comment.user),
        body: comment.body ?? null,
        createdAt: comment.created_at,
      }));
    } catch (error) {
      throw toHostingError(error, `list comments for ${repository.fullName}#${issueNumber}`);
    }
  }
}
