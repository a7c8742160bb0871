/**
 * Source-control hosting types
 */

/** Snapshot of one organization repository, immutable for a cycle */
export interface RepositoryDescriptor {
  name: string;
  /** owner/name */
  fullName: string;
  owner: string;
  archived: boolean;
  defaultBranch: string;
  cloneUrl: string;
}

export interface IssueSummary {
  number: number;
  title: string;
  url: string;
  state: string;
  author: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  closedAt: string | null;
  closedBy: string | null;
  labels: string[];
  milestone: string | null;
  assignees: string[];
  body: string | null;
  /** Comment count reported by the listing */
  commentCount: number;
}

export interface IssueComment {
  id: number;
  author: string | null;
  body: string | null;
  createdAt: string | null;
}

export interface HostingGateway {
  /** All repositories of the organization, every page */
  listRepositories(organization: string): Promise<RepositoryDescriptor[]>;

  /** Issues in any state, pull requests excluded */
  listIssues(repository: RepositoryDescriptor): Promise<IssueSummary[]>;

  listComments(repository: RepositoryDescriptor, issueNumber: number): Promise<IssueComment[]>;
}
