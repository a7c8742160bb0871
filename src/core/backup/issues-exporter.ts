/**
 * Issue metadata export
 */

import type {
  HostingGateway,
  IssueCommentRecord,
  IssueExportDocument,
  IssueRecord,
  IssueSummary,
  RepositoryDescriptor,
} from "../../types";
import { type Logger, logger } from "../../utils/logger";

export interface IssuesExporterOptions {
  log?: Logger;
  now?: () => Date;
}

export class IssuesExporter {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly hosting: HostingGateway,
    options: IssuesExporterOptions = {},
  ) {
    this.log = options.log ?? logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build the export document for every issue of `repository`.
   * A hosting failure on any call aborts the whole export; no partial document
   * is ever returned.
   */
  async exportIssues(repository: RepositoryDescriptor): Promise<IssueExportDocument> {
    this.log.info(`Exporting issues for: ${repository.fullName}`);

    const summaries = await this.hosting.listIssues(repository);
    const issues: IssueRecord[] = [];
    let openCount = 0;

    for (const summary of summaries) {
      const comments = await this.fetchComments(repository, summary);
      issues.push(toIssueRecord(summary, comments));
      if (summary.state === "open") openCount++;
    }

    issues.sort((a, b) => a.number - b.number);

    const document: IssueExportDocument = {
      metadata: {
        repository: repository.fullName,
        exported_at: this.now().toISOString(),
        total_issues: issues.length,
        open_issues: openCount,
        closed_issues: issues.length - openCount,
      },
      issues,
    };

    this.log.info(
      `Exported ${issues.length} issues (${openCount} open, ${issues.length - openCount} closed) for ${repository.fullName}`,
    );

    return document;
  }

  private async fetchComments(
    repository: RepositoryDescriptor,
    summary: IssueSummary,
  ): Promise<IssueCommentRecord[]> {
    if (summary.commentCount === 0) return [];

    const comments = await this.hosting.listComments(repository, summary.number);
    return comments.map((comment) => ({
      id: comment.id,
      author: comment.author,
      body: comment.body,
      created_at: comment.createdAt,
    }));
  }
}

function toIssueRecord(summary: IssueSummary, comments: IssueCommentRecord[]): IssueRecord {
  return {
    number: summary.number,
    title: summary.title,
    url: summary.url,
    state: summary.state,
    author: summary.author,
    created_at: summary.createdAt,
    updated_at: summary.updatedAt,
    closed_at: summary.closedAt,
    closed_by: summary.closedBy,
    labels: summary.labels,
    milestone: summary.milestone,
    assignees: summary.assignees,
    body: summary.body,
    comment_count: comments.length,
    comments,
  };
}

export function serializeIssueExport(document: IssueExportDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
