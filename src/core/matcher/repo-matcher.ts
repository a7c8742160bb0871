/**
 * Rule-based repository selection
 *
 * Precedence is fixed: archived repositories are dropped first (when
 * configured), then the include rules select, then the exclude rules remove.
 * An exclude match always wins, even over an exact-name include.
 */

import { ConfigurationError, errorMessage } from "../../errors";
import type { MatchRuleSet, RepositoryDescriptor } from "../../types";

export interface SelectionExplanation {
  selected: RepositoryDescriptor[];
  /** Dropped because `excludeArchived` is set */
  archived: string[];
  /** Matched no include rule */
  unmatched: string[];
  /** Matched an include rule and an exclude rule */
  excluded: string[];
  /** Names listed in `includeNames` that the organization listing does not contain */
  notFound: string[];
}

function compilePatterns(patterns: readonly string[], field: string): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid regex in ${field}: "${pattern}" (${errorMessage(error)})`,
      );
    }
  });
}

export class RepoMatcher {
  private readonly includePatterns: RegExp[];
  private readonly includeNames: ReadonlySet<string>;
  private readonly excludePatterns: RegExp[];
  private readonly excludeNames: ReadonlySet<string>;
  readonly excludeArchived: boolean;

  constructor(rules: MatchRuleSet) {
    this.includePatterns = compilePatterns(rules.includePatterns, "includePatterns");
    this.excludePatterns = compilePatterns(rules.excludePatterns, "excludePatterns");
    this.includeNames = new Set(rules.includeNames);
    this.excludeNames = new Set(rules.excludeNames);
    this.excludeArchived = rules.excludeArchived;
  }

  /** With no include rules at all, every name matches. */
  matches(name: string): boolean {
    if (this.includeNames.size === 0 && this.includePatterns.length === 0) {
      return true;
    }
    if (this.includeNames.has(name)) return true;
    return this.includePatterns.some((pattern) => pattern.test(name));
  }

  isExcluded(name: string): boolean {
    if (this.excludeNames.has(name)) return true;
    return this.excludePatterns.some((pattern) => pattern.test(name));
  }

  /** Order-preserving selection */
  select(repositories: readonly RepositoryDescriptor[]): RepositoryDescriptor[] {
    return this.explain(repositories).selected;
  }

  explain(repositories: readonly RepositoryDescriptor[]): SelectionExplanation {
    const result: SelectionExplanation = {
      selected: [],
      archived: [],
      unmatched: [],
      excluded: [],
      notFound: [],
    };

    for (const repository of repositories) {
      if (this.excludeArchived && repository.archived) {
        result.archived.push(repository.name);
      } else if (!this.matches(repository.name)) {
        result.unmatched.push(repository.name);
      } else if (this.isExcluded(repository.name)) {
        result.excluded.push(repository.name);
      } else {
        result.selected.push(repository);
      }
    }

    const listed = new Set(repositories.map((r) => r.name));
    result.notFound = [...this.includeNames].filter((name) => !listed.has(name)).sort();

    return result;
  }
}

/**
 * Lay out names in padded columns for compact log output.
 */
export function formatColumns(names: readonly string[], columns: number = 3): string[] {
  if (names.length === 0) return [];

  const width = Math.max(...names.map((n) => n.length)) + 2;
  const rows: string[] = [];

  for (let i = 0; i < names.length; i += columns) {
    const row = names
      .slice(i, i + columns)
      .map((name) => name.padEnd(width))
      .join("");
    rows.push(`  ${row.trimEnd()}`);
  }

  return rows;
}
