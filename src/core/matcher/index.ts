/**
 * Repository selection exports
 */

export { formatColumns, RepoMatcher, type SelectionExplanation } from "./repo-matcher";
