/**
 * Hosting gateway exports
 */

export { GitHubHostingGateway, type GitHubHostingOptions } from "./github";
