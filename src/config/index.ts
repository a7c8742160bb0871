/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, isRecord } from "./defaults";
// Loader
export { ConfigurationError, findAndLoadConfig, findConfigFile, loadConfig } from "./loader";
// Inline overrides
export {
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineFlagValues,
  type InlineValidationResult,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
// Resolver
export { buildMatchRuleSet, resolveGitHubToken, resolveOrganization } from "./resolver";
// Validator
export { validateConfig } from "./validator";
