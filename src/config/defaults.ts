/**
 * Default configuration values
 */

export const DEFAULT_CONFIG = {
  // version is intentionally NOT defaulted - it must be specified by the user
  repositories: {
    patterns: [],
    names: [],
    excludeArchived: false,
    excludePatterns: [],
    excludeNames: [],
  },
  s3: {
    region: "us-east-1",
    prefix: "backups",
  },
  metadata: {
    issues: false,
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = target[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}
