import { describe, expect, test } from "vitest";
import {
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "../../src/config/inline";
import type { RepoVaultConfig } from "../../src/types";

describe("inline config", () => {
  const baseConfig: RepoVaultConfig = {
    version: "1.0",
    organization: "file-org",
    repositories: {
      patterns: ["^svc-"],
      names: [],
      excludeArchived: true,
      excludePatterns: [],
      excludeNames: [],
    },
    s3: { bucket: "file-bucket", prefix: "backups", region: "eu-west-1" },
    metadata: { issues: false },
  };

  describe("extractInlineOptions", () => {
    test("maps flags to options", () => {
      expect(
        extractInlineOptions({
          organization: "test-org",
          "s3-bucket": "test-bucket",
          "s3-prefix": "",
          "s3-region": "us-west-2",
          "s3-endpoint": "http://localhost:9000",
          issues: true,
        }),
      ).toEqual({
        organization: "test-org",
        s3Bucket: "test-bucket",
        s3Prefix: "",
        s3Region: "us-west-2",
        s3Endpoint: "http://localhost:9000",
        issues: true,
      });
    });

    test("--no-issues wins over --issues", () => {
      expect(extractInlineOptions({ issues: true, "no-issues": true })).toEqual({ issues: false });
    });

    test("returns no options for no flags", () => {
      const options = extractInlineOptions({});

      expect(options).toEqual({});
      expect(hasInlineOptions(options)).toBe(false);
    });
  });

  describe("mergeInlineConfig", () => {
    test("overrides only what was given", () => {
      const merged = mergeInlineConfig(baseConfig, { s3Bucket: "test-bucket", issues: true });

      expect(merged).toEqual({
        ...baseConfig,
        s3: { bucket: "test-bucket", prefix: "backups", region: "eu-west-1" },
        metadata: { issues: true },
      });
    });

    test("overrides the organization", () => {
      expect(mergeInlineConfig(baseConfig, { organization: "test-org" }).organization).toBe("test-org");
    });

    test("does not modify the base config", () => {
      mergeInlineConfig(baseConfig, { s3Bucket: "other", s3Prefix: "nightly" });

      expect(baseConfig.s3).toEqual({ bucket: "file-bucket", prefix: "backups", region: "eu-west-1" });
    });
  });

  describe("config-free mode", () => {
    test("requires the organization and bucket", () => {
      expect(validateInlineOptionsForConfigFreeMode({})).toEqual({
        valid: false,
        errors: [
          "--organization is required when running without a config file",
          "--s3-bucket is required when running without a config file",
        ],
      });
      expect(validateInlineOptionsForConfigFreeMode({ organization: "test-org", s3Bucket: "test-bucket" })).toEqual({
        valid: true,
        errors: [],
      });
    });

    test("builds a complete config from flags", () => {
      expect(createConfigFromInlineOptions({ organization: "test-org", s3Bucket: "test-bucket" })).toEqual({
        version: "1.0",
        organization: "test-org",
        repositories: {
          patterns: [],
          names: [],
          excludeArchived: false,
          excludePatterns: [],
          excludeNames: [],
        },
        s3: { bucket: "test-bucket", prefix: "backups", region: "us-east-1" },
        metadata: { issues: false },
      });
    });

    test("throws with every missing flag", () => {
      expect(() => createConfigFromInlineOptions({ s3Bucket: "test-bucket" })).toThrow(
        "--organization is required when running without a config file",
      );
    });
  });
});
