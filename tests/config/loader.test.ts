import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  ConfigurationError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
} from "../../src/config/loader";

describe("config loader", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "repo-vault-config-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const configPath = path.join(tempDir, name);
    await writeFile(configPath, content);
    return configPath;
  }

  describe("loadConfig", () => {
    test("loads YAML and fills in defaults", async () => {
      const configPath = await writeConfig(
        "valid.yaml",
        `
version: "1.0"
organization: test-org
repositories:
  patterns:
    - "lecture-.*"
  excludeNames:
    - lecture-old
s3:
  bucket: test-bucket
metadata:
  issues: true
`,
      );

      const config = await loadConfig(configPath);

      expect(config).toEqual({
        version: "1.0",
        organization: "test-org",
        repositories: {
          patterns: ["lecture-.*"],
          names: [],
          excludeArchived: false,
          excludePatterns: [],
          excludeNames: ["lecture-old"],
        },
        s3: { bucket: "test-bucket", prefix: "backups", region: "us-east-1" },
        metadata: { issues: true },
      });
    });

    test("loads JSON", async () => {
      const configPath = await writeConfig(
        "valid.json",
        JSON.stringify({
          version: "1.0",
          s3: { bucket: "test-bucket", prefix: "", endpoint: "http://localhost:9000" },
          github: { token: "test-secret" },
        }),
      );

      const config = await loadConfig(configPath);

      expect(config.organization).toBeUndefined();
      expect(config.s3).toEqual({
        bucket: "test-bucket",
        prefix: "",
        region: "us-east-1",
        endpoint: "http://localhost:9000",
      });
      expect(config.github).toEqual({ token: "test-secret" });
      expect(config.metadata.issues).toBe(false);
    });

    test("rejects a missing file", async () => {
      await expect(loadConfig(path.join(tempDir, "missing.yaml"))).rejects.toThrow(
        /^Config file not found: /,
      );
    });

    test("rejects a missing version", async () => {
      const configPath = await writeConfig("no-version.yaml", "s3:\n  bucket: test-bucket\n");

      await expect(loadConfig(configPath)).rejects.toThrow("Config must have a 'version' field");
    });

    test("rejects a missing bucket", async () => {
      const configPath = await writeConfig("no-bucket.yaml", 'version: "1.0"\n');

      await expect(loadConfig(configPath)).rejects.toThrow("s3.bucket must be a non-empty string");
    });

    test("rejects an invalid pattern before anything runs", async () => {
      const configPath = await writeConfig(
        "bad-regex.yaml",
        'version: "1.0"\nrepositories:\n  patterns:\n    - "lecture-("\ns3:\n  bucket: test-bucket\n',
      );

      await expect(loadConfig(configPath)).rejects.toThrow(ConfigurationError);
      await expect(loadConfig(configPath)).rejects.toThrow(
        /repositories\.patterns\[0\] is not a valid regex: "lecture-\("/,
      );
    });

    test("rejects wrongly typed fields", async () => {
      const configPath = await writeConfig(
        "bad-types.yaml",
        'version: "1.0"\nrepositories:\n  excludeArchived: "yes"\ns3:\n  bucket: test-bucket\n',
      );

      await expect(loadConfig(configPath)).rejects.toThrow(
        "repositories.excludeArchived must be a boolean",
      );
    });

    test("rejects non-string list entries", async () => {
      const configPath = await writeConfig(
        "bad-names.yaml",
        'version: "1.0"\nrepositories:\n  names:\n    - demo\n    - 42\ns3:\n  bucket: test-bucket\n',
      );

      await expect(loadConfig(configPath)).rejects.toThrow("repositories.names[1] must be a string");
    });

    test("rejects malformed YAML", async () => {
      const configPath = await writeConfig("broken.yaml", "version: [1.0\n");

      await expect(loadConfig(configPath)).rejects.toThrow(/^Failed to parse YAML: /);
    });

    test("rejects unsupported extensions", async () => {
      const configPath = await writeConfig("config.toml", 'version = "1.0"\n');

      await expect(loadConfig(configPath)).rejects.toThrow(
        "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
      );
    });
  });

  describe("findConfigFile", () => {
    test("finds the default file name", async () => {
      const dir = await mkdtemp(path.join(tempDir, "find-"));
      const configPath = path.join(dir, "repo-vault.config.yml");
      await writeFile(configPath, 'version: "1.0"\n');

      expect(findConfigFile(dir)).toBe(configPath);
    });

    test("returns null when there is none", async () => {
      const dir = await mkdtemp(path.join(tempDir, "empty-"));

      expect(findConfigFile(dir)).toBeNull();
    });
  });

  describe("findAndLoadConfig", () => {
    test("explains how to create a config when none is found", async () => {
      const dir = await mkdtemp(path.join(tempDir, "none-"));

      await expect(findAndLoadConfig(undefined, dir)).rejects.toThrow(
        "No config file found. Create repo-vault.config.yaml or specify --config path",
      );
    });

    test("loads the discovered file", async () => {
      const dir = await mkdtemp(path.join(tempDir, "discover-"));
      await writeFile(
        path.join(dir, "repo-vault.config.yaml"),
        'version: "1.0"\norganization: test-org\ns3:\n  bucket: test-bucket\n',
      );

      const config = await findAndLoadConfig(undefined, dir);

      expect(config.organization).toBe("test-org");
    });
  });
});
