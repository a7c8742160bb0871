import { describe, expect, test } from "vitest";
import {
  ArchiveError,
  classifyError,
  ConfigurationError,
  errorMessage,
  HostingError,
  StorageError,
  toRepoVaultError,
  UploadVerificationError,
} from "../src/errors";

describe("errors", () => {
  test("each class carries its kind and name", () => {
    const errors = [
      new ConfigurationError("a"),
      new HostingError("b"),
      new ArchiveError("c"),
      new UploadVerificationError("d"),
      new StorageError("e"),
    ];

    expect(errors.map((e) => [e.kind, e.name])).toEqual([
      ["ConfigurationError", "ConfigurationError"],
      ["HostingError", "HostingError"],
      ["ArchiveError", "ArchiveError"],
      ["UploadVerificationError", "UploadVerificationError"],
      ["StorageError", "StorageError"],
    ]);
  });

  test("HostingError keeps the HTTP status", () => {
    expect(new HostingError("Bad credentials", { status: 401 }).status).toBe(401);
  });

  test("UploadVerificationError keeps the compared values", () => {
    const error = new UploadVerificationError("Size mismatch", { key: "k", expected: "5", actual: "6" });

    expect([error.key, error.expected, error.actual]).toEqual(["k", "5", "6"]);
  });

  describe("toRepoVaultError", () => {
    test("wraps unknown errors in the fallback kind", () => {
      const cause = new Error("disk full");
      const wrapped = toRepoVaultError(cause, "ArchiveError");

      expect(wrapped).toBeInstanceOf(ArchiveError);
      expect(wrapped.message).toBe("disk full");
      expect(wrapped.cause).toBe(cause);
    });

    test("keeps errors that already have a kind", () => {
      const original = new HostingError("rate limited", { status: 403 });

      expect(toRepoVaultError(original, "StorageError")).toBe(original);
    });
  });

  describe("classifyError", () => {
    test("reduces errors to kind and message", () => {
      expect(classifyError(new UploadVerificationError("Checksum mismatch"), "StorageError")).toEqual({
        kind: "UploadVerificationError",
        message: "Checksum mismatch",
      });
      expect(classifyError("plain string", "StorageError")).toEqual({
        kind: "StorageError",
        message: "plain string",
      });
    });
  });

  test("errorMessage handles non-errors", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
