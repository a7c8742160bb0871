import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/** Hex SHA-256 of a file, streamed so large archives never sit in memory */
export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export function computeBufferChecksum(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/** S3 reports checksums base64-encoded */
export function hexToBase64(hex: string): string {
  return Buffer.from(hex, "hex").toString("base64");
}
