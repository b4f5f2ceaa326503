import { createHash } from "node:crypto";
import fs from "node:fs";

/** SHA256 of a file's bytes, hex encoded. */
export function computeSha256(filePath: string): string {
  return computeSha256FromContent(fs.readFileSync(filePath));
}

export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}
