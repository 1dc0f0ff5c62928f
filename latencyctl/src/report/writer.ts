import fs from "node:fs";
import path from "node:path";
import { computeSha256FromContent } from "./checksum.js";

export type WrittenReport = {
  path: string;
  bytes: number;
  sha256: string;
};

/**
 * Write serialized report text to `outPath` with a trailing newline,
 * creating parent directories as needed.
 */
export function writeReport(outPath: string, text: string): WrittenReport {
  const fullPath = path.resolve(outPath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });

  const content = text + "\n";
  fs.writeFileSync(fullPath, content, "utf8");

  return {
    path: fullPath,
    bytes: Buffer.byteLength(content, "utf8"),
    sha256: computeSha256FromContent(content),
  };
}
