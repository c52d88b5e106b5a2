/**
 * digest.ts - Assembles bundle text for the analysis pass
 *
 * Bundles can hold megabytes of logs, far more than a chat request should
 * carry. Each alert lists the files worth sending, in priority order, with
 * per-file size limits in bytes. Files that were never collected are skipped.
 */

import {
  byteLength,
  matchBundleFiles,
  readBundleFile,
  truncate,
  truncateMiddle,
} from "./bundle";
import type { DigestEntry } from "./types";

function section(name: string, content: string): string {
  return `\n=== ${name} ===\n${content}\n`;
}

function limitContent(
  content: string,
  limit: number | undefined,
  keepEnds?: { over: number; keep: number }
): string {
  if (keepEnds && byteLength(content) > keepEnds.over) {
    return truncateMiddle(content, keepEnds.keep);
  }
  return limit === undefined ? content : truncate(content, limit);
}

export function buildDigest(dir: string, entries: DigestEntry[]): string {
  let digest = "";

  for (const entry of entries) {
    if ("file" in entry) {
      const content = readBundleFile(dir, entry.file);
      if (content !== undefined) {
        digest += section(entry.file, limitContent(content, entry.limit, entry.keepEnds));
      }
      continue;
    }

    const names = matchBundleFiles(dir, entry.prefix, entry.suffix).slice(0, entry.take);
    for (const name of names) {
      const content = readBundleFile(dir, name);
      if (content !== undefined) {
        digest += section(name, limitContent(content, entry.limit));
      }
    }
  }

  return digest;
}
