/**
 * digest.test.ts - Unit tests for the text sent to the analysis pass
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { buildDigest } from "./digest";
import { makeTempDir, removeDir } from "../testing/fakes";

describe("buildDigest", () => {
  let dir: string;

  const write = (name: string, content: string) =>
    fs.writeFileSync(path.join(dir, name), content);

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("concatenates files in plan order and skips missing ones", () => {
    write("01-jobs.txt", "jobs");
    write("00-SUMMARY.txt", "summary");

    const digest = buildDigest(dir, [
      { file: "00-SUMMARY.txt" },
      { file: "05-events.txt" },
      { file: "01-jobs.txt" },
    ]);

    expect(digest).toBe("\n=== 00-SUMMARY.txt ===\nsummary\n\n=== 01-jobs.txt ===\njobs\n");
  });

  it("applies a per-file limit", () => {
    write("01.yaml", "abcdefgh");
    expect(buildDigest(dir, [{ file: "01.yaml", limit: 5 }])).toBe(
      "\n=== 01.yaml ===\nabcde\n... (truncated)\n"
    );
  });

  it("keeps both ends of files over the keepEnds threshold", () => {
    write("logs.txt", "0123456789");
    expect(
      buildDigest(dir, [{ file: "logs.txt", limit: 4, keepEnds: { over: 8, keep: 2 } }])
    ).toBe("\n=== logs.txt ===\n01\n\n... (middle section truncated) ...\n\n89\n");
  });

  it("uses the plain limit below the keepEnds threshold", () => {
    write("logs.txt", "0123456");
    expect(
      buildDigest(dir, [{ file: "logs.txt", limit: 4, keepEnds: { over: 8, keep: 2 } }])
    ).toBe("\n=== logs.txt ===\n0123\n... (truncated)\n");
  });

  it("compares multi-byte content against the threshold in bytes", () => {
    // five characters, ten bytes
    write("logs.txt", "ééééé");
    expect(
      buildDigest(dir, [{ file: "logs.txt", limit: 4, keepEnds: { over: 8, keep: 2 } }])
    ).toBe("\n=== logs.txt ===\né\n\n... (middle section truncated) ...\n\né\n");
  });

  it("takes the first N sorted files of a pattern", () => {
    write("03-pod-logs-c.txt", "c");
    write("03-pod-logs-a.txt", "aaaaaa");
    write("03-pod-logs-b.txt", "b");

    expect(
      buildDigest(dir, [{ prefix: "03-pod-logs-", suffix: ".txt", take: 2, limit: 3 }])
    ).toBe(
      "\n=== 03-pod-logs-a.txt ===\naaa\n... (truncated)\n\n=== 03-pod-logs-b.txt ===\nb\n"
    );
  });
});
