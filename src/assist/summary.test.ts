/**
 * summary.test.ts - Unit tests for 00-SUMMARY.txt
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { formatTimestamp } from "./bundle";
import { buildSummary, filesCollectedSection, SUMMARY_FILE, writeSummary } from "./summary";
import { makeDeps, makeOptions, makeTempDir, removeDir } from "../testing/fakes";

describe("summary", () => {
  let dir: string;
  const now = new Date(2025, 2, 4, 9, 5, 0);

  beforeEach(() => {
    dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "01-jobs.txt"), "NAME   STATUS\njob-1  Failed");
    fs.writeFileSync(path.join(dir, "02-pods.yaml"), "items: []");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("lists the collected files under a heading", () => {
    expect(filesCollectedSection(dir)).toBe(
      "Files Collected:\n----------------\n01-jobs.txt\n02-pods.yaml\n"
    );
  });

  it("builds header, file list, excerpts and trailer", () => {
    const summary = buildSummary(
      dir,
      {
        title: "Example Diagnostic Collection Summary",
        excerpts: [
          { label: "Jobs Status", file: "01-jobs.txt" },
          { label: "Pods Status", file: "02-pods.txt" },
        ],
        trailer: "\nNetwork Type:\nOVNKubernetes\n\n",
      },
      "cluster-123",
      now
    );

    expect(summary).toBe(
      "Example Diagnostic Collection Summary\n" +
        "====================================================\n" +
        `Collection Date: ${formatTimestamp(now)}\n` +
        "Cluster ID: cluster-123\n\n" +
        "Files Collected:\n----------------\n01-jobs.txt\n02-pods.yaml\n" +
        "\nKey Information:\n---------------\n" +
        "\nJobs Status:\nNAME   STATUS\njob-1  Failed\n" +
        "\nNetwork Type:\nOVNKubernetes\n\n"
    );
  });

  it("writes the summary into the bundle and says so", () => {
    const deps = makeDeps();
    writeSummary(
      { options: makeOptions({ outputDir: dir }), deps },
      { title: "Title", excerpts: [] },
      "N/A"
    );

    expect(deps.reporter.lines).toEqual(["Generating summary report..."]);
    const written = fs.readFileSync(path.join(dir, SUMMARY_FILE), "utf8");
    expect(written.startsWith("Title\n")).toBe(true);
    expect(written).toContain("Cluster ID: N/A\n");
  });
});
