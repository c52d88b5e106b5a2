/**
 * summary.ts - Builds 00-SUMMARY.txt
 *
 * Layout:
 *
 *   <title>
 *   ====================================================
 *   Collection Date: <RFC 3339>
 *   Cluster ID: <id>
 *
 *   Files Collected:
 *   ----------------
 *   <every diagnostic file, sorted>
 *
 *   Key Information:
 *   ---------------
 *   <one "<label>:" section per excerpt whose file exists>
 *   <trailer>
 */

import {
  formatTimestamp,
  listBundleFiles,
  readBundleFile,
  writeBundleFile,
} from "./bundle";
import type { AssistContext, SummarySpec } from "./types";

export const SUMMARY_FILE = "00-SUMMARY.txt";

export const SUMMARY_RULE = "====================================================";

/**
 * The file list section: a heading and one line per collected file.
 */
export function filesCollectedSection(dir: string): string {
  let section = "Files Collected:\n----------------\n";
  for (const name of listBundleFiles(dir)) {
    section += `${name}\n`;
  }
  return section;
}

export function buildSummary(
  dir: string,
  spec: SummarySpec,
  clusterId: string,
  now: Date
): string {
  let summary =
    `${spec.title}\n${SUMMARY_RULE}\n` +
    `Collection Date: ${formatTimestamp(now)}\n` +
    `Cluster ID: ${clusterId}\n\n` +
    filesCollectedSection(dir);

  summary += "\nKey Information:\n---------------\n";

  for (const excerpt of spec.excerpts) {
    const content = readBundleFile(dir, excerpt.file);
    if (content !== undefined) {
      summary += `\n${excerpt.label}:\n${content}\n`;
    }
  }

  return summary + (spec.trailer ?? "");
}

/**
 * Writes the summary into the bundle.
 */
export function writeSummary(
  ctx: AssistContext,
  spec: SummarySpec,
  clusterId: string
): void {
  ctx.deps.reporter.success("Generating summary report...");
  const dir = ctx.options.outputDir;
  writeBundleFile(dir, SUMMARY_FILE, buildSummary(dir, spec, clusterId, ctx.deps.now()));
}
