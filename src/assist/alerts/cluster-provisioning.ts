/**
 * cluster-provisioning.ts - ClusterProvisioningFailure
 *
 * A cluster whose installation failed usually has no reachable API server,
 * so everything here comes from OCM instead of oc:
 *
 * 1. Resolve the internal ID from the external cluster ID (option completion)
 * 2. Write a note with the manual install-log commands for this cluster
 * 3. Fetch the install log tail from the cluster's resources endpoint
 * 4. Save `ocm describe cluster` (text and JSON) and the cluster events
 * 5. Write a summary built around the install log preview
 *
 * Steps 2-4 report failures and carry on; only a missing --cluster stops
 * the collection.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { createBundleDir } from "../collect";
import {
  formatTimestamp,
  readBundleFile,
  truncate,
  writeBundleFile,
} from "../bundle";
import { filesCollectedSection, SUMMARY_FILE, SUMMARY_RULE } from "../summary";
import type { AlertDefinition, AssistContext } from "../types";
import type { CommandRunner } from "../../utils/cli-runner";

const GUIDE =
  "https://github.com/openshift/ops-sop/blob/master/v4/alerts/ClusterProvisioningFailure.md";
const ANALYSIS_FILE = "10-llm-analysis.txt";

export const NOTE_FILE = "00-INSTALL-LOGS-COLLECTION.txt";
export const INSTALL_LOGS_FILE = "01-install-logs.txt";
const CLUSTER_INFO_FILE = "02-cluster-info-ocm.txt";
const CLUSTER_JSON_FILE = "02-cluster-info-ocm.json";
const CLUSTER_EVENTS_FILE = "03-cluster-events-ocm.txt";

const PREVIEW_LINES = 100;
const PREVIEW_LIMIT = 5000;

/** From src/assist/alerts/ (or dist/assist/alerts/) up to the project root. */
const templateDir = path.join(__dirname, "../../../templates");

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function clusterApiPath(internalId: string, resource?: string): string {
  const base = `/api/clusters_mgmt/v1/clusters/${internalId}`;
  return resource ? `${base}/${resource}` : base;
}

function parseJson(text: string, context: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`${context}: ${errorMessage(error)}`);
  }
}

// ---------------------------------------------------------------------------
// OCM lookups
// ---------------------------------------------------------------------------

const ClusterDescriptionSchema = z.object({ id: z.string().optional() });

const ClusterResourcesSchema = z.object({
  resources: z
    .object({ install_logs_tail: z.string().optional() })
    .optional(),
});

/**
 * Internal (OCM) ID for an external cluster ID, from
 * `ocm describe cluster <id> --json`.
 *
 * @throws Error when ocm fails, prints something other than JSON, or the
 * JSON has no id
 */
export function resolveInternalId(ocm: CommandRunner, clusterId: string): string {
  const result = ocm.run(["describe", "cluster", clusterId, "--json"]);
  if (result.isError) {
    throw new Error(
      `failed to run ocm describe cluster: exit status ${result.exitCode} (output: ${result.output.trim()})`
    );
  }

  const parsed = ClusterDescriptionSchema.safeParse(
    parseJson(result.output, "failed to parse ocm output")
  );
  const id = parsed.success ? parsed.data.id : undefined;
  if (!id) {
    throw new Error("internal ID not found in ocm output");
  }
  return id;
}

/**
 * The install log tail OCM keeps for a cluster, as plain text.
 */
export function fetchInstallLogs(ocm: CommandRunner, internalId: string): string {
  const result = ocm.run(["get", clusterApiPath(internalId, "resources")]);
  if (result.isError) {
    throw new Error(
      `failed to run OCM command: exit status ${result.exitCode} (output: ${result.output.trim()})`
    );
  }

  const parsed = ClusterResourcesSchema.safeParse(
    parseJson(result.output, "failed to parse OCM resources")
  );
  const tail = parsed.success ? parsed.data.resources?.install_logs_tail : undefined;
  if (tail === undefined) {
    throw new Error("install_logs_tail not found in OCM resources");
  }
  return tail.endsWith("\n") ? tail : `${tail}\n`;
}

// ---------------------------------------------------------------------------
// Install logs note
// ---------------------------------------------------------------------------

/**
 * The manual-collection note. With both IDs known it carries ready-to-run
 * commands; otherwise it explains how to find the internal ID.
 */
export function renderInstallLogsNote(clusterId?: string, internalId?: string): string {
  if (clusterId && internalId) {
    const template = fs.readFileSync(path.join(templateDir, "install-logs-note.txt"), "utf8");
    return template
      .replace(/\{\{clusterId\}\}/g, clusterId)
      .replace(/\{\{internalId\}\}/g, internalId);
  }
  return fs.readFileSync(path.join(templateDir, "install-logs-note-unresolved.txt"), "utf8");
}

function createInstallLogsNote(ctx: AssistContext): void {
  const { options, deps } = ctx;
  deps.reporter.progress("Creating install logs collection note...");
  try {
    writeBundleFile(
      options.outputDir,
      NOTE_FILE,
      renderInstallLogsNote(options.clusterId, options.internalId)
    );
  } catch (error) {
    throw new Error(`failed to write install logs note: ${errorMessage(error)}`);
  }
  deps.reporter.success(`  ✓ Saved to ${NOTE_FILE}`);
  deps.reporter.info();
}

// ---------------------------------------------------------------------------
// Collection via OCM
// ---------------------------------------------------------------------------

function collectInstallLogs(ctx: AssistContext, clusterId: string): void {
  const { options, deps } = ctx;
  const { reporter } = deps;

  if (!options.internalId) {
    reporter.progress("Skipping install logs collection: Internal ID not available");
    throw new Error("internal ID not available");
  }

  reporter.progress(`Collecting: Install logs via OCM for cluster ${clusterId}`);
  let logs: string;
  try {
    logs = fetchInstallLogs(deps.ocm, options.internalId);
  } catch (error) {
    reporter.failure(`  ✗ Failed to collect install logs via OCM: ${errorMessage(error)}`);
    reporter.info();
    throw error;
  }

  try {
    writeBundleFile(options.outputDir, INSTALL_LOGS_FILE, logs);
  } catch (error) {
    reporter.failure("  ✗ Failed to save install logs");
    reporter.info();
    throw error;
  }
  reporter.success(`  ✓ Saved to ${INSTALL_LOGS_FILE}`);
  reporter.info();
}

/**
 * Runs one ocm command and saves its output when it succeeds.
 * Returns whether the file was written; neither failure throws.
 */
function saveOcmOutput(
  ctx: AssistContext,
  args: string[],
  file: string,
  failure: string
): boolean {
  const { options, deps } = ctx;
  const result = deps.ocm.run(args);
  if (result.isError) {
    deps.reporter.failure(`  ✗ Failed to ${failure} via OCM: exit status ${result.exitCode}`);
    deps.reporter.info();
    return false;
  }
  try {
    writeBundleFile(options.outputDir, file, result.output);
  } catch (error) {
    deps.reporter.failure(`  ✗ Failed to save ${file}: ${errorMessage(error)}`);
    deps.reporter.info();
    return false;
  }
  deps.reporter.success(`  ✓ Saved to ${file}`);
  deps.reporter.info();
  return true;
}

function collectClusterInfo(ctx: AssistContext, clusterId: string): void {
  const { options, deps } = ctx;
  const { reporter } = deps;

  reporter.progress(`Collecting: Cluster information via OCM for cluster ${clusterId}`);
  if (
    !saveOcmOutput(ctx, ["describe", "cluster", clusterId], CLUSTER_INFO_FILE, "get cluster description")
  ) {
    throw new Error("failed to run ocm describe");
  }

  reporter.progress("Collecting: Cluster details (JSON)");
  saveOcmOutput(
    ctx,
    ["describe", "cluster", clusterId, "--json"],
    CLUSTER_JSON_FILE,
    "get cluster JSON"
  );

  if (options.internalId) {
    reporter.progress("Collecting: Cluster events via OCM");
    saveOcmOutput(
      ctx,
      ["get", clusterApiPath(options.internalId, "events")],
      CLUSTER_EVENTS_FILE,
      "get cluster events"
    );
  }
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/**
 * The last PREVIEW_LINES lines of the install log, cut at PREVIEW_LIMIT.
 */
export function installLogsPreview(logs: string): string {
  const lines = logs.split("\n");
  return truncate(lines.slice(Math.max(0, lines.length - PREVIEW_LINES)).join("\n"), PREVIEW_LIMIT);
}

export function buildFailedInstallSummary(
  dir: string,
  clusterId: string,
  internalId: string,
  now: Date
): string {
  let summary =
    `ClusterProvisioningFailure Diagnostic Collection Summary\n${SUMMARY_RULE}\n` +
    `Collection Date: ${formatTimestamp(now)}\n` +
    `Cluster ID: ${clusterId}\n` +
    `Internal ID: ${internalId}\n\n` +
    "This collection focuses on install logs for a failed cluster installation.\n" +
    "The cluster is not accessible via 'oc' commands, so all information is gathered via OCM.\n\n" +
    filesCollectedSection(dir);

  summary += "\nKey Information:\n---------------\n";

  const logs = readBundleFile(dir, INSTALL_LOGS_FILE);
  if (logs !== undefined) {
    summary += `\nInstall Logs Preview (last ${PREVIEW_LINES} lines):\n${installLogsPreview(logs)}\n`;
  } else {
    summary += `\nInstall Logs: Not available - see ${NOTE_FILE} for manual collection instructions\n`;
  }

  const info = readBundleFile(dir, CLUSTER_INFO_FILE);
  if (info !== undefined) {
    summary += `\nCluster Information:\n${info}\n`;
  }

  summary +=
    "\nNext Steps:\n-----------\n" +
    `1. Review install logs in ${INSTALL_LOGS_FILE} for ERROR messages\n` +
    "2. Look for common failure patterns:\n" +
    "   - IAM/permission errors\n" +
    "   - Resource quota/limit errors\n" +
    "   - Network/connectivity errors\n" +
    "   - Timeout errors\n" +
    `3. Check cluster info in ${CLUSTER_INFO_FILE} for cluster state\n` +
    `4. Refer to ${GUIDE}\n`;

  return summary;
}

// ---------------------------------------------------------------------------
// Collection entry point
// ---------------------------------------------------------------------------

function printClusterIdRequired(ctx: AssistContext): void {
  const { reporter } = ctx.deps;
  reporter.failure("Error: --cluster flag is required for cluster provisioning failures.");
  reporter.info("\nUsage:");
  reporter.info("  opsctl assist cluster-provisioning-failure --cluster $CLUSTER_ID");
  reporter.info("\nTo find your cluster ID:");
  reporter.info("  ocm list clusters");
}

/**
 * @throws Error when the bundle directory can't be created or no cluster ID
 * was given
 */
export function collectProvisioningFailure(ctx: AssistContext): void {
  const { options, deps } = ctx;
  const { reporter } = deps;

  createBundleDir(options.outputDir);

  reporter.progress("NOTE: For cluster provisioning failures, the cluster is typically not accessible.");
  reporter.progress("This command will collect install logs via OCM.");
  reporter.info();

  const clusterId = options.clusterId;
  if (!clusterId) {
    printClusterIdRequired(ctx);
    throw new Error("cluster ID required");
  }

  reporter.success("Cluster Information:");
  reporter.info(`Cluster ID: ${clusterId}`);
  if (options.internalId) {
    reporter.info(`Internal ID: ${options.internalId}`);
  }
  reporter.info();

  try {
    createInstallLogsNote(ctx);
  } catch (error) {
    reporter.info(`Warning: Failed to create install logs note: ${errorMessage(error)}`);
  }

  try {
    collectInstallLogs(ctx, clusterId);
  } catch (error) {
    reporter.info(`Warning: Failed to collect install logs: ${errorMessage(error)}`);
    reporter.progress(`See ${NOTE_FILE} for manual collection instructions.`);
  }

  try {
    collectClusterInfo(ctx, clusterId);
  } catch (error) {
    reporter.info(`Warning: Failed to collect cluster info via OCM: ${errorMessage(error)}`);
  }

  reporter.success("Generating summary report...");
  writeBundleFile(
    options.outputDir,
    SUMMARY_FILE,
    buildFailedInstallSummary(options.outputDir, clusterId, options.internalId ?? "", deps.now())
  );
}

export const clusterProvisioningAlert: AlertDefinition = {
  command: "cluster-provisioning-failure",
  alertName: "ClusterProvisioningFailure",
  summary: "Collect diagnostic information for ClusterProvisioningFailure alert",
  description: `Collects all diagnostic information needed to troubleshoot the ClusterProvisioningFailure alert.

A cluster whose installation failed is usually not reachable with 'oc', so this
command works entirely through OCM. Pass the cluster ID with --cluster; the
internal ID is resolved automatically.

This command gathers:
  - Install logs (the tail OCM keeps for the cluster)
  - Cluster description and details from OCM
  - Cluster events from OCM
  - Instructions for collecting install logs manually

With --analyze, the analysis is followed by an interactive session for
follow-up questions (skip it with --no-interactive).

Requires the OCM CLI (ocm) on PATH and an active OCM login.

For troubleshooting steps, refer to:
  ${GUIDE}`,
  examples: [
    "# Collect diagnostics for a cluster",
    "opsctl assist cluster-provisioning-failure --cluster $CLUSTER_ID",
    "",
    "# Collect diagnostics to a custom directory",
    "opsctl assist cluster-provisioning-failure --cluster $CLUSTER_ID --output-dir /tmp/my-diagnostics",
    "",
    "# Collect diagnostics and analyze with LLM",
    "opsctl assist cluster-provisioning-failure --analyze --cluster $CLUSTER_ID",
    "",
    "# Analyze an existing directory of diagnostic artifacts",
    "opsctl assist cluster-provisioning-failure --analyze-existing /path/to/existing-diagnostics",
  ],
  dirPrefix: "cluster-provisioning-failure-diagnostics",
  analysisFile: ANALYSIS_FILE,
  analysisLabel: "cluster provisioning failure",
  promptFile: "cluster-provisioning-failure.md",
  fallbackPrompt: `You are an expert OpenShift/Kubernetes Site Reliability Engineer (SRE) specializing in cluster installation and provisioning. Your task is to analyze diagnostic information and assess cluster provisioning failures on OpenShift clusters.

Analyze the provided diagnostic data and provide:
1. Root cause analysis - What is likely causing the cluster provisioning failure?
2. Key findings - What are the most important issues identified?
3. Recommended actions - What steps should be taken to resolve the issues?
4. Priority - Rate the severity (Critical/High/Medium/Low)

Be concise but thorough. Focus on actionable insights.`,
  followUp: true,
  acceptsClusterId: true,
  digest: [
    { file: "00-SUMMARY.txt", limit: 15000 },
    { file: INSTALL_LOGS_FILE, limit: 15000, keepEnds: { over: 20000, keep: 10000 } },
    { file: CLUSTER_INFO_FILE, limit: 15000 },
    { file: CLUSTER_EVENTS_FILE, limit: 15000 },
    { file: CLUSTER_JSON_FILE, limit: 10000 },
  ],
  complete: (options, deps) => {
    if (!options.clusterId) {
      return;
    }
    try {
      options.internalId = resolveInternalId(deps.ocm, options.clusterId);
    } catch (error) {
      deps.reporter.info(
        `Warning: Failed to resolve internal ID from cluster ${options.clusterId}: ${errorMessage(error)}`
      );
      deps.reporter.info(
        `You can manually find the internal ID with: ocm describe cluster ${options.clusterId}`
      );
    }
  },
  collect: collectProvisioningFailure,
  nextSteps: (options) => {
    const steps = [
      `3. Review install logs in ${INSTALL_LOGS_FILE}`,
      "   Look for ERROR messages, permission issues, quota limits, network errors",
      `4. Check cluster info in ${CLUSTER_INFO_FILE} for cluster state and status`,
      ...(options.analyze
        ? [
            `5. Review ${ANALYSIS_FILE} for AI-powered insights`,
            `6. Refer to ${GUIDE} for troubleshooting steps`,
          ]
        : [
            `5. Refer to ${GUIDE} for troubleshooting steps`,
            "6. Use --analyze flag to enable LLM analysis",
          ]),
    ];
    if (options.internalId) {
      steps.push(
        "\nTo re-collect install logs manually:",
        `  echo -e \`ocm get ${clusterApiPath(options.internalId, "resources")} | jq -r '.resources.install_logs_tail'\` > install-logs.txt`
      );
    }
    return steps;
  },
};
