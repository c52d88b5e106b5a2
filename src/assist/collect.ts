/**
 * collect.ts - Collection steps and the shared in-cluster preflight
 *
 * A collection step prints "Collecting: <what>", runs one command or writes
 * one computed file, then prints "✓ Saved to <file>" or "✗ Failed to collect
 * <what>". Failures are reported and the run continues.
 */

import * as fs from "fs";
import * as path from "path";
import {
  formatTimestamp,
  writeBundleFile,
} from "./bundle";
import { writeSummary } from "./summary";
import type { AssistContext, SummarySpec } from "./types";
import type { CommandRunner } from "../utils/cli-runner";

export interface CollectStep {
  /** Shown after "Collecting: ". */
  what: string;
  /** Shown after "Failed to collect ". */
  failure: string;
  args: string[];
  file: string;
}

/**
 * Runs one command with its output appended to a bundle file.
 * Returns whether the command succeeded.
 */
export function collectToFile(
  ctx: AssistContext,
  step: CollectStep,
  runner: CommandRunner = ctx.deps.oc
): boolean {
  const { reporter } = ctx.deps;
  reporter.progress(`Collecting: ${step.what}`);
  const result = runner.runToFile(
    step.args,
    path.join(ctx.options.outputDir, step.file)
  );
  reportOutcome(ctx, !result.isError, step.file, step.failure);
  return !result.isError;
}

/**
 * Writes content computed from command output (filtered lines, parsed JSON).
 */
export function collectComputed(
  ctx: AssistContext,
  what: string,
  failure: string,
  file: string,
  compute: () => string
): boolean {
  ctx.deps.reporter.progress(`Collecting: ${what}`);
  let ok = true;
  try {
    writeBundleFile(ctx.options.outputDir, file, compute());
  } catch {
    ok = false;
  }
  reportOutcome(ctx, ok, file, failure);
  return ok;
}

function reportOutcome(
  ctx: AssistContext,
  ok: boolean,
  file: string,
  failure: string
): void {
  const { reporter } = ctx.deps;
  if (ok) {
    reporter.success(`  ✓ Saved to ${file}`);
  } else {
    reporter.failure(`  ✗ Failed to collect ${failure}`);
  }
  reporter.info();
}

/**
 * `-o wide` into `<base>.txt` and `-o yaml` into `<base>.yaml`.
 */
export function collectWideAndYaml(
  ctx: AssistContext,
  what: string,
  failure: string,
  getArgs: string[],
  base: string
): void {
  collectToFile(ctx, {
    what,
    failure,
    args: [...getArgs, "-o", "wide"],
    file: `${base}.txt`,
  });
  collectToFile(ctx, {
    what: `${what} (yaml)`,
    failure: `${failure} yaml`,
    args: [...getArgs, "-o", "yaml"],
    file: `${base}.yaml`,
  });
}

// ---------------------------------------------------------------------------
// In-cluster collection
// ---------------------------------------------------------------------------

export interface ClusterCollectionPlan {
  collectors: Array<(ctx: AssistContext) => void>;
  summary: (ctx: AssistContext) => SummarySpec;
}

/**
 * The cluster ID from ClusterVersion, or "N/A" when it can't be read.
 */
export function getClusterId(oc: CommandRunner): string {
  const result = oc.run([
    "get",
    "clusterversion",
    "version",
    "-o",
    "jsonpath={.spec.clusterID}",
  ]);
  const id = result.output.trim();
  return result.isError || id === "" ? "N/A" : id;
}

/**
 * Collection for alerts diagnosed from inside the cluster:
 * 1. create the bundle directory
 * 2. check oc is installed and logged in
 * 3. record the cluster ID and `oc cluster-info`
 * 4. run each collector in order
 * 5. write 00-SUMMARY.txt
 *
 * @throws Error when the directory can't be created, oc is missing, or no
 * cluster is reachable
 */
export function collectFromCluster(
  ctx: AssistContext,
  plan: ClusterCollectionPlan
): void {
  const { oc, reporter } = ctx.deps;
  const dir = ctx.options.outputDir;

  createBundleDir(dir);

  if (!ctx.deps.isOnPath(oc.binary)) {
    throw new Error(
      `'${oc.binary}' command not found. Please ensure OpenShift CLI is installed and configured.`
    );
  }

  if (oc.run(["cluster-info"]).isError) {
    throw new Error(
      "Not logged into a cluster. Please run 'ocm backplane login' first."
    );
  }

  reporter.success("Cluster Information:");
  const clusterId = getClusterId(oc);
  reporter.info(`Cluster ID: ${clusterId}`);
  reporter.info();

  const clusterInfoFile = "cluster-info.txt";
  writeBundleFile(
    dir,
    clusterInfoFile,
    `Cluster ID: ${clusterId}\nCollection Date: ${formatTimestamp(ctx.deps.now())}\n`
  );
  oc.runToFile(["cluster-info"], path.join(dir, clusterInfoFile));

  for (const collector of plan.collectors) {
    collector(ctx);
  }

  writeSummary(ctx, plan.summary(ctx), clusterId);
}

export function createBundleDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
  } catch (error) {
    throw new Error(
      `failed to create output directory: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
