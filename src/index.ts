#!/usr/bin/env node
/**
 * index.ts - CLI entry point for opsctl
 *
 * opsctl is an operations CLI for OpenShift clusters. Its `assist` group
 * holds one diagnostic-collection command per alert:
 *
 *   opsctl assist pruning-cronjob-error-sre --analyze
 *   opsctl assist cluster-provisioning-failure --cluster $CLUSTER_ID
 *
 * Each command gathers resource dumps, logs and events into a timestamped
 * bundle directory, archives it, and can send the bundle to an LLM for a
 * first-pass analysis.
 */

// Initialize OpenTelemetry tracing before any other imports
// so the tracer provider is registered before instrumented code loads
import "./tracing";

import { Command } from "commander";
import { createAssistCommand } from "./assist";
import { flushTracing } from "./tracing";

async function main() {
  const program = new Command();

  program
    .name("opsctl")
    .description("Operations CLI for OpenShift clusters")
    .version("0.1.0");

  program.addCommand(createAssistCommand());

  try {
    await program.parseAsync(process.argv);
  } finally {
    await flushTracing();
  }
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
