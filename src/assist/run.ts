/**
 * run.ts - The flow every assist command follows
 *
 * 1. Collect into a new bundle, or check an existing one (--analyze-existing)
 * 2. Archive the new bundle as <dir>.tar.gz
 * 3. Optionally analyze the bundle with the LLM, then take follow-up questions
 * 4. Print where everything is and what to look at next
 *
 * Only setup problems (no oc, not logged in, empty existing directory) fail
 * the command. Archive and analysis failures are printed as warnings.
 */

import * as fs from "fs";
import { keyPreview, type LlmConfig } from "../config/llm-config";
import {
  analyzeDiagnostics,
  loadSystemPrompt,
  type ChatResult,
} from "./analysis";
import {
  appendBundleFile,
  archivePath,
  createArchive,
  hasDiagnosticFiles,
  writeBundleFile,
} from "./bundle";
import { buildDigest } from "./digest";
import { formatExchange, runFollowUp } from "./follow-up";
import type { AlertDefinition, AssistContext } from "./types";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runAssist(
  definition: AlertDefinition,
  ctx: AssistContext
): Promise<void> {
  const { options, deps } = ctx;
  const { reporter } = deps;
  const dir = options.outputDir;

  if (options.skipCollection) {
    reporter.success("Analyzing existing diagnostic artifacts...");
    reporter.info(`Directory: ${dir}`);
    reporter.info();
    if (!hasDiagnosticFiles(dir)) {
      throw new Error(
        `directory appears to be empty or contains no diagnostic files: ${dir}`
      );
    }
  } else {
    reporter.success(
      `Collecting diagnostic information for ${definition.alertName} alert...`
    );
    reporter.info(`Output directory: ${dir}`);
    reporter.info();

    definition.collect(ctx);

    reporter.success("Creating archive...");
    try {
      createArchive(dir, deps.tar);
    } catch (error) {
      reporter.info(`Warning: Failed to create archive: ${errorMessage(error)}`);
    }
  }

  if (options.analyze && options.llm) {
    await analyzeBundle(definition, ctx, options.llm);
  }

  printCompletion(definition, ctx);
}

/**
 * The analysis pass and, for alerts that offer it, the follow-up loop.
 */
async function analyzeBundle(
  definition: AlertDefinition,
  ctx: AssistContext,
  llm: LlmConfig
): Promise<void> {
  const { options, deps } = ctx;
  const { reporter } = deps;
  const dir = options.outputDir;

  reporter.progress("\nAnalyzing diagnostics with LLM...");
  reporter.info(`Using LLM endpoint: ${llm.baseUrl}`);
  reporter.info(`Using model: ${llm.model}`);
  reporter.info(`API key preview: ${keyPreview(llm.apiKey)} (length: ${llm.apiKey.length})`);
  reporter.info();

  const model = deps.createModel(llm);
  let result: ChatResult;
  try {
    result = await analyzeDiagnostics(model, {
      systemPrompt: loadSystemPrompt(definition.promptFile, definition.fallbackPrompt),
      label: definition.analysisLabel,
      digest: buildDigest(dir, definition.digest),
      llm,
    });
  } catch (error) {
    reporter.info(`Warning: LLM analysis failed: ${errorMessage(error)}`);
    return;
  }

  reporter.success("\n=== LLM Analysis Results ===");
  reporter.info(result.answer);
  reporter.info();

  try {
    writeBundleFile(dir, definition.analysisFile, result.answer);
    reporter.success(`✓ LLM analysis saved to ${definition.analysisFile}`);
  } catch (error) {
    reporter.info(`Warning: Failed to save LLM analysis: ${errorMessage(error)}`);
  }

  if (!definition.followUp || !options.interactive) {
    return;
  }

  await runFollowUp({
    model,
    llm,
    history: result.history,
    input: deps.input,
    reporter,
    onExchange: (question, answer) => {
      try {
        appendBundleFile(dir, definition.analysisFile, formatExchange(question, answer));
      } catch (error) {
        reporter.info(
          `Warning: Failed to append follow-up to analysis file: ${errorMessage(error)}`
        );
      }
    },
  });
}

function printCompletion(definition: AlertDefinition, ctx: AssistContext): void {
  const { options, deps } = ctx;
  const { reporter } = deps;
  const dir = options.outputDir;

  reporter.success("\n========================================");
  reporter.success("Collection Complete!");
  reporter.success("========================================");
  reporter.info(`Diagnostic information saved to: ${dir}/`);
  if (fs.existsSync(archivePath(dir))) {
    reporter.info(`Archive created: ${archivePath(dir)}`);
  }

  reporter.info("\nNext steps:");
  reporter.info(`1. Review the files in ${dir}/`);
  reporter.info("2. Start with 00-SUMMARY.txt for an overview");
  for (const line of definition.nextSteps(options)) {
    reporter.info(line);
  }
  reporter.info();
}
