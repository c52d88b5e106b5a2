/**
 * command.ts - Builds one commander subcommand per alert
 *
 * Every subcommand takes the same flags, completes them the same way and
 * hands off to runAssist. Alert-specific behaviour lives in the
 * AlertDefinition.
 */

import * as fs from "fs";
import { Command } from "commander";
import {
  DEFAULT_LLM_MODEL,
  loadConfigFile,
  resolveLlmConfig,
} from "../config/llm-config";
import { withSpan } from "../tracing";
import { createCommandRunner, isOnPath } from "../utils/cli-runner";
import { createConsoleReporter } from "../utils/reporter";
import { createChatModel } from "./analysis";
import { defaultBundleDir } from "./bundle";
import { runAssist } from "./run";
import type { AlertDefinition, AssistDeps, AssistOptions } from "./types";

/**
 * Flag values as commander parses them.
 */
export interface RawAssistOptions {
  outputDir?: string;
  analyze?: boolean;
  analyzeExisting?: string;
  llmApiKey?: string;
  llmBaseUrl?: string;
  llmModel: string;
  /** commander sets this to false for --no-interactive. */
  interactive: boolean;
  cluster?: string;
}

export function createDefaultDeps(): AssistDeps {
  return {
    oc: createCommandRunner("oc"),
    ocm: createCommandRunner("ocm"),
    tar: createCommandRunner("tar"),
    reporter: createConsoleReporter(),
    isOnPath: (binary) => isOnPath(binary),
    now: () => new Date(),
    env: process.env,
    loadConfig: () => loadConfigFile(),
    createModel: createChatModel,
    input: process.stdin,
  };
}

/**
 * Turns parsed flags into AssistOptions:
 * 1. --analyze-existing must name a directory; it becomes the output dir
 *    and forces analysis
 * 2. otherwise the output dir defaults to <prefix>-YYYYMMDD-HHMMSS
 * 3. alert-specific completion (the provisioning internal ID)
 * 4. LLM settings are resolved when analysis is on
 *
 * @throws Error for a bad --analyze-existing path or unusable LLM settings
 */
export function completeOptions(
  definition: AlertDefinition,
  raw: RawAssistOptions,
  modelExplicit: boolean,
  deps: AssistDeps
): AssistOptions {
  const options: AssistOptions = {
    outputDir: raw.outputDir ?? "",
    analyze: raw.analyze ?? false,
    skipCollection: false,
    interactive: raw.interactive,
    clusterId: raw.cluster || undefined,
  };

  if (raw.analyzeExisting) {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(raw.analyzeExisting);
    } catch (error) {
      throw new Error(
        `existing directory does not exist or is not accessible: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!stats.isDirectory()) {
      throw new Error(`path is not a directory: ${raw.analyzeExisting}`);
    }
    options.outputDir = raw.analyzeExisting;
    options.skipCollection = true;
    options.analyze = true;
  } else if (!options.outputDir) {
    options.outputDir = defaultBundleDir(definition.dirPrefix, deps.now());
  }

  definition.complete?.(options, deps);

  if (options.analyze) {
    options.llm = resolveLlmConfig(
      {
        apiKey: raw.llmApiKey,
        baseUrl: raw.llmBaseUrl,
        model: raw.llmModel,
        modelExplicit,
      },
      { env: deps.env, config: deps.loadConfig() }
    );
  }

  return options;
}

function examplesHelp(examples: string[]): string {
  return `\nExamples:\n${examples.map((line) => (line ? `  ${line}` : "")).join("\n")}\n`;
}

/**
 * The subcommand for one alert. `getDeps` is called once per invocation so
 * tests can hand in fakes.
 */
export function createAlertCommand(
  definition: AlertDefinition,
  getDeps: () => AssistDeps = createDefaultDeps
): Command {
  const command = new Command(definition.command)
    .summary(definition.summary)
    .description(definition.description)
    .allowExcessArguments(false)
    .option(
      "--output-dir <dir>",
      `Output directory for diagnostic files (default: ${definition.dirPrefix}-TIMESTAMP)`
    )
    .option("--analyze", "Enable LLM analysis of collected diagnostic files")
    .option(
      "--analyze-existing <dir>",
      "Path to existing directory of diagnostic artifacts to analyze with LLM (skips collection)"
    )
    .option(
      "--llm-api-key <key>",
      "LLM API key (default: ~/.config/opsctl OPENAI_API_KEY, then LLM_API_KEY, OPENAI_API_KEY, etc.)"
    )
    .option(
      "--llm-base-url <url>",
      "LLM API base URL (default: ~/.config/opsctl OPENAI_BASE_URL, then env vars, or https://api.openai.com/v1)"
    )
    .option(
      "--llm-model <model>",
      "LLM model to use for analysis (default: ~/.config/opsctl AI_MODEL_NAME, then env vars)",
      DEFAULT_LLM_MODEL
    )
    .option(
      "--no-interactive",
      definition.followUp
        ? "Skip the follow-up questions after the analysis"
        : "Accepted for consistency; this alert has no follow-up questions"
    );

  if (definition.acceptsClusterId) {
    command.option(
      "--cluster <id>",
      "Cluster ID (external); used to find the internal ID for install logs collection via OCM"
    );
  }

  for (const alias of definition.aliases ?? []) {
    command.alias(alias);
  }

  command.addHelpText("after", examplesHelp(definition.examples));

  command.action(async () => {
    const raw = command.opts<RawAssistOptions>();
    const modelExplicit = command.getOptionValueSource("llmModel") === "cli";
    const deps = getDeps();

    await withSpan(
      `opsctl.assist ${definition.command}`,
      {
        "opsctl.command": definition.command,
        "opsctl.alert": definition.alertName,
      },
      async (span) => {
        const options = completeOptions(definition, raw, modelExplicit, deps);
        span.setAttribute("opsctl.output_dir", options.outputDir);
        span.setAttribute("opsctl.analyze", options.analyze);
        span.setAttribute("opsctl.skip_collection", options.skipCollection);
        await runAssist(definition, { options, deps });
      }
    );
  });

  return command;
}
