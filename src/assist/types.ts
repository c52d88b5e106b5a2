/**
 * types.ts - Shared types for the assist commands
 *
 * Each alert is described by an AlertDefinition: what to collect, how to
 * summarize it, which files feed the analysis pass and what to tell the
 * operator afterwards. run.ts drives every alert through the same flow.
 */

import type { BaseMessage } from "@langchain/core/messages";
import type { ConfigValues, LlmConfig } from "../config/llm-config";
import type { CommandRunner } from "../utils/cli-runner";
import type { Reporter } from "../utils/reporter";

/**
 * The part of a chat model the analysis pass uses. ChatOpenAI satisfies it;
 * tests pass a vi.fn()-backed object.
 */
export interface ChatModel {
  invoke(messages: BaseMessage[]): Promise<{ content: unknown }>;
}

/**
 * Everything an assist command touches outside its own process.
 * createDefaultDeps() in command.ts wires the real implementations.
 */
export interface AssistDeps {
  oc: CommandRunner;
  ocm: CommandRunner;
  tar: CommandRunner;
  reporter: Reporter;
  isOnPath: (binary: string) => boolean;
  now: () => Date;
  env: NodeJS.ProcessEnv;
  loadConfig: () => ConfigValues;
  createModel: (config: LlmConfig) => ChatModel;
  /** Source of follow-up questions. */
  input: NodeJS.ReadableStream;
}

/**
 * Command options after completion: defaults filled in, the existing
 * directory validated and LLM settings resolved.
 */
export interface AssistOptions {
  outputDir: string;
  analyze: boolean;
  /** True for --analyze-existing: the bundle already exists. */
  skipCollection: boolean;
  /** False for --no-interactive. */
  interactive: boolean;
  /** Present exactly when analyze is true. */
  llm?: LlmConfig;
  clusterId?: string;
  internalId?: string;
}

export interface AssistContext {
  options: AssistOptions;
  deps: AssistDeps;
}

// ---------------------------------------------------------------------------
// Summary and digest plans
// ---------------------------------------------------------------------------

/** One "Key Information" section of 00-SUMMARY.txt. */
export interface SummaryExcerpt {
  label: string;
  file: string;
}

export interface SummarySpec {
  title: string;
  excerpts: SummaryExcerpt[];
  /** Appended verbatim after the excerpts. */
  trailer?: string;
}

/**
 * One step of the text sent to the analysis pass.
 *
 * - `file`: a single file. `keepEnds` keeps both ends of files longer than
 *   `over`; otherwise files longer than `limit` are cut.
 * - `prefix`/`suffix`: the first `take` sorted files matching the pattern.
 */
export type DigestEntry =
  | {
      file: string;
      limit?: number;
      keepEnds?: { over: number; keep: number };
    }
  | {
      prefix: string;
      suffix: string;
      take: number;
      limit?: number;
    };

export type Conversation = BaseMessage[];

// ---------------------------------------------------------------------------
// Alert definitions
// ---------------------------------------------------------------------------

export interface AlertDefinition {
  /** Subcommand name, e.g. "pruning-cronjob-error-sre". */
  command: string;
  aliases?: string[];
  /** Alert name as it appears in headings, e.g. "PruningCronjobErrorSRE". */
  alertName: string;
  summary: string;
  description: string;
  examples: string[];
  dirPrefix: string;
  analysisFile: string;
  /** Inserted into "Please analyze the following <label> diagnostic information". */
  analysisLabel: string;
  /** File under prompts/. */
  promptFile: string;
  /** Used when the prompt file can't be read. */
  fallbackPrompt: string;
  followUp: boolean;
  acceptsClusterId: boolean;
  digest: DigestEntry[];
  /** Extra option completion, run after the common defaults. */
  complete?: (options: AssistOptions, deps: AssistDeps) => void;
  /** Writes the bundle, including 00-SUMMARY.txt. */
  collect: (ctx: AssistContext) => void;
  /** Next-steps lines after "1. Review the files" and "2. Start with 00-SUMMARY.txt". */
  nextSteps: (options: AssistOptions) => string[];
}
