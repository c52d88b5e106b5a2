/**
 * follow-up.ts - Interactive follow-up questions after an analysis
 *
 * Reads one question per line. Each question is sent with the whole
 * conversation so far; answers are printed and appended to the analysis file
 * so the bundle keeps a record of the session. The loop ends on end of input
 * or on exit/quit/q.
 */

import { createInterface } from "readline";
import { askFollowUp, type ChatResult } from "./analysis";
import type { LlmConfig } from "../config/llm-config";
import type { Reporter } from "../utils/reporter";
import type { ChatModel, Conversation } from "./types";

const EXIT_WORDS = new Set(["exit", "quit", "q"]);

export interface FollowUpOptions {
  model: ChatModel;
  llm: LlmConfig;
  history: Conversation;
  input: NodeJS.ReadableStream;
  reporter: Reporter;
  /** Called after each answered question, e.g. to append it to a file. */
  onExchange: (question: string, answer: string) => void;
}

export function formatExchange(question: string, answer: string): string {
  return `\n\n=== Follow-up Question ===\n${question}\n\n=== Response ===\n${answer}\n`;
}

/**
 * Runs the question loop until the input ends or the operator exits.
 * A failed question is reported and the loop continues with the
 * conversation unchanged.
 */
export async function runFollowUp(options: FollowUpOptions): Promise<void> {
  const { reporter } = options;
  let history = options.history;

  reporter.progress("\n=== Interactive Follow-up ===");
  reporter.info(
    "You can ask follow-up questions about the analysis. Type 'exit' or 'quit' to finish."
  );
  reporter.info();

  const rl = createInterface({ input: options.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  try {
    for (;;) {
      reporter.prompt("Question (or 'exit' to finish): ");
      const next = await lines.next();
      if (next.done) {
        break;
      }

      const question = next.value.trim();
      if (question === "") {
        continue;
      }
      if (EXIT_WORDS.has(question.toLowerCase())) {
        reporter.success("Exiting interactive mode.");
        break;
      }

      reporter.progress("\nThinking...");
      let result: ChatResult;
      try {
        result = await askFollowUp(options.model, history, question, options.llm);
      } catch (error) {
        reporter.info(
          `Error: Failed to get response: ${error instanceof Error ? error.message : String(error)}`
        );
        continue;
      }

      history = result.history;
      reporter.success("\n=== Response ===");
      reporter.info(result.answer);
      reporter.info();

      options.onExchange(question, result.answer);
    }
  } finally {
    rl.close();
  }
}
