/**
 * follow-up.test.ts - Unit tests for the interactive question loop
 */

import { describe, it, expect, vi } from "vitest";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { formatExchange, runFollowUp } from "./follow-up";
import { createRecordingReporter, linesInput } from "../testing/fakes";
import type { LlmConfig } from "../config/llm-config";

const llm: LlmConfig = { apiKey: "test-secret", baseUrl: "https://llm.example.test/v1", model: "m" };
const PROMPT = "Question (or 'exit' to finish): ";

describe("formatExchange", () => {
  it("frames question and response", () => {
    expect(formatExchange("Why?", "Because.")).toBe(
      "\n\n=== Follow-up Question ===\nWhy?\n\n=== Response ===\nBecause.\n"
    );
  });
});

describe("runFollowUp", () => {
  const history = [new SystemMessage("system"), new HumanMessage("digest")];

  it("answers questions until exit, skipping blank lines", async () => {
    const reporter = createRecordingReporter();
    const onExchange = vi.fn();
    const model = { invoke: vi.fn().mockResolvedValue({ content: "Check the quota." }) };

    await runFollowUp({
      model,
      llm,
      history,
      input: linesInput(["", "  Why is it failing?  ", "EXIT", "never asked"]),
      reporter,
      onExchange,
    });

    expect(reporter.lines).toEqual([
      "\n=== Interactive Follow-up ===",
      "You can ask follow-up questions about the analysis. Type 'exit' or 'quit' to finish.",
      "",
      PROMPT,
      PROMPT,
      "\nThinking...",
      "\n=== Response ===",
      "Check the quota.",
      "",
      PROMPT,
      "Exiting interactive mode.",
    ]);
    expect(model.invoke).toHaveBeenCalledTimes(1);
    expect(onExchange).toHaveBeenCalledWith("Why is it failing?", "Check the quota.");
  });

  it("stops at end of input", async () => {
    const reporter = createRecordingReporter();
    const model = { invoke: vi.fn() };

    await runFollowUp({
      model,
      llm,
      history,
      input: linesInput([]),
      reporter,
      onExchange: vi.fn(),
    });

    expect(reporter.lines.at(-1)).toBe(PROMPT);
    expect(model.invoke).not.toHaveBeenCalled();
  });

  it("reports a failed question and keeps the conversation unchanged", async () => {
    const reporter = createRecordingReporter();
    const onExchange = vi.fn();
    const model = {
      invoke: vi
        .fn()
        .mockRejectedValueOnce(new Error("socket hang up"))
        .mockResolvedValueOnce({ content: "Second answer" }),
    };

    await runFollowUp({
      model,
      llm,
      history,
      input: linesInput(["first", "second"]),
      reporter,
      onExchange,
    });

    expect(reporter.lines).toContain("Error: Failed to get response: failed to send request: socket hang up");
    const secondCall = model.invoke.mock.calls[1][0];
    expect(secondCall).toHaveLength(3);
    expect(secondCall[2].content).toBe("second");
    expect(onExchange).toHaveBeenCalledTimes(1);
    expect(onExchange).toHaveBeenCalledWith("second", "Second answer");
  });
});
