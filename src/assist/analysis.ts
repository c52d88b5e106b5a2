/**
 * analysis.ts - LLM analysis of a diagnostic bundle
 *
 * Sends the alert's system prompt plus the bundle digest to an
 * OpenAI-compatible chat-completion endpoint and returns the answer together
 * with the conversation so far, which the follow-up loop extends.
 *
 * Key design choices:
 * - ChatOpenAI from @langchain/openai, pointed at any compatible base URL
 *   (OpenAI, a gateway, a self-hosted proxy)
 * - temperature 0.3 and a 4000-token answer budget
 * - no retries: a failed analysis is reported and the collected bundle is
 *   still there for a human
 * - the model is injectable (ChatModel) so tests never touch the network
 */

import * as fs from "fs";
import * as path from "path";
import { ChatOpenAI } from "@langchain/openai";
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
} from "@langchain/core/messages";
import { withSpan, isCaptureAiPayloads } from "../tracing";
import type { LlmConfig } from "../config/llm-config";
import type { ChatModel, Conversation } from "./types";

const TEMPERATURE = 0.3;
const MAX_TOKENS = 4000;
const REQUEST_TIMEOUT_MS = 120_000;

// ---------------------------------------------------------------------------
// Model creation
// ---------------------------------------------------------------------------

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function createChatModel(config: LlmConfig): ChatModel {
  return new ChatOpenAI({
    model: config.model,
    temperature: TEMPERATURE,
    maxTokens: MAX_TOKENS,
    apiKey: config.apiKey,
    timeout: REQUEST_TIMEOUT_MS,
    maxRetries: 0,
    configuration: { baseURL: normalizeBaseUrl(config.baseUrl) },
  });
}

// ---------------------------------------------------------------------------
// Prompt loading
// ---------------------------------------------------------------------------

/** From src/assist/ (or dist/assist/) up to the project root's prompts/. */
const promptDir = path.join(__dirname, "../../prompts");

const cachedPrompts = new Map<string, string>();

/**
 * Loads prompts/<file>, caching it. Falls back to `fallback` when the file
 * is missing so an installed CLI with a stripped prompts/ still works.
 */
export function loadSystemPrompt(file: string, fallback: string): string {
  const cached = cachedPrompts.get(file);
  if (cached !== undefined) {
    return cached;
  }

  let prompt: string;
  try {
    prompt = fs.readFileSync(path.join(promptDir, file), "utf8").trim();
  } catch {
    prompt = "";
  }
  const resolved = prompt || fallback;
  cachedPrompts.set(file, resolved);
  return resolved;
}

// ---------------------------------------------------------------------------
// Responses and errors
// ---------------------------------------------------------------------------

/**
 * Text of a model response. Content is either a string or an array of
 * content blocks, of which only the text blocks are kept.
 */
export function extractText(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (!Array.isArray(content)) {
    return "";
  }
  let text = "";
  for (const block of content) {
    if (
      typeof block === "object" &&
      block !== null &&
      "type" in block &&
      block.type === "text" &&
      "text" in block &&
      typeof block.text === "string"
    ) {
      text += block.text;
    }
  }
  return text;
}

function statusOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

/**
 * The provider's message without the client's decorations: the OpenAI client
 * prefixes the status ("401 Incorrect API key...") and LangChain appends a
 * troubleshooting URL.
 */
function providerMessage(error: unknown, status: number | undefined): string {
  let message = error instanceof Error ? error.message : String(error);
  const troubleshooting = message.indexOf("\n\nTroubleshooting URL:");
  if (troubleshooting !== -1) {
    message = message.slice(0, troubleshooting);
  }
  if (status !== undefined && message.startsWith(`${status} `)) {
    message = message.slice(String(status).length + 1);
  }
  return message.trim();
}

/**
 * Turns a client failure into the error shown to the operator.
 * With `troubleshoot`, a 401 carries steps that name the base URL; follow-up
 * questions leave them out since the first exchange already succeeded.
 */
export function describeLlmError(
  error: unknown,
  baseUrl: string,
  troubleshoot = true
): Error {
  const status = statusOf(error);
  const message = providerMessage(error, status);

  if (status === 401 && troubleshoot) {
    return new Error(
      `authentication failed (401): ${message}\n\nTroubleshooting:\n` +
        "1. Verify your API key is correct\n" +
        "2. Ensure there are no extra spaces or newlines in the key\n" +
        "3. Check your environment variables: LLM_API_KEY, OPENAI_API_KEY, etc.\n" +
        "4. Verify the API key format matches your LLM provider's requirements\n" +
        `5. Confirm the base URL (${baseUrl}) is correct for your LLM provider`
    );
  }
  if (status !== undefined) {
    return new Error(`LLM API returned status ${status}: ${message}`);
  }
  return new Error(`failed to send request: ${message}`);
}

// ---------------------------------------------------------------------------
// Chat calls
// ---------------------------------------------------------------------------

export interface ChatResult {
  answer: string;
  history: Conversation;
}

/**
 * Sends `messages` and returns the answer with the AI message appended.
 */
async function chat(
  model: ChatModel,
  messages: Conversation,
  llm: LlmConfig,
  troubleshoot: boolean
): Promise<ChatResult> {
  return withSpan(
    "llm.chat",
    {
      "gen_ai.operation.name": "chat",
      "gen_ai.request.model": llm.model,
      "server.address": normalizeBaseUrl(llm.baseUrl),
      "gen_ai.request.message_count": messages.length,
    },
    async (span) => {
      let response: { content: unknown };
      try {
        response = await model.invoke(messages);
      } catch (error) {
        throw describeLlmError(error, llm.baseUrl, troubleshoot);
      }

      const answer = extractText(response.content);
      if (answer === "") {
        throw new Error("no response from LLM");
      }
      span.setAttribute("gen_ai.response.length", answer.length);
      if (isCaptureAiPayloads) {
        span.setAttribute("gen_ai.completion", answer);
      }
      return { answer, history: [...messages, new AIMessage(answer)] };
    }
  );
}

export interface AnalysisRequest {
  systemPrompt: string;
  /** Inserted into the user message, e.g. "pruning cronjob". */
  label: string;
  digest: string;
  llm: LlmConfig;
}

export function buildUserMessage(label: string, digest: string): string {
  return `Please analyze the following ${label} diagnostic information from an OpenShift cluster:\n\n${digest}`;
}

/**
 * First exchange: system prompt plus the bundle digest.
 *
 * @throws Error describing the endpoint failure or an empty completion
 */
export async function analyzeDiagnostics(
  model: ChatModel,
  request: AnalysisRequest
): Promise<ChatResult> {
  return chat(
    model,
    [
      new SystemMessage(request.systemPrompt),
      new HumanMessage(buildUserMessage(request.label, request.digest)),
    ],
    request.llm,
    true
  );
}

/**
 * Later exchanges: the full history plus one new question. The returned
 * history includes both; on failure the caller keeps its old history.
 */
export async function askFollowUp(
  model: ChatModel,
  history: Conversation,
  question: string,
  llm: LlmConfig
): Promise<ChatResult> {
  return chat(model, [...history, new HumanMessage(question)], llm, false);
}
