/**
 * llm-config.ts - Resolves the LLM endpoint settings for the analysis pass
 *
 * Each setting is looked up in order until one is non-empty:
 *
 *   API key:  --llm-api-key → config OPENAI_API_KEY → env OPENAI_API_KEY
 *             → LLM_API_KEY, OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_API_KEY
 *   Base URL: --llm-base-url → config OPENAI_BASE_URL → env OPENAI_BASE_URL
 *             → LLM_BASE_URL, OPENAI_BASE_URL, ANTHROPIC_BASE_URL, GOOGLE_BASE_URL
 *             → https://api.openai.com/v1
 *   Model:    --llm-model when given explicitly → config AI_MODEL_NAME
 *             → env AI_MODEL_NAME → LLM_MODEL, AI_MODEL_NAME, OPENAI_MODEL,
 *             ANTHROPIC_MODEL, GOOGLE_MODEL → gpt-4o-mini
 *
 * The config file is ~/.config/opsctl, a flat YAML map of the same keys.
 * Resolution only happens when analysis is enabled; collection-only runs
 * never need a key.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse } from "yaml";
import { z } from "zod";

export const DEFAULT_LLM_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_LLM_MODEL = "gpt-4o-mini";

export const API_KEY_ENV_VARS = [
  "LLM_API_KEY",
  "OPENAI_API_KEY",
  "ANTHROPIC_API_KEY",
  "GOOGLE_API_KEY",
] as const;

const BASE_URL_ENV_VARS = [
  "LLM_BASE_URL",
  "OPENAI_BASE_URL",
  "ANTHROPIC_BASE_URL",
  "GOOGLE_BASE_URL",
] as const;

const MODEL_ENV_VARS = [
  "LLM_MODEL",
  "AI_MODEL_NAME",
  "OPENAI_MODEL",
  "ANTHROPIC_MODEL",
  "GOOGLE_MODEL",
] as const;

/** Minimum plausible key length; shorter values are almost always typos. */
const MIN_API_KEY_LENGTH = 10;

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}

/**
 * LLM values as given on the command line.
 * `modelExplicit` is false when `model` is only the flag's default.
 */
export interface LlmFlags {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  modelExplicit: boolean;
}

/** Config-file key → cleaned string value. */
export type ConfigValues = Record<string, string>;

export interface ConfigSources {
  env: NodeJS.ProcessEnv;
  config: ConfigValues;
}

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

const ConfigFileSchema = z.record(z.unknown());
const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export function defaultConfigPath(): string {
  return path.join(os.homedir(), ".config", "opsctl");
}

/**
 * Strips surrounding quote characters and whitespace. YAML that quotes a
 * value twice ('"sk-..."') still yields the bare key.
 */
export function cleanConfigValue(value: string): string {
  return value.replace(/^["']+|["']+$/g, "").trim();
}

/**
 * Reads the YAML config file. Scalar values become strings; nested values
 * are ignored. A missing or malformed file reads as empty.
 */
export function loadConfigFile(file: string = defaultConfigPath()): ConfigValues {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch {
    return {};
  }

  let document: unknown;
  try {
    document = parse(text);
  } catch {
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(document);
  if (!parsed.success) {
    return {};
  }

  const values: ConfigValues = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    const scalar = ScalarSchema.safeParse(value);
    if (scalar.success) {
      values[key] = cleanConfigValue(String(scalar.data));
    }
  }
  return values;
}

// ---------------------------------------------------------------------------
// Lookup helpers
// ---------------------------------------------------------------------------

/** Config file first, then one environment variable. */
function lookup(sources: ConfigSources, key: string, envVar: string): string {
  const fromConfig = sources.config[key];
  if (fromConfig) {
    return fromConfig;
  }
  const fromEnv = sources.env[envVar];
  return fromEnv ? fromEnv.trim() : "";
}

/**
 * The first variable that is set to a non-empty value wins, even when it
 * trims down to nothing. That case is reported as an invalid key below.
 */
function firstEnv(env: NodeJS.ProcessEnv, names: readonly string[]): string {
  for (const name of names) {
    const value = env[name];
    if (value) {
      return value.trim();
    }
  }
  return "";
}

// ---------------------------------------------------------------------------
// API key validation
// ---------------------------------------------------------------------------

/**
 * Basic sanity checks. Prefixes are not checked: providers and proxies use
 * different key formats, and the endpoint has the final word.
 */
export function validateApiKey(apiKey: string): void {
  if (apiKey === "") {
    throw new Error("API key is empty");
  }
  const trimmed = apiKey.trim();
  if (trimmed !== apiKey) {
    throw new Error(
      `API key contains leading or trailing whitespace (length: ${apiKey.length} -> ${trimmed.length} after trim)`
    );
  }
  if (apiKey.length < MIN_API_KEY_LENGTH) {
    throw new Error(
      `API key appears too short (length: ${apiKey.length}). Valid API keys are typically longer`
    );
  }
}

/**
 * First and last ten characters, for confirming which key is in use.
 */
export function keyPreview(apiKey: string): string {
  return `${apiKey.slice(0, 10)}...${apiKey.slice(Math.max(0, apiKey.length - 10))}`;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolves key, base URL and model from flags, config file and environment.
 *
 * @throws Error when no usable API key is found or the key fails validation
 */
export function resolveLlmConfig(
  flags: LlmFlags,
  sources: ConfigSources
): LlmConfig {
  const apiKey = flags.apiKey
    ? flags.apiKey.trim()
    : lookup(sources, "OPENAI_API_KEY", "OPENAI_API_KEY") ||
      firstEnv(sources.env, API_KEY_ENV_VARS);

  const baseUrl =
    flags.baseUrl ||
    lookup(sources, "OPENAI_BASE_URL", "OPENAI_BASE_URL") ||
    firstEnv(sources.env, BASE_URL_ENV_VARS) ||
    DEFAULT_LLM_BASE_URL;

  const model = flags.modelExplicit
    ? flags.model
    : lookup(sources, "AI_MODEL_NAME", "AI_MODEL_NAME") ||
      firstEnv(sources.env, MODEL_ENV_VARS) ||
      flags.model;

  if (!apiKey) {
    const found = API_KEY_ENV_VARS.filter((name) => sources.env[name]);
    if (found.length > 0) {
      throw new Error(
        `LLM analysis enabled but API key from environment variable(s) [${found.join(" ")}] appears to be empty or invalid`
      );
    }
    throw new Error(
      `LLM analysis enabled but no API key provided. Set --llm-api-key flag or one of these environment variables: ${API_KEY_ENV_VARS.join(", ")}`
    );
  }

  try {
    validateApiKey(apiKey);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const preview = apiKey.length > 20 ? `${apiKey.slice(0, 20)}...` : apiKey;
    throw new Error(
      `LLM API key validation failed: ${reason}\nKey preview (first 20 chars): ${preview}\nPlease verify your API key environment variable (LLM_API_KEY, OPENAI_API_KEY, etc.)`
    );
  }

  return { apiKey, baseUrl, model };
}
