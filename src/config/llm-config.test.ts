/**
 * llm-config.test.ts - Unit tests for LLM settings resolution
 *
 * Flags, config file and environment are passed in explicitly, so nothing
 * here reads the real home directory or process.env.
 */

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  cleanConfigValue,
  keyPreview,
  loadConfigFile,
  resolveLlmConfig,
  validateApiKey,
  type ConfigSources,
  type LlmFlags,
} from "./llm-config";
import { makeTempDir, removeDir } from "../testing/fakes";

const KEY = "test-secret-key-0123";

function flags(overrides: Partial<LlmFlags> = {}): LlmFlags {
  return { model: "gpt-4o-mini", modelExplicit: false, ...overrides };
}

function sources(overrides: Partial<ConfigSources> = {}): ConfigSources {
  return { env: {}, config: {}, ...overrides };
}

// ---------------------------------------------------------------------------
// API key
// ---------------------------------------------------------------------------

describe("resolveLlmConfig API key", () => {
  it("prefers the flag and trims it", () => {
    const config = resolveLlmConfig(
      flags({ apiKey: `  ${KEY}  ` }),
      sources({ env: { LLM_API_KEY: "test-secret-from-env" } })
    );
    expect(config.apiKey).toBe(KEY);
  });

  it("uses the config file before the environment", () => {
    const config = resolveLlmConfig(
      flags(),
      sources({
        config: { OPENAI_API_KEY: "test-secret-from-config" },
        env: { LLM_API_KEY: "test-secret-from-env" },
      })
    );
    expect(config.apiKey).toBe("test-secret-from-config");
  });

  it("checks OPENAI_API_KEY before the other variables when the config has no key", () => {
    const config = resolveLlmConfig(
      flags(),
      sources({
        env: { LLM_API_KEY: "test-secret-llm-key", OPENAI_API_KEY: "test-secret-openai" },
      })
    );
    expect(config.apiKey).toBe("test-secret-openai");
  });

  it("falls through the variable list in order", () => {
    const config = resolveLlmConfig(
      flags(),
      sources({
        env: { ANTHROPIC_API_KEY: "test-secret-anthropic", GOOGLE_API_KEY: "test-secret-google" },
      })
    );
    expect(config.apiKey).toBe("test-secret-anthropic");
  });

  it("reports variables that are set but blank", () => {
    expect(() =>
      resolveLlmConfig(flags(), sources({ env: { LLM_API_KEY: "   ", GOOGLE_API_KEY: "\n" } }))
    ).toThrow(
      "LLM analysis enabled but API key from environment variable(s) [LLM_API_KEY GOOGLE_API_KEY] appears to be empty or invalid"
    );
  });

  it("lists every variable when no key is found anywhere", () => {
    expect(() => resolveLlmConfig(flags(), sources())).toThrow(
      "LLM analysis enabled but no API key provided. Set --llm-api-key flag or one of these environment variables: LLM_API_KEY, OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_API_KEY"
    );
  });

  it("wraps validation failures with a 20-character preview", () => {
    expect(() => resolveLlmConfig(flags({ apiKey: "short" }), sources())).toThrow(
      "LLM API key validation failed: API key appears too short (length: 5). Valid API keys are typically longer\n" +
        "Key preview (first 20 chars): short\n" +
        "Please verify your API key environment variable (LLM_API_KEY, OPENAI_API_KEY, etc.)"
    );
  });
});

// ---------------------------------------------------------------------------
// Base URL and model
// ---------------------------------------------------------------------------

describe("resolveLlmConfig base URL", () => {
  it("defaults to the OpenAI endpoint", () => {
    expect(resolveLlmConfig(flags({ apiKey: KEY }), sources()).baseUrl).toBe(
      "https://api.openai.com/v1"
    );
  });

  it("prefers flag, then config, then environment", () => {
    const env = { LLM_BASE_URL: "https://env.example.test/v1" };
    const config = { OPENAI_BASE_URL: "https://config.example.test/v1" };

    expect(
      resolveLlmConfig(
        flags({ apiKey: KEY, baseUrl: "https://flag.example.test/v1" }),
        sources({ env, config })
      ).baseUrl
    ).toBe("https://flag.example.test/v1");
    expect(resolveLlmConfig(flags({ apiKey: KEY }), sources({ env, config })).baseUrl).toBe(
      "https://config.example.test/v1"
    );
    expect(resolveLlmConfig(flags({ apiKey: KEY }), sources({ env })).baseUrl).toBe(
      "https://env.example.test/v1"
    );
  });
});

describe("resolveLlmConfig model", () => {
  it("keeps an explicit flag over config and environment", () => {
    const config = resolveLlmConfig(
      flags({ apiKey: KEY, model: "flag-model", modelExplicit: true }),
      sources({ config: { AI_MODEL_NAME: "config-model" }, env: { LLM_MODEL: "env-model" } })
    );
    expect(config.model).toBe("flag-model");
  });

  it("replaces the flag default with the config value", () => {
    const config = resolveLlmConfig(
      flags({ apiKey: KEY }),
      sources({ config: { AI_MODEL_NAME: "config-model" }, env: { LLM_MODEL: "env-model" } })
    );
    expect(config.model).toBe("config-model");
  });

  it("checks AI_MODEL_NAME before LLM_MODEL", () => {
    const config = resolveLlmConfig(
      flags({ apiKey: KEY }),
      sources({ env: { LLM_MODEL: "env-model", AI_MODEL_NAME: "named-model" } })
    );
    expect(config.model).toBe("named-model");
  });

  it("falls back to the flag default", () => {
    expect(resolveLlmConfig(flags({ apiKey: KEY }), sources()).model).toBe("gpt-4o-mini");
  });
});

// ---------------------------------------------------------------------------
// Key helpers
// ---------------------------------------------------------------------------

describe("validateApiKey", () => {
  it("rejects an empty key", () => {
    expect(() => validateApiKey("")).toThrow("API key is empty");
  });

  it("rejects surrounding whitespace and reports both lengths", () => {
    expect(() => validateApiKey(" test-secret-key ")).toThrow(
      "API key contains leading or trailing whitespace (length: 17 -> 15 after trim)"
    );
  });

  it("accepts a plausible key", () => {
    expect(() => validateApiKey(KEY)).not.toThrow();
  });
});

describe("keyPreview", () => {
  it("shows the first and last ten characters", () => {
    expect(keyPreview(KEY)).toBe("test-secre...t-key-0123");
  });
});

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

describe("cleanConfigValue", () => {
  it("strips quotes and whitespace", () => {
    expect(cleanConfigValue(`"'test-secret'"`)).toBe("test-secret");
    expect(cleanConfigValue("  gpt-4o  ")).toBe("gpt-4o");
  });
});

describe("loadConfigFile", () => {
  let dir = "";

  afterEach(() => {
    if (dir) removeDir(dir);
  });

  it("reads scalar values as cleaned strings and skips nested ones", () => {
    dir = makeTempDir();
    const file = path.join(dir, "opsctl");
    fs.writeFileSync(
      file,
      [
        `OPENAI_API_KEY: "'test-secret-from-config'"`,
        "OPENAI_BASE_URL: https://llm.example.test/v1",
        "PORT: 8080",
        "nested:",
        "  inner: value",
        "",
      ].join("\n")
    );

    expect(loadConfigFile(file)).toEqual({
      OPENAI_API_KEY: "test-secret-from-config",
      OPENAI_BASE_URL: "https://llm.example.test/v1",
      PORT: "8080",
    });
  });

  it("treats a missing file as empty", () => {
    dir = makeTempDir();
    expect(loadConfigFile(path.join(dir, "missing"))).toEqual({});
  });

  it("treats a document that is not a map as empty", () => {
    dir = makeTempDir();
    const file = path.join(dir, "opsctl");
    fs.writeFileSync(file, "- one\n- two\n");
    expect(loadConfigFile(file)).toEqual({});
  });
});
