/**
 * fakes.ts - In-process stand-ins for the things assist commands touch
 *
 * Shared by the *.test.ts files. Runners answer from a table keyed by the
 * joined argument list, so a test states exactly which commands succeed and
 * what they print; anything else gets the fallback.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Readable } from "stream";
import type { AssistDeps, AssistOptions, ChatModel } from "../assist/types";
import type { CliResult, CommandRunner } from "../utils/cli-runner";
import type { Reporter } from "../utils/reporter";

export interface FakeResponse {
  output?: string;
  isError?: boolean;
  exitCode?: number;
}

export interface FakeRunner extends CommandRunner {
  /** Every argument list the runner was called with, in order. */
  calls: string[][];
}

function toResult(response: FakeResponse): CliResult {
  const isError = response.isError ?? false;
  return {
    output: response.output ?? "",
    isError,
    exitCode: response.exitCode ?? (isError ? 1 : 0),
  };
}

/**
 * A runner that answers `args.join(" ")` from `responses`. runToFile appends
 * the scripted output to the file, the way a real child would.
 */
export function createFakeRunner(
  binary: string,
  responses: Record<string, FakeResponse> = {},
  fallback: FakeResponse = {}
): FakeRunner {
  const calls: string[][] = [];
  const respond = (args: string[]): CliResult => {
    calls.push(args);
    return toResult(responses[args.join(" ")] ?? fallback);
  };

  return {
    binary,
    calls,
    run: (args) => respond(args),
    runToFile: (args, file) => {
      const result = respond(args);
      fs.appendFileSync(file, result.output);
      return { ...result, output: "" };
    },
  };
}

export interface RecordingReporter extends Reporter {
  /** Printed lines without colour; prompts included. */
  lines: string[];
}

export function createRecordingReporter(): RecordingReporter {
  const lines: string[] = [];
  return {
    lines,
    info: (message = "") => lines.push(message),
    progress: (message) => lines.push(message),
    success: (message) => lines.push(message),
    failure: (message) => lines.push(message),
    prompt: (message) => lines.push(message),
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "opsctl-test-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** A model that fails if a test reaches it without providing one. */
const unusedModel: ChatModel = {
  invoke: () => Promise.reject(new Error("unexpected model call")),
};

export interface TestDeps extends AssistDeps {
  oc: FakeRunner;
  ocm: FakeRunner;
  tar: FakeRunner;
  reporter: RecordingReporter;
}

/**
 * Deps with empty fakes everywhere: oc/ocm/tar succeed with no output, oc is
 * on PATH, the clock is fixed and there is no config or environment.
 */
export function makeDeps(overrides: Partial<TestDeps> = {}): TestDeps {
  return {
    oc: createFakeRunner("oc"),
    ocm: createFakeRunner("ocm"),
    tar: createFakeRunner("tar"),
    reporter: createRecordingReporter(),
    isOnPath: () => true,
    now: () => new Date(2025, 2, 4, 9, 5, 0),
    env: {},
    loadConfig: () => ({}),
    createModel: () => unusedModel,
    input: Readable.from([]),
    ...overrides,
  };
}

export function makeOptions(overrides: Partial<AssistOptions> = {}): AssistOptions {
  return {
    outputDir: "",
    analyze: false,
    skipCollection: false,
    interactive: true,
    ...overrides,
  };
}

/** Input that yields one line per entry. */
export function linesInput(lines: string[]): NodeJS.ReadableStream {
  return Readable.from(lines.map((line) => `${line}\n`));
}
