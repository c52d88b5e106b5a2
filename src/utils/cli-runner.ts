/**
 * cli-runner.ts - Executes oc, ocm and tar as subprocesses
 *
 * How it works:
 * 1. Takes a binary and an argument array (e.g., "oc", ["get", "pods", "-n", "x"])
 * 2. Spawns the binary without a shell
 * 3. Returns the output and an isError flag derived from the exit code
 *
 * spawnSync with an args array never goes through /bin/sh, so a pod or job
 * name containing shell metacharacters reaches oc as a single argument.
 *
 * Collectors write most output straight into bundle files. runCliToFile hands
 * the child an append-mode file descriptor for both stdout and stderr, so the
 * file holds the two streams interleaved the way a terminal would show them.
 *
 * Each execution creates a CLIENT span with process.* semconv attributes and
 * cli.* attributes describing the operation.
 */

import { spawnSync, type SpawnSyncReturns } from "child_process";
import * as fs from "fs";
import * as path from "path";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/**
 * Result from executing a CLI command.
 *
 * `output` is stdout followed by stderr for runCli. For runCliToFile the
 * output went to the file, so `output` only carries spawn errors.
 */
export interface CliResult {
  output: string;
  isError: boolean;
  exitCode: number;
}

/**
 * A CLI bound to one binary. Collectors receive these instead of calling
 * runCli directly so tests can substitute scripted fakes.
 */
export interface CommandRunner {
  readonly binary: string;
  run(args: string[]): CliResult;
  runToFile(args: string[], file: string): CliResult;
}

interface CliMetadata {
  operation: string;
  resource: string;
  namespace: string | undefined;
}

/**
 * Generous enough for `oc logs --tail=-1` on a chatty component.
 */
const CLI_TIMEOUT_MS = 300_000;

/** Room for full log dumps captured in memory. */
const MAX_BUFFER_BYTES = 256 * 1024 * 1024;

/**
 * Derives span metadata from the argument list:
 * - oc get pod -n ns            → operation=get, resource=pod
 * - oc logs -n ns -l app=x      → operation=logs, resource=-n
 * - ocm describe cluster abc    → operation=describe, resource=cluster
 */
function extractCliMetadata(args: string[]): CliMetadata {
  const operation = args[0] || "unknown";
  const resource = args[1] || "unknown";

  let namespaceIndex = args.indexOf("-n");
  if (namespaceIndex === -1) {
    namespaceIndex = args.indexOf("--namespace");
  }
  const namespace =
    namespaceIndex !== -1 && args[namespaceIndex + 1]
      ? args[namespaceIndex + 1]
      : undefined;

  return { operation, resource, namespace };
}

/**
 * Spawns the binary inside a span and hands the raw result to `finish`.
 */
function traced(
  binary: string,
  args: string[],
  spawn: () => SpawnSyncReturns<string>,
  finish: (result: SpawnSyncReturns<string>) => string
): CliResult {
  const tracer = getTracer();
  const metadata = extractCliMetadata(args);
  const command = `${binary} ${args.join(" ")}`;
  const startTime = Date.now();

  return tracer.startActiveSpan(
    `${binary} ${metadata.operation} ${metadata.resource}`,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("cli.client", binary);
      span.setAttribute("cli.operation", metadata.operation);
      span.setAttribute("cli.resource", metadata.resource);
      if (metadata.namespace) {
        span.setAttribute("cli.namespace", metadata.namespace);
      }
      span.setAttribute("process.executable.name", binary);
      span.setAttribute("process.command_args", [binary, ...args]);

      try {
        const result = spawn();
        span.setAttribute("cli.duration_ms", Date.now() - startTime);

        // Spawn failures: binary missing, timeout, EACCES
        if (result.error) {
          span.setAttribute("process.exit.code", -1);
          span.setAttribute("error.type", result.error.name);
          span.recordException(result.error);
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: result.error.message,
          });
          return {
            output: `Error executing "${command}": ${result.error.message}`,
            isError: true,
            exitCode: -1,
          };
        }

        const exitCode = result.status ?? -1;
        span.setAttribute("process.exit.code", exitCode);
        const output = finish(result);

        if (exitCode !== 0) {
          span.setAttribute("error.type", "CliError");
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: result.stderr || `exit status ${exitCode}`,
          });
          return { output, isError: true, exitCode };
        }

        span.setStatus({ code: SpanStatusCode.OK });
        return { output, isError: false, exitCode };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        span.setAttribute("cli.duration_ms", Date.now() - startTime);
        span.setAttribute("process.exit.code", -1);
        span.setAttribute("error.type", err.name);
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });

        return {
          output: `Error executing "${command}": ${err.message}`,
          isError: true,
          exitCode: -1,
        };
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Runs a command and returns stdout followed by stderr.
 *
 * Example:
 *   runCli("oc", ["get", "clusterversion", "version", "-o", "jsonpath={.spec.clusterID}"])
 *   // { output: "0a1b2c...", isError: false, exitCode: 0 }
 */
export function runCli(binary: string, args: string[]): CliResult {
  return traced(
    binary,
    args,
    () =>
      spawnSync(binary, args, {
        encoding: "utf-8",
        timeout: CLI_TIMEOUT_MS,
        maxBuffer: MAX_BUFFER_BYTES,
      }),
    (result) => (result.stdout ?? "") + (result.stderr ?? "")
  );
}

/**
 * Runs a command with stdout and stderr appended to `file`.
 * The file is created (mode 0644) when it doesn't exist yet.
 */
export function runCliToFile(
  binary: string,
  args: string[],
  file: string
): CliResult {
  let fd: number;
  try {
    fd = fs.openSync(file, "a", 0o644);
  } catch (error) {
    return {
      output: `Error opening "${file}": ${error instanceof Error ? error.message : String(error)}`,
      isError: true,
      exitCode: -1,
    };
  }

  try {
    return traced(
      binary,
      args,
      () =>
        spawnSync(binary, args, {
          encoding: "utf-8",
          timeout: CLI_TIMEOUT_MS,
          stdio: ["ignore", fd, fd],
        }),
      () => ""
    );
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Binds runCli/runCliToFile to one binary.
 */
export function createCommandRunner(binary: string): CommandRunner {
  return {
    binary,
    run: (args) => runCli(binary, args),
    runToFile: (args, file) => runCliToFile(binary, args, file),
  };
}

/**
 * Reports whether `binary` resolves to an executable on PATH.
 */
export function isOnPath(
  binary: string,
  envPath: string = process.env.PATH ?? ""
): boolean {
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    try {
      fs.accessSync(path.join(dir, binary), fs.constants.X_OK);
      return true;
    } catch {
      // not in this directory
    }
  }
  return false;
}
