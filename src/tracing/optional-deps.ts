/**
 * optional-deps.ts - Loaders for the optional OTel SDK packages
 *
 * Each loader returns the module, or null when the package isn't installed.
 * Any other load failure (syntax error, broken transitive dependency) is
 * rethrown so it shows up at startup.
 *
 * Kept in its own module so tests can vi.mock("./optional-deps"); Vitest
 * cannot intercept the raw require() call below.
 */

// Only the first line names the module that failed to resolve; the
// "Require stack" below it lists the files that asked for it.
function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.split("\n")[0].includes(`'${packageName}'`)
  );
}

export function loadOptional<T>(packageName: string): T | null {
  try {
    return require(packageName);
  } catch (error) {
    if (isModuleNotFound(error, packageName)) return null;
    throw error;
  }
}

/** OpenLLMetry: owns the TracerProvider and instruments LangChain/OpenAI calls. */
export function loadTraceloop(): typeof import("@traceloop/node-server-sdk") | null {
  return loadOptional("@traceloop/node-server-sdk");
}

/** Provides ConsoleSpanExporter. */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  return loadOptional("@opentelemetry/sdk-trace-node");
}

/** Provides OTLPTraceExporter for collectors such as Jaeger or the Datadog Agent. */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  return loadOptional("@opentelemetry/exporter-trace-otlp-proto");
}
