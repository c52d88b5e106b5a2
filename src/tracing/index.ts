/**
 * tracing/index.ts - OpenTelemetry initialization for opsctl
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so a diagnostic run can be inspected after the
 * fact: every oc/ocm/tar subprocess and the LLM analysis call become spans
 * under one root span per assist command.
 *
 * Opt-in:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API hands out a no-op tracer and nothing is exported.
 *
 * Optional packages:
 * @traceloop/node-server-sdk, @opentelemetry/sdk-trace-node and
 * @opentelemetry/exporter-trace-otlp-proto are loaded through optional-deps.ts.
 * When they are absent, initialization is skipped and the no-op tracer is used.
 *
 * Exporter options (OTEL_EXPORTER_TYPE):
 * - console (default): prints spans to stdout
 * - otlp: sends spans to OTEL_EXPORTER_OTLP_ENDPOINT over HTTP/protobuf
 *
 * OpenLLMetry owns the TracerProvider. It also auto-instruments the LangChain
 * and OpenAI client calls made by the analysis pass, so those spans share the
 * trace with our subprocess spans.
 */

import {
  trace,
  SpanKind,
  SpanStatusCode,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import {
  loadTraceloop,
  loadSdkTraceNode,
  loadExporterOtlpProto,
} from "./optional-deps";

const traceloop = loadTraceloop();
const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "opsctl";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * When true, prompts and completions land in span attributes.
 * Bundles contain cluster data, so this stays off unless asked for.
 */
const isCaptureAiPayloads = process.env.OTEL_CAPTURE_AI_PAYLOADS === "true";

const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Create the span exporter named by OTEL_EXPORTER_TYPE.
 * Throws when the exporter's package is missing or the endpoint is unset.
 */
function createSpanExporter(): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.log(`[OTel] Using OTLP exporter → ${base}`); // eslint-disable-line no-console
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  console.log("[OTel] Using console exporter"); // eslint-disable-line no-console
  return new sdkTraceNode.ConsoleSpanExporter();
}

if (isTracingEnabled) {
  if (!traceloop) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @traceloop/node-server-sdk is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    console.log("[OTel] Initializing OpenTelemetry tracing..."); // eslint-disable-line no-console

    traceloop.initialize({
      appName: SERVICE_NAME,
      exporter: createSpanExporter(),
      // A CLI run is short; batching would drop spans on exit
      disableBatch: true,
      traceContent: isCaptureAiPayloads,
      silenceInitializationMessage: true,
    });

    console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`); // eslint-disable-line no-console

    process.once("SIGTERM", () => void shutdownTracing("SIGTERM"));
    process.once("SIGINT", () => void shutdownTracing("SIGINT"));
  }
}

/**
 * Get the tracer for opsctl spans.
 * Returns a no-op tracer when tracing is disabled.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Flush pending spans. Safe to call when tracing never initialized.
 */
export async function flushTracing(): Promise<void> {
  if (isTracingEnabled && traceloop) {
    await traceloop.forceFlush();
  }
}

/**
 * Signal handler: flush, then exit with the shell's 128+signal status.
 * Registering a handler replaces Node's default exit on the signal, so the
 * exit has to happen here.
 */
export async function shutdownTracing(signal: "SIGINT" | "SIGTERM"): Promise<void> {
  try {
    await flushTracing();
    console.log("[OTel] Tracing shut down gracefully"); // eslint-disable-line no-console
  } catch (error) {
    console.error("[OTel] Error shutting down tracing:", error);
  } finally {
    process.exit(signal === "SIGINT" ? 130 : 143);
  }
}

/**
 * Run `fn` inside an active span, recording its outcome.
 *
 * Exceptions are recorded on the span and rethrown. The span always ends,
 * including when `fn` rejects.
 */
export function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return getTracer().startActiveSpan(
    name,
    { kind: SpanKind.INTERNAL, attributes },
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

export { isCaptureAiPayloads };
