/**
 * dynatrace.ts - DynatraceMonitoringStackDownSRE
 *
 * The Dynatrace stack is an operator, a webhook, an OTEL collector, the
 * ActiveGate StatefulSet and the OneAgent DaemonSet, all in the dynatrace
 * namespace. A fresh cluster fires this alert while installation is still
 * running, hence the cluster-creation note.
 */

import { collectComputed, collectFromCluster, collectToFile } from "../collect";
import { failingPodNames, parsePodList } from "../kube-objects";
import type { AlertDefinition, AssistContext, DigestEntry } from "../types";

const NAMESPACE = "dynatrace";
const GUIDE = "~/ops-sop/dynatrace/alerts/DynatraceMonitoringStackDownSRE.md";
const ANALYSIS_FILE = "08-llm-analysis.txt";

const ACTIVEGATE_SELECTOR = "app.kubernetes.io/component=activegate";
const ONEAGENT_SELECTOR = "app.kubernetes.io/name=oneagent";

/** Log file suffix and label selector for each component. */
const COMPONENTS: ReadonlyArray<{ name: string; selector: string }> = [
  { name: "operator", selector: "app.kubernetes.io/component=operator" },
  { name: "webhook", selector: "app.kubernetes.io/component=webhook" },
  { name: "otel", selector: "app.kubernetes.io/component=otel" },
  { name: "activegate", selector: ACTIVEGATE_SELECTOR },
  { name: "oneagent", selector: ONEAGENT_SELECTOR },
];

export const CLUSTER_CREATION_NOTE = `Note: To check cluster creation timestamp, run:
ocm get cluster $MC_CLUSTER_ID | jq .creation_timestamp

If the creation timestamp is about 15-20 mins and this alert is fired,
it may be because the installation is still going on.
`;

/**
 * A workload kind collected as wide text and yaml, where the yaml step
 * has its own wording.
 */
function collectWorkload(
  ctx: AssistContext,
  kind: { what: string; yamlWhat: string; failure: string; args: string[]; base: string }
): void {
  collectToFile(ctx, {
    what: kind.what,
    failure: kind.failure,
    args: [...kind.args, "-o", "wide"],
    file: `${kind.base}.txt`,
  });
  collectToFile(ctx, {
    what: kind.yamlWhat,
    failure: `${kind.failure} yaml`,
    args: [...kind.args, "-o", "yaml"],
    file: `${kind.base}.yaml`,
  });
}

function collectDeployments(ctx: AssistContext): void {
  collectWorkload(ctx, {
    what: `Deployments in ${NAMESPACE} namespace`,
    yamlWhat: `Deployments in ${NAMESPACE} namespace (yaml)`,
    failure: "deployments",
    args: ["get", "deploy", "-n", NAMESPACE],
    base: "01-deployments",
  });
}

function collectActiveGate(ctx: AssistContext): void {
  collectWorkload(ctx, {
    what: `StatefulSets for ActiveGate in ${NAMESPACE} namespace`,
    yamlWhat: "StatefulSets for ActiveGate (yaml)",
    failure: "ActiveGate StatefulSets",
    args: ["get", "sts", "-n", NAMESPACE, "-l", ACTIVEGATE_SELECTOR],
    base: "02-statefulsets-activegate",
  });
}

function collectOneAgent(ctx: AssistContext): void {
  collectWorkload(ctx, {
    what: `DaemonSets for OneAgent in ${NAMESPACE} namespace`,
    yamlWhat: "DaemonSets for OneAgent (yaml)",
    failure: "OneAgent DaemonSets",
    args: ["get", "ds", "-n", NAMESPACE, "-l", ONEAGENT_SELECTOR],
    base: "03-daemonsets-oneagent",
  });
}

/**
 * Pod listings, then describe output for failing pods only. Healthy pods
 * are covered by the component logs.
 */
function collectPods(ctx: AssistContext): void {
  collectWorkload(ctx, {
    what: `Pods in ${NAMESPACE} namespace`,
    yamlWhat: `Pods in ${NAMESPACE} namespace (yaml)`,
    failure: "pods",
    args: ["get", "pod", "-n", NAMESPACE],
    base: "04-pods",
  });

  const pods = parsePodList(
    ctx.deps.oc.run(["get", "pod", "-n", NAMESPACE, "-o", "json"]).output
  );
  for (const pod of failingPodNames(pods)) {
    collectToFile(ctx, {
      what: `Describe output for pod ${pod}`,
      failure: `describe for pod ${pod}`,
      args: ["describe", "pod", pod, "-n", NAMESPACE],
      file: `05-pod-describe-${pod}.txt`,
    });
  }
}

function collectEvents(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: `Events in ${NAMESPACE} namespace`,
    failure: "events",
    args: ["get", "events", "-n", NAMESPACE, "--sort-by=.lastTimestamp"],
    file: "06-events.txt",
  });
}

function collectComponentLogs(ctx: AssistContext): void {
  for (const component of COMPONENTS) {
    collectToFile(ctx, {
      what: `Logs for ${component.name} component (using oc logs)`,
      failure: `logs for ${component.name}`,
      args: ["logs", "-n", NAMESPACE, "-l", component.selector, "--tail=-1"],
      file: `07-logs-${component.name}.txt`,
    });
  }
}

function collectCreationNote(ctx: AssistContext): void {
  collectComputed(
    ctx,
    "Cluster creation timestamp (to check if installation is still in progress)",
    "cluster creation note",
    "00-cluster-creation-note.txt",
    () => CLUSTER_CREATION_NOTE
  );
}

const LOG_DIGEST: DigestEntry[] = COMPONENTS.map((component) => ({
  file: `07-logs-${component.name}.txt`,
  limit: 10000,
}));

export const dynatraceAlert: AlertDefinition = {
  command: "dynatrace-monitoring-stack-down-sre",
  alertName: "DynatraceMonitoringStackDownSRE",
  summary: "Collect diagnostic information for DynatraceMonitoringStackDownSRE alert",
  description: `Collects all diagnostic information needed to troubleshoot the DynatraceMonitoringStackDownSRE alert.

This command gathers:
  - Cluster creation timestamp hint (installation may still be in progress)
  - Deployments in the ${NAMESPACE} namespace (operator, webhook, OTEL)
  - StatefulSets for ActiveGate
  - DaemonSets for OneAgent
  - Pods with status, and describe output for failing pods
  - Logs for every Dynatrace component
  - Events in the ${NAMESPACE} namespace

With --analyze, the analysis is followed by an interactive session for
follow-up questions (skip it with --no-interactive).

Requires the OpenShift CLI (oc) on PATH and an active cluster login
('ocm backplane login').

For troubleshooting steps, refer to:
  ${GUIDE}`,
  examples: [
    "# Collect diagnostics with default output directory",
    "opsctl assist dynatrace-monitoring-stack-down-sre",
    "",
    "# Collect diagnostics and analyze with LLM",
    "opsctl assist dynatrace-monitoring-stack-down-sre --analyze",
    "",
    "# Analyze without the follow-up session (e.g. from a script)",
    "opsctl assist dynatrace-monitoring-stack-down-sre --analyze --no-interactive",
    "",
    "# Analyze an existing directory of diagnostic artifacts",
    "opsctl assist dynatrace-monitoring-stack-down-sre --analyze-existing /path/to/existing-diagnostics",
  ],
  dirPrefix: "dynatrace-monitoring-stack-down-diagnostics",
  analysisFile: ANALYSIS_FILE,
  analysisLabel: "Dynatrace monitoring stack",
  promptFile: "dynatrace-monitoring-stack-down-sre.md",
  fallbackPrompt: `You are an expert OpenShift/Kubernetes Site Reliability Engineer (SRE) specializing in Dynatrace monitoring stack. Your task is to analyze diagnostic information and assess the health of Dynatrace components (Operator, Webhook, OneAgent, ActiveGate, OTEL) on any OpenShift cluster.

Analyze the provided diagnostic data and provide:
1. Root cause analysis - What is likely causing the Dynatrace stack to be down?
2. Key findings - What are the most important issues identified?
3. Recommended actions - What steps should be taken to resolve the issues?
4. Priority - Rate the severity (Critical/High/Medium/Low/Healthy)

Be concise but thorough. Focus on actionable insights.`,
  followUp: true,
  acceptsClusterId: false,
  digest: [
    { file: "00-SUMMARY.txt" },
    { file: "01-deployments.txt" },
    { file: "02-statefulsets-activegate.txt" },
    { file: "03-daemonsets-oneagent.txt" },
    { file: "04-pods.txt" },
    { file: "06-events.txt" },
    { file: "01-deployments.yaml", limit: 15000 },
    { file: "02-statefulsets-activegate.yaml", limit: 15000 },
    { file: "03-daemonsets-oneagent.yaml", limit: 15000 },
    { file: "04-pods.yaml", limit: 15000 },
    { prefix: "05-pod-describe-", suffix: ".txt", take: 5 },
    ...LOG_DIGEST,
  ],
  collect: (ctx) =>
    collectFromCluster(ctx, {
      collectors: [
        collectDeployments,
        collectActiveGate,
        collectOneAgent,
        collectPods,
        collectEvents,
        collectComponentLogs,
        collectCreationNote,
      ],
      summary: () => ({
        title: "DynatraceMonitoringStackDownSRE Diagnostic Collection Summary",
        excerpts: [
          { label: "Deployments Status", file: "01-deployments.txt" },
          { label: "Pods Status", file: "04-pods.txt" },
          { label: "ActiveGate StatefulSet Status", file: "02-statefulsets-activegate.txt" },
          { label: "OneAgent DaemonSet Status", file: "03-daemonsets-oneagent.txt" },
        ],
      }),
    }),
  nextSteps: (options) =>
    options.analyze
      ? [
          `3. Review ${ANALYSIS_FILE} for AI-powered insights`,
          "4. Check pod logs and describe output for error details",
          `5. Refer to ${GUIDE} for troubleshooting steps`,
        ]
      : [
          "3. Check pod logs and describe output for error details",
          `4. Refer to ${GUIDE} for troubleshooting steps`,
          "5. Use --analyze flag to enable LLM analysis",
        ],
};
