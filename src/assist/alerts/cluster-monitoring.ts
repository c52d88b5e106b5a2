/**
 * cluster-monitoring.ts - ClusterMonitoringErrorBudgetBurnSRE
 *
 * Fires when the monitoring cluster operator's availability probe burns its
 * error budget. The usual suspects are a degraded operator, crashlooping
 * monitoring pods, quotas, or a second Prometheus stack installed by a
 * customer competing for the same resources.
 */

import { collectFromCluster, collectToFile, collectWideAndYaml } from "../collect";
import type { AlertDefinition, AssistContext } from "../types";

const NAMESPACE = "openshift-monitoring";
const CMO_SELECTOR = "app=cluster-monitoring-operator";
const GUIDE = "~/ops-sop/v4/alerts/ClusterMonitoringErrorBudgetBurnSRE.md";
const ANALYSIS_FILE = "08-llm-analysis.txt";
const YAML_LIMIT = 15000;

function collectClusterOperator(ctx: AssistContext): void {
  // yaml first: conditions are what matter here
  collectToFile(ctx, {
    what: "Monitoring cluster operator status",
    failure: "monitoring cluster operator",
    args: ["get", "clusteroperator", "monitoring", "-o", "yaml"],
    file: "01-monitoring-clusteroperator.yaml",
  });
  collectToFile(ctx, {
    what: "Monitoring cluster operator status (wide)",
    failure: "monitoring cluster operator (wide)",
    args: ["get", "clusteroperator", "monitoring", "-o", "wide"],
    file: "01-monitoring-clusteroperator.txt",
  });
}

function collectPods(ctx: AssistContext): void {
  collectWideAndYaml(
    ctx,
    `Pods in ${NAMESPACE} namespace`,
    "monitoring pods",
    ["get", "pod", "-n", NAMESPACE],
    "02-monitoring-pods"
  );
}

function collectEvents(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: `Events in ${NAMESPACE} namespace`,
    failure: "monitoring events",
    args: ["get", "events", "-n", NAMESPACE, "--sort-by=.lastTimestamp"],
    file: "03-monitoring-events.txt",
  });
}

function collectPrometheusCrds(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: "Prometheus CRDs across all namespaces (checking for second monitoring stack)",
    failure: "Prometheus CRDs",
    args: ["get", "prometheus", "-A", "-o", "wide"],
    file: "04-prometheus-crds.txt",
  });
  collectToFile(ctx, {
    what: "Prometheus CRDs across all namespaces (yaml)",
    failure: "Prometheus CRDs yaml",
    args: ["get", "prometheus", "-A", "-o", "yaml"],
    file: "04-prometheus-crds.yaml",
  });
}

function collectOperatorLogs(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: "Cluster monitoring operator logs",
    failure: "CMO logs",
    args: ["logs", "-n", NAMESPACE, "-l", CMO_SELECTOR, "--tail=100"],
    file: "05-cmo-logs.txt",
  });
  collectToFile(ctx, {
    what: "Cluster monitoring operator logs (all containers)",
    failure: "CMO logs (all containers)",
    args: ["logs", "-n", NAMESPACE, "-l", CMO_SELECTOR, "--all-containers=true", "--tail=100"],
    file: "05-cmo-logs-all-containers.txt",
  });
}

function collectResourceQuotas(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: `Resource quotas in ${NAMESPACE}`,
    failure: "resource quotas",
    args: ["get", "resourcequota", "-n", NAMESPACE],
    file: "06-resource-quotas.txt",
  });
}

function collectClusterVersion(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: "Cluster version information",
    failure: "cluster version",
    args: ["get", "clusterversion", "version", "-o", "yaml"],
    file: "07-cluster-version.yaml",
  });
}

export const clusterMonitoringAlert: AlertDefinition = {
  command: "cluster-monitoring-error-budget-burn-sre",
  alertName: "ClusterMonitoringErrorBudgetBurnSRE",
  summary: "Collect diagnostic information for ClusterMonitoringErrorBudgetBurnSRE alert",
  description: `Collects all diagnostic information needed to troubleshoot the ClusterMonitoringErrorBudgetBurnSRE alert.

This command gathers:
  - Monitoring cluster operator status and conditions
  - Cluster monitoring operator logs
  - Prometheus CRDs across all namespaces (to detect a second monitoring stack)
  - Pods and events in the ${NAMESPACE} namespace
  - Resource quotas
  - Cluster version information

Requires the OpenShift CLI (oc) on PATH and an active cluster login
('ocm backplane login').

For troubleshooting steps, refer to:
  ${GUIDE}`,
  examples: [
    "# Collect diagnostics with default output directory",
    "opsctl assist cluster-monitoring-error-budget-burn-sre",
    "",
    "# Collect diagnostics and analyze with LLM",
    "opsctl assist cluster-monitoring-error-budget-burn-sre --analyze",
    "",
    "# Analyze an existing directory of diagnostic artifacts",
    "opsctl assist cluster-monitoring-error-budget-burn-sre --analyze-existing /path/to/existing-diagnostics",
  ],
  dirPrefix: "cluster-monitoring-error-budget-burn-diagnostics",
  analysisFile: ANALYSIS_FILE,
  analysisLabel: "ClusterMonitoringErrorBudgetBurnSRE",
  promptFile: "cluster-monitoring-error-budget-burn-sre.md",
  fallbackPrompt: `You are an expert OpenShift/Kubernetes Site Reliability Engineer (SRE) specializing in cluster monitoring and observability. Your task is to analyze diagnostic information and assess the health of the monitoring cluster operator for the ClusterMonitoringErrorBudgetBurnSRE alert.

Analyze the provided diagnostic data and provide:
1. Root cause analysis - What is likely causing the error budget burn?
2. Key findings - What are the most important issues identified?
3. Recommended actions - What steps should be taken to resolve the issues?
4. Priority - Rate the severity (Critical/High/Medium/Low/Healthy)

Be concise but thorough. Focus on actionable insights.`,
  followUp: false,
  acceptsClusterId: false,
  digest: [
    { file: "00-SUMMARY.txt" },
    { file: "01-monitoring-clusteroperator.txt" },
    { file: "02-monitoring-pods.txt" },
    { file: "03-monitoring-events.txt" },
    { file: "04-prometheus-crds.txt" },
    { file: "05-cmo-logs.txt" },
    { file: "06-resource-quotas.txt" },
    { file: "01-monitoring-clusteroperator.yaml", limit: YAML_LIMIT },
    { file: "02-monitoring-pods.yaml", limit: YAML_LIMIT },
    { file: "04-prometheus-crds.yaml", limit: YAML_LIMIT },
    { file: "07-cluster-version.yaml", limit: YAML_LIMIT },
  ],
  collect: (ctx) =>
    collectFromCluster(ctx, {
      collectors: [
        collectClusterOperator,
        collectPods,
        collectEvents,
        collectPrometheusCrds,
        collectOperatorLogs,
        collectResourceQuotas,
        collectClusterVersion,
      ],
      summary: () => ({
        title: "ClusterMonitoringErrorBudgetBurnSRE Diagnostic Collection Summary",
        excerpts: [
          { label: "Monitoring Cluster Operator Status", file: "01-monitoring-clusteroperator.txt" },
          {
            label: "Prometheus CRDs (check for second monitoring stack)",
            file: "04-prometheus-crds.txt",
          },
        ],
      }),
    }),
  nextSteps: (options) =>
    options.analyze
      ? [
          `3. Review ${ANALYSIS_FILE} for AI-powered insights`,
          "4. Check cluster operator status and logs for error details",
          `5. Refer to ${GUIDE} for troubleshooting steps`,
        ]
      : [
          "3. Check cluster operator status and logs for error details",
          `4. Refer to ${GUIDE} for troubleshooting steps`,
          "5. Use --analyze flag to enable LLM analysis",
        ],
};
