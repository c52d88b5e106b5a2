/**
 * pruning-cronjob.ts - PruningCronjobErrorSRE
 *
 * The SRE pruning cronjobs (builds, deployments, images) run in
 * openshift-sre-pruning. They usually fail for reasons outside the namespace:
 * image registry RBAC, seccomp profiles on the node, an overloaded
 * node-exporter, OVN masters, quotas. Collection covers all of those.
 */

import {
  collectComputed,
  collectFromCluster,
  collectToFile,
  collectWideAndYaml,
} from "../collect";
import {
  failingPodNames,
  filterLines,
  jobHistoryLines,
  jobNames,
  parseJobList,
  parsePodList,
  podNames,
  seccompPodNames,
} from "../kube-objects";
import type { AlertDefinition, AssistContext } from "../types";

const NAMESPACE = "openshift-sre-pruning";
const MONITORING_NAMESPACE = "openshift-monitoring";
const REGISTRY_NAMESPACE = "openshift-image-registry";
const REGISTRY_OPERATOR_SELECTOR = "name=cluster-image-registry-operator";
const GUIDE = "~/ops-sop/v4/alerts/PruningCronjobErrorSRE.md";
const ANALYSIS_FILE = "18-llm-analysis.txt";

function collectJobs(ctx: AssistContext): void {
  collectWideAndYaml(
    ctx,
    `Jobs in ${NAMESPACE} namespace`,
    "jobs",
    ["get", "job", "-n", NAMESPACE],
    "01-jobs"
  );
}

/**
 * Logs and describe output for failing pods, or for every pod when none
 * are failing (a pruner that succeeded but did nothing still tells a story).
 * Also describes every job.
 */
function collectPods(ctx: AssistContext): void {
  const { oc, reporter } = ctx.deps;

  collectWideAndYaml(
    ctx,
    `Pods in ${NAMESPACE} namespace`,
    "pods",
    ["get", "pod", "-n", NAMESPACE],
    "02-pods"
  );

  const pods = parsePodList(oc.run(["get", "pod", "-n", NAMESPACE, "-o", "json"]).output);
  let selected = failingPodNames(pods);
  if (selected.length === 0) {
    reporter.progress("No failing pods found, collecting logs for all pods...");
    selected = podNames(pods);
  } else {
    reporter.progress("Found failing pods, collecting detailed information...");
  }
  reporter.info();

  for (const pod of selected) {
    collectToFile(ctx, {
      what: `Logs for pod ${pod}`,
      failure: `logs for pod ${pod}`,
      args: ["logs", pod, "-n", NAMESPACE, "--all-containers=true"],
      file: `03-pod-logs-${pod}.txt`,
    });
    collectToFile(ctx, {
      what: `Describe output for pod ${pod}`,
      failure: `describe for pod ${pod}`,
      args: ["describe", "pod", pod, "-n", NAMESPACE],
      file: `04-pod-describe-${pod}.txt`,
    });
  }

  const jobs = parseJobList(oc.run(["get", "job", "-n", NAMESPACE, "-o", "json"]).output);
  for (const job of jobNames(jobs)) {
    collectToFile(ctx, {
      what: `Describe output for job ${job}`,
      failure: `describe for job ${job}`,
      args: ["describe", "job", job, "-n", NAMESPACE],
      file: `12-job-describe-${job}.txt`,
    });
  }
}

function collectEvents(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: `Events in ${NAMESPACE} namespace`,
    failure: "events",
    args: ["get", "events", "-n", NAMESPACE, "--sort-by=.lastTimestamp"],
    file: "05-events.txt",
  });
}

function collectNetworkConfig(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: "Network type configuration",
    failure: "network config",
    args: ["get", "Network.config.openshift.io", "cluster", "-o", "json"],
    file: "06-network-config.json",
  });
}

function collectNodeExporter(ctx: AssistContext): void {
  const { oc } = ctx.deps;
  const fallback = "No node-exporter pods found";

  collectComputed(ctx, "node-exporter pod CPU usage", "node-exporter CPU", "07-node-exporter-cpu.txt", () =>
    filterLines(
      oc.run(["adm", "top", "pod", "-n", MONITORING_NAMESPACE]).output,
      "node-exporter",
      fallback
    )
  );

  collectComputed(
    ctx,
    "node-exporter pods with node information",
    "node-exporter pods",
    "07-node-exporter-pods.txt",
    () =>
      filterLines(
        oc.run(["get", "pod", "-n", MONITORING_NAMESPACE, "-o", "wide"]).output,
        "node-exporter",
        fallback
      )
  );
}

function collectImageRegistry(ctx: AssistContext): void {
  const { oc } = ctx.deps;

  collectToFile(ctx, {
    what: "Image registry pods status",
    failure: "image registry pods",
    args: ["get", "pod", "-n", REGISTRY_NAMESPACE, "-o", "wide"],
    file: "08-image-registry-pods.txt",
  });

  collectComputed(
    ctx,
    "cluster-image-registry-operator logs (forbidden errors)",
    "forbidden errors",
    "09-registry-operator-forbidden.txt",
    () =>
      filterLines(
        oc.run([
          "logs",
          "-n",
          REGISTRY_NAMESPACE,
          "-l",
          REGISTRY_OPERATOR_SELECTOR,
          "--tail=1000",
        ]).output,
        "forbidden",
        "No forbidden errors found",
        { ignoreCase: true }
      )
  );

  collectToFile(ctx, {
    what: "cluster-image-registry-operator full logs",
    failure: "registry operator logs",
    args: ["logs", "-n", REGISTRY_NAMESPACE, "-l", REGISTRY_OPERATOR_SELECTOR, "--tail=500"],
    file: "09-registry-operator-logs.txt",
  });
}

function collectResourceQuotas(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: `Resource quotas in ${MONITORING_NAMESPACE}`,
    failure: "resource quotas",
    args: ["get", "resourcequota", "-n", MONITORING_NAMESPACE],
    file: "10-resource-quotas-monitoring.txt",
  });
  collectToFile(ctx, {
    what: `Resource quotas in ${NAMESPACE}`,
    failure: "resource quotas",
    args: ["get", "resourcequota", "-n", NAMESPACE],
    file: "10-resource-quotas-pruning.txt",
  });
}

function collectOvnMasters(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: "OVN master pods status",
    failure: "OVN master pods",
    args: ["get", "pod", "-n", "openshift-ovn-kubernetes", "-l", "app=ovnkube-master", "-o", "wide"],
    file: "11-ovn-master-pods.txt",
  });
}

function collectCronJobs(ctx: AssistContext): void {
  collectWideAndYaml(
    ctx,
    `CronJobs in ${NAMESPACE} namespace`,
    "cronjobs",
    ["get", "cronjob", "-n", NAMESPACE],
    "13-cronjobs"
  );
}

function collectSeccompErrors(ctx: AssistContext): void {
  const { oc } = ctx.deps;
  collectComputed(
    ctx,
    "Checking for seccomp errors in pod descriptions",
    "seccomp errors",
    "14-seccomp-errors.txt",
    () => {
      const pods = parsePodList(oc.run(["get", "pod", "-n", NAMESPACE, "-o", "json"]).output);
      const affected = seccompPodNames(pods);
      return affected.length > 0 ? affected.join("\n") : "No seccomp errors detected";
    }
  );
}

function collectPodNodes(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: "Node information for pruning pods",
    failure: "node information",
    args: [
      "get",
      "pod",
      "-n",
      NAMESPACE,
      "-o",
      'jsonpath={range .items[*]}{.metadata.name}{"\\t"}{.spec.nodeName}{"\\n"}{end}',
    ],
    file: "15-pod-nodes.txt",
  });
}

function collectJobHistory(ctx: AssistContext): void {
  const { oc } = ctx.deps;
  collectComputed(ctx, "Recent job history", "job history", "16-job-history.txt", () =>
    jobHistoryLines(parseJobList(oc.run(["get", "job", "-n", NAMESPACE, "-o", "json"]).output)).join("\n")
  );
}

function collectClusterVersion(ctx: AssistContext): void {
  collectToFile(ctx, {
    what: "Cluster version information",
    failure: "cluster version",
    args: ["get", "clusterversion", "version", "-o", "yaml"],
    file: "17-cluster-version.yaml",
  });
}

/**
 * SDN vs OVN matters for this alert: the OVN masters are a known cause.
 */
function networkType(ctx: AssistContext): string {
  const result = ctx.deps.oc.run([
    "get",
    "Network.config.openshift.io",
    "cluster",
    "-o",
    "jsonpath={.spec.networkType}",
  ]);
  const type = result.isError ? "" : result.output.trim();
  return type === "" ? "Unable to determine" : type;
}

export const pruningCronjobAlert: AlertDefinition = {
  command: "pruning-cronjob-error-sre",
  aliases: ["pruningcronjoberrorsre"],
  alertName: "PruningCronjobErrorSRE",
  summary: "Collect diagnostic information for PruningCronjobErrorSRE alert",
  description: `Collects all diagnostic information needed to troubleshoot the PruningCronjobErrorSRE alert.

This command gathers:
  - Job and pod status in the ${NAMESPACE} namespace
  - Pod logs and describe output for failing pods
  - Events and resource quotas
  - Network configuration (SDN vs OVN)
  - node-exporter CPU usage
  - Image registry status and logs
  - OVN master pod status
  - CronJob information
  - Seccomp error detection
  - Cluster version information

Requires the OpenShift CLI (oc) on PATH and an active cluster login
('ocm backplane login').

For troubleshooting steps, refer to:
  ${GUIDE}`,
  examples: [
    "# Collect diagnostics with default output directory",
    "opsctl assist pruning-cronjob-error-sre",
    "",
    "# Collect diagnostics to a custom directory",
    "opsctl assist pruning-cronjob-error-sre --output-dir /tmp/my-diagnostics",
    "",
    "# Collect diagnostics and analyze with LLM",
    "opsctl assist pruning-cronjob-error-sre --analyze",
    "",
    "# Analyze an existing directory of diagnostic artifacts",
    "opsctl assist pruning-cronjob-error-sre --analyze-existing /path/to/existing-diagnostics",
  ],
  dirPrefix: "pruning-cronjob-diagnostics",
  analysisFile: ANALYSIS_FILE,
  analysisLabel: "pruning cronjob",
  promptFile: "pruning-cronjob-error-sre.md",
  fallbackPrompt: `You are an expert OpenShift/Kubernetes Site Reliability Engineer (SRE) specializing in cluster maintenance and resource management. Your task is to analyze diagnostic information and assess the health of pruning cronjobs in the ${NAMESPACE} namespace on any OpenShift cluster.

Analyze the provided diagnostic data and provide:
1. Root cause analysis - What is likely causing the pruning cronjob failures?
2. Key findings - What are the most important issues identified?
3. Recommended actions - What steps should be taken to resolve the issues?
4. Priority - Rate the severity (Critical/High/Medium/Low/Healthy)

Be concise but thorough. Focus on actionable insights.`,
  followUp: false,
  acceptsClusterId: false,
  digest: [
    { file: "00-SUMMARY.txt" },
    { file: "01-jobs.txt" },
    { file: "02-pods.txt" },
    { file: "14-seccomp-errors.txt" },
    { file: "16-job-history.txt" },
    { file: "05-events.txt" },
    { prefix: "03-pod-logs-", suffix: ".txt", take: 5, limit: 10000 },
    { prefix: "04-pod-describe-", suffix: ".txt", take: 5 },
  ],
  collect: (ctx) =>
    collectFromCluster(ctx, {
      collectors: [
        collectJobs,
        collectPods,
        collectEvents,
        collectNetworkConfig,
        collectNodeExporter,
        collectImageRegistry,
        collectResourceQuotas,
        collectOvnMasters,
        collectCronJobs,
        collectSeccompErrors,
        collectPodNodes,
        collectJobHistory,
        collectClusterVersion,
      ],
      summary: (summaryCtx) => ({
        title: "PruningCronjobErrorSRE Diagnostic Collection Summary",
        excerpts: [
          { label: "Jobs Status", file: "01-jobs.txt" },
          { label: "Pods Status", file: "02-pods.txt" },
        ],
        trailer: `\nNetwork Type:\n${networkType(summaryCtx)}\n\n`,
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
