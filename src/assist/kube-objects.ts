/**
 * kube-objects.ts - Field extraction from `oc get -o json` output
 *
 * Collectors decide which pods to describe and what to report by looking at
 * a few fields of pod and job lists. The zod schemas here accept only those
 * fields and tolerate everything else being absent. Output that doesn't
 * parse (an error message instead of JSON, say) yields empty results, and
 * list items without the fields are skipped.
 */

import { z } from "zod";

const MetadataSchema = z.object({ name: z.string() });

const ContainerStatusSchema = z.object({
  state: z
    .object({
      waiting: z.object({ reason: z.string().optional() }).optional(),
      terminated: z.object({ reason: z.string().optional() }).optional(),
    })
    .optional(),
});

const PodSchema = z.object({
  metadata: MetadataSchema,
  status: z
    .object({
      phase: z.string().optional(),
      containerStatuses: z.array(ContainerStatusSchema).optional(),
    })
    .optional(),
});

const JobSchema = z.object({
  metadata: MetadataSchema,
  status: z
    .object({
      failed: z.number().nullish(),
      succeeded: z.number().nullish(),
    })
    .optional(),
});

// Items are checked one by one so a single odd object doesn't hide the rest
const ListSchema = z.object({ items: z.array(z.unknown()).default([]) });

export type Pod = z.infer<typeof PodSchema>;
export type Job = z.infer<typeof JobSchema>;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseItems<T>(json: string, schema: z.ZodType<T>): T[] {
  const list = ListSchema.safeParse(parseJson(json));
  if (!list.success) {
    return [];
  }
  const items: T[] = [];
  for (const item of list.data.items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      items.push(parsed.data);
    }
  }
  return items;
}

export function parsePodList(json: string): Pod[] {
  return parseItems(json, PodSchema);
}

export function parseJobList(json: string): Job[] {
  return parseItems(json, JobSchema);
}

// ---------------------------------------------------------------------------
// Pods
// ---------------------------------------------------------------------------

/**
 * Pods whose phase is neither Succeeded nor Running. Pending, Failed,
 * Unknown and a missing phase all count.
 */
export function failingPodNames(pods: Pod[]): string[] {
  return pods
    .filter((pod) => {
      const phase = pod.status?.phase ?? "";
      return phase !== "Succeeded" && phase !== "Running";
    })
    .map((pod) => pod.metadata.name);
}

export function podNames(pods: Pod[]): string[] {
  return pods.map((pod) => pod.metadata.name);
}

/**
 * Pods with at least one container waiting or terminated for a
 * seccomp-related reason. Each pod is listed once.
 */
export function seccompPodNames(pods: Pod[]): string[] {
  return pods
    .filter((pod) =>
      (pod.status?.containerStatuses ?? []).some((container) => {
        const reason =
          (container.state?.waiting?.reason ?? "") +
          (container.state?.terminated?.reason ?? "");
        return reason.toLowerCase().includes("seccomp");
      })
    )
    .map((pod) => pod.metadata.name);
}

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

export function jobNames(jobs: Job[]): string[] {
  return jobs.map((job) => job.metadata.name);
}

/**
 * `<name>: <failed> failed, <succeeded> succeeded`, one line per job.
 */
export function jobHistoryLines(jobs: Job[]): string[] {
  return jobs.map(
    (job) =>
      `${job.metadata.name}: ${job.status?.failed ?? 0} failed, ${job.status?.succeeded ?? 0} succeeded`
  );
}

// ---------------------------------------------------------------------------
// Text output
// ---------------------------------------------------------------------------

/**
 * Lines of `output` that contain `needle`, joined with newlines, or
 * `fallback` when none do.
 */
export function filterLines(
  output: string,
  needle: string,
  fallback: string,
  options: { ignoreCase?: boolean } = {}
): string {
  const wanted = options.ignoreCase ? needle.toLowerCase() : needle;
  const matches = output.split("\n").filter((line) => {
    const haystack = options.ignoreCase ? line.toLowerCase() : line;
    return haystack.includes(wanted);
  });
  const content = matches.join("\n");
  return content === "" ? fallback : content;
}
