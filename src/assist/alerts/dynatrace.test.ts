/**
 * dynatrace.test.ts - Collection for DynatraceMonitoringStackDownSRE
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { CLUSTER_CREATION_NOTE, dynatraceAlert } from "./dynatrace";
import {
  createFakeRunner,
  makeDeps,
  makeOptions,
  makeTempDir,
  removeDir,
  type TestDeps,
} from "../../testing/fakes";

const pods = JSON.stringify({
  items: [
    { metadata: { name: "dynatrace-operator-abc" }, status: { phase: "Running" } },
    { metadata: { name: "activegate-0" }, status: { phase: "Pending" } },
  ],
});

describe("dynatraceAlert.collect", () => {
  let dir: string;
  let deps: TestDeps;

  beforeEach(() => {
    dir = makeTempDir();
    deps = makeDeps({
      oc: createFakeRunner("oc", { "get pod -n dynatrace -o json": { output: pods } }),
    });
    dynatraceAlert.collect({ options: makeOptions({ outputDir: dir }), deps });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("describes failing pods only", () => {
    expect(fs.existsSync(path.join(dir, "05-pod-describe-activegate-0.txt"))).toBe(true);
    expect(fs.existsSync(path.join(dir, "05-pod-describe-dynatrace-operator-abc.txt"))).toBe(false);
  });

  it("collects full logs for each component by label", () => {
    const logCalls = deps.oc.calls.filter((args) => args[0] === "logs");
    expect(logCalls).toEqual([
      ["logs", "-n", "dynatrace", "-l", "app.kubernetes.io/component=operator", "--tail=-1"],
      ["logs", "-n", "dynatrace", "-l", "app.kubernetes.io/component=webhook", "--tail=-1"],
      ["logs", "-n", "dynatrace", "-l", "app.kubernetes.io/component=otel", "--tail=-1"],
      ["logs", "-n", "dynatrace", "-l", "app.kubernetes.io/component=activegate", "--tail=-1"],
      ["logs", "-n", "dynatrace", "-l", "app.kubernetes.io/name=oneagent", "--tail=-1"],
    ]);
  });

  it("writes the cluster creation note", () => {
    expect(fs.readFileSync(path.join(dir, "00-cluster-creation-note.txt"), "utf8")).toBe(
      CLUSTER_CREATION_NOTE
    );
  });

  it("uses its own wording for the ActiveGate yaml step", () => {
    expect(deps.reporter.lines).toContain("Collecting: StatefulSets for ActiveGate (yaml)");
  });
});

describe("dynatraceAlert", () => {
  it("offers follow-up questions", () => {
    expect(dynatraceAlert.followUp).toBe(true);
  });

  it("feeds component logs into the analysis after the pod descriptions", () => {
    const tail = dynatraceAlert.digest.slice(-6);
    expect(tail[0]).toEqual({ prefix: "05-pod-describe-", suffix: ".txt", take: 5 });
    expect(tail.slice(1)).toEqual([
      { file: "07-logs-operator.txt", limit: 10000 },
      { file: "07-logs-webhook.txt", limit: 10000 },
      { file: "07-logs-otel.txt", limit: 10000 },
      { file: "07-logs-activegate.txt", limit: 10000 },
      { file: "07-logs-oneagent.txt", limit: 10000 },
    ]);
  });
});
