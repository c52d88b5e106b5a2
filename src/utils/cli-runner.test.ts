/**
 * cli-runner.test.ts - Unit tests for subprocess execution
 *
 * child_process is mocked; no command actually runs.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { makeTempDir, removeDir } from "../testing/fakes";

const { spawnSyncMock } = vi.hoisted(() => ({ spawnSyncMock: vi.fn() }));

vi.mock("child_process", () => ({ spawnSync: spawnSyncMock }));

import { createCommandRunner, isOnPath, runCli, runCliToFile } from "./cli-runner";

beforeEach(() => {
  spawnSyncMock.mockReset();
});

describe("runCli", () => {
  it("returns stdout followed by stderr", () => {
    spawnSyncMock.mockReturnValue({ status: 0, stdout: "out\n", stderr: "warn\n" });

    expect(runCli("oc", ["get", "pod", "-n", "ns"])).toEqual({
      output: "out\nwarn\n",
      isError: false,
      exitCode: 0,
    });
    expect(spawnSyncMock).toHaveBeenCalledWith(
      "oc",
      ["get", "pod", "-n", "ns"],
      expect.objectContaining({ encoding: "utf-8" })
    );
  });

  it("flags a non-zero exit", () => {
    spawnSyncMock.mockReturnValue({ status: 1, stdout: "", stderr: "error: Unauthorized\n" });

    expect(runCli("oc", ["cluster-info"])).toEqual({
      output: "error: Unauthorized\n",
      isError: true,
      exitCode: 1,
    });
  });

  it("reports a spawn failure", () => {
    spawnSyncMock.mockReturnValue({
      status: null,
      stdout: "",
      stderr: "",
      error: new Error("spawnSync ocm ENOENT"),
    });

    expect(runCli("ocm", ["describe", "cluster", "abc"])).toEqual({
      output: 'Error executing "ocm describe cluster abc": spawnSync ocm ENOENT',
      isError: true,
      exitCode: -1,
    });
  });
});

describe("runCliToFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("hands the child one descriptor for stdout and stderr", () => {
    spawnSyncMock.mockReturnValue({ status: 0, stdout: null, stderr: null });
    const file = path.join(dir, "05-events.txt");

    const result = runCliToFile("oc", ["get", "events"], file);

    expect(result).toEqual({ output: "", isError: false, exitCode: 0 });
    expect(fs.existsSync(file)).toBe(true);
    const stdio = spawnSyncMock.mock.calls[0][2].stdio;
    expect(stdio[0]).toBe("ignore");
    expect(typeof stdio[1]).toBe("number");
    expect(stdio[2]).toBe(stdio[1]);
  });

  it("reports a file it cannot open without spawning", () => {
    const result = runCliToFile("oc", ["get", "events"], path.join(dir, "missing", "out.txt"));

    expect(result.isError).toBe(true);
    expect(result.exitCode).toBe(-1);
    expect(result.output).toMatch(/^Error opening ".*out\.txt": ENOENT/);
    expect(spawnSyncMock).not.toHaveBeenCalled();
  });
});

describe("createCommandRunner", () => {
  it("binds the binary", () => {
    spawnSyncMock.mockReturnValue({ status: 0, stdout: "ok", stderr: "" });
    const tar = createCommandRunner("tar");

    expect(tar.binary).toBe("tar");
    expect(tar.run(["-czf", "b.tar.gz", "b"]).output).toBe("ok");
    expect(spawnSyncMock.mock.calls[0][0]).toBe("tar");
  });
});

describe("isOnPath", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("finds an executable in one of the PATH entries", () => {
    fs.writeFileSync(path.join(dir, "oc"), "#!/bin/sh\n", { mode: 0o755 });
    expect(isOnPath("oc", ["", path.join(dir, "nope"), dir].join(path.delimiter))).toBe(true);
  });

  it("ignores files that aren't executable", () => {
    fs.writeFileSync(path.join(dir, "oc"), "", { mode: 0o644 });
    expect(isOnPath("oc", dir)).toBe(false);
  });

  it("is false for an empty PATH", () => {
    expect(isOnPath("oc", "")).toBe(false);
  });
});
