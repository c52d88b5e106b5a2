/**
 * optional-deps.test.ts - Unit tests for loading optional packages
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { makeTempDir, removeDir } from "../testing/fakes";
import { loadOptional } from "./optional-deps";

describe("loadOptional", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("returns the module when it resolves", () => {
    const file = path.join(dir, "present.js");
    fs.writeFileSync(file, "module.exports = { name: 'present' };\n");

    expect(loadOptional<{ name: string }>(file)).toEqual({ name: "present" });
  });

  it("returns null when the package is not installed", () => {
    expect(loadOptional("opsctl-package-that-is-not-installed")).toBeNull();
  });

  it("rethrows when an installed package is missing one of its own dependencies", () => {
    const file = path.join(dir, "broken.js");
    fs.writeFileSync(file, "require('opsctl-inner-dependency-that-is-missing');\n");

    expect(() => loadOptional(file)).toThrow(/opsctl-inner-dependency-that-is-missing/);
  });

  it("rethrows errors raised while the package loads", () => {
    const file = path.join(dir, "throws.js");
    fs.writeFileSync(file, "throw new Error('bad build');\n");

    expect(() => loadOptional(file)).toThrow("bad build");
  });
});
