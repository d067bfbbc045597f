import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { createBuildContext } from "../../src/lib/build-context.js";
import { createTmpDir, scenarioPackages, testSettings } from "../helpers.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = createTmpDir();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("createBuildContext", () => {
  it("writes nothing until something is logged", () => {
    const settings = testSettings(path.join(tmpDir, "work"));
    createBuildContext(settings, scenarioPackages(), { echo: false });
    expect(fs.existsSync(settings.paths.baseDir)).toBe(false);
  });

  it("creates the log files with the first activity line", () => {
    const settings = testSettings(path.join(tmpDir, "work"));
    const ctx = createBuildContext(settings, scenarioPackages(), { echo: false });
    ctx.ledger.log("Starting build process for pkg-a");
    expect(fs.readFileSync(settings.paths.logFile, "utf-8")).toMatch(/\] Starting build process for pkg-a\n$/);
    expect(fs.existsSync(settings.paths.failedLog)).toBe(true);
  });
});
