import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  DEFAULT_ARCH,
  DEFAULT_RELEASE,
  DEFAULT_REPO_NAME,
  DEFAULT_VERSION,
  getBaseDir,
  readConfig,
  resolvePaths,
  resolveSettings,
} from "../../src/lib/config.js";
import { createTmpDir, writeFile } from "../helpers.js";

let tmpDir: string;
let savedBaseDir: string | undefined;

beforeEach(() => {
  tmpDir = createTmpDir();
  savedBaseDir = process.env["METABUILD_BASE_DIR"];
  delete process.env["METABUILD_BASE_DIR"];
});

afterEach(() => {
  if (savedBaseDir === undefined) {
    delete process.env["METABUILD_BASE_DIR"];
  } else {
    process.env["METABUILD_BASE_DIR"] = savedBaseDir;
  }
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ── readConfig ──

describe("readConfig", () => {
  it("returns an empty config when the file is missing", () => {
    expect(readConfig(path.join(tmpDir, "config"))).toEqual({});
  });

  it("returns an empty config for an empty file", () => {
    writeFile(tmpDir, "config", "");
    expect(readConfig(path.join(tmpDir, "config"))).toEqual({});
  });

  it("reads every key and coerces numbers to strings", () => {
    writeFile(
      tmpDir,
      "config",
      ["base_dir: /srv/xlibre", "version: 21.1.99.2", "release: 3", "arch: aarch64", "repo_name: local-x"].join("\n"),
    );
    expect(readConfig(path.join(tmpDir, "config"))).toEqual({
      base_dir: "/srv/xlibre",
      version: "21.1.99.2",
      release: "3",
      arch: "aarch64",
      repo_name: "local-x",
    });
  });

  it("rejects unknown keys", () => {
    const file = path.join(tmpDir, "config");
    writeFile(tmpDir, "config", "base-dir: /srv\n");
    expect(() => readConfig(file)).toThrow(`Invalid config at ${file}`);
  });

  it("rejects a zero release", () => {
    const file = path.join(tmpDir, "config");
    writeFile(tmpDir, "config", "release: 0\n");
    expect(() => readConfig(file)).toThrow(/release:/);
  });
});

// ── settings ──

describe("getBaseDir", () => {
  it("prefers the environment over the config", () => {
    process.env["METABUILD_BASE_DIR"] = path.join(tmpDir, "env");
    expect(getBaseDir({ base_dir: "/srv/xlibre" })).toBe(path.join(tmpDir, "env"));
  });

  it("uses the configured directory", () => {
    expect(getBaseDir({ base_dir: "/srv/xlibre" })).toBe("/srv/xlibre");
  });
});

describe("resolvePaths", () => {
  it("places the repository under name and architecture", () => {
    expect(resolvePaths("/srv/x", "repo", "x86_64")).toEqual({
      baseDir: "/srv/x",
      repoDir: "/srv/x/repo/x86_64",
      logFile: "/srv/x/build.log",
      failedLog: "/srv/x/failed-builds.log",
      succeededLog: "/srv/x/successful-builds.log",
    });
  });
});

describe("resolveSettings", () => {
  it("fills in the defaults", () => {
    const settings = resolveSettings({ base_dir: "/srv/x" });
    expect(settings).toMatchObject({
      version: DEFAULT_VERSION,
      release: DEFAULT_RELEASE,
      arch: DEFAULT_ARCH,
      repoName: DEFAULT_REPO_NAME,
    });
    expect(settings.paths.repoDir).toBe("/srv/x/xlibre-repo/x86_64");
  });
});
