import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { parse } from "yaml";
import { z } from "zod/v4";
import type { BuildPaths, BuildSettings, MetabuildConfig } from "../types/index.js";

const CONFIG_DIR = path.join(os.homedir(), ".metabuild");
const CONFIG_PATH = path.join(CONFIG_DIR, "config");

export const DEFAULT_VERSION = "21.1.99.1";
export const DEFAULT_RELEASE = "1";
export const DEFAULT_ARCH = "x86_64";
export const DEFAULT_REPO_NAME = "xlibre-repo";

const configSchema = z
  .object({
    base_dir: z.string().min(1).optional(),
    version: z.coerce.string().regex(/^[0-9][0-9A-Za-z.+_]*$/).optional(),
    release: z.coerce.string().regex(/^[1-9][0-9]*$/).optional(),
    arch: z.string().min(1).optional(),
    repo_name: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/).optional(),
    packages_file: z.string().min(1).optional(),
  })
  .strict();

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function readConfig(configPath: string = CONFIG_PATH): MetabuildConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch {
    return {};
  }

  const data: unknown = parse(raw) ?? {};
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config at ${configPath}: ${problems}`);
  }
  return result.data;
}

export function getBaseDir(config: MetabuildConfig = readConfig()): string {
  const envDir = process.env["METABUILD_BASE_DIR"];
  if (envDir) return path.resolve(envDir);
  return path.resolve(config.base_dir ?? path.join(os.homedir(), "XLibre"));
}

export function resolvePaths(baseDir: string, repoName: string, arch: string): BuildPaths {
  return {
    baseDir,
    repoDir: path.join(baseDir, repoName, arch),
    logFile: path.join(baseDir, "build.log"),
    failedLog: path.join(baseDir, "failed-builds.log"),
    succeededLog: path.join(baseDir, "successful-builds.log"),
  };
}

export function resolveSettings(config: MetabuildConfig = readConfig()): BuildSettings {
  const arch = config.arch ?? DEFAULT_ARCH;
  const repoName = config.repo_name ?? DEFAULT_REPO_NAME;
  return {
    version: config.version ?? DEFAULT_VERSION,
    release: config.release ?? DEFAULT_RELEASE,
    arch,
    repoName,
    paths: resolvePaths(getBaseDir(config), repoName, arch),
  };
}
