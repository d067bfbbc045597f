// ── Package set (packages.yaml) ──

export type PackageKind = "foundational" | "driver" | "meta";

export interface PackageSpec {
  id: string;
  kind: PackageKind;
  tier: number;
  description: string;
  source?: string;
  artifacts: string[];
  depends: string[];
  makedepends: string[];
  conflicts: string[];
  provides: string[];
}

export interface PackageSet {
  packages: PackageSpec[];
}

// ── Recipe (PKGBUILD) ──

export type BuildSystem = "meson" | "autotools";

export interface SplitPackage {
  name: string;
  description: string;
  depends?: string[];
  provides?: string[];
  conflicts?: string[];
  body: string[];
}

export interface Recipe {
  pkgnames: string[];
  version: string;
  release: string;
  description: string;
  arch: string;
  url?: string;
  license: string[];
  options: string[];
  depends: string[];
  makedepends: string[];
  source: string[];
  prepare?: string[];
  build?: string[];
  packages: SplitPackage[];
}

// ── Outcomes ──

export type BuildStatus = "skipped" | "succeeded" | "failed";

export interface BuildOutcome {
  id: string;
  status: BuildStatus;
  at: Date;
  error?: Error;
}

export interface RunSummary {
  outcomes: BuildOutcome[];
  catalogued: string[];
}

// ── Config ──

export interface MetabuildConfig {
  base_dir?: string;
  version?: string;
  release?: string;
  arch?: string;
  repo_name?: string;
  packages_file?: string;
}

export interface BuildPaths {
  baseDir: string;
  repoDir: string;
  logFile: string;
  failedLog: string;
  succeededLog: string;
}

export interface BuildSettings {
  version: string;
  release: string;
  arch: string;
  repoName: string;
  paths: BuildPaths;
}
