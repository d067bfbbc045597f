import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z } from "zod/v4";
import type { PackageKind, PackageSet, PackageSpec } from "../types/index.js";

const ID_REGEX = /^[a-z0-9][a-z0-9+_.-]*$/;

const TIER_BY_KIND: Record<PackageKind, number> = {
  foundational: 0,
  driver: 1,
  meta: 2,
};

const nameList = z.array(z.string().regex(ID_REGEX));

const dependencyDefaults = z.object({
  depends: nameList.default([]),
  makedepends: nameList.default([]),
});

const packageEntry = z.object({
  id: z.string().regex(ID_REGEX),
  kind: z.enum(["foundational", "driver", "meta"]),
  tier: z.number().int().min(0).optional(),
  description: z.string().optional(),
  source: z.url().optional(),
  artifacts: nameList.min(1).optional(),
  depends: nameList.optional(),
  makedepends: nameList.optional(),
  conflicts: nameList.default([]),
  provides: nameList.default([]),
});

const packagesFile = z.object({
  defaults: z
    .object({
      driver: dependencyDefaults.optional(),
    })
    .default({}),
  packages: z.array(packageEntry).min(1),
});

// Works from both src/lib and the compiled dist/src/lib.
export function defaultPackagesFile(): string {
  const fromSource = fileURLToPath(new URL("../../packages.yaml", import.meta.url));
  if (fs.existsSync(fromSource)) return fromSource;
  return fileURLToPath(new URL("../../../packages.yaml", import.meta.url));
}

function defaultDescription(id: string, kind: PackageKind): string {
  const short = id.replace(/^xlibre-/, "");
  return kind === "driver" ? `XLibre ${short} driver` : `XLibre ${short}`;
}

export function parsePackageSet(raw: string): PackageSet {
  const result = packagesFile.safeParse(parse(raw));
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid package set: ${problems}`);
  }

  const { defaults, packages: entries } = result.data;
  const driverDefaults = defaults.driver ?? { depends: [], makedepends: [] };
  const seen = new Set<string>();
  const packages: PackageSpec[] = [];

  for (const entry of entries) {
    if (seen.has(entry.id)) {
      throw new Error(`Invalid package set: duplicate package id "${entry.id}"`);
    }
    seen.add(entry.id);

    if (entry.kind !== "meta" && !entry.source) {
      throw new Error(`Invalid package set: "${entry.id}" (${entry.kind}) needs a source`);
    }
    if (entry.kind === "meta" && entry.source) {
      throw new Error(`Invalid package set: meta package "${entry.id}" cannot have a source`);
    }
    if (entry.kind !== "foundational" && entry.artifacts && entry.artifacts.join() !== entry.id) {
      throw new Error(`Invalid package set: only foundational packages may declare several artifacts ("${entry.id}")`);
    }

    const fallback = entry.kind === "driver" ? driverDefaults : { depends: [], makedepends: [] };
    packages.push({
      id: entry.id,
      kind: entry.kind,
      tier: entry.tier ?? TIER_BY_KIND[entry.kind],
      description: entry.description ?? defaultDescription(entry.id, entry.kind),
      source: entry.source,
      artifacts: entry.artifacts ?? [entry.id],
      depends: entry.depends ?? fallback.depends,
      makedepends: entry.makedepends ?? fallback.makedepends,
      conflicts: entry.conflicts,
      provides: entry.provides,
    });
  }

  const foundational = packages.filter((p) => p.kind === "foundational");
  const drivers = packages.filter((p) => p.kind === "driver");
  const metas = packages.filter((p) => p.kind === "meta");
  for (const pkg of foundational) {
    const later = packages.find((p) => p.kind !== "foundational" && p.tier <= pkg.tier);
    if (later) {
      throw new Error(`Invalid package set: "${later.id}" must be in a later tier than "${pkg.id}"`);
    }
  }
  for (const meta of metas) {
    const earlier = drivers.find((d) => d.tier >= meta.tier);
    if (earlier) {
      throw new Error(`Invalid package set: meta package "${meta.id}" must be in a later tier than "${earlier.id}"`);
    }
  }

  return { packages };
}

export function loadPackageSet(file: string = defaultPackagesFile()): PackageSet {
  if (!fs.existsSync(file)) {
    throw new Error(`Package set not found: ${file}`);
  }
  return parsePackageSet(fs.readFileSync(file, "utf-8"));
}

export function findPackage(set: PackageSet, id: string): PackageSpec | undefined {
  return set.packages.find((p) => p.id === id);
}

/**
 * Groups packages by tier, lowest first. Declaration order is kept within a
 * tier.
 */
export function groupByTier(set: PackageSet): PackageSpec[][] {
  const tiers = new Map<number, PackageSpec[]>();
  for (const pkg of set.packages) {
    const group = tiers.get(pkg.tier) ?? [];
    group.push(pkg);
    tiers.set(pkg.tier, group);
  }
  return [...tiers.entries()].sort(([a], [b]) => a - b).map(([, group]) => group);
}

/** Directory name of a cloned source: the last URL segment without `.git`. */
export function sourceDirName(source: string): string {
  const last = source.replace(/\/+$/, "").split("/").pop() ?? source;
  return last.replace(/\.git$/, "");
}

export function archiveName(artifact: string, version: string, release: string, arch: string): string {
  return `${artifact}-${version}-${release}-${arch}.pkg.tar.zst`;
}

export function archivePath(repoDir: string, artifact: string, version: string, release: string, arch: string): string {
  return path.join(repoDir, archiveName(artifact, version, release, arch));
}
