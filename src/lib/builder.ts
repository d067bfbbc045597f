import fs from "node:fs";
import path from "node:path";
import type { BuildOutcome, PackageSpec } from "../types/index.js";
import type { BuildContext } from "./build-context.js";
import { recipeContext } from "./build-context.js";
import { installDeps } from "./deps.js";
import { BuildError, errorMessage } from "./errors.js";
import { archiveName, sourceDirName } from "./packages.js";
import { detectBuildSystem, RECIPE_FILE, renderPkgbuild, synthesize } from "./recipe.js";
import type { Ledger } from "./ledger.js";

const ARCHIVE_SUFFIX = ".pkg.tar.zst";

export function packageDir(spec: PackageSpec, ctx: BuildContext): string {
  return path.join(ctx.settings.paths.baseDir, spec.id);
}

export function sourceDir(spec: PackageSpec, ctx: BuildContext): string | undefined {
  return spec.source ? path.join(ctx.settings.paths.baseDir, sourceDirName(spec.source)) : undefined;
}

/**
 * Removes makepkg's transient state (`src/`, `pkg/`, archives and logs) so
 * the next run starts clean. The PKGBUILD stays.
 */
export function cleanBuildState(pkgdir: string, ledger?: Ledger): string[] {
  if (!fs.existsSync(pkgdir)) return [];
  ledger?.log(`Cleaning failed build artifacts in ${pkgdir}`);

  const removed: string[] = [];
  for (const entry of fs.readdirSync(pkgdir, { withFileTypes: true })) {
    const transient =
      (entry.isDirectory() && (entry.name === "src" || entry.name === "pkg")) ||
      (!entry.isDirectory() && (/\.tar\./.test(entry.name) || entry.name.endsWith(".log")));
    if (transient) {
      fs.rmSync(path.join(pkgdir, entry.name), { recursive: true, force: true });
      removed.push(entry.name);
    }
  }

  ledger?.log(`Cleanup complete for ${pkgdir}`);
  return removed;
}

async function removeConflicts(spec: PackageSpec, ctx: BuildContext): Promise<void> {
  if (spec.conflicts.length === 0) return;
  const names = spec.conflicts.join(" and ");
  ctx.ledger.log(`Removing ${names} to avoid conflicts`);
  if (!(await ctx.host.remove(spec.conflicts))) {
    ctx.ledger.log(`Note: ${names} not installed, proceeding`);
  }
}

async function acquireSource(spec: PackageSpec, ctx: BuildContext): Promise<void> {
  const dir = sourceDir(spec, ctx);
  if (!spec.source || !dir) return;

  if (fs.existsSync(dir)) {
    ctx.ledger.log(`Repository ${path.basename(dir)} already exists, updating`);
  } else {
    ctx.ledger.log(`Cloning repository ${spec.source}`);
  }

  try {
    const result = await ctx.fetcher.fetch(spec.source, dir);
    const head = await ctx.fetcher.head(dir);
    ctx.ledger.log(
      `Successfully ${result} ${spec.source} at ${head.slice(0, 12) || "unknown revision"} (${detectBuildSystem(dir)})`,
    );
  } catch (err) {
    ctx.ledger.log(`ERROR: Failed to fetch ${spec.source}: ${errorMessage(err)}`);
    throw new BuildError("SourceFetchFailed", `Failed to fetch ${spec.source}`, spec.id);
  }
}

function writeRecipe(spec: PackageSpec, ctx: BuildContext, pkgdir: string) {
  const recipe = synthesize(spec, recipeContext(ctx.settings));
  fs.mkdirSync(pkgdir, { recursive: true });
  ctx.ledger.log(`Creating ${RECIPE_FILE} for ${spec.id} in ${pkgdir}`);
  fs.writeFileSync(path.join(pkgdir, RECIPE_FILE), renderPkgbuild(recipe), "utf-8");
  return recipe;
}

async function makePackage(spec: PackageSpec, ctx: BuildContext, pkgdir: string): Promise<void> {
  ctx.ledger.log(`Building and installing ${spec.id} package`);
  if (!(await ctx.host.makePackage(pkgdir))) {
    ctx.ledger.log(`ERROR: Failed to build or install ${spec.id}. Check ${ctx.settings.paths.logFile}`);
    throw new BuildError("NativeBuildFailed", `makepkg failed for ${spec.id}`, spec.id);
  }
}

function relocateArchives(spec: PackageSpec, ctx: BuildContext, pkgdir: string): string[] {
  const { version, release, arch, paths } = ctx.settings;
  const produced = fs.readdirSync(pkgdir).filter((name) => name.endsWith(ARCHIVE_SUFFIX));
  const missing = spec.artifacts
    .map((artifact) => archiveName(artifact, version, release, arch))
    .filter((name) => !produced.includes(name));

  if (missing.length > 0) {
    ctx.ledger.log(`ERROR: No package files found for ${spec.id}: missing ${missing.join(", ")}`);
    throw new BuildError("ArtifactMissingAfterBuild", `Missing archives after build: ${missing.join(", ")}`, spec.id);
  }

  ctx.ledger.log(`Moving ${spec.id} packages to ${paths.repoDir}`);
  fs.mkdirSync(paths.repoDir, { recursive: true });
  for (const name of produced) {
    fs.renameSync(path.join(pkgdir, name), path.join(paths.repoDir, name));
  }
  ctx.ledger.log(`Successfully moved ${spec.id} packages`);
  return produced;
}

/**
 * Fetches, synthesizes, builds and installs one package, then moves its
 * archives into the repository. Never throws: every failure cleans the
 * package directory and becomes a `failed` outcome with exactly one
 * failure-ledger line.
 */
export async function buildPackage(spec: PackageSpec, ctx: BuildContext): Promise<BuildOutcome> {
  const pkgdir = packageDir(spec, ctx);
  ctx.ledger.log(`Starting build process for ${spec.id}`);

  try {
    if (spec.kind === "foundational") await removeConflicts(spec, ctx);
    await acquireSource(spec, ctx);
    const recipe = writeRecipe(spec, ctx, pkgdir);
    if (spec.kind !== "meta") {
      try {
        await installDeps(recipe, ctx);
      } catch (err) {
        ctx.ledger.log(`ERROR: Failed to install dependencies for ${spec.id}`);
        throw err;
      }
    }
    await makePackage(spec, ctx, pkgdir);
    relocateArchives(spec, ctx, pkgdir);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    if (!(err instanceof BuildError)) {
      ctx.ledger.log(`ERROR: ${spec.id}: ${error.message}`);
    }
    cleanBuildState(pkgdir, ctx.ledger);
    ctx.ledger.recordFailure(spec.id);
    return { id: spec.id, status: "failed", at: new Date(), error };
  }

  ctx.ledger.log(`Successfully built and installed ${spec.id} package`);
  ctx.ledger.recordSuccess(spec.id);
  return { id: spec.id, status: "succeeded", at: new Date() };
}
