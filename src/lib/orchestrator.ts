import fs from "node:fs";
import type { BuildOutcome, PackageSpec, RunSummary } from "../types/index.js";
import type { BuildContext } from "./build-context.js";
import { buildPackage } from "./builder.js";
import { runDoctor } from "./doctor.js";
import { BuildError } from "./errors.js";
import { isDone } from "./gate.js";
import { groupByTier } from "./packages.js";

export interface RunBuildOptions {
  /** Override for the preflight's uid check; tests run as any user. */
  uid?: number;
  onStart?: (spec: PackageSpec) => void;
  onOutcome?: (outcome: BuildOutcome) => void;
}

export async function preflight(ctx: BuildContext, uid?: number): Promise<void> {
  ctx.ledger.log("Checking for required tools and sudo access");
  const result = await runDoctor(ctx.host, { uid });
  for (const issue of result.issues) {
    ctx.ledger.log(`${issue.severity === "error" ? "ERROR" : "WARNING"}: ${issue.message}`);
    if (issue.fix) ctx.ledger.log(issue.fix);
  }

  const first = result.issues.find((i) => i.severity === "error");
  if (first) {
    throw new BuildError(first.code ?? "ToolMissing", first.message);
  }
}

async function syncDatabase(ctx: BuildContext): Promise<void> {
  ctx.ledger.log("Updating pacman package database");
  if (!(await ctx.host.syncDatabase())) {
    ctx.ledger.log(`ERROR: Failed to update pacman database. Check ${ctx.settings.paths.logFile}`);
    throw new BuildError("DatabaseSyncFailed", "Failed to update pacman database");
  }
}

export async function processPackage(spec: PackageSpec, ctx: BuildContext): Promise<BuildOutcome> {
  ctx.ledger.log(`Checking if ${spec.id} is already built and installed`);
  if (await isDone(spec, ctx)) {
    ctx.ledger.log(`Skipping ${spec.id}, already built and installed`);
    return { id: spec.id, status: "skipped", at: new Date() };
  }
  return buildPackage(spec, ctx);
}

export function listArchives(repoDir: string): string[] {
  if (!fs.existsSync(repoDir)) return [];
  return fs
    .readdirSync(repoDir)
    .filter((name) => name.endsWith(".pkg.tar.zst"))
    .sort();
}

/** Indexes every archive in the repository directory with repo-add. */
export async function catalog(ctx: BuildContext): Promise<string[]> {
  const { repoDir, logFile } = ctx.settings.paths;
  const database = `${ctx.settings.repoName}.db.tar.gz`;
  ctx.ledger.log(`Creating repository database in ${repoDir}`);

  const archives = listArchives(repoDir);
  if (archives.length === 0) {
    ctx.ledger.log(`ERROR: No package archives to catalog in ${repoDir}`);
    throw new BuildError("CatalogFailed", `No package archives in ${repoDir}`);
  }
  if (!(await ctx.host.indexRepository(repoDir, database, archives))) {
    ctx.ledger.log(`ERROR: Failed to create repository database. Check ${logFile}`);
    throw new BuildError("CatalogFailed", "Failed to create repository database");
  }

  ctx.ledger.log("Successfully created repository database");
  return archives;
}

/**
 * Full run: preflight, database sync, every tier in order, then the catalog.
 * Foundational failures and the fatal error codes throw; any other package
 * failure is recorded and the run continues.
 */
export async function runBuild(ctx: BuildContext, options: RunBuildOptions = {}): Promise<RunSummary> {
  await preflight(ctx, options.uid);
  await syncDatabase(ctx);
  fs.mkdirSync(ctx.settings.paths.repoDir, { recursive: true });

  const outcomes: BuildOutcome[] = [];
  for (const tier of groupByTier(ctx.packages)) {
    for (const spec of tier) {
      options.onStart?.(spec);
      const outcome = await processPackage(spec, ctx);
      outcomes.push(outcome);
      options.onOutcome?.(outcome);

      if (outcome.status === "failed" && spec.kind === "foundational") {
        const cause = outcome.error;
        const code = cause instanceof BuildError ? cause.code : "NativeBuildFailed";
        throw new BuildError(code, `${spec.id} failed and every other package depends on it`, spec.id);
      }
    }
  }

  const catalogued = await catalog(ctx);
  const { repoDir } = ctx.settings.paths;
  ctx.ledger.log(`Build and installation process complete! Repository created at ${repoDir}`);
  ctx.ledger.log("To use the repository outside the chroot, add to /etc/pacman.conf:");
  ctx.ledger.log(`[${ctx.settings.repoName}]`);
  ctx.ledger.log(`Server = file://${repoDir}`);
  const meta = ctx.packages.packages.find((p) => p.kind === "meta");
  if (meta) ctx.ledger.log(`Then run: sudo pacman -Syu ${meta.id}`);

  return { outcomes, catalogued };
}
