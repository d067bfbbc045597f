import fs from "node:fs";
import type { PackageSpec, Recipe } from "../types/index.js";
import type { BuildContext } from "./build-context.js";
import { BuildError } from "./errors.js";
import { archivePath } from "./packages.js";

/** Runtime and build dependency names of a recipe, de-duplicated and sorted. */
export function collectDependencies(recipe: Recipe): string[] {
  return [...new Set([...recipe.depends, ...recipe.makedepends])].sort();
}

/**
 * Packages of this run that satisfy a dependency from the local repository
 * instead of the package feed, keyed by dependency name.
 */
export function localProviders(ctx: BuildContext): Map<string, PackageSpec> {
  const providers = new Map<string, PackageSpec>();
  for (const pkg of ctx.packages.packages) {
    if (pkg.kind !== "meta") providers.set(pkg.id, pkg);
  }
  return providers;
}

async function installLocalArtifacts(provider: PackageSpec, ctx: BuildContext): Promise<void> {
  const { version, release, arch, paths } = ctx.settings;
  for (const artifact of provider.artifacts) {
    const archive = archivePath(paths.repoDir, artifact, version, release, arch);
    if (!fs.existsSync(archive)) {
      ctx.ledger.log(`ERROR: ${artifact} package not found in ${paths.repoDir}`);
      throw new BuildError("MissingLocalArtifact", `${artifact} package not found in ${paths.repoDir}`);
    }
    ctx.ledger.log(`Installing ${artifact} from local repository`);
    if (!(await ctx.host.installLocal(archive))) {
      ctx.ledger.log(`ERROR: Failed to install ${artifact} from ${archive}. Check ${paths.logFile}`);
      throw new BuildError("DepInstallFailed", `Failed to install ${artifact} from ${archive}`);
    }
  }
}

/**
 * Makes every dependency of `recipe` present on the host. Stops at the first
 * failure; dependencies installed before it stay installed.
 */
export async function installDeps(recipe: Recipe, ctx: BuildContext): Promise<void> {
  const deps = collectDependencies(recipe);
  const label = recipe.pkgnames[0] ?? "recipe";
  if (deps.length === 0) {
    ctx.ledger.log(`No dependencies found for ${label}`);
    return;
  }

  ctx.ledger.log(`Installing dependencies: ${deps.join(" ")}`);
  const providers = localProviders(ctx);
  for (const dep of deps) {
    const provider = providers.get(dep);
    if (provider) {
      await installLocalArtifacts(provider, ctx);
      continue;
    }
    if (!(await ctx.host.installFromFeed(dep))) {
      ctx.ledger.log(`ERROR: Failed to install dependency ${dep} for ${label}. Check ${ctx.settings.paths.logFile}`);
      throw new BuildError("DepInstallFailed", `Failed to install dependency ${dep}`);
    }
  }
  ctx.ledger.log(`Successfully installed dependencies for ${label}`);
}
