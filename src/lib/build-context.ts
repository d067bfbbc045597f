import type { BuildSettings, MetabuildConfig, PackageSet } from "../types/index.js";
import type { Host } from "./host.js";
import type { Ledger } from "./ledger.js";
import type { SourceFetcher } from "./git.js";
import type { RecipeContext } from "./recipe.js";
import { SystemHost } from "./host.js";
import { FileLedger } from "./ledger.js";
import { GitFetcher } from "./git.js";
import { readConfig, resolveSettings } from "./config.js";
import { loadPackageSet } from "./packages.js";

/** Everything a build step needs; passed explicitly, never global. */
export interface BuildContext {
  settings: BuildSettings;
  packages: PackageSet;
  host: Host;
  fetcher: SourceFetcher;
  ledger: Ledger;
}

export function createBuildContext(
  settings: BuildSettings,
  packages: PackageSet,
  options: { echo?: boolean } = {},
): BuildContext {
  return {
    settings,
    packages,
    host: new SystemHost(settings.paths.logFile),
    fetcher: new GitFetcher(settings.paths.logFile),
    ledger: new FileLedger(settings.paths, { echo: options.echo }),
  };
}

/** Reads the user config and package set and wires the system implementations. */
export function loadBuildContext(
  options: { echo?: boolean; config?: MetabuildConfig } = {},
): BuildContext {
  const config = options.config ?? readConfig();
  return createBuildContext(resolveSettings(config), loadPackageSet(config.packages_file), options);
}

export function recipeContext(settings: BuildSettings): RecipeContext {
  return { version: settings.version, release: settings.release, arch: settings.arch };
}
