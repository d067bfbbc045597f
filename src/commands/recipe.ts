import { Command } from "commander";
import { readConfig, resolveSettings } from "../lib/config.js";
import { recipeContext } from "../lib/build-context.js";
import { collectDependencies } from "../lib/deps.js";
import { findPackage, loadPackageSet } from "../lib/packages.js";
import { renderPkgbuild, synthesize } from "../lib/recipe.js";
import { logger } from "../lib/logger.js";
import { errorMessage } from "../lib/errors.js";

export const recipeCommand = new Command("recipe")
  .description("Print the PKGBUILD synthesized for a package")
  .argument("<package>", "Package id (e.g., xlibre-video-intel)")
  .option("--deps", "Print only the dependencies that would be installed")
  .action((id: string, options: { deps?: boolean }) => {
    try {
      const config = readConfig();
      const spec = findPackage(loadPackageSet(config.packages_file), id);
      if (!spec) {
        throw new Error(`Unknown package '${id}'. Run \`metabuild status\` to list packages.`);
      }
      const recipe = synthesize(spec, recipeContext(resolveSettings(config)));
      if (options.deps) {
        for (const dep of collectDependencies(recipe)) console.log(dep);
        return;
      }
      process.stdout.write(renderPkgbuild(recipe));
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
