import path from "node:path";
import { Command } from "commander";
import { loadBuildContext } from "../lib/build-context.js";
import { cleanBuildState, packageDir } from "../lib/builder.js";
import { findPackage } from "../lib/packages.js";
import { logger } from "../lib/logger.js";
import { errorMessage } from "../lib/errors.js";

export const cleanCommand = new Command("clean")
  .description("Remove transient build state (src/, pkg/, archives, logs) of packages")
  .argument("[packages...]", "Package ids (default: all)")
  .action((ids: string[]) => {
    try {
      const ctx = loadBuildContext({ echo: false });
      const specs = ids.length > 0
        ? ids.map((id) => {
            const spec = findPackage(ctx.packages, id);
            if (!spec) throw new Error(`Unknown package '${id}'.`);
            return spec;
          })
        : ctx.packages.packages;

      let total = 0;
      for (const spec of specs) {
        const dir = packageDir(spec, ctx);
        const removed = cleanBuildState(dir, ctx.ledger);
        total += removed.length;
        if (removed.length > 0) {
          logger.success(`Cleaned ${path.basename(dir)}: ${removed.join(", ")}`);
        }
      }
      if (total === 0) logger.dim("Nothing to clean");
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
