import { Command } from "commander";
import { loadBuildContext } from "../lib/build-context.js";
import { isDone } from "../lib/gate.js";
import { logger } from "../lib/logger.js";
import { errorMessage } from "../lib/errors.js";
import { withSpinner } from "../lib/prompts.js";

export const statusCommand = new Command("status")
  .description("Show every package and whether it is already built and installed")
  .option("--pending", "Only list packages that still need building")
  .action(async (options: { pending?: boolean }) => {
    try {
      const ctx = loadBuildContext({ echo: false });
      const states = await withSpinner(
        "Checking packages",
        async () => {
          const built: boolean[] = [];
          for (const spec of ctx.packages.packages) built.push(await isDone(spec, ctx));
          return built;
        },
        (built) => `Checked ${built.length} package(s)`,
      );

      const rows: string[][] = [];
      let done = 0;
      ctx.packages.packages.forEach((spec, i) => {
        const built = states[i] ?? false;
        if (built) done++;
        if (options.pending && built) return;
        rows.push([spec.id, spec.kind, String(spec.tier), built ? "done" : "pending"]);
      });

      logger.blank();
      if (rows.length > 0) {
        logger.table(["Package", "Kind", "Tier", "Status"], rows);
        logger.blank();
      }
      logger.dim(`${done}/${ctx.packages.packages.length} package(s) built and installed`);
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
