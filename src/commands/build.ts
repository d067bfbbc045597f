import { Command } from "commander";
import * as p from "@clack/prompts";
import type { BuildOutcome } from "../types/index.js";
import { loadBuildContext } from "../lib/build-context.js";
import { runBuild } from "../lib/orchestrator.js";
import { logger } from "../lib/logger.js";
import { errorMessage, isBuildError } from "../lib/errors.js";
import { isInteractive } from "../lib/prompts.js";

function summarize(outcomes: BuildOutcome[]): Record<BuildOutcome["status"], number> {
  const counts = { skipped: 0, succeeded: 0, failed: 0 };
  for (const outcome of outcomes) counts[outcome.status]++;
  return counts;
}

export const buildCommand = new Command("build")
  .description("Build, install and catalog every package in dependency order")
  .action(async () => {
    const interactive = isInteractive();
    const spinner = interactive ? p.spinner() : undefined;
    let spinning = false;

    try {
      const ctx = loadBuildContext({ echo: !interactive });
      const { paths } = ctx.settings;

      if (interactive) {
        p.intro(`Building ${ctx.packages.packages.length} packages into ${paths.repoDir}`);
        p.log.info(`Full log: ${paths.logFile}`);
      }

      const summary = await runBuild(ctx, {
        onStart(spec) {
          if (!spinner) return;
          spinner.start(`${spec.id}`);
          spinning = true;
        },
        onOutcome(outcome) {
          if (!spinner) return;
          spinning = false;
          if (outcome.status === "failed") {
            spinner.stop(`${outcome.id} failed: ${outcome.error?.message ?? "unknown error"}`, 2);
          } else {
            spinner.stop(`${outcome.id} ${outcome.status}`);
          }
        },
      });

      const counts = summarize(summary.outcomes);
      const failed = summary.outcomes.filter((o) => o.status === "failed");
      const line = `${counts.succeeded} built, ${counts.skipped} skipped, ${counts.failed} failed; ${summary.catalogued.length} archive(s) catalogued`;

      if (interactive) {
        if (failed.length > 0) {
          p.log.warn(`Failed: ${failed.map((o) => o.id).join(", ")}. See ${paths.failedLog}`);
        }
        p.outro(line);
      } else {
        logger.blank();
        if (failed.length > 0) {
          logger.table(
            ["Package", "Error"],
            failed.map((o) => [o.id, o.error?.message ?? ""]),
          );
          logger.blank();
        }
        logger.bold(line);
      }
    } catch (err) {
      if (spinner && spinning) spinner.stop("Aborted", 2);
      logger.error(errorMessage(err));
      if (isBuildError(err)) {
        logger.dim(`  ${err.code}${err.fatal ? "" : ` in ${err.packageId ?? "a foundational package"}`}; see the activity log for details`);
      }
      process.exit(1);
    }
  });
