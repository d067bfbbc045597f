import { Command } from "commander";
import * as p from "@clack/prompts";
import { runDoctor } from "../lib/doctor.js";
import { SystemHost } from "../lib/host.js";
import { getConfigPath, readConfig, resolveSettings } from "../lib/config.js";
import { loadPackageSet } from "../lib/packages.js";
import { logger } from "../lib/logger.js";
import { errorMessage } from "../lib/errors.js";
import { isInteractive } from "../lib/prompts.js";

export const doctorCommand = new Command("doctor")
  .description("Check the build host: required tools, sudo access, config and package set")
  .action(async () => {
    const interactive = isInteractive();
    const result = await runDoctor(new SystemHost());

    try {
      const config = readConfig();
      const packages = loadPackageSet(config.packages_file);
      const settings = resolveSettings(config);
      logger.dim(`Config: ${getConfigPath()}`);
      logger.dim(`Base directory: ${settings.paths.baseDir}`);
      logger.dim(`Package set: ${packages.packages.length} package(s), version ${settings.version}-${settings.release}`);
    } catch (err) {
      result.issues.push({ severity: "error", message: errorMessage(err) });
      result.healthy = false;
    }

    if (interactive) {
      p.intro("Build host check");
      p.log.info(`Checked ${result.toolsChecked} tool(s)`);
    } else {
      logger.blank();
      logger.bold(`Checked ${result.toolsChecked} tool(s)`);
      logger.blank();
    }

    if (result.issues.length === 0) {
      if (interactive) {
        p.outro("Everything looks good. Ready to build.");
      } else {
        logger.success("Everything looks good. Ready to build.");
        logger.blank();
      }
      return;
    }

    const errors = result.issues.filter((i) => i.severity === "error");
    const warnings = result.issues.filter((i) => i.severity === "warning");

    for (const issue of [...errors, ...warnings]) {
      if (interactive) {
        const text = issue.fix ? `${issue.message}\nFix: ${issue.fix}` : issue.message;
        if (issue.severity === "error") p.log.error(text);
        else p.log.warn(text);
      } else {
        if (issue.severity === "error") logger.error(issue.message);
        else logger.warn(issue.message);
        if (issue.fix) logger.dim(`  Fix: ${issue.fix}`);
      }
    }

    const tally = `${errors.length} error(s), ${warnings.length} warning(s)`;
    if (interactive) {
      p.outro(tally);
    } else {
      logger.blank();
      if (errors.length > 0) logger.error(tally);
      else logger.warn(tally);
      logger.blank();
    }

    if (errors.length > 0) {
      process.exit(1);
    }
  });
