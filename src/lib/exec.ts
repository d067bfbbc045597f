import fs from "node:fs";
import { spawn } from "node:child_process";

export interface RunOptions {
  cwd?: string;
  /** Append the command's stdout and stderr to this file instead of discarding them. */
  logFile?: string;
}

/**
 * Runs a command to completion and resolves with its exit code. A command
 * that cannot be started resolves with 127, like a shell would.
 */
export function run(command: string, args: string[], options: RunOptions = {}): Promise<number> {
  return new Promise((resolve) => {
    const fd = options.logFile ? fs.openSync(options.logFile, "a") : undefined;
    const output = fd ?? "ignore";
    let settled = false;

    const finish = (code: number) => {
      if (settled) return;
      settled = true;
      if (fd !== undefined) fs.closeSync(fd);
      resolve(code);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", output, output],
    });

    child.on("error", (err) => {
      if (fd !== undefined && !settled) {
        fs.writeSync(fd, `${command}: ${err.message}\n`);
      }
      finish(127);
    });
    child.on("close", (code) => finish(code ?? 1));
  });
}
