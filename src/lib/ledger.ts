import fs from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";
import type { BuildPaths } from "../types/index.js";

/**
 * Sink for the activity log and the per-package outcome ledgers.
 * Components receive one explicitly; nothing reads it back during a run.
 */
export interface Ledger {
  log(message: string): void;
  recordSuccess(id: string): void;
  recordFailure(id: string): void;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

export function formatLine(date: Date, text: string): string {
  return `[${formatTimestamp(date)}] ${text}\n`;
}

export interface FileLedgerOptions {
  now?: () => Date;
  /** Mirror activity lines to the console logger (default true). */
  echo?: boolean;
}

/** Appends to the log files, creating them on the first line written. */
export class FileLedger implements Ledger {
  private readonly now: () => Date;
  private readonly echo: boolean;
  private prepared = false;

  constructor(
    private readonly paths: BuildPaths,
    options: FileLedgerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.echo = options.echo ?? true;
  }

  private append(file: string, line: string): void {
    if (!this.prepared) {
      for (const target of [this.paths.logFile, this.paths.failedLog, this.paths.succeededLog]) {
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.appendFileSync(target, "", "utf-8");
      }
      this.prepared = true;
    }
    fs.appendFileSync(file, line, "utf-8");
  }

  log(message: string): void {
    const at = this.now();
    this.append(this.paths.logFile, formatLine(at, message));
    if (this.echo) logger.activity(formatTimestamp(at), message);
  }

  recordSuccess(id: string): void {
    this.append(this.paths.succeededLog, formatLine(this.now(), id));
  }

  recordFailure(id: string): void {
    this.append(this.paths.failedLog, formatLine(this.now(), id));
  }
}
