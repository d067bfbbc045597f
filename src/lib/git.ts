import fs from "node:fs";
import { simpleGit, type SimpleGit } from "simple-git";

export type FetchResult = "cloned" | "updated";

export interface SourceFetcher {
  /** Clones `source` into `targetDir`, or pulls when the tree already exists. */
  fetch(source: string, targetDir: string): Promise<FetchResult>;
  head(dir: string): Promise<string>;
}

export type GitOutputHandler = (
  command: string,
  stdout: NodeJS.ReadableStream,
  stderr: NodeJS.ReadableStream,
) => void;

export function cloneUrl(source: string): string {
  return source.endsWith(".git") ? source : `${source}.git`;
}

/** Appends a git command's stdout and stderr to `logFile` as it arrives. */
export function appendOutputTo(logFile: string): GitOutputHandler {
  return (_command, stdout, stderr) => {
    const write = (chunk: Buffer | string) => fs.appendFileSync(logFile, chunk);
    stdout.on("data", write);
    stderr.on("data", write);
  };
}

export class GitFetcher implements SourceFetcher {
  constructor(private readonly logFile?: string) {}

  private git(dir?: string): SimpleGit {
    const git = dir ? simpleGit(dir) : simpleGit();
    return this.logFile ? git.outputHandler(appendOutputTo(this.logFile)) : git;
  }

  async fetch(source: string, targetDir: string): Promise<FetchResult> {
    if (!fs.existsSync(targetDir)) {
      await this.git().clone(cloneUrl(source), targetDir);
      return "cloned";
    }
    await this.git(targetDir).pull();
    return "updated";
  }

  async head(dir: string): Promise<string> {
    const log = await simpleGit(dir).log({ n: 1 });
    return log.latest?.hash ?? "";
  }
}
