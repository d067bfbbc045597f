import { run } from "./exec.js";

/**
 * The build host's external tools. Every method blocks until the tool exits
 * and reports success as a boolean; tool output goes to the activity log.
 */
export interface Host {
  hasCommand(tool: string): Promise<boolean>;
  canElevate(): Promise<boolean>;
  isInstalled(pkg: string): Promise<boolean>;
  syncDatabase(): Promise<boolean>;
  installFromFeed(pkg: string): Promise<boolean>;
  installLocal(archive: string): Promise<boolean>;
  remove(pkgs: string[]): Promise<boolean>;
  makePackage(dir: string): Promise<boolean>;
  indexRepository(repoDir: string, database: string, archives: string[]): Promise<boolean>;
}

export class SystemHost implements Host {
  constructor(private readonly logFile?: string) {}

  private async ok(command: string, args: string[], cwd?: string): Promise<boolean> {
    return (await run(command, args, { cwd, logFile: this.logFile })) === 0;
  }

  private async quiet(command: string, args: string[]): Promise<boolean> {
    return (await run(command, args)) === 0;
  }

  hasCommand(tool: string): Promise<boolean> {
    return this.quiet("sh", ["-c", 'command -v "$1"', "sh", tool]);
  }

  canElevate(): Promise<boolean> {
    return this.quiet("sudo", ["-n", "true"]);
  }

  isInstalled(pkg: string): Promise<boolean> {
    return this.quiet("pacman", ["-Q", pkg]);
  }

  syncDatabase(): Promise<boolean> {
    return this.ok("sudo", ["pacman", "-Syu", "--noconfirm"]);
  }

  installFromFeed(pkg: string): Promise<boolean> {
    return this.ok("sudo", ["pacman", "-S", "--needed", "--noconfirm", pkg]);
  }

  installLocal(archive: string): Promise<boolean> {
    return this.ok("sudo", ["pacman", "-U", "--noconfirm", archive]);
  }

  remove(pkgs: string[]): Promise<boolean> {
    return this.ok("sudo", ["pacman", "-Rdd", "--noconfirm", ...pkgs]);
  }

  makePackage(dir: string): Promise<boolean> {
    return this.ok("makepkg", ["-si", "--noconfirm"], dir);
  }

  indexRepository(repoDir: string, database: string, archives: string[]): Promise<boolean> {
    return this.ok("repo-add", [database, ...archives], repoDir);
  }
}
