import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BuildSettings, PackageSet, PackageSpec } from "../src/types/index.js";
import type { BuildContext } from "../src/lib/build-context.js";
import type { Host } from "../src/lib/host.js";
import type { Ledger } from "../src/lib/ledger.js";
import type { FetchResult, SourceFetcher } from "../src/lib/git.js";
import { resolvePaths } from "../src/lib/config.js";
import { archiveName, archivePath } from "../src/lib/packages.js";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "metabuild-test-"));
}

export function writeFile(dir: string, relativePath: string, content: string): void {
  const fullPath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content, "utf-8");
}

export function makeSpec(overrides: Partial<PackageSpec> & Pick<PackageSpec, "id" | "kind">): PackageSpec {
  const tier = overrides.kind === "foundational" ? 0 : overrides.kind === "driver" ? 1 : 2;
  return {
    tier,
    description: `Test ${overrides.id}`,
    source: overrides.kind === "meta" ? undefined : `https://example.com/src/upstream-${overrides.id}`,
    artifacts: [overrides.id],
    depends: [],
    makedepends: [],
    conflicts: [],
    provides: [],
    ...overrides,
  };
}

/** A (foundational, two artifacts), B (driver on A), C (meta on A and B). */
export function scenarioPackages(): PackageSet {
  return {
    packages: [
      makeSpec({ id: "pkg-a", kind: "foundational", artifacts: ["pkg-a", "pkg-a-common"] }),
      makeSpec({ id: "pkg-b", kind: "driver", depends: ["pkg-a"], makedepends: ["make-tool"] }),
      makeSpec({ id: "pkg-c", kind: "meta", depends: ["pkg-a", "pkg-b"] }),
    ],
  };
}

export function testSettings(baseDir: string): BuildSettings {
  return {
    version: "1.0.0",
    release: "1",
    arch: "x86_64",
    repoName: "test-repo",
    paths: resolvePaths(baseDir, "test-repo", "x86_64"),
  };
}

export class MemoryLedger implements Ledger {
  lines: string[] = [];
  succeeded: string[] = [];
  failed: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  recordSuccess(id: string): void {
    this.succeeded.push(id);
  }

  recordFailure(id: string): void {
    this.failed.push(id);
  }

  indexOf(message: string): number {
    return this.lines.indexOf(message);
  }
}

export type FakeBuildMode = "ok" | "fail" | "no-archive";

/**
 * In-memory stand-in for pacman, makepkg and repo-add. makepkg writes the
 * expected archives into the package directory and marks them installed.
 */
export class FakeHost implements Host {
  installed = new Set<string>();
  calls: string[] = [];
  missingTools = new Set<string>();
  failingDeps = new Set<string>();
  builds = new Map<string, FakeBuildMode>();
  elevate = true;
  syncOk = true;
  indexOk = true;
  indexed: string[] = [];

  constructor(
    private readonly settings: BuildSettings,
    private readonly packages: PackageSet,
  ) {}

  async hasCommand(tool: string): Promise<boolean> {
    return !this.missingTools.has(tool);
  }

  async canElevate(): Promise<boolean> {
    return this.elevate;
  }

  async isInstalled(pkg: string): Promise<boolean> {
    return this.installed.has(pkg);
  }

  async syncDatabase(): Promise<boolean> {
    this.calls.push("sync");
    return this.syncOk;
  }

  async installFromFeed(pkg: string): Promise<boolean> {
    this.calls.push(`install ${pkg}`);
    if (this.failingDeps.has(pkg)) return false;
    this.installed.add(pkg);
    return true;
  }

  async installLocal(archive: string): Promise<boolean> {
    const name = path.basename(archive);
    this.calls.push(`install-local ${name}`);
    const { version, release, arch } = this.settings;
    this.installed.add(name.slice(0, -`-${version}-${release}-${arch}.pkg.tar.zst`.length));
    return true;
  }

  async remove(pkgs: string[]): Promise<boolean> {
    this.calls.push(`remove ${pkgs.join(" ")}`);
    const present = pkgs.every((p) => this.installed.has(p));
    for (const pkg of pkgs) this.installed.delete(pkg);
    return present;
  }

  async makePackage(dir: string): Promise<boolean> {
    const id = path.basename(dir);
    this.calls.push(`makepkg ${id}`);
    const mode = this.builds.get(id) ?? "ok";
    fs.mkdirSync(path.join(dir, "src"), { recursive: true });
    fs.mkdirSync(path.join(dir, "pkg"), { recursive: true });

    if (mode === "fail") {
      fs.writeFileSync(path.join(dir, `${id}-build.log`), "error: compilation failed\n");
      return false;
    }
    if (mode === "no-archive") return true;

    const spec = this.packages.packages.find((p) => p.id === id);
    const { version, release, arch } = this.settings;
    for (const artifact of spec?.artifacts ?? []) {
      fs.writeFileSync(path.join(dir, archiveName(artifact, version, release, arch)), "archive");
      this.installed.add(artifact);
    }
    return true;
  }

  async indexRepository(repoDir: string, database: string, archives: string[]): Promise<boolean> {
    this.calls.push(`repo-add ${database}`);
    this.indexed = archives;
    if (this.indexOk) fs.writeFileSync(path.join(repoDir, database), archives.join("\n"));
    return this.indexOk;
  }

  /** Puts a package in the state a previous successful run leaves behind. */
  seedBuilt(spec: PackageSpec): void {
    const { version, release, arch, paths } = this.settings;
    fs.mkdirSync(paths.repoDir, { recursive: true });
    for (const artifact of spec.artifacts) {
      fs.writeFileSync(archivePath(paths.repoDir, artifact, version, release, arch), "archive");
      this.installed.add(artifact);
    }
  }
}

export class FakeFetcher implements SourceFetcher {
  fetched: string[] = [];
  failing = new Set<string>();

  async fetch(source: string, targetDir: string): Promise<FetchResult> {
    this.fetched.push(source);
    if (this.failing.has(source)) {
      throw new Error(`fatal: unable to access '${source}'`);
    }
    const existed = fs.existsSync(targetDir);
    fs.mkdirSync(targetDir, { recursive: true });
    return existed ? "updated" : "cloned";
  }

  async head(): Promise<string> {
    return "0123456789abcdef0123";
  }
}

export interface TestContext extends BuildContext {
  host: FakeHost;
  fetcher: FakeFetcher;
  ledger: MemoryLedger;
}

export function makeContext(baseDir: string, packages: PackageSet = scenarioPackages()): TestContext {
  const settings = testSettings(baseDir);
  return {
    settings,
    packages,
    host: new FakeHost(settings, packages),
    fetcher: new FakeFetcher(),
    ledger: new MemoryLedger(),
  };
}
