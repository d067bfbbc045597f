import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import { collectDependencies, installDeps, localProviders } from "../../src/lib/deps.js";
import { synthesize } from "../../src/lib/recipe.js";
import { recipeContext } from "../../src/lib/build-context.js";
import type { PackageSpec } from "../../src/types/index.js";
import { createTmpDir, makeContext, makeSpec, scenarioPackages, type TestContext } from "../helpers.js";

let tmpDir: string;
let ctx: TestContext;

beforeEach(() => {
  tmpDir = createTmpDir();
  ctx = makeContext(tmpDir);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function spec(id: string): PackageSpec {
  const found = ctx.packages.packages.find((p) => p.id === id);
  if (!found) throw new Error(`no test package ${id}`);
  return found;
}

function recipeFor(pkg: PackageSpec) {
  return synthesize(pkg, recipeContext(ctx.settings));
}

describe("collectDependencies", () => {
  it("merges runtime and build dependencies without duplicates", () => {
    const pkg = makeSpec({ id: "pkg-x", kind: "driver", depends: ["lib-x"], makedepends: ["lib-x", "a-tool"] });
    expect(collectDependencies(recipeFor(pkg))).toEqual(["a-tool", "lib-x"]);
  });
});

describe("localProviders", () => {
  it("maps every buildable package of the set", () => {
    expect([...localProviders(ctx).keys()]).toEqual(["pkg-a", "pkg-b"]);
  });
});

describe("installDeps", () => {
  it("installs local packages from the repository and the rest from the feed", async () => {
    ctx.host.seedBuilt(spec("pkg-a"));
    await installDeps(recipeFor(spec("pkg-b")), ctx);

    expect(ctx.host.calls).toEqual([
      "install make-tool",
      "install-local pkg-a-1.0.0-1-x86_64.pkg.tar.zst",
      "install-local pkg-a-common-1.0.0-1-x86_64.pkg.tar.zst",
    ]);
    expect(ctx.ledger.lines[0]).toBe("Installing dependencies: make-tool pkg-a");
    expect(ctx.ledger.lines.at(-1)).toBe("Successfully installed dependencies for pkg-b");
  });

  it("fails when a local package has not been built", async () => {
    await expect(installDeps(recipeFor(spec("pkg-b")), ctx)).rejects.toMatchObject({
      code: "MissingLocalArtifact",
      message: `pkg-a package not found in ${ctx.settings.paths.repoDir}`,
    });
    expect(ctx.host.calls).toEqual(["install make-tool"]);
  });

  it("installs a name declared in both lists once", async () => {
    const pkg = makeSpec({ id: "pkg-x", kind: "driver", depends: ["lib-x"], makedepends: ["lib-x", "a-tool"] });
    await installDeps(recipeFor(pkg), ctx);
    expect(ctx.host.calls).toEqual(["install a-tool", "install lib-x"]);
  });

  it("stops at the first dependency that fails to install", async () => {
    const pkg = makeSpec({ id: "pkg-x", kind: "driver", depends: ["lib-x", "lib-y"] });
    ctx.host.failingDeps.add("lib-x");

    await expect(installDeps(recipeFor(pkg), ctx)).rejects.toMatchObject({
      code: "DepInstallFailed",
      message: "Failed to install dependency lib-x",
    });
    expect(ctx.host.calls).toEqual(["install lib-x"]);
    expect(ctx.host.installed.has("lib-y")).toBe(false);
  });

  it("keeps dependencies installed before a failure", async () => {
    const pkg = makeSpec({ id: "pkg-x", kind: "driver", depends: ["lib-x", "lib-y"] });
    ctx.host.failingDeps.add("lib-y");

    await expect(installDeps(recipeFor(pkg), ctx)).rejects.toMatchObject({ code: "DepInstallFailed" });
    expect(ctx.host.installed.has("lib-x")).toBe(true);
  });

  it("does nothing for a recipe without dependencies", async () => {
    const pkg = makeSpec({ id: "pkg-z", kind: "meta" });
    await installDeps(recipeFor(pkg), ctx);
    expect(ctx.host.calls).toEqual([]);
    expect(ctx.ledger.lines).toEqual(["No dependencies found for pkg-z"]);
  });

  it("treats packages outside the set as feed packages", async () => {
    const other = makeContext(tmpDir, { packages: scenarioPackages().packages.filter((p) => p.id !== "pkg-a") });
    const pkg = makeSpec({ id: "pkg-x", kind: "driver", depends: ["pkg-a"] });
    await installDeps(synthesize(pkg, recipeContext(other.settings)), other);
    expect(other.host.calls).toEqual(["install pkg-a"]);
  });
});
