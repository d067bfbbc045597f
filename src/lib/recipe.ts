import fs from "node:fs";
import path from "node:path";
import type { BuildSystem, PackageSpec, Recipe, SplitPackage } from "../types/index.js";
import { cloneUrl } from "./git.js";
import { sourceDirName } from "./packages.js";
import { renderPatchStage } from "./patches.js";

export interface RecipeContext {
  version: string;
  release: string;
  arch: string;
}

export const RECIPE_FILE = "PKGBUILD";

// Optional servers split out of the foundational package, keyed by artifact suffix.
const OPTIONAL_SERVERS = new Map<string, { binary: string; buildPath: string; description: string }>([
  ["xvfb", { binary: "Xvfb", buildPath: "build/hw/vfb/Xvfb", description: "XLibre virtual framebuffer server" }],
  ["xwayland", { binary: "Xwayland", buildPath: "build/hw/xwayland/Xwayland", description: "XLibre Xwayland server" }],
  ["xnest", { binary: "Xnest", buildPath: "build/hw/xnest/Xnest", description: "XLibre nested X server" }],
]);

const SERVER_MESON_FLAGS = [
  "--prefix=/usr",
  "--libexecdir=/usr/lib",
  "-Dxvfb=true",
  "-Dxwayland=true",
  "-Dxnest=true",
  "-Dxdmcp=true",
];

const SERVER_CONFIGURE_FLAGS = [
  "--prefix=/usr",
  "--libexecdir=/usr/lib",
  "--enable-xvfb",
  "--enable-xwayland",
  "--enable-xnest",
  "--enable-xdmcp",
];

const DRIVER_MESON_FLAGS = ["--prefix=/usr"];
const DRIVER_CONFIGURE_FLAGS = ["--prefix=/usr"];

/** Which build system a fetched source tree uses. */
export function detectBuildSystem(sourceDir: string): BuildSystem {
  return fs.existsSync(path.join(sourceDir, "meson.build")) ? "meson" : "autotools";
}

function buildSteps(dir: string, mesonFlags: string[], configureFlags: string[]): string[] {
  return [
    `cd ${dir}`,
    "if [ -f meson.build ]; then",
    '    echo "Using Meson build system" >&2',
    `    meson setup build ${mesonFlags.join(" ")}`,
    "    ninja -C build",
    "else",
    '    echo "Using Autotools build system" >&2',
    "    ./autogen.sh",
    `    ./configure ${configureFlags.join(" ")}`,
    "    make -j$(nproc)",
    "fi",
  ];
}

function installSteps(dir: string): string[] {
  return [
    `cd ${dir}`,
    "if [ -d build ]; then",
    '    DESTDIR="$pkgdir" ninja -C build install',
    "else",
    '    make DESTDIR="$pkgdir" install',
    "fi",
  ];
}

function prepareSteps(id: string, dir: string): string[] | undefined {
  const patches = renderPatchStage(id);
  return patches ? [`cd ${dir}`, ...patches] : undefined;
}

function requireSource(spec: PackageSpec): string {
  if (!spec.source) {
    throw new Error(`Package "${spec.id}" has no source to build from`);
  }
  return spec.source;
}

function serverPackages(spec: PackageSpec, dir: string): SplitPackage[] {
  const [core, ...rest] = spec.artifacts;
  if (!core) {
    throw new Error(`Package "${spec.id}" declares no artifacts`);
  }

  const optional = rest.flatMap((name) => {
    const server = OPTIONAL_SERVERS.get(name.slice(core.length + 1));
    return name.startsWith(`${core}-`) && server ? [{ name, ...server }] : [];
  });
  const unknown = rest.filter((name) => name !== `${core}-common` && !optional.some((o) => o.name === name));
  if (unknown.length > 0) {
    throw new Error(`No packaging rule for ${unknown.join(", ")}`);
  }

  const packages: SplitPackage[] = [];
  const removed = optional.map((o) => o.binary);
  packages.push({
    name: core,
    description: "XLibre X11 server core",
    depends: spec.depends,
    provides: spec.provides,
    conflicts: spec.conflicts,
    body: [
      ...installSteps(dir),
      ...(removed.length > 0
        ? [`rm -rf "$pkgdir"/usr/bin/${removed.length > 1 ? `{${removed.join(",")}}` : removed.join("")} 2>/dev/null || true`]
        : []),
      'rm -rf "$pkgdir"/usr/share/X11/xorg.conf.d',
    ],
  });

  if (rest.includes(`${core}-common`)) {
    packages.push({
      name: `${core}-common`,
      description: "XLibre server common files",
      depends: [core],
      conflicts: spec.conflicts.filter((c) => !spec.provides.includes(c)),
      body: [
        `cd ${dir}`,
        'install -Dm644 -t "$pkgdir"/usr/share/X11/xorg.conf.d config/*.conf 2>/dev/null || true',
      ],
    });
  }

  for (const server of optional) {
    packages.push({
      name: server.name,
      description: server.description,
      depends: [core],
      body: [
        `cd ${dir}`,
        `if [ -f ${server.buildPath} ]; then`,
        `    echo "Installing ${server.buildPath} for ${server.name}" >&2`,
        `    install -Dm755 ${server.buildPath} "$pkgdir"/usr/bin/${server.binary}`,
        `elif [ -f ${server.binary} ]; then`,
        `    echo "Installing ${server.binary} for ${server.name}" >&2`,
        `    install -Dm755 ${server.binary} "$pkgdir"/usr/bin/${server.binary}`,
        "else",
        `    echo "Warning: ${server.binary} binary not found for ${server.name}, skipping installation" >&2`,
        "fi",
      ],
    });
  }

  return packages;
}

function foundationalRecipe(spec: PackageSpec, ctx: RecipeContext): Recipe {
  const source = requireSource(spec);
  const dir = sourceDirName(source);
  return {
    pkgnames: spec.artifacts,
    version: ctx.version,
    release: ctx.release,
    description: spec.description,
    arch: ctx.arch,
    url: source,
    license: ["MIT"],
    options: ["!debug"],
    depends: spec.depends,
    makedepends: spec.makedepends,
    source: [`git+${cloneUrl(source)}`],
    prepare: prepareSteps(spec.id, dir),
    build: [
      ...buildSteps(dir, SERVER_MESON_FLAGS, SERVER_CONFIGURE_FLAGS),
      'echo "Built binaries:" >&2',
      "find . -type f -executable >&2",
    ],
    packages: serverPackages(spec, dir),
  };
}

function driverRecipe(spec: PackageSpec, ctx: RecipeContext): Recipe {
  const source = requireSource(spec);
  const dir = sourceDirName(source);
  return {
    pkgnames: [spec.id],
    version: ctx.version,
    release: ctx.release,
    description: spec.description,
    arch: ctx.arch,
    url: source,
    license: ["MIT"],
    options: ["!debug"],
    depends: spec.depends,
    makedepends: spec.makedepends,
    source: [`git+${cloneUrl(source)}`],
    prepare: prepareSteps(spec.id, dir),
    build: buildSteps(dir, DRIVER_MESON_FLAGS, DRIVER_CONFIGURE_FLAGS),
    packages: [{ name: spec.id, description: spec.description, body: installSteps(dir) }],
  };
}

function metaRecipe(spec: PackageSpec, ctx: RecipeContext): Recipe {
  return {
    pkgnames: [spec.id],
    version: ctx.version,
    release: ctx.release,
    description: spec.description,
    arch: ctx.arch,
    license: ["MIT"],
    options: [],
    depends: spec.depends,
    makedepends: [],
    source: [],
    packages: [{ name: spec.id, description: spec.description, body: ["# Meta-package, no files to install", "true"] }],
  };
}

/** Builds the recipe for a package. Pure: the caller writes it out. */
export function synthesize(spec: PackageSpec, ctx: RecipeContext): Recipe {
  switch (spec.kind) {
    case "foundational":
      return foundationalRecipe(spec, ctx);
    case "driver":
      return driverRecipe(spec, ctx);
    case "meta":
      return metaRecipe(spec, ctx);
  }
}

// ── PKGBUILD rendering ──

function quoteDouble(text: string): string {
  return `"${text.replace(/[\\"$`]/g, "\\$&")}"`;
}

function array(name: string, values: string[], quote: "single" | "double" = "single"): string {
  const items = values.map((v) => (quote === "single" ? `'${v}'` : quoteDouble(v)));
  return `${name}=(${items.join(" ")})`;
}

function shellFunction(name: string, lines: string[]): string[] {
  return [`${name}() {`, ...lines.map((line) => (line ? `    ${line}` : "")), "}"];
}

function splitPackageFunction(pkg: SplitPackage, split: boolean): string[] {
  const header: string[] = [];
  if (split) {
    header.push(`pkgdesc=${quoteDouble(pkg.description)}`);
    if (pkg.depends) header.push(array("depends", pkg.depends));
  }
  if (pkg.provides && pkg.provides.length > 0) header.push(array("provides", pkg.provides));
  if (pkg.conflicts && pkg.conflicts.length > 0) header.push(array("conflicts", pkg.conflicts));
  const lines = header.length > 0 ? [...header, "", ...pkg.body] : pkg.body;
  return shellFunction(split ? `package_${pkg.name}` : "package", lines);
}

export function renderPkgbuild(recipe: Recipe): string {
  const split = recipe.pkgnames.length > 1;
  const lines: string[] = [
    "# Generated by metabuild; changes are overwritten on the next run.",
    split ? `pkgname=(${recipe.pkgnames.join(" ")})` : `pkgname=${recipe.pkgnames.join("")}`,
    `pkgver=${recipe.version}`,
    `pkgrel=${recipe.release}`,
    `pkgdesc=${quoteDouble(recipe.description)}`,
    array("arch", [recipe.arch]),
  ];
  if (recipe.url) lines.push(`url=${quoteDouble(recipe.url)}`);
  lines.push(array("license", recipe.license));
  if (recipe.options.length > 0) lines.push(array("options", recipe.options));
  lines.push(array("depends", recipe.depends));
  if (recipe.makedepends.length > 0) lines.push(array("makedepends", recipe.makedepends));
  if (recipe.source.length > 0) {
    lines.push(array("source", recipe.source, "double"));
    lines.push(array("sha256sums", recipe.source.map(() => "SKIP")));
  }

  if (recipe.prepare) lines.push("", ...shellFunction("prepare", recipe.prepare));
  if (recipe.build) lines.push("", ...shellFunction("build", recipe.build));
  for (const pkg of recipe.packages) {
    lines.push("", ...splitPackageFunction(pkg, split));
  }

  return `${lines.join("\n")}\n`;
}
