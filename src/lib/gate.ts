import fs from "node:fs";
import type { PackageSpec } from "../types/index.js";
import type { BuildContext } from "./build-context.js";
import { archivePath } from "./packages.js";

/**
 * True when every artifact of `spec` is in the repository directory and
 * installed on the host. A missing repository directory counts as not done.
 */
export async function isDone(spec: PackageSpec, ctx: BuildContext): Promise<boolean> {
  const { version, release, arch, paths } = ctx.settings;
  for (const artifact of spec.artifacts) {
    if (!fs.existsSync(archivePath(paths.repoDir, artifact, version, release, arch))) return false;
    if (!(await ctx.host.isInstalled(artifact))) return false;
  }
  return true;
}
