export type BuildErrorCode =
  | "ToolMissing"
  | "PrivilegeMissing"
  | "DatabaseSyncFailed"
  | "SourceFetchFailed"
  | "DepInstallFailed"
  | "MissingLocalArtifact"
  | "NativeBuildFailed"
  | "ArtifactMissingAfterBuild"
  | "CatalogFailed";

// Codes that end the whole run no matter which package they came from.
const FATAL_CODES: ReadonlySet<BuildErrorCode> = new Set<BuildErrorCode>([
  "ToolMissing",
  "PrivilegeMissing",
  "DatabaseSyncFailed",
  "CatalogFailed",
]);

export class BuildError extends Error {
  constructor(
    public readonly code: BuildErrorCode,
    message: string,
    public readonly packageId?: string,
  ) {
    super(message);
    this.name = "BuildError";
  }

  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

export function isBuildError(err: unknown): err is BuildError {
  return err instanceof BuildError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
