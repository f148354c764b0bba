import type { BuildArtifact, BuildDiagnostic, BuildMode, VersionFile } from "../../types.js";

export interface BundleRequest {
  projectId: string;
  buildId: string;
  files: readonly VersionFile[];
  mode: BuildMode;
  signal: AbortSignal;
  timeoutMs: number;
}

export interface BundleResult {
  exitCode: number;
  output: string;
  timedOut: boolean;
  /** Present when the bundler exited cleanly and left an output directory. */
  artifact: BuildArtifact | null;
}

/** Anything that can turn a file set into a deployable artifact. */
export interface Bundler {
  bundle(request: BundleRequest): Promise<BundleResult>;
}

export type BuildResult =
  | { ok: true; artifact: BuildArtifact; output: string }
  | { ok: false; diagnostics: BuildDiagnostic[]; rawOutput: string };
