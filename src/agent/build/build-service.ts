import { randomUUID } from "node:crypto";
import { throwIfAborted } from "../../lib/abort.js";
import { logInfo, logWarn } from "../../lib/logging.js";
import type { BuildMode, VersionFile } from "../../types.js";
import { parseBuildDiagnostics, tailOutput } from "./diagnostic-parser.js";
import type { BuildResult, Bundler } from "./types.js";

export interface BuildServiceOptions {
  timeoutMs: number;
}

export interface BuildRequest {
  projectId: string;
  files: readonly VersionFile[];
  mode: BuildMode;
  signal: AbortSignal;
  buildId?: string;
}

export class BuildService {
  constructor(
    private readonly bundler: Bundler,
    private readonly options: BuildServiceOptions
  ) {}

  /**
   * Runs the bundler once. Rejects with SessionAbortedError when the signal
   * fires; every other failure resolves as `{ ok: false }`.
   */
  async build(request: BuildRequest): Promise<BuildResult> {
    throwIfAborted(request.signal);

    const buildId = request.buildId ?? randomUUID();
    const startedAt = Date.now();
    const result = await this.bundler.bundle({
      projectId: request.projectId,
      buildId,
      files: request.files,
      mode: request.mode,
      signal: request.signal,
      timeoutMs: this.options.timeoutMs
    });

    throwIfAborted(request.signal);

    const durationMs = Date.now() - startedAt;
    const rawOutput = tailOutput(result.output);

    if (result.timedOut) {
      logWarn("build.timed_out", { projectId: request.projectId, buildId, timeoutMs: this.options.timeoutMs });
      return {
        ok: false,
        rawOutput,
        diagnostics: [
          {
            severity: "error",
            code: "timeout",
            message: `Bundler did not finish within ${this.options.timeoutMs}ms.`
          }
        ]
      };
    }

    if (result.exitCode === 0 && result.artifact) {
      logInfo("build.succeeded", {
        projectId: request.projectId,
        buildId,
        mode: request.mode,
        files: result.artifact.files.length,
        durationMs
      });
      return { ok: true, artifact: result.artifact, output: rawOutput };
    }

    const diagnostics = parseBuildDiagnostics(result.output);
    if (!diagnostics.length) {
      diagnostics.push({
        severity: "error",
        code: result.exitCode === 0 ? "empty_output" : "exit_code",
        message:
          result.exitCode === 0
            ? "Bundler exited cleanly but produced no output files."
            : `Bundler exited with code ${result.exitCode}.`
      });
    }

    logWarn("build.failed", {
      projectId: request.projectId,
      buildId,
      exitCode: result.exitCode,
      diagnostics: diagnostics.length,
      durationMs
    });

    return { ok: false, diagnostics, rawOutput };
  }
}
