import { randomUUID } from "node:crypto";
import { throwIfAborted } from "../lib/abort.js";
import { SessionAbortedError, ToolValidationError } from "../lib/errors.js";
import type { ProjectRepository } from "../lib/project-store.js";
import type {
  BuildArtifact,
  BuildAttempt,
  BuildMode,
  BuildTrigger,
  GenerationSessionRecord,
  Project,
  Version
} from "../types.js";
import type { BuildService } from "./build/build-service.js";
import type { BuildResult } from "./build/types.js";
import { FileStore } from "./fs/file-store.js";
import type { ToolEffect } from "./tools/index.js";

export interface SessionBuild {
  attempt: BuildAttempt;
  version: Version | null;
  artifact: BuildArtifact | null;
}

export interface GenerationSessionOptions {
  project: Project;
  instruction: string;
  signal: AbortSignal;
  repository: ProjectRepository;
  buildService: BuildService;
  maxBuildAttempts: number;
}

/**
 * Mutable state of one generation run over a project: the file store, the
 * build budget and the session record. Every build, model-triggered or not,
 * goes through `build` so the budget is shared.
 */
export class GenerationSession {
  readonly id = randomUUID();
  readonly project: Project;
  readonly store: FileStore;
  readonly signal: AbortSignal;
  readonly record: GenerationSessionRecord;
  readonly maxBuildAttempts: number;
  private readonly repository: ProjectRepository;
  private readonly buildService: BuildService;

  constructor(options: GenerationSessionOptions) {
    this.project = options.project;
    this.store = new FileStore(options.project);
    this.signal = options.signal;
    this.repository = options.repository;
    this.buildService = options.buildService;
    this.maxBuildAttempts = options.maxBuildAttempts;
    this.record = {
      id: this.id,
      instruction: options.instruction,
      outcome: "running",
      turnCount: 0,
      buildAttemptCount: 0,
      versionId: null,
      errorCode: null,
      errorMessage: null,
      startedAt: new Date().toISOString(),
      finishedAt: null
    };
    this.project.sessions.push(this.record);
  }

  get attempts(): BuildAttempt[] {
    return this.project.buildAttempts.filter((attempt) => attempt.sessionId === this.id);
  }

  get remainingBuilds(): number {
    return Math.max(0, this.maxBuildAttempts - this.attempts.length);
  }

  latestAttempt(): BuildAttempt | null {
    const attempts = this.attempts;
    return attempts.length ? attempts[attempts.length - 1] : null;
  }

  async persist(): Promise<void> {
    this.project.updatedAt = new Date().toISOString();
    await this.repository.save(this.project);
  }

  /**
   * Builds the current snapshot, records the attempt and, on success, a new
   * Version. A build interrupted by an abort is recorded as `cancelled` before
   * the abort propagates.
   */
  async build(trigger: BuildTrigger, mode: BuildMode): Promise<SessionBuild> {
    throwIfAborted(this.signal);
    if (this.remainingBuilds <= 0) {
      throw new ToolValidationError(`Build budget of ${this.maxBuildAttempts} attempts is spent for this session.`);
    }

    const snapshot = this.store.snapshot();
    const attempt: BuildAttempt = {
      id: randomUUID(),
      sessionId: this.id,
      attempt: this.attempts.length + 1,
      trigger,
      mode,
      fileRevision: snapshot.revision,
      outcome: "failed",
      diagnostics: [],
      rawOutput: "",
      category: null,
      strategy: null,
      repair: null,
      versionId: null,
      startedAt: new Date().toISOString(),
      finishedAt: ""
    };

    let result: BuildResult;
    try {
      result = await this.buildService.build({
        projectId: this.project.id,
        buildId: attempt.id,
        files: snapshot.files,
        mode,
        signal: this.signal
      });
    } catch (error) {
      if (error instanceof SessionAbortedError) {
        attempt.outcome = "cancelled";
        attempt.finishedAt = new Date().toISOString();
        this.project.buildAttempts.push(attempt);
        this.record.buildAttemptCount = this.attempts.length;
        await this.persist();
      }
      throw error;
    }

    attempt.outcome = result.ok ? "succeeded" : "failed";
    attempt.diagnostics = result.ok ? [] : result.diagnostics;
    attempt.rawOutput = result.ok ? result.output : result.rawOutput;
    attempt.finishedAt = new Date().toISOString();

    let version: Version | null = null;
    if (result.ok) {
      version = Object.freeze({
        id: randomUUID(),
        number: this.project.versions.length + 1,
        buildAttemptId: attempt.id,
        fileRevision: snapshot.revision,
        files: snapshot.files,
        createdAt: attempt.finishedAt
      });
      attempt.versionId = version.id;
      await this.repository.saveArtifact(this.project.id, version.id, result.artifact);
      this.project.versions.push(version);
      this.record.versionId = version.id;
    }

    this.project.buildAttempts.push(attempt);
    this.record.buildAttemptCount = this.attempts.length;
    await this.persist();

    return { attempt, version, artifact: result.ok ? result.artifact : null };
  }

  /** `run-build` as seen by the model: the outcome is a tool result, not an exception. */
  async runModelBuild(mode: BuildMode): Promise<ToolEffect> {
    const { attempt, version } = await this.build("model", mode);

    if (attempt.outcome === "succeeded") {
      return {
        ok: true,
        message: `Build #${attempt.attempt} succeeded; created version ${version?.number ?? "?"}.`,
        data: { attempt: attempt.attempt, outcome: attempt.outcome, versionId: attempt.versionId }
      };
    }

    return {
      ok: false,
      message: `Build #${attempt.attempt} failed with ${attempt.diagnostics.length} diagnostic(s).`,
      data: {
        attempt: attempt.attempt,
        outcome: attempt.outcome,
        remainingBuilds: this.remainingBuilds,
        diagnostics: attempt.diagnostics.slice(0, 20)
      }
    };
  }
}
