import { randomUUID } from "node:crypto";
import {
  DeploymentFailureError,
  DeploymentPreconditionError,
  ProjectNotFoundError,
  SessionAbortedError,
  SessionBusyError,
  isShipwrightError
} from "../lib/errors.js";
import { logError, logInfo, logWarn, serializeError } from "../lib/logging.js";
import type { ProjectRepository } from "../lib/project-store.js";
import type { DeploymentService } from "../deploy/deployment-service.js";
import type { BuildMode, Deployment, DeploymentEnvironment, Project, ProjectStatus, Version } from "../types.js";
import type { BuildService } from "./build/build-service.js";
import { HealingLoop, HealingLoopOptions } from "./correction/healing-loop.js";
import { ToolExecutor } from "./executor.js";
import { FileStore } from "./fs/file-store.js";
import { GenerationSession } from "./session.js";
import { createDefaultToolRegistry, ToolRegistry } from "./tools/index.js";
import { ModelClient, TurnOrchestrator, TurnOrchestratorOptions } from "./turn-orchestrator.js";

export interface GenerationPipelineOptions {
  orchestrator: TurnOrchestratorOptions;
  healing: HealingLoopOptions & { maxAttempts: number };
  buildMode?: BuildMode;
}

export interface GenerationPipelineDependencies {
  repository: ProjectRepository;
  model: ModelClient;
  buildService: BuildService;
  deployments: DeploymentService;
  tools?: ToolRegistry;
}

export interface CreateProjectInput {
  name: string;
  files?: Array<{ path: string; content: string }>;
}

export interface GenerateOptions {
  deployTo?: DeploymentEnvironment;
  mode?: BuildMode;
}

export interface GenerationOutcome {
  projectId: string;
  sessionId: string;
  summary: string;
  version: Version;
  deployment: Deployment | null;
}

export function slugify(name: string): string {
  return (
    name
      .toLowerCase()
      .normalize("NFKD")
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, "")
      .slice(0, 40)
      .replace(/-+$/g, "") || "app"
  );
}

/**
 * Owns the per-project session lock and the status transitions
 * planning → generating → healing → (deploying) → ready | failed.
 */
export class GenerationPipeline {
  private readonly active = new Map<string, AbortController>();
  private readonly executor: ToolExecutor;
  private readonly tools: ToolRegistry;

  constructor(
    private readonly deps: GenerationPipelineDependencies,
    private readonly options: GenerationPipelineOptions
  ) {
    this.tools = deps.tools ?? createDefaultToolRegistry();
    this.executor = new ToolExecutor(this.tools);
  }

  async createProject(input: CreateProjectInput): Promise<Project> {
    const id = randomUUID();
    const now = new Date().toISOString();
    const project: Project = {
      id,
      name: input.name.trim(),
      slug: `${slugify(input.name)}-${id.slice(0, 8)}`,
      status: "ready",
      fileRevision: 0,
      files: [],
      versions: [],
      turns: [],
      buildAttempts: [],
      deployments: [],
      sessions: [],
      errorMessage: null,
      createdAt: now,
      updatedAt: now
    };

    if (input.files?.length) {
      new FileStore(project).apply(
        input.files.map((file) => ({ type: "write" as const, path: file.path, content: file.content }))
      );
    }

    const created = await this.deps.repository.create(project);
    logInfo("project.created", { projectId: id, slug: project.slug, files: project.files.length });
    return created;
  }

  async getProject(projectId: string): Promise<Project> {
    const project = await this.deps.repository.get(projectId);
    if (!project) {
      throw new ProjectNotFoundError(projectId);
    }
    return project;
  }

  async listProjects(): Promise<Project[]> {
    return this.deps.repository.list();
  }

  isActive(projectId: string): boolean {
    return this.active.has(projectId);
  }

  /** Aborts the project's running session. Returns false when nothing was running. */
  abort(projectId: string): boolean {
    const controller = this.active.get(projectId);
    if (!controller) {
      return false;
    }
    controller.abort(new SessionAbortedError());
    logInfo("session.abort_requested", { projectId });
    return true;
  }

  async generate(projectId: string, instruction: string, options: GenerateOptions = {}): Promise<GenerationOutcome> {
    const controller = this.acquire(projectId);
    let project: Project | null = null;
    let session: GenerationSession | null = null;

    try {
      project = await this.getProject(projectId);
      project.status = "planning";
      project.errorMessage = null;

      session = new GenerationSession({
        project,
        instruction,
        signal: controller.signal,
        repository: this.deps.repository,
        buildService: this.deps.buildService,
        maxBuildAttempts: this.options.healing.maxAttempts
      });
      await session.persist();

      const orchestrator = new TurnOrchestrator(this.deps.model, this.executor, this.tools, this.options.orchestrator);

      await this.transition(session, "generating");
      const result = await orchestrator.run(session, instruction);

      await this.transition(session, "healing");
      const healing = new HealingLoop(orchestrator.repairerFor(session), this.options.healing);
      const healed = await healing.run(session, options.mode ?? this.options.buildMode ?? "preview");

      let deployment: Deployment | null = null;
      if (options.deployTo) {
        await this.transition(session, "deploying");
        deployment = await this.deployWithinSession(project, options.deployTo, healed.version.id, controller.signal);
      }

      project.status = "ready";
      session.record.outcome = "completed";
      session.record.finishedAt = new Date().toISOString();
      await session.persist();

      logInfo("session.completed", {
        projectId,
        sessionId: session.id,
        version: healed.version.number,
        buildAttempts: session.attempts.length,
        deployment: deployment?.status ?? null
      });

      return {
        projectId,
        sessionId: session.id,
        summary: result.summary,
        version: healed.version,
        deployment
      };
    } catch (error) {
      if (project && session) {
        await this.failSession(project, session, error);
      }
      throw error;
    } finally {
      this.active.delete(projectId);
    }
  }

  async deploy(projectId: string, input: { environment: DeploymentEnvironment; versionId?: string }): Promise<Deployment> {
    return this.withDeployLock(projectId, (project, signal) =>
      this.deps.deployments.deploy({ project, environment: input.environment, versionId: input.versionId, signal })
    );
  }

  async rollback(projectId: string, environment: DeploymentEnvironment): Promise<Deployment> {
    return this.withDeployLock(projectId, (project, signal) =>
      this.deps.deployments.rollback({ project, environment, signal })
    );
  }

  private acquire(projectId: string): AbortController {
    if (this.active.has(projectId)) {
      throw new SessionBusyError(projectId);
    }
    const controller = new AbortController();
    this.active.set(projectId, controller);
    return controller;
  }

  private async transition(session: GenerationSession, status: ProjectStatus): Promise<void> {
    session.project.status = status;
    await session.persist();
    logInfo("project.status", { projectId: session.project.id, status });
  }

  /** Non-fatal deployment failures are recorded and leave the project usable. */
  private async deployWithinSession(
    project: Project,
    environment: DeploymentEnvironment,
    versionId: string,
    signal: AbortSignal
  ): Promise<Deployment | null> {
    try {
      return await this.deps.deployments.deploy({ project, environment, versionId, signal });
    } catch (error) {
      if ((error instanceof DeploymentFailureError && !error.fatal) || error instanceof DeploymentPreconditionError) {
        project.errorMessage = error.message;
        logWarn("session.deploy_skipped", { projectId: project.id, ...serializeError(error) });
        return project.deployments.find((deployment) => deployment.versionId === versionId && deployment.failure) ?? null;
      }
      throw error;
    }
  }

  private async withDeployLock(
    projectId: string,
    run: (project: Project, signal: AbortSignal) => Promise<Deployment>
  ): Promise<Deployment> {
    const controller = this.acquire(projectId);

    try {
      const project = await this.getProject(projectId);
      const previousStatus = project.status;
      project.status = "deploying";
      await this.save(project);

      try {
        const deployment = await run(project, controller.signal);
        project.status = "ready";
        project.errorMessage = null;
        await this.save(project);
        return deployment;
      } catch (error) {
        const fatal = isShipwrightError(error) && error.fatal;
        project.status = fatal ? "failed" : error instanceof DeploymentPreconditionError ? previousStatus : "ready";
        project.errorMessage = error instanceof Error ? error.message : String(error);
        await this.save(project);
        throw error;
      }
    } finally {
      this.active.delete(projectId);
    }
  }

  private async save(project: Project): Promise<void> {
    project.updatedAt = new Date().toISOString();
    await this.deps.repository.save(project);
  }

  private async failSession(project: Project, session: GenerationSession, error: unknown): Promise<void> {
    const aborted = error instanceof SessionAbortedError;
    project.status = "failed";
    project.errorMessage = error instanceof Error ? error.message : String(error);
    session.record.outcome = aborted ? "aborted" : "failed";
    session.record.errorCode = isShipwrightError(error) ? error.code : "internal";
    session.record.errorMessage = project.errorMessage;
    session.record.finishedAt = new Date().toISOString();

    for (const turn of project.turns) {
      if (turn.status === "pending" || turn.status === "executing") {
        turn.status = "failed";
        turn.errorMessage = project.errorMessage;
        turn.finishedAt = session.record.finishedAt;
      }
    }

    const log = aborted ? logWarn : logError;
    log("session.failed", { projectId: project.id, sessionId: session.id, ...serializeError(error) });

    await session.persist();
  }
}
