import { randomUUID } from "node:crypto";
import cors from "cors";
import express from "express";
import { ZodError, z } from "zod";
import type { GenerationPipeline } from "./agent/pipeline.js";
import {
  DeploymentFailureError,
  DeploymentPreconditionError,
  ProjectNotFoundError,
  SessionBusyError,
  ToolValidationError,
  isShipwrightError
} from "./lib/errors.js";
import { logError, logInfo, serializeError } from "./lib/logging.js";
import type { Project } from "./types.js";

export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }
}

const environmentSchema = z.enum(["preview", "production"]);

const createProjectSchema = z.object({
  name: z.string().trim().min(1).max(120),
  files: z
    .array(z.object({ path: z.string().min(1).max(240), content: z.string().max(1_500_000) }))
    .max(500)
    .optional()
});

const generateSchema = z.object({
  instruction: z.string().trim().min(1).max(20_000),
  mode: z.enum(["preview", "production"]).optional(),
  deployTo: environmentSchema.optional()
});

const deploySchema = z.object({
  environment: environmentSchema.default("preview"),
  versionId: z.string().min(1).optional()
});

const rollbackSchema = z.object({
  environment: environmentSchema.default("production")
});

function requestIdOf(res: express.Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === "string" ? value : "unknown";
}

function projectSummary(project: Project) {
  return {
    id: project.id,
    name: project.name,
    slug: project.slug,
    status: project.status,
    errorMessage: project.errorMessage,
    fileRevision: project.fileRevision,
    fileCount: project.files.length,
    versions: project.versions.map((version) => ({
      id: version.id,
      number: version.number,
      fileRevision: version.fileRevision,
      createdAt: version.createdAt
    })),
    buildAttempts: project.buildAttempts.map((attempt) => ({
      id: attempt.id,
      sessionId: attempt.sessionId,
      attempt: attempt.attempt,
      trigger: attempt.trigger,
      outcome: attempt.outcome,
      category: attempt.category,
      strategy: attempt.strategy,
      repair: attempt.repair,
      diagnostics: attempt.diagnostics,
      versionId: attempt.versionId,
      finishedAt: attempt.finishedAt
    })),
    deployments: project.deployments,
    sessions: project.sessions,
    createdAt: project.createdAt,
    updatedAt: project.updatedAt
  };
}

function statusForError(error: unknown): number {
  if (error instanceof HttpError) {
    return error.status;
  }
  if (error instanceof ZodError || error instanceof ToolValidationError) {
    return 400;
  }
  if (error instanceof ProjectNotFoundError) {
    return 404;
  }
  if (error instanceof SessionBusyError || error instanceof DeploymentPreconditionError) {
    return 409;
  }
  if (error instanceof DeploymentFailureError) {
    return 502;
  }
  return 500;
}

export function createApp(input: { pipeline: GenerationPipeline }): express.Express {
  const { pipeline } = input;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  app.use((req, res, next) => {
    const header = req.headers["x-request-id"];
    const requestId = typeof header === "string" && header ? header : randomUUID();
    res.locals.requestId = requestId;
    res.setHeader("x-request-id", requestId);

    const startedAt = Date.now();
    res.on("finish", () => {
      logInfo("http.response", {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt
      });
    });

    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/projects", async (_req, res, next) => {
    try {
      const projects = await pipeline.listProjects();
      res.json({
        projects: projects.map((project) => ({ ...projectSummary(project), active: pipeline.isActive(project.id) }))
      });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/projects", async (req, res, next) => {
    try {
      const body = createProjectSchema.parse(req.body);
      const project = await pipeline.createProject(body);
      res.status(201).json({ project: projectSummary(project) });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/projects/:projectId", async (req, res, next) => {
    try {
      const project = await pipeline.getProject(req.params.projectId);
      res.json({ project: projectSummary(project), active: pipeline.isActive(project.id) });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/projects/:projectId/files", async (req, res, next) => {
    try {
      const project = await pipeline.getProject(req.params.projectId);
      res.json({
        revision: project.fileRevision,
        files: project.files.map((file) => ({ path: file.path, content: file.content, contentHash: file.contentHash }))
      });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/projects/:projectId/generate", async (req, res, next) => {
    try {
      const body = generateSchema.parse(req.body);
      const project = await pipeline.getProject(req.params.projectId);
      if (pipeline.isActive(project.id)) {
        throw new SessionBusyError(project.id);
      }

      const requestId = requestIdOf(res);
      pipeline.generate(project.id, body.instruction, { mode: body.mode, deployTo: body.deployTo }).catch((error: unknown) => {
        logError("session.background_failed", { requestId, projectId: project.id, ...serializeError(error) });
      });

      res.status(202).json({ projectId: project.id, accepted: true });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/projects/:projectId/deploy", async (req, res, next) => {
    try {
      const body = deploySchema.parse(req.body ?? {});
      const deployment = await pipeline.deploy(req.params.projectId, body);
      res.status(201).json({ deployment });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/projects/:projectId/rollback", async (req, res, next) => {
    try {
      const body = rollbackSchema.parse(req.body ?? {});
      const deployment = await pipeline.rollback(req.params.projectId, body.environment);
      res.status(201).json({ deployment });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/projects/:projectId/abort", async (req, res, next) => {
    try {
      const project = await pipeline.getProject(req.params.projectId);
      res.json({ aborted: pipeline.abort(project.id) });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const requestId = requestIdOf(res);

    if (error instanceof ZodError) {
      const details = error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
      logError("http.error.validation", { requestId, details });
      return res.status(400).json({ error: "Invalid request payload.", details });
    }

    const status = statusForError(error);
    if (status === 500) {
      logError("http.error.unhandled", { requestId, ...serializeError(error) });
      return res.status(500).json({ error: "Internal server error." });
    }

    logError("http.error", { requestId, statusCode: status, ...serializeError(error) });

    const message = error instanceof Error ? error.message : String(error);
    const code = isShipwrightError(error) ? error.code : undefined;
    const details =
      error instanceof HttpError
        ? error.details
        : error instanceof DeploymentFailureError
          ? { category: error.category, statusCode: error.statusCode }
          : error instanceof ToolValidationError && error.issues.length
            ? error.issues
            : undefined;

    return res.status(status).json({
      error: message,
      ...(code ? { code } : {}),
      ...(details !== undefined ? { details } : {})
    });
  });

  return app;
}
