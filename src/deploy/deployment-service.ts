import { randomUUID } from "node:crypto";
import { throwIfAborted } from "../lib/abort.js";
import { DeploymentFailureError, DeploymentPreconditionError } from "../lib/errors.js";
import { logInfo, logWarn } from "../lib/logging.js";
import type { ProjectRepository } from "../lib/project-store.js";
import type { ArtifactFile, BuildArtifact, Deployment, DeploymentEnvironment, Project, Version } from "../types.js";
import { probeLiveness } from "./liveness-probe.js";
import { contentAddressedKey } from "./object-storage-client.js";
import type { AssetStorage, EdgePlatform, FetchLike, PlainTextBinding } from "./types.js";
import { buildWorkerManifest, renderWorkerModule } from "./worker-script.js";

export interface DeploymentServiceOptions {
  baseDomain: string;
  assetOffloadThresholdBytes: number;
  maxScriptBytes: number;
  liveness: {
    attempts: number;
    initialDelayMs: number;
    timeoutMs: number;
  };
  probeFetch?: FetchLike;
}

export interface DeployRequest {
  project: Project;
  environment: DeploymentEnvironment;
  /** Defaults to the project's latest Version. */
  versionId?: string;
  signal?: AbortSignal;
}

export function scriptNameFor(slug: string, environment: DeploymentEnvironment): string {
  return `${environment === "preview" ? "preview" : "app"}-${slug}`;
}

/**
 * Publishes a Version: offload large files, upload the worker, bind the
 * hostname, then probe it. Appends a Deployment to the project in every
 * outcome except a failed precondition.
 */
export class DeploymentService {
  constructor(
    private readonly edge: EdgePlatform | null,
    private readonly storage: AssetStorage | null,
    private readonly repository: ProjectRepository,
    private readonly options: DeploymentServiceOptions
  ) {}

  async deploy(request: DeployRequest): Promise<Deployment> {
    const { project, environment } = request;
    const version = this.resolveVersion(project, request.versionId);
    const artifact = await this.checkPreconditions(project, version);
    const edge = this.edge;

    if (!edge) {
      throw new DeploymentPreconditionError("Edge platform credentials are not configured.");
    }

    const oversized = artifact.files.filter((file) => file.bytes.length > this.options.assetOffloadThresholdBytes);
    if (oversized.length && !this.storage) {
      throw new DeploymentPreconditionError(
        `Object storage is not configured but ${oversized.length} file(s) exceed ${this.options.assetOffloadThresholdBytes} bytes.`
      );
    }

    const scriptName = scriptNameFor(project.slug, environment);
    const deployment: Deployment = {
      id: randomUUID(),
      versionId: version.id,
      environment,
      scriptName,
      hostname: null,
      url: null,
      assetManifest: {},
      liveness: null,
      status: "failed",
      failure: null,
      createdAt: new Date().toISOString()
    };

    try {
      const assetUrls = await this.offloadAssets(oversized, deployment, request.signal);
      const offloaded = new Set(oversized.map((file) => file.path));
      const module = renderWorkerModule(
        buildWorkerManifest({
          entry: artifact.entry,
          embedded: artifact.files.filter((file) => !offloaded.has(file.path)),
          assetUrls
        })
      );

      const moduleBytes = Buffer.byteLength(module, "utf8");
      if (moduleBytes > this.options.maxScriptBytes) {
        throw new DeploymentFailureError({
          category: "script-rejected",
          message: `Worker module is ${moduleBytes} bytes, above the ${this.options.maxScriptBytes} byte limit.`
        });
      }

      throwIfAborted(request.signal);
      await edge.uploadScript({
        scriptName,
        module,
        bindings: this.bindingsFor(project, version, environment),
        signal: request.signal
      });

      const hostname = `${scriptName}.${this.options.baseDomain}`;
      await edge.bindRoute({ scriptName, hostname, signal: request.signal });
      deployment.hostname = hostname;
      deployment.url = `https://${hostname}`;

      deployment.liveness = await probeLiveness(
        deployment.url,
        { ...this.options.liveness, fetchImpl: this.options.probeFetch },
        request.signal
      );
      deployment.status = deployment.liveness.ok ? "live" : "unreachable";

      if (deployment.liveness.ok) {
        logInfo("deploy.live", { projectId: project.id, scriptName, url: deployment.url, attempts: deployment.liveness.attempts });
      } else {
        logWarn("deploy.liveness.failed", {
          projectId: project.id,
          scriptName,
          url: deployment.url,
          statusCode: deployment.liveness.statusCode,
          error: deployment.liveness.error
        });
      }

      project.deployments.push(deployment);
      return deployment;
    } catch (error) {
      if (error instanceof DeploymentFailureError) {
        deployment.status = "failed";
        deployment.failure = {
          category: error.category,
          statusCode: error.statusCode,
          body: error.body,
          message: error.message
        };
        project.deployments.push(deployment);
        logWarn("deploy.failed", {
          projectId: project.id,
          scriptName,
          category: error.category,
          statusCode: error.statusCode
        });
      }
      throw error;
    }
  }

  /** Redeploys the Version behind the live deployment that preceded the current one. */
  async rollback(input: { project: Project; environment: DeploymentEnvironment; signal?: AbortSignal }): Promise<Deployment> {
    const live = input.project.deployments.filter(
      (deployment) => deployment.environment === input.environment && deployment.status === "live"
    );
    const current = live[live.length - 1];
    const previous = current
      ? [...live].reverse().find((deployment) => deployment.versionId !== current.versionId)
      : undefined;

    if (!previous) {
      throw new DeploymentPreconditionError(`No earlier live ${input.environment} deployment to roll back to.`);
    }

    return this.deploy({
      project: input.project,
      environment: input.environment,
      versionId: previous.versionId,
      signal: input.signal
    });
  }

  private resolveVersion(project: Project, versionId: string | undefined): Version {
    const version = versionId
      ? project.versions.find((entry) => entry.id === versionId)
      : project.versions[project.versions.length - 1];

    if (!version) {
      throw new DeploymentPreconditionError(
        versionId ? `Version '${versionId}' does not exist.` : "Project has no successfully built version."
      );
    }

    return version;
  }

  private async checkPreconditions(project: Project, version: Version): Promise<BuildArtifact> {
    const attempt = project.buildAttempts.find((entry) => entry.id === version.buildAttemptId);
    if (!attempt || attempt.outcome !== "succeeded" || attempt.versionId !== version.id) {
      throw new DeploymentPreconditionError(`Version ${version.number} has no successful build attempt.`);
    }

    const sameRevision = project.buildAttempts.filter((entry) => entry.fileRevision === version.fileRevision);
    const latest = sameRevision[sameRevision.length - 1];
    if (latest && latest.outcome !== "succeeded") {
      throw new DeploymentPreconditionError(
        `The most recent build of version ${version.number}'s files did not succeed.`
      );
    }

    const artifact = await this.repository.getArtifact(project.id, version.id);
    if (!artifact) {
      throw new DeploymentPreconditionError(`Build artifact for version ${version.number} is not retained.`);
    }

    return artifact;
  }

  private async offloadAssets(
    files: ArtifactFile[],
    deployment: Deployment,
    signal: AbortSignal | undefined
  ): Promise<Record<string, string>> {
    const urls: Record<string, string> = {};
    if (!files.length || !this.storage) {
      return urls;
    }

    for (const file of files) {
      throwIfAborted(signal);
      const stored = await this.storage.put({
        key: contentAddressedKey(file.path, file.bytes),
        bytes: file.bytes,
        contentType: file.contentType,
        signal
      });
      urls[file.path] = stored.url;
      deployment.assetManifest[file.path] = stored.key;
    }

    logInfo("deploy.assets.offloaded", { scriptName: deployment.scriptName, files: files.length });
    return urls;
  }

  private bindingsFor(project: Project, version: Version, environment: DeploymentEnvironment): PlainTextBinding[] {
    return [
      { name: "APP_ENVIRONMENT", text: environment },
      { name: "APP_PROJECT_ID", text: project.id },
      { name: "APP_VERSION", text: String(version.number) }
    ];
  }
}
