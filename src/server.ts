import "dotenv/config";
import type { Server as HttpServer } from "node:http";
import { BuildService } from "./agent/build/build-service.js";
import { CommandBundler, splitCommandLine } from "./agent/build/command-bundler.js";
import { GenerationPipeline } from "./agent/pipeline.js";
import { createApp } from "./app.js";
import { DeploymentService } from "./deploy/deployment-service.js";
import { EdgePlatformClient } from "./deploy/edge-platform-client.js";
import { ObjectStorageClient } from "./deploy/object-storage-client.js";
import { loadConfig } from "./lib/config.js";
import { configureLogging, logError, logInfo, serializeError } from "./lib/logging.js";
import { InMemoryProjectRepository, PostgresProjectRepository, ProjectRepository } from "./lib/project-store.js";
import { ProviderRegistry } from "./lib/providers.js";

const config = loadConfig();
configureLogging({ level: config.logLevel });

const postgres = config.databaseUrl ? new PostgresProjectRepository({ databaseUrl: config.databaseUrl }) : null;
const repository: ProjectRepository = postgres ?? new InMemoryProjectRepository();

const providers = new ProviderRegistry(config.providers, config.provider.id);

const bundler = new CommandBundler({
  workDir: config.bundler.workDir,
  buildCommand: splitCommandLine(config.bundler.command),
  installCommand: config.bundler.installCommand ? splitCommandLine(config.bundler.installCommand) : null,
  outDir: config.bundler.outDir
});

const edge =
  config.deploy.accountId && config.deploy.apiToken
    ? new EdgePlatformClient({
        apiBaseUrl: config.deploy.edgeApiBaseUrl,
        accountId: config.deploy.accountId,
        apiToken: config.deploy.apiToken,
        zoneId: config.deploy.zoneId,
        compatibilityDate: config.deploy.compatibilityDate,
        requestTimeoutMs: config.deploy.requestTimeoutMs
      })
    : null;

const storage =
  config.deploy.storageBaseUrl && config.deploy.storagePublicUrl
    ? new ObjectStorageClient({
        baseUrl: config.deploy.storageBaseUrl,
        publicUrl: config.deploy.storagePublicUrl,
        bucket: config.deploy.storageBucket,
        apiToken: config.deploy.storageApiToken,
        requestTimeoutMs: config.deploy.requestTimeoutMs
      })
    : null;

const pipeline = new GenerationPipeline(
  {
    repository,
    model: providers.get(),
    buildService: new BuildService(bundler, { timeoutMs: config.bundler.timeoutMs }),
    deployments: new DeploymentService(edge, storage, repository, {
      baseDomain: config.deploy.baseDomain,
      assetOffloadThresholdBytes: config.deploy.assetOffloadThresholdBytes,
      maxScriptBytes: config.deploy.maxScriptBytes,
      liveness: config.deploy.liveness
    })
  },
  {
    orchestrator: config.orchestrator,
    healing: config.healing
  }
);

const app = createApp({ pipeline });
const shutdownGraceMs = 10_000;
let httpServer: HttpServer | null = null;
let shutdownPromise: Promise<void> | null = null;

async function main(): Promise<void> {
  await postgres?.initialize();

  httpServer = await new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(config.port, () => resolve(server));
    server.once("error", reject);
  });

  logInfo("server.started", {
    port: config.port,
    provider: config.provider.id,
    storage: postgres ? "postgres" : "memory",
    edge: Boolean(edge),
    objectStorage: Boolean(storage)
  });
}

function closeHttpServer(server: HttpServer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shutdownPromise) {
    await shutdownPromise;
    return;
  }

  shutdownPromise = (async () => {
    const startedAt = Date.now();
    logInfo("server.shutdown_started", { signal, graceMs: shutdownGraceMs });

    const forceExitTimer = setTimeout(() => {
      logError("server.shutdown_timeout", { signal, graceMs: shutdownGraceMs });
      process.exit(1);
    }, shutdownGraceMs);
    forceExitTimer.unref();

    try {
      if (httpServer) {
        httpServer.closeIdleConnections();
        await closeHttpServer(httpServer);
      }
      await postgres?.close();

      logInfo("server.shutdown_complete", { signal, durationMs: Date.now() - startedAt });
      process.exit(0);
    } catch (error) {
      logError("server.shutdown_failed", { signal, durationMs: Date.now() - startedAt, ...serializeError(error) });
      process.exit(1);
    } finally {
      clearTimeout(forceExitTimer);
    }
  })();

  await shutdownPromise;
}

process.once("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.once("SIGINT", () => {
  void shutdown("SIGINT");
});

main().catch(async (error: unknown) => {
  logError("server.start_failed", { ...serializeError(error) });

  try {
    await postgres?.close();
  } catch (closeError) {
    logError("server.start_failed_cleanup", { ...serializeError(closeError) });
  }

  process.exit(1);
});
