import { spawn } from "node:child_process";
import path from "node:path";
import { ensureDir, readFilesRecursive, removeDir, safeResolvePath, writeTextFile } from "../../lib/fs-utils.js";
import { logDebug, logWarn } from "../../lib/logging.js";
import { buildDirectoryPath } from "../../lib/workspace.js";
import type { ArtifactFile, BuildMode } from "../../types.js";
import type { BundleRequest, BundleResult, Bundler } from "./types.js";

export interface CommandBundlerOptions {
  workDir: string;
  /** argv of the build command, e.g. `["npm", "run", "build"]`. */
  buildCommand: string[];
  installCommand: string[] | null;
  outDir: string;
  keepBuildDirectory?: boolean;
  env?: NodeJS.ProcessEnv;
}

interface CommandResult {
  exitCode: number;
  combined: string;
  timedOut: boolean;
  aborted: boolean;
}

const contentTypes: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".htm": "text/html; charset=utf-8",
  ".js": "application/javascript; charset=utf-8",
  ".mjs": "application/javascript; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".map": "application/json; charset=utf-8",
  ".txt": "text/plain; charset=utf-8",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".ico": "image/x-icon",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".wasm": "application/wasm"
};

export function contentTypeFor(filePath: string): string {
  return contentTypes[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/** Splits a configured command line into argv, honouring single and double quotes. */
export function splitCommandLine(value: string): string[] {
  const args: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null = null;

  while (true) {
    match = pattern.exec(value);
    if (!match) {
      break;
    }
    args.push(match[1] ?? match[2] ?? match[3]);
  }

  return args;
}

function truncateOutput(value: string, maxChars = 120_000): string {
  if (value.length <= maxChars) {
    return value;
  }
  return value.slice(value.length - maxChars);
}

function runCommand(input: {
  cwd: string;
  argv: string[];
  timeoutMs: number;
  signal: AbortSignal;
  env: NodeJS.ProcessEnv;
}): Promise<CommandResult> {
  const [command, ...args] = input.argv;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: input.cwd,
      env: input.env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let combined = `$ ${input.argv.join(" ")}\n`;
    let timedOut = false;
    let aborted = false;

    const append = (chunk: Buffer): void => {
      combined = truncateOutput(combined + chunk.toString("utf8"));
    };

    const terminate = (): void => {
      child.kill("SIGTERM");
      setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill("SIGKILL");
        }
      }, 1_000).unref();
    };

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };

    const timeout = setTimeout(() => {
      timedOut = true;
      terminate();
    }, input.timeoutMs);

    child.stdout.on("data", append);
    child.stderr.on("data", append);
    child.on("error", (error) => {
      clearTimeout(timeout);
      input.signal.removeEventListener("abort", onAbort);
      reject(error);
    });

    if (input.signal.aborted) {
      onAbort();
    } else {
      input.signal.addEventListener("abort", onAbort, { once: true });
    }

    child.on("close", (code) => {
      clearTimeout(timeout);
      input.signal.removeEventListener("abort", onAbort);
      resolve({
        exitCode: Number.isInteger(code) ? Number(code) : 1,
        combined: combined.trim(),
        timedOut,
        aborted
      });
    });
  });
}

function buildEnv(base: NodeJS.ProcessEnv, mode: BuildMode): NodeJS.ProcessEnv {
  return {
    ...base,
    SHIPWRIGHT_BUILD_MODE: mode,
    NODE_ENV: mode === "production" ? "production" : "development"
  };
}

/**
 * Materializes a file snapshot into a scratch directory and runs the
 * configured install and build commands there.
 */
export class CommandBundler implements Bundler {
  constructor(private readonly options: CommandBundlerOptions) {
    if (!options.buildCommand.length) {
      throw new Error("Bundler build command must not be empty.");
    }
  }

  async bundle(request: BundleRequest): Promise<BundleResult> {
    const root = buildDirectoryPath(this.options.workDir, request.projectId, request.buildId);
    const env = buildEnv(this.options.env ?? process.env, request.mode);
    const deadline = Date.now() + request.timeoutMs;

    await removeDir(root);
    await ensureDir(root);

    try {
      try {
        for (const file of request.files) {
          await writeTextFile(safeResolvePath(root, file.path), file.content);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logWarn("build.materialize.failed", { projectId: request.projectId, buildId: request.buildId, error: message });
        return {
          exitCode: 1,
          output: `Error: could not write project files: ${message}`,
          timedOut: false,
          artifact: null
        };
      }

      const logs: string[] = [];
      const commands = [this.options.installCommand, this.options.buildCommand].filter(
        (argv): argv is string[] => Array.isArray(argv) && argv.length > 0
      );

      for (const argv of commands) {
        const result = await runCommand({
          cwd: root,
          argv,
          timeoutMs: Math.max(1, deadline - Date.now()),
          signal: request.signal,
          env
        });
        logs.push(result.combined);

        if (result.aborted || result.timedOut || result.exitCode !== 0) {
          return {
            exitCode: result.exitCode,
            output: logs.join("\n"),
            timedOut: result.timedOut,
            artifact: null
          };
        }
      }

      const outRoot = safeResolvePath(root, this.options.outDir);
      const files: ArtifactFile[] = (await readFilesRecursive(outRoot)).map((entry) => ({
        path: entry.path,
        contentType: contentTypeFor(entry.path),
        bytes: entry.bytes
      }));

      logDebug("build.bundle.completed", { projectId: request.projectId, buildId: request.buildId, files: files.length });

      return {
        exitCode: 0,
        output: logs.join("\n"),
        timedOut: false,
        artifact: files.length
          ? { files, entry: files.some((file) => file.path === "index.html") ? "index.html" : files[0].path }
          : null
      };
    } finally {
      if (!this.options.keepBuildDirectory) {
        await removeDir(root);
      }
    }
  }
}
