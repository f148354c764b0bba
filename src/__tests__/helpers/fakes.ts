import type { BundleRequest, BundleResult, Bundler } from "../../agent/build/types.js";
import type { ModelClient, ModelToolCall, ModelTurn, ModelTurnRequest } from "../../agent/turn-orchestrator.js";
import type { EdgePlatform, FetchLike, RouteBinding, ScriptUpload } from "../../deploy/types.js";
import type { Project } from "../../types.js";

export function newProject(overrides: Partial<Project> = {}): Project {
  const now = new Date().toISOString();
  return {
    id: "project-1",
    name: "Demo",
    slug: "demo-1234abcd",
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
    updatedAt: now,
    ...overrides
  };
}

export function successResult(html = "<h1>ok</h1>"): BundleResult {
  return {
    exitCode: 0,
    output: "built in 12ms",
    timedOut: false,
    artifact: {
      entry: "index.html",
      files: [{ path: "index.html", contentType: "text/html; charset=utf-8", bytes: Buffer.from(html) }]
    }
  };
}

export function failureResult(output: string, exitCode = 1): BundleResult {
  return { exitCode, output, timedOut: false, artifact: null };
}

type ScriptedBundle = BundleResult | ((request: BundleRequest) => BundleResult);

/** Replays queued results in order; succeeds once the queue is empty. */
export class FakeBundler implements Bundler {
  readonly requests: BundleRequest[] = [];

  constructor(private readonly queue: ScriptedBundle[] = []) {}

  async bundle(request: BundleRequest): Promise<BundleResult> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (!next) {
      return successResult();
    }
    return typeof next === "function" ? next(request) : next;
  }
}

let callCounter = 0;

export function toolCall(name: string, args: Record<string, unknown> = {}): ModelToolCall {
  callCounter += 1;
  return { id: `call_${callCounter}`, name, arguments: args };
}

export function turnOf(...toolCalls: ModelToolCall[]): ModelTurn {
  return { commentary: "", toolCalls };
}

type ScriptedTurn = ModelTurn | Error | ((request: ModelTurnRequest) => ModelTurn | Promise<ModelTurn>);

/** Model that replays scripted replies. Errors in the script are thrown. */
export class ScriptedModelClient implements ModelClient {
  readonly id = "scripted";
  readonly requests: ModelTurnRequest[] = [];

  constructor(private readonly script: ScriptedTurn[]) {}

  async requestTurn(request: ModelTurnRequest): Promise<ModelTurn> {
    this.requests.push(request);
    const next = this.script.shift();
    if (!next) {
      throw new Error("Scripted model has no replies left.");
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === "function" ? next(request) : next;
  }
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: RequestInit["body"];
}

/** fetch stand-in: every call is recorded and answered by `respond`. */
export function recordingFetch(respond: (request: RecordedRequest) => Response | Promise<Response>): {
  fetchImpl: FetchLike;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fetchImpl: FetchLike = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const request: RecordedRequest = {
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: init?.body
    };
    requests.push(request);
    return respond(request);
  };

  return { fetchImpl, requests };
}

/** Edge platform that records uploads and routes, or rejects every upload with `uploadError`. */
export class FakeEdge implements EdgePlatform {
  readonly uploads: ScriptUpload[] = [];
  readonly routes: RouteBinding[] = [];

  constructor(private readonly uploadError: Error | null = null) {}

  async uploadScript(upload: ScriptUpload): Promise<void> {
    if (this.uploadError) {
      throw this.uploadError;
    }
    this.uploads.push(upload);
  }

  async bindRoute(route: RouteBinding): Promise<void> {
    this.routes.push(route);
  }
}
