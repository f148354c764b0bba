import { logInfo } from "../lib/logging.js";
import { requestOrFail } from "./http-failure.js";
import type { EdgePlatform, FetchLike, RouteBinding, ScriptUpload } from "./types.js";

export const WORKER_MAIN_MODULE = "worker.js";

export interface EdgePlatformClientOptions {
  apiBaseUrl: string;
  accountId: string;
  apiToken: string;
  zoneId: string | null;
  compatibilityDate: string;
  requestTimeoutMs: number;
  fetchImpl?: FetchLike;
}

/** Client for a Workers-style scripts API (`/accounts/:id/workers/...`). */
export class EdgePlatformClient implements EdgePlatform {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: EdgePlatformClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private url(pathname: string): string {
    return `${this.options.apiBaseUrl.replace(/\/$/, "")}/accounts/${encodeURIComponent(this.options.accountId)}${pathname}`;
  }

  async uploadScript(upload: ScriptUpload): Promise<void> {
    const metadata = {
      main_module: WORKER_MAIN_MODULE,
      compatibility_date: this.options.compatibilityDate,
      bindings: upload.bindings.map((binding) => ({ type: "plain_text", name: binding.name, text: binding.text }))
    };

    const form = new FormData();
    form.append("metadata", new Blob([JSON.stringify(metadata)], { type: "application/json" }));
    form.append(
      WORKER_MAIN_MODULE,
      new Blob([upload.module], { type: "application/javascript+module" }),
      WORKER_MAIN_MODULE
    );

    await requestOrFail({
      fetchImpl: this.fetchImpl,
      url: this.url(`/workers/scripts/${encodeURIComponent(upload.scriptName)}`),
      init: {
        method: "PUT",
        headers: { Authorization: `Bearer ${this.options.apiToken}` },
        body: form
      },
      operation: `upload script ${upload.scriptName}`,
      timeoutMs: this.options.requestTimeoutMs,
      signal: upload.signal
    });

    logInfo("deploy.script.uploaded", {
      scriptName: upload.scriptName,
      bytes: Buffer.byteLength(upload.module, "utf8"),
      bindings: upload.bindings.length
    });
  }

  async bindRoute(route: RouteBinding): Promise<void> {
    await requestOrFail({
      fetchImpl: this.fetchImpl,
      url: this.url("/workers/domains"),
      init: {
        method: "PUT",
        headers: {
          Authorization: `Bearer ${this.options.apiToken}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          hostname: route.hostname,
          service: route.scriptName,
          environment: "production",
          ...(this.options.zoneId ? { zone_id: this.options.zoneId } : {})
        })
      },
      operation: `bind ${route.hostname}`,
      timeoutMs: this.options.requestTimeoutMs,
      signal: route.signal
    });

    logInfo("deploy.route.bound", { scriptName: route.scriptName, hostname: route.hostname });
  }
}
