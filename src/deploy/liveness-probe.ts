import { scopedSignal, sleep } from "../lib/abort.js";
import { SessionAbortedError } from "../lib/errors.js";
import { logDebug } from "../lib/logging.js";
import type { LivenessResult } from "../types.js";
import type { FetchLike } from "./types.js";

export interface LivenessProbeOptions {
  attempts: number;
  initialDelayMs: number;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Up to `attempts` GETs, waiting initialDelayMs, 2×, 4×… between them.
 * Any 2xx or 3xx counts as live; redirects are not followed.
 */
export async function probeLiveness(url: string, options: LivenessProbeOptions, signal?: AbortSignal): Promise<LivenessResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let statusCode: number | null = null;
  let lastError: string | null = null;

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    const scope = scopedSignal(signal, options.timeoutMs);

    try {
      const response = await fetchImpl(url, { method: "GET", redirect: "manual", signal: scope.signal });
      statusCode = response.status;
      await response.body?.cancel();

      if (response.status >= 200 && response.status < 400) {
        return { ok: true, attempts: attempt, statusCode, error: null, checkedAt: new Date().toISOString() };
      }
      lastError = `HTTP ${response.status}`;
    } catch (error) {
      if (signal?.aborted) {
        throw new SessionAbortedError();
      }
      statusCode = null;
      lastError = scope.timedOut()
        ? `timed out after ${options.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
    } finally {
      scope.dispose();
    }

    logDebug("deploy.liveness.retry", { url, attempt, error: lastError });

    if (attempt < options.attempts) {
      await sleep(options.initialDelayMs * 2 ** (attempt - 1), signal);
    }
  }

  return {
    ok: false,
    attempts: options.attempts,
    statusCode,
    error: lastError,
    checkedAt: new Date().toISOString()
  };
}
