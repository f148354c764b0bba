import { scopedSignal } from "../lib/abort.js";
import { DeploymentFailureError, SessionAbortedError } from "../lib/errors.js";
import type { DeploymentFailureCategory } from "../types.js";
import type { FetchLike } from "./types.js";

const quotaBodyPattern = /quota|limit(?:s)? (?:exceeded|reached)|exceeded (?:the |your )?(?:\w+ )?limit|too many/i;

export function categorizeHttpFailure(statusCode: number, body: string): DeploymentFailureCategory {
  if (statusCode === 401 || statusCode === 403) {
    return "auth-failure";
  }
  if (statusCode === 429 || (statusCode < 500 && quotaBodyPattern.test(body))) {
    return "quota-exceeded";
  }
  if (statusCode >= 500) {
    return "network-error";
  }
  return "script-rejected";
}

/**
 * fetch under a per-call timeout linked to the session signal. Non-2xx
 * responses and transport errors become DeploymentFailureError.
 */
export async function requestOrFail(input: {
  fetchImpl: FetchLike;
  url: string;
  init: RequestInit;
  operation: string;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<Response> {
  const scope = scopedSignal(input.signal, input.timeoutMs);

  let response: Response;
  try {
    response = await input.fetchImpl(input.url, { ...input.init, signal: scope.signal });
  } catch (error) {
    if (input.signal?.aborted) {
      throw new SessionAbortedError();
    }
    const reason = scope.timedOut()
      ? `timed out after ${input.timeoutMs}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    throw new DeploymentFailureError({ category: "network-error", message: `${input.operation} failed: ${reason}` });
  } finally {
    scope.dispose();
  }

  if (!response.ok) {
    const body = (await response.text()).slice(0, 4_000);
    const category = categorizeHttpFailure(response.status, body);
    throw new DeploymentFailureError({
      category,
      statusCode: response.status,
      body,
      message: `${input.operation} failed with HTTP ${response.status} (${category}).`
    });
  }

  return response;
}
