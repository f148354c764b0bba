import { ZodError } from "zod";
import { ToolValidationError, isShipwrightError } from "../lib/errors.js";
import { logWarn, serializeError } from "../lib/logging.js";
import type { ToolCall, ToolCallResult, ToolErrorCode, ToolName } from "../types.js";
import { isPathWithinPrefixes, normalizeProjectPath } from "./fs/path-policy.js";
import { ControlSignal, ToolContext, ToolRegistry, isToolName } from "./tools/index.js";

export interface ToolInvocation {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** Narrows what a repair turn may touch. */
export interface ToolConstraint {
  allowedTools?: readonly ToolName[];
  /** Exact paths or prefixes ending in `/`. Empty means any path. */
  allowedPathPrefixes?: readonly string[];
}

export interface ExecutedToolCall {
  call: ToolCall;
  control: ControlSignal | null;
}

function freezeCall(invocation: ToolInvocation, result: ToolCallResult): ToolCall {
  return Object.freeze({
    id: invocation.id,
    name: invocation.name,
    arguments: Object.freeze({ ...invocation.arguments }),
    result: Object.freeze({ ...result }),
    executedAt: new Date().toISOString()
  });
}

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

function errorCodeFor(error: unknown): ToolErrorCode {
  if (isShipwrightError(error)) {
    if (error.code === "tool_validation" || error.code === "patch_conflict" || error.code === "not_found") {
      return error.code;
    }
  }
  return "internal";
}

export class ToolExecutor {
  constructor(private readonly tools: ToolRegistry) {}

  /**
   * Runs one model-issued call against the file store. Recoverable failures
   * become a failed result on the recorded call; fatal errors propagate.
   */
  async execute(invocation: ToolInvocation, context: ToolContext, constraint?: ToolConstraint): Promise<ExecutedToolCall> {
    try {
      if (!isToolName(invocation.name)) {
        throw new ToolValidationError(`Unknown operation '${invocation.name}'.`);
      }

      if (constraint?.allowedTools && !constraint.allowedTools.includes(invocation.name)) {
        throw new ToolValidationError(`Operation '${invocation.name}' is not allowed here.`);
      }

      const tool = this.tools.get(invocation.name);
      const parsed = tool.inputSchema.parse(invocation.arguments);
      const prefixes = constraint?.allowedPathPrefixes ?? [];

      for (const target of tool.targetPaths(parsed)) {
        const normalized = normalizeProjectPath(target);
        if (!isPathWithinPrefixes(normalized, prefixes)) {
          throw new ToolValidationError(`Path '${normalized}' is outside the files this repair may change.`);
        }
      }

      const effect = await tool.execute(parsed, context);

      return {
        call: freezeCall(invocation, {
          ok: effect.ok ?? true,
          message: effect.message,
          ...(effect.data ? { data: effect.data } : {})
        }),
        control: effect.control ?? null
      };
    } catch (error) {
      if (isShipwrightError(error) && error.fatal) {
        throw error;
      }

      const normalized =
        error instanceof ZodError ? new ToolValidationError("Invalid arguments.", formatZodIssues(error)) : error;
      const errorCode = errorCodeFor(normalized);

      if (errorCode === "internal") {
        logWarn("tool.internal_error", { tool: invocation.name, ...serializeError(normalized) });
      }

      return {
        call: freezeCall(invocation, {
          ok: false,
          errorCode,
          message: normalized instanceof Error ? normalized.message : "Tool execution failed."
        }),
        control: null
      };
    }
  }

  /** Records a call that was never executed, e.g. one issued after `finish`. */
  skip(invocation: ToolInvocation, reason: string): ToolCall {
    return freezeCall(invocation, { ok: false, errorCode: "skipped", message: reason });
  }
}
