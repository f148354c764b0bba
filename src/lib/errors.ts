import type { BuildAttempt, DeploymentFailureCategory } from "../types.js";

export type ShipwrightErrorCode =
  | "protocol_violation"
  | "tool_validation"
  | "patch_conflict"
  | "not_found"
  | "project_not_found"
  | "turn_limit_exceeded"
  | "healing_exhausted"
  | "deployment_failure"
  | "deployment_precondition"
  | "session_busy"
  | "session_aborted";

export abstract class ShipwrightError extends Error {
  abstract readonly code: ShipwrightErrorCode;
  /** Fatal errors end the generation session and mark the project failed. */
  abstract readonly fatal: boolean;
}

export class ProtocolViolationError extends ShipwrightError {
  readonly code = "protocol_violation";
  readonly fatal = false;

  constructor(message: string) {
    super(message);
    this.name = "ProtocolViolationError";
  }
}

export class ToolValidationError extends ShipwrightError {
  readonly code = "tool_validation";
  readonly fatal = false;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message} ${issues.join("; ")}` : message);
    this.name = "ToolValidationError";
    this.issues = issues;
  }
}

export class PatchConflictError extends ShipwrightError {
  readonly code = "patch_conflict";
  readonly fatal = false;
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Patch conflict on '${path}': ${message}`);
    this.name = "PatchConflictError";
    this.path = path;
  }
}

export class NotFoundError extends ShipwrightError {
  readonly code = "not_found";
  readonly fatal = false;
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = "NotFoundError";
    this.path = path;
  }
}

export class ProjectNotFoundError extends ShipwrightError {
  readonly code = "project_not_found";
  readonly fatal = false;

  constructor(projectId: string) {
    super(`Project not found: ${projectId}`);
    this.name = "ProjectNotFoundError";
  }
}

export class TurnLimitExceededError extends ShipwrightError {
  readonly code = "turn_limit_exceeded";
  readonly fatal = true;
  readonly maxTurns: number;

  constructor(maxTurns: number) {
    super(`Model did not finish within ${maxTurns} turns.`);
    this.name = "TurnLimitExceededError";
    this.maxTurns = maxTurns;
  }
}

export interface HealingHistoryEntry {
  attempt: number;
  category: BuildAttempt["category"];
  strategy: BuildAttempt["strategy"];
  repairSummary: string | null;
  diagnostics: BuildAttempt["diagnostics"];
}

export class HealingExhaustedError extends ShipwrightError {
  readonly code = "healing_exhausted";
  readonly fatal = true;
  readonly history: HealingHistoryEntry[];

  constructor(maxAttempts: number, history: HealingHistoryEntry[]) {
    const strategies = history.map((entry) => `#${entry.attempt}:${entry.strategy ?? "none"}`).join(", ");
    super(`Build still failing after ${maxAttempts} attempts (strategies: ${strategies || "none"}).`);
    this.name = "HealingExhaustedError";
    this.history = history;
  }
}

export class DeploymentFailureError extends ShipwrightError {
  readonly code = "deployment_failure";
  readonly fatal: boolean;
  readonly category: DeploymentFailureCategory;
  readonly statusCode: number | null;
  readonly body: string;

  constructor(input: { category: DeploymentFailureCategory; message: string; statusCode?: number | null; body?: string }) {
    super(input.message);
    this.name = "DeploymentFailureError";
    this.category = input.category;
    this.statusCode = input.statusCode ?? null;
    this.body = input.body ?? "";
    this.fatal = input.category === "auth-failure";
  }
}

export class DeploymentPreconditionError extends ShipwrightError {
  readonly code = "deployment_precondition";
  readonly fatal = false;

  constructor(message: string) {
    super(message);
    this.name = "DeploymentPreconditionError";
  }
}

export class SessionBusyError extends ShipwrightError {
  readonly code = "session_busy";
  readonly fatal = false;

  constructor(projectId: string) {
    super(`Project '${projectId}' already has an active session.`);
    this.name = "SessionBusyError";
  }
}

export class SessionAbortedError extends ShipwrightError {
  readonly code = "session_aborted";
  readonly fatal = true;

  constructor(message = "Session aborted.") {
    super(message);
    this.name = "SessionAbortedError";
  }
}

export function isShipwrightError(error: unknown): error is ShipwrightError {
  return error instanceof ShipwrightError;
}
