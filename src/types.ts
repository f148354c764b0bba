export type ProjectStatus = "planning" | "generating" | "healing" | "deploying" | "ready" | "failed";

export type ChatRole = "user" | "agent" | "tool";
export type ChatTurnStatus = "pending" | "executing" | "completed" | "failed";
export type ChatTurnPurpose = "generation" | "repair";

export type ToolName = "write-file" | "patch-file" | "delete-file" | "rename-file" | "run-build" | "finish";

export type ToolErrorCode = "tool_validation" | "patch_conflict" | "not_found" | "skipped" | "internal";

export type BuildMode = "preview" | "production";
export type BuildTrigger = "model" | "healing";
export type BuildOutcome = "succeeded" | "failed" | "cancelled";
export type DiagnosticSeverity = "error" | "warning";

export type FailureCategory = "type-check" | "missing-dependency" | "syntax" | "unclassified";
export type RepairStrategy =
  | "synthesize-types"
  | "relax-check"
  | "add-dependency"
  | "regenerate-file"
  | "model-repair";

export type DeploymentEnvironment = "preview" | "production";
export type DeploymentStatus = "live" | "unreachable" | "failed";
export type DeploymentFailureCategory = "auth-failure" | "quota-exceeded" | "script-rejected" | "network-error";

export interface ProjectFile {
  path: string;
  content: string;
  contentHash: string;
  /** File-store revision at which this path was last written. */
  lastModifiedRevision: number;
}

export interface ToolCallResult {
  ok: boolean;
  message: string;
  errorCode?: ToolErrorCode;
  data?: Record<string, unknown>;
}

export interface ToolCall {
  readonly id: string;
  /** Operation name as issued by the model; unknown names are recorded with a validation failure. */
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly result: Readonly<ToolCallResult>;
  readonly executedAt: string;
}

export interface ChatTurn {
  id: string;
  index: number;
  role: ChatRole;
  purpose: ChatTurnPurpose;
  status: ChatTurnStatus;
  commentary: string;
  toolCalls: ToolCall[];
  errorMessage: string | null;
  startedAt: string;
  finishedAt: string | null;
}

export interface VersionFile {
  readonly path: string;
  readonly content: string;
  readonly contentHash: string;
}

export interface Version {
  readonly id: string;
  readonly number: number;
  readonly buildAttemptId: string;
  readonly fileRevision: number;
  readonly files: readonly VersionFile[];
  readonly createdAt: string;
}

export interface BuildDiagnostic {
  file?: string;
  line?: number;
  column?: number;
  message: string;
  severity: DiagnosticSeverity;
  code?: string;
}

export interface RepairRecord {
  applied: boolean;
  summary: string;
  changedPaths: string[];
  /** Files that received `// @ts-nocheck` or configs whose strictness was lowered. */
  relaxedPaths: string[];
}

export interface BuildAttempt {
  id: string;
  sessionId: string;
  attempt: number;
  trigger: BuildTrigger;
  mode: BuildMode;
  fileRevision: number;
  outcome: BuildOutcome;
  diagnostics: BuildDiagnostic[];
  rawOutput: string;
  category: FailureCategory | null;
  strategy: RepairStrategy | null;
  repair: RepairRecord | null;
  versionId: string | null;
  startedAt: string;
  finishedAt: string;
}

export interface LivenessResult {
  ok: boolean;
  attempts: number;
  statusCode: number | null;
  error: string | null;
  checkedAt: string;
}

export interface DeploymentFailure {
  category: DeploymentFailureCategory;
  statusCode: number | null;
  body: string;
  message: string;
}

export interface Deployment {
  id: string;
  versionId: string;
  environment: DeploymentEnvironment;
  scriptName: string;
  hostname: string | null;
  url: string | null;
  assetManifest: Record<string, string>;
  liveness: LivenessResult | null;
  status: DeploymentStatus;
  failure: DeploymentFailure | null;
  createdAt: string;
}

export type SessionOutcome = "running" | "completed" | "failed" | "aborted";

export interface GenerationSessionRecord {
  id: string;
  instruction: string;
  outcome: SessionOutcome;
  turnCount: number;
  buildAttemptCount: number;
  versionId: string | null;
  errorCode: string | null;
  errorMessage: string | null;
  startedAt: string;
  finishedAt: string | null;
}

export interface Project {
  id: string;
  name: string;
  slug: string;
  status: ProjectStatus;
  fileRevision: number;
  files: ProjectFile[];
  versions: Version[];
  turns: ChatTurn[];
  buildAttempts: BuildAttempt[];
  deployments: Deployment[];
  sessions: GenerationSessionRecord[];
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ArtifactFile {
  path: string;
  contentType: string;
  bytes: Buffer;
}

export interface BuildArtifact {
  files: ArtifactFile[];
  /** Path of the entry document inside the artifact, usually `index.html`. */
  entry: string;
}
