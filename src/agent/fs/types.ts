import { createHash } from "node:crypto";
import type { ProjectFile, VersionFile } from "../../types.js";

export type FileMutation =
  | { type: "write"; path: string; content: string; expectedHash?: string }
  | { type: "delete"; path: string; expectedHash?: string }
  | { type: "rename"; from: string; to: string };

/** Shape of the project fields the file store owns. A `Project` satisfies it. */
export interface FileStoreState {
  files: ProjectFile[];
  fileRevision: number;
}

export interface FileSnapshot {
  readonly revision: number;
  readonly files: readonly VersionFile[];
}

export interface AppliedMutation {
  revision: number;
  changedPaths: string[];
  removedPaths: string[];
}

export interface FileDigestEntry {
  path: string;
  bytes: number;
  contentHash: string;
  head: string;
}

export function contentHash(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}
