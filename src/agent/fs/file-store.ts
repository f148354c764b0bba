import { NotFoundError, PatchConflictError, ToolValidationError } from "../../lib/errors.js";
import { compareNormalizedPaths } from "../../lib/fs-utils.js";
import type { ProjectFile } from "../../types.js";
import { normalizeProjectPath } from "./path-policy.js";
import {
  AppliedMutation,
  FileDigestEntry,
  FileMutation,
  FileSnapshot,
  FileStoreState,
  contentHash
} from "./types.js";

interface WorkingEntry {
  content: string;
  contentHash: string;
  lastModifiedRevision: number;
}

/** A file path may not also be a directory of another file, and vice versa. */
function assertNoDirectoryCollision(working: ReadonlyMap<string, WorkingEntry>, target: string): void {
  const segments = target.split("/");
  for (let depth = 1; depth < segments.length; depth += 1) {
    const ancestor = segments.slice(0, depth).join("/");
    if (working.has(ancestor)) {
      throw new ToolValidationError(`Cannot create '${target}': '${ancestor}' is a file.`);
    }
  }

  const prefix = `${target}/`;
  for (const existing of working.keys()) {
    if (existing.startsWith(prefix)) {
      throw new ToolValidationError(`Cannot create '${target}': it is a directory containing '${existing}'.`);
    }
  }
}

/**
 * Versioned path → content map over the project's own `files` array. Every
 * `apply` is all-or-nothing and bumps the revision once.
 */
export class FileStore {
  constructor(private readonly state: FileStoreState) {}

  get revision(): number {
    return this.state.fileRevision;
  }

  list(): readonly ProjectFile[] {
    return this.state.files;
  }

  has(relativePath: string): boolean {
    return this.read(relativePath) !== null;
  }

  read(relativePath: string): ProjectFile | null {
    const normalized = normalizeProjectPath(relativePath);
    return this.state.files.find((file) => file.path === normalized) ?? null;
  }

  snapshot(): FileSnapshot {
    const files = this.state.files.map((file) =>
      Object.freeze({ path: file.path, content: file.content, contentHash: file.contentHash })
    );

    return Object.freeze({
      revision: this.state.fileRevision,
      files: Object.freeze(files)
    });
  }

  digest(headLength = 240): FileDigestEntry[] {
    return this.state.files.map((file) => ({
      path: file.path,
      bytes: Buffer.byteLength(file.content, "utf8"),
      contentHash: file.contentHash,
      head: file.content.slice(0, headLength)
    }));
  }

  apply(mutations: FileMutation[]): AppliedMutation {
    if (mutations.length === 0) {
      throw new ToolValidationError("No file mutations to apply.");
    }

    const working = new Map<string, WorkingEntry>(
      this.state.files.map((file) => [
        file.path,
        { content: file.content, contentHash: file.contentHash, lastModifiedRevision: file.lastModifiedRevision }
      ])
    );
    const nextRevision = this.state.fileRevision + 1;
    const changed = new Set<string>();
    const removed = new Set<string>();

    for (const mutation of mutations) {
      if (mutation.type === "write") {
        const target = normalizeProjectPath(mutation.path);
        const existing = working.get(target);
        if (mutation.expectedHash !== undefined && existing?.contentHash !== mutation.expectedHash) {
          throw new PatchConflictError(target, "content changed since it was read.");
        }
        if (!existing) {
          assertNoDirectoryCollision(working, target);
        }
        working.set(target, {
          content: mutation.content,
          contentHash: contentHash(mutation.content),
          lastModifiedRevision: nextRevision
        });
        changed.add(target);
        removed.delete(target);
        continue;
      }

      if (mutation.type === "delete") {
        const target = normalizeProjectPath(mutation.path);
        const existing = working.get(target);
        if (!existing) {
          throw new NotFoundError(target);
        }
        if (mutation.expectedHash !== undefined && existing.contentHash !== mutation.expectedHash) {
          throw new PatchConflictError(target, "content changed since it was read.");
        }
        working.delete(target);
        changed.delete(target);
        removed.add(target);
        continue;
      }

      const from = normalizeProjectPath(mutation.from);
      const to = normalizeProjectPath(mutation.to);
      const source = working.get(from);
      if (!source) {
        throw new NotFoundError(from);
      }
      if (from === to) {
        throw new ToolValidationError(`Cannot rename '${from}' onto itself.`);
      }
      if (working.has(to)) {
        throw new ToolValidationError(`Cannot rename '${from}' to '${to}': target already exists.`);
      }
      working.delete(from);
      assertNoDirectoryCollision(working, to);
      working.set(to, { ...source, lastModifiedRevision: nextRevision });
      changed.delete(from);
      removed.add(from);
      changed.add(to);
      removed.delete(to);
    }

    this.state.files = Array.from(working.entries())
      .map(([filePath, entry]) => ({ path: filePath, ...entry }))
      .sort((left, right) => compareNormalizedPaths(left.path, right.path));
    this.state.fileRevision = nextRevision;

    return {
      revision: nextRevision,
      changedPaths: Array.from(changed),
      removedPaths: Array.from(removed)
    };
  }
}
