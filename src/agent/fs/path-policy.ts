import path from "node:path";
import { ToolValidationError } from "../../lib/errors.js";

export const MAX_PATH_LENGTH = 240;

/**
 * Canonical project-relative form of a model-supplied path. Throws
 * ToolValidationError for empty, absolute or root-escaping paths.
 */
export function normalizeProjectPath(raw: string): string {
  const trimmed = raw.trim().replaceAll("\\", "/");

  if (!trimmed) {
    throw new ToolValidationError("Path must not be empty.");
  }

  if (trimmed.includes("\u0000")) {
    throw new ToolValidationError(`Path '${raw}' contains a NUL byte.`);
  }

  if (trimmed.startsWith("/") || /^[a-zA-Z]:/.test(trimmed)) {
    throw new ToolValidationError(`Path '${raw}' must be relative to the project root.`);
  }

  const normalized = path.posix.normalize(trimmed).replace(/^(\.\/)+/, "").replace(/\/+$/, "");

  if (!normalized || normalized === ".") {
    throw new ToolValidationError(`Path '${raw}' does not name a file.`);
  }

  if (normalized === ".." || normalized.startsWith("../")) {
    throw new ToolValidationError(`Path '${raw}' escapes the project root.`);
  }

  if (normalized.length > MAX_PATH_LENGTH) {
    throw new ToolValidationError(`Path '${raw}' exceeds ${MAX_PATH_LENGTH} characters.`);
  }

  return normalized;
}

/** Entries ending in `/` admit everything below them; any other entry admits that exact path. */
export function isPathWithinPrefixes(pathValue: string, prefixes: readonly string[]): boolean {
  if (!prefixes.length) {
    return true;
  }

  return prefixes.some((prefix) => (prefix.endsWith("/") ? pathValue.startsWith(prefix) : pathValue === prefix));
}
