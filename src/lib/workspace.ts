import path from "node:path";

export function resolveWorkspaceRoot(explicitRoot?: string): string {
  const raw = typeof explicitRoot === "string" ? explicitRoot.trim() : "";
  if (!raw) {
    return path.resolve(process.cwd(), ".shipwright");
  }

  if (!path.isAbsolute(raw)) {
    throw new Error(`SHIPWRIGHT_WORKSPACE_ROOT must be an absolute path. Received '${raw}'.`);
  }

  return path.resolve(raw);
}

function safeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9-_.]/g, "-").slice(0, 80) || "unnamed";
}

/** Directory a single build materializes its snapshot into. */
export function buildDirectoryPath(workDir: string, projectId: string, buildId: string): string {
  return path.join(workDir, safeSegment(projectId), safeSegment(buildId));
}
