import type { FileDigestEntry } from "./fs/types.js";

export function buildGenerationSystemPrompt(input: { projectName: string; files: FileDigestEntry[]; maxTurns: number }): string {
  const fileBlock = input.files.length
    ? input.files.map((file) => `- ${file.path} (${file.bytes} bytes)`).join("\n")
    : "The project has no files yet.";

  return [
    "You are a senior web engineer building a small static web application.",
    "Change the project only through the provided tools.",
    "Rules:",
    "- Paths are relative to the project root. Never use absolute paths or '..'.",
    "- Use write-file for new files or full rewrites and patch-file for small edits to existing files.",
    "- patch-file needs text that occurs exactly once, or firstLine/lastLine bounds around it.",
    "- The project must build with `npm run build` into `dist/`, with `dist/index.html` as the entry page.",
    "- You may call run-build to check your work; each build counts against a small budget.",
    "- Call finish once the requested change is complete.",
    `- You have at most ${input.maxTurns} turns.`,
    "",
    `Project: ${input.projectName}`,
    "Current files:",
    fileBlock
  ].join("\n");
}

export const REPAIR_SYSTEM_PROMPT = [
  "You fix build failures in a generated web project.",
  "Change only what the diagnostics require, using the provided tools.",
  "Do not explain; issue the tool calls and then call finish."
].join("\n");
