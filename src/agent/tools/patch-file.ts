import { z } from "zod";
import { NotFoundError, PatchConflictError } from "../../lib/errors.js";
import { normalizeProjectPath } from "../fs/path-policy.js";
import type { AgentTool } from "./index.js";
import { projectPathSchema } from "./schemas.js";

const patchFileInputSchema = z
  .object({
    path: projectPathSchema,
    search: z.string().min(1),
    replace: z.string(),
    firstLine: z.number().int().min(1).optional(),
    lastLine: z.number().int().min(1).optional()
  })
  .superRefine((value, ctx) => {
    const hasFirst = value.firstLine !== undefined;
    const hasLast = value.lastLine !== undefined;

    if (hasFirst !== hasLast) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Provide both firstLine and lastLine, or neither."
      });
      return;
    }

    if (value.firstLine !== undefined && value.lastLine !== undefined && value.lastLine < value.firstLine) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lastLine"],
        message: "lastLine must not be before firstLine."
      });
    }
  });

type PatchFileInput = z.infer<typeof patchFileInputSchema>;

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

function replaceLineRange(path: string, content: string, input: PatchFileInput, first: number, last: number): string {
  const lines = content.split("\n");

  if (last > lines.length) {
    throw new PatchConflictError(path, `lines ${first}-${last} are outside the file (${lines.length} lines).`);
  }

  const current = lines.slice(first - 1, last).join("\n");
  if (current !== input.search) {
    throw new PatchConflictError(path, `lines ${first}-${last} do not match the search text.`);
  }

  const replacement = input.replace === "" ? [] : [input.replace];
  return [...lines.slice(0, first - 1), ...replacement, ...lines.slice(last)].join("\n");
}

function replaceUniqueMatch(path: string, content: string, input: PatchFileInput): string {
  const matches = countOccurrences(content, input.search);

  if (matches === 0) {
    throw new PatchConflictError(path, "search text not found.");
  }
  if (matches > 1) {
    throw new PatchConflictError(path, `search text matches ${matches} times; narrow it with firstLine/lastLine.`);
  }

  const index = content.indexOf(input.search);
  return `${content.slice(0, index)}${input.replace}${content.slice(index + input.search.length)}`;
}

export const patchFileTool: AgentTool<PatchFileInput> = {
  name: "patch-file",
  description:
    "Replace one exact region of an existing file. Without line bounds the search text must occur exactly once; " +
    "with firstLine/lastLine (1-based, inclusive) those lines must equal the search text.",
  inputSchema: patchFileInputSchema,
  parameters: {
    type: "object",
    properties: {
      path: { type: "string" },
      search: { type: "string", description: "Exact text currently in the file." },
      replace: { type: "string", description: "Text that takes its place." },
      firstLine: { type: "integer", minimum: 1 },
      lastLine: { type: "integer", minimum: 1 }
    },
    required: ["path", "search", "replace"],
    additionalProperties: false
  },
  targetPaths(input) {
    return [input.path];
  },
  async execute(input, context) {
    const target = normalizeProjectPath(input.path);
    const file = context.store.read(target);

    if (!file) {
      throw new NotFoundError(target);
    }

    const next =
      input.firstLine !== undefined && input.lastLine !== undefined
        ? replaceLineRange(target, file.content, input, input.firstLine, input.lastLine)
        : replaceUniqueMatch(target, file.content, input);

    const applied = context.store.apply([
      { type: "write", path: target, content: next, expectedHash: file.contentHash }
    ]);

    return {
      message: `Patched ${target}.`,
      data: { path: target, revision: applied.revision }
    };
  }
};
