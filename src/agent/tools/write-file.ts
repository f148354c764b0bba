import { Buffer } from "node:buffer";
import { z } from "zod";
import { normalizeProjectPath } from "../fs/path-policy.js";
import type { AgentTool } from "./index.js";
import { projectPathSchema } from "./schemas.js";

const writeFileInputSchema = z.object({
  path: projectPathSchema,
  content: z.string().max(1_500_000)
});

export const writeFileTool: AgentTool<z.infer<typeof writeFileInputSchema>> = {
  name: "write-file",
  description: "Create a UTF-8 text file or replace its whole content.",
  inputSchema: writeFileInputSchema,
  parameters: {
    type: "object",
    properties: {
      path: { type: "string", description: "Project-relative file path." },
      content: { type: "string", description: "Full new file content." }
    },
    required: ["path", "content"],
    additionalProperties: false
  },
  targetPaths(input) {
    return [input.path];
  },
  async execute(input, context) {
    const target = normalizeProjectPath(input.path);
    const existed = context.store.has(target);
    const applied = context.store.apply([{ type: "write", path: target, content: input.content }]);

    return {
      message: `${existed ? "Updated" : "Created"} ${target}.`,
      data: {
        path: target,
        bytes: Buffer.byteLength(input.content, "utf8"),
        revision: applied.revision
      }
    };
  }
};
