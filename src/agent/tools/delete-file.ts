import { z } from "zod";
import { normalizeProjectPath } from "../fs/path-policy.js";
import type { AgentTool } from "./index.js";
import { projectPathSchema } from "./schemas.js";

const deleteFileInputSchema = z.object({
  path: projectPathSchema
});

export const deleteFileTool: AgentTool<z.infer<typeof deleteFileInputSchema>> = {
  name: "delete-file",
  description: "Delete an existing file.",
  inputSchema: deleteFileInputSchema,
  parameters: {
    type: "object",
    properties: {
      path: { type: "string" }
    },
    required: ["path"],
    additionalProperties: false
  },
  targetPaths(input) {
    return [input.path];
  },
  async execute(input, context) {
    const target = normalizeProjectPath(input.path);
    const applied = context.store.apply([{ type: "delete", path: target }]);

    return {
      message: `Deleted ${target}.`,
      data: { path: target, revision: applied.revision }
    };
  }
};
