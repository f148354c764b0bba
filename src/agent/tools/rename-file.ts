import { z } from "zod";
import { normalizeProjectPath } from "../fs/path-policy.js";
import type { AgentTool } from "./index.js";
import { projectPathSchema } from "./schemas.js";

const renameFileInputSchema = z.object({
  from: projectPathSchema,
  to: projectPathSchema
});

export const renameFileTool: AgentTool<z.infer<typeof renameFileInputSchema>> = {
  name: "rename-file",
  description: "Move a file to a new path. The target must not exist yet.",
  inputSchema: renameFileInputSchema,
  parameters: {
    type: "object",
    properties: {
      from: { type: "string" },
      to: { type: "string" }
    },
    required: ["from", "to"],
    additionalProperties: false
  },
  targetPaths(input) {
    return [input.from, input.to];
  },
  async execute(input, context) {
    const from = normalizeProjectPath(input.from);
    const to = normalizeProjectPath(input.to);
    const applied = context.store.apply([{ type: "rename", from, to }]);

    return {
      message: `Renamed ${from} to ${to}.`,
      data: { from, to, revision: applied.revision }
    };
  }
};
