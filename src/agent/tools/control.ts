import { z } from "zod";
import { ToolValidationError } from "../../lib/errors.js";
import type { AgentTool } from "./index.js";

const runBuildInputSchema = z.object({
  mode: z.enum(["preview", "production"]).default("preview")
});

const finishInputSchema = z.object({
  summary: z.string().max(4_000).default("")
});

export const runBuildTool: AgentTool<z.infer<typeof runBuildInputSchema>> = {
  name: "run-build",
  description: "Build the current project files and report diagnostics.",
  inputSchema: runBuildInputSchema,
  parameters: {
    type: "object",
    properties: {
      mode: { type: "string", enum: ["preview", "production"] }
    },
    required: [],
    additionalProperties: false
  },
  targetPaths() {
    return [];
  },
  async execute(input, context) {
    if (!context.runBuild) {
      throw new ToolValidationError("run-build is not available in this turn.");
    }

    const effect = await context.runBuild(input.mode);
    return { ...effect, control: { type: "run-build", mode: input.mode } };
  }
};

export const finishTool: AgentTool<z.infer<typeof finishInputSchema>> = {
  name: "finish",
  description: "Signal that the requested change is complete.",
  inputSchema: finishInputSchema,
  parameters: {
    type: "object",
    properties: {
      summary: { type: "string", description: "One or two sentences on what changed." }
    },
    required: [],
    additionalProperties: false
  },
  targetPaths() {
    return [];
  },
  async execute(input) {
    return {
      message: "Finished.",
      control: { type: "finish", summary: input.summary }
    };
  }
};
