import { z } from "zod";
import type { BuildMode, ToolName } from "../../types.js";
import type { FileStore } from "../fs/file-store.js";
import { finishTool, runBuildTool } from "./control.js";
import { deleteFileTool } from "./delete-file.js";
import { patchFileTool } from "./patch-file.js";
import { renameFileTool } from "./rename-file.js";
import { writeFileTool } from "./write-file.js";

export type ControlSignal = { type: "run-build"; mode: BuildMode } | { type: "finish"; summary: string };

export interface ToolEffect {
  message: string;
  /** Set when the call failed without throwing, e.g. a build that produced diagnostics. */
  ok?: boolean;
  data?: Record<string, unknown>;
  control?: ControlSignal;
}

export interface ToolContext {
  store: FileStore;
  signal?: AbortSignal;
  /** Present only when the caller can run a build on the model's behalf. */
  runBuild?: (mode: BuildMode) => Promise<ToolEffect>;
}

/** JSON-schema object handed to the model as the function parameters. */
export interface ToolParameters {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  required: string[];
  additionalProperties: false;
}

export interface AgentTool<Input = unknown> {
  name: ToolName;
  description: string;
  inputSchema: z.ZodType<Input, z.ZodTypeDef, unknown>;
  parameters: ToolParameters;
  /** Project paths the call writes, used to enforce repair constraints. */
  targetPaths(input: Input): string[];
  execute(input: Input, context: ToolContext): Promise<ToolEffect>;
}

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  parameters: ToolParameters;
}

export const TOOL_NAMES: readonly ToolName[] = [
  "write-file",
  "patch-file",
  "delete-file",
  "rename-file",
  "run-build",
  "finish"
];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

export class ToolRegistry {
  constructor(private readonly tools: Record<ToolName, AgentTool>) {}

  describe(only?: readonly ToolName[]): ToolDescriptor[] {
    return TOOL_NAMES.filter((name) => !only || only.includes(name)).map((name) => ({
      name,
      description: this.tools[name].description,
      parameters: this.tools[name].parameters
    }));
  }

  get(name: ToolName): AgentTool {
    return this.tools[name];
  }
}

export function createDefaultToolRegistry(): ToolRegistry {
  return new ToolRegistry({
    "write-file": writeFileTool,
    "patch-file": patchFileTool,
    "delete-file": deleteFileTool,
    "rename-file": renameFileTool,
    "run-build": runBuildTool,
    finish: finishTool
  });
}
