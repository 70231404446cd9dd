import type { ToolCapability } from "@steward/agent-runtime-core";
import type { ResearchScheduler } from "../../orchestrator/researchScheduler";
import { type IBashExecutor, RunCommandTool } from "./bash";
import { DeleteFileTool, EditFileTool, ListFilesTool, ReadFileTool, WriteFileTool } from "./file";
import { ResearchTool } from "./research";
import { SearchCodeTool } from "./search";

export * from "./bash";
export * from "./file";
export * from "./research";
export * from "./search";
export * from "./shellSyntax";

export interface CoreToolsOptions {
  /** Enables the research tool */
  scheduler?: ResearchScheduler;
  bashExecutor?: IBashExecutor;
  commandTimeoutMs?: number;
  /** Tool calls per research task */
  researchMaxSteps?: number;
}

/**
 * The built-in tool set: file access, search, shell and (with a scheduler) research.
 */
export function createCoreTools(options: CoreToolsOptions = {}): ToolCapability[] {
  const tools: ToolCapability[] = [
    new ReadFileTool(),
    new ListFilesTool(),
    new SearchCodeTool(),
    new WriteFileTool(),
    new EditFileTool(),
    new DeleteFileTool(),
    new RunCommandTool({
      executor: options.bashExecutor,
      defaultTimeoutMs: options.commandTimeoutMs,
    }),
  ];
  if (options.scheduler) {
    tools.push(new ResearchTool(options.scheduler, options.researchMaxSteps));
  }
  return tools;
}
