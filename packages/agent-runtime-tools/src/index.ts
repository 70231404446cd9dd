/**
 * Agent Runtime Tools
 *
 * Tool registry, built-in tools and the research subagent scheduler.
 */

export { BaseTool } from "./tools/baseTool";
export {
  fileExists,
  listFiles,
  readFile,
  searchFiles,
} from "./tools/code/fileSystem";
export type {
  FileEntry,
  ListFilesOptions,
  ReadFileOptions,
  ReadFileResult,
  SearchMatch,
  SearchOptions,
} from "./tools/code/fileSystem";
export * from "./tools/core";
export { createToolRegistry, ToolRegistry } from "./tools/registry";
export type {
  IToolRegistry,
  ToolExecutor,
  ToolRegistryOptions,
  ToolStatusEntry,
} from "./tools/registry";
export {
  DEFAULT_RESEARCH_MAX_STEPS,
  decomposeQuery,
  extractSearchTerms,
  isListingQuery,
} from "./orchestrator/queryDecomposer";
export type { DecomposeOptions } from "./orchestrator/queryDecomposer";
export { createResearchRunner } from "./orchestrator/researchRunner";
export {
  createResearchScheduler,
  DEFAULT_MAX_CONCURRENT_RESEARCH,
  ResearchScheduler,
} from "./orchestrator/researchScheduler";
export type {
  ResearchRunContext,
  ResearchRunner,
  ResearchSchedulerConfig,
  ResearchSchedulerStats,
} from "./orchestrator/researchScheduler";
