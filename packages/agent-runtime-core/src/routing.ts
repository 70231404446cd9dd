/**
 * Model Routing Types
 */

export type TaskComplexity = "low" | "medium" | "high";

export type AgentType =
  | "explorer"
  | "builder"
  | "debugger"
  | "refactorer"
  | "file_searcher"
  | "pattern_finder"
  | "dependency_mapper";

export interface ModelConfig {
  provider: string;
  model: string;
  /** USD per million input tokens */
  costPerMillionInput: number;
  /** USD per million output tokens */
  costPerMillionOutput: number;
  contextWindow: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cost: number;
  requestCount: number;
}

export interface ModelUsageStats {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  totalCost: number;
  requestCount: number;
  /** Keyed by `provider/model` */
  perModel: Record<string, ModelStats>;
}

export function modelKey(config: Pick<ModelConfig, "provider" | "model">): string {
  return `${config.provider}/${config.model}`;
}
