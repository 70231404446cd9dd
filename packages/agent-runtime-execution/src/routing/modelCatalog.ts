/**
 * Model Catalog
 *
 * Known models with their per-million-token prices, and the default
 * complexity × agent-type routing table.
 */

import type { AgentType, ModelConfig, TaskComplexity } from "@steward/agent-runtime-core";

export const MODEL_CATALOG = {
  opus: {
    provider: "anthropic",
    model: "claude-opus",
    costPerMillionInput: 15,
    costPerMillionOutput: 75,
    contextWindow: 200_000,
  },
  sonnet: {
    provider: "anthropic",
    model: "claude-sonnet",
    costPerMillionInput: 3,
    costPerMillionOutput: 15,
    contextWindow: 200_000,
  },
  haiku: {
    provider: "anthropic",
    model: "claude-haiku",
    costPerMillionInput: 0.25,
    costPerMillionOutput: 1.25,
    contextWindow: 200_000,
  },
  "gpt-4o": {
    provider: "openai",
    model: "gpt-4o",
    costPerMillionInput: 2.5,
    costPerMillionOutput: 10,
    contextWindow: 128_000,
  },
} as const satisfies Record<string, ModelConfig>;

export type CatalogModelName = keyof typeof MODEL_CATALOG;

export type RoutingTable = Partial<Record<AgentType, Partial<Record<TaskComplexity, ModelConfig>>>>;

const { opus, sonnet, haiku } = MODEL_CATALOG;

/**
 * Research subagents always take the cheap model; primary agents scale with
 * complexity.
 */
export const DEFAULT_ROUTING_TABLE: RoutingTable = {
  explorer: { low: haiku, medium: sonnet, high: opus },
  builder: { low: sonnet, medium: sonnet, high: opus },
  debugger: { low: sonnet, medium: opus, high: opus },
  refactorer: { low: sonnet, medium: sonnet, high: opus },
  file_searcher: { low: haiku, medium: haiku, high: haiku },
  pattern_finder: { low: haiku, medium: haiku, high: haiku },
  dependency_mapper: { low: haiku, medium: haiku, high: haiku },
};

export const DEFAULT_MODEL: ModelConfig = sonnet;

/** Baseline for cost savings: the most expensive model. */
export const BASELINE_MODEL: ModelConfig = opus;

/** Look a model up by catalog name, `provider/model` or bare model id. */
export function findModel(name: string): ModelConfig | undefined {
  const entries: Array<[string, ModelConfig]> = Object.entries(MODEL_CATALOG);
  const match = entries.find(
    ([key, model]) => key === name || `${model.provider}/${model.model}` === name || model.model === name
  );
  return match?.[1];
}

export function estimateCost(model: ModelConfig, inputTokens: number, outputTokens: number): number {
  return (
    (inputTokens / 1_000_000) * model.costPerMillionInput +
    (outputTokens / 1_000_000) * model.costPerMillionOutput
  );
}
