/**
 * Model Router
 *
 * Selects a model per request from a complexity × agent-type table and keeps
 * cumulative usage and cost for the session. Usage updates are synchronous,
 * so concurrent callers can never lose an increment.
 */

import type { AgentEventBus } from "@steward/agent-runtime-control";
import {
  type AgentMode,
  type AgentType,
  type ModelConfig,
  type ModelStats,
  type ModelUsageStats,
  modelKey,
  type TaskComplexity,
  type TokenUsage,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";
import {
  BASELINE_MODEL,
  DEFAULT_MODEL,
  DEFAULT_ROUTING_TABLE,
  estimateCost,
  type RoutingTable,
} from "./modelCatalog";

// ============================================================================
// Types
// ============================================================================

export type ModelRoutingReason = "user_override" | "single_model" | "routing_table" | "default";

export interface ModelRoutingRequest {
  complexity: TaskComplexity;
  agentType: AgentType;
  /** Explicit user choice; wins over everything */
  override?: ModelConfig;
}

export interface ModelRoutingDecision {
  model: ModelConfig;
  complexity: TaskComplexity;
  agentType: AgentType;
  reason: ModelRoutingReason;
}

export type RoutingDecisionEmitter = (decision: ModelRoutingDecision) => void;

export interface ModelRouterConfig {
  routingTable?: RoutingTable;
  /** Used for combinations the table does not cover */
  defaultModel?: ModelConfig;
  /** Reference for cost savings */
  baselineModel?: ModelConfig;
  /** Route every request to this model */
  singleModel?: ModelConfig;
  /** Optional callback to emit routing decisions for observability */
  onRoutingDecision?: RoutingDecisionEmitter;
  eventBus?: AgentEventBus;
  logger?: RuntimeLogger;
}

export interface CostSavings {
  /** USD saved against running everything on the baseline model */
  savings: number;
  percent: number;
  baselineCost: number;
}

// ============================================================================
// Heuristics
// ============================================================================

const HIGH_COMPLEXITY_MARKERS = [
  "architecture",
  "design pattern",
  "complex",
  "algorithm",
  "optimize",
  "refactor entire",
];

const LOW_COMPLEXITY_MARKERS = ["simple", "basic", "trivial", "read", "list", "show"];

/** Long requests are treated as complex. */
const LONG_REQUEST_CHARS = 500;

export function estimateComplexity(text: string): TaskComplexity {
  const lower = text.toLowerCase();
  if (text.length > LONG_REQUEST_CHARS || HIGH_COMPLEXITY_MARKERS.some((m) => lower.includes(m))) {
    return "high";
  }
  if (LOW_COMPLEXITY_MARKERS.some((m) => lower.includes(m))) {
    return "low";
  }
  return "medium";
}

const DEBUG_MARKERS = ["fix", "bug", "debug", "error", "crash", "failing", "broken"];
const REFACTOR_MARKERS = ["refactor", "clean up", "rename", "restructure", "simplify"];
const EXPLORE_MARKERS = ["explain", "what does", "how does", "where is", "read", "show"];

/** Plan Mode always explores; Build Mode picks a specialist from the wording. */
export function resolveAgentType(mode: AgentMode, text: string): AgentType {
  if (mode === "plan") {
    return "explorer";
  }
  const lower = text.toLowerCase();
  if (DEBUG_MARKERS.some((m) => lower.includes(m))) {
    return "debugger";
  }
  if (REFACTOR_MARKERS.some((m) => lower.includes(m))) {
    return "refactorer";
  }
  if (EXPLORE_MARKERS.some((m) => lower.includes(m))) {
    return "explorer";
  }
  return "builder";
}

function emptyModelStats(): ModelStats {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0, cost: 0, requestCount: 0 };
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

// ============================================================================
// Router
// ============================================================================

export class ModelRouter {
  private readonly routingTable: RoutingTable;
  private readonly defaultModel: ModelConfig;
  private readonly baselineModel: ModelConfig;
  private singleModel?: ModelConfig;
  private readonly onRoutingDecision?: RoutingDecisionEmitter;
  private readonly eventBus?: AgentEventBus;
  private readonly logger: RuntimeLogger;
  private readonly stats: ModelUsageStats = {
    totalInputTokens: 0,
    totalOutputTokens: 0,
    totalTokens: 0,
    totalCost: 0,
    requestCount: 0,
    perModel: {},
  };

  constructor(config: ModelRouterConfig = {}) {
    this.routingTable = structuredClone(config.routingTable ?? DEFAULT_ROUTING_TABLE);
    this.defaultModel = config.defaultModel ?? DEFAULT_MODEL;
    this.baselineModel = config.baselineModel ?? BASELINE_MODEL;
    this.singleModel = config.singleModel;
    this.onRoutingDecision = config.onRoutingDecision;
    this.eventBus = config.eventBus;
    this.logger = config.logger ?? getLogger("model-router");
  }

  select(complexity: TaskComplexity, agentType: AgentType, override?: ModelConfig): ModelConfig {
    return this.resolve({ complexity, agentType, override }).model;
  }

  resolve(request: ModelRoutingRequest): ModelRoutingDecision {
    const { complexity, agentType, override } = request;
    const routed = this.routingTable[agentType]?.[complexity];

    let decision: ModelRoutingDecision;
    if (override) {
      decision = { model: override, complexity, agentType, reason: "user_override" };
    } else if (this.singleModel) {
      decision = { model: this.singleModel, complexity, agentType, reason: "single_model" };
    } else if (routed) {
      decision = { model: routed, complexity, agentType, reason: "routing_table" };
    } else {
      decision = { model: this.defaultModel, complexity, agentType, reason: "default" };
    }

    this.logger.debug("Selected model", {
      model: modelKey(decision.model),
      agentType,
      complexity,
      reason: decision.reason,
    });
    this.onRoutingDecision?.(decision);
    return decision;
  }

  /** Override the route for one agent type and complexity tier. */
  setRoute(agentType: AgentType, complexity: TaskComplexity, model: ModelConfig): void {
    this.routingTable[agentType] = { ...this.routingTable[agentType], [complexity]: model };
    this.logger.info("Custom route set", { agentType, complexity, model: modelKey(model) });
  }

  setSingleModel(model: ModelConfig | undefined): void {
    this.singleModel = model;
  }

  /**
   * Add one request's usage. `cost` is the provider-reported spend; it is
   * estimated from the model's prices when absent. Returns the model's
   * cumulative stats.
   */
  recordUsage(model: ModelConfig, usage: TokenUsage, cost?: number): ModelStats {
    const inputTokens = nonNegative(usage.inputTokens);
    const outputTokens = nonNegative(usage.outputTokens);
    const spend =
      cost !== undefined && Number.isFinite(cost) && cost >= 0
        ? cost
        : estimateCost(model, inputTokens, outputTokens);
    const key = modelKey(model);

    this.stats.totalInputTokens += inputTokens;
    this.stats.totalOutputTokens += outputTokens;
    this.stats.totalTokens += inputTokens + outputTokens;
    this.stats.totalCost += spend;
    this.stats.requestCount += 1;

    const perModel = this.stats.perModel[key] ?? emptyModelStats();
    perModel.inputTokens += inputTokens;
    perModel.outputTokens += outputTokens;
    perModel.totalTokens += inputTokens + outputTokens;
    perModel.cost += spend;
    perModel.requestCount += 1;
    this.stats.perModel[key] = perModel;

    this.eventBus?.publish({
      type: "usage_recorded",
      modelKey: key,
      inputTokens,
      outputTokens,
      cost: spend,
      timestamp: Date.now(),
    });
    return { ...perModel };
  }

  getStats(): ModelUsageStats {
    const perModel: Record<string, ModelStats> = {};
    for (const [key, stats] of Object.entries(this.stats.perModel)) {
      perModel[key] = { ...stats };
    }
    return { ...this.stats, perModel };
  }

  getCostSavings(): CostSavings {
    const baselineCost = estimateCost(
      this.baselineModel,
      this.stats.totalInputTokens,
      this.stats.totalOutputTokens
    );
    const savings = baselineCost - this.stats.totalCost;
    return {
      savings,
      percent: baselineCost === 0 ? 0 : (savings / baselineCost) * 100,
      baselineCost,
    };
  }

  generateReport(): string {
    const { savings, percent } = this.getCostSavings();
    const lines = [
      "=== Model Usage Report ===",
      "",
      `Total Requests: ${this.stats.requestCount}`,
      `Total Input Tokens: ${this.stats.totalInputTokens}`,
      `Total Output Tokens: ${this.stats.totalOutputTokens}`,
      `Total Cost: $${this.stats.totalCost.toFixed(4)}`,
      "",
      `Cost Savings vs ${this.baselineModel.model}: $${savings.toFixed(4)} (${percent.toFixed(1)}%)`,
      "",
      "Per-Model Breakdown:",
    ];
    for (const key of Object.keys(this.stats.perModel).sort()) {
      const stats = this.stats.perModel[key];
      if (stats) {
        lines.push(
          `  ${key}: ${stats.requestCount} requests, ${stats.inputTokens} in, ${stats.outputTokens} out, $${stats.cost.toFixed(4)}`
        );
      }
    }
    return lines.join("\n");
  }

  estimateComplexity(text: string): TaskComplexity {
    return estimateComplexity(text);
  }

  resolveAgentType(mode: AgentMode, text: string): AgentType {
    return resolveAgentType(mode, text);
  }
}

export function createModelRouter(config?: ModelRouterConfig): ModelRouter {
  return new ModelRouter(config);
}
