import { createEventBus } from "@steward/agent-runtime-control";
import { createNoopLogger } from "@steward/agent-runtime-telemetry/logging";
import { describe, expect, it, vi } from "vitest";
import { findModel, MODEL_CATALOG } from "../routing/modelCatalog";
import {
  createModelRouter,
  estimateComplexity,
  type ModelRoutingDecision,
  resolveAgentType,
} from "../routing/modelRouter";

const logger = createNoopLogger();
const { opus, sonnet, haiku } = MODEL_CATALOG;

describe("ModelRouter selection", () => {
  it("routes by agent type and complexity", () => {
    const router = createModelRouter({ logger });

    expect(router.select("low", "explorer")).toEqual(haiku);
    expect(router.select("medium", "explorer")).toEqual(sonnet);
    expect(router.select("high", "builder")).toEqual(opus);
    expect(router.select("medium", "debugger")).toEqual(opus);
    expect(router.select("high", "file_searcher")).toEqual(haiku);
  });

  it("prefers a user override, then a single model, then the table", () => {
    const decisions: ModelRoutingDecision[] = [];
    const router = createModelRouter({
      logger,
      onRoutingDecision: (decision) => decisions.push(decision),
    });

    router.select("low", "explorer", MODEL_CATALOG["gpt-4o"]);
    router.setSingleModel(sonnet);
    router.select("low", "explorer");
    router.setSingleModel(undefined);
    router.select("low", "explorer");

    expect(decisions.map((decision) => decision.reason)).toEqual([
      "user_override",
      "single_model",
      "routing_table",
    ]);
    expect(decisions[0]?.model).toEqual(MODEL_CATALOG["gpt-4o"]);
  });

  it("falls back to the default model for uncovered combinations", () => {
    const router = createModelRouter({ routingTable: {}, defaultModel: haiku, logger });

    expect(router.resolve({ complexity: "high", agentType: "builder" })).toEqual({
      model: haiku,
      complexity: "high",
      agentType: "builder",
      reason: "default",
    });
  });

  it("applies custom routes without touching the default table", () => {
    const router = createModelRouter({ logger });
    router.setRoute("builder", "low", haiku);

    expect(router.select("low", "builder")).toEqual(haiku);
    expect(router.select("medium", "builder")).toEqual(sonnet);
    expect(createModelRouter({ logger }).select("low", "builder")).toEqual(sonnet);
  });
});

describe("ModelRouter usage", () => {
  it("reports savings against the baseline model", () => {
    const router = createModelRouter({ logger });
    router.recordUsage(haiku, { inputTokens: 100_000, outputTokens: 50_000 });

    const savings = router.getCostSavings();

    expect(savings.baselineCost).toBeCloseTo(5.25, 10);
    expect(savings.savings).toBeCloseTo(5.1625, 10);
    expect(savings.percent).toBeCloseTo(98.333, 2);
  });

  it("prefers the provider-reported cost", () => {
    const router = createModelRouter({ logger });

    const stats = router.recordUsage(sonnet, { inputTokens: 10, outputTokens: 10 }, 0.5);

    expect(stats.cost).toBe(0.5);
    expect(router.getStats().totalCost).toBe(0.5);
  });

  it("clamps negative token counts", () => {
    const router = createModelRouter({ logger });

    router.recordUsage(sonnet, { inputTokens: -50, outputTokens: 20 });

    expect(router.getStats()).toMatchObject({ totalInputTokens: 0, totalOutputTokens: 20 });
  });

  it("never loses an increment under interleaved callers", async () => {
    const router = createModelRouter({ logger });

    await Promise.all(
      Array.from({ length: 100 }, async (_, index) => {
        await new Promise((resolve) => setTimeout(resolve, index % 3));
        router.recordUsage(index % 2 === 0 ? sonnet : haiku, { inputTokens: 10, outputTokens: 5 });
      })
    );

    const stats = router.getStats();
    expect(stats.requestCount).toBe(100);
    expect(stats.totalInputTokens).toBe(1_000);
    expect(stats.totalOutputTokens).toBe(500);
    expect(stats.totalTokens).toBe(1_500);
    expect(stats.perModel["anthropic/claude-sonnet"]?.requestCount).toBe(50);
    expect(stats.perModel["anthropic/claude-haiku"]?.requestCount).toBe(50);
  });

  it("returns stats that callers cannot mutate", () => {
    const router = createModelRouter({ logger });
    router.recordUsage(sonnet, { inputTokens: 1, outputTokens: 1 });

    const snapshot = router.getStats();
    const perModel = snapshot.perModel["anthropic/claude-sonnet"];
    if (perModel) {
      perModel.requestCount = 99;
    }

    expect(router.getStats().perModel["anthropic/claude-sonnet"]?.requestCount).toBe(1);
  });

  it("publishes each recorded usage", () => {
    const bus = createEventBus({ logger });
    const events = bus.subscribe({ types: ["usage_recorded"] });
    const router = createModelRouter({ eventBus: bus, logger });

    router.recordUsage(haiku, { inputTokens: 4, outputTokens: 2 }, 0.001);

    expect(events.tryNext()).toMatchObject({
      type: "usage_recorded",
      modelKey: "anthropic/claude-haiku",
      inputTokens: 4,
      outputTokens: 2,
      cost: 0.001,
    });
  });

  it("renders a usage report", () => {
    const router = createModelRouter({ logger });
    router.recordUsage(haiku, { inputTokens: 100_000, outputTokens: 50_000 });

    expect(router.generateReport().split("\n")).toEqual([
      "=== Model Usage Report ===",
      "",
      "Total Requests: 1",
      "Total Input Tokens: 100000",
      "Total Output Tokens: 50000",
      "Total Cost: $0.0875",
      "",
      "Cost Savings vs claude-opus: $5.1625 (98.3%)",
      "",
      "Per-Model Breakdown:",
      "  anthropic/claude-haiku: 1 requests, 100000 in, 50000 out, $0.0875",
    ]);
  });
});

describe("routing heuristics", () => {
  it.each([
    ["x".repeat(501), "high"],
    ["Optimize the query planner", "high"],
    ["Refactor entire billing module", "high"],
    ["list the exported functions", "low"],
    ["Add a logout button", "medium"],
  ] as const)("estimates the complexity of %s", (text, complexity) => {
    expect(estimateComplexity(text)).toBe(complexity);
  });

  it.each([
    ["plan", "fix the crash", "explorer"],
    ["build", "fix the crash on save", "debugger"],
    ["build", "rename the session module", "refactorer"],
    ["build", "where is the config loaded", "explorer"],
    ["build", "add a health endpoint", "builder"],
  ] as const)("resolves the agent type in %s mode for %s", (mode, text, agentType) => {
    expect(resolveAgentType(mode, text)).toBe(agentType);
  });

  it("finds catalog models by several names", () => {
    expect(findModel("haiku")).toEqual(haiku);
    expect(findModel("anthropic/claude-opus")).toEqual(opus);
    expect(findModel("gpt-4o")).toEqual(MODEL_CATALOG["gpt-4o"]);
    expect(findModel("unknown-model")).toBeUndefined();
  });

  it("does not call the decision hook for plain heuristics", () => {
    const hook = vi.fn();
    const router = createModelRouter({ logger, onRoutingDecision: hook });

    expect(router.estimateComplexity("show the readme")).toBe("low");
    expect(hook).not.toHaveBeenCalled();
  });
});
