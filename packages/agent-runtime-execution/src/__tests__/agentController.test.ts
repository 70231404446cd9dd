import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { createEventBus } from "@steward/agent-runtime-control";
import {
  type AgentMode,
  type AgentUpdate,
  type ApprovalMode,
  OrchestrationCancelledError,
  OrchestrationTimeoutError,
  ProviderError,
  SessionBusyError,
} from "@steward/agent-runtime-core";
import { createNoopLogger } from "@steward/agent-runtime-telemetry/logging";
import { createCoreTools, createToolRegistry } from "@steward/agent-runtime-tools";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createModeClassifier } from "../modes/modeClassifier";
import { createModeStateMachine } from "../modes/modeStateMachine";
import {
  createAgentController,
  type ModeChangeConfirmation,
} from "../orchestrator/agentController";
import { createConversation } from "../orchestrator/conversation";
import { createToolCallPipeline } from "../orchestrator/toolCallPipeline";
import { createModelRouter } from "../routing/modelRouter";
import { ApprovalMemory } from "../security/approvalMemory";
import { createPermissionChannel } from "../security/permissionChannel";
import { createSafetyPolicyEngine } from "../security/safetyPolicy";
import { createUpdateChannel } from "../streaming/updateChannel";
import {
  finalAnswer,
  hangingStep,
  RecordingExecutor,
  ScriptedProvider,
  toolCall,
} from "./scriptedProvider";

const logger = createNoopLogger();

interface SetupOptions {
  approvalMode?: ApprovalMode;
  agentMode?: AgentMode;
  maxTurns?: number;
  maxTurnDurationMs?: number;
  confirmModeChange?: ModeChangeConfirmation;
}

describe("AgentController", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "agent-controller-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function setup(options: SetupOptions = {}) {
    const executor = new RecordingExecutor();
    const eventBus = createEventBus({ logger });
    const tools = createToolRegistry({ eventBus, logger });
    for (const tool of createCoreTools({ bashExecutor: executor })) {
      tools.register(tool);
    }
    const permissions = createPermissionChannel({ eventBus, logger });
    const modes = createModeStateMachine({
      initialMode: options.agentMode ?? "build",
      eventBus,
      logger,
    });
    const classifier = createModeClassifier();
    const router = createModelRouter({ eventBus, logger });
    const conversation = createConversation({ rootPath: root });
    const pipeline = createToolCallPipeline({
      tools,
      policy: createSafetyPolicyEngine({ projectRoot: root, logger }),
      classifier,
      permissions,
      approvalMemory: new ApprovalMemory(),
      getAgentMode: () => modes.getMode(),
      getApprovalMode: () => options.approvalMode ?? "smart",
      eventBus,
      logger,
    });
    const controller = createAgentController({
      conversation,
      pipeline,
      tools,
      modes,
      classifier,
      router,
      maxTurns: options.maxTurns,
      maxTurnDurationMs: options.maxTurnDurationMs,
      confirmModeChange: options.confirmModeChange,
      eventBus,
      logger,
    });
    return { controller, conversation, executor, eventBus, permissions, modes, router };
  }

  async function collect(channel: ReturnType<typeof createUpdateChannel>): Promise<AgentUpdate[]> {
    const updates: AgentUpdate[] = [];
    let update = await channel.next();
    while (update) {
      updates.push(update);
      update = await channel.next();
    }
    return updates;
  }

  it("writes a file in smart build mode and reports one status line", async () => {
    const { controller, conversation, router } = setup({ approvalMode: "smart" });
    const provider = new ScriptedProvider([
      toolCall("call_1", "write_file", { path: "notes.md", content: "# Release\n" }),
      finalAnswer("Created notes.md"),
    ]);
    const updates = createUpdateChannel();

    const result = await controller.processMessage("Create notes.md for the release", provider, undefined, {
      updates,
    });

    expect(result.response).toBe("Created notes.md");
    expect(result.toolStatusMessages).toEqual(["✓ write_file: Create notes.md"]);
    expect(result.turns).toBe(2);
    expect(result.totalTokens).toBe(30);
    expect(result.model.model).toBe("claude-sonnet");
    expect(await fs.readFile(path.join(root, "notes.md"), "utf-8")).toBe("# Release\n");
    expect(conversation.getActiveFiles()).toEqual(["notes.md"]);
    expect(conversation.getToolCall("call_1")?.result?.success).toBe(true);
    expect(router.getStats()).toMatchObject({
      requestCount: 2,
      totalInputTokens: 23,
      totalOutputTokens: 7,
    });

    expect(await collect(updates)).toEqual([
      {
        type: "tool_status",
        toolName: "write_file",
        message: "✓ write_file: Create notes.md",
      },
      { type: "text_chunk", content: "Created notes.md", delta: false, tokensUsed: 10 },
      { type: "complete", totalTokens: 30, toolStatusMessages: ["✓ write_file: Create notes.md"] },
    ]);
  });

  it("feeds tool results back to the provider", async () => {
    const { controller } = setup();
    const provider = new ScriptedProvider([
      toolCall("call_1", "run_command", { command: "git status" }),
      finalAnswer("Clean tree"),
    ]);

    await controller.processMessage("check git state", provider);

    const second = provider.requests[1];
    const last = second?.messages[second.messages.length - 1];
    expect(last).toMatchObject({ role: "tool", toolCallId: "call_1", content: "ran git status" });
    expect(second?.messages[0]?.role).toBe("system");
  });

  it("never executes a dangerous command the approver denies", async () => {
    const { controller, executor, permissions } = setup({ approvalMode: "review" });
    void (async () => {
      const ticket = await permissions.next();
      ticket?.respond("denied");
    })();
    const provider = new ScriptedProvider([
      toolCall("call_1", "run_command", { command: "rm -rf /" }),
      finalAnswer("I will not delete the filesystem."),
    ]);

    const result = await controller.processMessage("wipe everything", provider);

    expect(executor.commands).toEqual([]);
    expect(result.toolStatusMessages).toEqual([
      '✗ run_command: PERMISSION_DENIED Permission denied for "run_command": denied by approver',
    ]);
  });

  it("offers plan mode only read-only tools and refuses writes", async () => {
    const { controller } = setup({ agentMode: "plan", approvalMode: "auto" });
    const provider = new ScriptedProvider([
      toolCall("call_1", "write_file", { path: "x.ts", content: "" }),
      finalAnswer("Plan ready"),
    ]);

    const result = await controller.processMessage("Outline the approach", provider);

    const offered = provider.requests[0]?.tools?.map((tool) => tool.name) ?? [];
    expect(offered).toContain("read_file");
    expect(offered).not.toContain("write_file");
    expect(offered).not.toContain("run_command");
    expect(result.toolStatusMessages[0]?.startsWith("✗ write_file: PLAN_MODE_VIOLATION")).toBe(true);
  });

  it("streams provider deltas in order", async () => {
    const { controller } = setup();
    const provider = new ScriptedProvider([
      async (_request, callbacks) => {
        callbacks?.onTextDelta?.("Hel");
        callbacks?.onTextDelta?.("");
        callbacks?.onTextDelta?.("lo");
        return finalAnswer("Hello");
      },
    ]);
    const updates = createUpdateChannel();

    await controller.processMessage("say hello", provider, undefined, { updates });

    expect(await collect(updates)).toEqual([
      { type: "text_chunk", content: "Hel", delta: true },
      { type: "text_chunk", content: "lo", delta: true },
      { type: "complete", totalTokens: 10, toolStatusMessages: [] },
    ]);
  });

  it("stops at the turn ceiling", async () => {
    const { controller, router } = setup({ maxTurns: 2 });
    const provider = new ScriptedProvider([toolCall("call_x", "list_files", {})]);
    const updates = createUpdateChannel();

    await expect(
      controller.processMessage("keep listing", provider, undefined, { updates })
    ).rejects.toBeInstanceOf(OrchestrationTimeoutError);

    const emitted = await collect(updates);
    expect(emitted[emitted.length - 1]).toMatchObject({ type: "error", code: "ORCHESTRATION_TIMEOUT" });
    expect(router.getStats().requestCount).toBe(2);
  });

  it("cancels a running turn", async () => {
    const { controller } = setup();
    const provider = new ScriptedProvider([hangingStep]);

    const running = controller.processMessage("take your time", provider);
    expect(controller.busy).toBe(true);
    expect(controller.cancel("user pressed stop")).toBe(true);

    await expect(running).rejects.toThrow("Turn cancelled: user pressed stop");
    expect(controller.busy).toBe(false);
    expect(controller.cancel()).toBe(false);
  });

  it("honors an external abort signal", async () => {
    const { controller } = setup();
    const abort = new AbortController();
    const running = controller.processMessage("wait", new ScriptedProvider([hangingStep]), undefined, {
      signal: abort.signal,
    });

    abort.abort();

    await expect(running).rejects.toBeInstanceOf(OrchestrationCancelledError);
  });

  it("enforces the wall-clock ceiling", async () => {
    const { controller } = setup({ maxTurnDurationMs: 20 });

    await expect(
      controller.processMessage("wait", new ScriptedProvider([hangingStep]))
    ).rejects.toMatchObject({ code: "ORCHESTRATION_TIMEOUT", limit: "duration" });
  });

  it("wraps provider failures", async () => {
    const { controller } = setup();
    const provider = new ScriptedProvider([
      async () => {
        throw new Error("503 upstream");
      },
    ]);
    const updates = createUpdateChannel();

    await expect(
      controller.processMessage("hello", provider, undefined, { updates })
    ).rejects.toBeInstanceOf(ProviderError);
    expect(await collect(updates)).toEqual([
      {
        type: "error",
        code: "PROVIDER_ERROR",
        message: 'Provider "scripted" failed: 503 upstream',
      },
    ]);
  });

  it("processes one message at a time", async () => {
    const { controller } = setup();
    const running = controller.processMessage("first", new ScriptedProvider([hangingStep]));
    const updates = createUpdateChannel();

    await expect(
      controller.processMessage("second", new ScriptedProvider([finalAnswer("x")]), undefined, {
        updates,
      })
    ).rejects.toBeInstanceOf(SessionBusyError);
    expect(await collect(updates)).toEqual([
      {
        type: "error",
        code: "SESSION_BUSY",
        message: "A message is already being processed in this session",
      },
    ]);

    controller.cancel();
    await expect(running).rejects.toBeInstanceOf(OrchestrationCancelledError);
  });

  it("answers every tool call of a cancelled batch", async () => {
    const { controller, conversation, executor, permissions } = setup();
    const provider = new ScriptedProvider([
      {
        content: "",
        tokensUsed: 20,
        toolCallRequests: [
          { id: "call_1", name: "run_command", arguments: { command: "npm test" } },
          { id: "call_2", name: "run_command", arguments: { command: "npm run lint" } },
        ],
      },
    ]);

    const running = controller.processMessage("check everything", provider);
    const ticket = await permissions.next();
    expect(ticket?.request.command).toBe("npm test");
    controller.cancel("user pressed stop");

    await expect(running).rejects.toThrow("Turn cancelled: user pressed stop");
    expect(executor.commands).toEqual([]);
    expect(conversation.getMessages().map((message) => message.role)).toEqual([
      "user",
      "assistant",
      "tool",
      "tool",
    ]);
    expect(conversation.getToolCall("call_1")?.result?.error?.code).toBe("CANCELLED");
    expect(conversation.getToolCall("call_2")?.result).toEqual({
      success: false,
      content: [{ type: "text", text: "Not run: Turn cancelled: user pressed stop" }],
      error: { code: "CANCELLED", message: "Not run: Turn cancelled: user pressed stop" },
    });
    expect(conversation.getMessages()[3]).toMatchObject({
      role: "tool",
      toolCallId: "call_2",
      content: "Not run: Turn cancelled: user pressed stop",
    });
  });

  it("switches mode only when the recommendation is confirmed", async () => {
    const confirmed = setup({ agentMode: "plan", confirmModeChange: () => true });
    const declined = setup({ agentMode: "plan", confirmModeChange: () => false });
    const events = declined.eventBus.subscribe({ types: ["mode_recommended"] });

    await confirmed.controller.processMessage("implement the cache", new ScriptedProvider([finalAnswer("ok")]));
    await declined.controller.processMessage("implement the cache", new ScriptedProvider([finalAnswer("ok")]));

    expect(confirmed.modes.getMode()).toBe("build");
    expect(confirmed.modes.getHistory()[0]?.source).toBe("classifier");
    expect(declined.modes.getMode()).toBe("plan");
    expect(events.tryNext()).toMatchObject({
      type: "mode_recommended",
      current: "plan",
      recommended: "build",
    });
  });

  it("uses an explicit model override", async () => {
    const { controller } = setup();
    const provider = new ScriptedProvider([finalAnswer("done")]);
    const override = {
      provider: "local",
      model: "test-model",
      costPerMillionInput: 0,
      costPerMillionOutput: 0,
      contextWindow: 8_000,
    };

    const result = await controller.processMessage("hello", provider, override);

    expect(result.model).toEqual(override);
    expect(provider.requests[0]?.model).toBe("test-model");
  });
});
