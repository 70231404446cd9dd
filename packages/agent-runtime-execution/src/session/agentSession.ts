/**
 * Agent Session
 *
 * Frontend-facing surface that wires the runtime together for one session:
 * event bus, tool registry with the built-in tools, research scheduler,
 * safety policy, permission channel, modes, model router and controller.
 *
 * @example
 * ```typescript
 * const session = createAgentSession({ provider, config: { projectRoot, approvalMode: "smart" } });
 *
 * void (async () => {
 *   for await (const ticket of session.permissions) {
 *     ticket.respond(await askUser(ticket.request));
 *   }
 * })();
 *
 * const { updates, result } = session.streamMessage("add a health check endpoint");
 * for await (const update of updates) render(update);
 * await result;
 * ```
 */

import { type AgentEventBus, createEventBus } from "@steward/agent-runtime-control";
import {
  APPROVAL_MODES,
  type AgentMode,
  type ApprovalMode,
  getErrorMessage,
  InvalidConfigError,
  type LLMProvider,
  type ModelConfig,
  type ModelUsageStats,
  type SnapshotCollaborator,
  type ToolCapability,
  type UpdateSink,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";
import {
  createCoreTools,
  createResearchRunner,
  createResearchScheduler,
  createToolRegistry,
  type IBashExecutor,
  type ResearchRunner,
  type ResearchScheduler,
  type ToolRegistry,
} from "@steward/agent-runtime-tools";
import { resolveSessionConfig, type SessionConfig } from "../config/runtimeConfig";
import { createModeClassifier } from "../modes/modeClassifier";
import { createModeStateMachine, type ModeTransition } from "../modes/modeStateMachine";
import {
  AgentController,
  type ModeChangeConfirmation,
  type ProcessMessageResult,
} from "../orchestrator/agentController";
import { Conversation } from "../orchestrator/conversation";
import { createToolCallPipeline } from "../orchestrator/toolCallPipeline";
import { findModel } from "../routing/modelCatalog";
import { createModelRouter, type ModelRouter } from "../routing/modelRouter";
import { ApprovalMemory } from "../security/approvalMemory";
import { createPermissionChannel, type PermissionChannel } from "../security/permissionChannel";
import { createSafetyPolicyEngine } from "../security/safetyPolicy";
import { createUpdateChannel, type UpdateChannel } from "../streaming/updateChannel";

// ============================================================================
// Types
// ============================================================================

export interface AgentSessionOptions {
  provider: LLMProvider;
  /** Validated with resolveSessionConfig */
  config?: unknown;
  env?: Record<string, string | undefined>;
  snapshots?: SnapshotCollaborator;
  /** Registered after the built-in tools */
  tools?: ToolCapability[];
  bashExecutor?: IBashExecutor;
  researchRunner?: ResearchRunner;
  confirmModeChange?: ModeChangeConfirmation;
  language?: string;
  framework?: string;
  logger?: RuntimeLogger;
}

export interface SessionMessageOptions {
  /** Catalog name, `provider/model`, or a full config; bypasses routing */
  model?: string | ModelConfig;
  signal?: AbortSignal;
}

export interface StreamedMessage {
  updates: UpdateChannel;
  result: Promise<ProcessMessageResult>;
}

export interface AgentSession {
  readonly id: string;
  readonly config: SessionConfig;
  readonly events: AgentEventBus;
  readonly permissions: PermissionChannel;
  readonly router: ModelRouter;
  readonly tools: ToolRegistry;
  readonly research: ResearchScheduler;
  readonly conversation: Conversation;
  processMessage(
    text: string,
    options?: SessionMessageOptions & { updates?: UpdateSink }
  ): Promise<ProcessMessageResult>;
  streamMessage(text: string, options?: SessionMessageOptions): StreamedMessage;
  getMode(): AgentMode;
  setMode(mode: string, reason?: string): ModeTransition | undefined;
  getApprovalMode(): ApprovalMode;
  setApprovalMode(mode: string): void;
  cancel(reason?: string): boolean;
  /** Cancel everything, deny pending permissions and close the bus. */
  endSession(): ModelUsageStats;
}

// ============================================================================
// Factory
// ============================================================================

let sessionCounter = 0;

function isApprovalMode(value: string): value is ApprovalMode {
  return APPROVAL_MODES.some((mode) => mode === value);
}

export function createAgentSession(options: AgentSessionOptions): AgentSession {
  const config = resolveSessionConfig(options.config ?? {}, options.env ?? process.env);
  sessionCounter += 1;
  const id = config.sessionId ?? `session_${Date.now().toString(36)}_${sessionCounter.toString(36)}`;
  const logger = (options.logger ?? getLogger("agent-session")).child({ sessionId: id });

  const events = createEventBus({ bufferSize: config.eventBufferSize, logger });
  const tools = createToolRegistry({ eventBus: events, logger });
  const research = createResearchScheduler({
    runner: options.researchRunner ?? createResearchRunner(),
    tools: tools.readOnlyView(),
    projectRoot: config.projectRoot,
    maxConcurrent: config.research.maxConcurrent,
    cancelGraceMs: config.research.cancelGraceMs,
    eventBus: events,
    logger,
  });
  const builtIns = createCoreTools({
    scheduler: research,
    bashExecutor: options.bashExecutor,
    commandTimeoutMs: config.commandTimeoutMs,
    researchMaxSteps: config.research.maxSteps,
  });
  for (const tool of [...builtIns, ...(options.tools ?? [])]) {
    tools.register(tool);
  }

  const policy = createSafetyPolicyEngine({ projectRoot: config.projectRoot, logger });
  const permissions = createPermissionChannel({
    capacity: config.permission.capacity,
    timeoutMs: config.permission.timeoutMs,
    eventBus: events,
    logger,
  });
  const approvalMemory = new ApprovalMemory();
  const modes = createModeStateMachine({ initialMode: config.agentMode, eventBus: events, logger });
  const classifier = createModeClassifier();
  const router = createModelRouter({
    singleModel: config.singleModel ? findModel(config.singleModel) : undefined,
    eventBus: events,
    logger,
  });
  const conversation = new Conversation({
    rootPath: config.projectRoot,
    language: options.language,
    framework: options.framework,
  });

  let approvalMode: ApprovalMode = config.approvalMode;

  const pipeline = createToolCallPipeline({
    tools,
    policy,
    classifier,
    permissions,
    approvalMemory,
    getAgentMode: () => modes.getMode(),
    getApprovalMode: () => approvalMode,
    snapshots: options.snapshots,
    eventBus: events,
    logger,
  });
  const controller = new AgentController({
    conversation,
    pipeline,
    tools,
    modes,
    classifier,
    router,
    sessionId: id,
    maxTurns: config.maxTurns,
    maxTurnDurationMs: config.maxTurnDurationMs,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    confirmModeChange: options.confirmModeChange,
    eventBus: events,
    logger,
  });

  const processMessage: AgentSession["processMessage"] = async (text, messageOptions = {}) => {
    const { model, updates, signal } = messageOptions;
    const selected = typeof model === "string" ? findModel(model) : model;
    if (typeof model === "string" && !selected) {
      const error = new InvalidConfigError([`model: Unknown model "${model}"`]);
      updates?.emit({ type: "error", code: error.code, message: error.message });
      throw error;
    }
    return controller.processMessage(text, options.provider, selected, { updates, signal });
  };

  logger.info("Agent session created", {
    projectRoot: config.projectRoot,
    approvalMode,
    agentMode: config.agentMode,
    tools: tools.list().length,
  });

  return {
    id,
    config,
    events,
    permissions,
    router,
    tools,
    research,
    conversation,
    processMessage,
    streamMessage(text, messageOptions = {}) {
      const updates = createUpdateChannel();
      const result = processMessage(text, { ...messageOptions, updates });
      // The failure also reaches the consumer as an `error` update
      result.catch((error: unknown) => {
        logger.debug("Streamed message failed", { error: getErrorMessage(error) });
      });
      return { updates, result };
    },
    getMode: () => modes.getMode(),
    setMode: (mode, reason) => modes.setMode(mode, { reason, source: "command" }),
    getApprovalMode: () => approvalMode,
    setApprovalMode(mode) {
      if (!isApprovalMode(mode)) {
        throw new InvalidConfigError([
          `approvalMode: expected one of ${APPROVAL_MODES.join(", ")}, received "${mode}"`,
        ]);
      }
      if (mode === approvalMode) {
        return;
      }
      const from = approvalMode;
      approvalMode = mode;
      events.publish({ type: "approval_mode_changed", from, to: mode, timestamp: Date.now() });
      logger.info("Approval mode changed", { from, to: mode });
    },
    cancel: (reason) => controller.cancel(reason),
    endSession() {
      controller.cancel("session ended");
      research.cancelAll("session ended");
      permissions.close();
      const stats = router.getStats();
      logger.info("Agent session ended", {
        requests: stats.requestCount,
        totalTokens: stats.totalTokens,
        totalCost: stats.totalCost,
      });
      events.dispose();
      return stats;
    },
  };
}
