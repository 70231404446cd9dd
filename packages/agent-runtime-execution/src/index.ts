/**
 * @steward/agent-runtime-execution
 *
 * Orchestration and tool safety for a coding agent.
 *
 * This package provides:
 * - Agent controller running the multi-turn provider/tool loop
 * - Safety policy, permission channel and approval memory
 * - Plan/Build mode state machine and classifier
 * - Model router with cost accounting
 * - Streaming update channel for frontends
 *
 * @example
 * ```typescript
 * import { createAgentSession } from "@steward/agent-runtime-execution";
 *
 * const session = createAgentSession({
 *   provider,
 *   config: { projectRoot: "/work/app", approvalMode: "smart", agentMode: "build" },
 * });
 *
 * const { updates, result } = session.streamMessage("add input validation to the signup form");
 * for await (const update of updates) {
 *   console.log(update);
 * }
 * const { toolStatusMessages } = await result;
 * ```
 */

// ============================================================================
// Session
// ============================================================================

export { createAgentSession } from "./session/agentSession";
export type {
  AgentSession,
  AgentSessionOptions,
  SessionMessageOptions,
  StreamedMessage,
} from "./session/agentSession";
export { resolveSessionConfig, sessionConfigSchema } from "./config/runtimeConfig";
export type { SessionConfig, SessionConfigInput } from "./config/runtimeConfig";

// ============================================================================
// Orchestration
// ============================================================================

export {
  AgentController,
  createAgentController,
  DEFAULT_MAX_TURN_DURATION_MS,
  DEFAULT_MAX_TURNS,
} from "./orchestrator/agentController";
export type {
  AgentControllerConfig,
  ModeChangeConfirmation,
  ProcessMessageOptions,
  ProcessMessageResult,
} from "./orchestrator/agentController";
export { Conversation, createConversation } from "./orchestrator/conversation";
export type { AppendMessageInput } from "./orchestrator/conversation";
export {
  changedFiles,
  createToolCallPipeline,
  describeChange,
  formatToolStatus,
  ToolCallPipeline,
} from "./orchestrator/toolCallPipeline";
export type {
  ApprovalSource,
  ToolCallOutcome,
  ToolCallPipelineDeps,
  ToolCallRunContext,
  ToolCallStage,
} from "./orchestrator/toolCallPipeline";

// ============================================================================
// Safety
// ============================================================================

export {
  assessChange,
  commandLine,
  createSafetyPolicyEngine,
  decide,
  generateDiff,
  SafetyPolicyEngine,
} from "./security/safetyPolicy";
export type { ChangeRisk, SafetyPolicyConfig } from "./security/safetyPolicy";
export { classifyCommand, classifySegment, programName } from "./security/commandRisk";
export type { CommandRisk, CommandRiskOptions } from "./security/commandRisk";
export {
  createPermissionChannel,
  DEFAULT_PERMISSION_CAPACITY,
  DEFAULT_PERMISSION_TIMEOUT_MS,
  PermissionChannel,
} from "./security/permissionChannel";
export type {
  PermissionChannelConfig,
  PermissionRequestOptions,
  PermissionTicket,
} from "./security/permissionChannel";
export { ApprovalMemory, approvalPatternKey } from "./security/approvalMemory";

// ============================================================================
// Modes
// ============================================================================

export {
  createModeStateMachine,
  isAgentMode,
  ModeStateMachine,
} from "./modes/modeStateMachine";
export type {
  ModeEvent,
  ModeStateMachineConfig,
  ModeTransition,
  ModeTransitionHandler,
  ModeTransitionOptions,
} from "./modes/modeStateMachine";
export { createModeClassifier, MODE_PROMPTS, ModeClassifier } from "./modes/modeClassifier";
export type { ModeRecommendation } from "./modes/modeClassifier";

// ============================================================================
// Routing
// ============================================================================

export {
  BASELINE_MODEL,
  DEFAULT_MODEL,
  DEFAULT_ROUTING_TABLE,
  estimateCost,
  findModel,
  MODEL_CATALOG,
} from "./routing/modelCatalog";
export type { CatalogModelName, RoutingTable } from "./routing/modelCatalog";
export {
  createModelRouter,
  estimateComplexity,
  ModelRouter,
  resolveAgentType,
} from "./routing/modelRouter";
export type {
  CostSavings,
  ModelRouterConfig,
  ModelRoutingDecision,
  ModelRoutingReason,
  ModelRoutingRequest,
  RoutingDecisionEmitter,
} from "./routing/modelRouter";

// ============================================================================
// Streaming
// ============================================================================

export {
  createUpdateChannel,
  UpdateChannel,
  UpdateChannelClosedError,
} from "./streaming/updateChannel";
