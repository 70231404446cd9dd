/**
 * Tool Call Pipeline
 *
 * Runs one model-requested tool call through every gate before it touches the
 * workspace:
 *
 *   mode gate → describe → classify → decide → approve → snapshot → execute
 *
 * Every exit produces a ToolResult for the model; nothing here ends the turn.
 */

import type { AgentEventBus } from "@steward/agent-runtime-control";
import {
  type AgentMode,
  type ApprovalMode,
  type ChangeType,
  errorResult,
  getErrorMessage,
  InvalidArgumentsError,
  type PendingChange,
  PermissionDeniedError,
  type PermissionRequest,
  type PermissionResponse,
  PlanModeViolationError,
  type PolicyDecision,
  type SnapshotCollaborator,
  SnapshotFailureError,
  type ToolCallRequest,
  type ToolCapability,
  type ToolExecutionContext,
  type ToolResult,
  UnknownToolError,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";
import type { ToolExecutor } from "@steward/agent-runtime-tools";
import type { ModeClassifier } from "../modes/modeClassifier";
import type { ApprovalMemory } from "../security/approvalMemory";
import type { PermissionChannel } from "../security/permissionChannel";
import { commandLine, type SafetyPolicyEngine } from "../security/safetyPolicy";

// ============================================================================
// Types
// ============================================================================

/** How a gated call got permission to run */
export type ApprovalSource = "policy" | "approver" | "approver_similar" | "remembered";

export type ToolCallStage = "mode_gate" | "describe" | "policy" | "permission" | "snapshot" | "execute";

export interface ToolCallOutcome {
  callId: string;
  toolName: string;
  result: ToolResult;
  /** Last stage the call reached */
  stage: ToolCallStage;
  pendingChange?: PendingChange;
  decision?: PolicyDecision;
  approval?: ApprovalSource;
  snapshotId?: string;
}

export interface ToolCallPipelineDeps {
  tools: ToolExecutor;
  policy: SafetyPolicyEngine;
  classifier: ModeClassifier;
  permissions: PermissionChannel;
  approvalMemory: ApprovalMemory;
  getAgentMode: () => AgentMode;
  getApprovalMode: () => ApprovalMode;
  snapshots?: SnapshotCollaborator;
  permissionTimeoutMs?: number;
  eventBus?: AgentEventBus;
  logger?: RuntimeLogger;
}

export interface ToolCallRunContext {
  projectRoot: string;
  sessionId?: string;
  signal?: AbortSignal;
}

// ============================================================================
// Helpers
// ============================================================================

const MUTATING_KINDS = new Set<ChangeType["kind"]>([
  "create_file",
  "modify_file",
  "delete_file",
  "run_command",
  "other",
]);

export function describeChange(change: ChangeType): string {
  switch (change.kind) {
    case "create_file":
      return `Create ${change.path}`;
    case "modify_file":
      return `Modify ${change.path}`;
    case "delete_file":
      return `Delete ${change.path}`;
    case "run_command":
      return `Run \`${commandLine(change)}\``;
    case "read":
      return `Read ${change.target}`;
    case "research":
      return `Research "${change.query}"`;
    case "other":
      return change.summary;
  }
}

/** Files a change touches, for the conversation's active-file list. */
export function changedFiles(change: ChangeType): string[] {
  switch (change.kind) {
    case "create_file":
    case "modify_file":
    case "delete_file":
      return [change.path];
    default:
      return [];
  }
}

/** One-line status shown to the user after each call. */
export function formatToolStatus(outcome: ToolCallOutcome): string {
  const subject = outcome.pendingChange
    ? describeChange(outcome.pendingChange.change)
    : outcome.toolName;
  if (outcome.result.success) {
    return `✓ ${outcome.toolName}: ${subject}`;
  }
  const error = outcome.result.error;
  return `✗ ${outcome.toolName}: ${error ? `${error.code} ${error.message}` : "failed"}`;
}

let permissionCounter = 0;

function buildPermissionRequest(pending: PendingChange, preview: string): PermissionRequest {
  permissionCounter += 1;
  const change = pending.change;
  const base = {
    id: `perm_${Date.now().toString(36)}_${permissionCounter.toString(36)}`,
    description: pending.description,
    preview,
    pendingChange: pending,
  };
  if (change.kind === "run_command") {
    return { ...base, command: change.command, args: change.args };
  }
  return { ...base, command: pending.toolName, args: changedFiles(change) };
}

// ============================================================================
// Pipeline
// ============================================================================

export class ToolCallPipeline {
  private readonly deps: ToolCallPipelineDeps;
  private readonly logger: RuntimeLogger;

  constructor(deps: ToolCallPipelineDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? getLogger("tool-pipeline");
  }

  async run(call: ToolCallRequest, context: ToolCallRunContext): Promise<ToolCallOutcome> {
    const outcome = (
      stage: ToolCallStage,
      result: ToolResult,
      extra: Partial<ToolCallOutcome> = {}
    ): ToolCallOutcome => ({ callId: call.id, toolName: call.name, stage, result, ...extra });

    const tool = this.deps.tools.get(call.name);
    if (!tool) {
      return outcome("mode_gate", errorResult("UNKNOWN_TOOL", new UnknownToolError(call.name).message));
    }

    const agentMode = this.deps.getAgentMode();
    if (!this.deps.classifier.isToolAllowed(agentMode, tool)) {
      const error = new PlanModeViolationError(call.name, agentMode);
      return outcome("mode_gate", errorResult("PLAN_MODE_VIOLATION", error.message));
    }

    const toolContext: ToolExecutionContext = {
      projectRoot: context.projectRoot,
      sessionId: context.sessionId,
      callId: call.id,
      signal: context.signal,
    };

    let change: ChangeType;
    try {
      change = await this.proposeAction(tool, call.arguments, toolContext);
    } catch (error) {
      const code = error instanceof InvalidArgumentsError ? "INVALID_ARGUMENTS" : "TOOL_EXECUTION_ERROR";
      return outcome("describe", errorResult(code, getErrorMessage(error)));
    }

    const pending = this.deps.policy.classify({
      toolName: call.name,
      change,
      description: describeChange(change),
    });
    const decision = this.deps.policy.decide(pending, this.deps.getApprovalMode(), agentMode);

    if (decision.action === "reject") {
      const message =
        decision.reason === "plan_mode_violation"
          ? new PlanModeViolationError(call.name, agentMode).message
          : `"${call.name}" is blocked in read-only mode (${pending.safetyLevel} action)`;
      const code = decision.reason === "plan_mode_violation" ? "PLAN_MODE_VIOLATION" : "READ_ONLY_MODE";
      return outcome("policy", errorResult(code, message), { pendingChange: pending, decision });
    }

    let approval: ApprovalSource = "policy";
    if (decision.action === "require_approval") {
      const granted = await this.requestApproval(pending, context.signal);
      if (!granted.ok) {
        return outcome("permission", granted.result, { pendingChange: pending, decision });
      }
      approval = granted.source;
    }

    let snapshotId: string | undefined;
    if (pending.safetyLevel !== "safe" && MUTATING_KINDS.has(change.kind) && this.deps.snapshots) {
      const snapshot = await this.takeSnapshot(this.deps.snapshots, pending);
      if (!snapshot.ok) {
        return outcome("snapshot", snapshot.result, { pendingChange: pending, decision, approval });
      }
      snapshotId = snapshot.snapshotId;
    }

    let result: ToolResult;
    try {
      result = await this.deps.tools.execute(call.name, call.arguments, toolContext);
    } catch (error) {
      if (!(error instanceof UnknownToolError)) {
        throw error;
      }
      result = errorResult("UNKNOWN_TOOL", error.message);
    }

    return outcome("execute", result, { pendingChange: pending, decision, approval, snapshotId });
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async proposeAction(
    tool: ToolCapability,
    params: Record<string, unknown>,
    context: ToolExecutionContext
  ): Promise<ChangeType> {
    if (tool.proposeAction) {
      return tool.proposeAction(params, context);
    }
    if (tool.readOnly) {
      return { kind: "read", target: tool.name };
    }
    return { kind: "other", summary: `${tool.name} ${JSON.stringify(params)}` };
  }

  private async takeSnapshot(
    snapshots: SnapshotCollaborator,
    pending: PendingChange
  ): Promise<{ ok: true; snapshotId: string } | { ok: false; result: ToolResult }> {
    let snapshotId: string;
    try {
      snapshotId = await snapshots.snapshot(`Before ${pending.description}`);
    } catch (error) {
      const failure = new SnapshotFailureError(error);
      this.logger.error("Snapshot failed; mutation blocked", failure);
      return { ok: false, result: errorResult("SNAPSHOT_FAILURE", failure.message) };
    }
    this.deps.eventBus?.publish({
      type: "snapshot_created",
      snapshotId,
      reason: pending.description,
      timestamp: Date.now(),
    });
    return { ok: true, snapshotId };
  }

  private async requestApproval(
    pending: PendingChange,
    signal?: AbortSignal
  ): Promise<{ ok: true; source: ApprovalSource } | { ok: false; result: ToolResult }> {
    if (this.deps.approvalMemory.matches(pending)) {
      this.logger.debug("Approved by remembered pattern", { toolName: pending.toolName });
      return { ok: true, source: "remembered" };
    }

    const request = buildPermissionRequest(pending, this.deps.policy.generateDiff(pending));
    const outcome = await this.deps.permissions.request(request, {
      signal,
      timeoutMs: this.deps.permissionTimeoutMs,
    });

    if (outcome.cancelled) {
      return { ok: false, result: errorResult("CANCELLED", "Permission request cancelled") };
    }
    if (outcome.timedOut) {
      const error = new PermissionDeniedError(pending.toolName, "no response before timeout", true);
      return { ok: false, result: errorResult("PERMISSION_TIMEOUT", error.message) };
    }
    return this.applyResponse(pending, outcome.response);
  }

  private applyResponse(
    pending: PendingChange,
    response: PermissionResponse
  ): { ok: true; source: ApprovalSource } | { ok: false; result: ToolResult } {
    switch (response) {
      case "approved":
        return { ok: true, source: "approver" };
      case "approved_similar":
        if (!this.deps.approvalMemory.remember(pending)) {
          this.logger.info("Dangerous action approved once; pattern not remembered", {
            toolName: pending.toolName,
          });
          return { ok: true, source: "approver" };
        }
        return { ok: true, source: "approver_similar" };
      case "denied": {
        const error = new PermissionDeniedError(pending.toolName, "denied by approver");
        return { ok: false, result: errorResult("PERMISSION_DENIED", error.message) };
      }
    }
  }
}

export function createToolCallPipeline(deps: ToolCallPipelineDeps): ToolCallPipeline {
  return new ToolCallPipeline(deps);
}
