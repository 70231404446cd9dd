/**
 * Safety Policy Engine
 *
 * Classifies proposed actions into safety levels, decides what the session's
 * approval and agent modes allow, and renders previews for approvers.
 */

import path from "node:path";
import {
  type AgentMode,
  type ApprovalMode,
  type ChangeType,
  isWithinRoot,
  type PendingChange,
  type PolicyDecision,
  type ProposedAction,
  type SafetyLevel,
  toProjectRelative,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";
import { createTwoFilesPatch } from "diff";
import { classifyCommand } from "./commandRisk";

// ============================================================================
// Types
// ============================================================================

export interface SafetyPolicyConfig {
  projectRoot: string;
  logger?: RuntimeLogger;
  /** Clock used for PendingChange timestamps */
  now?: () => number;
}

export interface ChangeRisk {
  level: SafetyLevel;
  reasons: string[];
}

// ============================================================================
// Pure Rules
// ============================================================================

/** Full command line for a run_command change. */
export function commandLine(change: Extract<ChangeType, { kind: "run_command" }>): string {
  return change.args.length > 0 ? `${change.command} ${change.args.join(" ")}` : change.command;
}

function isUnderGitDir(projectRoot: string, target: string): boolean {
  const relative = toProjectRelative(projectRoot, target);
  return relative.split(/[\\/]/)[0] === ".git";
}

function fileWriteRisk(projectRoot: string, target: string): ChangeRisk {
  if (!isWithinRoot(projectRoot, target)) {
    return { level: "dangerous", reasons: [`${target} is outside the project`] };
  }
  if (isUnderGitDir(projectRoot, target)) {
    return { level: "caution", reasons: [`${target} is inside .git`] };
  }
  return { level: "safe", reasons: [] };
}

/** Risk of a change relative to a project root. */
export function assessChange(change: ChangeType, projectRoot: string): ChangeRisk {
  switch (change.kind) {
    case "read":
    case "research":
      return { level: "safe", reasons: [] };
    case "create_file":
    case "modify_file":
      return fileWriteRisk(projectRoot, change.path);
    case "delete_file":
      return isWithinRoot(projectRoot, change.path)
        ? { level: "caution", reasons: [`deletes ${change.path}`] }
        : { level: "dangerous", reasons: [`deletes ${change.path} outside the project`] };
    case "run_command":
      return classifyCommand(commandLine(change), {
        projectRoot,
        cwd: change.cwd === undefined ? undefined : path.resolve(projectRoot, change.cwd),
      });
    case "other":
      return { level: "caution", reasons: ["tool did not describe its side effects"] };
  }
}

/**
 * What the session policy allows for a classified change. Pure: the same
 * inputs always give the same decision.
 */
export function decide(
  pending: Pick<PendingChange, "safetyLevel">,
  approvalMode: ApprovalMode,
  agentMode: AgentMode
): PolicyDecision {
  if (pending.safetyLevel === "safe") {
    return { action: "auto_approve" };
  }
  if (agentMode === "plan") {
    return { action: "reject", reason: "plan_mode_violation" };
  }
  switch (approvalMode) {
    case "auto":
      return { action: "auto_approve" };
    case "smart":
    case "review":
      return { action: "require_approval" };
    case "read_only":
      return { action: "reject", reason: "read_only_mode" };
  }
}

/** Deterministic preview of a change; nothing is executed. */
export function generateDiff(pending: Pick<PendingChange, "change">): string {
  const change = pending.change;
  switch (change.kind) {
    case "create_file":
      return createTwoFilesPatch("/dev/null", change.path, "", change.content);
    case "modify_file":
      return createTwoFilesPatch(change.path, change.path, change.oldContent, change.newContent);
    case "delete_file":
      return `--- ${change.path}\n+++ /dev/null\n@@ File will be deleted @@`;
    case "run_command":
      return `$ ${commandLine(change)}\n# Working directory: ${change.cwd ?? "current"}`;
    case "read":
      return `Read ${change.target}`;
    case "research":
      return `Research: ${change.query}`;
    case "other":
      return change.summary;
  }
}

// ============================================================================
// Engine
// ============================================================================

export class SafetyPolicyEngine {
  private readonly projectRoot: string;
  private readonly logger: RuntimeLogger;
  private readonly now: () => number;
  private counter = 0;

  constructor(config: SafetyPolicyConfig) {
    this.projectRoot = path.resolve(config.projectRoot);
    this.logger = config.logger ?? getLogger("safety-policy");
    this.now = config.now ?? Date.now;
  }

  classify(action: ProposedAction): PendingChange {
    const risk = assessChange(action.change, this.projectRoot);
    const timestamp = this.now();
    this.counter += 1;

    const pending: PendingChange = Object.freeze({
      id: `change_${timestamp.toString(36)}_${this.counter.toString(36)}`,
      toolName: action.toolName,
      change: action.change,
      description: action.description,
      safetyLevel: risk.level,
      timestamp,
    });

    if (risk.level !== "safe") {
      this.logger.debug("Classified change above safe", {
        toolName: action.toolName,
        kind: action.change.kind,
        level: risk.level,
        reasons: risk.reasons,
      });
    }
    return pending;
  }

  decide(pending: PendingChange, approvalMode: ApprovalMode, agentMode: AgentMode): PolicyDecision {
    return decide(pending, approvalMode, agentMode);
  }

  generateDiff(pending: PendingChange): string {
    return generateDiff(pending);
  }
}

export function createSafetyPolicyEngine(config: SafetyPolicyConfig): SafetyPolicyEngine {
  return new SafetyPolicyEngine(config);
}
