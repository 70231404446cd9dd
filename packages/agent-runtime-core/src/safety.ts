/**
 * Safety & Approval Types
 */

// ============================================================================
// Levels and Modes
// ============================================================================

export type SafetyLevel = "safe" | "caution" | "dangerous";

export const SAFETY_LEVEL_RANK: Readonly<Record<SafetyLevel, number>> = {
  safe: 0,
  caution: 1,
  dangerous: 2,
};

export function maxSafetyLevel(a: SafetyLevel, b: SafetyLevel): SafetyLevel {
  return SAFETY_LEVEL_RANK[a] >= SAFETY_LEVEL_RANK[b] ? a : b;
}

/**
 * Session policy for gated actions.
 * - review: every action above safe waits for a human
 * - smart: safe actions run, the rest wait for a human
 * - auto: everything runs
 * - read_only: nothing above safe runs
 */
export type ApprovalMode = "review" | "smart" | "auto" | "read_only";

export const APPROVAL_MODES: readonly ApprovalMode[] = ["review", "smart", "auto", "read_only"];

export type AgentMode = "plan" | "build";

export const AGENT_MODES: readonly AgentMode[] = ["plan", "build"];

// ============================================================================
// Proposed Changes
// ============================================================================

export type ChangeType =
  | { kind: "create_file"; path: string; content: string }
  | { kind: "modify_file"; path: string; oldContent: string; newContent: string }
  | { kind: "delete_file"; path: string }
  | { kind: "run_command"; command: string; args: string[]; cwd?: string }
  | { kind: "read"; target: string }
  | { kind: "research"; query: string }
  | { kind: "other"; summary: string };

export type ChangeKind = ChangeType["kind"];

export interface ProposedAction {
  toolName: string;
  change: ChangeType;
  description: string;
}

/** A classified action. Never mutated after classification. */
export interface PendingChange {
  readonly id: string;
  readonly toolName: string;
  readonly change: ChangeType;
  readonly description: string;
  readonly safetyLevel: SafetyLevel;
  readonly timestamp: number;
}

export type PolicyRejectReason = "plan_mode_violation" | "read_only_mode";

export type PolicyDecision =
  | { action: "auto_approve" }
  | { action: "require_approval" }
  | { action: "reject"; reason: PolicyRejectReason };

// ============================================================================
// Permission Round-Trip
// ============================================================================

export interface PermissionRequest {
  id: string;
  command: string;
  args: string[];
  description: string;
  /** Rendered diff or command preview */
  preview: string;
  pendingChange: PendingChange;
}

export type PermissionResponse = "approved" | "approved_similar" | "denied";

export interface PermissionOutcome {
  requestId: string;
  response: PermissionResponse;
  /** Resolved by the timeout rather than an approver */
  timedOut: boolean;
  /** Resolved by cancellation rather than an approver */
  cancelled: boolean;
}
