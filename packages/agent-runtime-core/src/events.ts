/**
 * Agent Events
 *
 * Payloads carried by the event bus. Every variant has a `type` tag and a
 * millisecond timestamp.
 */

import type { ResearchResult } from "./research";
import type { AgentMode, ApprovalMode, PermissionResponse, SafetyLevel } from "./safety";

export type ModeTransitionSource = "user" | "command" | "classifier";

export type DiagnosticLevel = "info" | "warning" | "error";

export type AgentEvent =
  | {
      type: "mode_changed";
      from: AgentMode;
      to: AgentMode;
      reason: string;
      source: ModeTransitionSource;
      timestamp: number;
    }
  | {
      type: "mode_recommended";
      current: AgentMode;
      recommended: AgentMode;
      reason: string;
      timestamp: number;
    }
  | { type: "approval_mode_changed"; from: ApprovalMode; to: ApprovalMode; timestamp: number }
  | {
      type: "tool_executed";
      toolName: string;
      callId: string;
      success: boolean;
      durationMs: number;
      timestamp: number;
    }
  | {
      type: "permission_requested";
      requestId: string;
      toolName: string;
      safetyLevel: SafetyLevel;
      timestamp: number;
    }
  | {
      type: "permission_resolved";
      requestId: string;
      response: PermissionResponse;
      timedOut: boolean;
      timestamp: number;
    }
  | { type: "snapshot_created"; snapshotId: string; reason: string; timestamp: number }
  | {
      type: "research_completed";
      taskId: string;
      status: ResearchResult["status"];
      durationMs: number;
      timestamp: number;
    }
  | {
      type: "usage_recorded";
      modelKey: string;
      inputTokens: number;
      outputTokens: number;
      cost: number;
      timestamp: number;
    }
  | {
      type: "diagnostic";
      level: DiagnosticLevel;
      source: string;
      message: string;
      timestamp: number;
    };

export type AgentEventType = AgentEvent["type"];

export type AgentEventOf<T extends AgentEventType> = Extract<AgentEvent, { type: T }>;
