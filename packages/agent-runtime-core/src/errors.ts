/**
 * Runtime Error Taxonomy
 *
 * Tool-level errors are fed back to the model as tool messages; provider,
 * timeout and cancellation errors end the turn.
 */

import type { AgentMode } from "./safety";

export type AgentRuntimeErrorCode =
  | "UNKNOWN_TOOL"
  | "INVALID_ARGUMENTS"
  | "TOOL_EXECUTION_ERROR"
  | "PLAN_MODE_VIOLATION"
  | "PERMISSION_DENIED"
  | "SNAPSHOT_FAILURE"
  | "PROVIDER_ERROR"
  | "ORCHESTRATION_TIMEOUT"
  | "ORCHESTRATION_CANCELLED"
  | "INVALID_MODE_TRANSITION"
  | "INVALID_CONFIG"
  | "SESSION_BUSY";

export class AgentRuntimeError extends Error {
  readonly code: AgentRuntimeErrorCode;

  constructor(code: AgentRuntimeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentRuntimeError";
    this.code = code;
  }

  /** Turn-ending errors; everything else is reported back to the model */
  get fatal(): boolean {
    return (
      this.code === "PROVIDER_ERROR" ||
      this.code === "ORCHESTRATION_TIMEOUT" ||
      this.code === "ORCHESTRATION_CANCELLED"
    );
  }
}

export class UnknownToolError extends AgentRuntimeError {
  readonly toolName: string;

  constructor(toolName: string) {
    super("UNKNOWN_TOOL", `Tool "${toolName}" is not registered`);
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export class InvalidArgumentsError extends AgentRuntimeError {
  readonly toolName: string;

  constructor(toolName: string, detail: string) {
    super("INVALID_ARGUMENTS", `Invalid arguments for "${toolName}": ${detail}`);
    this.name = "InvalidArgumentsError";
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends AgentRuntimeError {
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super("TOOL_EXECUTION_ERROR", `Tool "${toolName}" failed: ${getErrorMessage(cause)}`, {
      cause,
    });
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class PlanModeViolationError extends AgentRuntimeError {
  readonly toolName: string;
  readonly mode: AgentMode;

  constructor(toolName: string, mode: AgentMode = "plan") {
    super(
      "PLAN_MODE_VIOLATION",
      `Tool "${toolName}" is not allowed in ${mode} mode; switch to build mode first`
    );
    this.name = "PlanModeViolationError";
    this.toolName = toolName;
    this.mode = mode;
  }
}

export class PermissionDeniedError extends AgentRuntimeError {
  readonly toolName: string;
  readonly timedOut: boolean;

  constructor(toolName: string, reason: string, timedOut = false) {
    super("PERMISSION_DENIED", `Permission denied for "${toolName}": ${reason}`);
    this.name = "PermissionDeniedError";
    this.toolName = toolName;
    this.timedOut = timedOut;
  }
}

export class SnapshotFailureError extends AgentRuntimeError {
  constructor(cause: unknown) {
    super("SNAPSHOT_FAILURE", `Snapshot failed: ${getErrorMessage(cause)}`, { cause });
    this.name = "SnapshotFailureError";
  }
}

export class ProviderError extends AgentRuntimeError {
  readonly provider: string;

  constructor(provider: string, cause: unknown) {
    super("PROVIDER_ERROR", `Provider "${provider}" failed: ${getErrorMessage(cause)}`, {
      cause,
    });
    this.name = "ProviderError";
    this.provider = provider;
  }
}

export class OrchestrationTimeoutError extends AgentRuntimeError {
  readonly limit: "turns" | "duration";

  constructor(limit: "turns" | "duration", detail: string) {
    super("ORCHESTRATION_TIMEOUT", `Orchestration ceiling reached (${limit}): ${detail}`);
    this.name = "OrchestrationTimeoutError";
    this.limit = limit;
  }
}

export class OrchestrationCancelledError extends AgentRuntimeError {
  constructor(reason: string) {
    super("ORCHESTRATION_CANCELLED", `Turn cancelled: ${reason}`);
    this.name = "OrchestrationCancelledError";
  }
}

export class SessionBusyError extends AgentRuntimeError {
  constructor() {
    super("SESSION_BUSY", "A message is already being processed in this session");
    this.name = "SessionBusyError";
  }
}

export class InvalidModeTransitionError extends AgentRuntimeError {
  constructor(message: string) {
    super("INVALID_MODE_TRANSITION", message);
    this.name = "InvalidModeTransitionError";
  }
}

export class InvalidConfigError extends AgentRuntimeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIG", `Invalid session config: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
