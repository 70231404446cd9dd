/**
 * Tool Capability Types
 *
 * The contract every tool implements, plus the result envelope the registry
 * hands back to the controller.
 */

import type { ChangeType } from "./safety";

// ============================================================================
// Schemas
// ============================================================================

/** JSON Schema subset for tool parameters */
export interface JSONSchema {
  type: "object" | "string" | "number" | "boolean" | "array";
  properties?: Record<string, JSONSchemaProperty>;
  additionalProperties?: boolean;
  required?: string[];
  description?: string;
}

export interface JSONSchemaProperty {
  type?: "string" | "number" | "boolean" | "array" | "object";
  description?: string;
  enum?: string[];
  items?: JSONSchemaProperty;
  default?: unknown;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
}

/** What the model sees for each tool */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: JSONSchema;
}

// ============================================================================
// Results
// ============================================================================

export type ToolContent =
  | { type: "text"; text: string }
  | { type: "json"; value: unknown };

export type ToolErrorCode =
  | "UNKNOWN_TOOL"
  | "INVALID_ARGUMENTS"
  | "TOOL_EXECUTION_ERROR"
  | "PLAN_MODE_VIOLATION"
  | "READ_ONLY_MODE"
  | "PERMISSION_DENIED"
  | "PERMISSION_TIMEOUT"
  | "SNAPSHOT_FAILURE"
  | "CANCELLED";

export interface ToolError {
  code: ToolErrorCode;
  message: string;
}

export interface ToolResult {
  success: boolean;
  content: ToolContent[];
  error?: ToolError;
  /** Filled in by the registry */
  meta?: {
    durationMs: number;
    toolName: string;
  };
}

// ============================================================================
// Capability
// ============================================================================

export interface ToolExecutionContext {
  /** Absolute path every relative tool path resolves against */
  projectRoot: string;
  sessionId?: string;
  callId?: string;
  signal?: AbortSignal;
}

/**
 * A tool the agent can invoke. `readOnly` tools are the only ones allowed in
 * Plan mode and the only ones research tasks can see.
 */
export interface ToolCapability extends ToolSchema {
  readonly readOnly: boolean;
  execute(params: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolResult>;
  /**
   * Describe the side effect a call would have, without performing it.
   * Tools that omit this are classified from `readOnly` alone.
   */
  proposeAction?(params: Record<string, unknown>, context: ToolExecutionContext): Promise<ChangeType>;
}

export function textResult(text: string): ToolResult {
  return { success: true, content: [{ type: "text", text }] };
}

export function jsonResult(value: unknown): ToolResult {
  return { success: true, content: [{ type: "json", value }] };
}

export function errorResult(code: ToolErrorCode, message: string): ToolResult {
  return {
    success: false,
    content: [{ type: "text", text: message }],
    error: { code, message },
  };
}

/** Flatten result content into the text fed back to the model. */
export function renderToolContent(result: ToolResult): string {
  return result.content
    .map((item) => (item.type === "text" ? item.text : JSON.stringify(item.value)))
    .join("\n");
}
