/**
 * Conversation Types
 */

import type { ToolResult } from "./tools";

export type MessageRole = "user" | "assistant" | "system" | "tool";

/** A tool call as requested by the model */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** A requested call together with its outcome, once known */
export interface ToolCallRecord {
  readonly id: string;
  readonly toolName: string;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly result?: ToolResult;
}

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly toolCalls?: readonly ToolCallRequest[];
  /** Set on tool-role messages */
  readonly toolCallId?: string;
  readonly timestamp: number;
}

export interface ProjectContext {
  rootPath: string;
  language?: string;
  framework?: string;
}

export type TaskStatus = "pending" | "in_progress" | "completed" | "cancelled";

export interface ConversationTask {
  readonly id: string;
  readonly description: string;
  readonly status: TaskStatus;
  readonly createdAt: number;
  readonly completedAt?: number;
}
