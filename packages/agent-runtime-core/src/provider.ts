/**
 * LLM Provider Contract
 *
 * Provider clients live outside the runtime; the controller only needs this.
 */

import type { ConversationMessage, ToolCallRequest } from "./conversation";
import type { ToolSchema } from "./tools";

export interface ChatRequest {
  model: string;
  messages: readonly ConversationMessage[];
  tools?: ToolSchema[];
  maxTokens?: number;
  temperature?: number;
  stream?: boolean;
  signal?: AbortSignal;
}

export interface ChatResponse {
  content: string;
  tokensUsed: number;
  inputTokens?: number;
  outputTokens?: number;
  /** Provider-reported cost in USD; estimated from model pricing when absent */
  cost?: number;
  toolCallRequests?: ToolCallRequest[];
}

export interface ChatCallbacks {
  /** Called for each streamed text delta, in order */
  onTextDelta?: (delta: string) => void;
}

export interface LLMProvider {
  readonly name: string;
  chat(request: ChatRequest, callbacks?: ChatCallbacks): Promise<ChatResponse>;
}
