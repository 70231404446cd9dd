/**
 * Streaming Updates
 *
 * What a frontend sees while a turn runs. `complete` and `error` are terminal.
 */

export type AgentUpdate =
  | { type: "tool_status"; toolName: string; message: string }
  | { type: "text_chunk"; content: string; delta: boolean; tokensUsed?: number }
  | { type: "complete"; totalTokens: number; toolStatusMessages: string[] }
  | { type: "error"; code: string; message: string };

export function isTerminalUpdate(update: AgentUpdate): boolean {
  return update.type === "complete" || update.type === "error";
}

export interface UpdateSink {
  emit(update: AgentUpdate): void;
}
