/**
 * Conversation
 *
 * Append-only history for one session plus its working context. Messages are
 * frozen once appended; a tool call's result can be set once.
 */

import type {
  ConversationMessage,
  ConversationTask,
  MessageRole,
  ProjectContext,
  TaskStatus,
  ToolCallRecord,
  ToolCallRequest,
  ToolResult,
} from "@steward/agent-runtime-core";

export interface AppendMessageInput {
  role: MessageRole;
  content: string;
  toolCalls?: readonly ToolCallRequest[];
  toolCallId?: string;
}

export class Conversation {
  private readonly messages: ConversationMessage[] = [];
  private readonly toolCalls = new Map<string, ToolCallRecord>();
  private readonly activeFiles = new Set<string>();
  private readonly tasks: ConversationTask[] = [];
  private taskCounter = 0;

  constructor(
    readonly projectContext: ProjectContext,
    private readonly now: () => number = Date.now
  ) {}

  append(input: AppendMessageInput): ConversationMessage {
    const toolCalls = input.toolCalls?.map((call) =>
      Object.freeze({ ...call, arguments: Object.freeze({ ...call.arguments }) })
    );
    const message: ConversationMessage = Object.freeze({
      role: input.role,
      content: input.content,
      toolCalls: toolCalls ? Object.freeze(toolCalls) : undefined,
      toolCallId: input.toolCallId,
      timestamp: this.now(),
    });
    this.messages.push(message);

    for (const call of toolCalls ?? []) {
      this.toolCalls.set(
        call.id,
        Object.freeze({ id: call.id, toolName: call.name, parameters: call.arguments })
      );
    }
    return message;
  }

  getMessages(): readonly ConversationMessage[] {
    return this.messages.slice();
  }

  get length(): number {
    return this.messages.length;
  }

  getToolCall(id: string): ToolCallRecord | undefined {
    return this.toolCalls.get(id);
  }

  /** Throws when the call is unknown or already has a result. */
  setToolResult(id: string, result: ToolResult): ToolCallRecord {
    const record = this.toolCalls.get(id);
    if (!record) {
      throw new Error(`Unknown tool call "${id}"`);
    }
    if (record.result) {
      throw new Error(`Tool call "${id}" already has a result`);
    }
    const updated: ToolCallRecord = Object.freeze({ ...record, result });
    this.toolCalls.set(id, updated);
    return updated;
  }

  addActiveFile(path: string): void {
    this.activeFiles.add(path);
  }

  getActiveFiles(): string[] {
    return Array.from(this.activeFiles);
  }

  addTask(description: string): ConversationTask {
    this.taskCounter += 1;
    const task: ConversationTask = Object.freeze({
      id: `task_${this.taskCounter}`,
      description,
      status: "pending",
      createdAt: this.now(),
    });
    this.tasks.push(task);
    return task;
  }

  updateTask(id: string, status: TaskStatus): ConversationTask {
    const index = this.tasks.findIndex((task) => task.id === id);
    const current = this.tasks[index];
    if (index < 0 || !current) {
      throw new Error(`Unknown task "${id}"`);
    }
    const finished = status === "completed" || status === "cancelled";
    const updated: ConversationTask = Object.freeze({
      ...current,
      status,
      completedAt: finished ? this.now() : undefined,
    });
    this.tasks[index] = updated;
    return updated;
  }

  getTasks(): readonly ConversationTask[] {
    return this.tasks.slice();
  }
}

export function createConversation(projectContext: ProjectContext): Conversation {
  return new Conversation(projectContext);
}
