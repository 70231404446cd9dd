/**
 * Tool Registry
 *
 * Name-indexed set of tool capabilities. Execution is timed, tool failures
 * come back as failed results, and every call lands in a bounded status log.
 */

import type { AgentEventBus } from "@steward/agent-runtime-control";
import {
  errorResult,
  getErrorMessage,
  type ToolCapability,
  type ToolExecutionContext,
  ToolExecutionError,
  type ToolErrorCode,
  type ToolResult,
  type ToolSchema,
  UnknownToolError,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";

// ============================================================================
// Types
// ============================================================================

export interface ToolStatusEntry {
  callId: string;
  toolName: string;
  success: boolean;
  durationMs: number;
  errorCode?: ToolErrorCode;
  timestamp: number;
}

/** The subset of the registry that executes tools */
export interface ToolExecutor {
  has(name: string): boolean;
  get(name: string): ToolCapability | undefined;
  list(): ToolCapability[];
  schemas(): ToolSchema[];
  /** Throws UnknownToolError for unregistered names */
  execute(
    name: string,
    params: Record<string, unknown>,
    context: ToolExecutionContext
  ): Promise<ToolResult>;
}

export interface IToolRegistry extends ToolExecutor {
  register(tool: ToolCapability): void;
  unregister(name: string): boolean;
  readOnlyView(): ToolExecutor;
  getStatusLog(): ToolStatusEntry[];
}

export interface ToolRegistryOptions {
  eventBus?: AgentEventBus;
  logger?: RuntimeLogger;
  /** Entries kept in the status log */
  statusLogLimit?: number;
}

// ============================================================================
// Tool Registry Implementation
// ============================================================================

export class ToolRegistry implements IToolRegistry {
  private readonly tools = new Map<string, ToolCapability>();
  private readonly statusLog: ToolStatusEntry[] = [];
  private readonly eventBus?: AgentEventBus;
  private readonly logger: RuntimeLogger;
  private readonly statusLogLimit: number;
  private callCounter = 0;

  constructor(options: ToolRegistryOptions = {}) {
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? getLogger("tool-registry");
    this.statusLogLimit = options.statusLogLimit ?? 200;
  }

  register(tool: ToolCapability): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    this.logger.debug("Tool registered", { toolName: tool.name, readOnly: tool.readOnly });
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolCapability | undefined {
    return this.tools.get(name);
  }

  list(): ToolCapability[] {
    return Array.from(this.tools.values());
  }

  schemas(): ToolSchema[] {
    return this.list().map(toSchema);
  }

  async execute(
    name: string,
    params: Record<string, unknown>,
    context: ToolExecutionContext
  ): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }

    const callId = context.callId ?? this.generateCallId();
    const startTime = Date.now();
    let result: ToolResult;

    try {
      result = await tool.execute(params, { ...context, callId });
    } catch (err) {
      const error = new ToolExecutionError(name, err);
      this.logger.warn("Tool threw during execution", {
        toolName: name,
        callId,
        error: getErrorMessage(err),
      });
      result = errorResult("TOOL_EXECUTION_ERROR", error.message);
    }

    const durationMs = Date.now() - startTime;
    const resultWithMeta: ToolResult = { ...result, meta: { durationMs, toolName: name } };
    this.recordStatus({
      callId,
      toolName: name,
      success: result.success,
      durationMs,
      errorCode: result.error?.code,
      timestamp: Date.now(),
    });
    return resultWithMeta;
  }

  readOnlyView(): ToolExecutor {
    return new ReadOnlyToolView(this);
  }

  getStatusLog(): ToolStatusEntry[] {
    return [...this.statusLog];
  }

  private recordStatus(entry: ToolStatusEntry): void {
    this.statusLog.push(entry);
    if (this.statusLog.length > this.statusLogLimit) {
      this.statusLog.shift();
    }
    this.eventBus?.publish({
      type: "tool_executed",
      toolName: entry.toolName,
      callId: entry.callId,
      success: entry.success,
      durationMs: entry.durationMs,
      timestamp: entry.timestamp,
    });
  }

  private generateCallId(): string {
    this.callCounter++;
    return `call_${Date.now().toString(36)}_${this.callCounter.toString(36)}`;
  }
}

// ============================================================================
// Read-Only View
// ============================================================================

/**
 * Exposes only read-only tools. Mutating tools do not exist from inside the
 * view, so calling one fails with UnknownToolError.
 */
class ReadOnlyToolView implements ToolExecutor {
  constructor(private readonly base: ToolExecutor) {}

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  get(name: string): ToolCapability | undefined {
    const tool = this.base.get(name);
    return tool?.readOnly ? tool : undefined;
  }

  list(): ToolCapability[] {
    return this.base.list().filter((tool) => tool.readOnly);
  }

  schemas(): ToolSchema[] {
    return this.list().map(toSchema);
  }

  execute(
    name: string,
    params: Record<string, unknown>,
    context: ToolExecutionContext
  ): Promise<ToolResult> {
    if (!this.has(name)) {
      return Promise.reject(new UnknownToolError(name));
    }
    return this.base.execute(name, params, context);
  }
}

function toSchema(tool: ToolCapability): ToolSchema {
  return { name: tool.name, description: tool.description, inputSchema: tool.inputSchema };
}

// ============================================================================
// Factory
// ============================================================================

export function createToolRegistry(options?: ToolRegistryOptions): ToolRegistry {
  return new ToolRegistry(options);
}
