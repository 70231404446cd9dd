/**
 * Agent Controller
 *
 * The multi-turn loop for one session: ask the provider, stream its text,
 * run requested tools one at a time through the tool-call pipeline, feed the
 * results back, and stop on a final answer or a ceiling.
 *
 * @example
 * ```typescript
 * const controller = createAgentController({ conversation, pipeline, tools, modes, classifier, router });
 * const result = await controller.processMessage("fix the failing test", provider, undefined, {
 *   updates: channel,
 * });
 * ```
 *
 * @module orchestrator/agentController
 */

import type { AgentEventBus } from "@steward/agent-runtime-control";
import {
  AgentRuntimeError,
  type AgentType,
  type ChatResponse,
  type ConversationMessage,
  getErrorMessage,
  type LLMProvider,
  type ModelConfig,
  modelKey,
  OrchestrationCancelledError,
  OrchestrationTimeoutError,
  ProviderError,
  errorResult,
  renderToolContent,
  SessionBusyError,
  type TaskComplexity,
  type ToolCallRequest,
  type ToolSchema,
  type UpdateSink,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";
import type { ToolExecutor } from "@steward/agent-runtime-tools";
import type { ModeClassifier, ModeRecommendation } from "../modes/modeClassifier";
import type { ModeStateMachine } from "../modes/modeStateMachine";
import type { ModelRouter } from "../routing/modelRouter";
import type { Conversation } from "./conversation";
import {
  changedFiles,
  formatToolStatus,
  type ToolCallOutcome,
  type ToolCallPipeline,
} from "./toolCallPipeline";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_MAX_TURNS = 10;
export const DEFAULT_MAX_TURN_DURATION_MS = 300_000;

/** Decides whether a classifier recommendation is committed. */
export type ModeChangeConfirmation = (
  recommendation: ModeRecommendation
) => boolean | Promise<boolean>;

export interface AgentControllerConfig {
  conversation: Conversation;
  pipeline: ToolCallPipeline;
  tools: ToolExecutor;
  modes: ModeStateMachine;
  classifier: ModeClassifier;
  router: ModelRouter;
  sessionId?: string;
  /** Provider round-trips per processMessage call */
  maxTurns?: number;
  /** Wall-clock ceiling per processMessage call */
  maxTurnDurationMs?: number;
  maxTokens?: number;
  temperature?: number;
  confirmModeChange?: ModeChangeConfirmation;
  eventBus?: AgentEventBus;
  logger?: RuntimeLogger;
}

export interface ProcessMessageOptions {
  updates?: UpdateSink;
  signal?: AbortSignal;
  complexity?: TaskComplexity;
  agentType?: AgentType;
}

export interface ProcessMessageResult {
  /** Final assistant text */
  response: string;
  toolStatusMessages: string[];
  totalTokens: number;
  /** Provider round-trips taken */
  turns: number;
  /** Model used for the last round-trip */
  model: ModelConfig;
}

const NOOP_SINK: UpdateSink = { emit: () => undefined };

// ============================================================================
// Helpers
// ============================================================================

/** Normalize an abort reason into the error the turn rejects with. */
function abortError(signal: AbortSignal): AgentRuntimeError {
  const reason: unknown = signal.reason;
  if (reason instanceof AgentRuntimeError) {
    return reason;
  }
  return new OrchestrationCancelledError(reason === undefined ? "aborted" : getErrorMessage(reason));
}

/** Settle with `promise`, or reject as soon as `signal` aborts. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortError(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

// ============================================================================
// Controller
// ============================================================================

export class AgentController {
  private readonly config: AgentControllerConfig;
  private readonly maxTurns: number;
  private readonly maxTurnDurationMs: number;
  private readonly logger: RuntimeLogger;
  private activeTurn: AbortController | undefined;

  constructor(config: AgentControllerConfig) {
    this.config = config;
    this.maxTurns = config.maxTurns ?? DEFAULT_MAX_TURNS;
    this.maxTurnDurationMs = config.maxTurnDurationMs ?? DEFAULT_MAX_TURN_DURATION_MS;
    this.logger = config.logger ?? getLogger("agent-controller");
  }

  get busy(): boolean {
    return this.activeTurn !== undefined;
  }

  /**
   * Run one user message to completion. `model` is a user override; without
   * it the router picks from the inferred complexity and agent type.
   */
  async processMessage(
    text: string,
    provider: LLMProvider,
    model?: ModelConfig,
    options: ProcessMessageOptions = {}
  ): Promise<ProcessMessageResult> {
    const updates = options.updates ?? NOOP_SINK;
    if (this.activeTurn) {
      const busy = new SessionBusyError();
      updates.emit({ type: "error", code: busy.code, message: busy.message });
      throw busy;
    }

    const turn = new AbortController();
    this.activeTurn = turn;

    const onExternalAbort = (): void => {
      turn.abort(abortError(options.signal ?? turn.signal));
    };
    if (options.signal?.aborted) {
      onExternalAbort();
    }
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
    const deadline = setTimeout(() => {
      turn.abort(
        new OrchestrationTimeoutError("duration", `exceeded ${this.maxTurnDurationMs}ms`)
      );
    }, this.maxTurnDurationMs);

    try {
      const result = await this.runLoop(text, provider, model, options, updates, turn.signal);
      updates.emit({
        type: "complete",
        totalTokens: result.totalTokens,
        toolStatusMessages: [...result.toolStatusMessages],
      });
      return result;
    } catch (error) {
      const failure = turn.signal.aborted ? abortError(turn.signal) : error;
      const code = failure instanceof AgentRuntimeError ? failure.code : "INTERNAL_ERROR";
      this.logger.warn("Message processing failed", { code, error: getErrorMessage(failure) });
      updates.emit({ type: "error", code, message: getErrorMessage(failure) });
      throw failure;
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener("abort", onExternalAbort);
      this.activeTurn = undefined;
    }
  }

  /** Abort the running message, if any. Returns false when idle. */
  cancel(reason = "cancelled by user"): boolean {
    if (!this.activeTurn) {
      return false;
    }
    this.activeTurn.abort(new OrchestrationCancelledError(reason));
    return true;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async runLoop(
    text: string,
    provider: LLMProvider,
    model: ModelConfig | undefined,
    options: ProcessMessageOptions,
    updates: UpdateSink,
    signal: AbortSignal
  ): Promise<ProcessMessageResult> {
    const { conversation, router, modes } = this.config;

    await raceAbort(this.considerModeChange(text), signal);
    conversation.append({ role: "user", content: text });

    const complexity = options.complexity ?? router.estimateComplexity(text);
    const toolStatusMessages: string[] = [];
    let totalTokens = 0;

    for (let turnNumber = 1; turnNumber <= this.maxTurns; turnNumber++) {
      if (signal.aborted) {
        throw abortError(signal);
      }

      const agentType = options.agentType ?? router.resolveAgentType(modes.getMode(), text);
      const selected = router.select(complexity, agentType, model);
      const response = await this.callProvider(provider, selected, updates, signal);

      totalTokens += response.tokensUsed;
      const inputTokens = response.inputTokens ?? 0;
      router.recordUsage(
        selected,
        {
          inputTokens,
          outputTokens: response.outputTokens ?? Math.max(0, response.tokensUsed - inputTokens),
        },
        response.cost
      );

      const toolCalls = response.toolCallRequests ?? [];
      conversation.append({
        role: "assistant",
        content: response.content,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      });

      if (toolCalls.length === 0) {
        return {
          response: response.content,
          toolStatusMessages,
          totalTokens,
          turns: turnNumber,
          model: selected,
        };
      }

      for (const [index, call] of toolCalls.entries()) {
        if (signal.aborted) {
          const failure = abortError(signal);
          this.closeUnanswered(toolCalls.slice(index), failure.message);
          throw failure;
        }
        let outcome: ToolCallOutcome;
        try {
          outcome = await this.config.pipeline.run(call, {
            projectRoot: conversation.projectContext.rootPath,
            sessionId: this.config.sessionId,
            signal,
          });
        } catch (error) {
          this.closeUnanswered(toolCalls.slice(index), getErrorMessage(error));
          throw error;
        }

        conversation.setToolResult(call.id, outcome.result);
        conversation.append({
          role: "tool",
          content: renderToolContent(outcome.result),
          toolCallId: call.id,
        });
        if (outcome.result.success && outcome.pendingChange) {
          for (const file of changedFiles(outcome.pendingChange.change)) {
            conversation.addActiveFile(file);
          }
        }

        const status = formatToolStatus(outcome);
        toolStatusMessages.push(status);
        updates.emit({ type: "tool_status", toolName: call.name, message: status });
      }
    }

    throw new OrchestrationTimeoutError(
      "turns",
      `no final answer after ${this.maxTurns} provider round-trips`
    );
  }

  /**
   * Answer every tool call the turn will not run, so the history stays a
   * valid request for the next message.
   */
  private closeUnanswered(calls: ToolCallRequest[], reason: string): void {
    const { conversation } = this.config;
    for (const call of calls) {
      const result = errorResult("CANCELLED", `Not run: ${reason}`);
      conversation.setToolResult(call.id, result);
      conversation.append({
        role: "tool",
        content: renderToolContent(result),
        toolCallId: call.id,
      });
    }
  }

  private async callProvider(
    provider: LLMProvider,
    model: ModelConfig,
    updates: UpdateSink,
    signal: AbortSignal
  ): Promise<ChatResponse> {
    const { conversation, classifier, modes, tools } = this.config;
    const mode = modes.getMode();
    const systemMessage: ConversationMessage = {
      role: "system",
      content: classifier.systemPrompt(mode),
      timestamp: Date.now(),
    };
    const schemas: ToolSchema[] = classifier.filterTools(mode, tools.list()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));

    let streamed = false;
    const onTextDelta = (delta: string): void => {
      if (signal.aborted || delta.length === 0) {
        return;
      }
      streamed = true;
      updates.emit({ type: "text_chunk", content: delta, delta: true });
    };

    this.logger.debug("Calling provider", {
      provider: provider.name,
      model: modelKey(model),
      messages: conversation.length,
      tools: schemas.length,
    });

    let response: ChatResponse;
    try {
      response = await raceAbort(
        provider.chat(
          {
            model: model.model,
            messages: [systemMessage, ...conversation.getMessages()],
            tools: schemas,
            maxTokens: this.config.maxTokens,
            temperature: this.config.temperature,
            stream: true,
            signal,
          },
          { onTextDelta }
        ),
        signal
      );
    } catch (error) {
      if (signal.aborted) {
        throw abortError(signal);
      }
      throw new ProviderError(provider.name, error);
    }

    if (!streamed && response.content.length > 0) {
      updates.emit({
        type: "text_chunk",
        content: response.content,
        delta: false,
        tokensUsed: response.tokensUsed,
      });
    }
    return response;
  }

  private async considerModeChange(text: string): Promise<void> {
    const { classifier, modes, eventBus } = this.config;
    const current = modes.getMode();
    const recommendation = classifier.recommend(current, text);
    if (!recommendation) {
      return;
    }

    eventBus?.publish({
      type: "mode_recommended",
      current,
      recommended: recommendation.mode,
      reason: recommendation.reason,
      timestamp: Date.now(),
    });

    const confirm = this.config.confirmModeChange;
    if (confirm && (await confirm(recommendation))) {
      modes.setMode(recommendation.mode, { reason: recommendation.reason, source: "classifier" });
    }
  }
}

export function createAgentController(config: AgentControllerConfig): AgentController {
  return new AgentController(config);
}
