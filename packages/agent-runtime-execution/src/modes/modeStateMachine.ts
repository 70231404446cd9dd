/**
 * Mode State Machine
 *
 * Plan/Build phases of a session. The only writer of the current mode: every
 * committed transition is kept in a bounded history and published on the bus.
 *
 * @example
 * ```typescript
 * const modes = createModeStateMachine({ eventBus });
 * modes.transition("enter_build", { reason: "user approved plan", source: "user" });
 * modes.getMode(); // "build"
 * ```
 */

import type { AgentEventBus } from "@steward/agent-runtime-control";
import {
  AGENT_MODES,
  type AgentMode,
  InvalidModeTransitionError,
  type ModeTransitionSource,
  toError,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";

// ============================================================================
// Types
// ============================================================================

export type ModeEvent = "enter_build" | "enter_plan";

export interface ModeTransition {
  readonly from: AgentMode;
  readonly to: AgentMode;
  readonly event: ModeEvent;
  readonly reason: string;
  readonly source: ModeTransitionSource;
  readonly timestamp: number;
}

export interface ModeTransitionOptions {
  reason?: string;
  source?: ModeTransitionSource;
}

export type ModeTransitionHandler = (transition: ModeTransition) => void;

export interface ModeStateMachineConfig {
  initialMode?: AgentMode;
  /** Transitions kept in history (default: 100) */
  maxHistorySize?: number;
  eventBus?: AgentEventBus;
  logger?: RuntimeLogger;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MAX_HISTORY_SIZE = 100;

/** Total: every mode accepts every event. */
const TRANSITIONS: Readonly<Record<AgentMode, Readonly<Record<ModeEvent, AgentMode>>>> = {
  plan: { enter_build: "build", enter_plan: "plan" },
  build: { enter_build: "build", enter_plan: "plan" },
};

const EVENT_FOR_MODE: Readonly<Record<AgentMode, ModeEvent>> = {
  plan: "enter_plan",
  build: "enter_build",
};

export function isAgentMode(value: string): value is AgentMode {
  return AGENT_MODES.some((mode) => mode === value);
}

// ============================================================================
// Implementation
// ============================================================================

export class ModeStateMachine {
  private mode: AgentMode;
  private readonly history: ModeTransition[] = [];
  private readonly maxHistorySize: number;
  private readonly handlers = new Set<ModeTransitionHandler>();
  private readonly eventBus?: AgentEventBus;
  private readonly logger: RuntimeLogger;

  constructor(config: ModeStateMachineConfig = {}) {
    this.mode = config.initialMode ?? "plan";
    this.maxHistorySize = config.maxHistorySize ?? DEFAULT_MAX_HISTORY_SIZE;
    this.eventBus = config.eventBus;
    this.logger = config.logger ?? getLogger("mode-state-machine");
  }

  getMode(): AgentMode {
    return this.mode;
  }

  getHistory(): readonly ModeTransition[] {
    return this.history;
  }

  /**
   * Apply an event. Returns the committed transition, or undefined when the
   * event targets the current mode.
   */
  transition(event: ModeEvent, options: ModeTransitionOptions = {}): ModeTransition | undefined {
    const next = TRANSITIONS[this.mode][event];
    if (next === this.mode) {
      return undefined;
    }

    const transition: ModeTransition = {
      from: this.mode,
      to: next,
      event,
      reason: options.reason ?? event,
      source: options.source ?? "user",
      timestamp: Date.now(),
    };

    this.mode = next;
    this.recordTransition(transition);
    this.logger.info("Agent mode changed", {
      from: transition.from,
      to: transition.to,
      source: transition.source,
    });
    this.eventBus?.publish({
      type: "mode_changed",
      from: transition.from,
      to: transition.to,
      reason: transition.reason,
      source: transition.source,
      timestamp: transition.timestamp,
    });
    this.notifyHandlers(transition);
    return transition;
  }

  /** Move to `mode`, accepting the name as a string (slash commands, env). */
  setMode(mode: string, options: ModeTransitionOptions = {}): ModeTransition | undefined {
    if (!isAgentMode(mode)) {
      throw new InvalidModeTransitionError(
        `Unknown agent mode "${mode}"; expected one of ${AGENT_MODES.join(", ")}`
      );
    }
    return this.transition(EVENT_FOR_MODE[mode], options);
  }

  onTransition(handler: ModeTransitionHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private recordTransition(transition: ModeTransition): void {
    this.history.push(transition);
    if (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }
  }

  private notifyHandlers(transition: ModeTransition): void {
    for (const handler of this.handlers) {
      try {
        handler(transition);
      } catch (error) {
        this.logger.error("Mode transition handler failed", toError(error));
      }
    }
  }
}

export function createModeStateMachine(config?: ModeStateMachineConfig): ModeStateMachine {
  return new ModeStateMachine(config);
}
