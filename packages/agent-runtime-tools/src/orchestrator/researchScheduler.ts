/**
 * Research Subagent Scheduler
 *
 * Runs research tasks with bounded concurrency. Extra submissions queue in
 * FIFO order. Each task gets its own AbortSignal and only the read-only tool
 * view; cancellation is cooperative with a grace deadline after which the
 * handle reports cancelled regardless.
 */

import type { AgentEventBus } from "@steward/agent-runtime-control";
import {
  getErrorMessage,
  OrchestrationCancelledError,
  type ResearchFindings,
  type ResearchHandle,
  type ResearchProgress,
  type ResearchResult,
  type ResearchTask,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";
import type { ToolExecutor } from "../tools/registry";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_MAX_CONCURRENT_RESEARCH = 3;

export interface ResearchRunContext {
  signal: AbortSignal;
  /** Read-only tools only */
  tools: ToolExecutor;
  projectRoot: string;
  reportProgress(stepsCompleted: number, message?: string): void;
  /** Throws OrchestrationCancelledError once the task is cancelled */
  throwIfCancelled(): void;
}

export type ResearchRunner = (
  task: ResearchTask,
  context: ResearchRunContext
) => Promise<ResearchFindings>;

export interface ResearchSchedulerConfig {
  runner: ResearchRunner;
  tools: ToolExecutor;
  projectRoot: string;
  maxConcurrent?: number;
  /** How long a cancelled running task may take to stop before it is reported cancelled */
  cancelGraceMs?: number;
  eventBus?: AgentEventBus;
  logger?: RuntimeLogger;
}

export interface ResearchSchedulerStats {
  running: number;
  queued: number;
  completed: number;
  /** Highest number of tasks ever running at once */
  peakRunning: number;
}

// ============================================================================
// Job
// ============================================================================

class ResearchJob implements ResearchHandle {
  readonly controller = new AbortController();
  readonly submittedAt = Date.now();
  startedAt: number | undefined;
  graceTimer: ReturnType<typeof setTimeout> | undefined;

  private progress: ResearchProgress = { state: "queued", stepsCompleted: 0 };
  private settled: ResearchResult | undefined;
  private resolveResult: ((result: ResearchResult) => void) | undefined;
  private readonly resultPromise: Promise<ResearchResult>;

  constructor(
    readonly task: ResearchTask,
    private readonly onCancel: (job: ResearchJob, reason: string) => void
  ) {
    this.resultPromise = new Promise((resolve) => {
      this.resolveResult = resolve;
    });
  }

  get taskId(): string {
    return this.task.id;
  }

  get isSettled(): boolean {
    return this.settled !== undefined;
  }

  poll(): ResearchProgress {
    return { ...this.progress };
  }

  cancel(reason = "cancelled"): void {
    this.onCancel(this, reason);
  }

  result(): Promise<ResearchResult> {
    return this.resultPromise;
  }

  markRunning(): void {
    this.startedAt = Date.now();
    this.progress = { state: "running", stepsCompleted: 0 };
  }

  reportProgress(stepsCompleted: number, message?: string): void {
    if (this.progress.state === "running") {
      this.progress = { state: "running", stepsCompleted, message };
    }
  }

  elapsedMs(): number {
    return Date.now() - (this.startedAt ?? this.submittedAt);
  }

  /** First settlement wins; returns false when already settled */
  settle(result: ResearchResult): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = result;
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = undefined;
    }
    this.progress = {
      state: "done",
      stepsCompleted: this.progress.stepsCompleted,
      message: result.status,
    };
    this.resolveResult?.(result);
    return true;
  }
}

// ============================================================================
// Scheduler Implementation
// ============================================================================

export class ResearchScheduler {
  private readonly queue: ResearchJob[] = [];
  private readonly running = new Set<ResearchJob>();
  private readonly runner: ResearchRunner;
  private readonly tools: ToolExecutor;
  private readonly projectRoot: string;
  private readonly maxConcurrent: number;
  private readonly cancelGraceMs: number;
  private readonly eventBus?: AgentEventBus;
  private readonly logger: RuntimeLogger;

  private completed = 0;
  private peakRunning = 0;

  constructor(config: ResearchSchedulerConfig) {
    this.runner = config.runner;
    this.tools = config.tools;
    this.projectRoot = config.projectRoot;
    this.maxConcurrent = Math.max(1, config.maxConcurrent ?? DEFAULT_MAX_CONCURRENT_RESEARCH);
    this.cancelGraceMs = config.cancelGraceMs ?? 5_000;
    this.eventBus = config.eventBus;
    this.logger = config.logger ?? getLogger("research-scheduler");
  }

  submit(task: ResearchTask): ResearchHandle {
    const job = new ResearchJob(task, (target, reason) => this.cancelJob(target, reason));
    this.queue.push(job);
    this.logger.debug("Research task queued", {
      taskId: task.id,
      agentType: task.agentType,
      queued: this.queue.length,
    });
    this.pump();
    return job;
  }

  cancelAll(reason = "cancelled"): void {
    for (const job of [...this.queue, ...this.running]) {
      this.cancelJob(job, reason);
    }
  }

  getStats(): ResearchSchedulerStats {
    return {
      running: this.running.size,
      queued: this.queue.length,
      completed: this.completed,
      peakRunning: this.peakRunning,
    };
  }

  private pump(): void {
    while (this.running.size < this.maxConcurrent) {
      const job = this.queue.shift();
      if (!job) {
        return;
      }
      void this.run(job);
    }
  }

  private async run(job: ResearchJob): Promise<void> {
    this.running.add(job);
    this.peakRunning = Math.max(this.peakRunning, this.running.size);
    job.markRunning();

    const signal = job.controller.signal;
    const context: ResearchRunContext = {
      signal,
      tools: this.tools,
      projectRoot: this.projectRoot,
      reportProgress: (steps, message) => job.reportProgress(steps, message),
      throwIfCancelled: () => {
        if (signal.aborted) {
          throw new OrchestrationCancelledError(abortReason(signal));
        }
      },
    };

    try {
      const findings = await this.runner(job.task, context);
      if (signal.aborted) {
        this.finish(job, cancelledResult(job, abortReason(signal)));
      } else {
        this.finish(job, {
          status: "success",
          taskId: job.taskId,
          durationMs: job.elapsedMs(),
          ...findings,
        });
      }
    } catch (error) {
      this.finish(
        job,
        signal.aborted
          ? cancelledResult(job, abortReason(signal))
          : {
              status: "failed",
              taskId: job.taskId,
              durationMs: job.elapsedMs(),
              error: getErrorMessage(error),
            }
      );
    } finally {
      this.running.delete(job);
      this.pump();
    }
  }

  private cancelJob(job: ResearchJob, reason: string): void {
    if (job.isSettled) {
      return;
    }

    const queuedIndex = this.queue.indexOf(job);
    if (queuedIndex !== -1) {
      this.queue.splice(queuedIndex, 1);
      job.controller.abort(reason);
      this.finish(job, cancelledResult(job, reason));
      return;
    }

    if (job.controller.signal.aborted) {
      return;
    }
    job.controller.abort(reason);
    // The slot stays taken until the runner actually returns
    job.graceTimer = setTimeout(() => {
      this.logger.warn("Research task ignored cancellation", {
        taskId: job.taskId,
        graceMs: this.cancelGraceMs,
      });
      this.finish(job, cancelledResult(job, reason));
    }, this.cancelGraceMs);
  }

  private finish(job: ResearchJob, result: ResearchResult): void {
    if (!job.settle(result)) {
      return;
    }
    this.completed++;
    this.logger.debug("Research task finished", {
      taskId: job.taskId,
      status: result.status,
      durationMs: result.durationMs,
    });
    this.eventBus?.publish({
      type: "research_completed",
      taskId: job.taskId,
      status: result.status,
      durationMs: result.durationMs,
      timestamp: Date.now(),
    });
  }
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return typeof reason === "string" ? reason : getErrorMessage(reason ?? "cancelled");
}

function cancelledResult(job: ResearchJob, reason: string): ResearchResult {
  return { status: "cancelled", taskId: job.taskId, durationMs: job.elapsedMs(), reason };
}

// ============================================================================
// Factory
// ============================================================================

export function createResearchScheduler(config: ResearchSchedulerConfig): ResearchScheduler {
  return new ResearchScheduler(config);
}
