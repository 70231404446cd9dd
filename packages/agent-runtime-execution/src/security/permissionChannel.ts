/**
 * Permission Channel
 *
 * Bounded queue between tool calls that need a human decision and whoever
 * approves them. A requester waits only on its own reply slot; every request
 * settles exactly once, by an approver, the timeout, cancellation or close().
 */

import type { AgentEventBus } from "@steward/agent-runtime-control";
import type {
  PermissionOutcome,
  PermissionRequest,
  PermissionResponse,
} from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_PERMISSION_CAPACITY = 10;
export const DEFAULT_PERMISSION_TIMEOUT_MS = 60_000;

export interface PermissionChannelConfig {
  /** Requests that may wait in the queue before requesters block */
  capacity?: number;
  /** Per-request wait before resolving as denied */
  timeoutMs?: number;
  eventBus?: AgentEventBus;
  logger?: RuntimeLogger;
}

export interface PermissionRequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** A dequeued request with its reply slot. */
export interface PermissionTicket {
  readonly request: PermissionRequest;
  readonly settled: boolean;
  /** False when the request was already settled (timed out, cancelled, answered) */
  respond(response: PermissionResponse): boolean;
}

interface ChannelEntry extends PermissionTicket {
  settle(response: PermissionResponse, flags: { timedOut?: boolean; cancelled?: boolean }): boolean;
}

// ============================================================================
// Implementation
// ============================================================================

export class PermissionChannel implements AsyncIterable<PermissionTicket> {
  private readonly capacity: number;
  private readonly timeoutMs: number;
  private readonly eventBus?: AgentEventBus;
  private readonly logger: RuntimeLogger;

  /** Admitted, not yet handed to an approver */
  private readonly queue: ChannelEntry[] = [];
  /** Waiting for queue space */
  private readonly overflow: ChannelEntry[] = [];
  /** Every unsettled entry, dequeued or not */
  private readonly unsettled = new Set<ChannelEntry>();
  private readonly approverWaiters: Array<(ticket: PermissionTicket | undefined) => void> = [];
  private isClosed = false;

  constructor(config: PermissionChannelConfig = {}) {
    this.capacity = Math.max(1, config.capacity ?? DEFAULT_PERMISSION_CAPACITY);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_PERMISSION_TIMEOUT_MS;
    this.eventBus = config.eventBus;
    this.logger = config.logger ?? getLogger("permission-channel");
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Requests queued for an approver, including those waiting for space */
  get pending(): number {
    return this.queue.length + this.overflow.length;
  }

  // ==========================================================================
  // Requester Side
  // ==========================================================================

  request(
    request: PermissionRequest,
    options: PermissionRequestOptions = {}
  ): Promise<PermissionOutcome> {
    if (this.isClosed) {
      return Promise.resolve({
        requestId: request.id,
        response: "denied",
        timedOut: false,
        cancelled: true,
      });
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const signal = options.signal;

    return new Promise<PermissionOutcome>((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = (): void => {
        entry.settle("denied", { cancelled: true });
      };

      const entry: ChannelEntry = {
        request,
        get settled() {
          return settled;
        },
        respond: (response) => entry.settle(response, {}),
        settle: (response, flags) => {
          if (settled) {
            return false;
          }
          settled = true;
          if (timer) {
            clearTimeout(timer);
          }
          signal?.removeEventListener("abort", onAbort);
          this.withdraw(entry);

          const outcome: PermissionOutcome = {
            requestId: request.id,
            response,
            timedOut: flags.timedOut ?? false,
            cancelled: flags.cancelled ?? false,
          };
          this.eventBus?.publish({
            type: "permission_resolved",
            requestId: request.id,
            response,
            timedOut: outcome.timedOut,
            timestamp: Date.now(),
          });
          if (outcome.timedOut) {
            this.logger.warn("Permission request timed out", { requestId: request.id, timeoutMs });
          }
          resolve(outcome);
          return true;
        },
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      timer = setTimeout(() => {
        entry.settle("denied", { timedOut: true });
      }, timeoutMs);

      this.unsettled.add(entry);
      this.eventBus?.publish({
        type: "permission_requested",
        requestId: request.id,
        toolName: request.pendingChange.toolName,
        safetyLevel: request.pendingChange.safetyLevel,
        timestamp: Date.now(),
      });
      this.admit(entry);
    });
  }

  // ==========================================================================
  // Approver Side
  // ==========================================================================

  /** Next request awaiting a decision; undefined once the channel is closed. */
  next(): Promise<PermissionTicket | undefined> {
    const ticket = this.tryNext();
    if (ticket || this.isClosed) {
      return Promise.resolve(ticket);
    }
    return new Promise((resolve) => {
      this.approverWaiters.push(resolve);
    });
  }

  tryNext(): PermissionTicket | undefined {
    const entry = this.queue.shift();
    if (entry) {
      this.promoteOverflow();
    }
    return entry;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<PermissionTicket> {
    while (true) {
      const ticket = await this.next();
      if (!ticket) {
        return;
      }
      yield ticket;
    }
  }

  /** Deny everything still pending and stop accepting requests. */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    for (const entry of Array.from(this.unsettled)) {
      entry.settle("denied", { cancelled: true });
    }
    for (const waiter of this.approverWaiters.splice(0)) {
      waiter(undefined);
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private admit(entry: ChannelEntry): void {
    const waiter = this.approverWaiters.shift();
    if (waiter) {
      waiter(entry);
      return;
    }
    if (this.queue.length < this.capacity) {
      this.queue.push(entry);
    } else {
      this.logger.debug("Permission queue full, request waiting for space", {
        requestId: entry.request.id,
      });
      this.overflow.push(entry);
    }
  }

  private withdraw(entry: ChannelEntry): void {
    this.unsettled.delete(entry);
    const queued = this.queue.indexOf(entry);
    if (queued >= 0) {
      this.queue.splice(queued, 1);
      this.promoteOverflow();
      return;
    }
    const waiting = this.overflow.indexOf(entry);
    if (waiting >= 0) {
      this.overflow.splice(waiting, 1);
    }
  }

  private promoteOverflow(): void {
    while (this.queue.length < this.capacity) {
      const entry = this.overflow.shift();
      if (!entry) {
        return;
      }
      this.queue.push(entry);
    }
  }
}

export function createPermissionChannel(config?: PermissionChannelConfig): PermissionChannel {
  return new PermissionChannel(config);
}
