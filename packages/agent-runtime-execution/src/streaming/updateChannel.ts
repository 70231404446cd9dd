/**
 * Streaming Update Channel
 *
 * Ordered, single-consumer stream of AgentUpdates for one turn. A `complete`
 * or `error` update ends the stream; emitting after that throws.
 *
 * @example
 * ```typescript
 * const channel = createUpdateChannel();
 * channel.emit({ type: "text_chunk", content: "Hi", delta: true });
 * channel.emit({ type: "complete", totalTokens: 12, toolStatusMessages: [] });
 *
 * for await (const update of channel) {
 *   render(update);
 * }
 * ```
 *
 * @module streaming/updateChannel
 */

import { type AgentUpdate, isTerminalUpdate, type UpdateSink } from "@steward/agent-runtime-core";

// ============================================================================
// Types
// ============================================================================

export class UpdateChannelClosedError extends Error {
  constructor(update: AgentUpdate) {
    super(`Update channel is closed; cannot emit "${update.type}"`);
    this.name = "UpdateChannelClosedError";
  }
}

// ============================================================================
// Implementation
// ============================================================================

export class UpdateChannel implements UpdateSink, AsyncIterable<AgentUpdate> {
  private readonly buffer: AgentUpdate[] = [];
  private waiter: ((update: AgentUpdate | undefined) => void) | undefined;
  private isClosed = false;
  private iterated = false;

  /** True once a terminal update was emitted or close() was called */
  get closed(): boolean {
    return this.isClosed;
  }

  emit(update: AgentUpdate): void {
    if (this.isClosed) {
      throw new UpdateChannelClosedError(update);
    }
    if (isTerminalUpdate(update)) {
      this.isClosed = true;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(update);
    } else {
      this.buffer.push(update);
    }
  }

  /** End the stream without a terminal update. */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
  }

  /** Next update in emission order; undefined once the stream has ended. */
  next(): Promise<AgentUpdate | undefined> {
    const buffered = this.buffer.shift();
    if (buffered || this.isClosed) {
      return Promise.resolve(buffered);
    }
    if (this.waiter) {
      return Promise.reject(new Error("Update channel already has a pending reader"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Everything left in the stream, once it ends. */
  async drain(): Promise<AgentUpdate[]> {
    const updates: AgentUpdate[] = [];
    for await (const update of this) {
      updates.push(update);
    }
    return updates;
  }

  [Symbol.asyncIterator](): AsyncIterator<AgentUpdate> {
    if (this.iterated) {
      throw new Error("Update channel supports a single consumer");
    }
    this.iterated = true;
    return {
      next: async (): Promise<IteratorResult<AgentUpdate>> => {
        const update = await this.next();
        return update ? { done: false, value: update } : { done: true, value: undefined };
      },
    };
  }
}

export function createUpdateChannel(): UpdateChannel {
  return new UpdateChannel();
}
