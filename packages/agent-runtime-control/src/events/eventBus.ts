/**
 * Agent Event Bus
 *
 * Multi-listener bus for agent events. Publishing never blocks: every listener
 * owns a bounded buffer, and a listener that falls behind loses its oldest
 * events instead of slowing the publisher or its peers.
 */

import type { AgentEvent, AgentEventOf, AgentEventType } from "@steward/agent-runtime-core";
import { getErrorMessage } from "@steward/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@steward/agent-runtime-telemetry/logging";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_LISTENER_BUFFER_SIZE = 1000;

export interface EventBusConfig {
  /** Per-listener buffer size */
  bufferSize?: number;
  logger?: RuntimeLogger;
}

export interface ListenOptions {
  /** Overrides the bus default for this listener */
  bufferSize?: number;
  /** Only these event types are delivered */
  types?: readonly AgentEventType[];
  filter?: (event: AgentEvent) => boolean;
}

export interface EventListenerHandle extends AsyncIterable<AgentEvent> {
  readonly id: string;
  /** Events lost to overflow so far */
  readonly dropped: number;
  /** Buffered, undelivered events */
  readonly pending: number;
  readonly closed: boolean;
  /** Resolves with the next event, or undefined once unsubscribed */
  next(): Promise<AgentEvent | undefined>;
  tryNext(): AgentEvent | undefined;
  unsubscribe(): void;
}

export interface Subscription {
  id: string;
  unsubscribe: () => void;
}

export type AgentEventHandler = (event: AgentEvent) => void | Promise<void>;

export interface EventBusStats {
  totalPublished: number;
  totalDropped: number;
  activeListeners: number;
}

// ============================================================================
// Listener Queue
// ============================================================================

class ListenerQueue implements EventListenerHandle {
  private readonly buffer: AgentEvent[] = [];
  private readonly waiters: Array<(event: AgentEvent | undefined) => void> = [];
  private droppedCount = 0;
  private isClosed = false;

  constructor(
    readonly id: string,
    private readonly capacity: number,
    private readonly accepts: (event: AgentEvent) => boolean,
    private readonly onClose: (id: string) => void
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Returns true when an older event had to be dropped */
  offer(event: AgentEvent): boolean {
    if (this.isClosed || !this.accepts(event)) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return false;
    }

    let dropped = false;
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
      dropped = true;
    }
    this.buffer.push(event);
    return dropped;
  }

  next(): Promise<AgentEvent | undefined> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve(buffered);
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  tryNext(): AgentEvent | undefined {
    return this.buffer.shift();
  }

  unsubscribe(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.buffer.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
    this.onClose(this.id);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<AgentEvent> {
    while (true) {
      const event = await this.next();
      if (!event) {
        return;
      }
      yield event;
    }
  }
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

export class AgentEventBus {
  private readonly listeners = new Map<string, ListenerQueue>();
  private readonly bufferSize: number;
  private readonly logger: RuntimeLogger;

  private listenerIdCounter = 0;
  private totalPublished = 0;
  private totalDropped = 0;

  constructor(config: EventBusConfig = {}) {
    this.bufferSize = Math.max(1, config.bufferSize ?? DEFAULT_LISTENER_BUFFER_SIZE);
    this.logger = config.logger ?? getLogger("event-bus");
  }

  /**
   * Deliver an event to every matching listener. Never waits on a listener.
   */
  publish(event: AgentEvent): void {
    this.totalPublished++;
    for (const listener of this.listeners.values()) {
      let dropped: boolean;
      try {
        dropped = listener.offer(event);
      } catch (error) {
        this.logger.error(`Listener filter failed for ${event.type}`, {
          listenerId: listener.id,
          error: getErrorMessage(error),
        });
        continue;
      }
      if (dropped) {
        this.totalDropped++;
        // First overflow, then every 100th
        if (listener.dropped === 1 || listener.dropped % 100 === 0) {
          this.logger.warn("Listener buffer full, dropped oldest event", {
            listenerId: listener.id,
            dropped: listener.dropped,
          });
        }
      }
    }
  }

  /**
   * Pull-style listener with its own bounded buffer.
   */
  subscribe(options: ListenOptions = {}): EventListenerHandle {
    const id = `listener_${++this.listenerIdCounter}`;
    const types = options.types ? new Set<AgentEventType>(options.types) : undefined;
    const filter = options.filter;
    const accepts = (event: AgentEvent): boolean =>
      (!types || types.has(event.type)) && (!filter || filter(event));

    const queue = new ListenerQueue(
      id,
      Math.max(1, options.bufferSize ?? this.bufferSize),
      accepts,
      (closedId) => {
        this.listeners.delete(closedId);
      }
    );
    this.listeners.set(id, queue);
    return queue;
  }

  /**
   * Callback-style listener. The handler runs on its own pump, one event at a
   * time; its failures are logged and never reach the publisher.
   */
  on(handler: AgentEventHandler, options: ListenOptions = {}): Subscription {
    const handle = this.subscribe(options);

    const pump = async (): Promise<void> => {
      for await (const event of handle) {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Handler error for ${event.type}`, {
            listenerId: handle.id,
            error: getErrorMessage(error),
          });
        }
      }
    };
    void pump();

    return { id: handle.id, unsubscribe: () => handle.unsubscribe() };
  }

  /**
   * Wait for the next event of a type.
   */
  waitFor<T extends AgentEventType>(
    type: T,
    options: { timeoutMs?: number; filter?: (event: AgentEventOf<T>) => boolean } = {}
  ): Promise<AgentEventOf<T>> {
    const handle = this.subscribe({ types: [type] });
    const timeoutMs = options.timeoutMs ?? 30_000;

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        handle.unsubscribe();
        reject(new Error(`Timeout waiting for event: ${type}`));
      }, timeoutMs);

      const loop = async (): Promise<void> => {
        for await (const event of handle) {
          if (isEventOf(event, type) && (!options.filter || options.filter(event))) {
            clearTimeout(timeout);
            handle.unsubscribe();
            resolve(event);
            return;
          }
        }
      };
      loop().catch((error: unknown) => {
        clearTimeout(timeout);
        reject(error);
      });
    });
  }

  getStats(): EventBusStats {
    return {
      totalPublished: this.totalPublished,
      totalDropped: this.totalDropped,
      activeListeners: this.listeners.size,
    };
  }

  dispose(): void {
    for (const listener of [...this.listeners.values()]) {
      listener.unsubscribe();
    }
  }
}

function isEventOf<T extends AgentEventType>(
  event: AgentEvent,
  type: T
): event is AgentEventOf<T> {
  return event.type === type;
}

// ============================================================================
// Factory
// ============================================================================

export function createEventBus(config?: EventBusConfig): AgentEventBus {
  return new AgentEventBus(config);
}
