import { createEventBus } from "@steward/agent-runtime-control";
import type { PendingChange, PermissionRequest } from "@steward/agent-runtime-core";
import { createNoopLogger } from "@steward/agent-runtime-telemetry/logging";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createPermissionChannel, type PermissionTicket } from "../security/permissionChannel";

const logger = createNoopLogger();

function makeRequest(id: string): PermissionRequest {
  const pendingChange: PendingChange = {
    id: `change_${id}`,
    toolName: "run_command",
    change: { kind: "run_command", command: "npm install", args: [] },
    description: "Run `npm install`",
    safetyLevel: "caution",
    timestamp: 1,
  };
  return {
    id,
    command: "npm install",
    args: [],
    description: pendingChange.description,
    preview: "$ npm install\n# Working directory: current",
    pendingChange,
  };
}

describe("PermissionChannel", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves the requester with the approver's response", async () => {
    const channel = createPermissionChannel({ logger });
    const outcome = channel.request(makeRequest("perm_1"));

    const ticket = await channel.next();
    expect(ticket?.request.id).toBe("perm_1");
    expect(ticket?.respond("approved")).toBe(true);

    await expect(outcome).resolves.toEqual({
      requestId: "perm_1",
      response: "approved",
      timedOut: false,
      cancelled: false,
    });
    expect(ticket?.settled).toBe(true);
    expect(ticket?.respond("denied")).toBe(false);
  });

  it("hands a request straight to an approver already waiting", async () => {
    const channel = createPermissionChannel({ logger });
    const waiting = channel.next();

    const outcome = channel.request(makeRequest("perm_2"));
    const ticket = await waiting;
    ticket?.respond("approved_similar");

    expect((await outcome).response).toBe("approved_similar");
    expect(channel.pending).toBe(0);
  });

  it("denies exactly once on timeout", async () => {
    vi.useFakeTimers();
    const bus = createEventBus({ logger });
    const events = bus.subscribe({ types: ["permission_resolved"] });
    const channel = createPermissionChannel({ timeoutMs: 1_000, eventBus: bus, logger });

    const outcome = channel.request(makeRequest("perm_3"));
    vi.advanceTimersByTime(999);
    expect(channel.pending).toBe(1);
    vi.advanceTimersByTime(1);

    await expect(outcome).resolves.toEqual({
      requestId: "perm_3",
      response: "denied",
      timedOut: true,
      cancelled: false,
    });
    expect(channel.pending).toBe(0);
    expect(channel.tryNext()).toBeUndefined();

    vi.advanceTimersByTime(5_000);
    expect(events.pending).toBe(1);
    const event = events.tryNext();
    expect(event?.type === "permission_resolved" && event.timedOut).toBe(true);
  });

  it("ignores an approver answering after the timeout", async () => {
    vi.useFakeTimers();
    const channel = createPermissionChannel({ timeoutMs: 500, logger });
    const outcome = channel.request(makeRequest("perm_4"));
    const ticket = channel.tryNext();

    vi.advanceTimersByTime(500);

    expect(ticket?.respond("approved")).toBe(false);
    expect((await outcome).response).toBe("denied");
  });

  it("honors a per-request timeout", async () => {
    vi.useFakeTimers();
    const channel = createPermissionChannel({ timeoutMs: 60_000, logger });
    const outcome = channel.request(makeRequest("perm_5"), { timeoutMs: 10 });

    vi.advanceTimersByTime(10);

    expect((await outcome).timedOut).toBe(true);
  });

  it("resolves as cancelled when the signal aborts", async () => {
    const channel = createPermissionChannel({ logger });
    const controller = new AbortController();
    const outcome = channel.request(makeRequest("perm_6"), { signal: controller.signal });

    controller.abort();

    await expect(outcome).resolves.toEqual({
      requestId: "perm_6",
      response: "denied",
      timedOut: false,
      cancelled: true,
    });
    expect(channel.pending).toBe(0);
  });

  it("does not enqueue a request whose signal already aborted", async () => {
    const channel = createPermissionChannel({ logger });
    const controller = new AbortController();
    controller.abort();

    const outcome = await channel.request(makeRequest("perm_7"), { signal: controller.signal });

    expect(outcome.cancelled).toBe(true);
    expect(channel.pending).toBe(0);
  });

  it("holds requests beyond capacity until space frees up", () => {
    const channel = createPermissionChannel({ capacity: 2, logger });
    void channel.request(makeRequest("a"));
    void channel.request(makeRequest("b"));
    void channel.request(makeRequest("c"));

    expect(channel.pending).toBe(3);
    expect(channel.tryNext()?.request.id).toBe("a");
    expect(channel.tryNext()?.request.id).toBe("b");
    expect(channel.tryNext()?.request.id).toBe("c");
    expect(channel.tryNext()).toBeUndefined();
    channel.close();
  });

  it("drops a withdrawn request from the overflow", async () => {
    const channel = createPermissionChannel({ capacity: 1, logger });
    const controller = new AbortController();
    void channel.request(makeRequest("a"));
    const withdrawn = channel.request(makeRequest("b"), { signal: controller.signal });
    void channel.request(makeRequest("c"));

    controller.abort();
    await withdrawn;

    expect(channel.pending).toBe(2);
    expect(channel.tryNext()?.request.id).toBe("a");
    expect(channel.tryNext()?.request.id).toBe("c");
    channel.close();
  });

  it("denies everything pending on close and stops approvers", async () => {
    const channel = createPermissionChannel({ logger });
    const queued = channel.request(makeRequest("a"));
    const dequeued = channel.request(makeRequest("b"));
    const ticket = channel.tryNext();

    channel.close();

    expect((await queued).cancelled).toBe(true);
    expect((await dequeued).cancelled).toBe(true);
    expect(ticket?.respond("approved")).toBe(false);
    await expect(channel.next()).resolves.toBeUndefined();
    expect(channel.closed).toBe(true);

    const late = await channel.request(makeRequest("c"));
    expect(late).toEqual({ requestId: "c", response: "denied", timedOut: false, cancelled: true });
  });

  it("iterates requests until closed", async () => {
    const channel = createPermissionChannel({ logger });
    const seen: string[] = [];
    const approver = (async () => {
      for await (const ticket of channel) {
        seen.push(ticket.request.id);
        ticket.respond("denied");
      }
    })();

    const outcomes = await Promise.all([
      channel.request(makeRequest("x")),
      channel.request(makeRequest("y")),
    ]);
    channel.close();
    await approver;

    expect(seen).toEqual(["x", "y"]);
    expect(outcomes.map((outcome) => outcome.response)).toEqual(["denied", "denied"]);
  });

  it("publishes a request event before an approver sees it", async () => {
    const bus = createEventBus({ logger });
    const events = bus.subscribe({ types: ["permission_requested"] });
    const channel = createPermissionChannel({ eventBus: bus, logger });

    void channel.request(makeRequest("perm_8"));
    const ticket: PermissionTicket | undefined = channel.tryNext();

    expect(ticket?.request.id).toBe("perm_8");
    expect(events.tryNext()).toMatchObject({
      type: "permission_requested",
      requestId: "perm_8",
      toolName: "run_command",
      safetyLevel: "caution",
    });
    channel.close();
  });
});
