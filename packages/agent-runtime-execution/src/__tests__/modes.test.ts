import { createEventBus } from "@steward/agent-runtime-control";
import { InvalidModeTransitionError } from "@steward/agent-runtime-core";
import { createNoopLogger } from "@steward/agent-runtime-telemetry/logging";
import { describe, expect, it, vi } from "vitest";
import { createModeClassifier, MODE_PROMPTS } from "../modes/modeClassifier";
import { createModeStateMachine } from "../modes/modeStateMachine";

const logger = createNoopLogger();

describe("ModeStateMachine", () => {
  it("starts in plan mode", () => {
    expect(createModeStateMachine({ logger }).getMode()).toBe("plan");
  });

  it("records, publishes and notifies a committed transition", () => {
    const bus = createEventBus({ logger });
    const events = bus.subscribe({ types: ["mode_changed"] });
    const modes = createModeStateMachine({ eventBus: bus, logger });
    const handler = vi.fn();
    modes.onTransition(handler);

    const transition = modes.transition("enter_build", { reason: "plan approved" });

    expect(modes.getMode()).toBe("build");
    expect(transition).toMatchObject({
      from: "plan",
      to: "build",
      event: "enter_build",
      reason: "plan approved",
      source: "user",
    });
    expect(modes.getHistory()).toEqual([transition]);
    expect(handler).toHaveBeenCalledWith(transition);
    expect(events.tryNext()).toMatchObject({
      type: "mode_changed",
      from: "plan",
      to: "build",
      reason: "plan approved",
      source: "user",
    });
  });

  it("treats a transition to the current mode as a no-op", () => {
    const bus = createEventBus({ logger });
    const events = bus.subscribe();
    const modes = createModeStateMachine({ initialMode: "build", eventBus: bus, logger });

    expect(modes.transition("enter_build")).toBeUndefined();
    expect(modes.getHistory()).toHaveLength(0);
    expect(events.pending).toBe(0);
  });

  it("accepts mode names and rejects unknown ones", () => {
    const modes = createModeStateMachine({ logger });

    expect(modes.setMode("build", { source: "command" })?.source).toBe("command");
    expect(() => modes.setMode("yolo")).toThrow(InvalidModeTransitionError);
    expect(modes.getMode()).toBe("build");
  });

  it("keeps a bounded history", () => {
    const modes = createModeStateMachine({ maxHistorySize: 2, logger });

    modes.setMode("build");
    modes.setMode("plan");
    modes.setMode("build");

    expect(modes.getHistory().map((entry) => entry.to)).toEqual(["plan", "build"]);
  });

  it("keeps going when a handler throws", () => {
    const modes = createModeStateMachine({ logger });
    const second = vi.fn();
    modes.onTransition(() => {
      throw new Error("handler failed");
    });
    modes.onTransition(second);

    modes.setMode("build");

    expect(second).toHaveBeenCalledTimes(1);
  });

  it("stops notifying an unsubscribed handler", () => {
    const modes = createModeStateMachine({ logger });
    const handler = vi.fn();
    const unsubscribe = modes.onTransition(handler);

    unsubscribe();
    modes.setMode("build");

    expect(handler).not.toHaveBeenCalled();
  });
});

describe("ModeClassifier", () => {
  const classifier = createModeClassifier();

  it("recommends build mode for change requests made in plan mode", () => {
    expect(classifier.recommend("plan", "Please fix the login redirect")).toEqual({
      mode: "build",
      matched: "fix",
      reason: "Request asks to fix; Build Mode is needed",
    });
    expect(classifier.recommend("plan", "Create  file for the router")?.matched).toBe("create file");
    expect(classifier.recommend("plan", "Keep writing the parser")?.matched).toBe("write");
    expect(classifier.recommend("plan", "It fixes nothing yet")?.matched).toBe("fix");
  });

  it("recommends plan mode for analysis requests made in build mode", () => {
    expect(classifier.recommend("build", "What does this reducer do?")).toEqual({
      mode: "plan",
      matched: "what does",
      reason: "Request asks to what does; Plan Mode fits analysis",
    });
  });

  it("returns null when the current mode already fits", () => {
    expect(classifier.recommend("plan", "Explain the caching layer")).toBeNull();
    expect(classifier.recommend("build", "Implement the retry helper")).toBeNull();
    expect(classifier.recommend("plan", "Rewrite nothing, just look")).toBeNull();
  });

  it("ignores keywords that only start a longer word", () => {
    expect(classifier.recommend("plan", "Explain the fixture")).toBeNull();
    expect(classifier.recommend("plan", "Open the editor settings")).toBeNull();
    expect(classifier.recommend("build", "Update the explorer sidebar")).toBeNull();
  });

  it("allows only read-only tools in plan mode", () => {
    const tools = [
      { name: "read_file", readOnly: true },
      { name: "write_file", readOnly: false },
    ];

    expect(classifier.filterTools("plan", tools).map((tool) => tool.name)).toEqual(["read_file"]);
    expect(classifier.filterTools("build", tools)).toHaveLength(2);
    expect(classifier.isToolAllowed("plan", { readOnly: false })).toBe(false);
  });

  it("returns the prompt for each mode", () => {
    expect(classifier.systemPrompt("plan")).toBe(MODE_PROMPTS.plan);
    expect(classifier.systemPrompt("build").startsWith("You are in BUILD MODE.")).toBe(true);
  });
});
