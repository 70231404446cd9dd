import { createEventBus } from "@steward/agent-runtime-control";
import type { ResearchTask } from "@steward/agent-runtime-core";
import { createNoopLogger } from "@steward/agent-runtime-telemetry/logging";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createResearchScheduler,
  type ResearchRunner,
  type ResearchSchedulerConfig,
} from "../orchestrator/researchScheduler";
import { createToolRegistry } from "../tools/registry";

function task(id: string): ResearchTask {
  return {
    id,
    description: `look into ${id}`,
    agentType: "file_searcher",
    complexity: "low",
    maxSteps: 20,
    context: [],
  };
}

/**
 * Runner whose tasks finish only when released, and reject once aborted.
 */
function createControlledRunner() {
  const started: string[] = [];
  const releases = new Map<string, () => void>();
  let active = 0;
  let peak = 0;

  const runner: ResearchRunner = (researchTask, context) =>
    new Promise((resolve, reject) => {
      let done = false;
      const finish = (): boolean => {
        if (done) {
          return false;
        }
        done = true;
        active--;
        return true;
      };
      active++;
      peak = Math.max(peak, active);
      started.push(researchTask.id);
      releases.set(researchTask.id, () => {
        if (finish()) {
          resolve({ findings: [researchTask.id], relevantFiles: [], tokensUsed: 10 });
        }
      });
      context.signal.addEventListener(
        "abort",
        () => {
          if (finish()) {
            reject(new Error("aborted"));
          }
        },
        { once: true }
      );
    });

  return { runner, started, releases, peak: () => peak };
}

function schedulerConfig(
  runner: ResearchRunner,
  overrides: Partial<ResearchSchedulerConfig> = {}
): ResearchSchedulerConfig {
  return {
    runner,
    tools: createToolRegistry({ logger: createNoopLogger() }).readOnlyView(),
    projectRoot: "/workspace/project",
    logger: createNoopLogger(),
    ...overrides,
  };
}

describe("ResearchScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("never runs more than three tasks at once under a burst", async () => {
    const controlled = createControlledRunner();
    const scheduler = createResearchScheduler(schedulerConfig(controlled.runner));

    const handles = Array.from({ length: 10 }, (_, index) => scheduler.submit(task(`t${index}`)));

    expect(controlled.started).toEqual(["t0", "t1", "t2"]);
    expect(scheduler.getStats()).toMatchObject({ running: 3, queued: 7 });

    for (let index = 0; index < handles.length; index++) {
      controlled.releases.get(`t${index}`)?.();
      const result = await handles[index].result();
      expect(result.status).toBe("success");
      expect(scheduler.getStats().running).toBeLessThanOrEqual(3);
    }

    expect(controlled.peak()).toBe(3);
    expect(scheduler.getStats().peakRunning).toBe(3);
    expect(controlled.started).toEqual(handles.map((handle) => handle.taskId));
  });

  it("honours a custom concurrency limit", () => {
    const controlled = createControlledRunner();
    const scheduler = createResearchScheduler(
      schedulerConfig(controlled.runner, { maxConcurrent: 1 })
    );

    scheduler.submit(task("a"));
    scheduler.submit(task("b"));

    expect(controlled.started).toEqual(["a"]);
  });

  it("cancels a queued task without ever running it", async () => {
    const controlled = createControlledRunner();
    const scheduler = createResearchScheduler(
      schedulerConfig(controlled.runner, { maxConcurrent: 1 })
    );
    scheduler.submit(task("a"));
    const queued = scheduler.submit(task("b"));

    expect(queued.poll().state).toBe("queued");
    queued.cancel("not needed");

    const result = await queued.result();
    expect(result).toMatchObject({ status: "cancelled", taskId: "b", reason: "not needed" });
    expect(queued.poll().state).toBe("done");
    expect(controlled.started).toEqual(["a"]);
    expect(scheduler.getStats().queued).toBe(0);
  });

  it("cancels a running task cooperatively and frees its slot", async () => {
    const controlled = createControlledRunner();
    const scheduler = createResearchScheduler(
      schedulerConfig(controlled.runner, { maxConcurrent: 1 })
    );
    const running = scheduler.submit(task("a"));
    const next = scheduler.submit(task("b"));

    running.cancel("user stop");

    expect(await running.result()).toMatchObject({ status: "cancelled", reason: "user stop" });
    expect(controlled.started).toEqual(["a", "b"]);
    controlled.releases.get("b")?.();
    expect((await next.result()).status).toBe("success");
  });

  it("reports a task that ignores cancellation as cancelled after the grace period", async () => {
    vi.useFakeTimers();
    const stubborn: ResearchRunner = () => new Promise(() => undefined);
    const scheduler = createResearchScheduler(
      schedulerConfig(stubborn, { maxConcurrent: 1, cancelGraceMs: 100 })
    );
    const handle = scheduler.submit(task("stuck"));
    const queued = scheduler.submit(task("waiting"));

    handle.cancel("deadline");
    expect(handle.poll().state).toBe("running");

    await vi.advanceTimersByTimeAsync(100);

    expect(await handle.result()).toMatchObject({ status: "cancelled", reason: "deadline" });
    // The stuck runner still holds the only slot
    expect(scheduler.getStats()).toMatchObject({ running: 1, queued: 1 });
    expect(queued.poll().state).toBe("queued");
  });

  it("reports runner failures", async () => {
    const failing: ResearchRunner = async () => {
      throw new Error("index unavailable");
    };
    const scheduler = createResearchScheduler(schedulerConfig(failing));

    const result = await scheduler.submit(task("f")).result();

    expect(result).toMatchObject({ status: "failed", taskId: "f", error: "index unavailable" });
  });

  it("exposes progress through poll", async () => {
    let release: () => void = () => undefined;
    const runner: ResearchRunner = (_task, context) =>
      new Promise((resolve) => {
        context.reportProgress(2, "searching src");
        release = () => resolve({ findings: [], relevantFiles: [], tokensUsed: 0 });
      });
    const scheduler = createResearchScheduler(schedulerConfig(runner));

    const handle = scheduler.submit(task("p"));

    expect(handle.poll()).toEqual({ state: "running", stepsCompleted: 2, message: "searching src" });
    release();
    await handle.result();
    expect(handle.poll()).toEqual({ state: "done", stepsCompleted: 2, message: "success" });
  });

  it("cancels everything with cancelAll", async () => {
    const controlled = createControlledRunner();
    const scheduler = createResearchScheduler(schedulerConfig(controlled.runner));
    const handles = Array.from({ length: 5 }, (_, index) => scheduler.submit(task(`c${index}`)));

    scheduler.cancelAll("session ended");

    const results = await Promise.all(handles.map((handle) => handle.result()));
    expect(results.map((result) => result.status)).toEqual([
      "cancelled",
      "cancelled",
      "cancelled",
      "cancelled",
      "cancelled",
    ]);
    expect(controlled.started).toEqual(["c0", "c1", "c2"]);
  });

  it("publishes research_completed events", async () => {
    const bus = createEventBus({ logger: createNoopLogger() });
    const listener = bus.subscribe({ types: ["research_completed"] });
    const runner: ResearchRunner = async () => ({ findings: [], relevantFiles: [], tokensUsed: 0 });
    const scheduler = createResearchScheduler(schedulerConfig(runner, { eventBus: bus }));

    await scheduler.submit(task("e")).result();

    expect(listener.tryNext()).toMatchObject({
      type: "research_completed",
      taskId: "e",
      status: "success",
    });
  });
});
