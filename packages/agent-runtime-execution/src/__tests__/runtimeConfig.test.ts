import { InvalidConfigError } from "@steward/agent-runtime-core";
import { describe, expect, it } from "vitest";
import { resolveSessionConfig } from "../config/runtimeConfig";

describe("resolveSessionConfig", () => {
  it("fills defaults", () => {
    const config = resolveSessionConfig({ projectRoot: "/work/app" }, {});

    expect(config).toEqual({
      projectRoot: "/work/app",
      approvalMode: "review",
      agentMode: "plan",
      maxTurns: 10,
      maxTurnDurationMs: 300_000,
      commandTimeoutMs: 30_000,
      permission: { timeoutMs: 60_000, capacity: 10 },
      research: { maxConcurrent: 3, cancelGraceMs: 5_000, maxSteps: 20 },
      eventBufferSize: 1_000,
    });
  });

  it("lets environment values win over the input", () => {
    const config = resolveSessionConfig(
      { projectRoot: "/work/app", approvalMode: "review", permission: { capacity: 4 } },
      {
        STEWARD_APPROVAL_MODE: "smart",
        STEWARD_AGENT_MODE: "build",
        STEWARD_MAX_TURNS: "25",
        STEWARD_PERMISSION_TIMEOUT_MS: "1500",
        STEWARD_RESEARCH_CONCURRENCY: "2",
        STEWARD_SINGLE_MODEL: "haiku",
      }
    );

    expect(config).toMatchObject({
      approvalMode: "smart",
      agentMode: "build",
      maxTurns: 25,
      singleModel: "haiku",
      permission: { timeoutMs: 1_500, capacity: 4 },
      research: { maxConcurrent: 2 },
    });
  });

  it("ignores blank environment values", () => {
    const config = resolveSessionConfig({ projectRoot: "/work/app" }, { STEWARD_APPROVAL_MODE: "  " });

    expect(config.approvalMode).toBe("review");
  });

  it("reports every invalid field", () => {
    let caught: unknown;
    try {
      resolveSessionConfig(
        { projectRoot: "/work/app", singleModel: "no-such-model" },
        { STEWARD_MAX_TURNS: "many" }
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidConfigError);
    const issues = caught instanceof InvalidConfigError ? caught.issues : [];
    expect(issues.map((issue) => issue.split(":")[0])).toEqual(["maxTurns", "singleModel"]);
    expect(issues).toContain("singleModel: Unknown model");
  });

  it("rejects an unknown approval mode", () => {
    expect(() => resolveSessionConfig({ approvalMode: "yolo" }, {})).toThrow(InvalidConfigError);
  });
});
