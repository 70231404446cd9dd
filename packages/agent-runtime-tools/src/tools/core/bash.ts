/**
 * run_command tool
 *
 * Shell command execution with timeout, output cap and abort support. Whether
 * a command may run at all is decided before execution by the safety policy.
 */

import { type ChildProcess, type SpawnOptions, spawn } from "node:child_process";
import {
  type ChangeType,
  errorResult,
  type JSONSchema,
  resolveProjectPath,
  textResult,
  type ToolExecutionContext,
  type ToolResult,
} from "@steward/agent-runtime-core";
import { z } from "zod";
import { BaseTool } from "../baseTool";

// ============================================================================
// Bash Executor Interface (for dependency injection)
// ============================================================================

export interface BashExecuteOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  maxOutputBytes?: number;
  signal?: AbortSignal;
}

export interface BashExecuteResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
}

export interface IBashExecutor {
  execute(command: string, options: BashExecuteOptions): Promise<BashExecuteResult>;
}

// ============================================================================
// Bash Executor Implementation
// ============================================================================

/**
 * Default executor using child_process.
 */
export class ProcessBashExecutor implements IBashExecutor {
  private readonly defaultShell: string;

  constructor(shell = "/bin/bash") {
    this.defaultShell = shell;
  }

  async execute(command: string, options: BashExecuteOptions): Promise<BashExecuteResult> {
    const startTime = Date.now();
    const timeoutMs = options.timeoutMs ?? 30_000;
    const maxOutputBytes = options.maxOutputBytes ?? 1024 * 1024;

    if (options.signal?.aborted) {
      return {
        exitCode: -1,
        stdout: "",
        stderr: "Execution aborted before start.",
        timedOut: false,
        truncated: false,
        durationMs: 0,
      };
    }

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let truncated = false;
      let timedOut = false;
      let resolved = false;

      const spawnOptions: SpawnOptions = {
        shell: this.defaultShell,
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
      };

      const child: ChildProcess = spawn(command, [], spawnOptions);

      const timeout = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
        // SIGKILL if SIGTERM was ignored
        setTimeout(() => {
          if (!resolved) {
            child.kill("SIGKILL");
          }
        }, 5000).unref();
      }, timeoutMs);

      const onAbort = (): void => {
        child.kill("SIGTERM");
      };
      options.signal?.addEventListener("abort", onAbort, { once: true });

      const append = (current: string, data: Buffer): string => {
        if (current.length + data.length > maxOutputBytes) {
          truncated = true;
          const remaining = maxOutputBytes - current.length;
          return remaining > 0 ? current + data.subarray(0, remaining).toString() : current;
        }
        return current + data.toString();
      };

      child.stdout?.on("data", (data: Buffer) => {
        stdout = append(stdout, data);
      });
      child.stderr?.on("data", (data: Buffer) => {
        stderr = append(stderr, data);
      });

      child.on("close", (code) => {
        clearTimeout(timeout);
        options.signal?.removeEventListener("abort", onAbort);
        resolved = true;
        resolve({
          exitCode: code ?? -1,
          stdout,
          stderr,
          timedOut,
          truncated,
          durationMs: Date.now() - startTime,
        });
      });

      child.on("error", (err) => {
        clearTimeout(timeout);
        options.signal?.removeEventListener("abort", onAbort);
        resolved = true;
        resolve({
          exitCode: -1,
          stdout: "",
          stderr: err.message,
          timedOut: false,
          truncated: false,
          durationMs: Date.now() - startTime,
        });
      });
    });
  }
}

// ============================================================================
// run_command
// ============================================================================

const runCommandParams = z.object({
  command: z.string().min(1),
  cwd: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().max(600_000).optional(),
});

type RunCommandParams = z.infer<typeof runCommandParams>;

export interface RunCommandToolOptions {
  executor?: IBashExecutor;
  defaultTimeoutMs?: number;
  maxOutputBytes?: number;
}

export class RunCommandTool extends BaseTool<RunCommandParams> {
  readonly name = "run_command";
  readonly description =
    "Run a shell command in the project. Use for builds, tests, git and other CLI tasks.";
  readonly readOnly = false;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      command: { type: "string", description: "The command line to run" },
      cwd: { type: "string", description: "Working directory relative to the project root" },
      timeoutMs: { type: "number", description: "Timeout in milliseconds (default: 30000)" },
    },
    required: ["command"],
  };
  protected readonly paramsSchema = runCommandParams;

  private readonly executor: IBashExecutor;
  private readonly defaultTimeoutMs: number;
  private readonly maxOutputBytes?: number;

  constructor(options: RunCommandToolOptions = {}) {
    super();
    this.executor = options.executor ?? new ProcessBashExecutor();
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.maxOutputBytes = options.maxOutputBytes;
  }

  protected async run(params: RunCommandParams, context: ToolExecutionContext): Promise<ToolResult> {
    const timeoutMs = params.timeoutMs ?? this.defaultTimeoutMs;
    const result = await this.executor.execute(params.command, {
      cwd: resolveProjectPath(context.projectRoot, params.cwd ?? "."),
      timeoutMs,
      maxOutputBytes: this.maxOutputBytes,
      signal: context.signal,
    });

    if (result.timedOut) {
      return errorResult("TOOL_EXECUTION_ERROR", `Command timed out after ${timeoutMs}ms`);
    }

    const output = formatOutput(result);
    if (result.exitCode !== 0) {
      return {
        success: false,
        content: [{ type: "text", text: output }],
        error: {
          code: "TOOL_EXECUTION_ERROR",
          message: `Command exited with code ${result.exitCode}`,
        },
      };
    }

    return textResult(output);
  }

  protected describe(params: RunCommandParams): ChangeType {
    return { kind: "run_command", command: params.command, args: [], cwd: params.cwd };
  }
}

function formatOutput(result: BashExecuteResult): string {
  const parts: string[] = [];

  if (result.stdout) {
    parts.push(result.stdout);
  }
  if (result.stderr) {
    parts.push(`[stderr]\n${result.stderr}`);
  }
  if (result.truncated) {
    parts.push("\n[output truncated]");
  }
  if (parts.length === 0) {
    return `Command completed with exit code ${result.exitCode}`;
  }

  return parts.join("\n");
}
