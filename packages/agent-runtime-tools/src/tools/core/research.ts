/**
 * research tool
 *
 * Decomposes a query into research tasks, fans them out on the scheduler and
 * waits for all of them. Aborting the tool call cancels every task it started.
 */

import {
  type ChangeType,
  type JSONSchema,
  jsonResult,
  type ResearchResult,
  type ToolExecutionContext,
  type ToolResult,
} from "@steward/agent-runtime-core";
import { z } from "zod";
import { decomposeQuery } from "../../orchestrator/queryDecomposer";
import type { ResearchScheduler } from "../../orchestrator/researchScheduler";
import { BaseTool } from "../baseTool";

const researchParams = z.object({
  query: z.string().min(1),
  maxSteps: z.number().int().positive().max(100).optional(),
});

type ResearchParams = z.infer<typeof researchParams>;

export interface ResearchSummary {
  query: string;
  succeeded: number;
  failed: number;
  cancelled: number;
  findings: string[];
  relevantFiles: string[];
  tokensUsed: number;
  results: ResearchResult[];
}

export class ResearchTool extends BaseTool<ResearchParams> {
  readonly name = "research";
  readonly description =
    "Investigate the codebase in parallel: where something is defined or used, similar patterns, or file inventories.";
  readonly readOnly = true;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      query: { type: "string", description: "What to find out" },
      maxSteps: { type: "number", description: "Tool calls per research task (default 20)" },
    },
    required: ["query"],
  };
  protected readonly paramsSchema = researchParams;

  constructor(
    private readonly scheduler: ResearchScheduler,
    private readonly defaultMaxSteps?: number
  ) {
    super();
  }

  protected async run(params: ResearchParams, context: ToolExecutionContext): Promise<ToolResult> {
    const handles = decomposeQuery(params.query, {
      maxSteps: params.maxSteps ?? this.defaultMaxSteps,
    }).map((task) =>
      this.scheduler.submit(task)
    );

    const cancelAll = (): void => {
      for (const handle of handles) {
        handle.cancel("research call aborted");
      }
    };
    if (context.signal?.aborted) {
      cancelAll();
    }
    context.signal?.addEventListener("abort", cancelAll, { once: true });

    try {
      const results = await Promise.all(handles.map((handle) => handle.result()));
      return jsonResult(summarize(params.query, results));
    } finally {
      context.signal?.removeEventListener("abort", cancelAll);
    }
  }

  protected describe(params: ResearchParams): ChangeType {
    return { kind: "research", query: params.query };
  }
}

export function summarize(query: string, results: ResearchResult[]): ResearchSummary {
  const findings: string[] = [];
  const files = new Set<string>();
  let tokensUsed = 0;

  for (const result of results) {
    if (result.status === "success") {
      findings.push(...result.findings);
      for (const file of result.relevantFiles) {
        files.add(file);
      }
      tokensUsed += result.tokensUsed;
    } else if (result.status === "failed") {
      findings.push(`Task ${result.taskId} failed: ${result.error}`);
    }
  }

  return {
    query,
    succeeded: results.filter((result) => result.status === "success").length,
    failed: results.filter((result) => result.status === "failed").length,
    cancelled: results.filter((result) => result.status === "cancelled").length,
    findings,
    relevantFiles: [...files].sort(),
    tokensUsed,
    results,
  };
}
