/**
 * Base Tool
 *
 * Abstract base for built-in tools. Arguments are validated with zod before
 * either the side-effect description or the execution sees them.
 */

import {
  type ChangeType,
  errorResult,
  InvalidArgumentsError,
  type JSONSchema,
  type ToolCapability,
  type ToolExecutionContext,
  type ToolResult,
} from "@steward/agent-runtime-core";
import type { z } from "zod";

export abstract class BaseTool<TParams> implements ToolCapability {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly inputSchema: JSONSchema;
  abstract readonly readOnly: boolean;

  protected abstract readonly paramsSchema: z.ZodType<TParams, z.ZodTypeDef, unknown>;

  async execute(params: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolResult> {
    const parsed = this.paramsSchema.safeParse(params);
    if (!parsed.success) {
      return errorResult("INVALID_ARGUMENTS", formatIssues(parsed.error));
    }
    return this.run(parsed.data, context);
  }

  async proposeAction(
    params: Record<string, unknown>,
    context: ToolExecutionContext
  ): Promise<ChangeType> {
    return this.describe(this.parse(params), context);
  }

  /** Throws InvalidArgumentsError on bad input */
  protected parse(params: Record<string, unknown>): TParams {
    const parsed = this.paramsSchema.safeParse(params);
    if (!parsed.success) {
      throw new InvalidArgumentsError(this.name, formatIssues(parsed.error));
    }
    return parsed.data;
  }

  protected abstract run(params: TParams, context: ToolExecutionContext): Promise<ToolResult>;

  protected abstract describe(
    params: TParams,
    context: ToolExecutionContext
  ): Promise<ChangeType> | ChangeType;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
