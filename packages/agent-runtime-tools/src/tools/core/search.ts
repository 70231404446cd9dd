/**
 * search_code tool
 */

import {
  type ChangeType,
  type JSONSchema,
  jsonResult,
  resolveProjectPath,
  type ToolExecutionContext,
  type ToolResult,
} from "@steward/agent-runtime-core";
import { z } from "zod";
import { BaseTool } from "../baseTool";
import { searchFiles } from "../code/fileSystem";

const searchCodeParams = z.object({
  query: z.string().min(1),
  path: z.string().min(1).default("."),
  regex: z.boolean().default(false),
  caseSensitive: z.boolean().default(false),
  maxResults: z.number().int().positive().max(1000).default(100),
  extensions: z.array(z.string()).optional(),
});

type SearchCodeParams = z.infer<typeof searchCodeParams>;

export class SearchCodeTool extends BaseTool<SearchCodeParams> {
  readonly name = "search_code";
  readonly description = "Search file contents line by line for a string or regular expression.";
  readonly readOnly = true;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      query: { type: "string", description: "Text or pattern to look for" },
      path: { type: "string", description: "Directory to search, relative to the project root" },
      regex: { type: "boolean", default: false },
      caseSensitive: { type: "boolean", default: false },
      maxResults: { type: "number", default: 100 },
      extensions: { type: "array", items: { type: "string" } },
    },
    required: ["query"],
  };
  protected readonly paramsSchema = searchCodeParams;

  protected async run(params: SearchCodeParams, context: ToolExecutionContext): Promise<ToolResult> {
    const matches = await searchFiles(resolveProjectPath(context.projectRoot, params.path), params.query, {
      regex: params.regex,
      caseSensitive: params.caseSensitive,
      maxResults: params.maxResults,
      extensions: params.extensions,
    });
    return jsonResult({ query: params.query, path: params.path, matches });
  }

  protected describe(params: SearchCodeParams): ChangeType {
    return { kind: "read", target: params.path };
  }
}
