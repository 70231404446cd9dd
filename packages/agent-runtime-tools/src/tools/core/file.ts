/**
 * File Tools
 *
 * read_file, list_files, write_file, edit_file and delete_file. Paths are
 * resolved against the project root from the execution context.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  type ChangeType,
  InvalidArgumentsError,
  type JSONSchema,
  jsonResult,
  resolveProjectPath,
  textResult,
  type ToolExecutionContext,
  type ToolResult,
  toProjectRelative,
} from "@steward/agent-runtime-core";
import { createTwoFilesPatch } from "diff";
import { z } from "zod";
import { BaseTool } from "../baseTool";
import { fileExists, listFiles, readFile } from "../code/fileSystem";

// ============================================================================
// read_file
// ============================================================================

const readFileParams = z.object({
  path: z.string().min(1),
  startLine: z.number().int().positive().optional(),
  endLine: z.number().int().positive().optional(),
});

export class ReadFileTool extends BaseTool<z.infer<typeof readFileParams>> {
  readonly name = "read_file";
  readonly description = "Read a file, optionally a line range, with line numbers.";
  readonly readOnly = true;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      path: { type: "string", description: "File path relative to the project root" },
      startLine: { type: "number", description: "1-indexed first line" },
      endLine: { type: "number", description: "1-indexed last line" },
    },
    required: ["path"],
  };
  protected readonly paramsSchema = readFileParams;

  protected async run(
    params: z.infer<typeof readFileParams>,
    context: ToolExecutionContext
  ): Promise<ToolResult> {
    const result = await readFile(resolveProjectPath(context.projectRoot, params.path), {
      startLine: params.startLine,
      endLine: params.endLine,
    });
    return textResult(result.content);
  }

  protected describe(params: z.infer<typeof readFileParams>): ChangeType {
    return { kind: "read", target: params.path };
  }
}

// ============================================================================
// list_files
// ============================================================================

const listFilesParams = z.object({
  path: z.string().min(1).default("."),
  maxDepth: z.number().int().positive().optional(),
  includeHidden: z.boolean().optional(),
  limit: z.number().int().positive().default(500),
});

export class ListFilesTool extends BaseTool<z.infer<typeof listFilesParams>> {
  readonly name = "list_files";
  readonly description = "List files and directories below a path.";
  readonly readOnly = true;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      path: { type: "string", description: "Directory relative to the project root" },
      maxDepth: { type: "number" },
      includeHidden: { type: "boolean" },
      limit: { type: "number", default: 500 },
    },
  };
  protected readonly paramsSchema = listFilesParams;

  protected async run(
    params: z.infer<typeof listFilesParams>,
    context: ToolExecutionContext
  ): Promise<ToolResult> {
    const entries = await listFiles(resolveProjectPath(context.projectRoot, params.path), {
      maxDepth: params.maxDepth,
      includeHidden: params.includeHidden,
      limit: params.limit,
    });
    return jsonResult({ path: params.path, entries });
  }

  protected describe(params: z.infer<typeof listFilesParams>): ChangeType {
    return { kind: "read", target: params.path };
  }
}

// ============================================================================
// write_file
// ============================================================================

const writeFileParams = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export class WriteFileTool extends BaseTool<z.infer<typeof writeFileParams>> {
  readonly name = "write_file";
  readonly description = "Create a file or replace its whole content.";
  readonly readOnly = false;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      path: { type: "string", description: "File path relative to the project root" },
      content: { type: "string", description: "Full new content" },
    },
    required: ["path", "content"],
  };
  protected readonly paramsSchema = writeFileParams;

  protected async run(
    params: z.infer<typeof writeFileParams>,
    context: ToolExecutionContext
  ): Promise<ToolResult> {
    const absolutePath = resolveProjectPath(context.projectRoot, params.path);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, params.content, "utf-8");
    return textResult(
      `Wrote ${Buffer.byteLength(params.content, "utf-8")} bytes to ${toProjectRelative(context.projectRoot, params.path)}`
    );
  }

  protected async describe(
    params: z.infer<typeof writeFileParams>,
    context: ToolExecutionContext
  ): Promise<ChangeType> {
    const absolutePath = resolveProjectPath(context.projectRoot, params.path);
    if (await fileExists(absolutePath)) {
      const oldContent = await fs.readFile(absolutePath, "utf-8");
      return { kind: "modify_file", path: params.path, oldContent, newContent: params.content };
    }
    return { kind: "create_file", path: params.path, content: params.content };
  }
}

// ============================================================================
// edit_file
// ============================================================================

const editFileParams = z.object({
  path: z.string().min(1),
  oldText: z.string().min(1),
  newText: z.string(),
  replaceAll: z.boolean().default(false),
});

type EditFileParams = z.infer<typeof editFileParams>;

export class EditFileTool extends BaseTool<EditFileParams> {
  readonly name = "edit_file";
  readonly description =
    "Replace an exact text fragment in a file. The fragment must be unique unless replaceAll is set.";
  readonly readOnly = false;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      path: { type: "string", description: "File path relative to the project root" },
      oldText: { type: "string", description: "Exact text to replace" },
      newText: { type: "string", description: "Replacement text" },
      replaceAll: { type: "boolean", default: false },
    },
    required: ["path", "oldText", "newText"],
  };
  protected readonly paramsSchema = editFileParams;

  protected async run(params: EditFileParams, context: ToolExecutionContext): Promise<ToolResult> {
    const absolutePath = resolveProjectPath(context.projectRoot, params.path);
    const oldContent = await fs.readFile(absolutePath, "utf-8");
    const newContent = applyEdit(this.name, oldContent, params);
    await fs.writeFile(absolutePath, newContent, "utf-8");

    const displayPath = toProjectRelative(context.projectRoot, params.path);
    return textResult(createTwoFilesPatch(displayPath, displayPath, oldContent, newContent));
  }

  protected async describe(
    params: EditFileParams,
    context: ToolExecutionContext
  ): Promise<ChangeType> {
    const absolutePath = resolveProjectPath(context.projectRoot, params.path);
    if (!(await fileExists(absolutePath))) {
      throw new InvalidArgumentsError(this.name, `file not found: ${params.path}`);
    }
    const oldContent = await fs.readFile(absolutePath, "utf-8");
    return {
      kind: "modify_file",
      path: params.path,
      oldContent,
      newContent: applyEdit(this.name, oldContent, params),
    };
  }
}

export function applyEdit(
  toolName: string,
  content: string,
  edit: Pick<EditFileParams, "oldText" | "newText" | "replaceAll">
): string {
  const occurrences = content.split(edit.oldText).length - 1;
  if (occurrences === 0) {
    throw new InvalidArgumentsError(toolName, "oldText not found in file");
  }
  if (occurrences > 1 && !edit.replaceAll) {
    throw new InvalidArgumentsError(
      toolName,
      `oldText occurs ${occurrences} times; make it unique or set replaceAll`
    );
  }
  return edit.replaceAll
    ? content.split(edit.oldText).join(edit.newText)
    : content.replace(edit.oldText, () => edit.newText);
}

// ============================================================================
// delete_file
// ============================================================================

const deleteFileParams = z.object({
  path: z.string().min(1),
});

export class DeleteFileTool extends BaseTool<z.infer<typeof deleteFileParams>> {
  readonly name = "delete_file";
  readonly description = "Delete a single file.";
  readonly readOnly = false;
  readonly inputSchema: JSONSchema = {
    type: "object",
    properties: {
      path: { type: "string", description: "File path relative to the project root" },
    },
    required: ["path"],
  };
  protected readonly paramsSchema = deleteFileParams;

  protected async run(
    params: z.infer<typeof deleteFileParams>,
    context: ToolExecutionContext
  ): Promise<ToolResult> {
    await fs.rm(resolveProjectPath(context.projectRoot, params.path));
    return textResult(`Deleted ${toProjectRelative(context.projectRoot, params.path)}`);
  }

  protected describe(params: z.infer<typeof deleteFileParams>): ChangeType {
    return { kind: "delete_file", path: params.path };
  }
}
