/**
 * File System Operations for Code Tools
 *
 * Agent-friendly file reading, listing and text search under a project root.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

/** Directories never walked */
const IGNORED_DIRECTORIES = new Set(["node_modules", ".git", "dist", "build", "target", "coverage"]);

// ============================================================================
// Types
// ============================================================================

export interface ReadFileOptions {
  /** 1-indexed start line (inclusive). If omitted, start from line 1. */
  startLine?: number;
  /** 1-indexed end line (inclusive). If omitted, read to EOF. */
  endLine?: number;
  /** Prepend line numbers to each line. Default: true */
  withLineNumbers?: boolean;
}

export interface ReadFileResult {
  path: string;
  totalLines: number;
  content: string;
  /** Range of lines actually returned [startLine, endLine] (1-indexed) */
  range: [number, number];
}

export interface ListFilesOptions {
  /** Max depth for recursive listing. Default: Infinity */
  maxDepth?: number;
  /** Include hidden files/directories. Default: false */
  includeHidden?: boolean;
  /** Stop after this many entries */
  limit?: number;
}

export interface FileEntry {
  /** Relative to the listed directory, `/`-separated */
  path: string;
  type: "file" | "directory";
  size?: number;
}

export interface SearchOptions {
  /** Treat the query as a regular expression */
  regex?: boolean;
  caseSensitive?: boolean;
  maxResults?: number;
  /** Only files whose extension is listed (".ts") */
  extensions?: string[];
}

export interface SearchMatch {
  /** Relative to the searched directory */
  file: string;
  line: number;
  text: string;
}

// ============================================================================
// Read File
// ============================================================================

/**
 * Read a file with optional line range.
 * Returns content with line numbers for easy LLM reference.
 */
export async function readFile(
  absolutePath: string,
  options: ReadFileOptions = {}
): Promise<ReadFileResult> {
  const content = await fs.readFile(absolutePath, "utf-8");
  const lines = content.split("\n");
  const totalLines = lines.length;

  const startLine = Math.max(1, options.startLine ?? 1);
  const endLine = Math.min(totalLines, options.endLine ?? totalLines);

  if (startLine > totalLines) {
    throw new Error(`Start line ${startLine} exceeds total lines ${totalLines}`);
  }

  const selectedLines = lines.slice(startLine - 1, endLine);
  const withLineNumbers = options.withLineNumbers ?? true;
  let formattedContent: string;

  if (withLineNumbers) {
    const maxLineNumWidth = String(endLine).length;
    formattedContent = selectedLines
      .map((line, idx) => {
        const lineNum = String(startLine + idx).padStart(maxLineNumWidth, " ");
        return `${lineNum}: ${line}`;
      })
      .join("\n");
  } else {
    formattedContent = selectedLines.join("\n");
  }

  return {
    path: absolutePath,
    totalLines,
    content: formattedContent,
    range: [startLine, endLine],
  };
}

// ============================================================================
// List Files
// ============================================================================

export async function listFiles(
  dirPath: string,
  options: ListFilesOptions = {}
): Promise<FileEntry[]> {
  const entries: FileEntry[] = [];
  await walk(dirPath, dirPath, 1, {
    maxDepth: options.maxDepth ?? Infinity,
    includeHidden: options.includeHidden ?? false,
    limit: options.limit ?? Infinity,
    entries,
  });
  return entries;
}

interface WalkState {
  maxDepth: number;
  includeHidden: boolean;
  limit: number;
  entries: FileEntry[];
}

async function walk(
  dirPath: string,
  basePath: string,
  currentDepth: number,
  state: WalkState
): Promise<void> {
  if (currentDepth > state.maxDepth) {
    return;
  }

  const items = await fs.readdir(dirPath, { withFileTypes: true });
  items.sort((a, b) => a.name.localeCompare(b.name));

  for (const item of items) {
    if (state.entries.length >= state.limit) {
      return;
    }
    if (!state.includeHidden && item.name.startsWith(".")) {
      continue;
    }

    const fullPath = path.join(dirPath, item.name);
    const relativePath = toPosix(path.relative(basePath, fullPath));

    if (item.isDirectory()) {
      if (IGNORED_DIRECTORIES.has(item.name)) {
        continue;
      }
      state.entries.push({ path: relativePath, type: "directory" });
      await walk(fullPath, basePath, currentDepth + 1, state);
    } else if (item.isFile()) {
      const stat = await fs.stat(fullPath);
      state.entries.push({ path: relativePath, type: "file", size: stat.size });
    }
  }
}

// ============================================================================
// Search
// ============================================================================

/**
 * Line-oriented text search over every file below `dirPath`.
 */
export async function searchFiles(
  dirPath: string,
  query: string,
  options: SearchOptions = {}
): Promise<SearchMatch[]> {
  const matcher = createMatcher(query, options);
  const maxResults = options.maxResults ?? 100;
  const extensions = options.extensions?.map((ext) => ext.toLowerCase());
  const files = (await listFiles(dirPath)).filter((entry) => entry.type === "file");
  const matches: SearchMatch[] = [];

  for (const file of files) {
    if (extensions && !extensions.includes(path.extname(file.path).toLowerCase())) {
      continue;
    }
    const content = await fs.readFile(path.join(dirPath, file.path), "utf-8");
    if (content.includes("\u0000")) {
      continue;
    }
    const lines = content.split("\n");
    for (let index = 0; index < lines.length; index++) {
      if (matcher(lines[index])) {
        matches.push({ file: file.path, line: index + 1, text: lines[index].trim() });
        if (matches.length >= maxResults) {
          return matches;
        }
      }
    }
  }

  return matches;
}

function createMatcher(query: string, options: SearchOptions): (line: string) => boolean {
  if (options.regex) {
    const pattern = new RegExp(query, options.caseSensitive ? "" : "i");
    return (line) => pattern.test(line);
  }
  if (options.caseSensitive) {
    return (line) => line.includes(query);
  }
  const needle = query.toLowerCase();
  return (line) => line.toLowerCase().includes(needle);
}

// ============================================================================
// Utility Functions
// ============================================================================

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function toPosix(value: string): string {
  return value.split(path.sep).join("/");
}
