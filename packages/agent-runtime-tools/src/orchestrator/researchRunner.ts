/**
 * Default Research Runner
 *
 * Tool-driven research strategies (file search, listing, pattern search,
 * dependency mapping) built on list_files, search_code and read_file.
 * Cancellation is checked before every tool call.
 */

import * as path from "node:path";
import {
  getErrorMessage,
  type ResearchFindings,
  type ResearchTask,
  renderToolContent,
  type ToolResult,
} from "@steward/agent-runtime-core";
import { z } from "zod";
import { extractSearchTerms, isListingQuery } from "./queryDecomposer";
import type { ResearchRunContext, ResearchRunner } from "./researchScheduler";

// ============================================================================
// Tool Result Parsing
// ============================================================================

const searchPayload = z.object({
  matches: z.array(z.object({ file: z.string(), line: z.number(), text: z.string() })),
});

const listingPayload = z.object({
  entries: z.array(z.object({ path: z.string(), type: z.enum(["file", "directory"]) })),
});

function jsonPayload<T>(result: ToolResult, schema: z.ZodType<T>): T | null {
  for (const item of result.content) {
    if (item.type === "json") {
      const parsed = schema.safeParse(item.value);
      if (parsed.success) {
        return parsed.data;
      }
    }
  }
  return null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Rough token estimate for text a model would have read */
function estimateTokens(chars: number): number {
  return Math.ceil(chars / 4);
}

// ============================================================================
// Runner
// ============================================================================

class ResearchSession {
  readonly findings: string[] = [];
  readonly files = new Set<string>();
  private steps = 0;
  private charsRead = 0;

  constructor(
    private readonly task: ResearchTask,
    private readonly context: ResearchRunContext
  ) {}

  get exhausted(): boolean {
    return this.steps >= this.task.maxSteps;
  }

  async call(name: string, params: Record<string, unknown>): Promise<ToolResult | null> {
    this.context.throwIfCancelled();
    if (this.exhausted) {
      return null;
    }
    this.steps++;
    const result = await this.context.tools.execute(name, params, {
      projectRoot: this.context.projectRoot,
      signal: this.context.signal,
    });
    this.charsRead += renderToolContent(result).length;
    this.context.reportProgress(this.steps, `${name} ${JSON.stringify(params)}`);
    return result;
  }

  async search(
    query: string,
    scope: string,
    regex: boolean
  ): Promise<Array<{ file: string; line: number; text: string }>> {
    const result = await this.call("search_code", { query, path: scope, regex, maxResults: 50 });
    if (!result?.success) {
      return [];
    }
    const payload = jsonPayload(result, searchPayload);
    return (payload?.matches ?? []).map((match) => ({
      ...match,
      file: path.posix.join(scope, match.file),
    }));
  }

  toFindings(): ResearchFindings {
    return {
      findings: this.findings,
      relevantFiles: [...this.files].sort(),
      tokensUsed: estimateTokens(this.charsRead),
    };
  }
}

async function runFileSearch(
  session: ResearchSession,
  terms: string[],
  scopes: string[]
): Promise<void> {
  for (const scope of scopes) {
    for (const term of terms) {
      const matches = await session.search(term, scope, false);
      for (const match of matches) {
        session.files.add(match.file);
      }
      if (matches.length > 0) {
        session.findings.push(`"${term}" appears ${matches.length} time(s) under ${scope}`);
      }
    }
  }
}

async function runListing(
  session: ResearchSession,
  terms: string[],
  scopes: string[]
): Promise<void> {
  for (const scope of scopes) {
    const result = await session.call("list_files", { path: scope });
    const payload = result?.success ? jsonPayload(result, listingPayload) : null;
    if (!payload) {
      continue;
    }
    const files = payload.entries.filter((entry) => entry.type === "file");
    const lowered = terms.map((term) => term.toLowerCase());
    const selected =
      lowered.length === 0
        ? files
        : files.filter((entry) => lowered.some((term) => entry.path.toLowerCase().includes(term)));
    for (const entry of selected) {
      session.files.add(path.posix.join(scope, entry.path));
    }
    session.findings.push(`${selected.length} matching file(s) under ${scope}`);
  }
}

async function runPatternSearch(
  session: ResearchSession,
  terms: string[],
  scopes: string[]
): Promise<void> {
  await runFileSearch(session, terms, scopes);
  const first = [...session.files].sort()[0];
  if (!first) {
    return;
  }
  const result = await session.call("read_file", { path: first, startLine: 1, endLine: 40 });
  if (result?.success) {
    session.findings.push(`Example from ${first}:\n${renderToolContent(result)}`);
  }
}

async function runDependencyMapping(
  session: ResearchSession,
  terms: string[],
  scopes: string[]
): Promise<void> {
  for (const scope of scopes) {
    for (const term of terms) {
      const escaped = escapeRegExp(term);
      const definitions = await session.search(
        `(function|class|interface|type|const|let|def|fn|struct|enum)\\s+${escaped}\\b`,
        scope,
        true
      );
      for (const match of definitions) {
        session.files.add(match.file);
        session.findings.push(`${term} defined at ${match.file}:${match.line}`);
      }

      const usages = await session.search(`(import|require|from|use)\\b.*${escaped}`, scope, true);
      const dependents = new Set(usages.map((match) => match.file));
      for (const file of dependents) {
        session.files.add(file);
      }
      if (dependents.size > 0) {
        session.findings.push(`${term} is imported by ${dependents.size} file(s)`);
      }
    }
  }
}

/**
 * Runner used by the research tool unless a host supplies its own.
 */
export function createResearchRunner(): ResearchRunner {
  return async (task, context) => {
    const session = new ResearchSession(task, context);
    const terms = extractSearchTerms(task.description);
    const scopes = task.context.length > 0 ? task.context : ["."];

    try {
      if (isListingQuery(task.description)) {
        await runListing(session, terms, scopes);
      } else if (terms.length === 0) {
        session.findings.push("No searchable terms in query");
      } else if (task.agentType === "dependency_mapper") {
        await runDependencyMapping(session, terms, scopes);
      } else if (task.agentType === "pattern_finder") {
        await runPatternSearch(session, terms, scopes);
      } else {
        await runFileSearch(session, terms, scopes);
      }
    } catch (error) {
      context.throwIfCancelled();
      throw new Error(`Research task ${task.id} failed: ${getErrorMessage(error)}`);
    }

    if (session.findings.length === 0) {
      session.findings.push("No matches found");
    }
    return session.toFindings();
  };
}
