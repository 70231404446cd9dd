/**
 * Query Decomposer
 *
 * Splits a research query into scoped tasks the scheduler can run in parallel.
 */

import type { ResearchTask } from "@steward/agent-runtime-core";

export const DEFAULT_RESEARCH_MAX_STEPS = 20;

export interface DecomposeOptions {
  maxSteps?: number;
  createId?: () => string;
}

const STOP_WORDS = new Set([
  "a",
  "all",
  "an",
  "and",
  "are",
  "called",
  "code",
  "defined",
  "does",
  "file",
  "files",
  "find",
  "for",
  "how",
  "implemented",
  "in",
  "is",
  "list",
  "many",
  "of",
  "pattern",
  "patterns",
  "references",
  "search",
  "similar",
  "the",
  "to",
  "usages",
  "used",
  "uses",
  "what",
  "where",
  "which",
  "with",
]);

let idCounter = 0;

function defaultId(): string {
  idCounter++;
  return `research_${Date.now().toString(36)}_${idCounter.toString(36)}`;
}

/**
 * Split a query into one or more research tasks.
 */
export function decomposeQuery(query: string, options: DecomposeOptions = {}): ResearchTask[] {
  const maxSteps = options.maxSteps ?? DEFAULT_RESEARCH_MAX_STEPS;
  const createId = options.createId ?? defaultId;
  const lower = query.toLowerCase();

  if (lower.includes("find all") || lower.includes("search for")) {
    return [
      { scope: ["src"], label: "source" },
      { scope: ["tests"], label: "tests" },
      { scope: ["docs", "README.md"], label: "documentation" },
    ].map(({ scope, label }): ResearchTask => ({
      id: createId(),
      description: `${query} (${label})`,
      agentType: "file_searcher",
      complexity: "low",
      maxSteps,
      context: scope,
    }));
  }

  if (isListingQuery(query)) {
    return [
      {
        id: createId(),
        description: query,
        agentType: "file_searcher",
        complexity: "low",
        maxSteps,
        context: [],
      },
    ];
  }

  if (lower.includes("what uses") || lower.includes("where is")) {
    return [
      {
        id: createId(),
        description: query,
        agentType: "dependency_mapper",
        complexity: "medium",
        maxSteps,
        context: [],
      },
    ];
  }

  if (lower.includes("pattern") || lower.includes("similar to")) {
    return [
      {
        id: createId(),
        description: query,
        agentType: "pattern_finder",
        complexity: "medium",
        maxSteps,
        context: [],
      },
    ];
  }

  return [
    {
      id: createId(),
      description: query,
      agentType: "file_searcher",
      complexity: "medium",
      maxSteps,
      context: [],
    },
  ];
}

export function isListingQuery(query: string): boolean {
  const lower = query.toLowerCase();
  return lower.includes("how many") || lower.includes("list all");
}

/**
 * Search terms in a query: quoted phrases first, then identifier-like words.
 */
export function extractSearchTerms(query: string): string[] {
  const terms: string[] = [];
  const withoutQuoted = query.replace(/["'`]([^"'`]+)["'`]/g, (_match, phrase: string) => {
    terms.push(phrase.trim());
    return " ";
  });

  for (const word of withoutQuoted.replace(/\([^)]*\)/g, " ").split(/[^A-Za-z0-9_.$-]+/)) {
    const cleaned = word.replace(/^[.-]+|[.-]+$/g, "");
    if (cleaned.length >= 3 && !STOP_WORDS.has(cleaned.toLowerCase()) && !terms.includes(cleaned)) {
      terms.push(cleaned);
    }
  }

  return terms.filter((term) => term.length > 0);
}
