/**
 * Mode Classifier
 *
 * Keyword heuristics that suggest a Plan/Build switch from the user's text,
 * plus the mode-aware tool filter the controller applies before every call.
 */

import type { AgentMode, ToolCapability } from "@steward/agent-runtime-core";

export interface ModeRecommendation {
  mode: AgentMode;
  reason: string;
  /** Keyword that triggered the recommendation */
  matched: string;
}

const BUILD_KEYWORDS = ["implement", "write", "edit", "fix", "change", "modify", "create file"];

const PLAN_KEYWORDS = [
  "analyze",
  "understand",
  "explain",
  "research",
  "explore",
  "what does",
  "how does",
];

/** System prompt addition sent with every request in each mode. */
export const MODE_PROMPTS: Readonly<Record<AgentMode, string>> = {
  plan: `You are in PLAN MODE. You can read files, search the codebase and run research, but you cannot modify files or run commands.
Analyze the problem, explore the relevant code and propose a step-by-step plan. The user switches to Build Mode to implement it.`,
  build: `You are in BUILD MODE. You can read and write files and run commands.
Make incremental changes and verify each step. Destructive operations may require approval.`,
};

/** Whole words, plus simple inflections: fixes, fixed, fixing, writing. */
function keywordPattern(keyword: string): RegExp {
  const stem = keyword.replace(/e$/, "").replace(/\s+/g, "\\s+");
  const silentE = keyword.endsWith("e") ? "e?" : "";
  return new RegExp(`\\b${stem}${silentE}(?:s|es|ed|d|ing)?\\b`, "i");
}

function findKeyword(text: string, keywords: readonly string[]): string | undefined {
  return keywords.find((keyword) => keywordPattern(keyword).test(text));
}

export class ModeClassifier {
  /** Suggested mode for `text`, or null when the current mode fits. */
  recommend(currentMode: AgentMode, text: string): ModeRecommendation | null {
    if (currentMode === "plan") {
      const matched = findKeyword(text, BUILD_KEYWORDS);
      return matched
        ? { mode: "build", matched, reason: `Request asks to ${matched}; Build Mode is needed` }
        : null;
    }
    const matched = findKeyword(text, PLAN_KEYWORDS);
    return matched
      ? { mode: "plan", matched, reason: `Request asks to ${matched}; Plan Mode fits analysis` }
      : null;
  }

  /** Plan Mode allows read-only tools only; Build Mode allows everything. */
  isToolAllowed(mode: AgentMode, tool: Pick<ToolCapability, "readOnly">): boolean {
    return mode === "build" || tool.readOnly;
  }

  filterTools<T extends Pick<ToolCapability, "readOnly">>(mode: AgentMode, tools: readonly T[]): T[] {
    return tools.filter((tool) => this.isToolAllowed(mode, tool));
  }

  systemPrompt(mode: AgentMode): string {
    return MODE_PROMPTS[mode];
  }
}

export function createModeClassifier(): ModeClassifier {
  return new ModeClassifier();
}
