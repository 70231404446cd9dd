/**
 * Research Subagent Types
 */

import type { AgentType, TaskComplexity } from "./routing";

export interface ResearchTask {
  id: string;
  description: string;
  agentType: AgentType;
  complexity: TaskComplexity;
  maxSteps: number;
  /** Paths or hints that scope the task */
  context: string[];
}

export interface ResearchFindings {
  findings: string[];
  relevantFiles: string[];
  tokensUsed: number;
}

export type ResearchResult =
  | ({ status: "success"; taskId: string; durationMs: number } & ResearchFindings)
  | { status: "failed"; taskId: string; durationMs: number; error: string }
  | { status: "cancelled"; taskId: string; durationMs: number; reason: string };

export type ResearchState = "queued" | "running" | "done";

export interface ResearchProgress {
  state: ResearchState;
  stepsCompleted: number;
  message?: string;
}

export interface ResearchHandle {
  readonly taskId: string;
  /** Non-blocking */
  poll(): ResearchProgress;
  cancel(reason?: string): void;
  result(): Promise<ResearchResult>;
}
