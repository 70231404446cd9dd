/**
 * Approval Memory
 *
 * Patterns approved with "approved_similar" for the rest of the session.
 */

import type { PendingChange } from "@steward/agent-runtime-core";
import { splitShellSegments } from "@steward/agent-runtime-tools";
import { programName } from "./commandRisk";
import { commandLine } from "./safetyPolicy";

/**
 * Programs of every chained segment for commands (`git status | wc -l` →
 * `git wc`), empty for everything else.
 */
function patternSubject(pending: PendingChange): string {
  if (pending.change.kind !== "run_command") {
    return "";
  }
  return splitShellSegments(commandLine(pending.change))
    .map((segment) => programName(segment.words[0] ?? ""))
    .filter((program) => program.length > 0)
    .join(" ");
}

export function approvalPatternKey(pending: PendingChange): string {
  return [pending.toolName, pending.safetyLevel, pending.change.kind, patternSubject(pending)].join(
    "\u0000"
  );
}

export class ApprovalMemory {
  private readonly patterns = new Set<string>();

  /** Returns false for dangerous changes, which are never remembered. */
  remember(pending: PendingChange): boolean {
    if (pending.safetyLevel === "dangerous") {
      return false;
    }
    this.patterns.add(approvalPatternKey(pending));
    return true;
  }

  matches(pending: PendingChange): boolean {
    return pending.safetyLevel !== "dangerous" && this.patterns.has(approvalPatternKey(pending));
  }

  get size(): number {
    return this.patterns.size;
  }

  clear(): void {
    this.patterns.clear();
  }
}
