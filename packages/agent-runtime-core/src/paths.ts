/**
 * Project path helpers shared by tools and the safety engine.
 */

import path from "node:path";

/** Resolve a tool-supplied path against the project root. */
export function resolveProjectPath(projectRoot: string, target: string): string {
  return path.resolve(projectRoot, target);
}

/** True when `target` (absolute or root-relative) stays inside `projectRoot`. */
export function isWithinRoot(projectRoot: string, target: string): boolean {
  const root = path.resolve(projectRoot);
  const resolved = path.resolve(root, target);
  const relative = path.relative(root, resolved);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/** Root-relative display path, falling back to the absolute path outside the root. */
export function toProjectRelative(projectRoot: string, target: string): string {
  const resolved = resolveProjectPath(projectRoot, target);
  return isWithinRoot(projectRoot, resolved)
    ? path.relative(path.resolve(projectRoot), resolved) || "."
    : resolved;
}
