/**
 * Command Risk Analysis
 *
 * Classifies a shell command line by its most dangerous segment, including
 * the commands nested in substitutions, subshells and inline scripts.
 */

import path from "node:path";
import { isWithinRoot, maxSafetyLevel, type SafetyLevel } from "@steward/agent-runtime-core";
import {
  extractNestedCommands,
  type ShellSegment,
  splitShellSegments,
} from "@steward/agent-runtime-tools";

// ============================================================================
// Command Tables
// ============================================================================

const READ_ONLY_PROGRAMS = new Set([
  "ls",
  "pwd",
  "echo",
  "cat",
  "grep",
  "find",
  "head",
  "tail",
  "wc",
  "rg",
  "which",
]);

const READ_ONLY_GIT_SUBCOMMANDS = new Set(["status", "diff", "log", "show"]);

const DESTRUCTIVE_PROGRAMS = new Set([
  "mkfs",
  "dd",
  "shred",
  "chown",
  "sudo",
  "shutdown",
  "reboot",
]);

const NETWORK_PROGRAMS = new Set([
  "curl",
  "wget",
  "ssh",
  "scp",
  "rsync",
  "nc",
  "ftp",
  "telnet",
  "iptables",
]);

/** Shell keywords and wrappers skipped before the program name */
const COMMAND_PREFIXES = new Set([
  "!",
  "{",
  "}",
  "if",
  "then",
  "elif",
  "else",
  "while",
  "until",
  "do",
  "done",
  "fi",
  "time",
  "nohup",
  "exec",
  "command",
  "builtin",
  "env",
  "nice",
  "timeout",
  "xargs",
]);

const SHELL_PROGRAMS = new Set(["sh", "bash", "zsh", "dash", "ksh"]);

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;
const PREFIX_ARGUMENT = /^(-.*|\d+[smhd]?)$/;

export interface CommandRiskOptions {
  projectRoot: string;
  /** Absolute working directory; defaults to the project root */
  cwd?: string;
}

export interface CommandRisk {
  level: SafetyLevel;
  /** Why the command is above safe; empty for safe commands */
  reasons: string[];
}

// ============================================================================
// Analysis
// ============================================================================

/** Program name without any leading path, e.g. `/bin/rm` → `rm`. */
export function programName(word: string): string {
  const slash = word.lastIndexOf("/");
  const base = slash >= 0 ? word.slice(slash + 1) : word;
  return base.startsWith("mkfs.") ? "mkfs" : base;
}

/** Flags as single letters (`-rf` → r, f) plus long flags verbatim. */
function collectFlags(args: string[]): Set<string> {
  const flags = new Set<string>();
  for (const arg of args) {
    if (arg.startsWith("--")) {
      flags.add(arg);
    } else if (arg.startsWith("-") && arg.length > 1) {
      for (const letter of arg.slice(1)) {
        flags.add(letter);
      }
    }
  }
  return flags;
}

/**
 * The words that name the program and its arguments: leading variable
 * assignments and wrappers such as `nohup` or `env` (with their flags) dropped.
 */
function commandWords(words: string[]): string[] {
  let index = 0;
  while (index < words.length) {
    const word = words[index];
    if (ASSIGNMENT.test(word)) {
      index++;
    } else if (COMMAND_PREFIXES.has(word)) {
      index++;
      while (index < words.length && PREFIX_ARGUMENT.test(words[index])) {
        index++;
      }
    } else {
      break;
    }
  }
  return words.slice(index);
}

function inlineScript(program: string, args: string[]): string | undefined {
  if (program === "eval") {
    return args.join(" ");
  }
  if (SHELL_PROGRAMS.has(program)) {
    const flag = args.findIndex((arg) => /^-[a-z]*c[a-z]*$/.test(arg));
    return flag >= 0 ? args[flag + 1] : undefined;
  }
  return undefined;
}

function gitRisk(args: string[]): CommandRisk {
  const subcommand = args.find((arg) => !arg.startsWith("-"));
  const rest = subcommand ? args.slice(args.indexOf(subcommand) + 1) : [];
  const flags = collectFlags(rest);

  if (subcommand === "reset" && flags.has("--hard")) {
    return { level: "dangerous", reasons: ["git reset --hard discards work"] };
  }
  if (subcommand === "clean" && flags.has("f")) {
    return { level: "dangerous", reasons: ["git clean -f deletes untracked files"] };
  }
  if (subcommand === "push") {
    const forced = flags.has("f") || flags.has("--force") || flags.has("--force-with-lease");
    return {
      level: "dangerous",
      reasons: [forced ? "git push --force rewrites remote history" : "git push reaches the network"],
    };
  }
  if (subcommand && READ_ONLY_GIT_SUBCOMMANDS.has(subcommand)) {
    return { level: "safe", reasons: [] };
  }
  return {
    level: "caution",
    reasons: [subcommand ? `git ${subcommand} changes the repository` : "bare git invocation"],
  };
}

export function classifySegment(segment: ShellSegment, options: CommandRiskOptions): CommandRisk {
  const fileWrites = segment.redirects.filter((target) => target !== "/dev/null");
  const deviceWrite = fileWrites.find((target) => target.startsWith("/dev/"));
  if (deviceWrite) {
    return { level: "dangerous", reasons: [`writes to device ${deviceWrite}`] };
  }
  const base = options.cwd ?? options.projectRoot;
  const outsideWrite = fileWrites.find(
    (target) => target.startsWith("~") || !isWithinRoot(options.projectRoot, path.resolve(base, target))
  );
  if (outsideWrite) {
    return { level: "dangerous", reasons: [`writes to ${outsideWrite} outside the project`] };
  }

  const [first, ...args] = commandWords(segment.words);
  if (!first) {
    return fileWrites.length > 0
      ? { level: "caution", reasons: ["output redirected to a file"] }
      : { level: "safe", reasons: [] };
  }

  const program = programName(first);
  const flags = collectFlags(args);

  const script = inlineScript(program, args);
  if (script !== undefined) {
    const inner = classifyCommand(script, options);
    return {
      level: maxSafetyLevel(inner.level, "caution"),
      reasons: [`${program} runs an inline script`, ...inner.reasons],
    };
  }
  if (program === "rm" && (flags.has("r") || flags.has("R") || flags.has("--recursive"))) {
    return { level: "dangerous", reasons: ["recursive delete"] };
  }
  if (program === "chmod" && (flags.has("R") || flags.has("--recursive"))) {
    return { level: "dangerous", reasons: ["recursive permission change"] };
  }
  if (program === "kill" && flags.has("9")) {
    return { level: "dangerous", reasons: ["kill -9"] };
  }
  if (DESTRUCTIVE_PROGRAMS.has(program)) {
    return { level: "dangerous", reasons: [`${program} is destructive`] };
  }
  if (NETWORK_PROGRAMS.has(program)) {
    return { level: "dangerous", reasons: [`${program} reaches the network`] };
  }
  if (program === "npm" && args[0] === "publish") {
    return { level: "dangerous", reasons: ["npm publish reaches the network"] };
  }
  if (program === "git") {
    const risk = gitRisk(args);
    if (risk.level === "safe" && fileWrites.length > 0) {
      return { level: "caution", reasons: ["output redirected to a file"] };
    }
    return risk;
  }
  if (READ_ONLY_PROGRAMS.has(program)) {
    return fileWrites.length > 0
      ? { level: "caution", reasons: ["output redirected to a file"] }
      : { level: "safe", reasons: [] };
  }
  return { level: "caution", reasons: [`${program} may modify the workspace`] };
}

/**
 * Risk of a full command line: the maximum over its chained segments and the
 * commands nested in it, raised to dangerous when the working directory
 * leaves the project root.
 */
export function classifyCommand(command: string, options: CommandRiskOptions): CommandRisk {
  let level: SafetyLevel = "safe";
  const reasons: string[] = [];

  if (options.cwd !== undefined && !isWithinRoot(options.projectRoot, options.cwd)) {
    level = "dangerous";
    reasons.push(`working directory ${options.cwd} is outside the project`);
  }

  const { command: outer, nested } = extractNestedCommands(command);
  const segments = splitShellSegments(outer);
  const bodies = nested.filter((body) => body.trim() !== "");
  if (segments.length === 0 && bodies.length === 0) {
    return { level: maxSafetyLevel(level, "caution"), reasons: [...reasons, "empty command"] };
  }

  for (const segment of segments) {
    const risk = classifySegment(segment, options);
    level = maxSafetyLevel(level, risk.level);
    reasons.push(...risk.reasons);
  }
  for (const body of bodies) {
    const risk = classifyCommand(body, options);
    level = maxSafetyLevel(level, risk.level);
    reasons.push(...risk.reasons);
  }
  return { level, reasons };
}
