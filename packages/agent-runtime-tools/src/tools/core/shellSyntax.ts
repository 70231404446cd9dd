/**
 * Shell Syntax Helpers
 *
 * Quote-aware splitting of a command line into chained segments and words,
 * and extraction of the commands nested inside it. Enough shell to classify
 * a command, not to run one.
 */

export type ChainOperator = "&&" | "||" | ";" | "|" | "&" | "\n";

export interface ShellSegment {
  /** Raw segment text, trimmed */
  text: string;
  /** Unquoted words */
  words: string[];
  /** Redirection targets (`> file`, `>> file`) */
  redirects: string[];
  /** Operator that ended this segment, if any */
  operator?: ChainOperator;
}

type QuoteState = {
  inSingleQuote: boolean;
  inDoubleQuote: boolean;
  escaped: boolean;
};

function createQuoteState(): QuoteState {
  return { inSingleQuote: false, inDoubleQuote: false, escaped: false };
}

function updateQuoteState(char: string, state: QuoteState): boolean {
  if (state.escaped) {
    state.escaped = false;
    return true;
  }

  if (char === "\\" && !state.inSingleQuote) {
    state.escaped = true;
    return true;
  }

  if (char === '"' && !state.inSingleQuote) {
    state.inDoubleQuote = !state.inDoubleQuote;
    return true;
  }

  if (char === "'" && !state.inDoubleQuote) {
    state.inSingleQuote = !state.inSingleQuote;
    return true;
  }

  return false;
}

function matchChainOperator(command: string, index: number): ChainOperator | null {
  const char = command[index];
  const next = command[index + 1];
  const previous = command[index - 1];

  if (char === "&" && next === "&") {
    return "&&";
  }
  // `2>&1`, `>&2` and `&>file` are redirections, not background jobs
  if (char === "&" && next !== ">" && previous !== ">" && previous !== "<") {
    return "&";
  }
  if (char === "|" && next === "|") {
    return "||";
  }
  if (char === "|") {
    return "|";
  }
  if (char === ";") {
    return ";";
  }
  if (char === "\n") {
    return "\n";
  }
  return null;
}

/**
 * Split a command line on `&&`, `||`, `;`, `|`, `&` and newlines outside quotes.
 */
export function splitShellSegments(command: string): ShellSegment[] {
  const segments: ShellSegment[] = [];
  const state = createQuoteState();
  let start = 0;

  for (let index = 0; index < command.length; index++) {
    const char = command[index];
    if (updateQuoteState(char, state) || state.inSingleQuote || state.inDoubleQuote) {
      continue;
    }

    const operator = matchChainOperator(command, index);
    if (operator) {
      pushSegment(segments, command.slice(start, index), operator);
      index += operator.length - 1;
      start = index + 1;
    }
  }
  pushSegment(segments, command.slice(start));

  return segments;
}

function pushSegment(segments: ShellSegment[], raw: string, operator?: ChainOperator): void {
  const text = raw.trim();
  if (!text) {
    return;
  }
  const { words, redirects } = tokenizeSegment(text);
  segments.push({ text, words, redirects, operator });
}

/**
 * Split one segment into words, pulling out redirection targets.
 */
export function tokenizeSegment(text: string): { words: string[]; redirects: string[] } {
  const words: string[] = [];
  const redirects: string[] = [];
  const state = createQuoteState();
  let current = "";
  let hasToken = false;
  let pendingRedirect = false;

  const flush = (): void => {
    if (!hasToken) {
      return;
    }
    if (pendingRedirect) {
      redirects.push(current);
      pendingRedirect = false;
    } else {
      words.push(current);
    }
    current = "";
    hasToken = false;
  };

  for (let index = 0; index < text.length; index++) {
    const char = text[index];
    const wasEscaped = state.escaped;

    if (updateQuoteState(char, state)) {
      if (wasEscaped) {
        current += char;
      }
      hasToken = true;
      continue;
    }

    if (state.inSingleQuote || state.inDoubleQuote) {
      current += char;
      continue;
    }

    if (char === " " || char === "\t") {
      flush();
      continue;
    }

    if (char === ">") {
      // Drop an fd prefix such as the 2 in 2> or the & in &>
      if (/^(\d|&)$/.test(current)) {
        current = "";
        hasToken = false;
      }
      flush();
      pendingRedirect = true;
      if (text[index + 1] === ">") {
        index++;
      }
      if (text[index + 1] === "&") {
        // 2>&1 duplicates a descriptor, no file
        index++;
        pendingRedirect = false;
        while (index + 1 < text.length && /\d/.test(text[index + 1])) {
          index++;
        }
      }
      continue;
    }

    current += char;
    hasToken = true;
  }
  flush();

  return { words, redirects };
}

/** Words of a whole command line, ignoring chaining */
export function shellWords(command: string): string[] {
  return splitShellSegments(command).flatMap((segment) => segment.words);
}

// ============================================================================
// Nested Commands
// ============================================================================

/** Placeholder left where a substitution stood */
export const SUBSTITUTION_PLACEHOLDER = "$(...)";

export interface NestedCommands {
  /** The command line with every nested command taken out */
  command: string;
  /** Bodies of `$(…)`, backticks, `<(…)`, `>(…)` and `( … )` subshells, outermost only */
  nested: string[];
}

function findClosingParen(command: string, open: number): number {
  const state = createQuoteState();
  let depth = 0;
  for (let index = open; index < command.length; index++) {
    const char = command[index];
    if (updateQuoteState(char, state) || state.inSingleQuote || state.inDoubleQuote) {
      continue;
    }
    if (char === "(") {
      depth++;
    } else if (char === ")") {
      depth--;
      if (depth === 0) {
        return index;
      }
    }
  }
  return command.length;
}

function findClosingBacktick(command: string, from: number): number {
  for (let index = from; index < command.length; index++) {
    if (command[index] === "\\") {
      index++;
    } else if (command[index] === "`") {
      return index;
    }
  }
  return command.length;
}

/**
 * Pull out the commands the shell runs on the side. Single-quoted text is
 * literal; `$(…)` and backticks still expand inside double quotes. Substitutions
 * leave SUBSTITUTION_PLACEHOLDER behind, subshell groups leave nothing.
 */
export function extractNestedCommands(command: string): NestedCommands {
  const nested: string[] = [];
  const state = createQuoteState();
  let outer = "";
  let copied = 0;

  for (let index = 0; index < command.length; index++) {
    const char = command[index];
    if (updateQuoteState(char, state) || state.inSingleQuote) {
      continue;
    }

    if (char === "`") {
      const end = findClosingBacktick(command, index + 1);
      nested.push(command.slice(index + 1, end));
      outer += `${command.slice(copied, index)}${SUBSTITUTION_PLACEHOLDER}`;
      index = end;
      copied = end + 1;
      continue;
    }

    const next = command[index + 1];
    const substitution =
      next === "(" && (char === "$" || (!state.inDoubleQuote && (char === "<" || char === ">")));
    const group = char === "(" && !state.inDoubleQuote;
    if (substitution || group) {
      const open = substitution ? index + 1 : index;
      const end = findClosingParen(command, open);
      nested.push(command.slice(open + 1, end));
      outer += `${command.slice(copied, index)}${substitution ? SUBSTITUTION_PLACEHOLDER : " "}`;
      index = end;
      copied = end + 1;
    }
  }
  outer += command.slice(copied);

  return { command: outer, nested };
}
