/**
 * Brace-delimited blocks and the directives inside them.
 */
import type { Directive, SourcePosition, Token } from "../types.js";
import { defaultDirectiveTable, isDirectiveName, type DirectiveTable } from "./directives.js";

/**
 * How a statement ends when no brace or comment intervenes.
 *
 * - `"directive-name"`: a known directive name ends the previous statement
 *   once it has at least one argument. An unknown directive followed by a
 *   value that happens to be a known name is misread; that is a limitation of
 *   the grammar recovery, not something this mode tries to guess around.
 * - `"newline"`: additionally end the statement when the next token starts
 *   on a later line.
 */
export type StatementBoundary = "directive-name" | "newline";

export type BlockOptions = {
  directives?: DirectiveTable;
  statementBoundary?: StatementBoundary;
};

export type BlockContents = {
  directives: Directive[];
  /** First argument of every `import` directive at this level */
  imports: string[];
};

/**
 * Index of the `}` that closes the `{` at `open`, or `tokens.length` when the
 * block runs off the end of the input.
 */
export function findBlockEnd(tokens: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    const kind = tokens[i].kind;
    if (kind === "open-brace") depth++;
    else if (kind === "close-brace") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return tokens.length;
}

/** Source span covering tokens[from, to) */
export function spanOf(
  tokens: Token[],
  from: number,
  to: number,
): { start: SourcePosition; end: SourcePosition; text: string } {
  const first = tokens[from];
  const last = tokens[to - 1];
  return {
    start: { line: first.line, column: first.column, offset: first.offset },
    end: endOf(last),
    text: tokens.slice(from, to).map((t) => t.text).join(" "),
  };
}

function endOf(token: Token): SourcePosition {
  const lines = token.text.split(/\r\n|\r|\n/);
  if (lines.length === 1) {
    return {
      line: token.line,
      column: token.column + token.text.length,
      offset: token.offset + token.text.length,
    };
  }
  return {
    line: token.line + lines.length - 1,
    column: lines[lines.length - 1].length + 1,
    offset: token.offset + token.text.length,
  };
}

/**
 * Parse the tokens between a block's braces (exclusive) into directives.
 *
 * A `{` with no directive in front of it is dropped and its contents are read
 * as if they belonged to the enclosing block.
 */
export function parseDirectives(tokens: Token[], options?: BlockOptions): BlockContents {
  const table = options?.directives ?? defaultDirectiveTable;
  const byLine = options?.statementBoundary === "newline";
  const directives: Directive[] = [];
  const imports: string[] = [];

  let i = 0;
  while (i < tokens.length) {
    const head = tokens[i];
    if (head.kind === "open-brace" || head.kind === "close-brace" || head.kind === "comment") {
      i++;
      continue;
    }

    const directive: Directive = { name: head.text, args: [], raw: head.text };
    let lastLine = lastLineOf(head);
    i++;

    while (i < tokens.length) {
      const t = tokens[i];
      if (t.kind === "open-brace" || t.kind === "close-brace" || t.kind === "comment") break;
      if (directive.args.length > 0 && isDirectiveName(t.text, table)) break;
      if (byLine && t.line > lastLine) break;
      directive.args.push(t.text);
      directive.raw += " " + t.text;
      lastLine = lastLineOf(t);
      i++;
    }

    if (i < tokens.length && tokens[i].kind === "open-brace") {
      const close = findBlockEnd(tokens, i);
      directive.block = parseDirectives(tokens.slice(i + 1, close), options).directives;
      i = close + 1;
    }

    if (directive.name === "import" && directive.args.length > 0) {
      imports.push(directive.args[0]);
    }
    directives.push(directive);
  }

  return { directives, imports };
}

function lastLineOf(token: Token): number {
  return token.line + (token.text.match(/\r\n|\r|\n/g)?.length ?? 0);
}
