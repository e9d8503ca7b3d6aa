/**
 * Editor views of a Caddyfile: problems as LSP diagnostics, and a hover
 * summary of the top-level block under the cursor.
 *
 * Positions here are LSP positions (0-based line and character); the engine
 * reports 1-based lines and columns.
 */
import { DiagnosticSeverity, MarkupKind, type Diagnostic, type Hover, type Position } from "vscode-languageserver/node.js";
import {
  globalBlockOptions,
  parseCaddyfileWithReport,
  parseDirectives,
  scanTopLevel,
  tokenize,
  type ParseOptions,
  type SkippedRange,
  type Token,
  type TopLevelItem,
} from "caddyfile-engine";

const SOURCE = "caddyfile";

// ── Diagnostics ────────────────────────────────────────────────────────────

function skipMessage(range: SkippedRange): string {
  switch (range.reason) {
    case "unrecognized-token":
      return `Unrecognized top-level token "${range.text}"`;
    case "incomplete-site":
      return `Site address without a block: ${range.text}`;
    case "incomplete-snippet":
      return `Snippet definition without a block: ${range.text}`;
    case "orphan-block":
      return "Block has no site address or snippet name";
    case "duplicate-global-options":
      return "Only the first global options block is used";
    case "unbalanced-brace":
      return "Unmatched closing brace";
    case "unterminated-block":
      return "Block is never closed";
  }
}

function tokenRange(token: Token) {
  return {
    start: { line: token.line - 1, character: token.column - 1 },
    end: { line: token.line - 1, character: token.column - 1 + token.text.length },
  };
}

/**
 * Everything the parser had to skip (as warnings) plus snippet names and
 * site addresses defined twice (as errors, since caddy refuses them).
 */
export function toDiagnostics(text: string, options?: ParseOptions): Diagnostic[] {
  const { skipped } = parseCaddyfileWithReport(text, options);
  const diagnostics: Diagnostic[] = skipped.map((range) => ({
    severity: DiagnosticSeverity.Warning,
    range: {
      start: { line: range.start.line - 1, character: range.start.column - 1 },
      end: { line: range.end.line - 1, character: range.end.column - 1 },
    },
    message: skipMessage(range),
    source: SOURCE,
  }));

  const tokens = tokenize(text);
  const snippets = new Set<string>();
  const addresses = new Set<string>();

  for (const item of scanTopLevel(tokens, options).items) {
    if (item.kind === "snippet") {
      if (snippets.has(item.name)) {
        diagnostics.push({
          severity: DiagnosticSeverity.Error,
          range: tokenRange(tokens[item.start]),
          message: `Snippet (${item.name}) is already defined`,
          source: SOURCE,
        });
      }
      snippets.add(item.name);
    } else if (item.kind === "site") {
      for (let i = item.start; i < item.open; i++) {
        if (tokens[i].kind === "comment") continue;
        const address = tokens[i].text;
        if (addresses.has(address)) {
          diagnostics.push({
            severity: DiagnosticSeverity.Error,
            range: tokenRange(tokens[i]),
            message: `Address ${address} is already used by another site`,
            source: SOURCE,
          });
        }
        addresses.add(address);
      }
    }
  }

  return diagnostics.sort(
    (a, b) => a.range.start.line - b.range.start.line || a.range.start.character - b.range.start.character,
  );
}

// ── Hover ──────────────────────────────────────────────────────────────────

function before(a: Position, b: Position): boolean {
  return a.line < b.line || (a.line === b.line && a.character < b.character);
}

function contains(tokens: Token[], item: TopLevelItem, position: Position): boolean {
  const first = tokens[item.start];
  const start = { line: first.line - 1, character: first.column - 1 };
  if (before(position, start)) return false;
  if (item.close >= tokens.length) return true;
  const end = tokenRange(tokens[item.close]).end;
  return before(position, end);
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** Markdown summary of the top-level block containing `line`/`character`, or `null` outside any block. */
export function hoverAt(text: string, line: number, character: number, options?: ParseOptions): Hover | null {
  const tokens = tokenize(text);
  const position = { line, character };
  const item = scanTopLevel(tokens, options).items.find((i) => contains(tokens, i, position));
  if (!item) return null;

  const body = tokens.slice(item.open + 1, item.close);
  let value: string;

  if (item.kind === "global-options") {
    const { directives } = parseDirectives(body, globalBlockOptions(options));
    value = `**Global options**\n\n${plural(directives.length, "option")}`;
  } else {
    const { directives, imports } = parseDirectives(body, options);
    const header =
      item.kind === "snippet"
        ? `**Snippet** \`(${item.name})\``
        : `**Site** ${item.addresses.map((a) => `\`${a}\``).join(", ")}`;
    value = `${header}\n\n${plural(directives.length, "directive")}`;
    if (imports.length > 0) value += ` · imports ${imports.map((i) => `\`${i}\``).join(", ")}`;
  }

  const first = tokens[item.start];
  return {
    contents: { kind: MarkupKind.Markdown, value },
    range: {
      start: { line: first.line - 1, character: first.column - 1 },
      end: item.close < tokens.length ? tokenRange(tokens[item.close]).end : position,
    },
  };
}
