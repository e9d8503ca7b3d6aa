/**
 * Top-level structure recovery.
 *
 * A Caddyfile has no keyword in front of its blocks, so whether `{` opens the
 * global options, a snippet or a site depends on the tokens before it. The
 * scan below threads that context forward through a single pass instead of
 * looking backwards from each brace.
 */
import type { SkippedRange, SkipReason, Token } from "../types.js";
import { findBlockEnd, spanOf } from "./block.js";
import { defaultDirectiveTable, type DirectiveTable } from "./directives.js";

// ── Token predicates ───────────────────────────────────────────────────────

/**
 * Heuristic: does this token look like a site address?
 *
 * A plugin directive whose name contains a dot and is missing from the table
 * is misread as an address; add it to the table to disambiguate.
 */
export function isSiteAddress(text: string, table: DirectiveTable = defaultDirectiveTable): boolean {
  if (text === "" || text === "{" || text === "}") return false;
  if (text.startsWith("#") || text.startsWith("(") || text.startsWith("@")) return false;
  if (table.has(text)) return false;
  return (
    text.includes(".") ||
    text.startsWith(":") ||
    text.startsWith("http://") ||
    text.startsWith("https://") ||
    text === "localhost" ||
    text.startsWith("localhost:")
  );
}

/** `(name)` with a non-empty name */
export function isSnippetName(text: string): boolean {
  return text.length > 2 && text.startsWith("(") && text.endsWith(")");
}

export function snippetNameOf(text: string): string {
  return text.slice(1, -1);
}

// ── Top-level scan ─────────────────────────────────────────────────────────

export type ScanOptions = {
  directives?: DirectiveTable;
};

/** `open`/`close` are token indices; `close === tokens.length` when unterminated */
export type TopLevelItem =
  | { kind: "global-options"; start: number; open: number; close: number; comments: string[] }
  | { kind: "snippet"; start: number; name: string; open: number; close: number; comments: string[] }
  | { kind: "site"; start: number; addresses: string[]; open: number; close: number; comments: string[] };

export type TopLevelScan = {
  items: TopLevelItem[];
  skipped: SkippedRange[];
};

type Pending =
  | { kind: "site"; start: number; end: number; addresses: string[] }
  | { kind: "snippet"; start: number; end: number; name: string };

/**
 * Walk the top level once and recover its blocks.
 *
 * State carried forward:
 *   - `pending`: the site addresses or snippet name waiting for their `{`
 *   - `sawMarker`: whether an address or snippet name appeared since the
 *     document start or the last top-level `}` (stray ones included); a bare
 *     `{` is the global options block only while this is false
 */
export function scanTopLevel(tokens: Token[], options?: ScanOptions): TopLevelScan {
  const table = options?.directives ?? defaultDirectiveTable;
  const items: TopLevelItem[] = [];
  const skipped: SkippedRange[] = [];

  let pending: Pending | undefined;
  let sawMarker = false;
  let comments: string[] = [];

  const skip = (reason: SkipReason, from: number, to: number) => {
    skipped.push({ reason, ...spanOf(tokens, from, to) });
  };

  const dropPending = () => {
    if (!pending) return;
    skip(pending.kind === "site" ? "incomplete-site" : "incomplete-snippet", pending.start, pending.end);
    pending = undefined;
  };

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];

    if (token.kind === "comment") {
      if (!pending) comments.push(token.text);
      i++;
      continue;
    }

    if (token.kind === "close-brace") {
      dropPending();
      skip("unbalanced-brace", i, i + 1);
      sawMarker = false;
      comments = [];
      i++;
      continue;
    }

    if (token.kind === "open-brace") {
      const close = findBlockEnd(tokens, i);
      if (close >= tokens.length) skip("unterminated-block", i, i + 1);

      if (pending?.kind === "site") {
        items.push({ kind: "site", start: pending.start, addresses: pending.addresses, open: i, close, comments });
      } else if (pending?.kind === "snippet") {
        items.push({ kind: "snippet", start: pending.start, name: pending.name, open: i, close, comments });
      } else if (!sawMarker) {
        items.push({ kind: "global-options", start: i, open: i, close, comments });
      } else {
        skip("orphan-block", i, Math.min(close + 1, tokens.length));
      }

      pending = undefined;
      sawMarker = false;
      comments = [];
      i = close + 1;
      continue;
    }

    const text = token.text;
    if (token.kind === "word" && isSnippetName(text)) {
      dropPending();
      pending = { kind: "snippet", start: i, end: i + 1, name: snippetNameOf(text) };
      sawMarker = true;
    } else if (token.kind === "word" && isSiteAddress(text, table)) {
      if (pending?.kind === "site") {
        pending.addresses.push(text);
        pending.end = i + 1;
      } else {
        dropPending();
        pending = { kind: "site", start: i, end: i + 1, addresses: [text] };
      }
      sawMarker = true;
    } else {
      dropPending();
      skip("unrecognized-token", i, i + 1);
      comments = [];
    }
    i++;
  }

  dropPending();
  return { items, skipped };
}

export type Classification = "global-options" | "snippet" | "site" | "none";

/**
 * Classify a token index: the start of a global options block (its `{`), of
 * a snippet definition (its `(name)`), of a site block (its first address),
 * or none of these.
 */
export function classifyPosition(tokens: Token[], index: number, options?: ScanOptions): Classification {
  for (const item of scanTopLevel(tokens, options).items) {
    if (item.start === index) return item.kind;
  }
  return "none";
}
