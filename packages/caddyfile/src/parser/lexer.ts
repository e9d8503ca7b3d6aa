/**
 * Chevrotain lexer for the Caddyfile format.
 *
 * Whitespace is skipped. Comments stay in the token stream so that callers
 * can attach them to blocks; every consumer below the lexer steps over them.
 */
import { createToken, Lexer, type IToken } from "chevrotain";
import type { Token, TokenKind } from "../types.js";

// ── Whitespace ─────────────────────────────────────────────────────────────

export const Newline = createToken({
  name: "Newline",
  pattern: /\r\n|\r|\n/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

export const WS = createToken({
  name: "WS",
  pattern: /[^\S\r\n]+/,
  group: Lexer.SKIPPED,
  line_breaks: false,
});

// ── Comments ───────────────────────────────────────────────────────────────

export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\r\n]*/,
  line_breaks: false,
});

// ── Braces ─────────────────────────────────────────────────────────────────

export const LCurly = createToken({ name: "LCurly", pattern: /\{/, line_breaks: false });
export const RCurly = createToken({ name: "RCurly", pattern: /\}/, line_breaks: false });

// ── Quoted spans (may cross lines; an unterminated quote runs to EOF) ─────

export const DoubleQuoted = createToken({
  name: "DoubleQuoted",
  pattern: /"(?:[^"\\]|\\[\s\S])*"?/,
  line_breaks: true,
});

export const SingleQuoted = createToken({
  name: "SingleQuoted",
  pattern: /'[^']*'?/,
  line_breaks: true,
});

// ── Words ──────────────────────────────────────────────────────────────────
// Anything else up to whitespace or a brace. A quote or `#` only has its
// special meaning at the start of a token.

export const Word = createToken({
  name: "Word",
  pattern: /[^\s{}"'#][^\s{}]*/,
  line_breaks: false,
});

export const allTokens = [
  Newline,
  WS,
  Comment,
  LCurly,
  RCurly,
  DoubleQuoted,
  SingleQuoted,
  Word,
];

// Complement character classes rule out Chevrotain's first-char optimization,
// so the lexer runs in its general mode.
export const CaddyfileLexer = new Lexer(allTokens, {
  positionTracking: "full",
});

const KIND_BY_TOKEN: Record<string, TokenKind> = {
  [Comment.name]: "comment",
  [LCurly.name]: "open-brace",
  [RCurly.name]: "close-brace",
  [DoubleQuoted.name]: "quoted",
  [SingleQuoted.name]: "quoted",
  [Word.name]: "word",
};

function toToken(t: IToken): Token {
  return {
    kind: KIND_BY_TOKEN[t.tokenType.name] ?? "word",
    text: t.image,
    line: t.startLine ?? 1,
    column: t.startColumn ?? 1,
    offset: t.startOffset,
  };
}

/**
 * Split Caddyfile text into tokens.
 *
 * Never throws: every character is covered by one of the token patterns, so
 * malformed input (an unterminated quote, say) simply yields odd tokens.
 */
export function tokenize(text: string): Token[] {
  const { tokens } = CaddyfileLexer.tokenize(text);
  return tokens.map(toToken).filter((t) => t.text !== "");
}
