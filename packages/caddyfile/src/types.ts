/**
 * Structured representation of a Caddyfile.
 *
 * The parser produces these records; callers edit them in place and hand them
 * back to the writer. Nothing here holds a reference into the source text.
 */

export type TokenKind = "word" | "open-brace" | "close-brace" | "quoted" | "comment";

/** A lexical unit. `line` and `column` are 1-based, `offset` is 0-based. */
export type Token = {
  kind: TokenKind;
  text: string;
  line: number;
  column: number;
  offset: number;
};

/**
 * One statement inside a block.
 *
 * `block` is present when the statement opened a nested `{ ... }`; arguments
 * only ever precede that brace.
 */
export type Directive = {
  name: string;
  args: string[];
  block?: Directive[];
  /** Statement head as it appeared in the source (name and arguments) */
  raw: string;
};

export type Snippet = {
  name: string;
  directives: Directive[];
  /** Snippet names pulled in by top-level `import` statements */
  imports: string[];
  /** Comments directly preceding the definition */
  comments?: string[];
};

export type Site = {
  addresses: string[];
  directives: Directive[];
  imports: string[];
  comments?: string[];
};

/** `order <directive> before|after <anchor>` */
export type OrderHint = {
  directive: string;
  anchor: string;
};

export type LogConfig = {
  output?: string;
  format?: string;
  level?: string;
  rollSize?: string;
  rollKeep?: string;
};

export type GlobalOptions = {
  email?: string;
  acmeCa?: string;
  admin?: string;
  debug: boolean;
  orderBefore: OrderHint[];
  orderAfter: OrderHint[];
  log?: LogConfig;
  /** Contents of the `servers { ... }` option */
  servers: Directive[];
  /** Options without a structured field, kept verbatim */
  extra: Directive[];
  comments?: string[];
};

export type Caddyfile = {
  globalOptions?: GlobalOptions;
  snippets: Snippet[];
  sites: Site[];
};

export type SkipReason =
  | "unrecognized-token"
  | "incomplete-site"
  | "incomplete-snippet"
  | "orphan-block"
  | "duplicate-global-options"
  | "unbalanced-brace"
  | "unterminated-block";

export type SourcePosition = {
  line: number;
  column: number;
  offset: number;
};

/**
 * A span of tokens the lenient parser dropped (or, for `unterminated-block`,
 * accepted with a missing closing brace).
 */
export type SkippedRange = {
  reason: SkipReason;
  start: SourcePosition;
  /** Position just past the last token of the range */
  end: SourcePosition;
  text: string;
};

export type ParseReport = {
  caddyfile: Caddyfile;
  skipped: SkippedRange[];
};
