/**
 * Directive names the parser knows about.
 *
 * The Caddyfile has no statement terminator other than a newline, and the
 * tokenizer drops newlines; a known directive name is what ends the previous
 * statement. Plugins add their own names through `createDirectiveTable`.
 */

const DEFAULT_DIRECTIVES = [
  "abort", "basicauth", "basic_auth", "bind", "copy_response", "copy_response_headers",
  "encode", "error", "file_server", "forward_auth", "handle", "handle_errors",
  "handle_path", "header", "import", "invoke", "log", "log_append", "map",
  "method", "matcher", "metrics", "php_fastcgi", "push", "redir", "request_body",
  "request_header", "respond", "reverse_proxy", "rewrite", "root", "route",
  "skip_log", "templates", "tls", "tracing", "try_files", "uri", "vars",
];

export type DirectiveTable = ReadonlySet<string>;

/** Known directive names, extended with any plugin directives the caller uses. */
export function createDirectiveTable(extra: Iterable<string> = []): DirectiveTable {
  return new Set([...DEFAULT_DIRECTIVES, ...extra]);
}

export const defaultDirectiveTable: DirectiveTable = createDirectiveTable();

export function isDirectiveName(text: string, table: DirectiveTable = defaultDirectiveTable): boolean {
  return table.has(text) || text.startsWith("@");
}

