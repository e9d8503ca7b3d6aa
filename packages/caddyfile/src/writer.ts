import { tokenize } from "./parser/lexer.js";
import type { Caddyfile, Directive, GlobalOptions, LogConfig, Site, Snippet } from "./types.js";

// ── Serializer ──────────────────────────────────────────────────────────────

export type WriteOptions = {
  /** One level of indentation (default: a tab) */
  indent?: string;
};

const DEFAULT_INDENT = "\t";

// An already-quoted argument must close before the next token; `"a\"` would
// run to the end of the file and take every following brace with it.
function closesAsOneToken(text: string): boolean {
  const tokens = tokenize(`${text} }`);
  return tokens.length === 2 && tokens[0].text === text && tokens[0].kind === "quoted";
}

/**
 * Wrap an argument in double quotes when it would not survive tokenizing as a
 * single token. Arguments already wrapped in matching quotes pass through.
 * The empty string is written as `""`.
 */
export function quoteIfNeeded(arg: string): string {
  if (arg === "") return '""';
  if (arg.length >= 2) {
    const first = arg[0];
    const last = arg[arg.length - 1];
    if ((first === '"' || first === "'") && first === last && closesAsOneToken(arg)) return arg;
  }
  if (!/[ \t\r\n{}"]/.test(arg) && !arg.startsWith("'") && !arg.startsWith("#")) return arg;

  // Backslashes only need doubling where they would otherwise escape a quote
  const escaped = arg
    .replace(/(\\*)"/g, (_, slashes: string) => `${slashes}${slashes}\\"`)
    .replace(/(\\+)$/, "$1$1");
  return `"${escaped}"`;
}

/**
 * Global option values may span several words (`output file /var/log/x`).
 * Plain words are written as they are; one that would not read back as a
 * single token gets the whole value quoted.
 */
function writeValue(value: string): string {
  const words = value.split(/[ \t]+/);
  return words.every((w) => w !== "" && quoteIfNeeded(w) === w) ? value : quoteIfNeeded(value);
}

export function writeDirective(directive: Directive, depth: number, options?: WriteOptions): string {
  const unit = options?.indent ?? DEFAULT_INDENT;
  const indent = unit.repeat(depth);
  let line = indent + quoteIfNeeded(directive.name);
  for (const arg of directive.args) {
    line += " " + quoteIfNeeded(arg);
  }
  if (directive.block !== undefined) {
    line += " {\n";
    for (const child of directive.block) {
      line += writeDirective(child, depth + 1, options);
    }
    line += indent + "}";
  }
  return line + "\n";
}

function writeBlock(header: string, directives: Directive[], options?: WriteOptions): string {
  let out = header + " {\n";
  for (const d of directives) {
    out += writeDirective(d, 1, options);
  }
  return out + "}\n";
}

export function writeSite(site: Site, options?: WriteOptions): string {
  return writeBlock(site.addresses.map(quoteIfNeeded).join(" "), site.directives, options);
}

export function writeSnippet(snippet: Snippet, options?: WriteOptions): string {
  return writeBlock(quoteIfNeeded(`(${snippet.name})`), snippet.directives, options);
}

function present(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/** Global options block; structured fields first, in a fixed order, then `extra`. */
export function writeGlobalOptions(opts: GlobalOptions, options?: WriteOptions): string {
  const unit = options?.indent ?? DEFAULT_INDENT;
  const lines: string[] = ["{"];

  if (present(opts.email)) lines.push(`${unit}email ${writeValue(opts.email)}`);
  if (present(opts.acmeCa)) lines.push(`${unit}acme_ca ${writeValue(opts.acmeCa)}`);
  if (present(opts.admin)) lines.push(`${unit}admin ${writeValue(opts.admin)}`);
  if (opts.debug) lines.push(`${unit}debug`);
  for (const hint of opts.orderBefore) {
    lines.push(`${unit}order ${quoteIfNeeded(hint.directive)} before ${quoteIfNeeded(hint.anchor)}`);
  }
  for (const hint of opts.orderAfter) {
    lines.push(`${unit}order ${quoteIfNeeded(hint.directive)} after ${quoteIfNeeded(hint.anchor)}`);
  }
  if (opts.log) lines.push(...logLines(opts.log, unit));
  if (opts.servers.length > 0) {
    lines.push(`${unit}servers {`);
    for (const d of opts.servers) lines.push(writeDirective(d, 2, options).slice(0, -1));
    lines.push(`${unit}}`);
  }
  for (const d of opts.extra) lines.push(writeDirective(d, 1, options).slice(0, -1));

  lines.push("}");
  return lines.join("\n") + "\n";
}

function logLines(log: LogConfig, unit: string): string[] {
  const i1 = unit;
  const i2 = unit.repeat(2);
  const i3 = unit.repeat(3);
  const lines = [`${i1}log {`];

  if (present(log.output)) {
    if (present(log.rollSize) || present(log.rollKeep)) {
      lines.push(`${i2}output ${writeValue(log.output)} {`);
      if (present(log.rollSize)) lines.push(`${i3}roll_size ${writeValue(log.rollSize)}`);
      if (present(log.rollKeep)) lines.push(`${i3}roll_keep ${writeValue(log.rollKeep)}`);
      lines.push(`${i2}}`);
    } else {
      lines.push(`${i2}output ${writeValue(log.output)}`);
    }
  }
  if (present(log.format)) lines.push(`${i2}format ${writeValue(log.format)}`);
  if (present(log.level)) lines.push(`${i2}level ${writeValue(log.level)}`);

  lines.push(`${i1}}`);
  return lines;
}

/**
 * Serialize a whole Caddyfile: global options, then snippets, then sites,
 * with one blank line between blocks. An empty document writes as `""`.
 */
export function writeCaddyfile(caddyfile: Caddyfile, options?: WriteOptions): string {
  const blocks: string[] = [];
  if (caddyfile.globalOptions) blocks.push(writeGlobalOptions(caddyfile.globalOptions, options));
  for (const snippet of caddyfile.snippets) blocks.push(writeSnippet(snippet, options));
  for (const site of caddyfile.sites) blocks.push(writeSite(site, options));
  return blocks.join("\n");
}
