/**
 * Caddyfile text → structured model.
 *
 * Global options, snippets and sites are each recovered by their own full
 * scan of the top level; every scan steps over the blocks it is not looking
 * for by brace extent without reading their interior.
 */
import type {
  Caddyfile,
  Directive,
  GlobalOptions,
  LogConfig,
  ParseReport,
  Site,
  Snippet,
  Token,
} from "../types.js";
import { parseDirectives, spanOf, type BlockOptions, type StatementBoundary } from "./block.js";
import { scanTopLevel, type TopLevelItem } from "./classifier.js";
import { createDirectiveTable, type DirectiveTable } from "./directives.js";
import { tokenize } from "./lexer.js";

// Names that end a statement inside the global options block. Site directive
// names are no use there: `order rate_limit before basicauth` must keep
// `basicauth` as an argument.
const GLOBAL_OPTION_NAMES = [
  "debug", "email", "acme_ca", "acme_ca_root", "acme_eab", "acme_dns", "admin",
  "auto_https", "cert_issuer", "default_bind", "default_sni", "events",
  "fallback_sni", "grace_period", "http_port", "https_port", "key_type",
  "local_certs", "log", "metrics", "ocsp_interval", "ocsp_stapling",
  "on_demand_tls", "order", "persist_config", "pki", "preferred_chains",
  "renew_interval", "servers", "shutdown_delay", "skip_install_trust",
  "storage", "storage_clean_interval",
  // log { ... }
  "output", "format", "level", "include", "exclude", "roll_size", "roll_keep",
  "roll_keep_for", "roll_local_time", "roll_disabled", "sampling",
  // servers { ... }
  "listener_wrappers", "timeouts", "trusted_proxies", "client_ip_headers",
  "max_header_size", "keepalive_interval", "protocols", "strict_sni_host",
  "log_credentials",
];

export const defaultGlobalOptionTable: DirectiveTable = new Set(GLOBAL_OPTION_NAMES);

export type ParseOptions = {
  /** Known site directive names (default: `defaultDirectiveTable`) */
  directives?: DirectiveTable;
  /** Known global option names (default: `defaultGlobalOptionTable`) */
  globalOptions?: DirectiveTable;
  statementBoundary?: StatementBoundary;
};

/** Shorthand for a site directive table that adds plugin directive names */
export function withDirectives(names: Iterable<string>): ParseOptions {
  return { directives: createDirectiveTable(names) };
}

type Source = string | Token[];

function tokensOf(source: Source): Token[] {
  return typeof source === "string" ? tokenize(source) : source;
}

function bodyOf(tokens: Token[], item: TopLevelItem): Token[] {
  return tokens.slice(item.open + 1, item.close);
}

function attachComments<T extends { comments?: string[] }>(target: T, comments: string[]): T {
  if (comments.length > 0) target.comments = comments;
  return target;
}

// ── Sites ──────────────────────────────────────────────────────────────────

export function parseSites(source: Source, options?: ParseOptions): Site[] {
  const tokens = tokensOf(source);
  const sites: Site[] = [];
  for (const item of scanTopLevel(tokens, options).items) {
    if (item.kind !== "site") continue;
    const { directives, imports } = parseDirectives(bodyOf(tokens, item), options);
    sites.push(attachComments<Site>({ addresses: [...item.addresses], directives, imports }, item.comments));
  }
  return sites;
}

// ── Snippets ───────────────────────────────────────────────────────────────

export function parseSnippets(source: Source, options?: ParseOptions): Snippet[] {
  const tokens = tokensOf(source);
  const snippets: Snippet[] = [];
  for (const item of scanTopLevel(tokens, options).items) {
    if (item.kind !== "snippet") continue;
    const { directives, imports } = parseDirectives(bodyOf(tokens, item), options);
    snippets.push(attachComments<Snippet>({ name: item.name, directives, imports }, item.comments));
  }
  return snippets;
}

// ── Global options ─────────────────────────────────────────────────────────

/** The first global options block, or `undefined` when the document has none. */
export function parseGlobalOptions(source: Source, options?: ParseOptions): GlobalOptions | undefined {
  const tokens = tokensOf(source);
  const item = scanTopLevel(tokens, options).items.find((i) => i.kind === "global-options");
  if (!item) return undefined;

  const { directives } = parseDirectives(bodyOf(tokens, item), globalBlockOptions(options));
  return attachComments(buildGlobalOptions(directives), item.comments);
}

/**
 * Options for reading the global block. Flag options such as `debug` take no
 * arguments, so a line break ends a statement there unless the caller picked
 * a boundary explicitly.
 */
export function globalBlockOptions(options?: ParseOptions): BlockOptions {
  return {
    directives: options?.globalOptions ?? defaultGlobalOptionTable,
    statementBoundary: options?.statementBoundary ?? "newline",
  };
}

export function emptyGlobalOptions(): GlobalOptions {
  return { debug: false, orderBefore: [], orderAfter: [], servers: [], extra: [] };
}

function buildGlobalOptions(directives: Directive[]): GlobalOptions {
  const opts = emptyGlobalOptions();
  let sawServers = false;

  for (const d of directives) {
    const value = d.args.join(" ");
    const plain = d.block === undefined;

    switch (d.name) {
      case "email":
        if (plain && d.args.length > 0 && opts.email === undefined) {
          opts.email = value;
          continue;
        }
        break;
      case "acme_ca":
        if (plain && d.args.length > 0 && opts.acmeCa === undefined) {
          opts.acmeCa = value;
          continue;
        }
        break;
      case "admin":
        if (plain && d.args.length > 0 && opts.admin === undefined) {
          opts.admin = value;
          continue;
        }
        break;
      case "debug":
        if (plain && d.args.length === 0) {
          opts.debug = true;
          continue;
        }
        break;
      case "order":
        if (plain && d.args.length === 3 && (d.args[1] === "before" || d.args[1] === "after")) {
          const hint = { directive: d.args[0], anchor: d.args[2] };
          (d.args[1] === "before" ? opts.orderBefore : opts.orderAfter).push(hint);
          continue;
        }
        break;
      case "log": {
        const log =
          opts.log === undefined && d.args.length === 0 && d.block !== undefined ? buildLogConfig(d.block) : undefined;
        if (log) {
          opts.log = log;
          continue;
        }
        break;
      }
      case "servers":
        if (!sawServers && d.args.length === 0) {
          opts.servers = d.block ?? [];
          sawServers = true;
          continue;
        }
        break;
    }
    opts.extra.push(d);
  }

  return opts;
}

/**
 * Map a global `log { ... }` body onto LogConfig. Returns `undefined` when the
 * body holds anything LogConfig cannot represent, so the caller keeps the
 * whole block verbatim instead.
 */
function buildLogConfig(body: Directive[]): LogConfig | undefined {
  const log: LogConfig = {};
  for (const d of body) {
    if (d.args.length === 0) return undefined;
    const value = d.args.join(" ");
    if (d.name === "output" && log.output === undefined) {
      log.output = value;
      for (const roll of d.block ?? []) {
        if (roll.block !== undefined || roll.args.length === 0) return undefined;
        if (roll.name === "roll_size" && log.rollSize === undefined) log.rollSize = roll.args.join(" ");
        else if (roll.name === "roll_keep" && log.rollKeep === undefined) log.rollKeep = roll.args.join(" ");
        else return undefined;
      }
    } else if (d.name === "format" && d.block === undefined && log.format === undefined) {
      log.format = value;
    } else if (d.name === "level" && d.block === undefined && log.level === undefined) {
      log.level = value;
    } else {
      return undefined;
    }
  }
  return log;
}

// ── Whole document ─────────────────────────────────────────────────────────

export function parseCaddyfile(text: string, options?: ParseOptions): Caddyfile {
  return parseCaddyfileWithReport(text, options).caddyfile;
}

/**
 * Parse a whole Caddyfile and report what the lenient recovery dropped.
 *
 * `skipped` is empty for well-formed input; tests and callers can assert on
 * it instead of diffing documents to notice lost content.
 */
export function parseCaddyfileWithReport(text: string, options?: ParseOptions): ParseReport {
  const tokens = tokenize(text);
  const globalOptions = parseGlobalOptions(tokens, options);
  const caddyfile: Caddyfile = {
    snippets: parseSnippets(tokens, options),
    sites: parseSites(tokens, options),
  };
  if (globalOptions) caddyfile.globalOptions = globalOptions;

  const { items, skipped } = scanTopLevel(tokens, options);
  const globals = items.filter((i) => i.kind === "global-options");
  for (const extra of globals.slice(1)) {
    skipped.push({
      reason: "duplicate-global-options",
      ...spanOf(tokens, extra.open, Math.min(extra.close + 1, tokens.length)),
    });
  }
  skipped.sort((a, b) => a.start.offset - b.start.offset);

  return { caddyfile, skipped };
}
