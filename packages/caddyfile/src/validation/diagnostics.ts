/**
 * Decoding of validator output into line-addressable errors.
 *
 * `caddy adapt`/`caddy validate` print free text (or JSON log lines) on
 * stderr, and the admin API answers `/adapt` with `{"error": "..."}`. Both
 * end up here.
 */

export type ValidationError = {
  /** 1-based line in the submitted text; 0 when the output named none */
  line: number;
  message: string;
};

export type ValidationResult =
  | { valid: true; errors: [] }
  | { valid: false; errors: ValidationError[] };

/** Lifecycle of a document's check: it starts unchecked and ends valid or invalid. */
export type ValidationState = "unchecked" | "valid" | "invalid";

export const VALID: ValidationResult = { valid: true, errors: [] };

export function invalid(errors: ValidationError[]): ValidationResult {
  return { valid: false, errors };
}

export function validationState(result: ValidationResult | undefined): ValidationState {
  if (!result) return "unchecked";
  return result.valid ? "valid" : "invalid";
}

type LinePattern = {
  regex: RegExp;
  line: number;
  message: number;
};

const PATTERNS: LinePattern[] = [
  // Caddyfile:42 - Error: message   /etc/caddy/Caddyfile:42: message
  { regex: /caddyfile:(\d+)\s*[-:]\s*(.+)/i, line: 1, message: 2 },
  // line 42: message
  { regex: /line\s+(\d+):\s*(.+)/i, line: 1, message: 2 },
  // Error: message at Caddyfile:42
  { regex: /error:\s*(.+?)\s+at\s+\S*?:(\d+)/i, line: 2, message: 1 },
];

const ERROR_WORDS = /error|invalid|unknown|unrecognized|expected/i;
const QUIET_LEVELS = new Set(["debug", "info", "warn", "warning"]);

/**
 * Pull the message out of a JSON log line or JSON error body. Returns `null`
 * for a log line below error level, and the line itself when it is not JSON.
 */
function unwrapJson(line: string): string | null {
  if (!line.startsWith("{")) return line;
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line;
  }
  if (typeof parsed !== "object" || parsed === null) return line;

  const level = "level" in parsed && typeof parsed.level === "string" ? parsed.level.toLowerCase() : undefined;
  if (level && QUIET_LEVELS.has(level)) return null;

  const msg = "msg" in parsed && typeof parsed.msg === "string" ? parsed.msg : undefined;
  const error = "error" in parsed && typeof parsed.error === "string" ? parsed.error : undefined;
  if (msg && error) return `${msg}: ${error}`;
  return error ?? msg ?? line;
}

/** One error per recognizable output line; unrelated chatter is ignored. */
export function parseValidationErrors(output: string): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const rawLine of output.split(/\r?\n/)) {
    const trimmed = rawLine.trim();
    if (!trimmed) continue;
    const text = unwrapJson(trimmed);
    if (text === null) continue;

    let matched = false;
    for (const pattern of PATTERNS) {
      const m = text.match(pattern.regex);
      if (m) {
        errors.push({ line: Number(m[pattern.line]), message: m[pattern.message].trim() });
        matched = true;
        break;
      }
    }

    if (!matched && ERROR_WORDS.test(text)) {
      errors.push({ line: 0, message: text });
    }
  }

  return errors;
}

/**
 * Errors for a check the authority reported as failed. Never empty: when no
 * line in `output` is recognizable, the trimmed output (or `fallback`, if
 * there was none) becomes a single line-0 error.
 */
export function decodeValidationFailure(output: string, fallback: string): ValidationError[] {
  const errors = parseValidationErrors(output);
  if (errors.length > 0) return errors;
  return [{ line: 0, message: output.trim() || fallback }];
}

export function formatValidationResult(result: ValidationResult): string {
  if (result.valid) return "Configuration is valid";
  const lines = ["Configuration is invalid:"];
  for (const err of result.errors) {
    lines.push(err.line > 0 ? `  Line ${err.line}: ${err.message}` : `  ${err.message}`);
  }
  return lines.join("\n") + "\n";
}
