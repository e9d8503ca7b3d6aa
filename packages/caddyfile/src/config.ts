import { ConfigError } from "./errors.js";

export type ValidationMode = "admin" | "command";

export type EngineConfig = {
  caddyfilePath: string;
  adminUrl: string;
  caddyBinary: string;
  validation: ValidationMode;
  timeoutMs: number;
};

export const DEFAULT_CONFIG: EngineConfig = {
  caddyfilePath: "/etc/caddy/Caddyfile",
  adminUrl: "http://localhost:2019",
  caddyBinary: "caddy",
  validation: "admin",
  timeoutMs: 30_000,
};

type Env = Record<string, string | undefined>;

/**
 * Engine settings from environment variables. Unset or empty variables take
 * the defaults; values that are set but unusable throw `ConfigError`.
 *
 * | Variable               | Default                 |
 * | ---------------------- | ----------------------- |
 * | `CADDYFILE_PATH`       | `/etc/caddy/Caddyfile`  |
 * | `CADDY_ADMIN_URL`      | `http://localhost:2019` |
 * | `CADDY_BINARY`         | `caddy`                 |
 * | `CADDYFILE_VALIDATION` | `admin` (or `command`)  |
 * | `CADDYFILE_TIMEOUT_MS` | `30000`                 |
 */
export function resolveConfig(env: Env = process.env): EngineConfig {
  return {
    caddyfilePath: nonEmpty(env.CADDYFILE_PATH) ?? DEFAULT_CONFIG.caddyfilePath,
    adminUrl: adminUrl(nonEmpty(env.CADDY_ADMIN_URL) ?? DEFAULT_CONFIG.adminUrl),
    caddyBinary: nonEmpty(env.CADDY_BINARY) ?? DEFAULT_CONFIG.caddyBinary,
    validation: validationMode(nonEmpty(env.CADDYFILE_VALIDATION)),
    timeoutMs: timeout(nonEmpty(env.CADDYFILE_TIMEOUT_MS)),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function adminUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`CADDY_ADMIN_URL is not a valid URL: ${value}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`CADDY_ADMIN_URL must use http or https: ${value}`);
  }
  return value.replace(/\/+$/, "");
}

function validationMode(value: string | undefined): ValidationMode {
  if (value === undefined) return DEFAULT_CONFIG.validation;
  if (value === "admin" || value === "command") return value;
  throw new ConfigError(`CADDYFILE_VALIDATION must be "admin" or "command", got "${value}"`);
}

function timeout(value: string | undefined): number {
  if (value === undefined) return DEFAULT_CONFIG.timeoutMs;
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new ConfigError(`CADDYFILE_TIMEOUT_MS must be a positive integer, got "${value}"`);
  }
  return ms;
}
