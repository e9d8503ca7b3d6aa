/**
 * Error classes callers can tell apart with `instanceof`.
 *
 * Parse problems never throw; they come back as `SkippedRange` records. An
 * invalid configuration is a `ValidationResult`, not an error either.
 */

/** The Caddyfile does not exist; callers may offer to create one. */
export class CaddyfileNotFoundError extends Error {
  override name = "CaddyfileNotFoundError";
  constructor(readonly path: string) {
    super(`Caddyfile not found: ${path}`);
  }
}

export type UnavailableReason = "binary-missing" | "unreachable" | "timeout" | "aborted";

/**
 * The validating authority could not give an answer. The configuration may
 * well be valid; nothing is known about it.
 */
export class ValidationUnavailableError extends Error {
  override name = "ValidationUnavailableError";
  constructor(
    readonly reason: UnavailableReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Non-2xx answer from the Caddy admin API. */
export class AdminError extends Error {
  override name = "AdminError";
  constructor(
    readonly status: number,
    readonly detail: string,
  ) {
    super(detail ? `caddy admin api error (status ${status}): ${detail}` : `caddy admin api error (status ${status})`);
  }
}

/**
 * A 2xx answer whose body could not be used (not JSON, wrong shape). The
 * request succeeded but says nothing about the configuration.
 */
export class AdminProtocolError extends Error {
  override name = "AdminProtocolError";
  constructor(
    readonly status: number,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`unexpected caddy admin api response (status ${status}): ${detail}`, options);
  }
}

export type UnreachableReason = "network" | "timeout" | "aborted";

/** The admin API could not be reached at all. */
export class AdminUnreachableError extends Error {
  override name = "AdminUnreachableError";
  constructor(
    readonly url: string,
    readonly reason: UnreachableReason,
    options?: { cause?: unknown },
  ) {
    super(`caddy admin api not reachable at ${url}: ${causeMessage(options?.cause)}`, options);
  }
}

/**
 * The running server refused a configuration that passed validation, e.g.
 * because it changed between the two calls.
 */
export class ReloadRejectedError extends Error {
  override name = "ReloadRejectedError";
  constructor(
    readonly status: number,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`caddy rejected the new configuration (status ${status}): ${detail}`, options);
  }
}

export type DuplicateKind = "snippet" | "address";

/** Two snippets share a name, or two sites claim the same address. */
export class DuplicateDefinitionError extends Error {
  override name = "DuplicateDefinitionError";
  constructor(readonly duplicates: { kind: DuplicateKind; name: string }[]) {
    super(
      "Duplicate definitions: " +
        duplicates.map((d) => (d.kind === "snippet" ? `snippet (${d.name})` : `address ${d.name}`)).join(", "),
    );
  }
}

/** An environment variable holds a value the configuration cannot use. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

export function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
