import { spawn } from "node:child_process";
import { deadline } from "../abort.js";
import { ValidationUnavailableError, causeMessage, type UnavailableReason } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { roundMs, validationCounter, withSpan } from "../telemetry.js";
import { VALID, decodeValidationFailure, invalid, type ValidationResult } from "./diagnostics.js";
import type { CaddyfileValidator, ValidateOptions } from "./validator.js";

export type CommandOutput = {
  /** Exit code; `null` when the process was killed by a signal */
  code: number | null;
  stdout: string;
  stderr: string;
};

export type CommandRunOptions = {
  stdin?: string;
  signal?: AbortSignal;
};

/**
 * Runs a program to completion. Rejects when the program could not be started
 * or was aborted; a non-zero exit is a normal result.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandRunOptions,
) => Promise<CommandOutput>;

export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal: options.signal });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", reject);
    child.on("close", (code) => {
      resolve({
        code,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });

    // The process may exit before reading its input; its exit code tells the story.
    child.stdin.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code !== "EPIPE") reject(err);
    });
    child.stdin.end(options.stdin ?? "");
  });

export type CommandValidatorOptions = {
  /** Path or name of the caddy executable (default "caddy") */
  binary?: string;
  /** Upper bound for one run in milliseconds (default 30000) */
  timeoutMs?: number;
  /** Process runner (override for testing) */
  run?: CommandRunner;
  logger?: Logger;
};

const MISSING_BINARY_CODES = new Set(["ENOENT", "EACCES"]);

/**
 * Validates by running the caddy executable. Text goes through
 * `caddy adapt --validate` on stdin; files through `caddy validate`.
 */
export class CommandValidator implements CaddyfileValidator {
  readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(options?: CommandValidatorOptions) {
    this.binary = options?.binary ?? "caddy";
    this.timeoutMs = options?.timeoutMs ?? 30_000;
    this.run = options?.run ?? runCommand;
    this.logger = options?.logger ?? silentLogger;
  }

  validate(text: string, options?: ValidateOptions): Promise<ValidationResult> {
    return this.check(
      "text",
      ["adapt", "--config", "-", "--adapter", "caddyfile", "--validate"],
      text,
      options?.signal,
    );
  }

  /** Validate a Caddyfile already on disk; line numbers refer to that file. */
  validateFile(path: string, options?: ValidateOptions): Promise<ValidationResult> {
    return this.check("file", ["validate", "--config", path, "--adapter", "caddyfile"], undefined, options?.signal);
  }

  private check(
    source: "text" | "file",
    args: string[],
    stdin: string | undefined,
    callerSignal: AbortSignal | undefined,
  ): Promise<ValidationResult> {
    const attrs = { "caddyfile.validator": "command", "caddyfile.source": source };

    return withSpan("caddyfile.validate", attrs, async (): Promise<ValidationResult> => {
      const guard = deadline(this.timeoutMs, callerSignal);
      const start = performance.now();
      let output: CommandOutput;
      try {
        output = await this.run(this.binary, args, { stdin, signal: guard.signal });
      } catch (err) {
        const reason = this.unavailableReason(err, guard.timedOut(), callerSignal);
        validationCounter.add(1, { ...attrs, outcome: "unavailable", reason });
        this.logger.warn("[caddyfile] validation unavailable (%s): %s", reason, causeMessage(err));
        throw new ValidationUnavailableError(reason, this.describe(reason, err), { cause: err });
      } finally {
        guard.dispose();
      }

      const durationMs = roundMs(performance.now() - start);
      if (output.code === 0) {
        validationCounter.add(1, { ...attrs, outcome: "valid" });
        this.logger.debug("[caddyfile] validation passed in %dms", durationMs);
        return VALID;
      }

      const fallback = output.stderr.trim() || output.stdout.trim() || `caddy exited with code ${output.code}`;
      const errors = decodeValidationFailure(output.stderr || output.stdout, fallback);
      validationCounter.add(1, { ...attrs, outcome: "invalid" });
      this.logger.info("[caddyfile] validation failed with %d error(s) in %dms", errors.length, durationMs);
      return invalid(errors);
    });
  }

  private unavailableReason(err: unknown, timedOut: boolean, callerSignal?: AbortSignal): UnavailableReason {
    if (timedOut) return "timeout";
    if (callerSignal?.aborted) return "aborted";
    const code = errnoCode(err);
    if (code && MISSING_BINARY_CODES.has(code)) return "binary-missing";
    return "unreachable";
  }

  private describe(reason: UnavailableReason, err: unknown): string {
    switch (reason) {
      case "binary-missing":
        return `caddy executable not found or not runnable: ${this.binary}`;
      case "timeout":
        return `validation timed out after ${this.timeoutMs}ms`;
      case "aborted":
        return "validation was aborted";
      case "unreachable":
        return `could not run ${this.binary}: ${causeMessage(err)}`;
    }
  }
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
