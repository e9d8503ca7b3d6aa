import { AdminClient } from "./admin-client.js";
import type { EngineConfig } from "./config.js";
import { assertNoDuplicates } from "./duplicates.js";
import { AdminError, ReloadRejectedError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { parseCaddyfileWithReport, type ParseOptions } from "./parser/assembler.js";
import { CaddyfileReader } from "./reader.js";
import type { Caddyfile, ParseReport } from "./types.js";
import { AdminApiValidator } from "./validation/admin-validator.js";
import { CommandValidator } from "./validation/command-validator.js";
import type { ValidationError, ValidationResult } from "./validation/diagnostics.js";
import type { CaddyfileValidator } from "./validation/validator.js";
import { writeCaddyfile, type WriteOptions } from "./writer.js";

export type ApplyResult =
  | { status: "invalid"; errors: ValidationError[]; text: string }
  | { status: "applied"; text: string };

export type ApplyOptions = {
  signal?: AbortSignal;
  /** Persist the file but leave the running server alone (default false) */
  skipReload?: boolean;
};

export type CaddyfileManagerOptions = {
  reader: CaddyfileReader;
  validator: CaddyfileValidator;
  admin: AdminClient;
  parse?: ParseOptions;
  write?: WriteOptions;
  logger?: Logger;
};

/**
 * Edit cycle for a Caddyfile on disk: load it into the model, render a
 * changed model back to text, check it, then persist and hot-reload.
 */
export class CaddyfileManager {
  readonly reader: CaddyfileReader;
  readonly validator: CaddyfileValidator;
  readonly admin: AdminClient;
  private readonly parseOptions?: ParseOptions;
  private readonly writeOptions?: WriteOptions;
  private readonly logger: Logger;

  constructor(options: CaddyfileManagerOptions) {
    this.reader = options.reader;
    this.validator = options.validator;
    this.admin = options.admin;
    this.parseOptions = options.parse;
    this.writeOptions = options.write;
    this.logger = options.logger ?? silentLogger;
  }

  /** Wire up reader, admin client and validator from resolved configuration. */
  static fromConfig(
    config: EngineConfig,
    options?: { fetch?: typeof fetch; logger?: Logger; parse?: ParseOptions },
  ): CaddyfileManager {
    const logger = options?.logger;
    const admin = new AdminClient(config.adminUrl, { fetch: options?.fetch, timeoutMs: config.timeoutMs, logger });
    const validator =
      config.validation === "command"
        ? new CommandValidator({ binary: config.caddyBinary, timeoutMs: config.timeoutMs, logger })
        : new AdminApiValidator(admin, { logger });
    return new CaddyfileManager({
      reader: new CaddyfileReader(config.caddyfilePath),
      validator,
      admin,
      parse: options?.parse,
      logger,
    });
  }

  /** Read and parse the file. Throws `CaddyfileNotFoundError` when it is absent. */
  async load(): Promise<ParseReport> {
    const text = await this.reader.read();
    const report = parseCaddyfileWithReport(text, this.parseOptions);
    if (report.skipped.length > 0) {
      this.logger.warn("[caddyfile] %s: %d region(s) not understood", this.reader.path, report.skipped.length);
    }
    return report;
  }

  render(caddyfile: Caddyfile): string {
    return writeCaddyfile(caddyfile, this.writeOptions);
  }

  async validate(caddyfile: Caddyfile, options?: { signal?: AbortSignal }): Promise<ValidationResult> {
    return this.validator.validate(this.render(caddyfile), options);
  }

  /**
   * Render, validate, persist and reload. Nothing is written when the text
   * is invalid. When the server rejects the reload the new file stays on
   * disk and `ReloadRejectedError` is thrown.
   */
  async apply(caddyfile: Caddyfile, options?: ApplyOptions): Promise<ApplyResult> {
    assertNoDuplicates(caddyfile);
    const text = this.render(caddyfile);

    const result = await this.validator.validate(text, { signal: options?.signal });
    if (!result.valid) {
      this.logger.info("[caddyfile] not saving %s: %d validation error(s)", this.reader.path, result.errors.length);
      return { status: "invalid", errors: result.errors, text };
    }

    await this.reader.write(text);
    this.logger.info("[caddyfile] saved %s", this.reader.path);
    if (options?.skipReload) return { status: "applied", text };

    try {
      await this.admin.load(text, { signal: options?.signal });
    } catch (err) {
      if (err instanceof AdminError) {
        this.logger.error("[caddyfile] reload rejected (status %d): %s", err.status, err.detail);
        throw new ReloadRejectedError(err.status, err.detail, { cause: err });
      }
      throw err;
    }
    this.logger.info("[caddyfile] reloaded from %s", this.reader.path);
    return { status: "applied", text };
  }
}
