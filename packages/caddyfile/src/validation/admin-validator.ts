import type { AdminClient } from "../admin-client.js";
import { AdminError, AdminProtocolError, AdminUnreachableError, ValidationUnavailableError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { validationCounter, withSpan } from "../telemetry.js";
import { VALID, decodeValidationFailure, invalid, type ValidationResult } from "./diagnostics.js";
import type { CaddyfileValidator, ValidateOptions } from "./validator.js";

export type AdminApiValidatorOptions = {
  logger?: Logger;
};

/**
 * Validates through a running server's `/adapt` endpoint. Nothing is
 * applied. A 4xx/5xx answer means the text was rejected; failing to reach
 * the server, or a success body that cannot be read, means no answer.
 */
export class AdminApiValidator implements CaddyfileValidator {
  private readonly logger: Logger;

  constructor(
    private readonly client: AdminClient,
    options?: AdminApiValidatorOptions,
  ) {
    this.logger = options?.logger ?? silentLogger;
  }

  validate(text: string, options?: ValidateOptions): Promise<ValidationResult> {
    const attrs = { "caddyfile.validator": "admin", "caddyfile.source": "text" };

    return withSpan("caddyfile.validate", attrs, async (): Promise<ValidationResult> => {
      try {
        const { warnings } = await this.client.adapt(text, { signal: options?.signal });
        for (const w of warnings) {
          this.logger.warn("[caddyfile] adapt warning at line %d: %s", w.line ?? 0, w.message);
        }
        validationCounter.add(1, { ...attrs, outcome: "valid" });
        return VALID;
      } catch (err) {
        if (err instanceof AdminError) {
          const errors = decodeValidationFailure(err.detail, `caddy rejected the configuration (status ${err.status})`);
          validationCounter.add(1, { ...attrs, outcome: "invalid" });
          this.logger.info("[caddyfile] validation failed with %d error(s)", errors.length);
          return invalid(errors);
        }
        if (err instanceof AdminUnreachableError) {
          const reason = err.reason === "network" ? "unreachable" : err.reason;
          validationCounter.add(1, { ...attrs, outcome: "unavailable", reason });
          throw new ValidationUnavailableError(reason, err.message, { cause: err });
        }
        if (err instanceof AdminProtocolError) {
          // The server answered, but not with anything that judges the text
          validationCounter.add(1, { ...attrs, outcome: "unavailable", reason: "unreachable" });
          throw new ValidationUnavailableError("unreachable", err.message, { cause: err });
        }
        throw err;
      }
    });
  }
}
