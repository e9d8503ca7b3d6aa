import type { ValidationResult } from "./diagnostics.js";

export type ValidateOptions = {
  signal?: AbortSignal;
};

/**
 * Something that can tell whether Caddyfile text is a configuration the
 * server would accept. Resolves with a result either way; rejects with
 * `ValidationUnavailableError` only when no answer could be obtained.
 */
export interface CaddyfileValidator {
  validate(text: string, options?: ValidateOptions): Promise<ValidationResult>;
}
