export * from "./parser/index.js";
export { quoteIfNeeded, writeCaddyfile, writeDirective, writeGlobalOptions, writeSite, writeSnippet } from "./writer.js";
export type { WriteOptions } from "./writer.js";
export { assertNoDuplicates, findDuplicates } from "./duplicates.js";
export type { Duplicate } from "./duplicates.js";
export type {
  Caddyfile,
  Directive,
  GlobalOptions,
  LogConfig,
  OrderHint,
  ParseReport,
  Site,
  SkipReason,
  SkippedRange,
  Snippet,
  SourcePosition,
  Token,
  TokenKind,
} from "./types.js";
export {
  AdminError,
  AdminProtocolError,
  AdminUnreachableError,
  CaddyfileNotFoundError,
  ConfigError,
  DuplicateDefinitionError,
  ReloadRejectedError,
  ValidationUnavailableError,
} from "./errors.js";
export type { DuplicateKind, UnavailableReason, UnreachableReason } from "./errors.js";
export {
  decodeValidationFailure,
  formatValidationResult,
  parseValidationErrors,
  validationState,
} from "./validation/diagnostics.js";
export type { ValidationError, ValidationResult, ValidationState } from "./validation/diagnostics.js";
export type { CaddyfileValidator, ValidateOptions } from "./validation/validator.js";
export { CommandValidator, runCommand } from "./validation/command-validator.js";
export type { CommandOutput, CommandRunner, CommandRunOptions, CommandValidatorOptions } from "./validation/command-validator.js";
export { AdminApiValidator } from "./validation/admin-validator.js";
export type { AdminApiValidatorOptions } from "./validation/admin-validator.js";
export { AdminClient } from "./admin-client.js";
export type { AdaptResult, AdaptWarning, AdminClientOptions, AdminStatus, CaInfo, RequestOptions } from "./admin-client.js";
export { CaddyfileReader } from "./reader.js";
export { DEFAULT_CONFIG, resolveConfig } from "./config.js";
export type { EngineConfig, ValidationMode } from "./config.js";
export { CaddyfileManager } from "./manager.js";
export type { ApplyOptions, ApplyResult, CaddyfileManagerOptions } from "./manager.js";
export type { Logger } from "./logger.js";
