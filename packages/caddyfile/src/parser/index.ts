/**
 * Caddyfile text → tokens → top-level items → directive trees → model.
 *
 * Re-exports each stage so editors and tools can stop at the one they need.
 */
export { CaddyfileLexer, allTokens, tokenize } from "./lexer.js";
export { createDirectiveTable, defaultDirectiveTable, isDirectiveName } from "./directives.js";
export type { DirectiveTable } from "./directives.js";
export { classifyPosition, isSiteAddress, isSnippetName, scanTopLevel, snippetNameOf } from "./classifier.js";
export type { Classification, ScanOptions, TopLevelItem, TopLevelScan } from "./classifier.js";
export { findBlockEnd, parseDirectives } from "./block.js";
export type { BlockContents, BlockOptions, StatementBoundary } from "./block.js";
export {
  defaultGlobalOptionTable,
  emptyGlobalOptions,
  globalBlockOptions,
  parseCaddyfile,
  parseCaddyfileWithReport,
  parseGlobalOptions,
  parseSites,
  parseSnippets,
  withDirectives,
} from "./assembler.js";
export type { ParseOptions } from "./assembler.js";
