/**
 * Caddyfile Language Server: LSP features for Caddyfile documents.
 *
 * Runs as a standalone Node.js process spawned by an editor client and
 * speaks the Language Server Protocol over stdio or IPC.
 *
 * Features:
 *   • Real-time diagnostics  (skipped regions, duplicate definitions)
 *   • Hover information      (summary of the enclosing site or snippet)
 */
import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  type InitializeResult,
  TextDocumentSyncKind,
  type Hover,
} from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { withDirectives, type ParseOptions } from "caddyfile-engine";
import { hoverAt, toDiagnostics } from "./diagnostics.js";

// ── Connection & document manager ──────────────────────────────────────────

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

let parseOptions: ParseOptions | undefined;

connection.onInitialize((params): InitializeResult => {
  // Plugin directive names, e.g. { "directives": ["rate_limit"] }
  const init: unknown = params.initializationOptions;
  if (typeof init === "object" && init !== null && "directives" in init && Array.isArray(init.directives)) {
    const names = init.directives.filter((n): n is string => typeof n === "string");
    parseOptions = withDirectives(names);
    connection.console.log(`[caddyfile] ${names.length} plugin directive(s) registered`);
  }
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      hoverProvider: true,
    },
  };
});

// ── Diagnostics ────────────────────────────────────────────────────────────

function validate(doc: TextDocument): void {
  const text = doc.getText();

  // Empty / whitespace-only file: clear any previous diagnostics
  if (!text.trim()) {
    connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
    return;
  }

  connection.sendDiagnostics({ uri: doc.uri, diagnostics: toDiagnostics(text, parseOptions) });
}

documents.onDidChangeContent((change) => validate(change.document));
documents.onDidOpen((e) => validate(e.document));
documents.onDidClose((e) => connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] }));

// ── Hover ──────────────────────────────────────────────────────────────────

connection.onHover((params): Hover | null => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;
  return hoverAt(doc.getText(), params.position.line, params.position.character, parseOptions);
});

// ── Start ──────────────────────────────────────────────────────────────────

documents.listen(connection);
connection.listen();
