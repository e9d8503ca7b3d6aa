import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { tokenize } from "../src/parser/lexer.js";

const texts = (input: string) => tokenize(input).map((t) => t.text);

// ── Positions ───────────────────────────────────────────────────────────────

describe("tokenize: positions", () => {
  test("tracks line, column and offset of each token", () => {
    const tokens = tokenize("example.com {\n\treverse_proxy localhost:8080\n}\n");
    assert.deepStrictEqual(tokens, [
      { kind: "word", text: "example.com", line: 1, column: 1, offset: 0 },
      { kind: "open-brace", text: "{", line: 1, column: 13, offset: 12 },
      { kind: "word", text: "reverse_proxy", line: 2, column: 2, offset: 15 },
      { kind: "word", text: "localhost:8080", line: 2, column: 16, offset: 29 },
      { kind: "close-brace", text: "}", line: 3, column: 1, offset: 44 },
    ]);
  });

  test("CRLF line endings advance the line", () => {
    const [, b] = tokenize("a\r\nb");
    assert.equal(b.line, 2);
    assert.equal(b.column, 1);
  });

  test("a quoted span crossing a newline moves later tokens to the next line", () => {
    const tokens = tokenize('"a\nb" c');
    assert.equal(tokens[1].text, "c");
    assert.equal(tokens[1].line, 2);
    assert.equal(tokens[1].column, 4);
  });

  test("empty input yields no tokens", () => {
    assert.deepStrictEqual(tokenize(""), []);
    assert.deepStrictEqual(tokenize("  \n\t\n"), []);
  });
});

// ── Quotes ──────────────────────────────────────────────────────────────────

describe("tokenize: quotes", () => {
  test("double-quoted span is one token with its quotes", () => {
    const tokens = tokenize('respond "Hello World" 200');
    assert.deepStrictEqual(
      tokens.map((t) => [t.kind, t.text]),
      [
        ["word", "respond"],
        ["quoted", '"Hello World"'],
        ["word", "200"],
      ],
    );
  });

  test("single-quoted span keeps braces and spaces", () => {
    assert.deepStrictEqual(texts("respond 'a { b }'"), ["respond", "'a { b }'"]);
  });

  test("escaped double quote does not end the span", () => {
    assert.deepStrictEqual(texts('header X "a \\"b\\" c"'), ["header", "X", '"a \\"b\\" c"']);
  });

  test("unterminated quote runs to the end of input", () => {
    const tokens = tokenize('respond "oops\nmore');
    assert.equal(tokens.length, 2);
    assert.equal(tokens[1].kind, "quoted");
    assert.equal(tokens[1].text, '"oops\nmore');
  });
});

// ── Braces and comments ─────────────────────────────────────────────────────

describe("tokenize: braces and comments", () => {
  test("braces split words without whitespace", () => {
    assert.deepStrictEqual(texts("a{b}"), ["a", "{", "b", "}"]);
  });

  test("comment runs to end of line", () => {
    const tokens = tokenize("# site\nexample.com");
    assert.equal(tokens[0].kind, "comment");
    assert.equal(tokens[0].text, "# site");
    assert.equal(tokens[1].text, "example.com");
  });

  test("# inside a word is not a comment", () => {
    const tokens = tokenize("foo#bar # note");
    assert.deepStrictEqual(
      tokens.map((t) => [t.kind, t.text]),
      [
        ["word", "foo#bar"],
        ["comment", "# note"],
      ],
    );
  });

  test("# inside quotes is not a comment", () => {
    assert.deepStrictEqual(texts('respond "#1"'), ["respond", '"#1"']);
  });
});
