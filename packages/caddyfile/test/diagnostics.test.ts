import assert from "node:assert/strict";
import { describe, test } from "node:test";
import {
  VALID,
  decodeValidationFailure,
  formatValidationResult,
  invalid,
  parseValidationErrors,
  validationState,
} from "../src/validation/diagnostics.js";

// ── parseValidationErrors ───────────────────────────────────────────────────

describe("parseValidationErrors", () => {
  test("Caddyfile:NN - message", () => {
    assert.deepStrictEqual(parseValidationErrors("Caddyfile:10 - Error: unrecognized directive"), [
      { line: 10, message: "Error: unrecognized directive" },
    ]);
  });

  test("path:NN: message", () => {
    assert.deepStrictEqual(parseValidationErrors("/etc/caddy/Caddyfile:4: wrong argument count"), [
      { line: 4, message: "wrong argument count" },
    ]);
  });

  test("line NN: message", () => {
    assert.deepStrictEqual(parseValidationErrors("line 3: unexpected token"), [
      { line: 3, message: "unexpected token" },
    ]);
  });

  test("error: message at file:NN", () => {
    assert.deepStrictEqual(parseValidationErrors("Error: bad thing at /etc/caddy/Caddyfile:7"), [
      { line: 7, message: "bad thing" },
    ]);
  });

  test("the first file reference with a line number wins", () => {
    assert.deepStrictEqual(
      parseValidationErrors("Error: adapting config using caddyfile: Caddyfile:3 - Error: unrecognized directive: foo"),
      [{ line: 3, message: "Error: unrecognized directive: foo" }],
    );
  });

  test("JSON log lines are unwrapped, quiet levels dropped", () => {
    const output = [
      '{"level":"info","msg":"using adjacent Caddyfile"}',
      '{"level":"error","msg":"adapting config","error":"Caddyfile:4 - unknown directive: foo"}',
    ].join("\n");
    assert.deepStrictEqual(parseValidationErrors(output), [{ line: 4, message: "unknown directive: foo" }]);
  });

  test("JSON error bodies are unwrapped", () => {
    assert.deepStrictEqual(parseValidationErrors('{"error":"line 2: unexpected token"}'), [
      { line: 2, message: "unexpected token" },
    ]);
  });

  test("error words without a line number yield line 0", () => {
    assert.deepStrictEqual(parseValidationErrors("some invalid thing\nall good\n\n"), [
      { line: 0, message: "some invalid thing" },
    ]);
  });

  test("unrelated output yields nothing", () => {
    assert.deepStrictEqual(parseValidationErrors("Valid configuration\n"), []);
  });
});

// ── decodeValidationFailure ─────────────────────────────────────────────────

describe("decodeValidationFailure", () => {
  test("never empty: unrecognizable output becomes one generic error", () => {
    assert.deepStrictEqual(decodeValidationFailure("  boom \n", "fallback"), [{ line: 0, message: "boom" }]);
  });

  test("no output at all uses the fallback", () => {
    assert.deepStrictEqual(decodeValidationFailure("", "caddy exited with code 1"), [
      { line: 0, message: "caddy exited with code 1" },
    ]);
  });

  test("recognizable output is parsed", () => {
    assert.deepStrictEqual(decodeValidationFailure("Caddyfile:2 - Error: bad", "fallback"), [
      { line: 2, message: "Error: bad" },
    ]);
  });
});

// ── Results ─────────────────────────────────────────────────────────────────

describe("formatValidationResult", () => {
  test("valid", () => {
    assert.equal(formatValidationResult(VALID), "Configuration is valid");
  });

  test("invalid lists each error", () => {
    const result = invalid([
      { line: 10, message: "unrecognized directive" },
      { line: 0, message: "something else" },
    ]);
    assert.equal(
      formatValidationResult(result),
      "Configuration is invalid:\n  Line 10: unrecognized directive\n  something else\n",
    );
  });
});

describe("validationState", () => {
  test("unchecked until a result exists", () => {
    assert.equal(validationState(undefined), "unchecked");
    assert.equal(validationState(VALID), "valid");
    assert.equal(validationState(invalid([{ line: 1, message: "x" }])), "invalid");
  });
});
