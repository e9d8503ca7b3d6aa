import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { ValidationUnavailableError } from "../src/errors.js";
import type { Logger } from "../src/logger.js";
import {
  CommandValidator,
  type CommandOutput,
  type CommandRunner,
  type CommandRunOptions,
} from "../src/validation/command-validator.js";

type Call = { command: string; args: string[]; options: CommandRunOptions };

function fakeRunner(output: CommandOutput): { run: CommandRunner; calls: Call[] } {
  const calls: Call[] = [];
  return {
    calls,
    run: async (command, args, options) => {
      calls.push({ command, args, options });
      return output;
    },
  };
}

/** Never finishes on its own; rejects with the abort reason. */
const hangingRunner: CommandRunner = (_command, _args, options) =>
  new Promise((_resolve, reject) => {
    const signal = options.signal;
    if (!signal) return;
    if (signal.aborted) reject(signal.reason);
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

function createLogCapture(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: () => {},
    info: () => {},
    warn: (...args: unknown[]) => warnings.push(args.map(String).join(" ")),
    error: () => {},
  };
}

const isUnavailable = (reason: string) => (err: unknown) => {
  assert.ok(err instanceof ValidationUnavailableError);
  assert.equal(err.reason, reason);
  return true;
};

// ── Results ─────────────────────────────────────────────────────────────────

describe("CommandValidator: results", () => {
  test("exit code 0 is valid", async () => {
    const { run, calls } = fakeRunner({ code: 0, stdout: "", stderr: "" });
    const validator = new CommandValidator({ run });
    const result = await validator.validate("example.com {\n}\n");

    assert.deepStrictEqual(result, { valid: true, errors: [] });
    assert.equal(calls.length, 1);
    assert.equal(calls[0].command, "caddy");
    assert.deepStrictEqual(calls[0].args, ["adapt", "--config", "-", "--adapter", "caddyfile", "--validate"]);
    assert.equal(calls[0].options.stdin, "example.com {\n}\n");
  });

  test("non-zero exit decodes stderr into line errors", async () => {
    const { run } = fakeRunner({
      code: 1,
      stdout: "",
      stderr: "Error: adapting config using caddyfile: Caddyfile:3 - Error: unrecognized directive: foo\n",
    });
    const result = await new CommandValidator({ run }).validate("x");
    assert.deepStrictEqual(result, {
      valid: false,
      errors: [{ line: 3, message: "Error: unrecognized directive: foo" }],
    });
  });

  test("non-zero exit without output still yields one error", async () => {
    const { run } = fakeRunner({ code: 2, stdout: "", stderr: "" });
    const result = await new CommandValidator({ run }).validate("x");
    assert.deepStrictEqual(result, { valid: false, errors: [{ line: 0, message: "caddy exited with code 2" }] });
  });

  test("validateFile runs caddy validate on the path", async () => {
    const { run, calls } = fakeRunner({ code: 0, stdout: "", stderr: "" });
    await new CommandValidator({ run, binary: "/usr/local/bin/caddy" }).validateFile("/etc/caddy/Caddyfile");
    assert.equal(calls[0].command, "/usr/local/bin/caddy");
    assert.deepStrictEqual(calls[0].args, ["validate", "--config", "/etc/caddy/Caddyfile", "--adapter", "caddyfile"]);
    assert.equal(calls[0].options.stdin, undefined);
  });
});

// ── Unavailable ─────────────────────────────────────────────────────────────

describe("CommandValidator: unavailable", () => {
  test("a runner failing with ENOENT means the binary is missing", async () => {
    const run: CommandRunner = async () => {
      throw Object.assign(new Error("spawn caddy ENOENT"), { code: "ENOENT" });
    };
    const logger = createLogCapture();
    await assert.rejects(new CommandValidator({ run, logger }).validate("x"), isUnavailable("binary-missing"));
    assert.equal(logger.warnings.length, 1);
    assert.ok(logger.warnings[0].startsWith("[caddyfile] validation unavailable (%s): %s binary-missing"));
  });

  test("a binary that does not exist is reported as missing", async () => {
    const validator = new CommandValidator({ binary: "/nonexistent/caddy-test-binary" });
    await assert.rejects(validator.validate("x"), isUnavailable("binary-missing"));
  });

  test("other runner failures are unreachable", async () => {
    const run: CommandRunner = async () => {
      throw new Error("spawn failed");
    };
    await assert.rejects(new CommandValidator({ run }).validate("x"), isUnavailable("unreachable"));
  });

  test("a run past the timeout is cut off", async () => {
    const validator = new CommandValidator({ run: hangingRunner, timeoutMs: 20 });
    await assert.rejects(validator.validate("x"), (err: unknown) => {
      assert.ok(err instanceof ValidationUnavailableError);
      assert.equal(err.reason, "timeout");
      assert.equal(err.message, "validation timed out after 20ms");
      return true;
    });
  });

  test("the caller's signal aborts the run", async () => {
    const controller = new AbortController();
    const validator = new CommandValidator({ run: hangingRunner });
    const pending = validator.validate("x", { signal: controller.signal });
    controller.abort();
    await assert.rejects(pending, isUnavailable("aborted"));
  });
});
