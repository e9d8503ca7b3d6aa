import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, test } from "node:test";
import { AdminClient } from "../src/admin-client.js";
import { DuplicateDefinitionError, ReloadRejectedError } from "../src/errors.js";
import { CaddyfileManager } from "../src/manager.js";
import { parseCaddyfile } from "../src/parser/assembler.js";
import { CaddyfileReader } from "../src/reader.js";
import { AdminApiValidator } from "../src/validation/admin-validator.js";
import { CommandValidator } from "../src/validation/command-validator.js";
import { VALID, invalid, type ValidationResult } from "../src/validation/diagnostics.js";
import type { CaddyfileValidator } from "../src/validation/validator.js";

class FakeValidator implements CaddyfileValidator {
  readonly seen: string[] = [];
  constructor(private readonly result: ValidationResult) {}

  async validate(text: string): Promise<ValidationResult> {
    this.seen.push(text);
    return this.result;
  }
}

const SITE = "example.com {\n\trespond ok\n}\n";

describe("CaddyfileManager", () => {
  let dir: string;
  let path: string;
  let loads: string[];
  let loadStatus: number;

  const admin = () =>
    new AdminClient("http://localhost:2019", {
      fetch: async (input, init) => {
        const body = init?.body;
        if (String(input).endsWith("/load") && typeof body === "string") loads.push(body);
        return loadStatus === 200
          ? new Response("", { status: 200 })
          : new Response(JSON.stringify({ error: "loading new config: boom" }), { status: loadStatus });
      },
    });

  const manager = (validator: CaddyfileValidator) =>
    new CaddyfileManager({ reader: new CaddyfileReader(path), validator, admin: admin() });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "caddyfile-manager-"));
    path = join(dir, "Caddyfile");
    loads = [];
    loadStatus = 200;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("load parses the file and reports skipped regions", async () => {
    await writeFile(path, "stray\n" + SITE);
    const report = await manager(new FakeValidator(VALID)).load();
    assert.deepStrictEqual(report.caddyfile.sites[0].addresses, ["example.com"]);
    assert.deepStrictEqual(
      report.skipped.map((s) => s.reason),
      ["unrecognized-token"],
    );
  });

  test("render writes the model", () => {
    assert.equal(manager(new FakeValidator(VALID)).render(parseCaddyfile(SITE)), SITE);
  });

  test("validate checks the rendered text", async () => {
    const validator = new FakeValidator(VALID);
    assert.deepStrictEqual(await manager(validator).validate(parseCaddyfile(SITE)), VALID);
    assert.deepStrictEqual(validator.seen, [SITE]);
  });

  test("apply saves and reloads a valid document", async () => {
    const result = await manager(new FakeValidator(VALID)).apply(parseCaddyfile(SITE));
    assert.deepStrictEqual(result, { status: "applied", text: SITE });
    assert.equal(await readFile(path, "utf8"), SITE);
    assert.deepStrictEqual(loads, [SITE]);
  });

  test("apply with skipReload only saves", async () => {
    await manager(new FakeValidator(VALID)).apply(parseCaddyfile(SITE), { skipReload: true });
    assert.equal(await readFile(path, "utf8"), SITE);
    assert.deepStrictEqual(loads, []);
  });

  test("an invalid document is neither saved nor loaded", async () => {
    await writeFile(path, "old.example.com {\n}\n");
    const errors = [{ line: 2, message: "Error: unrecognized directive: respond" }];
    const result = await manager(new FakeValidator(invalid(errors))).apply(parseCaddyfile(SITE));

    assert.deepStrictEqual(result, { status: "invalid", errors, text: SITE });
    assert.equal(await readFile(path, "utf8"), "old.example.com {\n}\n");
    assert.deepStrictEqual(loads, []);
  });

  test("duplicates are refused before validation", async () => {
    const validator = new FakeValidator(VALID);
    await assert.rejects(
      manager(validator).apply(parseCaddyfile(SITE + SITE)),
      DuplicateDefinitionError,
    );
    assert.deepStrictEqual(validator.seen, []);
  });

  test("a rejected reload throws after the file is saved", async () => {
    loadStatus = 400;
    await assert.rejects(manager(new FakeValidator(VALID)).apply(parseCaddyfile(SITE)), (err: unknown) => {
      assert.ok(err instanceof ReloadRejectedError);
      assert.equal(err.status, 400);
      assert.equal(err.detail, "loading new config: boom");
      return true;
    });
    assert.equal(await readFile(path, "utf8"), SITE);
  });
});

describe("CaddyfileManager.fromConfig", () => {
  const config = {
    caddyfilePath: "/etc/caddy/Caddyfile",
    adminUrl: "http://localhost:2019",
    caddyBinary: "caddy",
    timeoutMs: 1000,
  };

  test("admin mode validates through the admin API", () => {
    const manager = CaddyfileManager.fromConfig({ ...config, validation: "admin" });
    assert.ok(manager.validator instanceof AdminApiValidator);
    assert.equal(manager.reader.path, "/etc/caddy/Caddyfile");
    assert.equal(manager.admin.baseUrl, "http://localhost:2019");
  });

  test("command mode runs the caddy binary", () => {
    const manager = CaddyfileManager.fromConfig({ ...config, validation: "command" });
    assert.ok(manager.validator instanceof CommandValidator);
  });
});
