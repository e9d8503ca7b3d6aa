import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { parseCaddyfile, parseCaddyfileWithReport } from "../src/parser/assembler.js";
import { writeCaddyfile } from "../src/writer.js";

// ═══════════════════════════════════════════════════════════════════════════
// Round trip
//
// Parsing canonical text and writing it back reproduces the text; parsing
// the output again reproduces the model.
// ═══════════════════════════════════════════════════════════════════════════

const CANONICAL = `{
	email ops@example.com
	order rate_limit before basicauth
}

(security) {
	header {
		Strict-Transport-Security "max-age=31536000"
	}
}

example.com www.example.com {
	import security
	@api path /api/*
	handle @api {
		reverse_proxy localhost:9000
	}
	respond "Hello World" 200
}

:8080 {
	file_server browse
}
`;

describe("round trip", () => {
  test("canonical text is reproduced byte for byte", () => {
    assert.equal(writeCaddyfile(parseCaddyfile(CANONICAL)), CANONICAL);
  });

  test("parse(write(parse(text))) equals parse(text)", () => {
    const first = parseCaddyfile(CANONICAL);
    const second = parseCaddyfile(writeCaddyfile(first));
    assert.deepStrictEqual(second, first);
  });

  test("formatting differences do not survive", () => {
    const messy = "example.com   www.example.com{\n  respond   ok\n\n\n   encode gzip }\n";
    const first = parseCaddyfile(messy);
    const written = writeCaddyfile(first);
    assert.equal(written, "example.com www.example.com {\n\trespond ok\n\tencode gzip\n}\n");
    assert.deepStrictEqual(parseCaddyfile(written), first);
  });

  test("edits to the model show up in the output", () => {
    const doc = parseCaddyfile(CANONICAL);
    const site = doc.sites[1];
    site.directives.push({ name: "encode", args: ["zstd", "gzip"], raw: "encode zstd gzip" });
    site.addresses = [":9090"];

    const { caddyfile, skipped } = parseCaddyfileWithReport(writeCaddyfile(doc));
    assert.deepStrictEqual(skipped, []);
    assert.deepStrictEqual(caddyfile.sites[1].addresses, [":9090"]);
    assert.deepStrictEqual(
      caddyfile.sites[1].directives.map((d) => d.raw),
      ["file_server browse", "encode zstd gzip"],
    );
  });
});
