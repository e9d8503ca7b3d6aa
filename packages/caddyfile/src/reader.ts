import { randomBytes } from "node:crypto";
import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { CaddyfileNotFoundError } from "./errors.js";

/** Reads and replaces the Caddyfile at a fixed path. */
export class CaddyfileReader {
  constructor(readonly path: string) {}

  async read(): Promise<string> {
    try {
      return await readFile(this.path, "utf8");
    } catch (err) {
      if (isNotFound(err)) throw new CaddyfileNotFoundError(this.path);
      throw err;
    }
  }

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.path)).isFile();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /**
   * Replace the file contents. The text is written to a sibling temporary
   * file first and renamed over the target, so readers never see a partial
   * file.
   */
  async write(text: string): Promise<void> {
    const tmp = join(dirname(this.path), `.${basename(this.path)}.${randomBytes(6).toString("hex")}.tmp`);
    await writeFile(tmp, text, { encoding: "utf8", mode: 0o644 });
    try {
      await rename(tmp, this.path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
