import { DuplicateDefinitionError, type DuplicateKind } from "./errors.js";
import type { Caddyfile } from "./types.js";

export type Duplicate = { kind: DuplicateKind; name: string };

/**
 * Snippet names and site addresses defined more than once, each reported
 * once, in order of their second appearance.
 *
 * The parser accepts duplicates; uniqueness is checked here, when a document
 * is about to be written back.
 */
export function findDuplicates(caddyfile: Caddyfile): Duplicate[] {
  const duplicates: Duplicate[] = [];

  const collect = (kind: DuplicateKind, names: string[]) => {
    const seen = new Set<string>();
    const reported = new Set<string>();
    for (const name of names) {
      if (!seen.has(name)) {
        seen.add(name);
      } else if (!reported.has(name)) {
        reported.add(name);
        duplicates.push({ kind, name });
      }
    }
  };

  collect("snippet", caddyfile.snippets.map((s) => s.name));
  collect("address", caddyfile.sites.flatMap((s) => s.addresses));
  return duplicates;
}

export function assertNoDuplicates(caddyfile: Caddyfile): void {
  const duplicates = findDuplicates(caddyfile);
  if (duplicates.length > 0) throw new DuplicateDefinitionError(duplicates);
}
