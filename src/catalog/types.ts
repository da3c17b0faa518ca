export interface FixtureEntry {
  /** Filename, unique within its catalog. */
  readonly name: string;
  /** Exact bytes written to the file. Catalog entries return a fresh copy on each read. */
  readonly payload: Uint8Array;
}

export type Catalog = readonly FixtureEntry[];

/**
 * Freeze an ordered list of fixtures. Throws on a duplicate name or on a
 * name that is not a single path segment. Payload bytes are copied in, and
 * every read of `payload` hands out a new copy, so callers cannot change
 * what later runs write.
 */
export function defineCatalog(entries: FixtureEntry[]): Catalog {
  const seen = new Set<string>();

  for (const entry of entries) {
    if (
      entry.name === "" ||
      entry.name === "." ||
      entry.name === ".." ||
      /[/\\]/.test(entry.name)
    ) {
      throw new Error(`Invalid fixture name: "${entry.name}"`);
    }
    if (seen.has(entry.name)) {
      throw new Error(`Duplicate fixture name: ${entry.name}`);
    }
    seen.add(entry.name);
  }

  return Object.freeze(entries.map(sealEntry));
}

function sealEntry(entry: FixtureEntry): FixtureEntry {
  const bytes = entry.payload.slice();
  return Object.freeze({
    name: entry.name,
    get payload(): Uint8Array {
      return bytes.slice();
    },
  });
}
