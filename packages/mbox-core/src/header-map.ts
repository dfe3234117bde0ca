export function normalizeHeaderName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Read-only header mapping with case-insensitive lookups.
 *
 * Names are stored lower-cased. When a name is supplied more than once the
 * last value wins, while the name keeps the position it was first seen at.
 */
export class HeaderMap implements Iterable<[string, string]> {
  private readonly fields: ReadonlyMap<string, string>;

  constructor(fields: Iterable<readonly [string, string]> = []) {
    const map = new Map<string, string>();
    for (const [name, value] of fields) {
      map.set(normalizeHeaderName(name), value);
    }
    this.fields = map;
    Object.freeze(this);
  }

  get(name: string): string | undefined {
    return this.fields.get(normalizeHeaderName(name));
  }

  has(name: string): boolean {
    return this.fields.has(normalizeHeaderName(name));
  }

  get size(): number {
    return this.fields.size;
  }

  names(): string[] {
    return [...this.fields.keys()];
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.fields);
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.fields.entries();
  }
}
