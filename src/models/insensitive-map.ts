const IGNORED_KEY_CHARACTERS = /[ _-]/g;

/**
 * Ordered map whose keys ignore case, spaces, underscores and hyphens, so
 * `Phone Number`, `phone_number` and `PHONENUMBER` are the same column.
 * Keys are normalised on write and on read.
 */
export class InsensitiveMap<V> implements Iterable<[string, V]> {
  private readonly entriesByKey = new Map<string, V>();

  constructor(entries: Iterable<readonly [string, V]> = []) {
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  static makeKey(key: string): string {
    return key.replace(IGNORED_KEY_CHARACTERS, '').toLowerCase();
  }

  static fromKeys(keys: Iterable<string>): InsensitiveMap<null> {
    const map = new InsensitiveMap<null>();
    for (const key of keys) {
      map.set(key, null);
    }
    return map;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: string): V | undefined {
    return this.entriesByKey.get(InsensitiveMap.makeKey(key));
  }

  has(key: string): boolean {
    return this.entriesByKey.has(InsensitiveMap.makeKey(key));
  }

  set(key: string, value: V): this {
    this.entriesByKey.set(InsensitiveMap.makeKey(key), value);
    return this;
  }

  keys(): IterableIterator<string> {
    return this.entriesByKey.keys();
  }

  values(): IterableIterator<V> {
    return this.entriesByKey.values();
  }

  entries(): IterableIterator<[string, V]> {
    return this.entriesByKey.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, V]> {
    return this.entries();
  }

  toRecord(): Record<string, V> {
    return Object.fromEntries(this.entriesByKey);
  }
}
