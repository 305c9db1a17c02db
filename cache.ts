export type CacheEntry = {
  path: string;
  contentType: string;
  content: Buffer;
};

// ----------------------------------------------------
// Bounded path -> file store, least recently used goes first.
// A Map iterates in insertion order, so the first key is the oldest.
// ----------------------------------------------------
export class Cache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`cache size must be a positive integer, got ${maxSize}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(path: string): CacheEntry | undefined {
    const entry = this.entries.get(path);
    if (!entry) return undefined;
    this.entries.delete(path);
    this.entries.set(path, entry);
    return entry;
  }

  put(path: string, contentType: string, content: Buffer): CacheEntry {
    const entry: CacheEntry = { path, contentType, content };
    this.entries.delete(path);
    this.entries.set(path, entry);
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return entry;
  }
}
