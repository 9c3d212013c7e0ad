const DEFAULT_TTL_SEC = 300; // 5 minutes

interface Entry<T> {
  value: T;
  storedAt: number;
}

/**
 * In-process cache whose entries expire `ttlSec` after they were stored.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlSec = DEFAULT_TTL_SEC, now: () => number = Date.now) {
    this.ttlMs = ttlSec * 1000;
    this.now = now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
