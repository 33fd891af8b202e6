/**
 * Run-scoped memo of secret lookups.
 *
 * Both successes and failures are remembered so that each reference
 * reaches the engine at most once per run. Nothing here is persisted.
 */

export type CachedLookup = { ok: true; value: string } | { ok: false; reason: string };

export class SecretCache {
  private entries = new Map<string, CachedLookup>();

  get(key: string): CachedLookup | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, lookup: CachedLookup): void {
    this.entries.set(key, lookup);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
