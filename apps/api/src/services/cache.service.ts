/**
 * Single-entry TTL cache around an async loader.
 *
 * A stored value is served while `now - fetchedAt < ttlMs`. After that the next
 * `get()` reloads; concurrent callers share one in-flight load. A failed load
 * leaves the previous entry untouched and rejects only the callers waiting on it.
 */

export type Clock = () => number;

export interface CacheEntry<T> {
    readonly fetchedAt: number;
    readonly value: T;
}

export interface TtlCacheOptions<T> {
    load: () => Promise<T>;
    ttlMs?: number;
    clock?: Clock;
}

export const DEFAULT_TTL_MS = 60_000;

export class TtlCache<T> {
    private entry: CacheEntry<T> | null = null;
    private inflight: Promise<T> | null = null;
    private readonly load: () => Promise<T>;
    private readonly ttlMs: number;
    private readonly clock: Clock;

    constructor(options: TtlCacheOptions<T>) {
        this.load = options.load;
        this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
        this.clock = options.clock ?? Date.now;
    }

    async get(now: number = this.clock()): Promise<T> {
        const entry = this.entry;
        if (entry && now - entry.fetchedAt < this.ttlMs) {
            console.log(`[CACHE] Hit, entry is ${now - entry.fetchedAt}ms old.`);
            return entry.value;
        }
        if (!this.inflight) {
            this.inflight = this.refresh(now).finally(() => {
                this.inflight = null;
            });
        }
        return this.inflight;
    }

    isFresh(now: number = this.clock()): boolean {
        return this.entry !== null && now - this.entry.fetchedAt < this.ttlMs;
    }

    get lastFetchedAt(): number | null {
        return this.entry?.fetchedAt ?? null;
    }

    private async refresh(now: number): Promise<T> {
        console.log('[CACHE] Entry missing or stale, refreshing...');
        const value = await this.load();
        this.entry = { fetchedAt: now, value };
        return value;
    }
}
