/**
 * CoverCache - in-memory album art store shared by the UI loop and every
 * background fetch task.
 *
 * Each entry maps a file key to the art bytes, or to `null` when the daemon
 * had no art (a remembered negative result). Keys with an outstanding fetch
 * sit in a pending set so that concurrent callers never fetch the same key
 * twice. All methods are synchronous, so each call runs without interleaving
 * with any other task; `claim` bundles the check-then-mark sequence that
 * fetchers need into a single call.
 *
 * The cache is bounded: once `maxEntries` is reached the least recently used
 * entry is evicted.
 */

import { logger } from "../utils/logger";

export interface CoverCacheEntry {
    data: Buffer | null;
}

export type CoverClaim =
    | { status: "hit"; entry: CoverCacheEntry }
    | { status: "pending" }
    | { status: "claimed" };

export interface CoverCacheStats {
    size: number;
    pending: number;
    hits: number;
    misses: number;
    evictions: number;
}

export const DEFAULT_COVER_CACHE_MAX_ENTRIES = 256;

export class CoverCache {
    private readonly entries = new Map<string, CoverCacheEntry>();
    private readonly pending = new Set<string>();
    private readonly maxEntries: number;
    private hits = 0;
    private misses = 0;
    private evictions = 0;

    constructor(maxEntries: number = DEFAULT_COVER_CACHE_MAX_ENTRIES) {
        if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
            throw new Error("Cover cache size must be a positive integer");
        }
        this.maxEntries = maxEntries;
    }

    get size(): number {
        return this.entries.size;
    }

    get(key: string): CoverCacheEntry | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            this.misses++;
            return undefined;
        }

        this.hits++;
        this.touch(key, entry);
        return entry;
    }

    contains(key: string): boolean {
        return this.entries.has(key);
    }

    isPending(key: string): boolean {
        return this.pending.has(key);
    }

    markPending(key: string): void {
        this.pending.add(key);
    }

    /** Drops a pending mark without storing a result. */
    release(key: string): void {
        this.pending.delete(key);
    }

    /** Stores the final fetch result and clears the pending mark. */
    insert(key: string, data: Buffer | null): void {
        this.pending.delete(key);
        this.touch(key, { data });

        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
            this.evictions++;
            logger.debug(`[CoverCache] Evicted ${oldest.value}`);
        }
    }

    /**
     * Checks the cache, then the pending set, and marks the key pending when
     * neither knows it. A `claimed` result obliges the caller to `insert`
     * (or `release`) the key later.
     */
    claim(key: string): CoverClaim {
        const entry = this.get(key);
        if (entry) {
            return { status: "hit", entry };
        }
        if (this.isPending(key)) {
            return { status: "pending" };
        }
        this.markPending(key);
        return { status: "claimed" };
    }

    clear(): void {
        this.entries.clear();
        this.pending.clear();
    }

    stats(): CoverCacheStats {
        return {
            size: this.entries.size,
            pending: this.pending.size,
            hits: this.hits,
            misses: this.misses,
            evictions: this.evictions,
        };
    }

    private touch(key: string, entry: CoverCacheEntry): void {
        // Map iteration follows insertion order; re-inserting marks the key
        // as most recently used.
        this.entries.delete(key);
        this.entries.set(key, entry);
    }
}
