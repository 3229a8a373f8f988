/**
 * Cache Service
 *
 * In-memory caching with LRU eviction and TTL support.
 * Used to memoize fetched/extracted documents and discovery results.
 *
 * Safe for concurrent access in the Node.js async environment: reads and writes
 * are synchronous, and callers that need single-flight fills keep their own
 * in-flight map (see DocumentCache).
 */

interface CacheEntry<T> {
    value: T;
    storedAt: number;
}

export interface CacheStats {
    hits: number;
    misses: number;
    evictions: number;
    size: number;
    hitRate: number;
}

export interface CacheOptions {
    maxSize?: number;
    /** Validity window in milliseconds; an entry older than this is stale */
    ttl?: number;
    /** Clock source, injectable for tests */
    now?: () => number;
}

export class Cache<T = unknown> {
    private cache: Map<string, CacheEntry<T>> = new Map();
    private readonly maxSize: number;
    private readonly ttl: number;
    private readonly now: () => number;

    // Hit rate tracking
    private hits: number = 0;
    private misses: number = 0;
    private evictions: number = 0;

    constructor(options: CacheOptions = {}) {
        this.maxSize = options.maxSize ?? 1000;
        this.ttl = options.ttl ?? 24 * 60 * 60 * 1000; // Default: 24 hours
        this.now = options.now ?? Date.now;
    }

    get ttlMs(): number {
        return this.ttl;
    }

    /**
     * Get a value; stale entries are dropped and count as a miss
     */
    get(key: string): T | undefined {
        const entry = this.cache.get(key);
        if (!entry) {
            this.misses++;
            return undefined;
        }

        if (this.isExpired(entry)) {
            this.cache.delete(key);
            this.misses++;
            return undefined;
        }

        // Refresh LRU position: Map iteration order is insertion order
        this.cache.delete(key);
        this.cache.set(key, entry);
        this.hits++;
        return entry.value;
    }

    /**
     * Look at an entry without touching statistics or LRU order
     */
    peek(key: string): T | undefined {
        const entry = this.cache.get(key);
        if (!entry || this.isExpired(entry)) {
            return undefined;
        }
        return entry.value;
    }

    set(key: string, value: T, storedAt: number = this.now()): void {
        if (this.cache.has(key)) {
            this.cache.delete(key);
        } else if (this.cache.size >= this.maxSize) {
            this.evictOldest();
        }
        this.cache.set(key, { value, storedAt });
    }

    has(key: string): boolean {
        return this.peek(key) !== undefined;
    }

    delete(key: string): boolean {
        return this.cache.delete(key);
    }

    clear(): void {
        this.cache.clear();
        this.hits = 0;
        this.misses = 0;
        this.evictions = 0;
    }

    getStats(): CacheStats {
        const total = this.hits + this.misses;
        return {
            hits: this.hits,
            misses: this.misses,
            evictions: this.evictions,
            size: this.cache.size,
            hitRate: total > 0 ? this.hits / total : 0,
        };
    }

    private isExpired(entry: CacheEntry<T>): boolean {
        return this.now() - entry.storedAt > this.ttl;
    }

    private evictOldest(): void {
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
            this.cache.delete(oldest.value);
            this.evictions++;
        }
    }
}
