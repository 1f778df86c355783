/**
 * In-process TTL cache
 * Entries expire lazily on read and are swept on write; the oldest entries are
 * evicted once maxEntries is reached.
 */

export interface CacheLayer<V> {
    get(key: string): Promise<V | undefined>;
    set(key: string, value: V, ttlSeconds: number): Promise<void>;
}

interface CacheEntry<V> {
    value: V;
    expiresAt: number; // epoch ms
}

export interface MemoryCacheOptions {
    maxEntries?: number;
    now?: () => number;
}

export class MemoryCache<V> implements CacheLayer<V> {
    private entries: Map<string, CacheEntry<V>> = new Map();
    private readonly maxEntries: number;
    private readonly now: () => number;

    constructor(options: MemoryCacheOptions = {}) {
        this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
        this.now = options.now ?? Date.now;
    }

    async get(key: string): Promise<V | undefined> {
        const entry = this.entries.get(key);
        if (!entry) return undefined;

        if (this.now() >= entry.expiresAt) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    async set(key: string, value: V, ttlSeconds: number): Promise<void> {
        // Re-inserting moves the key to the end of the eviction order
        this.entries.delete(key);
        this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });

        if (this.entries.size > this.maxEntries) {
            this.cleanup();
        }
    }

    get size(): number {
        return this.entries.size;
    }

    private cleanup(): void {
        const now = this.now();
        for (const [key, entry] of this.entries) {
            if (now >= entry.expiresAt) this.entries.delete(key);
        }

        // Map iteration is insertion order, so the first keys are the oldest
        for (const key of this.entries.keys()) {
            if (this.entries.size <= this.maxEntries) break;
            this.entries.delete(key);
        }
    }
}
