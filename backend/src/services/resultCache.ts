import NodeCache from 'node-cache';
import { canonicalText } from './normalizer';
import { NormalizedQuery, SearchResult } from './types';

export const DEFAULT_CACHE_TTL_SECONDS = 300;

/**
 * Canonical cache key for a query. Text is case- and whitespace-insensitive,
 * absent filters are written as "-".
 */
export function buildCacheKey(query: NormalizedQuery): string {
    const part = (value: string | number | undefined) => (value === undefined ? '-' : String(value));
    return [
        `search:${canonicalText(query.text)}`,
        part(query.category ? canonicalText(query.category) || undefined : undefined),
        part(query.maxPrice),
        part(query.minRating),
        part(query.limit),
        part(query.sortBy)
    ].join('|');
}

// Short-lived search result cache. checkperiod 0 means no background sweep:
// node-cache drops an expired entry when it is next read.
export class ResultCache {
    private readonly store: NodeCache;

    constructor(ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS) {
        this.store = new NodeCache({ stdTTL: ttlSeconds, checkperiod: 0, useClones: false });
    }

    get(key: string): SearchResult | undefined {
        return this.store.get<SearchResult>(key);
    }

    set(key: string, result: SearchResult): void {
        this.store.set(key, result);
    }

    clear(): void {
        this.store.flushAll();
    }

    get size(): number {
        return this.store.keys().length;
    }
}
