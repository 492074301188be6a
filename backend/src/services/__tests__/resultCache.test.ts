import { afterEach, describe, it, expect, vi } from 'vitest';
import { buildCacheKey, ResultCache } from '../resultCache';
import { SearchResult } from '../types';

const result: SearchResult = {
    query: 'sofa',
    filtersApplied: { category: null, maxPrice: null, minRating: null, sortBy: null },
    items: [],
    totalCount: 0,
    retrievedAt: '2026-01-01T00:00:00.000Z',
    provenanceCounts: { live: 0, fallback: 0 }
};

describe('buildCacheKey', () => {
    it('writes absent filters as dashes', () => {
        expect(buildCacheKey({ text: 'sofa', limit: 10 })).toBe('search:sofa|-|-|-|10|-');
    });

    it('includes every filter and normalizes text case', () => {
        expect(buildCacheKey({ text: ' Queen Bed ', limit: 5, category: ' Frame ', maxPrice: 400, minRating: 4.5, sortBy: 'price_asc' }))
            .toBe('search:queen bed|frame|400|4.5|5|price_asc');
    });

    it('distinguishes queries that differ only in limit', () => {
        expect(buildCacheKey({ text: 'sofa', limit: 5 })).not.toBe(buildCacheKey({ text: 'sofa', limit: 6 }));
    });
});

describe('ResultCache', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('stores and returns the same object', () => {
        const cache = new ResultCache(60);
        cache.set('k', result);

        expect(cache.get('k')).toBe(result);
        expect(cache.size).toBe(1);
    });

    it('expires entries after the ttl', () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
        const cache = new ResultCache(300);
        cache.set('k', result);

        vi.setSystemTime(new Date('2026-01-01T00:04:59Z'));
        expect(cache.get('k')).toBe(result);

        vi.setSystemTime(new Date('2026-01-01T00:05:01Z'));
        expect(cache.get('k')).toBeUndefined();
    });

    it('clears everything', () => {
        const cache = new ResultCache();
        cache.set('a', result);
        cache.set('b', result);
        cache.clear();

        expect(cache.size).toBe(0);
        expect(cache.get('a')).toBeUndefined();
    });
});
