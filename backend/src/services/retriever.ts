import { StaticCatalog } from './catalog';
import { InvalidQueryError, NotFoundError, TransportFailure } from './errors';
import { extractItems, ExtractionOutcome } from './extractor';
import { filterItems, sortItems } from './filters';
import { BROWSER_HEADERS, HttpClient } from './httpClient';
import { canonicalText } from './normalizer';
import { extractProductPage } from './productPage';
import { buildCacheKey, ResultCache } from './resultCache';
import { Item, NormalizedQuery, ProductPageDetails, ProvenanceCounts, SearchResult } from './types';

export interface RetrieverOptions {
    http: HttpClient;
    catalog: StaticCatalog;
    cache: ResultCache;
    baseUrl: string;
    timeoutMs: number;
    liveFetchEnabled?: boolean;
    now?: () => Date;
}

type LiveOutcome =
    | { kind: 'success'; items: Item[]; strategy: string }
    | { kind: 'failure'; reason: string };

export function buildSearchUrl(baseUrl: string, text: string): string {
    const base = baseUrl.replace(/\/+$/, '');
    return `${base}/search?query=${encodeURIComponent(text.trim()).replace(/%20/g, '+')}`;
}

function countProvenance(items: readonly Item[]): ProvenanceCounts {
    const live = items.filter(i => i.provenance === 'live').length;
    return { live, fallback: items.length - live };
}

/**
 * Live retrieval with a static fallback.
 *
 * A search is answered from the cache when possible, otherwise from the retailer's
 * search page, otherwise from the static catalog. `retrieve` never rejects: every
 * failure on the live path ends in the fallback branch.
 */
export class ProductRetriever {
    private readonly http: HttpClient;
    private readonly catalog: StaticCatalog;
    private readonly cache: ResultCache;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly liveFetchEnabled: boolean;
    private readonly now: () => Date;

    constructor(options: RetrieverOptions) {
        this.http = options.http;
        this.catalog = options.catalog;
        this.cache = options.cache;
        this.baseUrl = options.baseUrl;
        this.timeoutMs = options.timeoutMs;
        this.liveFetchEnabled = options.liveFetchEnabled ?? true;
        this.now = options.now ?? (() => new Date());
    }

    async retrieve(query: NormalizedQuery): Promise<SearchResult> {
        const cacheKey = buildCacheKey(query);
        const cached = this.cache.get(cacheKey);
        if (cached) {
            console.log(`[Retriever] Cache hit for ${cacheKey}`);
            return cached;
        }

        const outcome = await this.fetchLive(query);

        let items: Item[];
        if (outcome.kind === 'success') {
            console.log(`[Retriever] Extracted ${outcome.items.length} live items (strategy: ${outcome.strategy})`);
            items = outcome.items;
        } else {
            console.warn(`[Retriever] Live retrieval failed (${outcome.reason}), using fallback catalog`);
            items = this.catalog.getFallbackItems(query.text, query.limit);
        }

        const result = this.buildResult(query, items);
        this.cache.set(cacheKey, result);
        return result;
    }

    private async fetchLive(query: NormalizedQuery): Promise<LiveOutcome> {
        if (!this.liveFetchEnabled) {
            return { kind: 'failure', reason: 'live fetch disabled' };
        }

        const url = buildSearchUrl(this.baseUrl, query.text);
        try {
            console.log(`[Retriever] Fetching ${url}`);
            const response = await this.http.get(url, { ...BROWSER_HEADERS }, this.timeoutMs);
            const extraction: ExtractionOutcome = extractItems(response.body, {
                limit: query.limit,
                baseUrl: this.baseUrl
            });
            if (!extraction.ok) {
                return { kind: 'failure', reason: `extraction empty: ${extraction.reason}` };
            }
            return { kind: 'success', items: extraction.items, strategy: extraction.strategy };
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            const status = error instanceof TransportFailure && error.status !== undefined ? ` (HTTP ${error.status})` : '';
            console.error(`[Retriever] Error retrieving ${url}${status}:`, message);
            return { kind: 'failure', reason: message };
        }
    }

    /**
     * Fetch one product page on the retailer's site and pull its details.
     * Throws InvalidQueryError for a URL off that site and NotFoundError when the page
     * cannot be fetched; there is no fallback copy of product pages.
     */
    async fetchProductPage(productUrl: string): Promise<ProductPageDetails> {
        const url = this.onRetailerSite(productUrl);
        if (!this.liveFetchEnabled) {
            throw new NotFoundError(`Product page ${url} is unavailable: live fetch disabled`);
        }
        try {
            console.log(`[Retriever] Fetching product page ${url}`);
            const response = await this.http.get(url, { ...BROWSER_HEADERS }, this.timeoutMs);
            return extractProductPage(response.body, url, this.baseUrl);
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Retriever] Error retrieving product page ${url}:`, message);
            throw new NotFoundError(`Product page ${url} could not be retrieved`);
        }
    }

    private onRetailerSite(productUrl: string): string {
        let parsed: URL;
        try {
            parsed = new URL(productUrl, this.baseUrl);
        } catch {
            throw new InvalidQueryError(`Invalid product URL: ${productUrl}`);
        }
        if (parsed.host !== new URL(this.baseUrl).host || !['http:', 'https:'].includes(parsed.protocol)) {
            throw new InvalidQueryError(`Product URL must be on ${this.baseUrl}`);
        }
        return parsed.toString();
    }

    private buildResult(query: NormalizedQuery, retrieved: readonly Item[]): SearchResult {
        const filtered = filterItems(retrieved, query);
        const items = Object.freeze(sortItems(filtered, query.sortBy));

        // One cached result answers every casing of the query, so echo the canonical form
        return Object.freeze({
            query: canonicalText(query.text),
            filtersApplied: Object.freeze({
                category: query.category ? canonicalText(query.category) : null,
                maxPrice: query.maxPrice ?? null,
                minRating: query.minRating ?? null,
                sortBy: query.sortBy ?? null
            }),
            items,
            totalCount: items.length,
            retrievedAt: this.now().toISOString(),
            provenanceCounts: countProvenance(items)
        });
    }
}
