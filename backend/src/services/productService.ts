import { StaticCatalog } from './catalog';
import { InvalidQueryError, NotFoundError } from './errors';
import { compare, DEFAULT_MIN_DISCOUNT, getDeals, relatedItems } from './filters';
import { ProductRetriever } from './retriever';
import {
    ComparisonSummary,
    DealsResult,
    Item,
    NormalizedQuery,
    ProductDetails,
    ProductPageDetails,
    SearchQuery,
    SearchResult,
    SortOption
} from './types';

export const DEFAULT_LIMIT = 10;

export const SORT_OPTIONS: readonly SortOption[] = ['relevance', 'price_asc', 'price_desc', 'rating'];

export function isSortOption(value: string): value is SortOption {
    return SORT_OPTIONS.some(option => option === value);
}

function assertNonNegative(value: number | undefined, field: string): void {
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
        throw new InvalidQueryError(`${field} must be a non-negative number`);
    }
}

/**
 * Reject a query before any retrieval work happens.
 */
export function validateQuery(query: SearchQuery): NormalizedQuery {
    const text = typeof query.text === 'string' ? query.text.trim() : '';
    if (!text) {
        throw new InvalidQueryError('Query text is required');
    }

    const limit = query.limit ?? DEFAULT_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
        throw new InvalidQueryError('limit must be an integer of at least 1');
    }

    assertNonNegative(query.maxPrice, 'maxPrice');
    assertNonNegative(query.minRating, 'minRating');

    if (query.sortBy !== undefined && !isSortOption(query.sortBy)) {
        throw new InvalidQueryError(`sortBy must be one of: ${SORT_OPTIONS.join(', ')}`);
    }

    const category = query.category?.trim();
    return {
        text,
        limit,
        category: category ? category : undefined,
        maxPrice: query.maxPrice,
        minRating: query.minRating,
        sortBy: query.sortBy
    };
}

/**
 * Boundary operations offered to the HTTP layer and to agent tools.
 */
export class ProductService {
    // Every item handed out by a search, so later compare/detail calls can find it.
    // Ids can collide between pages; the most recent item wins.
    private readonly seen = new Map<string, Item>();

    constructor(
        private readonly retriever: ProductRetriever,
        private readonly catalog: StaticCatalog
    ) {}

    async search(query: SearchQuery): Promise<SearchResult> {
        const normalized = validateQuery(query);
        const result = await this.retriever.retrieve(normalized);
        for (const item of result.items) {
            this.seen.set(item.id, item);
        }
        return result;
    }

    private resolve(id: string): Item | undefined {
        return this.seen.get(id) ?? this.catalog.findById(id);
    }

    compareItems(ids: readonly string[]): ComparisonSummary {
        const uniqueIds = [...new Set(ids)];
        const items = uniqueIds
            .map(id => this.resolve(id))
            .filter((item): item is Item => item !== undefined);

        if (items.length < 2) {
            const missing = uniqueIds.filter(id => !this.resolve(id));
            throw new NotFoundError(
                `At least 2 known products are needed to compare; unknown ids: ${missing.join(', ') || 'none'}`
            );
        }
        return compare(items);
    }

    listCategories(): string[] {
        return this.catalog.listCategories();
    }

    listBrands(): string[] {
        return this.catalog.listBrands();
    }

    async getProductPage(url: string): Promise<ProductPageDetails> {
        if (!url.trim()) {
            throw new InvalidQueryError('Product URL is required');
        }
        return this.retriever.fetchProductPage(url.trim());
    }

    getProductDetails(id: string): ProductDetails {
        const item = this.resolve(id);
        if (!item) {
            throw new NotFoundError(`Product ${id} not found`);
        }
        return { item, related: relatedItems(item, this.catalog.allItems()) };
    }

    getDeals(minDiscount: number = DEFAULT_MIN_DISCOUNT): DealsResult {
        if (!Number.isFinite(minDiscount) || minDiscount < 0 || minDiscount > 100) {
            throw new InvalidQueryError('minDiscount must be between 0 and 100');
        }
        return getDeals(this.catalog.allItems(), minDiscount);
    }
}
