// Types shared by the retrieval engine, the catalog and the HTTP layer

export type Provenance = 'live' | 'fallback';

export type SortOption = 'relevance' | 'price_asc' | 'price_desc' | 'rating';

export interface Item {
    readonly id: string;
    readonly name: string;
    readonly price: number | null;
    readonly originalPrice?: number;
    readonly discountPercent?: number;
    readonly rating?: number;
    readonly reviewCount?: number;
    readonly availability: string;
    readonly url: string;
    readonly imageUrl: string;
    readonly description: string;
    readonly provenance: Provenance;
    readonly category?: string;     // catalog key, fallback items only
    readonly brand?: string;
}

export interface SearchFilters {
    category?: string;
    maxPrice?: number;
    minRating?: number;
}

export interface SearchQuery extends SearchFilters {
    text: string;
    limit?: number;
    sortBy?: SortOption;
}

/** A query after validation: trimmed text and a concrete limit. */
export interface NormalizedQuery extends SearchFilters {
    text: string;
    limit: number;
    sortBy?: SortOption;
}

export interface FiltersApplied {
    category: string | null;
    maxPrice: number | null;
    minRating: number | null;
    sortBy: SortOption | null;
}

export interface ProvenanceCounts {
    live: number;
    fallback: number;
}

export interface SearchResult {
    query: string;
    filtersApplied: FiltersApplied;
    items: readonly Item[];
    totalCount: number;
    retrievedAt: string;
    provenanceCounts: ProvenanceCounts;
}

export interface RangeSummary {
    min: number;
    max: number;
    avg: number;
}

export interface ComparisonSummary {
    items: Item[];
    priceRange: RangeSummary;
    ratingRange: RangeSummary;
    bestValue: Item;
    highestRated: Item;
}

export interface DealsResult {
    deals: Item[];
    minDiscount: number;
    totalDeals: number;
}

export interface ProductDetails {
    item: Item;
    related: Item[];
}

/** What a single product page adds beyond the search listing. */
export interface ProductPageDetails {
    url: string;
    description: string;
    features: string[];
    specifications: Record<string, string>;
    images: string[];
}
