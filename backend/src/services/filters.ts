import { DivisionUndefinedError, InsufficientInputError } from './errors';
import { ComparisonSummary, DealsResult, Item, RangeSummary, SearchFilters, SortOption } from './types';

/**
 * Apply category / price / rating filters.
 *
 * The category filter is a loose, case-insensitive substring match against the
 * item name, not a match on the catalog key. Bounds are inclusive, and an item
 * with no price (or rating) is dropped when that bound is set.
 */
export function filterItems(items: readonly Item[], filters: SearchFilters): Item[] {
    const category = filters.category?.trim().toLowerCase();

    return items.filter(item => {
        if (category && !item.name.toLowerCase().includes(category)) {
            return false;
        }
        if (filters.maxPrice !== undefined && (item.price === null || item.price > filters.maxPrice)) {
            return false;
        }
        if (filters.minRating !== undefined && (item.rating === undefined || item.rating < filters.minRating)) {
            return false;
        }
        return true;
    });
}

function popularity(item: Item): number {
    return (item.rating ?? 0) * (item.reviewCount ?? 0);
}

/** Most popular first (rating x review count). Array.prototype.sort is stable. */
export function rankByRelevance(items: readonly Item[]): Item[] {
    return [...items].sort((a, b) => popularity(b) - popularity(a));
}

// Missing values always sort last, whatever the direction
function compareMissingLast(a: number | null | undefined, b: number | null | undefined, direction: 1 | -1): number {
    if (a === null || a === undefined) {
        return b === null || b === undefined ? 0 : 1;
    }
    if (b === null || b === undefined) {
        return -1;
    }
    return (a - b) * direction;
}

export function sortItems(items: readonly Item[], sortBy: SortOption | undefined): Item[] {
    switch (sortBy) {
        case 'relevance':
            return rankByRelevance(items);
        case 'price_asc':
            return [...items].sort((a, b) => compareMissingLast(a.price, b.price, 1));
        case 'price_desc':
            return [...items].sort((a, b) => compareMissingLast(a.price, b.price, -1));
        case 'rating':
            return [...items].sort((a, b) => compareMissingLast(a.rating, b.rating, -1));
        default:
            return [...items];
    }
}

function summarize(values: number[]): RangeSummary {
    return {
        min: Math.min(...values),
        max: Math.max(...values),
        avg: values.reduce((sum, v) => sum + v, 0) / values.length
    };
}

interface PricedItem {
    item: Item;
    price: number;
    rating: number;
}

/**
 * Side-by-side summary of two or more items.
 * Ties for best value and highest rating go to the earlier item.
 */
export function compare(items: readonly Item[]): ComparisonSummary {
    if (items.length < 2) {
        throw new InsufficientInputError(`Comparison needs at least 2 items, got ${items.length}`);
    }

    const priced: PricedItem[] = items.map(item => {
        if (item.price === null || item.rating === undefined) {
            throw new InsufficientInputError(`Item ${item.id} has no price or rating to compare`);
        }
        return { item, price: item.price, rating: item.rating };
    });

    const zeroRated = priced.find(p => p.rating === 0);
    if (zeroRated) {
        throw new DivisionUndefinedError(zeroRated.item.id);
    }

    let bestValue = priced[0];
    let highestRated = priced[0];
    for (const candidate of priced.slice(1)) {
        if (candidate.price / candidate.rating < bestValue.price / bestValue.rating) {
            bestValue = candidate;
        }
        if (candidate.rating > highestRated.rating) {
            highestRated = candidate;
        }
    }

    return {
        items: [...items],
        priceRange: summarize(priced.map(p => p.price)),
        ratingRange: summarize(priced.map(p => p.rating)),
        bestValue: bestValue.item,
        highestRated: highestRated.item
    };
}

export const DEFAULT_MIN_DISCOUNT = 20;

export function getDeals(items: readonly Item[], minDiscount: number = DEFAULT_MIN_DISCOUNT): DealsResult {
    const deals = items
        .filter(item => (item.discountPercent ?? 0) >= minDiscount)
        .sort((a, b) => (b.discountPercent ?? 0) - (a.discountPercent ?? 0));

    return { deals, minDiscount, totalDeals: deals.length };
}

/** Same category, priced within 30% of the item, capped at `limit`. */
export function relatedItems(item: Item, pool: readonly Item[], limit = 4): Item[] {
    if (item.price === null || !item.category) return [];
    const low = item.price * 0.7;
    const high = item.price * 1.3;

    return pool
        .filter(p => p.id !== item.id
            && p.category === item.category
            && p.price !== null
            && p.price >= low
            && p.price <= high)
        .slice(0, limit);
}
