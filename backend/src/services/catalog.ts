import catalogData from '../../data/fallback-catalog.json';
import { Item } from './types';

// ============================================================================
// STATIC FALLBACK CATALOG
// ============================================================================
// Used whenever live retrieval is unavailable or unproductive. The table is read
// once, frozen, and never written afterwards.

interface RawCatalogItem {
    id: string;
    name: string;
    brand?: string;
    price: number;
    originalPrice?: number;
    discountPercent?: number;
    rating: number;
    reviewCount: number;
    availability: string;
    url: string;
    imageUrl: string;
    description: string;
}

interface RawCategory {
    key: string;
    terms: string[];
    items: RawCatalogItem[];
}

interface RawCatalog {
    categories: RawCategory[];
}

export interface CatalogCategory {
    readonly key: string;
    readonly terms: readonly string[];
    readonly items: readonly Item[];
}

export const DEFAULT_CATEGORY = 'sofa';

function toFallbackItem(raw: RawCatalogItem, category: string): Item {
    return Object.freeze({
        ...raw,
        category,
        provenance: 'fallback' as const
    });
}

function buildCategories(raw: RawCatalog): readonly CatalogCategory[] {
    return Object.freeze(raw.categories.map(c => Object.freeze({
        key: c.key,
        terms: Object.freeze([...c.terms]),
        items: Object.freeze(c.items.map(item => toFallbackItem(item, c.key)))
    })));
}

export class StaticCatalog {
    private readonly categories: readonly CatalogCategory[];
    private readonly byId: ReadonlyMap<string, Item>;

    constructor(raw: RawCatalog) {
        this.categories = buildCategories(raw);
        if (!this.categories.some(c => c.key === DEFAULT_CATEGORY)) {
            throw new Error(`Fallback catalog is missing the default category "${DEFAULT_CATEGORY}"`);
        }
        this.byId = new Map(this.categories.flatMap(c => c.items.map(item => [item.id, item] as const)));
    }

    /**
     * Category for a free-text query: the first category (in table order) one of
     * whose terms occurs in the lower-cased query. Defaults to sofa.
     */
    resolveCategory(text: string): string {
        const lowered = text.toLowerCase();
        const match = this.categories.find(c => c.terms.some(term => lowered.includes(term)));
        return match ? match.key : DEFAULT_CATEGORY;
    }

    getFallbackItems(text: string, limit: number): Item[] {
        const key = this.resolveCategory(text);
        return this.itemsFor(key).slice(0, limit);
    }

    itemsFor(key: string): readonly Item[] {
        return this.categories.find(c => c.key === key)?.items ?? [];
    }

    listCategories(): string[] {
        return this.categories.map(c => c.key);
    }

    /** Distinct brands across the table, alphabetical. */
    listBrands(): string[] {
        const brands = new Set<string>();
        for (const item of this.allItems()) {
            if (item.brand) brands.add(item.brand);
        }
        return [...brands].sort((a, b) => a.localeCompare(b));
    }

    findById(id: string): Item | undefined {
        return this.byId.get(id);
    }

    allItems(): Item[] {
        return this.categories.flatMap(c => c.items);
    }
}

export const defaultCatalog = new StaticCatalog(catalogData);
