import { load, type Cheerio, type CheerioAPI, type SelectorType } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import { MalformedBlock } from './errors';
import {
    cleanText,
    computeDiscountPercent,
    countCurrencyRuns,
    makeItemId,
    parsePrice,
    parseRating,
    parseReviewCount
} from './normalizer';
import { Item } from './types';

// ============================================================================
// MARKUP EXTRACTION
// ============================================================================
// Search-results pages change without notice, so nothing here targets one exact
// layout. Product blocks are located by an ordered list of guessed selectors and
// the first strategy that finds anything wins; later strategies are not tried.

export interface BlockLocator {
    name: string;
    locate: ($: CheerioAPI) => Element[];
}

export type ExtractionOutcome =
    | { ok: true; items: Item[]; strategy: string }
    | { ok: false; reason: 'no-blocks' | 'no-valid-items'; strategy: string | null; pricesOnPage: number };

function selectorLocator(name: string, selector: SelectorType): BlockLocator {
    return { name, locate: ($) => $(selector).toArray() };
}

export const BLOCK_LOCATORS: readonly BlockLocator[] = [
    selectorLocator('data-testid-product', '[data-testid*="product"]'),
    selectorLocator('product-class', '[class*="product"]'),
    selectorLocator('item-class', '[class*="item"]'),
    selectorLocator('card-class', '[class*="card"]'),
    selectorLocator('article', 'article'),
    selectorLocator('search-result-item', '.search-result-item')
];

const NAME_SELECTORS = [
    'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
    '[class*="title"]', '[class*="name"]',
    'a[href*="/pdp/"]', '.product-title', '.item-title'
];
const PRICE_SELECTORS = ['[class*="price"]', '[class*="cost"]'];
const STRUCK_PRICE = 's, del, [class*="original"], [class*="was-price"], [class*="list-price"]';
const RATING_SELECTORS = ['[class*="rating"]', '[class*="stars"]'];
const REVIEW_SELECTORS = ['[class*="review"]'];
const AVAILABILITY_SELECTORS = ['[class*="availability"]', '[class*="stock"]'];

const MIN_NAME_LENGTH = 3;

export interface ExtractOptions {
    limit: number;
    baseUrl: string;
    locators?: readonly BlockLocator[];
}

/**
 * First strategy (in order) that yields at least one candidate block.
 */
export function locateBlocks($: CheerioAPI, locators: readonly BlockLocator[] = BLOCK_LOCATORS): { strategy: string; blocks: Element[] } | null {
    for (const locator of locators) {
        const blocks = locator.locate($);
        if (blocks.length > 0) {
            return { strategy: locator.name, blocks };
        }
    }
    return null;
}

function firstText($block: Cheerio<Element>, selectors: readonly string[], accept: (text: string) => boolean): string | null {
    for (const selector of selectors) {
        const candidates = $block.find(selector).toArray();
        for (const el of candidates) {
            const text = cleanText($block.find(el).text());
            if (accept(text)) return text;
        }
    }
    return null;
}

function textNodes(node: AnyNode, out: string[]): string[] {
    if (isText(node)) {
        out.push(node.data);
    } else if (hasChildren(node) && !(isTag(node) && (node.name === 'script' || node.name === 'style'))) {
        for (const child of node.children) {
            textNodes(child, out);
        }
    }
    return out;
}

export function extractName($block: Cheerio<Element>): string | null {
    const fromSelectors = firstText($block, NAME_SELECTORS, text => text.length > MIN_NAME_LENGTH);
    if (fromSelectors) return fromSelectors;

    // No usable heading: take the first text node that looks like a product name
    const node = $block.get(0);
    if (!node) return null;
    for (const raw of textNodes(node, [])) {
        const text = cleanText(raw);
        if (text.length > 10 && text.length < 100 && !/^\d+$/.test(text)) {
            return text;
        }
    }
    return null;
}

// Text of an element with any struck-through (was-price) descendants left out
function currentPriceText($el: Cheerio<Element>): string {
    const $copy = $el.clone();
    $copy.find(STRUCK_PRICE).remove();
    return cleanText($copy.text());
}

export function extractPrice($block: Cheerio<Element>): number | null {
    for (const selector of PRICE_SELECTORS) {
        for (const el of $block.find(selector).not(STRUCK_PRICE).toArray()) {
            const price = parsePrice(currentPriceText($block.find(el)));
            if (price !== null) return price;
        }
    }
    return parsePrice(currentPriceText($block));
}

function extractOriginalPrice($block: Cheerio<Element>): number | null {
    for (const el of $block.find(STRUCK_PRICE).toArray()) {
        const price = parsePrice(cleanText($block.find(el).text()));
        if (price !== null) return price;
    }
    return null;
}

function extractRating($block: Cheerio<Element>): number | null {
    const labelled = $block.find('[aria-label*="out of 5"]').first().attr('aria-label');
    const text = labelled ?? firstText($block, RATING_SELECTORS, t => parseRating(t) !== null);
    const rating = parseRating(text);
    return rating !== null && rating >= 0 && rating <= 5 ? rating : null;
}

/**
 * Resolve an href/src against the site. Anything that does not end up as an
 * absolute http(s) URL becomes an empty string.
 */
export function resolveUrl(value: string | undefined, baseUrl: string): string {
    if (!value) return '';
    try {
        const resolved = new URL(value.trim(), baseUrl);
        return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : '';
    } catch {
        return '';
    }
}

/**
 * Build an Item from one candidate block. Throws MalformedBlock when the block has
 * no usable name or price.
 */
export function extractItem($block: Cheerio<Element>, baseUrl: string): Item {
    const name = extractName($block);
    if (!name) {
        throw new MalformedBlock('no product name');
    }
    const price = extractPrice($block);
    if (price === null) {
        throw new MalformedBlock(`no price for "${name}"`);
    }

    const originalPrice = extractOriginalPrice($block) ?? undefined;
    const rating = extractRating($block) ?? undefined;
    const reviewCount = parseReviewCount(firstText($block, REVIEW_SELECTORS, t => /\d/.test(t))) ?? undefined;
    const availability = firstText($block, AVAILABILITY_SELECTORS, t => t.length > 0) ?? 'In Stock';
    const $img = $block.find('img').first();

    return Object.freeze({
        id: makeItemId(name, price),
        name,
        price,
        originalPrice,
        discountPercent: computeDiscountPercent(price, originalPrice),
        rating,
        reviewCount,
        availability,
        url: resolveUrl($block.find('a[href]').first().attr('href'), baseUrl),
        imageUrl: resolveUrl($img.attr('src') || $img.attr('data-src'), baseUrl),
        description: name,
        provenance: 'live' as const
    });
}

/**
 * Extract up to `limit` items from a search-results page. Never throws: a block
 * that cannot produce an item is logged and skipped, and a page with no usable
 * blocks comes back as `{ ok: false }`.
 */
export function extractItems(html: string, options: ExtractOptions): ExtractionOutcome {
    const $ = load(html);
    const located = locateBlocks($, options.locators);

    if (!located) {
        const pricesOnPage = countCurrencyRuns($.root().text());
        console.warn(`[Extractor] No product blocks found (${pricesOnPage} price-like strings on page)`);
        return { ok: false, reason: 'no-blocks', strategy: null, pricesOnPage };
    }

    console.log(`[Extractor] Found ${located.blocks.length} candidate blocks using strategy: ${located.strategy}`);

    const items: Item[] = [];
    const seen = new Set<string>();
    let skipped = 0;

    for (const block of located.blocks) {
        if (items.length >= options.limit) break;
        try {
            const item = extractItem($(block), options.baseUrl);
            // Nested matches (a card and its own info wrapper) describe the same product
            if (seen.has(item.id)) continue;
            seen.add(item.id);
            items.push(item);
        } catch (error) {
            skipped++;
            if (!(error instanceof MalformedBlock)) {
                console.warn('[Extractor] Unexpected error in product block:', error instanceof Error ? error.message : error);
            }
        }
    }

    if (skipped > 0) {
        console.warn(`[Extractor] Skipped ${skipped} blocks without a usable name or price`);
    }

    if (items.length === 0) {
        return {
            ok: false,
            reason: 'no-valid-items',
            strategy: located.strategy,
            pricesOnPage: countCurrencyRuns($.root().text())
        };
    }
    return { ok: true, items, strategy: located.strategy };
}
