// Price / rating / text helpers. All pure.

// Optional currency symbol, digits with optional thousands separators, exactly two decimals.
const PRICE_PATTERN = /[$£€]?\s?(\d{1,3}(?:,\d{3})+|\d+)\.(\d{2})(?!\d)/;
const DECIMAL_PATTERN = /\d+(?:\.\d+)?/;
const INTEGER_PATTERN = /\d{1,3}(?:,\d{3})+|\d+/;

// Currency-prefixed numeric runs, used to tell whether a page shows prices at all
const CURRENCY_RUN_PATTERN = /[$£€]\s?\d[\d,]*(?:\.\d{2})?/g;

export function parsePrice(text: string | null | undefined): number | null {
    if (!text) return null;
    const match = text.match(PRICE_PATTERN);
    if (!match) return null;
    const value = Number(`${match[1].replace(/,/g, '')}.${match[2]}`);
    return Number.isFinite(value) ? value : null;
}

export function parseRating(text: string | null | undefined): number | null {
    if (!text) return null;
    const match = text.match(DECIMAL_PATTERN);
    return match ? Number(match[0]) : null;
}

export function parseReviewCount(text: string | null | undefined): number | null {
    if (!text) return null;
    const match = text.match(INTEGER_PATTERN);
    return match ? Number(match[0].replace(/,/g, '')) : null;
}

export function countCurrencyRuns(text: string): number {
    return text.match(CURRENCY_RUN_PATTERN)?.length ?? 0;
}

/**
 * Discount implied by a sale price and its original price, rounded to an integer.
 * 0 when the two are equal; undefined when either is missing, the original price
 * is not positive, or it is below the sale price.
 */
export function computeDiscountPercent(price: number | null, originalPrice: number | undefined): number | undefined {
    if (price === null || originalPrice === undefined) return undefined;
    if (originalPrice <= 0 || originalPrice < price) return undefined;
    return Math.round(((originalPrice - price) / originalPrice) * 100);
}

export function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/** Case- and whitespace-insensitive form of query text, as cached and echoed. */
export function canonicalText(text: string): string {
    return cleanText(text).toLowerCase();
}

// 32-bit FNV-1a
function hashString(input: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < input.length; i++) {
        hash ^= input.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/**
 * Id for a live item. Same name and price give the same id; different items can
 * collide, so ids are only meaningful within one result set.
 */
export function makeItemId(name: string, price: number | null): string {
    const bucket = hashString(`${name}${price ?? 0}`) % 10000;
    return `WF_${String(bucket).padStart(4, '0')}`;
}
