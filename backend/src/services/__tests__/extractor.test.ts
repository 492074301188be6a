import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { BLOCK_LOCATORS, extractItems, resolveUrl } from '../extractor';
import { makeItemId } from '../normalizer';

const BASE_URL = 'https://www.wayfair.com';

function page(body: string): string {
    return `<html><head><title>Search</title></head><body>${body}</body></html>`;
}

describe('extractItems', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('extracts every field from a data-testid product block', () => {
        const html = page(`
            <div data-testid="product-card">
                <h2>Modern Oak Coffee Table</h2>
                <span class="price-now">$249.99</span>
                <s>$329.99</s>
                <div class="rating" aria-label="4.5 out of 5 stars">4.5</div>
                <span class="review-count">(1,024)</span>
                <a href="/furniture/pdp/oak-coffee-table.html">View</a>
                <img src="https://images.example.com/oak.jpg">
            </div>`);

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome).toEqual({
            ok: true,
            strategy: 'data-testid-product',
            items: [{
                id: makeItemId('Modern Oak Coffee Table', 249.99),
                name: 'Modern Oak Coffee Table',
                price: 249.99,
                originalPrice: 329.99,
                discountPercent: 24,
                rating: 4.5,
                reviewCount: 1024,
                availability: 'In Stock',
                url: 'https://www.wayfair.com/furniture/pdp/oak-coffee-table.html',
                imageUrl: 'https://images.example.com/oak.jpg',
                description: 'Modern Oak Coffee Table',
                provenance: 'live'
            }]
        });
    });

    it.each([
        ['item-class', '<li class="search-item"><h3>Rattan Accent Chair</h3><span class="price">$149.99</span></li>'],
        ['card-class', '<div class="card"><h3>Rattan Accent Chair</h3><span class="price">$149.99</span></div>'],
        ['article', '<article><h3>Rattan Accent Chair</h3><span class="price">$149.99</span></article>']
    ])('falls through to the %s strategy', (strategy, markup) => {
        const outcome = extractItems(page(markup), { limit: 10, baseUrl: BASE_URL });

        expect(outcome.ok).toBe(true);
        expect(outcome.strategy).toBe(strategy);
        if (outcome.ok) {
            expect(outcome.items.map(i => i.name)).toEqual(['Rattan Accent Chair']);
            expect(outcome.items[0].price).toBe(149.99);
        }
    });

    it('uses the search-result-item locator when given on its own', () => {
        const locators = BLOCK_LOCATORS.filter(l => l.name === 'search-result-item');
        const html = page('<div class="search-result-item"><h3>Rattan Accent Chair</h3><span class="price">$149.99</span></div>');

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL, locators });

        expect(outcome.ok).toBe(true);
        expect(outcome.strategy).toBe('search-result-item');
    });

    it('stops at the first strategy that finds blocks', () => {
        const html = page(`
            <div class="product-tile"><h3>Velvet Accent Chair</h3><span class="price">$199.99</span></div>
            <article><h3>Teak Outdoor Bench</h3><span class="price">$319.99</span></article>`);

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome.strategy).toBe('product-class');
        expect(outcome.ok && outcome.items.map(i => i.name)).toEqual(['Velvet Accent Chair']);
    });

    it('falls back to the first plausible text node for the name', () => {
        const html = page('<div class="product-tile"><span>42</span><span>Handwoven Jute Area Rug</span><span class="price">$89.99</span></div>');

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome.ok && outcome.items[0].name).toBe('Handwoven Jute Area Rug');
    });

    it('ignores struck-through prices when reading the current price', () => {
        const html = page(`
            <div class="product-tile">
                <h3>Linen Slipcovered Sofa</h3>
                <del class="price-original">$1,099.00</del>
                <span class="price-now">$849.00</span>
            </div>`);

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.items[0].price).toBe(849);
            expect(outcome.items[0].originalPrice).toBe(1099);
            expect(outcome.items[0].discountPercent).toBe(23);
        }
    });

    it('reads the current price from a wrapper that also holds the was-price', () => {
        const html = page(`
            <div class="product-tile">
                <h3>Linen Slipcovered Sofa</h3>
                <div class="price-block"><s>$1,099.00</s> <span>$849.00</span></div>
            </div>`);

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.items[0].price).toBe(849);
            expect(outcome.items[0].originalPrice).toBe(1099);
            expect(outcome.items[0].discountPercent).toBe(23);
        }
    });

    it('skips struck-through prices when falling back to the whole block', () => {
        const html = page('<div class="product-tile"><h3>Teak Outdoor Bench</h3><del>$400.00</del> now $319.99</div>');

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome.ok && outcome.items[0].price).toBe(319.99);
    });

    it('skips blocks without a name or a price', () => {
        const html = page(`
            <div class="product">Only text</div>
            <div class="product"><h3>Rattan Accent Chair</h3><span class="price">Call for price</span></div>
            <div class="product"><h3>Teak Outdoor Bench</h3><span class="price">$319.99</span></div>`);

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome.ok && outcome.items.map(i => i.name)).toEqual(['Teak Outdoor Bench']);
    });

    it('reports no valid items when every block is discarded', () => {
        const html = page('<div class="product"><h3>Rattan Accent Chair</h3></div>');

        expect(extractItems(html, { limit: 10, baseUrl: BASE_URL })).toEqual({
            ok: false,
            reason: 'no-valid-items',
            strategy: 'product-class',
            pricesOnPage: 0
        });
    });

    it('reports no blocks and counts price-like strings', () => {
        const html = page('<p>Prices from $10.00 and £20.00</p>');

        expect(extractItems(html, { limit: 10, baseUrl: BASE_URL })).toEqual({
            ok: false,
            reason: 'no-blocks',
            strategy: null,
            pricesOnPage: 2
        });
    });

    it('keeps one item when a card and its inner wrapper both match', () => {
        const html = page(`
            <div class="product-card">
                <div class="product-info"><h3>Walnut Bookshelf Tower</h3><span class="price">$159.99</span></div>
            </div>`);

        const outcome = extractItems(html, { limit: 10, baseUrl: BASE_URL });

        expect(outcome.ok && outcome.items.length).toBe(1);
    });

    it('returns at most limit items in page order', () => {
        const names = ['Alder Stool', 'Birch Stool', 'Cedar Stool', 'Maple Stool', 'Spruce Stool'];
        const html = page(names
            .map((name, i) => `<div class="product"><h3>${name}</h3><span class="price">$${i + 40}.00</span></div>`)
            .join(''));

        const outcome = extractItems(html, { limit: 3, baseUrl: BASE_URL });

        expect(outcome.ok && outcome.items.map(i => i.name)).toEqual(['Alder Stool', 'Birch Stool', 'Cedar Stool']);
    });
});

describe('resolveUrl', () => {
    it('resolves relative and protocol-relative links', () => {
        expect(resolveUrl('/furniture/pdp/a.html', BASE_URL)).toBe('https://www.wayfair.com/furniture/pdp/a.html');
        expect(resolveUrl('//cdn.example.com/a.jpg', BASE_URL)).toBe('https://cdn.example.com/a.jpg');
    });

    it('returns an empty string for missing or non-http links', () => {
        expect(resolveUrl(undefined, BASE_URL)).toBe('');
        expect(resolveUrl('javascript:void(0)', BASE_URL)).toBe('');
        expect(resolveUrl('mailto:help@example.com', BASE_URL)).toBe('');
    });
});
