import { load } from 'cheerio';
import { resolveUrl } from './extractor';
import { cleanText } from './normalizer';
import { ProductPageDetails } from './types';

const DESCRIPTION_SELECTOR = [
    'div[class*="description"]', 'p[class*="description"]',
    'div[class*="details"]', 'p[class*="details"]'
].join(', ');
const FEATURE_SELECTOR = [
    'li[class*="feature"]', 'div[class*="feature"]',
    'li[class*="benefit"]', 'div[class*="benefit"]'
].join(', ');
const IMAGE_SELECTOR = 'img[class*="product"], img[class*="main"]';

const MAX_FEATURES = 5;

/**
 * Description, feature bullets, specification table and images from a product page.
 * Anything the page does not have comes back empty.
 */
export function extractProductPage(html: string, url: string, baseUrl: string): ProductPageDetails {
    const $ = load(html);

    const description = cleanText($(DESCRIPTION_SELECTOR).first().text());

    const features: string[] = [];
    for (const el of $(FEATURE_SELECTOR).toArray()) {
        if (features.length >= MAX_FEATURES) break;
        const text = cleanText($(el).text());
        if (text && !features.includes(text)) features.push(text);
    }

    // <dt>/<dd> pairs or two-cell rows inside a specifications section
    const specifications: Record<string, string> = {};
    $('[class*="spec"] dt').each((_, dt) => {
        const label = cleanText($(dt).text());
        const value = cleanText($(dt).next('dd').text());
        if (label && value) specifications[label] = value;
    });
    $('[class*="spec"] tr').each((_, row) => {
        const cells = $(row).children('th, td');
        if (cells.length !== 2) return;
        const label = cleanText(cells.eq(0).text());
        const value = cleanText(cells.eq(1).text());
        if (label && value) specifications[label] = value;
    });

    const images: string[] = [];
    for (const el of $(IMAGE_SELECTOR).toArray()) {
        const $img = $(el);
        const src = resolveUrl($img.attr('src') || $img.attr('data-src'), baseUrl);
        if (src && !images.includes(src)) images.push(src);
    }

    return { url, description, features, specifications, images };
}
