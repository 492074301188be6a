import express, { Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AGENT_TOOLS } from './agentTools';
import { InvalidQueryError, isRequestError } from './services/errors';
import { isSortOption, ProductService, SORT_OPTIONS } from './services/productService';
import { SearchQuery } from './services/types';

const SERVICE_NAME = 'Furniture Product Search Server';
const SERVICE_VERSION = '1.0.0';

// --- Request parsing helpers ---

function optionalNumber(value: unknown, field: string): number | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidQueryError(`${field} must be a number`);
    }
    return parsed;
}

function optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    if (typeof value !== 'string') {
        throw new InvalidQueryError(`${field} must be a string`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Accepts both the agent tool field names (snake_case) and camelCase
export function parseSearchBody(body: unknown): SearchQuery {
    if (!isRecord(body)) {
        throw new InvalidQueryError('Request body must be a JSON object');
    }
    const text = body.query ?? body.text;
    if (typeof text !== 'string') {
        throw new InvalidQueryError('Query text is required');
    }
    const sortBy = optionalString(body.sort_by ?? body.sortBy, 'sort_by');
    if (sortBy !== undefined && !isSortOption(sortBy)) {
        throw new InvalidQueryError(`sort_by must be one of: ${SORT_OPTIONS.join(', ')}`);
    }

    return {
        text,
        category: optionalString(body.category, 'category'),
        maxPrice: optionalNumber(body.max_price ?? body.maxPrice, 'max_price'),
        minRating: optionalNumber(body.min_rating ?? body.minRating, 'min_rating'),
        limit: optionalNumber(body.limit, 'limit'),
        sortBy
    };
}

function parseIds(body: unknown): string[] {
    const ids = isRecord(body) ? body.product_ids ?? body.productIds ?? body.ids : undefined;
    if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
        throw new InvalidQueryError('product_ids must be an array of strings');
    }
    return ids;
}

function sendError(res: Response, error: unknown, context: string): void {
    if (isRequestError(error)) {
        res.status(error.statusCode).json({ success: false, error: error.message, code: error.code });
        return;
    }
    console.error(`[Server] ${context} failed:`, error);
    res.status(500).json({ success: false, error: `${context} failed` });
}

export function createApp(service: ProductService): express.Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(helmet({
        contentSecurityPolicy: false,
    }));
    app.use(express.json());

    // --- Routes ---

    app.get('/', (_req: Request, res: Response) => {
        res.json({
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
            endpoints: {
                'GET /health': 'Health check',
                'POST /api/search': 'Search products',
                'POST /api/compare': 'Compare products by id',
                'GET /api/categories': 'List categories',
                'GET /api/brands': 'List brands',
                'GET /api/products/:id': 'Product details',
                'GET /api/product-page?url=': 'Details read from a product page',
                'GET /api/deals': 'Discounted products',
                'GET /mcp/tools': 'Agent tool definitions'
            }
        });
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'healthy', timestamp: new Date().toISOString(), service: SERVICE_NAME });
    });

    app.post('/api/search', async (req: Request, res: Response) => {
        try {
            const query = parseSearchBody(req.body);
            console.log(`[Server] Search request: "${query.text}"`);
            const result = await service.search(query);
            res.json({ success: true, ...result });
        } catch (error) {
            sendError(res, error, 'Search');
        }
    });

    app.post('/api/compare', (req: Request, res: Response) => {
        try {
            const comparison = service.compareItems(parseIds(req.body));
            res.json({ success: true, comparison });
        } catch (error) {
            sendError(res, error, 'Compare');
        }
    });

    app.get('/api/categories', (_req: Request, res: Response) => {
        res.json({ success: true, categories: service.listCategories() });
    });

    app.get('/api/brands', (_req: Request, res: Response) => {
        res.json({ success: true, brands: service.listBrands() });
    });

    app.get('/api/product-page', async (req: Request, res: Response) => {
        try {
            const url = optionalString(req.query.url, 'url');
            if (url === undefined) {
                throw new InvalidQueryError('url is required');
            }
            res.json({ success: true, details: await service.getProductPage(url) });
        } catch (error) {
            sendError(res, error, 'Product page');
        }
    });

    app.get('/api/products/:id', (req: Request, res: Response) => {
        try {
            res.json({ success: true, ...service.getProductDetails(req.params.id) });
        } catch (error) {
            sendError(res, error, 'Product lookup');
        }
    });

    app.get('/api/deals', (req: Request, res: Response) => {
        try {
            const minDiscount = optionalNumber(req.query.min_discount, 'min_discount');
            res.json({ success: true, ...service.getDeals(minDiscount) });
        } catch (error) {
            sendError(res, error, 'Deals');
        }
    });

    app.get('/mcp/tools', (_req: Request, res: Response) => {
        res.json({ tools: AGENT_TOOLS });
    });

    return app;
}
