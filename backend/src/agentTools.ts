// Tool definitions advertised to AI agents (served at GET /mcp/tools)

export interface AgentTool {
    name: string;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, Record<string, unknown>>;
        required?: string[];
    };
}

export const AGENT_TOOLS: readonly AgentTool[] = [
    {
        name: 'search_products',
        description: 'Search the furniture catalog. Results come from the live retailer site when it can be read, otherwise from a curated fallback catalog; provenanceCounts says which.',
        inputSchema: {
            type: 'object',
            properties: {
                query: { type: 'string', description: "Search text, e.g. 'sectional sofa' or 'queen bed frame'" },
                category: { type: 'string', description: 'Only keep products whose name contains this text' },
                max_price: { type: 'number', description: 'Maximum price (inclusive)' },
                min_rating: { type: 'number', description: 'Minimum rating from 0 to 5 (inclusive)' },
                limit: { type: 'integer', description: 'Maximum number of results (default: 10)', minimum: 1 },
                sort_by: { type: 'string', enum: ['relevance', 'price_asc', 'price_desc', 'rating'] }
            },
            required: ['query']
        }
    },
    {
        name: 'get_product_details',
        description: 'Get one product by id together with related products',
        inputSchema: {
            type: 'object',
            properties: {
                product_id: { type: 'string', description: 'Product id from a previous search' }
            },
            required: ['product_id']
        }
    },
    {
        name: 'compare_products',
        description: 'Compare two or more products: price and rating ranges, best value and highest rated',
        inputSchema: {
            type: 'object',
            properties: {
                product_ids: { type: 'array', items: { type: 'string' }, description: 'Ids of the products to compare' }
            },
            required: ['product_ids']
        }
    },
    {
        name: 'list_categories',
        description: 'List the catalog categories',
        inputSchema: { type: 'object', properties: {} }
    },
    {
        name: 'list_brands',
        description: 'List the brands in the catalog',
        inputSchema: { type: 'object', properties: {} }
    },
    {
        name: 'get_product_page',
        description: 'Read description, features, specifications and images from a product page URL on the retailer site',
        inputSchema: {
            type: 'object',
            properties: {
                url: { type: 'string', description: 'Product page URL, e.g. one returned by search_products' }
            },
            required: ['url']
        }
    },
    {
        name: 'get_deals',
        description: 'Products discounted by at least the given percentage',
        inputSchema: {
            type: 'object',
            properties: {
                min_discount: { type: 'integer', description: 'Minimum discount percentage (default: 20)' }
            }
        }
    }
];
