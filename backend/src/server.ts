import { createApp } from './app';
import { loadConfig } from './config';
import { defaultCatalog } from './services/catalog';
import { AxiosHttpClient } from './services/httpClient';
import { ProductService } from './services/productService';
import { ResultCache } from './services/resultCache';
import { ProductRetriever } from './services/retriever';

// --- Setup ---

const config = loadConfig();

const retriever = new ProductRetriever({
    http: new AxiosHttpClient(),
    catalog: defaultCatalog,
    cache: new ResultCache(config.cacheTtlSeconds),
    baseUrl: config.retailerBaseUrl,
    timeoutMs: config.fetchTimeoutMs,
    liveFetchEnabled: config.liveFetchEnabled
});

const service = new ProductService(retriever, defaultCatalog);
const app = createApp(service);

app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`[Server] Live retrieval from ${config.retailerBaseUrl} ${config.liveFetchEnabled ? 'enabled' : 'disabled'}, cache TTL ${config.cacheTtlSeconds}s`);
    console.log(`[Server] Categories: ${service.listCategories().join(', ')}`);
});
