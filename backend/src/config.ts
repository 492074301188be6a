import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
    port: number;
    retailerBaseUrl: string;
    fetchTimeoutMs: number;
    cacheTtlSeconds: number;
    liveFetchEnabled: boolean;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
        console.warn(`[Config] Ignoring invalid ${name}="${raw}", using ${fallback}`);
        return fallback;
    }
    return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    return !['false', '0', 'no', 'off'].includes(raw);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return {
        port: readNumber(env, 'PORT', 3000),
        retailerBaseUrl: env.RETAILER_BASE_URL?.trim() || 'https://www.wayfair.com',
        fetchTimeoutMs: readNumber(env, 'FETCH_TIMEOUT_MS', 12000),
        cacheTtlSeconds: readNumber(env, 'CACHE_TTL_SECONDS', 300),
        liveFetchEnabled: readBoolean(env, 'LIVE_FETCH_ENABLED', true)
    };
}
