import { afterEach, describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('uses defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            retailerBaseUrl: 'https://www.wayfair.com',
            fetchTimeoutMs: 12000,
            cacheTtlSeconds: 300,
            liveFetchEnabled: true
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            PORT: '8080',
            RETAILER_BASE_URL: 'https://retailer.test',
            FETCH_TIMEOUT_MS: '2500',
            CACHE_TTL_SECONDS: '60',
            LIVE_FETCH_ENABLED: 'off'
        });

        expect(config).toEqual({
            port: 8080,
            retailerBaseUrl: 'https://retailer.test',
            fetchTimeoutMs: 2500,
            cacheTtlSeconds: 60,
            liveFetchEnabled: false
        });
    });

    it('ignores invalid numbers', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        expect(loadConfig({ CACHE_TTL_SECONDS: 'soon' }).cacheTtlSeconds).toBe(300);
        expect(loadConfig({ FETCH_TIMEOUT_MS: '-1' }).fetchTimeoutMs).toBe(12000);
        expect(warn).toHaveBeenCalledTimes(2);
    });
});
