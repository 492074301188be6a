import axios from 'axios';
import { TransportFailure } from './errors';

export interface HttpResponse {
    status: number;
    body: string;
}

/** Minimal GET contract the retriever needs. Implementations throw TransportFailure. */
export interface HttpClient {
    get(url: string, headers: Record<string, string>, timeoutMs: number): Promise<HttpResponse>;
}

// Fixed desktop-browser header set sent with every live fetch
export const BROWSER_HEADERS: Readonly<Record<string, string>> = Object.freeze({
    'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Accept-Encoding': 'gzip, deflate, br',
    'Connection': 'keep-alive',
    'Upgrade-Insecure-Requests': '1'
});

export class AxiosHttpClient implements HttpClient {
    async get(url: string, headers: Record<string, string>, timeoutMs: number): Promise<HttpResponse> {
        try {
            const response = await axios.get<string>(url, {
                headers,
                // `timeout` only covers an idle socket; the signal caps the whole request
                timeout: timeoutMs,
                signal: AbortSignal.timeout(timeoutMs),
                responseType: 'text',
                maxRedirects: 5,
                validateStatus: (status) => status >= 200 && status < 300
            });
            return { status: response.status, body: String(response.data ?? '') };
        } catch (error: unknown) {
            if (axios.isAxiosError(error)) {
                const timedOut = error.code === 'ECONNABORTED'
                    || error.code === 'ETIMEDOUT'
                    || error.code === 'ERR_CANCELED';
                const reason = timedOut ? `timed out after ${timeoutMs}ms` : error.message;
                throw new TransportFailure(url, reason, error.response?.status);
            }
            throw new TransportFailure(url, error instanceof Error ? error.message : String(error));
        }
    }
}
