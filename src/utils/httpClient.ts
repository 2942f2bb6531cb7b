/**
 * src/utils/httpClient.ts
 *
 * The one place adapters perform HTTP GETs.
 *
 *  • Direct requests go through global fetch() with the caller's AbortSignal.
 *  • When PROXY_URL is configured, requests go through got-scraping instead,
 *    which also supplies browser-like header fingerprints.
 *  • Non-2xx responses are converted to the crawl error taxonomy via
 *    classifyHttpStatus(); transport failures become retryable
 *    SourceUnreachable errors.
 *
 * Retrying is the orchestrator's job. This client makes exactly one request.
 */

import { log } from 'crawlee';
import { SourceUnreachableError, classifyHttpStatus, errorMessage } from '../sources/errors.js';
import { parseRetryAfter } from './backoff.js';

export interface HttpRequestOptions {
    signal: AbortSignal;
    headers?: Record<string, string>;
    /** Upper bound for proxied requests, which do not observe the signal. */
    timeoutMs?: number;
    /** Refuse the request when the site's robots.txt disallows it. */
    checkRobots?: boolean;
}

export interface HttpClient {
    getText(url: string, options: HttpRequestOptions): Promise<string>;
    getJson(url: string, options: HttpRequestOptions): Promise<unknown>;
}

export interface HttpClientConfig {
    userAgent: string;
    proxyUrl?: string;
}

interface RawResponse {
    status: number;
    body: string;
    retryAfter: string | null;
}

const DEFAULT_PROXY_TIMEOUT_MS = 30_000;

export class FetchHttpClient implements HttpClient {
    private readonly userAgent: string;
    private readonly proxyUrl: string | null;

    constructor(config: HttpClientConfig) {
        this.userAgent = config.userAgent;
        this.proxyUrl = config.proxyUrl ? config.proxyUrl : null;
    }

    async getText(url: string, options: HttpRequestOptions): Promise<string> {
        const res = this.proxyUrl
            ? await this.viaProxy(url, this.proxyUrl, options)
            : await this.viaFetch(url, options);

        if (res.status < 200 || res.status >= 300) {
            throw classifyHttpStatus(res.status, url, parseRetryAfter(res.retryAfter));
        }
        return res.body;
    }

    async getJson(url: string, options: HttpRequestOptions): Promise<unknown> {
        const body = await this.getText(url, {
            ...options,
            headers: { Accept: 'application/json', ...options.headers },
        });
        try {
            return JSON.parse(body);
        } catch (err) {
            throw new SourceUnreachableError(`Non-JSON response from ${url}`, { cause: err });
        }
    }

    private headersFor(options: HttpRequestOptions): Record<string, string> {
        return {
            'User-Agent': this.userAgent,
            'Accept-Language': 'en-US,en;q=0.9',
            ...options.headers,
        };
    }

    private async viaFetch(url: string, options: HttpRequestOptions): Promise<RawResponse> {
        try {
            const response = await fetch(url, {
                headers: this.headersFor(options),
                signal: options.signal,
                redirect: 'follow',
            });
            return {
                status: response.status,
                body: await response.text(),
                retryAfter: response.headers.get('retry-after'),
            };
        } catch (err) {
            if (options.signal.aborted) throw options.signal.reason;
            throw new SourceUnreachableError(`Request to ${url} failed: ${errorMessage(err)}`, {
                retryable: true,
                cause: err,
            });
        }
    }

    private async viaProxy(url: string, proxyUrl: string, options: HttpRequestOptions): Promise<RawResponse> {
        log.debug(`[Http] GET ${url} via proxy`);
        const { gotScraping } = await import('got-scraping');
        try {
            const response = await gotScraping({
                url,
                proxyUrl,
                headers: this.headersFor(options),
                throwHttpErrors: false,
                timeout: { request: options.timeoutMs ?? DEFAULT_PROXY_TIMEOUT_MS },
                retry: { limit: 0 },
            });
            return {
                status: response.statusCode,
                body: response.body,
                retryAfter: response.headers['retry-after'] ?? null,
            };
        } catch (err) {
            if (options.signal.aborted) throw options.signal.reason;
            throw new SourceUnreachableError(`Proxied request to ${url} failed: ${errorMessage(err)}`, {
                retryable: true,
                cause: err,
            });
        }
    }
}
