/**
 * src/utils/politeHttpClient.ts
 *
 * Wraps an HttpClient so every request passes the per-host gate, and requests
 * made with `checkRobots` are refused when the site's robots.txt disallows
 * them. robots.txt itself is fetched through the same gate.
 */

import type { Env } from '../config/envSchema.js';
import { SourceUnreachableError } from '../sources/errors.js';
import { HostGate } from './hostGate.js';
import { FetchHttpClient, type HttpClient, type HttpRequestOptions } from './httpClient.js';
import { RobotsCache } from './robots.js';

export interface PoliteHttpOptions {
    respectRobotsTxt: boolean;
    robotsCacheTtlMs: number;
}

export class PoliteHttpClient implements HttpClient {
    private readonly robots: RobotsCache | null;

    constructor(
        private readonly inner: HttpClient,
        private readonly gate: HostGate,
        options: PoliteHttpOptions
    ) {
        this.robots = options.respectRobotsTxt
            ? new RobotsCache(
                (robotsUrl, signal) => this.gate.run(robotsUrl, signal, () => this.inner.getText(robotsUrl, { signal })),
                options.robotsCacheTtlMs
            )
            : null;
    }

    async getText(url: string, options: HttpRequestOptions): Promise<string> {
        await this.assertAllowed(url, options);
        return this.gate.run(url, options.signal, () => this.inner.getText(url, options));
    }

    async getJson(url: string, options: HttpRequestOptions): Promise<unknown> {
        await this.assertAllowed(url, options);
        return this.gate.run(url, options.signal, () => this.inner.getJson(url, options));
    }

    private async assertAllowed(url: string, options: HttpRequestOptions): Promise<void> {
        if (!options.checkRobots || !this.robots) return;
        if (!(await this.robots.isAllowed(url, options.signal))) {
            throw new SourceUnreachableError(`robots.txt disallows ${url}`);
        }
    }
}

export function httpClientFromEnv(env: Env): PoliteHttpClient {
    return new PoliteHttpClient(
        new FetchHttpClient({ userAgent: env.HTTP_USER_AGENT, proxyUrl: env.PROXY_URL || undefined }),
        new HostGate({
            maxConcurrentPerHost: env.HOST_MAX_CONCURRENCY,
            minIntervalMs: env.HOST_MIN_INTERVAL_MS,
            failureThreshold: env.HOST_FAILURE_THRESHOLD,
            cooldownMs: env.HOST_COOLDOWN_MS,
        }),
        { respectRobotsTxt: env.RESPECT_ROBOTS_TXT, robotsCacheTtlMs: env.ROBOTS_CACHE_TTL_MS }
    );
}
