/**
 * Shared builders and in-process fakes for the test suites.
 */

import type {
    AdapterContext,
    AdapterKind,
    CrawlRun,
    JobPosting,
    NewSource,
    Source,
    SourceOutcome,
} from '../sources/types.js';
import type { HttpClient, HttpRequestOptions } from '../utils/httpClient.js';
import { NEUTRAL_PRIORITY } from '../utils/healthTracker.js';

export function makeSource(overrides: Partial<Source> & { id: string; adapterKind?: AdapterKind }): Source {
    return {
        name: overrides.id,
        adapterKind: 'ats-json',
        config: { vendor: 'greenhouse', slug: overrides.id },
        active: true,
        consecutiveEmpty: 0,
        consecutiveFailures: 0,
        successRate: null,
        priorityScore: NEUTRAL_PRIORITY,
        lastCrawledAt: null,
        deactivatedAt: null,
        deactivationReason: null,
        rateLimitedUntil: null,
        ...overrides,
    };
}

export function newSource(id: string, config: Record<string, unknown> = { vendor: 'greenhouse', slug: id }): NewSource {
    return { id, name: id, adapterKind: 'ats-json', config };
}

const T0 = '2026-03-02T09:00:00.000Z';

export function makePosting(overrides: Partial<JobPosting> & { id: string }): JobPosting {
    const url = overrides.url ?? `https://jobs.example.com/${overrides.id}`;
    return {
        sourceId: 'acme',
        fingerprint: `fp-${overrides.id}`,
        title: `Role ${overrides.id}`,
        url,
        canonicalUrl: url,
        location: null,
        postedAt: null,
        description: null,
        firstSeenAt: T0,
        lastSeenAt: T0,
        missCount: 0,
        archived: false,
        archivedAt: null,
        ...overrides,
    };
}

export function makeOutcome(overrides: Partial<SourceOutcome> & { sourceId: string }): SourceOutcome {
    return {
        sourceName: overrides.sourceId,
        adapterKind: 'ats-json',
        status: 'success',
        errorKind: null,
        errorDetail: null,
        jobsFound: 0,
        newJobs: 0,
        updatedJobs: 0,
        unchangedJobs: 0,
        archivedJobs: 0,
        droppedCandidates: 0,
        attempts: 1,
        startedAt: T0,
        finishedAt: T0,
        durationMs: 0,
        deactivated: false,
        interrupted: false,
        ...overrides,
    };
}

export function makeRun(overrides: Partial<CrawlRun> = {}): CrawlRun {
    return {
        id: 'run-1',
        state: 'completed',
        trigger: 'manual',
        requestedSourceIds: null,
        startedAt: T0,
        finishedAt: '2026-03-02T09:05:00.000Z',
        outcomes: [],
        totals: { sources: 0, succeeded: 0, empty: 0, failed: 0, jobsFound: 0, newJobs: 0, updatedJobs: 0, archivedJobs: 0 },
        deactivatedSourceIds: [],
        skippedSourceIds: [],
        failureReason: null,
        cancelReason: null,
        ...overrides,
    };
}

type Responder = (url: string) => unknown;

/**
 * HttpClient answering from a url → response table. An Error response is
 * thrown; `onCall` registers a function computed per request.
 */
export class FakeHttpClient implements HttpClient {
    readonly calls: string[] = [];
    private readonly routes = new Map<string, Responder>();

    on(url: string, response: unknown): this {
        return this.onCall(url, () => {
            if (response instanceof Error) throw response;
            return response;
        });
    }

    onCall(url: string, responder: Responder): this {
        this.routes.set(url, responder);
        return this;
    }

    async getText(url: string, options: HttpRequestOptions): Promise<string> {
        const value = await this.resolve(url, options);
        return typeof value === 'string' ? value : JSON.stringify(value);
    }

    async getJson(url: string, options: HttpRequestOptions): Promise<unknown> {
        const value = await this.resolve(url, options);
        return typeof value === 'string' ? JSON.parse(value) : value;
    }

    private async resolve(url: string, options: HttpRequestOptions): Promise<unknown> {
        this.calls.push(url);
        if (options.signal.aborted) throw options.signal.reason;
        const responder = this.routes.get(url);
        if (!responder) throw new Error(`FakeHttpClient: no route for ${url}`);
        return responder(url);
    }
}

export function adapterContext(http: HttpClient, overrides: Partial<AdapterContext> = {}): AdapterContext {
    return {
        signal: new AbortController().signal,
        http,
        timeoutMs: 5_000,
        aiBudgetChars: 10_000,
        ...overrides,
    };
}
