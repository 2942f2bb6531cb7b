import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { makeOutcome, makePosting, makeRun } from '../testing/fixtures.js';
import type { SqlClient, SqlExecutor, SqlResult } from './db.js';
import type { ReconcileResult } from './dedup.js';
import { PgJobStore } from './jobStore.js';

interface RecordedQuery {
    sql: string;
    values: unknown[] | undefined;
    inTransaction: boolean;
}

type Responder = (sql: string, values: unknown[] | undefined) => Record<string, unknown>[];

/** Records every statement and answers from `respond`; no database involved. */
class FakeSqlClient implements SqlClient {
    readonly queries: RecordedQuery[] = [];

    constructor(private readonly respond: Responder = () => []) {}

    query(sql: string, values?: unknown[]): Promise<SqlResult> {
        return this.run(sql, values, false);
    }

    async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
        return fn({ query: (sql, values) => this.run(sql, values, true) });
    }

    async close(): Promise<void> {}

    private async run(sql: string, values: unknown[] | undefined, inTransaction: boolean): Promise<SqlResult> {
        const normalized = sql.replace(/\s+/g, ' ').trim();
        this.queries.push({ sql: normalized, values, inTransaction });
        const rows = this.respond(normalized, values);
        return { rows, rowCount: rows.length };
    }
}

const NOW = '2026-03-02T09:00:00.000Z';

const sourceRow = {
    id: 'acme',
    name: 'Acme',
    adapter_kind: 'ats-json',
    config: { vendor: 'greenhouse', slug: 'acme' },
    active: true,
    consecutive_empty: '2',
    consecutive_failures: 0,
    success_rate: '0.75',
    priority_score: '0.9',
    last_crawled_at: new Date('2026-03-01T08:00:00Z'),
    deactivated_at: null,
    deactivation_reason: null,
    rate_limited_until: null,
};

const insertedPostingRow = {
    id: 17,
    source_id: 'acme',
    fingerprint: 'fp-new',
    title: 'New role',
    url: 'https://jobs.example.com/new',
    canonical_url: 'https://jobs.example.com/new',
    location: null,
    posted_at: null,
    description: null,
    first_seen_at: NOW,
    last_seen_at: new Date(NOW),
    miss_count: 0,
    archived: false,
    archived_at: null,
};

describe('PgJobStore', () => {
    it('filters sources and maps rows to camelCase', async () => {
        const sql = new FakeSqlClient(() => [sourceRow]);
        const sources = await new PgJobStore(sql).listSources({ activeOnly: true, ids: ['acme', 'globex'] });

        expect(sql.queries[0].sql).toContain('FROM sources WHERE active = TRUE AND id = ANY($1::text[]) ORDER BY');
        expect(sql.queries[0].values).toEqual([['acme', 'globex']]);
        expect(sources).toEqual([{
            id: 'acme',
            name: 'Acme',
            adapterKind: 'ats-json',
            config: { vendor: 'greenhouse', slug: 'acme' },
            active: true,
            consecutiveEmpty: 2,
            consecutiveFailures: 0,
            successRate: 0.75,
            priorityScore: 0.9,
            lastCrawledAt: '2026-03-01T08:00:00.000Z',
            deactivatedAt: null,
            deactivationReason: null,
            rateLimitedUntil: null,
        }]);
    });

    it('lists every source without a WHERE clause', async () => {
        const sql = new FakeSqlClient();
        expect(await new PgJobStore(sql).listSources()).toEqual([]);
        expect(sql.queries[0].sql).not.toContain('WHERE');
    });

    it('returns null for unknown sources', async () => {
        const store = new PgJobStore(new FakeSqlClient());
        expect(await store.getSource('nope')).toBeNull();
        expect(await store.reactivateSource('nope')).toBeNull();
    });

    it('fails loudly on column drift', async () => {
        const store = new PgJobStore(new FakeSqlClient(() => [{ id: 'acme', name: 'Acme' }]));
        await expect(store.getSource('acme')).rejects.toBeInstanceOf(ZodError);
    });

    it('stores source config as JSON', async () => {
        const sql = new FakeSqlClient(() => [sourceRow]);
        await new PgJobStore(sql).upsertSource({
            id: 'acme',
            name: 'Acme',
            adapterKind: 'ats-json',
            config: { vendor: 'greenhouse', slug: 'acme' },
        });
        expect(sql.queries[0].values).toEqual(['acme', 'Acme', 'ats-json', '{"vendor":"greenhouse","slug":"acme"}']);
    });

    it('writes a reconciliation pass in one transaction', async () => {
        const sql = new FakeSqlClient((statement) =>
            statement.startsWith('INSERT INTO job_postings') ? [insertedPostingRow] : []
        );
        const result: ReconcileResult = {
            created: [{
                sourceId: 'acme',
                fingerprint: 'fp-new',
                title: 'New role',
                url: 'https://jobs.example.com/new',
                canonicalUrl: 'https://jobs.example.com/new',
                location: null,
                postedAt: null,
                description: null,
                firstSeenAt: NOW,
                lastSeenAt: NOW,
                missCount: 0,
                archived: false,
                archivedAt: null,
            }],
            updated: [makePosting({ id: '2', title: 'Renamed', lastSeenAt: NOW })],
            unchanged: [makePosting({ id: '3', lastSeenAt: NOW })],
            missed: [makePosting({ id: '4', missCount: 1 })],
            archived: [makePosting({ id: '5', missCount: 3, archived: true, archivedAt: NOW })],
            duplicateCandidates: 0,
        };

        const created = await new PgJobStore(sql).applyReconciliation('acme', result);

        expect(created).toEqual([{
            id: '17',
            sourceId: 'acme',
            fingerprint: 'fp-new',
            title: 'New role',
            url: 'https://jobs.example.com/new',
            canonicalUrl: 'https://jobs.example.com/new',
            location: null,
            postedAt: null,
            description: null,
            firstSeenAt: NOW,
            lastSeenAt: NOW,
            missCount: 0,
            archived: false,
            archivedAt: null,
        }]);
        expect(sql.queries.every((q) => q.inTransaction)).toBe(true);
        expect(sql.queries.map((q) => q.sql.slice(0, 40))).toEqual([
            'INSERT INTO job_postings (source_id, fin',
            'UPDATE job_postings SET title = $2, url ',
            'UPDATE job_postings SET last_seen_at = $',
            'UPDATE job_postings SET miss_count = mis',
            'UPDATE job_postings SET miss_count = mis',
        ]);
        expect(sql.queries[1].values?.slice(0, 2)).toEqual(['2', 'Renamed']);
        expect(sql.queries[2].values).toEqual([['3'], NOW]);
        expect(sql.queries[3].values).toEqual([['4']]);
        expect(sql.queries[4].sql).toContain('archived = TRUE');
        expect(sql.queries[4].values).toEqual([['5'], NOW]);
    });

    it('issues nothing for an empty reconciliation', async () => {
        const sql = new FakeSqlClient();
        const empty: ReconcileResult = { created: [], updated: [], unchanged: [], missed: [], archived: [], duplicateCandidates: 0 };
        expect(await new PgJobStore(sql).applyReconciliation('acme', empty)).toEqual([]);
        expect(sql.queries).toEqual([]);
    });

    it('returns outcome history oldest first', async () => {
        const sql = new FakeSqlClient(() => [
            { status: 'error', error_kind: 'Timeout', jobs_found: '0' },
            { status: 'success', error_kind: null, jobs_found: 5 },
        ]);
        expect(await new PgJobStore(sql).loadOutcomeHistory('acme', 10)).toEqual([
            { status: 'success', errorKind: null, jobsFound: 5 },
            { status: 'error', errorKind: 'Timeout', jobsFound: 0 },
        ]);
        expect(sql.queries[0].values).toEqual(['acme', 10]);
    });

    it('saves a run and its outcomes together', async () => {
        const sql = new FakeSqlClient();
        const run = makeRun({
            outcomes: [makeOutcome({ sourceId: 'alpha' }), makeOutcome({ sourceId: 'beta', status: 'empty' })],
        });

        await new PgJobStore(sql).saveRun(run);

        expect(sql.queries).toHaveLength(3);
        expect(sql.queries.every((q) => q.inTransaction)).toBe(true);
        expect(sql.queries[0].sql.startsWith('INSERT INTO crawl_runs')).toBe(true);
        expect(sql.queries[0].values?.[6]).toBe(JSON.stringify(run.totals));
        expect(sql.queries[2].values?.slice(0, 5)).toEqual(['run-1', 'beta', 'beta', 'ats-json', 'empty']);
    });

    it('parses active and recent runs', async () => {
        const started = new Date('2026-03-02T08:00:00Z');
        const sql = new FakeSqlClient((statement) => statement.includes("state = 'running'")
            ? [{ id: 'run-9', requested_source_ids: null, started_at: started }]
            : [{
                id: 'run-8',
                state: 'completed',
                trigger: 'scheduled',
                requested_source_ids: ['acme'],
                started_at: started,
                finished_at: null,
                totals: { sources: 1, succeeded: 1, empty: 0, failed: 0, jobsFound: 4, newJobs: 1, updatedJobs: 0, archivedJobs: 0 },
                deactivated_source_ids: [],
                skipped_source_ids: [],
                failure_reason: null,
                cancel_reason: null,
            }]);
        const store = new PgJobStore(sql);

        expect(await store.listActiveRuns()).toEqual([
            { id: 'run-9', requestedSourceIds: null, startedAt: '2026-03-02T08:00:00.000Z' },
        ]);
        const [recent] = await store.listRecentRuns(5);
        expect(recent).toMatchObject({ id: 'run-8', trigger: 'scheduled', requestedSourceIds: ['acme'] });
        expect(recent.totals.jobsFound).toBe(4);
    });

    it('retires a source and archives its postings in one transaction', async () => {
        const sql = new FakeSqlClient((statement) => statement.startsWith('UPDATE sources') ? [sourceRow] : []);

        const retired = await new PgJobStore(sql).retireSource('acme', NOW);

        expect(retired?.source.id).toBe('acme');
        expect(sql.queries.map((q) => [q.sql.slice(0, 25), q.inTransaction])).toEqual([
            ['UPDATE sources SET active', true],
            ['UPDATE job_postings SET a', true],
        ]);
        expect(sql.queries[1].values).toEqual(['acme', NOW]);
    });

    it('reports an unreachable database from ping', async () => {
        const sql = new FakeSqlClient(() => {
            throw new Error('connect ECONNREFUSED');
        });
        expect(await new PgJobStore(sql).ping()).toBe(false);
    });
});
