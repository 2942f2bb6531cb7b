/**
 * src/utils/jobStore.ts
 *
 * Persistence for sources, postings and crawl runs.
 *
 * Design
 * ──────
 * • JobStore is the interface the orchestrator and CLIs depend on. Every
 *   call is atomic and durable on return.
 * • PgJobStore implements it on PostgreSQL. Rows coming back from the
 *   database are parsed with zod, so column drift fails loudly.
 * • Postings are unique per (source_id, fingerprint); inserts use
 *   ON CONFLICT so a retried reconciliation cannot create duplicates.
 * • Errors propagate. The orchestrator records them as PersistenceError.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { ADAPTER_KINDS } from '../sources/types.js';
import type {
    CrawlRun,
    JobPosting,
    NewSource,
    OutcomeSample,
    Source,
    SourceHealthFields,
    SourceOutcome,
} from '../sources/types.js';
import type { ReconcileResult } from './dedup.js';
import { pingDb, type SqlClient, type SqlExecutor } from './db.js';

// ─── Interface ────────────────────────────────────────────────────────────────

export interface SourceFilter {
    ids?: readonly string[];
    activeOnly?: boolean;
}

export interface ActiveRunRecord {
    id: string;
    requestedSourceIds: string[] | null;
    startedAt: string;
}

export type RunRecord = Omit<CrawlRun, 'outcomes'>;

export interface RetiredSource {
    source: Source;
    archivedPostings: number;
}

export interface JobStore {
    ping(): Promise<boolean>;
    listSources(filter?: SourceFilter): Promise<Source[]>;
    getSource(id: string): Promise<Source | null>;
    upsertSource(source: NewSource): Promise<Source>;
    saveSourceHealth(sourceId: string, health: SourceHealthFields): Promise<void>;
    /** Re-enables a source and clears both streak counters. */
    reactivateSource(sourceId: string): Promise<Source | null>;
    /** Deactivates a source for good and archives every posting it still has open. */
    retireSource(sourceId: string, at: string): Promise<RetiredSource | null>;
    /** Most recent outcomes for a source that count toward health, oldest first. */
    loadOutcomeHistory(sourceId: string, limit: number): Promise<OutcomeSample[]>;
    /** All postings of a source, archived ones included. */
    loadPostings(sourceId: string): Promise<JobPosting[]>;
    /** Persists one reconciliation pass atomically; returns the created postings with ids. */
    applyReconciliation(sourceId: string, result: ReconcileResult): Promise<JobPosting[]>;
    recordOutcome(runId: string, outcome: SourceOutcome): Promise<void>;
    saveRun(run: CrawlRun): Promise<void>;
    listActiveRuns(): Promise<ActiveRunRecord[]>;
    listRecentRuns(limit: number): Promise<RunRecord[]>;
}

// ─── Row schemas ──────────────────────────────────────────────────────────────

const timestamp = z
    .union([z.date(), z.string()])
    .transform((v) => (v instanceof Date ? v : new Date(v)).toISOString());

const count = z.coerce.number().int();

const SourceRowSchema = z.object({
    id: z.string(),
    name: z.string(),
    adapter_kind: z.enum(ADAPTER_KINDS),
    config: z.record(z.string(), z.unknown()),
    active: z.boolean(),
    consecutive_empty: count,
    consecutive_failures: count,
    success_rate: z.coerce.number().nullable(),
    priority_score: z.coerce.number(),
    last_crawled_at: timestamp.nullable(),
    deactivated_at: timestamp.nullable(),
    deactivation_reason: z.string().nullable(),
    rate_limited_until: timestamp.nullable(),
}).transform((row): Source => ({
    id: row.id,
    name: row.name,
    adapterKind: row.adapter_kind,
    config: row.config,
    active: row.active,
    consecutiveEmpty: row.consecutive_empty,
    consecutiveFailures: row.consecutive_failures,
    successRate: row.success_rate,
    priorityScore: row.priority_score,
    lastCrawledAt: row.last_crawled_at,
    deactivatedAt: row.deactivated_at,
    deactivationReason: row.deactivation_reason,
    rateLimitedUntil: row.rate_limited_until,
}));

const PostingRowSchema = z.object({
    id: z.union([z.string(), z.number(), z.bigint()]).transform(String),
    source_id: z.string(),
    fingerprint: z.string(),
    title: z.string(),
    url: z.string(),
    canonical_url: z.string(),
    location: z.string().nullable(),
    posted_at: timestamp.nullable(),
    description: z.string().nullable(),
    first_seen_at: timestamp,
    last_seen_at: timestamp,
    miss_count: count,
    archived: z.boolean(),
    archived_at: timestamp.nullable(),
}).transform((row): JobPosting => ({
    id: row.id,
    sourceId: row.source_id,
    fingerprint: row.fingerprint,
    title: row.title,
    url: row.url,
    canonicalUrl: row.canonical_url,
    location: row.location,
    postedAt: row.posted_at,
    description: row.description,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    missCount: row.miss_count,
    archived: row.archived,
    archivedAt: row.archived_at,
}));

const OutcomeSampleRowSchema = z.object({
    status: z.enum(['success', 'empty', 'error', 'timeout']),
    error_kind: z
        .enum(['SourceUnreachable', 'Timeout', 'RateLimited', 'ExtractionFailed', 'PersistenceError', 'InvalidConfig'])
        .nullable(),
    jobs_found: count,
}).transform((row): OutcomeSample => ({
    status: row.status,
    errorKind: row.error_kind,
    jobsFound: row.jobs_found,
}));

const RunTotalsSchema = z.object({
    sources: count,
    succeeded: count,
    empty: count,
    failed: count,
    jobsFound: count,
    newJobs: count,
    updatedJobs: count,
    archivedJobs: count,
});

const RunRowSchema = z.object({
    id: z.string(),
    state: z.enum(['idle', 'running', 'completed', 'cancelled', 'failed']),
    trigger: z.enum(['scheduled', 'manual']),
    requested_source_ids: z.array(z.string()).nullable(),
    started_at: timestamp,
    finished_at: timestamp.nullable(),
    totals: RunTotalsSchema,
    deactivated_source_ids: z.array(z.string()),
    skipped_source_ids: z.array(z.string()),
    failure_reason: z.string().nullable(),
    cancel_reason: z.string().nullable(),
}).transform((row): RunRecord => ({
    id: row.id,
    state: row.state,
    trigger: row.trigger,
    requestedSourceIds: row.requested_source_ids,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    totals: row.totals,
    deactivatedSourceIds: row.deactivated_source_ids,
    skippedSourceIds: row.skipped_source_ids,
    failureReason: row.failure_reason,
    cancelReason: row.cancel_reason,
}));

// ─── SQL ──────────────────────────────────────────────────────────────────────

const SOURCE_COLUMNS = `id, name, adapter_kind, config, active, consecutive_empty, consecutive_failures,
    success_rate, priority_score, last_crawled_at, deactivated_at, deactivation_reason, rate_limited_until`;

const POSTING_COLUMNS = `id, source_id, fingerprint, title, url, canonical_url, location, posted_at,
    description, first_seen_at, last_seen_at, miss_count, archived, archived_at`;

const INSERT_POSTING_SQL = `
INSERT INTO job_postings
    (source_id, fingerprint, title, url, canonical_url, location, posted_at,
     description, first_seen_at, last_seen_at, miss_count, archived, archived_at)
VALUES
    ($1, $2, $3, $4, $5, $6, $7,
     $8, $9, $10, 0, FALSE, NULL)
ON CONFLICT (source_id, fingerprint) DO UPDATE SET
    title = EXCLUDED.title,
    url = EXCLUDED.url,
    canonical_url = EXCLUDED.canonical_url,
    location = EXCLUDED.location,
    posted_at = EXCLUDED.posted_at,
    description = EXCLUDED.description,
    last_seen_at = EXCLUDED.last_seen_at,
    miss_count = 0,
    archived = FALSE,
    archived_at = NULL
RETURNING ${POSTING_COLUMNS};
`;

const UPDATE_POSTING_SQL = `
UPDATE job_postings SET
    title = $2, url = $3, canonical_url = $4, location = $5, posted_at = $6,
    description = $7, last_seen_at = $8, miss_count = 0, archived = FALSE, archived_at = NULL
WHERE id = $1;
`;

const UPSERT_RUN_SQL = `
INSERT INTO crawl_runs
    (id, state, trigger, requested_source_ids, started_at, finished_at, totals,
     deactivated_source_ids, skipped_source_ids, failure_reason, cancel_reason)
VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9, $10, $11)
ON CONFLICT (id) DO UPDATE SET
    state = EXCLUDED.state,
    finished_at = EXCLUDED.finished_at,
    totals = EXCLUDED.totals,
    deactivated_source_ids = EXCLUDED.deactivated_source_ids,
    skipped_source_ids = EXCLUDED.skipped_source_ids,
    failure_reason = EXCLUDED.failure_reason,
    cancel_reason = EXCLUDED.cancel_reason;
`;

const INSERT_OUTCOME_SQL = `
INSERT INTO crawl_run_outcomes
    (run_id, source_id, source_name, adapter_kind, status, error_kind, error_detail,
     jobs_found, new_jobs, updated_jobs, unchanged_jobs, archived_jobs, dropped_candidates,
     attempts, started_at, finished_at, duration_ms, deactivated, interrupted)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
ON CONFLICT (run_id, source_id) DO NOTHING;
`;

// ─── PostgreSQL store ─────────────────────────────────────────────────────────

export class PgJobStore implements JobStore {
    constructor(private readonly sql: SqlClient) {}

    ping(): Promise<boolean> {
        return pingDb(this.sql);
    }

    async listSources(filter: SourceFilter = {}): Promise<Source[]> {
        const where: string[] = [];
        const values: unknown[] = [];
        if (filter.activeOnly) where.push('active = TRUE');
        if (filter.ids) {
            values.push([...filter.ids]);
            where.push(`id = ANY($${values.length}::text[])`);
        }
        const { rows } = await this.sql.query(
            `SELECT ${SOURCE_COLUMNS} FROM sources` +
            (where.length > 0 ? ` WHERE ${where.join(' AND ')}` : '') +
            ' ORDER BY priority_score DESC, id ASC',
            values
        );
        return rows.map((row) => SourceRowSchema.parse(row));
    }

    async getSource(id: string): Promise<Source | null> {
        const { rows } = await this.sql.query(`SELECT ${SOURCE_COLUMNS} FROM sources WHERE id = $1`, [id]);
        return rows.length > 0 ? SourceRowSchema.parse(rows[0]) : null;
    }

    async upsertSource(source: NewSource): Promise<Source> {
        const { rows } = await this.sql.query(
            `INSERT INTO sources (id, name, adapter_kind, config)
             VALUES ($1, $2, $3, $4::jsonb)
             ON CONFLICT (id) DO UPDATE SET
                 name = EXCLUDED.name,
                 adapter_kind = EXCLUDED.adapter_kind,
                 config = EXCLUDED.config,
                 updated_at = NOW()
             RETURNING ${SOURCE_COLUMNS}`,
            [source.id, source.name, source.adapterKind, JSON.stringify(source.config)]
        );
        return SourceRowSchema.parse(rows[0]);
    }

    async saveSourceHealth(sourceId: string, health: SourceHealthFields): Promise<void> {
        await this.sql.query(
            `UPDATE sources SET
                 active = $2, consecutive_empty = $3, consecutive_failures = $4, success_rate = $5,
                 priority_score = $6, last_crawled_at = $7, deactivated_at = $8, deactivation_reason = $9,
                 rate_limited_until = $10, updated_at = NOW()
             WHERE id = $1`,
            [
                sourceId,
                health.active,
                health.consecutiveEmpty,
                health.consecutiveFailures,
                health.successRate,
                health.priorityScore,
                health.lastCrawledAt,
                health.deactivatedAt,
                health.deactivationReason,
                health.rateLimitedUntil,
            ]
        );
    }

    async reactivateSource(sourceId: string): Promise<Source | null> {
        const { rows } = await this.sql.query(
            `UPDATE sources SET
                 active = TRUE, consecutive_empty = 0, consecutive_failures = 0,
                 deactivated_at = NULL, deactivation_reason = NULL, rate_limited_until = NULL,
                 updated_at = NOW()
             WHERE id = $1
             RETURNING ${SOURCE_COLUMNS}`,
            [sourceId]
        );
        return rows.length > 0 ? SourceRowSchema.parse(rows[0]) : null;
    }

    async retireSource(sourceId: string, at: string): Promise<RetiredSource | null> {
        return this.sql.transaction(async (tx) => {
            const { rows } = await tx.query(
                `UPDATE sources SET
                     active = FALSE, deactivated_at = $2, deactivation_reason = 'retired by operator',
                     updated_at = NOW()
                 WHERE id = $1
                 RETURNING ${SOURCE_COLUMNS}`,
                [sourceId, at]
            );
            if (rows.length === 0) return null;
            const archived = await tx.query(
                `UPDATE job_postings SET archived = TRUE, archived_at = $2
                 WHERE source_id = $1 AND NOT archived`,
                [sourceId, at]
            );
            return { source: SourceRowSchema.parse(rows[0]), archivedPostings: archived.rowCount ?? 0 };
        });
    }

    async loadOutcomeHistory(sourceId: string, limit: number): Promise<OutcomeSample[]> {
        const { rows } = await this.sql.query(
            `SELECT status, error_kind, jobs_found FROM crawl_run_outcomes
             WHERE source_id = $1 AND NOT interrupted
               AND (error_kind IS NULL OR error_kind <> 'PersistenceError')
             ORDER BY finished_at DESC
             LIMIT $2`,
            [sourceId, limit]
        );
        return rows.map((row) => OutcomeSampleRowSchema.parse(row)).reverse();
    }

    async loadPostings(sourceId: string): Promise<JobPosting[]> {
        const { rows } = await this.sql.query(
            `SELECT ${POSTING_COLUMNS} FROM job_postings WHERE source_id = $1 ORDER BY id`,
            [sourceId]
        );
        return rows.map((row) => PostingRowSchema.parse(row));
    }

    async applyReconciliation(sourceId: string, result: ReconcileResult): Promise<JobPosting[]> {
        return this.sql.transaction(async (tx) => {
            const created: JobPosting[] = [];
            for (const posting of result.created) {
                const { rows } = await tx.query(INSERT_POSTING_SQL, [
                    sourceId,
                    posting.fingerprint,
                    posting.title,
                    posting.url,
                    posting.canonicalUrl,
                    posting.location,
                    posting.postedAt,
                    posting.description,
                    posting.firstSeenAt,
                    posting.lastSeenAt,
                ]);
                created.push(PostingRowSchema.parse(rows[0]));
            }

            for (const posting of result.updated) {
                await tx.query(UPDATE_POSTING_SQL, [
                    posting.id,
                    posting.title,
                    posting.url,
                    posting.canonicalUrl,
                    posting.location,
                    posting.postedAt,
                    posting.description,
                    posting.lastSeenAt,
                ]);
            }

            await this.touchUnchanged(tx, result);

            if (result.missed.length > 0) {
                await tx.query(
                    'UPDATE job_postings SET miss_count = miss_count + 1 WHERE id = ANY($1::bigint[])',
                    [result.missed.map((p) => p.id)]
                );
            }
            if (result.archived.length > 0) {
                await tx.query(
                    `UPDATE job_postings SET miss_count = miss_count + 1, archived = TRUE, archived_at = $2
                     WHERE id = ANY($1::bigint[])`,
                    [result.archived.map((p) => p.id), result.archived[0].archivedAt]
                );
            }

            log.debug(
                `[DB] ${sourceId}: +${created.length} ~${result.updated.length} =${result.unchanged.length} ` +
                `missed ${result.missed.length} archived ${result.archived.length}`
            );
            return created;
        });
    }

    private async touchUnchanged(tx: SqlExecutor, result: ReconcileResult): Promise<void> {
        if (result.unchanged.length === 0) return;
        await tx.query(
            'UPDATE job_postings SET last_seen_at = $2, miss_count = 0 WHERE id = ANY($1::bigint[])',
            [result.unchanged.map((p) => p.id), result.unchanged[0].lastSeenAt]
        );
    }

    async recordOutcome(runId: string, outcome: SourceOutcome): Promise<void> {
        await this.sql.query(INSERT_OUTCOME_SQL, outcomeValues(runId, outcome));
    }

    async saveRun(run: CrawlRun): Promise<void> {
        await this.sql.transaction(async (tx) => {
            await tx.query(UPSERT_RUN_SQL, [
                run.id,
                run.state,
                run.trigger,
                run.requestedSourceIds,
                run.startedAt,
                run.finishedAt,
                JSON.stringify(run.totals),
                run.deactivatedSourceIds,
                run.skippedSourceIds,
                run.failureReason,
                run.cancelReason,
            ]);
            for (const outcome of run.outcomes) {
                await tx.query(INSERT_OUTCOME_SQL, outcomeValues(run.id, outcome));
            }
        });
    }

    async listActiveRuns(): Promise<ActiveRunRecord[]> {
        const { rows } = await this.sql.query(
            `SELECT id, requested_source_ids, started_at FROM crawl_runs WHERE state = 'running'`
        );
        return rows.map((row) => {
            const parsed = z.object({
                id: z.string(),
                requested_source_ids: z.array(z.string()).nullable(),
                started_at: timestamp,
            }).parse(row);
            return {
                id: parsed.id,
                requestedSourceIds: parsed.requested_source_ids,
                startedAt: parsed.started_at,
            };
        });
    }

    async listRecentRuns(limit: number): Promise<RunRecord[]> {
        const { rows } = await this.sql.query(
            `SELECT id, state, trigger, requested_source_ids, started_at, finished_at, totals,
                    deactivated_source_ids, skipped_source_ids, failure_reason, cancel_reason
             FROM crawl_runs ORDER BY started_at DESC LIMIT $1`,
            [limit]
        );
        return rows.map((row) => RunRowSchema.parse(row));
    }
}

function outcomeValues(runId: string, o: SourceOutcome): unknown[] {
    return [
        runId,
        o.sourceId,
        o.sourceName,
        o.adapterKind,
        o.status,
        o.errorKind,
        o.errorDetail,
        o.jobsFound,
        o.newJobs,
        o.updatedJobs,
        o.unchangedJobs,
        o.archivedJobs,
        o.droppedCandidates,
        o.attempts,
        o.startedAt,
        o.finishedAt,
        o.durationMs,
        o.deactivated,
        o.interrupted,
    ];
}
