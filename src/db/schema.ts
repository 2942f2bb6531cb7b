/**
 * src/db/schema.ts
 *
 * PostgreSQL schema for sources, postings and crawl runs. Every statement is
 * idempotent (IF NOT EXISTS), so migrations can run on every deploy.
 */

import type { SqlExecutor } from '../utils/db.js';

export const CREATE_TABLES = [
    `
CREATE TABLE IF NOT EXISTS sources (
    id                   TEXT PRIMARY KEY,
    name                 TEXT        NOT NULL,
    adapter_kind         TEXT        NOT NULL
                         CHECK (adapter_kind IN ('ats-json', 'guest-search', 'ai-assisted-html')),
    config               JSONB       NOT NULL DEFAULT '{}'::jsonb,
    active               BOOLEAN     NOT NULL DEFAULT TRUE,
    consecutive_empty    INTEGER     NOT NULL DEFAULT 0,
    consecutive_failures INTEGER     NOT NULL DEFAULT 0,
    success_rate         DOUBLE PRECISION,
    priority_score       DOUBLE PRECISION NOT NULL DEFAULT 1,
    last_crawled_at      TIMESTAMPTZ,
    deactivated_at       TIMESTAMPTZ,
    deactivation_reason  TEXT,
    -- not dispatched again before this time (server Retry-After)
    rate_limited_until   TIMESTAMPTZ,
    created_at           TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at           TIMESTAMPTZ NOT NULL DEFAULT NOW()
);`,
    `
CREATE TABLE IF NOT EXISTS job_postings (
    id             BIGSERIAL PRIMARY KEY,
    -- a source with postings is retired (postings archived), never deleted
    source_id      TEXT        NOT NULL REFERENCES sources(id) ON DELETE RESTRICT,
    -- sha256 of normalized url + normalized title
    fingerprint    TEXT        NOT NULL,
    title          TEXT        NOT NULL,
    url            TEXT        NOT NULL,
    canonical_url  TEXT        NOT NULL,
    location       TEXT,
    posted_at      TIMESTAMPTZ,
    description    TEXT,
    first_seen_at  TIMESTAMPTZ NOT NULL,
    last_seen_at   TIMESTAMPTZ NOT NULL,
    miss_count     INTEGER     NOT NULL DEFAULT 0,
    archived       BOOLEAN     NOT NULL DEFAULT FALSE,
    archived_at    TIMESTAMPTZ,
    UNIQUE (source_id, fingerprint)
);`,
    `
CREATE TABLE IF NOT EXISTS crawl_runs (
    id                     TEXT PRIMARY KEY,
    state                  TEXT        NOT NULL
                           CHECK (state IN ('idle', 'running', 'completed', 'cancelled', 'failed')),
    trigger                TEXT        NOT NULL CHECK (trigger IN ('scheduled', 'manual')),
    requested_source_ids   TEXT[],
    started_at             TIMESTAMPTZ NOT NULL,
    finished_at            TIMESTAMPTZ,
    totals                 JSONB       NOT NULL,
    deactivated_source_ids TEXT[]      NOT NULL DEFAULT '{}',
    skipped_source_ids     TEXT[]      NOT NULL DEFAULT '{}',
    failure_reason         TEXT,
    cancel_reason          TEXT
);`,
    `
CREATE TABLE IF NOT EXISTS crawl_run_outcomes (
    run_id             TEXT        NOT NULL REFERENCES crawl_runs(id) ON DELETE CASCADE,
    -- by id only: outcomes outlive the source they describe
    source_id          TEXT        NOT NULL,
    source_name        TEXT        NOT NULL,
    adapter_kind       TEXT        NOT NULL,
    status             TEXT        NOT NULL CHECK (status IN ('success', 'empty', 'error', 'timeout')),
    error_kind         TEXT,
    error_detail       TEXT,
    jobs_found         INTEGER     NOT NULL DEFAULT 0,
    new_jobs           INTEGER     NOT NULL DEFAULT 0,
    updated_jobs       INTEGER     NOT NULL DEFAULT 0,
    unchanged_jobs     INTEGER     NOT NULL DEFAULT 0,
    archived_jobs      INTEGER     NOT NULL DEFAULT 0,
    dropped_candidates INTEGER     NOT NULL DEFAULT 0,
    attempts           INTEGER     NOT NULL DEFAULT 1,
    started_at         TIMESTAMPTZ NOT NULL,
    finished_at        TIMESTAMPTZ NOT NULL,
    duration_ms        INTEGER     NOT NULL,
    deactivated        BOOLEAN     NOT NULL DEFAULT FALSE,
    interrupted        BOOLEAN     NOT NULL DEFAULT FALSE,
    PRIMARY KEY (run_id, source_id)
);`,
];

export const INDEXES = [
    `CREATE INDEX IF NOT EXISTS idx_sources_active_priority ON sources(active, priority_score DESC);`,
    `CREATE INDEX IF NOT EXISTS idx_postings_source_active  ON job_postings(source_id) WHERE NOT archived;`,
    `CREATE INDEX IF NOT EXISTS idx_postings_last_seen      ON job_postings(last_seen_at DESC);`,
    `CREATE INDEX IF NOT EXISTS idx_runs_state              ON crawl_runs(state);`,
    `CREATE INDEX IF NOT EXISTS idx_runs_started_at         ON crawl_runs(started_at DESC);`,
    `CREATE INDEX IF NOT EXISTS idx_outcomes_source_time    ON crawl_run_outcomes(source_id, finished_at DESC);`,
];

/** Applies every table and index statement in order. Returns the number executed. */
export async function applySchema(sql: SqlExecutor): Promise<number> {
    const statements = [...CREATE_TABLES, ...INDEXES];
    for (const statement of statements) {
        await sql.query(statement);
    }
    return statements.length;
}
