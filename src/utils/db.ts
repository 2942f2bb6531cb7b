/**
 * src/utils/db.ts
 *
 * PostgreSQL access for the harvester.
 *
 * The pool is lazy: it is created on the first getDb() call and does not
 * connect until the first query, so importing this module never blocks
 * startup. DATABASE_URL takes priority over the individual PG* variables.
 *
 * Everything above this module talks to the SqlClient interface, which lets
 * tests hand the PostgreSQL store a fake client instead of a live database.
 */

import pkg from 'pg';
import type { Pool as PgPool, PoolConfig } from 'pg';
import { log } from 'crawlee';
import type { Env } from '../config/envSchema.js';

const { Pool } = pkg;

// ─── Interface ────────────────────────────────────────────────────────────────

export interface SqlResult {
    rows: Record<string, unknown>[];
    rowCount: number | null;
}

export interface SqlExecutor {
    query(sql: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlClient extends SqlExecutor {
    /** Runs `fn` inside BEGIN/COMMIT, rolling back if it throws. */
    transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

// ─── Pool config ──────────────────────────────────────────────────────────────

type DbEnv = Pick<Env, 'DATABASE_URL' | 'PGHOST' | 'PGPORT' | 'PGUSER' | 'PGPASSWORD' | 'PGDATABASE' | 'PGSSL' | 'PG_POOL_MAX'>;

export function buildPoolConfig(env: DbEnv): PoolConfig {
    const common = {
        max: env.PG_POOL_MAX,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
    };
    if (env.DATABASE_URL) {
        return {
            ...common,
            connectionString: env.DATABASE_URL,
            ssl: env.DATABASE_URL.includes('sslmode=require') || env.PGSSL
                ? { rejectUnauthorized: false }
                : undefined,
        };
    }
    return {
        ...common,
        host: env.PGHOST,
        port: env.PGPORT,
        user: env.PGUSER,
        password: env.PGPASSWORD,
        database: env.PGDATABASE,
        ssl: env.PGSSL ? { rejectUnauthorized: false } : undefined,
    };
}

// ─── pg-backed client ─────────────────────────────────────────────────────────

export class PgSqlClient implements SqlClient {
    constructor(private readonly pool: PgPool) {
        // Idle-client errors would otherwise crash the process.
        pool.on('error', (err) => {
            log.error(`[DB] Unexpected pool error: ${err.message}`);
        });
    }

    async query(sql: string, values?: unknown[]): Promise<SqlResult> {
        return this.pool.query(sql, values);
    }

    async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
            const out = await fn({ query: (sql, values) => client.query(sql, values) });
            await client.query('COMMIT');
            return out;
        } catch (err) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackErr) {
                log.error(`[DB] Rollback failed: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`);
            }
            throw err;
        } finally {
            client.release();
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

// ─── Singleton ────────────────────────────────────────────────────────────────

let db: PgSqlClient | null = null;

export function getDb(env: DbEnv): PgSqlClient {
    if (!db) db = new PgSqlClient(new Pool(buildPoolConfig(env)));
    return db;
}

export async function closeDb(): Promise<void> {
    if (!db) return;
    const current = db;
    db = null;
    await current.close();
}

/** Returns true if the database answers `SELECT 1`. */
export async function pingDb(client: SqlExecutor): Promise<boolean> {
    try {
        await client.query('SELECT 1');
        return true;
    } catch (err) {
        log.debug(`[DB] Ping failed: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}
