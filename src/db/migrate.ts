/**
 * src/db/migrate.ts
 *
 * Idempotent database migration.
 *
 * Run:  npm run db:migrate
 *
 * Uses CREATE TABLE IF NOT EXISTS / CREATE INDEX IF NOT EXISTS, so it is safe
 * to run multiple times without data loss.
 */

import 'dotenv/config';
import { log } from 'crawlee';
import { env } from '../config/env.js';
import { errorMessage } from '../sources/errors.js';
import { closeDb, getDb, pingDb } from '../utils/db.js';
import { applySchema } from './schema.js';

async function migrate(): Promise<void> {
    log.info('[migrate] Checking database connectivity…');
    const db = getDb(env);

    if (!(await pingDb(db))) {
        log.error('[migrate] Cannot reach PostgreSQL. Check DATABASE_URL or PGHOST / PGUSER / PGPASSWORD / PGDATABASE in .env');
        process.exitCode = 1;
        return;
    }
    log.info(`[migrate] Connected to "${env.PGDATABASE}".`);

    const count = await applySchema(db);
    log.info(`[migrate] ${count} statements applied. Database is ready for the crawler.`);
}

migrate()
    .catch((err: unknown) => {
        log.error(`[migrate] Fatal error: ${errorMessage(err)}`);
        process.exitCode = 1;
    })
    .finally(() => closeDb().catch((err: unknown) => {
        log.warning(`[migrate] Could not close pool: ${errorMessage(err)}`);
    }));
