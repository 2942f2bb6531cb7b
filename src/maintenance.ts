/**
 * src/maintenance.ts
 *
 * CLI entry-point for source and run management.
 *
 * USAGE
 * ──────
 *   npm run maintenance -- sources [--all]     list active (or all) sources with health
 *   npm run maintenance -- reactivate <id>     re-enable a deactivated source
 *   npm run maintenance -- retire <id>         deactivate a source and archive its postings
 *   npm run maintenance -- seed <file>         register/update sources from a JSON file
 *   npm run maintenance -- detect <url>        show the adapter a careers URL maps to
 *                                              (fetches the page to look for an embedded board)
 *   npm run maintenance -- runs [--limit N]    recent crawl runs
 */

import 'dotenv/config';
import { log } from 'crawlee';
import { env } from './config/env.js';
import { configureLogLevel } from './config/logging.js';
import { detectSourceFromPage } from './sources/detect.js';
import { errorMessage } from './sources/errors.js';
import { loadSeedFile } from './sources/seedFile.js';
import { closeDb, getDb } from './utils/db.js';
import { PgJobStore } from './utils/jobStore.js';
import { httpClientFromEnv } from './utils/politeHttpClient.js';
import { formatRunTable, formatSourceTable } from './utils/sourceReport.js';

// ─── Argument Parsing ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const command = args[0] ?? 'help';
const positional = args[1];
const limitArg = (() => {
    const i = args.indexOf('--limit');
    const n = i !== -1 && args[i + 1] ? Number(args[i + 1]) : NaN;
    return Number.isInteger(n) && n > 0 ? n : 20;
})();

const HELP = `
Job Harvester: Maintenance CLI
═══════════════════════════════

Commands:
  sources [--all]       List active sources (or every source) with health
  reactivate <id>       Re-enable a deactivated source and reset its streaks
  retire <id>           Deactivate a source for good and archive its postings
  seed <file>           Register or update sources from a JSON file
  detect <url>          Show the adapter kind and config a careers URL maps to
  runs [--limit N]      Show the most recent crawl runs (default: 20)

Examples:
  npm run maintenance -- seed config/sources.example.json
  npm run maintenance -- detect https://boards.greenhouse.io/acme
`;

// ─── Commands ─────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
    configureLogLevel(env.CRAWLEE_LOG_LEVEL);

    switch (command) {
        case 'detect': {
            if (!positional) {
                log.error('[Maintenance] Usage: detect <url>');
                return 1;
            }
            const detected = await detectSourceFromPage(positional, httpClientFromEnv(env), AbortSignal.timeout(env.SOURCE_TIMEOUT_MS));
            console.log(JSON.stringify(detected, null, 2));
            return 0;
        }

        case 'sources': {
            const store = new PgJobStore(getDb(env));
            const sources = await store.listSources({ activeOnly: !args.includes('--all') });
            console.log(formatSourceTable(sources));
            return 0;
        }

        case 'reactivate': {
            if (!positional) {
                log.error('[Maintenance] Usage: reactivate <source-id>');
                return 1;
            }
            const store = new PgJobStore(getDb(env));
            const source = await store.reactivateSource(positional);
            if (!source) {
                log.error(`[Maintenance] No source with id "${positional}"`);
                return 1;
            }
            log.info(`[Maintenance] ${source.id} reactivated (priority ${source.priorityScore.toFixed(2)})`);
            return 0;
        }

        case 'retire': {
            if (!positional) {
                log.error('[Maintenance] Usage: retire <source-id>');
                return 1;
            }
            const store = new PgJobStore(getDb(env));
            const retired = await store.retireSource(positional, new Date().toISOString());
            if (!retired) {
                log.error(`[Maintenance] No source with id "${positional}"`);
                return 1;
            }
            log.info(`[Maintenance] ${retired.source.id} retired; ${retired.archivedPostings} postings archived`);
            return 0;
        }

        case 'seed': {
            if (!positional) {
                log.error('[Maintenance] Usage: seed <file>');
                return 1;
            }
            const entries = loadSeedFile(positional);
            const store = new PgJobStore(getDb(env));
            for (const entry of entries) {
                const saved = await store.upsertSource(entry);
                log.info(`[Maintenance] Upserted ${saved.id} (${saved.adapterKind})`);
            }
            log.info(`[Maintenance] ${entries.length} sources seeded from ${positional}`);
            return 0;
        }

        case 'runs': {
            const store = new PgJobStore(getDb(env));
            console.log(formatRunTable(await store.listRecentRuns(limitArg)));
            return 0;
        }

        case 'help':
        case '--help':
        case '-h':
            console.log(HELP);
            return 0;

        default:
            log.error(`[Maintenance] Unknown command "${command}"`);
            console.log(HELP);
            return 1;
    }
}

main()
    .catch((err: unknown) => {
        log.error(`[Maintenance] Fatal error: ${errorMessage(err)}`);
        return 1;
    })
    .then(async (code) => {
        await closeDb();
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        log.error(`[Maintenance] Could not close the database pool: ${errorMessage(err)}`);
        process.exitCode = 1;
    });
