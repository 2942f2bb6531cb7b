#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: crawl every active source once, or on a schedule.
 *
 * USAGE
 * ─────
 *   tsx src/main.ts                       one manual run over all active sources
 *   tsx src/main.ts --sources acme,globex restrict the run to these source ids
 *   tsx src/main.ts --schedule            run every CRAWL_INTERVAL_MINUTES until stopped
 *   tsx src/main.ts --dry-run [--seed f]  in-memory store seeded from a JSON file
 *   tsx src/main.ts --verbose             DEBUG logging
 *
 * SHUTDOWN
 * ────────
 *  • First SIGINT/SIGTERM: stop dispatching; in-flight sources finish.
 *  • Second signal: abort in-flight sources (recorded as interrupted, not held
 *    against the source's health).
 *
 * Exit code is 1 when the run failed or could not start, 0 otherwise.
 */

import 'dotenv/config';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { log } from 'crawlee';
import { env, type Env } from './config/env.js';
import { crawlPolicyFromEnv } from './config/crawlPolicy.js';
import { configureLogLevel } from './config/logging.js';
import { CrawlOrchestrator, type RunHandle } from './orchestrator.js';
import { CrawlScheduler } from './scheduler.js';
import { errorMessage, RunConflictError } from './sources/errors.js';
import { loadSeedFile } from './sources/seedFile.js';
import type { JobExtractor, PageRenderer, RunListener } from './sources/types.js';
import { RunNotifier } from './services/notifier.js';
import { checkOllamaHealth, OllamaJobExtractor } from './services/ollamaExtractor.js';
import { HttpPageRenderer } from './services/renderService.js';
import { closeDb, getDb } from './utils/db.js';
import { closeJsonLogger, initJsonLogger, jsonRunLog } from './utils/fileLogger.js';
import { PgJobStore, type JobStore } from './utils/jobStore.js';
import { InMemoryJobStore } from './utils/memoryStore.js';
import { httpClientFromEnv } from './utils/politeHttpClient.js';

const DEFAULT_SEED_FILE = fileURLToPath(new URL('../config/sources.example.json', import.meta.url));

// ─── CLI args ─────────────────────────────────────────────────────────────────

interface CliOptions {
    sourceIds?: string[];
    schedule: boolean;
    dryRun: boolean;
    seedFile: string;
}

function argValue(argv: readonly string[], flag: string): string | undefined {
    const i = argv.indexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
}

function parseArgs(argv: readonly string[]): CliOptions {
    const sources = argValue(argv, '--sources');
    const seed = argValue(argv, '--seed');
    return {
        sourceIds: sources
            ? sources.split(',').map((s) => s.trim()).filter(Boolean)
            : undefined,
        schedule: argv.includes('--schedule'),
        dryRun: argv.includes('--dry-run') || seed !== undefined,
        seedFile: seed ? path.resolve(seed) : DEFAULT_SEED_FILE,
    };
}

// ─── Wiring ───────────────────────────────────────────────────────────────────

async function buildExtractor(config: Env): Promise<JobExtractor | undefined> {
    if (!config.ENABLE_LLM) {
        log.info('[Main] ENABLE_LLM=false: AI-assisted sources will report ExtractionFailed');
        return undefined;
    }
    const healthy = await checkOllamaHealth({ baseUrl: config.OLLAMA_BASE_URL, model: config.OLLAMA_MODEL });
    if (!healthy) {
        log.warning('[Main] Ollama unavailable: AI-assisted sources will report ExtractionFailed');
        return undefined;
    }
    return new OllamaJobExtractor({
        baseUrl: config.OLLAMA_BASE_URL,
        model: config.OLLAMA_MODEL,
        timeoutMs: config.OLLAMA_TIMEOUT_MS,
        temperature: config.OLLAMA_TEMPERATURE,
        maxTokens: config.OLLAMA_MAX_TOKENS,
    });
}

async function buildRenderer(config: Env): Promise<PageRenderer | undefined> {
    if (!config.RENDER_SERVICE_URL) return undefined;
    const renderer = new HttpPageRenderer(config.RENDER_SERVICE_URL);
    if (!(await renderer.ping())) {
        log.warning(`[Main] Render service at ${config.RENDER_SERVICE_URL} did not answer; rendering may fail`);
    }
    return renderer;
}

function buildListeners(config: Env): RunListener[] {
    return [
        jsonRunLog,
        new RunNotifier({
            enabled: config.ENABLE_NOTIFICATIONS,
            slackWebhook: config.NOTIFY_SLACK_WEBHOOK || undefined,
            webhookUrl: config.NOTIFY_WEBHOOK_URL || undefined,
            ntfyServer: config.NTFY_SERVER || undefined,
            ntfyTopic: config.NTFY_TOPIC || undefined,
            cooldownMin: config.NOTIFY_COOLDOWN_MIN,
        }),
    ];
}

function buildStore(options: CliOptions): JobStore {
    if (!options.dryRun) return new PgJobStore(getDb(env));
    const seed = loadSeedFile(options.seedFile);
    log.info(`[Main] Dry run: in-memory store with ${seed.length} sources from ${options.seedFile}`);
    return new InMemoryJobStore(seed);
}

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
    configureLogLevel(env.CRAWLEE_LOG_LEVEL);
    const options = parseArgs(process.argv.slice(2));
    initJsonLogger({ dir: env.LOG_DIR });

    const store = buildStore(options);
    const orchestrator = new CrawlOrchestrator({
        store,
        policy: crawlPolicyFromEnv(env),
        http: httpClientFromEnv(env),
        extractor: await buildExtractor(env),
        renderer: await buildRenderer(env),
        listeners: buildListeners(env),
    });

    let signals = 0;
    let stopScheduler: (() => void) | null = null;
    const onSignal = (signal: NodeJS.Signals): void => {
        signals++;
        if (signals === 1) {
            log.warning(`[Main] ${signal} received: finishing in-flight sources (send again to abort them)`);
            orchestrator.cancelAll(`${signal} received`);
            stopScheduler?.();
        } else {
            log.warning(`[Main] ${signal} received again: aborting in-flight sources`);
            orchestrator.cancelAll(`${signal} received`, { abortInFlight: true });
        }
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    if (options.schedule) {
        const scheduler = new CrawlScheduler(orchestrator, {
            intervalMs: env.CRAWL_INTERVAL_MINUTES * 60_000,
            sourceIds: options.sourceIds,
        });
        const stopped = new Promise<void>((resolve) => {
            stopScheduler = resolve;
        });
        scheduler.start();
        await stopped;
        await scheduler.stop('shutdown requested');
        return 0;
    }

    let handle: RunHandle;
    try {
        handle = await orchestrator.startRun({ sourceIds: options.sourceIds, trigger: 'manual' });
    } catch (err) {
        if (err instanceof RunConflictError) {
            log.error(`[Main] ${err.message}`);
            return 1;
        }
        throw err;
    }
    const run = await handle.done;
    return run.state === 'failed' ? 1 : 0;
}

main()
    .catch((err: unknown) => {
        log.error(`[Main] Fatal: ${errorMessage(err)}`);
        return 1;
    })
    .then(async (code) => {
        await closeJsonLogger();
        await closeDb();
        process.exit(code);
    })
    .catch((err: unknown) => {
        log.error(`[Main] Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
    });
