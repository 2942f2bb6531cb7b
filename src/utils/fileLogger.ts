/**
 * src/utils/fileLogger.ts
 *
 * Structured JSON-lines log, written next to the normal Crawlee console output.
 *
 * BEHAVIOUR
 * ─────────
 *  • initJsonLogger() opens `{LOG_DIR}/runs.jsonl` in append mode. Outside
 *    production it is a no-op unless `force` is set.
 *  • logStructured() writes one JSON object per line.
 *  • jsonRunLog is a RunListener: every finished run writes one `run.finished`
 *    entry plus one `source.outcome` entry per crawled source.
 *  • closeJsonLogger() flushes and closes the stream.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import type { CrawlRun, JobPosting, RunListener } from '../sources/types.js';

export const JSON_LOG_FILE_NAME = 'runs.jsonl';

export interface JsonLoggerOptions {
    dir: string;
    /** Write even when NODE_ENV is not production. */
    force?: boolean;
}

let jsonWriteStream: fs.WriteStream | null = null;
const isProdEnv = (): boolean => process.env.NODE_ENV === 'production';

export function initJsonLogger(options: JsonLoggerOptions): string | null {
    if (!isProdEnv() && !options.force) return null;
    if (jsonWriteStream) return jsonWriteStream.path.toString();

    fs.mkdirSync(options.dir, { recursive: true });
    const file = path.join(options.dir, JSON_LOG_FILE_NAME);
    jsonWriteStream = fs.createWriteStream(file, { flags: 'a', encoding: 'utf-8' });
    jsonWriteStream.on('error', (err) => {
        log.warning(`[FileLogger] JSON log write failed: ${err.message}`);
    });
    return file;
}

export function closeJsonLogger(): Promise<void> {
    const stream = jsonWriteStream;
    jsonWriteStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => {
        stream.end(() => resolve());
    });
}

export function logStructured(level: string, message: string, extra?: Record<string, unknown>): void {
    if (!jsonWriteStream) return;
    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...extra,
    };
    jsonWriteStream.write(JSON.stringify(entry) + '\n');
}

export const jsonRunLog: RunListener = {
    async onRunFinished(run: CrawlRun, newPostings: JobPosting[]): Promise<void> {
        const level = run.state === 'failed' ? 'error' : run.state === 'cancelled' ? 'warning' : 'info';
        logStructured(level, 'run.finished', {
            runId: run.id,
            state: run.state,
            trigger: run.trigger,
            startedAt: run.startedAt,
            finishedAt: run.finishedAt,
            totals: run.totals,
            newPostingIds: newPostings.map((p) => p.id),
            deactivatedSourceIds: run.deactivatedSourceIds,
            skippedSourceIds: run.skippedSourceIds,
            failureReason: run.failureReason,
            cancelReason: run.cancelReason,
        });
        for (const outcome of run.outcomes) {
            logStructured(outcome.errorKind ? 'warning' : 'info', 'source.outcome', {
                runId: run.id,
                ...outcome,
            });
        }
    },
};
