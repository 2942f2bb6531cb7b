import { z } from 'zod';
import * as path from 'path';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const positiveInt = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().int().positive());

const nonNegativeInt = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().int().nonnegative());

const optionalUrl = z
    .string()
    .default('')
    .superRefine((val, ctx) => {
        if (!val) return;
        try {
            new URL(val);
        } catch {
            ctx.addIssue({ code: 'custom', message: 'Expected an absolute URL' });
        }
    });

export const envSchema = z.object({
    NODE_ENV: z.string().default('development'),

    DATABASE_URL: z.string().optional(),
    PGHOST: z.string().default('localhost'),
    PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
    PGUSER: z.string().optional(),
    PGPASSWORD: z.string().optional(),
    PGDATABASE: z.string().default('job_harvester'),
    PGSSL: boolStrictTrue.default(false),
    PG_POOL_MAX: positiveInt.default(10),

    CRAWL_CONCURRENCY: positiveInt.default(5),
    SOURCE_TIMEOUT_MS: positiveInt.default(60_000),
    RUN_TIMEOUT_MS: positiveInt.default(30 * 60_000),
    RETRY_MAX_ATTEMPTS: positiveInt.default(3),
    RETRY_BASE_DELAY_MS: nonNegativeInt.default(300),
    RETRY_MAX_DELAY_MS: nonNegativeInt.default(5_000),
    RETRY_JITTER_MS: nonNegativeInt.default(150),

    FAILURE_DEACTIVATION_THRESHOLD: positiveInt.default(3),
    EMPTY_CRAWL_DEACTIVATION_THRESHOLD: positiveInt.default(5),
    POSTING_ARCHIVE_AFTER_MISSES: positiveInt.default(3),
    HEALTH_WINDOW_SIZE: positiveInt.default(20),
    HEALTH_GRACE_RUNS: nonNegativeInt.default(3),
    STALE_RUN_AFTER_MS: positiveInt.default(2 * 60 * 60_000),
    CRAWL_INTERVAL_MINUTES: positiveInt.default(30),

    AI_HTML_BUDGET_CHARS: positiveInt.default(10_000),
    OLLAMA_BASE_URL: z.string().default('http://localhost:11434'),
    OLLAMA_MODEL: z.string().default('qwen2.5:7b-instruct'),
    OLLAMA_TIMEOUT_MS: positiveInt.default(120_000),
    OLLAMA_TEMPERATURE: numFromEnv.default(0),
    OLLAMA_MAX_TOKENS: positiveInt.default(4096),
    ENABLE_LLM: boolUnlessFalse.default(true),

    HOST_MAX_CONCURRENCY: positiveInt.default(2),
    HOST_MIN_INTERVAL_MS: nonNegativeInt.default(500),
    HOST_FAILURE_THRESHOLD: positiveInt.default(5),
    HOST_COOLDOWN_MS: nonNegativeInt.default(5 * 60_000),
    RESPECT_ROBOTS_TXT: boolUnlessFalse.default(true),
    ROBOTS_CACHE_TTL_MS: nonNegativeInt.default(60 * 60_000),

    RENDER_SERVICE_URL: optionalUrl,
    PROXY_URL: optionalUrl,
    HTTP_USER_AGENT: z
        .string()
        .default('Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36'),

    NOTIFY_SLACK_WEBHOOK: optionalUrl,
    NOTIFY_WEBHOOK_URL: optionalUrl,
    NTFY_SERVER: z.string().default('https://ntfy.sh'),
    NTFY_TOPIC: z.string().default(''),
    NOTIFY_COOLDOWN_MIN: numFromEnv.default(15),
    ENABLE_NOTIFICATIONS: boolUnlessFalse.default(true),

    CRAWLEE_LOG_LEVEL: z.string().default(''),
    LOG_DIR: z.string().default(path.join(process.cwd(), 'storage')),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
