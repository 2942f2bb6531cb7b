/**
 * src/sources/sourceConfig.ts
 *
 * Per-kind configuration schemas. Unknown keys are rejected so a typo in an
 * operator's seed file surfaces as InvalidConfig instead of being ignored.
 */

import { z, type ZodError } from 'zod';
import { InvalidSourceConfigError } from './errors.js';
import type { AdapterKind } from './types.js';

export const ATS_VENDORS = ['greenhouse', 'lever', 'recruitee'] as const;
export type AtsVendor = (typeof ATS_VENDORS)[number];

export const DEFAULT_GUEST_SEARCH_ENDPOINT = 'https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search';

const timeoutMs = z.number().int().positive().max(10 * 60_000).optional();

export const AtsJsonConfigSchema = z.object({
    vendor: z.enum(ATS_VENDORS),
    slug: z.string().trim().min(1).regex(/^[A-Za-z0-9._-]+$/, 'slug may only contain letters, digits, ".", "_" and "-"'),
    timeoutMs,
}).strict();

export const GuestSearchConfigSchema = z.object({
    keywords: z.string().trim().min(1),
    location: z.string().trim().min(1).optional(),
    remoteOnly: z.boolean().default(false),
    filters: z.record(z.string(), z.string()).default({}),
    maxPages: z.number().int().min(1).max(20).default(2),
    pageSize: z.number().int().min(1).max(100).default(25),
    pageDelayMs: z.number().int().min(0).max(60_000).default(1_000),
    endpoint: z.string().url().default(DEFAULT_GUEST_SEARCH_ENDPOINT),
    timeoutMs,
}).strict();

export const AiHtmlConfigSchema = z.object({
    url: z.string().url(),
    render: z.boolean().default(false),
    waitSelector: z.string().min(1).optional(),
    budgetChars: z.number().int().min(500).max(200_000).optional(),
    timeoutMs,
}).strict();

export type AtsJsonConfig = z.infer<typeof AtsJsonConfigSchema>;
export type GuestSearchConfig = z.infer<typeof GuestSearchConfigSchema>;
export type AiHtmlConfig = z.infer<typeof AiHtmlConfigSchema>;

const SCHEMAS = {
    'ats-json': AtsJsonConfigSchema,
    'guest-search': GuestSearchConfigSchema,
    'ai-assisted-html': AiHtmlConfigSchema,
} satisfies Record<AdapterKind, z.ZodTypeAny>;

export interface ConfigByKind {
    'ats-json': AtsJsonConfig;
    'guest-search': GuestSearchConfig;
    'ai-assisted-html': AiHtmlConfig;
}

function issuesOf(err: ZodError): string[] {
    return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

export function parseSourceConfig<K extends AdapterKind>(kind: K, config: unknown): ConfigByKind[K];
export function parseSourceConfig(kind: AdapterKind, config: unknown): ConfigByKind[AdapterKind] {
    const result = SCHEMAS[kind].safeParse(config);
    if (!result.success) {
        throw new InvalidSourceConfigError(`Invalid ${kind} configuration`, issuesOf(result.error));
    }
    return result.data;
}

/** Optional per-source timeout, read without validating the rest of the config. */
export function configuredTimeoutMs(config: Record<string, unknown>): number | null {
    const value = config.timeoutMs;
    return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : null;
}
