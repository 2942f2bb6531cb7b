/**
 * src/sources/candidate.ts
 *
 * Turns whatever an adapter scraped into RawCandidate objects.
 *
 * Required: a non-empty title and an absolute http(s) URL (relative URLs are
 * resolved against `baseUrl` when one is given). Anything else is a
 * malformed candidate: it is counted and dropped, never raised.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { RawCandidate } from './types.js';

const MAX_DESCRIPTION_CHARS = 20_000;

const LooseCandidateSchema = z.object({
    title: z.string().nullish(),
    url: z.string().nullish(),
    location: z.string().nullish(),
    postedAt: z.union([z.string(), z.number()]).nullish(),
    description: z.string().nullish(),
});

export type LooseCandidate = z.input<typeof LooseCandidateSchema>;

export interface SanitizedCandidates {
    candidates: RawCandidate[];
    dropped: number;
}

function collapse(value: string | null | undefined): string | undefined {
    if (!value) return undefined;
    const out = value.replace(/\s+/g, ' ').trim();
    return out.length > 0 ? out : undefined;
}

export function resolveHttpUrl(href: string | null | undefined, baseUrl?: string): string | null {
    const trimmed = href?.trim();
    if (!trimmed) return null;
    try {
        const resolved = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
        if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
        return resolved.toString();
    } catch {
        return null;
    }
}

/** Accepts ISO strings, other Date.parse-able strings and epoch milliseconds. */
export function toIsoTimestamp(value: string | number | null | undefined): string | undefined {
    if (value === null || value === undefined || value === '') return undefined;
    const ms = typeof value === 'number' ? value : Date.parse(value);
    if (!Number.isFinite(ms)) return undefined;
    return new Date(ms).toISOString();
}

/** Strips markup, decoding entities first so escaped HTML is handled too. */
export function htmlToText(html: string | null | undefined): string | undefined {
    if (!html) return undefined;
    const decoded = cheerio.load(html).root().text();
    const text = /<[a-z][\s\S]*>/i.test(decoded) ? cheerio.load(decoded).root().text() : decoded;
    return collapse(text);
}

export function sanitizeCandidate(raw: unknown, baseUrl?: string): RawCandidate | null {
    const parsed = LooseCandidateSchema.safeParse(raw);
    if (!parsed.success) return null;

    const title = collapse(parsed.data.title);
    const url = resolveHttpUrl(parsed.data.url, baseUrl);
    if (!title || !url) return null;

    const candidate: RawCandidate = { title, url };
    const location = collapse(parsed.data.location);
    if (location) candidate.location = location;
    const postedAt = toIsoTimestamp(parsed.data.postedAt);
    if (postedAt) candidate.postedAt = postedAt;
    const description = parsed.data.description?.trim();
    if (description) candidate.description = description.slice(0, MAX_DESCRIPTION_CHARS);
    return candidate;
}

export function sanitizeCandidates(raw: readonly unknown[], baseUrl?: string): SanitizedCandidates {
    const candidates: RawCandidate[] = [];
    let dropped = 0;
    for (const item of raw) {
        const candidate = sanitizeCandidate(item, baseUrl);
        if (candidate) candidates.push(candidate);
        else dropped++;
    }
    return { candidates, dropped };
}
