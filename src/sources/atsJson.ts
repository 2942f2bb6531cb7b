/**
 * src/sources/atsJson.ts
 *
 * ATS-JSON adapter: one GET against an applicant-tracking system's public
 * job board API.
 *
 *   greenhouse → https://boards-api.greenhouse.io/v1/boards/<slug>/jobs?content=true
 *   lever      → https://api.lever.co/v0/postings/<slug>?mode=json
 *   recruitee  → https://<slug>.recruitee.com/api/offers/
 *
 * Every vendor payload is validated with zod before mapping. A payload that
 * does not match is treated as SourceUnreachable: the endpoint answered, but
 * not with a job board.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { sanitizeCandidates, htmlToText, type LooseCandidate } from './candidate.js';
import { SourceUnreachableError } from './errors.js';
import { parseSourceConfig, type AtsJsonConfig, type AtsVendor } from './sourceConfig.js';
import type { AdapterContext, AdapterResult, Source, SourceAdapter } from './types.js';

// ─── Vendor payloads ──────────────────────────────────────────────────────────

const GreenhouseSchema = z.object({
    jobs: z.array(z.object({
        id: z.union([z.number(), z.string()]),
        title: z.string().nullish(),
        absolute_url: z.string().nullish(),
        location: z.object({ name: z.string().nullish() }).nullish(),
        updated_at: z.string().nullish(),
        first_published: z.string().nullish(),
        content: z.string().nullish(),
    })),
});

const LeverSchema = z.array(z.object({
    id: z.string(),
    text: z.string().nullish(),
    hostedUrl: z.string().nullish(),
    applyUrl: z.string().nullish(),
    categories: z.object({
        location: z.string().nullish(),
        commitment: z.string().nullish(),
        team: z.string().nullish(),
    }).nullish(),
    createdAt: z.number().nullish(),
    description: z.string().nullish(),
    descriptionPlain: z.string().nullish(),
}));

const RecruiteeSchema = z.object({
    offers: z.array(z.object({
        id: z.union([z.number(), z.string()]),
        title: z.string().nullish(),
        careers_url: z.string().nullish(),
        careers_apply_url: z.string().nullish(),
        description: z.string().nullish(),
        city: z.string().nullish(),
        country: z.string().nullish(),
        remote: z.boolean().nullish(),
        created_at: z.string().nullish(),
        published_at: z.string().nullish(),
    })),
});

// ─── Vendor mapping ───────────────────────────────────────────────────────────

interface VendorApi {
    endpoint(slug: string): string;
    map(payload: unknown): LooseCandidate[] | null;
}

function joinLocation(...parts: Array<string | null | undefined>): string | undefined {
    const present = parts.map((p) => p?.trim()).filter((p): p is string => Boolean(p));
    return present.length > 0 ? present.join(', ') : undefined;
}

export const ATS_VENDOR_APIS: Record<AtsVendor, VendorApi> = {
    greenhouse: {
        endpoint: (slug) => `https://boards-api.greenhouse.io/v1/boards/${encodeURIComponent(slug)}/jobs?content=true`,
        map(payload) {
            const parsed = GreenhouseSchema.safeParse(payload);
            if (!parsed.success) return null;
            return parsed.data.jobs.map((job) => ({
                title: job.title,
                url: job.absolute_url,
                location: job.location?.name,
                postedAt: job.first_published ?? job.updated_at,
                description: htmlToText(job.content),
            }));
        },
    },
    lever: {
        endpoint: (slug) => `https://api.lever.co/v0/postings/${encodeURIComponent(slug)}?mode=json`,
        map(payload) {
            const parsed = LeverSchema.safeParse(payload);
            if (!parsed.success) return null;
            return parsed.data.map((job) => ({
                title: job.text,
                url: job.hostedUrl ?? job.applyUrl,
                location: job.categories?.location,
                postedAt: job.createdAt,
                description: job.descriptionPlain ?? htmlToText(job.description),
            }));
        },
    },
    recruitee: {
        endpoint: (slug) => `https://${encodeURIComponent(slug)}.recruitee.com/api/offers/`,
        map(payload) {
            const parsed = RecruiteeSchema.safeParse(payload);
            if (!parsed.success) return null;
            return parsed.data.offers.map((offer) => ({
                title: offer.title,
                url: offer.careers_url ?? offer.careers_apply_url,
                location: joinLocation(offer.city, offer.country, offer.remote ? 'Remote' : undefined),
                postedAt: offer.published_at ?? offer.created_at,
                description: htmlToText(offer.description),
            }));
        },
    },
};

// ─── Adapter ──────────────────────────────────────────────────────────────────

export class AtsJsonAdapter implements SourceAdapter {
    readonly kind = 'ats-json' as const;

    async fetch(source: Source, context: AdapterContext): Promise<AdapterResult> {
        const config: AtsJsonConfig = parseSourceConfig('ats-json', source.config);
        const api = ATS_VENDOR_APIS[config.vendor];
        const url = api.endpoint(config.slug);

        const payload = await context.http.getJson(url, {
            signal: context.signal,
            timeoutMs: context.timeoutMs,
        });
        const loose = api.map(payload);
        if (!loose) {
            throw new SourceUnreachableError(`Unexpected ${config.vendor} payload from ${url}`);
        }

        const { candidates, dropped } = sanitizeCandidates(loose);
        log.debug(`[AtsJson] ${source.name}: ${candidates.length} candidates (${dropped} dropped) from ${config.vendor}`);
        return { candidates, dropped };
    }
}
