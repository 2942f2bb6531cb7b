/**
 * src/sources/jsonLd.ts
 *
 * schema.org JobPosting objects embedded as JSON-LD. Many careers pages
 * (and most ATS-hosted ones) publish their openings this way, which makes
 * the LLM pass unnecessary for them.
 */

import { log } from 'crawlee';
import * as cheerio from 'cheerio';
import { z } from 'zod';
import { htmlToText, type LooseCandidate } from './candidate.js';
import { errorMessage } from './errors.js';

const looseString = z.string().optional().catch(undefined);

const AddressSchema = z.union([
    z.string(),
    z.object({
        addressLocality: looseString,
        addressRegion: looseString,
        addressCountry: z.union([z.string(), z.object({ name: looseString })]).optional().catch(undefined),
    }),
]);

const PlaceSchema = z.object({ address: AddressSchema.optional().catch(undefined) });

const JobPostingSchema = z.object({
    title: looseString,
    url: looseString,
    datePosted: looseString,
    description: looseString,
    jobLocation: z.union([PlaceSchema, z.array(PlaceSchema)]).optional().catch(undefined),
    jobLocationType: looseString,
});

type JobPostingLd = z.infer<typeof JobPostingSchema>;
type Place = z.infer<typeof PlaceSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJobPosting(node: Record<string, unknown>): boolean {
    const type = node['@type'];
    return type === 'JobPosting' || (Array.isArray(type) && type.includes('JobPosting'));
}

/** Depth-first walk collecting every JobPosting node, including @graph members. */
function collectJobPostings(node: unknown, out: unknown[]): void {
    if (Array.isArray(node)) {
        for (const item of node) collectJobPostings(item, out);
        return;
    }
    if (!isRecord(node)) return;
    if (isJobPosting(node)) out.push(node);
    for (const value of Object.values(node)) {
        if (typeof value === 'object' && value !== null) collectJobPostings(value, out);
    }
}

function placeToText(place: Place): string | undefined {
    const address = place.address;
    if (address === undefined) return undefined;
    if (typeof address === 'string') return address.trim() || undefined;
    const country = typeof address.addressCountry === 'string' ? address.addressCountry : address.addressCountry?.name;
    const parts = [address.addressLocality, address.addressRegion, country]
        .map((p) => p?.trim())
        .filter((p): p is string => Boolean(p));
    return parts.length > 0 ? parts.join(', ') : undefined;
}

function locationOf(posting: JobPostingLd): string | undefined {
    const places = posting.jobLocation === undefined
        ? []
        : Array.isArray(posting.jobLocation) ? posting.jobLocation : [posting.jobLocation];
    const texts = [...new Set(places.map(placeToText).filter((t): t is string => t !== undefined))];
    if (texts.length > 0) return texts.join('; ');
    return posting.jobLocationType === 'TELECOMMUTE' ? 'Remote' : undefined;
}

/**
 * Reads every `application/ld+json` block on the page and maps its
 * JobPosting nodes to loose candidates. Postings without their own URL point
 * at `pageUrl`. Unparseable blocks are skipped.
 */
export function extractJsonLdJobs(html: string, pageUrl: string): LooseCandidate[] {
    const $ = cheerio.load(html);
    const nodes: unknown[] = [];

    $('script[type="application/ld+json"]').each((_, el) => {
        const raw = $(el).html();
        if (!raw) return;
        try {
            collectJobPostings(JSON.parse(raw), nodes);
        } catch (err) {
            log.debug(`[JsonLd] Skipping unparseable block on ${pageUrl}: ${errorMessage(err)}`);
        }
    });

    return nodes.map((node) => {
        const posting = JobPostingSchema.parse(node);
        return {
            title: posting.title,
            url: posting.url ?? pageUrl,
            location: locationOf(posting),
            postedAt: posting.datePosted,
            description: htmlToText(posting.description),
        };
    });
}
