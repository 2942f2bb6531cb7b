/**
 * src/sources/guestSearch.ts
 *
 * Guest-search adapter: paginates a job board's public, logged-out search
 * endpoint (LinkedIn's `jobs-guest` fragment API by default) and parses the
 * returned HTML cards with Cheerio.
 *
 * Pagination stops at the first page with no cards, at HTTP 404 (past the
 * last page) or after `maxPages`. 429 / 403 surface as RateLimited via the
 * HTTP client and are never retried.
 */

import { log } from 'crawlee';
import * as cheerio from 'cheerio';
import { sanitizeCandidates, type LooseCandidate } from './candidate.js';
import { normalizeUrl } from './dedupFingerprint.js';
import { SourceUnreachableError } from './errors.js';
import { parseSourceConfig, type GuestSearchConfig } from './sourceConfig.js';
import type { AdapterContext, AdapterResult, RawCandidate, Source, SourceAdapter } from './types.js';
import { sleep } from '../utils/backoff.js';

// ─── URL Builder ──────────────────────────────────────────────────────────────

export function buildGuestSearchUrl(config: GuestSearchConfig, page: number): string {
    const url = new URL(config.endpoint);
    url.searchParams.set('keywords', config.keywords);
    if (config.location) url.searchParams.set('location', config.location);
    if (config.remoteOnly) url.searchParams.set('f_WT', '2');
    for (const [key, value] of Object.entries(config.filters)) {
        url.searchParams.set(key, value);
    }
    url.searchParams.set('start', String(page * config.pageSize));
    return url.toString();
}

// ─── Card Parser ──────────────────────────────────────────────────────────────

/** Parses one page of search-result cards. Relative links stay relative until sanitizing. */
export function parseGuestSearchCards(html: string): LooseCandidate[] {
    const $ = cheerio.load(html);
    const cards: LooseCandidate[] = [];

    $('.base-search-card, .base-card, .job-search-card').each((_, el) => {
        const $card = $(el);
        // Nested matches (a .base-card inside a .base-search-card) would double count.
        if ($card.parents('.base-search-card, .base-card, .job-search-card').length > 0) return;

        const title = $card.find('.base-search-card__title, h3').first().text();
        const href = $card.find('a.base-card__full-link, a[href*="/jobs/view/"]').first().attr('href');
        const company = $card.find('.base-search-card__subtitle, h4').first().text().trim();
        const location = $card.find('.job-search-card__location').first().text();
        const snippet = $card.find('.job-search-card__snippet').first().text().trim();
        const postedAt = $card.find('time').first().attr('datetime');

        // Tracking parameters make the same job look different on every page.
        const url = href?.split('?')[0];
        const description = [company ? `Company: ${company}` : '', snippet].filter(Boolean).join('\n');

        cards.push({
            title,
            url,
            location,
            postedAt,
            description: description || undefined,
        });
    });

    return cards;
}

// ─── Adapter ──────────────────────────────────────────────────────────────────

export class GuestSearchAdapter implements SourceAdapter {
    readonly kind = 'guest-search' as const;

    async fetch(source: Source, context: AdapterContext): Promise<AdapterResult> {
        const config = parseSourceConfig('guest-search', source.config);
        const seen = new Set<string>();
        const candidates: RawCandidate[] = [];
        let dropped = 0;

        for (let page = 0; page < config.maxPages; page++) {
            if (page > 0 && config.pageDelayMs > 0) {
                await sleep(config.pageDelayMs, context.signal);
            }

            const url = buildGuestSearchUrl(config, page);
            let html: string;
            try {
                html = await context.http.getText(url, {
                    signal: context.signal,
                    timeoutMs: context.timeoutMs,
                    headers: { Accept: 'text/html' },
                });
            } catch (err) {
                if (err instanceof SourceUnreachableError && err.statusCode === 404) {
                    log.debug(`[GuestSearch] ${source.name}: 404 on page ${page}, end of results`);
                    break;
                }
                throw err;
            }

            const cards = parseGuestSearchCards(html);
            if (cards.length === 0) break;

            const sanitized = sanitizeCandidates(cards, url);
            dropped += sanitized.dropped;
            for (const candidate of sanitized.candidates) {
                const key = normalizeUrl(candidate.url);
                if (seen.has(key)) continue;
                seen.add(key);
                candidates.push(candidate);
            }
        }

        log.debug(`[GuestSearch] ${source.name}: ${candidates.length} candidates (${dropped} dropped)`);
        return { candidates, dropped };
    }
}
