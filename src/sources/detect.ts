/**
 * src/sources/detect.ts
 *
 * Infers an adapter kind and configuration from a careers-page URL, so an
 * operator can register a company by pasting the link they would open in a
 * browser. Hosted ATS boards map to `ats-json`, LinkedIn job searches to
 * `guest-search`, everything else to `ai-assisted-html`.
 *
 * Company-branded careers pages often embed a hosted board; the page-level
 * variant fetches the page and looks for one before settling on the HTML
 * adapter.
 */

import { log } from 'crawlee';
import { InvalidSourceConfigError, errorMessage } from './errors.js';
import { parseSourceConfig } from './sourceConfig.js';
import type { AdapterKind } from './types.js';
import type { HttpClient } from '../utils/httpClient.js';

export interface DetectedSource {
    adapterKind: AdapterKind;
    config: Record<string, unknown>;
    /** Human-friendly name guessed from the URL. */
    suggestedName: string;
}

function firstSegment(pathname: string): string | null {
    const segment = pathname.split('/').find((s) => s.length > 0);
    return segment ? decodeURIComponent(segment) : null;
}

function titleCase(slug: string): string {
    return slug
        .split(/[-_.]+/)
        .filter(Boolean)
        .map((part) => part[0].toUpperCase() + part.slice(1))
        .join(' ');
}

export function detectSource(rawUrl: string): DetectedSource {
    let url: URL;
    try {
        url = new URL(rawUrl.trim());
    } catch {
        throw new InvalidSourceConfigError(`Not an absolute URL: ${rawUrl}`);
    }
    const host = url.hostname.toLowerCase();

    if (host === 'boards.greenhouse.io' || host === 'job-boards.greenhouse.io') {
        const slug = firstSegment(url.pathname);
        if (slug) return ats('greenhouse', slug);
    }
    if (host === 'boards-api.greenhouse.io') {
        const match = url.pathname.match(/\/v1\/boards\/([^/]+)/);
        if (match) return ats('greenhouse', decodeURIComponent(match[1]));
    }
    if (host === 'jobs.lever.co' || host === 'api.lever.co') {
        const segments = url.pathname.split('/').filter(Boolean);
        const slug = host === 'api.lever.co' ? segments[2] : segments[0];
        if (slug) return ats('lever', decodeURIComponent(slug));
    }
    if (host.endsWith('.recruitee.com')) {
        const slug = host.slice(0, -'.recruitee.com'.length);
        if (slug && !slug.includes('.')) return ats('recruitee', slug);
    }
    if ((host === 'www.linkedin.com' || host === 'linkedin.com') && url.pathname.startsWith('/jobs')) {
        const keywords = url.searchParams.get('keywords');
        if (keywords) {
            const location = url.searchParams.get('location');
            const config: Record<string, unknown> = { keywords };
            if (location) config.location = location;
            if (url.searchParams.get('f_WT') === '2') config.remoteOnly = true;
            parseSourceConfig('guest-search', config);
            return {
                adapterKind: 'guest-search',
                config,
                suggestedName: `LinkedIn: ${keywords}${location ? ` (${location})` : ''}`,
            };
        }
    }

    const config = { url: url.toString() };
    parseSourceConfig('ai-assisted-html', config);
    return {
        adapterKind: 'ai-assisted-html',
        config,
        suggestedName: titleCase(host.replace(/^(www|careers|jobs)\./, '').split('.')[0]),
    };
}

type AtsVendor = 'greenhouse' | 'lever' | 'recruitee';

const SLUG = '([A-Za-z0-9_-]+)';

// Most specific first: API and embed URLs name the board unambiguously.
const EMBEDDED_BOARDS: ReadonlyArray<[AtsVendor, RegExp]> = [
    ['greenhouse', new RegExp(`boards-api\\.greenhouse\\.io/v1/boards/${SLUG}`, 'i')],
    ['greenhouse', new RegExp(`boards\\.greenhouse\\.io/embed/job_board(?:/js)?\\?for=${SLUG}`, 'i')],
    ['greenhouse', new RegExp(`(?:job-)?boards\\.greenhouse\\.io/(?!(?:embed|v1|jobs|careers|openings)\\b)${SLUG}`, 'i')],
    ['lever', new RegExp(`api\\.lever\\.co/v0/postings/${SLUG}`, 'i')],
    ['lever', new RegExp(`jobs\\.lever\\.co/${SLUG}`, 'i')],
    ['recruitee', new RegExp(`//${SLUG}\\.recruitee\\.com`, 'i')],
];

/** Finds a hosted ATS board referenced anywhere in a page's markup. */
export function detectEmbeddedAts(html: string): DetectedSource | null {
    for (const [vendor, pattern] of EMBEDDED_BOARDS) {
        const match = html.match(pattern);
        if (match) return ats(vendor, match[1]);
    }
    return null;
}

/**
 * detectSource(), plus a look inside pages that would otherwise go to the
 * HTML adapter. A page that cannot be fetched keeps the HTML adapter.
 */
export async function detectSourceFromPage(rawUrl: string, http: HttpClient, signal: AbortSignal): Promise<DetectedSource> {
    const detected = detectSource(rawUrl);
    if (detected.adapterKind !== 'ai-assisted-html') return detected;

    const pageUrl = rawUrl.trim();
    let html: string;
    try {
        html = await http.getText(pageUrl, { signal, headers: { Accept: 'text/html' }, checkRobots: true });
    } catch (err) {
        if (signal.aborted) throw signal.reason;
        log.warning(`[Detect] Could not fetch ${pageUrl}: ${errorMessage(err)}`);
        return detected;
    }

    const embedded = detectEmbeddedAts(html);
    if (!embedded) return detected;
    log.info(`[Detect] ${pageUrl} embeds a hosted board: ${JSON.stringify(embedded.config)}`);
    return { ...embedded, suggestedName: detected.suggestedName };
}

function ats(vendor: AtsVendor, slug: string): DetectedSource {
    const config = { vendor, slug };
    parseSourceConfig('ats-json', config);
    return { adapterKind: 'ats-json', config, suggestedName: titleCase(slug) };
}
