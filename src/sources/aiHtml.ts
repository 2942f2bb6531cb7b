/**
 * src/sources/aiHtml.ts
 *
 * AI-assisted HTML adapter for careers pages with no structured API.
 *
 *  1. Fetch the page (or have the render service execute its JavaScript).
 *     Direct fetches honour the site's robots.txt.
 *  2. Use the page's JSON-LD JobPosting data when it has any, and stop there.
 *  3. Strip non-content markup and convert to compact Markdown (Turndown).
 *  4. Truncate to the source's character budget.
 *  5. Ask the LLM collaborator for a job list and validate every item.
 *
 * Anything that goes wrong in step 5 is reported as an ExtractionFailed
 * annotation on an empty result; it never escapes the adapter.
 */

import { log } from 'crawlee';
import * as cheerio from 'cheerio';
import TurndownService from 'turndown';
import { sanitizeCandidates } from './candidate.js';
import { ExtractionFailedError, errorMessage } from './errors.js';
import { extractJsonLdJobs } from './jsonLd.js';
import { parseSourceConfig } from './sourceConfig.js';
import type { AdapterContext, AdapterResult, Source, SourceAdapter } from './types.js';

const NOISE_SELECTORS = 'script, style, noscript, nav, header, footer, svg, iframe, img, form, template';

const turndown = new TurndownService({ headingStyle: 'atx', codeBlockStyle: 'fenced' });

/** Cleans a page down to Markdown and caps it at `budgetChars`. */
export function htmlToMarkdown(html: string, budgetChars: number): string {
    const $ = cheerio.load(html);
    $(NOISE_SELECTORS).remove();
    const body = $('body').html() ?? $.root().html() ?? '';
    const markdown = turndown
        .turndown(body)
        .replace(/\n{3,}/g, '\n\n')
        .trim();
    return markdown.slice(0, budgetChars);
}

function emptyWithAnnotation(detail: string): AdapterResult {
    return { candidates: [], dropped: 0, annotation: { kind: 'ExtractionFailed', detail } };
}

export class AiHtmlAdapter implements SourceAdapter {
    readonly kind = 'ai-assisted-html' as const;

    async fetch(source: Source, context: AdapterContext): Promise<AdapterResult> {
        const config = parseSourceConfig('ai-assisted-html', source.config);
        const budgetChars = config.budgetChars ?? context.aiBudgetChars;

        let html: string;
        if (config.render) {
            if (!context.renderer) {
                return emptyWithAnnotation('Page requires rendering but no render service is configured');
            }
            html = await context.renderer.render(config.url, {
                waitSelector: config.waitSelector,
                timeoutMs: context.timeoutMs,
                signal: context.signal,
            });
        } else {
            html = await context.http.getText(config.url, {
                signal: context.signal,
                timeoutMs: context.timeoutMs,
                headers: { Accept: 'text/html' },
                checkRobots: true,
            });
        }

        const structured = sanitizeCandidates(extractJsonLdJobs(html, config.url), config.url);
        if (structured.candidates.length > 0) {
            log.debug(`[AiHtml] ${source.name}: ${structured.candidates.length} JSON-LD postings (${structured.dropped} dropped)`);
            return structured;
        }

        const markdown = htmlToMarkdown(html, budgetChars);
        if (markdown.length === 0) {
            log.debug(`[AiHtml] ${source.name}: page has no readable content`);
            return { candidates: [], dropped: 0 };
        }

        if (!context.extractor) {
            return emptyWithAnnotation('No LLM extractor configured');
        }

        let items: unknown[];
        try {
            items = await context.extractor.extractJobs(markdown, {
                pageUrl: config.url,
                signal: context.signal,
            });
        } catch (err) {
            if (context.signal.aborted) throw context.signal.reason;
            if (err instanceof ExtractionFailedError) {
                log.warning(`[AiHtml] ${source.name}: ${err.message}`);
                return emptyWithAnnotation(err.message);
            }
            log.warning(`[AiHtml] ${source.name}: extractor failed: ${errorMessage(err)}`);
            return emptyWithAnnotation(`Extractor failed: ${errorMessage(err)}`);
        }

        const { candidates, dropped } = sanitizeCandidates(items, config.url);
        log.debug(`[AiHtml] ${source.name}: ${candidates.length} candidates (${dropped} dropped)`);
        return { candidates, dropped };
    }
}
