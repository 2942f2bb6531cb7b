/**
 * src/services/renderService.ts
 *
 * Client for an external headless-browser render service. The service loads
 * a page in a real browser, optionally waits for a selector, and returns the
 * final HTML.
 *
 *   POST {RENDER_SERVICE_URL}/render  { url, waitForSelector?, timeoutMs }  →  { html }
 *   GET  {RENDER_SERVICE_URL}/health  →  { status: "ok" }
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { SourceUnreachableError, errorMessage } from '../sources/errors.js';
import type { PageRenderer, RenderOptions } from '../sources/types.js';

const RenderResponseSchema = z.object({
    html: z.string(),
});

export class HttpPageRenderer implements PageRenderer {
    private readonly baseUrl: string;

    constructor(baseUrl: string) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
    }

    async render(url: string, options: RenderOptions): Promise<string> {
        let res: Response;
        try {
            res = await fetch(`${this.baseUrl}/render`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    url,
                    waitForSelector: options.waitSelector,
                    timeoutMs: options.timeoutMs,
                }),
                signal: options.signal,
            });
        } catch (err) {
            if (options.signal.aborted) throw options.signal.reason;
            throw new SourceUnreachableError(`Render service unreachable: ${errorMessage(err)}`, {
                retryable: true,
                cause: err,
            });
        }

        if (!res.ok) {
            throw new SourceUnreachableError(`Render service returned HTTP ${res.status} for ${url}`, {
                statusCode: res.status,
                retryable: res.status >= 500,
            });
        }

        const parsed = RenderResponseSchema.safeParse(await res.json());
        if (!parsed.success) {
            throw new SourceUnreachableError(`Render service returned no HTML for ${url}`);
        }
        log.debug(`[Render] ${url}: ${parsed.data.html.length} bytes`);
        return parsed.data.html;
    }

    async ping(): Promise<boolean> {
        try {
            const res = await fetch(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(5000) });
            return res.ok;
        } catch (err) {
            log.warning(`[Render] Health check failed: ${errorMessage(err)}`);
            return false;
        }
    }
}
