/**
 * src/services/ollamaExtractor.ts
 *
 * Ollama-backed JobExtractor for the AI-assisted HTML adapter.
 *
 * RESPONSIBILITIES
 * ────────────────
 *  1. Structured job extraction via Ollama /api/chat (JSON mode)
 *  2. Validation of the model's reply (it is untrusted input)
 *  3. Ollama health check at startup
 *
 * Raw fetch(), no wrapper libraries. Model, base URL and sampling settings
 * come from the constructor so the entry point decides them from env.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { ExtractionFailedError, errorMessage } from '../sources/errors.js';
import type { LooseCandidate } from '../sources/candidate.js';
import type { ExtractJobsOptions, JobExtractor } from '../sources/types.js';

export interface OllamaConfig {
    baseUrl: string;
    model: string;
    timeoutMs: number;
    temperature: number;
    maxTokens: number;
}

// ─── Prompt ───────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT =
    'You are a structured data extraction engine. Always respond with valid JSON only. Never add commentary.';

export const EXTRACTION_PROMPT = (markdown: string, pageUrl: string): string => `
Extract ALL job openings listed on the careers page below.
Page URL: ${pageUrl}

Respond with a JSON object of the form {"jobs": [...]}. Each job must match:
{
  "title": "exact job title",
  "url": "link to the job posting, absolute or relative to the page URL",
  "location": "city, country or Remote",
  "job_type": "Full Time | Part Time | Internship | Contract",
  "posted_at": "ISO-8601 date if the page shows one, otherwise null",
  "description": "one or two sentences summarizing the role, or null"
}

Rules:
- Only include real job openings, not navigation links or blog posts
- If a field is not on the page use null; never invent URLs
- If there are no openings, respond with {"jobs": []}

Page content:
${markdown}
`;

// ─── Response validation ──────────────────────────────────────────────────────

const ChatResponseSchema = z.object({
    message: z.object({ content: z.string() }),
});

const optionalText = z.string().nullish().catch(undefined);

const ExtractedJobSchema = z.object({
    title: z.string(),
    url: optionalText,
    apply_url: optionalText,
    location: optionalText,
    job_type: optionalText,
    posted_at: optionalText,
    description: optionalText,
});

function parseModelJson(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        // Some models wrap the JSON in prose despite format=json.
        const match = raw.match(/\[[\s\S]*\]|\{[\s\S]*\}/);
        if (!match) throw new ExtractionFailedError(`LLM reply is not JSON: ${raw.slice(0, 120)}`);
        try {
            return JSON.parse(match[0]);
        } catch (err) {
            throw new ExtractionFailedError(`LLM reply is not JSON: ${raw.slice(0, 120)}`, { cause: err });
        }
    }
}

function unwrapJobList(parsed: unknown): unknown[] {
    if (Array.isArray(parsed)) return parsed;
    if (parsed !== null && typeof parsed === 'object') {
        const list = Object.values(parsed).find((value): value is unknown[] => Array.isArray(value));
        if (list) return list;
        if ('title' in parsed) return [parsed];
    }
    throw new ExtractionFailedError('LLM reply does not contain a job list');
}

/**
 * Validates each item of the model's job list. Items that are not job objects
 * come back as `null` so the candidate sanitizer counts them as dropped.
 */
export function validateExtractedJobs(raw: string): Array<LooseCandidate | null> {
    const list = unwrapJobList(parseModelJson(raw));
    const out = list.map((item): LooseCandidate | null => {
        const parsed = ExtractedJobSchema.safeParse(item);
        if (!parsed.success) return null;
        const job = parsed.data;
        const description = [job.job_type ? `Type: ${job.job_type}` : '', job.description ?? '']
            .filter(Boolean)
            .join('\n');
        return {
            title: job.title,
            url: job.url ?? job.apply_url,
            location: job.location,
            postedAt: job.posted_at,
            description: description || undefined,
        };
    });

    if (list.length > 0 && out.every((item) => item === null)) {
        throw new ExtractionFailedError(`None of the ${list.length} items in the LLM reply is a valid job`);
    }
    return out;
}

// ─── Extractor ────────────────────────────────────────────────────────────────

export class OllamaJobExtractor implements JobExtractor {
    constructor(private readonly config: OllamaConfig) {}

    async extractJobs(pageContent: string, options: ExtractJobsOptions): Promise<unknown[]> {
        const body = {
            model: this.config.model,
            format: 'json',
            stream: false,
            options: {
                temperature: this.config.temperature,
                num_predict: this.config.maxTokens,
            },
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: EXTRACTION_PROMPT(pageContent, options.pageUrl) },
            ],
        };

        let res: Response;
        try {
            res = await fetch(`${this.config.baseUrl}/api/chat`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(body),
                signal: AbortSignal.any([options.signal, AbortSignal.timeout(this.config.timeoutMs)]),
            });
        } catch (err) {
            if (options.signal.aborted) throw options.signal.reason;
            throw new ExtractionFailedError(`Ollama request failed: ${errorMessage(err)}`, { cause: err });
        }

        if (!res.ok) {
            throw new ExtractionFailedError(`Ollama error: ${res.status} ${res.statusText}`);
        }

        const envelope = ChatResponseSchema.safeParse(await res.json());
        if (!envelope.success) {
            throw new ExtractionFailedError('Ollama response has no message content');
        }

        const jobs = validateExtractedJobs(envelope.data.message.content.trim());
        log.debug(`[OllamaExtractor] ${options.pageUrl}: model returned ${jobs.length} items`);
        return jobs;
    }
}

/**
 * Verifies Ollama is running and the configured model is pulled.
 * Never throws; a false result disables the AI-assisted adapter's extractor.
 */
export async function checkOllamaHealth(config: Pick<OllamaConfig, 'baseUrl' | 'model'>): Promise<boolean> {
    try {
        const res = await fetch(`${config.baseUrl}/api/tags`, {
            signal: AbortSignal.timeout(5000),
        });
        if (!res.ok) {
            log.warning(`[OllamaHealth] Ollama returned HTTP ${res.status}`);
            return false;
        }

        const parsed = z.object({ models: z.array(z.object({ name: z.string() })) }).safeParse(await res.json());
        if (!parsed.success) {
            log.warning('[OllamaHealth] Unexpected /api/tags response');
            return false;
        }

        const available = parsed.data.models.map((m) => m.name);
        const modelBase = config.model.split(':')[0];
        if (!available.some((m) => m.includes(modelBase))) {
            log.warning(
                `[OllamaHealth] Model ${config.model} not found. Available: [${available.join(', ')}]. ` +
                `Run: ollama pull ${config.model}`
            );
            return false;
        }

        log.info(`[OllamaHealth] Ollama running at ${config.baseUrl} with ${config.model}`);
        return true;
    } catch (err) {
        log.warning(`[OllamaHealth] Ollama not reachable at ${config.baseUrl}: ${errorMessage(err)}`);
        return false;
    }
}
