import { describe, it, expect, vi } from 'vitest';
import { ExtractionFailedError } from '../sources/errors.js';
import { checkOllamaHealth, OllamaJobExtractor, validateExtractedJobs } from './ollamaExtractor.js';

const config = {
    baseUrl: 'http://ollama.test:11434',
    model: 'qwen2.5:7b-instruct',
    timeoutMs: 5_000,
    temperature: 0,
    maxTokens: 2048,
};

const jsonResponse = (body: unknown, status = 200): Response =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const options = () => ({ pageUrl: 'https://careers.example.com/jobs', signal: new AbortController().signal });

describe('validateExtractedJobs', () => {
    it('maps model fields onto candidates and nulls out invalid items', () => {
        const items = validateExtractedJobs(JSON.stringify({
            jobs: [
                { title: 'Data Engineer', url: '/jobs/1', job_type: 'Full-time', description: 'Pipelines' },
                { name: 'not a job' },
            ],
        }));
        expect(items).toEqual([
            { title: 'Data Engineer', url: '/jobs/1', description: 'Type: Full-time\nPipelines' },
            null,
        ]);
    });

    it('falls back to the apply url and ignores mistyped fields', () => {
        expect(validateExtractedJobs('[{"title":"SRE","url":42,"apply_url":"https://example.com/apply/9","location":"Oslo"}]'))
            .toEqual([{ title: 'SRE', url: 'https://example.com/apply/9', location: 'Oslo' }]);
    });

    it('accepts a bare job object', () => {
        expect(validateExtractedJobs('{"title":"Solo","url":"https://example.com/1"}'))
            .toEqual([{ title: 'Solo', url: 'https://example.com/1' }]);
    });

    it('digs JSON out of surrounding prose', () => {
        expect(validateExtractedJobs('Here you go: {"jobs": []} thanks')).toEqual([]);
    });

    it('rejects replies that are not JSON or hold no list', () => {
        expect(() => validateExtractedJobs('no json here')).toThrow(new ExtractionFailedError('LLM reply is not JSON: no json here'));
        expect(() => validateExtractedJobs('{"status":"ok"}')).toThrow('LLM reply does not contain a job list');
    });

    it('rejects a list where no item is a job', () => {
        expect(() => validateExtractedJobs('[{"foo":1},{"bar":2}]')).toThrow('None of the 2 items in the LLM reply is a valid job');
    });
});

describe('OllamaJobExtractor', () => {
    it('posts a JSON-mode chat request and validates the reply', async () => {
        const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({
            message: { content: '{"jobs":[{"title":"Data Engineer","url":"/jobs/1"}]}' },
        }));

        const items = await new OllamaJobExtractor(config).extractJobs('## Open roles', options());

        expect(items).toEqual([{ title: 'Data Engineer', url: '/jobs/1' }]);
        expect(fetchSpy).toHaveBeenCalledTimes(1);
        const [url, init] = fetchSpy.mock.calls[0];
        expect(url).toBe('http://ollama.test:11434/api/chat');
        const body = JSON.parse(String(init?.body));
        expect(body).toMatchObject({
            model: 'qwen2.5:7b-instruct',
            format: 'json',
            stream: false,
            options: { temperature: 0, num_predict: 2048 },
        });
        expect(body.messages[1].content).toContain('## Open roles');
        expect(body.messages[1].content).toContain('https://careers.example.com/jobs');
    });

    it('reports HTTP errors as ExtractionFailed', async () => {
        vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('boom', { status: 500, statusText: 'Internal Server Error' }));
        await expect(new OllamaJobExtractor(config).extractJobs('x', options()))
            .rejects.toThrow(new ExtractionFailedError('Ollama error: 500 Internal Server Error'));
    });

    it('reports transport errors as ExtractionFailed', async () => {
        vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
        await expect(new OllamaJobExtractor(config).extractJobs('x', options()))
            .rejects.toThrow(new ExtractionFailedError('Ollama request failed: fetch failed'));
    });

    it('reports a reply without message content', async () => {
        vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ done: true }));
        await expect(new OllamaJobExtractor(config).extractJobs('x', options()))
            .rejects.toThrow('Ollama response has no message content');
    });

    it('rethrows the caller abort reason', async () => {
        const controller = new AbortController();
        const reason = new Error('run cancelled');
        vi.spyOn(globalThis, 'fetch').mockImplementation(async () => {
            controller.abort(reason);
            throw new DOMException('aborted', 'AbortError');
        });
        await expect(new OllamaJobExtractor(config).extractJobs('x', { pageUrl: 'https://a.example', signal: controller.signal }))
            .rejects.toBe(reason);
    });
});

describe('checkOllamaHealth', () => {
    it('is healthy when the model is pulled', async () => {
        vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ models: [{ name: 'qwen2.5:7b-instruct' }] }));
        expect(await checkOllamaHealth(config)).toBe(true);
    });

    it('is unhealthy when the model is missing or the server is down', async () => {
        vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(jsonResponse({ models: [{ name: 'llama3:8b' }] }));
        expect(await checkOllamaHealth(config)).toBe(false);

        vi.spyOn(globalThis, 'fetch').mockRejectedValueOnce(new TypeError('fetch failed'));
        expect(await checkOllamaHealth(config)).toBe(false);
    });
});
