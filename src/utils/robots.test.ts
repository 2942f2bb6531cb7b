import { describe, it, expect, vi } from 'vitest';
import { RobotsCache, type FetchRobotsText } from './robots.js';

const ROBOTS = ['User-agent: *', 'Disallow: /private', ''].join('\n');

function signal(): AbortSignal {
    return new AbortController().signal;
}

describe('RobotsCache', () => {
    it('applies the rules of the page origin', async () => {
        const fetchText = vi.fn<FetchRobotsText>(async () => ROBOTS);
        const robots = new RobotsCache(fetchText, 60_000);

        expect(await robots.isAllowed('https://careers.example.com/jobs', signal())).toBe(true);
        expect(await robots.isAllowed('https://careers.example.com/private/roles', signal())).toBe(false);
        expect(fetchText).toHaveBeenCalledTimes(1);
        expect(fetchText.mock.calls[0][0]).toBe('https://careers.example.com/robots.txt');
    });

    it('fetches robots.txt again once the cached copy expires', async () => {
        let clock = 0;
        const fetchText = vi.fn(async () => ROBOTS);
        const robots = new RobotsCache(fetchText, 1_000, () => clock);

        await robots.isAllowed('https://careers.example.com/jobs', signal());
        clock = 999;
        await robots.isAllowed('https://careers.example.com/jobs', signal());
        expect(fetchText).toHaveBeenCalledTimes(1);

        clock = 1_000;
        await robots.isAllowed('https://careers.example.com/jobs', signal());
        expect(fetchText).toHaveBeenCalledTimes(2);
    });

    it('allows everything when robots.txt cannot be fetched', async () => {
        const fetchText = vi.fn(async (): Promise<string> => {
            throw new Error('HTTP 404');
        });
        const robots = new RobotsCache(fetchText, 60_000);

        expect(await robots.isAllowed('https://careers.example.com/private/roles', signal())).toBe(true);
        expect(await robots.isAllowed('https://careers.example.com/private/other', signal())).toBe(true);
        expect(fetchText).toHaveBeenCalledTimes(1);
    });

    it('rethrows the abort reason instead of caching a miss', async () => {
        const controller = new AbortController();
        const fetchText = vi.fn(async (): Promise<string> => {
            controller.abort(new Error('shutting down'));
            throw new Error('aborted');
        });
        const robots = new RobotsCache(fetchText, 60_000);

        await expect(robots.isAllowed('https://careers.example.com/jobs', controller.signal)).rejects.toThrow('shutting down');
        await robots.isAllowed('https://careers.example.com/jobs', signal());
        expect(fetchText).toHaveBeenCalledTimes(2);
    });
});
