/**
 * src/utils/robots.ts
 *
 * robots.txt rules per origin, parsed with crawlee's RobotsTxtFile and cached
 * for `ttlMs`. A robots.txt that cannot be fetched allows everything.
 */

import { RobotsTxtFile, log } from 'crawlee';
import { errorMessage } from '../sources/errors.js';

export type FetchRobotsText = (robotsUrl: string, signal: AbortSignal) => Promise<string>;

interface CachedRules {
    rules: RobotsTxtFile | null;
    fetchedAt: number;
}

export class RobotsCache {
    private readonly byOrigin = new Map<string, CachedRules>();

    constructor(
        private readonly fetchText: FetchRobotsText,
        private readonly ttlMs: number,
        private readonly now: () => number = Date.now
    ) {}

    async isAllowed(url: string, signal: AbortSignal): Promise<boolean> {
        let origin: string;
        try {
            origin = new URL(url).origin;
        } catch {
            return true;
        }
        const rules = await this.rulesFor(origin, signal);
        return rules === null || rules.isAllowed(url);
    }

    private async rulesFor(origin: string, signal: AbortSignal): Promise<RobotsTxtFile | null> {
        const cached = this.byOrigin.get(origin);
        if (cached && this.now() - cached.fetchedAt < this.ttlMs) return cached.rules;

        const robotsUrl = `${origin}/robots.txt`;
        let rules: RobotsTxtFile | null = null;
        try {
            rules = RobotsTxtFile.from(robotsUrl, await this.fetchText(robotsUrl, signal));
        } catch (err) {
            if (signal.aborted) throw signal.reason;
            log.debug(`[Robots] No usable robots.txt at ${robotsUrl}: ${errorMessage(err)}`);
        }
        this.byOrigin.set(origin, { rules, fetchedAt: this.now() });
        return rules;
    }
}
