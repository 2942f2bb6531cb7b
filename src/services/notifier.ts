/**
 * src/services/notifier.ts
 *
 * Run listener that posts a summary of each finished crawl run.
 *
 * SUPPORTED CHANNELS
 * ──────────────────
 * 1. Slack   → POST to NOTIFY_SLACK_WEBHOOK (Incoming Webhooks URL)
 * 2. Webhook → POST the JSON summary to NOTIFY_WEBHOOK_URL
 * 3. ntfy    → POST plain text to {NTFY_SERVER}/{NTFY_TOPIC}
 *
 * WHAT GETS SENT
 * ──────────────
 *   critical → run failed
 *   warning  → run cancelled, sources failed or sources deactivated
 *   info     → new postings found
 * A clean run with nothing new sends nothing. Summaries without new postings
 * are rate-limited per (channel, severity) to one per NOTIFY_COOLDOWN_MIN.
 *
 * Never throws: delivery failures are logged as warnings.
 */

import { log } from 'crawlee';
import { errorMessage } from '../sources/errors.js';
import type { CrawlRun, JobPosting, RunListener } from '../sources/types.js';

export type NotifySeverity = 'info' | 'warning' | 'critical';
type Channel = 'slack' | 'webhook' | 'ntfy';

export interface NotifierConfig {
    enabled: boolean;
    slackWebhook?: string;
    webhookUrl?: string;
    ntfyServer?: string;
    ntfyTopic?: string;
    cooldownMin: number;
    /** Postings listed by title in the message body. */
    maxListedPostings?: number;
}

export interface RunSummary {
    severity: NotifySeverity;
    title: string;
    text: string;
}

const SEVERITY_EMOJI: Record<NotifySeverity, string> = {
    info: 'ℹ️',
    warning: '⚠️',
    critical: '🚨',
};

const SLACK_COLORS: Record<NotifySeverity, string> = {
    info: '#36A64F',
    warning: '#FFA500',
    critical: '#FF0000',
};

const NTFY_PRIORITY: Record<NotifySeverity, string> = {
    info: 'default',
    warning: 'high',
    critical: 'urgent',
};

/** Returns null when the run is not worth a notification. */
export function summarizeRun(run: CrawlRun, newPostings: readonly JobPosting[], maxListed = 10): RunSummary | null {
    const t = run.totals;
    const severity: NotifySeverity =
        run.state === 'failed' ? 'critical'
            : run.state === 'cancelled' || t.failed > 0 || run.deactivatedSourceIds.length > 0 ? 'warning'
                : 'info';

    if (severity === 'info' && newPostings.length === 0) return null;

    const lines: string[] = [];
    if (run.state === 'failed') {
        lines.push(`Run failed: ${run.failureReason ?? 'unknown reason'}`);
    } else {
        lines.push(
            `${t.sources} sources crawled: ${t.succeeded} ok, ${t.empty} empty, ${t.failed} failed. ` +
            `${t.newJobs} new, ${t.updatedJobs} updated, ${t.archivedJobs} archived.`
        );
    }
    if (run.state === 'cancelled') {
        lines.push(`Cancelled: ${run.cancelReason ?? 'no reason given'} (${run.skippedSourceIds.length} sources skipped)`);
    }
    if (run.deactivatedSourceIds.length > 0) {
        lines.push(`Deactivated: ${run.deactivatedSourceIds.join(', ')}`);
    }
    for (const failed of run.outcomes.filter((o) => o.status === 'error' || o.status === 'timeout')) {
        lines.push(`✗ ${failed.sourceName}: ${failed.errorKind ?? failed.status}`);
    }
    for (const posting of newPostings.slice(0, maxListed)) {
        lines.push(`• ${posting.title}${posting.location ? ` (${posting.location})` : ''} ${posting.url}`);
    }
    if (newPostings.length > maxListed) {
        lines.push(`…and ${newPostings.length - maxListed} more`);
    }

    return {
        severity,
        title: `Crawl run ${run.state}: ${newPostings.length} new job${newPostings.length === 1 ? '' : 's'}`,
        text: lines.join('\n'),
    };
}

async function httpPost(url: string, body: string, headers: Record<string, string>): Promise<void> {
    const res = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(8000),
    });
    if (res.status >= 400) {
        throw new Error(`HTTP ${res.status}`);
    }
}

export class RunNotifier implements RunListener {
    private readonly lastSent = new Map<string, number>();

    constructor(
        private readonly config: NotifierConfig,
        private readonly clock: () => number = Date.now
    ) {}

    async onRunFinished(run: CrawlRun, newPostings: JobPosting[]): Promise<void> {
        const summary = summarizeRun(run, newPostings, this.config.maxListedPostings);
        if (!summary) {
            log.debug(`[Notifier] Run ${run.id}: nothing to report`);
            return;
        }
        if (!this.config.enabled) {
            log.debug(`[Notifier] Notifications disabled. Would send (${summary.severity}): ${summary.title}`);
            return;
        }

        const rateLimited = newPostings.length === 0;
        await Promise.allSettled([
            this.send('slack', summary, rateLimited, () => this.sendSlack(summary)),
            this.send('webhook', summary, rateLimited, () => this.sendWebhook(summary, run, newPostings)),
            this.send('ntfy', summary, rateLimited, () => this.sendNtfy(summary)),
        ]);
    }

    private isConfigured(channel: Channel): boolean {
        switch (channel) {
            case 'slack':
                return Boolean(this.config.slackWebhook);
            case 'webhook':
                return Boolean(this.config.webhookUrl);
            case 'ntfy':
                return Boolean(this.config.ntfyServer && this.config.ntfyTopic);
        }
    }

    private async send(channel: Channel, summary: RunSummary, rateLimited: boolean, deliver: () => Promise<void>): Promise<void> {
        if (!this.isConfigured(channel)) return;

        const key = `${channel}:${summary.severity}`;
        if (rateLimited) {
            const last = this.lastSent.get(key);
            if (last !== undefined && this.clock() - last < this.config.cooldownMin * 60_000) {
                log.debug(`[Notifier] ${channel} on cooldown for ${summary.severity}.`);
                return;
            }
        }

        try {
            await deliver();
            this.lastSent.set(key, this.clock());
            log.info(`[Notifier] ${channel} notification sent (${summary.severity}).`);
        } catch (err) {
            log.warning(`[Notifier] ${channel} send failed: ${errorMessage(err)}`);
        }
    }

    private async sendSlack(summary: RunSummary): Promise<void> {
        await httpPost(this.config.slackWebhook ?? '', JSON.stringify({
            attachments: [{
                color: SLACK_COLORS[summary.severity],
                title: `${SEVERITY_EMOJI[summary.severity]} ${summary.title}`,
                text: summary.text,
                ts: Math.floor(this.clock() / 1000),
            }],
        }), { 'Content-Type': 'application/json' });
    }

    private async sendWebhook(summary: RunSummary, run: CrawlRun, newPostings: readonly JobPosting[]): Promise<void> {
        await httpPost(this.config.webhookUrl ?? '', JSON.stringify({
            severity: summary.severity,
            title: summary.title,
            message: summary.text,
            run: {
                id: run.id,
                state: run.state,
                trigger: run.trigger,
                startedAt: run.startedAt,
                finishedAt: run.finishedAt,
                totals: run.totals,
                deactivatedSourceIds: run.deactivatedSourceIds,
                skippedSourceIds: run.skippedSourceIds,
            },
            newPostings: newPostings.map((p) => ({
                id: p.id,
                sourceId: p.sourceId,
                title: p.title,
                url: p.url,
                location: p.location,
            })),
            timestamp: new Date(this.clock()).toISOString(),
            service: 'job-harvester',
        }), { 'Content-Type': 'application/json' });
    }

    private async sendNtfy(summary: RunSummary): Promise<void> {
        const server = (this.config.ntfyServer ?? '').replace(/\/+$/, '');
        await httpPost(`${server}/${encodeURIComponent(this.config.ntfyTopic ?? '')}`, summary.text, {
            'Content-Type': 'text/plain; charset=utf-8',
            Title: summary.title,
            Priority: NTFY_PRIORITY[summary.severity],
        });
    }
}
