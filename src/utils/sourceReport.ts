/**
 * src/utils/sourceReport.ts
 *
 * Box-drawn tables for the maintenance CLI.
 */

import type { Source } from '../sources/types.js';
import type { RunRecord } from './jobStore.js';

function cell(value: string, width: number): string {
    return value.length > width ? value.slice(0, width - 1) + '…' : value.padEnd(width);
}

function table(widths: readonly number[], header: readonly string[], rows: readonly string[][]): string {
    const rule = (l: string, m: string, r: string): string => l + widths.map((w) => '─'.repeat(w + 2)).join(m) + r;
    const line = (values: readonly string[]): string =>
        '│' + values.map((v, i) => ` ${cell(v, widths[i])} `).join('│') + '│';
    return [
        rule('┌', '┬', '┐'),
        line(header),
        rule('├', '┼', '┤'),
        ...rows.map(line),
        rule('└', '┴', '┘'),
    ].join('\n');
}

const fmtRate = (rate: number | null): string => (rate === null ? '-' : `${Math.round(rate * 100)}%`);
const fmtDate = (iso: string | null): string => (iso ? iso.slice(0, 16).replace('T', ' ') : '-');

export function formatSourceTable(sources: readonly Source[]): string {
    if (sources.length === 0) return 'No sources registered.';
    return table(
        [20, 16, 6, 7, 5, 5, 16],
        ['Source', 'Adapter', 'Active', 'Success', 'Fail', 'Empty', 'Last crawled'],
        sources.map((s) => [
            s.id,
            s.adapterKind,
            s.active ? 'yes' : 'no',
            fmtRate(s.successRate),
            String(s.consecutiveFailures),
            String(s.consecutiveEmpty),
            fmtDate(s.lastCrawledAt),
        ])
    );
}

export function formatRunTable(runs: readonly RunRecord[]): string {
    if (runs.length === 0) return 'No crawl runs recorded.';
    return table(
        [36, 9, 9, 16, 7, 4, 6],
        ['Run', 'Trigger', 'State', 'Started', 'Sources', 'New', 'Failed'],
        runs.map((r) => [
            r.id,
            r.trigger,
            r.state,
            fmtDate(r.startedAt),
            String(r.totals.sources),
            String(r.totals.newJobs),
            String(r.totals.failed),
        ])
    );
}
