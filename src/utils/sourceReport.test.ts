import { describe, it, expect } from 'vitest';
import { makeRun, makeSource } from '../testing/fixtures.js';
import { formatRunTable, formatSourceTable } from './sourceReport.js';

describe('formatSourceTable', () => {
    it('says so when there are no sources', () => {
        expect(formatSourceTable([])).toBe('No sources registered.');
    });

    it('renders one row per source', () => {
        const table = formatSourceTable([
            makeSource({ id: 'acme', successRate: 0.666, consecutiveFailures: 2, lastCrawledAt: '2026-03-02T09:15:42.000Z' }),
            makeSource({ id: 'globex', active: false }),
        ]);
        const lines = table.split('\n');

        expect(lines).toHaveLength(6);
        expect(lines[0].startsWith('┌')).toBe(true);
        expect(lines[5].startsWith('└')).toBe(true);
        expect(lines[3]).toBe(
            '│ ' + 'acme'.padEnd(20) + ' │ ' + 'ats-json'.padEnd(16) + ' │ ' + 'yes'.padEnd(6) +
            ' │ ' + '67%'.padEnd(7) + ' │ ' + '2'.padEnd(5) + ' │ ' + '0'.padEnd(5) +
            ' │ ' + '2026-03-02 09:15'.padEnd(16) + ' │'
        );
        expect(lines[4]).toContain('│ no     │ -       │');
    });

    it('truncates long ids with an ellipsis', () => {
        const table = formatSourceTable([makeSource({ id: 'a-very-long-source-identifier' })]);
        expect(table.split('\n')[3].startsWith('│ a-very-long-source-… │')).toBe(true);
    });
});

describe('formatRunTable', () => {
    it('says so when there are no runs', () => {
        expect(formatRunTable([])).toBe('No crawl runs recorded.');
    });

    it('renders run totals', () => {
        const run = makeRun({
            totals: { sources: 12, succeeded: 10, empty: 1, failed: 1, jobsFound: 80, newJobs: 5, updatedJobs: 3, archivedJobs: 0 },
        });
        const row = formatRunTable([run]).split('\n')[3];
        expect(row).toContain('│ manual    │ completed │ 2026-03-02 09:00 │ 12      │ 5    │ 1      │');
    });
});
