import { describe, it, expect } from 'vitest';
import { buildPostingFingerprint } from '../sources/dedupFingerprint.js';
import type { JobPosting, RawCandidate } from '../sources/types.js';
import { reconcile } from './dedup.js';

const T0 = '2026-01-05T08:00:00.000Z';
const T1 = '2026-01-05T09:00:00.000Z';
const options = (now: string) => ({ archiveAfterMisses: 3, now });

function stored(id: string, candidate: RawCandidate, overrides: Partial<JobPosting> = {}): JobPosting {
    const created = reconcile('acme', [], [candidate], options(T0)).created[0];
    return { id, ...created, ...overrides };
}

const backend: RawCandidate = { title: 'Backend Engineer', url: 'https://jobs.example.com/acme/1', location: 'Remote' };
const frontend: RawCandidate = { title: 'Frontend Engineer', url: 'https://jobs.example.com/acme/2' };

describe('reconcile', () => {
    it('creates postings for unseen candidates', () => {
        const result = reconcile('acme', [], [backend], options(T0));
        expect(result.created).toEqual([{
            sourceId: 'acme',
            fingerprint: buildPostingFingerprint(backend),
            title: 'Backend Engineer',
            url: 'https://jobs.example.com/acme/1',
            canonicalUrl: 'https://jobs.example.com/acme/1',
            location: 'Remote',
            postedAt: null,
            description: null,
            firstSeenAt: T0,
            lastSeenAt: T0,
            missCount: 0,
            archived: false,
            archivedAt: null,
        }]);
        expect(result.updated).toEqual([]);
        expect(result.missed).toEqual([]);
    });

    it('refreshes unchanged postings without counting them as updates', () => {
        const existing = stored('1', backend);
        const result = reconcile('acme', [existing], [backend], options(T1));
        expect(result.created).toEqual([]);
        expect(result.updated).toEqual([]);
        expect(result.unchanged).toEqual([{ ...existing, lastSeenAt: T1 }]);
    });

    it('reports content changes as updates and keeps firstSeenAt', () => {
        const existing = stored('1', backend);
        const result = reconcile('acme', [existing], [{ ...backend, location: 'Lisbon' }], options(T1));
        expect(result.updated).toHaveLength(1);
        expect(result.updated[0]).toMatchObject({ id: '1', location: 'Lisbon', firstSeenAt: T0, lastSeenAt: T1 });
    });

    it('keeps stored optional fields a candidate omits', () => {
        const existing = stored('1', { ...backend, description: 'Own the billing API' });
        const result = reconcile('acme', [existing], [{ title: backend.title, url: backend.url }], options(T1));
        expect(result.unchanged).toHaveLength(1);
        expect(result.unchanged[0].location).toBe('Remote');
        expect(result.unchanged[0].description).toBe('Own the billing API');
    });

    it('matches candidates whose url differs only in tracking parameters', () => {
        const existing = stored('1', backend);
        const result = reconcile('acme', [existing], [{ ...backend, url: 'https://jobs.example.com/acme/1?utm_source=feed' }], options(T1));
        expect(result.created).toEqual([]);
        expect(result.updated).toHaveLength(1);
        expect(result.updated[0].url).toBe('https://jobs.example.com/acme/1?utm_source=feed');
    });

    it('counts repeated candidates within one batch once', () => {
        const result = reconcile('acme', [], [backend, { ...backend, title: 'backend  engineer' }, frontend], options(T0));
        expect(result.created).toHaveLength(2);
        expect(result.duplicateCandidates).toBe(1);
    });

    it('increments the miss count of absent postings', () => {
        const existing = stored('1', backend, { missCount: 1 });
        const result = reconcile('acme', [existing], [frontend], options(T1));
        expect(result.missed).toEqual([{ ...existing, missCount: 2 }]);
        expect(result.archived).toEqual([]);
        expect(result.created).toHaveLength(1);
    });

    it('archives a posting when it reaches the miss threshold', () => {
        const existing = stored('1', backend, { missCount: 2 });
        const result = reconcile('acme', [existing], [], options(T1));
        expect(result.archived).toEqual([{ ...existing, missCount: 3, archived: true, archivedAt: T1 }]);
    });

    it('leaves archived postings alone while they stay absent', () => {
        const existing = stored('1', backend, { missCount: 3, archived: true, archivedAt: T0 });
        const result = reconcile('acme', [existing], [], options(T1));
        expect(result.missed).toEqual([]);
        expect(result.archived).toEqual([]);
    });

    it('revives an archived posting that reappears', () => {
        const existing = stored('1', backend, { missCount: 3, archived: true, archivedAt: T0 });
        const result = reconcile('acme', [existing], [backend], options(T1));
        expect(result.updated).toEqual([{ ...existing, missCount: 0, archived: false, archivedAt: null, lastSeenAt: T1 }]);
    });

    it('walks one posting through its whole lifecycle', () => {
        const policy = { archiveAfterMisses: 2 };
        const first = reconcile('acme', [], [backend, frontend], { ...policy, now: '2026-02-01T00:00:00.000Z' });
        let postings: JobPosting[] = first.created.map((p, i) => ({ id: String(i + 1), ...p }));

        const second = reconcile('acme', postings, [frontend], { ...policy, now: '2026-02-02T00:00:00.000Z' });
        expect(second.missed.map((p) => p.id)).toEqual(['1']);
        postings = [...second.missed, ...second.unchanged];

        const third = reconcile('acme', postings, [frontend], { ...policy, now: '2026-02-03T00:00:00.000Z' });
        expect(third.archived.map((p) => [p.id, p.archivedAt])).toEqual([['1', '2026-02-03T00:00:00.000Z']]);
        postings = [...third.archived, ...third.unchanged];

        const fourth = reconcile('acme', postings, [frontend, backend], { ...policy, now: '2026-02-04T00:00:00.000Z' });
        expect(fourth.created).toEqual([]);
        expect(fourth.updated.map((p) => [p.id, p.archived, p.firstSeenAt])).toEqual([['1', false, '2026-02-01T00:00:00.000Z']]);
    });
});
