/**
 * src/utils/dedup.ts
 *
 * Per-source reconciliation of freshly fetched candidates against the
 * postings already stored for that source.
 *
 *   match + content changed (or posting was archived)  → updated
 *   match + same content                               → unchanged (still refreshed)
 *   no match                                           → created
 *   stored, not archived, not seen this crawl          → missCount + 1,
 *                                                        archived at the threshold
 *
 * Pure: no I/O and no clock reads. The caller supplies `now` and the
 * archive threshold and persists the result in one store call.
 */

import { buildPostingFingerprint, normalizeUrl } from '../sources/dedupFingerprint.js';
import type { JobPosting, NewPosting, RawCandidate } from '../sources/types.js';

export interface ReconcileOptions {
    archiveAfterMisses: number;
    /** ISO-8601 timestamp of this crawl. */
    now: string;
}

export interface ReconcileResult {
    created: NewPosting[];
    updated: JobPosting[];
    unchanged: JobPosting[];
    /** Absent this crawl but still below the archive threshold. */
    missed: JobPosting[];
    /** Absent this crawl and reaching the archive threshold. */
    archived: JobPosting[];
    /** Candidates repeating a fingerprint already seen in the same batch. */
    duplicateCandidates: number;
}

function contentOf(candidate: RawCandidate, current: JobPosting | null) {
    // Optional fields a candidate omits keep their stored value.
    return {
        title: candidate.title,
        url: candidate.url,
        canonicalUrl: normalizeUrl(candidate.url),
        location: candidate.location ?? current?.location ?? null,
        postedAt: candidate.postedAt ?? current?.postedAt ?? null,
        description: candidate.description ?? current?.description ?? null,
    };
}

function contentChanged(posting: JobPosting, next: ReturnType<typeof contentOf>): boolean {
    return posting.title !== next.title
        || posting.url !== next.url
        || posting.location !== next.location
        || posting.postedAt !== next.postedAt
        || posting.description !== next.description;
}

export function reconcile(
    sourceId: string,
    existing: readonly JobPosting[],
    candidates: readonly RawCandidate[],
    options: ReconcileOptions
): ReconcileResult {
    const { now, archiveAfterMisses } = options;
    const byFingerprint = new Map<string, JobPosting>();
    for (const posting of existing) {
        byFingerprint.set(posting.fingerprint, posting);
    }

    const result: ReconcileResult = {
        created: [],
        updated: [],
        unchanged: [],
        missed: [],
        archived: [],
        duplicateCandidates: 0,
    };
    const seen = new Set<string>();

    for (const candidate of candidates) {
        const fingerprint = buildPostingFingerprint(candidate);
        if (seen.has(fingerprint)) {
            result.duplicateCandidates++;
            continue;
        }
        seen.add(fingerprint);

        const current = byFingerprint.get(fingerprint);
        if (!current) {
            result.created.push({
                sourceId,
                fingerprint,
                ...contentOf(candidate, null),
                firstSeenAt: now,
                lastSeenAt: now,
                missCount: 0,
                archived: false,
                archivedAt: null,
            });
            continue;
        }

        const next = contentOf(candidate, current);
        const refreshed: JobPosting = {
            ...current,
            ...next,
            lastSeenAt: now,
            missCount: 0,
            archived: false,
            archivedAt: null,
        };
        if (current.archived || contentChanged(current, next)) {
            result.updated.push(refreshed);
        } else {
            result.unchanged.push(refreshed);
        }
    }

    for (const posting of existing) {
        if (posting.archived || seen.has(posting.fingerprint)) continue;
        const missCount = posting.missCount + 1;
        if (missCount >= archiveAfterMisses) {
            result.archived.push({ ...posting, missCount, archived: true, archivedAt: now });
        } else {
            result.missed.push({ ...posting, missCount });
        }
    }

    return result;
}
