/**
 * src/utils/memoryStore.ts
 *
 * In-process JobStore used by tests and by `--dry-run` crawls. Mirrors the
 * PostgreSQL store's semantics, including the (sourceId, fingerprint)
 * uniqueness of postings. Values are copied in and out so callers cannot
 * mutate stored state by accident.
 */

import type {
    CrawlRun,
    JobPosting,
    NewSource,
    OutcomeSample,
    Source,
    SourceHealthFields,
    SourceOutcome,
} from '../sources/types.js';
import type { ReconcileResult } from './dedup.js';
import type { ActiveRunRecord, JobStore, RetiredSource, RunRecord, SourceFilter } from './jobStore.js';
import { NEUTRAL_PRIORITY } from './healthTracker.js';

interface StoredOutcome {
    runId: string;
    outcome: SourceOutcome;
}

export class InMemoryJobStore implements JobStore {
    private readonly sources = new Map<string, Source>();
    private readonly postings = new Map<string, JobPosting>();
    private readonly runs = new Map<string, RunRecord>();
    private readonly outcomes: StoredOutcome[] = [];
    private nextPostingId = 1;

    /** When set, every call rejects with this error. */
    failWith: Error | null = null;

    constructor(seed: readonly NewSource[] = []) {
        for (const source of seed) {
            this.sources.set(source.id, newSourceRecord(source));
        }
    }

    private guard(): void {
        if (this.failWith) throw this.failWith;
    }

    async ping(): Promise<boolean> {
        return this.failWith === null;
    }

    async listSources(filter: SourceFilter = {}): Promise<Source[]> {
        this.guard();
        return [...this.sources.values()]
            .filter((s) => !filter.activeOnly || s.active)
            .filter((s) => !filter.ids || filter.ids.includes(s.id))
            .sort((a, b) => b.priorityScore - a.priorityScore || a.id.localeCompare(b.id))
            .map((s) => structuredClone(s));
    }

    async getSource(id: string): Promise<Source | null> {
        this.guard();
        const source = this.sources.get(id);
        return source ? structuredClone(source) : null;
    }

    async upsertSource(source: NewSource): Promise<Source> {
        this.guard();
        const current = this.sources.get(source.id);
        const next: Source = current
            ? { ...current, name: source.name, adapterKind: source.adapterKind, config: structuredClone(source.config) }
            : newSourceRecord(source);
        this.sources.set(source.id, next);
        return structuredClone(next);
    }

    async saveSourceHealth(sourceId: string, health: SourceHealthFields): Promise<void> {
        this.guard();
        const current = this.sources.get(sourceId);
        if (current) this.sources.set(sourceId, { ...current, ...health });
    }

    async reactivateSource(sourceId: string): Promise<Source | null> {
        this.guard();
        const current = this.sources.get(sourceId);
        if (!current) return null;
        const next: Source = {
            ...current,
            active: true,
            consecutiveEmpty: 0,
            consecutiveFailures: 0,
            deactivatedAt: null,
            deactivationReason: null,
            rateLimitedUntil: null,
        };
        this.sources.set(sourceId, next);
        return structuredClone(next);
    }

    async retireSource(sourceId: string, at: string): Promise<RetiredSource | null> {
        this.guard();
        const current = this.sources.get(sourceId);
        if (!current) return null;
        const next: Source = { ...current, active: false, deactivatedAt: at, deactivationReason: 'retired by operator' };
        this.sources.set(sourceId, next);
        let archivedPostings = 0;
        for (const posting of this.postings.values()) {
            if (posting.sourceId !== sourceId || posting.archived) continue;
            this.postings.set(posting.id, { ...posting, archived: true, archivedAt: at });
            archivedPostings++;
        }
        return { source: structuredClone(next), archivedPostings };
    }

    async loadOutcomeHistory(sourceId: string, limit: number): Promise<OutcomeSample[]> {
        this.guard();
        return this.outcomes
            .filter(({ outcome }) =>
                outcome.sourceId === sourceId && !outcome.interrupted && outcome.errorKind !== 'PersistenceError')
            .slice(-limit)
            .map(({ outcome }) => ({ status: outcome.status, errorKind: outcome.errorKind, jobsFound: outcome.jobsFound }));
    }

    async loadPostings(sourceId: string): Promise<JobPosting[]> {
        this.guard();
        return [...this.postings.values()]
            .filter((p) => p.sourceId === sourceId)
            .map((p) => structuredClone(p));
    }

    async applyReconciliation(sourceId: string, result: ReconcileResult): Promise<JobPosting[]> {
        this.guard();
        const created: JobPosting[] = [];
        for (const draft of result.created) {
            const existing = [...this.postings.values()].find(
                (p) => p.sourceId === sourceId && p.fingerprint === draft.fingerprint
            );
            const posting: JobPosting = existing
                ? { ...existing, ...draft, id: existing.id, firstSeenAt: existing.firstSeenAt }
                : { ...draft, sourceId, id: String(this.nextPostingId++) };
            this.postings.set(posting.id, posting);
            created.push(structuredClone(posting));
        }
        for (const posting of [...result.updated, ...result.unchanged, ...result.missed, ...result.archived]) {
            if (this.postings.has(posting.id)) this.postings.set(posting.id, structuredClone(posting));
        }
        return created;
    }

    async recordOutcome(runId: string, outcome: SourceOutcome): Promise<void> {
        this.guard();
        const exists = this.outcomes.some((o) => o.runId === runId && o.outcome.sourceId === outcome.sourceId);
        if (!exists) this.outcomes.push({ runId, outcome: structuredClone(outcome) });
    }

    async saveRun(run: CrawlRun): Promise<void> {
        this.guard();
        const { outcomes, ...record } = structuredClone(run);
        this.runs.set(run.id, record);
        for (const outcome of outcomes) {
            await this.recordOutcome(run.id, outcome);
        }
    }

    async listActiveRuns(): Promise<ActiveRunRecord[]> {
        this.guard();
        return [...this.runs.values()]
            .filter((r) => r.state === 'running')
            .map((r) => ({ id: r.id, requestedSourceIds: r.requestedSourceIds, startedAt: r.startedAt }));
    }

    async listRecentRuns(limit: number): Promise<RunRecord[]> {
        this.guard();
        return [...this.runs.values()]
            .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
            .slice(0, limit)
            .map((r) => structuredClone(r));
    }

    /** Test helper: every stored posting, across sources. */
    allPostings(): JobPosting[] {
        return [...this.postings.values()].map((p) => structuredClone(p));
    }
}

function newSourceRecord(source: NewSource): Source {
    return {
        id: source.id,
        name: source.name,
        adapterKind: source.adapterKind,
        config: structuredClone(source.config),
        active: true,
        consecutiveEmpty: 0,
        consecutiveFailures: 0,
        successRate: null,
        priorityScore: NEUTRAL_PRIORITY,
        lastCrawledAt: null,
        deactivatedAt: null,
        deactivationReason: null,
        rateLimitedUntil: null,
    };
}
