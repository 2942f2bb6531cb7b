/**
 * src/sources/types.ts
 *
 * Shared types for sources, adapters, postings and crawl runs.
 *
 * Every adapter returns RawCandidate objects. The orchestrator reconciles
 * those against the JobPostings already stored for the same Source and
 * records one SourceOutcome per dispatched source on the CrawlRun.
 */

import type { ErrorKind } from './errors.js';
import type { HttpClient } from '../utils/httpClient.js';

// ─── Sources ──────────────────────────────────────────────────────────────────

export const ADAPTER_KINDS = ['ats-json', 'guest-search', 'ai-assisted-html'] as const;

export type AdapterKind = (typeof ADAPTER_KINDS)[number];

export interface SourceHealthFields {
    active: boolean;
    /** Consecutive crawls that ended empty or failed. */
    consecutiveEmpty: number;
    /** Consecutive crawls that ended SourceUnreachable / Timeout / InvalidConfig. */
    consecutiveFailures: number;
    /** Rolling success rate; null while no outcome has been recorded. */
    successRate: number | null;
    priorityScore: number;
    lastCrawledAt: string | null;
    deactivatedAt: string | null;
    deactivationReason: string | null;
    /** Set from a server's Retry-After; the source is not dispatched before it. */
    rateLimitedUntil: string | null;
}

export interface Source extends SourceHealthFields {
    id: string;
    name: string;
    adapterKind: AdapterKind;
    config: Record<string, unknown>;
}

export interface NewSource {
    id: string;
    name: string;
    adapterKind: AdapterKind;
    config: Record<string, unknown>;
}

// ─── Candidates & Postings ────────────────────────────────────────────────────

export interface RawCandidate {
    title: string;
    /** Absolute http(s) URL. */
    url: string;
    location?: string;
    /** ISO-8601 timestamp. */
    postedAt?: string;
    description?: string;
}

export interface JobPosting {
    id: string;
    sourceId: string;
    fingerprint: string;
    title: string;
    url: string;
    canonicalUrl: string;
    location: string | null;
    postedAt: string | null;
    description: string | null;
    firstSeenAt: string;
    lastSeenAt: string;
    missCount: number;
    archived: boolean;
    archivedAt: string | null;
}

/** A posting the reconciler decided to create; the store assigns the id. */
export type NewPosting = Omit<JobPosting, 'id'>;

// ─── Adapter contract ─────────────────────────────────────────────────────────

export interface ExtractJobsOptions {
    pageUrl: string;
    signal: AbortSignal;
}

/** LLM collaborator. Output is untrusted and validated by the caller. */
export interface JobExtractor {
    extractJobs(pageContent: string, options: ExtractJobsOptions): Promise<unknown[]>;
}

export interface RenderOptions {
    waitSelector?: string;
    timeoutMs: number;
    signal: AbortSignal;
}

/** Headless-browser collaborator for pages that need JavaScript. */
export interface PageRenderer {
    render(url: string, options: RenderOptions): Promise<string>;
}

export interface AdapterContext {
    signal: AbortSignal;
    http: HttpClient;
    extractor?: JobExtractor;
    renderer?: PageRenderer;
    /** Per-source timeout in effect, used for collaborator calls. */
    timeoutMs: number;
    aiBudgetChars: number;
}

export interface AdapterAnnotation {
    kind: Extract<ErrorKind, 'ExtractionFailed'>;
    detail: string;
}

export interface AdapterResult {
    candidates: RawCandidate[];
    /** Candidates discarded for missing or malformed required fields. */
    dropped: number;
    annotation?: AdapterAnnotation;
}

export interface SourceAdapter {
    readonly kind: AdapterKind;
    fetch(source: Source, context: AdapterContext): Promise<AdapterResult>;
}

// ─── Runs ─────────────────────────────────────────────────────────────────────

export type RunState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';
export type RunTrigger = 'scheduled' | 'manual';
export type OutcomeStatus = 'success' | 'empty' | 'error' | 'timeout';

export interface SourceOutcome {
    sourceId: string;
    sourceName: string;
    adapterKind: AdapterKind;
    status: OutcomeStatus;
    errorKind: ErrorKind | null;
    errorDetail: string | null;
    jobsFound: number;
    newJobs: number;
    updatedJobs: number;
    unchangedJobs: number;
    archivedJobs: number;
    droppedCandidates: number;
    attempts: number;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    deactivated: boolean;
    /** Aborted by an operator shutdown; kept out of source health. */
    interrupted: boolean;
}

/** The slice of an outcome the health window keeps. */
export type OutcomeSample = Pick<SourceOutcome, 'status' | 'errorKind' | 'jobsFound'>;

export interface RunTotals {
    sources: number;
    succeeded: number;
    empty: number;
    failed: number;
    jobsFound: number;
    newJobs: number;
    updatedJobs: number;
    archivedJobs: number;
}

export interface CrawlRun {
    id: string;
    state: RunState;
    trigger: RunTrigger;
    /** null means every active source. */
    requestedSourceIds: string[] | null;
    startedAt: string;
    finishedAt: string | null;
    outcomes: SourceOutcome[];
    totals: RunTotals;
    deactivatedSourceIds: string[];
    skippedSourceIds: string[];
    failureReason: string | null;
    cancelReason: string | null;
}

export interface RunListener {
    onRunFinished(run: CrawlRun, newPostings: JobPosting[]): Promise<void>;
}
