/**
 * src/sources/errors.ts
 *
 * Error taxonomy for the crawl pipeline. Adapters and collaborators throw
 * these; the orchestrator catches them at the adapter boundary and turns them
 * into a SourceOutcome.
 */

export type ErrorKind =
    | 'SourceUnreachable'
    | 'Timeout'
    | 'RateLimited'
    | 'ExtractionFailed'
    | 'PersistenceError'
    | 'InvalidConfig';

export class CrawlError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.kind = kind;
    }

    /** Whether another attempt at the same call may succeed. */
    get retryable(): boolean {
        return false;
    }
}

export class SourceUnreachableError extends CrawlError {
    readonly statusCode: number | null;
    private readonly transient: boolean;

    constructor(
        message: string,
        options: { statusCode?: number; retryable?: boolean; cause?: unknown } = {}
    ) {
        super('SourceUnreachable', message, { cause: options.cause });
        this.statusCode = options.statusCode ?? null;
        this.transient = options.retryable ?? false;
    }

    override get retryable(): boolean {
        return this.transient;
    }
}

export class TimeoutError extends CrawlError {
    /** True when an operator shutdown, not the source, cut the call short. */
    readonly interrupted: boolean;

    constructor(message: string, options: { interrupted?: boolean } = {}) {
        super('Timeout', message);
        this.interrupted = options.interrupted ?? false;
    }
}

export class RateLimitedError extends CrawlError {
    readonly statusCode: number;
    readonly retryAfterMs: number | null;

    constructor(message: string, statusCode: number, retryAfterMs: number | null = null) {
        super('RateLimited', message);
        this.statusCode = statusCode;
        this.retryAfterMs = retryAfterMs;
    }
}

export class ExtractionFailedError extends CrawlError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('ExtractionFailed', message, options);
    }
}

export class InvalidSourceConfigError extends CrawlError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super('InvalidConfig', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}

export class PersistenceError extends CrawlError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('PersistenceError', message, options);
    }
}

/** Raised by startRun when another running run covers an overlapping source set. */
export class RunConflictError extends Error {
    readonly conflictingRunId: string;

    constructor(conflictingRunId: string) {
        super(`Run ${conflictingRunId} is already crawling an overlapping set of sources`);
        this.name = 'RunConflictError';
        this.conflictingRunId = conflictingRunId;
    }
}

// ─── Classification ───────────────────────────────────────────────────────────

/**
 * Maps a non-2xx HTTP status to the error an adapter should raise.
 * 429 and 403 are rate limiting; 5xx is transient; anything else is final.
 */
export function classifyHttpStatus(status: number, url: string, retryAfterMs: number | null = null): CrawlError {
    if (status === 429 || status === 403) {
        return new RateLimitedError(`HTTP ${status} from ${url}`, status, retryAfterMs);
    }
    return new SourceUnreachableError(`HTTP ${status} from ${url}`, {
        statusCode: status,
        retryable: status >= 500,
    });
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Normalizes anything an adapter threw into a CrawlError. */
export function toCrawlError(err: unknown): CrawlError {
    if (err instanceof CrawlError) return err;
    return new SourceUnreachableError(errorMessage(err), { cause: err });
}
