/**
 * src/utils/hostGate.ts
 *
 * Per-host politeness for outgoing requests.
 *
 * Many sources share one host (every Greenhouse board lives on
 * boards-api.greenhouse.io), so the fetch pool's concurrency alone would let
 * a run hit the same server CRAWL_CONCURRENCY times at once. Each host gets:
 *
 *  • a concurrency gate   at most `maxConcurrentPerHost` requests in flight
 *  • request spacing      starts at least `minIntervalMs` apart
 *  • a circuit breaker    `failureThreshold` consecutive transient failures
 *                         (5xx, transport errors) open the circuit for
 *                         `cooldownMs`; requests fail fast until it closes,
 *                         and the first failure after that reopens it
 */

import { log } from 'crawlee';
import { SourceUnreachableError } from '../sources/errors.js';
import { sleep } from './backoff.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface HostGateConfig {
    maxConcurrentPerHost: number;
    minIntervalMs: number;
    failureThreshold: number;
    cooldownMs: number;
}

export interface HostStats {
    host: string;
    active: number;
    waiting: number;
    consecutiveFailures: number;
    /** Epoch ms until which requests fail fast; null while the circuit is closed. */
    openUntil: number | null;
    totalRequests: number;
}

interface HostState {
    active: number;
    waiters: Array<() => void>;
    nextStartAt: number;
    consecutiveFailures: number;
    openUntil: number | null;
    totalRequests: number;
}

function hostOf(url: string): string {
    try {
        return new URL(url).host.toLowerCase();
    } catch {
        return url;
    }
}

function tripsBreaker(err: unknown): boolean {
    return err instanceof SourceUnreachableError && err.retryable;
}

// ─── Gate ─────────────────────────────────────────────────────────────────────

export class HostGate {
    private readonly hosts = new Map<string, HostState>();

    constructor(
        private readonly config: HostGateConfig,
        private readonly now: () => number = Date.now
    ) {}

    /** Runs `task` once the host of `url` has a free, spaced slot. */
    async run<T>(url: string, signal: AbortSignal, task: () => Promise<T>): Promise<T> {
        const host = hostOf(url);
        const state = this.stateFor(host);
        this.checkCircuit(host, state);

        await this.acquire(state, signal);
        try {
            await this.space(state, signal);
            state.totalRequests++;
            const result = await task();
            state.consecutiveFailures = 0;
            return result;
        } catch (err) {
            if (tripsBreaker(err)) this.recordFailure(host, state);
            throw err;
        } finally {
            this.release(state);
        }
    }

    stats(url: string): HostStats {
        const host = hostOf(url);
        const state = this.stateFor(host);
        return {
            host,
            active: state.active,
            waiting: state.waiters.length,
            consecutiveFailures: state.consecutiveFailures,
            openUntil: state.openUntil,
            totalRequests: state.totalRequests,
        };
    }

    private stateFor(host: string): HostState {
        let state = this.hosts.get(host);
        if (!state) {
            state = { active: 0, waiters: [], nextStartAt: 0, consecutiveFailures: 0, openUntil: null, totalRequests: 0 };
            this.hosts.set(host, state);
        }
        return state;
    }

    // ─── Circuit breaker ──────────────────────────────────────────────────────

    private checkCircuit(host: string, state: HostState): void {
        if (state.openUntil === null) return;
        if (this.now() < state.openUntil) {
            throw new SourceUnreachableError(
                `Circuit open for ${host} until ${new Date(state.openUntil).toISOString()}`
            );
        }
        // Half-open: the next transient failure reopens the circuit.
        state.openUntil = null;
        state.consecutiveFailures = this.config.failureThreshold - 1;
    }

    private recordFailure(host: string, state: HostState): void {
        state.consecutiveFailures++;
        if (state.openUntil === null && state.consecutiveFailures >= this.config.failureThreshold) {
            state.openUntil = this.now() + this.config.cooldownMs;
            log.warning(
                `[HostGate] ${host}: ${state.consecutiveFailures} consecutive failures, ` +
                `pausing requests for ${this.config.cooldownMs}ms`
            );
        }
    }

    // ─── Concurrency & spacing ────────────────────────────────────────────────

    private async acquire(state: HostState, signal: AbortSignal): Promise<void> {
        while (state.active >= this.config.maxConcurrentPerHost) {
            await new Promise<void>((resolve, reject) => {
                if (signal.aborted) {
                    reject(signal.reason);
                    return;
                }
                const wake = (): void => {
                    signal.removeEventListener('abort', onAbort);
                    resolve();
                };
                const onAbort = (): void => {
                    const i = state.waiters.indexOf(wake);
                    if (i !== -1) state.waiters.splice(i, 1);
                    reject(signal.reason);
                };
                state.waiters.push(wake);
                signal.addEventListener('abort', onAbort, { once: true });
            });
        }
        state.active++;
    }

    private release(state: HostState): void {
        state.active = Math.max(0, state.active - 1);
        state.waiters.shift()?.();
    }

    private async space(state: HostState, signal: AbortSignal): Promise<void> {
        const nowMs = this.now();
        const startAt = Math.max(nowMs, state.nextStartAt);
        state.nextStartAt = startAt + this.config.minIntervalMs;
        if (startAt > nowMs) {
            log.debug(`[HostGate] Waiting ${startAt - nowMs}ms before the next request`);
            await sleep(startAt - nowMs, signal);
        }
    }
}
