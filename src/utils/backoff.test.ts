import { describe, it, expect, vi } from 'vitest';
import type { RetryPolicy } from '../config/crawlPolicy.js';
import { computeBackoffDelay, parseRetryAfter, sleep } from './backoff.js';

const policy: RetryPolicy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitterMs: 50 };

describe('computeBackoffDelay', () => {
    it('doubles the base delay per attempt without jitter', () => {
        const noJitter = (): number => 0;
        expect(computeBackoffDelay(1, policy, noJitter)).toBe(100);
        expect(computeBackoffDelay(2, policy, noJitter)).toBe(200);
        expect(computeBackoffDelay(3, policy, noJitter)).toBe(400);
    });

    it('adds floored jitter', () => {
        expect(computeBackoffDelay(1, policy, () => 0.5)).toBe(125);
        expect(computeBackoffDelay(2, policy, () => 0.999)).toBe(249);
    });

    it('caps at maxDelayMs', () => {
        expect(computeBackoffDelay(5, policy, () => 0)).toBe(1000);
        expect(computeBackoffDelay(10, policy, () => 0.9)).toBe(1000);
    });
});

describe('parseRetryAfter', () => {
    it('reads delta-seconds', () => {
        expect(parseRetryAfter('30')).toBe(30_000);
    });

    it('reads an HTTP date relative to now', () => {
        const now = Date.parse('2026-03-01T10:00:00Z');
        expect(parseRetryAfter('Sun, 01 Mar 2026 10:00:05 GMT', now)).toBe(5_000);
    });

    it('never returns a negative delay', () => {
        const now = Date.parse('2026-03-01T10:00:00Z');
        expect(parseRetryAfter('Sun, 01 Mar 2026 09:00:00 GMT', now)).toBe(0);
    });

    it('returns null for missing or unreadable values', () => {
        expect(parseRetryAfter(null)).toBeNull();
        expect(parseRetryAfter('soon')).toBeNull();
    });
});

describe('sleep', () => {
    it('resolves after the delay', async () => {
        vi.useFakeTimers();
        try {
            let done = false;
            const pending = sleep(500).then(() => {
                done = true;
            });
            await vi.advanceTimersByTimeAsync(499);
            expect(done).toBe(false);
            await vi.advanceTimersByTimeAsync(1);
            await pending;
            expect(done).toBe(true);
        } finally {
            vi.useRealTimers();
        }
    });

    it('rejects with the abort reason', async () => {
        const controller = new AbortController();
        const pending = sleep(10_000, controller.signal);
        const reason = new Error('stop');
        controller.abort(reason);
        await expect(pending).rejects.toBe(reason);
    });

    it('rejects immediately when already aborted', async () => {
        const controller = new AbortController();
        controller.abort('gone');
        await expect(sleep(10, controller.signal)).rejects.toBe('gone');
    });
});
