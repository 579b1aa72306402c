// tests/scheduler.test.ts

import { describe, it, expect, vi } from 'vitest';
import { PostScheduler } from '../src/scheduler/post-scheduler';
import type { CycleResult } from '../src/types';

const MINUTE_MS = 60 * 1000;

const sequence = (...values: number[]) => {
    let index = 0;
    return () => values[index++ % values.length] ?? 0;
};

const atHour = (hour: number) => () => new Date(2026, 0, 15, hour, 30);

const posted: CycleResult = { status: 'posted', reason: 'Posted', identifier: 'octo/lib' };

describe('PostScheduler policy', () => {
    const scheduler = new PostScheduler({ runCycle: async () => posted });

    it('treats 9:00 up to 23:00 as active hours', () => {
        expect(scheduler.isActiveHour(8)).toBe(false);
        expect(scheduler.isActiveHour(9)).toBe(true);
        expect(scheduler.isActiveHour(22)).toBe(true);
        expect(scheduler.isActiveHour(23)).toBe(false);
        expect(scheduler.isActiveHour(0)).toBe(false);
    });

    it('uses 0.8 outside and 0.1 inside active hours', () => {
        expect(scheduler.skipProbability(3)).toBe(0.8);
        expect(scheduler.skipProbability(12)).toBe(0.1);
    });

    it('skips about 80% of cycles outside active hours', () => {
        const trials = 20000;
        let skipped = 0;
        for (let i = 0; i < trials; i++) {
            if (scheduler.shouldSkip(4)) skipped++;
        }
        expect(Math.abs(skipped / trials - 0.8)).toBeLessThan(0.03);
    });

    it('skips about 10% of cycles inside active hours', () => {
        const trials = 20000;
        let skipped = 0;
        for (let i = 0; i < trials; i++) {
            if (scheduler.shouldSkip(15)) skipped++;
        }
        expect(Math.abs(skipped / trials - 0.1)).toBeLessThan(0.03);
    });

    it('draws sleep durations between 45 and 120 minutes', () => {
        for (let i = 0; i < 1000; i++) {
            const ms = scheduler.nextSleepMs();
            expect(ms).toBeGreaterThanOrEqual(45 * MINUTE_MS);
            expect(ms).toBeLessThanOrEqual(120 * MINUTE_MS);
        }
    });

    it('maps the random draw linearly onto the sleep window', () => {
        expect(new PostScheduler({ runCycle: async () => posted, random: () => 0 }).nextSleepMs()).toBe(45 * MINUTE_MS);
        expect(new PostScheduler({ runCycle: async () => posted, random: () => 0.5 }).nextSleepMs()).toBe(4950000);
    });
});

describe('PostScheduler.runOnce', () => {
    it('skips without running the pipeline when the draw falls under the skip probability', async () => {
        const runCycle = vi.fn(async () => posted);
        const scheduler = new PostScheduler({ runCycle, random: sequence(0.5, 0), now: atHour(3) });

        const outcome = await scheduler.runOnce();

        expect(runCycle).not.toHaveBeenCalled();
        expect(outcome).toEqual({
            status: 'skipped',
            reason: 'Random skip outside active hours',
            hour: 3,
            sleepMs: 45 * MINUTE_MS
        });
    });

    it('runs the pipeline during active hours when the draw passes', async () => {
        const runCycle = vi.fn(async () => posted);
        const scheduler = new PostScheduler({ runCycle, random: sequence(0.5, 0.5), now: atHour(12) });

        const outcome = await scheduler.runOnce();

        expect(runCycle).toHaveBeenCalledTimes(1);
        expect(outcome).toEqual({ ...posted, hour: 12, sleepMs: 4950000 });
    });

    it('still posts outside active hours when the draw beats 0.8', async () => {
        const runCycle = vi.fn(async () => posted);
        const scheduler = new PostScheduler({ runCycle, random: sequence(0.85, 0), now: atHour(2) });

        const outcome = await scheduler.runOnce();

        expect(runCycle).toHaveBeenCalledTimes(1);
        expect(outcome.status).toBe('posted');
    });

    it('turns a thrown pipeline error into a failed cycle that still sleeps', async () => {
        const runCycle = vi.fn(async (): Promise<CycleResult> => {
            throw new Error('socket hang up');
        });
        const scheduler = new PostScheduler({ runCycle, random: sequence(0.5, 1), now: atHour(10) });

        const outcome = await scheduler.runOnce();

        expect(outcome).toEqual({ status: 'failed', reason: 'socket hang up', hour: 10, sleepMs: 120 * MINUTE_MS });
    });
});

describe('PostScheduler.start', () => {
    it('keeps cycling after a failed cycle until stopped', async () => {
        const runCycle = vi.fn<() => Promise<CycleResult>>()
            .mockRejectedValueOnce(new Error('rate limited'))
            .mockResolvedValueOnce(posted);
        const sleeps: number[] = [];

        const scheduler = new PostScheduler({
            runCycle,
            random: () => 0.5,
            now: atHour(14),
            sleep: async (ms) => {
                sleeps.push(ms);
                if (sleeps.length === 2) {
                    scheduler.stop();
                }
            }
        });

        await scheduler.start();

        expect(runCycle).toHaveBeenCalledTimes(2);
        expect(sleeps).toEqual([4950000, 4950000]);
        expect(scheduler.getStatus()).toEqual({ isRunning: false, cycles: 2 });
    });
});
