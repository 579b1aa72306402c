// src/scheduler/post-scheduler.ts

import type { CycleOutcome, CycleResult, SchedulerPolicy } from '@/types';
import { SCHEDULER_POLICY } from '@/config/apis';
import { dateUtils, sleep } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('PostScheduler');

const MINUTE_MS = 60 * 1000;

export interface PostSchedulerDeps {
    runCycle: () => Promise<CycleResult>;
    random?: () => number;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
    policy?: SchedulerPolicy;
}

/**
 * Wakes, rolls the dice against the active-hours policy, runs one post cycle
 * and sleeps for a random 45-120 minutes. A failing cycle never stops the loop.
 */
export class PostScheduler {
    private runCycle: () => Promise<CycleResult>;
    private random: () => number;
    private now: () => Date;
    private sleepFn: (ms: number) => Promise<void>;
    private policy: SchedulerPolicy;
    private isRunning: boolean = false;
    private cycles: number = 0;

    constructor(deps: PostSchedulerDeps) {
        this.runCycle = deps.runCycle;
        this.random = deps.random ?? Math.random;
        this.now = deps.now ?? (() => new Date());
        this.sleepFn = deps.sleep ?? sleep;
        this.policy = deps.policy ?? SCHEDULER_POLICY;
    }

    public isActiveHour(hour: number): boolean {
        return hour >= this.policy.activeStartHour && hour < this.policy.activeEndHour;
    }

    public skipProbability(hour: number): number {
        return this.isActiveHour(hour)
            ? this.policy.activeSkipProbability
            : this.policy.inactiveSkipProbability;
    }

    public shouldSkip(hour: number): boolean {
        return this.random() < this.skipProbability(hour);
    }

    /**
     * Uniform draw between the minimum and maximum sleep, in milliseconds
     */
    public nextSleepMs(): number {
        const minMs = this.policy.minSleepMinutes * MINUTE_MS;
        const maxMs = this.policy.maxSleepMinutes * MINUTE_MS;
        return Math.round(minMs + this.random() * (maxMs - minMs));
    }

    /**
     * Decide and run a single cycle, without sleeping
     */
    public async runOnce(): Promise<CycleOutcome> {
        const hour = dateUtils.hourOf(this.now());
        let result: CycleResult;

        if (this.shouldSkip(hour)) {
            result = {
                status: 'skipped',
                reason: this.isActiveHour(hour) ? 'Random skip during active hours' : 'Random skip outside active hours'
            };
        } else {
            try {
                result = await this.runCycle();
            } catch (error: unknown) {
                const errMsg = error instanceof Error ? error.message : String(error);
                logger.error('Post cycle failed', error, { hour });
                result = { status: 'failed', reason: errMsg };
            }
        }

        const outcome: CycleOutcome = { ...result, hour, sleepMs: this.nextSleepMs() };
        this.cycles++;

        logger.info('Cycle finished', {
            cycle: this.cycles,
            status: outcome.status,
            reason: outcome.reason,
            identifier: outcome.identifier,
            hour,
            sleepMinutes: Math.round(outcome.sleepMs / MINUTE_MS)
        });

        return outcome;
    }

    /**
     * Run cycles until stop() is called
     */
    public async start(): Promise<void> {
        if (this.isRunning) {
            logger.warn('Scheduler already running');
            return;
        }

        this.isRunning = true;
        logger.info('Scheduler started', {
            activeHours: `${this.policy.activeStartHour}:00-${this.policy.activeEndHour}:00`
        });

        while (this.isRunning) {
            const outcome = await this.runOnce();
            if (!this.isRunning) {
                break;
            }
            await this.sleepFn(outcome.sleepMs);
        }

        logger.info('Scheduler stopped', { cycles: this.cycles });
    }

    public stop(): void {
        this.isRunning = false;
    }

    public getStatus(): { isRunning: boolean; cycles: number } {
        return { isRunning: this.isRunning, cycles: this.cycles };
    }
}
