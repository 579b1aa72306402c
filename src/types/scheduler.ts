// src/types/scheduler.ts

export type CycleStatus = 'posted' | 'skipped' | 'failed';

export interface CycleResult {
    status: CycleStatus;
    reason: string;
    identifier?: string;
}

export interface CycleOutcome extends CycleResult {
    hour: number;
    sleepMs: number;
}

export interface SchedulerPolicy {
    activeStartHour: number;
    activeEndHour: number;
    inactiveSkipProbability: number;
    activeSkipProbability: number;
    minSleepMinutes: number;
    maxSleepMinutes: number;
}
