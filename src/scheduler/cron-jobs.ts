// src/scheduler/cron-jobs.ts

import cron from 'node-cron';
import { config } from '@/config';
import { MAINTENANCE_SCHEDULES } from '@/config/apis';
import { createServiceLogger } from '@/utils/logger';
import { createApiResponse } from '@/utils/helpers';
import type { ApiResponse } from '@/types';
import { postedLog } from '@/services/memory/posted-log';
import { screenshotCapturer } from '@/services/browser/screenshot';

const logger = createServiceLogger('CronJobs');

interface JobInfo {
    name: string;
    schedule: string;
    run: () => Promise<void>;
    task: cron.ScheduledTask | null;
    lastRun?: string;
}

/**
 * Housekeeping jobs that run beside the post scheduler
 */
class CronJobsService {
    private static instance: CronJobsService;
    private jobs: Map<string, JobInfo> = new Map();
    private isRunning: boolean = false;

    private constructor() { }

    public static getInstance(): CronJobsService {
        if (!CronJobsService.instance) {
            CronJobsService.instance = new CronJobsService();
        }
        return CronJobsService.instance;
    }

    /**
     * Start all cron jobs
     */
    public start(): ApiResponse<boolean> {
        try {
            if (this.isRunning) {
                return createApiResponse(true, 'Cron jobs already running', true);
            }

            this.initializeJobs();

            this.jobs.forEach(jobInfo => {
                if (!cron.validate(jobInfo.schedule)) {
                    logger.error('Invalid cron schedule', undefined, { job: jobInfo.name, schedule: jobInfo.schedule });
                    return;
                }

                const task = cron.schedule(jobInfo.schedule, () => this.runJob(jobInfo), {
                    scheduled: false,
                    ...(config.app.timezone ? { timezone: config.app.timezone } : {})
                });

                jobInfo.task = task;
                task.start();
                logger.info(`${jobInfo.name} job scheduled`, { schedule: jobInfo.schedule });
            });

            this.isRunning = true;
            logger.info('All cron jobs started successfully', { totalJobs: this.jobs.size });

            return createApiResponse(true, 'Cron jobs started successfully', true);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Failed to start cron jobs', error);
            return createApiResponse(false, 'Failed to start cron jobs', false, errMsg);
        }
    }

    /**
     * Stop all cron jobs
     */
    public stop(): ApiResponse<boolean> {
        this.jobs.forEach((jobInfo, name) => {
            if (jobInfo.task) {
                jobInfo.task.stop();
                jobInfo.task = null;
                logger.debug(`Stopped cron job: ${name}`);
            }
        });

        this.isRunning = false;
        logger.info('All cron jobs stopped');
        return createApiResponse(true, 'Cron jobs stopped successfully', true);
    }

    public getStatus(): { isRunning: boolean; jobs: Array<{ name: string; running: boolean; lastRun?: string }> } {
        return {
            isRunning: this.isRunning,
            jobs: Array.from(this.jobs.values()).map(jobInfo => ({
                name: jobInfo.name,
                running: this.isRunning && jobInfo.task !== null,
                ...(jobInfo.lastRun ? { lastRun: jobInfo.lastRun } : {})
            }))
        };
    }

    /**
     * Run a job right away, outside its schedule
     */
    public async triggerJob(name: string): Promise<ApiResponse<boolean>> {
        if (this.jobs.size === 0) {
            this.initializeJobs();
        }

        const jobInfo = this.jobs.get(name);
        if (!jobInfo) {
            return createApiResponse(false, 'Job not found', false, `Unknown job: ${name}`);
        }

        await this.runJob(jobInfo);
        return createApiResponse(true, `${name} job ran`, true);
    }

    private initializeJobs(): void {
        const jobDefinitions: Array<Omit<JobInfo, 'task'>> = [
            {
                name: 'screenshot-cleanup',
                schedule: MAINTENANCE_SCHEDULES.screenshotCleanup,
                run: async () => {
                    const result = await screenshotCapturer.cleanupOldScreenshots();
                    if (!result.successful) {
                        logger.error('Scheduled screenshot cleanup failed', undefined, { error: result.error });
                    }
                }
            },
            {
                name: 'posted-log-backup',
                schedule: MAINTENANCE_SCHEDULES.postedLogBackup,
                run: async () => {
                    const result = await postedLog.createBackup();
                    if (result.successful) {
                        logger.info('Scheduled backup completed', { path: result.data });
                    } else {
                        logger.warn('Scheduled backup skipped', { reason: result.error });
                    }
                }
            }
        ];

        jobDefinitions.forEach(def => {
            this.jobs.set(def.name, { ...def, task: null });
        });
    }

    private async runJob(jobInfo: JobInfo): Promise<void> {
        logger.info(`${jobInfo.name} job triggered`);
        jobInfo.lastRun = new Date().toISOString();

        try {
            await jobInfo.run();
        } catch (error) {
            logger.error(`${jobInfo.name} job error`, error);
        }
    }
}

export const cronJobs = CronJobsService.getInstance();
export default cronJobs;
