// src/app.ts

import { configManager, config } from '@/config';
import { validateEnv } from '@/utils/validators';
import { createServiceLogger } from '@/utils/logger';
import { createApiResponse } from '@/utils/helpers';
import { trendingSource } from '@/services/github/trending';
import { contentGenerator } from '@/services/ai/content-generator';
import { screenshotCapturer } from '@/services/browser/screenshot';
import { postedLog } from '@/services/memory/posted-log';
import { twitterPublisher } from '@/services/social/twitter';
import { cronJobs } from '@/scheduler/cron-jobs';
import type { ApiResponse, CandidateRepository, CycleResult, GeneratedPost, PostedEntry, PublishResult } from '@/types';

const logger = createServiceLogger('Application');

const HOUR_MS = 60 * 60 * 1000;

/**
 * The collaborators one post cycle talks to
 */
export interface PipelineDeps {
    trendSource: {
        fetchTrendingRepositories(): Promise<ApiResponse<CandidateRepository[]>>;
    };
    contentGenerator: {
        generatePost(repo: CandidateRepository): Promise<ApiResponse<GeneratedPost>>;
    };
    screenshotCapturer: {
        captureReadme(repo: CandidateRepository): Promise<ApiResponse<string | undefined>>;
    };
    postedLog: {
        initialize(): Promise<ApiResponse<number>>;
        hasPosted(identifier: string): boolean;
        countSince(since: Date): number;
        recordPost(entry: PostedEntry): Promise<ApiResponse<boolean>>;
    };
    publisher: {
        publishPost(post: GeneratedPost): Promise<ApiResponse<PublishResult | undefined>>;
        validateCredentials(): Promise<ApiResponse<boolean>>;
    };
    postsPerHour: number;
    now?: () => Date;
}

export class Application {
    private deps: PipelineDeps;
    private now: () => Date;
    private isInitialized: boolean = false;

    constructor(deps: PipelineDeps) {
        this.deps = deps;
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Validate configuration, load the posted log and start housekeeping jobs
     */
    public async initialize(): Promise<ApiResponse<boolean>> {
        try {
            logger.info('Starting Repo Spotlight Bot');

            const envValidation = validateEnv();
            if (!envValidation.successful) {
                return createApiResponse(false, 'Environment validation failed', false, envValidation.error);
            }

            const configValidation = configManager.validateConfig();
            if (!configValidation.successful) {
                return createApiResponse(false, 'Configuration validation failed', false, configValidation.error);
            }

            const logInit = await this.deps.postedLog.initialize();
            if (!logInit.successful) {
                return createApiResponse(false, 'Posted log could not be loaded', false, logInit.error);
            }

            const credentials = await this.deps.publisher.validateCredentials();
            if (!credentials.successful) {
                logger.warn('Twitter credentials could not be verified', {
                    message: credentials.message,
                    error: credentials.error
                });
            }

            const cronStart = cronJobs.start();
            if (!cronStart.successful) {
                logger.warn('Cron jobs failed to start', { error: cronStart.error });
            }

            this.isInitialized = true;
            logger.info('Application initialized successfully', {
                model: config.ai.model,
                postsPerHour: this.deps.postsPerHour,
                alreadyPosted: logInit.data
            });

            return createApiResponse(true, 'Application initialized successfully', true);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Failed to initialize application', error);
            return createApiResponse(false, 'Application initialization failed', false, errMsg);
        }
    }

    /**
     * One pass of fetch, generate, screenshot and publish
     */
    public async runPostCycle(): Promise<CycleResult> {
        if (!this.isInitialized) {
            const init = await this.deps.postedLog.initialize();
            if (!init.successful) {
                return { status: 'failed', reason: `Posted log unavailable: ${init.error}` };
            }
            this.isInitialized = true;
        }

        // Step 1: respect the posts-per-hour hint
        const postedLastHour = this.deps.postedLog.countSince(new Date(this.now().getTime() - HOUR_MS));
        if (postedLastHour >= this.deps.postsPerHour) {
            logger.info('Hourly post cap reached', { postedLastHour, postsPerHour: this.deps.postsPerHour });
            return { status: 'skipped', reason: 'Hourly post cap reached' };
        }

        // Step 2: fetch candidates
        const candidatesResult = await this.deps.trendSource.fetchTrendingRepositories();
        if (!candidatesResult.successful || !candidatesResult.data) {
            logger.warn('Failed to fetch candidates', { error: candidatesResult.error });
            return { status: 'failed', reason: `${candidatesResult.message}: ${candidatesResult.error}` };
        }

        if (candidatesResult.data.length === 0) {
            logger.info('No trending repositories found');
            return { status: 'skipped', reason: 'No trending repositories found' };
        }

        // Step 3: first candidate that was never posted
        const candidate = this.selectCandidate(candidatesResult.data);
        if (!candidate) {
            logger.info('All trending repositories were already posted', { candidates: candidatesResult.data.length });
            return { status: 'skipped', reason: 'No new repositories to post' };
        }
        logger.info('Selected repository', { repository: candidate.id, url: candidate.url });

        // Step 4: generate text
        const contentResult = await this.deps.contentGenerator.generatePost(candidate);
        if (!contentResult.successful || !contentResult.data || !contentResult.data.text.trim()) {
            logger.warn('Content generation failed', { repository: candidate.id, error: contentResult.error });
            return { status: 'failed', reason: 'Content generation failed', identifier: candidate.id };
        }
        const post: GeneratedPost = { ...contentResult.data, candidate };

        // Step 5: screenshot, optional
        const screenshotResult = await this.deps.screenshotCapturer.captureReadme(candidate);
        if (screenshotResult.successful && screenshotResult.data) {
            post.screenshotPath = screenshotResult.data;
            logger.info('Screenshot ready', { repository: candidate.id, path: screenshotResult.data });
        } else {
            logger.warn('Screenshot unavailable, posting text only', { repository: candidate.id, error: screenshotResult.error });
        }

        // Step 6: publish
        const publishResult = await this.deps.publisher.publishPost(post);
        if (!publishResult.successful || !publishResult.data) {
            logger.warn('Publishing failed', {
                repository: candidate.id,
                message: publishResult.message,
                error: publishResult.error
            });
            return { status: 'failed', reason: `${publishResult.message}: ${publishResult.error}`, identifier: candidate.id };
        }

        // Step 7: remember it
        const entry: PostedEntry = {
            identifier: candidate.id,
            postedAt: this.now().toISOString(),
            tweetId: publishResult.data.tweetId,
            content: post.text
        };
        if (post.screenshotPath) {
            entry.mediaPath = post.screenshotPath;
        }

        const recordResult = await this.deps.postedLog.recordPost(entry);
        if (!recordResult.successful) {
            logger.error('Post published but not recorded', undefined, { repository: candidate.id, error: recordResult.error });
        }

        logger.info('Post published', {
            repository: candidate.id,
            tweetId: publishResult.data.tweetId,
            url: publishResult.data.url,
            source: post.source
        });

        return { status: 'posted', reason: `Posted ${publishResult.data.url}`, identifier: candidate.id };
    }

    /**
     * Ranking order is kept; posted repositories are passed over
     */
    public selectCandidate(candidates: CandidateRepository[]): CandidateRepository | undefined {
        for (const candidate of candidates) {
            if (this.deps.postedLog.hasPosted(candidate.id)) {
                logger.debug('Skipping already posted repository', { repository: candidate.id });
                continue;
            }
            return candidate;
        }
        return undefined;
    }

    public shutdown(): void {
        logger.info('Shutting down application');
        cronJobs.stop();
        logger.info('Application shutdown complete');
    }
}

export const app = new Application({
    trendSource: trendingSource,
    contentGenerator,
    screenshotCapturer,
    postedLog,
    publisher: twitterPublisher,
    postsPerHour: config.social.postsPerHour
});

export default app;
