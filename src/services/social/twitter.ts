// src/services/social/twitter.ts

import fs from 'fs/promises';
import path from 'path';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import type { ApiResponse, GeneratedPost, PublishResult, RateLimitEndpoint } from '@/types';
import { config } from '@/config';
import { API_ENDPOINTS, DEFAULT_HEADERS } from '@/config/apis';
import { FALLBACK_TEMPLATES } from '@/data/templates/prompts';
import { createApiResponse, dateUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { BasePublisher, type PublisherHttpClient } from './base-publisher';
import { buildOAuthHeader, type OAuthCredentials } from './oauth';
import { RateLimitTracker } from './rate-limit-tracker';

const logger = createServiceLogger('TwitterPublisher');

interface CreateTweetResponse {
    data?: {
        id: string;
        text: string;
    };
}

interface MediaUploadResponse {
    media_id_string?: string;
}

interface TweetPayload {
    text: string;
    media?: { media_ids: string[] };
    reply?: { in_reply_to_tweet_id: string };
}

export class TwitterPublisher extends BasePublisher {
    private credentials: OAuthCredentials;
    private rateLimits: RateLimitTracker;

    constructor(http?: PublisherHttpClient, credentials?: OAuthCredentials, rateLimits: RateLimitTracker = new RateLimitTracker()) {
        super('Twitter', API_ENDPOINTS.twitter.baseUrl, DEFAULT_HEADERS.twitter, http);

        this.credentials = credentials ?? {
            consumerKey: config.social.twitter.apiKey,
            consumerSecret: config.social.twitter.apiSecret,
            token: config.social.twitter.accessToken,
            tokenSecret: config.social.twitter.accessTokenSecret
        };
        this.rateLimits = rateLimits;
    }

    public getRateLimits(): RateLimitTracker {
        return this.rateLimits;
    }

    /**
     * Upload the screenshot (if any), post the tweet and reply with the repository link
     */
    public async publishPost(post: GeneratedPost): Promise<ApiResponse<PublishResult | undefined>> {
        const contentValidation = this.validatePostContent(post);
        if (!contentValidation.successful) {
            return createApiResponse(false, 'Content validation failed', undefined, contentValidation.error);
        }

        if (this.rateLimits.isExhausted('tweet_create')) {
            const waitSeconds = this.rateLimits.getWaitTime('tweet_create');
            logger.warn('Tweet creation limit reached, skipping this cycle', { waitSeconds });
            return createApiResponse(false, 'Twitter rate limit exceeded', undefined, `Tweet limit resets in ${waitSeconds} seconds`);
        }

        logger.info('Publishing post to Twitter', {
            repository: post.candidate.id,
            contentLength: post.text.length,
            hasImage: !!post.screenshotPath
        });

        let mediaId: string | undefined;
        if (post.screenshotPath) {
            mediaId = await this.uploadMedia(post.screenshotPath);
        }

        let tweetId: string;
        try {
            const payload: TweetPayload = { text: post.text };
            if (mediaId) {
                payload.media = { media_ids: [mediaId] };
            }

            const response = await this.http.post<CreateTweetResponse>(API_ENDPOINTS.twitter.tweets, payload);
            this.rateLimits.updateFromHeaders(response.headers, 'tweet_create');

            if (!response.data?.data?.id) {
                return createApiResponse(false, 'No tweet ID returned', undefined, 'Twitter API returned no tweet ID');
            }
            tweetId = response.data.data.id;
        } catch (error: unknown) {
            this.recordRateLimitHit(error, 'tweet_create');
            return this.handleApiError<PublishResult>(error, 'publish post');
        }

        const result: PublishResult = {
            tweetId,
            url: API_ENDPOINTS.twitter.statusUrl(tweetId),
            publishedAt: new Date().toISOString()
        };
        if (mediaId) {
            result.mediaId = mediaId;
        }

        const replyId = await this.replyWithLink(tweetId, post);
        if (replyId) {
            result.replyId = replyId;
        }

        this.logSuccessfulPost(result);
        return createApiResponse(true, 'Twitter post published successfully', result);
    }

    /**
     * Validate credentials with a user lookup
     */
    public async validateCredentials(): Promise<ApiResponse<boolean>> {
        try {
            logger.info('Validating Twitter credentials');
            await this.http.get('/users/me');
            logger.info('Twitter credentials validated');
            return createApiResponse(true, 'Twitter credentials are valid', true);
        } catch (error: unknown) {
            const failure = this.handleApiError<boolean>(error, 'validate credentials');
            return createApiResponse(false, failure.message, false, failure.error);
        }
    }

    protected signRequest(requestConfig: InternalAxiosRequestConfig): InternalAxiosRequestConfig {
        const url = axios.getUri({ ...requestConfig, params: undefined });
        const params: Record<string, string> = {};
        if (requestConfig.params && typeof requestConfig.params === 'object') {
            for (const [key, value] of Object.entries(requestConfig.params)) {
                params[key] = String(value);
            }
        }

        requestConfig.headers.set('Authorization', buildOAuthHeader({
            method: requestConfig.method?.toUpperCase() || 'GET',
            url,
            params
        }, this.credentials));

        return requestConfig;
    }

    /**
     * Returns the media id, or undefined when the tweet should go out without an image
     */
    private async uploadMedia(screenshotPath: string): Promise<string | undefined> {
        if (this.rateLimits.isExhausted('media_upload')) {
            logger.warn('Media upload limit reached, posting without image', {
                waitSeconds: this.rateLimits.getWaitTime('media_upload')
            });
            return undefined;
        }

        try {
            const buffer = await fs.readFile(screenshotPath);
            const form = new FormData();
            form.append('media', new Blob([new Uint8Array(buffer)], { type: 'image/png' }), path.basename(screenshotPath));
            form.append('media_category', 'tweet_image');

            const response = await this.http.post<MediaUploadResponse>(API_ENDPOINTS.twitter.mediaUpload, form);
            this.rateLimits.updateFromHeaders(response.headers, 'media_upload');

            const mediaId = response.data?.media_id_string;
            if (!mediaId) {
                logger.warn('Media upload returned no media id, posting without image');
                return undefined;
            }

            logger.info('Screenshot uploaded', { mediaId, path: screenshotPath });
            return mediaId;
        } catch (error: unknown) {
            this.recordRateLimitHit(error, 'media_upload');
            const failure = this.handleApiError<string>(error, 'upload media');
            logger.warn('Media upload failed, posting without image', { error: failure.error });
            return undefined;
        }
    }

    private async replyWithLink(tweetId: string, post: GeneratedPost): Promise<string | undefined> {
        try {
            const payload: TweetPayload = {
                text: FALLBACK_TEMPLATES.linkReply(post.candidate),
                reply: { in_reply_to_tweet_id: tweetId }
            };
            const response = await this.http.post<CreateTweetResponse>(API_ENDPOINTS.twitter.tweets, payload);
            this.rateLimits.updateFromHeaders(response.headers, 'tweet_create');
            return response.data?.data?.id;
        } catch (error: unknown) {
            this.recordRateLimitHit(error, 'tweet_create');
            const failure = this.handleApiError<string>(error, 'reply with link');
            logger.warn('Link reply failed, main tweet kept', { tweetId, error: failure.error });
            return undefined;
        }
    }

    private recordRateLimitHit(error: unknown, endpoint: RateLimitEndpoint): void {
        if (axios.isAxiosError(error) && error.response?.status === 429) {
            this.rateLimits.markExhausted(endpoint, error.response.headers);
            const state = this.rateLimits.getState(endpoint);
            logger.warn('Rate limit event', {
                endpoint,
                resetsAt: dateUtils.fromUnixSeconds(state.reset),
                waitSeconds: this.rateLimits.getWaitTime(endpoint)
            });
        }
    }
}

export const twitterPublisher = new TwitterPublisher();
export default twitterPublisher;
