// src/services/social/base-publisher.ts

import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import type { ApiResponse, GeneratedPost, PublishResult } from '@/types';
import { REQUEST_TIMEOUTS, TWEET_LIMITS } from '@/config/apis';
import { createApiResponse } from '@/utils/helpers';
import { createServiceLogger, logApiRequest } from '@/utils/logger';
import { validateGeneratedPost } from '@/utils/validators';

const logger = createServiceLogger('BasePublisher');

export type PublisherHttpClient = Pick<AxiosInstance, 'get' | 'post'>;

export abstract class BasePublisher {
    protected http: PublisherHttpClient;
    protected platformName: string;

    constructor(platformName: string, baseURL: string, headers: Record<string, string>, http?: PublisherHttpClient) {
        this.platformName = platformName;
        this.http = http ?? this.createHttpClient(baseURL, headers);
    }

    /**
     * Publish a generated post - implemented by each platform
     */
    abstract publishPost(post: GeneratedPost): Promise<ApiResponse<PublishResult | undefined>>;

    /**
     * Check that the configured credentials are accepted
     */
    abstract validateCredentials(): Promise<ApiResponse<boolean>>;

    /**
     * Hook for platforms that sign every outgoing request
     */
    protected signRequest(config: InternalAxiosRequestConfig): InternalAxiosRequestConfig {
        return config;
    }

    /**
     * Handle API errors consistently
     */
    protected handleApiError<T>(error: unknown, action: string): ApiResponse<T | undefined> {
        logger.error(`${this.platformName} ${action} failed`, error);

        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const data: unknown = error.response?.data;
            const detail = typeof data === 'object' && data !== null && 'detail' in data && typeof data.detail === 'string'
                ? data.detail
                : error.message;

            switch (status) {
                case 401:
                    return createApiResponse<T | undefined>(
                        false,
                        `${this.platformName} authentication failed`,
                        undefined,
                        'Access token expired or invalid'
                    );
                case 403:
                    return createApiResponse<T | undefined>(
                        false,
                        `${this.platformName} access forbidden`,
                        undefined,
                        `Insufficient permissions or duplicate content: ${detail}`
                    );
                case 429:
                    return createApiResponse<T | undefined>(
                        false,
                        `${this.platformName} rate limit exceeded`,
                        undefined,
                        'Too many requests, try again later'
                    );
                case 400:
                    return createApiResponse<T | undefined>(
                        false,
                        `${this.platformName} bad request`,
                        undefined,
                        `Invalid request: ${detail}`
                    );
                default:
                    return createApiResponse<T | undefined>(
                        false,
                        `${this.platformName} API error`,
                        undefined,
                        status ? `HTTP ${status}: ${detail}` : detail
                    );
            }
        }

        const errMsg = error instanceof Error ? error.message : String(error);
        return createApiResponse<T | undefined>(
            false,
            `${this.platformName} ${action} failed`,
            undefined,
            errMsg
        );
    }

    /**
     * Validate post content before publishing
     */
    protected validatePostContent(post: GeneratedPost): ApiResponse<boolean> {
        if (!post.text || post.text.trim().length === 0) {
            return createApiResponse(false, 'Post content is empty', false, 'Content is required');
        }

        if (post.text.length > TWEET_LIMITS.maxLength) {
            return createApiResponse(false, 'Post content too long', false, `Content exceeds ${TWEET_LIMITS.maxLength} characters`);
        }

        return validateGeneratedPost(post);
    }

    protected logSuccessfulPost(result: PublishResult): void {
        logger.info(`${this.platformName} post published successfully`, {
            tweetId: result.tweetId,
            url: result.url,
            publishedAt: result.publishedAt
        });
    }

    private createHttpClient(baseURL: string, headers: Record<string, string>): AxiosInstance {
        const instance = axios.create({
            baseURL,
            timeout: REQUEST_TIMEOUTS.twitter,
            headers
        });

        instance.interceptors.request.use(
            (config) => {
                logger.debug(`${this.platformName} API request`, {
                    method: config.method?.toUpperCase(),
                    url: config.url,
                    hasData: !!config.data
                });
                return this.signRequest(config);
            },
            (error) => {
                logger.error(`${this.platformName} request error`, error);
                return Promise.reject(error);
            }
        );

        instance.interceptors.response.use(
            (response) => {
                logApiRequest(
                    this.platformName.toLowerCase(),
                    response.config.url || '',
                    response.config.method?.toUpperCase() || 'GET',
                    response.status
                );
                return response;
            },
            (error) => {
                if (axios.isAxiosError(error)) {
                    logApiRequest(
                        this.platformName.toLowerCase(),
                        error.config?.url || '',
                        error.config?.method?.toUpperCase() || 'GET',
                        error.response?.status
                    );
                }
                return Promise.reject(error);
            }
        );

        return instance;
    }
}
