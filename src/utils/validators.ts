// src/utils/validators.ts

import Joi from 'joi';
import type { ApiResponse, GitHubSearchRepository, GeneratedPost } from '@/types';
import { createApiResponse } from './helpers';
import { TWEET_LIMITS } from '@/config/apis';

/**
 * Environment variables validation schema
 */
const envSchema = Joi.object({
    TWITTER_API_KEY: Joi.string().required(),
    TWITTER_API_SECRET: Joi.string().required(),
    TWITTER_ACCESS_TOKEN: Joi.string().required(),
    TWITTER_ACCESS_TOKEN_SECRET: Joi.string().required(),
    GITHUB_TOKEN: Joi.string().allow('').optional(),
    POSTS_PER_HOUR: Joi.number().integer().min(1).optional(),
    OLLAMA_MODEL: Joi.string().optional(),
    OLLAMA_BASE_URL: Joi.string().uri().optional(),
    TRENDING_WINDOW_DAYS: Joi.number().integer().min(1).optional(),
    TRENDING_MIN_STARS: Joi.number().integer().min(0).optional(),
    SCREENSHOT_DIR: Joi.string().optional(),
    SCREENSHOT_RETENTION_DAYS: Joi.number().integer().min(1).optional(),
    POSTED_LOG_PATH: Joi.string().optional(),
    CHROMIUM_EXECUTABLE_PATH: Joi.string().optional(),
    CRON_TIMEZONE: Joi.string().optional(),
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info')
});

/**
 * GitHub search item validation schema
 */
const searchRepositorySchema = Joi.object<GitHubSearchRepository>({
    id: Joi.number().required(),
    full_name: Joi.string().pattern(/^[^/\s]+\/[^/\s]+$/).required(),
    name: Joi.string().required(),
    html_url: Joi.string().uri().required(),
    description: Joi.string().allow('', null).default(null),
    language: Joi.string().allow(null).default(null),
    stargazers_count: Joi.number().integer().min(0).required()
}).unknown(true);

/**
 * Generated post validation schema
 */
const generatedPostSchema = Joi.object({
    text: Joi.string().trim().min(1).max(TWEET_LIMITS.maxLength).required(),
    screenshotPath: Joi.string().optional(),
    candidate: Joi.object({
        id: Joi.string().required(),
        url: Joi.string().uri().required()
    }).unknown(true).required(),
    source: Joi.string().valid('model', 'fallback').required()
});

/**
 * Validate environment variables
 */
export const validateEnv = (env: NodeJS.ProcessEnv = process.env): ApiResponse<boolean> => {
    const { error } = envSchema.validate(env, {
        allowUnknown: true,
        stripUnknown: true,
        abortEarly: false
    });

    if (error) {
        return createApiResponse(
            false,
            'Environment validation failed',
            false,
            error.details.map(d => d.message).join(', ')
        );
    }

    return createApiResponse(true, 'Environment variables validated', true);
};

/**
 * Validate a repository item from the GitHub search API
 */
export const validateSearchRepository = (item: unknown): ApiResponse<GitHubSearchRepository | undefined> => {
    const { error, value } = searchRepositorySchema.validate(item);

    if (error) {
        return createApiResponse(
            false,
            'GitHub repository validation failed',
            undefined,
            error.details[0]?.message || 'Unknown validation error'
        );
    }

    return createApiResponse(true, 'GitHub repository validated', value);
};

/**
 * Validate a generated post before it is handed to the publisher
 */
export const validateGeneratedPost = (post: GeneratedPost): ApiResponse<boolean> => {
    const { error } = generatedPostSchema.validate(post);

    if (error) {
        return createApiResponse(
            false,
            'Generated post validation failed',
            false,
            error.details[0]?.message || 'Unknown validation error'
        );
    }

    return createApiResponse(true, 'Generated post validated', true);
};
