// tests/social-services.test.ts

import crypto from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import axios, { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { REQUEST_TIMEOUTS } from '../src/config/apis';
import { buildOAuthHeader, createOAuthSignature, percentEncode } from '../src/services/social/oauth';
import { RateLimitTracker } from '../src/services/social/rate-limit-tracker';
import { TwitterPublisher } from '../src/services/social/twitter';
import type { GeneratedPost } from '../src/types';

const credentials = {
    consumerKey: 'test-key',
    consumerSecret: 'test-secret',
    token: 'test-token',
    tokenSecret: 'test-token-secret'
};

const post: GeneratedPost = {
    text: 'fastlib makes parsing fun #Rust',
    candidate: {
        id: 'octo/fastlib',
        name: 'fastlib',
        description: 'Blazing fast parsing',
        language: 'Rust',
        stars: 120,
        url: 'https://github.com/octo/fastlib',
        readmeUrl: 'https://github.com/octo/fastlib#readme'
    },
    source: 'model'
};

const httpError = (status: number, headers: Record<string, string> = {}): AxiosError => {
    const requestConfig: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    return new AxiosError('Request failed', 'ERR_BAD_REQUEST', requestConfig, undefined, {
        status,
        statusText: 'Error',
        headers,
        config: requestConfig,
        data: {}
    });
};

const tweetResponse = (id: string) => ({ data: { data: { id, text: 'ok' } }, headers: {} });

describe('OAuth signing', () => {
    it('percent-encodes reserved characters', () => {
        expect(percentEncode("it's (ok)*!")).toBe('it%27s%20%28ok%29%2A%21');
    });

    it('signs the method, url and sorted parameters', () => {
        const signature = createOAuthSignature(
            'post',
            'https://api.example.com/2/tweets',
            { b: '2', a: '1 x' },
            { consumerSecret: 'cs', tokenSecret: 'ts' }
        );

        const expected = crypto
            .createHmac('sha1', 'cs&ts')
            .update('POST&https%3A%2F%2Fapi.example.com%2F2%2Ftweets&a%3D1%2520x%26b%3D2')
            .digest('base64');
        expect(signature).toBe(expected);
    });

    it('builds a header with sorted oauth parameters', () => {
        const header = buildOAuthHeader(
            { method: 'POST', url: 'https://api.example.com/2/tweets', nonce: 'abc', timestamp: '1700000000' },
            credentials
        );

        const signature = createOAuthSignature('POST', 'https://api.example.com/2/tweets', {
            oauth_consumer_key: 'test-key',
            oauth_nonce: 'abc',
            oauth_signature_method: 'HMAC-SHA1',
            oauth_timestamp: '1700000000',
            oauth_token: 'test-token',
            oauth_version: '1.0'
        }, credentials);

        expect(header).toBe(
            'OAuth oauth_consumer_key="test-key", oauth_nonce="abc", ' +
            `oauth_signature="${percentEncode(signature)}", oauth_signature_method="HMAC-SHA1", ` +
            'oauth_timestamp="1700000000", oauth_token="test-token", oauth_version="1.0"'
        );
    });

    it('signs query string parameters like explicit ones', () => {
        const fromQuery = buildOAuthHeader(
            { method: 'GET', url: 'https://api.example.com/2/users/me?fields=id', nonce: 'n', timestamp: '1' },
            credentials
        );
        const fromParams = buildOAuthHeader(
            { method: 'GET', url: 'https://api.example.com/2/users/me', params: { fields: 'id' }, nonce: 'n', timestamp: '1' },
            credentials
        );

        expect(fromQuery).toBe(fromParams);
    });
});

describe('RateLimitTracker', () => {
    it('tracks remaining calls from response headers', () => {
        const tracker = new RateLimitTracker();

        tracker.updateFromHeaders({ 'x-rate-limit-limit': '100', 'x-rate-limit-remaining': '0', 'x-rate-limit-reset': '2000' }, 'tweet_create');

        expect(tracker.getState('tweet_create')).toEqual({ limit: 100, remaining: 0, reset: 2000 });
        expect(tracker.isExhausted('tweet_create', 1000)).toBe(true);
        expect(tracker.getWaitTime('tweet_create', 1000)).toBe(1002);
        expect(tracker.isExhausted('tweet_create', 2000)).toBe(false);
        expect(tracker.isExhausted('media_upload', 1000)).toBe(false);
    });

    it('keeps known values when headers are missing', () => {
        const tracker = new RateLimitTracker();

        tracker.updateFromHeaders({ 'x-rate-limit-remaining': '7' }, 'media_upload');

        expect(tracker.getState('media_upload')).toEqual({ limit: 50, remaining: 7, reset: 0 });
    });

    it('assumes a fifteen minute window when a 429 carries no reset', () => {
        const tracker = new RateLimitTracker();

        tracker.markExhausted('media_upload', undefined, 1000);

        expect(tracker.getState('media_upload')).toEqual({ limit: 50, remaining: 0, reset: 1900 });
        expect(tracker.isExhausted('media_upload', 1899)).toBe(true);
        expect(tracker.getWaitTime('media_upload', 3000)).toBe(0);
    });
});

describe('TwitterPublisher', () => {
    let tmpDir: string;
    let screenshotPath: string;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'spotlight-publish-'));
        screenshotPath = path.join(tmpDir, 'fastlib_1700000000.png');
        await fs.writeFile(screenshotPath, Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('uploads the screenshot, tweets and replies with the link', async () => {
        const httpPost = vi.fn()
            .mockResolvedValueOnce({ data: { media_id_string: 'media-1' }, headers: {} })
            .mockResolvedValueOnce(tweetResponse('tweet-1'))
            .mockResolvedValueOnce(tweetResponse('tweet-2'));
        const publisher = new TwitterPublisher({ get: vi.fn(), post: httpPost }, credentials);

        const result = await publisher.publishPost({ ...post, screenshotPath });

        expect(result.successful).toBe(true);
        expect(result.data).toEqual({
            tweetId: 'tweet-1',
            url: 'https://twitter.com/i/status/tweet-1',
            publishedAt: expect.any(String),
            mediaId: 'media-1',
            replyId: 'tweet-2'
        });

        expect(httpPost).toHaveBeenCalledTimes(3);
        const [uploadUrl, form] = httpPost.mock.calls[0] ?? [];
        expect(uploadUrl).toBe('https://upload.twitter.com/1.1/media/upload.json');
        expect(form).toBeInstanceOf(FormData);
        expect(form.get('media_category')).toBe('tweet_image');
        expect(httpPost).toHaveBeenNthCalledWith(2, '/tweets', {
            text: 'fastlib makes parsing fun #Rust',
            media: { media_ids: ['media-1'] }
        });
        expect(httpPost).toHaveBeenNthCalledWith(3, '/tweets', {
            text: '🔗 https://github.com/octo/fastlib',
            reply: { in_reply_to_tweet_id: 'tweet-1' }
        });
    });

    it('posts text only when there is no screenshot', async () => {
        const httpPost = vi.fn()
            .mockResolvedValueOnce(tweetResponse('tweet-1'))
            .mockResolvedValueOnce(tweetResponse('tweet-2'));
        const publisher = new TwitterPublisher({ get: vi.fn(), post: httpPost }, credentials);

        const result = await publisher.publishPost(post);

        expect(result.data?.mediaId).toBeUndefined();
        expect(httpPost).toHaveBeenNthCalledWith(1, '/tweets', { text: 'fastlib makes parsing fun #Rust' });
    });

    it('posts without media when the screenshot cannot be read', async () => {
        const httpPost = vi.fn()
            .mockResolvedValueOnce(tweetResponse('tweet-1'))
            .mockResolvedValueOnce(tweetResponse('tweet-2'));
        const publisher = new TwitterPublisher({ get: vi.fn(), post: httpPost }, credentials);

        const result = await publisher.publishPost({ ...post, screenshotPath: path.join(tmpDir, 'missing.png') });

        expect(result.successful).toBe(true);
        expect(httpPost).toHaveBeenNthCalledWith(1, '/tweets', { text: 'fastlib makes parsing fun #Rust' });
    });

    it('keeps the tweet when the link reply fails', async () => {
        const httpPost = vi.fn()
            .mockResolvedValueOnce(tweetResponse('tweet-1'))
            .mockRejectedValueOnce(httpError(403));
        const publisher = new TwitterPublisher({ get: vi.fn(), post: httpPost }, credentials);

        const result = await publisher.publishPost(post);

        expect(result.successful).toBe(true);
        expect(result.data?.tweetId).toBe('tweet-1');
        expect(result.data?.replyId).toBeUndefined();
    });

    it('refuses empty text without calling the API', async () => {
        const httpPost = vi.fn();
        const publisher = new TwitterPublisher({ get: vi.fn(), post: httpPost }, credentials);

        const result = await publisher.publishPost({ ...post, text: '   ' });

        expect(result).toEqual({
            successful: false,
            message: 'Content validation failed',
            error: 'Content is required'
        });
        expect(httpPost).not.toHaveBeenCalled();
    });

    it('fails when the API returns no tweet id', async () => {
        const publisher = new TwitterPublisher({ get: vi.fn(), post: vi.fn().mockResolvedValue({ data: {}, headers: {} }) }, credentials);

        const result = await publisher.publishPost(post);

        expect(result.message).toBe('No tweet ID returned');
    });

    it('stops calling the API after a 429 until the window resets', async () => {
        const reset = Math.floor(Date.now() / 1000) + 600;
        const httpPost = vi.fn().mockRejectedValue(httpError(429, { 'x-rate-limit-reset': String(reset) }));
        const publisher = new TwitterPublisher({ get: vi.fn(), post: httpPost }, credentials);

        const first = await publisher.publishPost(post);
        const second = await publisher.publishPost(post);

        expect(first).toEqual({
            successful: false,
            message: 'Twitter rate limit exceeded',
            error: 'Too many requests, try again later'
        });
        expect(second.message).toBe('Twitter rate limit exceeded');
        expect(second.error).toMatch(/^Tweet limit resets in \d+ seconds$/);
        expect(httpPost).toHaveBeenCalledTimes(1);
        expect(publisher.getRateLimits().getState('tweet_create')).toEqual({ limit: 50, remaining: 0, reset });
    });

    it('builds its client with the Twitter timeout', () => {
        const create = vi.spyOn(axios, 'create');

        new TwitterPublisher(undefined, credentials);

        expect(create).toHaveBeenCalledWith(expect.objectContaining({
            baseURL: 'https://api.twitter.com/2',
            timeout: REQUEST_TIMEOUTS.twitter
        }));
        create.mockRestore();
    });

    it('reports rejected credentials', async () => {
        const publisher = new TwitterPublisher({ get: vi.fn().mockRejectedValue(httpError(401)), post: vi.fn() }, credentials);

        const result = await publisher.validateCredentials();

        expect(result).toEqual({
            successful: false,
            message: 'Twitter authentication failed',
            data: false,
            error: 'Access token expired or invalid'
        });
    });
});
