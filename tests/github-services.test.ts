// tests/github-services.test.ts

import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect, vi } from 'vitest';
import { TrendingSourceService } from '../src/services/github/trending';

const searchItem = (overrides: Record<string, unknown> = {}) => ({
    id: 1,
    full_name: 'octo/fastlib',
    name: 'fastlib',
    html_url: 'https://github.com/octo/fastlib',
    description: '  Blazing fast parsing  ',
    language: 'Rust',
    stargazers_count: 420,
    ...overrides
});

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

describe('TrendingSourceService', () => {
    it('builds a created-since query with a star floor', () => {
        const source = new TrendingSourceService({ get: vi.fn() }, { windowDays: 7, minStars: 50 });

        expect(source.buildSearchQuery(new Date(2026, 5, 15, 12))).toBe('created:>=2026-06-08 stars:>=50');
    });

    it('leaves out the star floor when it is zero', () => {
        const source = new TrendingSourceService({ get: vi.fn() }, { windowDays: 1, minStars: 0 });

        expect(source.buildSearchQuery(new Date(2026, 5, 15, 12))).toBe('created:>=2026-06-14');
    });

    it('searches most starred first and maps items to candidates', async () => {
        const get = vi.fn().mockResolvedValue({
            data: { items: [searchItem(), searchItem({ id: 2, full_name: 'octo/bare', name: 'bare', html_url: 'https://github.com/octo/bare', description: null, language: null, stargazers_count: 60 })] }
        });
        const source = new TrendingSourceService({ get }, { windowDays: 7, minStars: 50 });

        const result = await source.fetchTrendingRepositories(new Date(2026, 5, 15, 12));

        expect(get).toHaveBeenCalledWith('/search/repositories', {
            params: { q: 'created:>=2026-06-08 stars:>=50', sort: 'stars', order: 'desc', per_page: 30 }
        });
        expect(result.successful).toBe(true);
        expect(result.data).toEqual([
            {
                id: 'octo/fastlib',
                name: 'fastlib',
                description: 'Blazing fast parsing',
                language: 'Rust',
                stars: 420,
                url: 'https://github.com/octo/fastlib',
                readmeUrl: 'https://github.com/octo/fastlib#readme'
            },
            {
                id: 'octo/bare',
                name: 'bare',
                description: '',
                language: 'Unknown',
                stars: 60,
                url: 'https://github.com/octo/bare',
                readmeUrl: 'https://github.com/octo/bare#readme'
            }
        ]);
    });

    it('drops malformed items', async () => {
        const get = vi.fn().mockResolvedValue({
            data: { items: [searchItem({ full_name: 'not-a-full-name' }), searchItem({ stargazers_count: 'many' }), searchItem()] }
        });
        const source = new TrendingSourceService({ get });

        const result = await source.fetchTrendingRepositories();

        expect(result.data?.map(candidate => candidate.id)).toEqual(['octo/fastlib']);
    });

    it('treats a missing items array as no candidates', async () => {
        const source = new TrendingSourceService({ get: vi.fn().mockResolvedValue({ data: {} }) });

        const result = await source.fetchTrendingRepositories();

        expect(result).toEqual({ successful: true, message: 'Fetched 0 trending repositories', data: [] });
    });

    it('reports the rate limit reset time', async () => {
        const get = vi.fn().mockRejectedValue(httpError(403, { 'x-ratelimit-reset': '1767225600' }));
        const source = new TrendingSourceService({ get });

        const result = await source.fetchTrendingRepositories();

        expect(result).toEqual({
            successful: false,
            message: 'GitHub rate limit exceeded',
            data: [],
            error: 'Resets at 2026-01-01T00:00:00.000Z'
        });
    });

    it('reports an unknown reset when the header is missing', async () => {
        const source = new TrendingSourceService({ get: vi.fn().mockRejectedValue(httpError(429)) });

        const result = await source.fetchTrendingRepositories();

        expect(result.error).toBe('Resets at unknown');
    });

    it('reports a bad token', async () => {
        const source = new TrendingSourceService({ get: vi.fn().mockRejectedValue(httpError(401)) });

        const result = await source.fetchTrendingRepositories();

        expect(result.message).toBe('GitHub authentication failed');
        expect(result.error).toBe('Invalid GitHub token');
    });

    it('reports network failures without throwing', async () => {
        const source = new TrendingSourceService({ get: vi.fn().mockRejectedValue(new Error('socket hang up')) });

        const result = await source.fetchTrendingRepositories();

        expect(result).toEqual({
            successful: false,
            message: 'Failed to fetch trending repositories',
            data: [],
            error: 'socket hang up'
        });
    });
});
