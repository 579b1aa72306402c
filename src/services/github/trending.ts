// src/services/github/trending.ts

import axios, { type AxiosInstance } from 'axios';
import type { ApiResponse, CandidateRepository, GitHubSearchRepository, GitHubSearchResponse } from '@/types';
import { config } from '@/config';
import { API_ENDPOINTS, DEFAULT_HEADERS, REQUEST_TIMEOUTS } from '@/config/apis';
import { createApiResponse, dateUtils } from '@/utils/helpers';
import { createServiceLogger, logApiRequest } from '@/utils/logger';
import { validateSearchRepository } from '@/utils/validators';

const logger = createServiceLogger('TrendingSource');

export type GitHubHttpClient = Pick<AxiosInstance, 'get'>;

export interface TrendingQueryOptions {
    windowDays: number;
    minStars: number;
    perPage: number;
}

const createGitHubClient = (): AxiosInstance => {
    const instance = axios.create({
        baseURL: API_ENDPOINTS.github.baseUrl,
        timeout: REQUEST_TIMEOUTS.github,
        headers: {
            ...DEFAULT_HEADERS.github,
            ...(config.github.token ? { 'Authorization': `Bearer ${config.github.token}` } : {})
        }
    });

    instance.interceptors.request.use((requestConfig) => {
        logger.debug('GitHub API request', {
            method: requestConfig.method?.toUpperCase(),
            url: requestConfig.url,
            params: requestConfig.params
        });
        return requestConfig;
    });

    instance.interceptors.response.use(
        (response) => {
            logApiRequest('github', response.config.url || '',
                response.config.method?.toUpperCase() || 'GET',
                response.status);
            return response;
        },
        (error) => {
            if (axios.isAxiosError(error)) {
                logApiRequest('github', error.config?.url || '',
                    error.config?.method?.toUpperCase() || 'GET',
                    error.response?.status);
            }
            return Promise.reject(error);
        }
    );

    return instance;
};

export class TrendingSourceService {
    private http: GitHubHttpClient;
    private options: TrendingQueryOptions;

    constructor(http?: GitHubHttpClient, options?: Partial<TrendingQueryOptions>) {
        this.http = http ?? createGitHubClient();
        this.options = {
            windowDays: config.github.trendingWindowDays,
            minStars: config.github.minStars,
            perPage: 30,
            ...options
        };
    }

    /**
     * Search query for repositories created inside the trending window
     */
    public buildSearchQuery(now: Date = new Date()): string {
        const parts = [`created:>=${dateUtils.daysAgo(this.options.windowDays, now)}`];
        if (this.options.minStars > 0) {
            parts.push(`stars:>=${this.options.minStars}`);
        }
        return parts.join(' ');
    }

    /**
     * Fetch trending repositories, most starred first
     */
    public async fetchTrendingRepositories(now: Date = new Date()): Promise<ApiResponse<CandidateRepository[]>> {
        try {
            const query = this.buildSearchQuery(now);
            logger.info('Fetching trending repositories', { query });

            const response = await this.http.get<GitHubSearchResponse>(API_ENDPOINTS.github.searchRepositories, {
                params: {
                    q: query,
                    sort: 'stars',
                    order: 'desc',
                    per_page: this.options.perPage
                }
            });

            const items = Array.isArray(response.data?.items) ? response.data.items : [];
            const candidates: CandidateRepository[] = [];

            for (const item of items) {
                const validation = validateSearchRepository(item);
                if (!validation.successful || !validation.data) {
                    logger.warn('Skipping malformed repository item', { error: validation.error });
                    continue;
                }
                candidates.push(this.toCandidate(validation.data));
            }

            logger.info('Trending repositories fetched', { count: candidates.length });
            return createApiResponse(true, `Fetched ${candidates.length} trending repositories`, candidates);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Failed to fetch trending repositories', error);

            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                if (status === 403 || status === 429) {
                    const reset = Number(error.response?.headers?.['x-ratelimit-reset']);
                    const resetsAt = Number.isFinite(reset) && reset > 0
                        ? dateUtils.fromUnixSeconds(reset)
                        : 'unknown';
                    logger.warn('GitHub rate limit exceeded', { resetsAt });
                    return createApiResponse(false, 'GitHub rate limit exceeded', [], `Resets at ${resetsAt}`);
                }
                if (status === 401) {
                    return createApiResponse(false, 'GitHub authentication failed', [], 'Invalid GitHub token');
                }
                if (status === 422) {
                    return createApiResponse(false, 'GitHub rejected the search query', [], errMsg);
                }
            }

            return createApiResponse(false, 'Failed to fetch trending repositories', [], errMsg);
        }
    }

    public toCandidate(repo: GitHubSearchRepository): CandidateRepository {
        return {
            id: repo.full_name,
            name: repo.name,
            description: repo.description?.trim() || '',
            language: repo.language || 'Unknown',
            stars: repo.stargazers_count,
            url: repo.html_url,
            readmeUrl: `${repo.html_url}#readme`
        };
    }
}

export const trendingSource = new TrendingSourceService();
export default trendingSource;
