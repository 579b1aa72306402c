// src/types/github.ts

/**
 * Subset of a repository item returned by the GitHub search API
 */
export interface GitHubSearchRepository {
    id: number;
    full_name: string;
    name: string;
    html_url: string;
    description: string | null;
    language: string | null;
    stargazers_count: number;
}

export interface GitHubSearchResponse {
    total_count: number;
    incomplete_results: boolean;
    items: unknown[];
}

export interface CandidateRepository {
    /** `owner/name`, used as the posted-log identifier */
    id: string;
    name: string;
    description: string;
    language: string;
    stars: number;
    url: string;
    readmeUrl: string;
}
