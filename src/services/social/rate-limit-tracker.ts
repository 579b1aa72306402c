// src/services/social/rate-limit-tracker.ts

import type { RateLimitEndpoint, RateLimitState } from '@/types';

type ResponseHeaders = Record<string, unknown> | undefined;

const readHeader = (headers: ResponseHeaders, name: string, fallback: number): number => {
    const value = Number(headers?.[name]);
    return Number.isFinite(value) && headers?.[name] !== undefined ? value : fallback;
};

const nowInSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Per-endpoint rate limit state fed from `x-rate-limit-*` response headers
 */
export class RateLimitTracker {
    private limits: Record<RateLimitEndpoint, RateLimitState> = {
        tweet_create: { limit: 50, remaining: 50, reset: 0 },
        media_upload: { limit: 50, remaining: 50, reset: 0 }
    };

    public updateFromHeaders(headers: ResponseHeaders, endpoint: RateLimitEndpoint): void {
        if (!headers) {
            return;
        }

        const current = this.limits[endpoint];
        this.limits[endpoint] = {
            limit: readHeader(headers, 'x-rate-limit-limit', current.limit),
            remaining: readHeader(headers, 'x-rate-limit-remaining', current.remaining),
            reset: readHeader(headers, 'x-rate-limit-reset', current.reset)
        };
    }

    /**
     * Record a 429 response; without a reset header the window is assumed to be 15 minutes
     */
    public markExhausted(endpoint: RateLimitEndpoint, headers: ResponseHeaders, now: number = nowInSeconds()): void {
        this.updateFromHeaders(headers, endpoint);
        const current = this.limits[endpoint];
        this.limits[endpoint] = {
            ...current,
            remaining: 0,
            reset: current.reset > now ? current.reset : now + 15 * 60
        };
    }

    public isExhausted(endpoint: RateLimitEndpoint, now: number = nowInSeconds()): boolean {
        const state = this.limits[endpoint];
        return state.remaining < 1 && state.reset > now;
    }

    /**
     * Seconds until the endpoint's window resets, with a small buffer
     */
    public getWaitTime(endpoint: RateLimitEndpoint, now: number = nowInSeconds()): number {
        return Math.max(this.limits[endpoint].reset - now + 2, 0);
    }

    public getState(endpoint: RateLimitEndpoint): RateLimitState {
        return { ...this.limits[endpoint] };
    }
}
