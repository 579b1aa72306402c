// src/types/social.ts

import type { CandidateRepository } from './github';

export type ContentSource = 'model' | 'fallback';

export interface GeneratedPost {
    text: string;
    screenshotPath?: string;
    candidate: CandidateRepository;
    source: ContentSource;
}

export interface PublishResult {
    tweetId: string;
    url: string;
    replyId?: string;
    mediaId?: string;
    publishedAt: string;
}

export type RateLimitEndpoint = 'tweet_create' | 'media_upload';

export interface RateLimitState {
    limit: number;
    remaining: number;
    /** Unix seconds */
    reset: number;
}

export interface PostedEntry {
    identifier: string;
    postedAt: string;
    tweetId: string;
    content: string;
    mediaPath?: string;
}
