// src/utils/helpers.ts

import moment from 'moment';
import type { ApiResponse } from '@/types';

/**
 * Sleep/delay function
 */
export const sleep = (ms: number): Promise<void> => {
    return new Promise(resolve => setTimeout(resolve, ms));
};

/**
 * Create standardized API response
 */
export const createApiResponse = <T>(
    successful: boolean,
    message: string,
    data?: T,
    error?: string | Error
): ApiResponse<T> => {
    const response: ApiResponse<T> = {
        successful,
        message
    };
    if (error !== undefined) {
        response.error = error instanceof Error ? error.message : error;
    }
    if (data !== undefined) {
        response.data = data;
    }
    return response;
};

/**
 * Date and time utilities
 */
export const dateUtils = {
    daysAgo: (days: number, from: Date = new Date()): string => {
        return moment(from).subtract(days, 'days').format('YYYY-MM-DD');
    },

    hourOf: (date: Date): number => {
        return moment(date).hour();
    },

    isOlderThan: (date: Date, days: number, now: Date = new Date()): boolean => {
        return moment(date).isBefore(moment(now).subtract(days, 'days'));
    },

    fileTimestamp: (date: Date = new Date()): string => {
        return moment(date).format('YYYYMMDD-HHmmss');
    },

    fromUnixSeconds: (seconds: number): string => {
        return moment.unix(seconds).toISOString();
    }
};

/**
 * String utilities
 */
export const stringUtils = {
    truncate: (text: string, maxLength: number, suffix: string = '...'): string => {
        if (text.length <= maxLength) return text;
        const limit = maxLength - suffix.length;
        let truncated = '';
        // whole code points only, so an emoji is never split
        for (const char of text) {
            if (truncated.length + char.length > limit) break;
            truncated += char;
        }
        return truncated + suffix;
    },

    slugify: (text: string): string => {
        return text
            .toLowerCase()
            .replace(/[^a-z0-9]+/g, '-')
            .replace(/^-+|-+$/g, '');
    },

    escapeNewlines: (text: string): string => {
        return text.replace(/\r?\n/g, '\\n');
    }
};
