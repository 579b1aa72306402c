// src/config/apis.ts

import path from 'path';
import { config } from './index';
import type { SchedulerPolicy } from '@/types';

export const API_ENDPOINTS = {
    github: {
        baseUrl: 'https://api.github.com',
        searchRepositories: '/search/repositories'
    },

    ollama: {
        baseUrl: config.ai.baseUrl,
        generate: '/api/generate'
    },

    twitter: {
        baseUrl: 'https://api.twitter.com/2',
        tweets: '/tweets',
        mediaUpload: 'https://upload.twitter.com/1.1/media/upload.json',
        statusUrl: (id: string) => `https://twitter.com/i/status/${id}`
    }
};

export const REQUEST_TIMEOUTS = {
    github: 10000,      // 10 seconds
    ollama: 120000,     // local models can be slow on first load
    twitter: 15000,
    browserNavigation: 60000,
    readmeSelector: 10000,
    screenshot: 30000
};

export const DEFAULT_HEADERS = {
    github: {
        'Accept': 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
        'User-Agent': 'repo-spotlight-bot/1.0'
    },

    ollama: {
        'Content-Type': 'application/json'
    },

    twitter: {
        'User-Agent': 'repo-spotlight-bot/1.0'
    }
};

export const TWEET_LIMITS = {
    maxLength: 280,
    maxHashtags: 3
};

export const SCREENSHOT_SETTINGS = {
    viewport: { width: 1280, height: 2000 },
    squareSize: 900,
    readmeSelector: '#readme, .markdown-body',
    selectorAttempts: 3,
    renderDelayMs: 2000
};

export const SCHEDULER_POLICY: SchedulerPolicy = {
    activeStartHour: 9,
    activeEndHour: 23,
    inactiveSkipProbability: 0.8,
    activeSkipProbability: 0.1,
    minSleepMinutes: 45,
    maxSleepMinutes: 120
};

export const STORAGE_PATHS = {
    logs: {
        root: path.join(process.cwd(), 'logs'),
        app: path.join(process.cwd(), 'logs', 'app.log'),
        error: path.join(process.cwd(), 'logs', 'error.log')
    },
    backups: path.join(process.cwd(), 'backups')
};

export const MAINTENANCE_SCHEDULES = {
    screenshotCleanup: '0 3 * * *',
    postedLogBackup: '0 2 * * *',
    maxBackups: 7
};
