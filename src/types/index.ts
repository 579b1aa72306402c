// src/types/index.ts

export interface ApiResponse<T = unknown> {
    data?: T;
    error?: string;
    message: string;
    successful: boolean;
}

export interface AppConfig {
    github: {
        token?: string;
        trendingWindowDays: number;
        minStars: number;
    };
    ai: {
        baseUrl: string;
        model: string;
    };
    social: {
        twitter: {
            apiKey: string;
            apiSecret: string;
            accessToken: string;
            accessTokenSecret: string;
        };
        postsPerHour: number;
    };
    browser: {
        screenshotDir: string;
        retentionDays: number;
        executablePath?: string;
    };
    storage: {
        postedLogPath: string;
    };
    app: {
        nodeEnv: string;
        logLevel: string;
        timezone?: string;
    };
}

export * from './github';
export * from './social';
export * from './scheduler';
