// src/config/index.ts

import dotenv from 'dotenv';
import type { AppConfig, ApiResponse } from '@/types';

dotenv.config();

const parseNumber = (value: string | undefined, fallback: number): number => {
    const parsed = Number(value);
    return value !== undefined && value !== '' && Number.isFinite(parsed) ? parsed : fallback;
};

class ConfigManager {
    private static instance: ConfigManager;
    private config: AppConfig;

    private constructor() {
        this.config = ConfigManager.loadConfig(process.env);
    }

    public static getInstance(): ConfigManager {
        if (!ConfigManager.instance) {
            ConfigManager.instance = new ConfigManager();
        }
        return ConfigManager.instance;
    }

    /**
     * Build the application config from an environment map.
     * Throws when a Twitter credential is missing.
     */
    public static loadConfig(env: NodeJS.ProcessEnv): AppConfig {
        const requiredEnvVars = [
            'TWITTER_API_KEY',
            'TWITTER_API_SECRET',
            'TWITTER_ACCESS_TOKEN',
            'TWITTER_ACCESS_TOKEN_SECRET'
        ] as const;

        const missingVars = requiredEnvVars.filter(envVar => !env[envVar]);
        if (missingVars.length > 0) {
            throw new Error(`Missing required environment variables: ${missingVars.join(', ')}`);
        }

        return {
            github: {
                token: env.GITHUB_TOKEN || undefined,
                trendingWindowDays: parseNumber(env.TRENDING_WINDOW_DAYS, 7),
                minStars: parseNumber(env.TRENDING_MIN_STARS, 50)
            },
            ai: {
                baseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
                model: env.OLLAMA_MODEL || 'deepseek-coder'
            },
            social: {
                twitter: {
                    apiKey: env.TWITTER_API_KEY ?? '',
                    apiSecret: env.TWITTER_API_SECRET ?? '',
                    accessToken: env.TWITTER_ACCESS_TOKEN ?? '',
                    accessTokenSecret: env.TWITTER_ACCESS_TOKEN_SECRET ?? ''
                },
                postsPerHour: parseNumber(env.POSTS_PER_HOUR, 4)
            },
            browser: {
                screenshotDir: env.SCREENSHOT_DIR || 'screenshots',
                retentionDays: parseNumber(env.SCREENSHOT_RETENTION_DAYS, 7),
                executablePath: env.CHROMIUM_EXECUTABLE_PATH || undefined
            },
            storage: {
                postedLogPath: env.POSTED_LOG_PATH || 'data/posted-repos.log'
            },
            app: {
                nodeEnv: env.NODE_ENV || 'development',
                logLevel: env.LOG_LEVEL || 'info',
                timezone: env.CRON_TIMEZONE || undefined
            }
        };
    }

    public getConfig(): AppConfig {
        return this.config;
    }

    public validateConfig(): ApiResponse<boolean> {
        if (!Number.isInteger(this.config.social.postsPerHour) || this.config.social.postsPerHour < 1) {
            return {
                successful: false,
                message: 'Invalid posts-per-hour hint',
                error: 'POSTS_PER_HOUR must be a positive integer'
            };
        }

        if (this.config.github.trendingWindowDays < 1) {
            return {
                successful: false,
                message: 'Invalid trending window',
                error: 'TRENDING_WINDOW_DAYS must be at least 1'
            };
        }

        return {
            successful: true,
            message: 'Configuration validated successfully',
            data: true
        };
    }
}

export const configManager = ConfigManager.getInstance();
export const config = configManager.getConfig();
export { ConfigManager };
export default config;
