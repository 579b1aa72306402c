// vitest.config.ts

import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': path.resolve(__dirname, 'src')
        }
    },
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
            TWITTER_API_KEY: 'test-key',
            TWITTER_API_SECRET: 'test-secret',
            TWITTER_ACCESS_TOKEN: 'test-token',
            TWITTER_ACCESS_TOKEN_SECRET: 'test-token-secret',
            POSTS_PER_HOUR: '4'
        }
    }
});
