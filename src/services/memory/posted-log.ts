// src/services/memory/posted-log.ts

import fs from 'fs/promises';
import path from 'path';
import type { ApiResponse, PostedEntry } from '@/types';
import { config } from '@/config';
import { MAINTENANCE_SCHEDULES, STORAGE_PATHS } from '@/config/apis';
import { createApiResponse, dateUtils, stringUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('PostedLog');

const ENTRY_SEPARATOR = '-'.repeat(50);
const HEADER_PATTERN = /^\[(.+)\] Tweet ID: (.*)$/;
const POSTED_PREFIX = 'Posted: ';

interface PostedRecord {
    identifier: string;
    postedAt: string;
}

/**
 * Extract posted identifiers (and their timestamps) from the log text.
 * Only `Posted: ` lines count; the rest of each block is for humans.
 */
export const parsePostedLog = (text: string): PostedRecord[] => {
    const records: PostedRecord[] = [];
    let lastTimestamp = '';

    for (const line of text.split(/\r?\n/)) {
        const header = HEADER_PATTERN.exec(line);
        if (header) {
            lastTimestamp = header[1] ?? '';
            continue;
        }
        if (line.startsWith(POSTED_PREFIX)) {
            const identifier = line.slice(POSTED_PREFIX.length).trim();
            if (identifier) {
                records.push({ identifier, postedAt: lastTimestamp });
            }
            lastTimestamp = '';
        }
    }

    return records;
};

export const formatPostedEntry = (entry: PostedEntry): string => [
    `[${entry.postedAt}] Tweet ID: ${entry.tweetId}`,
    `${POSTED_PREFIX}${entry.identifier}`,
    `Content: ${stringUtils.escapeNewlines(entry.content)}`,
    `Media: ${entry.mediaPath ?? 'None'}`,
    ENTRY_SEPARATOR,
    ''
].join('\n');

export class PostedLogService {
    private logPath: string;
    private identifiers: Set<string> = new Set();
    private records: PostedRecord[] = [];
    private isInitialized: boolean = false;

    constructor(logPath: string = config.storage.postedLogPath) {
        this.logPath = logPath;
    }

    /**
     * Load previously posted identifiers from disk
     */
    public async initialize(): Promise<ApiResponse<number>> {
        try {
            await fs.mkdir(path.dirname(this.logPath), { recursive: true });

            let text = '';
            try {
                text = await fs.readFile(this.logPath, 'utf-8');
            } catch (error: unknown) {
                if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
                    throw error;
                }
                logger.info('No posted log found, starting fresh', { path: this.logPath });
            }

            this.records = parsePostedLog(text);
            this.identifiers = new Set(this.records.map(record => record.identifier));
            this.isInitialized = true;

            logger.info('Posted log loaded', { path: this.logPath, identifiers: this.identifiers.size });
            return createApiResponse(true, 'Posted log loaded', this.identifiers.size);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Failed to load posted log', error, { path: this.logPath });
            return createApiResponse(false, 'Failed to load posted log', 0, errMsg);
        }
    }

    public hasPosted(identifier: string): boolean {
        return this.identifiers.has(identifier);
    }

    /**
     * Number of posts recorded strictly after the given moment
     */
    public countSince(since: Date): number {
        const cutoff = since.getTime();
        return this.records.filter(record => {
            const postedAt = Date.parse(record.postedAt);
            return Number.isFinite(postedAt) && postedAt > cutoff;
        }).length;
    }

    /**
     * Append an entry. It is remembered in memory even when the append fails.
     */
    public async recordPost(entry: PostedEntry): Promise<ApiResponse<boolean>> {
        try {
            if (!this.isInitialized) {
                const init = await this.initialize();
                if (!init.successful) {
                    this.remember(entry);
                    return createApiResponse(false, 'Posted log unavailable', false, init.error);
                }
            }

            this.remember(entry);
            await fs.appendFile(this.logPath, formatPostedEntry(entry), 'utf-8');

            logger.info('Post recorded', { identifier: entry.identifier, tweetId: entry.tweetId });
            return createApiResponse(true, 'Post recorded', true);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Failed to record post', error, { identifier: entry.identifier });
            return createApiResponse(false, 'Failed to record post', false, errMsg);
        }
    }

    private remember(entry: PostedEntry): void {
        this.identifiers.add(entry.identifier);
        this.records.push({ identifier: entry.identifier, postedAt: entry.postedAt });
    }

    /**
     * Copy the log into the backup directory, keeping the newest copies
     */
    public async createBackup(
        backupDir: string = STORAGE_PATHS.backups,
        maxBackups: number = MAINTENANCE_SCHEDULES.maxBackups
    ): Promise<ApiResponse<string | undefined>> {
        try {
            try {
                await fs.access(this.logPath);
            } catch {
                return createApiResponse(false, 'Nothing to back up', undefined, 'Posted log does not exist yet');
            }

            await fs.mkdir(backupDir, { recursive: true });
            const backupPath = path.join(backupDir, `posted-repos-${dateUtils.fileTimestamp()}.log`);
            await fs.copyFile(this.logPath, backupPath);

            const backups = (await fs.readdir(backupDir))
                .filter(file => file.startsWith('posted-repos-') && file.endsWith('.log'))
                .sort()
                .reverse();

            for (const stale of backups.slice(maxBackups)) {
                await fs.unlink(path.join(backupDir, stale));
                logger.info('Old backup deleted', { fileName: stale });
            }

            logger.info('Posted log backup created', { backupPath });
            return createApiResponse(true, 'Backup created', backupPath);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Failed to back up posted log', error);
            return createApiResponse(false, 'Backup failed', undefined, errMsg);
        }
    }
}

export const postedLog = new PostedLogService();
export default postedLog;
