// src/services/browser/screenshot.ts

import fs from 'fs/promises';
import path from 'path';
import { chromium, type Browser, type Locator, type Page } from 'playwright-core';
import type { ApiResponse, CandidateRepository } from '@/types';
import { config } from '@/config';
import { REQUEST_TIMEOUTS, SCREENSHOT_SETTINGS } from '@/config/apis';
import { createApiResponse, dateUtils, stringUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('ScreenshotCapturer');

export interface BoundingBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface ScreenshotOptions {
    screenshotDir: string;
    executablePath?: string;
    renderDelayMs: number;
}

/**
 * Square clip anchored at the README, kept inside the page
 */
export const computeClip = (
    box: BoundingBox,
    pageWidth: number,
    pageHeight: number,
    size: number = SCREENSHOT_SETTINGS.squareSize
): BoundingBox => ({
    x: Math.max(0, Math.min(box.x, pageWidth - size)),
    y: Math.max(0, Math.min(box.y, pageHeight - size)),
    width: Math.min(size, pageWidth),
    height: Math.min(size, pageHeight)
});

export class ScreenshotCapturerService {
    private options: ScreenshotOptions;

    constructor(options?: Partial<ScreenshotOptions>) {
        this.options = {
            screenshotDir: config.browser.screenshotDir,
            executablePath: config.browser.executablePath,
            renderDelayMs: SCREENSHOT_SETTINGS.renderDelayMs,
            ...options
        };
    }

    public buildFileName(repo: CandidateRepository, now: Date = new Date()): string {
        const slug = stringUtils.slugify(repo.name) || 'repository';
        return `${slug}_${Math.floor(now.getTime() / 1000)}.png`;
    }

    /**
     * Capture the README section of a repository page as a PNG
     */
    public async captureReadme(repo: CandidateRepository): Promise<ApiResponse<string | undefined>> {
        let browser: Browser | undefined;

        try {
            await fs.mkdir(this.options.screenshotDir, { recursive: true });

            browser = await chromium.launch({
                headless: true,
                ...(this.options.executablePath ? { executablePath: this.options.executablePath } : {})
            });
            const page = await browser.newPage({ viewport: SCREENSHOT_SETTINGS.viewport });

            logger.info('Capturing README screenshot', { repository: repo.id, url: repo.readmeUrl });
            await page.goto(repo.readmeUrl, { timeout: REQUEST_TIMEOUTS.browserNavigation });

            const readme = await this.waitForReadme(page);
            await readme.scrollIntoViewIfNeeded();
            await page.waitForTimeout(this.options.renderDelayMs);

            const box = await readme.boundingBox();
            if (!box || box.width === 0 || box.height === 0) {
                logger.warn('README element has no visible area', { repository: repo.id });
                return createApiResponse(false, 'README not visible', undefined, 'Empty bounding box');
            }

            const pageWidth = Number(await page.evaluate<number>('document.documentElement.scrollWidth'));
            const pageHeight = Number(await page.evaluate<number>('document.documentElement.scrollHeight'));
            const clip = computeClip(box, pageWidth, pageHeight);

            const screenshotPath = path.join(this.options.screenshotDir, this.buildFileName(repo));
            await page.screenshot({
                path: screenshotPath,
                clip,
                type: 'png',
                animations: 'disabled',
                timeout: REQUEST_TIMEOUTS.screenshot
            });

            logger.info('Screenshot captured', { repository: repo.id, path: screenshotPath });
            return createApiResponse(true, 'Screenshot captured', screenshotPath);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Screenshot failed', error, { repository: repo.id });
            return createApiResponse(false, 'Screenshot failed', undefined, errMsg);
        } finally {
            if (browser) {
                await browser.close().catch((closeError: unknown) => {
                    logger.warn('Failed to close browser', {
                        error: closeError instanceof Error ? closeError.message : String(closeError)
                    });
                });
            }
        }
    }

    /**
     * Delete PNG files older than the retention window
     */
    public async cleanupOldScreenshots(
        retentionDays: number = config.browser.retentionDays,
        now: Date = new Date()
    ): Promise<ApiResponse<number>> {
        try {
            let files: string[];
            try {
                files = await fs.readdir(this.options.screenshotDir);
            } catch {
                return createApiResponse(true, 'No screenshot directory yet', 0);
            }

            let deleted = 0;
            for (const file of files.filter(name => name.endsWith('.png'))) {
                const filePath = path.join(this.options.screenshotDir, file);
                const stat = await fs.stat(filePath);
                if (dateUtils.isOlderThan(stat.mtime, retentionDays, now)) {
                    await fs.unlink(filePath);
                    deleted++;
                }
            }

            logger.info('Old screenshots cleaned up', { deleted, retentionDays });
            return createApiResponse(true, `Deleted ${deleted} screenshots`, deleted);
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);
            logger.error('Screenshot cleanup failed', error);
            return createApiResponse(false, 'Screenshot cleanup failed', 0, errMsg);
        }
    }

    private async waitForReadme(page: Page): Promise<Locator> {
        for (let attempt = 1; attempt <= SCREENSHOT_SETTINGS.selectorAttempts; attempt++) {
            try {
                await page.waitForSelector(SCREENSHOT_SETTINGS.readmeSelector, {
                    state: 'visible',
                    timeout: REQUEST_TIMEOUTS.readmeSelector
                });
                const locator = page.locator(SCREENSHOT_SETTINGS.readmeSelector).first();
                if (await locator.count() > 0) {
                    return locator;
                }
            } catch (error: unknown) {
                logger.warn('README not found yet, reloading', {
                    attempt,
                    error: error instanceof Error ? error.message : String(error)
                });
                await page.reload();
            }
        }

        throw new Error(`README section not found after ${SCREENSHOT_SETTINGS.selectorAttempts} attempts`);
    }
}

export const screenshotCapturer = new ScreenshotCapturerService();
export default screenshotCapturer;
