import { chromium } from 'playwright';
import { createLogger } from '../logger.js';
import type { BrowserLauncher, BrowserPage, Viewport } from './contracts.js';

export const DEFAULT_VIEWPORT: Viewport = { width: 1280, height: 720 };

export const LAUNCH_ARGS = ['--no-sandbox', '--disable-setuid-sandbox'];

export interface BrowserSessionOptions {
    headless: boolean;
    /** When set, the context records a video of every page into this directory. */
    videoDir?: string;
    viewport?: Viewport;
}

/**
 * Launches a browser, opens one page and hands it to `fn`. The context is
 * closed before the browser whatever `fn` does, so a recorded video is
 * flushed to disk before this resolves.
 */
export async function withBrowserSession<T>(
    options: BrowserSessionOptions,
    fn: (page: BrowserPage) => Promise<T>,
    launcher: BrowserLauncher = chromium,
): Promise<T> {
    const logger = createLogger('browser');
    const viewport = options.viewport ?? DEFAULT_VIEWPORT;

    logger.info({ headless: options.headless, recording: Boolean(options.videoDir) }, 'Launching browser');
    const browser = await launcher.launch({ headless: options.headless, args: LAUNCH_ARGS });

    try {
        const context = await browser.newContext({
            viewport,
            ...(options.videoDir ? { recordVideo: { dir: options.videoDir, size: viewport } } : {}),
        });

        try {
            const page = await context.newPage();
            return await fn(page);
        } finally {
            await context.close();
        }
    } finally {
        await browser.close();
        logger.info('Browser closed');
    }
}
