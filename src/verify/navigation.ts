import type { BrowserPage, LoadState } from '../browser/contracts.js';
import type { Logger } from '../logger.js';

export class NavigationError extends Error {
    readonly url: string;

    constructor(url: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to navigate to ${url}: ${reason}`, { cause });
        this.name = 'NavigationError';
        this.url = url;
    }
}

export async function navigate(
    page: BrowserPage,
    url: string,
    logger: Logger,
    waitUntil: LoadState = 'load',
): Promise<void> {
    logger.info({ url, waitUntil }, `Navigating to ${url}`);
    try {
        await page.goto(url, { waitUntil });
    } catch (error) {
        throw new NavigationError(url, error);
    }
}
