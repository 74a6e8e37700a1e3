import path from 'node:path';
import type { HarnessConfig } from '../config.js';
import type { BrowserLauncher, BrowserPage } from '../browser/contracts.js';
import { buildVerificationRouter } from '../browser/dashboard-mocks.js';
import { SIMULATOR_STATUS_LANDMARK } from '../browser/driver.js';
import { withBrowserSession } from '../browser/session.js';
import { ensureDir } from '../browser/video.js';
import { createLogger, type Logger } from '../logger.js';
import { navigate } from './navigation.js';

export const USER_SERVICE_CARD = 'text=User Service';

export interface DashboardVerificationOptions {
    launcher?: BrowserLauncher;
    logger?: Logger;
    landmarkTimeoutMs?: number;
}

export interface DashboardVerificationResult {
    landmarkFound: boolean;
    serviceCardVisible: boolean;
    screenshotPath: string;
}

export async function inspectDashboard(
    page: BrowserPage,
    config: Pick<HarnessConfig, 'dashboardUrl' | 'screenshotPath'>,
    logger: Logger,
    landmarkTimeoutMs = 10000,
): Promise<DashboardVerificationResult> {
    await buildVerificationRouter().attach(page);
    await navigate(page, config.dashboardUrl, logger);

    let landmarkFound = true;
    try {
        await page.waitForSelector(SIMULATOR_STATUS_LANDMARK, { timeout: landmarkTimeoutMs });
        logger.info('✅ Dashboard loaded');
    } catch (error) {
        landmarkFound = false;
        logger.warn({ err: error }, 'Timed out waiting for "Simulator Status"');
    }

    const serviceCardVisible = await page.locator(USER_SERVICE_CARD).isVisible();
    if (serviceCardVisible) {
        logger.info('✅ Found User Service card');
    } else {
        logger.warn('❌ User Service card not found');
    }

    await ensureDir(path.dirname(config.screenshotPath));
    await page.screenshot({ path: config.screenshotPath, fullPage: true });
    logger.info({ path: config.screenshotPath }, `📸 Screenshot saved to ${config.screenshotPath}`);

    return { landmarkFound, serviceCardVisible, screenshotPath: config.screenshotPath };
}

export async function runDashboardVerification(
    config: HarnessConfig,
    options: DashboardVerificationOptions = {},
): Promise<DashboardVerificationResult> {
    const logger = options.logger ?? createLogger('verify-dashboard');

    return withBrowserSession(
        { headless: config.headless },
        (page) => inspectDashboard(page, config, logger, options.landmarkTimeoutMs),
        options.launcher,
    );
}
