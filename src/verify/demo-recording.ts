import path from 'node:path';
import type { HarnessConfig } from '../config.js';
import type { BrowserLauncher } from '../browser/contracts.js';
import { buildDemoRouter } from '../browser/dashboard-mocks.js';
import { DASHBOARD_TOUR, InteractionDriver, type DriveResult, type InteractionStep } from '../browser/driver.js';
import { withBrowserSession } from '../browser/session.js';
import { DEMO_VIDEO_NAME, ensureDir, finalizeVideo } from '../browser/video.js';
import { createLogger, type Logger } from '../logger.js';
import { navigate } from './navigation.js';

export interface DemoRecordingOptions {
    launcher?: BrowserLauncher;
    logger?: Logger;
    steps?: readonly InteractionStep[];
}

export interface DemoRecordingResult {
    drive: DriveResult;
    videoPath?: string;
}

export async function runDemoRecording(
    config: HarnessConfig,
    options: DemoRecordingOptions = {},
): Promise<DemoRecordingResult> {
    const logger = options.logger ?? createLogger('record-demo');
    const videoDir = config.artifactDir;
    await ensureDir(videoDir);

    const driver = new InteractionDriver({
        errorScreenshotPath: path.join(videoDir, 'error.png'),
        logger,
    });

    const drive = await withBrowserSession(
        { headless: config.headless, videoDir },
        async (page) => {
            await buildDemoRouter().attach(page);
            await navigate(page, config.dashboardUrl, logger, 'networkidle');
            return driver.drive(page, options.steps ?? DASHBOARD_TOUR);
        },
        options.launcher,
    );

    if (!drive.completed) {
        logger.warn({ failedStep: drive.failedStep, error: drive.error }, 'Tour ended early');
    }

    const videoPath = await finalizeVideo(videoDir, DEMO_VIDEO_NAME);
    return { drive, videoPath };
}
