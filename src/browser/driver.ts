import { createLogger, type Logger } from '../logger.js';
import type { BrowserPage } from './contracts.js';

export type InteractionStep =
    | { kind: 'wait'; label: string; selector: string; timeoutMs: number; settleMs: number }
    | { kind: 'hover'; label: string; selector: string; settleMs: number }
    | { kind: 'click'; label: string; selector: string; settleMs: number };

export interface DriveResult {
    completed: boolean;
    stepsCompleted: number;
    failedStep?: string;
    error?: string;
    screenshotPath?: string;
}

export const SIMULATOR_STATUS_LANDMARK = 'text=Simulator Status';

const sidebarClick = (testId: string, label: string, settleMs = 2000): InteractionStep => ({
    kind: 'click',
    label,
    selector: `[data-testid='${testId}']`,
    settleMs,
});

export const DASHBOARD_TOUR: readonly InteractionStep[] = [
    { kind: 'wait', label: 'Dashboard', selector: SIMULATOR_STATUS_LANDMARK, timeoutMs: 10000, settleMs: 2000 },
    {
        kind: 'hover',
        label: 'Service card',
        selector: "[data-testid='service-card'][data-service-name='users-service']",
        settleMs: 1000,
    },
    sidebarClick('sidebar-services', 'Services', 3000),
    sidebarClick('sidebar-iot', 'IoT'),
    sidebarClick('sidebar-marketplace', 'Marketplace'),
    sidebarClick('sidebar-recording', 'Recording'),
    sidebarClick('sidebar-ai-generator', 'AI Generator'),
    sidebarClick('sidebar-plugin-generator', 'Plugin Generator'),
    sidebarClick('sidebar-contract-testing', 'Contract Testing'),
    sidebarClick('sidebar-code-generator', 'Code Generator'),
    sidebarClick('sidebar-logs', 'Logs'),
    sidebarClick('sidebar-configuration', 'Configuration'),
    sidebarClick('sidebar-dashboard', 'Dashboard'),
];

export interface InteractionDriverOptions {
    errorScreenshotPath: string;
    logger?: Logger;
}

/**
 * Plays a linear script of UI actions. Each action is followed by its fixed
 * settle delay. The first failure stops the script and leaves a screenshot.
 */
export class InteractionDriver {
    private readonly errorScreenshotPath: string;
    private readonly logger: Logger;

    constructor(options: InteractionDriverOptions) {
        this.errorScreenshotPath = options.errorScreenshotPath;
        this.logger = options.logger ?? createLogger('driver');
    }

    async drive(page: BrowserPage, steps: readonly InteractionStep[]): Promise<DriveResult> {
        let stepsCompleted = 0;
        let current: InteractionStep | undefined;

        try {
            for (const step of steps) {
                current = step;
                this.logger.info({ step: step.label, kind: step.kind }, `Interacting: ${step.label}`);
                await this.perform(page, step);
                await page.waitForTimeout(step.settleMs);
                stepsCompleted += 1;
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error({ err: error, step: current?.label }, 'Error during interaction');

            return {
                completed: false,
                stepsCompleted,
                failedStep: current?.label,
                error: message,
                screenshotPath: await this.captureDiagnostic(page),
            };
        }

        return { completed: true, stepsCompleted };
    }

    private async perform(page: BrowserPage, step: InteractionStep): Promise<void> {
        switch (step.kind) {
            case 'wait':
                await page.waitForSelector(step.selector, { timeout: step.timeoutMs });
                return;
            case 'hover':
                await page.hover(step.selector);
                return;
            case 'click':
                await page.click(step.selector);
                return;
        }
    }

    private async captureDiagnostic(page: BrowserPage): Promise<string | undefined> {
        try {
            await page.screenshot({ path: this.errorScreenshotPath });
            return this.errorScreenshotPath;
        } catch (error) {
            this.logger.error({ err: error, path: this.errorScreenshotPath }, 'Diagnostic screenshot failed');
            return undefined;
        }
    }
}
