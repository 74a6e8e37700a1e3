import { mkdtemp, rm, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FakePage, fakeLauncher } from '../../browser/__tests__/fakes.js';
import { loadConfig } from '../../config.js';
import { runDashboardVerification, USER_SERVICE_CARD } from '../dashboard-verification.js';
import { NavigationError } from '../navigation.js';

describe('runDashboardVerification', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'dashboard-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    function config() {
        return loadConfig({ SCREENSHOT_PATH: path.join(dir, 'verification', 'dashboard.png') });
    }

    it('mocks the backend, checks the card and saves a full-page screenshot', async () => {
        const page = new FakePage();
        page.visibleSelectors.add(USER_SERVICE_CARD);
        const { launcher, events } = fakeLauncher(page);
        const screenshotPath = path.join(dir, 'verification', 'dashboard.png');

        const result = await runDashboardVerification(config(), { launcher });

        expect(result).toEqual({ landmarkFound: true, serviceCardVisible: true, screenshotPath });
        expect(page.routes.map((route) => route.url)).toEqual(['**/*']);
        expect(page.actions.slice(0, 2)).toEqual(['goto http://localhost:9002 load', 'wait text=Simulator Status']);
        expect(page.screenshots).toEqual([{ path: screenshotPath, fullPage: true }]);
        expect((await stat(path.join(dir, 'verification'))).isDirectory()).toBe(true);
        expect(events.at(-1)).toBe('browser.close');
    });

    it('keeps going when the landmark never shows', async () => {
        const page = new FakePage();
        page.failingSelector = 'text=Simulator Status';
        const { launcher } = fakeLauncher(page);

        const result = await runDashboardVerification(config(), { launcher });

        expect(result.landmarkFound).toBe(false);
        expect(result.serviceCardVisible).toBe(false);
        expect(page.screenshots).toHaveLength(1);
    });

    it('fails with a navigation error and still closes the browser', async () => {
        const page = new FakePage();
        page.gotoError = new Error('net::ERR_CONNECTION_REFUSED');
        const { launcher, events } = fakeLauncher(page);

        await expect(runDashboardVerification(config(), { launcher })).rejects.toBeInstanceOf(NavigationError);
        expect(events.slice(-2)).toEqual(['context.close', 'browser.close']);
        expect(page.screenshots).toEqual([]);
    });
});
