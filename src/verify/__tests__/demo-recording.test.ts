import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FakePage, fakeLauncher } from '../../browser/__tests__/fakes.js';
import { loadConfig } from '../../config.js';
import { runDemoRecording } from '../demo-recording.js';
import { NavigationError } from '../navigation.js';

describe('runDemoRecording', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'demo-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    function recordingLauncher(page: FakePage) {
        return fakeLauncher(page, {
            onContextClose: async (recordVideo) => {
                if (recordVideo) {
                    await writeFile(path.join(recordVideo.dir, 'c0ffee.webm'), 'video');
                }
            },
        });
    }

    it('tours the dashboard and keeps the video under its stable name', async () => {
        const page = new FakePage();
        const { launcher, contextOptions } = recordingLauncher(page);

        const result = await runDemoRecording(loadConfig({ ARTIFACT_DIR: dir }), { launcher });

        expect(result.drive).toEqual({ completed: true, stepsCompleted: 13 });
        expect(result.videoPath).toBe(path.join(dir, 'demo_video.webm'));
        expect(page.actions[0]).toBe('goto http://localhost:9002 networkidle');
        expect(page.routes.map((route) => route.url)).toEqual(['**/*']);
        expect(contextOptions).toEqual([{
            viewport: { width: 1280, height: 720 },
            recordVideo: { dir, size: { width: 1280, height: 720 } },
        }]);
        expect(await readdir(dir)).toEqual(['demo_video.webm']);
    });

    it('keeps the partial video when the tour stops early', async () => {
        const page = new FakePage();
        page.failingSelector = "[data-testid='sidebar-logs']";
        const { launcher } = recordingLauncher(page);

        const result = await runDemoRecording(loadConfig({ ARTIFACT_DIR: dir }), { launcher });

        expect(result.drive.completed).toBe(false);
        expect(result.drive.failedStep).toBe('Logs');
        expect(result.videoPath).toBe(path.join(dir, 'demo_video.webm'));
        expect(page.screenshots).toEqual([{ path: path.join(dir, 'error.png') }]);
    });

    it('releases the browser and skips the video when navigation fails', async () => {
        const page = new FakePage();
        page.gotoError = new Error('net::ERR_CONNECTION_REFUSED');
        const { launcher, events } = fakeLauncher(page);

        await expect(runDemoRecording(loadConfig({ ARTIFACT_DIR: dir }), { launcher })).rejects.toBeInstanceOf(NavigationError);
        expect(events.slice(-2)).toEqual(['context.close', 'browser.close']);
        expect(await readdir(dir)).toEqual([]);
    });
});
