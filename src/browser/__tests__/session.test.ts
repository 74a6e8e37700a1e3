import { describe, expect, it } from 'vitest';

import { withBrowserSession } from '../session.js';
import { FakePage, fakeLauncher } from './fakes.js';

describe('withBrowserSession', () => {
    it('hands the page to the callback and closes context before browser', async () => {
        const page = new FakePage();
        const { launcher, events, contextOptions } = fakeLauncher(page);

        const result = await withBrowserSession({ headless: true }, async (received) => received === page, launcher);

        expect(result).toBe(true);
        expect(events).toEqual([
            'launch headless=true args=--no-sandbox --disable-setuid-sandbox',
            'newContext',
            'newPage',
            'context.close',
            'browser.close',
        ]);
        expect(contextOptions).toEqual([{ viewport: { width: 1280, height: 720 } }]);
    });

    it('records video into the requested directory', async () => {
        const { launcher, contextOptions } = fakeLauncher(new FakePage());

        await withBrowserSession({ headless: false, videoDir: 'webui' }, async () => undefined, launcher);

        expect(contextOptions).toEqual([{
            viewport: { width: 1280, height: 720 },
            recordVideo: { dir: 'webui', size: { width: 1280, height: 720 } },
        }]);
    });

    it('releases the browser when the callback throws', async () => {
        const { launcher, events } = fakeLauncher(new FakePage());

        await expect(withBrowserSession({ headless: true }, async () => {
            throw new Error('boom');
        }, launcher)).rejects.toThrow('boom');

        expect(events.slice(-2)).toEqual(['context.close', 'browser.close']);
    });
});
