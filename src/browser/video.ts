import { mkdir, readdir, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../logger.js';

export const DEMO_VIDEO_NAME = 'demo_video.webm';

export async function ensureDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
}

/**
 * Gives the recording its stable name. Playwright names videos after an
 * internal page id, so the most recently written other .webm in `dir` is
 * moved over `name`, replacing an older recording. Leftovers from aborted
 * runs stay where they are. Returns the final path, or undefined when the
 * directory holds no fresh video.
 */
export async function finalizeVideo(dir: string, name = DEMO_VIDEO_NAME): Promise<string | undefined> {
    const logger = createLogger('video');
    const entries = await readdir(dir);
    const recorded = await Promise.all(
        entries
            .filter((entry) => entry.endsWith('.webm') && entry !== name)
            .map(async (entry) => ({ entry, modifiedMs: (await stat(path.join(dir, entry))).mtimeMs }))
    );
    recorded.sort((a, b) => b.modifiedMs - a.modifiedMs || a.entry.localeCompare(b.entry));

    if (recorded.length === 0) {
        logger.warn({ dir }, 'No recorded video found');
        return undefined;
    }

    const target = path.join(dir, name);
    await rm(target, { force: true });
    await rename(path.join(dir, recorded[0].entry), target);

    logger.info({ target }, `🎬 Video saved to ${target}`);
    return target;
}
