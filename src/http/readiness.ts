import { createLogger, type Logger } from '../logger.js';

export const LIVENESS_PATH = '/health';

export interface ReadinessOptions {
    /** Attempt budget; one attempt per interval. */
    timeoutSeconds: number;
    intervalMs?: number;
    attemptTimeoutMs?: number;
    fetch?: typeof fetch;
    sleep?: (ms: number) => Promise<void>;
    logger?: Logger;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

async function probeOnce(url: string, timeoutMs: number, fetchImpl: typeof fetch): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
        const res = await fetchImpl(url, { signal: controller.signal });
        await res.arrayBuffer();
        return res.status === 200;
    } catch {
        // unreachable counts as not ready yet
        return false;
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Polls the liveness endpoint until it answers 200 or the attempt budget is
 * spent. Non-200 responses and transport errors are treated alike.
 */
export async function waitReady(baseUrl: string, options: ReadinessOptions): Promise<boolean> {
    const logger = options.logger ?? createLogger('readiness');
    const intervalMs = options.intervalMs ?? 1000;
    const attemptTimeoutMs = options.attemptTimeoutMs ?? 1000;
    const fetchImpl = options.fetch ?? fetch;
    const pause = options.sleep ?? sleep;
    const url = `${baseUrl.replace(/\/+$/, '')}${LIVENESS_PATH}`;

    logger.info({ url, timeoutSeconds: options.timeoutSeconds }, '⏳ Waiting for server to start...');

    for (let attempt = 1; attempt <= options.timeoutSeconds; attempt += 1) {
        if (await probeOnce(url, attemptTimeoutMs, fetchImpl)) {
            logger.info({ attempt }, '✅ Server is ready');
            return true;
        }

        logger.debug({ attempt }, 'Server not ready yet');
        await pause(intervalMs);
    }

    logger.error({ timeoutSeconds: options.timeoutSeconds }, `❌ Server failed to start within ${options.timeoutSeconds} seconds`);
    return false;
}
