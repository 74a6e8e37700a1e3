import type { HarnessConfig } from '../config.js';
import { HttpExecutor } from '../http/executor.js';
import { waitReady } from '../http/readiness.js';
import { Session } from '../http/session.js';
import { createLogger, type Logger } from '../logger.js';
import { ResultReporter, type RunReport } from '../reporting/reporter.js';
import { buildCloudStages, cloudBindings } from '../stages/cloud-stages.js';
import { StageRunner } from '../stages/runner.js';

export interface ApiVerificationOptions {
    config: HarnessConfig;
    reporter?: ResultReporter;
    fetch?: typeof fetch;
    sleep?: (ms: number) => Promise<void>;
    logger?: Logger;
}

export type ApiVerificationResult =
    | { ready: false }
    | { ready: true; report: RunReport };

export async function runApiVerification(options: ApiVerificationOptions): Promise<ApiVerificationResult> {
    const { config } = options;
    const logger = options.logger ?? createLogger('verify-api');
    const reporter = options.reporter ?? new ResultReporter();

    logger.info({ apiUrl: config.apiUrl }, '🚀 Starting API endpoint tests...');

    const ready = await waitReady(config.apiUrl, {
        timeoutSeconds: config.readiness.timeoutSeconds,
        intervalMs: config.readiness.intervalMs,
        fetch: options.fetch,
        sleep: options.sleep,
    });
    if (!ready) {
        logger.error('Server is not running. Please start it first.');
        return { ready: false };
    }

    const session = new Session();
    const runner = new StageRunner({
        executor: new HttpExecutor({
            baseUrl: config.apiUrl,
            timeoutMs: config.requestTimeoutMs,
            fetch: options.fetch,
        }),
        reporter,
        bindings: cloudBindings({
            username: config.credentials.username,
            password: config.credentials.password,
            serviceName: config.serviceName,
        }),
        sleep: options.sleep,
    });

    const report = await runner.runAll(buildCloudStages(), session);
    reporter.summary();

    return { ready: true, report };
}
