import { readField, type HttpExecutor } from '../http/executor.js';
import type { Session } from '../http/session.js';
import { createLogger, type Logger } from '../logger.js';
import { isAccepted, type ReportEntry, type ResultReporter, type RunReport } from '../reporting/reporter.js';
import { interpolateString, interpolateValue } from './templates.js';
import type { Bindings, OperationDescriptor, Stage } from './types.js';

export interface StageRunnerOptions {
    executor: Pick<HttpExecutor, 'execute'>;
    reporter: ResultReporter;
    bindings?: Bindings;
    sleep?: (ms: number) => Promise<void>;
    logger?: Logger;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs stages strictly in order and never stops early: a failed operation is
 * recorded and the next one runs, even when it depends on the failed one.
 */
export class StageRunner {
    private readonly executor: Pick<HttpExecutor, 'execute'>;
    private readonly reporter: ResultReporter;
    private readonly bindings: Bindings;
    private readonly pause: (ms: number) => Promise<void>;
    private readonly logger: Logger;

    constructor(options: StageRunnerOptions) {
        this.executor = options.executor;
        this.reporter = options.reporter;
        this.bindings = options.bindings ?? {};
        this.pause = options.sleep ?? sleep;
        this.logger = options.logger ?? createLogger('stage-runner');
    }

    async runAll(stages: readonly Stage[], session: Session): Promise<RunReport> {
        for (const [index, stage] of stages.entries()) {
            this.reporter.stage(index + 1, stage.name);
            this.logger.debug({ stage: stage.name, operations: stage.operations.length }, 'Running stage');

            for (const operation of stage.operations) {
                await this.runOperation(operation, session);
            }
        }

        return this.reporter.entries();
    }

    async runOperation(operation: OperationDescriptor, session: Session): Promise<ReportEntry> {
        const path = interpolateString(operation.path, this.bindings);
        const body = operation.body === undefined ? undefined : interpolateValue(operation.body, this.bindings);
        const label = `${operation.method} ${path}`;

        this.reporter.operation(label);
        const outcome = await this.executor.execute(session, {
            method: operation.method,
            path,
            body,
            requiresAuth: operation.requiresAuth,
        });

        const detail = operation.summarize && isAccepted(outcome, operation.accept)
            ? operation.summarize(outcome.body)
            : undefined;
        const entry = this.reporter.record(label, outcome, operation.accept, detail);

        if (entry.passed && operation.captureToken && session.adoptToken(readField(outcome.body, 'token'))) {
            this.logger.debug({ operation: label }, 'Session token updated');
        }

        if (operation.settleAfterMs !== undefined && operation.settleAfterMs > 0) {
            await this.pause(operation.settleAfterMs);
        }

        return entry;
    }
}
