import type { OperationOutcome } from '../http/executor.js';

export interface ReportEntry {
    label: string;
    outcome: OperationOutcome;
    passed: boolean;
}

export type RunReport = ReadonlyArray<ReportEntry>;

export type OutputSink = (line: string) => void;

const BANNER = '='.repeat(50);

export function formatBody(body: unknown): string {
    return typeof body === 'string' ? body : JSON.stringify(body, null, 2);
}

export function isAccepted(outcome: OperationOutcome, accept: readonly number[]): boolean {
    return outcome.statusCode !== undefined && accept.includes(outcome.statusCode);
}

/**
 * Streaming reporter: every recorded outcome is printed as soon as it arrives.
 * It keeps the run report but never tallies it.
 */
export class ResultReporter {
    private readonly report: ReportEntry[] = [];
    private readonly write: OutputSink;

    constructor(write: OutputSink = (line) => console.log(line)) {
        this.write = write;
    }

    stage(index: number, name: string): void {
        this.write('');
        this.write(BANNER);
        this.write(`${index}. ${name.toUpperCase()}`);
        this.write(BANNER);
    }

    operation(label: string): void {
        this.write('');
        this.write(`Testing: ${label}`);
    }

    /**
     * @param detail printed instead of the body on a pass
     */
    record(label: string, outcome: OperationOutcome, accept: readonly number[], detail?: string): ReportEntry {
        const passed = isAccepted(outcome, accept);

        if (passed) {
            if (detail !== undefined) {
                this.write(detail);
            } else if (outcome.body !== undefined) {
                this.write(formatBody(outcome.body));
            }
        } else {
            this.write(`Status: ${outcome.statusCode ?? 'N/A'}`);
            if (outcome.error !== undefined) {
                this.write(`Error: ${outcome.error}`);
            } else if (outcome.body !== undefined) {
                this.write(formatBody(outcome.body));
            }
        }

        this.write(passed ? `✅ ${label}` : `❌ ${label}`);

        const entry: ReportEntry = { label, outcome, passed };
        this.report.push(entry);
        return entry;
    }

    summary(): void {
        this.write('');
        this.write(BANNER);
        this.write('✅ API TESTING COMPLETE');
        this.write(BANNER);
    }

    entries(): RunReport {
        return [...this.report];
    }
}
