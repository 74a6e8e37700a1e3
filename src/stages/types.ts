import type { HttpMethod } from '../http/executor.js';

export type OperationDescriptor = {
    method: HttpMethod;
    /** May reference bindings, e.g. "/api/services/{{serviceName}}". */
    path: string;
    body?: unknown;
    requiresAuth: boolean;
    /** Status codes that count as a pass. */
    accept: readonly number[];
    /** Adopt the response's `token` field into the session on a pass. */
    captureToken?: boolean;
    /** Fixed pause after the operation, pass or fail. */
    settleAfterMs?: number;
    /** Replaces the printed body on a pass. */
    summarize?: (body: unknown) => string;
};

export type Stage = {
    name: string;
    operations: readonly OperationDescriptor[];
};

export type Bindings = Readonly<Record<string, string>>;
