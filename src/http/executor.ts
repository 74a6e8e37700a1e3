import type { Session } from './session.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

const SUPPORTED_METHODS: ReadonlySet<string> = new Set<HttpMethod>(['GET', 'POST', 'PUT', 'DELETE']);
const METHODS_WITH_BODY: ReadonlySet<string> = new Set<HttpMethod>(['POST', 'PUT']);

export type JsonObject = Record<string, unknown>;

export interface OperationRequest {
    method: HttpMethod;
    path: string;
    body?: unknown;
    requiresAuth: boolean;
}

/**
 * Normalized result of one request. Transport failures carry `error` and no
 * status code; `ok` is true only for a 2xx response.
 */
export interface OperationOutcome {
    ok: boolean;
    statusCode?: number;
    body?: unknown;
    error?: string;
}

export interface HttpExecutorOptions {
    baseUrl: string;
    timeoutMs?: number;
    fetch?: typeof fetch;
}

export class HttpExecutor {
    private readonly baseUrl: string;
    private readonly timeoutMs: number | undefined;
    private readonly fetchImpl: typeof fetch;

    constructor(options: HttpExecutorOptions) {
        const normalizedUrl = options.baseUrl.trim();
        if (!normalizedUrl) {
            throw new Error('HttpExecutor baseUrl is required');
        }

        this.baseUrl = normalizedUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetch ?? fetch;
    }

    url(path: string): string {
        return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    }

    async execute(session: Session, request: OperationRequest): Promise<OperationOutcome> {
        if (!SUPPORTED_METHODS.has(request.method)) {
            throw new Error(`Unsupported method: ${request.method}`);
        }

        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            ...(request.requiresAuth ? session.authorizationHeader() : {}),
        };
        const sendsBody = METHODS_WITH_BODY.has(request.method) && request.body !== undefined;

        const controller = new AbortController();
        const timeout = this.timeoutMs !== undefined
            ? setTimeout(() => controller.abort(), this.timeoutMs)
            : undefined;

        try {
            const res = await this.fetchImpl(this.url(request.path), {
                method: request.method,
                headers,
                ...(sendsBody ? { body: JSON.stringify(request.body) } : {}),
                signal: controller.signal,
            });

            const text = await res.text();
            return {
                ok: res.ok,
                statusCode: res.status,
                ...(text.length > 0 ? { body: parseBody(text) } : {}),
            };
        } catch (error) {
            return {
                ok: false,
                error: this.describeTransportError(error),
            };
        } finally {
            clearTimeout(timeout);
        }
    }

    private describeTransportError(error: unknown): string {
        if ((error instanceof DOMException || error instanceof Error) && error.name === 'AbortError') {
            return `request timed out after ${this.timeoutMs}ms`;
        }

        if (error instanceof Error) {
            const cause = error.cause instanceof Error ? error.cause.message : undefined;
            return cause ? `${error.message}: ${cause}` : error.message;
        }

        return String(error);
    }
}

function parseBody(text: string): unknown {
    try {
        return JSON.parse(text) as unknown;
    } catch {
        return text;
    }
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readField(body: unknown, key: string): unknown {
    return isJsonObject(body) ? body[key] : undefined;
}
