import { createLogger, type Logger } from '../logger.js';
import type { BrowserPage, InterceptedRoute } from './contracts.js';
import { globToRegExp } from './glob.js';

export type MockResponse = {
    kind: 'fulfill';
    status: number;
    contentType?: string;
    body: string;
};

export type PassThrough = { kind: 'continue' };

export type MockDecision = MockResponse | PassThrough;

/** Maps the request method to a canned response or a pass-through. */
export type Responder = (method: string) => MockDecision;

type MockRule = {
    pattern: string;
    matcher: RegExp;
    responder: Responder;
};

export type Resolution = {
    /** Pattern of the rule that answered, absent when nothing matched. */
    pattern?: string;
    decision: MockDecision;
};

export const PASS_THROUGH: PassThrough = { kind: 'continue' };

const WRITE_METHODS = new Set(['POST', 'PUT', 'DELETE']);

export function jsonResponse(payload: unknown, status = 200): MockResponse {
    return {
        kind: 'fulfill',
        status,
        contentType: 'application/json',
        body: JSON.stringify(payload),
    };
}

export function always(response: MockResponse): Responder {
    return () => response;
}

export function onlyGet(response: MockResponse): Responder {
    return (method) => (method.toUpperCase() === 'GET' ? response : PASS_THROUGH);
}

export function writesSucceed(response: MockResponse): Responder {
    return (method) => (WRITE_METHODS.has(method.toUpperCase()) ? response : PASS_THROUGH);
}

/**
 * Ordered URL-pattern dispatch. Rules are tried in registration order and the
 * first matching pattern answers, even when its responder passes the request
 * through. Unmatched requests go to the real network.
 */
export class InterceptionRouter {
    private readonly rules: MockRule[] = [];
    private readonly logger: Logger;

    constructor(logger: Logger = createLogger('interception')) {
        this.logger = logger;
    }

    register(pattern: string, responder: Responder): this {
        this.rules.push({ pattern, matcher: globToRegExp(pattern), responder });
        return this;
    }

    resolve(url: string, method: string): Resolution {
        const rule = this.rules.find((candidate) => candidate.matcher.test(url));
        if (!rule) {
            return { decision: PASS_THROUGH };
        }

        return { pattern: rule.pattern, decision: rule.responder(method) };
    }

    async attach(page: BrowserPage): Promise<void> {
        await page.route('**/*', (route) => this.dispatch(route));
    }

    async dispatch(route: InterceptedRoute): Promise<void> {
        const request = route.request();
        const { pattern, decision } = this.resolve(request.url(), request.method());

        if (decision.kind === 'fulfill') {
            this.logger.debug({ url: request.url(), method: request.method(), pattern, status: decision.status }, 'Fulfilled from mock');
            await route.fulfill({
                status: decision.status,
                contentType: decision.contentType,
                body: decision.body,
            });
            return;
        }

        if (!pattern) {
            this.logger.debug({ url: request.url(), method: request.method() }, 'No mock rule matched; passing through');
        }
        await route.continue();
    }
}
