import { always, InterceptionRouter, jsonResponse, onlyGet, writesSucceed } from './router.js';

export const verificationStatusPayload = {
    data: {
        is_active: true,
        services_count: 2,
        active_services: [
            {
                name: 'User Service',
                version: '1.0.0',
                port: 3001,
                is_running: true,
                endpoints: [
                    { method: 'GET', path: '/users' },
                    { method: 'POST', path: '/users' },
                ],
                definition: 'openapi: 3.0.0\ninfo:\n  title: User Service\n  version: 1.0.0',
            },
            {
                name: 'Order Service',
                version: '2.1.0',
                port: 3002,
                is_running: false,
                endpoints: [{ method: 'GET', path: '/orders' }],
                definition: 'openapi: 3.0.0\ninfo:\n  title: Order Service\n  version: 2.1.0',
            },
        ],
    },
};

export const demoStatusPayload = {
    success: true,
    data: {
        is_active: true,
        services_count: 2,
        active_services: [
            {
                id: 'service-1',
                name: 'users-service',
                version: '1.0.0',
                port: 3001,
                is_running: true,
                endpoints: [
                    { method: 'GET', path: '/users', description: 'Get all users' },
                    { method: 'POST', path: '/users', description: 'Create user' },
                ],
                endpoints_count: 2,
                definition: 'name: users-service\nversion: 1.0.0',
            },
            {
                id: 'service-2',
                name: 'payment-service',
                version: '1.2.0',
                port: 3002,
                is_running: false,
                endpoints: [{ method: 'POST', path: '/pay', description: 'Process payment' }],
                endpoints_count: 1,
                definition: 'name: payment-service\nversion: 1.2.0',
            },
        ],
    },
};

export const demoServicesPayload = {
    success: true,
    data: [
        { name: 'users-service', version: '1.0.0', port: 3001, is_running: true, endpoints_count: 2 },
        { name: 'payment-service', version: '1.2.0', port: 3002, is_running: false, endpoints_count: 1 },
    ],
};

export const demoLogsPayload = {
    success: true,
    data: {
        logs: [
            {
                timestamp: '2023-10-27T10:00:00Z',
                service: 'users-service',
                method: 'GET',
                path: '/users',
                status: 200,
                duration_ms: 15,
            },
            {
                timestamp: '2023-10-27T10:00:05Z',
                service: 'payment-service',
                method: 'POST',
                path: '/pay',
                status: 500,
                duration_ms: 45,
            },
        ],
        total: 2,
        filtered: 2,
    },
};

/** Backend stand-in for the one-shot dashboard screenshot. */
export function buildVerificationRouter(router = new InterceptionRouter()): InterceptionRouter {
    return router
        .register('**/status', always(jsonResponse(verificationStatusPayload)))
        .register('**/api/system/metrics', always(jsonResponse({ data: { cpu: 10, memory: 20, uptime: 100 } })))
        .register('**/api/logs*', always(jsonResponse({ data: { logs: [], total: 0, filtered: 0 } })));
}

/**
 * Backend stand-in for the recorded dashboard tour. The write catch-all for
 * everything under /api is registered last so the specific rules answer first.
 */
export function buildDemoRouter(router = new InterceptionRouter()): InterceptionRouter {
    return router
        .register('**/status', always(jsonResponse(demoStatusPayload)))
        .register('**/api/services/reload', always(jsonResponse({ success: true })))
        .register('**/api/services', onlyGet(jsonResponse(demoServicesPayload)))
        .register('**/api/logs**', always(jsonResponse(demoLogsPayload)))
        .register('**/api/iot/twins', always(jsonResponse({ success: true, data: ['thermostat-twin', 'vehicle-twin'] })))
        .register('**/api/marketplace', always(jsonResponse({
            success: true,
            data: [
                {
                    id: '1',
                    name: 'Auth Service',
                    description: 'Standard authentication service',
                    category: 'Security',
                    definition_url: 'http://example.com/auth.yaml',
                },
            ],
        })))
        .register('**/api/ai/config', always(jsonResponse({
            success: true,
            data: { is_configured: true, provider: 'openai', issues: [] },
        })))
        .register('**/api/**', writesSucceed(jsonResponse({ success: true, data: {} })));
}
