import { readField } from '../http/executor.js';
import type { Bindings, Stage } from './types.js';

export interface CloudStageInput {
    username: string;
    password: string;
    serviceName: string;
}

export const SERVICE_YAML_TEMPLATE = `name: {{serviceName}}
version: "1.0"
description: Test service
server:
  port: 9001
  base_path: /api
endpoints:
  - method: GET
    path: /hello
    responses:
      200:
        content_type: application/json
        body: |
          {"message": "Hello World"}`;

export function summarizeGeneratedCode(body: unknown): string {
    const code = readField(readField(body, 'data'), 'code');
    return typeof code === 'string'
        ? `Generated ${code.length} characters of TypeScript code`
        : 'Response carried no generated code';
}

export function cloudBindings(input: CloudStageInput): Bindings {
    return {
        serviceName: input.serviceName,
        username: input.username,
        password: input.password,
    };
}

/**
 * The fixed verification sequence. Later stages reuse the service created in
 * stage 3, and the cleanup stage always runs last.
 */
export function buildCloudStages(): Stage[] {
    const credentials = { username: '{{username}}', password: '{{password}}' };

    return [
        {
            name: 'Health Check',
            operations: [
                { method: 'GET', path: '/health', requiresAuth: false, accept: [200] },
            ],
        },
        {
            name: 'Authentication API',
            operations: [
                { method: 'POST', path: '/api/auth/register', body: credentials, requiresAuth: false, accept: [200, 201], captureToken: true },
                { method: 'POST', path: '/api/auth/login', body: credentials, requiresAuth: false, accept: [200], captureToken: true },
                { method: 'GET', path: '/api/auth/me', requiresAuth: true, accept: [200] },
                { method: 'POST', path: '/api/auth/refresh', requiresAuth: true, accept: [200], captureToken: true },
            ],
        },
        {
            name: 'Service Management API',
            operations: [
                { method: 'GET', path: '/api/services', requiresAuth: true, accept: [200] },
                { method: 'POST', path: '/api/services', body: { yaml: SERVICE_YAML_TEMPLATE }, requiresAuth: true, accept: [200, 201] },
                { method: 'GET', path: '/api/services/{{serviceName}}', requiresAuth: true, accept: [200] },
                { method: 'POST', path: '/api/services/{{serviceName}}/start', requiresAuth: true, accept: [200], settleAfterMs: 1000 },
                { method: 'GET', path: '/api/services/{{serviceName}}/status', requiresAuth: true, accept: [200] },
                { method: 'POST', path: '/api/services/{{serviceName}}/stop', requiresAuth: true, accept: [200] },
            ],
        },
        {
            name: 'Request Logs API',
            operations: [
                { method: 'GET', path: '/api/logs', requiresAuth: true, accept: [200] },
            ],
        },
        {
            name: 'Recording API',
            operations: [
                { method: 'GET', path: '/api/recording/status', requiresAuth: true, accept: [200] },
            ],
        },
        {
            name: 'AI Generation API',
            operations: [
                { method: 'GET', path: '/api/ai/config', requiresAuth: true, accept: [200] },
            ],
        },
        {
            name: 'Code Generation API',
            operations: [
                {
                    method: 'POST',
                    path: '/api/codegen/typescript',
                    body: { service_name: '{{serviceName}}' },
                    requiresAuth: true,
                    accept: [200],
                    summarize: summarizeGeneratedCode,
                },
            ],
        },
        {
            name: 'Configuration API',
            operations: [
                { method: 'GET', path: '/api/config', requiresAuth: true, accept: [200] },
            ],
        },
        {
            name: 'Cleanup',
            operations: [
                { method: 'DELETE', path: '/api/services/{{serviceName}}', requiresAuth: true, accept: [200] },
                { method: 'POST', path: '/api/auth/logout', requiresAuth: true, accept: [200] },
            ],
        },
    ];
}
