import { describe, expect, it } from 'vitest';

import { buildCloudStages, summarizeGeneratedCode } from '../cloud-stages.js';

describe('buildCloudStages', () => {
    const stages = buildCloudStages();

    it('lists the stages in run order', () => {
        expect(stages.map((stage) => stage.name)).toEqual([
            'Health Check',
            'Authentication API',
            'Service Management API',
            'Request Logs API',
            'Recording API',
            'AI Generation API',
            'Code Generation API',
            'Configuration API',
            'Cleanup',
        ]);
    });

    it('sends no token to health, register and login', () => {
        const anonymous = stages
            .flatMap((stage) => stage.operations)
            .filter((operation) => !operation.requiresAuth)
            .map((operation) => `${operation.method} ${operation.path}`);

        expect(anonymous).toEqual(['GET /health', 'POST /api/auth/register', 'POST /api/auth/login']);
    });

    it('accepts 201 only for register and service creation', () => {
        const lenient = stages
            .flatMap((stage) => stage.operations)
            .filter((operation) => operation.accept.includes(201))
            .map((operation) => `${operation.method} ${operation.path}`);

        expect(lenient).toEqual(['POST /api/auth/register', 'POST /api/services']);
    });
});

describe('summarizeGeneratedCode', () => {
    it('counts the characters of the generated code', () => {
        expect(summarizeGeneratedCode({ data: { code: 'export {}' } })).toBe('Generated 9 characters of TypeScript code');
    });

    it('says so when no code came back', () => {
        expect(summarizeGeneratedCode({ data: {} })).toBe('Response carried no generated code');
        expect(summarizeGeneratedCode('oops')).toBe('Response carried no generated code');
    });
});
