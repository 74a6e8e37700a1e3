import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import { loadConfig } from '../../config.js';
import { ResultReporter } from '../../reporting/reporter.js';
import { startStandIn, type StandIn } from '../../http/__tests__/stand-in-server.js';
import { runApiVerification } from '../api-verification.js';

describe('runApiVerification', () => {
    let standIn: StandIn;

    beforeAll(async () => {
        standIn = await startStandIn((app) => {
            app.get('/health', async () => ({ status: 'ok' }));
            app.post('/api/auth/register', async (_request, reply) => {
                reply.code(201);
                return { token: 'abc' };
            });
            app.get('/api/auth/me', async (request) => ({ authorization: request.headers.authorization ?? null }));
            app.post('/api/services', async (_request, reply) => {
                reply.code(409);
                return { error: 'Service already exists' };
            });
            app.delete<{ Params: { name: string } }>('/api/services/:name', async (request) => ({
                deleted: request.params.name,
            }));
        });
    });

    afterAll(async () => {
        await standIn.app.close();
    });

    it('runs every stage against a live server', async () => {
        const lines: string[] = [];
        const result = await runApiVerification({
            config: loadConfig({ API_URL: standIn.baseUrl, READY_TIMEOUT_SECONDS: '3' }),
            reporter: new ResultReporter((line) => lines.push(line)),
            sleep: async () => undefined,
        });

        if (!result.ready) {
            throw new Error('expected the stand-in to be ready');
        }
        const entry = (label: string) => result.report.find((candidate) => candidate.label === label);

        expect(result.report).toHaveLength(18);
        expect(entry('GET /health')?.passed).toBe(true);
        expect(entry('GET /api/auth/me')?.outcome.body).toEqual({ authorization: 'Bearer abc' });
        expect(entry('POST /api/services')?.outcome.statusCode).toBe(409);
        expect(entry('POST /api/services')?.passed).toBe(false);
        expect(entry('DELETE /api/services/test-service')?.outcome.body).toEqual({ deleted: 'test-service' });
        expect(entry('DELETE /api/services/test-service')?.passed).toBe(true);
        expect(lines.at(-2)).toBe('✅ API TESTING COMPLETE');
    });

    it('runs no stage when the server never becomes ready', async () => {
        const lines: string[] = [];
        const fetchStub = vi.fn<typeof fetch>().mockImplementation(async () => new Response(null, { status: 503 }));

        const result = await runApiVerification({
            config: loadConfig({ READY_TIMEOUT_SECONDS: '2' }),
            reporter: new ResultReporter((line) => lines.push(line)),
            fetch: fetchStub,
            sleep: async () => undefined,
        });

        expect(result).toEqual({ ready: false });
        expect(fetchStub.mock.calls.map((call) => call[0])).toEqual([
            'http://localhost:8080/health',
            'http://localhost:8080/health',
        ]);
        expect(lines).toEqual([]);
    });
});
