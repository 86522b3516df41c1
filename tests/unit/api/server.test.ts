import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ApiServer } from '../../../src/api/server.js';
import { SchemaValidator } from '../../../src/contracts/schema-validator.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { NatsClient } from '../../../src/nats/connection.js';
import { spo2StreakHold } from '../../../src/rules/config.js';
import { EvaluationService } from '../../../src/service/evaluation.js';
import { CONTRACTS_PATH } from '../../helpers.js';

describe('ApiServer', () => {
    let server: ApiServer;
    let metrics: Metrics;
    let baseUrl: string;

    beforeAll(async () => {
        const validator = new SchemaValidator(CONTRACTS_PATH);
        validator.loadSchemas();
        metrics = new Metrics();

        server = new ApiServer(
            0,
            new NatsClient({ servers: 'nats://localhost:4222' }),
            metrics,
            validator,
            new EvaluationService(spo2StreakHold(), metrics, 100),
        );
        await server.start();
        baseUrl = `http://127.0.0.1:${server.boundPort()}`;
    });

    afterAll(async () => {
        await server.stop();
    });

    function post(body: string): Promise<Response> {
        return fetch(`${baseUrl}/evaluate`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body,
        });
    }

    describe('POST /evaluate', () => {
        it('should return one row per sample', async () => {
            const res = await post(JSON.stringify({ samples: [93, 91, 90, 89, 88] }));

            expect(res.status).toBe(200);
            const body: unknown = await res.json();
            expect(body).toMatchObject({
                mode: 'streak-hold',
                summary: { points: 5, alert_rows: 1, first_alert_minute: 5 },
            });
            expect(body).toHaveProperty(['rows', 4], {
                minute: 5,
                sample: 88,
                reserve: 0,
                delta: -0.1597,
                deterioration: 0.1597,
                alert: 'ON*',
                reason: 'FLOOR_LIMIT',
                note: 'reset (floor)',
            });
        });

        it('should parse free-form text', async () => {
            const res = await post(JSON.stringify({ text: '95 94;93' }));

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({ summary: { points: 3, alert_rows: 0 } });
        });

        it('should answer 422 when the text holds no samples', async () => {
            const res = await post(JSON.stringify({ text: 'none here' }));
            expect(res.status).toBe(422);
        });

        it('should answer 400 for malformed JSON', async () => {
            const res = await post('{"samples": [');
            expect(res.status).toBe(400);
        });

        it('should answer 413 for a body over the size limit', async () => {
            const res = await post(JSON.stringify({ text: '9'.repeat(70 * 1024) }));

            expect(res.status).toBe(413);
            expect(await res.json()).toEqual({ error: 'Request body exceeds 65536 bytes' });
        });

        it('should answer 400 for an empty sample list', async () => {
            const res = await post(JSON.stringify({ samples: [] }));
            expect(res.status).toBe(400);
        });
    });

    describe('GET /health', () => {
        it('should report degraded without a NATS connection', async () => {
            const res = await fetch(`${baseUrl}/health`);

            expect(res.status).toBe(503);
            expect(await res.json()).toMatchObject({
                status: 'degraded',
                nats: { connected: false },
                mode: 'streak-hold',
            });
        });
    });

    describe('GET /metrics', () => {
        it('should expose the counters', async () => {
            const res = await fetch(`${baseUrl}/metrics`);

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject(metrics.getCounters());
        });
    });

    it('should answer 404 for unknown routes', async () => {
        const res = await fetch(`${baseUrl}/nowhere`);
        expect(res.status).toBe(404);
    });
});
