import { describe, it, expect, beforeEach } from 'vitest';
import { ApiServer } from '../../../src/api/server.js';
import { Metrics } from '../../../src/metrics/counter.js';

describe('ApiServer routes', () => {
    let metrics: Metrics;
    let connected: boolean;
    let server: ApiServer;

    beforeEach(() => {
        metrics = new Metrics();
        connected = true;
        server = new ApiServer(0, { isConnected: () => connected }, metrics);
    });

    it('should report healthy while NATS is connected', () => {
        const res = server.route('GET', '/health');

        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ status: 'ok', nats: { connected: true } });
    });

    it('should report degraded without NATS', () => {
        connected = false;

        const res = server.route('GET', '/health');

        expect(res.status).toBe(503);
        expect(res.body).toMatchObject({ status: 'degraded', nats: { connected: false } });
    });

    it('should expose the counters', () => {
        metrics.increment('alerts_created', 2);

        const res = server.route('GET', '/metrics');

        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ alerts_created: 2, notifications_sent: 0 });
    });

    it('should answer preflight and unknown routes', () => {
        expect(server.route('OPTIONS', '/metrics')).toEqual({ status: 204 });
        expect(server.route('GET', '/alerts')).toEqual({ status: 404, body: { error: 'Not found' } });
        expect(server.route('POST', '/health').status).toBe(404);
    });
});
