import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import { NatsClient } from '../nats/connection.js';
import { Metrics } from '../metrics/counter.js';

export interface RouteResult {
    status: number;
    body?: Record<string, unknown>;
}

export class ApiServer {
    private server: Server;
    private startedAt = Date.now();

    constructor(
        private port: number,
        private natsClient: Pick<NatsClient, 'isConnected'>,
        private metrics: Metrics,
    ) {
        this.server = createServer(this.handleRequest.bind(this));
    }

    private handleRequest(req: IncomingMessage, res: ServerResponse): void {
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        const { status, body } = this.route(req.method, req.url);

        if (body === undefined) {
            res.writeHead(status);
            res.end();
            return;
        }

        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
    }

    route(method: string | undefined, url: string | undefined): RouteResult {
        if (method === 'OPTIONS') {
            return { status: 204 };
        }

        if (method === 'GET' && url === '/health') {
            return this.health();
        }
        if (method === 'GET' && url === '/metrics') {
            return this.metricsSnapshot();
        }
        return { status: 404, body: { error: 'Not found' } };
    }

    private health(): RouteResult {
        const isNatsConnected = this.natsClient.isConnected();

        return {
            status: isNatsConnected ? 200 : 503,
            body: {
                status: isNatsConnected ? 'ok' : 'degraded',
                nats: {
                    connected: isNatsConnected,
                },
                uptime_seconds: Math.floor((Date.now() - this.startedAt) / 1000),
                timestamp: new Date().toISOString(),
            },
        };
    }

    private metricsSnapshot(): RouteResult {
        return {
            status: 200,
            body: {
                ...this.metrics.getCounters(),
                timestamp: new Date().toISOString(),
            },
        };
    }

    async start(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.port, () => {
                this.server.off('error', reject);
                logger.info({ port: this.port }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve) => {
            this.server.close(() => {
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
