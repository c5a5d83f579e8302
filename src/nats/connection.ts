import { connect, NatsConnection, ConnectionOptions } from 'nats';
import { logger } from '../config/logger.js';
import { errorMessage } from '../domain/errors.js';

export class NatsClient {
    private nc: NatsConnection | null = null;
    private connecting = false;

    constructor(private options: ConnectionOptions) { }

    async connect(): Promise<void> {
        if (this.nc || this.connecting) {
            return;
        }

        this.connecting = true;

        try {
            logger.info({ servers: this.options.servers }, 'Connecting to NATS');

            const nc = await connect(this.options);
            this.nc = nc;

            logger.info('Connected to NATS successfully');

            this.watchStatus(nc).catch((err) => {
                logger.error({ error: errorMessage(err) }, 'NATS status watcher stopped');
            });
        } catch (err) {
            logger.error({ error: errorMessage(err) }, 'Failed to connect to NATS');
            throw err;
        } finally {
            this.connecting = false;
        }
    }

    getConnection(): NatsConnection {
        if (!this.nc) {
            throw new Error('NATS connection not established');
        }
        return this.nc;
    }

    /**
     * Request-reply with a JSON body in both directions.
     */
    async request(subject: string, body: unknown, timeoutMs: number): Promise<unknown> {
        const reply = await this.getConnection().request(subject, JSON.stringify(body), { timeout: timeoutMs });
        return reply.json<unknown>();
    }

    isConnected(): boolean {
        return this.nc !== null && !this.nc.isClosed();
    }

    async close(): Promise<void> {
        if (this.nc) {
            logger.info('Closing NATS connection');
            await this.nc.drain();
            this.nc = null;
        }
    }

    private async watchStatus(nc: NatsConnection): Promise<void> {
        for await (const status of nc.status()) {
            logger.info({ type: status.type, data: status.data }, 'NATS status update');
        }
    }
}
