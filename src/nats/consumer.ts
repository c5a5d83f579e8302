import {
    AckPolicy,
    DeliverPolicy,
    NatsError,
    nanos,
    type Consumer,
    type JetStreamClient,
    type NatsConnection,
} from 'nats';
import { logger } from '../config/logger.js';
import type { VitalsRecordedEvent } from '../contracts/messages.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { NotFoundError, ValidationError, errorMessage } from '../domain/errors.js';
import { VITAL_KINDS, type VitalValues } from '../domain/types.js';
import { Metrics } from '../metrics/counter.js';
import type { IngestionReport, ReadingInput } from '../pipeline/ingestion.js';
import { NatsClient } from './connection.js';

export interface ConsumerConfig {
    streamName: string;
    durableName: string;
    subject: string;
}

/** The parts of a JetStream message the consumer touches. */
export interface InboundMessage {
    data: Uint8Array;
    json<T>(): T;
    ack(): void;
    nak(millis?: number): void;
}

export interface ReadingSink {
    submitReading(input: ReadingInput): Promise<IngestionReport>;
}

const RETRY_DELAY_MS = 2000;

export function toReadingInput(event: VitalsRecordedEvent): ReadingInput {
    const { payload } = event;
    const vitals: VitalValues = {};
    for (const vital of VITAL_KINDS) {
        const value = payload[vital];
        if (value !== undefined) {
            vitals[vital] = value;
        }
    }

    return {
        id: event.event_id,
        userId: payload.user_id ?? null,
        deviceId: payload.device_id,
        vitals,
        latitude: payload.latitude ?? null,
        longitude: payload.longitude ?? null,
        locationAccuracy: payload.location_accuracy ?? null,
        recordedAt: payload.timestamp ?? event.timestamp,
    };
}

function isRetryableStartError(err: unknown): boolean {
    if (!(err instanceof Error)) {
        return false;
    }
    const code = err instanceof NatsError ? err.code : '';
    return (
        code === '503' ||
        err.message.includes('stream not found') ||
        err.message.includes('unavailable') ||
        err.message.includes('consumer not found')
    );
}

function isConsumerMissing(err: unknown): boolean {
    if (err instanceof NatsError && err.code === '404') {
        return true;
    }
    return err instanceof Error && err.message.includes('consumer not found');
}

export class ReadingsConsumer {
    constructor(
        private natsClient: NatsClient,
        private validator: SchemaValidator,
        private sink: ReadingSink,
        private metrics: Metrics,
        private config: ConsumerConfig,
    ) { }

    async start(): Promise<void> {
        const nc = this.natsClient.getConnection();
        const js = nc.jetstream();

        logger.info(
            {
                stream: this.config.streamName,
                durable: this.config.durableName,
                subject: this.config.subject,
            },
            'Starting JetStream consumer',
        );

        const maxRetries = 30;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            try {
                return await this.connectAndConsume(nc, js);
            } catch (err) {
                lastError = err;

                if (isRetryableStartError(err) && attempt < maxRetries) {
                    logger.warn(
                        { attempt, maxRetries, error: errorMessage(err) },
                        'JetStream not ready, retrying...',
                    );
                    await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY_MS));
                    continue;
                }

                throw err;
            }
        }

        throw lastError;
    }

    private async connectAndConsume(nc: NatsConnection, js: JetStreamClient): Promise<void> {
        let consumer: Consumer;

        try {
            consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
            logger.info({ durable: this.config.durableName }, 'Using existing consumer');
        } catch (err) {
            if (!isConsumerMissing(err)) {
                throw err;
            }

            logger.info('Consumer not found, creating new consumer');

            const jsm = await nc.jetstreamManager();
            await jsm.consumers.add(this.config.streamName, {
                durable_name: this.config.durableName,
                filter_subject: this.config.subject,
                ack_policy: AckPolicy.Explicit,
                deliver_policy: DeliverPolicy.All,
                max_deliver: 5,
                ack_wait: nanos(30_000),
            });

            consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
            logger.info({ durable: this.config.durableName }, 'Consumer created');
        }

        const messages = await consumer.consume({
            max_messages: 100,
        });

        for await (const msg of messages) {
            await this.handleMessage(msg);
        }
    }

    /**
     * Malformed or unroutable readings are ACKed and dropped; anything else
     * that fails is NAKed for redelivery.
     */
    async handleMessage(msg: InboundMessage): Promise<void> {
        this.metrics.increment('readings_received');

        let data: unknown;
        try {
            data = msg.json<unknown>();
        } catch (err) {
            logger.error({ error: errorMessage(err), bytes: msg.data.length }, 'JSON parse error');
            this.metrics.increment('dropped_invalid');
            msg.ack();
            return;
        }

        const validation = this.validator.validateVitalsRecorded(data);
        if (!validation.valid) {
            logger.warn({ errors: validation.errors }, 'Schema validation failed');
            this.metrics.increment('dropped_invalid');
            msg.ack();
            return;
        }

        const input = toReadingInput(validation.data);

        try {
            const report = await this.sink.submitReading(input);
            logger.debug(
                { readingId: report.reading.id, outcomes: report.outcomes.map((o) => o.state) },
                'Reading handled',
            );
            msg.ack();
        } catch (err) {
            if (err instanceof ValidationError || err instanceof NotFoundError) {
                logger.warn({ eventId: input.id, error: err.message }, 'Reading rejected');
                this.metrics.increment('dropped_invalid');
                msg.ack();
                return;
            }

            this.metrics.increment('processing_failed');
            msg.nak(RETRY_DELAY_MS);
            logger.warn(
                { eventId: input.id, error: errorMessage(err) },
                'Reading processing failed, message NAKed for retry',
            );
        }
    }
}
