import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { parseChannel } from './domain/enums.js';
import { AlertFactory } from './alerts/factory.js';
import { EmergencyEscalator } from './emergency/escalator.js';
import { SosService } from './emergency/sos.js';
import { NatsClient } from './nats/connection.js';
import { ReadingsConsumer } from './nats/consumer.js';
import { CommandResponder } from './nats/responder.js';
import { NatsDeliveryGateway } from './notifications/nats-gateway.js';
import { NotificationDispatcher } from './notifications/dispatcher.js';
import { OtpEngine } from './otp/engine.js';
import { OtpService } from './otp/service.js';
import { IngestionPipeline } from './pipeline/ingestion.js';
import { InMemoryHealthStore } from './storage/memory-store.js';
import { applyDirectorySeed, loadDirectorySeed } from './storage/seed.js';
import { loadThresholdDefaults } from './thresholds/loader.js';
import { ThresholdProvisioner } from './thresholds/provisioner.js';
import { ThresholdResolver } from './thresholds/resolver.js';
import { Metrics } from './metrics/counter.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting vital alerts service');

    const config = loadConfig();
    logger.info(
        { nats: config.nats, http: config.http, channels: config.delivery.channels },
        'Configuration loaded',
    );

    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    const channels = config.delivery.channels.map(parseChannel);
    const defaults = loadThresholdDefaults(config.thresholds.path);

    const store = new InMemoryHealthStore();
    const metrics = new Metrics();

    const provisioner = new ThresholdProvisioner(store, defaults);
    await provisioner.seedSystemDefaults();
    await applyDirectorySeed(store, provisioner, loadDirectorySeed(config.directory.seedPath, validator));

    const natsClient = new NatsClient({
        servers: config.nats.url,
        name: 'vital-alerts',
    });

    await natsClient.connect();

    const gateway = new NatsDeliveryGateway(natsClient, config.delivery.timeoutMs);

    const dispatcher = new NotificationDispatcher(
        store,
        { push: gateway.push, sms: gateway.sms, mail: gateway.mail },
        metrics,
        { channels, timeoutMs: config.delivery.timeoutMs },
    );

    const resolver = new ThresholdResolver(store);
    const alertFactory = new AlertFactory();
    const escalator = new EmergencyEscalator(store, metrics);

    const pipeline = new IngestionPipeline(store, resolver, alertFactory, dispatcher, escalator, metrics);
    const sos = new SosService(store, alertFactory, dispatcher, escalator, metrics);

    const otpEngine = new OtpEngine(store, config.otp, metrics);
    const otp = new OtpService(otpEngine, store, gateway.mail, {
        ttlMinutes: config.otp.ttlMinutes,
        timeoutMs: config.delivery.timeoutMs,
    });

    const readingsConsumer = new ReadingsConsumer(natsClient, validator, pipeline, metrics, {
        streamName: config.nats.stream,
        durableName: config.nats.durable,
        subject: 'vitals.recorded',
    });

    const responder = new CommandResponder(
        natsClient,
        validator,
        { sos, otp, pipeline, escalator, provisioner, resolver, directory: store },
        metrics,
    );

    const apiServer = new ApiServer(config.http.port, natsClient, metrics);

    await apiServer.start();

    responder.start();

    readingsConsumer.start().catch((err) => {
        logger.error({ error: err }, 'Consumer failed');
    });

    logger.info('Vital alerts service running');

    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await apiServer.stop();
        await responder.stop();
        await natsClient.close();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ error: err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
