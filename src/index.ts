import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { loadRules } from './rules/loader.js';
import { EvaluationService } from './service/evaluation.js';
import { NatsClient } from './nats/connection.js';
import { SeriesConsumer } from './nats/consumer.js';
import { JetStreamEvaluationPublisher } from './nats/publisher.js';
import { Metrics } from './metrics/counter.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting reserve alert engine service');

    // Load configuration
    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    // Load and check rule configuration before any series is evaluated
    const rules = loadRules(config.rules.path, validator);

    // Initialize metrics
    const metrics = new Metrics();

    const service = new EvaluationService(rules, metrics, config.input.maxPoints);

    // Initialize NATS client
    const natsClient = new NatsClient({
        servers: config.nats.url,
        name: 'reserve-alerts',
    });

    await natsClient.connect();

    const publisher = new JetStreamEvaluationPublisher(
        natsClient,
        validator,
        config.nats.stream,
    );

    const seriesConsumer = new SeriesConsumer(
        natsClient,
        validator,
        service,
        publisher,
        metrics,
        {
            streamName: config.nats.stream,
            durableName: config.nats.durable,
            subject: 'series.submitted',
        },
    );

    // Initialize HTTP API server
    const apiServer = new ApiServer(
        config.http.port,
        natsClient,
        metrics,
        validator,
        service,
    );

    // Start HTTP server
    await apiServer.start();

    // Start consuming messages
    seriesConsumer.start().catch((err) => {
        logger.error({ error: err }, 'Consumer failed');
    });

    logger.info({ mode: rules.mode }, 'Reserve alert engine running');

    // Graceful shutdown
    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await apiServer.stop();
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
