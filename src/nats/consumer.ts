import { AckPolicy, DeliverPolicy, NatsError } from 'nats';
import type { Consumer, JetStreamClient, NatsConnection } from 'nats';
import { logger } from '../config/logger.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { EvaluationService } from '../service/evaluation.js';
import { NatsClient } from './connection.js';
import type { EvaluationPublisher } from './publisher.js';
import { Metrics } from '../metrics/counter.js';

export interface ConsumerConfig {
    streamName: string;
    durableName: string;
    subject: string;
}

/** The slice of a JetStream message the handler relies on. */
export interface InboundMessage {
    json(): unknown;
    ack(): void;
    nak(millis?: number): void;
}

function describeError(err: unknown): { code: string; message: string } {
    return {
        code: err instanceof NatsError ? err.code : '',
        message: err instanceof Error ? err.message : String(err),
    };
}

export class SeriesConsumer {
    constructor(
        private natsClient: NatsClient,
        private validator: SchemaValidator,
        private service: EvaluationService,
        private publisher: EvaluationPublisher,
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
        const baseDelayMs = 2000;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            try {
                return await this.connectAndConsume(nc, js);
            } catch (err) {
                lastError = err;
                const { code, message } = describeError(err);
                const isRetryable =
                    code === '503' ||
                    message.includes('stream not found') ||
                    message.includes('unavailable') ||
                    message.includes('consumer not found');

                if (isRetryable && attempt < maxRetries) {
                    logger.warn(
                        { attempt, maxRetries, error: message, code },
                        'JetStream not ready, retrying...',
                    );
                    await new Promise(resolve => setTimeout(resolve, baseDelayMs));
                    continue;
                }

                throw err;
            }
        }

        throw lastError;
    }

    private async getOrCreateConsumer(nc: NatsConnection, js: JetStreamClient): Promise<Consumer> {
        try {
            const consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
            logger.info({ durable: this.config.durableName }, 'Using existing consumer');
            return consumer;
        } catch (err) {
            const { code, message } = describeError(err);
            if (!message.includes('consumer not found') && code !== '404') {
                throw err;
            }
        }

        logger.info('Consumer not found, creating new consumer');

        const jsm = await nc.jetstreamManager();
        await jsm.consumers.add(this.config.streamName, {
            durable_name: this.config.durableName,
            filter_subject: this.config.subject,
            ack_policy: AckPolicy.Explicit,
            deliver_policy: DeliverPolicy.All,
            max_deliver: 5,
            ack_wait: 30_000_000_000, // 30 seconds in nanoseconds
        });

        const consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
        logger.info({ durable: this.config.durableName }, 'Consumer created');
        return consumer;
    }

    private async connectAndConsume(nc: NatsConnection, js: JetStreamClient): Promise<void> {
        const consumer = await this.getOrCreateConsumer(nc, js);

        const messages = await consumer.consume({
            max_messages: 100,
        });

        for await (const msg of messages) {
            await this.handleMessage(msg);
        }
    }

    async handleMessage(msg: InboundMessage): Promise<void> {
        this.metrics.incrementReceived();

        // Step 1: Parse JSON
        let data: unknown;
        try {
            data = msg.json();
        } catch (err) {
            logger.error({ error: err }, 'JSON parse error');
            this.metrics.incrementDroppedInvalid();
            msg.ack(); // ACK to avoid reprocessing
            return;
        }

        // Step 2: Validate schema
        const validationResult = this.validator.validateSeriesSubmitted(data);
        if (!validationResult.valid) {
            logger.warn(
                { errors: validationResult.errors },
                'Schema validation failed',
            );
            this.metrics.incrementDroppedInvalid();
            msg.ack(); // ACK to avoid poison message loop
            return;
        }

        this.metrics.incrementValidated();
        const { series_id: seriesId, samples } = validationResult.data.payload;

        // Step 3: Evaluate the series with a fresh engine
        const evaluation = this.service.evaluate(samples);

        logger.info(
            {
                series_id: seriesId,
                points: evaluation.summary.points,
                alert_rows: evaluation.summary.alert_rows,
            },
            'Series evaluated',
        );

        // Step 4: Publish rows
        const published = await this.publisher.publishEvaluation(seriesId, this.service.mode, evaluation);

        if (published) {
            msg.ack();
        } else {
            this.metrics.incrementDroppedPublishFail();

            // NAK with delay to retry
            msg.nak(2000); // 2 second delay

            logger.warn(
                { series_id: seriesId },
                'Evaluation publish failed, message NAKed for retry',
            );
        }
    }
}
