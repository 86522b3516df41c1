import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { NatsClient } from './connection.js';
import type { SeriesEvaluatedEvent, SeriesEvaluation } from '../contracts/events.js';
import type { EngineMode } from '../rules/types.js';

export const SERIES_EVALUATED_SUBJECT = 'series.evaluated';

export interface EvaluationPublisher {
    publishEvaluation(seriesId: string, mode: EngineMode, evaluation: SeriesEvaluation): Promise<boolean>;
}

export class JetStreamEvaluationPublisher implements EvaluationPublisher {
    constructor(
        private natsClient: NatsClient,
        private validator: SchemaValidator,
        private streamName: string,
    ) { }

    async publishEvaluation(seriesId: string, mode: EngineMode, evaluation: SeriesEvaluation): Promise<boolean> {
        const event: SeriesEvaluatedEvent = {
            event_name: 'series.evaluated',
            event_id: uuidv4(),
            timestamp: new Date().toISOString(),
            payload: {
                series_id: seriesId,
                mode,
                rows: evaluation.rows,
                summary: evaluation.summary,
            },
        };

        // Validate before publishing
        const validationResult = this.validator.validateSeriesEvaluated(event);
        if (!validationResult.valid) {
            logger.error(
                { errors: validationResult.errors, series_id: seriesId },
                'Evaluation event validation failed',
            );
            return false;
        }

        try {
            const js = this.natsClient.getConnection().jetstream();

            await js.publish(
                SERIES_EVALUATED_SUBJECT,
                JSON.stringify(event),
                { expect: { streamName: this.streamName } },
            );

            logger.info(
                {
                    event_id: event.event_id,
                    series_id: seriesId,
                    alert_rows: evaluation.summary.alert_rows,
                },
                'Evaluation published successfully',
            );

            return true;
        } catch (err) {
            logger.error(
                { error: err, series_id: seriesId },
                'Failed to publish evaluation to NATS',
            );
            return false;
        }
    }
}
