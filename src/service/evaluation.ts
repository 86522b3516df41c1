import { logger } from '../config/logger.js';
import type { EvaluationSummary, SeriesEvaluation } from '../contracts/events.js';
import { parseSeries, truncateSeries, type ParsedSeries } from '../input/series-parser.js';
import type { Metrics } from '../metrics/counter.js';
import { evaluate } from '../rules/engine.js';
import type { ReasonCode, Row, RuleConfig } from '../rules/types.js';

export function summarize(rows: readonly Row[], truncated: boolean): EvaluationSummary {
    const reasons: Partial<Record<ReasonCode, number>> = {};
    let alertRows = 0;
    let firstAlertMinute: number | null = null;

    for (const row of rows) {
        reasons[row.reason] = (reasons[row.reason] ?? 0) + 1;
        if (row.alert !== 'OFF') {
            alertRows++;
            firstAlertMinute ??= row.minute;
        }
    }

    return {
        points: rows.length,
        truncated,
        alert_rows: alertRows,
        first_alert_minute: firstAlertMinute,
        reasons,
    };
}

/**
 * Hosts the engine for the transports: bounds the input, runs one fresh
 * engine per series and records metrics.
 */
export class EvaluationService {
    constructor(
        private rules: Readonly<RuleConfig>,
        private metrics: Metrics,
        private maxPoints: number,
    ) { }

    get mode(): RuleConfig['mode'] {
        return this.rules.mode;
    }

    evaluate(samples: readonly number[]): SeriesEvaluation {
        return this.run(truncateSeries(samples, this.maxPoints));
    }

    evaluateText(text: string): SeriesEvaluation {
        return this.run(parseSeries(text, this.maxPoints));
    }

    private run({ samples, truncated }: ParsedSeries): SeriesEvaluation {
        if (truncated) {
            logger.warn({ maxPoints: this.maxPoints }, 'Series truncated to maximum length');
        }

        if (samples.length === 0) {
            return { rows: [], summary: summarize([], truncated) };
        }

        const rows = evaluate(samples, this.rules);
        const summary = summarize(rows, truncated);
        this.metrics.recordEvaluation(rows.length, summary.alert_rows);

        logger.debug({ points: summary.points, alert_rows: summary.alert_rows }, 'Series evaluated');

        return { rows, summary };
    }
}
