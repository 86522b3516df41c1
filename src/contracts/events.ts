import type { ReasonCode, Row } from '../rules/types.js';

export interface SeriesSubmittedEvent {
    event_name: 'series.submitted';
    event_id: string;
    timestamp: string;
    payload: {
        series_id: string;
        samples: number[];
    };
}

export interface EvaluationSummary {
    points: number;
    truncated: boolean;
    alert_rows: number;
    first_alert_minute: number | null;
    reasons: Partial<Record<ReasonCode, number>>;
}

export interface SeriesEvaluation {
    rows: Row[];
    summary: EvaluationSummary;
}

export interface SeriesEvaluatedEvent {
    event_name: 'series.evaluated';
    event_id: string;
    timestamp: string;
    payload: {
        series_id: string;
        mode: string;
        rows: Row[];
        summary: EvaluationSummary;
    };
}

export type EvaluateRequest = { samples: number[] } | { text: string };
