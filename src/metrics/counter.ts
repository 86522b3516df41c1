export interface MetricCounters {
    received: number;
    validated: number;
    series_evaluated: number;
    rows_emitted: number;
    alert_rows: number;
    dropped_invalid: number;
    dropped_publish_fail: number;
}

function emptyCounters(): MetricCounters {
    return {
        received: 0,
        validated: 0,
        series_evaluated: 0,
        rows_emitted: 0,
        alert_rows: 0,
        dropped_invalid: 0,
        dropped_publish_fail: 0,
    };
}

export class Metrics {
    private counters = emptyCounters();

    incrementReceived(): void {
        this.counters.received++;
    }

    incrementValidated(): void {
        this.counters.validated++;
    }

    recordEvaluation(rows: number, alertRows: number): void {
        this.counters.series_evaluated++;
        this.counters.rows_emitted += rows;
        this.counters.alert_rows += alertRows;
    }

    incrementDroppedInvalid(): void {
        this.counters.dropped_invalid++;
    }

    incrementDroppedPublishFail(): void {
        this.counters.dropped_publish_fail++;
    }

    getCounters(): MetricCounters {
        return { ...this.counters };
    }
}
