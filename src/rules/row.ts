import type { Decision } from './evaluator.js';
import type { Measure, Row } from './types.js';

export const DISPLAY_DECIMALS = 4;

const SCALE = 10 ** DISPLAY_DECIMALS;

export function roundForDisplay(value: number): number {
    const rounded = Math.round(value * SCALE) / SCALE;
    // Math.round can hand back -0 for tiny negative deltas.
    return rounded === 0 ? 0 : rounded;
}

export interface RowInput {
    minute: number;
    sample: number;
    measure: Measure;
    decision: Decision;
    notes: readonly string[];
}

export function emitRow({ minute, sample, measure, decision, notes }: RowInput): Row {
    return Object.freeze({
        minute,
        sample,
        reserve: roundForDisplay(measure.reserve),
        delta: measure.delta === null ? null : roundForDisplay(measure.delta),
        deterioration: measure.deterioration === null ? null : roundForDisplay(measure.deterioration),
        alert: decision.alert,
        reason: decision.reason,
        note: notes.join('; '),
    });
}
