import { atOrBelow } from './tolerance.js';
import type { Measure } from './types.js';

export interface DeltaResult extends Measure {
    notes: string[];
}

export function measureDelta(reserve: number, previous: number | null, flatThreshold: number): DeltaResult {
    if (previous === null) {
        return { reserve, delta: null, deterioration: null, notes: ['first sample'] };
    }

    const delta = reserve - previous;
    const deterioration = Math.max(0, -delta);
    const notes: string[] = [];

    // Informational only; never feeds the alert decision.
    if (atOrBelow(Math.abs(delta), flatThreshold)) {
        notes.push('flat');
    }

    return { reserve, delta, deterioration, notes };
}
