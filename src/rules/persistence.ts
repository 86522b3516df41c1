import { atOrBelow } from './tolerance.js';
import type { Band, RuleConfig, StreakState } from './types.js';

export function classifyBand(reserve: number, config: Pick<RuleConfig, 'critical_max' | 'caution_max'>): Band {
    if (atOrBelow(reserve, config.critical_max)) {
        return 'critical';
    }
    if (atOrBelow(reserve, config.caution_max)) {
        return 'caution';
    }
    return 'clear';
}

/**
 * Streak counters for the critical and caution bands. The critical band
 * sits inside the caution band, so a critical step extends both streaks.
 */
export class PersistenceTracker {
    private state: StreakState = { critical: 0, caution: 0 };

    update(band: Band): StreakState {
        switch (band) {
            case 'critical':
                this.state.critical += 1;
                this.state.caution += 1;
                break;
            case 'caution':
                this.state.critical = 0;
                this.state.caution += 1;
                break;
            case 'clear':
                this.state.critical = 0;
                this.state.caution = 0;
                break;
        }
        return this.snapshot();
    }

    reset(): void {
        this.state = { critical: 0, caution: 0 };
    }

    snapshot(): StreakState {
        return { ...this.state };
    }
}
