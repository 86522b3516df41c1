import { measureDelta } from './delta.js';
import { evaluateRules } from './evaluator.js';
import { HoldTimer } from './hold.js';
import { toReserve } from './normalizer.js';
import { classifyBand, PersistenceTracker } from './persistence.js';
import { emitRow } from './row.js';
import { atOrAbove, isZero } from './tolerance.js';
import type { Band, HoldState, RuleConfig, Row, StreakState } from './types.js';

/**
 * Single-series alert engine. Each instance owns its streak and hold state,
 * so concurrent series must each get their own engine.
 */
export class AlertEngine {
    private streaks = new PersistenceTracker();
    private hold: HoldTimer;
    private previousReserve: number | null = null;
    private minute = 0;

    constructor(private config: Readonly<RuleConfig>) {
        this.hold = new HoldTimer({
            floorWindowLen: config.mode === 'floor-window' ? config.floor_window_len : undefined,
            reminderCooldownLen: config.mode === 'floor-window' ? config.reminder_cooldown_len : undefined,
        });
    }

    /**
     * Evaluate the next sample and return its row. State for the step is
     * committed before returning.
     */
    step(sample: number): Row {
        const { config } = this;
        this.minute += 1;

        const reserve = toReserve(sample, config);
        const measure = measureDelta(reserve, this.previousReserve, config.flat_threshold);
        const notes = [...measure.notes];

        const band = classifyBand(reserve, config);
        const atFloor = isZero(reserve);
        const recovered = atOrAbove(reserve, config.recovery_threshold);

        if (recovered) {
            this.streaks.reset();
            notes.push(...this.hold.beginStep(band, true));
            notes.push('reset (recovery)');
        } else {
            if (atFloor) {
                this.streaks.reset();
                if (config.mode === 'streak-hold') {
                    notes.push(...this.hold.cancelAll('floor'));
                }
                notes.push('reset (floor)');
            } else {
                const streaks = this.streaks.update(band);
                notes.push(...this.countingNotes(band, streaks));
            }
            notes.push(...this.hold.beginStep(band, false));
        }

        const decision = evaluateRules({
            config,
            deterioration: measure.deterioration,
            band,
            atFloor,
            streaks: this.streaks.snapshot(),
            hold: this.hold,
        });

        notes.push(...this.hold.tick(decision.reason, band));

        this.previousReserve = reserve;

        return emitRow({ minute: this.minute, sample, measure, decision, notes });
    }

    private countingNotes(band: Band, streaks: StreakState): string[] {
        const { config } = this;
        if (band === 'critical' && streaks.critical < config.critical_trigger_len) {
            return ['counting critical persistence'];
        }
        if (
            band === 'caution' &&
            config.caution_persistence !== 'off' &&
            streaks.caution < config.caution_trigger_len
        ) {
            return ['counting caution persistence'];
        }
        return [];
    }

    getStreaks(): StreakState {
        return this.streaks.snapshot();
    }

    getHold(): HoldState {
        return this.hold.snapshot();
    }
}

/**
 * Evaluate a whole series with a fresh engine: one row per sample, in input
 * order.
 */
export function evaluate(series: readonly number[], config: Readonly<RuleConfig>): Row[] {
    const engine = new AlertEngine(config);
    return series.map((sample) => engine.step(sample));
}
