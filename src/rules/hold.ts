import type { Band, HoldReason, HoldState, ReasonCode } from './types.js';

export interface HoldTimerOptions {
    floorWindowLen?: number;
    reminderCooldownLen?: number;
}

/** Rule priority; the first running hold leads the step when no rule fires. */
const HOLD_PRIORITY: readonly HoldReason[] = ['FLOOR_LIMIT', 'DROP_EVENT', 'CRITICAL_PERSIST', 'CAUTION_PERSIST'];

const HOLD_LABEL: Record<HoldReason, string> = {
    FLOOR_LIMIT: 'floor',
    DROP_EVENT: 'drop',
    CRITICAL_PERSIST: 'critical',
    CAUTION_PERSIST: 'caution',
};

const REQUIRED_BAND: Record<HoldReason, Band | null> = {
    FLOOR_LIMIT: 'critical',
    CRITICAL_PERSIST: 'critical',
    CAUTION_PERSIST: 'caution',
    DROP_EVENT: null,
};

function staysInBand(reason: HoldReason, band: Band): boolean {
    const required = REQUIRED_BAND[reason];
    if (required === null) return true;
    if (required === 'critical') return band === 'critical';
    return band !== 'clear';
}

/**
 * One hold slot per rule plus the floor reminder cooldown.
 *
 * Every running hold counts down once per step, whether or not it decided
 * the step, so a hold of length N covers exactly N steps from the one that
 * armed it unless cancelled. Arming a slot never touches the other slots or
 * the cooldown. The cooldown only runs after a floor hold completes inside
 * the critical band.
 */
export class HoldTimer {
    private slots = new Map<HoldReason, number>();
    private cooldownLeft = 0;
    private armedThisStep = new Set<HoldReason>();

    constructor(private options: HoldTimerOptions = {}) { }

    /** Highest-priority running hold, or null when none runs. */
    get leading(): HoldReason | null {
        return HOLD_PRIORITY.find((reason) => this.isRunning(reason)) ?? null;
    }

    get coolingDown(): boolean {
        return this.cooldownLeft > 0;
    }

    isRunning(reason: HoldReason): boolean {
        return (this.slots.get(reason) ?? 0) > 0;
    }

    /**
     * Per-step timer update, run before rule evaluation: recovery clears
     * everything, band exits cancel the affected holds and the reminder, and
     * a running reminder counts down and re-arms the floor window at 0.
     */
    beginStep(band: Band, recovered: boolean): string[] {
        this.armedThisStep.clear();

        if (recovered) {
            return this.cancelAll('recovery');
        }

        const notes: string[] = [];
        for (const reason of HOLD_PRIORITY) {
            if (this.isRunning(reason) && !staysInBand(reason, band)) {
                notes.push(`${HOLD_LABEL[reason]} hold ended early (left ${REQUIRED_BAND[reason]} band)`);
                this.slots.delete(reason);
            }
        }

        if (this.cooldownLeft > 0) {
            if (band !== 'critical') {
                notes.push('reminder cancelled (left critical band)');
                this.cooldownLeft = 0;
            } else {
                this.cooldownLeft -= 1;
                if (this.cooldownLeft === 0 && this.options.floorWindowLen !== undefined) {
                    this.arm('FLOOR_LIMIT', this.options.floorWindowLen);
                    notes.push('reminder armed');
                } else {
                    notes.push(`reminder in ${this.cooldownLeft} min`);
                }
            }
        }

        return notes;
    }

    /** Start or refresh the hold of one rule; other holds keep running. */
    arm(reason: HoldReason, length: number): void {
        this.slots.set(reason, length);
        this.armedThisStep.add(reason);
    }

    /**
     * Count every running hold down by one after the step's decision. The
     * hold that decided the step is annotated; others run silently and only
     * note their expiry. A floor hold completing inside the critical band
     * starts the reminder cooldown, if one is configured.
     */
    tick(decided: ReasonCode, band: Band): string[] {
        const notes: string[] = [];

        for (const reason of HOLD_PRIORITY) {
            const left = this.slots.get(reason) ?? 0;
            if (left <= 0) continue;

            const reported = reason === decided;
            if (reported && !this.armedThisStep.has(reason)) {
                notes.push(`holding ON (${left} min left)`);
            }

            if (left > 1) {
                this.slots.set(reason, left - 1);
                continue;
            }

            this.slots.delete(reason);
            notes.push(reported ? 'hold completed' : `${HOLD_LABEL[reason]} hold expired`);

            const cooldown = this.options.reminderCooldownLen;
            if (reason === 'FLOOR_LIMIT' && band === 'critical' && cooldown !== undefined) {
                this.cooldownLeft = cooldown;
                notes.push(`reminder cooldown started (${cooldown} min)`);
            }
        }

        this.armedThisStep.clear();
        return notes;
    }

    /** Drop every hold and the cooldown, noting what was cancelled. */
    cancelAll(cause: string): string[] {
        const notes: string[] = [];
        if (this.leading !== null) notes.push(`hold cancelled (${cause})`);
        if (this.cooldownLeft > 0) notes.push(`reminder cancelled (${cause})`);
        this.slots.clear();
        this.cooldownLeft = 0;
        this.armedThisStep.clear();
        return notes;
    }

    snapshot(): HoldState {
        const reason = this.leading;
        const running: Partial<Record<HoldReason, number>> = {};
        for (const [slot, left] of this.slots) {
            running[slot] = left;
        }
        return {
            on_left: reason === null ? 0 : this.slots.get(reason) ?? 0,
            reason,
            cooldown_left: this.cooldownLeft,
            running,
        };
    }
}
