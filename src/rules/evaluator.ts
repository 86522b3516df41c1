import { exceeds } from './tolerance.js';
import type { HoldTimer } from './hold.js';
import type { Alert, Band, ReasonCode, RuleConfig, StreakState } from './types.js';

export interface RuleContext {
    config: Readonly<RuleConfig>;
    deterioration: number | null;
    band: Band;
    atFloor: boolean;
    streaks: StreakState;
    hold: HoldTimer;
}

export interface Decision {
    alert: Alert;
    reason: ReasonCode;
}

export interface Rule {
    name: string;
    /** Returns a decision when the rule fires; may arm the hold timer. */
    match(ctx: RuleContext): Decision | null;
}

const floorRule: Rule = {
    name: 'floor',
    match({ config, atFloor, hold }) {
        if (!atFloor) return null;

        if (config.mode === 'streak-hold') {
            return { alert: 'ON*', reason: 'FLOOR_LIMIT' };
        }

        // floor-window: continue a running window, stay quiet while the
        // reminder cooldown runs, otherwise open a fresh window.
        if (hold.isRunning('FLOOR_LIMIT')) {
            return { alert: 'ON*', reason: 'FLOOR_LIMIT' };
        }
        if (hold.coolingDown || config.floor_window_len === undefined) {
            return null;
        }
        hold.arm('FLOOR_LIMIT', config.floor_window_len);
        return { alert: 'ON*', reason: 'FLOOR_LIMIT' };
    },
};

const dropRule: Rule = {
    name: 'drop',
    match({ config, deterioration, hold }) {
        if (deterioration === null || !exceeds(deterioration, config.drop_threshold)) {
            return null;
        }
        if (config.drop_hold_len !== undefined && config.drop_hold_len > 0) {
            hold.arm('DROP_EVENT', config.drop_hold_len);
        }
        return { alert: 'ON', reason: 'DROP_EVENT' };
    },
};

const criticalRule: Rule = {
    name: 'critical-persistence',
    match({ config, streaks, hold }) {
        if (streaks.critical !== config.critical_trigger_len) return null;
        hold.arm('CRITICAL_PERSIST', config.critical_hold_len);
        return { alert: 'ON', reason: 'CRITICAL_PERSIST' };
    },
};

const cautionRule: Rule = {
    name: 'caution-persistence',
    match({ config, streaks, band, hold }) {
        if (config.caution_persistence === 'off') return null;
        if (config.caution_persistence === 'outside-critical' && band === 'critical') return null;
        if (streaks.caution !== config.caution_trigger_len) return null;
        hold.arm('CAUTION_PERSIST', config.caution_hold_len);
        return { alert: 'ON', reason: 'CAUTION_PERSIST' };
    },
};

const activeHoldRule: Rule = {
    name: 'active-hold',
    match({ hold }) {
        const reason = hold.leading;
        if (reason === null) return null;
        return { alert: reason === 'FLOOR_LIMIT' ? 'ON*' : 'ON', reason };
    },
};

/** Descending priority; the first rule that fires decides the step. */
export const RULES: readonly Rule[] = [floorRule, dropRule, criticalRule, cautionRule, activeHoldRule];

export function evaluateRules(ctx: RuleContext, rules: readonly Rule[] = RULES): Decision {
    for (const rule of rules) {
        const decision = rule.match(ctx);
        if (decision) {
            return decision;
        }
    }
    return { alert: 'OFF', reason: 'NO_TRIGGER' };
}
