import { toReserve, type ReferencePoints } from './normalizer.js';
import type { RuleConfig } from './types.js';

export type RuleConfigInput = Omit<RuleConfig, 'mode' | 'caution_persistence'> &
    Partial<Pick<RuleConfig, 'mode' | 'caution_persistence'>>;

export class RuleConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid rule configuration: ${issues.join('; ')}`);
        this.name = 'RuleConfigError';
    }
}

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

function checkLength(issues: string[], key: keyof RuleConfig, value: number | undefined, required: boolean): void {
    if (value === undefined) {
        if (required) {
            issues.push(`${key} is required`);
        }
        return;
    }
    if (!isPositiveInteger(value)) {
        issues.push(`${key} must be a positive integer (got ${value})`);
    }
}

/**
 * Build an immutable rule configuration, rejecting any combination of
 * thresholds and lengths that would let bands or timers contradict each
 * other mid-series.
 */
export function createRuleConfig(input: RuleConfigInput): Readonly<RuleConfig> {
    const config: RuleConfig = {
        ...input,
        mode: input.mode ?? 'streak-hold',
        caution_persistence: input.caution_persistence ?? 'outside-critical',
    };
    const issues: string[] = [];

    if (!(config.good > config.bad)) {
        issues.push(`good (${config.good}) must be greater than bad (${config.bad})`);
    }
    if (!(config.clamp_min < config.clamp_max)) {
        issues.push(`clamp_min (${config.clamp_min}) must be less than clamp_max (${config.clamp_max})`);
    }
    if (config.critical_max < 0) {
        issues.push(`critical_max (${config.critical_max}) must not be negative`);
    }
    if (!(config.critical_max < config.caution_max)) {
        issues.push(`critical_max (${config.critical_max}) must be less than caution_max (${config.caution_max})`);
    }
    if (config.recovery_threshold < config.caution_max) {
        issues.push(
            `recovery_threshold (${config.recovery_threshold}) must be at least caution_max (${config.caution_max})`,
        );
    }
    if (config.recovery_threshold > 1) {
        issues.push(`recovery_threshold (${config.recovery_threshold}) must not exceed 1`);
    }
    if (!(config.drop_threshold > 0)) {
        issues.push(`drop_threshold (${config.drop_threshold}) must be positive`);
    }
    if (config.flat_threshold < 0) {
        issues.push(`flat_threshold (${config.flat_threshold}) must not be negative`);
    }

    checkLength(issues, 'critical_trigger_len', config.critical_trigger_len, true);
    checkLength(issues, 'caution_trigger_len', config.caution_trigger_len, true);
    checkLength(issues, 'critical_hold_len', config.critical_hold_len, true);
    checkLength(issues, 'caution_hold_len', config.caution_hold_len, true);
    checkLength(issues, 'floor_window_len', config.floor_window_len, config.mode === 'floor-window');
    checkLength(issues, 'reminder_cooldown_len', config.reminder_cooldown_len, false);

    if (config.mode === 'streak-hold') {
        for (const key of ['floor_window_len', 'reminder_cooldown_len'] as const) {
            if (config[key] !== undefined) {
                issues.push(`${key} only applies in floor-window mode`);
            }
        }
    }

    if (config.drop_hold_len !== undefined && !(Number.isInteger(config.drop_hold_len) && config.drop_hold_len >= 0)) {
        issues.push(`drop_hold_len must be a non-negative integer (got ${config.drop_hold_len})`);
    }

    if (issues.length > 0) {
        throw new RuleConfigError(issues);
    }

    return Object.freeze(config);
}

const SPO2_REFERENCE: ReferencePoints = {
    good: 100,
    bad: 88,
    clamp_min: 50,
    clamp_max: 100,
};

/**
 * SpO2 rule set with dual persistence holds. Band edges sit exactly on the
 * reserve of SpO2 89 (critical), 91 (caution) and 92 (recovery).
 */
export function spo2StreakHold(overrides: Partial<RuleConfigInput> = {}): Readonly<RuleConfig> {
    return createRuleConfig({
        ...SPO2_REFERENCE,
        mode: 'streak-hold',
        drop_threshold: 0.3,
        flat_threshold: 0.01,
        recovery_threshold: toReserve(92, SPO2_REFERENCE),
        critical_max: toReserve(89, SPO2_REFERENCE),
        caution_max: toReserve(91, SPO2_REFERENCE),
        critical_trigger_len: 3,
        caution_trigger_len: 5,
        critical_hold_len: 5,
        caution_hold_len: 3,
        caution_persistence: 'outside-critical',
        ...overrides,
    });
}

/**
 * SpO2 rule set where the floor asserts for a window and re-notifies after
 * a cooldown while the reading stays critical. Caution persistence is off.
 */
export function spo2FloorWindow(overrides: Partial<RuleConfigInput> = {}): Readonly<RuleConfig> {
    return spo2StreakHold({
        mode: 'floor-window',
        caution_persistence: 'off',
        floor_window_len: 3,
        reminder_cooldown_len: 5,
        ...overrides,
    });
}
