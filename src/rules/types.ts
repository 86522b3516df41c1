export type EngineMode = 'streak-hold' | 'floor-window';

export type CautionPersistence = 'outside-critical' | 'always' | 'off';

export interface RuleConfig {
    mode: EngineMode;
    good: number;
    bad: number;
    clamp_min: number;
    clamp_max: number;
    drop_threshold: number;
    flat_threshold: number;
    recovery_threshold: number;
    critical_max: number;
    caution_max: number;
    critical_trigger_len: number;
    caution_trigger_len: number;
    critical_hold_len: number;
    caution_hold_len: number;
    caution_persistence: CautionPersistence;
    floor_window_len?: number;
    reminder_cooldown_len?: number;
    drop_hold_len?: number;
}

export type Band = 'critical' | 'caution' | 'clear';

export type Alert = 'ON' | 'ON*' | 'OFF';

export type ReasonCode =
    | 'FLOOR_LIMIT'
    | 'DROP_EVENT'
    | 'CRITICAL_PERSIST'
    | 'CAUTION_PERSIST'
    | 'NO_TRIGGER';

export type HoldReason = Exclude<ReasonCode, 'NO_TRIGGER'>;

export interface Measure {
    reserve: number;
    delta: number | null;
    deterioration: number | null;
}

export interface StreakState {
    critical: number;
    caution: number;
}

/** `on_left` and `reason` describe the leading hold; `running` lists every slot. */
export interface HoldState {
    on_left: number;
    reason: HoldReason | null;
    cooldown_left: number;
    running: Partial<Record<HoldReason, number>>;
}

export interface Row {
    readonly minute: number;
    readonly sample: number;
    readonly reserve: number;
    readonly delta: number | null;
    readonly deterioration: number | null;
    readonly alert: Alert;
    readonly reason: ReasonCode;
    readonly note: string;
}
