import { describe, it, expect } from 'vitest';
import { AlertEngine, evaluate } from '../../../src/rules/engine.js';
import { spo2FloorWindow, spo2StreakHold } from '../../../src/rules/config.js';
import type { Row } from '../../../src/rules/types.js';

const alerts = (rows: Row[]) => rows.map((r) => r.alert);
const reasons = (rows: Row[]) => rows.map((r) => r.reason);

describe('AlertEngine', () => {
    describe('Streak-hold mode', () => {
        const config = spo2StreakHold();

        it('should emit one row per sample in input order', () => {
            const rows = evaluate([95, 94, 93], config);
            expect(rows.map((r) => r.minute)).toEqual([1, 2, 3]);
            expect(rows.map((r) => r.sample)).toEqual([95, 94, 93]);
        });

        it('should return no rows for an empty series', () => {
            expect(evaluate([], config)).toEqual([]);
        });

        it('should assert the floor and start a fresh episode after it', () => {
            const rows = evaluate([93, 91, 90, 89, 88, 89, 89, 91, 92], config);

            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'OFF', 'OFF', 'ON*', 'OFF', 'OFF', 'OFF', 'OFF']);
            expect(reasons(rows)[4]).toBe('FLOOR_LIMIT');

            expect(rows[0]).toEqual({
                minute: 1,
                sample: 93,
                reserve: 0.6597,
                delta: null,
                deterioration: null,
                alert: 'OFF',
                reason: 'NO_TRIGGER',
                note: 'first sample; reset (recovery)',
            });
            expect(rows[4].reserve).toBe(0);
            expect(rows[4].delta).toBe(-0.1597);
            expect(rows[4].note).toBe('reset (floor)');
            expect(rows[5].note).toBe('counting critical persistence');
            expect(rows[6].note).toBe('flat; counting critical persistence');
            expect(rows[7].note).toBe('counting caution persistence');
            expect(rows[8].note).toBe('reset (recovery)');
        });

        it('should begin a fresh critical streak of one after the floor', () => {
            const engine = new AlertEngine(config);
            for (const sample of [93, 91, 90, 89, 88]) {
                engine.step(sample);
            }
            expect(engine.getStreaks()).toEqual({ critical: 0, caution: 0 });

            engine.step(89);
            expect(engine.getStreaks()).toEqual({ critical: 1, caution: 1 });
        });

        it('should compute deterioration and stay off below the drop threshold', () => {
            const rows = evaluate([92, 91, 90, 89], config);

            expect(rows[3].deterioration).toBe(0.1458);
            expect(rows[3].delta).toBe(-0.1458);
            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'OFF', 'OFF']);
        });

        it('should raise a drop event when deterioration exceeds the threshold', () => {
            const rows = evaluate([93, 89], config);

            expect(rows[1].deterioration).toBe(0.5);
            expect(rows[1].alert).toBe('ON');
            expect(rows[1].reason).toBe('DROP_EVENT');
        });

        it('should trigger caution persistence exactly once at the fifth step', () => {
            const rows = evaluate([91, 91, 91, 91, 91, 91, 91, 91, 91], config);

            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'OFF', 'OFF', 'ON', 'ON', 'ON', 'OFF', 'OFF']);
            expect(reasons(rows)).toEqual([
                'NO_TRIGGER',
                'NO_TRIGGER',
                'NO_TRIGGER',
                'NO_TRIGGER',
                'CAUTION_PERSIST',
                'CAUTION_PERSIST',
                'CAUTION_PERSIST',
                'NO_TRIGGER',
                'NO_TRIGGER',
            ]);
            expect(rows[0].note).toBe('first sample; counting caution persistence');
            expect(rows[4].note).toBe('flat');
            expect(rows[5].note).toBe('flat; holding ON (2 min left)');
            expect(rows[6].note).toBe('flat; holding ON (1 min left); hold completed');
        });

        it('should hold critical persistence for its full length', () => {
            const rows = evaluate([89, 89, 89, 89, 89, 89, 89, 89, 89], config);

            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'ON', 'ON', 'ON', 'ON', 'ON', 'OFF', 'OFF']);
            expect(reasons(rows).slice(2, 7)).toEqual(Array(5).fill('CRITICAL_PERSIST'));
            expect(rows[3].note).toBe('flat; holding ON (4 min left)');
            expect(rows[6].note).toBe('flat; holding ON (1 min left); hold completed');
        });

        it('should end a critical hold early when the reserve leaves the band', () => {
            const rows = evaluate([89, 89, 89, 90, 89], config);

            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'ON', 'OFF', 'OFF']);
            expect(rows[3].note).toBe('counting caution persistence; critical hold ended early (left critical band)');
            expect(rows[4].note).toBe('counting critical persistence');
        });

        it('should clear a running hold on recovery within the same step', () => {
            const engine = new AlertEngine(config);
            const rows = [89, 89, 89, 89, 92].map((sample) => engine.step(sample));

            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'ON', 'ON', 'OFF']);
            expect(rows[4].note).toBe('hold cancelled (recovery); reset (recovery)');
            expect(engine.getHold()).toEqual({ on_left: 0, reason: null, cooldown_left: 0, running: {} });
            expect(engine.getStreaks()).toEqual({ critical: 0, caution: 0 });
        });

        it('should assert the floor on every floor step and clear holds', () => {
            const engine = new AlertEngine(config);
            const rows = [89, 89, 89, 88, 88, 89].map((sample) => engine.step(sample));

            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'ON', 'ON*', 'ON*', 'OFF']);
            expect(reasons(rows)[4]).toBe('FLOOR_LIMIT');
            expect(rows[3].note).toBe('hold cancelled (floor); reset (floor)');
            expect(rows[4].note).toBe('flat; reset (floor)');
            expect(engine.getHold().on_left).toBe(0);
        });

        it('should not fire a persistence rule again while its streak keeps climbing', () => {
            const rows = evaluate(Array(12).fill(89), config);
            const triggers = rows.filter((r) => r.reason === 'CRITICAL_PERSIST' && !r.note.includes('holding'));

            expect(triggers.map((r) => r.minute)).toEqual([3]);
            expect(rows.slice(7).every((r) => r.alert === 'OFF')).toBe(true);
        });

        it('should let a drop consume the exact hit of a persistence streak', () => {
            const rows = evaluate([91, 91, 91, 91, 90, 90, 90], spo2StreakHold({ drop_threshold: 0.1 }));

            expect(reasons(rows)).toEqual([
                'NO_TRIGGER',
                'NO_TRIGGER',
                'NO_TRIGGER',
                'NO_TRIGGER',
                'DROP_EVENT',
                'NO_TRIGGER',
                'NO_TRIGGER',
            ]);
        });

        it('should keep a running hold counting down through a drop step', () => {
            const engine = new AlertEngine(spo2StreakHold({ drop_threshold: 0.25 }));
            const rows = [91, 91, 91, 91, 91, 89, 89].map((sample) => engine.step(sample));

            expect(reasons(rows).slice(4)).toEqual(['CAUTION_PERSIST', 'DROP_EVENT', 'CAUTION_PERSIST']);
            expect(rows[5].note).toBe('counting critical persistence');
            expect(rows[6].note).toBe('flat; counting critical persistence; holding ON (1 min left); hold completed');
            expect(engine.getHold()).toEqual({ on_left: 0, reason: null, cooldown_left: 0, running: {} });
        });

        it('should hold a drop event when a drop window is configured', () => {
            const rows = evaluate([93, 89, 89, 89], spo2StreakHold({ drop_hold_len: 2 }));

            expect(alerts(rows)).toEqual(['OFF', 'ON', 'ON', 'ON']);
            expect(reasons(rows)).toEqual(['NO_TRIGGER', 'DROP_EVENT', 'DROP_EVENT', 'CRITICAL_PERSIST']);
            expect(rows[2].note).toBe('flat; counting critical persistence; holding ON (1 min left); hold completed');
        });

        it('should produce identical rows on repeated runs', () => {
            const series = [93, 91, 90, 89, 88, 89, 89, 91, 92, 89, 90, 91, 92, 91, 89, 90];
            const first = evaluate(series, config);
            const second = evaluate(series, config);

            expect(JSON.stringify(second)).toBe(JSON.stringify(first));
        });

        it('should emit frozen rows', () => {
            const [row] = evaluate([95], config);
            expect(Object.isFrozen(row)).toBe(true);
        });
    });

    describe('Caution persistence flag', () => {
        const series = [89, 89, 89, 89, 89, 89, 89, 89];

        it('should suppress caution persistence inside the critical band by default', () => {
            const rows = evaluate(series, spo2StreakHold());
            expect(reasons(rows)).not.toContain('CAUTION_PERSIST');
        });

        it('should fire caution persistence inside the critical band when set to always', () => {
            const rows = evaluate(series, spo2StreakHold({ caution_persistence: 'always' }));

            expect(reasons(rows).slice(2, 7)).toEqual([
                'CRITICAL_PERSIST',
                'CRITICAL_PERSIST',
                'CAUTION_PERSIST',
                'CRITICAL_PERSIST',
                'CRITICAL_PERSIST',
            ]);
            expect(rows[6].note).toBe('flat; holding ON (1 min left); hold completed; caution hold expired');
            expect(rows[7].alert).toBe('OFF');
        });

        it('should not let a caution hold cut a longer critical hold short', () => {
            const rows = evaluate([91, 89, 89, 89, 89, 89, 89, 89, 89], spo2StreakHold({ caution_persistence: 'always' }));

            expect(alerts(rows)).toEqual(['OFF', 'OFF', 'OFF', 'ON', 'ON', 'ON', 'ON', 'ON', 'OFF']);
            expect(reasons(rows)).toEqual([
                'NO_TRIGGER',
                'NO_TRIGGER',
                'NO_TRIGGER',
                'CRITICAL_PERSIST',
                'CAUTION_PERSIST',
                'CRITICAL_PERSIST',
                'CRITICAL_PERSIST',
                'CRITICAL_PERSIST',
                'NO_TRIGGER',
            ]);
            expect(rows[5].note).toBe('flat; holding ON (3 min left)');
            expect(rows[7].note).toBe('flat; holding ON (1 min left); hold completed');
        });

        it('should never fire caution persistence when turned off', () => {
            const rows = evaluate([91, 91, 91, 91, 91, 91], spo2StreakHold({ caution_persistence: 'off' }));

            expect(alerts(rows)).toEqual(Array(6).fill('OFF'));
            expect(rows[1].note).toBe('flat');
        });
    });

    describe('Floor-window mode', () => {
        it('should re-notify a persistent floor after each cooldown', () => {
            const config = spo2FloorWindow({ floor_window_len: 2, reminder_cooldown_len: 3 });
            const rows = evaluate(Array(9).fill(88), config);

            expect(alerts(rows)).toEqual(['ON*', 'ON*', 'OFF', 'OFF', 'ON*', 'ON*', 'OFF', 'OFF', 'ON*']);
            expect(rows[0].note).toBe('first sample; reset (floor)');
            expect(rows[1].note).toBe(
                'flat; reset (floor); holding ON (1 min left); hold completed; reminder cooldown started (3 min)',
            );
            expect(rows[2].note).toBe('flat; reset (floor); reminder in 2 min');
            expect(rows[2].reason).toBe('NO_TRIGGER');
            expect(rows[4].note).toBe('flat; reset (floor); reminder armed');
            expect(rows[4].reason).toBe('FLOOR_LIMIT');
        });

        it('should cancel the reminder when the reserve leaves the critical band', () => {
            const config = spo2FloorWindow({ floor_window_len: 2, reminder_cooldown_len: 3 });
            const engine = new AlertEngine(config);
            const rows = [88, 88, 88, 90].map((sample) => engine.step(sample));

            expect(alerts(rows)).toEqual(['ON*', 'ON*', 'OFF', 'OFF']);
            expect(rows[3].note).toBe('reminder cancelled (left critical band)');
            expect(engine.getHold().cooldown_left).toBe(0);
        });

        it('should keep the floor window asserted while the reserve stays critical', () => {
            const engine = new AlertEngine(spo2FloorWindow());
            const rows = [88, 89, 89, 89].map((sample) => engine.step(sample));

            expect(alerts(rows)).toEqual(['ON*', 'ON*', 'ON*', 'ON']);
            expect(reasons(rows)).toEqual(['FLOOR_LIMIT', 'FLOOR_LIMIT', 'FLOOR_LIMIT', 'CRITICAL_PERSIST']);
            expect(rows[1].note).toBe('counting critical persistence; holding ON (2 min left)');
            expect(rows[2].note).toBe(
                'flat; counting critical persistence; holding ON (1 min left); hold completed; reminder cooldown started (5 min)',
            );
            expect(rows[3].note).toBe('flat; reminder in 4 min');
            expect(engine.getHold()).toEqual({
                on_left: 4,
                reason: 'CRITICAL_PERSIST',
                cooldown_left: 4,
                running: { CRITICAL_PERSIST: 4 },
            });
        });

        it('should keep re-notifying the floor through a critical persistence hold', () => {
            const rows = evaluate([88, ...Array(15).fill(89)], spo2FloorWindow());

            expect(alerts(rows)).toEqual([
                'ON*', 'ON*', 'ON*',
                'ON', 'ON', 'ON', 'ON',
                'ON*', 'ON*', 'ON*',
                'OFF', 'OFF', 'OFF', 'OFF',
                'ON*', 'ON*',
            ]);
            expect(reasons(rows).slice(3, 8)).toEqual([
                'CRITICAL_PERSIST',
                'CRITICAL_PERSIST',
                'CRITICAL_PERSIST',
                'CRITICAL_PERSIST',
                'FLOOR_LIMIT',
            ]);
            expect(rows[4].note).toBe('flat; reminder in 3 min; holding ON (4 min left)');
            expect(rows[7].note).toBe('flat; reminder armed; critical hold expired');
            expect(rows[9].note).toBe(
                'flat; holding ON (1 min left); hold completed; reminder cooldown started (5 min)',
            );
            expect(rows[10].note).toBe('flat; reminder in 4 min');
            expect(rows[14].note).toBe('flat; reminder armed');
        });

        it('should clear the floor window on recovery', () => {
            const rows = evaluate([88, 93], spo2FloorWindow());

            expect(alerts(rows)).toEqual(['ON*', 'OFF']);
            expect(rows[1].note).toBe('hold cancelled (recovery); reset (recovery)');
        });

        it('should not use caution persistence in the preset', () => {
            const rows = evaluate([91, 91, 91, 91, 91, 91], spo2FloorWindow());
            expect(alerts(rows)).toEqual(Array(6).fill('OFF'));
        });
    });
});
