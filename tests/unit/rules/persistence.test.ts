import { describe, it, expect, beforeEach } from 'vitest';
import { classifyBand, PersistenceTracker } from '../../../src/rules/persistence.js';
import { spo2StreakHold } from '../../../src/rules/config.js';
import { toReserve } from '../../../src/rules/normalizer.js';

describe('PersistenceTracker', () => {
    const config = spo2StreakHold();
    let tracker: PersistenceTracker;

    beforeEach(() => {
        tracker = new PersistenceTracker();
    });

    describe('Band classification', () => {
        it('should place the band edges inside their bands', () => {
            expect(classifyBand(toReserve(89, config), config)).toBe('critical');
            expect(classifyBand(toReserve(91, config), config)).toBe('caution');
            expect(classifyBand(toReserve(90, config), config)).toBe('caution');
            expect(classifyBand(toReserve(92, config), config)).toBe('clear');
        });

        it('should treat the floor as critical', () => {
            expect(classifyBand(0, config)).toBe('critical');
        });
    });

    describe('Streak counting', () => {
        it('should count critical steps in both streaks', () => {
            tracker.update('critical');
            expect(tracker.update('critical')).toEqual({ critical: 2, caution: 2 });
        });

        it('should reset the critical streak on a caution step', () => {
            tracker.update('critical');
            tracker.update('critical');
            expect(tracker.update('caution')).toEqual({ critical: 0, caution: 3 });
        });

        it('should reset both streaks when the band is exited', () => {
            tracker.update('caution');
            tracker.update('critical');
            expect(tracker.update('clear')).toEqual({ critical: 0, caution: 0 });
        });

        it('should restart counting from one after a reset', () => {
            tracker.update('critical');
            tracker.update('critical');
            tracker.reset();
            expect(tracker.update('critical')).toEqual({ critical: 1, caution: 1 });
        });

        it('should hand out snapshots that do not alias internal state', () => {
            const snapshot = tracker.update('caution');
            snapshot.caution = 40;
            expect(tracker.snapshot()).toEqual({ critical: 0, caution: 1 });
        });
    });
});
