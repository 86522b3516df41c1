import type { RuleConfig } from './types.js';

export type ReferencePoints = Pick<RuleConfig, 'good' | 'bad' | 'clamp_min' | 'clamp_max'>;

export function clampSample(sample: number, ref: ReferencePoints): number {
    return Math.max(ref.clamp_min, Math.min(ref.clamp_max, sample));
}

/**
 * Map a raw sample onto the reserve scale: 1 at or above `good`, 0 at or
 * below `bad`, quadratic in between so readings close to `bad` fall fast.
 */
export function toReserve(sample: number, ref: ReferencePoints): number {
    const s = clampSample(sample, ref);
    let t = (ref.good - s) / (ref.good - ref.bad);
    if (t < 0) {
        t = 0;
    } else if (t > 1) {
        t = 1;
    }
    return 1 - t * t;
}
