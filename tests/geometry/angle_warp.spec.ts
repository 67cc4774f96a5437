import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import {
    AngleWarpConfigError,
    DEFAULT_WARP_BOUNDS,
    assertWarpBounds,
    isAdjustableWarpIndex,
    normalizeWarpBounds,
    warpAngle,
} from '../../src/geometry/angle_warp';

const SKEWED = [0, 60, 90, 135, 180, 225, 270, 315];

describe('warpAngle', () => {
    it('Given default bounds, Then headings are unchanged', () => {
        const result = warpAngle(30, DEFAULT_WARP_BOUNDS);
        expect(result.angle).toBeCloseTo(30, 10);
        expect(result.sector).toBe(0);
    });

    it('Given a widened first sector, Then it is squeezed back onto 0..45', () => {
        expect(warpAngle(30, SKEWED)).toEqual({ angle: 22.5, sector: 0, t: 0.5 });
    });

    it('Given a narrowed second sector, Then it is stretched onto 45..90', () => {
        expect(warpAngle(75, SKEWED)).toEqual({ angle: 67.5, sector: 1, t: 0.5 });
    });

    it('Given an angle in the last sector, Then it wraps through 360', () => {
        const result = warpAngle(350, DEFAULT_WARP_BOUNDS);
        expect(result.sector).toBe(7);
        expect(result.angle).toBeCloseTo(350, 10);
    });

    it('Given a negative heading, Then it is normalized first', () => {
        const result = warpAngle(-45, DEFAULT_WARP_BOUNDS);
        expect(result.sector).toBe(7);
        expect(result.angle).toBeCloseTo(315, 10);
    });

    it('Given bounds of the wrong length, Then the heading passes through untouched', () => {
        expect(warpAngle(123, [0, 90, 180])).toEqual({ angle: 123, sector: null, t: null });
    });

    it('Then the axis headings are fixed points for any normalized bounds', () => {
        fc.assert(
            fc.property(fc.array(fc.double({ min: -720, max: 720, noNaN: true }), { minLength: 8, maxLength: 8 }), raw => {
                const bounds = normalizeWarpBounds(raw);
                for (const axis of [0, 90, 180, 270]) {
                    expect(warpAngle(axis, bounds).angle).toBeCloseTo(axis, 9);
                }
            })
        );
    });
});

describe('normalizeWarpBounds', () => {
    it('Given out-of-range entries, Then axes are pinned and diagonals clamped with clearance', () => {
        expect(normalizeWarpBounds([7, 10, 91, 170, 180, 225, 270, 400]))
            .toEqual([0, 10, 90, 170, 180, 225, 270, 355]);
        expect(normalizeWarpBounds([0, 1, 90, 500, 180, 225, 270, 315]))
            .toEqual([0, 5, 90, 175, 180, 225, 270, 315]);
    });

    it('Given non-finite or missing entries, Then defaults fill them', () => {
        expect(normalizeWarpBounds([0, Number.NaN, 90, Number.POSITIVE_INFINITY])).toEqual([...DEFAULT_WARP_BOUNDS]);
    });

    it('Then normalizing twice changes nothing', () => {
        fc.assert(
            fc.property(fc.array(fc.double(), { maxLength: 10 }), raw => {
                const once = normalizeWarpBounds(raw);
                expect(normalizeWarpBounds(once)).toEqual(once);
            })
        );
    });
});

describe('assertWarpBounds', () => {
    it('Given normalized bounds, Then it passes', () => {
        expect(() => assertWarpBounds(SKEWED)).not.toThrow();
    });

    it('Given the wrong length, Then it throws', () => {
        expect(() => assertWarpBounds([0, 45])).toThrow(AngleWarpConfigError);
    });

    it('Given an unnormalized entry, Then it names the index', () => {
        expect(() => assertWarpBounds([0, 45, 91, 135, 180, 225, 270, 315]))
            .toThrow('Angle warp bound 2 is 91; expected 90. Normalize before use.');
    });
});

describe('isAdjustableWarpIndex', () => {
    it('Then only the odd indices inside the table are adjustable', () => {
        expect([0, 1, 2, 3, 4, 5, 6, 7, 8, -1, 1.5].map(isAdjustableWarpIndex))
            .toEqual([false, true, false, true, false, true, false, true, false, false, false]);
    });
});
