import { describe, it, expect } from '@jest/globals';
import {
    anchorLimit,
    clampDiagonal,
    parseFiniteNumber,
    parseFlag,
    parseInteger,
    sanitizeAnchor,
    sanitizeCenter,
    sanitizeDeadzone,
    sanitizeDiagonalComponent,
    sanitizeGain,
    validateDiagonal,
} from '../../src/calibration/sanitize';

const SURFACE = { width: 1920, height: 1080 };

describe('number parsing', () => {
    it('Given numbers or numeric text, Then they parse', () => {
        expect(parseFiniteNumber(1.5)).toBe(1.5);
        expect(parseFiniteNumber(' 2.25 ')).toBe(2.25);
        expect(parseInteger('12')).toBe(12);
    });

    it('Given blanks, junk or non-finite values, Then nothing parses', () => {
        expect(parseFiniteNumber('')).toBeUndefined();
        expect(parseFiniteNumber('   ')).toBeUndefined();
        expect(parseFiniteNumber('abc')).toBeUndefined();
        expect(parseFiniteNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
        expect(parseFiniteNumber(null)).toBeUndefined();
        expect(parseFiniteNumber(true)).toBeUndefined();
        expect(parseInteger(1.5)).toBeUndefined();
    });

    it('Given flag spellings, Then booleans come back', () => {
        expect([true, 'true', 1, false, 'false', 0, 'yes', null].map(parseFlag))
            .toEqual([true, true, true, false, false, false, undefined, undefined]);
    });
});

describe('anchors and diagonals', () => {
    const limit = anchorLimit(SURFACE);

    it('Then the anchor limit is four times the longer surface side', () => {
        expect(limit).toBe(7680);
    });

    it('Given anchor values, Then only positive integers within the limit survive', () => {
        expect(sanitizeAnchor('120', limit)).toBe(120);
        expect(sanitizeAnchor(7680, limit)).toBe(7680);
        expect(sanitizeAnchor(7681, limit)).toBeUndefined();
        expect(sanitizeAnchor(0, limit)).toBeUndefined();
        expect(sanitizeAnchor(-5, limit)).toBeUndefined();
        expect(sanitizeAnchor(10.5, limit)).toBeUndefined();
    });

    it('Given diagonal components, Then non-zero integers within the limit survive', () => {
        expect(sanitizeDiagonalComponent(-5, limit)).toBe(-5);
        expect(sanitizeDiagonalComponent(0, limit)).toBeUndefined();
        expect(sanitizeDiagonalComponent(-7681, limit)).toBeUndefined();
    });

    it('Given a diagonal, Then its signs must match the quadrant', () => {
        expect(validateDiagonal('ur', 10, -10, limit)).toEqual({ x: 10, y: -10 });
        expect(validateDiagonal('ur', 10, 10, limit)).toBeUndefined();
        expect(validateDiagonal('dl', '-3', '4', limit)).toEqual({ x: -3, y: 4 });
        expect(validateDiagonal('ul', -3, '', limit)).toBeUndefined();
    });

    it('Given a dragged handle, Then it is rounded, bounded and forced into its quadrant', () => {
        expect(clampDiagonal('dl', 5.4, -3, 100)).toEqual({ x: -1, y: 1 });
        expect(clampDiagonal('ur', 500, -500, 100)).toEqual({ x: 100, y: -100 });
        expect(clampDiagonal('ur', Number.NaN, Number.NaN, 100)).toEqual({ x: 1, y: -1 });
        expect(clampDiagonal('dr', 12.6, 7.2, 100)).toEqual({ x: 13, y: 7 });
    });
});

describe('gains, deadzone and center', () => {
    it('Given gains, Then they are clamped to 0.5..2', () => {
        expect(sanitizeGain(3)).toBe(2);
        expect(sanitizeGain('0.1')).toBe(0.5);
        expect(sanitizeGain(1.25)).toBe(1.25);
        expect(sanitizeGain('x')).toBeUndefined();
    });

    it('Given deadzones, Then they are clamped to 0..0.95', () => {
        expect(sanitizeDeadzone(-1)).toBe(0);
        expect(sanitizeDeadzone(2)).toBe(0.95);
        expect(sanitizeDeadzone('0.2')).toBe(0.2);
    });

    it('Given a center, Then it must lie inside the half-open surface', () => {
        expect(sanitizeCenter(0, 0, SURFACE)).toEqual({ x: 0, y: 0 });
        expect(sanitizeCenter(1919.5, 1079, SURFACE)).toEqual({ x: 1919.5, y: 1079 });
        expect(sanitizeCenter(1920, 10, SURFACE)).toBeUndefined();
        expect(sanitizeCenter(10, -1, SURFACE)).toBeUndefined();
        expect(sanitizeCenter('', 10, SURFACE)).toBeUndefined();
    });
});
