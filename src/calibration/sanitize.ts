/**
 * sanitize.ts
 *
 * Readers for raw calibration values. Every function returns `undefined`
 * for input it rejects; callers treat that as "field unset", never as 0.
 */

import { z } from 'zod';
import type { Point, Quadrant, SurfaceSize } from '../kernel/types';
import { QUADRANT_SIGNS } from '../kernel/types';
import { DEADZONE_MAX } from '../geometry/pointer_mapper';

export const GAIN_MIN = 0.5;
export const GAIN_MAX = 2.0;
export const GAIN_DEFAULT = 1.0;
export const ANCHOR_MAX_MULTIPLIER = 4;

const FiniteNumber = z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite());

const FiniteInteger = z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite().int());

export function parseFiniteNumber(raw: unknown): number | undefined {
    const parsed = FiniteNumber.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
}

export function parseInteger(raw: unknown): number | undefined {
    const parsed = FiniteInteger.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
}

export function parseFlag(raw: unknown): boolean | undefined {
    if (typeof raw === 'boolean') return raw;
    if (raw === 'true' || raw === 1) return true;
    if (raw === 'false' || raw === 0) return false;
    return undefined;
}

export function anchorLimit(surface: SurfaceSize): number {
    return ANCHOR_MAX_MULTIPLIER * Math.max(surface.width, surface.height);
}

export function sanitizeAnchor(raw: unknown, limit: number): number | undefined {
    const value = parseInteger(raw);
    if (value === undefined || value <= 0 || value > limit) {
        return undefined;
    }
    return value;
}

export function sanitizeDiagonalComponent(raw: unknown, limit: number): number | undefined {
    const value = parseInteger(raw);
    if (value === undefined || value === 0 || Math.abs(value) > limit) {
        return undefined;
    }
    return value;
}

export function sanitizeGain(raw: unknown): number | undefined {
    const value = parseFiniteNumber(raw);
    return value === undefined ? undefined : Math.min(Math.max(value, GAIN_MIN), GAIN_MAX);
}

export function sanitizeDeadzone(raw: unknown): number | undefined {
    const value = parseFiniteNumber(raw);
    return value === undefined ? undefined : Math.min(Math.max(value, 0), DEADZONE_MAX);
}

/** A center must sit inside [0, width) × [0, height). */
export function sanitizeCenter(rawX: unknown, rawY: unknown, surface: SurfaceSize): Point | undefined {
    const x = parseFiniteNumber(rawX);
    const y = parseFiniteNumber(rawY);
    if (x === undefined || y === undefined) {
        return undefined;
    }
    if (x < 0 || y < 0 || x >= surface.width || y >= surface.height) {
        return undefined;
    }
    return { x, y };
}

/** Strict path: both components valid and signed for `quadrant`, or nothing. */
export function validateDiagonal(quadrant: Quadrant, rawDx: unknown, rawDy: unknown, limit: number): Point | undefined {
    const dx = sanitizeDiagonalComponent(rawDx, limit);
    const dy = sanitizeDiagonalComponent(rawDy, limit);
    if (dx === undefined || dy === undefined) {
        return undefined;
    }
    const signs = QUADRANT_SIGNS[quadrant];
    if (Math.sign(dx) !== signs.x || Math.sign(dy) !== signs.y) {
        return undefined;
    }
    return { x: dx, y: dy };
}

/** Drag-handle path: round, clamp to ±limit, then force the quadrant sign with magnitude ≥ 1. */
export function clampDiagonal(quadrant: Quadrant, dx: number, dy: number, limit: number): Point {
    const signs = QUADRANT_SIGNS[quadrant];
    const fit = (value: number, sign: number): number => {
        const finite = Number.isFinite(value) ? value : sign;
        const bounded = Math.max(-limit, Math.min(limit, Math.round(finite)));
        return sign > 0 ? Math.max(bounded, 1) : Math.min(bounded, -1);
    };
    return { x: fit(dx, signs.x), y: fit(dy, signs.y) };
}
