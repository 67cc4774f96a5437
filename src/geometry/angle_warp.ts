/**
 * angle_warp.ts
 *
 * Piecewise-linear remap from measured headings onto evenly spaced octants.
 * Eight boundary angles split the circle into sectors; sector i is stretched
 * onto [i·45°, (i+1)·45°). The axis boundaries (indices 0, 2, 4, 6) are
 * pinned to 0/90/180/270; the odd ones are user-adjustable.
 */

import { clamp, normalizeAngle } from './vector';

export const WARP_SECTOR_COUNT = 8;
export const WARP_SECTOR_SPAN = 45;
export const WARP_EPSILON = 5;

export const DEFAULT_WARP_BOUNDS: readonly number[] = [0, 45, 90, 135, 180, 225, 270, 315];

export interface WarpResult {
    angle: number;
    sector: number | null;
    t: number | null;
}

export class AngleWarpConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AngleWarpConfigError';
    }
}

export function isAdjustableWarpIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < WARP_SECTOR_COUNT && index % 2 === 1;
}

/**
 * Pins the axis entries and clamps each adjustable entry into its axis pair,
 * keeping `WARP_EPSILON` of clearance. Non-finite or missing entries revert to
 * the default. Applying it twice gives the same array.
 */
export function normalizeWarpBounds(bounds: readonly number[]): number[] {
    const normalized: number[] = [];
    for (let i = 0; i < WARP_SECTOR_COUNT; i++) {
        const fixed = i * WARP_SECTOR_SPAN;
        if (i % 2 === 0) {
            normalized.push(fixed);
            continue;
        }
        const raw = bounds[i];
        const value = raw !== undefined && Number.isFinite(raw) ? raw : fixed;
        const low = (i - 1) * WARP_SECTOR_SPAN + WARP_EPSILON;
        const high = (i + 1) * WARP_SECTOR_SPAN - WARP_EPSILON;
        normalized.push(clamp(value, low, high));
    }
    return normalized;
}

/** Throws when `bounds` is not already in normalized form. */
export function assertWarpBounds(bounds: readonly number[]): void {
    if (bounds.length !== WARP_SECTOR_COUNT) {
        throw new AngleWarpConfigError(
            `Angle warp needs ${WARP_SECTOR_COUNT} bounds, got ${bounds.length}`
        );
    }
    const normalized = normalizeWarpBounds(bounds);
    normalized.forEach((expected, i) => {
        if (bounds[i] !== expected) {
            throw new AngleWarpConfigError(
                `Angle warp bound ${i} is ${bounds[i]}; expected ${expected}. Normalize before use.`
            );
        }
    });
}

export function warpAngle(realAngle: number, bounds: readonly number[]): WarpResult {
    if (bounds.length !== WARP_SECTOR_COUNT) {
        return { angle: realAngle, sector: null, t: null };
    }
    const theta = normalizeAngle(realAngle);
    for (let i = 0; i < WARP_SECTOR_COUNT; i++) {
        const start = bounds[i];
        const end = i < WARP_SECTOR_COUNT - 1 ? bounds[i + 1] : bounds[0] + 360;
        let candidate: number | null = null;
        if (theta >= start && theta < end) {
            candidate = theta;
        } else if (theta + 360 >= start && theta + 360 < end) {
            candidate = theta + 360;
        }
        if (candidate === null) {
            continue;
        }
        const t = clamp((candidate - start) / Math.max(end - start, WARP_EPSILON), 0, 1);
        const ideal = i * WARP_SECTOR_SPAN + t * WARP_SECTOR_SPAN;
        return { angle: normalizeAngle(ideal), sector: i, t };
    }
    return { angle: theta, sector: null, t: null };
}
