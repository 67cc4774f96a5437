import type { Point } from '../kernel/types';

export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}

/** Wrap degrees into [0, 360). */
export function normalizeAngle(degrees: number): number {
    const wrapped = degrees % 360;
    const positive = wrapped < 0 ? wrapped + 360 : wrapped + 0;
    // -1e-15 + 360 rounds to 360
    return positive >= 360 ? 0 : positive;
}

/** Wrap a difference of angles into [-180, 180]. */
export function normalizeAngleDelta(delta: number): number {
    let d = delta;
    while (d > 180) d -= 360;
    while (d < -180) d += 360;
    return d;
}

/** Screen-space heading in degrees: 0 = right, 90 = down (y grows downward). */
export function vectorToAngle(dx: number, dy: number): number {
    return normalizeAngle((Math.atan2(dy, dx) * 180) / Math.PI);
}

export function angleToUnit(degrees: number): Point {
    const radians = (degrees * Math.PI) / 180;
    return { x: Math.cos(radians), y: Math.sin(radians) };
}

export function distance(a: Point, b: Point): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
}
