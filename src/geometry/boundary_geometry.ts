/**
 * boundary_geometry.ts
 *
 * The closed curve around the calibrated center that a full-deflection
 * pointer sits on. Every query is made in center-relative coordinates and
 * answers one question: how far from the center is the boundary along a
 * unit direction?
 *
 * Model selection falls back step by step:
 *   spline (anchors + diagonals) → anchor ellipse (anchors only)
 *   → superellipse (partial anchors, when requested) → circle → unbounded
 */

import type { AnchorDistances, DiagonalOffsets, Point } from '../kernel/types';
import { clamp, lerp } from './vector';

export const DIAGONAL_DEFAULT_SCALE = 0.7;
export const SPLINE_SAMPLES = 256;
export const SUPERELLIPSE_HARDNESS = 2.2;
export const SUPERELLIPSE_SHARPNESS = 4.0;

const PARALLEL_EPSILON = 1e-6;
const RAY_MIN_T = 1e-6;
const SEGMENT_TOLERANCE = 1e-9;

export type BoundaryModel =
    | { kind: 'spline'; contour: Point[]; anchors: AnchorDistances; limit: number }
    | { kind: 'anchor_ellipse'; anchors: AnchorDistances }
    | { kind: 'superellipse'; extents: AnchorDistances; hardness: number; sharpness: number }
    | { kind: 'circle'; radius: number }
    | { kind: 'unbounded' };

// ── Control points and spline ────────────────────────────────────────────────

export function defaultDiagonalOffsets(anchors: AnchorDistances): DiagonalOffsets {
    const scaled = (value: number): number => Math.max(1, Math.round(value * DIAGONAL_DEFAULT_SCALE));
    return {
        ur: { x: scaled(anchors.right), y: -scaled(anchors.up) },
        dr: { x: scaled(anchors.right), y: scaled(anchors.down) },
        dl: { x: -scaled(anchors.left), y: scaled(anchors.down) },
        ul: { x: -scaled(anchors.left), y: -scaled(anchors.up) },
    };
}

/** The 8 control points clockwise from straight up, relative to `center`. */
export function controlPoints(center: Point, anchors: AnchorDistances, diagonals: DiagonalOffsets): Point[] {
    const at = (dx: number, dy: number): Point => ({ x: center.x + dx, y: center.y + dy });
    return [
        at(0, -anchors.up),
        at(diagonals.ur.x, diagonals.ur.y),
        at(anchors.right, 0),
        at(diagonals.dr.x, diagonals.dr.y),
        at(0, anchors.down),
        at(diagonals.dl.x, diagonals.dl.y),
        at(-anchors.left, 0),
        at(diagonals.ul.x, diagonals.ul.y),
    ];
}

/**
 * Uniform Catmull-Rom through `points`, treated as a closed loop. The result
 * passes through every control point and repeats the first sample at the end.
 */
export function catmullRomClosed(points: Point[], samples: number = SPLINE_SAMPLES): Point[] {
    const count = points.length;
    if (count < 4) {
        return points.slice();
    }
    const total = Math.max(samples, count * 4);
    const perSegment = Math.max(1, Math.floor(total / count));
    const spline: Point[] = [];
    for (let i = 0; i < count; i++) {
        const p0 = points[(i - 1 + count) % count];
        const p1 = points[i];
        const p2 = points[(i + 1) % count];
        const p3 = points[(i + 2) % count];
        for (let step = 0; step < perSegment; step++) {
            const t = step / perSegment;
            const t2 = t * t;
            const t3 = t2 * t;
            const blend = (a: number, b: number, c: number, d: number): number => 0.5 * (
                2 * b
                + (-a + c) * t
                + (2 * a - 5 * b + 4 * c - d) * t2
                + (-a + 3 * b - 3 * c + d) * t3
            );
            spline.push({ x: blend(p0.x, p1.x, p2.x, p3.x), y: blend(p0.y, p1.y, p2.y, p3.y) });
        }
    }
    const first = spline[0];
    const last = spline[spline.length - 1];
    if (first.x !== last.x || first.y !== last.y) {
        spline.push({ ...first });
    }
    return spline;
}

export function buildDiagonalContour(
    center: Point,
    anchors: AnchorDistances,
    diagonals: DiagonalOffsets,
    samples: number = SPLINE_SAMPLES
): Point[] {
    return catmullRomClosed(controlPoints(center, anchors, diagonals), samples);
}

// ── Ray casting ──────────────────────────────────────────────────────────────

function cross(ax: number, ay: number, bx: number, by: number): number {
    return ax * by - ay * bx;
}

/**
 * Smallest positive ray parameter at which `origin + t * direction` meets the polyline.
 * Near-parallel segments are skipped. `null` when the ray never crosses it.
 */
export function rayIntersectionDistance(origin: Point, direction: Point, polyline: Point[]): number | null {
    if (polyline.length < 2) {
        return null;
    }
    let minT: number | null = null;
    for (let i = 0; i < polyline.length - 1; i++) {
        const a = polyline[i];
        const b = polyline[i + 1];
        const sx = b.x - a.x;
        const sy = b.y - a.y;
        const rxs = cross(direction.x, direction.y, sx, sy);
        if (Math.abs(rxs) < PARALLEL_EPSILON) {
            continue;
        }
        const qx = a.x - origin.x;
        const qy = a.y - origin.y;
        const t = cross(qx, qy, sx, sy) / rxs;
        const u = cross(qx, qy, direction.x, direction.y) / rxs;
        if (t >= RAY_MIN_T && u >= -SEGMENT_TOLERANCE && u <= 1 + SEGMENT_TOLERANCE) {
            if (minT === null || t < minT) {
                minT = t;
            }
        }
    }
    return minT;
}

// ── Closed-form radii ────────────────────────────────────────────────────────

/** Radius of the quadrant-wise ellipse through the four anchors. */
export function anchorEllipseRadius(unit: Point, anchors: AnchorDistances): number | null {
    const rx = unit.x >= 0 ? anchors.right : anchors.left;
    const ry = unit.y >= 0 ? anchors.down : anchors.up;
    if (rx <= 0 || ry <= 0) {
        return null;
    }
    const denom = (unit.x / rx) ** 2 + (unit.y / ry) ** 2;
    return denom > 0 ? 1 / Math.sqrt(denom) : null;
}

/**
 * Asymmetric oval whose half-extents blend smoothly between left/right and
 * up/down. `hardness` is the superellipse exponent, `sharpness` the tanh gain.
 */
export function superellipseRadius(
    unit: Point,
    extents: AnchorDistances,
    hardness: number = SUPERELLIPSE_HARDNESS,
    sharpness: number = SUPERELLIPSE_SHARPNESS
): number | null {
    const p = clamp(hardness, 2, 4);
    const k = clamp(sharpness, 1, 10);
    const sx = 0.5 * (1 + Math.tanh(k * unit.x));
    const sy = 0.5 * (1 + Math.tanh(k * unit.y));
    const rx = lerp(extents.left, extents.right, sx);
    const ry = lerp(extents.up, extents.down, sy);
    if (rx <= 0 || ry <= 0) {
        return null;
    }
    const denom = (Math.abs(unit.x) / rx) ** p + (Math.abs(unit.y) / ry) ** p;
    return denom > 0 ? 1 / denom ** (1 / p) : null;
}

// ── Model selection ──────────────────────────────────────────────────────────

export interface BoundaryInputs {
    /** Present only when all four anchors are valid. */
    anchors?: AnchorDistances;
    diagonals?: DiagonalOffsets;
    /** Whatever individual anchors are valid, for the superellipse fallback. */
    partialAnchors?: Partial<AnchorDistances>;
    smoothFallback?: boolean;
    /** Radius of the plain circle used without anchors; `null` leaves the model unbounded. */
    fallbackRadius: number | null;
    /** Upper bound for any anchor-derived distance. */
    limit: number;
}

export function buildBoundaryModel(input: BoundaryInputs): BoundaryModel {
    if (input.anchors) {
        if (input.diagonals) {
            return {
                kind: 'spline',
                contour: buildDiagonalContour({ x: 0, y: 0 }, input.anchors, input.diagonals),
                anchors: input.anchors,
                limit: input.limit,
            };
        }
        return { kind: 'anchor_ellipse', anchors: input.anchors };
    }
    if (input.smoothFallback && input.partialAnchors) {
        const extents = fillExtents(input.partialAnchors, input.fallbackRadius);
        if (extents) {
            return {
                kind: 'superellipse',
                extents,
                hardness: SUPERELLIPSE_HARDNESS,
                sharpness: SUPERELLIPSE_SHARPNESS,
            };
        }
    }
    if (input.fallbackRadius !== null && input.fallbackRadius > 0) {
        return { kind: 'circle', radius: input.fallbackRadius };
    }
    return { kind: 'unbounded' };
}

// Missing extents borrow the opposite side, then the fallback radius.
function fillExtents(partial: Partial<AnchorDistances>, fallbackRadius: number | null): AnchorDistances | null {
    const present = [partial.up, partial.down, partial.left, partial.right]
        .filter((v): v is number => v !== undefined);
    if (present.length === 0) {
        return null;
    }
    const last = fallbackRadius ?? Math.max(...present);
    return {
        up: partial.up ?? partial.down ?? last,
        down: partial.down ?? partial.up ?? last,
        left: partial.left ?? partial.right ?? last,
        right: partial.right ?? partial.left ?? last,
    };
}

/**
 * Distance from the center to the boundary along `unit` (a unit vector),
 * or `null` when the model has no finite boundary in that direction.
 */
export function boundaryDistance(model: BoundaryModel, unit: Point): number | null {
    if (unit.x === 0 && unit.y === 0) {
        return 0;
    }
    switch (model.kind) {
        case 'spline': {
            const hit = rayIntersectionDistance({ x: 0, y: 0 }, unit, model.contour);
            if (hit !== null) {
                // A self-intersecting contour can yield a hit right next to the center.
                return clamp(hit, 1, model.limit);
            }
            return anchorEllipseRadius(unit, model.anchors);
        }
        case 'anchor_ellipse':
            return anchorEllipseRadius(unit, model.anchors);
        case 'superellipse':
            return superellipseRadius(unit, model.extents, model.hardness, model.sharpness);
        case 'circle':
            return model.radius;
        case 'unbounded':
            return null;
    }
}
