/**
 * pointer_mapper.ts
 *
 * Projects an absolute pointer position onto the widget's output circle.
 * The pointer is measured against the calibrated input center; the result
 * is placed around the widget's own center at `outputRadius` scale.
 */

import type { AnchorDistances, GainPair, Point } from '../kernel/types';
import { BoundaryModel, boundaryDistance } from './boundary_geometry';
import { warpAngle } from './angle_warp';
import { angleToUnit, clamp, vectorToAngle } from './vector';

export const DEADZONE_MAX = 0.95;

export interface MapperCalibration {
    inputCenter: Point;
    gains: GainPair;
    deadzone: number;
    boundary: BoundaryModel;
    /** Normalized warp bounds; omit or pass `null` to leave headings untouched. */
    warpBounds?: readonly number[] | null;
    /** Correction applied to the gain-scaled offset before the boundary lookup. */
    adjustOffset?: (offset: Point) => Point;
}

export interface MappingResult {
    target: Point;
    ratio: number;
    realAngle: number;
    idealAngle: number;
}

/** Below the deadzone the output is zero; above it the range is stretched back to [0, 1]. */
export function applyDeadzone(ratio: number, deadzone: number): number {
    const dz = clamp(deadzone, 0, DEADZONE_MAX);
    const r = clamp(ratio, 0, 1);
    if (r <= dz) {
        return 0;
    }
    return (r - dz) / (1 - dz);
}

/**
 * Per-quadrant normalization against the anchors: (dx/rx, dy/ry), length capped
 * at 1, then deadzone-rescaled. Its length equals the quadrant-ellipse ratio.
 */
export function normalizeAnchorVector(offset: Point, anchors: AnchorDistances, deadzone: number): Point {
    const rx = offset.x >= 0 ? anchors.right : anchors.left;
    const ry = offset.y >= 0 ? anchors.down : anchors.up;
    if (rx <= 0 || ry <= 0) {
        return { x: 0, y: 0 };
    }
    const nx = offset.x / rx;
    const ny = offset.y / ry;
    const length = Math.hypot(nx, ny);
    if (length === 0) {
        return { x: 0, y: 0 };
    }
    const scale = applyDeadzone(Math.min(length, 1), deadzone) / length;
    return { x: nx * scale, y: ny * scale };
}

export function mapPointer(
    pointer: Point,
    calibration: MapperCalibration,
    widgetCenter: Point,
    outputRadius: number
): MappingResult {
    let offset: Point = {
        x: (pointer.x - calibration.inputCenter.x) * calibration.gains.x,
        y: (pointer.y - calibration.inputCenter.y) * calibration.gains.y,
    };
    if (calibration.adjustOffset) {
        offset = calibration.adjustOffset(offset);
    }
    const length = Math.hypot(offset.x, offset.y);
    const centered: MappingResult = { target: { ...widgetCenter }, ratio: 0, realAngle: 0, idealAngle: 0 };
    if (length === 0 || !Number.isFinite(length)) {
        return centered;
    }
    const realAngle = vectorToAngle(offset.x, offset.y);
    const unit: Point = { x: offset.x / length, y: offset.y / length };
    const model = calibration.boundary;

    if (model.kind === 'anchor_ellipse') {
        const n = normalizeAnchorVector(offset, model.anchors, calibration.deadzone);
        return {
            target: { x: widgetCenter.x + n.x * outputRadius, y: widgetCenter.y + n.y * outputRadius },
            ratio: Math.hypot(n.x, n.y),
            realAngle,
            idealAngle: realAngle,
        };
    }

    let ratio: number;
    if (model.kind === 'unbounded') {
        ratio = 1;
    } else {
        // Measured along the real heading: the warp only turns the output direction.
        const maxDistance = boundaryDistance(model, unit);
        if (maxDistance === null || !(maxDistance > 0)) {
            return { ...centered, realAngle, idealAngle: realAngle };
        }
        ratio = applyDeadzone(length / maxDistance, calibration.deadzone);
    }

    let direction = unit;
    let idealAngle = realAngle;
    if (calibration.warpBounds) {
        idealAngle = warpAngle(realAngle, calibration.warpBounds).angle;
        direction = angleToUnit(idealAngle);
    }
    return {
        target: {
            x: widgetCenter.x + direction.x * ratio * outputRadius,
            y: widgetCenter.y + direction.y * ratio * outputRadius,
        },
        ratio,
        realAngle,
        idealAngle,
    };
}
