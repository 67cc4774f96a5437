import type { Point } from '../kernel/types';
import { PerspectiveEllipseModel } from '../geometry/perspective_ellipse';
import { parseFiniteNumber } from './sanitize';

export const TILT_QUALITY_THRESHOLD = 5.0;
export const TILT_MIN_RADIUS = 5.0;

export interface CircleTiltInputs {
    cx: unknown;
    cy: unknown;
    up: unknown;
    down: unknown;
    left: unknown;
    right: unknown;
}

export interface CircleTiltSummary {
    center: Point;
    north: Point;
    south: Point;
    west: Point;
    east: Point;
    rX: number;
    rY: number;
    dxBias: number;
    dyBias: number;
    correctedCenter: Point;
    /** rY / rX; `null` when rX is 0. */
    ratio: number | null;
    warnings: string[];
}

/** Derive radii, center bias and quality checks from the four traced extremes. Unreadable inputs count as 0. */
export function computeCircleTilt(inputs: CircleTiltInputs): CircleTiltSummary {
    const read = (raw: unknown): number => parseFiniteNumber(raw) ?? 0;
    const cx = read(inputs.cx);
    const cy = read(inputs.cy);
    const up = read(inputs.up);
    const down = read(inputs.down);
    const left = read(inputs.left);
    const right = read(inputs.right);

    const rX = (left + right) / 2;
    const rY = (up + down) / 2;
    const dxBias = (right - left) / 2;
    const dyBias = (down - up) / 2;

    const warnings: string[] = [];
    if (Math.abs(left - right) > TILT_QUALITY_THRESHOLD) {
        warnings.push(`Left/right mismatch > ${TILT_QUALITY_THRESHOLD.toFixed(1)}px`);
    }
    if (Math.abs(up - down) > TILT_QUALITY_THRESHOLD) {
        warnings.push(`Up/down mismatch > ${TILT_QUALITY_THRESHOLD.toFixed(1)}px`);
    }
    if (rX < TILT_MIN_RADIUS || rY < TILT_MIN_RADIUS) {
        warnings.push(`Radius too small (min ${TILT_MIN_RADIUS.toFixed(1)}px)`);
    }

    return {
        center: { x: cx, y: cy },
        north: { x: cx, y: cy - up },
        south: { x: cx, y: cy + down },
        west: { x: cx - left, y: cy },
        east: { x: cx + right, y: cy },
        rX,
        rY,
        dxBias,
        dyBias,
        correctedCenter: { x: cx + dxBias, y: cy + dyBias },
        ratio: rX !== 0 ? rY / rX : null,
        warnings,
    };
}

export function toPerspectiveModel(summary: CircleTiltSummary): PerspectiveEllipseModel {
    return PerspectiveEllipseModel.fromCardinals(
        summary.center,
        summary.north,
        summary.south,
        summary.west,
        summary.east
    );
}

const fmt = (value: number): string => value.toFixed(2);
const fmtPoint = (p: Point): string => `(${fmt(p.x)}, ${fmt(p.y)})`;

export function formatCircleTiltSummary(summary: CircleTiltSummary): string {
    const lines = [
        'Circle Tilt / Radius Calibration',
        '',
        `Center: ${fmtPoint(summary.center)}`,
        `N: ${fmtPoint(summary.north)}`,
        `S: ${fmtPoint(summary.south)}`,
        `W: ${fmtPoint(summary.west)}`,
        `E: ${fmtPoint(summary.east)}`,
        '',
        `r_x: ${fmt(summary.rX)}`,
        `r_y: ${fmt(summary.rY)}`,
        `dx_bias: ${fmt(summary.dxBias)}`,
        `dy_bias: ${fmt(summary.dyBias)}`,
        `scale ratio (s): ${summary.ratio === null ? '∞' : summary.ratio.toFixed(4)}`,
        '',
        `corrected_cx: ${fmt(summary.correctedCenter.x)}`,
        `corrected_cy: ${fmt(summary.correctedCenter.y)}`,
        '',
        'Quality checks:',
        ...(summary.warnings.length > 0 ? summary.warnings.map(w => `- ${w}`) : ['- OK']),
    ];
    return lines.join('\n');
}
