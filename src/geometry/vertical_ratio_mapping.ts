import type { Point } from '../kernel/types';

/** A skill circle drawn with a perspective squash: visually an ellipse `verticalScaleRatio` as tall as wide. */
export interface VerticalRatioCalibration {
    centerX: number;
    centerY: number;
    radius: number;
    verticalScaleRatio?: number;
    yOffset?: number;
}

export const DEFAULT_VERTICAL_SCALE_RATIO = 0.745;

interface Resolved {
    mathCenterY: number;
    ratio: number;
}

function resolve(calibration: VerticalRatioCalibration): Resolved | null {
    const ratio = calibration.verticalScaleRatio ?? DEFAULT_VERTICAL_SCALE_RATIO;
    if (!Number.isFinite(calibration.radius) || calibration.radius <= 0 || ratio === 0) {
        return null;
    }
    return {
        mathCenterY: calibration.centerY + (calibration.yOffset ?? 0),
        ratio,
    };
}

function project(mouse: Point, calibration: VerticalRatioCalibration, r: Resolved): Point {
    let dx = mouse.x - calibration.centerX;
    let dyCorr = (mouse.y - r.mathCenterY) / r.ratio;
    const rCorr = Math.hypot(dx, dyCorr);
    if (rCorr > calibration.radius) {
        dx = (dx / rCorr) * calibration.radius;
        dyCorr = (dyCorr / rCorr) * calibration.radius;
    }
    return { x: calibration.centerX + dx, y: r.mathCenterY + dyCorr * r.ratio };
}

/** Clamp the pointer into the squashed circle. Degenerate calibrations return the anchor center. */
export function mapPointerToWidgetTarget(mouse: Point, calibration: VerticalRatioCalibration): Point {
    const r = resolve(calibration);
    if (!r) {
        return { x: calibration.centerX, y: calibration.centerY };
    }
    return project(mouse, calibration, r);
}

/** Like `mapPointerToWidgetTarget`, but `undefined` for a degenerate calibration. */
export function clampVisualPoint(mouse: Point, calibration: VerticalRatioCalibration): Point | undefined {
    const r = resolve(calibration);
    if (!r) {
        return undefined;
    }
    if (mouse.x === calibration.centerX && mouse.y === r.mathCenterY) {
        return { x: calibration.centerX, y: r.mathCenterY };
    }
    return project(mouse, calibration, r);
}
