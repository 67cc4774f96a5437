import type { CaptureTarget } from '../calibration/calibration_store';
import type { GainPair, Point, Quadrant } from '../kernel/types';

/** Click-to-calibrate support (center, anchors, and for some widgets diagonals). */
export interface Calibratable {
    readonly isCalibrating: boolean;
    beginCapture(target: CaptureTarget): void;
    cancelCapture(): boolean;
    handleCaptureClick(x: number, y: number): boolean;
    getEffectiveCenter(): Point;
    getCalibratedCenter(): Point | undefined;
}

/** Live gain tuning driven by the keyboard. */
export interface Tunable {
    readonly isTuning: boolean;
    startTuning(): boolean;
    handleTuningKey(key: string, shift?: boolean): boolean;
    cancelTuning(): boolean;
    getTuningGains(): GainPair;
}

/** Draggable diagonal handles on the calibration overlay. */
export interface DiagonalEditable {
    getDiagonalHandlePositions(): Record<Quadrant, Point> | undefined;
    updateDiagonalOffset(quadrant: Quadrant, dx: number, dy: number): boolean;
}

export interface WidgetCapabilities {
    calibratable?: Calibratable;
    tunable?: Tunable;
    diagonalEditable?: DiagonalEditable;
}
