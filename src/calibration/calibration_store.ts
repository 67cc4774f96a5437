/**
 * calibration_store.ts
 *
 * Per-widget calibration: center, anchors, diagonals, gains (with a live
 * tuning overlay), deadzone and angle-warp bounds, all persisted in the
 * widget's ConfigStore. Also runs click-to-capture and the gain tuning keys.
 *
 * User-origin changes refresh the overlay and derive default diagonals once
 * anchors become valid. Restore-origin changes do neither.
 */

import type { EventBus, OverlayAction } from '../kernel/event_bus';
import { ChangeOrigin, ConfigStore, ConfigValue } from '../kernel/config_store';
import {
    ANCHOR_AXES,
    AnchorAxis,
    AnchorDistances,
    DiagonalOffsets,
    GainPair,
    Point,
    QUADRANTS,
    Quadrant,
    SurfaceSize,
    surfaceCenter,
} from '../kernel/types';
import {
    BoundaryModel,
    SPLINE_SAMPLES,
    buildBoundaryModel,
    buildDiagonalContour,
    defaultDiagonalOffsets,
    superellipseRadius,
} from '../geometry/boundary_geometry';
import {
    DEFAULT_WARP_BOUNDS,
    isAdjustableWarpIndex,
    normalizeWarpBounds,
} from '../geometry/angle_warp';
import type { MapperCalibration } from '../geometry/pointer_mapper';
import {
    GAIN_DEFAULT,
    GAIN_MAX,
    GAIN_MIN,
    anchorLimit,
    clampDiagonal,
    parseFiniteNumber,
    parseFlag,
    sanitizeAnchor,
    sanitizeCenter,
    sanitizeDeadzone,
    sanitizeGain,
    validateDiagonal,
} from './sanitize';

export const CALIBRATION_KEYS = {
    centerX: 'calibrated_center_x',
    centerY: 'calibrated_center_y',
    gainEnabled: 'gain_enabled',
    xGain: 'x_gain',
    yGain: 'y_gain',
    anchor: (axis: AnchorAxis): string => `anchor_${axis}`,
    diagonal: (quadrant: Quadrant, component: 'dx' | 'dy'): string => `diag_${quadrant}_${component}`,
    deadzone: 'deadzone',
    warpEnabled: 'angle_warp_enabled',
    warpBounds: 'angle_warp_bounds',
} as const;

export const TUNING_STEP = 0.01;
export const TUNING_STEP_FAST = 0.05;

export type CaptureTarget =
    | { kind: 'center' }
    | { kind: 'anchor'; axis: AnchorAxis }
    | { kind: 'diagonal'; quadrant: Quadrant };

export type GainAxis = 'x' | 'y';

export interface CalibrationStoreOptions {
    deadzoneDefault: number;
}

export interface BoundaryOptions {
    smoothFallback: boolean;
    fallbackRadius: number | null;
}

export interface AnchorOverlayData {
    center: Point;
    anchors: Record<AnchorAxis, Point>;
    contour: Point[];
    diagonals: Record<Quadrant, Point> | null;
}

export class CalibrationStore {
    private captureTarget: CaptureTarget | null = null;
    private tuningGains: GainPair | null = null;
    private batchDepth = 0;
    private unsubscribers: Array<() => void> = [];

    constructor(
        private readonly widgetId: string,
        private readonly config: ConfigStore,
        private readonly surface: SurfaceSize,
        private readonly eventBus: EventBus,
        private readonly options: CalibrationStoreOptions
    ) {}

    /** Start listening for external edits and announce the widget to the overlay. */
    public attach(): void {
        if (this.unsubscribers.length > 0) return;
        for (const key of this.allKeys()) {
            this.unsubscribers.push(this.config.subscribe(key, (_key, _value, origin) => {
                if (origin === ChangeOrigin.Restore || this.batchDepth > 0) return;
                this.afterUserChange();
            }));
        }
        this.emitOverlay('register');
    }

    public detach(): void {
        const wasAttached = this.unsubscribers.length > 0;
        this.unsubscribers.forEach(unsubscribe => unsubscribe());
        this.unsubscribers = [];
        this.captureTarget = null;
        this.tuningGains = null;
        if (wasAttached) {
            this.emitOverlay('unregister');
        }
    }

    // ── Center ───────────────────────────────────────────────────────────────

    public getCalibratedCenter(): Point | undefined {
        return sanitizeCenter(
            this.config.get(CALIBRATION_KEYS.centerX),
            this.config.get(CALIBRATION_KEYS.centerY),
            this.surface
        );
    }

    public getEffectiveCenter(): Point {
        return this.getCalibratedCenter() ?? surfaceCenter(this.surface);
    }

    public applyCenter(x: unknown, y: unknown, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        const center = sanitizeCenter(x, y, this.surface);
        if (!center) return false;
        this.mutate(origin, () => {
            this.write(CALIBRATION_KEYS.centerX, center.x, origin);
            this.write(CALIBRATION_KEYS.centerY, center.y, origin);
        });
        return true;
    }

    /** Clears the center and puts both gains back to neutral. */
    public resetCenter(origin: ChangeOrigin = ChangeOrigin.User): void {
        this.mutate(origin, () => {
            this.write(CALIBRATION_KEYS.centerX, '', origin);
            this.write(CALIBRATION_KEYS.centerY, '', origin);
            this.write(CALIBRATION_KEYS.xGain, GAIN_DEFAULT, origin);
            this.write(CALIBRATION_KEYS.yGain, GAIN_DEFAULT, origin);
        });
    }

    // ── Gains ────────────────────────────────────────────────────────────────

    public isGainEnabled(): boolean {
        return parseFlag(this.config.get(CALIBRATION_KEYS.gainEnabled)) ?? true;
    }

    public setGainEnabled(enabled: boolean, origin: ChangeOrigin = ChangeOrigin.User): void {
        this.mutate(origin, () => this.write(CALIBRATION_KEYS.gainEnabled, enabled, origin));
    }

    public getSavedGains(): GainPair {
        return {
            x: sanitizeGain(this.config.get(CALIBRATION_KEYS.xGain)) ?? GAIN_DEFAULT,
            y: sanitizeGain(this.config.get(CALIBRATION_KEYS.yGain)) ?? GAIN_DEFAULT,
        };
    }

    /** Gains the mapper uses: neutral while the gain stage is switched off. */
    public getGains(): GainPair {
        if (!this.isGainEnabled()) {
            return { x: GAIN_DEFAULT, y: GAIN_DEFAULT };
        }
        return this.getSavedGains();
    }

    public applyGains(x: unknown, y: unknown, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        const xGain = sanitizeGain(x);
        const yGain = sanitizeGain(y);
        if (xGain === undefined || yGain === undefined) return false;
        this.mutate(origin, () => {
            this.write(CALIBRATION_KEYS.xGain, xGain, origin);
            this.write(CALIBRATION_KEYS.yGain, yGain, origin);
        });
        return true;
    }

    // ── Gain tuning overlay ──────────────────────────────────────────────────

    public isTuning(): boolean {
        return this.tuningGains !== null;
    }

    public startTuning(): boolean {
        if (this.tuningGains) return false;
        this.cancelCapture();
        this.tuningGains = this.getSavedGains();
        this.emitOverlay('tune_start');
        return true;
    }

    public getTuningGains(): GainPair {
        return this.tuningGains ? { ...this.tuningGains } : this.getGains();
    }

    public adjustTuningGain(axis: GainAxis, delta: number): boolean {
        if (!this.tuningGains || !Number.isFinite(delta)) return false;
        const next = Math.min(Math.max(this.tuningGains[axis] + delta, GAIN_MIN), GAIN_MAX);
        this.tuningGains = { ...this.tuningGains, [axis]: next };
        this.emitOverlay('refresh');
        return true;
    }

    public commitTuning(): boolean {
        const pending = this.tuningGains;
        if (!pending) return false;
        this.tuningGains = null;
        this.applyGains(pending.x, pending.y);
        this.emitOverlay('tune_stop');
        return true;
    }

    public cancelTuning(): boolean {
        if (!this.tuningGains) return false;
        this.tuningGains = null;
        this.emitOverlay('tune_stop');
        return true;
    }

    /**
     * Q/A nudge the x gain down/up, W/S the y gain; Shift takes bigger steps.
     * Escape discards, Enter commits. Returns whether the key was consumed.
     */
    public handleTuningKey(key: string, shift = false): boolean {
        if (!this.tuningGains) return false;
        if (key === 'Escape') return this.cancelTuning();
        if (key === 'Enter') return this.commitTuning();
        const step = shift ? TUNING_STEP_FAST : TUNING_STEP;
        switch (key.toLowerCase()) {
            case 'q': return this.adjustTuningGain('x', -step);
            case 'a': return this.adjustTuningGain('x', step);
            case 'w': return this.adjustTuningGain('y', -step);
            case 's': return this.adjustTuningGain('y', step);
            default: return false;
        }
    }

    // ── Anchors ──────────────────────────────────────────────────────────────

    public getAnchorLimit(): number {
        return anchorLimit(this.surface);
    }

    public getPartialAnchors(): Partial<AnchorDistances> {
        const limit = this.getAnchorLimit();
        const partial: Partial<AnchorDistances> = {};
        for (const axis of ANCHOR_AXES) {
            const value = sanitizeAnchor(this.config.get(CALIBRATION_KEYS.anchor(axis)), limit);
            if (value !== undefined) {
                partial[axis] = value;
            }
        }
        return partial;
    }

    /** All four anchors, or `undefined` if any one is missing or invalid. */
    public getAnchorDistances(): AnchorDistances | undefined {
        const { up, down, left, right } = this.getPartialAnchors();
        if (up === undefined || down === undefined || left === undefined || right === undefined) {
            return undefined;
        }
        return { up, down, left, right };
    }

    public applyAnchors(values: Record<AnchorAxis, unknown>, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        const limit = this.getAnchorLimit();
        const up = sanitizeAnchor(values.up, limit);
        const down = sanitizeAnchor(values.down, limit);
        const left = sanitizeAnchor(values.left, limit);
        const right = sanitizeAnchor(values.right, limit);
        if (up === undefined || down === undefined || left === undefined || right === undefined) {
            return false;
        }
        const anchors: AnchorDistances = { up, down, left, right };
        this.mutate(origin, () => {
            for (const axis of ANCHOR_AXES) {
                this.write(CALIBRATION_KEYS.anchor(axis), anchors[axis], origin);
            }
        });
        return true;
    }

    public setAnchor(axis: AnchorAxis, raw: unknown, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        const value = sanitizeAnchor(raw, this.getAnchorLimit());
        if (value === undefined) return false;
        this.mutate(origin, () => this.write(CALIBRATION_KEYS.anchor(axis), value, origin));
        return true;
    }

    /** Clears the anchors and, with them, the diagonals they anchor. */
    public resetAnchors(origin: ChangeOrigin = ChangeOrigin.User): void {
        this.mutate(origin, () => {
            for (const axis of ANCHOR_AXES) {
                this.write(CALIBRATION_KEYS.anchor(axis), '', origin);
            }
            this.clearDiagonals(origin);
        });
    }

    // ── Diagonals ────────────────────────────────────────────────────────────

    /** Stored diagonals, only when all four pass strict quadrant validation. */
    public getStoredDiagonals(): DiagonalOffsets | undefined {
        const limit = this.getAnchorLimit();
        const result: Partial<DiagonalOffsets> = {};
        for (const quadrant of QUADRANTS) {
            const offset = validateDiagonal(
                quadrant,
                this.config.get(CALIBRATION_KEYS.diagonal(quadrant, 'dx')),
                this.config.get(CALIBRATION_KEYS.diagonal(quadrant, 'dy')),
                limit
            );
            if (!offset) return undefined;
            result[quadrant] = offset;
        }
        const { ur, dr, dl, ul } = result;
        return ur && dr && dl && ul ? { ur, dr, dl, ul } : undefined;
    }

    /** Diagonals are meaningless without anchors; falls back to the anchor-derived defaults. */
    public getDiagonalOffsets(allowDefaultInit = true): DiagonalOffsets | undefined {
        const anchors = this.getAnchorDistances();
        if (!anchors) return undefined;
        const stored = this.getStoredDiagonals();
        if (stored) return stored;
        return allowDefaultInit ? defaultDiagonalOffsets(anchors) : undefined;
    }

    public applyDiagonals(
        values: Record<Quadrant, { dx: unknown; dy: unknown }>,
        origin: ChangeOrigin = ChangeOrigin.User
    ): boolean {
        if (!this.getAnchorDistances()) return false;
        const limit = this.getAnchorLimit();
        const validated: Partial<DiagonalOffsets> = {};
        for (const quadrant of QUADRANTS) {
            const offset = validateDiagonal(quadrant, values[quadrant].dx, values[quadrant].dy, limit);
            if (!offset) return false;
            validated[quadrant] = offset;
        }
        const { ur, dr, dl, ul } = validated;
        if (!ur || !dr || !dl || !ul) return false;
        this.mutate(origin, () => this.storeDiagonals({ ur, dr, dl, ul }, origin));
        return true;
    }

    /** Drag-handle edit: out-of-quadrant input is clamped rather than rejected. */
    public updateDiagonalOffset(quadrant: Quadrant, dx: number, dy: number, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        const current = this.getDiagonalOffsets(true);
        if (!current) return false;
        const clamped = clampDiagonal(quadrant, dx, dy, this.getAnchorLimit());
        this.mutate(origin, () => this.storeDiagonals({ ...current, [quadrant]: clamped }, origin));
        return true;
    }

    public resetDiagonals(origin: ChangeOrigin = ChangeOrigin.User): void {
        this.mutate(origin, () => this.clearDiagonals(origin));
    }

    public getDiagonalHandlePositions(): Record<Quadrant, Point> | undefined {
        const offsets = this.getDiagonalOffsets(true);
        if (!offsets) return undefined;
        const center = this.getEffectiveCenter();
        const at = (offset: Point): Point => ({ x: center.x + offset.x, y: center.y + offset.y });
        return { ur: at(offsets.ur), dr: at(offsets.dr), dl: at(offsets.dl), ul: at(offsets.ul) };
    }

    // ── Deadzone ─────────────────────────────────────────────────────────────

    public getDeadzone(): number {
        return sanitizeDeadzone(this.config.get(CALIBRATION_KEYS.deadzone)) ?? this.options.deadzoneDefault;
    }

    public applyDeadzone(raw: unknown, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        const value = sanitizeDeadzone(raw);
        if (value === undefined) return false;
        this.mutate(origin, () => this.write(CALIBRATION_KEYS.deadzone, value, origin));
        return true;
    }

    // ── Angle warp ───────────────────────────────────────────────────────────

    public isWarpEnabled(): boolean {
        return parseFlag(this.config.get(CALIBRATION_KEYS.warpEnabled)) ?? false;
    }

    public setWarpEnabled(enabled: boolean, origin: ChangeOrigin = ChangeOrigin.User): void {
        this.mutate(origin, () => this.write(CALIBRATION_KEYS.warpEnabled, enabled, origin));
    }

    public getWarpBounds(): number[] {
        const raw = this.config.get(CALIBRATION_KEYS.warpBounds);
        if (typeof raw !== 'string' || raw.trim() === '') {
            return DEFAULT_WARP_BOUNDS.slice();
        }
        const parsed = raw.split(',').map(part => parseFiniteNumber(part) ?? Number.NaN);
        return normalizeWarpBounds(parsed);
    }

    /** Bounds for the mapper, or `null` while the warp is switched off. */
    public getActiveWarpBounds(): number[] | null {
        return this.isWarpEnabled() ? this.getWarpBounds() : null;
    }

    public setWarpBound(index: number, angle: number, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        if (!isAdjustableWarpIndex(index) || !Number.isFinite(angle)) return false;
        const bounds = this.getWarpBounds();
        bounds[index] = angle;
        const normalized = normalizeWarpBounds(bounds);
        this.mutate(origin, () => this.write(CALIBRATION_KEYS.warpBounds, normalized.join(','), origin));
        return true;
    }

    public resetWarpBounds(origin: ChangeOrigin = ChangeOrigin.User): void {
        this.mutate(origin, () => this.write(CALIBRATION_KEYS.warpBounds, '', origin));
    }

    // ── Capture mode ─────────────────────────────────────────────────────────

    public isCapturing(): boolean {
        return this.captureTarget !== null;
    }

    public getCaptureTarget(): CaptureTarget | null {
        return this.captureTarget;
    }

    public beginCapture(target: CaptureTarget): void {
        this.cancelTuning();
        this.captureTarget = target;
        this.emitOverlay('start');
    }

    public cancelCapture(): boolean {
        if (!this.captureTarget) return false;
        this.captureTarget = null;
        this.emitOverlay('stop');
        return true;
    }

    /**
     * Feed a mask click to the active capture. A valid click updates one field
     * and ends capture; an invalid one changes nothing and capture stays armed.
     */
    public handleCaptureClick(x: number, y: number): boolean {
        const target = this.captureTarget;
        if (!target) return false;
        if (!(x >= 0 && y >= 0 && x < this.surface.width && y < this.surface.height)) {
            return false;
        }
        let applied = false;
        switch (target.kind) {
            case 'center':
                applied = this.applyCenter(x, y);
                break;
            case 'anchor':
                applied = this.setAnchor(target.axis, Math.round(this.axisDistance(target.axis, x, y)));
                break;
            case 'diagonal':
                applied = this.captureDiagonal(target.quadrant, x, y);
                break;
        }
        if (applied) {
            this.captureTarget = null;
            this.emitOverlay('stop');
        }
        return applied;
    }

    // ── Mapping inputs ───────────────────────────────────────────────────────

    public buildBoundary(options: BoundaryOptions): BoundaryModel {
        return buildBoundaryModel({
            anchors: this.getAnchorDistances(),
            diagonals: this.getDiagonalOffsets(true),
            partialAnchors: this.getPartialAnchors(),
            smoothFallback: options.smoothFallback,
            fallbackRadius: options.fallbackRadius,
            limit: this.getAnchorLimit(),
        });
    }

    public buildMapperCalibration(options: BoundaryOptions, gains: GainPair = this.getGains()): MapperCalibration {
        return {
            inputCenter: this.getEffectiveCenter(),
            gains,
            deadzone: this.getDeadzone(),
            boundary: this.buildBoundary(options),
            warpBounds: this.getActiveWarpBounds(),
        };
    }

    public getAnchorOverlayData(): AnchorOverlayData | undefined {
        const anchors = this.getAnchorDistances();
        if (!anchors) return undefined;
        const center = this.getEffectiveCenter();
        const diagonals = this.getDiagonalOffsets(true);
        const contour = diagonals
            ? buildDiagonalContour(center, anchors, diagonals)
            : sampleSuperellipse(center, anchors);
        return {
            center,
            anchors: {
                up: { x: center.x, y: center.y - anchors.up },
                down: { x: center.x, y: center.y + anchors.down },
                left: { x: center.x - anchors.left, y: center.y },
                right: { x: center.x + anchors.right, y: center.y },
            },
            contour,
            diagonals: this.getDiagonalHandlePositions() ?? null,
        };
    }

    // ── Internals ────────────────────────────────────────────────────────────

    private axisDistance(axis: AnchorAxis, x: number, y: number): number {
        const center = this.getEffectiveCenter();
        switch (axis) {
            case 'up': return center.y - y;
            case 'down': return y - center.y;
            case 'left': return center.x - x;
            case 'right': return x - center.x;
        }
    }

    private captureDiagonal(quadrant: Quadrant, x: number, y: number): boolean {
        const current = this.getDiagonalOffsets(true);
        if (!current) return false;
        const center = this.getEffectiveCenter();
        const offset = validateDiagonal(
            quadrant,
            Math.round(x - center.x),
            Math.round(y - center.y),
            this.getAnchorLimit()
        );
        if (!offset) return false;
        this.mutate(ChangeOrigin.User, () => this.storeDiagonals({ ...current, [quadrant]: offset }, ChangeOrigin.User));
        return true;
    }

    private storeDiagonals(offsets: DiagonalOffsets, origin: ChangeOrigin): void {
        for (const quadrant of QUADRANTS) {
            this.write(CALIBRATION_KEYS.diagonal(quadrant, 'dx'), offsets[quadrant].x, origin);
            this.write(CALIBRATION_KEYS.diagonal(quadrant, 'dy'), offsets[quadrant].y, origin);
        }
    }

    private clearDiagonals(origin: ChangeOrigin): void {
        for (const quadrant of QUADRANTS) {
            this.write(CALIBRATION_KEYS.diagonal(quadrant, 'dx'), '', origin);
            this.write(CALIBRATION_KEYS.diagonal(quadrant, 'dy'), '', origin);
        }
    }

    /** Persist defaults the first time anchors become valid with no diagonals stored. */
    private ensureDiagonalDefaults(): void {
        const anchors = this.getAnchorDistances();
        if (!anchors || this.getStoredDiagonals()) return;
        this.storeDiagonals(defaultDiagonalOffsets(anchors), ChangeOrigin.User);
    }

    private write(key: string, value: ConfigValue, origin: ChangeOrigin): void {
        this.config.set(key, value, origin);
    }

    private mutate(origin: ChangeOrigin, apply: () => void): void {
        this.batchDepth++;
        try {
            apply();
        } finally {
            this.batchDepth--;
        }
        if (this.batchDepth === 0 && origin === ChangeOrigin.User) {
            this.afterUserChange();
        }
    }

    private afterUserChange(): void {
        this.batchDepth++;
        try {
            this.ensureDiagonalDefaults();
        } finally {
            this.batchDepth--;
        }
        this.emitOverlay('refresh');
    }

    private emitOverlay(action: OverlayAction): void {
        this.eventBus.publish('OVERLAY', { action, widgetId: this.widgetId });
    }

    private allKeys(): string[] {
        const keys: string[] = [
            CALIBRATION_KEYS.centerX,
            CALIBRATION_KEYS.centerY,
            CALIBRATION_KEYS.gainEnabled,
            CALIBRATION_KEYS.xGain,
            CALIBRATION_KEYS.yGain,
            CALIBRATION_KEYS.deadzone,
            CALIBRATION_KEYS.warpEnabled,
            CALIBRATION_KEYS.warpBounds,
        ];
        for (const axis of ANCHOR_AXES) keys.push(CALIBRATION_KEYS.anchor(axis));
        for (const quadrant of QUADRANTS) {
            keys.push(CALIBRATION_KEYS.diagonal(quadrant, 'dx'), CALIBRATION_KEYS.diagonal(quadrant, 'dy'));
        }
        return keys;
    }
}

function sampleSuperellipse(center: Point, extents: AnchorDistances): Point[] {
    const points: Point[] = [];
    for (let i = 0; i <= SPLINE_SAMPLES; i++) {
        const radians = (2 * Math.PI * i) / SPLINE_SAMPLES;
        const unit = { x: Math.cos(radians), y: Math.sin(radians) };
        const r = superellipseRadius(unit, extents) ?? 0;
        points.push({ x: center.x + unit.x * r, y: center.y + unit.y * r });
    }
    return points;
}
