/**
 * ideal_calibration.ts
 *
 * Per-skill correction learned from guided samples. The user is shown a
 * target at each of N evenly spaced headings and aims until the cast lands
 * on it; the cursor heading and radius that did so are recorded. At map time
 * a pointer aimed at heading θ is moved to where the recorded cursor was
 * for θ (interpolated between recorded headings).
 */

import { ChangeOrigin, ConfigStore } from '../kernel/config_store';
import { CalibrationMap, CalibrationMapStoreSchema } from '../kernel/schemas';
import type { Point } from '../kernel/types';
import { angleToUnit, normalizeAngle, normalizeAngleDelta, vectorToAngle } from '../geometry/vector';

export const IDEAL_SCALE_MIN = 0.5;
export const IDEAL_SCALE_MAX = 2.0;
export const IDEAL_TARGET_RATIO = 0.95;
export const IDEAL_SAMPLE_COUNTS = [16, 32] as const;
export const IDEAL_DATA_KEY = 'ideal_calibration_data';

export type IdealSampleCount = typeof IDEAL_SAMPLE_COUNTS[number];

export interface IdealCalibrationSample {
    targetAngle: number;
    targetRadius: number;
    cursorAngle: number;
    cursorRadius: number;
}

export interface CalibrationAdjustment {
    offset: number;
    scale: number;
}

export interface CalibrationTarget {
    angle: number;
    radius: number;
    /** Center-relative position of the on-screen target. */
    offset: Point;
}

const NEUTRAL: CalibrationAdjustment = { offset: 0, scale: 1 };

function clampScale(scale: number): number {
    return Math.min(Math.max(scale, IDEAL_SCALE_MIN), IDEAL_SCALE_MAX);
}

export function buildTargetAngles(samples: number): number[] {
    if (samples <= 0) return [];
    const step = 360 / samples;
    return Array.from({ length: samples }, (_, i) => normalizeAngle(i * step));
}

/** Average the samples per target heading into a map. `null` for no samples. */
export function buildCalibrationMap(samples: readonly IdealCalibrationSample[]): CalibrationMap | null {
    if (samples.length === 0) return null;
    const buckets = new Map<number, IdealCalibrationSample[]>();
    for (const sample of samples) {
        const angle = normalizeAngle(sample.targetAngle);
        const bucket = buckets.get(angle) ?? [];
        bucket.push(sample);
        buckets.set(angle, bucket);
    }
    const angles = Array.from(buckets.keys()).sort((a, b) => a - b);
    const angleOffsets: number[] = [];
    const radiusScales: number[] = [];
    for (const angle of angles) {
        const entries = buckets.get(angle) ?? [];
        const offsets = entries.map(e => normalizeAngleDelta(e.cursorAngle - e.targetAngle));
        const scales = entries.map(e => clampScale(e.targetRadius > 0 ? e.cursorRadius / e.targetRadius : 1));
        angleOffsets.push(offsets.reduce((sum, v) => sum + v, 0) / offsets.length);
        radiusScales.push(scales.reduce((sum, v) => sum + v, 0) / scales.length);
    }
    return { bins: angles.length, angles, angleOffsets, radiusScales };
}

/** Linear interpolation between recorded headings, wrapping across 0°. */
export function interpolateAdjustment(map: CalibrationMap, angle: number): CalibrationAdjustment {
    if (map.angles.length === 0) return NEUTRAL;
    const rows = map.angles
        .map((a, i) => ({ angle: a, offset: map.angleOffsets[i], scale: map.radiusScales[i] }))
        .sort((a, b) => a.angle - b.angle);
    const theta = normalizeAngle(angle);
    const first = rows[0];
    const last = rows[rows.length - 1];
    let prev = { ...last, angle: last.angle - 360 };
    let next = first;
    if (theta >= last.angle) {
        prev = last;
        next = { ...first, angle: first.angle + 360 };
    } else if (theta > first.angle) {
        for (let i = 0; i < rows.length - 1; i++) {
            if (rows[i].angle <= theta && theta <= rows[i + 1].angle) {
                prev = rows[i];
                next = rows[i + 1];
                break;
            }
        }
    }
    const t = (theta - prev.angle) / Math.max(next.angle - prev.angle, 1e-6);
    return {
        offset: prev.offset + (next.offset - prev.offset) * t,
        scale: prev.scale + (next.scale - prev.scale) * t,
    };
}

export function applyCalibrationToVector(offset: Point, map: CalibrationMap | undefined): Point {
    if (!map || (offset.x === 0 && offset.y === 0)) {
        return { ...offset };
    }
    const angle = vectorToAngle(offset.x, offset.y);
    const radius = Math.hypot(offset.x, offset.y);
    const { offset: delta, scale } = interpolateAdjustment(map, angle);
    const unit = angleToUnit(normalizeAngle(angle + delta));
    const corrected = radius * clampScale(scale);
    return { x: unit.x * corrected, y: unit.y * corrected };
}

// ── Persistence ──────────────────────────────────────────────────────────────

/** Maps for every skill, stored as one JSON document under `IDEAL_DATA_KEY`. */
export class CalibrationMapRepository {
    constructor(private readonly config: ConfigStore) {}

    public getAll(): Record<string, CalibrationMap> {
        const raw = this.config.get(IDEAL_DATA_KEY);
        if (typeof raw !== 'string' || raw.trim() === '') return {};
        let decoded: unknown;
        try {
            decoded = JSON.parse(raw);
        } catch (error) {
            console.warn('[Calibration] Ignoring unreadable ideal calibration data:', error);
            return {};
        }
        const parsed = CalibrationMapStoreSchema.safeParse(decoded);
        return parsed.success ? parsed.data : {};
    }

    public get(skill: string): CalibrationMap | undefined {
        return this.getAll()[skill];
    }

    public set(skill: string, map: CalibrationMap, origin: ChangeOrigin = ChangeOrigin.User): void {
        const all = this.getAll();
        all[skill] = map;
        this.config.set(IDEAL_DATA_KEY, JSON.stringify(all), origin);
    }

    public clear(skill: string, origin: ChangeOrigin = ChangeOrigin.User): boolean {
        const all = this.getAll();
        if (!(skill in all)) return false;
        delete all[skill];
        this.config.set(IDEAL_DATA_KEY, JSON.stringify(all), origin);
        return true;
    }
}

// ── Guided session ───────────────────────────────────────────────────────────

export type BoundaryRadiusLookup = (angle: number) => number;

/**
 * One guided pass over the target headings. Each release yields a pending
 * sample that must be confirmed (recorded) or rejected before the next.
 */
export class IdealCalibrationSession {
    private targets: number[] = [];
    private index = 0;
    private samples: IdealCalibrationSample[] = [];
    private pending: IdealCalibrationSample | null = null;
    private active = false;
    private skill = '';

    constructor(
        private readonly repository: CalibrationMapRepository,
        private readonly onChange: () => void = () => undefined
    ) {}

    public isActive(): boolean {
        return this.active;
    }

    public isAwaitingConfirmation(): boolean {
        return this.pending !== null;
    }

    public getSkill(): string {
        return this.skill;
    }

    public progress(): { recorded: number; total: number } {
        return { recorded: this.index, total: this.targets.length };
    }

    public start(skill: string, samples: number): boolean {
        if (this.active) return false;
        const count: IdealSampleCount = samples === 32 ? 32 : 16;
        this.skill = skill;
        this.targets = buildTargetAngles(count);
        this.index = 0;
        this.samples = [];
        this.pending = null;
        this.active = true;
        this.onChange();
        return true;
    }

    /** Ends the session; with `savePartial` the samples so far still produce a map. */
    public stop(savePartial: boolean): CalibrationMap | null {
        if (!this.active) return null;
        const saved = savePartial ? this.finalize() : null;
        this.reset();
        this.onChange();
        return saved;
    }

    public currentTarget(boundaryRadiusAt: BoundaryRadiusLookup): CalibrationTarget | null {
        if (!this.active || this.index >= this.targets.length) return null;
        const angle = this.targets[this.index];
        const radius = boundaryRadiusAt(angle) * IDEAL_TARGET_RATIO;
        const unit = angleToUnit(angle);
        return { angle, radius, offset: { x: unit.x * radius, y: unit.y * radius } };
    }

    /** Record where the (gain-scaled, center-relative) cursor was when the cast was released. */
    public capture(cursorOffset: Point, boundaryRadiusAt: BoundaryRadiusLookup): boolean {
        if (!this.active || this.pending) return false;
        const target = this.currentTarget(boundaryRadiusAt);
        if (!target) return false;
        const cursorRadius = Math.hypot(cursorOffset.x, cursorOffset.y);
        if (cursorRadius === 0) return false;
        this.pending = {
            targetAngle: target.angle,
            targetRadius: target.radius,
            cursorAngle: vectorToAngle(cursorOffset.x, cursorOffset.y),
            cursorRadius,
        };
        this.onChange();
        return true;
    }

    /** Keep (`true`) or discard the pending sample. The last kept sample finalizes the map. */
    public confirm(record: boolean): boolean {
        const pending = this.pending;
        if (!this.active || !pending) return false;
        this.pending = null;
        if (record) {
            this.samples.push(pending);
            this.index++;
            if (this.index >= this.targets.length) {
                this.finalize();
                this.reset();
            }
        }
        this.onChange();
        return true;
    }

    /** Discard the pending sample and aim at the same target again. */
    public redo(): boolean {
        return this.confirm(false);
    }

    private finalize(): CalibrationMap | null {
        const map = buildCalibrationMap(this.samples);
        if (map) {
            this.repository.set(this.skill, map);
            console.log(`[Calibration] Saved ideal calibration for ${this.skill} (${map.bins} headings)`);
        }
        return map;
    }

    private reset(): void {
        this.active = false;
        this.targets = [];
        this.samples = [];
        this.index = 0;
        this.pending = null;
    }
}
