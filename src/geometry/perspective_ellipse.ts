import type { Point } from '../kernel/types';

export type DistanceCurveMode = 'linear' | 'gamma' | 'smoothstep';

export interface PerspectiveEllipseParams {
    centerX: number;
    centerY: number;
    radiusX: number;
    radiusY: number;
    dxBias?: number;
    dyBias?: number;
    deadzone?: number;
    maxRadiusClamp?: number;
    distanceCurve?: DistanceCurveMode;
    gamma?: number;
    angleBiasDeg?: number;
    radiusScale?: number;
}

export interface NormalizedPoint {
    u: number;
    v: number;
    rawRadius: number;
    rawAngle: number;
}

export interface AngleDistance {
    /** Radians. */
    angle: number;
    /** 1.0 is the ellipse edge. */
    distance: number;
}

const MIN_GAMMA = 1e-6;

/**
 * Maps screen points seen through a perspective-squashed circle onto a
 * corrected unit circle, and back.
 */
export class PerspectiveEllipseModel {
    public readonly centerX: number;
    public readonly centerY: number;
    public readonly radiusX: number;
    public readonly radiusY: number;
    public readonly dxBias: number;
    public readonly dyBias: number;
    public readonly deadzone: number;
    public readonly maxRadiusClamp: number;
    public readonly distanceCurve: DistanceCurveMode;
    public readonly gamma: number;
    public readonly angleBiasDeg: number;
    public readonly radiusScale: number;

    constructor(params: PerspectiveEllipseParams) {
        this.centerX = params.centerX;
        this.centerY = params.centerY;
        this.radiusX = params.radiusX;
        this.radiusY = params.radiusY;
        this.dxBias = params.dxBias ?? 0;
        this.dyBias = params.dyBias ?? 0;
        this.deadzone = params.deadzone ?? 0;
        this.maxRadiusClamp = params.maxRadiusClamp ?? 1;
        this.distanceCurve = params.distanceCurve ?? 'linear';
        this.gamma = params.gamma ?? 1;
        this.angleBiasDeg = params.angleBiasDeg ?? 0;
        this.radiusScale = params.radiusScale ?? 1;
    }

    /** Build from the four extreme points traced on screen. */
    public static fromCardinals(
        center: Point,
        north: Point,
        south: Point,
        west: Point,
        east: Point,
        extra: Omit<PerspectiveEllipseParams, 'centerX' | 'centerY' | 'radiusX' | 'radiusY' | 'dxBias' | 'dyBias'> = {}
    ): PerspectiveEllipseModel {
        return new PerspectiveEllipseModel({
            ...extra,
            centerX: center.x,
            centerY: center.y,
            radiusX: (east.x - west.x) / 2,
            radiusY: (south.y - north.y) / 2,
            dxBias: (east.x + west.x) / 2 - center.x,
            dyBias: (south.y + north.y) / 2 - center.y,
        });
    }

    public get correctedCenter(): Point {
        return { x: this.centerX + this.dxBias, y: this.centerY + this.dyBias };
    }

    public get angleBiasRad(): number {
        return (this.angleBiasDeg * Math.PI) / 180;
    }

    public isValid(): boolean {
        return this.radiusX > 0 && this.radiusY > 0;
    }

    public normalizePoint(px: number, py: number): NormalizedPoint {
        const center = this.correctedCenter;
        const u = (px - center.x) / this.radiusX;
        const v = (py - center.y) / this.radiusY;
        return {
            u,
            v,
            rawRadius: Math.hypot(u, v),
            rawAngle: Math.atan2(v, u) + this.angleBiasRad,
        };
    }

    public pointToAngleDistance(px: number, py: number): AngleDistance {
        const { rawRadius, rawAngle } = this.normalizePoint(px, py);
        if (rawRadius <= this.deadzone) {
            return { angle: rawAngle, distance: 0 };
        }
        const clamped = Math.min(rawRadius, this.maxRadiusClamp);
        let curved = clamped <= 1 ? this.applyCurve(clamped) : clamped;
        curved *= this.radiusScale;
        return { angle: rawAngle, distance: Math.max(0, Math.min(curved, this.maxRadiusClamp)) };
    }

    public angleDistanceToPoint(angleRad: number, distanceNorm: number): Point {
        let d = Math.max(0, distanceNorm);
        if (this.radiusScale > 0) {
            d /= this.radiusScale;
        }
        d = Math.min(d, this.maxRadiusClamp);
        const rawRadius = d <= 1 ? this.invertCurve(d) : d;
        const center = this.correctedCenter;
        const angle = angleRad - this.angleBiasRad;
        return {
            x: center.x + this.radiusX * rawRadius * Math.cos(angle),
            y: center.y + this.radiusY * rawRadius * Math.sin(angle),
        };
    }

    private applyCurve(radius: number): number {
        switch (this.distanceCurve) {
            case 'gamma':
                return radius ** Math.max(this.gamma, MIN_GAMMA);
            case 'smoothstep':
                return radius * radius * (3 - 2 * radius);
            case 'linear':
                return radius;
        }
    }

    private invertCurve(distance: number): number {
        switch (this.distanceCurve) {
            case 'gamma':
                return distance ** (1 / Math.max(this.gamma, MIN_GAMMA));
            case 'smoothstep': {
                const d = Math.max(0, Math.min(distance, 1));
                return 0.5 - Math.sin(Math.asin(1 - 2 * d) / 3);
            }
            case 'linear':
                return distance;
        }
    }
}
