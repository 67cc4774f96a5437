import { z } from 'zod';

// Touch events cross into the external transport, so every frame is validated before it leaves.

/** Motion-event action codes understood by the remote touch protocol. */
export const TouchAction = {
    DOWN: 0,
    UP: 1,
    MOVE: 2,
} as const;

export type TouchAction = typeof TouchAction[keyof typeof TouchAction];

export const BUTTON_PRIMARY = 1;

export const TouchEventSchema = z.object({
    action: z.union([
        z.literal(TouchAction.DOWN),
        z.literal(TouchAction.UP),
        z.literal(TouchAction.MOVE),
    ]),
    pointerId: z.number().int().nonnegative(),
    x: z.number().int(),
    y: z.number().int(),
    surfaceWidth: z.number().int().positive(),
    surfaceHeight: z.number().int().positive(),
    pressure: z.number().min(0).max(1),
    actionButton: z.number().int().nonnegative(),
    buttons: z.number().int().nonnegative(),
});

export type TouchEvent = z.infer<typeof TouchEventSchema>;

// ── Widget options ───────────────────────────────────────────────────────────

const GestureTimingSchema = z.object({
    moveSteps: z.number().int().min(1).default(6),
    moveIntervalMs: z.number().int().min(1).default(20),
    smoothFallback: z.boolean().default(false),
});

export const WalkOptionsSchema = GestureTimingSchema.extend({
    longPressMs: z.number().nonnegative().default(300),
    minHoldSec: z.number().positive().default(0.5),
    maxHoldSec: z.number().positive().default(5.0),
    deadzoneDefault: z.number().min(0).max(0.95).default(0.08),
}).refine(opts => opts.minHoldSec <= opts.maxHoldSec, {
    message: 'minHoldSec must not exceed maxHoldSec',
});

export type WalkOptions = z.infer<typeof WalkOptionsSchema>;
export type WalkOptionsInput = z.input<typeof WalkOptionsSchema>;

export const CastTimingSchema = z.enum(['on_release', 'immediate', 'manual']);
export type CastTiming = z.infer<typeof CastTimingSchema>;

export const SkillCastOptionsSchema = GestureTimingSchema.extend({
    castTiming: CastTimingSchema.default('on_release'),
    queueCapacity: z.number().int().min(1).default(128),
    defaultCastRadius: z.number().positive().default(200),
    deadzoneDefault: z.number().min(0).max(0.95).default(0.1),
});

export type SkillCastOptions = z.infer<typeof SkillCastOptionsSchema>;
export type SkillCastOptionsInput = z.input<typeof SkillCastOptionsSchema>;

// ── Ideal calibration persistence ────────────────────────────────────────────

export const CalibrationMapSchema = z.object({
    bins: z.number().int().positive(),
    angles: z.array(z.number().finite()),
    angleOffsets: z.array(z.number().finite()),
    radiusScales: z.array(z.number().finite()),
}).refine(
    map => map.angles.length === map.bins
        && map.angleOffsets.length === map.bins
        && map.radiusScales.length === map.bins,
    { message: 'calibration map arrays must all have `bins` entries' }
);

export type CalibrationMap = z.infer<typeof CalibrationMapSchema>;

export const CalibrationMapStoreSchema = z.record(z.string(), CalibrationMapSchema);
