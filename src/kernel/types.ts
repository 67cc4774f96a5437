// ── Shared geometry and gesture vocabulary ───────────────────────────────────

export interface Point {
    x: number;
    y: number;
}

/** Size of the emulated touch surface, in absolute pixels. */
export interface SurfaceSize {
    width: number;
    height: number;
}

/** A widget's on-screen rectangle. Joystick widgets are square; `width` sets the output radius. */
export interface WidgetRect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export type AnchorAxis = 'up' | 'down' | 'left' | 'right';

export type Quadrant = 'ur' | 'dr' | 'dl' | 'ul';

export interface AnchorDistances {
    up: number;
    down: number;
    left: number;
    right: number;
}

export type DiagonalOffsets = Record<Quadrant, Point>;

export interface GainPair {
    x: number;
    y: number;
}

export const ANCHOR_AXES: readonly AnchorAxis[] = ['up', 'down', 'left', 'right'];

export const QUADRANTS: readonly Quadrant[] = ['ur', 'dr', 'dl', 'ul'];

/** Sign of (dx, dy) each quadrant requires. Screen y grows downward. */
export const QUADRANT_SIGNS: Readonly<Record<Quadrant, Point>> = {
    ur: { x: 1, y: -1 },
    dr: { x: 1, y: 1 },
    dl: { x: -1, y: 1 },
    ul: { x: -1, y: -1 },
};

export function widgetCenter(rect: WidgetRect): Point {
    return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export function widgetRadius(rect: WidgetRect): number {
    return rect.width / 2;
}

export function surfaceCenter(surface: SurfaceSize): Point {
    return { x: surface.width / 2, y: surface.height / 2 };
}
