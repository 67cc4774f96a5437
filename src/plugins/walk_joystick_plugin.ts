/**
 * walk_joystick_plugin.ts
 *
 * Click-to-walk: a press drags a virtual stick from its center to the mapped
 * boundary point in a few interpolated steps, then holds it there.
 *
 *   INACTIVE ──press──▶ MOVING ──steps done──▶ HOLDING ──release/hold timeout──▶ INACTIVE
 *
 * A short click leaves the stick held for a time proportional to how far the
 * pointer was from the center. Holding the button past the long-press
 * threshold makes the stick follow the pointer until release.
 */

import { ConfigStore } from '../kernel/config_store';
import type { PluginContext } from '../kernel/plugin_supervisor';
import { WalkOptions, WalkOptionsInput, WalkOptionsSchema } from '../kernel/schemas';
import type { TimerHandle } from '../kernel/timer_arena';
import type { Point, SurfaceSize, WidgetRect } from '../kernel/types';
import { mapPointer } from '../geometry/pointer_mapper';
import { JoystickWidget } from './joystick_widget';

export type WalkState = 'INACTIVE' | 'MOVING' | 'HOLDING';

/**
 * Seconds to keep the stick deflected after a short click.
 * Grows linearly with pointer distance up to half the surface diagonal.
 */
export function computeHoldDurationSec(
    pointerDistance: number,
    surface: SurfaceSize,
    minHoldSec = 0.5,
    maxHoldSec = 5.0
): number {
    const maxDistance = Math.hypot(surface.width, surface.height) / 2;
    if (!(maxDistance > 0) || !Number.isFinite(pointerDistance)) {
        return minHoldSec;
    }
    const ratio = Math.min(Math.max(pointerDistance, 0) / maxDistance, 1);
    return Math.min(Math.max(ratio * maxHoldSec, minHoldSec), maxHoldSec);
}

export class WalkJoystickPlugin extends JoystickWidget {
    private readonly options: WalkOptions;
    private state: WalkState = 'INACTIVE';
    private current: Point;
    private target: Point;
    private lockedTarget: Point | null = null;
    private pointerDistance = 0;
    private pressStartMs = 0;
    private keyDown = false;
    private longPress = false;
    private stepsTaken = 0;
    private moveTimer: TimerHandle | null = null;
    private holdTimer: TimerHandle | null = null;

    constructor(id: string, rect: WidgetRect, options: WalkOptionsInput = {}, config: ConfigStore = new ConfigStore()) {
        const parsed = WalkOptionsSchema.parse(options);
        super(id, rect, config, parsed.deadzoneDefault);
        this.options = parsed;
        this.current = this.center;
        this.target = this.center;
    }

    public getState(): WalkState {
        return this.state;
    }

    public getCurrentPosition(): Point {
        return { ...this.current };
    }

    protected onInit(_context: PluginContext): void {
        console.log(`[WalkJoystick] ${this.name} ready (${this.options.moveSteps} steps @ ${this.options.moveIntervalMs}ms)`);
    }

    // ── Input ────────────────────────────────────────────────────────────────

    public press(position?: Point): boolean {
        if (!this.mapping || !position) return false;
        const now = this.now();
        const calibration = this.getCalibration();
        const target = this.mapTarget(position);
        this.pointerDistance = Math.hypot(
            position.x - calibration.getEffectiveCenter().x,
            position.y - calibration.getEffectiveCenter().y
        );
        this.lockedTarget = target;
        this.target = target;

        switch (this.state) {
            case 'INACTIVE': {
                if (this.context.pointerIds.allocate(this.name) === null) {
                    return false;
                }
                this.pressStartMs = now;
                this.longPress = false;
                this.keyDown = true;
                this.current = this.center;
                this.emitter.down(this.current);
                this.startSmoothMove();
                return true;
            }
            case 'MOVING':
                this.pressStartMs = now;
                this.longPress = false;
                this.keyDown = true;
                return true;
            case 'HOLDING':
                this.current = this.target;
                this.emitter.move(this.current);
                this.pressStartMs = now;
                this.longPress = false;
                this.keyDown = true;
                this.clearHoldTimer();
                return true;
        }
    }

    public motion(position: Point): boolean {
        if (!this.mapping || this.state === 'INACTIVE') return false;
        if (this.shouldFollowCursor(this.now())) {
            this.target = this.mapTarget(position);
            this.lockedTarget = null;
        } else if (this.lockedTarget) {
            this.target = this.lockedTarget;
        }
        if (this.state === 'HOLDING') {
            this.current = this.target;
            this.emitter.move(this.current);
        }
        return true;
    }

    public release(): boolean {
        if (this.state === 'INACTIVE') return false;
        const pressDurationMs = this.now() - this.pressStartMs;
        this.keyDown = false;
        if (pressDurationMs >= this.options.longPressMs) {
            this.longPress = true;
        }
        if (this.longPress) {
            this.finish();
        } else if (this.state === 'HOLDING') {
            this.startHoldTimer();
        }
        // Still MOVING: the hold timer starts once the stick reaches the boundary.
        return true;
    }

    public cancel(): void {
        if (this.state === 'INACTIVE') return;
        console.log(`[WalkJoystick] ${this.name} cancelled while ${this.state}`);
        this.finish();
    }

    // ── Internals ────────────────────────────────────────────────────────────

    private mapTarget(position: Point): Point {
        const calibration = this.getCalibration().buildMapperCalibration({
            smoothFallback: this.options.smoothFallback,
            fallbackRadius: null,
        });
        return mapPointer(position, calibration, this.center, this.outputRadius).target;
    }

    private shouldFollowCursor(now: number): boolean {
        if (!this.keyDown) return false;
        if (this.longPress) return true;
        if (now - this.pressStartMs >= this.options.longPressMs) {
            this.longPress = true;
            return true;
        }
        return false;
    }

    private startSmoothMove(): void {
        this.moveTimer?.cancel();
        this.state = 'MOVING';
        this.stepsTaken = 0;
        this.moveTimer = this.context.timers.repeat(this.name, this.options.moveIntervalMs, () => {
            if (this.state !== 'MOVING') {
                this.moveTimer = null;
                return false;
            }
            if (this.stepsTaken < this.options.moveSteps) {
                // Divide by the remaining steps so a target that moves mid-flight is still reached on time.
                const remaining = this.options.moveSteps - this.stepsTaken;
                this.current = {
                    x: this.current.x + (this.target.x - this.current.x) / remaining,
                    y: this.current.y + (this.target.y - this.current.y) / remaining,
                };
                this.stepsTaken++;
                this.emitter.move(this.current);
                return true;
            }
            this.current = this.target;
            this.moveTimer = null;
            this.onReachedBoundary();
            return false;
        });
    }

    private onReachedBoundary(): void {
        this.state = 'HOLDING';
        if (!this.longPress && !this.keyDown) {
            this.startHoldTimer();
        }
    }

    private startHoldTimer(): void {
        this.clearHoldTimer();
        const seconds = computeHoldDurationSec(
            this.pointerDistance,
            this.context.surface,
            this.options.minHoldSec,
            this.options.maxHoldSec
        );
        this.holdTimer = this.context.timers.schedule(this.name, Math.round(seconds * 1000), () => {
            this.holdTimer = null;
            if (this.state === 'INACTIVE') return;
            this.finish();
        });
    }

    private clearHoldTimer(): void {
        this.holdTimer?.cancel();
        this.holdTimer = null;
    }

    private finish(): void {
        this.emitter.up(this.current);
        this.reset();
    }

    private reset(): void {
        this.state = 'INACTIVE';
        this.current = this.center;
        this.lockedTarget = null;
        this.keyDown = false;
        this.longPress = false;
        this.moveTimer?.cancel();
        this.moveTimer = null;
        this.clearHoldTimer();
        this.context.timers.cancelOwner(this.name);
        this.context.pointerIds.release(this.name);
    }
}
