/**
 * joystick_widget.ts
 *
 * Shared plumbing for the pointer-driven widgets: lifecycle hooks for the
 * supervisor, the per-widget calibration store and touch emitter, and the
 * bus subscriptions that live exactly as long as the widget does.
 */

import type { Plugin, PluginContext } from '../kernel/plugin_supervisor';
import { ConfigStore } from '../kernel/config_store';
import { TouchEmitter } from '../kernel/touch_emitter';
import type { GainPair, Point, WidgetRect } from '../kernel/types';
import { widgetCenter, widgetRadius } from '../kernel/types';
import { CalibrationStore, CaptureTarget } from '../calibration/calibration_store';
import type { Calibratable, Tunable, WidgetCapabilities } from './widget_capabilities';

export class WidgetNotInitializedError extends Error {
    constructor(widgetId: string) {
        super(`[Widget] ${widgetId} used before init(); register it with a PluginSupervisor first.`);
        this.name = 'WidgetNotInitializedError';
    }
}

interface Attached {
    context: PluginContext;
    calibration: CalibrationStore;
    emitter: TouchEmitter;
}

export abstract class JoystickWidget implements Plugin, Calibratable, Tunable {
    public readonly version = '1.0.0';
    protected mapping = false;
    private attached: Attached | null = null;
    private unsubscribers: Array<() => void> = [];

    protected constructor(
        public readonly name: string,
        protected rect: WidgetRect,
        public readonly config: ConfigStore,
        private readonly deadzoneDefault: number
    ) {}

    // ── Lifecycle ────────────────────────────────────────────────────────────

    public init(context: PluginContext): void {
        if (this.attached) return;
        const calibration = new CalibrationStore(this.name, this.config, context.surface, context.eventBus, {
            deadzoneDefault: this.deadzoneDefault,
        });
        const emitter = new TouchEmitter(this.name, context.eventBus, context.pointerIds, context.surface);
        this.attached = { context, calibration, emitter };
        calibration.attach();
        this.unsubscribers.push(
            context.eventBus.subscribe('MOUSE_MOTION', position => {
                this.motion(position);
            }),
            context.eventBus.subscribe('MASK_CLICKED', click => {
                this.handleCaptureClick(click.x, click.y);
            })
        );
        this.onInit(context);
    }

    /** Enter mapping mode: input now drives touch output. */
    public start(): void {
        this.mapping = true;
    }

    /** Leave mapping mode; any gesture in flight is cancelled. */
    public stop(): void {
        this.mapping = false;
        this.cancel();
    }

    public destroy(): void {
        this.mapping = false;
        if (!this.attached) return;
        this.cancel();
        this.unsubscribers.forEach(unsubscribe => unsubscribe());
        this.unsubscribers = [];
        this.onDestroy();
        this.attached.calibration.detach();
        this.attached = null;
    }

    public isMapping(): boolean {
        return this.mapping;
    }

    // ── Input ────────────────────────────────────────────────────────────────

    public abstract press(position?: Point): boolean;
    public abstract release(): boolean;
    public abstract motion(position: Point): boolean;
    /** End the current gesture now: UP, timers cleared, pointer id released. No-op when idle. */
    public abstract cancel(): void;

    protected onInit(_context: PluginContext): void {}
    protected onDestroy(): void {}

    // ── Geometry ─────────────────────────────────────────────────────────────

    public getRect(): WidgetRect {
        return { ...this.rect };
    }

    public setRect(rect: WidgetRect): void {
        this.rect = { ...rect };
    }

    public get center(): Point {
        return widgetCenter(this.rect);
    }

    public get outputRadius(): number {
        return widgetRadius(this.rect);
    }

    // ── Capabilities ─────────────────────────────────────────────────────────

    public capabilities(): WidgetCapabilities {
        return { calibratable: this, tunable: this };
    }

    public getCalibration(): CalibrationStore {
        return this.require().calibration;
    }

    public get isCalibrating(): boolean {
        return this.attached?.calibration.isCapturing() ?? false;
    }

    public beginCapture(target: CaptureTarget): void {
        this.getCalibration().beginCapture(target);
    }

    public cancelCapture(): boolean {
        return this.attached?.calibration.cancelCapture() ?? false;
    }

    public handleCaptureClick(x: number, y: number): boolean {
        return this.attached?.calibration.handleCaptureClick(x, y) ?? false;
    }

    public getEffectiveCenter(): Point {
        return this.getCalibration().getEffectiveCenter();
    }

    public getCalibratedCenter(): Point | undefined {
        return this.getCalibration().getCalibratedCenter();
    }

    public get isTuning(): boolean {
        return this.attached?.calibration.isTuning() ?? false;
    }

    public startTuning(): boolean {
        return this.getCalibration().startTuning();
    }

    public handleTuningKey(key: string, shift = false): boolean {
        return this.attached?.calibration.handleTuningKey(key, shift) ?? false;
    }

    public cancelTuning(): boolean {
        return this.attached?.calibration.cancelTuning() ?? false;
    }

    public getTuningGains(): GainPair {
        return this.getCalibration().getTuningGains();
    }

    // ── For subclasses ───────────────────────────────────────────────────────

    protected require(): Attached {
        if (!this.attached) {
            throw new WidgetNotInitializedError(this.name);
        }
        return this.attached;
    }

    protected get emitter(): TouchEmitter {
        return this.require().emitter;
    }

    protected get context(): PluginContext {
        return this.require().context;
    }

    protected now(): number {
        return Date.now();
    }
}
