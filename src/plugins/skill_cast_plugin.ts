/**
 * skill_cast_plugin.ts
 *
 * Skill targeting: a key press drops a finger on the skill button and drags
 * it toward the mapped pointer position; the cast fires according to the
 * configured timing.
 *
 *   INACTIVE ──press──▶ MOVING ──┬─ immediate ──────────────▶ UP
 *                                ├─ manual ─────▶ LOCKED ──press──▶ UP
 *                                └─ on_release ─▶ ACTIVE ──release──▶ UP
 *   any non-idle ──cancel signal──▶ CANCELING (slide to the cancel button) ──▶ UP
 *
 * Input is funnelled through a bounded queue drained by one consumer, so
 * events are handled strictly in arrival order. At most one interpolation
 * task runs per gesture.
 */

import { ConfigStore } from '../kernel/config_store';
import { EventQueue } from '../kernel/event_queue';
import type { PluginContext } from '../kernel/plugin_supervisor';
import {
    CastTiming,
    CastTimingSchema,
    SkillCastOptions,
    SkillCastOptionsInput,
    SkillCastOptionsSchema,
} from '../kernel/schemas';
import { TaskAbortedError } from '../kernel/timer_arena';
import type { Point, Quadrant, WidgetRect } from '../kernel/types';
import { boundaryDistance } from '../geometry/boundary_geometry';
import { mapPointer } from '../geometry/pointer_mapper';
import { angleToUnit } from '../geometry/vector';
import {
    CalibrationMapRepository,
    CalibrationTarget,
    IdealCalibrationSession,
    applyCalibrationToVector,
} from '../calibration/ideal_calibration';
import { JoystickWidget, WidgetNotInitializedError } from './joystick_widget';
import type { DiagonalEditable, WidgetCapabilities } from './widget_capabilities';

export type SkillState = 'INACTIVE' | 'MOVING' | 'ACTIVE' | 'LOCKED' | 'CANCELING';

export type SkillEvent =
    | { type: 'press' }
    | { type: 'release' }
    | { type: 'motion'; position: Point }
    | { type: 'cancel'; target: Point };

export const CAST_TIMING_KEY = 'cast_timing';
export const IDEAL_SKILL_KEY = 'ideal_calibration_skill';

export interface IdealStopResult {
    stopped: boolean;
    saved: boolean;
}

interface CastTask {
    controller: AbortController;
    done: Promise<void>;
}

export class SkillCastPlugin extends JoystickWidget implements DiagonalEditable {
    private readonly options: SkillCastOptions;
    private state: SkillState = 'INACTIVE';
    private current: Point;
    private pointer: Point;
    private releasedDuringMove = false;
    private cancelTarget: Point | null = null;
    private task: CastTask | null = null;
    private queue: EventQueue<SkillEvent> | null = null;
    private consumer: Promise<void> | null = null;
    private unsubscribeCancel: () => void = () => undefined;
    private ideal: IdealCalibrationSession | null = null;
    private maps: CalibrationMapRepository;

    constructor(id: string, rect: WidgetRect, options: SkillCastOptionsInput = {}, config: ConfigStore = new ConfigStore()) {
        const parsed = SkillCastOptionsSchema.parse(options);
        super(id, rect, config, parsed.deadzoneDefault);
        this.options = parsed;
        this.current = this.center;
        this.pointer = this.center;
        this.maps = new CalibrationMapRepository(config);
    }

    public getState(): SkillState {
        return this.state;
    }

    public getCurrentPosition(): Point {
        return { ...this.current };
    }

    public getCastTiming(): CastTiming {
        const parsed = CastTimingSchema.safeParse(this.config.get(CAST_TIMING_KEY));
        return parsed.success ? parsed.data : this.options.castTiming;
    }

    public capabilities(): WidgetCapabilities {
        return { ...super.capabilities(), diagonalEditable: this };
    }

    // ── Lifecycle ────────────────────────────────────────────────────────────

    protected onInit(context: PluginContext): void {
        const queue = new EventQueue<SkillEvent>(this.options.queueCapacity);
        this.queue = queue;
        this.consumer = this.consume(queue);
        this.ideal = new IdealCalibrationSession(this.maps, () => {
            context.eventBus.publish('OVERLAY', { action: 'refresh', widgetId: this.name });
        });
        this.unsubscribeCancel = context.eventBus.subscribe('CANCEL_CASTING', target => {
            this.cancelCasting(target);
        });
    }

    protected onDestroy(): void {
        this.unsubscribeCancel();
        this.queue?.close();
        this.queue = null;
        this.ideal?.stop(false);
    }

    /** Resolves once the input consumer has drained and stopped (after destroy). */
    public whenStopped(): Promise<void> {
        return this.consumer ?? Promise.resolve();
    }

    // ── Input (producers) ────────────────────────────────────────────────────

    public press(position?: Point): boolean {
        if (!this.mapping) return false;
        if (position) {
            this.pointer = { ...position };
        }
        return this.enqueue({ type: 'press' });
    }

    public release(): boolean {
        if (!this.mapping) return false;
        return this.enqueue({ type: 'release' });
    }

    public motion(position: Point): boolean {
        if (!this.mapping) return false;
        this.pointer = { ...position };
        return this.enqueue({ type: 'motion', position: { ...position } });
    }

    /** Slide the finger to `target` (the cancel button) and lift it there. */
    public cancelCasting(target: Point): boolean {
        if (!this.mapping) return false;
        return this.enqueue({ type: 'cancel', target: { ...target } });
    }

    public cancel(): void {
        if (this.state === 'INACTIVE') return;
        console.log(`[SkillCast] ${this.name} cancelled while ${this.state}`);
        this.emitter.up(this.current);
        this.reset();
    }

    private enqueue(event: SkillEvent): boolean {
        const queue = this.queue;
        if (!queue) return false;
        const accepted = queue.offer(event);
        if (!accepted) {
            console.warn(`[SkillCast] ${this.name} input queue full; dropped ${event.type}`);
        }
        return accepted;
    }

    // ── Consumer ─────────────────────────────────────────────────────────────

    private async consume(queue: EventQueue<SkillEvent>): Promise<void> {
        for (;;) {
            const event = await queue.take();
            if (event === null) return;
            try {
                this.handle(event);
            } catch (error) {
                console.error(`[SkillCast] ${this.name} failed handling ${event.type}:`, error);
                this.cancel();
            }
        }
    }

    private handle(event: SkillEvent): void {
        if (!this.mapping) return;
        if (this.state === 'CANCELING') return;
        switch (event.type) {
            case 'press':
                if (this.state === 'INACTIVE') {
                    this.activate();
                } else if (this.state === 'LOCKED') {
                    this.releaseSkill();
                }
                return;
            case 'release':
                if (this.getCastTiming() !== 'on_release') return;
                if (this.state === 'MOVING') {
                    this.releasedDuringMove = true;
                } else if (this.state === 'ACTIVE') {
                    this.releaseSkill();
                }
                return;
            case 'motion':
                if (this.state === 'ACTIVE' || this.state === 'LOCKED') {
                    this.current = this.mapTarget(event.position);
                    this.emitter.move(this.current);
                }
                return;
            case 'cancel':
                if (this.state === 'INACTIVE') return;
                if (this.state === 'MOVING') {
                    // Never interrupt a move mid-flight; the cast task picks this up when it lands.
                    this.cancelTarget = event.target;
                    return;
                }
                this.task?.controller.abort('superseded');
                this.startTask(signal => this.cancelFlow(event.target, signal));
                return;
        }
    }

    // ── Gesture tasks ────────────────────────────────────────────────────────

    private activate(): void {
        if (this.context.pointerIds.allocate(this.name) === null) {
            return;
        }
        this.releasedDuringMove = false;
        this.cancelTarget = null;
        this.current = this.center;
        this.emitter.down(this.current);
        const target = this.mapTarget(this.pointer);
        this.startTask(signal => this.castFlow(target, signal));
    }

    private startTask(run: (signal: AbortSignal) => Promise<void>): void {
        const controller = new AbortController();
        const done = run(controller.signal).catch((error: unknown) => {
            if (error instanceof TaskAbortedError || controller.signal.aborted) {
                return;
            }
            console.error(`[SkillCast] ${this.name} cast task failed:`, error);
            if (this.task?.controller === controller) {
                this.cancel();
            }
        });
        this.task = { controller, done };
    }

    private async castFlow(target: Point, signal: AbortSignal): Promise<void> {
        this.state = 'MOVING';
        await this.smoothMoveTo(target, signal);
        if (this.state === 'INACTIVE' || signal.aborted) return;

        const pendingCancel = this.cancelTarget;
        if (pendingCancel) {
            this.cancelTarget = null;
            await this.cancelFlow(pendingCancel, signal);
            return;
        }
        switch (this.getCastTiming()) {
            case 'immediate':
                this.releaseSkill();
                return;
            case 'manual':
                this.state = 'LOCKED';
                return;
            case 'on_release':
                if (this.releasedDuringMove) {
                    this.releaseSkill();
                } else {
                    this.state = 'ACTIVE';
                }
                return;
        }
    }

    private async cancelFlow(target: Point, signal: AbortSignal): Promise<void> {
        this.state = 'CANCELING';
        await this.smoothMoveTo(target, signal);
        if (this.state === 'INACTIVE' || signal.aborted) return;
        this.releaseSkill();
    }

    private async smoothMoveTo(target: Point, signal: AbortSignal): Promise<void> {
        const start = this.current;
        const steps = this.options.moveSteps;
        for (let step = 1; step <= steps; step++) {
            const t = step / steps;
            this.current = {
                x: start.x + (target.x - start.x) * t,
                y: start.y + (target.y - start.y) * t,
            };
            this.emitter.move(this.current);
            await this.context.timers.sleep(this.name, this.options.moveIntervalMs, signal);
            if (this.state === 'INACTIVE') return;
        }
        this.current = target;
    }

    private releaseSkill(): void {
        this.emitter.up(this.current);
        this.captureIdealSample();
        this.reset();
    }

    private reset(): void {
        this.state = 'INACTIVE';
        this.current = this.center;
        this.releasedDuringMove = false;
        this.cancelTarget = null;
        const task = this.task;
        this.task = null;
        task?.controller.abort('reset');
        this.context.timers.cancelOwner(this.name);
        this.context.pointerIds.release(this.name);
    }

    // ── Mapping ──────────────────────────────────────────────────────────────

    private mapTarget(position: Point): Point {
        const calibration = this.getCalibration().buildMapperCalibration({
            smoothFallback: this.options.smoothFallback,
            fallbackRadius: this.options.defaultCastRadius,
        });
        const map = this.ideal?.isActive() ? undefined : this.maps.get(this.getIdealSkill());
        if (map) {
            calibration.adjustOffset = offset => applyCalibrationToVector(offset, map);
        }
        return mapPointer(position, calibration, this.center, this.outputRadius).target;
    }

    private boundaryRadiusAt = (angle: number): number => {
        const boundary = this.getCalibration().buildBoundary({
            smoothFallback: this.options.smoothFallback,
            fallbackRadius: this.options.defaultCastRadius,
        });
        const distance = boundaryDistance(boundary, angleToUnit(angle));
        return distance !== null && distance > 0 ? distance : this.options.defaultCastRadius;
    };

    // ── Ideal calibration ────────────────────────────────────────────────────

    public getIdealSkill(): string {
        const raw = this.config.get(IDEAL_SKILL_KEY);
        return typeof raw === 'string' && raw.trim() !== '' ? raw : this.name;
    }

    public startIdealCalibration(samples = 16): boolean {
        const session = this.requireIdeal();
        if (session.isActive()) return false;
        this.getCalibration().cancelCapture();
        this.getCalibration().cancelTuning();
        return session.start(this.getIdealSkill(), samples);
    }

    /** `stopped` is false when no session was running; `saved` when a map was written. */
    public stopIdealCalibration(savePartial: boolean): IdealStopResult {
        const session = this.requireIdeal();
        if (!session.isActive()) {
            return { stopped: false, saved: false };
        }
        const map = session.stop(savePartial);
        return { stopped: true, saved: map !== null };
    }

    public confirmIdealSample(record: boolean): boolean {
        return this.requireIdeal().confirm(record);
    }

    public redoIdealSample(): boolean {
        return this.requireIdeal().redo();
    }

    public clearIdealCalibration(): boolean {
        return this.maps.clear(this.getIdealSkill());
    }

    public isIdealCalibrating(): boolean {
        return this.ideal?.isActive() ?? false;
    }

    public isAwaitingIdealConfirmation(): boolean {
        return this.ideal?.isAwaitingConfirmation() ?? false;
    }

    /** The target the user should aim at now, in surface coordinates. */
    public getIdealCalibrationTarget(): (CalibrationTarget & { position: Point }) | null {
        const target = this.ideal?.currentTarget(this.boundaryRadiusAt) ?? null;
        if (!target) return null;
        const center = this.getEffectiveCenter();
        return { ...target, position: { x: center.x + target.offset.x, y: center.y + target.offset.y } };
    }

    private captureIdealSample(): void {
        const session = this.ideal;
        if (!session?.isActive() || this.state === 'CANCELING') return;
        const calibration = this.getCalibration();
        const center = calibration.getEffectiveCenter();
        const gains = calibration.getGains();
        session.capture(
            { x: (this.pointer.x - center.x) * gains.x, y: (this.pointer.y - center.y) * gains.y },
            this.boundaryRadiusAt
        );
    }

    private requireIdeal(): IdealCalibrationSession {
        if (!this.ideal) {
            throw new WidgetNotInitializedError(this.name);
        }
        return this.ideal;
    }

    // ── Diagonal handles ─────────────────────────────────────────────────────

    public getDiagonalHandlePositions(): Record<Quadrant, Point> | undefined {
        return this.getCalibration().getDiagonalHandlePositions();
    }

    public updateDiagonalOffset(quadrant: Quadrant, dx: number, dy: number): boolean {
        return this.getCalibration().updateDiagonalOffset(quadrant, dx, dy);
    }
}
