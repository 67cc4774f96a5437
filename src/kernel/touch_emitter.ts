import type { EventBus } from './event_bus';
import type { PointerIdAllocator } from './pointer_id_allocator';
import type { Point, SurfaceSize } from './types';
import { BUTTON_PRIMARY, TouchAction, TouchEvent, TouchEventSchema } from './schemas';

/**
 * Formats DOWN/MOVE/UP frames for one widget and publishes them on CONTROL_MSG.
 * The pointer id is looked up at emit time; without one nothing is sent.
 */
export class TouchEmitter {
    constructor(
        private readonly ownerId: string,
        private readonly eventBus: EventBus,
        private readonly pointerIds: PointerIdAllocator,
        private readonly surface: SurfaceSize
    ) {}

    public emit(action: TouchAction, position: Point): TouchEvent | null {
        const pointerId = this.pointerIds.getAllocatedId(this.ownerId);
        if (pointerId === null) {
            return null;
        }
        const released = action === TouchAction.UP;
        const candidate = {
            action,
            pointerId,
            x: Math.trunc(position.x),
            y: Math.trunc(position.y),
            surfaceWidth: this.surface.width,
            surfaceHeight: this.surface.height,
            pressure: released ? 0.0 : 1.0,
            actionButton: BUTTON_PRIMARY,
            buttons: released ? 0 : BUTTON_PRIMARY,
        };
        const parsed = TouchEventSchema.safeParse(candidate);
        if (!parsed.success) {
            console.warn(`[TouchEmitter] Dropping invalid touch event from ${this.ownerId}:`, parsed.error.issues);
            return null;
        }
        this.eventBus.publish('CONTROL_MSG', parsed.data);
        return parsed.data;
    }

    public down(position: Point): TouchEvent | null {
        return this.emit(TouchAction.DOWN, position);
    }

    public move(position: Point): TouchEvent | null {
        return this.emit(TouchAction.MOVE, position);
    }

    public up(position: Point): TouchEvent | null {
        return this.emit(TouchAction.UP, position);
    }
}
