import type { Point } from './types';
import type { TouchEvent } from './schemas';

export type OverlayAction =
    | 'register'
    | 'unregister'
    | 'start'
    | 'stop'
    | 'refresh'
    | 'tune_start'
    | 'tune_stop';

export interface OverlaySignal {
    action: OverlayAction;
    widgetId: string;
}

export interface ControllerEvents {
    /** Touch events headed for the external transport. */
    CONTROL_MSG: TouchEvent;
    OVERLAY: OverlaySignal;
    MOUSE_MOTION: Point;
    /** Click on the calibration mask while a widget is in capture mode. */
    MASK_CLICKED: Point;
    /** Position of the cancel-casting button the skill gesture should slide to. */
    CANCEL_CASTING: Point;
}

type Listener<K extends keyof ControllerEvents> = (payload: ControllerEvents[K]) => void;

export class EventBus {
    private subscribers: { [K in keyof ControllerEvents]?: Set<Listener<K>> } = {};

    public subscribe<K extends keyof ControllerEvents>(
        channel: K,
        listener: Listener<K>
    ): () => void {
        let channelSubscribers: Set<Listener<K>> | undefined = this.subscribers[channel];
        if (!channelSubscribers) {
            channelSubscribers = new Set();
            this.subscribers[channel] = channelSubscribers;
        }
        channelSubscribers.add(listener);

        return () => {
            const subs: Set<Listener<K>> | undefined = this.subscribers[channel];
            if (subs) {
                subs.delete(listener);
            }
        };
    }

    public publish<K extends keyof ControllerEvents>(
        channel: K,
        payload: ControllerEvents[K]
    ): boolean {
        const channelSubscribers: Set<Listener<K>> | undefined = this.subscribers[channel];
        if (!channelSubscribers || channelSubscribers.size === 0) {
            return false;
        }

        // Snapshot: a listener may unsubscribe itself while we iterate.
        for (const listener of Array.from(channelSubscribers)) {
            listener(payload);
        }

        return true;
    }

    public listenerCount<K extends keyof ControllerEvents>(channel: K): number {
        return this.subscribers[channel]?.size ?? 0;
    }
}
