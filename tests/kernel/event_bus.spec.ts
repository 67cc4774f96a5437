import { describe, it, expect, jest } from '@jest/globals';
import { EventBus } from '../../src/kernel/event_bus';

describe('EventBus', () => {
    it('Given a subscriber, Then it receives the published payload', () => {
        const bus = new EventBus();
        const listener = jest.fn();
        bus.subscribe('MOUSE_MOTION', listener);

        expect(bus.publish('MOUSE_MOTION', { x: 3, y: 4 })).toBe(true);
        expect(listener).toHaveBeenCalledWith({ x: 3, y: 4 });
    });

    it('Given two subscribers on one channel, Then both receive the event', () => {
        const bus = new EventBus();
        const first = jest.fn();
        const second = jest.fn();
        bus.subscribe('OVERLAY', first);
        bus.subscribe('OVERLAY', second);

        bus.publish('OVERLAY', { action: 'refresh', widgetId: 'walk' });

        expect(first).toHaveBeenCalledWith({ action: 'refresh', widgetId: 'walk' });
        expect(second).toHaveBeenCalledWith({ action: 'refresh', widgetId: 'walk' });
    });

    it('Given an unsubscribed listener, Then it never fires and publish reports no delivery', () => {
        const bus = new EventBus();
        const listener = jest.fn();
        const unsubscribe = bus.subscribe('MASK_CLICKED', listener);
        unsubscribe();

        expect(bus.publish('MASK_CLICKED', { x: 1, y: 1 })).toBe(false);
        expect(listener).not.toHaveBeenCalled();
    });

    it('Given unsubscribe called twice, Then neither call throws', () => {
        const bus = new EventBus();
        const unsubscribe = bus.subscribe('MASK_CLICKED', jest.fn());
        expect(() => unsubscribe()).not.toThrow();
        expect(() => unsubscribe()).not.toThrow();
        expect(bus.listenerCount('MASK_CLICKED')).toBe(0);
    });

    it('Given a listener that unsubscribes itself mid-publish, Then later listeners still run', () => {
        const bus = new EventBus();
        const later = jest.fn();
        const unsubscribe = bus.subscribe('CANCEL_CASTING', () => unsubscribe());
        bus.subscribe('CANCEL_CASTING', later);

        bus.publish('CANCEL_CASTING', { x: 10, y: 20 });

        expect(later).toHaveBeenCalledTimes(1);
        expect(bus.listenerCount('CANCEL_CASTING')).toBe(1);
    });

    it('Given no subscribers at all, Then publish returns false', () => {
        const bus = new EventBus();
        expect(bus.publish('OVERLAY', { action: 'start', widgetId: 'skill' })).toBe(false);
    });

    it('Then channels are isolated from each other', () => {
        const bus = new EventBus();
        const motion = jest.fn();
        bus.subscribe('MOUSE_MOTION', motion);

        bus.publish('MASK_CLICKED', { x: 5, y: 5 });

        expect(motion).not.toHaveBeenCalled();
    });
});
