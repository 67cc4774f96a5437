import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fc from 'fast-check';
import { PluginSupervisor } from '../../src/kernel/plugin_supervisor';
import { PointerIdAllocator } from '../../src/kernel/pointer_id_allocator';
import { TouchAction } from '../../src/kernel/schemas';
import { WalkJoystickPlugin, computeHoldDurationSec } from '../../src/plugins/walk_joystick_plugin';

const SURFACE = { width: 1920, height: 1080 };
// Widget centered at (200, 800) with a 100px output radius.
const RECT = { x: 100, y: 700, width: 200, height: 200 };
// 300px right of the default input center (960, 540).
const POINTER_RIGHT = { x: 1260, y: 540 };
// Hold for a 300px click on a 1920x1080 surface: 300 / 1101.45 * 5s.
const HOLD_MS = 1362;

interface Sent {
    at: number;
    action: number;
    pointerId: number;
    x: number;
    y: number;
}

async function setup(pointerIds?: PointerIdAllocator) {
    const supervisor = new PluginSupervisor(SURFACE, pointerIds ? { pointerIds } : {});
    const walk = new WalkJoystickPlugin('walk', RECT);
    const sent: Sent[] = [];
    supervisor.getEventBus().subscribe('CONTROL_MSG', event => {
        sent.push({ at: Date.now(), action: event.action, pointerId: event.pointerId, x: event.x, y: event.y });
    });
    supervisor.registerPlugin(walk);
    await supervisor.initAll();
    await supervisor.startAll();
    return { supervisor, walk, sent };
}

describe('computeHoldDurationSec', () => {
    it('Given the pointer on the center, Then the minimum hold applies', () => {
        expect(computeHoldDurationSec(0, SURFACE)).toBe(0.5);
    });

    it('Given the pointer half a diagonal away or more, Then the maximum hold applies', () => {
        expect(computeHoldDurationSec(5000, SURFACE)).toBe(5);
    });

    it('Given an unusable distance, Then the minimum hold applies', () => {
        expect(computeHoldDurationSec(Number.NaN, SURFACE)).toBe(0.5);
    });

    it('Then the hold stays within its bounds and grows with distance', () => {
        fc.assert(
            fc.property(
                fc.double({ min: 0, max: 1e5, noNaN: true }),
                fc.double({ min: 0, max: 1e5, noNaN: true }),
                (a, b) => {
                    const [near, far] = a <= b ? [a, b] : [b, a];
                    const shortHold = computeHoldDurationSec(near, SURFACE);
                    const longHold = computeHoldDurationSec(far, SURFACE);
                    return shortHold >= 0.5 && longHold <= 5 && shortHold <= longHold;
                }
            )
        );
    });
});

describe('WalkJoystickPlugin', () => {
    beforeEach(() => {
        jest.useFakeTimers({ now: 0 });
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    it('Given a short click, Then the stick slides out in six steps and holds for the distance-based time', async () => {
        const { walk, sent } = await setup();

        expect(walk.press(POINTER_RIGHT)).toBe(true);
        await jest.advanceTimersByTimeAsync(50);
        walk.release();
        await jest.advanceTimersByTimeAsync(100);
        expect(walk.getState()).toBe('HOLDING');

        await jest.advanceTimersByTimeAsync(HOLD_MS + 100);

        expect(sent).toEqual([
            { at: 0, action: TouchAction.DOWN, pointerId: 0, x: 200, y: 800 },
            { at: 20, action: TouchAction.MOVE, pointerId: 0, x: 216, y: 800 },
            { at: 40, action: TouchAction.MOVE, pointerId: 0, x: 233, y: 800 },
            { at: 60, action: TouchAction.MOVE, pointerId: 0, x: 250, y: 800 },
            { at: 80, action: TouchAction.MOVE, pointerId: 0, x: 266, y: 800 },
            { at: 100, action: TouchAction.MOVE, pointerId: 0, x: 283, y: 800 },
            { at: 120, action: TouchAction.MOVE, pointerId: 0, x: 300, y: 800 },
            { at: 140 + HOLD_MS, action: TouchAction.UP, pointerId: 0, x: 300, y: 800 },
        ]);
        expect(walk.getState()).toBe('INACTIVE');
    });

    it('Given a long press, Then release lifts the finger immediately', async () => {
        const { walk, sent } = await setup();

        walk.press(POINTER_RIGHT);
        await jest.advanceTimersByTimeAsync(400);
        walk.release();

        const last = sent[sent.length - 1];
        expect(last).toEqual({ at: 400, action: TouchAction.UP, pointerId: 0, x: 300, y: 800 });
        expect(sent.filter(event => event.action === TouchAction.MOVE)).toHaveLength(6);
    });

    it('Given the button held past the threshold, Then the stick follows the pointer', async () => {
        const { walk, sent } = await setup();

        walk.press(POINTER_RIGHT);
        await jest.advanceTimersByTimeAsync(350);
        expect(walk.motion({ x: 960, y: 240 })).toBe(true);

        expect(sent[sent.length - 1]).toEqual({ at: 350, action: TouchAction.MOVE, pointerId: 0, x: 200, y: 700 });

        walk.release();
        expect(sent[sent.length - 1]).toEqual({ at: 350, action: TouchAction.UP, pointerId: 0, x: 200, y: 700 });
    });

    it('Given motion before the threshold, Then the stick stays on the pressed target', async () => {
        const { walk, sent } = await setup();

        walk.press(POINTER_RIGHT);
        await jest.advanceTimersByTimeAsync(200);
        walk.motion({ x: 960, y: 240 });

        expect(sent[sent.length - 1]).toEqual({ at: 200, action: TouchAction.MOVE, pointerId: 0, x: 300, y: 800 });
    });

    it('Given a short click that is already released, Then motion while holding keeps the clicked target', async () => {
        const { walk, sent } = await setup();

        walk.press(POINTER_RIGHT);
        await jest.advanceTimersByTimeAsync(50);
        walk.release();
        await jest.advanceTimersByTimeAsync(550);
        expect(walk.getState()).toBe('HOLDING');

        walk.motion({ x: 960, y: 240 });
        expect(sent[sent.length - 1]).toEqual({ at: 600, action: TouchAction.MOVE, pointerId: 0, x: 300, y: 800 });

        await jest.advanceTimersByTimeAsync(1000);
        expect(sent[sent.length - 1]).toEqual({ at: 140 + HOLD_MS, action: TouchAction.UP, pointerId: 0, x: 300, y: 800 });
    });

    it('Given a second click while holding, Then the stick jumps to the new target and the hold restarts', async () => {
        const { walk, sent } = await setup();

        walk.press(POINTER_RIGHT);
        walk.release();
        await jest.advanceTimersByTimeAsync(500);

        expect(walk.press({ x: 960, y: 840 })).toBe(true);
        expect(sent[sent.length - 1]).toEqual({ at: 500, action: TouchAction.MOVE, pointerId: 0, x: 200, y: 900 });
        await jest.advanceTimersByTimeAsync(50);
        walk.release();

        await jest.advanceTimersByTimeAsync(HOLD_MS - 1);
        expect(walk.getState()).toBe('HOLDING');
        await jest.advanceTimersByTimeAsync(1);
        expect(sent[sent.length - 1]).toEqual({ at: 550 + HOLD_MS, action: TouchAction.UP, pointerId: 0, x: 200, y: 900 });
    });

    it('Given no free pointer id, Then the press is refused and nothing is sent', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const { walk, sent } = await setup(new PointerIdAllocator({ maxPointers: 0 }));

        expect(walk.press(POINTER_RIGHT)).toBe(false);
        await jest.advanceTimersByTimeAsync(500);

        expect(walk.getState()).toBe('INACTIVE');
        expect(sent).toEqual([]);
    });

    it('Given edit mode, Then presses are ignored', async () => {
        const { supervisor, walk, sent } = await setup();
        await supervisor.stopAll();

        expect(walk.press(POINTER_RIGHT)).toBe(false);
        expect(walk.press()).toBe(false);
        expect(sent).toEqual([]);
    });

    it('Given stop mid-slide, Then the finger lifts, timers die and the pointer id is freed', async () => {
        const { supervisor, walk, sent } = await setup();

        walk.press(POINTER_RIGHT);
        await jest.advanceTimersByTimeAsync(50);
        await supervisor.stopAll();
        await jest.advanceTimersByTimeAsync(5000);

        expect(sent.map(event => [event.at, event.action])).toEqual([
            [0, TouchAction.DOWN],
            [20, TouchAction.MOVE],
            [40, TouchAction.MOVE],
            [50, TouchAction.UP],
        ]);
        expect(walk.getState()).toBe('INACTIVE');
        expect(supervisor.getContext().pointerIds.activeCount()).toBe(0);
        expect(supervisor.getContext().timers.pendingCount('walk')).toBe(0);
    });

    it('Then every DOWN is paired with an UP on the same pointer id', async () => {
        const { walk, sent } = await setup();

        for (let i = 0; i < 3; i++) {
            walk.press(POINTER_RIGHT);
            await jest.advanceTimersByTimeAsync(400);
            walk.release();
        }

        const downs = sent.filter(event => event.action === TouchAction.DOWN);
        const ups = sent.filter(event => event.action === TouchAction.UP);
        expect(downs).toHaveLength(3);
        expect(ups.map(event => event.pointerId)).toEqual(downs.map(event => event.pointerId));
    });

    it('Given a calibrated center and gains, Then they shape the target', async () => {
        const { walk, sent } = await setup();
        walk.getCalibration().applyCenter(500, 500);
        walk.getCalibration().applyGains(2, 1);

        walk.press({ x: 500, y: 400 });
        await jest.advanceTimersByTimeAsync(400);
        walk.release();

        expect(sent[sent.length - 1]).toEqual({ at: 400, action: TouchAction.UP, pointerId: 0, x: 200, y: 700 });
    });
});
