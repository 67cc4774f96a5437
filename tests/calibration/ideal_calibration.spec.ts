import { describe, it, expect, jest, afterEach } from '@jest/globals';
import {
    CalibrationMapRepository,
    IDEAL_DATA_KEY,
    IdealCalibrationSession,
    applyCalibrationToVector,
    buildCalibrationMap,
    buildTargetAngles,
    interpolateAdjustment,
} from '../../src/calibration/ideal_calibration';
import { ConfigStore } from '../../src/kernel/config_store';
import type { CalibrationMap } from '../../src/kernel/schemas';

const QUARTERS: CalibrationMap = {
    bins: 4,
    angles: [0, 90, 180, 270],
    angleOffsets: [0, 10, 20, 30],
    radiusScales: [1, 1.2, 1.4, 1.6],
};

describe('buildTargetAngles', () => {
    it('Then headings are evenly spaced from zero', () => {
        expect(buildTargetAngles(4)).toEqual([0, 90, 180, 270]);
        expect(buildTargetAngles(16)[1]).toBe(22.5);
        expect(buildTargetAngles(0)).toEqual([]);
    });
});

describe('buildCalibrationMap', () => {
    it('Given samples, Then offsets and scales are averaged per heading', () => {
        const map = buildCalibrationMap([
            { targetAngle: 0, targetRadius: 100, cursorAngle: 350, cursorRadius: 120 },
            { targetAngle: 90, targetRadius: 100, cursorAngle: 100, cursorRadius: 50 },
            { targetAngle: 90, targetRadius: 100, cursorAngle: 110, cursorRadius: 300 },
        ]);
        expect(map).toEqual({
            bins: 2,
            angles: [0, 90],
            angleOffsets: [-10, 15],
            radiusScales: [1.2, 1.25],
        });
    });

    it('Given no samples, Then there is no map', () => {
        expect(buildCalibrationMap([])).toBeNull();
    });
});

describe('interpolateAdjustment', () => {
    it('Given a heading between two bins, Then it blends linearly', () => {
        const adjustment = interpolateAdjustment(QUARTERS, 45);
        expect(adjustment.offset).toBeCloseTo(5, 12);
        expect(adjustment.scale).toBeCloseTo(1.1, 12);
    });

    it('Given a heading past the last bin, Then it wraps toward the first', () => {
        const adjustment = interpolateAdjustment(QUARTERS, 315);
        expect(adjustment.offset).toBeCloseTo(15, 12);
        expect(adjustment.scale).toBeCloseTo(1.3, 12);
    });

    it('Given a heading on the first bin, Then that bin applies', () => {
        const adjustment = interpolateAdjustment(QUARTERS, 0);
        expect(adjustment.offset).toBeCloseTo(0, 12);
        expect(adjustment.scale).toBeCloseTo(1, 12);
    });
});

describe('applyCalibrationToVector', () => {
    const single: CalibrationMap = { bins: 1, angles: [0], angleOffsets: [90], radiusScales: [2] };

    it('Given a map, Then the heading is rotated by the offset and the length scaled', () => {
        const corrected = applyCalibrationToVector({ x: 10, y: 0 }, single);
        expect(corrected.x).toBeCloseTo(0, 9);
        expect(corrected.y).toBeCloseTo(20, 9);
    });

    it('Given no map or a zero vector, Then the vector is unchanged', () => {
        expect(applyCalibrationToVector({ x: 3, y: 4 }, undefined)).toEqual({ x: 3, y: 4 });
        expect(applyCalibrationToVector({ x: 0, y: 0 }, single)).toEqual({ x: 0, y: 0 });
    });
});

describe('CalibrationMapRepository', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('Given a stored map, Then it reads back per skill and clears', () => {
        const repository = new CalibrationMapRepository(new ConfigStore());
        repository.set('Q', QUARTERS);

        expect(repository.get('Q')).toEqual(QUARTERS);
        expect(repository.get('E')).toBeUndefined();
        expect(repository.clear('Q')).toBe(true);
        expect(repository.clear('Q')).toBe(false);
        expect(repository.getAll()).toEqual({});
    });

    it('Given unreadable JSON, Then it is ignored with a warning', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const repository = new CalibrationMapRepository(new ConfigStore({ [IDEAL_DATA_KEY]: '{not json' }));
        expect(repository.getAll()).toEqual({});
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('Given JSON of the wrong shape, Then it is ignored', () => {
        const config = new ConfigStore({ [IDEAL_DATA_KEY]: JSON.stringify({ Q: { bins: 2, angles: [0] } }) });
        expect(new CalibrationMapRepository(config).getAll()).toEqual({});
    });
});

describe('IdealCalibrationSession', () => {
    const radiusAt = (): number => 100;

    function setup() {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const repository = new CalibrationMapRepository(new ConfigStore());
        const onChange = jest.fn();
        return { repository, onChange, session: new IdealCalibrationSession(repository, onChange) };
    }

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('Given a started session, Then the first target sits at 95% of the boundary straight right', () => {
        const { session } = setup();
        expect(session.start('Q', 16)).toBe(true);
        expect(session.start('Q', 16)).toBe(false);
        expect(session.progress()).toEqual({ recorded: 0, total: 16 });
        expect(session.currentTarget(radiusAt)).toEqual({ angle: 0, radius: 95, offset: { x: 95, y: 0 } });
    });

    it('Given an unsupported sample count, Then sixteen targets are used', () => {
        const { session } = setup();
        session.start('Q', 7);
        expect(session.progress().total).toBe(16);
        session.stop(false);
        session.start('Q', 32);
        expect(session.progress().total).toBe(32);
    });

    it('Given a capture, Then it waits for confirmation before the next target', () => {
        const { session } = setup();
        session.start('Q', 16);

        expect(session.capture({ x: 114, y: 0 }, radiusAt)).toBe(true);
        expect(session.isAwaitingConfirmation()).toBe(true);
        expect(session.capture({ x: 114, y: 0 }, radiusAt)).toBe(false);

        expect(session.redo()).toBe(true);
        expect(session.progress().recorded).toBe(0);

        session.capture({ x: 114, y: 0 }, radiusAt);
        expect(session.confirm(true)).toBe(true);
        expect(session.progress().recorded).toBe(1);
        expect(session.currentTarget(radiusAt)?.angle).toBe(22.5);
    });

    it('Given a zero cursor offset, Then nothing is captured', () => {
        const { session } = setup();
        session.start('Q', 16);
        expect(session.capture({ x: 0, y: 0 }, radiusAt)).toBe(false);
    });

    it('Given every target recorded, Then the map is saved and the session ends', () => {
        const { session, repository } = setup();
        session.start('Q', 16);
        for (let i = 0; i < 16; i++) {
            const target = session.currentTarget(radiusAt);
            if (!target) throw new Error('target expected');
            session.capture({ x: target.offset.x * 1.2, y: target.offset.y * 1.2 }, radiusAt);
            session.confirm(true);
        }

        expect(session.isActive()).toBe(false);
        const map = repository.get('Q');
        expect(map?.bins).toBe(16);
        map?.radiusScales.forEach(scale => expect(scale).toBeCloseTo(1.2, 9));
        map?.angleOffsets.forEach(offset => expect(offset).toBeCloseTo(0, 6));
    });

    it('Given stop with savePartial, Then the samples so far are saved', () => {
        const { session, repository, onChange } = setup();
        session.start('Q', 16);
        session.capture({ x: 95, y: 0 }, radiusAt);
        session.confirm(true);

        const map = session.stop(true);

        expect(map).toEqual({ bins: 1, angles: [0], angleOffsets: [0], radiusScales: [1] });
        expect(repository.get('Q')).toEqual(map);
        expect(onChange).toHaveBeenCalledTimes(4);
    });

    it('Given stop without savePartial, Then nothing is saved', () => {
        const { session, repository } = setup();
        session.start('Q', 16);
        session.capture({ x: 95, y: 0 }, radiusAt);
        session.confirm(true);

        expect(session.stop(false)).toBeNull();
        expect(repository.get('Q')).toBeUndefined();
        expect(session.stop(false)).toBeNull();
    });
});
