/**
 * CalibrationStore Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    createDefaultCalibration,
    fromCalibrationRecord,
    loadCalibration,
    saveCalibration,
    toCalibrationRecord
} from './CalibrationStore';
import { DiagnosticLog, SyncErrorCode } from '../shared/errors';
import { CalibrationTransform } from './types';

describe('CalibrationStore', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'calibration-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('round-trips a calibration through save and load', () => {
        const calibration: CalibrationTransform = {
            positionOffset: { x: 0.05, y: -0.12, z: 0.3 },
            rotationOffsetEuler: { x: 1.5, y: -2, z: 90 },
            fieldOfViewDeg: 92.5
        };
        const file = path.join(dir, 'nested', 'config', 'calibration.json');

        saveCalibration(file, calibration);
        const loaded = loadCalibration(file);

        expect(loaded.found).toBe(true);
        expect(loaded.calibration).toEqual(calibration);
        expect(loaded.diagnostics).toHaveLength(0);
    });

    it('writes the on-disk record shape', () => {
        const file = path.join(dir, 'calibration.json');
        saveCalibration(file, {
            positionOffset: { x: 1, y: 2, z: 3 },
            rotationOffsetEuler: { x: 4, y: 5, z: 6 },
            fieldOfViewDeg: 70
        });

        expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
            offset_pos: [1, 2, 3],
            offset_rot_euler: [4, 5, 6],
            fov: 70
        });
    });

    it('overwrites an existing file', () => {
        const file = path.join(dir, 'calibration.json');
        saveCalibration(file, { ...createDefaultCalibration(), fieldOfViewDeg: 80 });
        saveCalibration(file, { ...createDefaultCalibration(), fieldOfViewDeg: 110 });

        expect(loadCalibration(file).calibration.fieldOfViewDeg).toBe(110);
    });

    it('returns defaults when the file is missing', () => {
        const loaded = loadCalibration(path.join(dir, 'absent.json'));

        expect(loaded.found).toBe(false);
        expect(loaded.calibration).toEqual(createDefaultCalibration());
        expect(loaded.diagnostics.map(d => d.code)).toEqual([SyncErrorCode.CALIBRATION_NOT_FOUND]);
    });

    it('returns defaults and reports an unparsable file', () => {
        const file = path.join(dir, 'calibration.json');
        fs.writeFileSync(file, '{ not json');

        const loaded = loadCalibration(file);

        expect(loaded.found).toBe(true);
        expect(loaded.calibration).toEqual(createDefaultCalibration());
        expect(loaded.diagnostics.map(d => d.code)).toEqual([SyncErrorCode.INVALID_CALIBRATION]);
    });

    it('fills missing keys with their defaults', () => {
        const file = path.join(dir, 'calibration.json');
        fs.writeFileSync(file, JSON.stringify({ offset_pos: [0, 0.5, 0] }));

        const loaded = loadCalibration(file);

        expect(loaded.calibration).toEqual({
            positionOffset: { x: 0, y: 0.5, z: 0 },
            rotationOffsetEuler: { x: 0, y: 0, z: 0 },
            fieldOfViewDeg: 100
        });
        expect(loaded.diagnostics).toHaveLength(0);
    });
});

describe('calibration record conversion', () => {
    it('reports invalid keys and keeps the valid ones', () => {
        const diagnostics = new DiagnosticLog('test');
        const calibration = fromCalibrationRecord({ offset_pos: [1, 2], offset_rot_euler: [0, 0, 45], fov: 'wide' }, diagnostics);

        expect(calibration).toEqual({
            positionOffset: { x: 0, y: 0, z: 0 },
            rotationOffsetEuler: { x: 0, y: 0, z: 45 },
            fieldOfViewDeg: 100
        });
        expect(diagnostics.count(SyncErrorCode.INVALID_CALIBRATION)).toBe(2);
    });

    it('rejects a record that is not an object', () => {
        const diagnostics = new DiagnosticLog('test');

        expect(fromCalibrationRecord([1, 2, 3], diagnostics)).toEqual(createDefaultCalibration());
        expect(diagnostics.has(SyncErrorCode.INVALID_CALIBRATION)).toBe(true);
    });

    it('clamps an out-of-range field of view', () => {
        const diagnostics = new DiagnosticLog('test');
        expect(fromCalibrationRecord({ fov: 180 }, diagnostics).fieldOfViewDeg).toBe(179);
    });

    it('converts a transform to its record', () => {
        expect(toCalibrationRecord(createDefaultCalibration())).toEqual({
            offset_pos: [0, 0, 0],
            offset_rot_euler: [0, 0, 0],
            fov: 100
        });
    });
});
