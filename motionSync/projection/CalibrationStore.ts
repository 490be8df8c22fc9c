/**
 * Calibration persistence.
 *
 * On disk: { "offset_pos": [x, y, z], "offset_rot_euler": [x, y, z], "fov": degrees }
 * Missing file → defaults. Missing or invalid keys → that key's default, reported.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CAMERA } from '../shared/constants';
import { DiagnosticLog, SyncDiagnostic, SyncErrorCode, describeError } from '../shared/errors';
import { SyncLogger } from '../shared/SyncLogger';
import { Vector3 } from '../shared/types';
import { Vector3Service } from '../shared/Vector3Service';
import { sanitizeFieldOfView } from './CameraIntrinsics';
import { CalibrationRecord, CalibrationTransform } from './types';

const LOG_CATEGORY = 'CalibrationStore';

export interface LoadedCalibration {
    calibration: CalibrationTransform;
    found: boolean;
    diagnostics: readonly SyncDiagnostic[];
}

export function createDefaultCalibration(): CalibrationTransform {
    return {
        positionOffset: Vector3Service.zero(),
        rotationOffsetEuler: Vector3Service.zero(),
        fieldOfViewDeg: CAMERA.DEFAULT_FOV_DEG
    };
}

function isVectorTuple(value: unknown): value is [number, number, number] {
    return Array.isArray(value) && value.length === 3 &&
        value.every(v => typeof v === 'number' && Number.isFinite(v));
}

function readVector(record: Record<string, unknown>, key: string, diagnostics: DiagnosticLog): Vector3 {
    const value = record[key];
    if (value === undefined) return Vector3Service.zero();
    if (!isVectorTuple(value)) {
        diagnostics.report(SyncErrorCode.INVALID_CALIBRATION, `"${key}" must be three numbers, using [0, 0, 0]`);
        return Vector3Service.zero();
    }
    return Vector3Service.fromArray(value);
}

export function toCalibrationRecord(calibration: CalibrationTransform): CalibrationRecord {
    return {
        offset_pos: Vector3Service.toArray(calibration.positionOffset),
        offset_rot_euler: Vector3Service.toArray(calibration.rotationOffsetEuler),
        fov: calibration.fieldOfViewDeg
    };
}

/**
 * Reads an untrusted parsed record; every absent or invalid key falls back to its default.
 */
export function fromCalibrationRecord(record: unknown, diagnostics: DiagnosticLog): CalibrationTransform {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
        diagnostics.report(SyncErrorCode.INVALID_CALIBRATION, 'Calibration record is not an object, using defaults');
        return createDefaultCalibration();
    }

    const fields: Record<string, unknown> = { ...record };
    const fov = fields.fov;
    let fieldOfViewDeg: number = CAMERA.DEFAULT_FOV_DEG;
    if (typeof fov === 'number') {
        fieldOfViewDeg = sanitizeFieldOfView(fov, diagnostics);
    } else if (fov !== undefined) {
        diagnostics.report(SyncErrorCode.INVALID_CALIBRATION, `"fov" must be a number, using ${CAMERA.DEFAULT_FOV_DEG}`);
    }

    return {
        positionOffset: readVector(fields, 'offset_pos', diagnostics),
        rotationOffsetEuler: readVector(fields, 'offset_rot_euler', diagnostics),
        fieldOfViewDeg
    };
}

export function loadCalibration(filePath: string): LoadedCalibration {
    const diagnostics = new DiagnosticLog(LOG_CATEGORY);

    if (!fs.existsSync(filePath)) {
        diagnostics.report(SyncErrorCode.CALIBRATION_NOT_FOUND, 'No calibration file, using defaults', {
            severity: 'info',
            source: filePath
        });
        return { calibration: createDefaultCalibration(), found: false, diagnostics: diagnostics.getAll() };
    }

    let record: unknown;
    try {
        record = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        diagnostics.report(SyncErrorCode.INVALID_CALIBRATION, `Unreadable calibration, using defaults: ${describeError(error)}`, {
            source: filePath
        });
        return { calibration: createDefaultCalibration(), found: true, diagnostics: diagnostics.getAll() };
    }

    const calibration = fromCalibrationRecord(record, diagnostics);
    SyncLogger.info(LOG_CATEGORY, `Loaded calibration from ${filePath}`, toCalibrationRecord(calibration));
    return { calibration, found: true, diagnostics: diagnostics.getAll() };
}

/**
 * Writes the calibration record, creating parent directories and overwriting any existing file.
 */
export function saveCalibration(filePath: string, calibration: CalibrationTransform): void {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }

    fs.writeFileSync(filePath, JSON.stringify(toCalibrationRecord(calibration), null, 2));
    SyncLogger.info(LOG_CATEGORY, `Saved calibration to ${filePath}`);
}
