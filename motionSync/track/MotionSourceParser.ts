/**
 * MotionSourceParser - validates one motion source record and extracts its first trajectory.
 *
 * Problems are reported to the DiagnosticLog and never thrown:
 * - no trajectory list / empty list     → source skipped (MISSING_TRAJECTORY)
 * - no timestamps or poses              → source skipped (MISSING_FIELDS)
 * - non-numeric values                  → source skipped (MALFORMED_SOURCE)
 * - array lengths disagree              → truncated to the shortest (LENGTH_MISMATCH)
 * - no samples left                     → source skipped (EMPTY_TRAJECTORY)
 */

import { Pose } from '../shared/types';
import { QuaternionService } from '../shared/QuaternionService';
import { Vector3Service } from '../shared/Vector3Service';
import { DiagnosticLog, SyncErrorCode } from '../shared/errors';
import { NamedMotionSource, ParsedTrajectory, PoseTuple } from './types';

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every(isFiniteNumber);
}

function isPoseTupleArray(value: unknown): value is PoseTuple[] {
    return Array.isArray(value) && value.every(isNumberArray);
}

function isOptionalPoseTupleArray(value: unknown): value is PoseTuple[] | undefined {
    return value === undefined || isPoseTupleArray(value);
}

/**
 * Converts a [px, py, pz, qx, qy, qz, qw] tuple into a Pose.
 * Fewer than 3 elements → origin; fewer than 7 → identity rotation.
 */
export function poseFromTuple(tuple: readonly number[]): Pose {
    const position = tuple.length >= 3 ? Vector3Service.fromArray(tuple) : Vector3Service.zero();
    const rotation = tuple.length >= 7
        ? QuaternionService.normalize(QuaternionService.fromScalarLast(tuple.slice(3, 7)))
        : QuaternionService.createIdentity();

    return { position, rotation, gripper: 0 };
}

/**
 * Extracts the first trajectory of a source, or null when the source contributes nothing.
 */
export function parseMotionSource(source: NamedMotionSource, diagnostics: DiagnosticLog): ParsedTrajectory | null {
    const { name, record } = source;

    if (!isRecord(record) || !Array.isArray(record.trajectories) || record.trajectories.length === 0) {
        diagnostics.report(SyncErrorCode.MISSING_TRAJECTORY, 'No trajectories found', { source: name });
        return null;
    }

    const trajectory: unknown = record.trajectories[0];
    if (!isRecord(trajectory) || trajectory.timestamps === undefined || trajectory.poses === undefined) {
        diagnostics.report(SyncErrorCode.MISSING_FIELDS, 'Missing timestamps or poses in trajectory', { source: name });
        return null;
    }

    const { timestamps, poses } = trajectory;
    const leftEye = trajectory.left_eye_poses;
    const rightEye = trajectory.right_eye_poses;

    if (!isNumberArray(timestamps) || !isPoseTupleArray(poses)) {
        diagnostics.report(SyncErrorCode.MALFORMED_SOURCE, 'Timestamps or poses are not numeric arrays', { source: name });
        return null;
    }
    if (!isOptionalPoseTupleArray(leftEye) || !isOptionalPoseTupleArray(rightEye)) {
        diagnostics.report(SyncErrorCode.MALFORMED_SOURCE, 'Eye pose arrays are not numeric', { source: name });
        return null;
    }

    const lengths: Record<string, number> = {
        timestamps: timestamps.length,
        poses: poses.length
    };
    if (leftEye !== undefined) lengths.left_eye_poses = leftEye.length;
    if (rightEye !== undefined) lengths.right_eye_poses = rightEye.length;

    const counts = Object.values(lengths);
    const commonLength = Math.min(...counts);
    if (counts.some(count => count !== commonLength)) {
        diagnostics.report(
            SyncErrorCode.LENGTH_MISMATCH,
            `Array lengths differ, truncating to ${commonLength}`,
            { source: name, details: lengths }
        );
    }
    if (commonLength === 0) {
        diagnostics.report(SyncErrorCode.EMPTY_TRAJECTORY, 'Trajectory has no samples', { source: name, details: lengths });
        return null;
    }

    return {
        source: name,
        timestamps: timestamps.slice(0, commonLength),
        poses: poses.slice(0, commonLength).map(poseFromTuple),
        leftEye: leftEye !== undefined ? leftEye.slice(0, commonLength).map(poseFromTuple) : null,
        rightEye: rightEye !== undefined ? rightEye.slice(0, commonLength).map(poseFromTuple) : null
    };
}
