/**
 * CalibratedProjector - applies the operator calibration to poses and projects world points
 * into the camera image.
 *
 * Calibration and intrinsics are held as one frozen snapshot. setCalibration() builds a new
 * snapshot and swaps the reference, so a batch holding an older snapshot keeps reading a
 * consistent pair.
 *
 * Coordinate conventions:
 *   motion capture: +X right, +Y up, +Z forward
 *   image:          +u right, +v down
 * The single vertical sign flip in project() reconciles the two.
 */

import { CAMERA, DIAGNOSTIC_HISTORY_SIZE } from '../shared/constants';
import { DiagnosticLog } from '../shared/errors';
import { QuaternionService } from '../shared/QuaternionService';
import { SyncLogger } from '../shared/SyncLogger';
import { PixelPoint, Pose, Vector3 } from '../shared/types';
import { Vector3Service } from '../shared/Vector3Service';
import { computeIntrinsics, sanitizeFieldOfView } from './CameraIntrinsics';
import { createDefaultCalibration, loadCalibration, saveCalibration } from './CalibrationStore';
import {
    CalibrationDelta,
    CalibrationTransform,
    CameraIntrinsics,
    PoseOverlay,
    PoseOverlayOptions,
    ProjectOptions,
    ProjectionSnapshot,
    ProjectorOptions
} from './types';

const LOG_CATEGORY = 'CalibratedProjector';

function freezeCalibration(calibration: CalibrationTransform): Readonly<CalibrationTransform> {
    return Object.freeze({
        positionOffset: Object.freeze({ ...calibration.positionOffset }),
        rotationOffsetEuler: Object.freeze({ ...calibration.rotationOffsetEuler }),
        fieldOfViewDeg: calibration.fieldOfViewDeg
    });
}

export class CalibratedProjector {
    private readonly width: number;
    private readonly height: number;
    private readonly minDepth: number;
    private readonly diagnostics = new DiagnosticLog(LOG_CATEGORY, DIAGNOSTIC_HISTORY_SIZE);
    private snapshot: ProjectionSnapshot;

    constructor(options: ProjectorOptions = {}) {
        this.width = options.width ?? CAMERA.DEFAULT_WIDTH;
        this.height = options.height ?? CAMERA.DEFAULT_HEIGHT;
        this.minDepth = options.minDepth ?? CAMERA.MIN_PROJECTION_DEPTH;

        const calibration = { ...createDefaultCalibration(), ...options.calibration };
        calibration.fieldOfViewDeg = sanitizeFieldOfView(calibration.fieldOfViewDeg, this.diagnostics);
        this.snapshot = this.createSnapshot(calibration, null);

        SyncLogger.debug(LOG_CATEGORY, `Intrinsics ${this.width}x${this.height}`, this.snapshot.intrinsics);
    }

    /**
     * Projector with the calibration stored at filePath, or defaults when the file is absent.
     */
    static fromFile(filePath: string, options: Omit<ProjectorOptions, 'calibration'> = {}): CalibratedProjector {
        const { calibration } = loadCalibration(filePath);
        return new CalibratedProjector({ ...options, calibration });
    }

    // ─────────────────────────────────────────────────────────────────
    // Calibration state
    // ─────────────────────────────────────────────────────────────────

    getSnapshot(): ProjectionSnapshot {
        return this.snapshot;
    }

    getCalibration(): Readonly<CalibrationTransform> {
        return this.snapshot.calibration;
    }

    getIntrinsics(): Readonly<CameraIntrinsics> {
        return this.snapshot.intrinsics;
    }

    getDiagnostics(): DiagnosticLog {
        return this.diagnostics;
    }

    /**
     * Replaces the calibration with a new snapshot. Unspecified fields keep their current value.
     */
    setCalibration(patch: Partial<CalibrationTransform>): ProjectionSnapshot {
        const next: CalibrationTransform = { ...this.snapshot.calibration, ...patch };
        next.fieldOfViewDeg = sanitizeFieldOfView(next.fieldOfViewDeg, this.diagnostics);

        this.snapshot = this.createSnapshot(next, this.snapshot);
        return this.snapshot;
    }

    /**
     * Adds per-axis deltas to the current calibration (one operator adjustment step).
     */
    nudgeCalibration(delta: CalibrationDelta): ProjectionSnapshot {
        const current = this.snapshot.calibration;
        const addPartial = (base: Vector3, d: Partial<Vector3> = {}): Vector3 => ({
            x: base.x + (d.x ?? 0),
            y: base.y + (d.y ?? 0),
            z: base.z + (d.z ?? 0)
        });

        return this.setCalibration({
            positionOffset: addPartial(current.positionOffset, delta.position),
            rotationOffsetEuler: addPartial(current.rotationOffsetEuler, delta.rotation),
            fieldOfViewDeg: current.fieldOfViewDeg + (delta.fieldOfView ?? 0)
        });
    }

    resetCalibration(): ProjectionSnapshot {
        return this.setCalibration(createDefaultCalibration());
    }

    save(filePath: string): void {
        saveCalibration(filePath, this.snapshot.calibration);
    }

    // ─────────────────────────────────────────────────────────────────
    // Transform and projection
    // ─────────────────────────────────────────────────────────────────

    /**
     * Translates by the position offset and pre-multiplies the rotation by the calibration
     * rotation, i.e. the offset is applied in world space before the pose's own orientation.
     */
    applyCalibration(pose: Pose, calibration: Readonly<CalibrationTransform> = this.snapshot.calibration): Pose {
        const offsetRotation = QuaternionService.fromEulerXYZ(calibration.rotationOffsetEuler);

        return {
            position: Vector3Service.add(pose.position, calibration.positionOffset),
            rotation: QuaternionService.normalize(QuaternionService.multiply(offsetRotation, pose.rotation)),
            gripper: pose.gripper
        };
    }

    /**
     * Projects a world point into pixel coordinates as seen from cameraPose.
     * Null when the point is at or behind the minimum depth, or outside the image with boundsCheck.
     */
    project(pointWorld: Vector3, cameraPose: Pose, options: ProjectOptions = {}): PixelPoint | null {
        const intrinsics = (options.snapshot ?? this.snapshot).intrinsics;

        // World → camera local frame
        const toPoint = Vector3Service.sub(pointWorld, cameraPose.position);
        const local = QuaternionService.rotate(QuaternionService.inverse(cameraPose.rotation), toPoint);

        // Vertical-up capture frame → vertical-down image frame
        const x = local.x;
        const y = -local.y;
        const depth = local.z;

        if (!(depth > this.minDepth)) {
            return null;
        }

        const u = intrinsics.focalLength * (x / depth) + intrinsics.cx;
        const v = intrinsics.focalLength * (y / depth) + intrinsics.cy;

        if (options.boundsCheck && !(u >= 0 && u < intrinsics.width && v >= 0 && v < intrinsics.height)) {
            return null;
        }

        return { u, v };
    }

    /**
     * Projects a pose origin and the tips of its X, Y and Z axes.
     * Null when the origin itself cannot be projected.
     */
    projectPose(pose: Pose, cameraPose: Pose, options: PoseOverlayOptions = {}): PoseOverlay | null {
        const snapshot = options.snapshot ?? this.snapshot;
        const axisLength = options.axisLength ?? CAMERA.DEFAULT_AXIS_LENGTH;
        const target = options.applyCalibration === false
            ? pose
            : this.applyCalibration(pose, snapshot.calibration);
        const projectOptions: ProjectOptions = { boundsCheck: options.boundsCheck, snapshot };

        const origin = this.project(target.position, cameraPose, projectOptions);
        if (!origin) return null;

        const axisTip = (axis: Vector3): PixelPoint | null => this.project(
            Vector3Service.add(target.position, QuaternionService.rotate(target.rotation, Vector3Service.scale(axis, axisLength))),
            cameraPose,
            projectOptions
        );

        return {
            pose: target,
            origin,
            axes: {
                x: axisTip({ x: 1, y: 0, z: 0 }),
                y: axisTip({ x: 0, y: 1, z: 0 }),
                z: axisTip({ x: 0, y: 0, z: 1 })
            }
        };
    }

    private createSnapshot(calibration: CalibrationTransform, previous: ProjectionSnapshot | null): ProjectionSnapshot {
        // Intrinsics only depend on the field of view; reuse them when it did not change
        const intrinsics = previous && previous.intrinsics.fieldOfViewDeg === calibration.fieldOfViewDeg
            ? previous.intrinsics
            : computeIntrinsics(this.width, this.height, calibration.fieldOfViewDeg);

        return Object.freeze({
            calibration: freezeCalibration(calibration),
            intrinsics
        });
    }
}
