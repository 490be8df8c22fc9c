/**
 * Types for calibration and camera projection.
 */

import { PixelPoint, Pose, Vector3 } from '../shared/types';

/**
 * Operator-adjusted rigid offset and field of view.
 * Rotation offset is intrinsic X-Y-Z Euler angles in degrees.
 */
export interface CalibrationTransform {
    positionOffset: Vector3;
    rotationOffsetEuler: Vector3;
    fieldOfViewDeg: number;
}

/** Persisted calibration record (JSON on disk) */
export interface CalibrationRecord {
    offset_pos: [number, number, number];
    offset_rot_euler: [number, number, number];
    fov: number;
}

/** Pinhole intrinsics derived from image size and horizontal field of view */
export interface CameraIntrinsics {
    width: number;
    height: number;
    fieldOfViewDeg: number;
    focalLength: number;
    cx: number;
    cy: number;
}

/**
 * Calibration and its derived intrinsics, swapped together as one frozen value.
 */
export interface ProjectionSnapshot {
    calibration: Readonly<CalibrationTransform>;
    intrinsics: Readonly<CameraIntrinsics>;
}

export interface ProjectorOptions {
    width?: number;
    height?: number;
    calibration?: Partial<CalibrationTransform>;
    /** Points at or nearer than this forward depth are not projected */
    minDepth?: number;
}

export interface ProjectOptions {
    /** Reject pixels outside [0, width) x [0, height) */
    boundsCheck?: boolean;
    /** Snapshot captured earlier; defaults to the projector's current one */
    snapshot?: ProjectionSnapshot;
}

export interface PoseOverlayOptions extends ProjectOptions {
    applyCalibration?: boolean;
    /** Length of each drawn axis in world units */
    axisLength?: number;
}

/** Projected pose origin plus the endpoints of its local axes */
export interface PoseOverlay {
    pose: Pose;
    origin: PixelPoint;
    axes: {
        x: PixelPoint | null;
        y: PixelPoint | null;
        z: PixelPoint | null;
    };
}

export interface CalibrationDelta {
    position?: Partial<Vector3>;
    rotation?: Partial<Vector3>;
    fieldOfView?: number;
}
