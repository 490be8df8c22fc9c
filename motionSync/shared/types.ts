/**
 * Core value types shared by the track, matcher, interpolator and projector.
 */

export interface Vector3 {
    x: number;
    y: number;
    z: number;
}

/** Unit quaternion. Wire records carry it scalar-last as [qx, qy, qz, qw]. */
export interface Quaternion {
    w: number;
    x: number;
    y: number;
    z: number;
}

/**
 * Fully specified rigid pose.
 * Either loaded verbatim from a track sample or produced by interpolation.
 */
export interface Pose {
    position: Vector3;
    rotation: Quaternion;
    gripper: number;
}

/** Auxiliary pose channels stored in parallel with the primary (hand) poses. */
export type AuxiliaryChannel = 'leftEye' | 'rightEye';

/** One keyframe of the motion track, resolved by position index. */
export interface TrackSample {
    index: number;
    timestamp: number;
    pose: Pose;
    leftEye: Pose | null;
    rightEye: Pose | null;
}

export interface TimeRange {
    start: number;
    end: number;
}

/** Pixel coordinates in image space (origin top-left, v grows downward). */
export interface PixelPoint {
    u: number;
    v: number;
}
