/**
 * Types for the motion track module.
 */

import { Pose, TrackSample } from '../shared/types';
import { SyncDiagnostic } from '../shared/errors';
import type { MotionTrack } from './MotionTrack';

// ============================================================================
// Wire Types (motion source files)
// ============================================================================

/**
 * Pose tuple as stored in source files: [px, py, pz, qx, qy, qz, qw].
 * Shorter tuples are accepted; missing parts take their defaults.
 */
export type PoseTuple = number[];

/** One trajectory of a motion source file. Only the first trajectory is consumed. */
export interface MotionTrajectoryRecord {
    timestamps: number[];
    poses: PoseTuple[];
    left_eye_poses?: PoseTuple[];
    right_eye_poses?: PoseTuple[];
}

export interface MotionSourceRecord {
    trajectories: MotionTrajectoryRecord[];
}

/**
 * Source handed to MotionTrack.build. `record` is untrusted parsed JSON.
 */
export interface NamedMotionSource {
    name: string;
    record: unknown;
}

// ============================================================================
// Parsed Types
// ============================================================================

/** Trajectory after validation and truncation to a common length */
export interface ParsedTrajectory {
    source: string;
    timestamps: number[];
    poses: Pose[];
    leftEye: Pose[] | null;
    rightEye: Pose[] | null;
}

/** Programmatic keyframe for MotionTrack.fromSamples */
export interface TrackEntry {
    timestamp: number;
    pose: Pose;
    leftEye?: Pose | null;
    rightEye?: Pose | null;
}

export interface BracketResult {
    prev: TrackSample | null;
    next: TrackSample | null;
}

export interface MotionTrackBuildResult {
    track: MotionTrack;
    diagnostics: readonly SyncDiagnostic[];
    /** Names of the sources that contributed at least one sample */
    contributingSources: string[];
}
