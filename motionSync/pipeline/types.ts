/**
 * Types for the synchronization pipeline: per-frame results, exported records and configuration.
 */

import { Pose } from '../shared/types';
import { SyncDiagnostic } from '../shared/errors';

// ============================================================================
// Frame Synchronization
// ============================================================================

/** Reconstructed poses for one video frame */
export interface SyncedFrame {
    frameIndex: number;
    rawTimestamp: number;
    alignedTimestamp: number;
    weight: number;
    inGap: boolean;
    handPose: Pose | null;
    cameraPose: Pose | null;
    /** Timestamps of the bracketing samples that produced the poses */
    sourceTimestamps: [number, number] | null;
}

export interface SynchronizationStats {
    totalFrames: number;
    framesWithHand: number;
    framesWithCamera: number;
    gapFrames: number;
}

export interface SynchronizationResult {
    frames: SyncedFrame[];
    stats: SynchronizationStats;
}

/** Nearest recorded sample against the synchronized pose of the same frame */
export interface RawSyncComparison {
    frameIndex: number;
    rawSampleTimestamp: number;
    alignedTimestamp: number;
    /** |raw sample timestamp - aligned timestamp|, seconds */
    temporalOffset: number;
    /** Euclidean distance between raw and synchronized hand positions */
    positionDifference: number;
}

// ============================================================================
// Synced Poses Record (JSON on disk)
// ============================================================================

export interface PoseRecord {
    position: [number, number, number];
    rotation: [number, number, number, number];
    gripper: number;
}

export interface SyncedFrameRecord {
    frame_idx: number;
    video_timestamp: number;
    hand_pose: PoseRecord | null;
    camera_pose: PoseRecord | null;
    interpolation_weight: number;
    in_gap: boolean;
    source_timestamps: [number, number] | null;
}

export interface SyncedPosesMetadata {
    session_id: string;
    video_path: string;
    motion_sources: string[];
    total_frames: number;
    fps: number;
    timestamp_offset: number;
    gap_threshold: number;
    gaps_detected: number;
    processing_date: string;
}

export interface SyncedPosesRecord {
    metadata: SyncedPosesMetadata;
    frames: SyncedFrameRecord[];
}

/** Caller-supplied part of the metadata; counts and ids are derived */
export interface SyncedPosesInput {
    videoPath: string;
    motionSources: string[];
    fps: number;
    timestampOffset: number;
    gapThreshold: number;
    processingDate?: Date;
}

// ============================================================================
// Pipeline Configuration
// ============================================================================

export interface PipelineOptions {
    gapThreshold: number;
    exportSyncedJson: boolean;
    generateReport: boolean;
    frameWidth: number;
    frameHeight: number;
}

export interface PipelineConfig {
    videoPath: string;
    motionDir: string;
    outputDir: string;
    calibrationPath: string;
    /** Seconds added to every video timestamp */
    timestampOffset: number;
    options: PipelineOptions;
}

/** Per-frame presentation timestamps produced by the video side */
export interface FrameTimeline {
    fps: number;
    /** Seconds */
    timestamps: number[];
}

export interface PipelineResult {
    frames: SyncedFrame[];
    stats: SynchronizationStats;
    /** Frames whose hand pose projected inside the image */
    projectedFrames: number;
    calibrationFound: boolean;
    motionSources: string[];
    syncedPosesPath: string | null;
    reportPath: string | null;
    diagnostics: readonly SyncDiagnostic[];
}
