// Shared
export * from './shared/types';
export * from './shared/constants';
export * from './shared/config';
export * from './shared/errors';
export { SyncLogger } from './shared/SyncLogger';
export type { LogLevel } from './shared/SyncLogger';
export { QuaternionService, lerp } from './shared/QuaternionService';
export { Vector3Service } from './shared/Vector3Service';

// Motion track
export * from './track/types';
export { MotionTrack, bisectLeft } from './track/MotionTrack';
export { parseMotionSource, poseFromTuple } from './track/MotionSourceParser';
export { isMotionSourceFile, listMotionSourceFiles, loadMotionSources, loadMotionTrack } from './track/MotionSourceLoader';
export type { LoadedSources, LoadedTrack } from './track/MotionSourceLoader';

// Matching and interpolation
export * from './matching/types';
export { TimeMatcher, summarizeMatches } from './matching/TimeMatcher';
export { PoseInterpolator } from './interpolation/PoseInterpolator';

// Projection
export * from './projection/types';
export { computeIntrinsics, sanitizeFieldOfView } from './projection/CameraIntrinsics';
export {
    createDefaultCalibration,
    fromCalibrationRecord,
    loadCalibration,
    saveCalibration,
    toCalibrationRecord
} from './projection/CalibrationStore';
export type { LoadedCalibration } from './projection/CalibrationStore';
export { CalibratedProjector } from './projection/CalibratedProjector';

// Pipeline
export * from './pipeline/types';
export { cameraPoseFromEyes, compareRawToSynced, synchronizeFrames } from './pipeline/FrameSynchronizer';
export {
    SYNCED_POSES_FILE,
    SyncedPosesExporter,
    buildSyncedPosesRecord,
    writeSyncedPoses
} from './pipeline/SyncedPosesExporter';
export type { WriteResult } from './pipeline/SyncedPosesExporter';
export {
    PROCESSING_REPORT_FILE,
    generateProcessingReport,
    writeProcessingReport
} from './pipeline/ProcessingReport';
export type { ProcessingReportInput } from './pipeline/ProcessingReport';
export { loadFrameTimeline, loadPipelineConfig, parseFrameTimeline, parsePipelineConfig } from './pipeline/PipelineConfig';
export { SyncPipeline } from './pipeline/SyncPipeline';
