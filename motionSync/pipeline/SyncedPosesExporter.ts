import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Pose } from '../shared/types';
import { QuaternionService } from '../shared/QuaternionService';
import { SyncLogger } from '../shared/SyncLogger';
import { Vector3Service } from '../shared/Vector3Service';
import { describeError } from '../shared/errors';
import { PoseRecord, SyncedFrame, SyncedFrameRecord, SyncedPosesInput, SyncedPosesRecord } from './types';

const LOG_CATEGORY = 'SyncedPosesExporter';

export const SYNCED_POSES_FILE = 'synced_poses.json';

/** Write result. */
export interface WriteResult {
    success: boolean;
    filePath?: string;
    error?: string;
}

/**
 * Serializes synchronized frames into the synced-poses JSON record.
 */
export class SyncedPosesExporter {

    static toPoseRecord(pose: Pose): PoseRecord {
        return {
            position: Vector3Service.toArray(pose.position),
            rotation: QuaternionService.toScalarLast(pose.rotation),
            gripper: pose.gripper
        };
    }

    static toFrameRecord(frame: SyncedFrame): SyncedFrameRecord {
        return {
            frame_idx: frame.frameIndex,
            video_timestamp: frame.alignedTimestamp,
            hand_pose: frame.handPose ? SyncedPosesExporter.toPoseRecord(frame.handPose) : null,
            camera_pose: frame.cameraPose ? SyncedPosesExporter.toPoseRecord(frame.cameraPose) : null,
            interpolation_weight: frame.weight,
            in_gap: frame.inGap,
            source_timestamps: frame.sourceTimestamps ? [frame.sourceTimestamps[0], frame.sourceTimestamps[1]] : null
        };
    }

    /**
     * Builds the record with a fresh session id. Frame counts and gap counts come from the frames.
     */
    static buildRecord(frames: readonly SyncedFrame[], input: SyncedPosesInput): SyncedPosesRecord {
        const processingDate = input.processingDate ?? new Date();

        return {
            metadata: {
                session_id: uuidv4(),
                video_path: input.videoPath,
                motion_sources: [...input.motionSources],
                total_frames: frames.length,
                fps: input.fps,
                timestamp_offset: input.timestampOffset,
                gap_threshold: input.gapThreshold,
                gaps_detected: frames.filter(f => f.inGap).length,
                processing_date: processingDate.toISOString()
            },
            frames: frames.map(SyncedPosesExporter.toFrameRecord)
        };
    }

    /**
     * Writes the record as indented JSON, creating parent directories.
     */
    static write(filePath: string, record: SyncedPosesRecord): WriteResult {
        try {
            // Ensure directory exists
            const dir = path.dirname(filePath);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }

            fs.writeFileSync(filePath, JSON.stringify(record, null, 2), 'utf-8');
            SyncLogger.info(LOG_CATEGORY, `Synced data saved: ${filePath} (${record.frames.length} frames)`);
            return { success: true, filePath };
        } catch (err) {
            SyncLogger.error(LOG_CATEGORY, `Failed to write ${filePath}`, err);
            return { success: false, error: `Failed to write file: ${describeError(err)}` };
        }
    }
}

export const buildSyncedPosesRecord = SyncedPosesExporter.buildRecord;
export const writeSyncedPoses = SyncedPosesExporter.write;
