/**
 * FrameSynchronizer - turns frame matches into hand and camera poses.
 *
 * Gapped brackets produce no poses. A zero-width bracket (exact hit or clamp to an end
 * sample) uses the sample as recorded; everything else is interpolated.
 */

import { Pose, TrackSample } from '../shared/types';
import { SyncLogger } from '../shared/SyncLogger';
import { Vector3Service } from '../shared/Vector3Service';
import { PoseInterpolator } from '../interpolation/PoseInterpolator';
import { FrameMatch } from '../matching/types';
import { RawSyncComparison, SyncedFrame, SynchronizationResult, SynchronizationStats } from './types';

const LOG_CATEGORY = 'FrameSynchronizer';

/**
 * Camera pose from the eye poses: both → midpoint position with the left eye rotation,
 * one → that eye, none → null.
 */
export function cameraPoseFromEyes(leftEye: Pose | null, rightEye: Pose | null): Pose | null {
    if (leftEye && rightEye) {
        return {
            position: Vector3Service.midpoint(leftEye.position, rightEye.position),
            rotation: { ...leftEye.rotation },
            gripper: leftEye.gripper
        };
    }
    return leftEye ?? rightEye;
}

function clonePose(pose: Pose): Pose {
    return {
        position: { ...pose.position },
        rotation: { ...pose.rotation },
        gripper: pose.gripper
    };
}

function emptyFrame(frameIndex: number, match: FrameMatch, inGap: boolean): SyncedFrame {
    return {
        frameIndex,
        rawTimestamp: match.rawTimestamp,
        alignedTimestamp: match.alignedTimestamp,
        weight: match.weight,
        inGap,
        handPose: null,
        cameraPose: null,
        sourceTimestamps: null
    };
}

function synchronizeFrame(frameIndex: number, match: FrameMatch): SyncedFrame {
    const { prev, next } = match;
    if (!prev || !next) return emptyFrame(frameIndex, match, false);
    if (match.gapped) return emptyFrame(frameIndex, match, true);

    let handPose: Pose;
    let leftEye: Pose | null;
    let rightEye: Pose | null;

    if (prev === next) {
        handPose = clonePose(prev.pose);
        leftEye = prev.leftEye ? clonePose(prev.leftEye) : null;
        rightEye = prev.rightEye ? clonePose(prev.rightEye) : null;
    } else {
        handPose = PoseInterpolator.interpolate(prev.pose, next.pose, match.weight);
        leftEye = PoseInterpolator.interpolateOptional(prev.leftEye, next.leftEye, match.weight);
        rightEye = PoseInterpolator.interpolateOptional(prev.rightEye, next.rightEye, match.weight);
    }

    return {
        frameIndex,
        rawTimestamp: match.rawTimestamp,
        alignedTimestamp: match.alignedTimestamp,
        weight: match.weight,
        inGap: false,
        handPose,
        cameraPose: cameraPoseFromEyes(leftEye, rightEye),
        sourceTimestamps: [prev.timestamp, next.timestamp]
    };
}

/**
 * Reconstructs one frame per match, in match order.
 */
export function synchronizeFrames(matches: readonly FrameMatch[]): SynchronizationResult {
    const stats: SynchronizationStats = { totalFrames: 0, framesWithHand: 0, framesWithCamera: 0, gapFrames: 0 };

    const frames = SyncLogger.time(LOG_CATEGORY, 'synchronize', () =>
        matches.map((match, frameIndex) => synchronizeFrame(frameIndex, match))
    );

    for (const frame of frames) {
        stats.totalFrames++;
        if (frame.handPose) stats.framesWithHand++;
        if (frame.cameraPose) stats.framesWithCamera++;
        if (frame.inGap) stats.gapFrames++;
    }

    SyncLogger.info(LOG_CATEGORY, `Synchronized ${stats.totalFrames} frames, gaps detected: ${stats.gapFrames}`, stats);
    return { frames, stats };
}

/**
 * Compares the nearer recorded sample (weight < 0.5 → prev) with the synchronized hand pose.
 * Null when the frame has no hand pose.
 */
export function compareRawToSynced(match: FrameMatch, frame: SyncedFrame): RawSyncComparison | null {
    if (!frame.handPose || !match.prev || !match.next) return null;

    const raw: TrackSample = match.weight < 0.5 ? match.prev : match.next;

    return {
        frameIndex: frame.frameIndex,
        rawSampleTimestamp: raw.timestamp,
        alignedTimestamp: match.alignedTimestamp,
        temporalOffset: Math.abs(raw.timestamp - match.alignedTimestamp),
        positionDifference: Vector3Service.distance(raw.pose.position, frame.handPose.position)
    };
}
