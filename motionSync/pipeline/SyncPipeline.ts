/**
 * SyncPipeline - runs one synchronization session end to end.
 *
 * Stages:
 *   1. calibration  (defaults when the file is absent)
 *   2. motion       (every source file under motion_dir, merged into one track)
 *   3. matching     (frame timestamps + offset → brackets and weights)
 *   4. poses        (hand and camera pose per frame, gaps skipped)
 *   5. projection   (hand pose overlay per frame, counted)
 *   6. outputs      (synced poses JSON and markdown report, per options)
 */

import * as fs from 'fs';
import * as path from 'path';
import { createSyncConfig } from '../shared/config';
import { DiagnosticLog, SyncError, SyncErrorCode } from '../shared/errors';
import { SyncLogger } from '../shared/SyncLogger';
import { loadMotionTrack } from '../track/MotionSourceLoader';
import { TimeMatcher, summarizeMatches } from '../matching/TimeMatcher';
import { loadCalibration } from '../projection/CalibrationStore';
import { CalibratedProjector } from '../projection/CalibratedProjector';
import { synchronizeFrames } from './FrameSynchronizer';
import { SYNCED_POSES_FILE, SyncedPosesExporter, WriteResult } from './SyncedPosesExporter';
import { PROCESSING_REPORT_FILE, generateProcessingReport, writeProcessingReport } from './ProcessingReport';
import { FrameTimeline, PipelineConfig, PipelineResult, SyncedFrame } from './types';

const LOG_CATEGORY = 'SyncPipeline';

function requireWritten(result: WriteResult, target: string): string {
    if (!result.success || !result.filePath) {
        throw new SyncError(SyncErrorCode.OUTPUT_WRITE_FAILED, result.error ?? `Failed to write ${target}`, { path: target });
    }
    return result.filePath;
}

export class SyncPipeline {

    static run(config: PipelineConfig, timeline: FrameTimeline): PipelineResult {
        const diagnostics = new DiagnosticLog(LOG_CATEGORY);
        const syncConfig = createSyncConfig(undefined, {
            gapThresholdSec: config.options.gapThreshold,
            frameWidth: config.options.frameWidth,
            frameHeight: config.options.frameHeight
        });

        // Stage 1: calibration
        SyncLogger.info(LOG_CATEGORY, 'Stage 1: Loading calibration...');
        const loadedCalibration = loadCalibration(config.calibrationPath);
        diagnostics.absorb(loadedCalibration.diagnostics);
        if (!loadedCalibration.found) {
            SyncLogger.warn(LOG_CATEGORY, `No calibration at ${config.calibrationPath}; overlays use the default transform`);
        }
        const projector = new CalibratedProjector({
            width: syncConfig.frameWidth,
            height: syncConfig.frameHeight,
            minDepth: syncConfig.minProjectionDepth,
            calibration: loadedCalibration.calibration
        });
        diagnostics.absorb(projector.getDiagnostics().getAll());

        // Stage 2: motion
        SyncLogger.info(LOG_CATEGORY, 'Stage 2: Loading motion data...');
        const motion = loadMotionTrack(config.motionDir);
        diagnostics.absorb(motion.diagnostics);
        SyncLogger.info(LOG_CATEGORY, `Motion: ${motion.track.size} poses from ${motion.sourceNames.length} source(s)`);

        // Stage 3: matching
        SyncLogger.info(LOG_CATEGORY, 'Stage 3: Matching frame timestamps...');
        const matcher = new TimeMatcher(motion.track);
        const matches = matcher.align(timeline.timestamps, config.timestampOffset, { gapThreshold: syncConfig.gapThresholdSec });
        SyncLogger.info(LOG_CATEGORY, `Matched ${matches.length} video frames`, summarizeMatches(matches));

        // Stage 4: poses
        SyncLogger.info(LOG_CATEGORY, 'Stage 4: Interpolating poses...');
        const { frames, stats } = synchronizeFrames(matches);

        // Stage 5: projection against one snapshot for the whole batch
        SyncLogger.info(LOG_CATEGORY, 'Stage 5: Projecting hand poses...');
        const projectedFrames = SyncPipeline.countProjectedFrames(projector, frames);
        SyncLogger.info(LOG_CATEGORY, `Projected hand pose in view for ${projectedFrames}/${frames.length} frames`);

        // Stage 6: outputs
        SyncLogger.info(LOG_CATEGORY, 'Stage 6: Generating outputs...');
        if (!fs.existsSync(config.outputDir)) {
            fs.mkdirSync(config.outputDir, { recursive: true });
        }

        let syncedPosesPath: string | null = null;
        if (config.options.exportSyncedJson) {
            const target = path.join(config.outputDir, SYNCED_POSES_FILE);
            const record = SyncedPosesExporter.buildRecord(frames, {
                videoPath: config.videoPath,
                motionSources: motion.sourceNames,
                fps: timeline.fps,
                timestampOffset: config.timestampOffset,
                gapThreshold: syncConfig.gapThresholdSec
            });
            syncedPosesPath = requireWritten(SyncedPosesExporter.write(target, record), target);
        }

        let reportPath: string | null = null;
        if (config.options.generateReport) {
            const target = path.join(config.outputDir, PROCESSING_REPORT_FILE);
            const markdown = generateProcessingReport({
                videoPath: config.videoPath,
                motionDir: config.motionDir,
                motionSources: motion.sourceNames,
                timestampOffset: config.timestampOffset,
                gapThreshold: syncConfig.gapThresholdSec,
                stats,
                projectedFrames,
                syncedPosesExported: syncedPosesPath !== null
            });
            reportPath = requireWritten(writeProcessingReport(target, markdown), target);
        }

        SyncLogger.info(LOG_CATEGORY, `Pipeline complete. Output directory: ${config.outputDir}`);

        return {
            frames,
            stats,
            projectedFrames,
            calibrationFound: loadedCalibration.found,
            motionSources: motion.sourceNames,
            syncedPosesPath,
            reportPath,
            diagnostics: diagnostics.getAll()
        };
    }

    /**
     * Frames whose hand pose origin lands inside the image.
     */
    static countProjectedFrames(projector: CalibratedProjector, frames: readonly SyncedFrame[]): number {
        const snapshot = projector.getSnapshot();
        let count = 0;

        for (const frame of frames) {
            if (frame.inGap || !frame.handPose || !frame.cameraPose) continue;
            const overlay = projector.projectPose(frame.handPose, frame.cameraPose, { boundsCheck: true, snapshot });
            if (overlay) count++;
        }

        return count;
    }
}
