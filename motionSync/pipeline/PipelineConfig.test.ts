/**
 * PipelineConfig Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadFrameTimeline, loadPipelineConfig, parseFrameTimeline, parsePipelineConfig } from './PipelineConfig';
import { SyncError, SyncErrorCode } from '../shared/errors';
import { gapThresholdForRate } from '../shared/config';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

const baseRecord = {
    video_path: 'videos/session.mp4',
    motion_dir: 'motion/session',
    output_dir: 'output/session',
    calibration_path: 'config/calibration.json'
};

function errorCodeOf(fn: () => unknown): SyncErrorCode | null {
    try {
        fn();
    } catch (error) {
        if (error instanceof SyncError) return error.code;
        throw error;
    }
    return null;
}

// ─────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────

describe('parsePipelineConfig', () => {
    it('reads every field', () => {
        const config = parsePipelineConfig({
            ...baseRecord,
            timestamp_offset: -1.5,
            options: {
                gap_threshold: 0.3,
                export_synced_json: false,
                generate_report: true,
                frame_width: 1280,
                frame_height: 720
            }
        });

        expect(config).toEqual({
            videoPath: 'videos/session.mp4',
            motionDir: 'motion/session',
            outputDir: 'output/session',
            calibrationPath: 'config/calibration.json',
            timestampOffset: -1.5,
            options: {
                gapThreshold: 0.3,
                exportSyncedJson: false,
                generateReport: true,
                frameWidth: 1280,
                frameHeight: 720
            }
        });
    });

    it('fills optional fields with defaults', () => {
        const config = parsePipelineConfig(baseRecord);

        expect(config.timestampOffset).toBe(0);
        expect(config.options).toEqual({
            gapThreshold: gapThresholdForRate(72),
            exportSyncedJson: true,
            generateReport: true,
            frameWidth: 1920,
            frameHeight: 1080
        });
    });

    it('names the offending field', () => {
        try {
            parsePipelineConfig({ ...baseRecord, options: { gap_threshold: 'big' } });
            throw new Error('expected a SyncError');
        } catch (error) {
            expect(error).toBeInstanceOf(SyncError);
            expect(error instanceof SyncError && error.details).toEqual({ field: 'options.gap_threshold' });
        }
    });

    it('rejects missing paths and invalid values', () => {
        const { motion_dir: _omitted, ...withoutMotion } = baseRecord;

        expect(errorCodeOf(() => parsePipelineConfig(withoutMotion))).toBe(SyncErrorCode.INVALID_CONFIG);
        expect(errorCodeOf(() => parsePipelineConfig({ ...baseRecord, timestamp_offset: '1' }))).toBe(SyncErrorCode.INVALID_CONFIG);
        expect(errorCodeOf(() => parsePipelineConfig({ ...baseRecord, options: { gap_threshold: 0 } }))).toBe(SyncErrorCode.INVALID_CONFIG);
        expect(errorCodeOf(() => parsePipelineConfig({ ...baseRecord, options: [] }))).toBe(SyncErrorCode.INVALID_CONFIG);
        expect(errorCodeOf(() => parsePipelineConfig('config'))).toBe(SyncErrorCode.INVALID_CONFIG);
    });
});

describe('parseFrameTimeline', () => {
    it('converts millisecond timestamps to seconds', () => {
        expect(parseFrameTimeline({ fps: 30, timestamps_ms: [0, 500, 1250] })).toEqual({
            fps: 30,
            timestamps: [0, 0.5, 1.25]
        });
    });

    it('rejects invalid timelines', () => {
        expect(errorCodeOf(() => parseFrameTimeline({ fps: 0, timestamps_ms: [] }))).toBe(SyncErrorCode.INVALID_TIMELINE);
        expect(errorCodeOf(() => parseFrameTimeline({ fps: 30 }))).toBe(SyncErrorCode.INVALID_TIMELINE);
        expect(errorCodeOf(() => parseFrameTimeline({ fps: 30, timestamps_ms: [0, 'x'] }))).toBe(SyncErrorCode.INVALID_TIMELINE);
    });
});

describe('loading from disk', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-config-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('loads a config file', () => {
        const file = path.join(dir, 'pipeline_config.json');
        fs.writeFileSync(file, JSON.stringify(baseRecord));

        expect(loadPipelineConfig(file).motionDir).toBe('motion/session');
    });

    it('raises CONFIG_NOT_FOUND for a missing config', () => {
        expect(errorCodeOf(() => loadPipelineConfig(path.join(dir, 'missing.json')))).toBe(SyncErrorCode.CONFIG_NOT_FOUND);
    });

    it('raises INVALID_CONFIG for unparsable JSON', () => {
        const file = path.join(dir, 'pipeline_config.json');
        fs.writeFileSync(file, '{');

        expect(errorCodeOf(() => loadPipelineConfig(file))).toBe(SyncErrorCode.INVALID_CONFIG);
    });

    it('loads a timeline and raises TIMELINE_NOT_FOUND when absent', () => {
        const file = path.join(dir, 'timeline.json');
        fs.writeFileSync(file, JSON.stringify({ fps: 25, timestamps_ms: [40, 80] }));

        expect(loadFrameTimeline(file)).toEqual({ fps: 25, timestamps: [0.04, 0.08] });
        expect(errorCodeOf(() => loadFrameTimeline(path.join(dir, 'none.json')))).toBe(SyncErrorCode.TIMELINE_NOT_FOUND);
    });
});
