/**
 * Pipeline configuration and frame timeline loading.
 *
 * Config JSON:
 *   {
 *     "video_path": "...", "motion_dir": "...", "output_dir": "...", "calibration_path": "...",
 *     "timestamp_offset": 0.0,
 *     "options": { "gap_threshold": 0.2, "export_synced_json": true, "generate_report": true,
 *                  "frame_width": 1920, "frame_height": 1080 }
 *   }
 * Timeline JSON: { "fps": 30, "timestamps_ms": [0, 33.3, ...] }
 */

import * as fs from 'fs';
import { SYSTEM } from '../shared/constants';
import { createSyncConfig } from '../shared/config';
import { SyncError, SyncErrorCode, describeError } from '../shared/errors';
import { SyncLogger } from '../shared/SyncLogger';
import { FrameTimeline, PipelineConfig, PipelineOptions } from './types';

const LOG_CATEGORY = 'PipelineConfig';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJsonFile(filePath: string, notFound: SyncErrorCode, invalid: SyncErrorCode): unknown {
    if (!fs.existsSync(filePath)) {
        throw new SyncError(notFound, `File not found: ${filePath}`, { path: filePath });
    }

    try {
        return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new SyncError(invalid, `Cannot parse ${filePath}: ${describeError(error)}`, { path: filePath });
    }
}

function invalidField(field: string, expected: string): SyncError {
    return new SyncError(SyncErrorCode.INVALID_CONFIG, `"${field}" must be ${expected}`, { field });
}

function requireString(record: JsonObject, field: string): string {
    const value = record[field];
    if (typeof value !== 'string' || value.length === 0) throw invalidField(field, 'a non-empty string');
    return value;
}

function optionalNumber(record: JsonObject, field: string, fallback: number, label: string = field): number {
    const value = record[field];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) throw invalidField(label, 'a finite number');
    return value;
}

function optionalBoolean(record: JsonObject, field: string, fallback: boolean, label: string = field): boolean {
    const value = record[field];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') throw invalidField(label, 'a boolean');
    return value;
}

function parseOptions(value: unknown): PipelineOptions {
    const defaults = createSyncConfig();
    if (value === undefined) {
        return {
            gapThreshold: defaults.gapThresholdSec,
            exportSyncedJson: true,
            generateReport: true,
            frameWidth: defaults.frameWidth,
            frameHeight: defaults.frameHeight
        };
    }
    if (!isJsonObject(value)) throw invalidField('options', 'an object');

    const options: PipelineOptions = {
        gapThreshold: optionalNumber(value, 'gap_threshold', defaults.gapThresholdSec, 'options.gap_threshold'),
        exportSyncedJson: optionalBoolean(value, 'export_synced_json', true, 'options.export_synced_json'),
        generateReport: optionalBoolean(value, 'generate_report', true, 'options.generate_report'),
        frameWidth: optionalNumber(value, 'frame_width', defaults.frameWidth, 'options.frame_width'),
        frameHeight: optionalNumber(value, 'frame_height', defaults.frameHeight, 'options.frame_height')
    };

    if (options.gapThreshold <= 0) throw invalidField('options.gap_threshold', 'greater than 0');
    if (options.frameWidth <= 0) throw invalidField('options.frame_width', 'greater than 0');
    if (options.frameHeight <= 0) throw invalidField('options.frame_height', 'greater than 0');
    return options;
}

/**
 * Validates an already-parsed config record.
 */
export function parsePipelineConfig(record: unknown): PipelineConfig {
    if (!isJsonObject(record)) {
        throw new SyncError(SyncErrorCode.INVALID_CONFIG, 'Pipeline config must be a JSON object');
    }

    return {
        videoPath: requireString(record, 'video_path'),
        motionDir: requireString(record, 'motion_dir'),
        outputDir: requireString(record, 'output_dir'),
        calibrationPath: requireString(record, 'calibration_path'),
        timestampOffset: optionalNumber(record, 'timestamp_offset', 0),
        options: parseOptions(record.options)
    };
}

export function loadPipelineConfig(filePath: string): PipelineConfig {
    const config = parsePipelineConfig(readJsonFile(filePath, SyncErrorCode.CONFIG_NOT_FOUND, SyncErrorCode.INVALID_CONFIG));
    SyncLogger.info(LOG_CATEGORY, `Loaded pipeline config from ${filePath}`);
    return config;
}

/**
 * Validates a parsed timeline record; timestamps are converted from milliseconds to seconds.
 */
export function parseFrameTimeline(record: unknown): FrameTimeline {
    if (!isJsonObject(record)) {
        throw new SyncError(SyncErrorCode.INVALID_TIMELINE, 'Frame timeline must be a JSON object');
    }

    const { fps, timestamps_ms: timestampsMs } = record;
    if (typeof fps !== 'number' || !Number.isFinite(fps) || fps <= 0) {
        throw new SyncError(SyncErrorCode.INVALID_TIMELINE, '"fps" must be a positive number', { field: 'fps' });
    }
    if (!Array.isArray(timestampsMs)) {
        throw new SyncError(SyncErrorCode.INVALID_TIMELINE, '"timestamps_ms" must be an array', { field: 'timestamps_ms' });
    }

    const timestamps: number[] = [];
    for (let i = 0; i < timestampsMs.length; i++) {
        const value: unknown = timestampsMs[i];
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new SyncError(SyncErrorCode.INVALID_TIMELINE, `"timestamps_ms[${i}]" is not a number`, { field: 'timestamps_ms', index: i });
        }
        timestamps.push(value / SYSTEM.MILLISECONDS_PER_SECOND);
    }

    return { fps, timestamps };
}

export function loadFrameTimeline(filePath: string): FrameTimeline {
    const timeline = parseFrameTimeline(readJsonFile(filePath, SyncErrorCode.TIMELINE_NOT_FOUND, SyncErrorCode.INVALID_TIMELINE));
    SyncLogger.info(LOG_CATEGORY, `Loaded ${timeline.timestamps.length} frame timestamps at ${timeline.fps} fps`);
    return timeline;
}
