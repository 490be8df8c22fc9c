/**
 * SyncedPosesExporter Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildSyncedPosesRecord, writeSyncedPoses } from './SyncedPosesExporter';
import { SyncedFrame, SyncedPosesInput } from './types';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const input: SyncedPosesInput = {
    videoPath: 'videos/session.mp4',
    motionSources: ['a.json', 'b.json'],
    fps: 30,
    timestampOffset: 0.25,
    gapThreshold: 0.2,
    processingDate: new Date('2026-01-02T03:04:05.000Z')
};

const poseFrame: SyncedFrame = {
    frameIndex: 0,
    rawTimestamp: 1,
    alignedTimestamp: 1.25,
    weight: 0.5,
    inGap: false,
    handPose: { position: { x: 1, y: 2, z: 3 }, rotation: { w: 0.5, x: 0.5, y: 0.5, z: 0.5 }, gripper: 0 },
    cameraPose: null,
    sourceTimestamps: [1.2, 1.3]
};

const gapFrame: SyncedFrame = {
    frameIndex: 1,
    rawTimestamp: 2,
    alignedTimestamp: 2.25,
    weight: 0.1,
    inGap: true,
    handPose: null,
    cameraPose: null,
    sourceTimestamps: null
};

// ─────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────

describe('SyncedPosesExporter', () => {
    it('builds snake_case frame records with scalar-last rotations', () => {
        const record = buildSyncedPosesRecord([poseFrame, gapFrame], input);

        expect(record.frames).toEqual([
            {
                frame_idx: 0,
                video_timestamp: 1.25,
                hand_pose: { position: [1, 2, 3], rotation: [0.5, 0.5, 0.5, 0.5], gripper: 0 },
                camera_pose: null,
                interpolation_weight: 0.5,
                in_gap: false,
                source_timestamps: [1.2, 1.3]
            },
            {
                frame_idx: 1,
                video_timestamp: 2.25,
                hand_pose: null,
                camera_pose: null,
                interpolation_weight: 0.1,
                in_gap: true,
                source_timestamps: null
            }
        ]);
    });

    it('derives the metadata counts from the frames', () => {
        const { metadata } = buildSyncedPosesRecord([poseFrame, gapFrame], input);

        expect(metadata).toEqual({
            session_id: expect.stringMatching(UUID_V4),
            video_path: 'videos/session.mp4',
            motion_sources: ['a.json', 'b.json'],
            total_frames: 2,
            fps: 30,
            timestamp_offset: 0.25,
            gap_threshold: 0.2,
            gaps_detected: 1,
            processing_date: '2026-01-02T03:04:05.000Z'
        });
    });

    it('gives every record its own session id', () => {
        const first = buildSyncedPosesRecord([], input);
        const second = buildSyncedPosesRecord([], input);
        expect(first.metadata.session_id).not.toBe(second.metadata.session_id);
    });

    it('writes indented JSON and creates parent directories', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'synced-'));
        try {
            const file = path.join(dir, 'out', 'synced_poses.json');
            const record = buildSyncedPosesRecord([poseFrame], input);

            const result = writeSyncedPoses(file, record);

            expect(result).toEqual({ success: true, filePath: file });
            const text = fs.readFileSync(file, 'utf-8');
            expect(text).toBe(JSON.stringify(record, null, 2));
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('writes to the given path as is, without home expansion', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'synced-'));
        try {
            const file = path.join(dir, '~', 'out', 'synced_poses.json');

            const result = writeSyncedPoses(file, buildSyncedPosesRecord([poseFrame], input));

            expect(result).toEqual({ success: true, filePath: file });
            expect(fs.existsSync(file)).toBe(true);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('returns a failure result when the directory cannot be created', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'synced-'));
        try {
            const blocker = path.join(dir, 'blocker');
            fs.writeFileSync(blocker, 'not a directory');

            const result = writeSyncedPoses(path.join(blocker, 'out', 'synced_poses.json'), buildSyncedPosesRecord([poseFrame], input));

            expect(result.success).toBe(false);
            expect(result.filePath).toBeUndefined();
            expect(result.error).toMatch(/^Failed to write file: /);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
