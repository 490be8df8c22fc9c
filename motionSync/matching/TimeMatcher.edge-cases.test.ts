/**
 * Edge Case Tests for TimeMatcher
 */

import { TimeMatcher } from './TimeMatcher';
import { MotionTrack } from '../track/MotionTrack';
import { SyncLogger } from '../shared/SyncLogger';
import { Pose } from '../shared/types';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

function poseAt(x: number): Pose {
    return { position: { x, y: 0, z: 0 }, rotation: { w: 1, x: 0, y: 0, z: 0 }, gripper: 0 };
}

// ─────────────────────────────────────────────────────────────────
// Edge Case Tests
// ─────────────────────────────────────────────────────────────────

describe('TimeMatcher edge cases', () => {
    afterEach(() => {
        SyncLogger.setLevel(null);
        jest.restoreAllMocks();
    });

    it('returns empty matches and warns once for an empty track', () => {
        SyncLogger.setLevel('warn');
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        const matches = new TimeMatcher(MotionTrack.empty()).align([1, 2, 3], 0);

        expect(matches).toHaveLength(3);
        for (const match of matches) {
            expect(match.prev).toBeNull();
            expect(match.next).toBeNull();
            expect(match.weight).toBe(0);
            expect(match.clamp).toBe('empty');
            expect(match.gapped).toBe(false);
        }
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toBe('[TimeMatcher] [EMPTY_TRACK] No motion samples; 3 timestamp(s) left unmatched');
    });

    it('clamps both sides to the only sample of a single-sample track', () => {
        const matcher = new TimeMatcher(MotionTrack.fromSamples([{ timestamp: 5, pose: poseAt(1) }]));
        const [before, exact, after] = matcher.align([4, 5, 6], 0);

        expect(before.clamp).toBe('start');
        expect(before.weight).toBe(0);
        expect(exact.clamp).toBe('none');
        expect(exact.weight).toBe(0);
        expect(after.clamp).toBe('end');
        expect(after.weight).toBe(1);
        expect(before.prev).toBe(after.next);
    });

    it('treats duplicate timestamps as an exact hit on the first of them', () => {
        const track = MotionTrack.fromSamples([
            { timestamp: 1, pose: poseAt(1) },
            { timestamp: 2, pose: poseAt(2) },
            { timestamp: 2, pose: poseAt(3) },
            { timestamp: 3, pose: poseAt(4) }
        ]);
        const [match] = new TimeMatcher(track).align([2], 0);

        expect(match.prev?.pose.position.x).toBe(2);
        expect(match.prev).toBe(match.next);
        expect(match.weight).toBe(0);
    });

    it('does not flag clamped matches as gaps', () => {
        const matcher = new TimeMatcher(MotionTrack.fromSamples([
            { timestamp: 0, pose: poseAt(0) },
            { timestamp: 0.01, pose: poseAt(1) }
        ]));
        const matches = matcher.align([-100, 100], 0, { gapThreshold: 0.2 });

        expect(matches.map(m => m.gapped)).toEqual([false, false]);
    });

    it('handles an empty input list', () => {
        const matcher = new TimeMatcher(MotionTrack.empty());
        expect(matcher.align([], 0)).toEqual([]);
    });
});
