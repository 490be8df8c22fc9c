/**
 * TimeMatcher Tests
 */

import { TimeMatcher, summarizeMatches } from './TimeMatcher';
import { MotionTrack } from '../track/MotionTrack';
import { Pose } from '../shared/types';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

function poseAt(x: number): Pose {
    return { position: { x, y: 0, z: 0 }, rotation: { w: 1, x: 0, y: 0, z: 0 }, gripper: 0 };
}

function trackAt(timestamps: number[]): MotionTrack {
    return MotionTrack.fromSamples(timestamps.map(t => ({ timestamp: t, pose: poseAt(t) })));
}

// ─────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────

describe('TimeMatcher', () => {
    const matcher = new TimeMatcher(trackAt([10, 20, 30, 40]));

    it('interpolates between the bracketing samples', () => {
        const [match] = matcher.align([15], 0);

        expect(match.prevTimestamp).toBe(10);
        expect(match.nextTimestamp).toBe(20);
        expect(match.weight).toBeCloseTo(0.5, 12);
        expect(match.clamp).toBe('none');
        expect(match.gapped).toBe(false);
    });

    it('clamps before the first sample to weight 0', () => {
        const [match] = matcher.align([5], 0);

        expect(match.prevTimestamp).toBe(10);
        expect(match.nextTimestamp).toBe(10);
        expect(match.weight).toBe(0);
        expect(match.clamp).toBe('start');
    });

    it('clamps after the last sample to weight 1', () => {
        const [match] = matcher.align([50], 0);

        expect(match.prevTimestamp).toBe(40);
        expect(match.nextTimestamp).toBe(40);
        expect(match.weight).toBe(1);
        expect(match.clamp).toBe('end');
    });

    it('adds the offset before matching', () => {
        const [match] = matcher.align([5], 20);

        expect(match.rawTimestamp).toBe(5);
        expect(match.alignedTimestamp).toBe(25);
        expect(match.prevTimestamp).toBe(20);
        expect(match.nextTimestamp).toBe(30);
        expect(match.weight).toBeCloseTo(0.5, 12);
    });

    it('accepts a negative offset', () => {
        const [match] = matcher.align([42], -10);

        expect(match.alignedTimestamp).toBe(32);
        expect(match.prevTimestamp).toBe(30);
        expect(match.weight).toBeCloseTo(0.2, 12);
    });

    it('gives weight 0 on an exact hit', () => {
        const [match] = matcher.align([20], 0);

        expect(match.prev).toBe(match.next);
        expect(match.prevTimestamp).toBe(20);
        expect(match.weight).toBe(0);
        expect(match.clamp).toBe('none');
    });

    it('returns one match per input in input order', () => {
        const inputs = [35, 5, 15, 50];
        const matches = matcher.align(inputs, 0);

        expect(matches.map(m => m.rawTimestamp)).toEqual(inputs);
        expect(matches.map(m => m.clamp)).toEqual(['none', 'start', 'none', 'end']);
    });

    it('flags brackets wider than the gap threshold', () => {
        const gapped = new TimeMatcher(trackAt([0, 4]));

        expect(gapped.align([2], 0, { gapThreshold: 0.2 })[0].gapped).toBe(true);
        expect(gapped.align([2], 0, { gapThreshold: 5 })[0].gapped).toBe(false);
        expect(gapped.align([2], 0)[0].gapped).toBe(false);
    });

    it('keeps every weight inside [0, 1]', () => {
        const timestamps: number[] = [];
        for (let t = -5; t <= 55; t += 0.37) timestamps.push(t);

        for (const match of matcher.align(timestamps, 0.11)) {
            expect(match.weight).toBeGreaterThanOrEqual(0);
            expect(match.weight).toBeLessThanOrEqual(1);
        }
    });

    it('freezes matches', () => {
        const [match] = matcher.align([15], 0);
        expect(Object.isFrozen(match)).toBe(true);
    });
});

describe('summarizeMatches', () => {
    it('counts clamps, gaps and exact hits', () => {
        const matcher = new TimeMatcher(trackAt([0, 1, 2, 10]));
        const matches = matcher.align([-1, 0, 0.5, 5, 11], 0, { gapThreshold: 2 });

        expect(summarizeMatches(matches)).toEqual({
            total: 5,
            gapped: 1,
            clampedStart: 1,
            clampedEnd: 1,
            exact: 1,
            empty: 0
        });
    });
});
