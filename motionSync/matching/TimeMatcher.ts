/**
 * TimeMatcher - maps a foreign clock (video frames) onto the motion track's clock.
 *
 * For each external timestamp t: aligned = t + offset, then
 * - before the first sample → prev = next = first, weight 0
 * - after the last sample   → prev = next = last,  weight 1
 * - otherwise               → weight = (aligned - prev) / (next - prev), clamped to [0, 1]
 *
 * This is the only place the boundary policy lives; MotionTrack.bracket just reports
 * which sides exist.
 */

import { PRECISION } from '../shared/constants';
import { SyncLogger } from '../shared/SyncLogger';
import { MotionTrack } from '../track/MotionTrack';
import { TrackSample } from '../shared/types';
import { AlignOptions, ClampKind, FrameMatch, MatchSummary } from './types';

const LOG_CATEGORY = 'TimeMatcher';

function clamp01(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.max(0, Math.min(1, value));
}

function createMatch(
    rawTimestamp: number,
    alignedTimestamp: number,
    prev: TrackSample | null,
    next: TrackSample | null,
    weight: number,
    gapThreshold: number,
    clamp: ClampKind
): FrameMatch {
    const span = prev && next ? next.timestamp - prev.timestamp : 0;

    return Object.freeze({
        rawTimestamp,
        alignedTimestamp,
        prev,
        next,
        prevTimestamp: prev ? prev.timestamp : null,
        nextTimestamp: next ? next.timestamp : null,
        weight,
        gapped: span > gapThreshold,
        clamp
    });
}

export class TimeMatcher {
    private readonly track: MotionTrack;

    constructor(track: MotionTrack) {
        this.track = track;
    }

    /**
     * Matches every external timestamp, preserving input order (one result per input).
     */
    align(externalTimestamps: readonly number[], offset: number, options: AlignOptions = {}): FrameMatch[] {
        const gapThreshold = options.gapThreshold ?? Infinity;

        if (this.track.isEmpty() && externalTimestamps.length > 0) {
            SyncLogger.warn(LOG_CATEGORY, `[EMPTY_TRACK] No motion samples; ${externalTimestamps.length} timestamp(s) left unmatched`);
        }

        return SyncLogger.time(LOG_CATEGORY, 'align', () =>
            externalTimestamps.map(t => this.matchOne(t, offset, gapThreshold))
        );
    }

    /**
     * Matches a single external timestamp.
     */
    matchOne(rawTimestamp: number, offset: number, gapThreshold: number = Infinity): FrameMatch {
        const aligned = rawTimestamp + offset;
        const { prev, next } = this.track.bracket(aligned);

        // After the last sample: reuse it, never extrapolate forward
        if (!next) {
            return prev
                ? createMatch(rawTimestamp, aligned, prev, prev, 1, gapThreshold, 'end')
                : createMatch(rawTimestamp, aligned, null, null, 0, gapThreshold, 'empty');
        }

        // Before the first sample: reuse it, never extrapolate backward
        if (!prev) {
            return createMatch(rawTimestamp, aligned, next, next, 0, gapThreshold, 'start');
        }

        // Zero-width (exact hit or duplicate timestamps) → weight 0
        const span = next.timestamp - prev.timestamp;
        const weight = span > PRECISION.ZERO_SPAN_SECONDS
            ? clamp01((aligned - prev.timestamp) / span)
            : 0;
        return createMatch(rawTimestamp, aligned, prev, next, weight, gapThreshold, 'none');
    }
}

/**
 * Counts gap, clamp and exact-hit matches for diagnostics and reports.
 */
export function summarizeMatches(matches: readonly FrameMatch[]): MatchSummary {
    const summary: MatchSummary = { total: matches.length, gapped: 0, clampedStart: 0, clampedEnd: 0, exact: 0, empty: 0 };

    for (const match of matches) {
        if (match.gapped) summary.gapped++;
        switch (match.clamp) {
            case 'start':
                summary.clampedStart++;
                break;
            case 'end':
                summary.clampedEnd++;
                break;
            case 'empty':
                summary.empty++;
                break;
            case 'none':
                if (match.prev !== null && match.prev === match.next) summary.exact++;
                break;
        }
    }

    return summary;
}
