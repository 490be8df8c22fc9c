/**
 * Types for timestamp matching.
 */

import { TrackSample } from '../shared/types';

/**
 * How the aligned timestamp related to the track's recorded interval.
 * - none:  inside the track, bracketed normally
 * - start: before the first sample, clamped to it (weight 0)
 * - end:   after the last sample, clamped to it (weight 1)
 * - empty: the track has no samples
 */
export type ClampKind = 'none' | 'start' | 'end' | 'empty';

/** Match of one external timestamp against the motion track. Frozen after creation. */
export interface FrameMatch {
    rawTimestamp: number;
    alignedTimestamp: number;
    prev: TrackSample | null;
    next: TrackSample | null;
    prevTimestamp: number | null;
    nextTimestamp: number | null;
    weight: number;             // [0, 1]
    gapped: boolean;            // bracket span exceeds the gap threshold
    clamp: ClampKind;
}

export interface AlignOptions {
    /** Bracket spans wider than this (same unit as timestamps) are flagged as gaps */
    gapThreshold?: number;
}

export interface MatchSummary {
    total: number;
    gapped: number;
    clampedStart: number;
    clampedEnd: number;
    exact: number;              // zero-width brackets inside the track
    empty: number;
}
