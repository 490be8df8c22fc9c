/**
 * MotionTrack - immutable, time-ordered store of motion keyframes.
 *
 * Primary (hand) poses and the auxiliary eye channels live in parallel arrays that are
 * aligned by index. Construction concatenates every source, then applies ONE stable sort
 * permutation to all arrays at once; channels are never sorted on their own.
 * After construction the track is frozen.
 */

import { AuxiliaryChannel, Pose, TimeRange, TrackSample } from '../shared/types';
import { DiagnosticLog, SyncErrorCode } from '../shared/errors';
import { SyncLogger } from '../shared/SyncLogger';
import { parseMotionSource } from './MotionSourceParser';
import { BracketResult, MotionTrackBuildResult, NamedMotionSource, TrackEntry } from './types';

const LOG_CATEGORY = 'MotionTrack';

interface TrackColumns {
    timestamps: number[];
    poses: Pose[];
    leftEye: (Pose | null)[];
    rightEye: (Pose | null)[];
}

function freezePose(pose: Pose): Pose {
    return Object.freeze({
        position: Object.freeze({ ...pose.position }),
        rotation: Object.freeze({ ...pose.rotation }),
        gripper: pose.gripper
    });
}

/**
 * Index of the first timestamp >= target (bisect-left).
 */
export function bisectLeft(timestamps: readonly number[], target: number): number {
    let left = 0;
    let right = timestamps.length;

    while (left < right) {
        const mid = Math.floor((left + right) / 2);
        if (timestamps[mid] < target) {
            left = mid + 1;
        } else {
            right = mid;
        }
    }

    return left;
}

export class MotionTrack {
    private readonly timestamps: readonly number[];
    private readonly samples: readonly TrackSample[];
    private readonly auxiliaryPresent: Readonly<Record<AuxiliaryChannel, boolean>>;

    private constructor(columns: TrackColumns) {
        // Stable sort of an index permutation, then every column is read through it
        const order = columns.timestamps.map((_, i) => i);
        order.sort((a, b) => columns.timestamps[a] - columns.timestamps[b]);

        const samples: TrackSample[] = order.map((sourceIdx, index) => {
            const leftEye = columns.leftEye[sourceIdx];
            const rightEye = columns.rightEye[sourceIdx];
            return Object.freeze({
                index,
                timestamp: columns.timestamps[sourceIdx],
                pose: freezePose(columns.poses[sourceIdx]),
                leftEye: leftEye ? freezePose(leftEye) : null,
                rightEye: rightEye ? freezePose(rightEye) : null
            });
        });

        this.samples = Object.freeze(samples);
        this.timestamps = Object.freeze(samples.map(s => s.timestamp));
        this.auxiliaryPresent = Object.freeze({
            leftEye: samples.some(s => s.leftEye !== null),
            rightEye: samples.some(s => s.rightEye !== null)
        });
        Object.freeze(this);
    }

    /**
     * Builds a track from parsed-JSON motion sources.
     * Sources that cannot be used are skipped and reported; this never throws for bad data.
     */
    static build(sources: readonly NamedMotionSource[]): MotionTrackBuildResult {
        const diagnostics = new DiagnosticLog(LOG_CATEGORY);
        const columns: TrackColumns = { timestamps: [], poses: [], leftEye: [], rightEye: [] };
        const contributingSources: string[] = [];

        for (const source of sources) {
            const trajectory = parseMotionSource(source, diagnostics);
            if (!trajectory) continue;

            const count = trajectory.timestamps.length;
            for (let i = 0; i < count; i++) {
                columns.timestamps.push(trajectory.timestamps[i]);
                columns.poses.push(trajectory.poses[i]);
                columns.leftEye.push(trajectory.leftEye ? trajectory.leftEye[i] : null);
                columns.rightEye.push(trajectory.rightEye ? trajectory.rightEye[i] : null);
            }
            contributingSources.push(source.name);
        }

        if (contributingSources.length === 0) {
            diagnostics.report(SyncErrorCode.NO_SOURCES, `None of ${sources.length} source(s) contributed samples`);
        }

        const track = new MotionTrack(columns);
        SyncLogger.info(LOG_CATEGORY, `Built track with ${track.size} samples from ${contributingSources.length} source(s)`);

        return { track, diagnostics: diagnostics.getAll(), contributingSources };
    }

    /**
     * Builds a track from unnamed parsed records; diagnostics name them source[0], source[1], ...
     */
    static fromRecords(records: readonly unknown[]): MotionTrackBuildResult {
        return MotionTrack.build(records.map((record, i) => ({ name: `source[${i}]`, record })));
    }

    /**
     * Builds a track from in-memory keyframes (any order).
     */
    static fromSamples(entries: readonly TrackEntry[]): MotionTrack {
        return new MotionTrack({
            timestamps: entries.map(e => e.timestamp),
            poses: entries.map(e => e.pose),
            leftEye: entries.map(e => e.leftEye ?? null),
            rightEye: entries.map(e => e.rightEye ?? null)
        });
    }

    static empty(): MotionTrack {
        return new MotionTrack({ timestamps: [], poses: [], leftEye: [], rightEye: [] });
    }

    get size(): number {
        return this.samples.length;
    }

    isEmpty(): boolean {
        return this.samples.length === 0;
    }

    /** Get sample at specific index */
    getSample(index: number): TrackSample | null {
        if (index < 0 || index >= this.samples.length) {
            return null;
        }
        return this.samples[index];
    }

    getTimestamps(): readonly number[] {
        return this.timestamps;
    }

    /** True when at least one sample carries a pose for the channel */
    hasAuxiliary(channel: AuxiliaryChannel): boolean {
        return this.auxiliaryPresent[channel];
    }

    /** First and last timestamps, or null for an empty track */
    timeRange(): TimeRange | null {
        if (this.samples.length === 0) return null;
        return {
            start: this.timestamps[0],
            end: this.timestamps[this.timestamps.length - 1]
        };
    }

    /**
     * Closest sample to timestamp. Of the insertion point and its predecessor the nearer wins;
     * a tie goes to the insertion point. Null when empty or farther than tolerance.
     */
    nearest(timestamp: number, tolerance?: number): TrackSample | null {
        if (this.samples.length === 0) return null;

        const idx = bisectLeft(this.timestamps, timestamp);
        let bestIdx = -1;
        let minDiff = Infinity;

        for (const candidate of [idx, idx - 1]) {
            if (candidate < 0 || candidate >= this.samples.length) continue;
            const diff = Math.abs(this.timestamps[candidate] - timestamp);
            if (diff < minDiff) {
                minDiff = diff;
                bestIdx = candidate;
            }
        }

        if (bestIdx < 0) return null;
        if (tolerance !== undefined && minDiff > tolerance) return null;
        return this.samples[bestIdx];
    }

    /**
     * Samples surrounding timestamp.
     * Exact hit → the same sample as both prev and next (zero-width bracket).
     * Before the start prev is null, past the end next is null; both null only when empty.
     */
    bracket(timestamp: number): BracketResult {
        if (this.samples.length === 0) {
            return { prev: null, next: null };
        }

        const idx = bisectLeft(this.timestamps, timestamp);

        if (idx < this.samples.length && this.timestamps[idx] === timestamp) {
            const hit = this.samples[idx];
            return { prev: hit, next: hit };
        }

        return {
            prev: idx > 0 ? this.samples[idx - 1] : null,
            next: idx < this.samples.length ? this.samples[idx] : null
        };
    }
}
