import { CAMERA, MOTION_RATES } from './constants';

export enum MotionRateProfile {
    HZ_72_STREAM = '72HZ_STREAM',
    HZ_90_STREAM = '90HZ_STREAM',
    HZ_120_STREAM = '120HZ_STREAM'
}

/** A bracket wider than this many nominal sample periods counts as a recording gap */
export const GAP_PERIOD_MULTIPLIER = 4;

interface ProfileSettings {
    motionRateHz: number;
}

const PROFILE_OPTIONS: Record<MotionRateProfile, ProfileSettings> = {
    [MotionRateProfile.HZ_72_STREAM]: { motionRateHz: MOTION_RATES.HZ_72 },
    [MotionRateProfile.HZ_90_STREAM]: { motionRateHz: MOTION_RATES.HZ_90 },
    [MotionRateProfile.HZ_120_STREAM]: { motionRateHz: MOTION_RATES.HZ_120 }
};

/**
 * Session-wide synchronization settings.
 */
export interface SyncConfig {
    motionRateHz: number;
    gapThresholdSec: number;
    frameWidth: number;
    frameHeight: number;
    fieldOfViewDeg: number;
    minProjectionDepth: number;
}

/**
 * Creates synchronization configuration for the given motion stream rate.
 * Explicit overrides win over the profile-derived values.
 */
export function createSyncConfig(
    profile: MotionRateProfile = MotionRateProfile.HZ_72_STREAM,
    overrides: Partial<SyncConfig> = {}
): SyncConfig {
    const settings = PROFILE_OPTIONS[profile];

    return {
        motionRateHz: settings.motionRateHz,
        gapThresholdSec: gapThresholdForRate(settings.motionRateHz),
        frameWidth: CAMERA.DEFAULT_WIDTH,
        frameHeight: CAMERA.DEFAULT_HEIGHT,
        fieldOfViewDeg: CAMERA.DEFAULT_FOV_DEG,
        minProjectionDepth: CAMERA.MIN_PROJECTION_DEPTH,
        ...overrides
    };
}

export function gapThresholdForRate(motionRateHz: number): number {
    return GAP_PERIOD_MULTIPLIER / motionRateHz;
}
