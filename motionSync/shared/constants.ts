/**
 * System-wide mathematical and timing constants.
 */
export enum SYSTEM {
    MILLISECONDS_PER_SECOND = 1000,
}

/**
 * Numeric tolerances.
 */
export enum PRECISION {
    QUATERNION_EPSILON = 0.000001,
    ZERO_SPAN_SECONDS = 1e-9,
    // Above this cosine the slerp falls back to normalized lerp
    SLERP_LINEAR_THRESHOLD = 0.9995,
}

/**
 * Camera and calibration defaults.
 */
export enum CAMERA {
    DEFAULT_WIDTH = 1920,
    DEFAULT_HEIGHT = 1080,
    DEFAULT_FOV_DEG = 100,
    MIN_FOV_DEG = 1,
    MAX_FOV_DEG = 179,
    MIN_PROJECTION_DEPTH = 0.1,
    DEFAULT_AXIS_LENGTH = 0.1,
}

/**
 * Nominal motion stream rates for the supported headsets.
 */
export enum MOTION_RATES {
    HZ_72 = 72,
    HZ_90 = 90,
    HZ_120 = 120,
}

/**
 * Motion source discovery.
 */
export const SOURCE_FILES = {
    EXTENSION: '.json',
    EXCLUDED_SUFFIXES: ['metadata.json', 'validation.json'],
} as const;

export const DIAGNOSTIC_HISTORY_SIZE = 200;
