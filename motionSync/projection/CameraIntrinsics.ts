import { CAMERA } from '../shared/constants';
import { DiagnosticLog, SyncErrorCode } from '../shared/errors';
import { CameraIntrinsics } from './types';

/**
 * Pinhole intrinsics from a horizontal field of view.
 * f = (width / 2) / tan(fov / 2), principal point at the image centre.
 * Height never feeds the focal length.
 */
export function computeIntrinsics(width: number, height: number, fieldOfViewDeg: number): CameraIntrinsics {
    const fovRad = fieldOfViewDeg * Math.PI / 180;
    const focalLength = (width / 2) / Math.tan(fovRad / 2);

    return Object.freeze({
        width,
        height,
        fieldOfViewDeg,
        focalLength,
        cx: width / 2,
        cy: height / 2
    });
}

/**
 * Keeps the field of view inside [MIN_FOV_DEG, MAX_FOV_DEG]; reports when it had to clamp.
 */
export function sanitizeFieldOfView(fieldOfViewDeg: number, diagnostics?: DiagnosticLog): number {
    if (!Number.isFinite(fieldOfViewDeg)) {
        diagnostics?.report(SyncErrorCode.INVALID_CALIBRATION, `Field of view ${fieldOfViewDeg} is not a number, using default`);
        return CAMERA.DEFAULT_FOV_DEG;
    }

    const clamped = Math.max(CAMERA.MIN_FOV_DEG, Math.min(CAMERA.MAX_FOV_DEG, fieldOfViewDeg));
    if (clamped !== fieldOfViewDeg) {
        diagnostics?.report(SyncErrorCode.INVALID_CALIBRATION, `Field of view ${fieldOfViewDeg} clamped to ${clamped}`);
    }
    return clamped;
}
