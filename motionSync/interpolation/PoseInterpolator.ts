import { Pose } from '../shared/types';
import { QuaternionService, lerp } from '../shared/QuaternionService';
import { Vector3Service } from '../shared/Vector3Service';

function scalarOrZero(value: number | undefined): number {
    return value !== undefined && Number.isFinite(value) ? value : 0;
}

/**
 * Blends two poses: position and gripper linearly, rotation by shortest-arc SLERP.
 * Stateless; identical inputs always give identical outputs.
 */
export class PoseInterpolator {

    /**
     * Interpolates between a (weight 0) and b (weight 1).
     * Weight is clamped to [0, 1]; NaN is treated as 0.
     */
    static interpolate(a: Pose, b: Pose, weight: number): Pose {
        const w = PoseInterpolator.clampWeight(weight);

        return {
            position: Vector3Service.lerp(a.position, b.position, w),
            rotation: QuaternionService.slerp(a.rotation, b.rotation, w),
            gripper: lerp(scalarOrZero(a.gripper), scalarOrZero(b.gripper), w)
        };
    }

    /**
     * Interpolates auxiliary poses; null unless both sides carry one.
     */
    static interpolateOptional(a: Pose | null, b: Pose | null, weight: number): Pose | null {
        if (!a || !b) return null;
        return PoseInterpolator.interpolate(a, b, weight);
    }

    static clampWeight(weight: number): number {
        if (Number.isNaN(weight)) return 0;
        return Math.max(0, Math.min(1, weight));
    }
}
