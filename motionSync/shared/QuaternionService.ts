import { Quaternion, Vector3 } from './types';
import { PRECISION } from './constants';

const DEG_TO_RAD = Math.PI / 180;

/**
 * Centralized service for all quaternion mathematical operations.
 * Quaternions are plain {w, x, y, z} objects and every operation returns a new value.
 */
export class QuaternionService {

    /**
     * Creates identity quaternion (no rotation) for safe fallback scenarios.
     */
    static createIdentity(): Quaternion {
        return { w: 1, x: 0, y: 0, z: 0 };
    }

    /**
     * Validates quaternion has all required numeric components.
     */
    static isValid(q: unknown): q is Quaternion {
        return typeof q === 'object' && q !== null &&
            'w' in q && 'x' in q && 'y' in q && 'z' in q &&
            typeof q.w === 'number' && isFinite(q.w) &&
            typeof q.x === 'number' && isFinite(q.x) &&
            typeof q.y === 'number' && isFinite(q.y) &&
            typeof q.z === 'number' && isFinite(q.z);
    }

    /**
     * Calculates quaternion magnitude (length).
     */
    static magnitude(q: Quaternion): number {
        return Math.sqrt(q.w * q.w + q.x * q.x + q.y * q.y + q.z * q.z);
    }

    /**
     * Normalizes quaternion to unit length with fallback to identity on invalid input.
     */
    static normalize(q: Quaternion): Quaternion {
        if (!QuaternionService.isValid(q)) {
            return QuaternionService.createIdentity();
        }

        const norm = QuaternionService.magnitude(q);
        if (norm < PRECISION.QUATERNION_EPSILON || !isFinite(norm)) {
            return QuaternionService.createIdentity();
        }

        const invNorm = 1.0 / norm;
        return {
            w: q.w * invNorm,
            x: q.x * invNorm,
            y: q.y * invNorm,
            z: q.z * invNorm
        };
    }

    static conjugate(q: Quaternion): Quaternion {
        return { w: q.w, x: -q.x, y: -q.y, z: -q.z };
    }

    /**
     * Computes quaternion inverse (conjugate for unit quaternions).
     */
    static inverse(q: Quaternion): Quaternion {
        return QuaternionService.conjugate(QuaternionService.normalize(q));
    }

    /**
     * Calculates dot product between two quaternions.
     */
    static dot(q1: Quaternion, q2: Quaternion): number {
        return q1.w * q2.w + q1.x * q2.x + q1.y * q2.y + q1.z * q2.z;
    }

    static negate(q: Quaternion): Quaternion {
        return { w: -q.w, x: -q.x, y: -q.y, z: -q.z };
    }

    /**
     * Hamilton product a * b (b is applied first when rotating vectors).
     */
    static multiply(a: Quaternion, b: Quaternion): Quaternion {
        return {
            w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
            x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
            y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
            z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w
        };
    }

    /**
     * Rotates vector v by quaternion q: v' = q * v * q⁻¹
     */
    static rotate(q: Quaternion, v: Vector3): Vector3 {
        const { w, x, y, z } = q;
        const ix = w * v.x + y * v.z - z * v.y;
        const iy = w * v.y + z * v.x - x * v.z;
        const iz = w * v.z + x * v.y - y * v.x;
        const iw = -x * v.x - y * v.y - z * v.z;

        return {
            x: ix * w + iw * -x + iy * -z - iz * -y,
            y: iy * w + iw * -y + iz * -x - ix * -z,
            z: iz * w + iw * -z + ix * -y - iy * -x
        };
    }

    /**
     * Spherical linear interpolation along the shortest arc.
     * Result is renormalized to absorb floating-point drift.
     */
    static slerp(q1: Quaternion, q2: Quaternion, t: number): Quaternion {
        // Endpoints return the inputs themselves, not their sign-flipped twins
        if (t <= 0) return QuaternionService.normalize(q1);
        if (t >= 1) return QuaternionService.normalize(q2);

        let q2Adj = q2;
        let cosHalfTheta = QuaternionService.dot(q1, q2);

        // Take shorter path
        if (cosHalfTheta < 0) {
            q2Adj = QuaternionService.negate(q2);
            cosHalfTheta = -cosHalfTheta;
        }

        // Nearly identical rotations: sin(θ) → 0, use normalized lerp instead
        if (cosHalfTheta > PRECISION.SLERP_LINEAR_THRESHOLD) {
            return QuaternionService.normalize({
                w: lerp(q1.w, q2Adj.w, t),
                x: lerp(q1.x, q2Adj.x, t),
                y: lerp(q1.y, q2Adj.y, t),
                z: lerp(q1.z, q2Adj.z, t)
            });
        }

        const halfTheta = Math.acos(Math.min(cosHalfTheta, 1));
        const sinHalfTheta = Math.sqrt(1 - cosHalfTheta * cosHalfTheta);

        const ratioA = Math.sin((1 - t) * halfTheta) / sinHalfTheta;
        const ratioB = Math.sin(t * halfTheta) / sinHalfTheta;

        return QuaternionService.normalize({
            w: q1.w * ratioA + q2Adj.w * ratioB,
            x: q1.x * ratioA + q2Adj.x * ratioB,
            y: q1.y * ratioA + q2Adj.y * ratioB,
            z: q1.z * ratioA + q2Adj.z * ratioB
        });
    }

    /**
     * Rotation of `angleRad` about a unit axis.
     */
    static fromAxisAngle(axis: Vector3, angleRad: number): Quaternion {
        const halfAngle = angleRad * 0.5;
        const s = Math.sin(halfAngle);
        return {
            w: Math.cos(halfAngle),
            x: axis.x * s,
            y: axis.y * s,
            z: axis.z * s
        };
    }

    /**
     * Intrinsic X-Y-Z Euler angles in degrees: rotate about X, then the new Y, then the new Z.
     * Composes as Rx * Ry * Rz.
     */
    static fromEulerXYZ(eulerDeg: Vector3): Quaternion {
        const qx = QuaternionService.fromAxisAngle({ x: 1, y: 0, z: 0 }, eulerDeg.x * DEG_TO_RAD);
        const qy = QuaternionService.fromAxisAngle({ x: 0, y: 1, z: 0 }, eulerDeg.y * DEG_TO_RAD);
        const qz = QuaternionService.fromAxisAngle({ x: 0, y: 0, z: 1 }, eulerDeg.z * DEG_TO_RAD);

        return QuaternionService.normalize(
            QuaternionService.multiply(QuaternionService.multiply(qx, qy), qz)
        );
    }

    /**
     * Smallest rotation angle (radians) taking q1 onto q2.
     */
    static angleBetween(q1: Quaternion, q2: Quaternion): number {
        const d = Math.min(1, Math.abs(QuaternionService.dot(
            QuaternionService.normalize(q1),
            QuaternionService.normalize(q2)
        )));
        return 2 * Math.acos(d);
    }

    /** Reads a scalar-last [qx, qy, qz, qw] tuple. */
    static fromScalarLast(values: readonly number[]): Quaternion {
        return { x: values[0], y: values[1], z: values[2], w: values[3] };
    }

    /** Writes a scalar-last [qx, qy, qz, qw] tuple. */
    static toScalarLast(q: Quaternion): [number, number, number, number] {
        return [q.x, q.y, q.z, q.w];
    }
}

/**
 * lerp helper function
 */
export const lerp = (a: number, b: number, t: number): number => (1 - t) * a + t * b;
