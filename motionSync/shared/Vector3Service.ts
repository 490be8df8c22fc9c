import { Vector3 } from './types';
import { lerp } from './QuaternionService';

/**
 * Vector3 utility
 */
export const Vector3Service = {
    zero: (): Vector3 => ({ x: 0, y: 0, z: 0 }),

    add: (a: Vector3, b: Vector3): Vector3 => ({ x: a.x + b.x, y: a.y + b.y, z: a.z + b.z }),

    sub: (a: Vector3, b: Vector3): Vector3 => ({ x: a.x - b.x, y: a.y - b.y, z: a.z - b.z }),

    scale: (v: Vector3, s: number): Vector3 => ({ x: v.x * s, y: v.y * s, z: v.z * s }),

    lerp: (a: Vector3, b: Vector3, t: number): Vector3 => ({
        x: lerp(a.x, b.x, t),
        y: lerp(a.y, b.y, t),
        z: lerp(a.z, b.z, t)
    }),

    midpoint: (a: Vector3, b: Vector3): Vector3 => ({
        x: (a.x + b.x) / 2,
        y: (a.y + b.y) / 2,
        z: (a.z + b.z) / 2
    }),

    distance: (a: Vector3, b: Vector3): number => {
        const dx = a.x - b.x, dy = a.y - b.y, dz = a.z - b.z;
        return Math.sqrt(dx * dx + dy * dy + dz * dz);
    },

    fromArray: (values: readonly number[]): Vector3 => ({ x: values[0], y: values[1], z: values[2] }),

    toArray: (v: Vector3): [number, number, number] => [v.x, v.y, v.z]
};
