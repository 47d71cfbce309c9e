/**
 * Quaternion and Vector Utilities
 *
 * Small, allocation-light helpers over plain tuples. Quaternions are stored
 * as [x, y, z, w], matching glTF node rotations.
 */

export type Vec3 = [number, number, number];
export type Quat = [number, number, number, number];

export const DEG2RAD = Math.PI / 180;
export const RAD2DEG = 180 / Math.PI;

export const IDENTITY_QUAT: Readonly<Quat> = [0, 0, 0, 1];

export const AXIS_X: Readonly<Vec3> = [1, 0, 0];
export const AXIS_Y: Readonly<Vec3> = [0, 1, 0];
export const AXIS_Z: Readonly<Vec3> = [0, 0, 1];

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function vec3Add(a: Readonly<Vec3>, b: Readonly<Vec3>): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function vec3Sub(a: Readonly<Vec3>, b: Readonly<Vec3>): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * Element-wise product
 */
export function vec3Multiply(a: Readonly<Vec3>, b: Readonly<Vec3>): Vec3 {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
}

/**
 * Element-wise reciprocal. A zero component maps to zero.
 */
export function vec3Reciprocal(a: Readonly<Vec3>): Vec3 {
  return [
    a[0] === 0 ? 0 : 1 / a[0],
    a[1] === 0 ? 0 : 1 / a[1],
    a[2] === 0 ? 0 : 1 / a[2],
  ];
}

/**
 * Hamilton product a * b (apply b first, then a)
 */
export function quatMultiply(a: Readonly<Quat>, b: Readonly<Quat>): Quat {
  const [ax, ay, az, aw] = a;
  const [bx, by, bz, bw] = b;
  return [
    aw * bx + ax * bw + ay * bz - az * by,
    aw * by - ax * bz + ay * bw + az * bx,
    aw * bz + ax * by - ay * bx + az * bw,
    aw * bw - ax * bx - ay * by - az * bz,
  ];
}

export function quatFromAxisAngle(axis: Readonly<Vec3>, degrees: number): Quat {
  const half = degrees * DEG2RAD * 0.5;
  const s = Math.sin(half);
  return [axis[0] * s, axis[1] * s, axis[2] * s, Math.cos(half)];
}

export function quatNormalize(q: Readonly<Quat>): Quat {
  const length = Math.hypot(q[0], q[1], q[2], q[3]);
  if (!Number.isFinite(length) || length < 1e-12) {
    return [0, 0, 0, 1];
  }
  return [q[0] / length, q[1] / length, q[2] / length, q[3] / length];
}

/**
 * Inverse of a unit quaternion
 */
export function quatConjugate(q: Readonly<Quat>): Quat {
  return [-q[0], -q[1], -q[2], q[3]];
}

export function quatDot(a: Readonly<Quat>, b: Readonly<Quat>): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2] + a[3] * b[3];
}

/**
 * Spherical interpolation along the shorter arc
 */
export function quatSlerp(a: Readonly<Quat>, b: Readonly<Quat>, t: number): Quat {
  let dot = quatDot(a, b);
  let end: Quat = [b[0], b[1], b[2], b[3]];
  if (dot < 0) {
    dot = -dot;
    end = [-b[0], -b[1], -b[2], -b[3]];
  }

  if (dot > 0.9995) {
    return quatNormalize([
      a[0] + (end[0] - a[0]) * t,
      a[1] + (end[1] - a[1]) * t,
      a[2] + (end[2] - a[2]) * t,
      a[3] + (end[3] - a[3]) * t,
    ]);
  }

  const theta = Math.acos(clamp(dot, -1, 1));
  const sinTheta = Math.sin(theta);
  const wa = Math.sin((1 - t) * theta) / sinTheta;
  const wb = Math.sin(t * theta) / sinTheta;
  return [
    a[0] * wa + end[0] * wb,
    a[1] * wa + end[1] * wb,
    a[2] * wa + end[2] * wb,
    a[3] * wa + end[3] * wb,
  ];
}
