/**
 * Coordinate Convention Engine
 *
 * Converts rig-space rotations and positions to BVH-space Euler triples and
 * offsets and back. Two conventions are supported:
 *
 * - 'standard': BVH's default Y-up, Z-forward space. The rig is mirrored
 *   along X, so positions become (-x, y, z) and rotations (x, -y, -z, w).
 * - 'blender': Z-up, Y-forward space as expected by Blender's importer.
 *   Positions become (-x, -z, y) and rotations (x, z, -y, w).
 *
 * Rotations are written as Zrotation Xrotation Yrotation, i.e. the rotation
 * R = Rz * Rx * Ry. All functions are pure.
 */

import {
  AXIS_X,
  AXIS_Y,
  AXIS_Z,
  Quat,
  RAD2DEG,
  Vec3,
  clamp,
  quatFromAxisAngle,
  quatMultiply,
  quatNormalize,
  vec3Multiply,
} from '../utils/quaternion-utils';

export type CoordinateConvention = 'standard' | 'blender';

/**
 * Euler angles in degrees for the ZXY rotation order
 */
export interface EulerZXY {
  x: number;
  y: number;
  z: number;
}

/**
 * Maps an angle in degrees into (-180, 180] assuming it is within one turn.
 */
export function wrapAngle(angle: number): number {
  if (angle > 180) {
    return angle - 360;
  }
  if (angle < -180) {
    return angle + 360;
  }
  return angle;
}

/**
 * Decomposes a unit quaternion into ZXY Euler angles such that
 * eulerZXYToQuaternion(result) reproduces it (up to sign). Near x = ±90°
 * the split between z and y is not unique.
 */
export function quaternionToEulerZXY(q: Readonly<Quat>): EulerZXY {
  const [x, y, z, w] = q;
  return {
    z: Math.atan2(-2 * (x * y - w * z), w * w - x * x + y * y - z * z) * RAD2DEG,
    x: Math.asin(clamp(2 * (y * z + w * x), -1, 1)) * RAD2DEG,
    y: Math.atan2(-2 * (x * z - w * y), w * w - x * x - y * y + z * z) * RAD2DEG,
  };
}

/**
 * AngleAxis(z, +Z) * AngleAxis(x, +X) * AngleAxis(y, +Y)
 */
export function eulerZXYToQuaternion(euler: Readonly<EulerZXY>): Quat {
  return quatMultiply(
    quatMultiply(quatFromAxisAngle(AXIS_Z, euler.z), quatFromAxisAngle(AXIS_X, euler.x)),
    quatFromAxisAngle(AXIS_Y, euler.y)
  );
}

/**
 * Rig rotation to BVH space, before decomposition
 */
export function remapRotationToBvh(q: Readonly<Quat>, convention: CoordinateConvention): Quat {
  if (convention === 'blender') {
    return [q[0], q[2], -q[1], q[3]];
  }
  return [q[0], -q[1], -q[2], q[3]];
}

/**
 * BVH rotation back to rig space, after composition
 */
export function remapRotationFromBvh(q: Readonly<Quat>, convention: CoordinateConvention): Quat {
  if (convention === 'blender') {
    return [q[0], -q[2], q[1], q[3]];
  }
  return [q[0], -q[1], -q[2], q[3]];
}

export function remapPositionToBvh(p: Readonly<Vec3>, convention: CoordinateConvention): Vec3 {
  if (convention === 'blender') {
    return [-p[0], -p[2], p[1]];
  }
  return [-p[0], p[1], p[2]];
}

export function remapPositionFromBvh(p: Readonly<Vec3>, convention: CoordinateConvention): Vec3 {
  if (convention === 'blender') {
    return [-p[0], p[2], -p[1]];
  }
  return [-p[0], p[1], p[2]];
}

/**
 * Rig-space offset to a BVH OFFSET or position triple. `scaleCompensation`
 * is the element-wise reciprocal of the rig's scale, since offsets are
 * measured in the rig's possibly scaled space.
 */
export function toBvhOffset(
  offset: Readonly<Vec3>,
  convention: CoordinateConvention,
  scaleCompensation: Readonly<Vec3> = [1, 1, 1]
): Vec3 {
  return remapPositionToBvh(vec3Multiply(offset, scaleCompensation), convention);
}

export function fromBvhOffset(offset: Readonly<Vec3>, convention: CoordinateConvention): Vec3 {
  return remapPositionFromBvh(offset, convention);
}

/**
 * Rig rotation to wrapped BVH channel values in Zrotation Xrotation
 * Yrotation order.
 */
export function toBvhRotation(rotation: Readonly<Quat>, convention: CoordinateConvention): Vec3 {
  const euler = quaternionToEulerZXY(quatNormalize(remapRotationToBvh(rotation, convention)));
  return [wrapAngle(euler.z), wrapAngle(euler.x), wrapAngle(euler.y)];
}

/**
 * Wrapped BVH Euler angles to a rig rotation.
 */
export function fromBvhRotation(euler: Readonly<EulerZXY>, convention: CoordinateConvention): Quat {
  const wrapped: EulerZXY = {
    x: wrapAngle(euler.x),
    y: wrapAngle(euler.y),
    z: wrapAngle(euler.z),
  };
  return remapRotationFromBvh(eulerZXYToQuaternion(wrapped), convention);
}
