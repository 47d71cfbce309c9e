/**
 * Skeleton Model
 *
 * Engine-independent joint tree used when writing BVH. Each joint carries
 * its rest offset, computed once when the skeleton is built, plus an opaque
 * handle back to the engine node it stands for.
 */

import type { Quat, Vec3 } from '../utils/quaternion-utils';
import { flattenJoints } from './bvh-document';

export interface SkeletonJoint<THandle = unknown> {
  readonly name: string;
  /** Displacement from the parent joint with every rotation at identity */
  readonly restOffset: Readonly<Vec3>;
  readonly children: readonly SkeletonJoint<THandle>[];
  readonly handle: THandle;
}

export interface Skeleton<THandle = unknown> {
  readonly root: SkeletonJoint<THandle>;
  /** Pre-order, root first; the order of rotations in a PoseSnapshot */
  readonly joints: readonly SkeletonJoint<THandle>[];
  /** Element-wise reciprocal of the rig scale */
  readonly scaleCompensation: Readonly<Vec3>;
  /** Rig position when the skeleton was built; root positions are written relative to it */
  readonly basePosition: Readonly<Vec3>;
}

/**
 * Pose of a skeleton at one instant.
 * `rotations[0]` is the root's world rotation, the rest are local rotations,
 * all in Skeleton.joints order.
 */
export interface PoseSnapshot {
  readonly rootPosition: Readonly<Vec3>;
  readonly rotations: readonly Readonly<Quat>[];
}

export interface SkeletonOptions {
  scaleCompensation?: Readonly<Vec3>;
  basePosition?: Readonly<Vec3>;
}

/**
 * Wraps a joint tree into a Skeleton with its pre-order joint list.
 */
export function createSkeleton<THandle>(root: SkeletonJoint<THandle>, options: SkeletonOptions = {}): Skeleton<THandle> {
  return {
    root,
    joints: flattenJoints(root),
    scaleCompensation: options.scaleCompensation ?? [1, 1, 1],
    basePosition: options.basePosition ?? [0, 0, 0],
  };
}
