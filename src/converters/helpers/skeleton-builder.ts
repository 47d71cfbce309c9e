/**
 * Skeleton Builder
 *
 * Turns the joints of glTF skins into the minimal joint tree written to a
 * BVH hierarchy, and reads pose snapshots from it.
 *
 * The tree starts at the common ancestor of the selected bones and keeps
 * every node that is a bone or has a bone below it, so unselected nodes
 * between two bones still become joints.
 */

import { Document, Node } from '@gltf-transform/core';
import { ERROR_MESSAGES } from '../../constants/errors';
import { PoseSnapshot, Skeleton, createSkeleton } from '../../core/skeleton';
import { BvhErrorFactory } from '../../errors';
import { sanitizeJointName } from '../../utils/name-utils';
import { Vec3, vec3Multiply, vec3Reciprocal } from '../../utils/quaternion-utils';
import {
  PoseOverrides,
  ancestorScale,
  isDescendantOf,
  readLocalTransform,
  worldRotation,
  worldTranslation,
} from './gltf-rig';

export interface DetectBonesOptions {
  /** Only joints strictly below this node are kept */
  rootBone?: Node | null;
}

export interface BuildSkeletonOptions {
  bones: readonly Node[];
  /** Node carrying the rig's placement and scale */
  rigNode?: Node | null;
  /** Names to write instead of node names */
  boneNames?: ReadonlyMap<Node, string>;
}

/**
 * Joints of every skin in the document, deduplicated and sorted by name.
 */
export function detectBones(document: Document, options: DetectBonesOptions = {}): Node[] {
  const rootBone = options.rootBone ?? null;
  const bones = new Set<Node>();

  for (const skin of document.getRoot().listSkins()) {
    for (const joint of skin.listJoints()) {
      if (rootBone === null || isDescendantOf(joint, rootBone)) {
        bones.add(joint);
      }
    }
  }

  return Array.from(bones).sort((a, b) => compareNames(a.getName(), b.getName()));
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * The bone that every other bone in the list descends from, or the
 * topmost bone found along the way. Null for an empty list.
 */
export function getRootBone(bones: readonly Node[]): Node | null {
  let root: Node | null = null;
  for (const bone of bones) {
    if (root === null || isDescendantOf(root, bone)) {
      root = bone;
    }
  }
  return root;
}

/**
 * True when the node is in the set or has a descendant in it. A node
 * found in the set is removed from it.
 */
function claimBone(boneSet: Set<Node>, node: Node): boolean {
  if (boneSet.delete(node)) {
    return true;
  }
  for (const other of boneSet) {
    if (isDescendantOf(other, node)) {
      return true;
    }
  }
  return false;
}

function jointName(node: Node, boneNames: ReadonlyMap<Node, string> | undefined, takenNames: ReadonlySet<string>): string {
  const name = node.getName();
  if (!boneNames) {
    return sanitizeJointName(name);
  }
  const renamed = boneNames.get(node);
  if (renamed !== undefined) {
    return sanitizeJointName(renamed);
  }
  // A bone keeping its own name must not collide with a renamed one
  return sanitizeJointName(takenNames.has(name) ? `${name}_` : name);
}

interface MutableJoint {
  name: string;
  restOffset: Vec3;
  children: MutableJoint[];
  handle: Node;
}

/**
 * Builds the minimal joint tree covering the given bones.
 *
 * Rest offsets are the local translations scaled by every ancestor's
 * scale; bone rotations are taken to be identity at rest. Root positions
 * are later written relative to the rig node's world position at this
 * moment, divided by its scale.
 */
export function buildSkeleton(options: BuildSkeletonOptions): Skeleton<Node> {
  if (options.bones.length === 0) {
    throw BvhErrorFactory.stateError(ERROR_MESSAGES.NO_BONES, 'buildSkeleton');
  }
  const rootBone = getRootBone(options.bones);
  if (!rootBone) {
    throw BvhErrorFactory.stateError(ERROR_MESSAGES.NO_ROOT_BONE, 'buildSkeleton');
  }

  const takenNames = new Set<string>(options.boneNames ? options.boneNames.values() : []);
  const makeJoint = (node: Node): MutableJoint => ({
    name: jointName(node, options.boneNames, takenNames),
    restOffset: vec3Multiply(ancestorScale(node), node.getTranslation()),
    children: [],
    handle: node,
  });

  const boneSet = new Set(options.bones);
  const root = makeJoint(rootBone);
  boneSet.delete(rootBone);

  const queue: MutableJoint[] = [root];
  while (queue.length > 0) {
    const joint = queue.shift();
    if (!joint) break;
    for (const child of joint.handle.listChildren()) {
      if (claimBone(boneSet, child)) {
        const childJoint = makeJoint(child);
        joint.children.push(childJoint);
        queue.push(childJoint);
      }
    }
  }

  const rigNode = options.rigNode ?? null;
  return createSkeleton<Node>(root, {
    scaleCompensation: rigNode ? vec3Reciprocal(rigNode.getScale()) : [1, 1, 1],
    basePosition: rigNode ? worldTranslation(rigNode) : [0, 0, 0],
  });
}

/**
 * Reads the current pose: root world position, root world rotation, and
 * the local rotation of every other joint. With overrides, those local
 * transforms stand in for the stored ones.
 */
export function captureSnapshot(skeleton: Skeleton<Node>, overrides?: PoseOverrides): PoseSnapshot {
  const root = skeleton.root.handle;
  return {
    rootPosition: worldTranslation(root, overrides),
    rotations: skeleton.joints.map(joint =>
      joint === skeleton.root
        ? worldRotation(root, overrides)
        : readLocalTransform(joint.handle, overrides).rotation
    ),
  };
}
