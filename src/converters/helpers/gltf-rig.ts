/**
 * glTF Rig Helpers
 *
 * Transform queries over glTF nodes. Every query can take pose overrides,
 * local transforms that replace a node's stored ones, so a pose can be
 * evaluated without writing to the document.
 */

import { Document, Node } from '@gltf-transform/core';
import type { RigView } from '../../core/rig-view';
import { IDENTITY_MATRIX, Mat4, composeMatrix, multiplyMatrices, transformPoint } from '../../utils/matrix-utils';
import { IDENTITY_QUAT, Quat, Vec3, quatMultiply } from '../../utils/quaternion-utils';

export interface LocalTransform {
  translation: Vec3;
  rotation: Quat;
  scale: Vec3;
}

/**
 * Local transforms replacing a node's stored TRS, per node
 */
export type PoseOverrides = ReadonlyMap<Node, Partial<LocalTransform>>;

const NO_OVERRIDES: PoseOverrides = new Map();

export function readLocalTransform(node: Node, overrides: PoseOverrides = NO_OVERRIDES): LocalTransform {
  const override = overrides.get(node);
  return {
    translation: override?.translation ?? node.getTranslation(),
    rotation: override?.rotation ?? node.getRotation(),
    scale: override?.scale ?? node.getScale(),
  };
}

export function localMatrix(node: Node, overrides: PoseOverrides = NO_OVERRIDES): Mat4 {
  const local = readLocalTransform(node, overrides);
  return composeMatrix(local.translation, local.rotation, local.scale);
}

export function worldMatrix(node: Node, overrides: PoseOverrides = NO_OVERRIDES): Mat4 {
  const parent = node.getParentNode();
  const local = localMatrix(node, overrides);
  return parent ? multiplyMatrices(worldMatrix(parent, overrides), local) : local;
}

/**
 * Product of local rotations from the scene root down to the node
 */
export function worldRotation(node: Node, overrides: PoseOverrides = NO_OVERRIDES): Quat {
  const parent = node.getParentNode();
  const local = readLocalTransform(node, overrides).rotation;
  return parent ? quatMultiply(worldRotation(parent, overrides), local) : local;
}

export function worldTranslation(node: Node, overrides: PoseOverrides = NO_OVERRIDES): Vec3 {
  const parent = node.getParentNode();
  const local = readLocalTransform(node, overrides).translation;
  return parent ? transformPoint(worldMatrix(parent, overrides), local) : [local[0], local[1], local[2]];
}

/**
 * True when `ancestor` is a proper ancestor of `node`
 */
export function isDescendantOf(node: Node, ancestor: Node): boolean {
  let current = node.getParentNode();
  while (current) {
    if (current === ancestor) {
      return true;
    }
    current = current.getParentNode();
  }
  return false;
}

/**
 * Element-wise product of the scales of every proper ancestor of a node
 */
export function ancestorScale(node: Node): Vec3 {
  const scale: Vec3 = [1, 1, 1];
  let current = node.getParentNode();
  while (current) {
    const s = current.getScale();
    scale[0] *= s[0];
    scale[1] *= s[1];
    scale[2] *= s[2];
    current = current.getParentNode();
  }
  return scale;
}

/**
 * Top-level nodes of the default scene, or of the first scene when no
 * default is set. A document without scenes yields every parentless node.
 */
export function listSceneRoots(document: Document): Node[] {
  const root = document.getRoot();
  const scene = root.getDefaultScene() ?? root.listScenes()[0];
  if (scene) {
    return scene.listChildren();
  }
  return root.listNodes().filter(node => node.getParentNode() === null);
}

/**
 * RigView over a glTF document. With a rig node the search starts there
 * and the node's translation and rotation are ignored by the parent
 * queries; without one the whole scene is the rig.
 */
export function createGltfRigView(document: Document, rigNode: Node | null = null): RigView<Node> {
  const neutralMatrix = (node: Node): Mat4 => {
    if (node === rigNode) {
      return composeMatrix([0, 0, 0], IDENTITY_QUAT, node.getScale());
    }
    const parent = node.getParentNode();
    const local = localMatrix(node);
    return parent ? multiplyMatrices(neutralMatrix(parent), local) : local;
  };

  const neutralRotation = (node: Node): Quat => {
    if (node === rigNode) {
      return [...IDENTITY_QUAT];
    }
    const parent = node.getParentNode();
    const local = node.getRotation();
    return parent ? quatMultiply(neutralRotation(parent), local) : local;
  };

  return {
    entryNodes: rigNode ? [rigNode] : listSceneRoots(document),
    scale: rigNode ? rigNode.getScale() : [1, 1, 1],
    getName: node => node.getName(),
    getChildren: node => node.listChildren(),
    getParentMatrix: node => {
      const parent = node.getParentNode();
      return parent ? neutralMatrix(parent) : [...IDENTITY_MATRIX];
    },
    getParentRotation: node => {
      const parent = node.getParentNode();
      return parent ? neutralRotation(parent) : [...IDENTITY_QUAT];
    },
  };
}
