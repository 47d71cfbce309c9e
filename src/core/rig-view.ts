/**
 * Rig View
 *
 * Read-only access to a joint hierarchy for the curve decoder and the name
 * resolver. Implementations never expose a way to change the rig.
 */

import type { Mat4 } from '../utils/matrix-utils';
import type { Quat, Vec3 } from '../utils/quaternion-utils';

export interface RigView<TNode> {
  /** Nodes a breadth-first root search starts from, in order */
  readonly entryNodes: readonly TNode[];
  /** Local scale of the rig node */
  readonly scale: Readonly<Vec3>;
  getName(node: TNode): string;
  getChildren(node: TNode): readonly TNode[];
  /**
   * World matrix of the node's parent with the rig node moved to the origin
   * and unrotated. Identity for a node without a parent.
   */
  getParentMatrix(node: TNode): Mat4;
  /** World rotation of the node's parent, rig node unrotated */
  getParentRotation(node: TNode): Quat;
}
