/**
 * Curve Decoder
 *
 * Converts a parsed BVH document into keyframe curves for rig nodes.
 * Joints are matched to nodes by name, walking the BVH hierarchy and the
 * rig hierarchy together. Only the root may carry position curves; every
 * joint with a full set of rotation channels gets rotation curves.
 *
 * The rig is read through a RigView and never changed, so decoding can run
 * anywhere the view is valid.
 */

import {
  BvhDocument,
  BvhJoint,
  POSITION_CHANNELS,
  ROTATION_CHANNELS,
  getChannelTriple,
} from '../core/bvh-document';
import { CoordinateConvention, fromBvhOffset, fromBvhRotation } from '../core/coordinate-convention';
import type { RigView } from '../core/rig-view';
import { Logger, LoggerFactory } from '../utils/logger';
import { invertMatrix4x4, transformPoint } from '../utils/matrix-utils';
import { quatConjugate, quatMultiply, vec3Add, vec3Multiply } from '../utils/quaternion-utils';
import { NameResolver, NameResolverOptions } from './helpers/name-resolver';

export type PositionProperty = 'position.x' | 'position.y' | 'position.z';
export type RotationProperty = 'rotation.x' | 'rotation.y' | 'rotation.z' | 'rotation.w';
export type CurveProperty = PositionProperty | RotationProperty;

export const POSITION_PROPERTIES: readonly PositionProperty[] = ['position.x', 'position.y', 'position.z'];
export const ROTATION_PROPERTIES: readonly RotationProperty[] = ['rotation.x', 'rotation.y', 'rotation.z', 'rotation.w'];

export interface CurveKey {
  /** Seconds */
  time: number;
  value: number;
}

export interface Curve<TNode> {
  target: TNode;
  property: CurveProperty;
  keys: CurveKey[];
}

export interface DecodeOptions<TNode> extends NameResolverOptions {
  /** Rig node the BVH root is applied to */
  rootNode: TNode;
  convention: CoordinateConvention;
  /** Seconds per frame; the document's Frame Time when omitted */
  frameTime?: number;
  /** Resolver to use instead of one built from the name options */
  resolver?: NameResolver<TNode>;
  logger?: Logger;
}

const NON_ROOT_POSITION_WARNING =
  'Position information on bones other than the root bone is not supported and has been ignored. ' +
  'When exporting from Blender, enable "Root Translation Only".';

function emptyCurves<TNode, P extends CurveProperty>(target: TNode, properties: readonly P[]): Curve<TNode>[] {
  return properties.map(property => ({ target, property, keys: [] }));
}

/**
 * Decodes every joint of the document into curves, root first.
 *
 * Root positions are converted into the local space of the root node's
 * parent and multiplied by the rig scale; the root rotation is made local
 * to the parent as well. Other joints keep their BVH rotations as local
 * rotations. A joint missing any of its three position or rotation
 * channels gets no curves for that group.
 *
 * @throws BvhNameResolutionError when a joint has no matching node
 */
export function decodeBvh<TNode>(
  document: BvhDocument,
  rig: RigView<TNode>,
  options: DecodeOptions<TNode>
): Curve<TNode>[] {
  const logger = options.logger ?? LoggerFactory.forLoader();
  const resolver = options.resolver ?? new NameResolver(rig, options);
  const frameTime = options.frameTime ?? document.frameTime;
  const convention = options.convention;
  const curves: Curve<TNode>[] = [];

  const visit = (joint: BvhJoint, searchFrom: TNode, isRoot: boolean): void => {
    // The root joint is applied to the supplied node whatever its name
    const node = isRoot ? searchFrom : resolver.resolveChild(joint.name, searchFrom);

    const positions = getChannelTriple(joint, POSITION_CHANNELS);
    if (positions && !isRoot) {
      logger.warn(NON_ROOT_POSITION_WARNING, { jointName: joint.name });
    } else if (positions) {
      const [xs, ys, zs] = positions;
      const offset = fromBvhOffset(joint.offset, convention);
      const parentInverse = invertMatrix4x4(rig.getParentMatrix(node));
      const group = emptyCurves(node, POSITION_PROPERTIES);

      for (let frame = 0; frame < document.frameCount; frame++) {
        const time = frame * frameTime;
        const world = vec3Add(fromBvhOffset([xs[frame], ys[frame], zs[frame]], convention), offset);
        const local = vec3Multiply(transformPoint(parentInverse, world), rig.scale);
        group.forEach((curve, axis) => curve.keys.push({ time, value: local[axis] }));
      }
      curves.push(...group);
    }

    const rotations = getChannelTriple(joint, ROTATION_CHANNELS);
    if (rotations) {
      const [xs, ys, zs] = rotations;
      const parentInverse = isRoot ? quatConjugate(rig.getParentRotation(node)) : null;
      const group = emptyCurves(node, ROTATION_PROPERTIES);

      for (let frame = 0; frame < document.frameCount; frame++) {
        const time = frame * frameTime;
        const rotation = fromBvhRotation({ x: xs[frame], y: ys[frame], z: zs[frame] }, convention);
        const local = parentInverse ? quatMultiply(parentInverse, rotation) : rotation;
        group.forEach((curve, component) => curve.keys.push({ time, value: local[component] }));
      }
      curves.push(...group);
    }

    if (!positions && !rotations) {
      logger.debug(`No complete channel set on joint "${joint.name}"`, { jointName: joint.name });
    }

    for (const child of joint.children) {
      visit(child, node, false);
    }
  };

  visit(document.root, options.rootNode, true);
  logger.debug(`Decoded ${curves.length} curves`, { frameCount: document.frameCount });
  return curves;
}
