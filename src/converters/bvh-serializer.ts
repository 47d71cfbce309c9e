/**
 * BVH Serializer
 *
 * Writes a skeleton and captured poses as BVH text. The root gets six
 * channels (position + rotation), every other joint three rotation
 * channels in Zrotation Xrotation Yrotation order.
 */

import { BVH_KEYWORDS, ROOT_END_SITE_OFFSET } from '../constants/bvh';
import { CoordinateConvention, toBvhOffset, toBvhRotation } from '../core/coordinate-convention';
import type { PoseSnapshot, Skeleton, SkeletonJoint } from '../core/skeleton';
import { BvhErrorFactory } from '../errors';
import { BvhPrecision, formatBvhTriple, formatFrameTime, tabs } from '../utils/bvh-formatter';
import { vec3Sub } from '../utils/quaternion-utils';

export interface BvhSerializeOptions {
  convention: CoordinateConvention;
  precision: BvhPrecision;
  /** Frames per second; Frame Time is written as its reciprocal */
  frameRate: number;
}

const ROOT_CHANNELS = 'CHANNELS 6 Xposition Yposition Zposition Zrotation Xrotation Yrotation';
const JOINT_CHANNELS = 'CHANNELS 3 Zrotation Xrotation Yrotation';

type FormatOptions = Pick<BvhSerializeOptions, 'convention' | 'precision'>;

function formatOffset(skeleton: Skeleton, joint: SkeletonJoint, options: FormatOptions): string {
  return formatBvhTriple(toBvhOffset(joint.restOffset, options.convention, skeleton.scaleCompensation), options.precision);
}

function formatJoint(skeleton: Skeleton, joint: SkeletonJoint, level: number, options: FormatOptions): string {
  const indent = tabs(level);
  const offset = formatOffset(skeleton, joint, options);
  let result = `${indent}${BVH_KEYWORDS.JOINT} ${joint.name}\n` +
    `${indent}{\n` +
    `${indent}\t${BVH_KEYWORDS.OFFSET}\t${offset}\n` +
    `${indent}\t${JOINT_CHANNELS}\n`;

  if (joint.children.length > 0) {
    for (const child of joint.children) {
      result += formatJoint(skeleton, child, level + 1, options);
    }
  } else {
    // Leaf bones get an End Site repeating their own offset so importers can draw a bone tail
    const inner = tabs(level + 1);
    result += `${inner}${BVH_KEYWORDS.END_SITE}\n` +
      `${inner}{\n` +
      `${inner}\t${BVH_KEYWORDS.OFFSET}\t${offset}\n` +
      `${inner}}\n`;
  }

  return result + `${indent}}\n`;
}

/**
 * HIERARCHY section for a skeleton
 */
export function formatHierarchy(skeleton: Skeleton, options: FormatOptions): string {
  const root = skeleton.root;
  let hierarchy = `${BVH_KEYWORDS.HIERARCHY}\n` +
    `${BVH_KEYWORDS.ROOT} ${root.name}\n` +
    `{\n` +
    `\t${BVH_KEYWORDS.OFFSET}\t0.00\t0.00\t0.00\n` +
    `\t${ROOT_CHANNELS}\n`;

  if (root.children.length > 0) {
    for (const child of root.children) {
      hierarchy += formatJoint(skeleton, child, 1, options);
    }
  } else {
    hierarchy += `\t${BVH_KEYWORDS.END_SITE}\n\t{\n\t\t${BVH_KEYWORDS.OFFSET}\t${ROOT_END_SITE_OFFSET}\n\t}\n`;
  }

  return hierarchy + '}\n';
}

/**
 * One MOTION line for a pose, newline included
 */
export function encodeFrame(skeleton: Skeleton, pose: PoseSnapshot, options: FormatOptions): string {
  if (pose.rotations.length !== skeleton.joints.length) {
    throw BvhErrorFactory.stateError(
      `Pose has ${pose.rotations.length} rotations but the skeleton has ${skeleton.joints.length} joints.`,
      'encodeFrame',
      { rotationCount: pose.rotations.length, jointCount: skeleton.joints.length }
    );
  }

  const position = toBvhOffset(vec3Sub(pose.rootPosition, skeleton.basePosition), options.convention, skeleton.scaleCompensation);
  const fields = [formatBvhTriple(position, options.precision)];
  for (const rotation of pose.rotations) {
    fields.push(formatBvhTriple(toBvhRotation(rotation, options.convention), options.precision));
  }
  return fields.join('\t') + '\n';
}

/**
 * MOTION section from encoded frame lines
 */
export function formatMotion(frameLines: readonly string[], frameRate: number): string {
  return `${BVH_KEYWORDS.MOTION}\n` +
    `${BVH_KEYWORDS.FRAMES}    ${frameLines.length}\n` +
    `${BVH_KEYWORDS.FRAME_TIME} ${formatFrameTime(frameRate)}\n` +
    frameLines.join('');
}

/**
 * Full BVH text. Frames may be pose snapshots or lines produced earlier by
 * encodeFrame with the same options.
 */
export function serializeBvh(
  skeleton: Skeleton,
  frames: readonly (PoseSnapshot | string)[],
  options: BvhSerializeOptions
): string {
  const lines = frames.map(frame => typeof frame === 'string' ? frame : encodeFrame(skeleton, frame, options));
  return formatHierarchy(skeleton, options) + formatMotion(lines, options.frameRate);
}
