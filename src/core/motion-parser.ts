/**
 * BVH Motion Parser
 *
 * Reads the MOTION header and the dense value grid. Columns follow the
 * pre-order joint list and, within a joint, the declared channel order.
 */

import { BVH_KEYWORDS } from '../constants/bvh';
import {
  BvhChannel,
  BvhDocument,
  BvhJoint,
  BvhJointDeclaration,
  CHANNEL_KIND_COUNT,
  countChannels,
  flattenJoints,
} from './bvh-document';
import { BvhScanner } from './scanner';

export interface MotionParseOptions {
  /** Replaces the Frame Time read from the file (seconds per frame) */
  frameTimeOverride?: number;
}

export interface MotionHeader {
  frameCount: number;
  frameTime: number;
}

/**
 * Parses `MOTION`, `Frames:` and `Frame Time:`. The file's Frame Time must
 * be positive unless an override replaces it.
 */
export function parseMotionHeader(scanner: BvhScanner, options: MotionParseOptions = {}): MotionHeader {
  scanner.skipWhitespace();
  scanner.assureLiteral(BVH_KEYWORDS.MOTION);
  scanner.skipWhitespace();
  scanner.assureLiteral(BVH_KEYWORDS.FRAMES);
  scanner.skipWhitespace();
  const frameCount = scanner.assureInt('frame number');
  if (frameCount < 0) {
    scanner.failNumeric('non-negative frame number');
  }
  scanner.skipWhitespace();
  scanner.assureLiteral(BVH_KEYWORDS.FRAME_TIME);
  scanner.skipWhitespace();
  const frameTime = scanner.assureFloat('frame time');
  if (options.frameTimeOverride === undefined && !(frameTime > 0)) {
    scanner.failNumeric('positive frame time');
  }
  return { frameCount, frameTime };
}

/**
 * Allocates a value array per declared channel, mirroring the declaration tree.
 */
function allocateJoint(declaration: BvhJointDeclaration, frameCount: number): BvhJoint {
  const channels = new Array<BvhChannel | undefined>(CHANNEL_KIND_COUNT).fill(undefined);
  for (const kind of declaration.channelOrder) {
    channels[kind] = { kind, values: new Float64Array(frameCount) };
  }
  return {
    name: declaration.name,
    offset: declaration.offset,
    channelOrder: declaration.channelOrder,
    channels,
    children: declaration.children.map(child => allocateJoint(child, frameCount)),
  };
}

/**
 * Parses the MOTION section for an already parsed hierarchy and assembles
 * the document. Only whitespace may follow the last frame.
 */
export function parseMotion(
  scanner: BvhScanner,
  hierarchy: BvhJointDeclaration,
  options: MotionParseOptions = {}
): BvhDocument {
  const header = parseMotionHeader(scanner, options);
  const frameTime = options.frameTimeOverride ?? header.frameTime;

  const root = allocateJoint(hierarchy, header.frameCount);
  const joints = flattenJoints(root);

  const columns: Float64Array[] = [];
  for (const joint of joints) {
    for (const kind of joint.channelOrder) {
      const channel = joint.channels[kind];
      if (channel) {
        columns.push(channel.values);
      }
    }
  }
  const totalChannels = countChannels(joints);

  for (let frame = 0; frame < header.frameCount; frame++) {
    scanner.expectNewline();
    for (let column = 0; column < totalChannels; column++) {
      scanner.skipInlineWhitespace();
      columns[column][frame] = scanner.assureFloat('channel value');
    }
  }

  scanner.skipWhitespace();
  scanner.assure('end of motion data', scanner.atEnd());

  return {
    root,
    joints,
    frameCount: header.frameCount,
    frameTime,
  };
}
