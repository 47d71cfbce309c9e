/**
 * BVH Hierarchy Parser
 *
 * Recursive descent over the HIERARCHY section:
 *
 *   ROOT|JOINT name
 *   {
 *     OFFSET x y z
 *     CHANNELS n channel...
 *     (JOINT ... | End Site { OFFSET x y z })*
 *   }
 *
 * Each call consumes one joint block and returns its declaration; the
 * scanner cursor is left after the closing brace.
 */

import { BVH_KEYWORDS, BVH_LIMITS } from '../constants/bvh';
import type { Vec3 } from '../utils/quaternion-utils';
import { BvhJointDeclaration, CHANNEL_NAMES, ChannelKind } from './bvh-document';
import { BvhScanner } from './scanner';

function parseOffset(scanner: BvhScanner, label: string): Vec3 {
  scanner.skipWhitespace();
  const x = scanner.assureFloat(`${label} X`);
  scanner.skipWhitespace();
  const y = scanner.assureFloat(`${label} Y`);
  scanner.skipWhitespace();
  const z = scanner.assureFloat(`${label} Z`);
  return [x, y, z];
}

function parseChannels(scanner: BvhScanner): ChannelKind[] {
  scanner.skipWhitespace();
  scanner.assureLiteral(BVH_KEYWORDS.CHANNELS);
  scanner.skipWhitespace();
  const channelCount = scanner.assureInt('channel number');
  scanner.assure(
    'valid channel number',
    channelCount >= BVH_LIMITS.MIN_CHANNELS && channelCount <= BVH_LIMITS.MAX_CHANNELS
  );

  const channelOrder: ChannelKind[] = [];
  for (let i = 0; i < channelCount; i++) {
    scanner.skipWhitespace();
    const channel = scanner.readChannelToken();
    scanner.assure('channel ID', channel.success);
    if (channelOrder.includes(channel.value)) {
      scanner.fail(`a channel other than ${CHANNEL_NAMES[channel.value]}, which is already declared`);
    }
    channelOrder.push(channel.value);
  }
  return channelOrder;
}

/**
 * End Site blocks give leaf bones a length; their offset is read and dropped.
 */
function skipEndSite(scanner: BvhScanner): void {
  scanner.assureLiteral(BVH_KEYWORDS.END_SITE);
  scanner.skipWhitespace();
  scanner.assureLiteral('{');
  scanner.skipWhitespace();
  scanner.assureLiteral(BVH_KEYWORDS.OFFSET);
  parseOffset(scanner, 'end site offset');
  scanner.skipWhitespace();
  scanner.assureLiteral('}');
}

/**
 * Parses one ROOT or JOINT block including all of its descendants.
 */
export function parseJoint(scanner: BvhScanner, isRoot: boolean): BvhJointDeclaration {
  scanner.skipWhitespace();
  scanner.assureLiteral(isRoot ? BVH_KEYWORDS.ROOT : BVH_KEYWORDS.JOINT);

  const name = scanner.readLineString();
  scanner.assure('joint name', name.success);

  scanner.skipWhitespace();
  scanner.assureLiteral('{');
  scanner.skipWhitespace();
  scanner.assureLiteral(BVH_KEYWORDS.OFFSET);
  const offset = parseOffset(scanner, 'offset');
  const channelOrder = parseChannels(scanner);

  const children: BvhJointDeclaration[] = [];
  for (;;) {
    scanner.skipWhitespace();
    const next = scanner.peek();
    scanner.assure('child joint', next !== null);

    if (next === 'J' || next === 'j') {
      children.push(parseJoint(scanner, false));
    } else if (next === 'E' || next === 'e') {
      skipEndSite(scanner);
    } else if (next === '}') {
      scanner.assureLiteral('}');
      break;
    } else {
      scanner.fail('child joint');
    }
  }

  return { name: name.value, offset, channelOrder, children };
}

/**
 * Parses `HIERARCHY` followed by the ROOT block.
 */
export function parseHierarchy(scanner: BvhScanner): BvhJointDeclaration {
  scanner.skipWhitespace();
  scanner.assureLiteral(BVH_KEYWORDS.HIERARCHY);
  return parseJoint(scanner, true);
}
