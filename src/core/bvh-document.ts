/**
 * BVH Document Model
 *
 * In-memory form of a parsed BVH file: a joint tree with per-channel value
 * arrays plus frame timing. Built once by the parser and only read after.
 */

import type { Vec3 } from '../utils/quaternion-utils';

/**
 * Channel kinds. Position kinds are 0-2, rotation kinds are the matching
 * axis + 3.
 */
export enum ChannelKind {
  Xposition = 0,
  Yposition = 1,
  Zposition = 2,
  Xrotation = 3,
  Yrotation = 4,
  Zrotation = 5,
}

export const CHANNEL_KIND_COUNT = 6;

export const CHANNEL_NAMES: Readonly<Record<ChannelKind, string>> = {
  [ChannelKind.Xposition]: 'Xposition',
  [ChannelKind.Yposition]: 'Yposition',
  [ChannelKind.Zposition]: 'Zposition',
  [ChannelKind.Xrotation]: 'Xrotation',
  [ChannelKind.Yrotation]: 'Yrotation',
  [ChannelKind.Zrotation]: 'Zrotation',
};

export const POSITION_CHANNELS = [ChannelKind.Xposition, ChannelKind.Yposition, ChannelKind.Zposition] as const;
export const ROTATION_CHANNELS = [ChannelKind.Xrotation, ChannelKind.Yrotation, ChannelKind.Zrotation] as const;

/**
 * One animated degree of freedom. `values` holds one entry per frame.
 */
export interface BvhChannel {
  readonly kind: ChannelKind;
  readonly values: Float64Array;
}

/**
 * Joint as declared in the HIERARCHY section, before motion data exists.
 */
export interface BvhJointDeclaration {
  readonly name: string;
  readonly offset: Readonly<Vec3>;
  /** Channels in the order the file declares them; also the column order */
  readonly channelOrder: readonly ChannelKind[];
  readonly children: readonly BvhJointDeclaration[];
}

export interface BvhJoint {
  readonly name: string;
  readonly offset: Readonly<Vec3>;
  readonly channelOrder: readonly ChannelKind[];
  /** Six slots indexed by ChannelKind; undefined where the channel is not declared */
  readonly channels: ReadonlyArray<BvhChannel | undefined>;
  readonly children: readonly BvhJoint[];
}

export interface BvhDocument {
  readonly root: BvhJoint;
  /** Every joint in pre-order, root first; defines the motion column order */
  readonly joints: readonly BvhJoint[];
  readonly frameCount: number;
  /** Seconds per frame */
  readonly frameTime: number;
}

/**
 * Pre-order traversal, root first.
 */
export function flattenJoints<T extends { readonly children: readonly T[] }>(root: T): T[] {
  const result: T[] = [];
  const visit = (joint: T) => {
    result.push(joint);
    for (const child of joint.children) {
      visit(child);
    }
  };
  visit(root);
  return result;
}

/**
 * Sum of declared channels across joints
 */
export function countChannels(joints: readonly { readonly channelOrder: readonly ChannelKind[] }[]): number {
  return joints.reduce((total, joint) => total + joint.channelOrder.length, 0);
}

/**
 * Value arrays for three channels, or null unless all three are declared.
 */
export function getChannelTriple(
  joint: BvhJoint,
  kinds: readonly [ChannelKind, ChannelKind, ChannelKind]
): [Float64Array, Float64Array, Float64Array] | null {
  const [a, b, c] = kinds.map(kind => joint.channels[kind]);
  if (!a || !b || !c) {
    return null;
  }
  return [a.values, b.values, c.values];
}

export function findJoint(document: BvhDocument, name: string): BvhJoint | undefined {
  return document.joints.find(joint => joint.name === name);
}

/**
 * Frames per second implied by the frame time
 */
export function getFrameRate(document: BvhDocument): number {
  return 1 / document.frameTime;
}

export function getDuration(document: BvhDocument): number {
  return document.frameCount * document.frameTime;
}
