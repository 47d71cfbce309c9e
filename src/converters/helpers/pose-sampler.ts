/**
 * Pose Sampler
 *
 * Evaluates glTF animation channels at fixed time steps and returns the
 * resulting local transforms as pose overrides. The document itself is
 * never written to.
 */

import { Accessor, Animation, AnimationChannel, Node } from '@gltf-transform/core';
import { Quat, Vec3, quatNormalize, quatSlerp } from '../../utils/quaternion-utils';
import type { LocalTransform, PoseOverrides } from './gltf-rig';

type Interpolation = 'LINEAR' | 'STEP' | 'CUBICSPLINE';

export interface SampledPose {
  /** Seconds from the animation start */
  time: number;
  overrides: PoseOverrides;
}

/**
 * Latest keyframe time over all channels of an animation
 */
export function getAnimationDuration(animation: Animation): number {
  let maxTime = 0;
  for (const channel of animation.listChannels()) {
    const input = channel.getSampler()?.getInput();
    if (!input || input.getCount() === 0) continue;
    maxTime = Math.max(maxTime, input.getMax([])[0]);
  }
  return maxTime;
}

/**
 * Number of frames needed to cover an animation at a frame rate, both ends
 * included.
 */
export function getSampleCount(animation: Animation, frameRate: number): number {
  return Math.floor(getAnimationDuration(animation) * frameRate + 1e-6) + 1;
}

/**
 * Output element at a keyframe. Cubic spline samplers store in-tangent,
 * value and out-tangent per key; only the value is read.
 */
function readKey(output: Accessor, key: number, interpolation: Interpolation): number[] {
  const index = interpolation === 'CUBICSPLINE' ? key * 3 + 1 : key;
  return output.getElement(index, []);
}

function lerp(a: readonly number[], b: readonly number[], t: number): number[] {
  return a.map((value, i) => value + (b[i] - value) * t);
}

/**
 * Value of one channel at a time, clamped to the keyframe range
 */
function evaluateChannel(channel: AnimationChannel, time: number): number[] | null {
  const sampler = channel.getSampler();
  const input = sampler?.getInput();
  const output = sampler?.getOutput();
  if (!sampler || !input || !output || input.getCount() === 0) {
    return null;
  }

  const interpolation = sampler.getInterpolation();
  const count = input.getCount();
  const times: number[] = [];
  for (let i = 0; i < count; i++) {
    times.push(input.getScalar(i));
  }

  if (time <= times[0]) {
    return readKey(output, 0, interpolation);
  }
  if (time >= times[count - 1]) {
    return readKey(output, count - 1, interpolation);
  }

  let key = 0;
  while (key < count - 2 && times[key + 1] <= time) {
    key++;
  }

  const start = readKey(output, key, interpolation);
  if (interpolation === 'STEP') {
    return start;
  }

  const end = readKey(output, key + 1, interpolation);
  const span = times[key + 1] - times[key];
  const t = span > 0 ? (time - times[key]) / span : 0;

  if (channel.getTargetPath() === 'rotation') {
    return quatSlerp(toQuat(start), toQuat(end), t);
  }
  return lerp(start, end, t);
}

function toVec3(values: readonly number[]): Vec3 {
  return [values[0] ?? 0, values[1] ?? 0, values[2] ?? 0];
}

function toQuat(values: readonly number[]): Quat {
  return [values[0] ?? 0, values[1] ?? 0, values[2] ?? 0, values[3] ?? 1];
}

/**
 * Local transforms of every node the animation targets, at one time.
 * Morph target weights are ignored.
 */
export function samplePoseOverrides(animation: Animation, time: number): Map<Node, Partial<LocalTransform>> {
  const overrides = new Map<Node, Partial<LocalTransform>>();

  for (const channel of animation.listChannels()) {
    const node = channel.getTargetNode();
    const path = channel.getTargetPath();
    if (!node || (path !== 'translation' && path !== 'rotation' && path !== 'scale')) {
      continue;
    }

    const value = evaluateChannel(channel, time);
    if (!value) continue;

    const override = overrides.get(node) ?? {};
    if (path === 'rotation') {
      override.rotation = quatNormalize(toQuat(value));
    } else if (path === 'translation') {
      override.translation = toVec3(value);
    } else {
      override.scale = toVec3(value);
    }
    overrides.set(node, override);
  }

  return overrides;
}

/**
 * Poses at `frameRate` from time 0 through the last keyframe.
 */
export function sampleAnimation(animation: Animation, frameRate: number): SampledPose[] {
  const count = getSampleCount(animation, frameRate);
  const poses: SampledPose[] = [];
  for (let frame = 0; frame < count; frame++) {
    const time = frame / frameRate;
    poses.push({ time, overrides: samplePoseOverrides(animation, time) });
  }
  return poses;
}
