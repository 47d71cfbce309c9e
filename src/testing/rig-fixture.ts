/**
 * In-memory glTF rig used by the converter tests.
 *
 *   Armature
 *   └─ Hips (0, 1, 0)
 *      ├─ Spine (0, 0.5, 0)
 *      │  └─ Head (0, 0.25, 0)
 *      └─ LeftLeg (0.25, -0.5, 0)
 *
 * Hips, Spine, Head and LeftLeg are joints of one skin.
 */

import { Animation, Document, Node, Scene, Skin } from '@gltf-transform/core';
import type { Vec3 } from '../utils/quaternion-utils';

export interface RigFixture {
  document: Document;
  scene: Scene;
  armature: Node;
  hips: Node;
  spine: Node;
  head: Node;
  leftLeg: Node;
  skin: Skin;
}

export interface RigFixtureOptions {
  armatureTranslation?: Vec3;
  armatureScale?: Vec3;
}

export function createRigFixture(options: RigFixtureOptions = {}): RigFixture {
  const document = new Document();
  document.createBuffer('data');

  const armature = document.createNode('Armature')
    .setTranslation(options.armatureTranslation ?? [0, 0, 0])
    .setScale(options.armatureScale ?? [1, 1, 1]);
  const hips = document.createNode('Hips').setTranslation([0, 1, 0]);
  const spine = document.createNode('Spine').setTranslation([0, 0.5, 0]);
  const head = document.createNode('Head').setTranslation([0, 0.25, 0]);
  const leftLeg = document.createNode('LeftLeg').setTranslation([0.25, -0.5, 0]);

  armature.addChild(hips);
  hips.addChild(spine).addChild(leftLeg);
  spine.addChild(head);

  const scene = document.createScene('Scene').addChild(armature);
  document.getRoot().setDefaultScene(scene);

  const skin = document.createSkin('Skin')
    .addJoint(hips)
    .addJoint(spine)
    .addJoint(head)
    .addJoint(leftLeg);

  return { document, scene, armature, hips, spine, head, leftLeg, skin };
}

/**
 * Adds an animation with one LINEAR channel per entry.
 */
export function addAnimation(
  document: Document,
  name: string,
  channels: { node: Node; path: 'translation' | 'rotation' | 'scale'; times: number[]; values: number[]; interpolation?: 'LINEAR' | 'STEP' | 'CUBICSPLINE' }[]
): Animation {
  const buffer = document.getRoot().listBuffers()[0];
  const animation = document.createAnimation(name);
  for (const channel of channels) {
    const input = document.createAccessor()
      .setType('SCALAR')
      .setArray(new Float32Array(channel.times))
      .setBuffer(buffer);
    const output = document.createAccessor()
      .setType(channel.path === 'rotation' ? 'VEC4' : 'VEC3')
      .setArray(new Float32Array(channel.values))
      .setBuffer(buffer);
    const sampler = document.createAnimationSampler()
      .setInput(input)
      .setOutput(output)
      .setInterpolation(channel.interpolation ?? 'LINEAR');
    animation.addSampler(sampler).addChannel(
      document.createAnimationChannel().setTargetNode(channel.node).setTargetPath(channel.path).setSampler(sampler)
    );
  }
  return animation;
}


/**
 * Two frames of motion for the fixture's Hips and Spine.
 */
export const WALK_BVH = [
  'HIERARCHY',
  'ROOT Hips',
  '{',
  '\tOFFSET 0 0 0',
  '\tCHANNELS 6 Xposition Yposition Zposition Zrotation Xrotation Yrotation',
  '\tJOINT Spine',
  '\t{',
  '\t\tOFFSET 0 0.5 0',
  '\t\tCHANNELS 3 Zrotation Xrotation Yrotation',
  '\t\tEnd Site',
  '\t\t{',
  '\t\t\tOFFSET 0 1 0',
  '\t\t}',
  '\t}',
  '}',
  'MOTION',
  'Frames: 2',
  'Frame Time: 0.5',
  '1 2 3 0 0 0 90 0 0',
  '0 0 0 0 0 0 0 0 0',
  '',
].join('\n');
