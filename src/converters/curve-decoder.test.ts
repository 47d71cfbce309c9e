import { describe, expect, it } from 'vitest';
import { Node } from '@gltf-transform/core';
import { createRigFixture } from '../testing/rig-fixture';
import { BvhNameResolutionError } from '../errors';
import { Logger, LogLevel } from '../utils/logger';
import { parseBvh } from './parsers/bvh-parser';
import { Curve, CurveProperty, decodeBvh } from './curve-decoder';
import { createGltfRigView } from './helpers/gltf-rig';

function bvhText(spineName: string, spineChannels: string, frames: string[]): string {
  return [
    'HIERARCHY',
    'ROOT Hips',
    '{',
    '\tOFFSET 0 0 0',
    '\tCHANNELS 6 Xposition Yposition Zposition Zrotation Xrotation Yrotation',
    `\tJOINT ${spineName}`,
    '\t{',
    '\t\tOFFSET 0 0.5 0',
    `\t\t${spineChannels}`,
    '\t\tEnd Site',
    '\t\t{',
    '\t\t\tOFFSET 0 1 0',
    '\t\t}',
    '\t}',
    '}',
    'MOTION',
    `Frames: ${frames.length}`,
    'Frame Time: 0.5',
    ...frames,
    '',
  ].join('\n');
}

const WALK = bvhText('Spine', 'CHANNELS 3 Zrotation Xrotation Yrotation', ['1 2 3 0 0 0 90 0 0', '0 0 0 0 0 0 0 0 0']);

function curveFor(curves: Curve<Node>[], node: Node, property: CurveProperty): Curve<Node> | undefined {
  return curves.find(curve => curve.target === node && curve.property === property);
}

// Positive zero for exact comparisons
function values(curve: Curve<Node> | undefined): number[] {
  return (curve?.keys ?? []).map(key => key.value + 0);
}

describe('decodeBvh', () => {
  it('emits position and rotation curves for the root and rotations for joints', () => {
    const { document, hips, spine } = createRigFixture();
    const curves = decodeBvh(parseBvh(WALK), createGltfRigView(document), { rootNode: hips, convention: 'standard' });

    expect(curves.map(curve => `${curve.target.getName()}:${curve.property}`)).toEqual([
      'Hips:position.x',
      'Hips:position.y',
      'Hips:position.z',
      'Hips:rotation.x',
      'Hips:rotation.y',
      'Hips:rotation.z',
      'Hips:rotation.w',
      'Spine:rotation.x',
      'Spine:rotation.y',
      'Spine:rotation.z',
      'Spine:rotation.w',
    ]);
    expect(curveFor(curves, spine, 'rotation.x')?.keys.map(key => key.time)).toEqual([0, 0.5]);
  });

  it('mirrors root positions into rig space', () => {
    const { document, hips } = createRigFixture();
    const curves = decodeBvh(parseBvh(WALK), createGltfRigView(document), { rootNode: hips, convention: 'standard' });

    expect(values(curveFor(curves, hips, 'position.x'))).toEqual([-1, 0]);
    expect(values(curveFor(curves, hips, 'position.y'))).toEqual([2, 0]);
    expect(values(curveFor(curves, hips, 'position.z'))).toEqual([3, 0]);
  });

  it('converts joint rotations with the convention', () => {
    const { document, hips, spine } = createRigFixture();
    const curves = decodeBvh(parseBvh(WALK), createGltfRigView(document), { rootNode: hips, convention: 'standard' });

    const z = curveFor(curves, spine, 'rotation.z')?.keys[0].value ?? NaN;
    const w = curveFor(curves, spine, 'rotation.w')?.keys[0].value ?? NaN;
    expect(z).toBeCloseTo(-Math.SQRT1_2, 10);
    expect(w).toBeCloseTo(Math.SQRT1_2, 10);
    expect(curveFor(curves, spine, 'rotation.w')?.keys[1].value).toBeCloseTo(1, 10);
  });

  it('cancels the rig scale for root positions', () => {
    const { document, armature, hips } = createRigFixture({ armatureTranslation: [10, 0, 0], armatureScale: [2, 2, 2] });
    const curves = decodeBvh(parseBvh(WALK), createGltfRigView(document, armature), { rootNode: hips, convention: 'standard' });

    expect(values(curveFor(curves, hips, 'position.x'))).toEqual([-1, 0]);
    expect(values(curveFor(curves, hips, 'position.z'))).toEqual([3, 0]);
  });

  it('makes the root rotation local to the parent', () => {
    const { document, armature, hips } = createRigFixture();
    armature.setRotation([0, 0, 0.6, 0.8]);
    const curves = decodeBvh(parseBvh(WALK), createGltfRigView(document), { rootNode: hips, convention: 'standard' });

    expect(curveFor(curves, hips, 'rotation.z')?.keys[0].value).toBeCloseTo(-0.6, 10);
    expect(curveFor(curves, hips, 'rotation.w')?.keys[0].value).toBeCloseTo(0.8, 10);
  });

  it('uses a frame time override for key times', () => {
    const { document, hips } = createRigFixture();
    const curves = decodeBvh(parseBvh(WALK), createGltfRigView(document), { rootNode: hips, convention: 'standard', frameTime: 0.25 });
    expect(curves[0].keys.map(key => key.time)).toEqual([0, 0.25]);
  });

  it('renames joints through the rename table', () => {
    const { document, hips, spine } = createRigFixture();
    const text = bvhText('Chest', 'CHANNELS 3 Zrotation Xrotation Yrotation', ['0 0 0 0 0 0 0 0 0']);
    const curves = decodeBvh(parseBvh(text), createGltfRigView(document), {
      rootNode: hips,
      convention: 'blender',
      renames: { Chest: 'Spine' },
    });
    expect(curveFor(curves, spine, 'rotation.w')).toBeDefined();
  });

  it('ignores positions on joints other than the root with a warning', () => {
    const { document, hips, spine } = createRigFixture();
    const lines: string[] = [];
    const logger = new Logger({ level: LogLevel.WARN, sink: line => lines.push(line) });
    const text = bvhText(
      'Spine',
      'CHANNELS 6 Xposition Yposition Zposition Zrotation Xrotation Yrotation',
      ['0 0 0 0 0 0 1 1 1 0 0 0']
    );

    const curves = decodeBvh(parseBvh(text), createGltfRigView(document), { rootNode: hips, convention: 'standard', logger });
    expect(curveFor(curves, spine, 'position.x')).toBeUndefined();
    expect(curveFor(curves, spine, 'rotation.x')).toBeDefined();
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('Position information on bones other than the root bone is not supported');
  });

  it('skips a rotation group with a missing channel', () => {
    const { document, hips, spine } = createRigFixture();
    const text = bvhText('Spine', 'CHANNELS 2 Zrotation Xrotation', ['0 0 0 0 0 0 0 0']);
    const curves = decodeBvh(parseBvh(text), createGltfRigView(document), { rootNode: hips, convention: 'standard' });
    expect(curves.filter(curve => curve.target === spine)).toEqual([]);
  });

  it('fails when a joint has no matching child node', () => {
    const { document, hips } = createRigFixture();
    const text = bvhText('Tail', 'CHANNELS 3 Zrotation Xrotation Yrotation', ['0 0 0 0 0 0 0 0 0']);
    expect(() => decodeBvh(parseBvh(text), createGltfRigView(document), { rootNode: hips, convention: 'standard' })).toThrow(
      BvhNameResolutionError
    );
  });
});
