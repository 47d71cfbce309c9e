import { describe, expect, it } from 'vitest';
import { addAnimation, createRigFixture } from '../../testing/rig-fixture';
import { getAnimationDuration, getSampleCount, samplePoseOverrides, sampleAnimation } from './pose-sampler';

const HALF_SQRT2 = Math.SQRT1_2;

function walkFixture() {
  const fixture = createRigFixture();
  const animation = addAnimation(fixture.document, 'Walk', [
    { node: fixture.hips, path: 'translation', times: [0, 1], values: [0, 1, 0, 2, 1, 0] },
    { node: fixture.spine, path: 'rotation', times: [0, 1], values: [0, 0, 0, 1, 0, 0, HALF_SQRT2, HALF_SQRT2] },
  ]);
  return { ...fixture, animation };
}

describe('getAnimationDuration', () => {
  it('returns the latest key time', () => {
    expect(getAnimationDuration(walkFixture().animation)).toBe(1);
  });

  it('is zero without channels', () => {
    const { document } = createRigFixture();
    expect(getAnimationDuration(document.createAnimation('Empty'))).toBe(0);
  });
});

describe('getSampleCount', () => {
  it('covers both ends of the animation', () => {
    expect(getSampleCount(walkFixture().animation, 4)).toBe(5);
  });
});

describe('samplePoseOverrides', () => {
  it('interpolates translations linearly', () => {
    const { animation, hips } = walkFixture();
    expect(samplePoseOverrides(animation, 0.5).get(hips)).toEqual({ translation: [1, 1, 0] });
  });

  it('clamps to the last key', () => {
    const { animation, hips } = walkFixture();
    expect(samplePoseOverrides(animation, 2).get(hips)?.translation).toEqual([2, 1, 0]);
  });

  it('interpolates rotations along the arc', () => {
    const { animation, spine } = walkFixture();
    const rotation = samplePoseOverrides(animation, 0.5).get(spine)?.rotation ?? [0, 0, 0, 0];
    expect(rotation[0]).toBeCloseTo(0, 6);
    expect(rotation[1]).toBeCloseTo(0, 6);
    expect(rotation[2]).toBeCloseTo(Math.sin(Math.PI / 8), 6);
    expect(rotation[3]).toBeCloseTo(Math.cos(Math.PI / 8), 6);
  });

  it('holds the previous key for STEP samplers', () => {
    const { document, head } = createRigFixture();
    const animation = addAnimation(document, 'Step', [
      { node: head, path: 'translation', times: [0, 1], values: [0, 0, 0, 4, 0, 0], interpolation: 'STEP' },
    ]);
    expect(samplePoseOverrides(animation, 0.5).get(head)?.translation).toEqual([0, 0, 0]);
    expect(samplePoseOverrides(animation, 1).get(head)?.translation).toEqual([4, 0, 0]);
  });

  it('reads only the values of cubic spline keys', () => {
    const { document, head } = createRigFixture();
    const animation = addAnimation(document, 'Cubic', [
      {
        node: head,
        path: 'translation',
        times: [0, 2],
        values: [9, 9, 9, 1, 2, 3, 9, 9, 9, 9, 9, 9, 5, 6, 7, 9, 9, 9],
        interpolation: 'CUBICSPLINE',
      },
    ]);
    expect(samplePoseOverrides(animation, 1).get(head)?.translation).toEqual([3, 4, 5]);
  });
});

describe('sampleAnimation', () => {
  it('samples from zero through the last key at the frame rate', () => {
    const { animation, hips } = walkFixture();
    const poses = sampleAnimation(animation, 4);

    expect(poses.map(pose => pose.time)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(poses[1].overrides.get(hips)?.translation).toEqual([0.5, 1, 0]);
  });
});
