import { describe, expect, it } from 'vitest';
import { addAnimation, createRigFixture } from '../../testing/rig-fixture';
import { LoggerFactory } from '../../utils/logger';
import { postprocessGltfDocument } from './gltf-transform-helpers';

function slideFixture() {
  const fixture = createRigFixture();
  const animation = addAnimation(fixture.document, 'Slide', [
    { node: fixture.hips, path: 'translation', times: [0, 1, 2], values: [0, 1, 0, 1, 1, 0, 2, 1, 0] },
  ]);
  return { ...fixture, animation };
}

describe('postprocessGltfDocument', () => {
  it('leaves animations untouched by default', async () => {
    const { document, animation } = slideFixture();
    await postprocessGltfDocument(document, {}, LoggerFactory.silent());
    expect(animation.listSamplers()[0].getInput()?.getCount()).toBe(3);
  });

  it('drops keyframes that linear interpolation reproduces', async () => {
    const { document, animation } = slideFixture();
    const result = await postprocessGltfDocument(document, { resample: true }, LoggerFactory.silent());

    expect(result).toBe(document);
    expect(Array.from(animation.listSamplers()[0].getInput()?.getArray() ?? [])).toEqual([0, 2]);
  });
});
