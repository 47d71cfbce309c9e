import { describe, expect, it } from 'vitest';
import { createRigFixture } from '../../testing/rig-fixture';
import { BvhFileSystemError } from '../../errors';
import { GltfParserFactory, writeGlb } from './gltf-parser-factory';

describe('GltfParserFactory', () => {
  it('returns documents as they are', async () => {
    const { document } = createRigFixture();
    expect(await GltfParserFactory.parse(document)).toBe(document);
  });

  it('picks a parser by input type', () => {
    expect(GltfParserFactory.createParser('rig.glb').getType()).toBe('GLTF');
    expect(GltfParserFactory.createParser(new Uint8Array(0)).getType()).toBe('GLB');
  });

  it('reads GLB bytes written by writeGlb', async () => {
    const { document } = createRigFixture();
    const glb = await writeGlb(document);

    expect(Array.from(glb.subarray(0, 4))).toEqual([0x67, 0x6c, 0x54, 0x46]);
    const loaded = await GltfParserFactory.parse(glb);
    expect(loaded.getRoot().listNodes().map(node => node.getName())).toEqual(['Armature', 'Hips', 'Spine', 'Head', 'LeftLeg']);
    expect(loaded.getRoot().listSkins()[0].listJoints()).toHaveLength(4);
  });

  it('reports unreadable files as file system errors', async () => {
    await expect(GltfParserFactory.parse('/nonexistent/rig.glb')).rejects.toBeInstanceOf(BvhFileSystemError);
  });
});
