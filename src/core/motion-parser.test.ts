import { describe, expect, it } from 'vitest';
import { BvhNumericParseError } from '../errors';
import { ChannelKind } from './bvh-document';
import { parseHierarchy } from './hierarchy-parser';
import { parseMotion } from './motion-parser';
import { BvhScanner } from './scanner';

const HIERARCHY = [
  'HIERARCHY',
  'ROOT Hips',
  '{',
  '\tOFFSET 0 0 0',
  '\tCHANNELS 6 Xposition Yposition Zposition Zrotation Xrotation Yrotation',
  '\tJOINT Spine',
  '\t{',
  '\t\tOFFSET 0 1 0',
  '\t\tCHANNELS 3 Xrotation Zrotation Yrotation',
  '\t\tEnd Site',
  '\t\t{',
  '\t\t\tOFFSET 0 1 0',
  '\t\t}',
  '\t}',
  '}',
].join('\n');

function parse(motion: string, frameTimeOverride?: number) {
  const scanner = new BvhScanner(`${HIERARCHY}\n${motion}`);
  return parseMotion(scanner, parseHierarchy(scanner), { frameTimeOverride });
}

function values(document: ReturnType<typeof parse>, joint: number, kind: ChannelKind): number[] {
  return Array.from(document.joints[joint].channels[kind]?.values ?? []);
}

describe('parseMotion', () => {
  const motion = [
    'MOTION',
    'Frames: 2',
    'Frame Time: 0.5',
    '1 2 3 10 20 30 40 50 60',
    '4 5 6 11 21 31 41 51 61',
    '',
  ].join('\n');

  it('reads the frame header', () => {
    const document = parse(motion);
    expect(document.frameCount).toBe(2);
    expect(document.frameTime).toBe(0.5);
  });

  it('assigns columns by the declared channel order', () => {
    const document = parse(motion);
    expect(values(document, 0, ChannelKind.Xposition)).toEqual([1, 4]);
    expect(values(document, 0, ChannelKind.Zrotation)).toEqual([10, 11]);
    expect(values(document, 0, ChannelKind.Yrotation)).toEqual([30, 31]);
    expect(values(document, 1, ChannelKind.Xrotation)).toEqual([40, 41]);
    expect(values(document, 1, ChannelKind.Zrotation)).toEqual([50, 51]);
    expect(values(document, 1, ChannelKind.Yrotation)).toEqual([60, 61]);
  });

  it('leaves undeclared channels empty', () => {
    const document = parse(motion);
    expect(document.joints[1].channels[ChannelKind.Xposition]).toBeUndefined();
  });

  it('uses a frame time override', () => {
    expect(parse(motion, 1 / 30).frameTime).toBe(1 / 30);
  });

  it('accepts zero frames', () => {
    const document = parse('MOTION\nFrames: 0\nFrame Time: 0.1\n');
    expect(document.frameCount).toBe(0);
    expect(values(document, 0, ChannelKind.Xposition)).toEqual([]);
  });

  it('accepts CRLF line endings and tab separators', () => {
    const document = parse('MOTION\r\nFrames: 1\r\nFrame Time: 0.1\r\n1\t2\t3\t4\t5\t6\t7\t8\t9\r\n');
    expect(values(document, 1, ChannelKind.Yrotation)).toEqual([9]);
  });

  it('fails when more lines follow than Frames declares', () => {
    expect(() => parse(motion.replace('Frames: 2', 'Frames: 1'))).toThrow(/Expected end of motion data/);
  });

  it('fails when fewer lines follow than Frames declares', () => {
    expect(() => parse(motion.replace('Frames: 2', 'Frames: 3'))).toThrow(BvhNumericParseError);
  });

  it('fails on a short frame line', () => {
    expect(() => parse('MOTION\nFrames: 1\nFrame Time: 0.1\n1 2 3 4 5 6 7 8\n')).toThrow(/Expected channel value/);
  });

  it('rejects a negative frame count', () => {
    expect(() => parse('MOTION\nFrames: -1\nFrame Time: 0.1\n')).toThrow(/Expected non-negative frame number/);
  });

  it('rejects a frame time that is not positive', () => {
    expect(() => parse('MOTION\nFrames: 0\nFrame Time: 0\n')).toThrow(/Expected positive frame time/);
  });

  it('accepts any file frame time when an override replaces it', () => {
    const document = parse('MOTION\nFrames: 0\nFrame Time: 0\n', 0.04);
    expect(document.frameTime).toBe(0.04);
  });

  it('rejects a missing frame count', () => {
    expect(() => parse('MOTION\nFrames: many\n')).toThrow(/Expected frame number/);
  });
});
