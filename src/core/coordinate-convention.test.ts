import { describe, expect, it } from 'vitest';
import { AXIS_Y, Quat, quatDot, quatFromAxisAngle, quatMultiply, quatNormalize, AXIS_X, AXIS_Z } from '../utils/quaternion-utils';
import {
  CoordinateConvention,
  eulerZXYToQuaternion,
  fromBvhOffset,
  fromBvhRotation,
  quaternionToEulerZXY,
  toBvhOffset,
  toBvhRotation,
  wrapAngle,
} from './coordinate-convention';

const CONVENTIONS: CoordinateConvention[] = ['standard', 'blender'];

const SAMPLE_ROTATIONS: Quat[] = [
  [0, 0, 0, 1],
  quatFromAxisAngle(AXIS_X, 45),
  quatFromAxisAngle(AXIS_Y, -120),
  quatFromAxisAngle(AXIS_Z, 170),
  quatNormalize(quatMultiply(quatFromAxisAngle(AXIS_X, 30), quatFromAxisAngle(AXIS_Y, 60))),
  quatNormalize([0.3, -0.5, 0.7, 0.2]),
];

describe('wrapAngle', () => {
  it('maps angles into (-180, 180]', () => {
    expect(wrapAngle(181)).toBe(-179);
    expect(wrapAngle(-181)).toBe(179);
    expect(wrapAngle(180)).toBe(180);
    expect(wrapAngle(-180)).toBe(-180);
    expect(wrapAngle(45)).toBe(45);
  });
});

describe('quaternionToEulerZXY', () => {
  it('inverts eulerZXYToQuaternion away from the singularity', () => {
    const euler = quaternionToEulerZXY(eulerZXYToQuaternion({ x: 10, y: 20, z: 30 }));
    expect(euler.x).toBeCloseTo(10, 9);
    expect(euler.y).toBeCloseTo(20, 9);
    expect(euler.z).toBeCloseTo(30, 9);
  });

  it('decomposes single-axis rotations', () => {
    expect(quaternionToEulerZXY(quatFromAxisAngle(AXIS_Z, 40)).z).toBeCloseTo(40, 9);
    expect(quaternionToEulerZXY(quatFromAxisAngle(AXIS_X, -25)).x).toBeCloseTo(-25, 9);
    expect(quaternionToEulerZXY(quatFromAxisAngle(AXIS_Y, 75)).y).toBeCloseTo(75, 9);
  });
});

describe('toBvhRotation', () => {
  it('mirrors a Y rotation in the standard convention', () => {
    const [z, x, y] = toBvhRotation(quatFromAxisAngle(AXIS_Y, 90), 'standard');
    expect(z).toBeCloseTo(0, 9);
    expect(x).toBeCloseTo(0, 9);
    expect(y).toBeCloseTo(-90, 9);
  });

  it('turns a Y rotation into a Z rotation in the blender convention', () => {
    const [z, x, y] = toBvhRotation(quatFromAxisAngle(AXIS_Y, 90), 'blender');
    expect(z).toBeCloseTo(-90, 9);
    expect(x).toBeCloseTo(0, 9);
    expect(y).toBeCloseTo(0, 9);
  });

  it.each(CONVENTIONS)('round-trips through fromBvhRotation up to sign (%s)', convention => {
    for (const rotation of SAMPLE_ROTATIONS) {
      const [z, x, y] = toBvhRotation(rotation, convention);
      const restored = fromBvhRotation({ x, y, z }, convention);
      expect(Math.abs(quatDot(rotation, restored))).toBeCloseTo(1, 9);
    }
  });
});

describe('fromBvhRotation', () => {
  it('wraps angles before composing', () => {
    expect(fromBvhRotation({ x: 0, y: 0, z: 190 }, 'standard')).toEqual(fromBvhRotation({ x: 0, y: 0, z: -170 }, 'standard'));
  });
});

describe('offsets', () => {
  it('mirrors X in the standard convention', () => {
    expect(toBvhOffset([1, 2, 3], 'standard')).toEqual([-1, 2, 3]);
  });

  it('swaps to Z-up in the blender convention', () => {
    expect(toBvhOffset([1, 2, 3], 'blender')).toEqual([-1, -3, 2]);
  });

  it('applies scale compensation before remapping', () => {
    expect(toBvhOffset([1, 2, 3], 'standard', [0.5, 0.5, 2])).toEqual([-0.5, 1, 6]);
  });

  it.each(CONVENTIONS)('round-trips through fromBvhOffset (%s)', convention => {
    expect(fromBvhOffset(toBvhOffset([1.5, -2, 0.25], convention), convention)).toEqual([1.5, -2, 0.25]);
  });
});
