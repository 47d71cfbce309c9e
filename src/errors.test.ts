import { describe, expect, it } from 'vitest';
import { BvhErrorFactory, BvhNameResolutionError, BvhParseError, BvhStateError } from './errors';

describe('BvhErrorFactory', () => {
  it('formats parse errors with position and context', () => {
    const error = BvhErrorFactory.parseError(12, 'joint name', '>>>{<<<');
    expect(error).toBeInstanceOf(BvhParseError);
    expect(error.message).toBe('Failed to parse BVH data at position 12. Expected joint name around here: >>>{<<<');
    expect(error.code).toBe('BVH_PARSE_ERROR');
  });

  it('tags numeric parse errors separately', () => {
    const error = BvhErrorFactory.numericParseError(3, 'frame number', 'x');
    expect(error._tag).toBe('BvhNumericParseError');
    expect(error.code).toBe('BVH_NUMERIC_PARSE_ERROR');
  });

  it('keeps the joint and parent of a name resolution error', () => {
    const error = BvhErrorFactory.nameResolutionError('missing', 'Tail', 'Hips');
    expect(error).toBeInstanceOf(BvhNameResolutionError);
    expect(error.jointName).toBe('Tail');
    expect(error.searchedUnder).toBe('Hips');
    expect(error.context).toEqual({ jointName: 'Tail', searchedUnder: 'Hips' });
  });

  it('exposes details for logging', () => {
    const error = BvhErrorFactory.stateError('not ready', 'genBvh');
    expect(error).toBeInstanceOf(BvhStateError);
    expect(error.name).toBe('BvhStateError');
    expect(error.getDetails()).toMatchObject({
      name: 'BvhStateError',
      message: 'not ready',
      code: 'BVH_STATE_ERROR',
      tag: 'BvhStateError',
      context: { operation: 'genBvh' },
    });
  });
});
