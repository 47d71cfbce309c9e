/**
 * BVH Formatter
 *
 * Fixed-point number formatting for BVH output. Every numeric field in
 * HIERARCHY and MOTION goes through here so precision stays consistent.
 */

import { BVH_PRECISION, FRAME_TIME_SIGNIFICANT_DIGITS } from '../constants/bvh';
import type { Vec3 } from './quaternion-utils';

export type BvhPrecision = keyof typeof BVH_PRECISION;

/**
 * Formats a value with a fixed number of decimals and a sign column:
 * positive values get a leading space, negative values a minus.
 * A negative value that rounds to zero is written as positive zero.
 * Example: 1.5 -> ' 1.500000', -0.25 -> '-0.250000'
 */
export function formatBvhFloat(value: number, precision: BvhPrecision = 'high'): string {
  const decimals = BVH_PRECISION[precision];
  const magnitude = Math.abs(value).toFixed(decimals);
  const isZero = /^0\.?0*$/.test(magnitude);
  return (value < 0 && !isZero ? '-' : ' ') + magnitude;
}

/**
 * Formats three values as tab-separated fixed-point fields.
 */
export function formatBvhTriple(values: Readonly<Vec3>, precision: BvhPrecision = 'high'): string {
  return `${formatBvhFloat(values[0], precision)}\t${formatBvhFloat(values[1], precision)}\t${formatBvhFloat(values[2], precision)}`;
}

/**
 * Formats the Frame Time header value (seconds per frame).
 * Example: 60 fps -> '0.01666667'
 */
export function formatFrameTime(frameRate: number): string {
  return String(Number((1 / frameRate).toPrecision(FRAME_TIME_SIGNIFICANT_DIGITS)));
}

/**
 * Indentation for a nesting level
 */
export function tabs(level: number): string {
  return '\t'.repeat(level);
}
