/**
 * BVH Format Constants
 *
 * Keywords, channel tokens and numeric formatting used by the parser and
 * the serializer.
 */

export const BVH_KEYWORDS = {
  HIERARCHY: 'HIERARCHY',
  ROOT: 'ROOT',
  JOINT: 'JOINT',
  OFFSET: 'OFFSET',
  CHANNELS: 'CHANNELS',
  END_SITE: 'End Site',
  MOTION: 'MOTION',
  FRAMES: 'Frames:',
  FRAME_TIME: 'Frame Time:',
} as const;

export const BVH_LIMITS = {
  /** A joint declares between one and six channels */
  MIN_CHANNELS: 1,
  MAX_CHANNELS: 6,

  /** Fractional digits accumulated by the float reader; any further digits are skipped */
  MAX_FRACTION_DIGITS: 128,

  /** Characters shown on each side of the cursor in parse diagnostics */
  CONTEXT_RADIUS: 15,
} as const;

/**
 * Decimal places per output precision.
 * 'high' matches most exporters, 'low' keeps files small.
 */
export const BVH_PRECISION = {
  high: 6,
  low: 2,
} as const;

/** Significant digits used for the Frame Time header */
export const FRAME_TIME_SIGNIFICANT_DIGITS = 7;

/** Offset written for the End Site of a childless root */
export const ROOT_END_SITE_OFFSET = '1.0\t0.0\t0.0';
