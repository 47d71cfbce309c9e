/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  CONVENTION: 'blender' as const,
  PRECISION: 'high' as const,
  FRAME_RATE: 60,
  RESPECT_BVH_TIME: true,
  FLEXIBLE_BONE_NAMES: true,
  OVERWRITE: false,
  RESAMPLE: false,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  BVH: '.bvh',
} as const;
